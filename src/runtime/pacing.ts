/** Roughly 30 frames per second at speed 1. */
export const BASE_FRAME_INTERVAL_MS = 33.333;

export const DEFAULT_SPEED = 1;

export type SpeedParseResult = {
  speed: number;
  warning?: string;
};

export const parseSpeedFactor = (raw: string): SpeedParseResult => {
  const trimmed = raw.trim();
  const value = trimmed === '' ? Number.NaN : Number(trimmed);
  if (!Number.isFinite(value) || value <= 0) {
    return {
      speed: DEFAULT_SPEED,
      warning: `Invalid speed factor "${raw}". Must be a positive number. Using default ${DEFAULT_SPEED.toFixed(1)}.`,
    };
  }
  return { speed: value };
};

/** Longest delay a Node timer accepts; anything above fires after 1ms. */
export const MAX_FRAME_INTERVAL_MS = 2_147_483_647;

export const frameIntervalMs = (speed: number, baseMs = BASE_FRAME_INTERVAL_MS): number =>
  Math.min(baseMs / speed, MAX_FRAME_INTERVAL_MS);
