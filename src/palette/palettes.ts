/** Foreground escape sequences for low, medium and high intensity. */
export type ColorPalette = readonly [low: string, medium: string, high: string];

export type PaletteName = 'green' | 'red' | 'blue' | 'cyan' | 'magenta' | 'yellow' | 'white';

type Rgb = readonly [number, number, number];

export const DEFAULT_PALETTE: PaletteName = 'green';

export const PALETTE_NAMES: readonly PaletteName[] = [
  'green',
  'red',
  'blue',
  'cyan',
  'magenta',
  'yellow',
  'white',
];

const PALETTE_LEVELS: Record<PaletteName, readonly [Rgb, Rgb, Rgb]> = {
  green: [
    [0, 100, 0],
    [0, 180, 0],
    [100, 255, 100],
  ],
  red: [
    [100, 0, 0],
    [180, 0, 0],
    [255, 100, 100],
  ],
  blue: [
    [0, 0, 100],
    [0, 0, 180],
    [100, 100, 255],
  ],
  cyan: [
    [0, 100, 100],
    [0, 180, 180],
    [100, 255, 255],
  ],
  magenta: [
    [100, 0, 100],
    [180, 0, 180],
    [255, 100, 255],
  ],
  yellow: [
    [100, 100, 0],
    [180, 180, 0],
    [255, 255, 100],
  ],
  white: [
    [100, 100, 100],
    [180, 180, 180],
    [255, 255, 255],
  ],
};

// German names accepted alongside the English ones.
const PALETTE_ALIASES: ReadonlyMap<string, PaletteName> = new Map<string, PaletteName>([
  ['gruen', 'green'],
  ['rot', 'red'],
  ['blau', 'blue'],
  ['gelb', 'yellow'],
  ['weiss', 'white'],
]);

export const truecolor = ([r, g, b]: Rgb): string => `\x1b[38;2;${r};${g};${b}m`;

const buildPalette = (levels: readonly [Rgb, Rgb, Rgb]): ColorPalette =>
  Object.freeze([truecolor(levels[0]), truecolor(levels[1]), truecolor(levels[2])] as const);

const PALETTES: Readonly<Record<PaletteName, ColorPalette>> = Object.freeze({
  green: buildPalette(PALETTE_LEVELS.green),
  red: buildPalette(PALETTE_LEVELS.red),
  blue: buildPalette(PALETTE_LEVELS.blue),
  cyan: buildPalette(PALETTE_LEVELS.cyan),
  magenta: buildPalette(PALETTE_LEVELS.magenta),
  yellow: buildPalette(PALETTE_LEVELS.yellow),
  white: buildPalette(PALETTE_LEVELS.white),
});

export type PaletteSelection = {
  name: PaletteName;
  palette: ColorPalette;
  warning?: string;
};

const PALETTE_NAME_SET: ReadonlySet<string> = new Set(PALETTE_NAMES);

const isPaletteName = (value: string): value is PaletteName => PALETTE_NAME_SET.has(value);

export const resolvePaletteName = (raw: string): PaletteName | null => {
  const normalized = raw.trim().toLowerCase();
  if (isPaletteName(normalized)) {
    return normalized;
  }
  return PALETTE_ALIASES.get(normalized) ?? null;
};

export const selectPalette = (raw: string): PaletteSelection => {
  const name = resolvePaletteName(raw);
  if (name) {
    return { name, palette: PALETTES[name] };
  }
  return {
    name: DEFAULT_PALETTE,
    palette: PALETTES[DEFAULT_PALETTE],
    warning: `Unknown color "${raw}". Using default "${DEFAULT_PALETTE}". Available: ${PALETTE_NAMES.join(', ')}`,
  };
};
