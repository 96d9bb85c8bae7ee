import { setTimeout as delay } from 'node:timers/promises';

import type { ColorPalette } from '../palette/palettes.js';
import { isQuitKey, type KeySource } from '../terminal/keyboard.js';
import { composeFrame } from '../torus/compositor.js';
import { rasterizeTorus } from '../torus/rasterizer.js';
import {
  ROTATION_STEP,
  advanceRotation,
  createRotationState,
  type RotationState,
} from '../torus/rotation.js';
import { createFrameBuffers } from '../torus/viewport.js';
import { FrameStats, type FrameStatsSnapshot } from './frameStats.js';

export interface FrameSink {
  write(frame: string): unknown;
}

export type AnimationOptions = {
  palette: ColorPalette;
  frameIntervalMs: number;
  keys: KeySource;
  output: FrameSink;
  maxFrames?: number;
  rotation?: RotationState;
  rotationStep?: Readonly<RotationState>;
  stats?: FrameStats;
  sleep?: (ms: number) => Promise<unknown>;
};

export type AnimationSummary = {
  frames: number;
  rotation: RotationState;
  stats: FrameStatsSnapshot;
};

/**
 * Host loop. Rotation is the only state that outlives a frame; the buffers are
 * reused as scratch and fully rewritten each time. The quit key is checked once
 * per frame, before rendering.
 */
export const runAnimation = async (options: AnimationOptions): Promise<AnimationSummary> => {
  const sleep = options.sleep ?? ((ms: number) => delay(ms));
  const stats = options.stats ?? new FrameStats({ budgetMs: options.frameIntervalMs });
  const step = options.rotationStep ?? ROTATION_STEP;
  const buffers = createFrameBuffers();
  let rotation = options.rotation ?? createRotationState();
  let frames = 0;

  while (options.maxFrames === undefined || frames < options.maxFrames) {
    if (isQuitKey(options.keys.pollKey())) {
      break;
    }

    stats.beginFrame(frames);
    rasterizeTorus(rotation, buffers);
    options.output.write(composeFrame(buffers, options.palette));
    stats.endFrame();
    frames += 1;

    rotation = advanceRotation(rotation, step);
    await sleep(options.frameIntervalMs);
  }

  return { frames, rotation, stats: stats.snapshot() };
};
