import test from 'node:test';
import assert from 'node:assert/strict';

import { selectPalette } from '../src/palette/palettes.js';
import { runAnimation } from '../src/runtime/animation.js';
import type { KeySource } from '../src/terminal/keyboard.js';
import { composeFrame } from '../src/torus/compositor.js';
import { rasterizeTorus } from '../src/torus/rasterizer.js';
import { advanceRotation, createRotationState } from '../src/torus/rotation.js';

class ScriptedKeys implements KeySource {
  closed = false;

  constructor(private readonly script: Array<string | null>) {}

  pollKey(): string | null {
    return this.script.shift() ?? null;
  }

  close(): void {
    this.closed = true;
  }
}

const { palette } = selectPalette('red');

const createHarness = (keys: Array<string | null>) => {
  const frames: string[] = [];
  const sleeps: number[] = [];
  return {
    frames,
    sleeps,
    options: {
      palette,
      frameIntervalMs: 25,
      keys: new ScriptedKeys(keys),
      output: { write: (frame: string) => frames.push(frame) },
      sleep: async (ms: number) => {
        sleeps.push(ms);
      },
    },
  };
};

test('runs until maxFrames, sleeping the pacing interval after each frame', async () => {
  const harness = createHarness([]);
  const summary = await runAnimation({ ...harness.options, maxFrames: 3 });

  assert.equal(summary.frames, 3);
  assert.equal(harness.frames.length, 3);
  assert.deepEqual(harness.sleeps, [25, 25, 25]);
  assert.equal(summary.stats.frames, 3);

  let expected = createRotationState();
  expected = advanceRotation(advanceRotation(advanceRotation(expected)));
  assert.deepEqual(summary.rotation, expected);
});

test('each frame renders the rotation for that frame', async () => {
  const harness = createHarness([]);
  await runAnimation({ ...harness.options, maxFrames: 2 });

  const start = createRotationState();
  assert.equal(harness.frames[0], composeFrame(rasterizeTorus(start), palette));
  assert.equal(harness.frames[1], composeFrame(rasterizeTorus(advanceRotation(start)), palette));
});

test('a quit key stops the loop before the next frame is drawn', async () => {
  const harness = createHarness([null, 'x', 'q', null]);
  const summary = await runAnimation(harness.options);

  assert.equal(summary.frames, 2);
  assert.equal(harness.frames.length, 2);
  assert.deepEqual(harness.sleeps, [25, 25]);
});

test('escape before the first frame draws nothing', async () => {
  const harness = createHarness(['\x1b']);
  const summary = await runAnimation({ ...harness.options, rotation: { a: 1, b: 2 } });

  assert.equal(summary.frames, 0);
  assert.deepEqual(harness.frames, []);
  assert.deepEqual(summary.rotation, { a: 1, b: 2 });
});
