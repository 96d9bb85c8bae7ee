import test from 'node:test';
import assert from 'node:assert/strict';

import {
  BLANK_GLYPH,
  VIEWPORT_CELLS,
  cellIndex,
  clearFrameBuffers,
  createFrameBuffers,
  depthAt,
  glyphAt,
  isInsideViewport,
} from '../src/torus/viewport.js';

test('viewport holds 1760 cells in both buffers', () => {
  const buffers = createFrameBuffers();
  assert.equal(VIEWPORT_CELLS, 1760);
  assert.equal(buffers.glyphs.length, 1760);
  assert.equal(buffers.depth.length, 1760);
  assert.ok(buffers.glyphs.every((code) => code === 32));
  assert.ok(buffers.depth.every((value) => value === 0));
});

test('cellIndex maps row-major coordinates', () => {
  assert.equal(cellIndex(0, 0), 0);
  assert.equal(cellIndex(5, 2), 165);
  assert.equal(cellIndex(79, 21), 1759);
});

test('cellIndex rejects coordinates outside the grid', () => {
  assert.throws(() => cellIndex(80, 0), RangeError);
  assert.throws(() => cellIndex(-1, 0), RangeError);
  assert.throws(() => cellIndex(0, 22), RangeError);
  assert.throws(() => cellIndex(1.5, 3), RangeError);
});

test('isInsideViewport excludes row 0, column 0 and the far edges', () => {
  assert.equal(isInsideViewport(0, 5), false);
  assert.equal(isInsideViewport(5, 0), false);
  assert.equal(isInsideViewport(1, 1), true);
  assert.equal(isInsideViewport(79, 21), true);
  assert.equal(isInsideViewport(80, 1), false);
  assert.equal(isInsideViewport(1, 22), false);
});

test('clearFrameBuffers blanks glyphs and zeroes depth', () => {
  const buffers = createFrameBuffers();
  buffers.glyphs[cellIndex(3, 4)] = '@'.charCodeAt(0);
  buffers.depth[cellIndex(3, 4)] = 0.25;
  assert.equal(glyphAt(buffers, 3, 4), '@');
  assert.equal(depthAt(buffers, 3, 4), 0.25);

  clearFrameBuffers(buffers);
  assert.equal(glyphAt(buffers, 3, 4), BLANK_GLYPH);
  assert.equal(depthAt(buffers, 3, 4), 0);
});
