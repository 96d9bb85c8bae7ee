export const VIEWPORT_WIDTH = 80;
export const VIEWPORT_HEIGHT = 22;
export const VIEWPORT_CELLS = VIEWPORT_WIDTH * VIEWPORT_HEIGHT;

export const BLANK_GLYPH = ' ';
const BLANK_CODE = BLANK_GLYPH.charCodeAt(0);

/**
 * Per-frame character and depth grids, row-major, `VIEWPORT_CELLS` entries each.
 * Depth holds inverse distance to the viewer; 0 means nothing has been drawn.
 */
export type FrameBuffers = {
  glyphs: Uint8Array;
  depth: Float64Array;
};

export const createFrameBuffers = (): FrameBuffers => ({
  glyphs: new Uint8Array(VIEWPORT_CELLS).fill(BLANK_CODE),
  depth: new Float64Array(VIEWPORT_CELLS),
});

export const clearFrameBuffers = (buffers: FrameBuffers): FrameBuffers => {
  buffers.glyphs.fill(BLANK_CODE);
  buffers.depth.fill(0);
  return buffers;
};

export const cellIndex = (x: number, y: number): number => {
  if (
    !Number.isInteger(x) ||
    !Number.isInteger(y) ||
    x < 0 ||
    x >= VIEWPORT_WIDTH ||
    y < 0 ||
    y >= VIEWPORT_HEIGHT
  ) {
    throw new RangeError(`Cell (${x}, ${y}) is outside the ${VIEWPORT_WIDTH}×${VIEWPORT_HEIGHT} viewport.`);
  }
  return x + VIEWPORT_WIDTH * y;
};

// Row 0 and column 0 stay blank: only the strict interior is drawable.
export const isInsideViewport = (x: number, y: number): boolean =>
  x > 0 && x < VIEWPORT_WIDTH && y > 0 && y < VIEWPORT_HEIGHT;

export const glyphAt = (buffers: FrameBuffers, x: number, y: number): string =>
  String.fromCharCode(buffers.glyphs[cellIndex(x, y)] ?? BLANK_CODE);

export const depthAt = (buffers: FrameBuffers, x: number, y: number): number =>
  buffers.depth[cellIndex(x, y)] ?? 0;
