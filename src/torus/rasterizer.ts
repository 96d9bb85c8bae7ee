import type { RotationState } from './rotation.js';
import { selectGlyph } from './shading.js';
import {
  cellIndex,
  clearFrameBuffers,
  createFrameBuffers,
  isInsideViewport,
  type FrameBuffers,
} from './viewport.js';

export const SWEEP_LIMIT = 6.28;
/** Step of the cross-section angle (around the tube). */
export const TUBE_STEP = 0.02;
/** Step of the sweep angle (around the central axis). */
export const RING_STEP = 0.07;

const TUBE_RADIUS = 1;
const RING_RADIUS = 2;
const CAMERA_OFFSET = 5;
const CENTER_X = 40;
const CENTER_Y = 12;
const SCALE_X = 30;
const SCALE_Y = 15;
const SHADE_SCALE = 8;

export type SurfaceSample = {
  x: number;
  y: number;
  /** Inverse distance to the viewer. */
  depth: number;
  /** Signed brightness score, already scaled for the shading table. */
  luminance: number;
};

export const projectSurfacePoint = (
  tube: number,
  ring: number,
  rotation: RotationState,
): SurfaceSample => {
  const sinTube = Math.sin(tube);
  const cosTube = Math.cos(tube);
  const sinRing = Math.sin(ring);
  const cosRing = Math.cos(ring);
  const sinA = Math.sin(rotation.a);
  const cosA = Math.cos(rotation.a);
  const sinB = Math.sin(rotation.b);
  const cosB = Math.cos(rotation.b);

  const circle = RING_RADIUS + TUBE_RADIUS * cosRing;
  const depth = 1 / (sinTube * circle * sinA + sinRing * cosA + CAMERA_OFFSET);
  const lifted = sinTube * circle * cosA - sinRing * sinA;

  const x = Math.trunc(CENTER_X + SCALE_X * depth * (cosTube * circle * cosB - lifted * sinB));
  const y = Math.trunc(CENTER_Y + SCALE_Y * depth * (cosTube * circle * sinB + lifted * cosB));

  // The sign convention decides which side of the torus faces the light.
  const luminance =
    SHADE_SCALE *
    ((sinRing * sinA - sinTube * cosRing * cosA) * cosB -
      sinTube * cosRing * sinA -
      sinRing * cosA -
      cosTube * cosRing * sinB);

  return { x, y, depth, luminance };
};

export const forEachSurfaceSample = (
  rotation: RotationState,
  visit: (sample: SurfaceSample) => void,
): void => {
  for (let ringStep = 0; ringStep * RING_STEP < SWEEP_LIMIT; ringStep++) {
    const ring = ringStep * RING_STEP;
    for (let tubeStep = 0; tubeStep * TUBE_STEP < SWEEP_LIMIT; tubeStep++) {
      visit(projectSurfacePoint(tubeStep * TUBE_STEP, ring, rotation));
    }
  }
};

export const rasterizeTorus = (
  rotation: RotationState,
  buffers: FrameBuffers = createFrameBuffers(),
): FrameBuffers => {
  clearFrameBuffers(buffers);
  const { glyphs, depth } = buffers;
  forEachSurfaceSample(rotation, (sample) => {
    if (!isInsideViewport(sample.x, sample.y)) {
      return;
    }
    const index = cellIndex(sample.x, sample.y);
    if (sample.depth > (depth[index] ?? 0)) {
      depth[index] = sample.depth;
      glyphs[index] = selectGlyph(sample.luminance).charCodeAt(0);
    }
  });
  return buffers;
};
