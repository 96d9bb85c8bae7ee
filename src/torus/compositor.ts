import type { ColorPalette } from '../palette/palettes.js';
import { classifyGlyph } from './shading.js';
import { BLANK_GLYPH, VIEWPORT_HEIGHT, VIEWPORT_WIDTH, type FrameBuffers } from './viewport.js';

export const CURSOR_HOME = '\x1b[H';
export const COLOR_RESET = '\x1b[0m';

/**
 * Serializes one frame for the terminal: cursor home, then every row on its own
 * line. Each shaded glyph carries its own color start and reset so colors never
 * run into the next cell; blank cells are bare spaces.
 */
export const composeFrame = (buffers: FrameBuffers, palette: ColorPalette): string => {
  const parts: string[] = [CURSOR_HOME];
  for (let row = 0; row < VIEWPORT_HEIGHT; row++) {
    parts.push('\n');
    const offset = row * VIEWPORT_WIDTH;
    for (let col = 0; col < VIEWPORT_WIDTH; col++) {
      const code = buffers.glyphs[offset + col];
      const glyph = code === undefined ? BLANK_GLYPH : String.fromCharCode(code);
      const band = classifyGlyph(glyph);
      parts.push(band === null ? glyph : `${palette[band]}${glyph}${COLOR_RESET}`);
    }
  }
  return parts.join('');
};
