export const SHADING_GLYPHS = '.,-~:;=!*#$@';

const MAX_SHADE = SHADING_GLYPHS.length - 1;

export type IntensityBand = 0 | 1 | 2;

const BAND_MEMBERS: ReadonlyArray<readonly [IntensityBand, string]> = [
  [0, '.,-'],
  [1, '~:;='],
  [2, '!*#$@'],
];

export const shadeIndex = (score: number): number => {
  if (Number.isNaN(score)) {
    return 0;
  }
  const index = Math.trunc(score);
  return index < 0 ? 0 : index > MAX_SHADE ? MAX_SHADE : index;
};

export const selectGlyph = (score: number): string => SHADING_GLYPHS.charAt(shadeIndex(score));

export const classifyGlyph = (glyph: string): IntensityBand | null => {
  if (glyph.length !== 1) {
    return null;
  }
  for (const [band, members] of BAND_MEMBERS) {
    if (members.includes(glyph)) {
      return band;
    }
  }
  return null;
};
