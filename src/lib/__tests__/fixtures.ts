import { unpackColor } from '../../colors';
import { AdjacencyInfo } from '../adjacency';
import { ColorRole, type Color, type RgbaBitmap } from '../../types';

export const TRANSPARENT = 0x00000000;
export const OUTLINE_BLACK = 0x000000ff;
export const FILL_GRAY = 0x999999ff;
export const HIGHLIGHT_WHITE = 0xf0f0f0ff;

/**
 * A gray letter with a white highlight inside a one-pixel black outline.
 */
export const OUTLINED_GLYPH = [
  '.......',
  '.#####.',
  '.#ooo#.',
  '.#o+o#.',
  '.#ooo#.',
  '.#####.',
  '.......',
];

export const GLYPH_PALETTE: Record<string, Color> = {
  '.': TRANSPARENT,
  '#': OUTLINE_BLACK,
  'o': FILL_GRAY,
  '+': HIGHLIGHT_WHITE,
};

/**
 * The outlined glyph surrounded by a half-transparent halo, which borders
 * both the outline and the fully transparent background.
 */
export const HALO_GLYPH = [
  '.........',
  '.hhhhhhh.',
  '.h#####h.',
  '.h#ooo#h.',
  '.h#o+o#h.',
  '.h#ooo#h.',
  '.h#####h.',
  '.hhhhhhh.',
  '.........',
];

export const HALO = 0x00000080;

export const HALO_PALETTE: Record<string, Color> = { ...GLYPH_PALETTE, h: HALO };

export function adjacencyFromCounts(counts: Partial<Record<ColorRole, number>>): AdjacencyInfo {
  const info = new AdjacencyInfo();
  for (const role of Object.values(ColorRole)) {
    for (let i = 0; i < (counts[role] ?? 0); i++) {
      info.increment(role);
    }
  }
  return info;
}

/**
 * Build a bitmap from rows of palette characters.
 */
export function bitmapFromRows(rows: string[], palette: Record<string, Color>): RgbaBitmap {
  const height = rows.length;
  const width = height > 0 ? rows[0].length : 0;
  const data = new Uint8ClampedArray(width * height * 4);

  for (let y = 0; y < height; y++) {
    if (rows[y].length !== width) {
      throw new Error(`Row ${y} has ${rows[y].length} pixels, expected ${width}`);
    }
    for (let x = 0; x < width; x++) {
      const color = palette[rows[y][x]];
      if (color === undefined) {
        throw new Error(`No palette entry for '${rows[y][x]}'`);
      }
      const { r, g, b, a } = unpackColor(color);
      const idx = (y * width + x) * 4;
      data[idx] = r;
      data[idx + 1] = g;
      data[idx + 2] = b;
      data[idx + 3] = a;
    }
  }

  return { width, height, data };
}
