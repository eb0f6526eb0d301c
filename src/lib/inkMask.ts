/**
 * Black-and-white view of a subtitle bitmap for OCR: 1 where a pixel is
 * glyph ink, 0 for transparent and shadow pixels.
 */

import { colorToHex } from '../colors';
import { ClassificationInvariantError, InvalidBitmapError } from '../errors';
import { getPixel } from './pixelAccess';
import { ColorRole, type ClassificationMap, type RgbaBitmap } from '../types';

export function createInkMask(bitmap: RgbaBitmap, classification: ClassificationMap): Uint8Array {
  const { width, height } = bitmap;
  const mask = new Uint8Array(width * height);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const color = getPixel(bitmap, x, y);
      const role = classification.get(color);
      if (role === undefined) {
        throw new ClassificationInvariantError(`Color ${colorToHex(color)} at (${x}, ${y}) was never classified`);
      }
      if (role === ColorRole.Opaque) {
        mask[y * width + x] = 1;
      }
    }
  }

  return mask;
}

/**
 * Render a mask as text, `#` for ink and `.` for background.
 */
export function inkMaskToAscii(mask: Uint8Array, width: number, height: number): string {
  if (mask.length !== width * height) {
    throw new InvalidBitmapError(`Mask has ${mask.length} pixels, expected ${width * height}`);
  }
  const rows: string[] = [];
  for (let y = 0; y < height; y++) {
    let row = '';
    for (let x = 0; x < width; x++) {
      row += mask[y * width + x] === 1 ? '#' : '.';
    }
    rows.push(row);
  }
  return rows.join('\n');
}
