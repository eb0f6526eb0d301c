import { rgbaToInt } from '@jimp/utils';
import { CoordinateOverflowError, InvalidBitmapError } from '../errors';
import type { Color, RgbaBitmap } from '../types';

const I32_MAX = 0x7fffffff;

/**
 * Convert a pixel index to the signed coordinate space used for
 * neighbor offsets.
 */
export function toSignedCoordinate(index: number): number {
  if (!Number.isInteger(index) || index < -I32_MAX - 1 || index > I32_MAX) {
    throw new CoordinateOverflowError(index);
  }
  return index;
}

export function assertValidBitmap(bitmap: RgbaBitmap): void {
  const { width, height, data } = bitmap;
  if (!Number.isInteger(width) || width < 0 || !Number.isInteger(height) || height < 0) {
    throw new InvalidBitmapError(`Invalid bitmap dimensions ${width}x${height}`);
  }
  const expected = width * height * 4;
  if (data.length !== expected) {
    throw new InvalidBitmapError(
      `Bitmap data has ${data.length} bytes, expected ${expected} for ${width}x${height} RGBA`
    );
  }
}

/**
 * Packed color of an in-bounds pixel. Callers guarantee the bounds.
 */
export function getPixel(bitmap: RgbaBitmap, x: number, y: number): Color {
  const idx = (y * bitmap.width + x) * 4;
  const { data } = bitmap;
  return rgbaToInt(data[idx], data[idx + 1], data[idx + 2], data[idx + 3]);
}

/**
 * Return the pixel at `x` and `y` if those coordinates fall inside the
 * image, or `undefined` if they're out of bounds.
 */
export function getPixelOpt(bitmap: RgbaBitmap, x: number, y: number): Color | undefined {
  if (x < 0 || y < 0 || x >= bitmap.width || y >= bitmap.height) {
    return undefined;
  }
  return getPixel(bitmap, x, y);
}
