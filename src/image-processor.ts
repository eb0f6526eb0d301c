import { Jimp } from 'jimp';
import { assertValidBitmap } from './lib/pixelAccess';
import type { RgbaBitmap } from './types';

/**
 * Decode an image file (or an in-memory encoded image) into an RGBA bitmap.
 */
export async function loadBitmap(source: string | Buffer): Promise<RgbaBitmap> {
  const image = await Jimp.read(source);
  return bitmapFromJimp(image);
}

export function bitmapFromJimp(image: { bitmap: RgbaBitmap }): RgbaBitmap {
  const { width, height, data } = image.bitmap;
  const bitmap = { width, height, data };
  assertValidBitmap(bitmap);
  return bitmap;
}
