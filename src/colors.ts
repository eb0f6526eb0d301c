import { intToRGBA, rgbaToInt } from '@jimp/utils';
import type { Color, Rgba } from './types';

export function packColor(rgba: Rgba): Color {
  return rgbaToInt(rgba.r, rgba.g, rgba.b, rgba.a);
}

export function unpackColor(color: Color): Rgba {
  const { r, g, b, a } = intToRGBA(color);
  return { r, g, b, a };
}

/**
 * Is this color transparent or partially transparent?
 */
export function isTransparent(color: Color): boolean {
  return unpackColor(color).a < 0xff;
}

export function colorToHex(color: Color): string {
  const { r, g, b, a } = unpackColor(color);
  return '#' + [r, g, b, a].map((x) => {
    const hex = x.toString(16);
    return hex.length === 1 ? '0' + hex : hex;
  }).join('');
}
