/**
 * A color packed as an unsigned 32-bit `0xRRGGBBAA` integer, the same
 * packing jimp uses for `getPixelColor`.
 */
export type Color = number;

export interface Rgba {
  r: number;
  g: number;
  b: number;
  a: number;
}

/**
 * Row-major RGBA pixels, 4 bytes per pixel. A jimp image's `bitmap`
 * already has this shape.
 */
export interface RgbaBitmap {
  width: number;
  height: number;
  data: Uint8Array | Uint8ClampedArray;
}

export const ColorRole = {
  /** Fully or partially transparent. */
  Transparent: 'transparent',
  /** Opaque, but behaves like an outline or drop shadow around the text. */
  Shadow: 'shadow',
  /** Opaque glyph ink, used for letter recognition. */
  Opaque: 'opaque',
} as const;

export type ColorRole = (typeof ColorRole)[keyof typeof ColorRole];

export type ClassificationMap = Map<Color, ColorRole>;

export interface ShadowThresholds {
  /** A color must account for at least `1 / significanceDivisor` of all adjacency observations. */
  significanceDivisor: number;
  /** Fraction of opaque neighbors above which a significant color looks like it sits inside a shadow. */
  opaqueInsideShadowThreshold: number;
  shadowOpaqueThreshold: number;
  shadowTransparentThreshold: number;
}
