export {
  analyzeColors,
  classifyColors,
  classifyByAlpha,
  countAdjacentRoles,
  detectShadowColors,
} from './lib/colorClassifier';
export {
  DEFAULT_SHADOW_THRESHOLDS,
  assertValidThresholds,
  resolveThresholds,
} from './lib/thresholds';
export type { ClassifyOptions, ColorAnalysis, ShadowDetection } from './lib/colorClassifier';
export { AdjacencyInfo } from './lib/adjacency';
export { getPixel, getPixelOpt, assertValidBitmap, toSignedCoordinate } from './lib/pixelAccess';
export { createInkMask, inkMaskToAscii } from './lib/inkMask';
export { packColor, unpackColor, isTransparent, colorToHex } from './colors';
export { loadBitmap, bitmapFromJimp } from './image-processor';
export { classifyImageFile, generateConfigForImage } from './processor';
export type { ClassifiedImage, ClassifyImageFileOptions } from './processor';
export { readConfig, parseConfig, writeConfig, generateDefaultConfig, getConfigPath, configExists } from './config';
export type { Config } from './config';
export {
  CoordinateOverflowError,
  ClassificationInvariantError,
  InvalidBitmapError,
  ConfigError,
  InvalidThresholdError,
} from './errors';
export { ColorRole } from './types';
export type { Color, Rgba, RgbaBitmap, ClassificationMap, ShadowThresholds } from './types';
