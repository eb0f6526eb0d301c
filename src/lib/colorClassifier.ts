/**
 * Color role classification for rendered subtitle bitmaps.
 *
 * Every distinct color is labelled transparent, shadow or opaque. Shadow
 * colors are opaque outline/drop-shadow colors that OCR should treat as
 * background so that letters separate cleanly.
 */

import { colorToHex, isTransparent } from '../colors';
import { ClassificationInvariantError } from '../errors';
import { AdjacencyInfo } from './adjacency';
import { assertValidBitmap, getPixel, getPixelOpt, toSignedCoordinate } from './pixelAccess';
import { assertValidThresholds, DEFAULT_SHADOW_THRESHOLDS, resolveThresholds } from './thresholds';
import {
  ColorRole,
  type ClassificationMap,
  type Color,
  type RgbaBitmap,
  type ShadowThresholds,
} from '../types';

export { DEFAULT_SHADOW_THRESHOLDS };

export interface ClassifyOptions {
  thresholds?: Partial<ShadowThresholds>;
  /** Log the intermediate maps with `console.debug`. */
  verbose?: boolean;
}

export interface ColorAnalysis {
  classification: ClassificationMap;
  adjacency: Map<Color, AdjacencyInfo>;
  totalAdjacency: number;
  haveOpaqueInsideShadow: boolean;
}

export interface ShadowDetection {
  totalAdjacency: number;
  haveOpaqueInsideShadow: boolean;
  shadowColors: Color[];
}

const NEIGHBOR_OFFSETS: ReadonlyArray<readonly [number, number]> = [
  [-1, -1], [0, -1], [1, -1],
  [-1, 0], [1, 0],
  [-1, 1], [0, 1], [1, 1],
];

/**
 * Divide colors into transparent and opaque based on alpha. The first
 * role recorded for a color wins.
 */
export function classifyByAlpha(bitmap: RgbaBitmap): ClassificationMap {
  const classification: ClassificationMap = new Map();
  for (let y = 0; y < bitmap.height; y++) {
    for (let x = 0; x < bitmap.width; x++) {
      const color = getPixel(bitmap, x, y);
      if (!classification.has(color)) {
        classification.set(color, isTransparent(color) ? ColorRole.Transparent : ColorRole.Opaque);
      }
    }
  }
  return classification;
}

/**
 * Count the roles of the 8 neighbors of every non-transparent pixel,
 * grouped by the pixel's color. Out-of-bounds neighbors count as
 * transparent; neighbors of the same color are not counted.
 */
export function countAdjacentRoles(
  bitmap: RgbaBitmap,
  classification: ClassificationMap
): Map<Color, AdjacencyInfo> {
  const adjacency = new Map<Color, AdjacencyInfo>();
  for (const color of classification.keys()) {
    if (!isTransparent(color)) {
      adjacency.set(color, new AdjacencyInfo());
    }
  }

  for (let y = 0; y < bitmap.height; y++) {
    const sy = toSignedCoordinate(y);
    for (let x = 0; x < bitmap.width; x++) {
      const color = getPixel(bitmap, x, y);
      if (isTransparent(color)) continue;

      const info = adjacency.get(color);
      if (!info) {
        throw new ClassificationInvariantError(`No adjacency record for color ${colorToHex(color)}`);
      }

      const sx = toSignedCoordinate(x);
      for (const [dx, dy] of NEIGHBOR_OFFSETS) {
        const neighbor = getPixelOpt(bitmap, sx + dx, sy + dy);
        if (neighbor === color) continue;

        if (neighbor === undefined) {
          info.increment(ColorRole.Transparent);
          continue;
        }
        const role = classification.get(neighbor);
        if (role === undefined) {
          throw new ClassificationInvariantError(
            `Neighbor color ${colorToHex(neighbor)} at (${sx + dx}, ${sy + dy}) was never classified`
          );
        }
        info.increment(role);
      }
    }
  }

  return adjacency;
}

/**
 * Find colors that look like a shadow or outline around the text.
 *
 * Shadows are only searched for when some significant color is almost
 * entirely surrounded by opaque pixels, i.e. there is opaque text sitting
 * inside an outline. A shadow color then borders both opaque and
 * transparent pixels.
 */
export function detectShadowColors(
  adjacency: ReadonlyMap<Color, AdjacencyInfo>,
  thresholds: ShadowThresholds = DEFAULT_SHADOW_THRESHOLDS
): ShadowDetection {
  assertValidThresholds(thresholds);

  let totalAdjacency = 0;
  for (const info of adjacency.values()) {
    totalAdjacency += info.total();
  }

  // Integer division, so a color at exactly the cutoff still counts.
  const cutoff = Math.floor(totalAdjacency / thresholds.significanceDivisor);
  let haveOpaqueInsideShadow = false;
  for (const info of adjacency.values()) {
    const total = info.total();
    if (
      total > 0 &&
      total >= cutoff &&
      info.fraction(ColorRole.Opaque) > thresholds.opaqueInsideShadowThreshold
    ) {
      haveOpaqueInsideShadow = true;
      break;
    }
  }

  const shadowColors: Color[] = [];
  if (haveOpaqueInsideShadow) {
    for (const [color, info] of adjacency) {
      if (info.total() === 0) continue;
      if (
        info.fraction(ColorRole.Opaque) > thresholds.shadowOpaqueThreshold &&
        info.fraction(ColorRole.Transparent) > thresholds.shadowTransparentThreshold
      ) {
        shadowColors.push(color);
      }
    }
  }

  return { totalAdjacency, haveOpaqueInsideShadow, shadowColors };
}

export function analyzeColors(bitmap: RgbaBitmap, options: ClassifyOptions = {}): ColorAnalysis {
  assertValidBitmap(bitmap);
  const thresholds = resolveThresholds(options.thresholds);
  const log = options.verbose ? console.debug : undefined;

  const classification = classifyByAlpha(bitmap);
  log?.('color classification (initial):', describeClassification(classification));

  const adjacency = countAdjacentRoles(bitmap, classification);
  log?.('color adjacency:', describeAdjacency(adjacency));

  const { totalAdjacency, haveOpaqueInsideShadow, shadowColors } = detectShadowColors(
    adjacency,
    thresholds
  );
  for (const color of shadowColors) {
    classification.set(color, ColorRole.Shadow);
  }
  log?.('color classification (final):', describeClassification(classification));

  return { classification, adjacency, totalAdjacency, haveOpaqueInsideShadow };
}

/**
 * Classify every color in `bitmap` as transparent, shadow or opaque.
 */
export function classifyColors(bitmap: RgbaBitmap, options: ClassifyOptions = {}): ClassificationMap {
  return analyzeColors(bitmap, options).classification;
}

function describeClassification(classification: ClassificationMap): Record<string, ColorRole> {
  const out: Record<string, ColorRole> = {};
  for (const [color, role] of classification) {
    out[colorToHex(color)] = role;
  }
  return out;
}

function describeAdjacency(adjacency: ReadonlyMap<Color, AdjacencyInfo>): Record<string, Record<ColorRole, number>> {
  const out: Record<string, Record<ColorRole, number>> = {};
  for (const [color, info] of adjacency) {
    out[colorToHex(color)] = info.toJSON();
  }
  return out;
}
