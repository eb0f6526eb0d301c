import { InvalidThresholdError } from '../errors';
import type { ShadowThresholds } from '../types';

// Empirically tuned heuristic constants.
export const DEFAULT_SHADOW_THRESHOLDS: ShadowThresholds = {
  significanceDivisor: 4,
  opaqueInsideShadowThreshold: 0.95,
  shadowOpaqueThreshold: 0.33,
  shadowTransparentThreshold: 0.33,
};

export const THRESHOLD_KEYS = [
  'significanceDivisor',
  'opaqueInsideShadowThreshold',
  'shadowOpaqueThreshold',
  'shadowTransparentThreshold',
] as const satisfies ReadonlyArray<keyof ShadowThresholds>;

export function thresholdRequirement(key: keyof ShadowThresholds): string {
  return key === 'significanceDivisor' ? 'must be a positive number' : 'must be a number in (0, 1]';
}

export function assertValidThresholds(thresholds: ShadowThresholds): void {
  for (const key of THRESHOLD_KEYS) {
    const value = thresholds[key];
    const valid = key === 'significanceDivisor'
      ? typeof value === 'number' && Number.isFinite(value) && value > 0
      : typeof value === 'number' && value > 0 && value <= 1;
    if (!valid) {
      throw new InvalidThresholdError(key, thresholdRequirement(key));
    }
  }
}

/**
 * Merge overrides over the defaults. Keys set to `undefined` keep their
 * default.
 */
export function resolveThresholds(overrides: Partial<ShadowThresholds> = {}): ShadowThresholds {
  const thresholds: ShadowThresholds = { ...DEFAULT_SHADOW_THRESHOLDS };
  for (const key of THRESHOLD_KEYS) {
    const value = overrides[key];
    if (value !== undefined) {
      thresholds[key] = value;
    }
  }
  assertValidThresholds(thresholds);
  return thresholds;
}
