import * as fs from 'fs';
import * as path from 'path';
import { parse as parseJsonc, printParseErrorCode, type ParseError } from 'jsonc-parser';
import { DEFAULT_SHADOW_THRESHOLDS, resolveThresholds, THRESHOLD_KEYS, thresholdRequirement } from './lib/thresholds';
import { ConfigError, InvalidThresholdError } from './errors';
import type { ShadowThresholds } from './types';

export interface Config {
  thresholds: ShadowThresholds;
}

export function generateDefaultConfig(): Config {
  return { thresholds: { ...DEFAULT_SHADOW_THRESHOLDS } };
}

export function writeConfig(filepath: string, config: Config): void {
  const jsonContent = JSON.stringify(config, null, 2);

  const commentBlock = `// Shadow detection thresholds:
//
// significanceDivisor
//   A color only signals "opaque text inside an outline" when it accounts
//   for at least 1/significanceDivisor of all neighbor observations.
//
// opaqueInsideShadowThreshold
//   Fraction of opaque neighbors a significant color needs for that signal.
//
// shadowOpaqueThreshold, shadowTransparentThreshold
//   Once the signal is seen, colors bordering more than these fractions of
//   opaque AND transparent pixels are classified as shadow.
//
`;

  fs.writeFileSync(filepath, commentBlock + jsonContent + '\n', 'utf-8');
}

export function parseConfig(content: string, filepath?: string): Config {
  const errors: ParseError[] = [];
  const raw: unknown = parseJsonc(content, errors, { allowTrailingComma: true });
  if (errors.length > 0) {
    const first = errors[0];
    throw new ConfigError(`${printParseErrorCode(first.error)} at offset ${first.offset}`, filepath);
  }
  if (!isRecord(raw)) {
    throw new ConfigError('expected a JSON object', filepath);
  }

  if (raw.thresholds === undefined) {
    return { thresholds: resolveThresholds() };
  }
  if (!isRecord(raw.thresholds)) {
    throw new ConfigError('"thresholds" must be an object', filepath);
  }

  const overrides: Partial<ShadowThresholds> = {};
  for (const key of THRESHOLD_KEYS) {
    const value = raw.thresholds[key];
    if (value === undefined) continue;
    if (typeof value !== 'number') {
      throw new ConfigError(`"thresholds.${key}" ${thresholdRequirement(key)}`, filepath);
    }
    overrides[key] = value;
  }

  try {
    return { thresholds: resolveThresholds(overrides) };
  } catch (error: unknown) {
    if (error instanceof InvalidThresholdError) {
      throw new ConfigError(`"thresholds.${error.key}" ${error.requirement}`, filepath);
    }
    throw error;
  }
}

export function readConfig(filepath: string): Config {
  const content = fs.readFileSync(filepath, 'utf-8');
  return parseConfig(content, filepath);
}

export function configExists(filepath: string): boolean {
  return fs.existsSync(filepath);
}

export function getConfigPath(imageFilepath: string): string {
  const dir = path.dirname(imageFilepath);
  const basename = path.basename(imageFilepath, path.extname(imageFilepath));
  return path.join(dir, `${basename}.jsonc`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
