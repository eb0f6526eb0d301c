import { loadBitmap } from './image-processor';
import { configExists, generateDefaultConfig, getConfigPath, readConfig, writeConfig } from './config';
import { classifyColors } from './lib/colorClassifier';
import { createInkMask } from './lib/inkMask';
import type { ClassificationMap } from './types';

export interface ClassifiedImage {
  width: number;
  height: number;
  classification: ClassificationMap;
  inkMask: Uint8Array;
}

export interface ClassifyImageFileOptions {
  /** Defaults to `<image basename>.jsonc` beside the image; used only if it exists. */
  configPath?: string;
  verbose?: boolean;
}

export async function classifyImageFile(
  imageFilepath: string,
  options: ClassifyImageFileOptions = {}
): Promise<ClassifiedImage> {
  const configFilepath = options.configPath ?? getConfigPath(imageFilepath);
  const config = configExists(configFilepath) ? readConfig(configFilepath) : generateDefaultConfig();
  if (options.verbose) {
    console.debug(`Using thresholds ${JSON.stringify(config.thresholds)}`);
  }

  const bitmap = await loadBitmap(imageFilepath);
  const classification = classifyColors(bitmap, {
    thresholds: config.thresholds,
    verbose: options.verbose,
  });

  return {
    width: bitmap.width,
    height: bitmap.height,
    classification,
    inkMask: createInkMask(bitmap, classification),
  };
}

/**
 * Write the default thresholds beside the image unless a config already
 * exists. Returns the config path and whether it was written.
 */
export function generateConfigForImage(imageFilepath: string): { configPath: string; written: boolean } {
  const configPath = getConfigPath(imageFilepath);
  if (configExists(configPath)) {
    return { configPath, written: false };
  }
  writeConfig(configPath, generateDefaultConfig());
  return { configPath, written: true };
}
