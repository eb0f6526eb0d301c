#!/usr/bin/env node

import * as fs from 'fs';
import * as path from 'path';
import { classifyImageFile, generateConfigForImage } from './processor';
import { colorToHex } from './colors';
import { inkMaskToAscii } from './lib/inkMask';

const USAGE = 'Usage: subtitle-color-roles <image-file> [--mask] [--verbose] [--write-config]';

async function main() {
  const args = process.argv.slice(2);
  const flags = new Set(args.filter((arg) => arg.startsWith('--')));
  const positional = args.filter((arg) => !arg.startsWith('--'));
  const unknown = [...flags].filter((f) => !['--mask', '--verbose', '--write-config'].includes(f));

  if (positional.length !== 1 || unknown.length > 0) {
    console.error(USAGE);
    process.exit(1);
  }

  const imageFilepath = positional[0];

  if (!fs.existsSync(imageFilepath)) {
    console.error(`Error: Image file not found: ${imageFilepath}`);
    process.exit(1);
  }

  if (flags.has('--write-config')) {
    const { configPath, written } = generateConfigForImage(imageFilepath);
    console.log(written ? `Wrote ${configPath}` : `Config already exists: ${configPath}`);
  }

  const result = await classifyImageFile(imageFilepath, { verbose: flags.has('--verbose') });
  console.log(`Classifying ${path.basename(imageFilepath)} (${result.width}x${result.height})`);

  const colors = Array.from(result.classification.entries()).sort((a, b) => a[0] - b[0]);
  for (const [color, role] of colors) {
    console.log(`${colorToHex(color)}  ${role}`);
  }

  if (flags.has('--mask')) {
    console.log(inkMaskToAscii(result.inkMask, result.width, result.height));
  }
}

main().catch((error: unknown) => {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
