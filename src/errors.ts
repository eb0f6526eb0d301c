/**
 * A pixel index could not be converted to the signed 32-bit coordinate
 * space used for neighbor offsets.
 */
export class CoordinateOverflowError extends Error {
  constructor(public readonly value: number) {
    super(`Pixel coordinate ${value} does not fit in a signed 32-bit integer`);
    this.name = 'CoordinateOverflowError';
  }
}

/**
 * Internal bookkeeping went wrong (e.g. a neighbor color that the initial
 * pass never classified). This is a bug, not a condition callers recover from.
 */
export class ClassificationInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ClassificationInvariantError';
  }
}

export class InvalidBitmapError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidBitmapError';
  }
}

export class ConfigError extends Error {
  constructor(message: string, public readonly filepath?: string) {
    super(filepath ? `Invalid config ${filepath}: ${message}` : `Invalid config: ${message}`);
    this.name = 'ConfigError';
  }
}

export class InvalidThresholdError extends RangeError {
  constructor(public readonly key: string, public readonly requirement: string) {
    super(`Shadow threshold ${key} ${requirement}`);
    this.name = 'InvalidThresholdError';
  }
}
