import { ColorRole } from '../types';

function roleIndex(role: ColorRole): 0 | 1 | 2 {
  switch (role) {
    case ColorRole.Transparent:
      return 0;
    case ColorRole.Shadow:
      return 1;
    case ColorRole.Opaque:
      return 2;
  }
}

/**
 * Counts of the roles of pixels adjacent to a given color, summed over
 * every pixel of that color in the image.
 */
export class AdjacencyInfo {
  private readonly counts: [number, number, number] = [0, 0, 0];

  count(role: ColorRole): number {
    return this.counts[roleIndex(role)];
  }

  increment(role: ColorRole): void {
    this.counts[roleIndex(role)]++;
  }

  total(): number {
    return this.counts[0] + this.counts[1] + this.counts[2];
  }

  /**
   * Fraction of adjacent pixels with `role`. Only defined when `total() > 0`.
   */
  fraction(role: ColorRole): number {
    const total = this.total();
    if (total === 0) {
      throw new RangeError('Cannot compute an adjacency fraction for a color with no neighbors');
    }
    return this.count(role) / total;
  }

  toJSON(): Record<ColorRole, number> {
    return {
      transparent: this.count(ColorRole.Transparent),
      shadow: this.count(ColorRole.Shadow),
      opaque: this.count(ColorRole.Opaque),
    };
  }
}
