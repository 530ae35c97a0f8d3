import { InvalidBoundsError } from "./errors";

export interface SizeLike {
  readonly width: number;
  readonly height: number;
}

/**
 * Extent of a cell in cell units: `width` columns by `height` rows.
 *
 * Sizes are also used as deltas, so arithmetic results may be zero or negative;
 * only a {@link Box} rejects non-positive extents.
 */
export class Size implements SizeLike {
  static readonly UNIT = new Size(1, 1);

  readonly width: number;
  readonly height: number;

  constructor(width: number, height: number) {
    if (!Number.isSafeInteger(width) || !Number.isSafeInteger(height)) {
      throw new InvalidBoundsError(`Size must use integer extents, got (${width} x ${height})`);
    }
    this.width = width;
    this.height = height;
    Object.freeze(this);
  }

  static from(value: SizeLike): Size {
    return value instanceof Size ? value : new Size(value.width, value.height);
  }

  add(other: SizeLike): Size {
    return new Size(this.width + other.width, this.height + other.height);
  }

  subtract(other: SizeLike): Size {
    return new Size(this.width - other.width, this.height - other.height);
  }

  scale(factor: number): Size {
    return new Size(this.width * factor, this.height * factor);
  }

  negate(): Size {
    return new Size(-this.width, -this.height);
  }

  equals(other: SizeLike): boolean {
    return this.width === other.width && this.height === other.height;
  }

  toString(): string {
    return `(${this.width} x ${this.height})`;
  }
}
