import { alphabetToInt, intToAlphabet } from "./alphabet";
import { InvalidBoundsError } from "./errors";
import type { SizeLike } from "./size";

export interface CoordinateLike {
  readonly x: number;
  readonly y: number;
}

const COORDINATE_RE = /^([A-Z]+)([1-9]\d*)$/;

/**
 * Position of a cell in a grid: `x` is the column, `y` the row. Both are 1-indexed.
 *
 * Coordinates are ordered row-major: by `y`, then by `x`.
 */
export class Coordinate implements CoordinateLike {
  static readonly ORIGIN = new Coordinate(1, 1);

  readonly x: number;
  readonly y: number;

  constructor(x: number, y: number) {
    if (!Number.isSafeInteger(x) || !Number.isSafeInteger(y) || x < 1 || y < 1) {
      throw new InvalidBoundsError(`Coordinates must be positive integers, got (${x}, ${y})`);
    }
    this.x = x;
    this.y = y;
    Object.freeze(this);
  }

  static from(value: CoordinateLike): Coordinate {
    return value instanceof Coordinate ? value : new Coordinate(value.x, value.y);
  }

  /** Parses a spreadsheet-style reference such as `"E6"`. */
  static parse(ref: string): Coordinate {
    const match = COORDINATE_RE.exec(ref.trim().toUpperCase());
    if (!match) {
      throw new InvalidBoundsError(`Invalid cell reference: "${ref}"`);
    }
    return new Coordinate(alphabetToInt(match[1]), Number(match[2]));
  }

  static compare(a: CoordinateLike, b: CoordinateLike): number {
    return a.y === b.y ? a.x - b.x : a.y - b.y;
  }

  shift(dx: number, dy: number): Coordinate {
    return new Coordinate(this.x + dx, this.y + dy);
  }

  add(size: SizeLike): Coordinate {
    return this.shift(size.width, size.height);
  }

  subtract(size: SizeLike): Coordinate {
    return this.shift(-size.width, -size.height);
  }

  equals(other: CoordinateLike): boolean {
    return this.x === other.x && this.y === other.y;
  }

  toString(): string {
    return intToAlphabet(this.x) + String(this.y);
  }
}
