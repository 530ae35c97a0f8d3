import { Coordinate, type CoordinateLike } from "./coordinate";
import { InvalidBoundsError } from "./errors";
import { Size, type SizeLike } from "./size";

export interface BoxTransform {
  /** New top-left corner; defaults to the current one. */
  coord?: CoordinateLike;
  /** New extent; defaults to the current one. */
  size?: SizeLike;
}

/**
 * Axis-aligned rectangle of cells, `min` (top-left) and `max` (bottom-right) inclusive.
 *
 * Boxes are immutable. Use the named constructors rather than `new Box(...)` when the
 * input is not already a pair of corners.
 */
export class Box {
  readonly min: Coordinate;
  readonly max: Coordinate;

  constructor(min: CoordinateLike, max: CoordinateLike) {
    if (!(min.x <= max.x && min.y <= max.y)) {
      throw new InvalidBoundsError(
        `Invalid box: min (${min.x}, ${min.y}) is not above-left of max (${max.x}, ${max.y})`
      );
    }
    this.min = Coordinate.from(min);
    this.max = Coordinate.from(max);
    Object.freeze(this);
  }

  static fromCorners(min: CoordinateLike, max: CoordinateLike): Box {
    return new Box(min, max);
  }

  static fromOriginAndSize(origin: CoordinateLike, size: SizeLike): Box {
    if (size.width < 1 || size.height < 1) {
      throw new InvalidBoundsError(`Invalid box size: (${size.width} x ${size.height})`);
    }
    return new Box(origin, { x: origin.x + size.width - 1, y: origin.y + size.height - 1 });
  }

  static unitAt(coord: CoordinateLike): Box {
    return new Box(coord, coord);
  }

  static fromBounds(minX: number, minY: number, maxX: number, maxY: number): Box {
    return new Box({ x: minX, y: minY }, { x: maxX, y: maxY });
  }

  static at(x: number, y: number): Box {
    return Box.fromBounds(x, y, x, y);
  }

  static from(box: Box): Box {
    return box;
  }

  /** Parses `"E6"` (single cell) or `"E6:G8"`. */
  static parse(ref: string): Box {
    const parts = ref.split(":");
    if (parts.length === 1) return Box.unitAt(Coordinate.parse(parts[0]));
    if (parts.length === 2) return new Box(Coordinate.parse(parts[0]), Coordinate.parse(parts[1]));
    throw new InvalidBoundsError(`Invalid box reference: "${ref}"`);
  }

  /** Row-major total order: `min.y`, `min.x`, then `max.y`, `max.x`. */
  static compare(a: Box, b: Box): number {
    if (a.min.y !== b.min.y) return a.min.y - b.min.y;
    if (a.min.x !== b.min.x) return a.min.x - b.min.x;
    if (a.max.y !== b.max.y) return a.max.y - b.max.y;
    return a.max.x - b.max.x;
  }

  get width(): number {
    return this.max.x - this.min.x + 1;
  }

  get height(): number {
    return this.max.y - this.min.y + 1;
  }

  get size(): Size {
    return new Size(this.width, this.height);
  }

  /** Inclusive point-in-box test, or corner containment of a whole box. */
  contains(other: CoordinateLike | Box): boolean {
    if (other instanceof Box) {
      return this.containsPoint(other.min) && this.containsPoint(other.max);
    }
    return this.containsPoint(other);
  }

  /**
   * Corner test: true when a `min` or `max` corner of either box lies in the other.
   *
   * This under-detects overlaps where neither box has a corner inside the other
   * (a cross shape); see {@link overlaps} for the full rectangle test.
   */
  intersect(other: Box): boolean {
    return (
      other.containsPoint(this.min) ||
      other.containsPoint(this.max) ||
      this.containsPoint(other.min) ||
      this.containsPoint(other.max)
    );
  }

  overlaps(other: Box): boolean {
    return (
      this.min.x <= other.max.x &&
      other.min.x <= this.max.x &&
      this.min.y <= other.max.y &&
      other.min.y <= this.max.y
    );
  }

  isDisjoint(other: Box): boolean {
    return !this.intersect(other);
  }

  /** Bounding box of this box and `others`. */
  union(...others: Box[]): Box {
    let minX = this.min.x;
    let minY = this.min.y;
    let maxX = this.max.x;
    let maxY = this.max.y;
    for (const box of others) {
      minX = Math.min(minX, box.min.x);
      minY = Math.min(minY, box.min.y);
      maxX = Math.max(maxX, box.max.x);
      maxY = Math.max(maxY, box.max.y);
    }
    return Box.fromBounds(minX, minY, maxX, maxY);
  }

  /** Inner box shared by this box and `others`; throws when they are disjoint. */
  intersection(...others: Box[]): Box {
    let minX = this.min.x;
    let minY = this.min.y;
    let maxX = this.max.x;
    let maxY = this.max.y;
    for (const box of others) {
      minX = Math.max(minX, box.min.x);
      minY = Math.max(minY, box.min.y);
      maxX = Math.min(maxX, box.max.x);
      maxY = Math.min(maxY, box.max.y);
    }
    return Box.fromBounds(minX, minY, maxX, maxY);
  }

  transform(change: BoxTransform = {}): Box {
    return Box.fromOriginAndSize(change.coord ?? this.min, change.size ?? this.size);
  }

  moveTo(coord: CoordinateLike): Box {
    return this.transform({ coord });
  }

  resize(size: SizeLike): Box {
    return this.transform({ size });
  }

  equals(other: Box): boolean {
    return this.min.equals(other.min) && this.max.equals(other.max);
  }

  toString(): string {
    if (this.width === 1 && this.height === 1) return this.min.toString();
    return `${this.min.toString()}:${this.max.toString()}`;
  }

  private containsPoint(point: CoordinateLike): boolean {
    return (
      this.min.x <= point.x &&
      point.x <= this.max.x &&
      this.min.y <= point.y &&
      point.y <= this.max.y
    );
  }
}
