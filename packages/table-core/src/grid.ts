import { Box } from "./box";
import { appendContent, Cell, type ContentAppender } from "./cell";
import { getConfig, getDefaultLogger, type CollisionMode } from "./config";
import { Coordinate, type CoordinateLike } from "./coordinate";
import { draw, iterLines, type DrawableGrid, type TileRenderer } from "./drawing";
import { CellNotFoundError, CollisionError, MergeError } from "./errors";
import type { Logger } from "./logger";

export interface GridOptions {
  /** Defaults to the `TABLE_CORE_COLLISION_MODE` configuration. */
  collisionMode?: CollisionMode;
  logger?: Logger;
}

export interface ExpandOptions {
  /** Columns to add (or remove, when negative) on the right edge. */
  width?: number;
  /** Rows to add (or remove, when negative) on the bottom edge. */
  height?: number;
  contentAppender?: ContentAppender;
}

/** Inserts `cell` into `cells`, keeping them in {@link Box.compare} order. */
export function insertCellSorted(cells: Cell[], cell: Cell): void {
  let low = 0;
  let high = cells.length;
  while (low < high) {
    const mid = Math.floor((low + high) / 2);
    if (Cell.compare(cells[mid], cell) < 0) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  cells.splice(low, 0, cell);
}

/**
 * Collision-free collection of cells.
 *
 * No two cells of a grid ever collide: {@link set} rejects an overlapping cell and
 * {@link merge} rejects a target box that a cell straddles. Every mutation validates
 * before it commits, so a failed call leaves the grid unchanged.
 *
 * Cells are kept in row-major {@link Box.compare} order. Lookups are linear scans,
 * which is fine for a single document table.
 *
 * Not safe for concurrent mutation.
 */
export class Grid implements Iterable<Cell>, DrawableGrid {
  readonly collisionMode: CollisionMode;
  protected readonly logger: Logger;
  private cells: Cell[] = [];

  constructor(cells: Iterable<Cell> = [], options: GridOptions = {}) {
    this.collisionMode = options.collisionMode ?? getConfig().collisionMode;
    this.logger = options.logger ?? getDefaultLogger();
    for (const cell of cells) {
      this.set(cell.min, cell);
    }
  }

  get size(): number {
    return this.cells.length;
  }

  [Symbol.iterator](): Iterator<Cell> {
    return this.cells[Symbol.iterator]();
  }

  /** Bounding box of all the cells, or `null` when the grid is empty. */
  get boundingBox(): Box | null {
    if (this.cells.length === 0) return null;
    const [first, ...rest] = this.cells;
    return first.box.union(...rest.map((cell) => cell.box));
  }

  has(coord: CoordinateLike): boolean {
    return this.find(coord) !== undefined;
  }

  find(coord: CoordinateLike): Cell | undefined {
    const point = Coordinate.from(coord);
    return this.cells.find((cell) => cell.box.contains(point));
  }

  get(coord: CoordinateLike): Cell {
    const cell = this.find(coord);
    if (!cell) throw new CellNotFoundError(Coordinate.from(coord).toString());
    return cell;
  }

  /**
   * Places a copy of `cell` with its top-left corner at `coord`.
   *
   * @returns the stored cell.
   */
  set(coord: CoordinateLike, cell: Cell): Cell {
    const placed = cell.moveTo(coord);
    for (const existing of this.cells) {
      if (this.collides(existing.box, placed.box)) {
        this.logger.debug({ ref: placed.box.toString(), existing: existing.box.toString() }, "grid_cell_collision");
        throw new CollisionError(placed.box.toString(), existing.box.toString());
      }
    }
    insertCellSorted(this.cells, placed);
    return placed;
  }

  /** Removes the cell covering `coord` and returns it. */
  delete(coord: CoordinateLike): Cell {
    const cell = this.get(coord);
    this.cells = this.cells.filter((candidate) => candidate !== cell);
    return cell;
  }

  /**
   * Replaces the cells contained in the box `start`–`end` with a single cell spanning it.
   *
   * Contents are folded left to right (in box order) with `contentAppender`; styles of
   * later cells override earlier ones; the nature of the first cell is kept.
   */
  merge(start: CoordinateLike, end: CoordinateLike, contentAppender: ContentAppender = appendContent): Cell {
    return this.mergeInto(new Box(start, end), null, contentAppender);
  }

  /**
   * Grows (or shrinks) the cell covering `coord` by moving its bottom-right corner,
   * merging every cell the new box swallows.
   */
  expand(coord: CoordinateLike, options: ExpandOptions = {}): Cell {
    const cell = this.get(coord);
    const target = new Box(cell.min, {
      x: cell.max.x + (options.width ?? 0),
      y: cell.max.y + (options.height ?? 0)
    });
    return this.mergeInto(target, cell, options.contentAppender ?? appendContent);
  }

  /** Yields the cells grouped by their top row. */
  *iterRows(): Generator<Cell[]> {
    let group: Cell[] = [];
    for (const cell of this.cells) {
      if (group.length > 0 && group[0].min.y !== cell.min.y) {
        yield group;
        group = [];
      }
      group.push(cell);
    }
    if (group.length > 0) yield group;
  }

  iterLines(tile?: TileRenderer): Generator<string> {
    return iterLines(this, tile);
  }

  draw(tile?: TileRenderer): string {
    return draw(this, tile);
  }

  toString(): string {
    return this.draw();
  }

  private collides(a: Box, b: Box): boolean {
    return this.collisionMode === "overlap" ? a.overlaps(b) : a.intersect(b);
  }

  /**
   * `anchor` is the cell being expanded: it may straddle `target` (when the
   * expansion shrinks it) and is always merged first.
   */
  private mergeInto(target: Box, anchor: Cell | null, contentAppender: ContentAppender): Cell {
    const ref = target.toString();
    const merged: Cell[] = [];
    const unchanged: Cell[] = [];
    for (const cell of this.cells) {
      if (cell === anchor || target.contains(cell.box)) {
        merged.push(cell);
      } else if (this.collides(cell.box, target)) {
        this.logger.debug({ ref, straddling: cell.box.toString() }, "grid_merge_rejected");
        throw new MergeError("ambiguous-merge", ref, `Cell ${cell.box.toString()} straddles the merge target ${ref}`);
      } else {
        unchanged.push(cell);
      }
    }

    const [first, ...rest] = merged;
    if (!first) {
      this.logger.debug({ ref }, "grid_merge_rejected");
      throw new MergeError("empty-merge", ref, `Nothing to merge in ${ref}`);
    }

    const result = first.transform({ coord: target.min, size: target.size });
    for (const cell of rest) {
      result.content = contentAppender(result.content, cell.content);
      Object.assign(result.styles, cell.styles);
    }

    insertCellSorted(unchanged, result);
    this.cells = unchanged;
    this.logger.debug({ ref, merged: merged.length }, "grid_cells_merged");
    return result;
  }
}
