import type { Box } from "./box";
import { Cell, type CellContent, type ContentAppender } from "./cell";
import { getDefaultLogger } from "./config";
import type { CoordinateLike } from "./coordinate";
import type { DrawableGrid, TileRenderer } from "./drawing";
import { Grid, type ExpandOptions, type GridOptions } from "./grid";
import type { Logger } from "./logger";
import { Styled, type Styles } from "./styled";
import { ColView, RowView, TableViewList } from "./views";

export interface TableOptions extends GridOptions {
  styles?: Readonly<Styles> | null;
  nature?: string;
}

export interface FillMissingOptions {
  styles?: Readonly<Styles> | null;
  /** Defaults to the table nature. */
  nature?: string;
}

/**
 * A {@link Grid} plus table-level styles and the row/column views used by format
 * parsers (streaming insertion) and builders (row groups, column specs).
 *
 * The views are a cache of the grid. Inserting a single cell adopts it into the
 * views it touches; `delete`, `merge` and `expand` invalidate the views and rebuild
 * them all before returning. Do not keep view references across such a call
 * expecting the old cell lists.
 *
 * Not safe for concurrent mutation.
 */
export class Table extends Styled implements Iterable<Cell>, DrawableGrid {
  private readonly logger: Logger;
  private readonly grid: Grid;
  private readonly rowViews: TableViewList<RowView>;
  private readonly colViews: TableViewList<ColView>;
  private stale = true;

  constructor(cells: Iterable<Cell> = [], options: TableOptions = {}) {
    super(options.styles, options.nature);
    this.logger = options.logger ?? getDefaultLogger();
    this.grid = new Grid(cells, { collisionMode: options.collisionMode, logger: this.logger });
    this.rowViews = new TableViewList((pos) => new RowView(this, pos, null, this.nature));
    this.colViews = new TableViewList((pos) => new ColView(this, pos, null, this.nature));
    this.ensureFresh();
  }

  get rows(): TableViewList<RowView> {
    this.ensureFresh();
    return this.rowViews;
  }

  get cols(): TableViewList<ColView> {
    this.ensureFresh();
    return this.colViews;
  }

  get boundingBox(): Box | null {
    return this.grid.boundingBox;
  }

  get size(): number {
    return this.grid.size;
  }

  [Symbol.iterator](): Iterator<Cell> {
    return this.grid[Symbol.iterator]();
  }

  has(coord: CoordinateLike): boolean {
    return this.grid.has(coord);
  }

  find(coord: CoordinateLike): Cell | undefined {
    return this.grid.find(coord);
  }

  get(coord: CoordinateLike): Cell {
    return this.grid.get(coord);
  }

  set(coord: CoordinateLike, cell: Cell): Cell {
    const placed = this.grid.set(coord, cell);
    if (this.stale) {
      this.ensureFresh();
    } else {
      this.adoptCell(placed);
    }
    return placed;
  }

  delete(coord: CoordinateLike): Cell {
    const removed = this.grid.delete(coord);
    this.logger.debug({ ref: removed.box.toString() }, "table_cell_deleted");
    this.invalidate();
    this.ensureFresh();
    return removed;
  }

  merge(start: CoordinateLike, end: CoordinateLike, contentAppender?: ContentAppender): Cell {
    const merged = this.grid.merge(start, end, contentAppender);
    this.invalidate();
    this.ensureFresh();
    return merged;
  }

  expand(coord: CoordinateLike, options: ExpandOptions = {}): Cell {
    const expanded = this.grid.expand(coord, options);
    this.invalidate();
    this.ensureFresh();
    return expanded;
  }

  /**
   * Inserts a 1×1 placeholder cell at every coordinate of `box` not covered yet,
   * e.g. to pad ragged rows up to the table width.
   *
   * @returns the inserted cells.
   */
  fillMissing(box: Box, content: CellContent = null, options: FillMissingOptions = {}): Cell[] {
    const inserted: Cell[] = [];
    for (let y = box.min.y; y <= box.max.y; y++) {
      for (let x = box.min.x; x <= box.max.x; x++) {
        if (this.grid.has({ x, y })) continue;
        const cell = new Cell(content, { styles: options.styles, nature: options.nature ?? this.nature });
        inserted.push(this.set({ x, y }, cell));
      }
    }
    if (inserted.length > 0) {
      this.logger.debug({ ref: box.toString(), inserted: inserted.length }, "table_missing_cells_filled");
    }
    return inserted;
  }

  /** Marks the row/column views as out of date. */
  invalidate(): void {
    this.stale = true;
  }

  /** Rebuilds the row/column views if they were invalidated. */
  ensureFresh(): void {
    if (this.stale) this.refreshAll();
  }

  /**
   * Resizes the view lists to the grid extent (views beyond it are dropped, existing
   * views keep their styles and nature), then re-adopts every cell.
   */
  refreshAll(): void {
    const bb = this.grid.boundingBox;
    this.rowViews.resize(bb ? bb.max.y : 0);
    this.colViews.resize(bb ? bb.max.x : 0);
    for (const view of this.rowViews) view.clear();
    for (const view of this.colViews) view.clear();
    for (const cell of this.grid) this.adoptCell(cell);
    this.stale = false;
    this.logger.debug(
      { rows: this.rowViews.length, cols: this.colViews.length, cells: this.grid.size },
      "table_views_refreshed"
    );
  }

  iterLines(tile?: TileRenderer): Generator<string> {
    return this.grid.iterLines(tile);
  }

  draw(tile?: TileRenderer): string {
    return this.grid.draw(tile);
  }

  toString(): string {
    return this.grid.toString();
  }

  private adoptCell(cell: Cell): void {
    this.rowViews.fitToSize(cell.max.y);
    this.colViews.fitToSize(cell.max.x);
    for (let y = cell.min.y; y <= cell.max.y; y++) this.rowViews.get(y).adopt(cell);
    for (let x = cell.min.x; x <= cell.max.x; x++) this.colViews.get(x).adopt(cell);
  }
}
