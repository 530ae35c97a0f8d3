import type { Box } from "./box";
import { Cell, type CellContent } from "./cell";
import type { CoordinateLike } from "./coordinate";
import { InvalidBoundsError } from "./errors";
import { insertCellSorted } from "./grid";
import { Styled, type Styles } from "./styled";
import type { Table } from "./table";

export interface InsertCellOptions {
  styles?: Readonly<Styles> | null;
  /** Defaults to the nature of the view. */
  nature?: string;
  width?: number;
  height?: number;
}

/**
 * Projection of the table cells on one row or one column.
 *
 * - owned cells: the top-left corner lies on this row/column
 * - caught cells: the cell spans this row/column (owned cells are caught too)
 *
 * Views are created and refreshed by their {@link Table}; a view obtained before a
 * merge, expand or delete still holds its styles and nature but its cell lists are
 * rebuilt in place.
 */
export abstract class TableView extends Styled {
  readonly table: Table;
  /** 1-based row or column index. */
  readonly pos: number;
  private readonly owned: Cell[] = [];
  private readonly caught: Cell[] = [];

  constructor(table: Table, pos: number, styles?: Readonly<Styles> | null, nature?: string) {
    super(styles, nature);
    this.table = table;
    this.pos = pos;
  }

  /** Owned cells, in box order (left to right for a row, top to bottom for a column). */
  get ownedCells(): readonly Cell[] {
    return this.owned;
  }

  get caughtCells(): readonly Cell[] {
    return this.caught;
  }

  abstract canOwn(cell: Cell): boolean;

  abstract canCatch(cell: Cell): boolean;

  /**
   * Appends a new cell at the first free slot of this row/column, skipping slots
   * already covered by spanning cells (or after the last one when there is no gap).
   */
  abstract insertCell(content?: CellContent, options?: InsertCellOptions): Cell;

  adopt(cell: Cell): void {
    if (this.canOwn(cell)) insertCellSorted(this.owned, cell);
    if (this.canCatch(cell)) insertCellSorted(this.caught, cell);
  }

  clear(): void {
    this.owned.length = 0;
    this.caught.length = 0;
  }

  protected nextFreeIndex(pointAt: (index: number) => CoordinateLike, lastIndexOf: (box: Box) => number): number {
    const boxes = this.caught.map((cell) => cell.box);
    if (boxes.length === 0) return 1;
    const [first, ...rest] = boxes;
    const last = lastIndexOf(first.union(...rest));
    for (let index = 1; index <= last; index++) {
      const point = pointAt(index);
      if (boxes.every((box) => !box.contains(point))) return index;
    }
    return last + 1;
  }

  protected placeCell(coord: CoordinateLike, content: CellContent, options: InsertCellOptions): Cell {
    const cell = new Cell(content, {
      styles: options.styles,
      nature: options.nature ?? this.nature,
      width: options.width,
      height: options.height
    });
    return this.table.set(coord, cell);
  }
}

export class RowView extends TableView {
  get rowPos(): number {
    return this.pos;
  }

  canOwn(cell: Cell): boolean {
    return cell.min.y === this.pos;
  }

  canCatch(cell: Cell): boolean {
    return cell.min.y <= this.pos && this.pos <= cell.max.y;
  }

  insertCell(content: CellContent = null, options: InsertCellOptions = {}): Cell {
    const y = this.pos;
    const x = this.nextFreeIndex(
      (index) => ({ x: index, y }),
      (box) => box.max.x
    );
    return this.placeCell({ x, y }, content, options);
  }
}

export class ColView extends TableView {
  get colPos(): number {
    return this.pos;
  }

  canOwn(cell: Cell): boolean {
    return cell.min.x === this.pos;
  }

  canCatch(cell: Cell): boolean {
    return cell.min.x <= this.pos && this.pos <= cell.max.x;
  }

  insertCell(content: CellContent = null, options: InsertCellOptions = {}): Cell {
    const x = this.pos;
    const y = this.nextFreeIndex(
      (index) => ({ x, y: index }),
      (box) => box.max.y
    );
    return this.placeCell({ x, y }, content, options);
  }
}

/**
 * 1-based list of row or column views.
 *
 * `get(pos)` grows the list when `pos` lies beyond it, so a streaming parser can open
 * a row before the row holds any cell.
 */
export class TableViewList<V extends TableView> implements Iterable<V> {
  private readonly views: V[] = [];

  constructor(private readonly createView: (pos: number) => V) {}

  get length(): number {
    return this.views.length;
  }

  get(pos: number): V {
    if (!Number.isSafeInteger(pos) || pos < 1) {
      throw new InvalidBoundsError(`View position must be a positive integer, got ${pos}`);
    }
    this.fitToSize(pos);
    return this.views[pos - 1];
  }

  /** Grows the list to at least `size` views. */
  fitToSize(size: number): void {
    for (let index = this.views.length; index < size; index++) {
      this.views.push(this.createView(index + 1));
    }
  }

  /** Grows or truncates the list to exactly `size` views. */
  resize(size: number): void {
    this.fitToSize(size);
    this.views.length = size;
  }

  toArray(): V[] {
    return [...this.views];
  }

  [Symbol.iterator](): Iterator<V> {
    return this.views[Symbol.iterator]();
  }
}
