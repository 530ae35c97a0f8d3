import { Box, type BoxTransform } from "./box";
import type { Coordinate, CoordinateLike } from "./coordinate";
import type { Size, SizeLike } from "./size";
import { DEFAULT_NATURE, Styled, type Styles } from "./styled";

/**
 * Node owned by a format adapter: an XML element, a wordprocessing run, ...
 *
 * The core never looks inside it, except for an optional `textContent` used by
 * {@link cellText}.
 */
export type MarkupNode = object;

/**
 * Content of a cell: empty (`null`), text (string, number or boolean), a markup node,
 * or a list of those.
 */
export type CellContent = string | number | boolean | null | MarkupNode | CellContent[];

/** Associative combiner used when several cells are merged into one. */
export type ContentAppender = (left: CellContent, right: CellContent) => CellContent;

export interface CellOptions {
  styles?: Readonly<Styles> | null;
  nature?: string;
  /** Left column, default 1. */
  x?: number;
  /** Top row, default 1. */
  y?: number;
  /** Number of spanned columns, default 1. */
  width?: number;
  /** Number of spanned rows, default 1. */
  height?: number;
}

function toContentList(content: CellContent): CellContent[] {
  if (content === null) return [];
  return Array.isArray(content) ? content : [content];
}

/**
 * Default merge combiner: concatenates strings, adds numbers and treats `null` as
 * neutral. Any other pair is combined into a node list.
 */
export const appendContent: ContentAppender = (left, right) => {
  if (left === null) return right;
  if (right === null) return left;
  if (typeof left === "string" && typeof right === "string") return left + right;
  if (typeof left === "number" && typeof right === "number") return left + right;
  return [...toContentList(left), ...toContentList(right)];
};

export function cellText(content: CellContent): string {
  if (content === null) return "";
  if (typeof content === "string") return content;
  if (typeof content === "number" || typeof content === "boolean") return String(content);
  if (Array.isArray(content)) {
    let text = "";
    for (const item of content) text += cellText(item);
    return text;
  }
  if ("textContent" in content && typeof content.textContent === "string") {
    return content.textContent;
  }
  return "";
}

/**
 * A rectangular cell of a grid.
 *
 * The box is fixed at construction; moving or resizing returns a new cell (the
 * content reference is shared, the styles are copied).
 */
export class Cell extends Styled {
  content: CellContent;
  readonly box: Box;

  constructor(content: CellContent = null, options: CellOptions = {}) {
    super(options.styles, options.nature ?? DEFAULT_NATURE);
    const x = options.x ?? 1;
    const y = options.y ?? 1;
    this.content = content;
    this.box = Box.fromOriginAndSize({ x, y }, { width: options.width ?? 1, height: options.height ?? 1 });
  }

  static compare(a: Cell, b: Cell): number {
    return Box.compare(a.box, b.box);
  }

  get min(): Coordinate {
    return this.box.min;
  }

  get max(): Coordinate {
    return this.box.max;
  }

  get size(): Size {
    return this.box.size;
  }

  get width(): number {
    return this.box.width;
  }

  get height(): number {
    return this.box.height;
  }

  get text(): string {
    return cellText(this.content);
  }

  contains(other: CoordinateLike | Box): boolean {
    return this.box.contains(other);
  }

  transform(change: BoxTransform = {}): Cell {
    const box = this.box.transform(change);
    return new Cell(this.content, {
      styles: this.styles,
      nature: this.nature,
      x: box.min.x,
      y: box.min.y,
      width: box.width,
      height: box.height
    });
  }

  moveTo(coord: CoordinateLike): Cell {
    return this.transform({ coord });
  }

  resize(size: SizeLike): Cell {
    return this.transform({ size });
  }

  toString(): string {
    return this.text;
  }
}
