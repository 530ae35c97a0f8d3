export type TableGridErrorKind =
  | "invalid-bounds"
  | "collision"
  | "not-found"
  | "ambiguous-merge"
  | "empty-merge";

/**
 * Base class of every error thrown by the grid/table core.
 *
 * The core never catches its own errors: callers (format adapters) decide whether
 * to abort the whole conversion or skip the offending table.
 */
export class TableGridError extends Error {
  readonly kind: TableGridErrorKind;

  constructor(kind: TableGridErrorKind, message: string) {
    super(message);
    this.name = "TableGridError";
    this.kind = kind;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidBoundsError extends TableGridError {
  constructor(message: string) {
    super("invalid-bounds", message);
    this.name = "InvalidBoundsError";
  }
}

export class CollisionError extends TableGridError {
  /** Reference (e.g. `"B2:C3"`) of the box that could not be inserted. */
  readonly ref: string;
  /** Reference of the existing cell it collides with. */
  readonly existingRef: string;

  constructor(ref: string, existingRef: string) {
    super("collision", `Cell ${ref} collides with existing cell ${existingRef}`);
    this.name = "CollisionError";
    this.ref = ref;
    this.existingRef = existingRef;
  }
}

export class CellNotFoundError extends TableGridError {
  readonly ref: string;

  constructor(ref: string) {
    super("not-found", `No cell covers ${ref}`);
    this.name = "CellNotFoundError";
    this.ref = ref;
  }
}

export class MergeError extends TableGridError {
  readonly ref: string;

  constructor(kind: "ambiguous-merge" | "empty-merge", ref: string, message: string) {
    super(kind, message);
    this.name = "MergeError";
    this.ref = ref;
  }
}

export function isTableGridError(err: unknown): err is TableGridError {
  return err instanceof TableGridError;
}
