import { z } from "zod";

import { Box } from "./box";
import { Cell, cellText, type CellContent } from "./cell";
import { DEFAULT_NATURE } from "./styled";
import { Table, type TableOptions } from "./table";

/** JSON-safe cell content. Markup nodes are reduced to their text. */
export type SnapshotContent = string | number | boolean | null | SnapshotContent[];

const SnapshotContentSchema: z.ZodType<SnapshotContent> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(SnapshotContentSchema)])
);

const BoxRefSchema = z.string().min(1).superRefine((value, ctx) => {
  try {
    Box.parse(value);
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: error instanceof Error ? error.message : `Invalid box reference: ${value}`
    });
  }
});

const StylesSchema = z.record(z.string());

export const CellSnapshotSchema = z.object({
  ref: BoxRefSchema,
  content: SnapshotContentSchema.optional().default(null),
  styles: StylesSchema.optional().default({}),
  nature: z.string().min(1).optional().default(DEFAULT_NATURE)
});

export const TableSnapshotSchema = z.object({
  styles: StylesSchema.optional().default({}),
  nature: z.string().min(1).optional().default(DEFAULT_NATURE),
  cells: z.array(CellSnapshotSchema)
});

export type CellSnapshot = z.infer<typeof CellSnapshotSchema>;
export type TableSnapshot = z.infer<typeof TableSnapshotSchema>;

function toSnapshotContent(content: CellContent): SnapshotContent {
  if (content === null || typeof content === "string" || typeof content === "number" || typeof content === "boolean") {
    return content;
  }
  if (Array.isArray(content)) {
    const items: CellContent[] = content;
    return items.map(toSnapshotContent);
  }
  return cellText(content);
}

function fromSnapshotContent(content: SnapshotContent): CellContent {
  return Array.isArray(content) ? content.map(fromSnapshotContent) : content;
}

export function toSnapshot(table: Table): TableSnapshot {
  return {
    styles: { ...table.styles },
    nature: table.nature,
    cells: Array.from(table, (cell) => ({
      ref: cell.box.toString(),
      content: toSnapshotContent(cell.content),
      styles: { ...cell.styles },
      nature: cell.nature
    }))
  };
}

/**
 * Rebuilds a table from a snapshot, validating its shape first.
 *
 * Throws a `ZodError` for a malformed snapshot and a `CollisionError` when two
 * cells of the snapshot collide.
 */
export function fromSnapshot(value: unknown, options: Omit<TableOptions, "styles" | "nature"> = {}): Table {
  const snapshot = TableSnapshotSchema.parse(value);
  const cells = snapshot.cells.map((entry) => {
    const box = Box.parse(entry.ref);
    return new Cell(fromSnapshotContent(entry.content), {
      styles: entry.styles,
      nature: entry.nature,
      x: box.min.x,
      y: box.min.y,
      width: box.width,
      height: box.height
    });
  });
  return new Table(cells, { ...options, styles: snapshot.styles, nature: snapshot.nature });
}
