import { Box } from "./box";
import type { Cell } from "./cell";
import type { CoordinateLike } from "./coordinate";

/** Read-only view of a grid, enough to draw it. */
export interface DrawableGrid {
  readonly boundingBox: Box | null;
  find(coord: CoordinateLike): Cell | undefined;
}

/** Which borders of a tile are drawn. */
export interface TileEdges {
  left: boolean;
  top: boolean;
  right: boolean;
  bottom: boolean;
}

/**
 * Produces the text lines of one grid tile. The 9-character placeholder
 * {@link TITLE_PLACEHOLDER} is replaced with the cell title (or blanked).
 */
export type TileRenderer = (edges: TileEdges) => readonly string[];

export const TITLE_PLACEHOLDER = "XXXXXXXXX";
const TITLE_WIDTH = TITLE_PLACEHOLDER.length;
const RULE = "-".repeat(TITLE_WIDTH + 2);
const BLANK = " ".repeat(TITLE_WIDTH + 2);

export const defaultTile: TileRenderer = ({ left, top, right, bottom }) => {
  const close = (corner: string, line: string): string => (right ? line + corner : line);
  const lines: string[] = [];
  if (top) lines.push(close("+", (left ? "+" : "-") + RULE));
  else lines.push(close("|", (left ? "|" : " ") + BLANK));
  lines.push(close("|", `${left ? "|" : " "} ${TITLE_PLACEHOLDER} `));
  if (bottom) lines.push(close("+", (left ? "+" : "-") + RULE));
  return lines;
};

function centerTitle(text: string): string {
  if (text.length >= TITLE_WIDTH) return text.slice(0, TITLE_WIDTH);
  const padding = TITLE_WIDTH - text.length;
  const before = Math.floor(padding / 2);
  return " ".repeat(before) + text + " ".repeat(padding - before);
}

function* iterTileRows(grid: DrawableGrid, tile: TileRenderer): Generator<Array<readonly string[]>> {
  const bb = grid.boundingBox;
  if (!bb) return;
  for (let row = bb.min.y; row <= bb.max.y; row++) {
    const tiles: Array<readonly string[]> = [];
    for (let col = bb.min.x; col <= bb.max.x; col++) {
      const cell = grid.find({ x: col, y: row });
      const box = cell ? cell.box : Box.at(col, row);
      const lines = tile({
        left: box.min.x === col,
        top: box.min.y === row,
        right: bb.max.x === col,
        bottom: bb.max.y === row
      });
      // The title goes on the middle tile of the cell.
      const isCenter =
        Math.floor((box.min.x + box.max.x) / 2) === col && Math.floor((box.min.y + box.max.y) / 2) === row;
      const title = isCenter && cell ? centerTitle(cell.text) : " ".repeat(TITLE_WIDTH);
      tiles.push(lines.map((line) => line.replace(TITLE_PLACEHOLDER, () => title)));
    }
    yield tiles;
  }
}

/** Lazily yields the lines of an ASCII drawing of `grid`. Debug aid only. */
export function* iterLines(grid: DrawableGrid, tile: TileRenderer = defaultTile): Generator<string> {
  for (const tiles of iterTileRows(grid, tile)) {
    const height = tiles.length > 0 ? tiles[0].length : 0;
    for (let index = 0; index < height; index++) {
      yield tiles.map((lines) => lines[index] ?? "").join("");
    }
  }
}

export function draw(grid: DrawableGrid, tile: TileRenderer = defaultTile): string {
  return Array.from(iterLines(grid, tile)).join("\n");
}
