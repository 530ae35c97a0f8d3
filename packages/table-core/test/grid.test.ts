import { describe, expect, it } from "vitest";

import { Box } from "../src/box";
import { Cell, cellText } from "../src/cell";
import type { CollisionMode } from "../src/config";
import {
  CellNotFoundError,
  CollisionError,
  InvalidBoundsError,
  isTableGridError,
  MergeError
} from "../src/errors";
import { Grid } from "../src/grid";

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("Expected the call to throw");
}

function scenarioGrid(collisionMode: CollisionMode = "corners"): Grid {
  return new Grid(
    [
      new Cell("red", { x: 1, y: 1, height: 2 }),
      new Cell("pink", { x: 2, y: 1, width: 2 }),
      new Cell("blue", { x: 2, y: 2 })
    ],
    { collisionMode }
  );
}

function refs(grid: Grid): string[] {
  return Array.from(grid, (cell) => `${cell.box.toString()}=${cell.text}`);
}

describe("Grid", () => {
  it("keeps cells in row-major order", () => {
    const grid = new Grid(
      [new Cell("c", { x: 1, y: 2 }), new Cell("b", { x: 2, y: 1 }), new Cell("a", { x: 1, y: 1 })],
      { collisionMode: "corners" }
    );
    expect(refs(grid)).toEqual(["A1=a", "B1=b", "A2=c"]);
  });

  it("computes the bounding box", () => {
    expect(scenarioGrid().boundingBox?.equals(Box.fromBounds(1, 1, 3, 2))).toBe(true);
    expect(new Grid([], { collisionMode: "corners" }).boundingBox).toBeNull();
  });

  it("finds the cell covering a coordinate", () => {
    const grid = scenarioGrid();
    expect(grid.get({ x: 1, y: 2 }).text).toBe("red");
    expect(grid.get({ x: 3, y: 1 }).text).toBe("pink");
    expect(grid.has({ x: 2, y: 2 })).toBe(true);
    expect(grid.has({ x: 3, y: 2 })).toBe(false);
    expect(grid.find({ x: 3, y: 2 })).toBeUndefined();
  });

  it("throws when no cell covers a coordinate", () => {
    const error = thrown(() => scenarioGrid().get({ x: 3, y: 3 }));
    expect(error).toBeInstanceOf(CellNotFoundError);
    expect(error).toMatchObject({ kind: "not-found", ref: "C3" });
  });

  it("stores a moved copy of the inserted cell", () => {
    const grid = scenarioGrid();
    const cell = new Cell("yellow");
    const placed = grid.set({ x: 3, y: 2 }, cell);

    expect(placed).not.toBe(cell);
    expect(placed.box.toString()).toBe("C2");
    expect(cell.box.toString()).toBe("A1");
    expect(grid.get({ x: 3, y: 2 })).toBe(placed);
    expect(grid.size).toBe(4);
  });

  it("rejects a colliding cell and stays unchanged", () => {
    const grid = scenarioGrid();
    const before = refs(grid);
    const error = thrown(() => grid.set({ x: 1, y: 2 }, new Cell("x")));

    expect(error).toBeInstanceOf(CollisionError);
    expect(error).toMatchObject({
      kind: "collision",
      ref: "A2",
      existingRef: "A1:A2",
      message: "Cell A2 collides with existing cell A1:A2"
    });
    expect(refs(grid)).toEqual(before);
  });

  it("lets a cross-shaped overlap through in corners mode only", () => {
    const corners = new Grid([new Cell("h", { x: 1, y: 2, width: 3 })], { collisionMode: "corners" });
    corners.set({ x: 2, y: 1 }, new Cell("v", { height: 3 }));
    expect(corners.size).toBe(2);

    const overlap = new Grid([new Cell("h", { x: 1, y: 2, width: 3 })], { collisionMode: "overlap" });
    const error = thrown(() => overlap.set({ x: 2, y: 1 }, new Cell("v", { height: 3 })));
    expect(error).toBeInstanceOf(CollisionError);
    expect(error).toMatchObject({ ref: "B1:B3", existingRef: "A2:C2" });
    expect(overlap.size).toBe(1);
  });

  it("deletes the cell covering a coordinate", () => {
    const grid = scenarioGrid();
    const removed = grid.delete({ x: 1, y: 2 });
    expect(removed.text).toBe("red");
    expect(refs(grid)).toEqual(["B1:C1=pink", "B2=blue"]);
    expect(() => grid.delete({ x: 1, y: 1 })).toThrow(CellNotFoundError);
  });

  it("groups cells by top row", () => {
    const rows = Array.from(scenarioGrid().iterRows(), (row) => row.map((cell) => cell.text));
    expect(rows).toEqual([["red", "pink"], ["blue"]]);
  });

  describe("merge", () => {
    it("folds the contents in box order", () => {
      const grid = new Grid([new Cell("A", { x: 1 }), new Cell("B", { x: 2 }), new Cell("C", { x: 3 })], {
        collisionMode: "corners"
      });
      const merged = grid.merge({ x: 1, y: 1 }, { x: 3, y: 1 });
      expect(merged.content).toBe("ABC");
      expect(refs(grid)).toEqual(["A1:C1=ABC"]);
    });

    it("lets later styles override earlier ones and keeps the first nature", () => {
      const grid = new Grid(
        [
          new Cell("a", { x: 1, styles: { a: "1", b: "1" }, nature: "header" }),
          new Cell("b", { x: 2, styles: { b: "2" } })
        ],
        { collisionMode: "corners" }
      );
      const merged = grid.merge({ x: 1, y: 1 }, { x: 2, y: 1 });
      expect(merged.styles).toEqual({ a: "1", b: "2" });
      expect(merged.nature).toBe("header");
    });

    it("uses a custom content appender", () => {
      const grid = scenarioGrid();
      const merged = grid.merge({ x: 2, y: 1 }, { x: 3, y: 2 }, (left, right) => `${cellText(left)}/${cellText(right)}`);
      expect(merged.content).toBe("pink/blue");
      expect(refs(grid)).toEqual(["A1:A2=red", "B1:C2=pink/blue"]);
    });

    it("rejects an empty target", () => {
      const grid = new Grid([new Cell("a")], { collisionMode: "corners" });
      const error = thrown(() => grid.merge({ x: 2, y: 2 }, { x: 3, y: 3 }));
      expect(error).toBeInstanceOf(MergeError);
      expect(error).toMatchObject({ kind: "empty-merge", ref: "B2:C3" });
    });

    it("rejects a target straddled by a cell", () => {
      const grid = scenarioGrid();
      const before = refs(grid);
      const error = thrown(() => grid.merge({ x: 1, y: 1 }, { x: 2, y: 1 }));
      expect(error).toBeInstanceOf(MergeError);
      expect(error).toMatchObject({ kind: "ambiguous-merge", ref: "A1:B1" });
      expect(refs(grid)).toEqual(before);
    });
  });

  describe("expand", () => {
    it("grows a cell to the right", () => {
      const grid = scenarioGrid();
      const expanded = grid.expand({ x: 2, y: 2 }, { width: 1 });
      expect(expanded.box.toString()).toBe("B2:C2");
      expect(expanded.content).toBe("blue");
      expect(refs(grid)).toEqual(["A1:A2=red", "B1:C1=pink", "B2:C2=blue"]);
    });

    it("swallows the cells below", () => {
      const grid = new Grid([new Cell("top"), new Cell("bottom", { y: 2 })], { collisionMode: "corners" });
      grid.expand({ x: 1, y: 1 }, { height: 1 });
      expect(refs(grid)).toEqual(["A1:A2=topbottom"]);
    });

    it("refuses to cut through a neighbour", () => {
      const grid = scenarioGrid();
      const error = thrown(() => grid.expand({ x: 1, y: 1 }, { width: 1 }));
      expect(error).toBeInstanceOf(MergeError);
      expect(error).toMatchObject({
        kind: "ambiguous-merge",
        ref: "A1:B2",
        message: "Cell B1:C1 straddles the merge target A1:B2"
      });
      expect(grid.get({ x: 1, y: 1 }).box.toString()).toBe("A1:A2");
    });

    it("shrinks with a negative delta", () => {
      const grid = new Grid([new Cell("wide", { width: 3 })], { collisionMode: "corners" });
      expect(grid.expand({ x: 1, y: 1 }, { width: -1 }).box.toString()).toBe("A1:B1");
      expect(() => grid.expand({ x: 1, y: 1 }, { width: -2 })).toThrow(InvalidBoundsError);
      expect(refs(grid)).toEqual(["A1:B1=wide"]);
    });
  });

  it.each<CollisionMode>(["corners", "overlap"])("never holds two colliding cells (%s)", (collisionMode) => {
    let state = 20240917;
    const next = (max: number): number => {
      state = (state * 48271) % 2147483647;
      return 1 + (state % max);
    };
    const collide = (a: Box, b: Box): boolean => (collisionMode === "overlap" ? a.overlaps(b) : a.intersect(b));
    const grid = new Grid([], { collisionMode });

    for (let step = 0; step < 300; step++) {
      const x = next(6);
      const y = next(6);
      const before = Array.from(grid);
      try {
        switch (next(4)) {
          case 1:
            grid.set({ x, y }, new Cell(step, { width: next(2), height: next(2) }));
            break;
          case 2:
            grid.merge({ x, y }, { x: x + next(3) - 1, y: y + next(3) - 1 });
            break;
          case 3:
            grid.expand({ x, y }, { width: next(3) - 2, height: next(3) - 2 });
            break;
          default:
            grid.delete({ x, y });
        }
      } catch (error) {
        if (!isTableGridError(error)) throw error;
        expect(Array.from(grid)).toEqual(before);
      }

      const cells = Array.from(grid);
      expect([...cells].sort(Cell.compare)).toEqual(cells);
      for (let i = 0; i < cells.length; i++) {
        for (let j = i + 1; j < cells.length; j++) {
          expect(collide(cells[i].box, cells[j].box)).toBe(false);
        }
      }
    }
  });
});
