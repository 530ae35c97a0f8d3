import { describe, expect, it } from "vitest";

import { Box } from "../src/box";
import { Coordinate } from "../src/coordinate";
import { InvalidBoundsError } from "../src/errors";
import { Size } from "../src/size";

describe("Box", () => {
  it("computes width and height from inclusive corners", () => {
    const single = Box.fromBounds(5, 6, 5, 6);
    expect(single.width).toBe(1);
    expect(single.height).toBe(1);

    const square = Box.fromBounds(1, 2, 2, 3);
    expect(square.width).toBe(2);
    expect(square.height).toBe(2);
    expect(square.size).toEqual(new Size(2, 2));
  });

  it("rejects inverted or non-positive bounds", () => {
    expect(() => Box.fromBounds(2, 1, 1, 1)).toThrow(InvalidBoundsError);
    expect(() => Box.fromBounds(1, 2, 1, 1)).toThrow(InvalidBoundsError);
    expect(() => Box.at(0, 1)).toThrow(InvalidBoundsError);
    expect(() => Box.fromOriginAndSize(new Coordinate(1, 1), new Size(0, 1))).toThrow(InvalidBoundsError);
  });

  it("offers one named constructor per input shape", () => {
    const expected = Box.fromBounds(5, 6, 7, 8);
    expect(Box.fromCorners(new Coordinate(5, 6), new Coordinate(7, 8)).equals(expected)).toBe(true);
    expect(Box.fromOriginAndSize(new Coordinate(5, 6), new Size(3, 3)).equals(expected)).toBe(true);
    expect(Box.unitAt(new Coordinate(5, 6)).equals(Box.at(5, 6))).toBe(true);
    expect(Box.from(expected)).toBe(expected);
  });

  it("formats and parses spreadsheet ranges", () => {
    expect(Box.fromBounds(5, 6, 7, 8).toString()).toBe("E6:G8");
    expect(Box.at(5, 6).toString()).toBe("E6");
    expect(Box.parse("A2:B3").equals(Box.fromBounds(1, 2, 2, 3))).toBe(true);
    expect(Box.parse("E6").equals(Box.at(5, 6))).toBe(true);
    expect(() => Box.parse("A1:B2:C3")).toThrow(InvalidBoundsError);
    expect(() => Box.parse("B2:A1")).toThrow(InvalidBoundsError);
  });

  it("tests point and box containment inclusively", () => {
    const box = Box.fromBounds(5, 6, 6, 8);
    expect(box.contains({ x: 5, y: 6 })).toBe(true);
    expect(box.contains({ x: 6, y: 6 })).toBe(true);
    expect(box.contains({ x: 5, y: 8 })).toBe(true);
    expect(box.contains({ x: 6, y: 8 })).toBe(true);
    expect(box.contains({ x: 7, y: 6 })).toBe(false);
    expect(box.contains(Box.fromBounds(6, 7, 6, 8))).toBe(true);
    expect(box.contains(Box.fromBounds(6, 7, 7, 8))).toBe(false);
  });

  it("detects intersections through corners", () => {
    const b1 = Box.fromBounds(5, 6, 6, 8);
    const b2 = Box.fromBounds(6, 6, 6, 7);
    const b3 = Box.fromBounds(7, 6, 7, 8);
    expect(b2.intersect(b3)).toBe(false);
    expect(b1.isDisjoint(b2)).toBe(false);
    expect(b2.isDisjoint(b1)).toBe(false);
    expect(b1.isDisjoint(b3)).toBe(true);
    expect(b3.isDisjoint(b1)).toBe(true);
  });

  it("misses a cross-shaped overlap that overlaps() catches", () => {
    const horizontal = Box.fromBounds(1, 2, 3, 2);
    const vertical = Box.fromBounds(2, 1, 2, 3);
    expect(horizontal.intersect(vertical)).toBe(false);
    expect(horizontal.overlaps(vertical)).toBe(true);
    expect(horizontal.overlaps(Box.at(4, 2))).toBe(false);
  });

  it("computes union and intersection", () => {
    const b1 = Box.fromBounds(3, 2, 6, 4);
    const b2 = Box.fromBounds(4, 3, 5, 7);
    expect(b1.union(b2).toString()).toBe("C2:F7");
    expect(b1.intersection(b2).toString()).toBe("D3:E4");
    expect(b1.union().equals(b1)).toBe(true);
    expect(() => Box.at(1, 1).intersection(Box.at(3, 3))).toThrow(InvalidBoundsError);
  });

  it("orders by top row, left column, then extent", () => {
    const b1 = Box.fromBounds(3, 2, 6, 4);
    expect(Box.compare(b1, b1)).toBe(0);
    expect(Box.compare(b1, Box.fromBounds(3, 2, 6, 5))).toBeLessThan(0);
    expect(Box.compare(b1, Box.fromBounds(3, 2, 7, 4))).toBeLessThan(0);
    expect(Box.compare(b1, Box.fromBounds(4, 2, 6, 4))).toBeLessThan(0);
    expect(Box.compare(b1, Box.fromBounds(3, 3, 6, 4))).toBeLessThan(0);
    expect(Box.compare(Box.fromBounds(9, 1, 9, 1), b1)).toBeLessThan(0);
  });

  it("moves and resizes into new boxes", () => {
    const box = Box.fromBounds(1, 1, 3, 2);
    expect(box.moveTo({ x: 5, y: 3 }).toString()).toBe("E3:G4");
    expect(box.resize(new Size(1, 1)).toString()).toBe("A1");
    expect(box.transform({ coord: { x: 2, y: 2 }, size: new Size(2, 1) }).toString()).toBe("B2:C2");
    expect(box.toString()).toBe("A1:C2");
  });
});
