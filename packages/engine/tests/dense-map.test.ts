/**
 * DenseMap class unit tests
 */

import { afterEach, describe, expect, it, vi } from "vitest";
import { GridSpace } from "../src/core/coords";
import { DenseMap } from "../src/core/grid";

describe("DenseMap", () => {
  const space = GridSpace.of(3, 2);
  const counting = () => DenseMap.from(space, [0, 1, 2, 3, 4, 5]).getOrThrow();

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("construction", () => {
    it("fills every position", () => {
      const map = DenseMap.filled(space, 7);
      expect(map.size).toBe(6);
      expect(map.toArray()).toEqual([7, 7, 7, 7, 7, 7]);
    });

    it("requires exactly width * height values", () => {
      const result = DenseMap.from(space, [1, 2, 3, 4, 5]);
      expect(result.error.code).toBe("SIZE_MISMATCH");
      expect(result.error.details).toEqual({ expected: 6, actual: 5 });
      expect(DenseMap.from(space, new Array<number>(7).fill(0)).isErr()).toBe(true);
    });

    it("builds from a function of position", () => {
      const map = DenseMap.fromFunction(space, (p) => p.index);
      expect(map.toArray()).toEqual([0, 1, 2, 3, 4, 5]);
    });
  });

  describe("access", () => {
    it("gets and sets by position", () => {
      const map = DenseMap.filled(space, 0);
      const position = space.positionOrThrow(1, 1);
      map.set(position, 5);

      expect(map.get(position)).toBe(5);
      expect(map.toArray()).toEqual([0, 0, 0, 0, 5, 0]);
    });

    it("returns rows and columns", () => {
      const map = counting();
      expect(map.line(1).value).toEqual([3, 4, 5]);
      expect(map.column(2).value).toEqual([2, 5]);
    });

    it("rejects rows and columns outside the grid", () => {
      const map = counting();
      expect(map.line(2).error.details).toEqual({ x: 0, y: 2, width: 3, height: 2 });
      expect(map.column(-1).error.code).toBe("OUT_OF_BOUNDS");
    });

    it("iterates entries row-major", () => {
      const entries = [...counting().entries()].map(([p, v]) => [p.x, p.y, v]);
      expect(entries).toEqual([
        [0, 0, 0],
        [1, 0, 1],
        [2, 0, 2],
        [0, 1, 3],
        [1, 1, 4],
        [2, 1, 5],
      ]);
    });

    it("re-indexes positions of another shape that fit", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      const foreign = GridSpace.of(4, 4).positionOrThrow(1, 1);

      expect(counting().get(foreign)).toBe(4);
      expect(warn).toHaveBeenCalledTimes(1);
    });

    it("throws for positions of another shape that do not fit", () => {
      const foreign = GridSpace.of(4, 4).positionOrThrow(3, 3);
      expect(() => counting().get(foreign)).toThrow(RangeError);
    });
  });

  describe("transforms", () => {
    it("flips horizontally in place", () => {
      const map = counting();
      map.flipH();
      expect(map.toArray()).toEqual([2, 1, 0, 5, 4, 3]);
    });

    it("flips vertically in place", () => {
      const map = counting();
      map.flipV();
      expect(map.toArray()).toEqual([3, 4, 5, 0, 1, 2]);
    });

    it("rotates square grids clockwise in place", () => {
      const square = GridSpace.of(3, 3);
      const map = DenseMap.fromFunction(square, (p) => p.index);
      map.rotateCw().getOrThrow();
      expect(map.toArray()).toEqual([6, 3, 0, 7, 4, 1, 8, 5, 2]);
    });

    it("rotates square grids counter-clockwise in place", () => {
      const square = GridSpace.of(3, 3);
      const map = DenseMap.fromFunction(square, (p) => p.index);
      map.rotateCcw().getOrThrow();
      expect(map.toArray()).toEqual([2, 5, 8, 1, 4, 7, 0, 3, 6]);
    });

    it("moves each value along Position.rotateCw", () => {
      const square = GridSpace.of(4, 4);
      const map = DenseMap.fromFunction(square, (p) => p.index);
      map.rotateCw().getOrThrow();
      for (const position of square.positions()) {
        expect(map.get(position.rotateCw().getOrThrow())).toBe(position.index);
      }
    });

    it("refuses to rotate a non-square grid", () => {
      const map = counting();
      const result = map.rotateCw();
      expect(result.error.message).toBe("Rotation requires a square grid");
      expect(result.error.details).toEqual({ width: 3, height: 2 });
      expect(map.rotateCcw().isErr()).toBe(true);
      expect(map.toArray()).toEqual([0, 1, 2, 3, 4, 5]);
    });

    it("maps values with their positions", () => {
      const map = counting().map((value, position) => value * 10 + position.y);
      expect(map.toArray()).toEqual([0, 10, 20, 31, 41, 51]);
    });

    it("clones independently", () => {
      const map = counting();
      const copy = map.clone();
      copy.set(space.first, 99);
      expect(map.get(space.first)).toBe(0);
      expect([...copy.values()]).toEqual([99, 1, 2, 3, 4, 5]);
    });
  });
});
