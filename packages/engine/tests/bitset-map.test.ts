/**
 * BitsetMap class unit tests
 */

import { describe, expect, it } from "vitest";
import { GridSpace } from "../src/core/coords";
import { BitsetMap } from "../src/core/grid";

describe("BitsetMap", () => {
  describe("transforms", () => {
    const square = GridSpace.of(3, 3);
    // (0,0) and (1,0) set
    const topLeftPair = () =>
      BitsetMap.fromPositions(square, [square.first, square.positionOrThrow(1, 0)]);
    const setIndices = (bits: BitsetMap) => [...bits.iterateTrue()].map((p) => p.index);

    it("flips horizontally in place", () => {
      const bits = topLeftPair();
      bits.flipH();
      expect(setIndices(bits)).toEqual([1, 2]);
    });

    it("flips vertically in place", () => {
      const bits = topLeftPair();
      bits.flipV();
      expect(setIndices(bits)).toEqual([6, 7]);
    });

    it("rotates clockwise and counter-clockwise", () => {
      const cw = topLeftPair();
      cw.rotateCw().getOrThrow();
      expect(setIndices(cw)).toEqual([2, 5]);

      const ccw = topLeftPair();
      ccw.rotateCcw().getOrThrow();
      expect(setIndices(ccw)).toEqual([3, 6]);
    });

    it("returns to the start after four rotations", () => {
      const bits = topLeftPair();
      for (let i = 0; i < 4; i++) {
        bits.rotateCw().getOrThrow();
      }
      expect(setIndices(bits)).toEqual([0, 1]);
    });

    it("flips across word boundaries", () => {
      const tall = GridSpace.of(5, 7);
      const bits = BitsetMap.fromPositions(tall, [tall.positionOrThrow(1, 6)]);
      bits.flipV();
      expect(setIndices(bits)).toEqual([1]);
      bits.flipH();
      expect(setIndices(bits)).toEqual([3]);
    });

    it("refuses to rotate a non-square grid", () => {
      const bits = new BitsetMap(GridSpace.of(5, 7));
      expect(bits.rotateCw().error.details).toEqual({ width: 5, height: 7 });
      expect(bits.rotateCcw().error.code).toBe("OUT_OF_BOUNDS");
    });
  });

  // 35 cells: one full word and three bits of a second one
  const space = GridSpace.of(5, 7);

  describe("construction", () => {
    it("starts all false", () => {
      const bits = new BitsetMap(space);
      expect(bits.count()).toBe(0);
      expect(bits.countFalse()).toBe(35);
      expect(bits.width).toBe(5);
      expect(bits.height).toBe(7);
    });

    it("requires exactly width * height booleans", () => {
      const short = BitsetMap.fromBooleans(space, new Array<boolean>(34).fill(true));
      expect(short.error.details).toEqual({ expected: 35, actual: 34 });

      const long = BitsetMap.fromBooleans(space, new Array<boolean>(36).fill(true));
      expect(long.error.details).toEqual({ expected: 35, actual: 36 });

      const exact = BitsetMap.fromBooleans(space, new Array<boolean>(35).fill(true));
      expect(exact.value.count()).toBe(35);
    });
  });

  describe("word boundaries", () => {
    const last = space.positionOrThrow(1, 6); // index 31
    const first = space.positionOrThrow(2, 6); // index 32
    const end = space.positionOrThrow(4, 6); // index 34

    it("keeps neighbouring bits independent", () => {
      const bits = BitsetMap.fromPositions(space, [last, first, end]);
      expect(bits.get(last)).toBe(true);
      expect(bits.get(first)).toBe(true);
      expect(bits.get(space.positionOrThrow(3, 6))).toBe(false);
      expect(bits.get(space.positionOrThrow(0, 6))).toBe(false);
      expect(bits.count()).toBe(3);
    });

    it("packs 32 positions per word", () => {
      const raw = BitsetMap.fromPositions(space, [last, first, end]).getRawDataCopy();
      expect(raw.length).toBe(2);
      expect(raw[0]).toBe(0x80000000);
      expect(raw[1]).toBe(0b101);
    });

    it("ignores padding bits when counting", () => {
      const bits = new BitsetMap(space);
      bits.fill();
      expect(bits.count()).toBe(35);
      expect(bits.countFalse()).toBe(0);
    });
  });

  describe("set operations", () => {
    it("adds, deletes and toggles", () => {
      const bits = new BitsetMap(space);
      const position = space.positionOrThrow(2, 3);

      bits.add(position);
      expect(bits.has(position)).toBe(true);
      bits.delete(position);
      expect(bits.has(position)).toBe(false);
      bits.toggle(position);
      expect(bits.get(position)).toBe(true);
      bits.toggle(position);
      expect(bits.get(position)).toBe(false);
    });

    it("iterates set and clear positions row-major", () => {
      const small = GridSpace.of(3, 2);
      const bits = BitsetMap.fromBooleans(small, [
        false, true, false,
        true, false, true,
      ]).getOrThrow();

      expect([...bits.iterateTrue()].map((p) => p.tuple())).toEqual([
        [1, 0],
        [0, 1],
        [2, 1],
      ]);
      expect([...bits.values()]).toHaveLength(3);
      expect([...bits.iterateFalse()].map((p) => p.index)).toEqual([0, 2, 4]);
    });

    it("sets many positions at once", () => {
      const bits = new BitsetMap(space);
      bits.setAll([space.first, space.last, space.center], true);
      expect(bits.count()).toBe(3);
      bits.setAll([space.first, space.center], false);
      expect([...bits.iterateTrue()].map((p) => p.index)).toEqual([34]);
    });

    it("clears and clones independently", () => {
      const bits = BitsetMap.fromPositions(space, [space.first]);
      const copy = bits.clone();
      bits.clear();

      expect(bits.count()).toBe(0);
      expect(copy.has(space.first)).toBe(true);
    });
  });
});
