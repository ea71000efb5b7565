/**
 * BitsetMap - memory-efficient boolean grid using bit packing.
 * Uses 32 cells per Uint32 element: word = index >>> 5, bit = index & 31.
 */

import { Err, GridError, Ok, type Result } from "@gridnav/contracts";
import type { GridSpace, Position } from "../coords";
import type { PositionMap, PositionSet } from "../storage/types";
import { resolveIndex } from "./indexing";

/**
 * Fast popcount for a 32-bit word using SWAR bit tricks.
 */
function popcount32(value: number): number {
  let n = value >>> 0;
  n = n - ((n >>> 1) & 0x55555555);
  n = (n & 0x33333333) + ((n >>> 2) & 0x33333333);
  return ((((n + (n >>> 4)) & 0x0f0f0f0f) * 0x01010101) >>> 24) >>> 0;
}

/**
 * One bit per grid position. Ideal for walls, visited sets and masks.
 *
 * @remarks
 * `get`/`set` are O(1). `iterateTrue()`, `iterateFalse()` and `values()`
 * always scan all `width * height` cells, however few bits are set:
 * compactness is traded for iteration speed. Use a SparseSet when the
 * set stays small relative to the grid and is iterated often.
 */
export class BitsetMap implements PositionSet, PositionMap<boolean> {
  readonly space: GridSpace;
  private readonly data: Uint32Array;

  constructor(space: GridSpace) {
    this.space = space;
    this.data = new Uint32Array(Math.ceil(space.size / 32));
  }

  /**
   * Mark every given position true.
   */
  static fromPositions(
    space: GridSpace,
    positions: Iterable<Position>,
  ): BitsetMap {
    const bits = new BitsetMap(space);
    for (const position of positions) {
      bits.set(position, true);
    }
    return bits;
  }

  /**
   * Take exactly `width * height` booleans in row-major order.
   * Fails with SIZE_MISMATCH on any other length.
   */
  static fromBooleans(
    space: GridSpace,
    values: Iterable<boolean>,
  ): Result<BitsetMap, GridError> {
    const bits = new BitsetMap(space);
    let index = 0;
    for (const value of values) {
      if (index < space.size && value) {
        bits.writeBit(index, true);
      }
      index++;
    }
    if (index !== space.size) {
      return Err(GridError.sizeMismatch(space.size, index));
    }
    return Ok(bits);
  }

  get width(): number {
    return this.space.width;
  }

  get height(): number {
    return this.space.height;
  }

  get(position: Position): boolean {
    return this.readBit(resolveIndex(this.space, position, "BitsetMap.get"));
  }

  set(position: Position, value: boolean): void {
    this.writeBit(resolveIndex(this.space, position, "BitsetMap.set"), value);
  }

  toggle(position: Position): void {
    const index = resolveIndex(this.space, position, "BitsetMap.toggle");
    this.writeBit(index, !this.readBit(index));
  }

  has(position: Position): boolean {
    return this.get(position);
  }

  add(position: Position): void {
    this.set(position, true);
  }

  delete(position: Position): void {
    this.set(position, false);
  }

  /**
   * Set every given position to `value`.
   */
  setAll(positions: Iterable<Position>, value: boolean): void {
    for (const position of positions) {
      this.set(position, value);
    }
  }

  /**
   * Clear all bits to false
   */
  clear(): void {
    this.data.fill(0);
  }

  /**
   * Set all bits to true
   */
  fill(): void {
    this.data.fill(0xffffffff);
  }

  /**
   * Count number of set bits (only valid cells, not padding)
   */
  count(): number {
    let count = 0;
    const totalCells = this.space.size;

    const fullElements = Math.floor(totalCells / 32);
    for (let i = 0; i < fullElements; i++) {
      count += popcount32(this.data[i] ?? 0);
    }

    const remainingBits = totalCells % 32;
    if (remainingBits > 0) {
      const lastElement = this.data[fullElements] ?? 0;
      const mask = 0xffffffff >>> (32 - remainingBits);
      count += popcount32(lastElement & mask);
    }

    return count;
  }

  countFalse(): number {
    return this.space.size - this.count();
  }

  /**
   * Positions whose bit is set, row-major. O(width * height).
   */
  *iterateTrue(): Generator<Position> {
    for (const [position, value] of this.entries()) {
      if (value) yield position;
    }
  }

  /**
   * Positions whose bit is clear, row-major. O(width * height).
   */
  *iterateFalse(): Generator<Position> {
    for (const [position, value] of this.entries()) {
      if (!value) yield position;
    }
  }

  values(): Generator<Position> {
    return this.iterateTrue();
  }

  *entries(): Generator<[Position, boolean]> {
    let index = 0;
    for (const position of this.space.positions()) {
      yield [position, this.readBit(index++)];
    }
  }

  /**
   * Mirror left-right in place.
   */
  flipH(): void {
    const { width, height } = this.space;
    for (let y = 0; y < height; y++) {
      const row = y * width;
      for (let x = 0; x < Math.floor(width / 2); x++) {
        this.swapBits(row + x, row + width - 1 - x);
      }
    }
  }

  /**
   * Mirror top-bottom in place.
   */
  flipV(): void {
    const { width, height } = this.space;
    for (let y = 0; y < Math.floor(height / 2); y++) {
      const top = y * width;
      const bottom = (height - 1 - y) * width;
      for (let x = 0; x < width; x++) {
        this.swapBits(top + x, bottom + x);
      }
    }
  }

  /**
   * Rotate 90° clockwise in place; square grids only.
   */
  rotateCw(): Result<BitsetMap, GridError> {
    const size = this.space.width;
    if (size !== this.space.height) {
      return Err(GridError.notSquare(this.space));
    }
    const source = this.clone();
    for (let index = 0; index < this.space.size; index++) {
      const x = index % size;
      const y = Math.floor(index / size);
      this.writeBit(x * size + (size - 1 - y), source.readBit(index));
    }
    return Ok(this);
  }

  /**
   * Rotate 90° counter-clockwise in place; square grids only.
   */
  rotateCcw(): Result<BitsetMap, GridError> {
    const size = this.space.width;
    if (size !== this.space.height) {
      return Err(GridError.notSquare(this.space));
    }
    const source = this.clone();
    for (let index = 0; index < this.space.size; index++) {
      const x = index % size;
      const y = Math.floor(index / size);
      this.writeBit((size - 1 - x) * size + y, source.readBit(index));
    }
    return Ok(this);
  }

  clone(): BitsetMap {
    const result = new BitsetMap(this.space);
    result.data.set(this.data);
    return result;
  }

  /**
   * Get a copy of the raw data array (safe for external use).
   */
  getRawDataCopy(): Uint32Array {
    return new Uint32Array(this.data);
  }

  private readBit(index: number): boolean {
    const word = this.data[index >>> 5];
    if (word === undefined) return false;
    return (word & (1 << (index & 31))) !== 0;
  }

  private swapBits(a: number, b: number): void {
    const first = this.readBit(a);
    this.writeBit(a, this.readBit(b));
    this.writeBit(b, first);
  }

  private writeBit(index: number, value: boolean): void {
    const arrayIndex = index >>> 5;
    const current = this.data[arrayIndex];
    if (current === undefined) {
      throw new Error(`BitsetMap: no word for index ${index}`);
    }
    const mask = 1 << (index & 31);
    this.data[arrayIndex] = value ? current | mask : current & ~mask;
  }
}
