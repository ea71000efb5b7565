/**
 * DenseMap - one value per grid position in a flat array.
 */

import { Err, GridError, Ok, type Result } from "@gridnav/contracts";
import type { GridSpace, Position } from "../coords";
import type { PositionMap } from "../storage/types";
import { resolveIndex } from "./indexing";

/**
 * Fixed-size position-indexed array. Entry `i` belongs to the position
 * whose linear index is `i` (`y * width + x`).
 *
 * @remarks
 * Point operations are O(1). `entries()`, `values()` and the bulk
 * transforms visit every cell.
 */
export class DenseMap<V> implements PositionMap<V> {
  readonly space: GridSpace;
  private readonly data: V[];

  private constructor(space: GridSpace, data: V[]) {
    this.space = space;
    this.data = data;
  }

  /**
   * Every position holds `value`.
   */
  static filled<V>(space: GridSpace, value: V): DenseMap<V> {
    return new DenseMap(space, new Array<V>(space.size).fill(value));
  }

  /**
   * Take exactly `width * height` values in row-major order.
   * Fails with SIZE_MISMATCH on any other length.
   */
  static from<V>(
    space: GridSpace,
    values: Iterable<V>,
  ): Result<DenseMap<V>, GridError> {
    const data = Array.from(values);
    if (data.length !== space.size) {
      return Err(GridError.sizeMismatch(space.size, data.length));
    }
    return Ok(new DenseMap(space, data));
  }

  static fromFunction<V>(
    space: GridSpace,
    fn: (position: Position) => V,
  ): DenseMap<V> {
    const data: V[] = [];
    for (const position of space.positions()) {
      data.push(fn(position));
    }
    return new DenseMap(space, data);
  }

  get width(): number {
    return this.space.width;
  }

  get height(): number {
    return this.space.height;
  }

  get size(): number {
    return this.data.length;
  }

  get(position: Position): V {
    return this.at(resolveIndex(this.space, position, "DenseMap.get"));
  }

  set(position: Position, value: V): void {
    this.data[resolveIndex(this.space, position, "DenseMap.set")] = value;
  }

  /**
   * Values of row `y`, left to right.
   */
  line(y: number): Result<V[], GridError> {
    if (!Number.isInteger(y) || y < 0 || y >= this.height) {
      return Err(GridError.outOfBounds(0, y, this.space));
    }
    const start = y * this.width;
    return Ok(this.data.slice(start, start + this.width));
  }

  /**
   * Values of column `x`, top to bottom.
   */
  column(x: number): Result<V[], GridError> {
    if (!Number.isInteger(x) || x < 0 || x >= this.width) {
      return Err(GridError.outOfBounds(x, 0, this.space));
    }
    const column: V[] = [];
    for (let y = 0; y < this.height; y++) {
      column.push(this.at(y * this.width + x));
    }
    return Ok(column);
  }

  *entries(): Generator<[Position, V]> {
    let index = 0;
    for (const position of this.space.positions()) {
      yield [position, this.at(index++)];
    }
  }

  *values(): Generator<V> {
    yield* this.data;
  }

  /**
   * Copy of the backing array, row-major. Bulk edits go through
   * `DenseMap.from(space, edited)`.
   */
  toArray(): V[] {
    return this.data.slice();
  }

  map<U>(fn: (value: V, position: Position) => U): DenseMap<U> {
    const data: U[] = [];
    for (const [position, value] of this.entries()) {
      data.push(fn(value, position));
    }
    return new DenseMap(this.space, data);
  }

  /**
   * Mirror left-right in place.
   */
  flipH(): void {
    for (let y = 0; y < this.height; y++) {
      const row = y * this.width;
      for (let x = 0; x < Math.floor(this.width / 2); x++) {
        this.swap(row + x, row + this.width - 1 - x);
      }
    }
  }

  /**
   * Mirror top-bottom in place.
   */
  flipV(): void {
    for (let y = 0; y < Math.floor(this.height / 2); y++) {
      const top = y * this.width;
      const bottom = (this.height - 1 - y) * this.width;
      for (let x = 0; x < this.width; x++) {
        this.swap(top + x, bottom + x);
      }
    }
  }

  /**
   * Rotate 90° clockwise in place; square grids only.
   * The value at `p` moves to `p.rotateCw()`.
   */
  rotateCw(): Result<DenseMap<V>, GridError> {
    const size = this.width;
    if (size !== this.height) {
      return Err(GridError.notSquare(this.space));
    }
    const source = this.data.slice();
    source.forEach((value, index) => {
      const x = index % size;
      const y = Math.floor(index / size);
      this.data[x * size + (size - 1 - y)] = value;
    });
    return Ok(this);
  }

  /**
   * Rotate 90° counter-clockwise in place; square grids only.
   * The value at `p` moves to `p.rotateCcw()`.
   */
  rotateCcw(): Result<DenseMap<V>, GridError> {
    const size = this.width;
    if (size !== this.height) {
      return Err(GridError.notSquare(this.space));
    }
    const source = this.data.slice();
    source.forEach((value, index) => {
      const x = index % size;
      const y = Math.floor(index / size);
      this.data[(size - 1 - x) * size + y] = value;
    });
    return Ok(this);
  }

  clone(): DenseMap<V> {
    return new DenseMap(this.space, this.data.slice());
  }

  private at(index: number): V {
    if (index < 0 || index >= this.data.length) {
      throw new Error(`DenseMap: index ${index} outside [0, ${this.data.length})`);
    }
    return this.data[index] as V;
  }

  private swap(a: number, b: number): void {
    const first = this.at(a);
    this.data[a] = this.at(b);
    this.data[b] = first;
  }
}
