/**
 * Sparse position containers keyed by linear index.
 *
 * Memory grows with the number of positions written rather than with
 * the grid, which suits very large grids where a search touches a
 * small area.
 */

import type { GridSpace, Position } from "../coords";
import { resolveIndex } from "../grid/indexing";
import type { PositionMap, PositionSet } from "./types";

export class SparseMap<V> implements PositionMap<V> {
  readonly space: GridSpace;
  private readonly fill: V;
  private readonly entriesByIndex = new Map<number, V>();

  /**
   * @param fill - value reported for positions never written (or written
   *   as undefined)
   */
  constructor(space: GridSpace, fill: V) {
    this.space = space;
    this.fill = fill;
  }

  get size(): number {
    return this.entriesByIndex.size;
  }

  get(position: Position): V {
    const value = this.entriesByIndex.get(
      resolveIndex(this.space, position, "SparseMap.get"),
    );
    return value === undefined ? this.fill : value;
  }

  set(position: Position, value: V): void {
    this.entriesByIndex.set(resolveIndex(this.space, position, "SparseMap.set"), value);
  }

  has(position: Position): boolean {
    return this.entriesByIndex.has(resolveIndex(this.space, position, "SparseMap.has"));
  }

  /**
   * Written entries only, in first-write order.
   */
  *entries(): Generator<[Position, V]> {
    for (const [index, value] of this.entriesByIndex) {
      yield [this.space.positionAt(index).getOrThrow(), value];
    }
  }

  clear(): void {
    this.entriesByIndex.clear();
  }
}

export class SparseSet implements PositionSet {
  readonly space: GridSpace;
  private readonly indices = new Set<number>();

  constructor(space: GridSpace) {
    this.space = space;
  }

  static fromPositions(space: GridSpace, positions: Iterable<Position>): SparseSet {
    const set = new SparseSet(space);
    for (const position of positions) {
      set.add(position);
    }
    return set;
  }

  get size(): number {
    return this.indices.size;
  }

  has(position: Position): boolean {
    return this.indices.has(resolveIndex(this.space, position, "SparseSet.has"));
  }

  add(position: Position): void {
    this.indices.add(resolveIndex(this.space, position, "SparseSet.add"));
  }

  delete(position: Position): void {
    this.indices.delete(resolveIndex(this.space, position, "SparseSet.delete"));
  }

  /**
   * Members in insertion order. O(size), not O(width * height).
   */
  *values(): Generator<Position> {
    for (const index of this.indices) {
      yield this.space.positionAt(index).getOrThrow();
    }
  }

  clear(): void {
    this.indices.clear();
  }
}
