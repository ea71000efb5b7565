/**
 * Position-storage capability.
 *
 * The search engine only talks to these two surfaces, so the same
 * algorithms run over dense containers (DenseMap, BitsetMap) sized to
 * the whole grid or over sparse ones that grow with the explored area.
 */

import type { GridSpace, Position } from "../coords";

/**
 * Mapping from position to value.
 */
export interface PositionMap<V> {
  get(position: Position): V | undefined;
  set(position: Position, value: V): void;
  entries(): Iterable<[Position, V]>;
}

/**
 * Set of positions.
 */
export interface PositionSet {
  has(position: Position): boolean;
  add(position: Position): void;
  values(): Iterable<Position>;
}

/**
 * Factory for the per-call state of a search.
 *
 * `fill` is the value a map reports for positions never written.
 */
export interface SearchStorage {
  readonly kind: string;
  createMap<V>(space: GridSpace, fill: V): PositionMap<V>;
  createSet(space: GridSpace): PositionSet;
}
