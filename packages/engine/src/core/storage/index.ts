/**
 * Storage module - the capability the search engine is written against,
 * and the two stock backings.
 */

import { BitsetMap } from "../grid/bitset-map";
import { DenseMap } from "../grid/dense-map";
import { SparseMap, SparseSet } from "./sparse";
import type { SearchStorage } from "./types";

/**
 * Whole-grid arrays and bitsets: O(width * height) memory, fastest access.
 */
export const denseStorage: SearchStorage = {
  kind: "dense",
  createMap: (space, fill) => DenseMap.filled(space, fill),
  createSet: (space) => new BitsetMap(space),
};

/**
 * Hash-based maps and sets: memory proportional to the positions explored.
 */
export const sparseStorage: SearchStorage = {
  kind: "sparse",
  createMap: (space, fill) => new SparseMap(space, fill),
  createSet: (space) => new SparseSet(space),
};

export { SparseMap, SparseSet } from "./sparse";
export type { PositionMap, PositionSet, SearchStorage } from "./types";
