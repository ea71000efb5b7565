/**
 * @gridnav/engine - bounded grid coordinates, position-indexed
 * containers and grid search.
 *
 * @example
 * ```typescript
 * import { BitsetMap, GridSpace, astarSearch, blockedBy } from "@gridnav/engine";
 *
 * const space = GridSpace.of(10, 10, true);
 * const walls = new BitsetMap(space);
 * const result = astarSearch(blockedBy(walls), space.topLeft, space.bottomRight);
 *
 * if (result.isOk()) {
 *   console.log(`${result.value.length} moves`);
 * }
 * ```
 */

export * from "./core/coords";
export * from "./core/data-structures";
export type { Dimensions, Point } from "./core/geometry";
export * from "./core/grid";
export * from "./core/storage";
export * from "./search";
