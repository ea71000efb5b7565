/**
 * Uniform-cost search (Dijkstra shortest path to a single destination).
 */

import type { GridError, Result } from "@gridnav/contracts";
import type { Position } from "../core/coords";
import { bestFirstSearchMap, checkSameGrid } from "./best-first";
import { cameFromIntoPath } from "./path";
import type { CameFromMap, MoveCostFn, Path, SearchOptions } from "./types";

const noEstimate = (): number => 0;

export function uniformCostSearchMap(
  move: MoveCostFn,
  origin: Position,
  destination: Position,
  options: SearchOptions = {},
): Result<CameFromMap, GridError> {
  return checkSameGrid(origin, destination).flatMap((dest) =>
    bestFirstSearchMap("ucs", move, origin, dest, noEstimate, options),
  );
}

/**
 * Lowest total cost path from `origin` to `destination`.
 *
 * Step costs must be finite and non-negative; the first offending cost
 * stops the search with INVALID_COST. Zero-cost steps are accepted.
 * Fails with UNREACHABLE when no path exists.
 */
export function uniformCostSearch(
  move: MoveCostFn,
  origin: Position,
  destination: Position,
  options: SearchOptions = {},
): Result<Path, GridError> {
  return uniformCostSearchMap(move, origin, destination, options).flatMap(
    (cameFrom) => cameFromIntoPath(cameFrom, origin, destination),
  );
}
