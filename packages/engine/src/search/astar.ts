/**
 * A* search.
 */

import type { GridError, Result } from "@gridnav/contracts";
import { Position } from "../core/coords";
import { bestFirstSearchMap, checkSameGrid } from "./best-first";
import { withUnitCost } from "./moves";
import { cameFromIntoPath } from "./path";
import type {
  AstarOptions,
  CameFromMap,
  Heuristic,
  MoveCostFn,
  MoveFn,
  Path,
} from "./types";

/**
 * Exact move count on an open 8-way grid.
 */
export const chebyshevHeuristic: Heuristic = (position, destination) =>
  Position.chebyshev(position, destination);

/**
 * Exact move count on an open 4-way grid.
 */
export const manhattanHeuristic: Heuristic = (position, destination) =>
  Position.manhattan(position, destination);

/**
 * The admissible and consistent unit-cost heuristic for a grid with or
 * without diagonal moves.
 */
export function defaultHeuristic(diagonals: boolean): Heuristic {
  return diagonals ? chebyshevHeuristic : manhattanHeuristic;
}

function run(
  move: MoveCostFn,
  origin: Position,
  destination: Position,
  options: AstarOptions,
): Result<CameFromMap, GridError> {
  const heuristic =
    options.heuristic ?? defaultHeuristic(origin.space.diagonals);
  return checkSameGrid(origin, destination).flatMap((dest) =>
    bestFirstSearchMap(
      "astar",
      move,
      origin,
      dest,
      (position) => heuristic(position, dest),
      options,
    ),
  );
}

/**
 * A* search over unit-cost moves; returns the came-from map.
 */
export function astarSearchMap(
  move: MoveFn,
  origin: Position,
  destination: Position,
  options: AstarOptions = {},
): Result<CameFromMap, GridError> {
  return run(withUnitCost(move), origin, destination, options);
}

/**
 * Shortest path (fewest moves) from `origin` to `destination`.
 *
 * Ties in f are broken by insertion order, so the result is
 * reproducible. Fails with UNREACHABLE when no path exists.
 *
 * @example
 * ```typescript
 * const space = GridSpace.of(3, 3, true);
 * astarSearch(unitMove, space.topLeft, space.bottomRight).value;
 * // [Direction.SE, Direction.SE]
 * ```
 */
export function astarSearch(
  move: MoveFn,
  origin: Position,
  destination: Position,
  options: AstarOptions = {},
): Result<Path, GridError> {
  return astarSearchMap(move, origin, destination, options).flatMap(
    (cameFrom) => cameFromIntoPath(cameFrom, origin, destination),
  );
}

/**
 * A* over a cost-aware move function.
 *
 * The default heuristic counts moves, so it only stays admissible when
 * every step costs at least 1; pass `heuristic` otherwise. Fails with
 * INVALID_COST on a negative or non-finite step cost.
 */
export function astarCostSearch(
  move: MoveCostFn,
  origin: Position,
  destination: Position,
  options: AstarOptions = {},
): Result<Path, GridError> {
  return run(move, origin, destination, options).flatMap((cameFrom) =>
    cameFromIntoPath(cameFrom, origin, destination),
  );
}
