/**
 * Search engine types.
 */

import type { Direction, Position } from "../core/coords";
import type { PositionMap, SearchStorage } from "../core/storage";
import type { SearchTraceCollector } from "./trace";

/**
 * Evaluate a move: the position reached from `position` going
 * `direction`, or undefined when the move is blocked.
 *
 * The result must be `position + direction`: paths are rebuilt by
 * stepping back along the inverse direction.
 */
export type MoveFn = (
  position: Position,
  direction: Direction,
) => Position | undefined;

/**
 * Cost-aware move evaluation: the position reached and the cost of the
 * step, or undefined when blocked. Costs must be finite and non-negative.
 */
export type MoveCostFn = (
  position: Position,
  direction: Direction,
) => readonly [Position, number] | undefined;

export type GoalFn = (position: Position) => boolean;

/**
 * Estimated remaining cost from `position` to the destination.
 */
export type Heuristic = (position: Position, destination: Position) => number;

/**
 * Directions from origin to destination, in order.
 */
export type Path = Direction[];

/**
 * Direction used to reach each visited position; undefined elsewhere.
 */
export type CameFromMap = PositionMap<Direction | undefined>;

export type SearchAlgorithm = "bfs" | "astar" | "ucs";

export interface SearchOptions {
  /** Backing for the visited/cost/came-from state (default: denseStorage) */
  readonly storage?: SearchStorage;
  /** Opt-in event collector */
  readonly trace?: SearchTraceCollector;
}

export interface AstarOptions extends SearchOptions {
  /**
   * Override the default heuristic (Chebyshev distance on 8-way grids,
   * Manhattan on 4-way). Must not overestimate for the path to be optimal.
   */
  readonly heuristic?: Heuristic;
}

export interface BreadthFirstMatch {
  readonly goal: Position;
  readonly path: Path;
}

export interface BreadthFirstMapMatch {
  readonly goal: Position;
  readonly cameFrom: CameFromMap;
}
