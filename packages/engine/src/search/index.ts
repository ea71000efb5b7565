/**
 * Search Module
 *
 * Breadth-first traversal, A* and uniform-cost search over bounded grids,
 * written against the position-storage capability.
 */

export {
  astarCostSearch,
  astarSearch,
  astarSearchMap,
  chebyshevHeuristic,
  defaultHeuristic,
  manhattanHeuristic,
} from "./astar";
export {
  BreadthFirstIterator,
  breadthFirstIterate,
  breadthFirstSearch,
  breadthFirstSearchMap,
} from "./breadth-first";
export { blockedBy, unitMove, withUnitCost } from "./moves";
export { cameFromIntoPath, gotoIntoPath } from "./path";
export {
  SearchTraceCollector,
  type SearchTraceEvent,
  type SearchTraceEventType,
  type SearchTraceSummary,
} from "./trace";
export { uniformCostSearch, uniformCostSearchMap } from "./ucs";
export type {
  AstarOptions,
  BreadthFirstMapMatch,
  BreadthFirstMatch,
  CameFromMap,
  GoalFn,
  Heuristic,
  MoveCostFn,
  MoveFn,
  Path,
  SearchAlgorithm,
  SearchOptions,
} from "./types";
