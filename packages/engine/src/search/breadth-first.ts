/**
 * Breadth-first traversal and search.
 */

import { Err, GridError, Ok, type Result } from "@gridnav/contracts";
import type { Direction, Position } from "../core/coords";
import { FastQueue } from "../core/data-structures";
import { denseStorage, type PositionSet } from "../core/storage";
import { cameFromIntoPath } from "./path";
import type { SearchTraceCollector } from "./trace";
import type {
  BreadthFirstMapMatch,
  BreadthFirstMatch,
  GoalFn,
  MoveFn,
  SearchOptions,
} from "./types";

/**
 * Lazy breadth-first walk from an origin.
 *
 * Each pull yields a newly reached position and the direction of the
 * move that reached it, in non-decreasing distance from the origin.
 * Every reachable position except the origin is yielded exactly once.
 * No work happens between pulls; stopping early is always safe.
 *
 * The iterator owns its queue and visited set: two iterators over the
 * same grid never share state.
 */
export class BreadthFirstIterator implements IterableIterator<[Position, Direction]> {
  private readonly frontier = new FastQueue<Position>();
  private readonly visited: PositionSet;
  private readonly directions: readonly Direction[];
  private readonly move: MoveFn;
  private readonly trace: SearchTraceCollector | undefined;
  private current: Position | undefined;
  private nextDirection = 0;

  constructor(origin: Position, move: MoveFn, options: SearchOptions = {}) {
    const storage = options.storage ?? denseStorage;
    this.move = move;
    this.trace = options.trace;
    this.directions = origin.space.directions();
    this.visited = storage.createSet(origin.space);
    this.visited.add(origin);
    this.frontier.enqueue(origin);
    this.trace?.start("bfs", origin);
  }

  next(): IteratorResult<[Position, Direction], undefined> {
    while (true) {
      if (this.current === undefined) {
        this.current = this.frontier.dequeue();
        this.nextDirection = 0;
        if (this.current === undefined) {
          return { done: true, value: undefined };
        }
        this.trace?.expand("bfs", this.current, this.frontier.length);
      }

      const position = this.current;
      while (this.nextDirection < this.directions.length) {
        const direction = this.directions[this.nextDirection++];
        if (direction === undefined) break;

        const next = this.move(position, direction);
        if (next === undefined || this.visited.has(next)) continue;

        this.visited.add(next);
        this.frontier.enqueue(next);
        return { done: false, value: [next, direction] };
      }
      this.current = undefined;
    }
  }

  [Symbol.iterator](): BreadthFirstIterator {
    return this;
  }
}

/**
 * Start a lazy breadth-first walk; see {@link BreadthFirstIterator}.
 */
export function breadthFirstIterate(
  origin: Position,
  move: MoveFn,
  options: SearchOptions = {},
): BreadthFirstIterator {
  return new BreadthFirstIterator(origin, move, options);
}

/**
 * Breadth-first search for the nearest position satisfying `goal`,
 * returning that position and the came-from map built on the way.
 *
 * The origin itself is checked first. Fails with UNREACHABLE once every
 * reachable position has been visited without a match.
 */
export function breadthFirstSearchMap(
  origin: Position,
  move: MoveFn,
  goal: GoalFn,
  options: SearchOptions = {},
): Result<BreadthFirstMapMatch, GridError> {
  const storage = options.storage ?? denseStorage;
  const cameFrom = storage.createMap<Direction | undefined>(origin.space, undefined);

  if (goal(origin)) {
    options.trace?.start("bfs", origin);
    options.trace?.goal("bfs", origin);
    return Ok({ goal: origin, cameFrom });
  }

  for (const [position, direction] of breadthFirstIterate(origin, move, options)) {
    cameFrom.set(position, direction);
    if (goal(position)) {
      options.trace?.goal("bfs", position);
      return Ok({ goal: position, cameFrom });
    }
  }

  options.trace?.exhausted("bfs");
  return Err(GridError.unreachable({ origin: origin.tuple() }));
}

/**
 * Breadth-first search for the nearest position satisfying `goal`.
 * Returns the goal and the shortest (fewest moves) path to it.
 */
export function breadthFirstSearch(
  origin: Position,
  move: MoveFn,
  goal: GoalFn,
  options: SearchOptions = {},
): Result<BreadthFirstMatch, GridError> {
  return breadthFirstSearchMap(origin, move, goal, options).flatMap((match) =>
    cameFromIntoPath(match.cameFrom, origin, match.goal).map((path) => ({
      goal: match.goal,
      path,
    })),
  );
}
