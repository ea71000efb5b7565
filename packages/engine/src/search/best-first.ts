/**
 * Cost-ordered search shared by A* and uniform-cost search.
 *
 * Same relaxation discipline as a Dijkstra map: a position's recorded
 * cost and came-from direction are overwritten whenever a strictly
 * cheaper route is found, until the position is popped and finalized.
 * Frontier entries made obsolete by a later relaxation stay in the heap
 * and are skipped when popped.
 */

import { Err, GridError, Ok, type Result } from "@gridnav/contracts";
import type { Direction, Position } from "../core/coords";
import { MinHeap } from "../core/data-structures";
import { denseStorage } from "../core/storage";
import type {
  CameFromMap,
  MoveCostFn,
  SearchAlgorithm,
  SearchOptions,
} from "./types";

interface FrontierEntry {
  readonly position: Position;
  /** Cost from origin when this entry was pushed */
  readonly g: number;
  /** g + heuristic */
  readonly f: number;
  /** Insertion order; breaks ties in f first-in first-out */
  readonly seq: number;
}

function compareEntries(a: FrontierEntry, b: FrontierEntry): number {
  if (a.f !== b.f) return a.f - b.f;
  return a.seq - b.seq;
}

/**
 * Destination must come from a grid of the same shape as the origin.
 */
export function checkSameGrid(
  origin: Position,
  destination: Position,
): Result<Position, GridError> {
  if (!origin.space.sameShape(destination.space)) {
    return Err(
      GridError.create(
        "OUT_OF_BOUNDS",
        `Destination ${destination} belongs to a ${destination.space.width}x${destination.space.height} grid, origin to ${origin.space.width}x${origin.space.height}`,
        {
          origin: origin.tuple(),
          destination: destination.tuple(),
        },
      ),
    );
  }
  return Ok(destination);
}

/**
 * Run the search and return the came-from map once `destination` is
 * finalized.
 *
 * Fails with INVALID_COST as soon as the move function reports a
 * negative, NaN or infinite step cost, and with UNREACHABLE when the
 * frontier runs dry.
 */
export function bestFirstSearchMap(
  algorithm: SearchAlgorithm,
  move: MoveCostFn,
  origin: Position,
  destination: Position,
  heuristic: (position: Position) => number,
  options: SearchOptions = {},
): Result<CameFromMap, GridError> {
  const space = origin.space;
  const storage = options.storage ?? denseStorage;
  const trace = options.trace;

  const costs = storage.createMap<number>(space, Infinity);
  const cameFrom = storage.createMap<Direction | undefined>(space, undefined);
  const finalized = storage.createSet(space);
  const frontier = new MinHeap<FrontierEntry>(compareEntries);
  const directions = space.directions();
  let seq = 0;

  costs.set(origin, 0);
  frontier.push({ position: origin, g: 0, f: heuristic(origin), seq: seq++ });
  trace?.start(algorithm, origin);

  while (!frontier.isEmpty) {
    const entry = frontier.pop();
    if (entry === undefined) break;

    const { position, g } = entry;
    if (finalized.has(position) || g > (costs.get(position) ?? Infinity)) {
      trace?.skipStale(algorithm, position);
      continue;
    }
    finalized.add(position);
    trace?.expand(algorithm, position, frontier.size);

    if (position.equals(destination)) {
      trace?.goal(algorithm, position);
      return Ok(cameFrom);
    }

    for (const direction of directions) {
      const step = move(position, direction);
      if (step === undefined) continue;

      const [next, stepCost] = step;
      if (!Number.isFinite(stepCost) || stepCost < 0) {
        return Err(
          GridError.invalidCost(stepCost, {
            position: position.tuple(),
            direction,
          }),
        );
      }
      if (finalized.has(next)) continue;

      const tentative = g + stepCost;
      if (tentative < (costs.get(next) ?? Infinity)) {
        costs.set(next, tentative);
        cameFrom.set(next, direction);
        frontier.push({
          position: next,
          g: tentative,
          f: tentative + heuristic(next),
          seq: seq++,
        });
        trace?.relax(algorithm, next, tentative);
      }
    }
  }

  trace?.exhausted(algorithm);
  return Err(
    GridError.unreachable({
      origin: origin.tuple(),
      destination: destination.tuple(),
    }),
  );
}
