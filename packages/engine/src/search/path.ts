/**
 * Turning direction maps into paths.
 */

import { Err, GridError, Ok, type Result } from "@gridnav/contracts";
import { inverseDirection, type Position } from "../core/coords";
import type { CameFromMap, Path } from "./types";

/**
 * Rebuild the path from `origin` to `destination` by walking the
 * came-from map backwards from the destination.
 *
 * Fails with UNREACHABLE when the destination was never reached,
 * INVALID_MOVEMENT when a step leads out of the grid or onto a position
 * with no entry, and LOOP after more steps than the grid has positions.
 */
export function cameFromIntoPath(
  cameFrom: CameFromMap,
  origin: Position,
  destination: Position,
): Result<Path, GridError> {
  if (destination.equals(origin)) {
    return Ok([]);
  }
  if (cameFrom.get(destination) === undefined) {
    return Err(
      GridError.unreachable({
        origin: origin.tuple(),
        destination: destination.tuple(),
      }),
    );
  }

  const maxSteps = origin.space.size;
  const path: Path = [];
  let position = destination;

  while (!position.equals(origin)) {
    const direction = cameFrom.get(position);
    if (direction === undefined) {
      return Err(
        GridError.invalidMovement(`No came-from entry at ${position}`, {
          position: position.tuple(),
        }),
      );
    }
    path.push(direction);
    if (path.length > maxSteps) {
      return Err(GridError.loop(path.length));
    }
    const previous = position.add(inverseDirection(direction));
    if (previous === undefined) {
      return Err(
        GridError.invalidMovement(`Came-from entry at ${position} leaves the grid`, {
          position: position.tuple(),
          direction,
        }),
      );
    }
    position = previous;
  }

  path.reverse();
  return Ok(path);
}

/**
 * Follow a "go to" map forwards: at each position, the entry is the
 * direction to take next.
 *
 * Fails like `cameFromIntoPath`.
 */
export function gotoIntoPath(
  goto: CameFromMap,
  origin: Position,
  destination: Position,
): Result<Path, GridError> {
  const maxSteps = origin.space.size;
  const path: Path = [];
  let position = origin;

  while (!position.equals(destination)) {
    const direction = goto.get(position);
    if (direction === undefined) {
      return Err(
        path.length === 0
          ? GridError.unreachable({
              origin: origin.tuple(),
              destination: destination.tuple(),
            })
          : GridError.invalidMovement(`No go-to entry at ${position}`, {
              position: position.tuple(),
            }),
      );
    }
    path.push(direction);
    if (path.length > maxSteps) {
      return Err(GridError.loop(path.length));
    }
    const next = position.add(direction);
    if (next === undefined) {
      return Err(
        GridError.invalidMovement(`Go-to entry at ${position} leaves the grid`, {
          position: position.tuple(),
          direction,
        }),
      );
    }
    position = next;
  }

  return Ok(path);
}
