/**
 * Position -> linear index resolution shared by the dense containers.
 */

import type { GridSpace, Position } from "../coords";

const DEV_MODE = process.env.NODE_ENV !== "production";

/**
 * Linear index of `position` inside `space`.
 *
 * A position from a differently shaped grid is re-indexed by its (x, y)
 * when those coordinates fit, with a development warning; otherwise
 * this throws, since no cell of the container corresponds to it.
 */
export function resolveIndex(
  space: GridSpace,
  position: Position,
  caller: string,
): number {
  if (space.sameShape(position.space)) {
    return position.index;
  }
  if (!space.contains(position.x, position.y)) {
    throw new RangeError(
      `${caller}: ${position} is outside the ${space.width}x${space.height} grid`,
    );
  }
  if (DEV_MODE) {
    console.warn(
      `[gridnav] ${caller}: position ${position} belongs to a ${position.space.width}x${position.space.height} grid, container is ${space.width}x${space.height}`,
    );
  }
  return position.y * space.width + position.x;
}
