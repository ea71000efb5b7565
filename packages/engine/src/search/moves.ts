/**
 * Stock move functions.
 */

import type { PositionSet } from "../core/storage";
import type { MoveCostFn, MoveFn } from "./types";

/**
 * `position + direction`: every in-grid move is allowed.
 */
export const unitMove: MoveFn = (position, direction) =>
  position.add(direction);

/**
 * In-grid moves that do not land on a wall.
 */
export function blockedBy(walls: PositionSet): MoveFn {
  return (position, direction) => {
    const next = position.add(direction);
    if (next === undefined || walls.has(next)) return undefined;
    return next;
  };
}

/**
 * Every allowed move costs 1.
 */
export function withUnitCost(move: MoveFn): MoveCostFn {
  return (position, direction) => {
    const next = move(position, direction);
    return next === undefined ? undefined : [next, 1];
  };
}
