/**
 * Unit movement vectors between adjacent grid cells.
 *
 * Directions are numbered clockwise starting at north, with y growing
 * downwards (row 0 is the top of the grid).
 */

import { Err, GridError, Ok, type Result } from "@gridnav/contracts";

export const Direction = {
  N: 0,
  NE: 1,
  E: 2,
  SE: 3,
  S: 4,
  SW: 5,
  W: 6,
  NW: 7,
} as const;

export type Direction = (typeof Direction)[keyof typeof Direction];

export const DIRECTION_COUNT = 8;

/**
 * (dx, dy) for each direction, indexed by the direction value.
 */
const DELTAS: ReadonlyArray<readonly [number, number]> = [
  [0, -1], // N
  [1, -1], // NE
  [1, 0], // E
  [1, 1], // SE
  [0, 1], // S
  [-1, 1], // SW
  [-1, 0], // W
  [-1, -1], // NW
];

const ALL: readonly Direction[] = [
  Direction.N,
  Direction.NE,
  Direction.E,
  Direction.SE,
  Direction.S,
  Direction.SW,
  Direction.W,
  Direction.NW,
];

/** All 8 directions in clockwise order. */
export const DIRECTIONS_8: readonly Direction[] = ALL;

/** The 4 cardinal directions in clockwise order. */
export const DIRECTIONS_4: readonly Direction[] = [
  Direction.N,
  Direction.E,
  Direction.S,
  Direction.W,
];

const NAMES = ["N", "NE", "E", "SE", "S", "SW", "W", "NW"] as const;

export type DirectionName = (typeof NAMES)[number];

const ARROWS = [
  "↑",
  "↗",
  "→",
  "↘",
  "↓",
  "↙",
  "←",
  "↖",
] as const;

// (dy + 1) * 3 + (dx + 1) -> direction; the centre slot is never read.
const FROM_DELTA: ReadonlyArray<Direction | undefined> = [
  Direction.NW,
  Direction.N,
  Direction.NE,
  Direction.W,
  undefined,
  Direction.E,
  Direction.SW,
  Direction.S,
  Direction.SE,
];

/**
 * Directions to consider for a grid, with or without diagonals.
 */
export function directionsFor(diagonals: boolean): readonly Direction[] {
  return diagonals ? DIRECTIONS_8 : DIRECTIONS_4;
}

export function isDirection(value: number): value is Direction {
  return Number.isInteger(value) && value >= 0 && value < DIRECTION_COUNT;
}

function at(index: number): Direction {
  const direction = ALL[((index % DIRECTION_COUNT) + DIRECTION_COUNT) % DIRECTION_COUNT];
  if (direction === undefined) {
    throw new Error(`Direction index ${index} is outside the direction table`);
  }
  return direction;
}

/**
 * The (dx, dy) unit delta of a direction.
 */
export function directionDelta(direction: Direction): readonly [number, number] {
  const delta = DELTAS[direction];
  if (delta === undefined) {
    throw new Error(`Unknown direction value: ${direction}`);
  }
  return delta;
}

/**
 * Build a direction from a unit delta.
 * Fails with INVALID_DIRECTION for (0, 0) or any component outside [-1, 1].
 */
export function directionFromDelta(
  dx: number,
  dy: number,
): Result<Direction, GridError> {
  if (!Number.isInteger(dx) || !Number.isInteger(dy)) {
    return Err(GridError.invalidDirection(dx, dy));
  }
  if (dx < -1 || dx > 1 || dy < -1 || dy > 1) {
    return Err(GridError.invalidDirection(dx, dy));
  }
  const direction = FROM_DELTA[(dy + 1) * 3 + dx + 1];
  if (direction === undefined) {
    return Err(GridError.invalidDirection(dx, dy));
  }
  return Ok(direction);
}

/**
 * The opposite direction (180° rotation): N <-> S, NE <-> SW, ...
 */
export function inverseDirection(direction: Direction): Direction {
  return at(direction + 4);
}

/**
 * Rotate clockwise by `steps` eighths of a turn (negative goes counter-clockwise).
 */
export function rotateDirection(direction: Direction, steps: number): Direction {
  return at(direction + steps);
}

/**
 * Rotate a direction by the angle another direction makes with north.
 */
export function rotateBy(direction: Direction, by: Direction): Direction {
  return at(direction + by);
}

export function rotateCw(direction: Direction): Direction {
  return at(direction + 1);
}

export function rotateCcw(direction: Direction): Direction {
  return at(direction - 1);
}

export function isDiagonal(direction: Direction): boolean {
  return direction % 2 === 1;
}

export function isVertical(direction: Direction): boolean {
  return direction === Direction.N || direction === Direction.S;
}

export function isHorizontal(direction: Direction): boolean {
  return direction === Direction.E || direction === Direction.W;
}

export function directionName(direction: Direction): DirectionName {
  return NAMES[direction];
}

export function directionArrow(direction: Direction): string {
  return ARROWS[direction];
}
