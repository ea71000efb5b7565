/**
 * Bounded 2D coordinates.
 *
 * A `GridSpace` is the immutable configuration (width, height, whether
 * diagonal moves exist). A `Position` can only be obtained through a
 * space, so every live Position is inside its grid.
 */

import {
  Err,
  GridConfigSchema,
  GridError,
  Ok,
  PointSchema,
  type Result,
} from "@gridnav/contracts";
import type { Dimensions, Point } from "../geometry";
import {
  Direction,
  directionDelta,
  directionName,
  directionsFor,
} from "./direction";

export class GridSpace implements Dimensions {
  readonly width: number;
  readonly height: number;
  /** Number of positions: width * height. */
  readonly size: number;
  readonly diagonals: boolean;

  private constructor(width: number, height: number, diagonals: boolean) {
    this.width = width;
    this.height = height;
    this.size = width * height;
    this.diagonals = diagonals;
  }

  /**
   * Validate a configuration and build a space from it.
   */
  static create(input: unknown): Result<GridSpace, GridError> {
    const parsed = GridConfigSchema.safeParse(input);
    if (!parsed.success) {
      return Err(
        GridError.configInvalid("Invalid grid configuration", {
          issues: parsed.error.issues.map((issue) => ({
            path: issue.path.map(String).join("."),
            message: issue.message,
          })),
        }),
      );
    }
    const { width, height, diagonals } = parsed.data;
    return Ok(new GridSpace(width, height, diagonals));
  }

  /**
   * Build a space from known-good literal dimensions; throws the
   * CONFIG_INVALID GridError otherwise.
   */
  static of(width: number, height: number, diagonals = false): GridSpace {
    return GridSpace.create({ width, height, diagonals }).getOrThrow();
  }

  /**
   * Same dimensions with a different direction set.
   */
  withDiagonals(diagonals: boolean): GridSpace {
    return new GridSpace(this.width, this.height, diagonals);
  }

  contains(x: number, y: number): boolean {
    return (
      Number.isInteger(x) &&
      Number.isInteger(y) &&
      x >= 0 &&
      x < this.width &&
      y >= 0 &&
      y < this.height
    );
  }

  /**
   * Same width and height. The direction set does not take part:
   * positions are interchangeable between such spaces.
   */
  sameShape(other: Dimensions): boolean {
    return this.width === other.width && this.height === other.height;
  }

  position(x: number, y: number): Result<Position, GridError> {
    return Position.create(this, x, y);
  }

  positionAt(index: number): Result<Position, GridError> {
    return Position.fromIndex(this, index);
  }

  /**
   * For literal coordinates known to be valid; throws OUT_OF_BOUNDS otherwise.
   */
  positionOrThrow(x: number, y: number): Position {
    return Position.create(this, x, y).getOrThrow();
  }

  /**
   * Parse an untrusted `{ x, y }` object into a position of this space.
   *
   * Malformed input (missing, negative or fractional coordinates) fails
   * with OUT_OF_BOUNDS and the zod issue messages in `details.issues`;
   * well-formed coordinates outside the grid fail like `position`.
   */
  parsePoint(input: unknown): Result<Position, GridError> {
    const parsed = PointSchema.safeParse(input);
    if (!parsed.success) {
      return Err(
        GridError.malformedPoint(
          parsed.error.issues.map((issue) => issue.message),
        ),
      );
    }
    return this.position(parsed.data.x, parsed.data.y);
  }

  /**
   * Every position in row-major order. Each call starts over.
   */
  *positions(): Generator<Position> {
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        yield this.positionOrThrow(x, y);
      }
    }
  }

  /**
   * Every position in column-major order: top to bottom, then left to right.
   */
  *positionsVertical(): Generator<Position> {
    for (let x = 0; x < this.width; x++) {
      for (let y = 0; y < this.height; y++) {
        yield this.positionOrThrow(x, y);
      }
    }
  }

  /**
   * Positions of the rectangle spanned by two corners, row-major.
   * The corners may be given in any order.
   */
  *positionsIn(a: Position, b: Position): Generator<Position> {
    const [xmin, xmax] = a.x <= b.x ? [a.x, b.x] : [b.x, a.x];
    const [ymin, ymax] = a.y <= b.y ? [a.y, b.y] : [b.y, a.y];
    for (let y = ymin; y <= ymax; y++) {
      for (let x = xmin; x <= xmax; x++) {
        yield this.positionOrThrow(x, y);
      }
    }
  }

  /**
   * Positions of column `x`, top to bottom; nothing when `x` is outside.
   */
  *positionsInColumn(x: number): Generator<Position> {
    if (!this.contains(x, 0)) return;
    for (let y = 0; y < this.height; y++) {
      yield this.positionOrThrow(x, y);
    }
  }

  /**
   * Positions of row `y`, left to right; nothing when `y` is outside.
   */
  *positionsInRow(y: number): Generator<Position> {
    if (!this.contains(0, y)) return;
    for (let x = 0; x < this.width; x++) {
      yield this.positionOrThrow(x, y);
    }
  }

  directions(): readonly Direction[] {
    return directionsFor(this.diagonals);
  }

  get first(): Position {
    return this.positionOrThrow(0, 0);
  }

  get last(): Position {
    return this.positionOrThrow(this.width - 1, this.height - 1);
  }

  /** The (approximate) center: (floor(width / 2), floor(height / 2)). */
  get center(): Position {
    return this.positionOrThrow(
      Math.floor(this.width / 2),
      Math.floor(this.height / 2),
    );
  }

  get topLeft(): Position {
    return this.first;
  }

  get topRight(): Position {
    return this.positionOrThrow(this.width - 1, 0);
  }

  get bottomLeft(): Position {
    return this.positionOrThrow(0, this.height - 1);
  }

  get bottomRight(): Position {
    return this.last;
  }

  getDimensions(): Dimensions {
    return { width: this.width, height: this.height };
  }

  toString(): string {
    return `${this.width}x${this.height}${this.diagonals ? " (8-way)" : " (4-way)"}`;
  }
}

/**
 * Immutable grid coordinate.
 *
 * Linear index is `y * width + x`, a bijection over `[0, width * height)`.
 * Positions are ordered row-major, which is also index order.
 */
export class Position implements Point {
  readonly space: GridSpace;
  readonly x: number;
  readonly y: number;

  private constructor(space: GridSpace, x: number, y: number) {
    this.space = space;
    this.x = x;
    this.y = y;
  }

  static create(
    space: GridSpace,
    x: number,
    y: number,
  ): Result<Position, GridError> {
    if (!space.contains(x, y)) {
      return Err(GridError.outOfBounds(x, y, space));
    }
    return Ok(new Position(space, x, y));
  }

  static fromIndex(space: GridSpace, index: number): Result<Position, GridError> {
    if (!Number.isInteger(index) || index < 0 || index >= space.size) {
      return Err(GridError.indexOutOfBounds(index, space.size));
    }
    return Ok(new Position(space, index % space.width, Math.floor(index / space.width)));
  }

  static manhattan(a: Position, b: Position): number {
    return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
  }

  static chebyshev(a: Position, b: Position): number {
    return Math.max(Math.abs(a.x - b.x), Math.abs(a.y - b.y));
  }

  /**
   * Top-left and bottom-right corners of the smallest rectangle holding
   * every given position. Fails with EMPTY when there are none.
   */
  static tlbrOf(
    positions: Iterable<Position>,
  ): Result<[Position, Position], GridError> {
    let first: Position | undefined;
    let xmin = 0;
    let ymin = 0;
    let xmax = 0;
    let ymax = 0;
    for (const position of positions) {
      if (first === undefined) {
        first = position;
        xmin = xmax = position.x;
        ymin = ymax = position.y;
        continue;
      }
      xmin = Math.min(xmin, position.x);
      ymin = Math.min(ymin, position.y);
      xmax = Math.max(xmax, position.x);
      ymax = Math.max(ymax, position.y);
    }
    if (first === undefined) {
      return Err(GridError.empty("No positions to bound"));
    }
    return Ok([
      new Position(first.space, xmin, ymin),
      new Position(first.space, xmax, ymax),
    ]);
  }

  get index(): number {
    return this.y * this.space.width + this.x;
  }

  tuple(): [number, number] {
    return [this.x, this.y];
  }

  equals(other: Position): boolean {
    return (
      this.x === other.x &&
      this.y === other.y &&
      this.space.sameShape(other.space)
    );
  }

  /**
   * Row-major ordering: negative when `this` comes first.
   */
  compare(other: Position): number {
    return this.index - other.index;
  }

  /**
   * Inside the rectangle spanned by `a` and `b`, edges included.
   * The corners may be given in any order.
   */
  inside(a: Position, b: Position): boolean {
    return (
      this.x >= Math.min(a.x, b.x) &&
      this.x <= Math.max(a.x, b.x) &&
      this.y >= Math.min(a.y, b.y) &&
      this.y <= Math.max(a.y, b.y)
    );
  }

  isCorner(): boolean {
    const { width, height } = this.space;
    return (
      (this.x === 0 || this.x === width - 1) &&
      (this.y === 0 || this.y === height - 1)
    );
  }

  isSide(): boolean {
    const { width, height } = this.space;
    return (
      this.x === 0 ||
      this.x === width - 1 ||
      this.y === 0 ||
      this.y === height - 1
    );
  }

  isCenter(): boolean {
    return (
      this.x === Math.floor(this.space.width / 2) &&
      this.y === Math.floor(this.space.height / 2)
    );
  }

  /**
   * `position + direction`, or undefined when the move would leave the grid.
   * Never wraps or clamps.
   */
  add(direction: Direction): Position | undefined {
    const [dx, dy] = directionDelta(direction);
    const x = this.x + dx;
    const y = this.y + dy;
    if (!this.space.contains(x, y)) return undefined;
    return new Position(this.space, x, y);
  }

  /**
   * Like `add`, reporting a blocked move as INVALID_MOVEMENT.
   */
  tryAdd(direction: Direction): Result<Position, GridError> {
    const next = this.add(direction);
    if (next === undefined) {
      return Err(
        GridError.invalidMovement(`Moving ${directionName(direction)} from ${this} leaves the grid`, {
          x: this.x,
          y: this.y,
          direction,
        }),
      );
    }
    return Ok(next);
  }

  /**
   * The next position in row-major order, or undefined after the last one.
   */
  next(): Position | undefined {
    return Position.fromIndex(this.space, this.index + 1).ok();
  }

  flipH(): Position {
    return new Position(this.space, this.space.width - 1 - this.x, this.y);
  }

  flipV(): Position {
    return new Position(this.space, this.x, this.space.height - 1 - this.y);
  }

  /**
   * Rotate 90° clockwise around the grid center; square grids only.
   */
  rotateCw(): Result<Position, GridError> {
    const size = this.space.width;
    if (size !== this.space.height) {
      return Err(GridError.notSquare(this.space));
    }
    return Ok(new Position(this.space, size - 1 - this.y, this.x));
  }

  /**
   * Rotate 90° counter-clockwise around the grid center; square grids only.
   */
  rotateCcw(): Result<Position, GridError> {
    const size = this.space.width;
    if (size !== this.space.height) {
      return Err(GridError.notSquare(this.space));
    }
    return Ok(new Position(this.space, this.y, size - 1 - this.x));
  }

  /**
   * The direction that best approaches `target`; undefined when equal.
   * Diagonals are used only when the space allows them.
   */
  directionTo(target: Position): Direction | undefined {
    const dx = Math.sign(target.x - this.x);
    const dy = Math.sign(target.y - this.y);
    if (this.space.diagonals) {
      if (dx === 0 && dy === 0) return undefined;
      if (dy < 0) return dx < 0 ? Direction.NW : dx > 0 ? Direction.NE : Direction.N;
      if (dy > 0) return dx < 0 ? Direction.SW : dx > 0 ? Direction.SE : Direction.S;
      return dx > 0 ? Direction.E : Direction.W;
    }
    if (dy < 0) return Direction.N;
    if (dx > 0) return Direction.E;
    if (dy > 0) return Direction.S;
    if (dx < 0) return Direction.W;
    return undefined;
  }

  toString(): string {
    return `(${this.x},${this.y})`;
  }
}
