/**
 * Coordinates module - bounded positions and unit directions.
 */

export {
  Direction,
  DIRECTION_COUNT,
  DIRECTIONS_4,
  DIRECTIONS_8,
  directionArrow,
  directionDelta,
  directionFromDelta,
  directionName,
  directionsFor,
  inverseDirection,
  isDiagonal,
  isDirection,
  isHorizontal,
  isVertical,
  rotateBy,
  rotateCcw,
  rotateCw,
  rotateDirection,
  type DirectionName,
} from "./direction";
export { GridSpace, Position } from "./position";
