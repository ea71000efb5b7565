/**
 * Plain geometry shapes shared by the containers.
 */

/**
 * 2D point with integer coordinates
 */
export interface Point {
  readonly x: number;
  readonly y: number;
}

/**
 * Grid dimensions
 */
export interface Dimensions {
  readonly width: number;
  readonly height: number;
}
