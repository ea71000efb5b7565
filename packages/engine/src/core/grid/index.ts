/**
 * Grid module - dense and bit-packed position-indexed containers.
 */

export { BitsetMap } from "./bitset-map";
export { DenseMap } from "./dense-map";
