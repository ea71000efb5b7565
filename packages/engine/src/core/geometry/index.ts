export type { Dimensions, Point } from "./types";
