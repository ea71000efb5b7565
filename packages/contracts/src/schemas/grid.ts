import { z } from "zod";

/** Coordinates are stored as 16-bit values. */
export const MAX_GRID_DIMENSION = 0xffff;

const DimensionSchema = z
  .number()
  .int({ error: "Grid dimensions must be integers" })
  .min(1, { error: "Grid dimensions must be at least 1" })
  .max(MAX_GRID_DIMENSION, {
    error: `Grid dimensions must not exceed ${MAX_GRID_DIMENSION}`,
  });

export const GridConfigSchema = z.object({
  width: DimensionSchema,
  height: DimensionSchema,
  diagonals: z.boolean().default(false),
});

export type GridConfigInput = z.input<typeof GridConfigSchema>;
export type GridConfig = z.output<typeof GridConfigSchema>;

export const CoordinateSchema = z
  .number()
  .int({ error: "Coordinates must be integers" })
  .min(0, { error: "Coordinates must be non-negative" });

export const PointSchema = z.object({
  x: CoordinateSchema,
  y: CoordinateSchema,
});
