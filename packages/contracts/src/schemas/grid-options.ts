import { z } from "zod";

/**
 * Largest cell count of a grid that allocates every cell (dense,
 * synchronized, atomic and typed storage).
 */
export const MAX_GRID_CELLS = 2 ** 30;

/**
 * Largest cell count of a sparse grid. Cells are keyed by the flat index
 * `row * columns + column`, which must stay an exact integer.
 */
export const MAX_SPARSE_CELLS = Number.MAX_SAFE_INTEGER;

export function maxCellsFor(strategy: GridStrategy): number {
  return strategy === "sparse" ? MAX_SPARSE_CELLS : MAX_GRID_CELLS;
}

const DimensionSchema = z
  .number()
  .int({ error: "Dimensions must be integers" })
  .min(0, { error: "Dimensions cannot be negative" });

export const GridStrategySchema = z.enum([
  "dense",
  "sparse",
  "synchronized",
  "atomic",
]);

export const TrimPolicySchema = z.enum(["anchored", "tight"]);

export const GridOptionsSchema = z
  .object({
    strategy: GridStrategySchema,
    rows: DimensionSchema,
    columns: DimensionSchema,
    trimPolicy: TrimPolicySchema,
  })
  .superRefine((data, ctx) => {
    const limit = maxCellsFor(data.strategy);
    if (data.rows * data.columns > limit) {
      ctx.addIssue({
        code: "custom",
        message: `A grid cannot hold more than ${limit} cells`,
        path: ["rows"],
      });
    }
  });

export type GridStrategy = z.infer<typeof GridStrategySchema>;
export type ValidatedGridOptions = z.infer<typeof GridOptionsSchema>;
