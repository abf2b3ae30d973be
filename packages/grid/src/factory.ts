/**
 * Options-driven grid construction.
 */

import {
  buildGridOptions,
  type GridError,
  type GridOptionsInput,
  type Result,
  type ValidatedGridOptions,
} from "@gridwork/contracts";
import { createAtomicGrid } from "./atomic/atomic-grid";
import { createDenseGrid } from "./core/grid/dense";
import type { Grid } from "./core/grid/grid";
import { createSparseGrid } from "./sparse/sparse-grid";
import { createSyncGrid } from "./sync/sync-grid";

function buildGrid<T>(options: ValidatedGridOptions, defaultValue: T): Grid<T> {
  const { rows, columns } = options;
  switch (options.strategy) {
    case "dense":
      return createDenseGrid(rows, columns, defaultValue);
    case "sparse":
      return createSparseGrid(rows, columns, defaultValue, options.trimPolicy);
    case "synchronized":
      return createSyncGrid(rows, columns, defaultValue);
    case "atomic":
      return createAtomicGrid(rows, columns, defaultValue);
  }
}

/**
 * Validate options and build the grid they describe.
 *
 * @example
 * ```typescript
 * const result = tryCreateGrid({ rows: 3, columns: 3, strategy: "sparse" }, 0);
 * if (result.isErr()) console.warn(result.error.message);
 * ```
 */
export function tryCreateGrid<T>(
  input: GridOptionsInput,
  defaultValue: T,
): Result<Grid<T>, GridError> {
  return buildGridOptions(input).map((options) =>
    buildGrid(options, defaultValue),
  );
}

/**
 * Same as {@link tryCreateGrid}, throwing the `GridError` on invalid options
 */
export function createGrid<T>(input: GridOptionsInput, defaultValue: T): Grid<T> {
  return tryCreateGrid(input, defaultValue).getOrThrow();
}
