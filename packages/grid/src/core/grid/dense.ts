/**
 * Dense grid factories.
 */

import { GridError } from "@gridwork/contracts";
import { DenseStorage } from "../storage/dense-storage";
import { assertDimensions } from "./bounds";
import { Grid } from "./grid";
import type { ReadonlyGrid } from "./types";

export function createDenseGrid<T>(
  rows: number,
  columns: number,
  fill: T,
): Grid<T> {
  assertDimensions(rows, columns);
  return new Grid(new DenseStorage(rows, columns, fill));
}

/**
 * Build a dense grid from nested rows. The first row fixes the column count.
 *
 * @param fill - Default value of the grid; the first cell when omitted
 */
export function denseGridOf<T>(
  values: readonly (readonly T[])[],
  fill?: T,
): Grid<T> {
  const rows = values.length;
  const columns = values[0]?.length ?? 0;

  for (const row of values) {
    if (row.length !== columns) {
      throw GridError.dimensionMismatch(
        { rows, columns },
        { rows, columns: row.length },
      );
    }
  }

  const first = values[0]?.[0];
  const defaultValue = fill !== undefined ? fill : first;
  if (defaultValue === undefined) {
    throw GridError.invalidOptions(
      "An empty grid needs an explicit default value",
    );
  }

  const storage = new DenseStorage<T>(rows, columns, defaultValue);
  values.forEach((row, r) => {
    row.forEach((value, c) => storage.write(r, c, value));
  });
  return new Grid(storage);
}

/**
 * Dense copy of any grid, absent cells materialized as the default
 */
export function denseCopyOf<T>(grid: ReadonlyGrid<T>): Grid<T> {
  const storage = new DenseStorage(grid.rows, grid.columns, grid.defaultValue);
  for (const { row, column, value } of grid.entries()) {
    storage.write(row, column, value);
  }
  return new Grid(storage);
}
