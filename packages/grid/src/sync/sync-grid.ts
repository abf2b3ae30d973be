/**
 * Thread-safe grids: dense storage with every call inside a `Mutex`.
 *
 * @remarks
 * One call is atomic with respect to other calls on the same grid; a
 * sequence of calls is not. Iterators are snapshots taken under the lock.
 * `merge` and `equals` between two synchronized grids take both locks,
 * this grid's first.
 */

import { assertDimensions } from "../core/grid/bounds";
import { Grid } from "../core/grid/grid";
import type { ReadonlyGrid } from "../core/grid/types";
import { DenseStorage } from "../core/storage/dense-storage";
import { Mutex } from "./mutex";

export function createSyncGrid<T>(
  rows: number,
  columns: number,
  fill: T,
  mutex: Mutex = new Mutex(),
): Grid<T> {
  assertDimensions(rows, columns);
  return new Grid(new DenseStorage(rows, columns, fill), mutex);
}

export function synchronizedCopyOf<T>(
  grid: ReadonlyGrid<T>,
  mutex: Mutex = new Mutex(),
): Grid<T> {
  const storage = new DenseStorage(grid.rows, grid.columns, grid.defaultValue);
  for (const { row, column, value } of grid.entries()) {
    storage.write(row, column, value);
  }
  return new Grid(storage, mutex);
}
