/**
 * Sparse grid with independently mutable bounds.
 *
 * Only cells that were written take memory. Absent cells read as the default
 * value, and the declared bounds can grow, shrink or be trimmed to the
 * present entries without copying the grid.
 */

import {
  type GridDimensions,
  GridError,
  type TrimPolicy,
} from "@gridwork/contracts";
import { isEqualValue } from "../core/grid/equality";
import { Grid } from "../core/grid/grid";
import type { GridEntry, ReadonlyGrid } from "../core/grid/types";
import { SparseStorage } from "../core/storage/sparse-storage";

export class SparseGrid<T> extends Grid<T> {
  private readonly sparse: SparseStorage<T>;

  constructor(
    storage: SparseStorage<T>,
    readonly trimPolicy: TrimPolicy = "anchored",
  ) {
    super(storage);
    this.sparse = storage;
  }

  /** Number of present entries */
  get entryCount(): number {
    return this.sparse.entryCount;
  }

  /**
   * Present cells, row-major
   */
  presentEntries(): GridEntry<T>[] {
    return this.sparse
      .presentEntries()
      .sort(([r1, c1], [r2, c2]) => r1 - r2 || c1 - c2)
      .map(([row, column, value]) => ({ row, column, value }));
  }

  // ===========================================================================
  // ENTRY REMOVAL
  // ===========================================================================

  /**
   * Delete the entry at a cell. Unlike writing the default value, this leaves
   * the cell absent.
   * @returns Whether an entry existed
   */
  remove(row: number, column: number): boolean {
    this.checkIndex(row, column);
    return this.sparse.remove(row, column);
  }

  /**
   * Remove every entry, bounds unchanged
   */
  clear(): void {
    this.sparse.clear();
  }

  /**
   * Remove entries that hold the default value. Bounds are unchanged.
   * @returns Number of entries removed
   */
  clean(): number {
    const defaultValue = this.sparse.defaultValue;
    return this.sparse.removeWhere((value) => isEqualValue(value, defaultValue));
  }

  // ===========================================================================
  // BOUNDS
  // ===========================================================================

  /**
   * Change the declared bounds in place.
   *
   * Entries keep their `(row, column)`. When either dimension shrinks,
   * entries outside the new bounds are dropped.
   *
   * @returns Number of entries dropped
   */
  setSize(rows: number, columns: number): number {
    return this.sparse.reshape(rows, columns);
  }

  /**
   * Shrink the bounds to the rectangle of present entries. Never drops an
   * entry; an empty grid trims to 0x0.
   *
   * - `anchored` keeps the origin: bounds become `(maxRow + 1, maxColumn + 1)`
   * - `tight` also drops leading empty rows and columns, moving every entry
   *   up and left by the same offset
   */
  trim(policy: TrimPolicy = this.trimPolicy): GridDimensions {
    const bounds = this.sparse.occupiedBounds();

    if (bounds === undefined) {
      this.sparse.reshape(0, 0);
    } else if (policy === "tight") {
      this.sparse.reshape(
        bounds.maxRow - bounds.minRow + 1,
        bounds.maxColumn - bounds.minColumn + 1,
        bounds.minRow,
        bounds.minColumn,
      );
    } else {
      this.sparse.reshape(bounds.maxRow + 1, bounds.maxColumn + 1);
    }

    return { rows: this.sparse.rows, columns: this.sparse.columns };
  }

  /**
   * `clean()` then `trim(policy)`
   * @returns Number of entries removed by the clean
   */
  cleanAndTrim(policy: TrimPolicy = this.trimPolicy): number {
    const removed = this.clean();
    this.trim(policy);
    return removed;
  }

  // ===========================================================================
  // DERIVED GRIDS
  // ===========================================================================

  override subGrid(r1: number, c1: number, r2: number, c2: number): SparseGrid<T> {
    return this.wrap(
      this.regionStorage(r1, c1, r2, c2, (rows, columns) =>
        this.sparse.allocate(rows, columns),
      ),
    );
  }

  override resize(rows: number, columns: number): SparseGrid<T> {
    return this.wrap(
      this.resizedStorage(rows, columns, (r, c) => this.sparse.allocate(r, c)),
    );
  }

  override transpose(): SparseGrid<T> {
    return this.wrap(
      this.transposedStorage((rows, columns) =>
        this.sparse.allocate(rows, columns),
      ),
    );
  }

  override copy(): SparseGrid<T> {
    return this.wrap(
      this.copiedStorage((rows, columns) => this.sparse.allocate(rows, columns)),
    );
  }

  override map<U>(f: (value: T) => U): SparseGrid<U> {
    return this.wrap(
      this.mappedStorage(f, (rows, columns, defaultValue) =>
        this.sparse.allocateFor(rows, columns, defaultValue),
      ),
    );
  }

  override merge<U, V>(
    other: ReadonlyGrid<U>,
    f: (a: T, b: U) => V,
  ): SparseGrid<V> {
    return this.wrap(
      this.mergedStorage(other, f, (rows, columns, defaultValue) =>
        this.sparse.allocateFor(rows, columns, defaultValue),
      ),
    );
  }

  private wrap<U>(storage: SparseStorage<U>): SparseGrid<U> {
    return new SparseGrid(storage, this.trimPolicy);
  }
}

// =============================================================================
// FACTORIES
// =============================================================================

export function createSparseGrid<T>(
  rows: number,
  columns: number,
  defaultValue: T,
  trimPolicy: TrimPolicy = "anchored",
): SparseGrid<T> {
  return new SparseGrid(new SparseStorage(rows, columns, defaultValue), trimPolicy);
}

/**
 * Build a sparse grid from nested rows. `undefined` slots stay absent; the
 * first row fixes the column count.
 */
export function sparseGridOf<T>(
  values: readonly (readonly (T | undefined)[])[],
  defaultValue: T,
  trimPolicy: TrimPolicy = "anchored",
): SparseGrid<T> {
  const rows = values.length;
  const columns = values[0]?.length ?? 0;
  const storage = new SparseStorage<T>(rows, columns, defaultValue);

  values.forEach((row, r) => {
    if (row.length !== columns) {
      throw GridError.dimensionMismatch(
        { rows, columns },
        { rows, columns: row.length },
      );
    }
    row.forEach((value, c) => {
      if (value !== undefined) storage.write(r, c, value);
    });
  });

  return new SparseGrid(storage, trimPolicy);
}

/**
 * Sparse copy of any grid. Only cells the source reports present are copied.
 */
export function sparseCopyOf<T>(
  grid: ReadonlyGrid<T>,
  trimPolicy: TrimPolicy = "anchored",
): SparseGrid<T> {
  const storage = new SparseStorage(grid.rows, grid.columns, grid.defaultValue);
  for (const { row, column, value } of grid.entries()) {
    if (grid.has(row, column)) storage.write(row, column, value);
  }
  return new SparseGrid(storage, trimPolicy);
}
