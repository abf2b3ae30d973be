/**
 * Argument checks shared by every grid. Each throws a `GridError` and runs
 * before any cell is touched.
 */

import {
  type GridDimensions,
  GridError,
  MAX_GRID_CELLS,
  MAX_SPARSE_CELLS,
  StorageStrategy,
} from "@gridwork/contracts";

export function isValidDimension(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

/**
 * Largest cell count a storage strategy can address
 */
export function cellLimit(strategy: StorageStrategy): number {
  return strategy === StorageStrategy.SPARSE ? MAX_SPARSE_CELLS : MAX_GRID_CELLS;
}

/**
 * @param limit - Largest `rows * columns` the storage can hold
 */
export function assertDimensions(
  rows: number,
  columns: number,
  limit: number = MAX_GRID_CELLS,
): void {
  if (!isValidDimension(rows) || !isValidDimension(columns)) {
    throw GridError.negativeDimension(rows, columns);
  }
  if (rows * columns > limit) {
    throw GridError.capacityExceeded(rows, columns, limit);
  }
}

export function isInRange(
  row: number,
  column: number,
  rows: number,
  columns: number,
): boolean {
  return (
    Number.isInteger(row) &&
    Number.isInteger(column) &&
    row >= 0 &&
    row < rows &&
    column >= 0 &&
    column < columns
  );
}

export function assertIndex(
  row: number,
  column: number,
  rows: number,
  columns: number,
): void {
  if (!isInRange(row, column, rows, columns)) {
    throw GridError.indexOutOfBounds(row, column, rows, columns);
  }
}

export function assertRow(row: number, rows: number, columns: number): void {
  if (!Number.isInteger(row) || row < 0 || row >= rows) {
    throw GridError.indexOutOfBounds(row, 0, rows, columns);
  }
}

export function assertColumn(
  column: number,
  rows: number,
  columns: number,
): void {
  if (!Number.isInteger(column) || column < 0 || column >= columns) {
    throw GridError.indexOutOfBounds(0, column, rows, columns);
  }
}

/**
 * Half-open rectangle `[r1, r2) x [c1, c2)`; empty rectangles are allowed.
 */
export function assertRange(
  r1: number,
  c1: number,
  r2: number,
  c2: number,
  rows: number,
  columns: number,
): void {
  const valid =
    Number.isInteger(r1) &&
    Number.isInteger(c1) &&
    Number.isInteger(r2) &&
    Number.isInteger(c2) &&
    r1 >= 0 &&
    c1 >= 0 &&
    r1 <= r2 &&
    c1 <= c2 &&
    r2 <= rows &&
    c2 <= columns;

  if (!valid) {
    throw GridError.rangeOutOfBounds(r1, c1, r2, c2, rows, columns);
  }
}

export function assertSameDimensions(
  expected: GridDimensions,
  actual: GridDimensions,
): void {
  if (expected.rows !== actual.rows || expected.columns !== actual.columns) {
    throw GridError.dimensionMismatch(
      { rows: expected.rows, columns: expected.columns },
      { rows: actual.rows, columns: actual.columns },
    );
  }
}
