import { formatIndex, gridIndex } from "./grid";

/**
 * Error codes for grid operations.
 * Every failure is a caller error raised synchronously at the offending call.
 */
export type GridErrorCode =
  | "INDEX_OUT_OF_BOUNDS"
  | "DIMENSION_MISMATCH"
  | "NEGATIVE_DIMENSION"
  | "CAPACITY_EXCEEDED"
  | "DIVISION_BY_ZERO"
  | "INVALID_OPTIONS";

/**
 * Unified error type for all grid operations.
 *
 * @example
 * ```typescript
 * try {
 *   grid.get(5, 0);
 * } catch (e) {
 *   if (GridError.isGridError(e) && e.code === "INDEX_OUT_OF_BOUNDS") {
 *     console.log(e.details); // { row: 5, column: 0, rows: 3, columns: 3 }
 *   }
 * }
 * ```
 */
export class GridError extends Error {
  override readonly name = "GridError";

  constructor(
    public readonly code: GridErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GridError);
    }
  }

  static indexOutOfBounds(
    row: number,
    column: number,
    rows: number,
    columns: number,
  ): GridError {
    return new GridError(
      "INDEX_OUT_OF_BOUNDS",
      `Index ${formatIndex(gridIndex(row, column))} is out of bounds for a ${rows}x${columns} grid`,
      { row, column, rows, columns },
    );
  }

  /**
   * Range `[r1, r2) x [c1, c2)` that is inverted or leaves the grid.
   */
  static rangeOutOfBounds(
    r1: number,
    c1: number,
    r2: number,
    c2: number,
    rows: number,
    columns: number,
  ): GridError {
    return new GridError(
      "INDEX_OUT_OF_BOUNDS",
      `Range [${r1}, ${r2}) x [${c1}, ${c2}) is out of bounds for a ${rows}x${columns} grid`,
      { r1, c1, r2, c2, rows, columns },
    );
  }

  static dimensionMismatch(
    expected: { rows: number; columns: number },
    actual: { rows: number; columns: number },
  ): GridError {
    return new GridError(
      "DIMENSION_MISMATCH",
      `Expected a ${expected.rows}x${expected.columns} grid, got ${actual.rows}x${actual.columns}`,
      { expected, actual },
    );
  }

  static negativeDimension(rows: number, columns: number): GridError {
    return new GridError(
      "NEGATIVE_DIMENSION",
      `A grid cannot have dimensions ${rows}x${columns}`,
      { rows, columns },
    );
  }

  /**
   * Dimensions whose cell count passes what the storage can address exactly.
   */
  static capacityExceeded(
    rows: number,
    columns: number,
    limit: number,
  ): GridError {
    return new GridError(
      "CAPACITY_EXCEEDED",
      `A ${rows}x${columns} grid exceeds the limit of ${limit} cells`,
      { rows, columns, limit },
    );
  }

  static divisionByZero(details?: Record<string, unknown>): GridError {
    return new GridError("DIVISION_BY_ZERO", "Division by zero", details);
  }

  static invalidOptions(
    message: string,
    details?: Record<string, unknown>,
  ): GridError {
    return new GridError("INVALID_OPTIONS", message, details);
  }

  static isGridError(error: unknown): error is GridError {
    return error instanceof GridError;
  }

  /**
   * Convert to a plain object for serialization.
   */
  toJSON(): {
    name: string;
    code: GridErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}
