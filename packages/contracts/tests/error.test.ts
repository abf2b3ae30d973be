import { describe, expect, it } from "vitest";
import { GridError } from "../src";

describe("GridError", () => {
  it("describes out of bounds indices", () => {
    const error = GridError.indexOutOfBounds(5, 0, 3, 3);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("GridError");
    expect(error.code).toBe("INDEX_OUT_OF_BOUNDS");
    expect(error.message).toBe("Index (5, 0) is out of bounds for a 3x3 grid");
    expect(error.details).toEqual({ row: 5, column: 0, rows: 3, columns: 3 });
  });

  it("describes out of bounds ranges", () => {
    const error = GridError.rangeOutOfBounds(0, 0, 4, 2, 3, 3);
    expect(error.code).toBe("INDEX_OUT_OF_BOUNDS");
    expect(error.message).toBe(
      "Range [0, 4) x [0, 2) is out of bounds for a 3x3 grid",
    );
  });

  it("describes dimension mismatches", () => {
    const error = GridError.dimensionMismatch(
      { rows: 2, columns: 2 },
      { rows: 1, columns: 3 },
    );
    expect(error.message).toBe("Expected a 2x2 grid, got 1x3");
    expect(error.details).toEqual({
      expected: { rows: 2, columns: 2 },
      actual: { rows: 1, columns: 3 },
    });
  });

  it("describes negative dimensions", () => {
    const error = GridError.negativeDimension(-1, 4);
    expect(error.code).toBe("NEGATIVE_DIMENSION");
    expect(error.message).toBe("A grid cannot have dimensions -1x4");
  });

  it("describes exceeded capacity", () => {
    const error = GridError.capacityExceeded(4, 5, 16);
    expect(error.code).toBe("CAPACITY_EXCEEDED");
    expect(error.message).toBe("A 4x5 grid exceeds the limit of 16 cells");
    expect(error.details).toEqual({ rows: 4, columns: 5, limit: 16 });
  });

  it("recognises its own instances", () => {
    expect(GridError.isGridError(GridError.divisionByZero())).toBe(true);
    expect(GridError.isGridError(new Error("Division by zero"))).toBe(false);
    expect(GridError.isGridError("DIVISION_BY_ZERO")).toBe(false);
  });

  it("serializes to JSON", () => {
    expect(GridError.divisionByZero({ row: 1, column: 2 }).toJSON()).toEqual({
      name: "GridError",
      code: "DIVISION_BY_ZERO",
      message: "Division by zero",
      details: { row: 1, column: 2 },
    });
  });

  it("omits missing details from JSON", () => {
    expect(GridError.divisionByZero().toJSON()).toEqual({
      name: "GridError",
      code: "DIVISION_BY_ZERO",
      message: "Division by zero",
    });
  });
});
