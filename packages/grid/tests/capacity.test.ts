/**
 * Cell count limits
 */

import { MAX_GRID_CELLS, MAX_SPARSE_CELLS } from "@gridwork/contracts";
import { describe, expect, it } from "vitest";
import {
  createAtomicGrid,
  createDenseGrid,
  createSparseGrid,
  denseCopyOf,
  IntGrid,
  SparseGrid,
  tryCreateGrid,
} from "../src";
import { catchGridError, codeOf } from "./helpers";

describe("Sparse grid capacity", () => {
  it("keeps neighbouring cells apart at large bounds", () => {
    const n = 2 ** 26;
    const grid = createSparseGrid(n, n, ".");
    grid.set(n - 1, 0, "a");
    grid.set(n - 1, 1, "b");

    expect(grid.entryCount).toBe(2);
    expect(grid.get(n - 1, 0)).toBe("a");
    expect(grid.get(n - 1, 1)).toBe("b");
  });

  it("rejects bounds whose flat keys would lose precision", () => {
    const error = catchGridError(() => createSparseGrid(2 ** 30, 2 ** 30, "."));
    expect(error.code).toBe("CAPACITY_EXCEEDED");
    expect(error.details).toEqual({
      rows: 2 ** 30,
      columns: 2 ** 30,
      limit: MAX_SPARSE_CELLS,
    });
  });

  it("rejects an oversized setSize before changing anything", () => {
    const grid = createSparseGrid(2, 2, 0);
    grid.set(1, 1, 5);

    expect(codeOf(() => grid.setSize(2 ** 30, 2 ** 30))).toBe(
      "CAPACITY_EXCEEDED",
    );
    expect(grid.dimensions()).toEqual({ rows: 2, columns: 2 });
    expect(grid.get(1, 1)).toBe(5);
  });

  it("resizes past the dense limit but not past the key limit", () => {
    const grid = createSparseGrid(2, 2, 0);
    grid.set(1, 1, 5);

    const large = grid.resize(2 ** 20, 2 ** 20);
    expect(large).toBeInstanceOf(SparseGrid);
    expect(large.dimensions()).toEqual({ rows: 2 ** 20, columns: 2 ** 20 });
    expect(large.get(1, 1)).toBe(5);

    expect(codeOf(() => grid.resize(2 ** 27, 2 ** 27))).toBe(
      "CAPACITY_EXCEEDED",
    );
  });
});

describe("Allocated grid capacity", () => {
  it("reports oversized dense grids as a GridError", () => {
    const error = catchGridError(() => createDenseGrid(1e10, 1e10, 0));
    expect(error.code).toBe("CAPACITY_EXCEEDED");
    expect(error.details).toEqual({
      rows: 1e10,
      columns: 1e10,
      limit: MAX_GRID_CELLS,
    });
  });

  it("applies the limit to every allocating strategy", () => {
    expect(codeOf(() => createDenseGrid(2, 2, 0).resize(2 ** 16, 2 ** 16))).toBe(
      "CAPACITY_EXCEEDED",
    );
    expect(codeOf(() => createAtomicGrid(2 ** 16, 2 ** 16, 0))).toBe(
      "CAPACITY_EXCEEDED",
    );
    expect(codeOf(() => IntGrid.create(2 ** 16, 2 ** 16))).toBe(
      "CAPACITY_EXCEEDED",
    );
  });

  it("refuses a dense copy of a large sparse grid", () => {
    const sparse = createSparseGrid(2 ** 20, 2 ** 20, 0);
    expect(codeOf(() => denseCopyOf(sparse))).toBe("CAPACITY_EXCEEDED");
  });

  it("still reports negative dimensions first", () => {
    expect(codeOf(() => createSparseGrid(-1, 2 ** 60, 0))).toBe(
      "NEGATIVE_DIMENSION",
    );
  });
});

describe("Options capacity", () => {
  it("allows large sparse grids through the options", () => {
    const result = tryCreateGrid(
      { rows: 2 ** 20, columns: 2 ** 20, strategy: "sparse" },
      0,
    );
    expect(result.isOk()).toBe(true);
    expect(result.value.rows).toBe(2 ** 20);
  });

  it("keeps the allocation limit for dense options", () => {
    const result = tryCreateGrid({ rows: 2 ** 20, columns: 2 ** 20 }, 0);
    expect(result.error.code).toBe("INVALID_OPTIONS");
  });
});
