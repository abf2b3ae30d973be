import { GridError } from "@gridwork/contracts";
import { describe, expect, it } from "vitest";
import { AtomicGrid, createGrid, SparseGrid, tryCreateGrid } from "../src";
import { catchGridError } from "./helpers";

describe("createGrid", () => {
  it("builds a dense grid by default", () => {
    const grid = createGrid({ rows: 2, columns: 3 }, 0);
    expect(grid.strategy).toBe("dense");
    expect(grid.synchronized).toBe(false);
    expect(grid.dimensions()).toEqual({ rows: 2, columns: 3 });
  });

  it("builds every strategy", () => {
    expect(createGrid({ rows: 1, columns: 1, strategy: "sparse" }, 0)).toBeInstanceOf(
      SparseGrid,
    );
    expect(createGrid({ rows: 1, columns: 1, strategy: "atomic" }, 0)).toBeInstanceOf(
      AtomicGrid,
    );
    expect(
      createGrid({ rows: 1, columns: 1, strategy: "synchronized" }, 0).synchronized,
    ).toBe(true);
  });

  it("passes the trim policy to sparse grids", () => {
    const grid = createGrid(
      { rows: 3, columns: 3, strategy: "sparse", trimPolicy: "tight" },
      0,
    );
    expect(grid).toBeInstanceOf(SparseGrid);
    if (grid instanceof SparseGrid) {
      expect(grid.trimPolicy).toBe("tight");
    }
  });

  it("throws the GridError of invalid options", () => {
    const error = catchGridError(() => createGrid({ rows: -1, columns: 2 }, 0));
    expect(error.code).toBe("NEGATIVE_DIMENSION");
    expect(error.details).toEqual({ rows: -1, columns: 2 });
  });
});

describe("tryCreateGrid", () => {
  it("returns the grid on success", () => {
    const result = tryCreateGrid({ rows: 2, columns: 2, strategy: "sparse" }, "x");
    expect(result.isOk()).toBe(true);
    expect(result.value.get(1, 1)).toBe("x");
  });

  it("reports fractional dimensions as invalid options", () => {
    const result = tryCreateGrid({ rows: 1.5, columns: 2 }, 0);
    expect(result.isErr()).toBe(true);
    expect(result.error).toBeInstanceOf(GridError);
    expect(result.error.code).toBe("INVALID_OPTIONS");
  });

  it("rejects grids above the cell limit", () => {
    const result = tryCreateGrid({ rows: 2 ** 16, columns: 2 ** 16 }, 0);
    expect(result.error.code).toBe("INVALID_OPTIONS");
  });
});
