/**
 * Structural equality, hashing and text form
 */

import { describe, expect, it } from "vitest";
import {
  atomicCopyOf,
  createDenseGrid,
  createSparseGrid,
  denseGridOf,
  type Equatable,
  formatRows,
  hashGrid,
  isEqualValue,
  isReadonlyGrid,
} from "../src";

class Point implements Equatable {
  constructor(
    readonly x: number,
    readonly y: number,
  ) {}

  equals(other: unknown): boolean {
    return other instanceof Point && other.x === this.x && other.y === this.y;
  }

  hash(): string {
    return `${this.x},${this.y}`;
  }

  toString(): string {
    return `(${this.x}, ${this.y})`;
  }
}

describe("isEqualValue", () => {
  it("compares primitives by identity", () => {
    expect(isEqualValue(1, 1)).toBe(true);
    expect(isEqualValue("a", "b")).toBe(false);
    expect(isEqualValue(0, -0)).toBe(true);
  });

  it("treats NaN as equal to itself", () => {
    expect(isEqualValue(Number.NaN, Number.NaN)).toBe(true);
    expect(isEqualValue(Number.NaN, 0)).toBe(false);
  });

  it("uses equals() when the value has one", () => {
    expect(isEqualValue(new Point(1, 2), new Point(1, 2))).toBe(true);
    expect(isEqualValue(new Point(1, 2), new Point(2, 1))).toBe(false);
    expect(isEqualValue({ x: 1 }, { x: 1 })).toBe(false);
  });
});

describe("Grid equality", () => {
  it("recognizes grids structurally", () => {
    expect(isReadonlyGrid(createDenseGrid(1, 1, 0))).toBe(true);
    expect(isReadonlyGrid({ rows: 1, columns: 1 })).toBe(false);
    expect(isReadonlyGrid(null)).toBe(false);
  });

  it("is false for values that are not grids", () => {
    const grid = createDenseGrid(1, 1, 0);
    expect(grid.equals([[0]])).toBe(false);
    expect(grid.equals(undefined)).toBe(false);
  });

  it("is false for look-alikes that cannot list their cells", () => {
    const lookAlike = { rows: 1, columns: 1, get: () => 0 };
    expect(isReadonlyGrid(lookAlike)).toBe(false);
    expect(createDenseGrid(1, 1, 0).equals(lookAlike)).toBe(false);
  });

  it("requires the same dimensions", () => {
    expect(createDenseGrid(2, 3, 0).equals(createDenseGrid(3, 2, 0))).toBe(false);
    expect(createDenseGrid(0, 3, 0).equals(createDenseGrid(0, 3, 1))).toBe(true);
  });

  it("ignores the storage strategy", () => {
    const dense = denseGridOf([[1, 2], [3, 4]]);
    const atomic = atomicCopyOf(dense);
    const sparse = createSparseGrid(2, 2, 0);
    sparse.set(0, 0, 1);
    sparse.set(0, 1, 2);
    sparse.set(1, 0, 3);
    sparse.set(1, 1, 4);

    expect(dense.equals(atomic)).toBe(true);
    expect(atomic.equals(sparse)).toBe(true);
    expect(sparse.equals(dense)).toBe(true);
  });

  it("compares cells with equals()", () => {
    const a = createDenseGrid(1, 2, new Point(0, 0));
    const b = createDenseGrid(1, 2, new Point(0, 0));
    expect(a.equals(b)).toBe(true);
    b.set(0, 1, new Point(1, 1));
    expect(a.equals(b)).toBe(false);
  });

  it("holds between a grid and its transpose transposed", () => {
    const grid = denseGridOf([[1, 2, 3], [4, 5, 6]]);
    expect(grid.transpose().transpose().equals(grid)).toBe(true);
  });
});

describe("hashCode", () => {
  it("matches for equal grids of different strategies", () => {
    const dense = denseGridOf([[1, Number.NaN], [-0, 4]]);
    const sparse = createSparseGrid(2, 2, 0);
    sparse.set(0, 0, 1);
    sparse.set(0, 1, Number.NaN);
    sparse.set(1, 1, 4);

    expect(dense.equals(sparse)).toBe(true);
    expect(dense.hashCode()).toBe(sparse.hashCode());
  });

  it("changes with the content", () => {
    const grid = createDenseGrid(2, 2, 0);
    const before = grid.hashCode();
    grid.set(1, 1, 1);
    expect(grid.hashCode()).not.toBe(before);
  });

  it("depends on the dimensions", () => {
    expect(hashGrid(1, 4, [0, 0, 0, 0])).not.toBe(hashGrid(2, 2, [0, 0, 0, 0]));
  });

  it("uses hash() of hashable values", () => {
    const a = createDenseGrid(1, 1, new Point(1, 2));
    const b = createDenseGrid(1, 1, new Point(1, 2));
    expect(a.hashCode()).toBe(b.hashCode());
  });

  it("is a 16-digit hex string", () => {
    expect(createDenseGrid(1, 1, "x").hashCode()).toMatch(/^[0-9a-f]{16}$/);
  });
});

describe("toString", () => {
  it("prints one bracketed row per line", () => {
    const grid = denseGridOf([[1, 2], [3, 4]]);
    expect(grid.toString()).toBe("{\n  [1, 2],\n  [3, 4]\n}");
  });

  it("prints a grid without rows as braces", () => {
    expect(createDenseGrid(0, 4, 0).toString()).toBe("{}");
  });

  it("prints rows without columns", () => {
    expect(createDenseGrid(2, 0, 0).toString()).toBe("{\n  [],\n  []\n}");
  });

  it("prints absent sparse cells as the default", () => {
    const grid = createSparseGrid(1, 3, "-");
    grid.set(0, 1, "x");
    expect(grid.toString()).toBe("{\n  [-, x, -]\n}");
  });

  it("uses each value's own text form", () => {
    expect(formatRows([[new Point(1, 2)]])).toBe("{\n  [(1, 2)]\n}");
  });
});
