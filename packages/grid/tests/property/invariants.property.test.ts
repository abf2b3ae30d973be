/**
 * Property-Based Invariant Tests
 *
 * Random grids drawn from a seeded PRNG, so a failing seed can be replayed.
 */

import { SeededRandom } from "@gridwork/contracts";
import { describe, expect, it } from "vitest";
import {
  createDenseGrid,
  createSparseGrid,
  denseCopyOf,
  type Grid,
  type SparseGrid,
} from "../../src";

const SEED_COUNT = 200;
const MAX_DIMENSION = 8;

interface RandomGrids {
  dense: Grid<number>;
  sparse: SparseGrid<number>;
}

/**
 * Dense and sparse grids with the same content; about half the sparse
 * cells are left absent.
 */
function randomGrids(rng: SeededRandom): RandomGrids {
  const rows = rng.range(0, MAX_DIMENSION);
  const columns = rng.range(0, MAX_DIMENSION);
  const dense = createDenseGrid(rows, columns, 0);
  const sparse = createSparseGrid(rows, columns, 0);

  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < columns; c++) {
      if (rng.probability(0.5)) continue;
      const value = rng.range(-5, 5);
      dense.set(r, c, value);
      sparse.set(r, c, value);
    }
  }

  return { dense, sparse };
}

function forEachSeed(check: (rng: SeededRandom, seed: number) => void): void {
  for (let seed = 0; seed < SEED_COUNT; seed++) {
    check(new SeededRandom(seed), seed);
  }
}

describe("Grid invariants", () => {
  it("size is always rows * columns", () => {
    forEachSeed((rng) => {
      const { dense, sparse } = randomGrids(rng);
      expect(dense.size).toBe(dense.rows * dense.columns);
      expect(sparse.size).toBe(sparse.rows * sparse.columns);

      const rows = rng.range(0, MAX_DIMENSION);
      const columns = rng.range(0, MAX_DIMENSION);
      sparse.setSize(rows, columns);
      expect(sparse.size).toBe(rows * columns);
    });
  });

  it("get returns what set stored", () => {
    forEachSeed((rng) => {
      const { dense, sparse } = randomGrids(rng);
      if (dense.size === 0) return;

      const r = rng.range(0, dense.rows - 1);
      const c = rng.range(0, dense.columns - 1);
      const value = rng.range(100, 200);
      dense.set(r, c, value);
      sparse.set(r, c, value);
      expect(dense.get(r, c)).toBe(value);
      expect(sparse.get(r, c)).toBe(value);
    });
  });

  it("dense and sparse grids with equal content are equal both ways", () => {
    forEachSeed((rng, seed) => {
      const { dense, sparse } = randomGrids(rng);
      expect(dense.equals(sparse), `seed ${seed}`).toBe(true);
      expect(sparse.equals(dense), `seed ${seed}`).toBe(true);
      expect(dense.hashCode()).toBe(sparse.hashCode());
    });
  });

  it("transposing twice gives back the grid", () => {
    forEachSeed((rng) => {
      const { dense, sparse } = randomGrids(rng);
      expect(dense.transpose().transpose().equals(dense)).toBe(true);
      expect(sparse.transpose().transpose().equals(sparse)).toBe(true);
      expect(sparse.transpose().equals(dense.transpose())).toBe(true);
    });
  });

  it("resizing keeps the overlap and defaults the rest", () => {
    forEachSeed((rng) => {
      const { dense } = randomGrids(rng);
      const rows = rng.range(0, MAX_DIMENSION);
      const columns = rng.range(0, MAX_DIMENSION);
      const resized = dense.resize(rows, columns);

      for (let r = 0; r < rows; r++) {
        for (let c = 0; c < columns; c++) {
          const expected =
            r < dense.rows && c < dense.columns ? dense.get(r, c) : 0;
          expect(resized.get(r, c)).toBe(expected);
        }
      }
    });
  });

  it("sparse setSize agrees with dense resize", () => {
    forEachSeed((rng, seed) => {
      const { dense, sparse } = randomGrids(rng);
      const rows = rng.range(0, MAX_DIMENSION);
      const columns = rng.range(0, MAX_DIMENSION);

      sparse.setSize(rows, columns);
      expect(sparse.equals(dense.resize(rows, columns)), `seed ${seed}`).toBe(
        true,
      );
    });
  });

  it("clean never adds entries and cleaned cells read as default", () => {
    forEachSeed((rng) => {
      const { sparse } = randomGrids(rng);
      const before = denseCopyOf(sparse);
      const count = sparse.entryCount;

      const removed = sparse.clean();
      expect(sparse.entryCount).toBe(count - removed);
      expect(sparse.equals(before)).toBe(true);
      for (const { value } of sparse.presentEntries()) {
        expect(value).not.toBe(0);
      }
    });
  });

  it("trimming never loses an entry", () => {
    forEachSeed((rng) => {
      const { sparse } = randomGrids(rng);
      const values = sparse
        .presentEntries()
        .map((e) => e.value)
        .sort((a, b) => a - b);

      sparse.trim(rng.probability(0.5) ? "tight" : "anchored");

      const after = sparse
        .presentEntries()
        .map((e) => e.value)
        .sort((a, b) => a - b);
      expect(after).toEqual(values);
      for (const { row, column } of sparse.presentEntries()) {
        expect(sparse.isInBounds(row, column)).toBe(true);
      }
    });
  });
});
