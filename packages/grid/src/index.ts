/**
 * @gridwork/grid
 *
 * Two-dimensional grids over interchangeable storage strategies: dense,
 * sparse with mutable bounds, synchronized, per-cell atomic, and unboxed
 * numeric families.
 *
 * @example
 * ```typescript
 * import { createDenseGrid, createSparseGrid } from "@gridwork/grid";
 *
 * const dense = createDenseGrid(3, 3, 0);
 * const sparse = createSparseGrid(3, 3, 0);
 * sparse.set(1, 1, 5);
 * dense.set(1, 1, 5);
 * dense.equals(sparse); // true
 * ```
 */

// Contract and core grid
export * from "./core/grid";

// Storages
export * from "./core/storage";

// Hashing
export * from "./core/hash";

// Variants
export * from "./atomic/atomic-grid";
export * from "./numeric";
export * from "./sparse/sparse-grid";
export { LOCK_SLOT, Mutex } from "./sync/mutex";
export * from "./sync/sync-grid";

// Options-driven construction
export { createGrid, tryCreateGrid } from "./factory";

export { DEV_MODE } from "./core/constants";
