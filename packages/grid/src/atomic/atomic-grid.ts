/**
 * Grids whose cells update atomically one at a time.
 *
 * @remarks
 * There is no grid-wide lock. Bulk operations (`fill`, `apply`,
 * `replaceAll`) visit cells one by one, so a concurrent reader can see some
 * cells before the update and some after.
 */

import { assertDimensions } from "../core/grid/bounds";
import { Grid } from "../core/grid/grid";
import type { ReadonlyGrid } from "../core/grid/types";
import {
  ReferenceCellStorage,
  SharedInt32CellStorage,
} from "../core/storage/atomic-storage";
import type { AtomicCellStorage } from "../core/storage/types";
import { Int32Element } from "../numeric/element-types";

export class AtomicGrid<T> extends Grid<T> {
  private readonly cells: AtomicCellStorage<T>;

  constructor(storage: AtomicCellStorage<T>) {
    super(storage);
    this.cells = storage;
  }

  // ===========================================================================
  // PER-CELL ATOMICS
  // ===========================================================================

  /**
   * Set the cell to `next` if it currently holds `expected`
   * @returns Whether the swap happened
   */
  compareAndSet(row: number, column: number, expected: T, next: T): boolean {
    this.checkIndex(row, column);
    return this.cells.compareAndSwap(row, column, expected, next);
  }

  getAndSet(row: number, column: number, value: T): T {
    this.checkIndex(row, column);
    return this.cells.exchange(row, column, value);
  }

  /**
   * Apply `f` to the cell with a compare-and-set loop. `f` may run more than
   * once under contention, so it should have no side effects.
   * @returns The new value
   */
  updateAndGet(row: number, column: number, f: (value: T) => T): T {
    this.checkIndex(row, column);
    for (;;) {
      const previous = this.cells.read(row, column);
      const next = f(previous);
      if (this.cells.compareAndSwap(row, column, previous, next)) return next;
    }
  }

  /**
   * Same as {@link updateAndGet}, returning the value before the update
   */
  getAndUpdate(row: number, column: number, f: (value: T) => T): T {
    this.checkIndex(row, column);
    for (;;) {
      const previous = this.cells.read(row, column);
      if (this.cells.compareAndSwap(row, column, previous, f(previous))) {
        return previous;
      }
    }
  }

  // ===========================================================================
  // DERIVED GRIDS
  // ===========================================================================

  override subGrid(r1: number, c1: number, r2: number, c2: number): AtomicGrid<T> {
    return new AtomicGrid(
      this.regionStorage(r1, c1, r2, c2, (rows, columns) =>
        this.cells.allocate(rows, columns),
      ),
    );
  }

  override resize(rows: number, columns: number): AtomicGrid<T> {
    return new AtomicGrid(
      this.resizedStorage(rows, columns, (r, c) => this.cells.allocate(r, c)),
    );
  }

  override transpose(): AtomicGrid<T> {
    return new AtomicGrid(
      this.transposedStorage((rows, columns) =>
        this.cells.allocate(rows, columns),
      ),
    );
  }

  override copy(): AtomicGrid<T> {
    return new AtomicGrid(
      this.copiedStorage((rows, columns) => this.cells.allocate(rows, columns)),
    );
  }

  override map<U>(f: (value: T) => U): AtomicGrid<U> {
    return new AtomicGrid(
      this.mappedStorage(f, (rows, columns, defaultValue) =>
        this.cells.allocateFor(rows, columns, defaultValue),
      ),
    );
  }

  override merge<U, V>(
    other: ReadonlyGrid<U>,
    f: (a: T, b: U) => V,
  ): AtomicGrid<V> {
    return new AtomicGrid(
      this.mergedStorage(other, f, (rows, columns, defaultValue) =>
        this.cells.allocateFor(rows, columns, defaultValue),
      ),
    );
  }
}

/**
 * Atomic grid of 32-bit integers in a SharedArrayBuffer.
 *
 * Hand `buffer` to a worker and call {@link attachAtomicIntGrid} there to
 * operate on the same cells from both threads.
 *
 * @example
 * ```typescript
 * const grid = createAtomicIntGrid(4, 4);
 * new Worker(file, { workerData: { buffer: grid.buffer, rows: 4, columns: 4 } });
 * ```
 */
export class AtomicIntGrid extends AtomicGrid<number> {
  private readonly shared: SharedInt32CellStorage;

  constructor(storage: SharedInt32CellStorage) {
    super(storage);
    this.shared = storage;
  }

  get buffer(): SharedArrayBuffer {
    return this.shared.buffer;
  }

  /**
   * @returns The value after adding `delta`, wrapped to 32 bits
   */
  addAndGet(row: number, column: number, delta: number): number {
    this.checkIndex(row, column);
    const previous = this.shared.add(row, column, delta);
    return Int32Element.add(previous, Int32Element.coerce(delta));
  }

  getAndAdd(row: number, column: number, delta: number): number {
    this.checkIndex(row, column);
    return this.shared.add(row, column, delta);
  }

  /** `f`'s result is narrowed to an Int32 before it is stored and returned */
  override updateAndGet(
    row: number,
    column: number,
    f: (value: number) => number,
  ): number {
    return super.updateAndGet(row, column, (value) =>
      Int32Element.coerce(f(value)),
    );
  }

  override subGrid(r1: number, c1: number, r2: number, c2: number): AtomicIntGrid {
    return new AtomicIntGrid(
      this.regionStorage(r1, c1, r2, c2, (rows, columns) =>
        this.shared.allocate(rows, columns),
      ),
    );
  }

  override resize(rows: number, columns: number): AtomicIntGrid {
    return new AtomicIntGrid(
      this.resizedStorage(rows, columns, (r, c) => this.shared.allocate(r, c)),
    );
  }

  override transpose(): AtomicIntGrid {
    return new AtomicIntGrid(
      this.transposedStorage((rows, columns) =>
        this.shared.allocate(rows, columns),
      ),
    );
  }

  override copy(): AtomicIntGrid {
    return new AtomicIntGrid(
      this.copiedStorage((rows, columns) => this.shared.allocate(rows, columns)),
    );
  }
}

// =============================================================================
// FACTORIES
// =============================================================================

export function createAtomicGrid<T>(
  rows: number,
  columns: number,
  fill: T,
): AtomicGrid<T> {
  assertDimensions(rows, columns);
  return new AtomicGrid(new ReferenceCellStorage(rows, columns, fill));
}

export function atomicCopyOf<T>(grid: ReadonlyGrid<T>): AtomicGrid<T> {
  const storage = new ReferenceCellStorage(
    grid.rows,
    grid.columns,
    grid.defaultValue,
  );
  for (const { row, column, value } of grid.entries()) {
    storage.write(row, column, value);
  }
  return new AtomicGrid(storage);
}

export function createAtomicIntGrid(
  rows: number,
  columns: number,
  fill = 0,
): AtomicIntGrid {
  assertDimensions(rows, columns);
  return new AtomicIntGrid(
    new SharedInt32CellStorage(rows, columns, Int32Element.coerce(fill)),
  );
}

/**
 * Operate on cells created by another thread's {@link AtomicIntGrid}
 */
export function attachAtomicIntGrid(
  buffer: SharedArrayBuffer,
  rows: number,
  columns: number,
): AtomicIntGrid {
  assertDimensions(rows, columns);
  return new AtomicIntGrid(SharedInt32CellStorage.attach(buffer, rows, columns));
}
