/**
 * Generic grid over an embedded storage strategy.
 *
 * Every public call validates its arguments and runs inside the grid's
 * critical section. Unsynchronized grids use the no-op `UNGUARDED` section;
 * synchronized grids use a `Mutex`.
 */

import {
  type GridDimensions,
  type GridIndex,
  gridIndex,
  type StorageStrategy,
} from "@gridwork/contracts";
import { hashGrid } from "../hash/grid-hash";
import type { GridStorage } from "../storage/types";
import {
  assertColumn,
  assertDimensions,
  cellLimit,
  assertIndex,
  assertRange,
  assertRow,
  assertSameDimensions,
  isInRange,
} from "./bounds";
import { gridsEqual, isEqualValue, isReadonlyGrid } from "./equality";
import { formatRows } from "./format";
import {
  type CriticalSection,
  type GridEntry,
  type MutableGrid,
  type ReadonlyGrid,
  UNGUARDED,
} from "./types";

/**
 * 2D grid with bounds-checked cell access, bulk mutation and copying
 * transforms.
 *
 * @remarks
 * Derived grids (`subGrid`, `resize`, `transpose`, `copy`, `map`, `merge`)
 * always get freshly allocated storage of the same strategy, and a forked
 * critical section. Subclasses override these to return their own type,
 * going through the protected `*Storage` helpers.
 */
export class Grid<T> implements MutableGrid<T> {
  constructor(
    protected readonly storage: GridStorage<T>,
    protected readonly guard: CriticalSection = UNGUARDED,
  ) {}

  // ===========================================================================
  // DIMENSIONS
  // ===========================================================================

  get rows(): number {
    return this.storage.rows;
  }

  get columns(): number {
    return this.storage.columns;
  }

  get size(): number {
    return this.storage.rows * this.storage.columns;
  }

  get defaultValue(): T {
    return this.storage.defaultValue;
  }

  get strategy(): StorageStrategy {
    return this.storage.strategy;
  }

  /** Whether public calls run inside an exclusive section */
  get synchronized(): boolean {
    return this.guard !== UNGUARDED;
  }

  dimensions(): GridDimensions {
    return this.guard.run(() => ({
      rows: this.storage.rows,
      columns: this.storage.columns,
    }));
  }

  isInBounds(row: number, column: number): boolean {
    return this.guard.run(() =>
      isInRange(row, column, this.storage.rows, this.storage.columns),
    );
  }

  // ===========================================================================
  // CELL ACCESS
  // ===========================================================================

  get(row: number, column: number): T {
    return this.guard.run(() => {
      this.checkIndex(row, column);
      return this.storage.read(row, column);
    });
  }

  getAt(index: GridIndex): T {
    return this.get(index.row, index.column);
  }

  has(row: number, column: number): boolean {
    return this.guard.run(() => {
      this.checkIndex(row, column);
      return this.storage.has(row, column);
    });
  }

  /**
   * Value of the cell, or `fallback` when the cell is absent.
   * Only sparse grids have absent cells.
   */
  getOrDefault(row: number, column: number, fallback: T): T {
    return this.guard.run(() => {
      this.checkIndex(row, column);
      return this.storage.has(row, column)
        ? this.storage.read(row, column)
        : fallback;
    });
  }

  set(row: number, column: number, value: T): void {
    this.guard.run(() => {
      this.checkIndex(row, column);
      this.storage.write(row, column, value);
    });
  }

  setAt(index: GridIndex, value: T): void {
    this.set(index.row, index.column, value);
  }

  // ===========================================================================
  // SEARCH
  // ===========================================================================

  contains(value: T): boolean {
    return this.guard.run(() => {
      const { rows, columns } = this.storage;
      for (let r = 0; r < rows; r++) {
        for (let c = 0; c < columns; c++) {
          if (isEqualValue(this.storage.read(r, c), value)) return true;
        }
      }
      return false;
    });
  }

  containsAll(values: Iterable<T>): boolean {
    return this.guard.run(() => {
      for (const value of values) {
        if (!this.contains(value)) return false;
      }
      return true;
    });
  }

  count(predicate: (value: T, row: number, column: number) => boolean): number {
    return this.guard.run(() => {
      const { rows, columns } = this.storage;
      let count = 0;
      for (let r = 0; r < rows; r++) {
        for (let c = 0; c < columns; c++) {
          if (predicate(this.storage.read(r, c), r, c)) count++;
        }
      }
      return count;
    });
  }

  /**
   * Indices of every cell equal to `value`, row-major
   */
  findAll(value: T): GridIndex[] {
    return this.guard.run(() => {
      const { rows, columns } = this.storage;
      const found: GridIndex[] = [];
      for (let r = 0; r < rows; r++) {
        for (let c = 0; c < columns; c++) {
          if (isEqualValue(this.storage.read(r, c), value)) {
            found.push(gridIndex(r, c));
          }
        }
      }
      return found;
    });
  }

  // ===========================================================================
  // BULK MUTATION
  // ===========================================================================

  fill(value: T): void {
    this.guard.run(() => this.storage.fillAll(value));
  }

  /**
   * Assign every cell of `[r1, r2) x [c1, c2)`
   */
  fillRange(r1: number, c1: number, r2: number, c2: number, value: T): void {
    this.guard.run(() => {
      assertRange(r1, c1, r2, c2, this.storage.rows, this.storage.columns);
      for (let r = r1; r < r2; r++) {
        for (let c = c1; c < c2; c++) {
          this.storage.write(r, c, value);
        }
      }
    });
  }

  /**
   * Assign every absent cell. Grids without absent cells are unchanged.
   */
  fillEmpty(value: T): void {
    this.guard.run(() => {
      const { rows, columns } = this.storage;
      for (let r = 0; r < rows; r++) {
        for (let c = 0; c < columns; c++) {
          if (!this.storage.has(r, c)) this.storage.write(r, c, value);
        }
      }
    });
  }

  fillIf(predicate: (value: T) => boolean, value: T): void {
    this.guard.run(() => {
      const { rows, columns } = this.storage;
      for (let r = 0; r < rows; r++) {
        for (let c = 0; c < columns; c++) {
          if (predicate(this.storage.read(r, c))) {
            this.storage.write(r, c, value);
          }
        }
      }
    });
  }

  apply(f: (value: T) => T): void {
    this.applyIndexed((value) => f(value));
  }

  applyIndexed(f: (value: T, row: number, column: number) => T): void {
    this.guard.run(() => {
      const { rows, columns } = this.storage;
      for (let r = 0; r < rows; r++) {
        for (let c = 0; c < columns; c++) {
          this.storage.write(r, c, f(this.storage.read(r, c), r, c));
        }
      }
    });
  }

  replaceAll(oldValue: T, newValue: T): void {
    this.guard.run(() => {
      const { rows, columns } = this.storage;
      for (let r = 0; r < rows; r++) {
        for (let c = 0; c < columns; c++) {
          if (isEqualValue(this.storage.read(r, c), oldValue)) {
            this.storage.write(r, c, newValue);
          }
        }
      }
    });
  }

  /**
   * Copy `source` into `[r1, r2) x [c1, c2)`, so that
   * `this.get(r1 + i, c1 + j) === source.get(i, j)`.
   *
   * The source is read in full before the first write, so passing this grid
   * (or a grid sharing its cells) as the source is safe.
   */
  setRange(
    r1: number,
    c1: number,
    r2: number,
    c2: number,
    source: ReadonlyGrid<T>,
  ): void {
    this.guard.run(() => {
      assertRange(r1, c1, r2, c2, this.storage.rows, this.storage.columns);
      assertSameDimensions(
        { rows: r2 - r1, columns: c2 - c1 },
        source.dimensions(),
      );

      const width = c2 - c1;
      const values = source.toArray();
      for (let i = 0; i < r2 - r1; i++) {
        for (let j = 0; j < width; j++) {
          this.storage.write(r1 + i, c1 + j, values[i * width + j] as T);
        }
      }
    });
  }

  // ===========================================================================
  // DERIVED GRIDS
  // ===========================================================================

  subGrid(r1: number, c1: number, r2: number, c2: number): Grid<T> {
    return this.derive(
      this.regionStorage(r1, c1, r2, c2, (rows, columns) =>
        this.storage.allocate(rows, columns),
      ),
    );
  }

  /**
   * New grid of the given size. Overlapping cells keep their value, cells
   * only in the new grid take the default.
   */
  resize(rows: number, columns: number): Grid<T> {
    return this.derive(
      this.resizedStorage(rows, columns, (r, c) => this.storage.allocate(r, c)),
    );
  }

  transpose(): Grid<T> {
    return this.derive(
      this.transposedStorage((rows, columns) =>
        this.storage.allocate(rows, columns),
      ),
    );
  }

  copy(): Grid<T> {
    return this.derive(
      this.copiedStorage((rows, columns) => this.storage.allocate(rows, columns)),
    );
  }

  map<U>(f: (value: T) => U): Grid<U> {
    return this.derive(
      this.mappedStorage(f, (rows, columns, defaultValue) =>
        this.storage.allocateFor(rows, columns, defaultValue),
      ),
    );
  }

  merge<U, V>(other: ReadonlyGrid<U>, f: (a: T, b: U) => V): Grid<V> {
    return this.derive(
      this.mergedStorage(other, f, (rows, columns, defaultValue) =>
        this.storage.allocateFor(rows, columns, defaultValue),
      ),
    );
  }

  // ===========================================================================
  // CONVERSION
  // ===========================================================================

  getRow(row: number): T[] {
    return this.guard.run(() => {
      assertRow(row, this.storage.rows, this.storage.columns);
      const values: T[] = [];
      for (let c = 0; c < this.storage.columns; c++) {
        values.push(this.storage.read(row, c));
      }
      return values;
    });
  }

  getColumn(column: number): T[] {
    return this.guard.run(() => {
      assertColumn(column, this.storage.rows, this.storage.columns);
      const values: T[] = [];
      for (let r = 0; r < this.storage.rows; r++) {
        values.push(this.storage.read(r, column));
      }
      return values;
    });
  }

  /**
   * Row-major copy of every cell
   */
  toArray(): T[] {
    return this.guard.run(() => {
      const { rows, columns } = this.storage;
      const values: T[] = [];
      for (let r = 0; r < rows; r++) {
        for (let c = 0; c < columns; c++) {
          values.push(this.storage.read(r, c));
        }
      }
      return values;
    });
  }

  toRows(): T[][] {
    return this.guard.run(() => {
      const result: T[][] = [];
      for (let r = 0; r < this.storage.rows; r++) {
        const row: T[] = [];
        for (let c = 0; c < this.storage.columns; c++) {
          row.push(this.storage.read(r, c));
        }
        result.push(row);
      }
      return result;
    });
  }

  distinct(): Set<T> {
    return new Set(this.toArray());
  }

  // ===========================================================================
  // ITERATION
  // ===========================================================================

  /**
   * Iterate over a snapshot of the values taken at call time
   */
  [Symbol.iterator](): Iterator<T> {
    return this.toArray()[Symbol.iterator]();
  }

  entries(): IterableIterator<GridEntry<T>> {
    return this.guard
      .run(() => {
        const { rows, columns } = this.storage;
        const snapshot: GridEntry<T>[] = [];
        for (let r = 0; r < rows; r++) {
          for (let c = 0; c < columns; c++) {
            snapshot.push({ row: r, column: c, value: this.storage.read(r, c) });
          }
        }
        return snapshot;
      })
      .values();
  }

  forEach(callback: (value: T, row: number, column: number) => void): void {
    this.guard.run(() => {
      const { rows, columns } = this.storage;
      for (let r = 0; r < rows; r++) {
        for (let c = 0; c < columns; c++) {
          callback(this.storage.read(r, c), r, c);
        }
      }
    });
  }

  // ===========================================================================
  // EQUALITY
  // ===========================================================================

  equals(other: unknown): boolean {
    if (!isReadonlyGrid(other)) return false;
    return this.guard.run(() => gridsEqual(this, other));
  }

  /**
   * FNV-64 digest of the dimensions and cell values.
   * Grids that are `equals()`-equal and hold primitives hash alike.
   */
  hashCode(): string {
    return this.guard.run(() =>
      hashGrid(this.storage.rows, this.storage.columns, this.toArray()),
    );
  }

  toString(): string {
    return formatRows(this.toRows());
  }

  // ===========================================================================
  // STORAGE HELPERS
  // ===========================================================================

  protected checkIndex(row: number, column: number): void {
    assertIndex(row, column, this.storage.rows, this.storage.columns);
  }

  /**
   * Wrap storage produced by a derived-grid helper.
   * Subclasses wrap their own storage in their own type instead.
   */
  protected derive<U>(storage: GridStorage<U>): Grid<U> {
    return new Grid(storage, this.guard.fork());
  }

  /**
   * Copy the present cells of `[r1, r2) x [c1, c2)` into fresh storage
   */
  protected regionStorage<S extends GridStorage<T>>(
    r1: number,
    c1: number,
    r2: number,
    c2: number,
    allocate: (rows: number, columns: number) => S,
  ): S {
    return this.guard.run(() => {
      assertRange(r1, c1, r2, c2, this.storage.rows, this.storage.columns);
      const target = allocate(r2 - r1, c2 - c1);
      for (let r = r1; r < r2; r++) {
        for (let c = c1; c < c2; c++) {
          if (this.storage.has(r, c)) {
            target.write(r - r1, c - c1, this.storage.read(r, c));
          }
        }
      }
      return target;
    });
  }

  protected resizedStorage<S extends GridStorage<T>>(
    rows: number,
    columns: number,
    allocate: (rows: number, columns: number) => S,
  ): S {
    assertDimensions(rows, columns, cellLimit(this.storage.strategy));
    return this.guard.run(() => {
      const target = allocate(rows, columns);
      const overlapRows = Math.min(rows, this.storage.rows);
      const overlapColumns = Math.min(columns, this.storage.columns);
      for (let r = 0; r < overlapRows; r++) {
        for (let c = 0; c < overlapColumns; c++) {
          if (this.storage.has(r, c)) {
            target.write(r, c, this.storage.read(r, c));
          }
        }
      }
      return target;
    });
  }

  protected transposedStorage<S extends GridStorage<T>>(
    allocate: (rows: number, columns: number) => S,
  ): S {
    return this.guard.run(() => {
      const { rows, columns } = this.storage;
      const target = allocate(columns, rows);
      for (let r = 0; r < rows; r++) {
        for (let c = 0; c < columns; c++) {
          if (this.storage.has(r, c)) {
            target.write(c, r, this.storage.read(r, c));
          }
        }
      }
      return target;
    });
  }

  protected copiedStorage<S extends GridStorage<T>>(
    allocate: (rows: number, columns: number) => S,
  ): S {
    return this.guard.run(() =>
      this.regionStorage(
        0,
        0,
        this.storage.rows,
        this.storage.columns,
        allocate,
      ),
    );
  }

  /**
   * Absent cells stay absent; the new default is `f(defaultValue)`
   */
  protected mappedStorage<U, S extends GridStorage<U>>(
    f: (value: T) => U,
    allocate: (rows: number, columns: number, defaultValue: U) => S,
  ): S {
    return this.guard.run(() => {
      const { rows, columns } = this.storage;
      const target = allocate(rows, columns, f(this.storage.defaultValue));
      for (let r = 0; r < rows; r++) {
        for (let c = 0; c < columns; c++) {
          if (this.storage.has(r, c)) {
            target.write(r, c, f(this.storage.read(r, c)));
          }
        }
      }
      return target;
    });
  }

  /**
   * Cells absent on both sides stay absent; the new default combines both
   * defaults.
   */
  protected mergedStorage<U, V, S extends GridStorage<V>>(
    other: ReadonlyGrid<U>,
    f: (a: T, b: U) => V,
    allocate: (rows: number, columns: number, defaultValue: V) => S,
  ): S {
    return this.guard.run(() => {
      const { rows, columns } = this.storage;
      assertSameDimensions({ rows, columns }, other.dimensions());

      const target = allocate(
        rows,
        columns,
        f(this.storage.defaultValue, other.defaultValue),
      );
      for (let r = 0; r < rows; r++) {
        for (let c = 0; c < columns; c++) {
          if (this.storage.has(r, c) || other.has(r, c)) {
            target.write(r, c, f(this.storage.read(r, c), other.get(r, c)));
          }
        }
      }
      return target;
    });
  }
}
