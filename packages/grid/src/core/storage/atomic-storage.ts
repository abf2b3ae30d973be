/**
 * Per-cell atomic storages.
 *
 * `ReferenceCellStorage` holds any element type, one `AtomicReference` per
 * cell; it is atomic with respect to everything running on the owning thread.
 * `SharedInt32CellStorage` keeps 32-bit integers in a `SharedArrayBuffer` and
 * goes through `Atomics` for every access, so worker threads attached to the
 * same buffer see each other's updates.
 */

import { GridError, StorageStrategy } from "@gridwork/contracts";
import { Int32Element } from "../../numeric/element-types";
import { assertDimensions } from "../grid/bounds";
import type { AtomicCellStorage } from "./types";

// =============================================================================
// ATOMIC REFERENCE
// =============================================================================

/**
 * Single mutable slot with compare-and-set.
 * Comparison uses `Object.is`, so `NaN` matches `NaN`.
 */
export class AtomicReference<T> {
  constructor(private value: T) {}

  get(): T {
    return this.value;
  }

  set(value: T): void {
    this.value = value;
  }

  compareAndSet(expected: T, next: T): boolean {
    if (!Object.is(this.value, expected)) return false;
    this.value = next;
    return true;
  }

  getAndSet(value: T): T {
    const previous = this.value;
    this.value = value;
    return previous;
  }
}

export class ReferenceCellStorage<T> implements AtomicCellStorage<T> {
  readonly strategy = StorageStrategy.ATOMIC;
  private readonly cells: AtomicReference<T>[];

  constructor(
    readonly rows: number,
    readonly columns: number,
    readonly defaultValue: T,
  ) {
    assertDimensions(rows, columns);
    const size = rows * columns;
    this.cells = new Array<AtomicReference<T>>(size);
    for (let i = 0; i < size; i++) {
      this.cells[i] = new AtomicReference(defaultValue);
    }
  }

  private cell(row: number, column: number): AtomicReference<T> {
    return this.cells[row * this.columns + column] as AtomicReference<T>;
  }

  has(_row: number, _column: number): boolean {
    return true;
  }

  read(row: number, column: number): T {
    return this.cell(row, column).get();
  }

  write(row: number, column: number, value: T): void {
    this.cell(row, column).set(value);
  }

  compareAndSwap(row: number, column: number, expected: T, next: T): boolean {
    return this.cell(row, column).compareAndSet(expected, next);
  }

  exchange(row: number, column: number, value: T): T {
    return this.cell(row, column).getAndSet(value);
  }

  fillAll(value: T): void {
    for (const cell of this.cells) {
      cell.set(value);
    }
  }

  allocate(rows: number, columns: number): ReferenceCellStorage<T> {
    return new ReferenceCellStorage(rows, columns, this.defaultValue);
  }

  allocateFor<U>(
    rows: number,
    columns: number,
    defaultValue: U,
  ): ReferenceCellStorage<U> {
    return new ReferenceCellStorage(rows, columns, defaultValue);
  }
}

// =============================================================================
// SHARED INT32 CELLS
// =============================================================================

export const INT32_BYTES = Int32Array.BYTES_PER_ELEMENT;

export class SharedInt32CellStorage implements AtomicCellStorage<number> {
  readonly strategy = StorageStrategy.ATOMIC;
  readonly buffer: SharedArrayBuffer;
  private readonly cells: Int32Array;

  constructor(
    readonly rows: number,
    readonly columns: number,
    readonly defaultValue: number = 0,
    buffer?: SharedArrayBuffer,
  ) {
    assertDimensions(rows, columns);
    const size = rows * columns;
    if (buffer === undefined) {
      this.buffer = new SharedArrayBuffer(size * INT32_BYTES);
      this.cells = new Int32Array(this.buffer);
      if (defaultValue !== 0) {
        this.fillAll(defaultValue);
      }
      return;
    }

    const capacity = Math.floor(buffer.byteLength / INT32_BYTES);
    if (capacity < size) {
      throw new GridError(
        "DIMENSION_MISMATCH",
        `Buffer holds ${capacity} cells, a ${rows}x${columns} grid needs ${size}`,
        { capacity, rows, columns },
      );
    }
    this.buffer = buffer;
    this.cells = new Int32Array(buffer, 0, size);
  }

  /**
   * Wrap a buffer created by another storage, typically in a worker thread.
   * Cells are left as they are.
   */
  static attach(
    buffer: SharedArrayBuffer,
    rows: number,
    columns: number,
  ): SharedInt32CellStorage {
    return new SharedInt32CellStorage(rows, columns, 0, buffer);
  }

  has(_row: number, _column: number): boolean {
    return true;
  }

  read(row: number, column: number): number {
    return Atomics.load(this.cells, row * this.columns + column);
  }

  write(row: number, column: number, value: number): void {
    Atomics.store(
      this.cells,
      row * this.columns + column,
      Int32Element.coerce(value),
    );
  }

  compareAndSwap(
    row: number,
    column: number,
    expected: number,
    next: number,
  ): boolean {
    const current = Int32Element.coerce(expected);
    return (
      Atomics.compareExchange(
        this.cells,
        row * this.columns + column,
        current,
        Int32Element.coerce(next),
      ) === current
    );
  }

  exchange(row: number, column: number, value: number): number {
    return Atomics.exchange(
      this.cells,
      row * this.columns + column,
      Int32Element.coerce(value),
    );
  }

  /**
   * Atomically add `delta` to the cell.
   * @returns The previous value
   */
  add(row: number, column: number, delta: number): number {
    return Atomics.add(
      this.cells,
      row * this.columns + column,
      Int32Element.coerce(delta),
    );
  }

  fillAll(value: number): void {
    const v = Int32Element.coerce(value);
    for (let i = 0; i < this.cells.length; i++) {
      Atomics.store(this.cells, i, v);
    }
  }

  allocate(rows: number, columns: number): SharedInt32CellStorage {
    return new SharedInt32CellStorage(rows, columns, this.defaultValue);
  }

  allocateFor<U>(
    rows: number,
    columns: number,
    defaultValue: U,
  ): ReferenceCellStorage<U> {
    return new ReferenceCellStorage(rows, columns, defaultValue);
  }
}
