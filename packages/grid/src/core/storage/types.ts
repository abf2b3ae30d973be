/**
 * Storage strategy interface shared by every grid variant.
 */

import type { StorageStrategy } from "@gridwork/contracts";

/**
 * Backing store of a grid.
 *
 * Storages never bounds-check: the owning grid validates every index and
 * range before calling in. Reads of an absent cell return `defaultValue`.
 *
 * @remarks
 * `allocate` and `allocateFor` always return fresh, independently owned
 * storage. No storage hands out a view into its own cells.
 */
export interface GridStorage<T> {
  readonly strategy: StorageStrategy;
  readonly rows: number;
  readonly columns: number;
  readonly defaultValue: T;

  /** Whether the cell holds an explicit value (false only for absent sparse cells) */
  has(row: number, column: number): boolean;
  read(row: number, column: number): T;
  write(row: number, column: number, value: T): void;

  /** Assign every cell */
  fillAll(value: T): void;

  /** Fresh storage of the same strategy and element type, every cell default */
  allocate(rows: number, columns: number): GridStorage<T>;

  /** Fresh storage for another element type, same strategy where it can hold `U` */
  allocateFor<U>(rows: number, columns: number, defaultValue: U): GridStorage<U>;
}

/**
 * Storage whose cells can each be updated atomically.
 */
export interface AtomicCellStorage<T> extends GridStorage<T> {
  /** Replace the cell with `next` only if it currently holds `expected` */
  compareAndSwap(row: number, column: number, expected: T, next: T): boolean;

  /** Replace the cell and return its previous value */
  exchange(row: number, column: number, value: T): T;

  allocate(rows: number, columns: number): AtomicCellStorage<T>;
  allocateFor<U>(
    rows: number,
    columns: number,
    defaultValue: U,
  ): AtomicCellStorage<U>;
}
