/**
 * Grid contract shared by every storage strategy.
 */

import type {
  GridDimensions,
  GridIndex,
  StorageStrategy,
} from "@gridwork/contracts";

/**
 * Cell yielded by `entries()`.
 */
export interface GridEntry<T> {
  readonly row: number;
  readonly column: number;
  readonly value: T;
}

/**
 * Value with its own notion of equality, used by structural grid equality.
 */
export interface Equatable {
  equals(other: unknown): boolean;
}

/**
 * Exclusive section a grid runs each public call inside.
 *
 * @remarks
 * Implementations must be reentrant for the thread that holds them: a
 * callback passed to `apply` or `forEach` may call back into the same grid.
 */
export interface CriticalSection {
  run<R>(fn: () => R): R;
  /** Independent section for a derived grid */
  fork(): CriticalSection;
}

/**
 * No-op section used by every grid that is not synchronized.
 */
export const UNGUARDED: CriticalSection = {
  run: (fn) => fn(),
  fork: () => UNGUARDED,
};

// =============================================================================
// GRID INTERFACES
// =============================================================================

/**
 * Read-only grid interface.
 *
 * Use this type when a function only needs to read from a grid. Operations
 * that produce a grid (`subGrid`, `resize`, `transpose`, `copy`, `map`,
 * `merge`) are available here too: they never alias the source.
 *
 * @example
 * ```typescript
 * function total(grid: ReadonlyGrid<number>): number {
 *   let sum = 0;
 *   for (const value of grid) sum += value;
 *   return sum;
 * }
 * ```
 */
export interface ReadonlyGrid<T> extends Iterable<T> {
  readonly rows: number;
  readonly columns: number;
  readonly size: number;
  readonly defaultValue: T;
  readonly strategy: StorageStrategy;

  // Bounds
  dimensions(): GridDimensions;
  isInBounds(row: number, column: number): boolean;

  // Cell access
  get(row: number, column: number): T;
  getAt(index: GridIndex): T;
  has(row: number, column: number): boolean;
  getOrDefault(row: number, column: number, fallback: T): T;

  // Search
  contains(value: T): boolean;
  containsAll(values: Iterable<T>): boolean;
  count(predicate: (value: T, row: number, column: number) => boolean): number;
  findAll(value: T): GridIndex[];

  // Derived grids
  subGrid(r1: number, c1: number, r2: number, c2: number): MutableGrid<T>;
  resize(rows: number, columns: number): MutableGrid<T>;
  transpose(): MutableGrid<T>;
  copy(): MutableGrid<T>;
  map<U>(f: (value: T) => U): MutableGrid<U>;
  merge<U, V>(other: ReadonlyGrid<U>, f: (a: T, b: U) => V): MutableGrid<V>;

  // Conversion
  getRow(row: number): T[];
  getColumn(column: number): T[];
  toArray(): T[];
  toRows(): T[][];
  distinct(): Set<T>;

  // Iteration
  entries(): IterableIterator<GridEntry<T>>;
  forEach(callback: (value: T, row: number, column: number) => void): void;

  // Equality
  equals(other: unknown): boolean;
  hashCode(): string;
  toString(): string;
}

/**
 * Mutable grid interface.
 *
 * Every bulk operation validates its arguments before the first cell changes.
 */
export interface MutableGrid<T> extends ReadonlyGrid<T> {
  // Single cell mutation
  set(row: number, column: number, value: T): void;
  setAt(index: GridIndex, value: T): void;

  // Bulk mutation
  fill(value: T): void;
  fillRange(r1: number, c1: number, r2: number, c2: number, value: T): void;
  fillEmpty(value: T): void;
  fillIf(predicate: (value: T) => boolean, value: T): void;
  apply(f: (value: T) => T): void;
  applyIndexed(f: (value: T, row: number, column: number) => T): void;
  replaceAll(oldValue: T, newValue: T): void;
  setRange(
    r1: number,
    c1: number,
    r2: number,
    c2: number,
    source: ReadonlyGrid<T>,
  ): void;
}
