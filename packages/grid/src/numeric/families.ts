/**
 * Numeric grid families, one per typed array.
 *
 * | family       | array           | element  |
 * |--------------|-----------------|----------|
 * | `DoubleGrid` | `Float64Array`  | `number` |
 * | `FloatGrid`  | `Float32Array`  | `number` |
 * | `IntGrid`    | `Int32Array`    | `number` |
 * | `LongGrid`   | `BigInt64Array` | `bigint` |
 *
 * `from` converts any numeric grid, narrowing or widening each value;
 * `mapFrom` converts any grid through a function.
 */

import type { ReadonlyGrid } from "../core/grid/types";
import type { TypedArrayStorage } from "../core/storage/typed-storage";
import {
  Float32Element,
  Float64Element,
  Int32Element,
  Int64Element,
  type NumericElement,
} from "./element-types";
import {
  NumericGrid,
  typedStorage,
  typedStorageFrom,
  typedStorageOf,
} from "./numeric-grid";

const identity = (value: NumericElement): NumericElement => value;

export class DoubleGrid extends NumericGrid<number, DoubleGrid> {
  private constructor(storage: TypedArrayStorage<number>) {
    super(storage);
  }

  static create(rows: number, columns: number, fill?: number): DoubleGrid {
    return new DoubleGrid(typedStorage(Float64Element, rows, columns, fill));
  }

  static of(values: readonly (readonly number[])[]): DoubleGrid {
    return new DoubleGrid(typedStorageOf(Float64Element, values));
  }

  static from(grid: ReadonlyGrid<NumericElement>): DoubleGrid {
    return new DoubleGrid(typedStorageFrom(Float64Element, grid, identity));
  }

  static mapFrom<T>(grid: ReadonlyGrid<T>, f: (value: T) => number): DoubleGrid {
    return new DoubleGrid(typedStorageFrom(Float64Element, grid, f));
  }

  protected override wrap(storage: TypedArrayStorage<number>): DoubleGrid {
    return new DoubleGrid(storage);
  }
}

/**
 * Single precision: every stored value goes through `Math.fround`
 */
export class FloatGrid extends NumericGrid<number, FloatGrid> {
  private constructor(storage: TypedArrayStorage<number>) {
    super(storage);
  }

  static create(rows: number, columns: number, fill?: number): FloatGrid {
    return new FloatGrid(typedStorage(Float32Element, rows, columns, fill));
  }

  static of(values: readonly (readonly number[])[]): FloatGrid {
    return new FloatGrid(typedStorageOf(Float32Element, values));
  }

  static from(grid: ReadonlyGrid<NumericElement>): FloatGrid {
    return new FloatGrid(typedStorageFrom(Float32Element, grid, identity));
  }

  static mapFrom<T>(grid: ReadonlyGrid<T>, f: (value: T) => number): FloatGrid {
    return new FloatGrid(typedStorageFrom(Float32Element, grid, f));
  }

  protected override wrap(storage: TypedArrayStorage<number>): FloatGrid {
    return new FloatGrid(storage);
  }
}

/**
 * 32-bit integers. Stored values are truncated toward zero and wrapped;
 * `NaN` and infinities are stored as 0.
 */
export class IntGrid extends NumericGrid<number, IntGrid> {
  private constructor(storage: TypedArrayStorage<number>) {
    super(storage);
  }

  static create(rows: number, columns: number, fill?: number): IntGrid {
    return new IntGrid(typedStorage(Int32Element, rows, columns, fill));
  }

  static of(values: readonly (readonly number[])[]): IntGrid {
    return new IntGrid(typedStorageOf(Int32Element, values));
  }

  static from(grid: ReadonlyGrid<NumericElement>): IntGrid {
    return new IntGrid(typedStorageFrom(Int32Element, grid, identity));
  }

  static mapFrom<T>(grid: ReadonlyGrid<T>, f: (value: T) => number): IntGrid {
    return new IntGrid(typedStorageFrom(Int32Element, grid, f));
  }

  protected override wrap(storage: TypedArrayStorage<number>): IntGrid {
    return new IntGrid(storage);
  }
}

/**
 * 64-bit integers as `bigint`. Numbers are truncated; non-finite numbers
 * are stored as 0n.
 */
export class LongGrid extends NumericGrid<bigint, LongGrid> {
  private constructor(storage: TypedArrayStorage<bigint>) {
    super(storage);
  }

  static create(rows: number, columns: number, fill?: NumericElement): LongGrid {
    return new LongGrid(typedStorage(Int64Element, rows, columns, fill));
  }

  static of(values: readonly (readonly NumericElement[])[]): LongGrid {
    return new LongGrid(typedStorageOf(Int64Element, values));
  }

  static from(grid: ReadonlyGrid<NumericElement>): LongGrid {
    return new LongGrid(typedStorageFrom(Int64Element, grid, identity));
  }

  static mapFrom<T>(
    grid: ReadonlyGrid<T>,
    f: (value: T) => NumericElement,
  ): LongGrid {
    return new LongGrid(typedStorageFrom(Int64Element, grid, f));
  }

  protected override wrap(storage: TypedArrayStorage<bigint>): LongGrid {
    return new LongGrid(storage);
  }
}
