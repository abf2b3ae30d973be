/**
 * Generic core of the unboxed numeric grid families.
 *
 * `N` is the element type (`number` or `bigint`), `M` the concrete family, so
 * that shape operations and arithmetic return the family they were called on.
 */

import { GridError } from "@gridwork/contracts";
import { assertDimensions, assertSameDimensions } from "../core/grid/bounds";
import { isReadonlyGrid } from "../core/grid/equality";
import { Grid } from "../core/grid/grid";
import type { ReadonlyGrid } from "../core/grid/types";
import { DenseStorage } from "../core/storage/dense-storage";
import { TypedArrayStorage } from "../core/storage/typed-storage";
import type { ElementType, NumericElement } from "./element-types";

/** Scalar or grid operand of an element-wise operation */
export type NumericOperand = NumericElement | ReadonlyGrid<NumericElement>;

export abstract class NumericGrid<
  N extends NumericElement,
  M extends NumericGrid<N, M>,
> extends Grid<N> {
  protected readonly typed: TypedArrayStorage<N>;

  protected constructor(storage: TypedArrayStorage<N>) {
    super(storage);
    this.typed = storage;
  }

  /** Wrap storage of this family in the concrete family type */
  protected abstract wrap(storage: TypedArrayStorage<N>): M;

  get element(): ElementType<N> {
    return this.typed.element;
  }

  // ===========================================================================
  // SHAPE
  // ===========================================================================

  override subGrid(r1: number, c1: number, r2: number, c2: number): M {
    return this.wrap(
      this.regionStorage(r1, c1, r2, c2, (rows, columns) =>
        this.typed.allocate(rows, columns),
      ),
    );
  }

  override resize(rows: number, columns: number): M {
    return this.wrap(
      this.resizedStorage(rows, columns, (r, c) => this.typed.allocate(r, c)),
    );
  }

  override transpose(): M {
    return this.wrap(
      this.transposedStorage((rows, columns) =>
        this.typed.allocate(rows, columns),
      ),
    );
  }

  override copy(): M {
    return this.wrap(
      this.copiedStorage((rows, columns) => this.typed.allocate(rows, columns)),
    );
  }

  /**
   * General dense grid holding the same values
   */
  boxed(): Grid<N> {
    return new Grid(
      this.copiedStorage(
        (rows, columns) => new DenseStorage(rows, columns, this.defaultValue),
      ),
    );
  }

  // ===========================================================================
  // ARITHMETIC
  // ===========================================================================

  add(operand: NumericOperand): M {
    return this.combine(operand, (a, b) => this.element.add(a, b));
  }

  subtract(operand: NumericOperand): M {
    return this.combine(operand, (a, b) => this.element.subtract(a, b));
  }

  multiply(operand: NumericOperand): M {
    return this.combine(operand, (a, b) => this.element.multiply(a, b));
  }

  /**
   * Element-wise division; integer families truncate toward zero.
   * @throws GridError DIVISION_BY_ZERO if the divisor is zero or any divisor
   * cell is zero, before anything is computed
   */
  divide(operand: NumericOperand): M {
    const element = this.element;

    if (isReadonlyGrid(operand)) {
      assertSameDimensions(this.dimensions(), operand.dimensions());
      operand.forEach((value, row, column) => {
        if (element.isZero(element.coerce(value))) {
          throw GridError.divisionByZero({ row, column });
        }
      });
    } else if (element.isZero(element.coerce(operand))) {
      throw GridError.divisionByZero();
    }

    return this.combine(operand, (a, b) => element.divide(a, b));
  }

  negate(): M {
    const element = this.element;
    const result = this.typed.allocate(this.rows, this.columns);
    this.forEach((value, row, column) => {
      result.write(row, column, element.negate(value));
    });
    return this.wrap(result);
  }

  sum(): N {
    const element = this.element;
    let total = element.zero;
    for (const value of this) {
      total = element.add(total, value);
    }
    return total;
  }

  /** Smallest value, or `undefined` for an empty grid */
  min(): N | undefined {
    return this.extreme((a, b) => this.element.compare(a, b) < 0);
  }

  /** Largest value, or `undefined` for an empty grid */
  max(): N | undefined {
    return this.extreme((a, b) => this.element.compare(a, b) > 0);
  }

  private extreme(isBetter: (candidate: N, current: N) => boolean): N | undefined {
    let best: N | undefined;
    for (const value of this) {
      if (best === undefined || isBetter(value, best)) best = value;
    }
    return best;
  }

  private combine(operand: NumericOperand, op: (a: N, b: N) => N): M {
    const element = this.element;
    const result = this.typed.allocate(this.rows, this.columns);

    if (isReadonlyGrid(operand)) {
      assertSameDimensions(this.dimensions(), operand.dimensions());
      const right = operand.toArray();
      let i = 0;
      this.forEach((value, row, column) => {
        result.write(row, column, op(value, element.coerce(right[i++] as NumericElement)));
      });
    } else {
      const scalar = element.coerce(operand);
      this.forEach((value, row, column) => {
        result.write(row, column, op(value, scalar));
      });
    }

    return this.wrap(result);
  }
}

// =============================================================================
// STORAGE BUILDERS
// =============================================================================

export function typedStorage<N extends NumericElement>(
  element: ElementType<N>,
  rows: number,
  columns: number,
  fill?: NumericElement,
): TypedArrayStorage<N> {
  assertDimensions(rows, columns);
  return new TypedArrayStorage(
    element,
    rows,
    columns,
    fill === undefined ? element.zero : element.coerce(fill),
  );
}

/**
 * Typed storage from nested rows; the first row fixes the column count
 */
export function typedStorageOf<N extends NumericElement>(
  element: ElementType<N>,
  values: readonly (readonly NumericElement[])[],
): TypedArrayStorage<N> {
  const rows = values.length;
  const columns = values[0]?.length ?? 0;
  const storage = new TypedArrayStorage(element, rows, columns);

  values.forEach((row, r) => {
    if (row.length !== columns) {
      throw GridError.dimensionMismatch(
        { rows, columns },
        { rows, columns: row.length },
      );
    }
    row.forEach((value, c) => storage.write(r, c, element.coerce(value)));
  });

  return storage;
}

/**
 * Typed storage holding `f` of every cell of `grid`, narrowed to `element`
 */
export function typedStorageFrom<T, N extends NumericElement>(
  element: ElementType<N>,
  grid: ReadonlyGrid<T>,
  f: (value: T) => NumericElement,
): TypedArrayStorage<N> {
  const storage = new TypedArrayStorage(
    element,
    grid.rows,
    grid.columns,
    element.coerce(f(grid.defaultValue)),
  );
  for (const { row, column, value } of grid.entries()) {
    storage.write(row, column, element.coerce(f(value)));
  }
  return storage;
}
