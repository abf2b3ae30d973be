import { StorageStrategy } from "@gridwork/contracts";
import type {
  ElementType,
  NumericArray,
  NumericElement,
} from "../../numeric/element-types";
import { assertDimensions } from "../grid/bounds";
import { DenseStorage } from "./dense-storage";
import type { GridStorage } from "./types";

/**
 * Flat typed-array storage for an unboxed numeric element type.
 * Every write goes through the element type's `coerce`.
 */
export class TypedArrayStorage<N extends NumericElement>
  implements GridStorage<N>
{
  readonly strategy = StorageStrategy.TYPED;
  readonly defaultValue: N;
  private readonly data: NumericArray<N>;

  constructor(
    readonly element: ElementType<N>,
    readonly rows: number,
    readonly columns: number,
    defaultValue: N = element.zero,
  ) {
    assertDimensions(rows, columns);
    this.defaultValue = element.coerce(defaultValue);
    this.data = element.createArray(rows * columns);
    if (this.defaultValue !== element.zero) {
      this.data.fill(this.defaultValue);
    }
  }

  has(_row: number, _column: number): boolean {
    return true;
  }

  read(row: number, column: number): N {
    return this.data[row * this.columns + column] as N;
  }

  write(row: number, column: number, value: N): void {
    this.data[row * this.columns + column] = this.element.coerce(value);
  }

  fillAll(value: N): void {
    this.data.fill(this.element.coerce(value));
  }

  allocate(rows: number, columns: number): TypedArrayStorage<N> {
    return new TypedArrayStorage(this.element, rows, columns, this.defaultValue);
  }

  /** Typed arrays cannot hold arbitrary values; other element types go dense */
  allocateFor<U>(rows: number, columns: number, defaultValue: U): DenseStorage<U> {
    return new DenseStorage(rows, columns, defaultValue);
  }
}
