import { StorageStrategy } from "@gridwork/contracts";
import { assertDimensions } from "../grid/bounds";
import type { GridStorage } from "./types";

/**
 * Fully materialized row-major storage, one array slot per cell.
 * Capacity is fixed at construction.
 */
export class DenseStorage<T> implements GridStorage<T> {
  readonly strategy = StorageStrategy.DENSE;
  private readonly cells: T[];

  constructor(
    readonly rows: number,
    readonly columns: number,
    readonly defaultValue: T,
  ) {
    assertDimensions(rows, columns);
    this.cells = new Array<T>(rows * columns).fill(defaultValue);
  }

  has(_row: number, _column: number): boolean {
    return true;
  }

  read(row: number, column: number): T {
    return this.cells[row * this.columns + column] as T;
  }

  write(row: number, column: number, value: T): void {
    this.cells[row * this.columns + column] = value;
  }

  fillAll(value: T): void {
    this.cells.fill(value);
  }

  allocate(rows: number, columns: number): DenseStorage<T> {
    return new DenseStorage(rows, columns, this.defaultValue);
  }

  allocateFor<U>(rows: number, columns: number, defaultValue: U): DenseStorage<U> {
    return new DenseStorage(rows, columns, defaultValue);
  }
}
