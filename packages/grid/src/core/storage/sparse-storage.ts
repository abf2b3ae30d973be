import { MAX_SPARSE_CELLS, StorageStrategy } from "@gridwork/contracts";
import { assertDimensions } from "../grid/bounds";
import type { GridStorage } from "./types";

/**
 * Bounding rectangle of the present entries, inclusive on both ends.
 */
export interface OccupiedBounds {
  readonly minRow: number;
  readonly minColumn: number;
  readonly maxRow: number;
  readonly maxColumn: number;
}

/**
 * Map-backed storage keyed by the row-major flat index `row * columns + column`.
 *
 * `rows` and `columns` are tracked independently of the entries: they only
 * change through {@link reshape}, which re-keys every entry for the new
 * column count. An absent key is an empty cell and reads as `defaultValue`.
 */
export class SparseStorage<T> implements GridStorage<T> {
  readonly strategy = StorageStrategy.SPARSE;
  private entries = new Map<number, T>();
  private _rows: number;
  private _columns: number;

  constructor(
    rows: number,
    columns: number,
    readonly defaultValue: T,
  ) {
    assertDimensions(rows, columns, MAX_SPARSE_CELLS);
    this._rows = rows;
    this._columns = columns;
  }

  get rows(): number {
    return this._rows;
  }

  get columns(): number {
    return this._columns;
  }

  /** Number of entries held in the backing map */
  get entryCount(): number {
    return this.entries.size;
  }

  has(row: number, column: number): boolean {
    return this.entries.has(row * this._columns + column);
  }

  read(row: number, column: number): T {
    const key = row * this._columns + column;
    if (!this.entries.has(key)) return this.defaultValue;
    return this.entries.get(key) as T;
  }

  write(row: number, column: number, value: T): void {
    this.entries.set(row * this._columns + column, value);
  }

  /**
   * Delete the entry at a cell.
   * @returns Whether an entry existed
   */
  remove(row: number, column: number): boolean {
    return this.entries.delete(row * this._columns + column);
  }

  /**
   * Drop every entry, bounds unchanged
   */
  clear(): void {
    this.entries.clear();
  }

  fillAll(value: T): void {
    for (let r = 0; r < this._rows; r++) {
      for (let c = 0; c < this._columns; c++) {
        this.entries.set(r * this._columns + c, value);
      }
    }
  }

  /**
   * Remove entries matching `isEmpty`.
   * @returns Number of entries removed
   */
  removeWhere(isEmpty: (value: T) => boolean): number {
    let removed = 0;
    for (const [key, value] of [...this.entries]) {
      if (!isEmpty(value)) continue;
      this.entries.delete(key);
      removed++;
    }
    return removed;
  }

  /**
   * Present entries as `[row, column, value]`, decoded with the current columns.
   * Returns a copy; later mutation does not affect it.
   */
  presentEntries(): Array<[number, number, T]> {
    const result: Array<[number, number, T]> = [];
    const columns = this._columns;
    for (const [key, value] of this.entries) {
      result.push([Math.floor(key / columns), key % columns, value]);
    }
    return result;
  }

  occupiedBounds(): OccupiedBounds | undefined {
    if (this.entries.size === 0) return undefined;

    let minRow = Number.POSITIVE_INFINITY;
    let minColumn = Number.POSITIVE_INFINITY;
    let maxRow = -1;
    let maxColumn = -1;
    const columns = this._columns;

    for (const key of this.entries.keys()) {
      const r = Math.floor(key / columns);
      const c = key % columns;
      if (r < minRow) minRow = r;
      if (r > maxRow) maxRow = r;
      if (c < minColumn) minColumn = c;
      if (c > maxColumn) maxColumn = c;
    }

    return { minRow, minColumn, maxRow, maxColumn };
  }

  /**
   * Change the declared bounds, re-keying every entry.
   *
   * 1. Decode each key of a snapshot with the current column count, shift by
   *    the offset and re-encode with `columns` into a fresh map. The live map
   *    is never re-keyed in place: a new key can equal an old key that has
   *    not been visited yet.
   * 2. If the resize is not expansive (either dimension shrinks, or entries
   *    are shifted), drop every entry that falls outside the new bounds.
   * 3. Commit the new map, then the new bounds.
   *
   * @param rowOffset - Subtracted from every entry's row
   * @param columnOffset - Subtracted from every entry's column
   * @returns Number of entries dropped
   */
  reshape(
    rows: number,
    columns: number,
    rowOffset = 0,
    columnOffset = 0,
  ): number {
    assertDimensions(rows, columns, MAX_SPARSE_CELLS);

    const oldColumns = this._columns;
    const snapshot = [...this.entries];
    const expansive =
      rows >= this._rows &&
      columns >= this._columns &&
      rowOffset === 0 &&
      columnOffset === 0;

    const remapped = new Map<number, T>();
    let dropped = 0;

    for (const [key, value] of snapshot) {
      const r = Math.floor(key / oldColumns) - rowOffset;
      const c = (key % oldColumns) - columnOffset;

      if (!expansive && (r < 0 || c < 0 || r >= rows || c >= columns)) {
        dropped++;
        continue;
      }

      remapped.set(r * columns + c, value);
    }

    this.entries = remapped;
    this._rows = rows;
    this._columns = columns;

    return dropped;
  }

  allocate(rows: number, columns: number): SparseStorage<T> {
    return new SparseStorage(rows, columns, this.defaultValue);
  }

  allocateFor<U>(rows: number, columns: number, defaultValue: U): SparseStorage<U> {
    return new SparseStorage(rows, columns, defaultValue);
  }
}
