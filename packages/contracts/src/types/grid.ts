/**
 * Shared grid vocabulary used by every grid package.
 */

/**
 * Row/column address of a grid cell.
 */
export interface GridIndex {
  readonly row: number;
  readonly column: number;
}

export interface GridDimensions {
  readonly rows: number;
  readonly columns: number;
}

/**
 * Backing strategy of a grid.
 * - `dense`: one slot per cell
 * - `sparse`: key-to-value map, absent keys are empty cells
 * - `atomic`: one independently updatable cell per index
 * - `typed`: flat typed array of an unboxed numeric element type
 */
export const StorageStrategy = {
  DENSE: "dense",
  SPARSE: "sparse",
  ATOMIC: "atomic",
  TYPED: "typed",
} as const;

export type StorageStrategy =
  (typeof StorageStrategy)[keyof typeof StorageStrategy];

/**
 * How a sparse grid shrinks its bounds around the present entries.
 * - `anchored`: keep the origin, shrink from the end
 * - `tight`: also drop leading empty rows/columns, shifting entries to (0, 0)
 */
export type TrimPolicy = "anchored" | "tight";

export function gridIndex(row: number, column: number): GridIndex {
  return { row, column };
}

export function indexEquals(a: GridIndex, b: GridIndex): boolean {
  return a.row === b.row && a.column === b.column;
}

export function formatIndex(index: GridIndex): string {
  return `(${index.row}, ${index.column})`;
}
