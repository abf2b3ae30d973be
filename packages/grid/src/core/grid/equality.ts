import type { Equatable, ReadonlyGrid } from "./types";

export function isEquatable(value: unknown): value is Equatable {
  return (
    typeof value === "object" &&
    value !== null &&
    "equals" in value &&
    typeof value.equals === "function"
  );
}

/**
 * Cell value equality: identity, `NaN` equal to itself, or `equals()`.
 */
export function isEqualValue(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (typeof a === "number" && typeof b === "number") {
    return Number.isNaN(a) && Number.isNaN(b);
  }
  return isEquatable(a) && a.equals(b);
}

export function isReadonlyGrid(value: unknown): value is ReadonlyGrid<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    "rows" in value &&
    "columns" in value &&
    "get" in value &&
    "toArray" in value &&
    typeof value.rows === "number" &&
    typeof value.columns === "number" &&
    typeof value.get === "function" &&
    typeof value.toArray === "function"
  );
}

/**
 * Structural equality: same dimensions and equal values cell by cell,
 * whatever the storage of either side.
 */
export function gridsEqual(
  a: ReadonlyGrid<unknown>,
  b: ReadonlyGrid<unknown>,
): boolean {
  if (a === b) return true;
  if (a.rows !== b.rows || a.columns !== b.columns) return false;

  const left = a.toArray();
  const right = b.toArray();
  for (let i = 0; i < left.length; i++) {
    if (!isEqualValue(left[i], right[i])) return false;
  }
  return true;
}
