/**
 * Grid hash codes.
 *
 * The hash covers the dimensions and every cell value in row-major order,
 * so grids that are `equals()`-equal hash alike regardless of storage
 * strategy or boxed/unboxed representation. Objects take part through their
 * `hash()` method when they have one, otherwise through `String(value)`.
 */

import { createFNV64Hasher } from "./fnv64";

/**
 * Value that supplies its own hash, consistent with its `equals()`.
 */
export interface Hashable {
  hash(): string;
}

export function isHashable(value: unknown): value is Hashable {
  return (
    typeof value === "object" &&
    value !== null &&
    "hash" in value &&
    typeof value.hash === "function"
  );
}

function valueKey(value: unknown): string {
  if (isHashable(value)) return `h:${value.hash()}`;
  // NaN and both zeros compare equal, so they must hash alike
  if (typeof value === "number") {
    return Number.isNaN(value) ? "n:NaN" : `n:${value === 0 ? 0 : value}`;
  }
  return `${typeof value}:${String(value)}`;
}

export function hashGrid(
  rows: number,
  columns: number,
  values: Iterable<unknown>,
): string {
  const hasher = createFNV64Hasher().updateInt32(rows).updateInt32(columns);
  for (const value of values) {
    hasher.updateString(valueKey(value)).updateByte(0);
  }
  return hasher.digest();
}
