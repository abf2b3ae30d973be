/**
 * Element type descriptors for the unboxed numeric grid families.
 *
 * A descriptor owns everything that differs between families: the typed array
 * it allocates, how a value is narrowed on store, and the element arithmetic.
 * Integer descriptors truncate toward zero and wrap to their width.
 */

import { DEV_MODE } from "../core/constants";

export type NumericElement = number | bigint;

/**
 * Structural view of a typed array holding `N`.
 */
export interface NumericArray<N extends NumericElement> {
  readonly length: number;
  [index: number]: N;
  fill(value: N): unknown;
}

export type ElementTypeName = "float64" | "float32" | "int32" | "int64";

export interface ElementType<N extends NumericElement> {
  readonly name: ElementTypeName;
  readonly zero: N;
  createArray(length: number): NumericArray<N>;
  /** Narrow any numeric value to this element type */
  coerce(value: NumericElement): N;
  add(a: N, b: N): N;
  subtract(a: N, b: N): N;
  multiply(a: N, b: N): N;
  /** Divisor is never zero here; grids check before dividing */
  divide(a: N, b: N): N;
  negate(a: N): N;
  isZero(value: N): boolean;
  compare(a: N, b: N): number;
}

function warnNonFinite(family: string, value: number): void {
  if (DEV_MODE) {
    console.warn(`${family}.coerce: non-finite value ${value} stored as 0`);
  }
}

function compareNumbers(a: number, b: number): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

// =============================================================================
// FLOATING POINT
// =============================================================================

export const Float64Element: ElementType<number> = {
  name: "float64",
  zero: 0,
  createArray: (length) => new Float64Array(length),
  coerce: (value) => Number(value),
  add: (a, b) => a + b,
  subtract: (a, b) => a - b,
  multiply: (a, b) => a * b,
  divide: (a, b) => a / b,
  negate: (a) => -a,
  isZero: (value) => value === 0,
  compare: compareNumbers,
};

export const Float32Element: ElementType<number> = {
  name: "float32",
  zero: 0,
  createArray: (length) => new Float32Array(length),
  coerce: (value) => Math.fround(Number(value)),
  add: (a, b) => Math.fround(a + b),
  subtract: (a, b) => Math.fround(a - b),
  multiply: (a, b) => Math.fround(a * b),
  divide: (a, b) => Math.fround(a / b),
  negate: (a) => -a,
  isZero: (value) => value === 0,
  compare: compareNumbers,
};

// =============================================================================
// INTEGER
// =============================================================================

export const Int32Element: ElementType<number> = {
  name: "int32",
  zero: 0,
  createArray: (length) => new Int32Array(length),
  coerce(value) {
    if (typeof value === "bigint") return Number(BigInt.asIntN(32, value));
    if (!Number.isFinite(value)) {
      warnNonFinite("IntGrid", value);
      return 0;
    }
    return value | 0;
  },
  add: (a, b) => (a + b) | 0,
  subtract: (a, b) => (a - b) | 0,
  multiply: (a, b) => Math.imul(a, b),
  divide: (a, b) => (a / b) | 0,
  negate: (a) => -a | 0,
  isZero: (value) => value === 0,
  compare: compareNumbers,
};

export const Int64Element: ElementType<bigint> = {
  name: "int64",
  zero: 0n,
  createArray: (length) => new BigInt64Array(length),
  coerce(value) {
    if (typeof value === "bigint") return BigInt.asIntN(64, value);
    if (!Number.isFinite(value)) {
      warnNonFinite("LongGrid", value);
      return 0n;
    }
    return BigInt.asIntN(64, BigInt(Math.trunc(value)));
  },
  add: (a, b) => BigInt.asIntN(64, a + b),
  subtract: (a, b) => BigInt.asIntN(64, a - b),
  multiply: (a, b) => BigInt.asIntN(64, a * b),
  divide: (a, b) => BigInt.asIntN(64, a / b),
  negate: (a) => BigInt.asIntN(64, -a),
  isZero: (value) => value === 0n,
  compare: (a, b) => (a < b ? -1 : a > b ? 1 : 0),
};
