import { GridError, type GridErrorCode } from "@gridwork/contracts";

/**
 * Run `fn` and return the GridError it throws.
 * Fails the test if it returns normally or throws anything else.
 */
export function catchGridError(fn: () => unknown): GridError {
  try {
    fn();
  } catch (e) {
    if (GridError.isGridError(e)) return e;
    throw e;
  }
  throw new Error("Expected a GridError to be thrown");
}

export function codeOf(fn: () => unknown): GridErrorCode {
  return catchGridError(fn).code;
}
