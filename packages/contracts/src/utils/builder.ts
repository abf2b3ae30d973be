import {
  GridOptionsSchema,
  type GridStrategy,
  type ValidatedGridOptions,
} from "../schemas/grid-options";
import { GridError } from "../types/error";
import type { TrimPolicy } from "../types/grid";
import { Err, Ok, type Result } from "../types/result";

export type GridOptionsInput = {
  rows: number;
  columns: number;
  strategy?: GridStrategy;
  trimPolicy?: TrimPolicy;
};

/**
 * Apply defaults and validate grid options.
 *
 * A negative dimension is reported as `NEGATIVE_DIMENSION`, every other
 * schema failure as `INVALID_OPTIONS`.
 */
export function buildGridOptions(
  input: GridOptionsInput,
): Result<ValidatedGridOptions, GridError> {
  const candidate = {
    strategy: input.strategy ?? "dense",
    rows: input.rows,
    columns: input.columns,
    trimPolicy: input.trimPolicy ?? "anchored",
  };

  const parsed = GridOptionsSchema.safeParse(candidate);
  if (parsed.success) return Ok(parsed.data);

  const issues = parsed.error.issues.map((issue) => ({
    path: issue.path.map(String).join("."),
    code: issue.code,
    message: issue.message,
  }));

  const negative = parsed.error.issues.some(
    (issue) =>
      issue.code === "too_small" &&
      (issue.path[0] === "rows" || issue.path[0] === "columns"),
  );
  if (negative) {
    return Err(GridError.negativeDimension(input.rows, input.columns));
  }

  const first = issues[0];
  return Err(
    GridError.invalidOptions(first ? first.message : "Invalid grid options", {
      issues,
    }),
  );
}
