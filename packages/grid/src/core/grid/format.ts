import { FORMAT_ROW_INDENT } from "../constants";

/**
 * Diagnostic text form of a grid, one bracketed row per line:
 *
 * ```
 * {
 *   [1, 2],
 *   [3, 4]
 * }
 * ```
 *
 * Not meant to be parsed back.
 */
export function formatRows(rows: readonly (readonly unknown[])[]): string {
  if (rows.length === 0) return "{}";

  const lines = rows.map(
    (row) => `${FORMAT_ROW_INDENT}[${row.map((v) => String(v)).join(", ")}]`,
  );
  return `{\n${lines.join(",\n")}\n}`;
}
