import { ValidationError } from "../errors.ts";
import { PriceTable } from "../storage/table.ts";
import type { Cell } from "../storage/table.ts";

function periodReturn(
  current: Cell | undefined,
  previous: Cell | undefined,
  useLog: boolean
): number | null {
  if (typeof current !== "number" || typeof previous !== "number") return null;

  const value = useLog
    ? Math.log(current / previous)
    : (current - previous) / previous;
  return Number.isFinite(value) ? value : null;
}

/**
 * Period-over-period returns for every (or the selected) column.
 *
 * The result keeps the input's date index; its first row is null since there
 * is no earlier period to compare against. Missing inputs and non-finite
 * results (a zero or negative price) come out as null.
 */
export function computeReturns(
  table: PriceTable,
  columns?: string | readonly string[],
  useLog = false
): PriceTable {
  const selected =
    columns === undefined
      ? table
      : table.select(typeof columns === "string" ? [columns] : columns);

  if (selected.isEmpty || selected.rowCount < 2) {
    throw new ValidationError("Input table is empty or has fewer than 2 rows");
  }

  const nonNumeric = selected.columns.filter((name) =>
    (selected.column(name) ?? []).some(
      (cell) => cell !== null && typeof cell !== "number"
    )
  );
  if (nonNumeric.length > 0) {
    throw new ValidationError(
      `Non-numeric data in column(s): ${nonNumeric.join(", ")}`,
      nonNumeric
    );
  }

  return new PriceTable(
    selected.index,
    selected.columns.map((name): [string, Array<number | null>] => {
      const values = selected.column(name) ?? [];
      return [
        name,
        values.map((value, row) =>
          row === 0 ? null : periodReturn(value, values[row - 1], useLog)
        ),
      ];
    })
  );
}
