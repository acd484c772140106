import { eachDateBetween } from "../dates.ts";
import { ValidationError } from "../errors.ts";
import type { PriceBar, PriceField } from "../types/index.ts";

export type Cell = number | string | null;

export type TableRecord = { date: string } & Record<string, Cell>;

/**
 * Immutable date-indexed column table. The index holds YYYY-MM-DD strings in
 * ascending order; `null` marks a missing value.
 */
export class PriceTable {
  readonly index: readonly string[];
  private readonly data: ReadonlyMap<string, readonly Cell[]>;

  constructor(
    index: readonly string[],
    data: Iterable<[string, readonly Cell[]]> = []
  ) {
    this.index = index;
    this.data = new Map(data);

    for (const [name, values] of this.data) {
      if (values.length !== index.length) {
        throw new Error(
          `Column ${name} has ${values.length} values for ${index.length} dates`
        );
      }
    }
  }

  /**
   * A table with no columns whose index is every calendar day from start to
   * end, inclusive.
   */
  static dateRange(start: string, end: string): PriceTable {
    return new PriceTable(eachDateBetween(start, end));
  }

  static fromBars(
    bars: readonly PriceBar[],
    fields: readonly PriceField[]
  ): PriceTable {
    return new PriceTable(
      bars.map((bar) => bar.date),
      fields.map((field): [string, Cell[]] => [
        field,
        bars.map((bar) => bar[field] ?? null),
      ])
    );
  }

  get columns(): string[] {
    return [...this.data.keys()];
  }

  get rowCount(): number {
    return this.index.length;
  }

  get isEmpty(): boolean {
    return this.rowCount === 0 || this.data.size === 0;
  }

  column(name: string): readonly Cell[] | undefined {
    return this.data.get(name);
  }

  select(names: readonly string[]): PriceTable {
    const missing = names.filter((name) => !this.data.has(name));
    if (missing.length > 0) {
      throw new ValidationError(
        `Unknown column(s): ${missing.join(", ")}`,
        missing
      );
    }
    return new PriceTable(
      this.index,
      names.map((name): [string, readonly Cell[]] => [
        name,
        this.data.get(name) ?? [],
      ])
    );
  }

  rename(mapping: Readonly<Record<string, string>>): PriceTable {
    return new PriceTable(
      this.index,
      [...this.data].map(([name, values]): [string, readonly Cell[]] => [
        mapping[name] ?? name,
        values,
      ])
    );
  }

  /** Namespace every column as `label.column`. */
  prefix(label: string): PriceTable {
    return new PriceTable(
      this.index,
      [...this.data].map(([name, values]): [string, readonly Cell[]] => [
        `${label}.${name}`,
        values,
      ])
    );
  }

  /**
   * Outer join on the date index. Dates present on only one side are kept,
   * with `null` in the other side's columns.
   */
  join(other: PriceTable): PriceTable {
    return PriceTable.joinAll([this, other]);
  }

  /**
   * Outer join of any number of tables in one pass: the index union is
   * built once and each table is realigned once. Columns keep table order.
   */
  static joinAll(tables: readonly PriceTable[]): PriceTable {
    const seen = new Set<string>();
    const clash = new Set<string>();
    for (const table of tables) {
      for (const name of table.columns) {
        if (seen.has(name)) clash.add(name);
        seen.add(name);
      }
    }
    if (clash.size > 0) {
      throw new Error(`Duplicate column(s) in join: ${[...clash].join(", ")}`);
    }

    const index = [
      ...new Set(tables.flatMap((table) => table.index)),
    ].sort();
    return new PriceTable(
      index,
      tables.flatMap((table) => table.realign(index))
    );
  }

  /** Drop the rows in which every cell is missing. */
  dropMissing(): PriceTable {
    const keep = this.index
      .map((_, row) => row)
      .filter((row) =>
        [...this.data.values()].some((values) => values[row] !== null)
      );

    return new PriceTable(
      keep.map((row) => this.index[row] ?? ""),
      [...this.data].map(([name, values]): [string, Cell[]] => [
        name,
        keep.map((row) => values[row] ?? null),
      ])
    );
  }

  toRecords(): TableRecord[] {
    return this.index.map((date, row) => {
      const record: TableRecord = { date };
      for (const [name, values] of this.data) {
        record[name] = values[row] ?? null;
      }
      return record;
    });
  }

  private realign(index: readonly string[]): Array<[string, Cell[]]> {
    const position = new Map<string, number>(
      this.index.map((date, row): [string, number] => [date, row])
    );
    return [...this.data].map(([name, values]): [string, Cell[]] => [
      name,
      index.map((date) => {
        const row = position.get(date);
        return row === undefined ? null : values[row] ?? null;
      }),
    ]);
  }
}
