import { parse } from "csv-parse/sync";
import { isValid, parseISO } from "date-fns";
import { PRICE_FIELDS } from "../types/index.ts";
import type { PriceBar, PriceField, PriceSeries } from "../types/index.ts";

const DATE_PREFIX = /^\d{4}-\d{2}-\d{2}/;

function parseNumber(raw: string, field: string, date: string): number | null {
  if (raw === "") return null;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`Invalid ${field} "${raw}" on ${date}`);
  }
  return value;
}

function parseDate(raw: string, row: number): string {
  // Tiingo sends either 2024-01-02 or 2024-01-02T00:00:00.000Z
  const date = DATE_PREFIX.exec(raw)?.[0];
  if (!date || !isValid(parseISO(date))) {
    throw new Error(`Invalid date "${raw}" on row ${row}`);
  }
  return date;
}

/**
 * Parse a Tiingo `format=csv` price response. Throws on a missing `date` or
 * `adjClose` column, malformed values, or dates that are not strictly
 * increasing.
 */
export function parsePriceCsv(ticker: string, text: string): PriceSeries {
  const rows: string[][] = parse(text, {
    bom: true,
    skip_empty_lines: true,
    trim: true,
  });

  const [header, ...records] = rows;
  if (!header) {
    throw new Error(`Empty response for ${ticker}`);
  }

  const dateColumn = header.indexOf("date");
  if (dateColumn === -1 || !header.includes("adjClose")) {
    throw new Error(
      `Response for ${ticker} is missing the date or adjClose column`
    );
  }

  const positions = new Map<PriceField, number>();
  for (const field of PRICE_FIELDS) {
    const position = header.indexOf(field);
    if (position !== -1) positions.set(field, position);
  }

  const bars: PriceBar[] = [];
  records.forEach((record, i) => {
    const row = i + 2; // 1-based, after the header
    const date = parseDate(record[dateColumn] ?? "", row);

    const previous = bars[bars.length - 1];
    if (previous && previous.date >= date) {
      throw new Error(`Dates out of order at ${date} (after ${previous.date})`);
    }

    const values = new Map<PriceField, number | null>();
    for (const [field, position] of positions) {
      values.set(field, parseNumber(record[position] ?? "", field, date));
    }

    const adjClose = values.get("adjClose");
    if (adjClose === null || adjClose === undefined) {
      throw new Error(`Missing adjClose on ${date}`);
    }

    bars.push({
      date,
      open: values.get("open"),
      high: values.get("high"),
      low: values.get("low"),
      close: values.get("close"),
      volume: values.get("volume"),
      adjOpen: values.get("adjOpen"),
      adjHigh: values.get("adjHigh"),
      adjLow: values.get("adjLow"),
      adjClose,
      adjVolume: values.get("adjVolume"),
      divCash: values.get("divCash"),
      splitFactor: values.get("splitFactor"),
    });
  });

  return { ticker, fields: [...positions.keys()], bars };
}
