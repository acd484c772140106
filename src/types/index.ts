export type Frequency = "daily" | "weekly" | "monthly" | "annually";

export const FREQUENCIES: readonly Frequency[] = [
  "daily",
  "weekly",
  "monthly",
  "annually",
];

export interface PriceBar {
  date: string; // YYYY-MM-DD format

  // Raw prices (as reported on that day)
  open?: number | null;
  high?: number | null;
  low?: number | null;
  close?: number | null;
  volume?: number | null;

  // Adjusted prices (for splits/dividends)
  adjOpen?: number | null;
  adjHigh?: number | null;
  adjLow?: number | null;
  adjClose: number;
  adjVolume?: number | null;

  // Corporate actions
  divCash?: number | null;
  splitFactor?: number | null;
}

export const PRICE_FIELDS = [
  "open",
  "high",
  "low",
  "close",
  "volume",
  "adjOpen",
  "adjHigh",
  "adjLow",
  "adjClose",
  "adjVolume",
  "divCash",
  "splitFactor",
] as const;

export type PriceField = (typeof PRICE_FIELDS)[number];

export interface PriceSeries {
  ticker: string;
  // Fields present in the response, in PRICE_FIELDS order
  fields: PriceField[];
  bars: PriceBar[];
}

export interface FetchOptions {
  start?: string | Date;
  end?: string | Date;
  frequency?: Frequency;
  adjCloseOnly?: boolean;
  parallel?: number;
}

export interface TiingoSourceConfig {
  tokenFile: string;
  baseUrl: string;
  testUrl: string;
  timeout: number;
}

export interface DefaultsConfig {
  startDate: string;
  frequency: Frequency;
  parallel: number;
  adjCloseOnly: boolean;
}

export interface Config {
  sources: {
    tiingo: TiingoSourceConfig;
  };
  defaults: DefaultsConfig;
}

export interface ConfigOverrides {
  sources?: {
    tiingo?: Partial<TiingoSourceConfig>;
  };
  defaults?: Partial<DefaultsConfig>;
}

export function isFrequency(value: unknown): value is Frequency {
  return typeof value === "string" && FREQUENCIES.some((f) => f === value);
}
