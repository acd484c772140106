import axios from "axios";
import type { AxiosInstance } from "axios";
import Bottleneck from "bottleneck";
import { getConfig } from "../config.ts";
import { readCredential } from "../credentials.ts";
import { toDateString, today } from "../dates.ts";
import {
  ConnectionError,
  FetchError,
  ValidationError,
  errorMessage,
} from "../errors.ts";
import { PriceTable } from "../storage/table.ts";
import { parsePriceCsv } from "./tiingo-csv.ts";
import type {
  Config,
  FetchOptions,
  Frequency,
  PriceSeries,
} from "../types/index.ts";

export type ConnectionStatus =
  | { ok: true; response: unknown }
  | { ok: false; error: ConnectionError };

interface TickerResult {
  ticker: string;
  series: PriceSeries | null;
}

export interface TiingoServiceOptions {
  http?: AxiosInstance;
  config?: Config;
}

// Query parameters sent unless a call overrides them
const DEFAULT_PARAMS = {
  format: "csv",
  resampleFreq: "daily",
} as const;

// Trimmed, with the caller's spelling kept: tickers name the merged columns
function normalizeTickers(tickers: string | readonly string[]): string[] {
  const list = typeof tickers === "string" ? [tickers] : tickers;
  return list.map((t) => t.trim()).filter(Boolean);
}

export class TiingoService {
  private readonly token: string;
  private readonly http: AxiosInstance;
  private readonly config: Config;
  private readonly headers: Readonly<Record<string, string>>;

  constructor(credentialPath?: string, options: TiingoServiceOptions = {}) {
    this.config = options.config ?? getConfig();
    this.token = readCredential(
      credentialPath || this.config.sources.tiingo.tokenFile
    );
    this.headers = {
      "Content-Type": "application/json",
      Authorization: `Token ${this.token}`,
    };
    this.http =
      options.http ??
      axios.create({ timeout: this.config.sources.tiingo.timeout });
  }

  private get baseUrl(): string {
    return this.config.sources.tiingo.baseUrl.replace(/\/+$/, "");
  }

  /**
   * Probe the API's test endpoint with the stored token. Failures come back
   * as a status value rather than a rejection.
   */
  async testConnection(): Promise<ConnectionStatus> {
    const testUrl = this.config.sources.tiingo.testUrl.replace(/\/+$/, "");
    const url = `${testUrl}/api/test?token=${encodeURIComponent(this.token)}`;

    try {
      const response = await this.http.get<unknown>(url, {
        headers: this.headers,
      });
      console.log(`Connection successful: ${JSON.stringify(response.data)}`);
      return { ok: true, response: response.data };
    } catch (error) {
      const connectionError =
        axios.isAxiosError(error) && error.response
          ? new ConnectionError(
              `Tiingo API error: ${error.response.status} - ${error.response.statusText}`,
              error.response.status,
              { cause: error }
            )
          : new ConnectionError(errorMessage(error), undefined, {
              cause: error,
            });
      console.error(`Connection failed: ${connectionError.message}`);
      return { ok: false, error: connectionError };
    }
  }

  buildRequestUrl(
    ticker: string,
    startDate?: string | Date,
    endDate?: string | Date,
    frequency?: Frequency
  ): string {
    const params: Record<string, string | undefined> = {
      ...DEFAULT_PARAMS,
      startDate: startDate ? toDateString(startDate) : undefined,
      endDate: toDateString(endDate ?? today()),
    };
    if (frequency) params.resampleFreq = frequency;

    const query = new URLSearchParams();
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) query.append(key, value);
    }

    return `${this.baseUrl}/${encodeURIComponent(ticker)}/prices?${query.toString()}`;
  }

  /**
   * Fetch historical prices for one or more tickers.
   *
   * A single ticker yields that ticker's own table (or null if it failed).
   * Several tickers yield one table spanning the requested range, with a
   * column per ticker (adjCloseOnly) or every field namespaced `TICKER.field`.
   * Failed tickers are logged and left out.
   */
  async fetchHistorical(
    tickers: string | readonly string[],
    options: FetchOptions = {}
  ): Promise<PriceTable | null> {
    const defaults = this.config.defaults;
    const requested = normalizeTickers(tickers);
    const symbols = [...new Set(requested)];
    const start = toDateString(options.start ?? defaults.startDate);
    const end = toDateString(options.end ?? today());
    const frequency = options.frequency ?? defaults.frequency;
    const adjCloseOnly = options.adjCloseOnly ?? defaults.adjCloseOnly;

    if (start > end) {
      throw new ValidationError(`Start date ${start} is after end date ${end}`);
    }

    const limiter = new Bottleneck({
      maxConcurrent: Math.max(1, Math.floor(options.parallel ?? defaults.parallel)),
    });
    const results = await Promise.all(
      symbols.map((ticker) =>
        limiter.schedule(() => this.fetchTicker(ticker, start, end, frequency))
      )
    );

    if (requested.length === 1) {
      const series = results[0]?.series;
      if (!series) return null;
      return PriceTable.fromBars(
        series.bars,
        adjCloseOnly ? ["adjClose"] : series.fields
      );
    }

    const tables: PriceTable[] = [];
    for (const { ticker, series } of results) {
      if (!series) continue;
      tables.push(
        adjCloseOnly
          ? PriceTable.fromBars(series.bars, ["adjClose"]).rename({
              adjClose: ticker,
            })
          : PriceTable.fromBars(series.bars, series.fields).prefix(ticker)
      );
    }
    const combined = PriceTable.joinAll([
      PriceTable.dateRange(start, end),
      ...tables,
    ]);

    if (combined.columns.length === 0) {
      console.warn("No data retrieved for any of the requested tickers");
    } else {
      console.log(
        `Retrieved data for ${tables.length} of ${symbols.length} tickers`
      );
    }
    return combined;
  }

  private async fetchTicker(
    ticker: string,
    start: string,
    end: string,
    frequency: Frequency
  ): Promise<TickerResult> {
    try {
      const series = await this.fetchSeries(ticker, start, end, frequency);
      return { ticker, series };
    } catch (error) {
      console.error(`${ticker}: Failed - ${errorMessage(error)}`);
      return { ticker, series: null };
    }
  }

  private async fetchSeries(
    ticker: string,
    start: string,
    end: string,
    frequency: Frequency
  ): Promise<PriceSeries> {
    const url = this.buildRequestUrl(ticker, start, end, frequency);

    let body: string;
    try {
      const response = await this.http.get<string>(url, {
        headers: this.headers,
        responseType: "text",
      });
      body = response.data;
    } catch (error) {
      if (axios.isAxiosError(error) && error.response) {
        if (error.response.status === 404) {
          throw new FetchError(ticker, "http", `Ticker ${ticker} not found`, {
            status: 404,
            cause: error,
          });
        }
        throw new FetchError(
          ticker,
          "http",
          `Tiingo API error: ${error.response.status} - ${error.response.statusText}`,
          { status: error.response.status, cause: error }
        );
      }
      throw new FetchError(
        ticker,
        "transport",
        `Request failed: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    try {
      return parsePriceCsv(ticker, body);
    } catch (error) {
      throw new FetchError(
        ticker,
        "parse",
        `Invalid response: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }
}
