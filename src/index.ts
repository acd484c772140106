import { TiingoService } from "./services/tiingo.ts";
import type { ConnectionStatus } from "./services/tiingo.ts";
import { computeReturns } from "./services/returns.ts";
import { loadConfig } from "./config.ts";
import type { PriceTable } from "./storage/table.ts";
import type { ConfigOverrides, FetchOptions } from "./types/index.ts";
import type { AxiosInstance } from "axios";

export class PriceKit {
  private dataService: TiingoService;

  constructor(
    credentialPath?: string,
    config?: ConfigOverrides,
    http?: AxiosInstance
  ) {
    this.dataService = new TiingoService(credentialPath, {
      config: config ? loadConfig(undefined, config) : undefined,
      http,
    });
  }

  testConnection(): Promise<ConnectionStatus> {
    return this.dataService.testConnection();
  }

  buildRequestUrl(...args: Parameters<TiingoService["buildRequestUrl"]>): string {
    return this.dataService.buildRequestUrl(...args);
  }

  fetchHistorical(
    tickers: string | readonly string[],
    options?: FetchOptions
  ): Promise<PriceTable | null> {
    return this.dataService.fetchHistorical(tickers, options);
  }

  computeReturns(
    table: PriceTable,
    columns?: string | readonly string[],
    useLog = false
  ): PriceTable {
    return computeReturns(table, columns, useLog);
  }
}

// Export everything for library usage
export * from "./types/index.ts";
export * from "./config.ts";
export * from "./errors.ts";
export * from "./credentials.ts";
export * from "./dates.ts";
export * from "./storage/table.ts";
export * from "./services/tiingo.ts";
export * from "./services/tiingo-csv.ts";
export * from "./services/returns.ts";
