import { mkdtempSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { PriceKit } from "./index.ts";
import { createMockHttp, priceCsv } from "./test-utils/mock-http.ts";

describe("PriceKit", () => {
  const dir = mkdtempSync(join(tmpdir(), "pricekit-facade-"));
  const tokenPath = join(dir, "token");
  writeFileSync(tokenPath, "test-secret");

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("builds URLs against the configured base URL", () => {
    const { http } = createMockHttp(() => ({ status: 200, data: "" }));
    const priceKit = new PriceKit(
      tokenPath,
      { sources: { tiingo: { baseUrl: "https://prices.example.test/daily/" } } },
      http
    );

    expect(priceKit.buildRequestUrl("QQQ", "2024-01-01", "2024-01-31")).toBe(
      "https://prices.example.test/daily/QQQ/prices?format=csv&resampleFreq=daily&startDate=2024-01-01&endDate=2024-01-31"
    );
  });

  it("fetches prices and turns them into returns", async () => {
    const { http } = createMockHttp((url) => ({
      status: 200,
      data: url.includes("/VTI/")
        ? priceCsv([
            ["2024-01-02", 200],
            ["2024-01-03", 210],
          ])
        : priceCsv([
            ["2024-01-02", 50],
            ["2024-01-03", 40],
          ]),
    }));
    const priceKit = new PriceKit(tokenPath, { defaults: { parallel: 2 } }, http);

    const prices = await priceKit.fetchHistorical(["VTI", "BND"], {
      start: "2024-01-01",
      end: "2024-01-03",
    });
    expect(prices).not.toBeNull();
    if (!prices) return;

    const returns = priceKit.computeReturns(prices.dropMissing());

    expect(returns.toRecords()).toEqual([
      { date: "2024-01-02", VTI: null, BND: null },
      { date: "2024-01-03", VTI: 0.05, BND: -0.2 },
    ]);
  });
});
