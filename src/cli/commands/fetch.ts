import { Command, Option } from "clipanion";
import * as t from "typanion";
import { PriceKit } from "../../index.ts";
import { FREQUENCIES } from "../../types/index.ts";

export class FetchCommand extends Command {
  static override paths = [["fetch"]];

  static override usage = Command.Usage({
    description: "Fetch historical prices for one or more tickers",
    details: `
      This command fetches historical end-of-day prices from Tiingo and prints
      them as JSON records.

      With a single ticker the ticker's own series is printed. With several
      tickers the series are merged on a shared date index, one column per
      ticker. Use --full to keep every price field, namespaced by ticker.

      Tickers that fail are reported and left out of the result.
    `,
    examples: [
      ["Fetch adjusted closes for AAPL", "pricekit fetch AAPL"],
      [
        "Fetch several tickers from 2023 onwards",
        "pricekit fetch AAPL MSFT GOOGL --start 2023-01-01",
      ],
      [
        "Fetch every field at weekly frequency",
        "pricekit fetch AAPL --full --frequency weekly",
      ],
    ],
  });

  tickers = Option.Rest({ required: 1 });

  start = Option.String("--start", {
    description: "Start date (YYYY-MM-DD)",
  });

  end = Option.String("--end", {
    description: "End date (YYYY-MM-DD), defaults to today",
  });

  frequency = Option.String("--frequency", {
    description: "Resample frequency (daily/weekly/monthly/annually)",
    validator: t.isEnum(FREQUENCIES),
  });

  full = Option.Boolean("--full", false, {
    description: "Keep every price field instead of adjusted close only",
  });

  parallel = Option.String("--parallel", {
    description: "Number of parallel fetches",
    validator: t.cascade(t.isNumber(), [t.isInteger(), t.isPositive()]),
  });

  dropEmpty = Option.Boolean("--drop-empty", false, {
    description: "Drop dates with no data for any ticker",
  });

  tokenFile = Option.String("--token-file", {
    description: "Path to the file holding the Tiingo API token",
  });

  async execute(): Promise<number> {
    try {
      const priceKit = new PriceKit(this.tokenFile);
      const table = await priceKit.fetchHistorical(this.tickers, {
        start: this.start,
        end: this.end,
        frequency: this.frequency,
        adjCloseOnly: !this.full,
        parallel: this.parallel,
      });

      if (!table) {
        this.context.stderr.write(`No data retrieved for ${this.tickers[0]}\n`);
        return 1;
      }

      const output = this.dropEmpty ? table.dropMissing() : table;
      this.context.stdout.write(
        `${JSON.stringify(output.toRecords(), null, 2)}\n`
      );
      return 0;
    } catch (error) {
      const errorMessage =
        error instanceof Error ? error.message : String(error);
      this.context.stderr.write(`Failed to fetch prices: ${errorMessage}\n`);
      return 1;
    }
  }
}
