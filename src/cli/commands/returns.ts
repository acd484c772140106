import { Command, Option } from "clipanion";
import * as t from "typanion";
import { PriceKit } from "../../index.ts";
import { FREQUENCIES } from "../../types/index.ts";

export class ReturnsCommand extends Command {
  static override paths = [["returns"]];

  static override usage = Command.Usage({
    description: "Compute period-over-period returns from adjusted closes",
    details: `
      This command fetches adjusted closing prices for the given tickers,
      drops dates on which no ticker traded, and prints simple returns
      (or logarithmic returns with --log) as JSON records.

      The first row has no earlier period and is printed as null.
    `,
    examples: [
      ["Daily returns for AAPL", "pricekit returns AAPL --start 2024-01-01"],
      [
        "Monthly log returns for two tickers",
        "pricekit returns AAPL MSFT --frequency monthly --log",
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

  log = Option.Boolean("--log", false, {
    description: "Compute logarithmic instead of simple returns",
  });

  parallel = Option.String("--parallel", {
    description: "Number of parallel fetches",
    validator: t.cascade(t.isNumber(), [t.isInteger(), t.isPositive()]),
  });

  tokenFile = Option.String("--token-file", {
    description: "Path to the file holding the Tiingo API token",
  });

  async execute(): Promise<number> {
    try {
      const priceKit = new PriceKit(this.tokenFile);
      const prices = await priceKit.fetchHistorical(this.tickers, {
        start: this.start,
        end: this.end,
        frequency: this.frequency,
        adjCloseOnly: true,
        parallel: this.parallel,
      });

      if (!prices) {
        this.context.stderr.write(`No data retrieved for ${this.tickers[0]}\n`);
        return 1;
      }

      const returns = priceKit.computeReturns(
        prices.dropMissing(),
        undefined,
        this.log
      );
      this.context.stdout.write(
        `${JSON.stringify(returns.toRecords(), null, 2)}\n`
      );
      return 0;
    } catch (error) {
      const errorMessage =
        error instanceof Error ? error.message : String(error);
      this.context.stderr.write(`Failed to compute returns: ${errorMessage}\n`);
      return 1;
    }
  }
}
