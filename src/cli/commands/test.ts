import { Command, Option } from "clipanion";
import { PriceKit } from "../../index.ts";

export class TestCommand extends Command {
  static override paths = [["test"]];

  static override usage = Command.Usage({
    description: "Check that the Tiingo API accepts the configured token",
    examples: [
      ["Test the default token", "pricekit test"],
      ["Test another token file", "pricekit test --token-file ./token.txt"],
    ],
  });

  tokenFile = Option.String("--token-file", {
    description: "Path to the file holding the Tiingo API token",
  });

  async execute(): Promise<number> {
    try {
      const priceKit = new PriceKit(this.tokenFile);
      const status = await priceKit.testConnection();
      return status.ok ? 0 : 1;
    } catch (error) {
      const errorMessage =
        error instanceof Error ? error.message : String(error);
      this.context.stderr.write(`Failed to test connection: ${errorMessage}\n`);
      return 1;
    }
  }
}
