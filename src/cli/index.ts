#!/usr/bin/env tsx

import { Cli, Builtins } from "clipanion";
import { FetchCommand } from "./commands/fetch.ts";
import { ReturnsCommand } from "./commands/returns.ts";
import { TestCommand } from "./commands/test.ts";

const cli = new Cli({
  binaryLabel: "pricekit",
  binaryName: "pricekit",
  binaryVersion: "1.0.0",
});

cli.register(FetchCommand);
cli.register(ReturnsCommand);
cli.register(TestCommand);
cli.register(Builtins.HelpCommand);
cli.register(Builtins.VersionCommand);

void cli.runExit(process.argv.slice(2));
