/**
 * @ledgerline/cli — Command-line definition.
 */

import { Command } from "commander";

export interface CliOptions {
  readonly verbose: boolean;
}

export function createProgram(): Command {
  return new Command()
    .name("ledgerline")
    .description(
      [
        "Replay payment events into per-client balances.",
        "Amounts may have at most AMOUNT_DECIMALS fractional digits",
        "(default 4); longer deposits and withdrawals are rejected.",
      ].join("\n"),
    )
    .version("0.1.0")
    .argument("<input-file>", "CSV file with columns type,client,tx,amount")
    .option("-v, --verbose", "report rejected records on stderr", false);
}
