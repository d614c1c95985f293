#!/usr/bin/env node
/**
 * @ledgerline/cli — Entry point.
 *
 * Usage: ledgerline <input-file> [--verbose]
 *
 * Prints `client,available,held,total,locked` to stdout.
 * Logs go to stderr; LOG_LEVEL, NODE_ENV and AMOUNT_DECIMALS are read
 * from the environment.
 */

import type { Command } from "commander";
import { loadConfig } from "./config.js";
import { createLogger, resolveLogLevel } from "./logger.js";
import { createProgram } from "./program.js";
import type { CliOptions } from "./program.js";
import { runLedger } from "./run.js";

async function main(argv: readonly string[]): Promise<void> {
  const program: Command = createProgram();
  program.parse([...argv]);
  const [inputFile] = program.args;
  const { verbose } = program.opts<CliOptions>();
  if (inputFile === undefined) {
    program.help({ error: true });
  }

  const config = loadConfig();
  const logger = createLogger({
    level: resolveLogLevel(config.LOG_LEVEL, verbose),
    pretty: config.NODE_ENV === "development",
  });

  try {
    await runLedger({
      inputFile,
      decimals: config.AMOUNT_DECIMALS,
      logger,
      output: process.stdout,
    });
  } catch (err) {
    logger.fatal({ err, inputFile }, "Run failed");
    process.exitCode = 1;
  }
}

main(process.argv).catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
