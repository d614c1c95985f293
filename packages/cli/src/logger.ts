/**
 * @ledgerline/cli — Structured logging.
 *
 * pino, always on stderr: stdout carries the balance report.
 */

import pino from "pino";
import type { DestinationStream, Logger } from "pino";
import type { LogLevel } from "./config.js";

export type { Logger } from "pino";

export interface LoggerOptions {
  readonly level: LogLevel;
  /** Human-readable output through pino-pretty. */
  readonly pretty?: boolean | undefined;
  /** Overrides stderr; ignored when `pretty` is set. */
  readonly destination?: DestinationStream | undefined;
}

const SEVERITY: Readonly<Record<LogLevel, number>> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
  silent: Number.POSITIVE_INFINITY,
};

/**
 * Level to run at. `--verbose` lowers anything quieter than `info`
 * to `info` so rejected records and the run summary are shown.
 */
export function resolveLogLevel(configured: LogLevel, verbose: boolean): LogLevel {
  if (verbose && SEVERITY[configured] > SEVERITY.info) {
    return "info";
  }
  return configured;
}

export function createLogger(options: LoggerOptions): Logger {
  if (options.pretty === true) {
    return pino({
      level: options.level,
      transport: { target: "pino-pretty", options: { destination: 2 } },
    });
  }
  return pino({ level: options.level }, options.destination ?? pino.destination(2));
}
