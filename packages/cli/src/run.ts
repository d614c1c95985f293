/**
 * @ledgerline/cli — One ledger run over an input file.
 *
 * Reads every record, applies it, writes the balance report.
 * Malformed rows and refused events are logged at warn and skipped;
 * applied events are logged at debug.
 */

import { PaymentEngine, describeEvent } from "@ledgerline/ledger";
import type { EngineStats, Rejection } from "@ledgerline/ledger";
import { readPaymentRecords } from "./csv-source.js";
import type { InvalidRow } from "./csv-source.js";
import type { Logger } from "./logger.js";
import { formatBalanceReport } from "./report.js";

export interface ReportSink {
  write(chunk: string): unknown;
}

export interface RunOptions {
  readonly inputFile: string;
  readonly decimals: number;
  readonly logger: Logger;
  readonly output: ReportSink;
}

export interface RunSummary extends EngineStats {
  readonly invalidRows: number;
  readonly clients: number;
  readonly transactions: number;
}

export async function runLedger(options: RunOptions): Promise<RunSummary> {
  const { inputFile, decimals, logger, output } = options;
  const log = logger.child({ inputFile });

  const engine = new PaymentEngine({
    decimals,
    onRejected: (rejection: Rejection) => {
      log.warn(
        {
          client: rejection.record.client,
          tx: rejection.record.tx,
          type: rejection.record.type,
          code: rejection.error.code,
        },
        rejection.error.message,
      );
    },
  });

  let invalidRows = 0;
  const onInvalidRow = (row: InvalidRow): void => {
    invalidRows++;
    log.warn({ line: row.line }, `Skipping malformed row: ${row.reason}`);
  };

  for await (const record of readPaymentRecords(inputFile, { onInvalidRow })) {
    const outcome = engine.submit(record);
    if (outcome.status === "applied") {
      log.debug(describeEvent(outcome.event, decimals));
    }
  }

  const balances = engine.balances();
  output.write(formatBalanceReport(balances, decimals));

  const summary: RunSummary = {
    ...engine.stats,
    invalidRows,
    clients: balances.length,
    transactions: engine.store.size,
  };
  log.info(summary, "Run complete");
  return summary;
}
