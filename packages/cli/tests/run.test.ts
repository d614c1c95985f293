/**
 * Tests for run.ts — a full ledger run over a CSV file.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { createLogger } from "../src/logger.js";
import type { LogLevel } from "../src/config.js";
import { runLedger } from "../src/run.js";

// =============================================================================
// Helpers
// =============================================================================

let testDir: string;

beforeEach(() => {
  testDir = mkdtempSync(join(tmpdir(), "ledgerline-run-"));
});

afterEach(() => {
  rmSync(testDir, { recursive: true, force: true });
});

function writeCsv(content: string): string {
  const path = join(testDir, "events.csv");
  writeFileSync(path, content, "utf-8");
  return path;
}

function harness(level: LogLevel = "warn") {
  const logLines: string[] = [];
  const chunks: string[] = [];
  const logger = createLogger({
    level,
    destination: { write: (msg: string) => void logLines.push(msg) },
  });
  return {
    logger,
    output: { write: (chunk: string) => chunks.push(chunk) },
    report: () => chunks.join(""),
    logs: () => logLines.map((line): unknown => JSON.parse(line)),
  };
}

// =============================================================================
// Tests
// =============================================================================

describe("runLedger", () => {
  it("prints final balances for every client", async () => {
    const inputFile = writeCsv(
      "type,client,tx,amount\n" +
        "deposit,1,1,1.0\n" +
        "deposit,2,2,2.0\n" +
        "deposit,1,3,2.0\n" +
        "withdrawal,1,4,1.5\n" +
        "withdrawal,2,5,3.0\n",
    );
    const h = harness();

    const summary = await runLedger({ inputFile, decimals: 4, logger: h.logger, output: h.output });

    expect(h.report()).toBe(
      "client,available,held,total,locked\n" +
        "1,1.5000,0.0000,1.5000,false\n" +
        "2,2.0000,0.0000,2.0000,false\n",
    );
    expect(summary).toEqual({
      received: 5,
      applied: 4,
      rejected: 1,
      invalidRows: 0,
      clients: 2,
      transactions: 4,
    });
  });

  it("runs the dispute lifecycle through to a frozen account", async () => {
    const inputFile = writeCsv(
      "type, client, tx, amount\n" +
        "deposit, 1, 1, 5.0\n" +
        "deposit, 1, 2, 6.0\n" +
        "dispute, 1, 1,\n" +
        "withdrawal, 1, 3, 5.0\n" +
        "chargeback, 1, 1,\n" +
        "deposit, 1, 4, 100.0\n" +
        "deposit, 2, 5, 10.0\n" +
        "dispute, 2, 5\n" +
        "resolve, 2, 5\n",
    );
    const h = harness();

    await runLedger({ inputFile, decimals: 4, logger: h.logger, output: h.output });

    expect(h.report()).toBe(
      "client,available,held,total,locked\n" +
        "1,1.0000,0.0000,1.0000,true\n" +
        "2,10.0000,0.0000,10.0000,false\n",
    );
  });

  it("logs refused events with client, transaction and code", async () => {
    const inputFile = writeCsv(
      "type,client,tx,amount\n" +
        "deposit,1,1,10.0\n" +
        "dispute,2,1,\n",
    );
    const h = harness();

    await runLedger({ inputFile, decimals: 4, logger: h.logger, output: h.output });

    expect(h.logs()).toHaveLength(1);
    expect(h.logs()[0]).toMatchObject({
      level: 40,
      inputFile,
      client: 2,
      tx: 1,
      type: "dispute",
      code: "TRANSACTION_NOT_FOUND",
      msg: "Transaction 1 not found for client 2",
    });
  });

  it("logs and skips malformed rows", async () => {
    const inputFile = writeCsv(
      "type,client,tx,amount\n" +
        "deposit,1,1,1.0\n" +
        "deposit,99999,2,1.0\n" +
        "deposit,1,3\n",
    );
    const h = harness();

    const summary = await runLedger({ inputFile, decimals: 4, logger: h.logger, output: h.output });

    expect(summary.invalidRows).toBe(1);
    expect(summary.rejected).toBe(1);
    expect(h.logs()).toEqual([
      expect.objectContaining({
        line: 3,
        msg: "Skipping malformed row: client: must be at most 65535",
      }),
      expect.objectContaining({ code: "MISSING_AMOUNT", client: 1, tx: 3 }),
    ]);
    expect(h.report()).toBe(
      "client,available,held,total,locked\n" +
        "1,1.0000,0.0000,1.0000,false\n",
    );
  });

  it("logs a summary at info", async () => {
    const inputFile = writeCsv("type,client,tx,amount\ndeposit,1,1,1.0\n");
    const h = harness("info");

    await runLedger({ inputFile, decimals: 4, logger: h.logger, output: h.output });

    expect(h.logs()).toEqual([
      expect.objectContaining({
        level: 30,
        msg: "Run complete",
        received: 1,
        applied: 1,
        rejected: 0,
        invalidRows: 0,
        clients: 1,
        transactions: 1,
      }),
    ]);
  });

  it("keeps going past a row with a stray quote", async () => {
    const inputFile = writeCsv(
      "type,client,tx,amount\n" +
        "deposit,1,1,1.0\n" +
        'depo"sit,1,2,1.0\n' +
        "deposit,1,3,2.0\n",
    );
    const h = harness();

    const summary = await runLedger({ inputFile, decimals: 4, logger: h.logger, output: h.output });

    expect(h.report()).toBe(
      "client,available,held,total,locked\n" +
        "1,3.0000,0.0000,3.0000,false\n",
    );
    expect(summary.invalidRows).toBe(1);
    expect(summary.applied).toBe(2);
    expect(h.logs()).toEqual([expect.objectContaining({ level: 40, line: 3 })]);
  });

  it("describes each applied event at debug", async () => {
    const inputFile = writeCsv(
      "type,client,tx,amount\n" +
        "deposit,7,1,2.5\n" +
        "dispute,7,1,\n" +
        "withdrawal,7,2,1.0\n",
    );
    const h = harness("debug");

    await runLedger({ inputFile, decimals: 4, logger: h.logger, output: h.output });

    const debugLines = h
      .logs()
      .filter((entry) => typeof entry === "object" && entry !== null && "level" in entry && entry.level === 20);
    expect(debugLines).toEqual([
      expect.objectContaining({ msg: "deposit 2.5000 for client 7 with transaction 1" }),
      expect.objectContaining({ msg: "dispute for client 7 with transaction 1" }),
    ]);
  });

  it("uses the configured scale for parsing and printing", async () => {
    const inputFile = writeCsv("type,client,tx,amount\ndeposit,1,1,1.25\ndeposit,1,2,0.125\n");
    const h = harness();

    const summary = await runLedger({ inputFile, decimals: 2, logger: h.logger, output: h.output });

    expect(summary.rejected).toBe(1);
    expect(h.report()).toBe("client,available,held,total,locked\n1,1.25,0.00,1.25,false\n");
  });

  it("fails without writing a report when the file is missing", async () => {
    const h = harness();
    await expect(
      runLedger({ inputFile: join(testDir, "absent.csv"), decimals: 4, logger: h.logger, output: h.output }),
    ).rejects.toThrow("ENOENT");
    expect(h.report()).toBe("");
  });
});
