/**
 * @ledgerline/cli — CSV payment record source.
 *
 * Streams `type,client,tx,amount` rows from a file and turns each into
 * a PaymentRecord. Rows that do not fit the shape are reported and
 * skipped; the rest of the file is still read.
 *
 * Accepted input:
 * - surrounding whitespace in any field
 * - a UTF-8 byte order mark
 * - empty lines
 * - rows without the trailing amount column
 *
 * Rows csv-parse cannot tokenize (a stray quote, for instance) are
 * skipped and reported like any other malformed row.
 */

import { createReadStream } from "node:fs";
import { parse } from "csv-parse";
import type { CsvError } from "csv-parse";
import { z } from "zod";
import { MAX_CLIENT_ID, MAX_TX_ID } from "@ledgerline/types";
import type { PaymentRecord } from "@ledgerline/types";

// =============================================================================
// Row Schema
// =============================================================================

export const REQUIRED_COLUMNS = ["type", "client", "tx", "amount"] as const;

function unsignedId(max: number) {
  return z
    .string()
    .regex(/^\d+$/, "must be an unsigned integer")
    .transform(Number)
    .pipe(z.number().int().max(max, `must be at most ${String(max)}`));
}

export const PaymentRowSchema = z.object({
  type: z.string(),
  client: unsignedId(MAX_CLIENT_ID),
  tx: unsignedId(MAX_TX_ID),
  amount: z
    .string()
    .optional()
    .transform((value) => (value === undefined || value === "" ? undefined : value)),
});

/** Shape csv-parse yields with `info: true`. */
const ParsedChunkSchema = z.object({
  record: z.record(z.string(), z.string().optional()),
  info: z.object({ lines: z.number() }),
});

// =============================================================================
// Errors
// =============================================================================

/**
 * The file cannot be read as payment records at all.
 */
export class InputFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InputFormatError";
  }
}

/**
 * A row skipped because it does not fit the record shape.
 */
export interface InvalidRow {
  /** 1-based line number in the file. */
  readonly line: number;
  readonly reason: string;
}

export interface ReadOptions {
  readonly onInvalidRow?: ((row: InvalidRow) => void) | undefined;
}

// =============================================================================
// Reader
// =============================================================================

function checkHeader(header: string[]): string[] {
  const missing = REQUIRED_COLUMNS.filter(
    (column) => column !== "amount" && !header.includes(column),
  );
  if (missing.length > 0) {
    throw new InputFormatError(
      `Missing column(s) ${missing.join(", ")}; expected header ${REQUIRED_COLUMNS.join(",")}`,
    );
  }
  return header;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    .join("; ");
}

/**
 * Parse a single CSV row into a PaymentRecord.
 */
export function toPaymentRecord(
  row: Readonly<Record<string, string | undefined>>,
): { ok: true; record: PaymentRecord } | { ok: false; reason: string } {
  const result = PaymentRowSchema.safeParse(row);
  if (!result.success) {
    return { ok: false, reason: describeIssues(result.error) };
  }
  const { type, client, tx, amount } = result.data;
  return {
    ok: true,
    record: amount === undefined ? { type, client, tx } : { type, client, tx, amount },
  };
}

/**
 * Stream PaymentRecords from a CSV file, in file order.
 *
 * @throws {InputFormatError} when the header lacks a required column
 */
export async function* readPaymentRecords(
  filePath: string,
  options?: ReadOptions,
): AsyncGenerator<PaymentRecord> {
  const parser = parse({
    bom: true,
    columns: checkHeader,
    info: true,
    relax_column_count: true,
    skip_empty_lines: true,
    skip_records_with_error: true,
    trim: true,
  });
  parser.on("skip", (err: CsvError) => {
    const line: unknown = err["lines"];
    options?.onInvalidRow?.({
      line: typeof line === "number" ? line : 0,
      reason: err.message,
    });
  });
  const input = createReadStream(filePath);
  // pipe() does not forward read errors (e.g. ENOENT) to the parser.
  input.on("error", (err) => parser.destroy(err));
  input.pipe(parser);

  const chunks: AsyncIterable<unknown> = parser;

  for await (const chunk of chunks) {
    const { record: row, info } = ParsedChunkSchema.parse(chunk);
    const result = toPaymentRecord(row);
    if (result.ok) {
      yield result.record;
    } else {
      options?.onInvalidRow?.({ line: info.lines, reason: result.reason });
    }
  }
}
