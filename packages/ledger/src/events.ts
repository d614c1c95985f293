/**
 * @ledgerline/ledger — Event validator.
 *
 * The only gate between untrusted PaymentRecords and the ledger.
 * A PaymentEvent is built here or not at all.
 */

import type { Amount, EventKind, PaymentEvent, PaymentRecord } from "@ledgerline/types";
import { formatAmount, isPositiveAmount, parseAmount } from "./amount.js";
import {
  DEFAULT_DECIMALS,
  EventValidationError,
  type ValidateOptions,
  type ValidationResult,
} from "./types.js";

/**
 * Parse the amount a deposit or withdrawal requires.
 * Blank text counts as absent.
 */
function requireAmount(record: PaymentRecord, decimals: number): Amount {
  if (record.amount === undefined || record.amount.trim() === "") {
    throw new EventValidationError(
      "MISSING_AMOUNT",
      `${record.type} requires an amount (client ${String(record.client)}, transaction ${String(record.tx)})`,
    );
  }

  const amount = parseAmount(record.amount, decimals);
  if (!isPositiveAmount(amount)) {
    throw new EventValidationError(
      "INVALID_AMOUNT",
      `${record.type} amount must be positive, got "${record.amount.trim()}"`,
    );
  }
  return amount;
}

function toKind(record: PaymentRecord, decimals: number): EventKind {
  switch (record.type) {
    case "deposit":
      return { type: "deposit", amount: requireAmount(record, decimals) };
    case "withdrawal":
      return { type: "withdrawal", amount: requireAmount(record, decimals) };
    // Amounts on these three are ignored, not validated.
    case "dispute":
      return { type: "dispute" };
    case "resolve":
      return { type: "resolve" };
    case "chargeback":
      return { type: "chargeback" };
    default:
      throw new EventValidationError(
        "UNKNOWN_EVENT_TYPE",
        `Unknown event type: ${JSON.stringify(record.type)}`,
      );
  }
}

/**
 * Build a PaymentEvent from an untrusted record.
 *
 * Throws EventValidationError:
 * - UNKNOWN_EVENT_TYPE when `type` is not one of the five exact literals
 * - MISSING_AMOUNT when a deposit or withdrawal has no amount
 * - INVALID_AMOUNT when that amount is malformed, too precise, or not positive
 */
export function toPaymentEvent(
  record: PaymentRecord,
  options?: ValidateOptions,
): PaymentEvent {
  const decimals = options?.decimals ?? DEFAULT_DECIMALS;
  return {
    client: record.client,
    tx: record.tx,
    kind: toKind(record, decimals),
  };
}

/**
 * Non-throwing form of toPaymentEvent.
 * Errors other than EventValidationError still propagate.
 */
export function validateRecord(
  record: PaymentRecord,
  options?: ValidateOptions,
): ValidationResult {
  try {
    return { ok: true, event: toPaymentEvent(record, options) };
  } catch (err) {
    if (err instanceof EventValidationError) {
      return { ok: false, error: err };
    }
    throw err;
  }
}

/**
 * Render an event for log lines.
 *
 * "deposit 1.0000 for client 1337 with transaction 1"
 */
export function describeEvent(event: PaymentEvent, decimals: number = DEFAULT_DECIMALS): string {
  const { kind } = event;
  const head =
    kind.type === "deposit" || kind.type === "withdrawal"
      ? `${kind.type} ${formatAmount(kind.amount, decimals)}`
      : kind.type;
  return `${head} for client ${String(event.client)} with transaction ${String(event.tx)}`;
}
