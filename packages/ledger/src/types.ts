/**
 * @ledgerline/ledger — Internal types for the ledger engine.
 *
 * Rules:
 * - Fail-closed: illegal events throw, never silently succeed
 * - A thrown error leaves balances and store untouched
 */

import type {
  AccountBalance,
  ClientId,
  PaymentEvent,
  PaymentRecord,
  TxId,
} from "@ledgerline/types";
import type { TransactionStore } from "./transaction-store.js";

// ─── Defaults ────────────────────────────────────────────────────────────

/** Decimal places used when no scale is configured. */
export const DEFAULT_DECIMALS = 4;

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for records that cannot become a PaymentEvent. */
export type EventValidationErrorCode =
  | "UNKNOWN_EVENT_TYPE"
  | "MISSING_AMOUNT"
  | "INVALID_AMOUNT";

/**
 * A record rejected by the event validator.
 */
export class EventValidationError extends Error {
  public readonly code: EventValidationErrorCode;

  constructor(code: EventValidationErrorCode, message: string) {
    super(message);
    this.name = "EventValidationError";
    this.code = code;
  }
}

/** Error codes for events the ledger refuses to apply. */
export type LedgerErrorCode =
  | "DUPLICATE_TRANSACTION"
  | "INSUFFICIENT_FUNDS"
  | "TRANSACTION_NOT_FOUND"
  | "TRANSACTION_NOT_DISPUTED"
  | "TRANSACTION_ALREADY_DISPUTED"
  | "TRANSACTION_NOT_DISPUTABLE"
  | "ACCOUNT_FROZEN";

/**
 * Structured error from the ledger engine.
 * Carries the client and transaction the refused event addressed.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;
  public readonly clientId: ClientId;
  public readonly txId: TxId;

  constructor(
    code: LedgerErrorCode,
    message: string,
    clientId: ClientId,
    txId: TxId,
  ) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
    this.clientId = clientId;
    this.txId = txId;
  }
}

/** Error codes for transaction store writes. */
export type TransactionStoreErrorCode = "OWNERSHIP_CONFLICT";

/**
 * Structured error from a transaction store.
 */
export class TransactionStoreError extends Error {
  public readonly code: TransactionStoreErrorCode;
  public readonly txId: TxId;

  constructor(code: TransactionStoreErrorCode, message: string, txId: TxId) {
    super(message);
    this.name = "TransactionStoreError";
    this.code = code;
    this.txId = txId;
  }
}

// ─── Validation Types ────────────────────────────────────────────────────

/**
 * Options for turning a record into an event.
 */
export interface ValidateOptions {
  /** Decimal places amounts are scaled by. Defaults to DEFAULT_DECIMALS. */
  readonly decimals?: number | undefined;
}

/**
 * Non-throwing validation result.
 */
export type ValidationResult =
  | { readonly ok: true; readonly event: PaymentEvent }
  | { readonly ok: false; readonly error: EventValidationError };

// ─── Engine Types ────────────────────────────────────────────────────────

/**
 * A record the engine refused, with the reason.
 */
export interface Rejection {
  readonly record: PaymentRecord;
  readonly error: EventValidationError | LedgerError;
}

/**
 * Outcome of submitting one record to the engine.
 */
export type ProcessOutcome =
  | { readonly status: "applied"; readonly event: PaymentEvent; readonly balance: AccountBalance }
  | { readonly status: "rejected"; readonly rejection: Rejection };

/**
 * Options for constructing a PaymentEngine.
 */
export interface PaymentEngineOptions {
  /** Shared transaction store. A fresh in-memory store when omitted. */
  readonly store?: TransactionStore | undefined;
  /** Decimal places amounts are scaled by. */
  readonly decimals?: number | undefined;
  /** Called once per refused record. */
  readonly onRejected?: ((rejection: Rejection) => void) | undefined;
}

/**
 * Running counters kept by the engine.
 */
export interface EngineStats {
  readonly received: number;
  readonly applied: number;
  readonly rejected: number;
}
