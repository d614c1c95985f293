/**
 * Payment Event Types
 *
 * Rules:
 * - A PaymentRecord is untrusted and may be malformed
 * - A PaymentEvent is only built by the event validator
 * - Once built, a PaymentEvent is trusted by the ledger
 */

import type { ClientId, TxId } from "./ids.js";

/**
 * A fixed-point decimal amount, scaled by the configured number of decimal
 * places (e.g. "1.5" at 4 decimals is `15000n`).
 */
export type Amount = bigint;

/** The five recognized event type literals. */
export type PaymentEventType =
  | "deposit"
  | "withdrawal"
  | "dispute"
  | "resolve"
  | "chargeback";

/**
 * A raw payment row as delivered by an input source.
 */
export interface PaymentRecord {
  /** Event type text; only exact lowercase literals are recognized. */
  readonly type: string;
  readonly client: ClientId;
  readonly tx: TxId;
  /** Decimal text. Absent when the source column was empty. */
  readonly amount?: string | undefined;
}

/** Credit funds to a client. */
export interface DepositKind {
  readonly type: "deposit";
  readonly amount: Amount;
}

/** Debit funds from a client. */
export interface WithdrawalKind {
  readonly type: "withdrawal";
  readonly amount: Amount;
}

/** Contest a prior deposit, holding its funds. */
export interface DisputeKind {
  readonly type: "dispute";
}

/** Release the held funds of a contested deposit. */
export interface ResolveKind {
  readonly type: "resolve";
}

/** Reverse a contested deposit and freeze the account. */
export interface ChargebackKind {
  readonly type: "chargeback";
}

/**
 * Validated event payload, discriminated by `type`.
 * Only deposits and withdrawals carry an amount.
 */
export type EventKind =
  | DepositKind
  | WithdrawalKind
  | DisputeKind
  | ResolveKind
  | ChargebackKind;

/**
 * A validated payment event addressed to one client and one transaction.
 */
export interface PaymentEvent {
  readonly client: ClientId;
  readonly tx: TxId;
  readonly kind: EventKind;
}
