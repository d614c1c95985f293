/**
 * @ledgerline/types — Shared domain types for the ledgerline stack.
 *
 * - Client and transaction identifiers
 * - Raw payment records and validated payment events
 * - Transaction states and account balances
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types; meaning lives in consuming code
 */

// Identifiers
export type { ClientId, TxId } from "./ids.js";
export { MAX_CLIENT_ID, MAX_TX_ID } from "./ids.js";

// Payment types
export type {
  Amount,
  PaymentEventType,
  PaymentRecord,
  DepositKind,
  WithdrawalKind,
  DisputeKind,
  ResolveKind,
  ChargebackKind,
  EventKind,
  PaymentEvent,
} from "./payment.js";

// Ledger types
export type { TxStatus, TxState, AccountBalance } from "./ledger.js";
