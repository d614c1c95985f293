/**
 * @ledgerline/ledger — Payment ledger engine.
 *
 * A pure TypeScript ledger with zero runtime dependencies.
 * Replays deposits, withdrawals and the dispute lifecycle into
 * per-client balances:
 * - Every record is validated before it reaches an account
 * - Transaction ids are unique across all clients
 * - Refused events change nothing
 * - A chargeback freezes the account for the rest of the run
 * - All monetary arithmetic uses bigint (no floating point)
 */

// Core engine
export { PaymentEngine } from "./payment-engine.js";
export { ClientAccount } from "./client-account.js";

// Transaction storage
export { InMemoryTransactionStore } from "./transaction-store.js";
export type { TransactionStore } from "./transaction-store.js";

// Event validation
export { toPaymentEvent, validateRecord, describeEvent } from "./events.js";

// Amount arithmetic
export {
  assertDecimals,
  parseAmount,
  formatAmount,
  isPositiveAmount,
} from "./amount.js";

// Types
export type {
  EventValidationErrorCode,
  LedgerErrorCode,
  TransactionStoreErrorCode,
  ValidateOptions,
  ValidationResult,
  Rejection,
  ProcessOutcome,
  PaymentEngineOptions,
  EngineStats,
} from "./types.js";

export {
  DEFAULT_DECIMALS,
  EventValidationError,
  LedgerError,
  TransactionStoreError,
} from "./types.js";
