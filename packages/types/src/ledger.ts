/**
 * Ledger State Types
 *
 * The authoritative record of each transaction, and the balance
 * read-out of each client.
 */

import type { ClientId } from "./ids.js";
import type { Amount } from "./payment.js";

/**
 * Per-transaction state held by a transaction store.
 *
 * Transitions:
 * - created as `deposited` (deposit) or `withdrawn` (withdrawal)
 * - `deposited` → `disputed` on dispute
 * - `disputed` → `deposited` on resolve
 *
 * `withdrawn` is terminal. A chargeback leaves the transaction `disputed`.
 */
export type TxStatus = "deposited" | "disputed" | "withdrawn";

export interface TxState {
  readonly status: TxStatus;
  /** Amount of the originating deposit or withdrawal. */
  readonly amount: Amount;
}

/**
 * Balance read-out of a single client.
 * `held` is derived (`total - available`) at read time.
 */
export interface AccountBalance {
  readonly client: ClientId;
  readonly available: Amount;
  readonly held: Amount;
  readonly total: Amount;
  readonly locked: boolean;
}
