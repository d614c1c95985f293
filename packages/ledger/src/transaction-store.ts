/**
 * @ledgerline/ledger — Transaction store.
 *
 * The authoritative record of every transaction id seen in a run.
 * Each id is bound to the client that created it, permanently.
 *
 * Rules:
 * - Transaction ids are unique across all clients
 * - A client never observes another client's transaction
 * - Entries are overwritten in place, never removed
 */

import type { ClientId, TxId, TxState } from "@ledgerline/types";
import { TransactionStoreError } from "./types.js";

/**
 * Capability interface over a transaction store.
 *
 * Any backing that honours this contract is substitutable. `get` and
 * `upsert` on the same id must be linearizable: the store is what stops
 * two clients from claiming one id.
 */
export interface TransactionStore {
  /**
   * Returns the state of `txId` if it exists and is owned by `clientId`.
   * An id owned by another client is reported as absent.
   */
  get(clientId: ClientId, txId: TxId): TxState | undefined;

  /**
   * Creates `txId` bound to `clientId`, or overwrites its state when
   * `clientId` already owns it.
   *
   * @throws {TransactionStoreError} OWNERSHIP_CONFLICT, with no mutation,
   *   when the id is owned by another client
   */
  upsert(clientId: ClientId, txId: TxId, state: TxState): void;

  /** Number of transaction ids tracked. */
  readonly size: number;
}

interface StoredTransaction {
  readonly owner: ClientId;
  state: TxState;
}

/**
 * In-memory transaction store backed by a single Map keyed by id.
 *
 * Every method is synchronous, so each call (and any sequence of calls
 * made without yielding) completes before another client's work runs.
 * One instance is shared by every ClientAccount in a run.
 */
export class InMemoryTransactionStore implements TransactionStore {
  private readonly _transactions = new Map<TxId, StoredTransaction>();

  get(clientId: ClientId, txId: TxId): TxState | undefined {
    const stored = this._transactions.get(txId);
    if (stored === undefined || stored.owner !== clientId) {
      return undefined;
    }
    return stored.state;
  }

  upsert(clientId: ClientId, txId: TxId, state: TxState): void {
    const stored = this._transactions.get(txId);

    if (stored === undefined) {
      this._transactions.set(txId, { owner: clientId, state: { ...state } });
      return;
    }

    if (stored.owner !== clientId) {
      throw new TransactionStoreError(
        "OWNERSHIP_CONFLICT",
        `Transaction ${String(txId)} is owned by another client`,
        txId,
      );
    }

    stored.state = { ...state };
  }

  get size(): number {
    return this._transactions.size;
  }
}
