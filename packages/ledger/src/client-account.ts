/**
 * @ledgerline/ledger — Client account state machine.
 *
 * One ClientAccount per client id, created lazily and kept for the run.
 * Balances move only through apply(); every guard for an event is
 * checked before anything is written.
 *
 * Invariants after every successful apply():
 * - held = total - available >= 0
 * - locked never goes from true back to false
 * - nothing applies once locked
 */

import type {
  AccountBalance,
  Amount,
  ClientId,
  PaymentEvent,
  TxId,
  TxState,
} from "@ledgerline/types";
import type { TransactionStore } from "./transaction-store.js";
import { LedgerError, TransactionStoreError } from "./types.js";

export class ClientAccount {
  private readonly _id: ClientId;
  private readonly _store: TransactionStore;
  private _available: Amount = 0n;
  private _total: Amount = 0n;
  private _locked = false;

  constructor(id: ClientId, store: TransactionStore) {
    this._id = id;
    this._store = store;
  }

  get id(): ClientId {
    return this._id;
  }

  /** Funds the client may withdraw now. */
  get available(): Amount {
    return this._available;
  }

  /** Funds held under dispute. */
  get held(): Amount {
    return this._total - this._available;
  }

  get total(): Amount {
    return this._total;
  }

  /** Whether a chargeback has frozen the account. */
  get locked(): boolean {
    return this._locked;
  }

  balance(): AccountBalance {
    return {
      client: this._id,
      available: this._available,
      held: this.held,
      total: this._total,
      locked: this._locked,
    };
  }

  /**
   * Apply a validated event to this account.
   *
   * - deposit: the id must be new; credits available and total
   * - withdrawal: available must cover it and the id must be new; debits both
   * - dispute: the id must hold an undisputed deposit no larger than
   *   available; moves its amount from available to held
   * - resolve: the id must be disputed; moves its amount back to available
   * - chargeback: the id must be disputed; removes its amount from total and
   *   freezes the account
   *
   * Throws LedgerError on any refused event, leaving balances and store as
   * they were.
   */
  apply(event: PaymentEvent): void {
    const { tx, kind } = event;

    if (this._locked) {
      throw this._error("ACCOUNT_FROZEN", tx, `Account ${String(this._id)} is frozen`);
    }

    switch (kind.type) {
      case "deposit": {
        this._assertUnused(tx);
        this._write(tx, { status: "deposited", amount: kind.amount });
        this._available += kind.amount;
        this._total += kind.amount;
        return;
      }

      case "withdrawal": {
        if (kind.amount > this._available) {
          throw this._error("INSUFFICIENT_FUNDS", tx, "Insufficient available funds for withdrawal");
        }
        this._assertUnused(tx);
        this._write(tx, { status: "withdrawn", amount: kind.amount });
        this._available -= kind.amount;
        this._total -= kind.amount;
        return;
      }

      case "dispute": {
        const state = this._lookup(tx);
        if (state.status === "disputed") {
          throw this._error("TRANSACTION_ALREADY_DISPUTED", tx, `Transaction ${String(tx)} is already disputed`);
        }
        if (state.status === "withdrawn") {
          throw this._error("TRANSACTION_NOT_DISPUTABLE", tx, `Transaction ${String(tx)} is a withdrawal and cannot be disputed`);
        }
        if (state.amount > this._available) {
          throw this._error("INSUFFICIENT_FUNDS", tx, "Insufficient available funds to hold for dispute");
        }
        this._write(tx, { status: "disputed", amount: state.amount });
        this._available -= state.amount;
        return;
      }

      case "resolve": {
        const state = this._lookupDisputed(tx);
        this._write(tx, { status: "deposited", amount: state.amount });
        this._available += state.amount;
        return;
      }

      case "chargeback": {
        const state = this._lookupDisputed(tx);
        this._total -= state.amount;
        this._locked = true;
        return;
      }
    }
  }

  // ─── Guards ──────────────────────────────────────────────────────────

  private _assertUnused(tx: TxId): void {
    if (this._store.get(this._id, tx) !== undefined) {
      throw this._error("DUPLICATE_TRANSACTION", tx, `Transaction ${String(tx)} already exists`);
    }
  }

  private _lookup(tx: TxId): TxState {
    const state = this._store.get(this._id, tx);
    if (state === undefined) {
      throw this._notFound(tx);
    }
    return state;
  }

  private _lookupDisputed(tx: TxId): TxState {
    const state = this._lookup(tx);
    if (state.status !== "disputed") {
      throw this._error("TRANSACTION_NOT_DISPUTED", tx, `Transaction ${String(tx)} is not disputed`);
    }
    return state;
  }

  /**
   * Write to the store. Runs before any balance change so a conflict
   * leaves the account untouched.
   */
  private _write(tx: TxId, state: TxState): void {
    try {
      this._store.upsert(this._id, tx, state);
    } catch (err) {
      // Another client's id is indistinguishable from a missing one.
      if (err instanceof TransactionStoreError && err.code === "OWNERSHIP_CONFLICT") {
        throw this._notFound(tx);
      }
      throw err;
    }
  }

  private _notFound(tx: TxId): LedgerError {
    return this._error(
      "TRANSACTION_NOT_FOUND",
      tx,
      `Transaction ${String(tx)} not found for client ${String(this._id)}`,
    );
  }

  private _error(code: LedgerError["code"], tx: TxId, message: string): LedgerError {
    return new LedgerError(code, message, this._id, tx);
  }
}
