/**
 * @ledgerline/ledger — Payment engine.
 *
 * Drives records through validation and into client accounts.
 * Accounts are created on first reference and share one transaction
 * store, so transaction ids stay unique across every client.
 *
 * Refused records are reported and counted; they never stop the run.
 */

import type { AccountBalance, ClientId, PaymentEvent, PaymentRecord } from "@ledgerline/types";
import { assertDecimals } from "./amount.js";
import { ClientAccount } from "./client-account.js";
import { validateRecord } from "./events.js";
import { InMemoryTransactionStore } from "./transaction-store.js";
import type { TransactionStore } from "./transaction-store.js";
import type {
  EngineStats,
  PaymentEngineOptions,
  ProcessOutcome,
  Rejection,
} from "./types.js";
import { DEFAULT_DECIMALS, LedgerError } from "./types.js";

export class PaymentEngine {
  private readonly _store: TransactionStore;
  private readonly _decimals: number;
  private readonly _onRejected: ((rejection: Rejection) => void) | undefined;
  private readonly _accounts = new Map<ClientId, ClientAccount>();
  private _received = 0;
  private _applied = 0;
  private _rejected = 0;

  constructor(options?: PaymentEngineOptions) {
    this._decimals = options?.decimals ?? DEFAULT_DECIMALS;
    assertDecimals(this._decimals);
    this._store = options?.store ?? new InMemoryTransactionStore();
    this._onRejected = options?.onRejected;
  }

  /** Decimal places amounts are scaled by. */
  get decimals(): number {
    return this._decimals;
  }

  get store(): TransactionStore {
    return this._store;
  }

  get stats(): EngineStats {
    return {
      received: this._received,
      applied: this._applied,
      rejected: this._rejected,
    };
  }

  /**
   * Validate a record and apply it to its client.
   *
   * Validation and ledger errors become a rejected outcome; anything
   * else propagates.
   */
  submit(record: PaymentRecord): ProcessOutcome {
    this._received++;

    const result = validateRecord(record, { decimals: this._decimals });
    if (!result.ok) {
      return this._reject({ record, error: result.error });
    }

    try {
      const balance = this.apply(result.event);
      this._applied++;
      return { status: "applied", event: result.event, balance };
    } catch (err) {
      if (err instanceof LedgerError) {
        return this._reject({ record, error: err });
      }
      throw err;
    }
  }

  /**
   * Apply an already-validated event, creating its client if needed.
   * Throws LedgerError when the event is refused.
   */
  apply(event: PaymentEvent): AccountBalance {
    const account = this._accountFor(event.client);
    account.apply(event);
    return account.balance();
  }

  account(clientId: ClientId): ClientAccount | undefined {
    return this._accounts.get(clientId);
  }

  /**
   * Balances of every client seen, ascending by client id.
   */
  balances(): readonly AccountBalance[] {
    return [...this._accounts.values()]
      .sort((a, b) => a.id - b.id)
      .map((account) => account.balance());
  }

  private _accountFor(clientId: ClientId): ClientAccount {
    let account = this._accounts.get(clientId);
    if (account === undefined) {
      account = new ClientAccount(clientId, this._store);
      this._accounts.set(clientId, account);
    }
    return account;
  }

  private _reject(rejection: Rejection): ProcessOutcome {
    this._rejected++;
    this._onRejected?.(rejection);
    return { status: "rejected", rejection };
  }
}
