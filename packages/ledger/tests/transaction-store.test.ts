/**
 * Tests for InMemoryTransactionStore.
 *
 * Verifies:
 * - get: owned, foreign and missing ids
 * - upsert: create, overwrite by owner, ownership conflict
 * - Stored state is isolated from caller objects
 */

import { describe, it, expect } from "vitest";
import type { TxState } from "@ledgerline/types";
import { InMemoryTransactionStore } from "../src/transaction-store.js";
import { TransactionStoreError } from "../src/types.js";

const DEPOSITED: TxState = { status: "deposited", amount: 100_000n };
const DISPUTED: TxState = { status: "disputed", amount: 100_000n };

describe("get", () => {
  it("returns undefined for an unknown id", () => {
    const store = new InMemoryTransactionStore();
    expect(store.get(1, 1)).toBeUndefined();
  });

  it("returns the state to its owner", () => {
    const store = new InMemoryTransactionStore();
    store.upsert(1, 10, DEPOSITED);
    expect(store.get(1, 10)).toEqual(DEPOSITED);
  });

  it("hides an id from every other client", () => {
    const store = new InMemoryTransactionStore();
    store.upsert(1, 10, DEPOSITED);
    expect(store.get(2, 10)).toBeUndefined();
    expect(store.get(0, 10)).toBeUndefined();
  });
});

describe("upsert", () => {
  it("overwrites the state for the same owner", () => {
    const store = new InMemoryTransactionStore();
    store.upsert(1, 10, DEPOSITED);
    store.upsert(1, 10, DISPUTED);
    expect(store.get(1, 10)).toEqual(DISPUTED);
    expect(store.size).toBe(1);
  });

  it("throws OWNERSHIP_CONFLICT for a foreign id", () => {
    const store = new InMemoryTransactionStore();
    store.upsert(1, 10, DEPOSITED);

    let caught: unknown;
    try {
      store.upsert(2, 10, DISPUTED);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(TransactionStoreError);
    expect(caught).toMatchObject({ code: "OWNERSHIP_CONFLICT", txId: 10 });
  });

  it("leaves the entry untouched on conflict", () => {
    const store = new InMemoryTransactionStore();
    store.upsert(1, 10, DEPOSITED);
    expect(() => store.upsert(2, 10, DISPUTED)).toThrow(TransactionStoreError);
    expect(store.get(1, 10)).toEqual(DEPOSITED);
    expect(store.get(2, 10)).toBeUndefined();
  });

  it("keeps ids unique across clients", () => {
    const store = new InMemoryTransactionStore();
    store.upsert(1, 10, DEPOSITED);
    store.upsert(2, 11, DEPOSITED);
    expect(store.size).toBe(2);
  });

  it("copies the state it is given", () => {
    const store = new InMemoryTransactionStore();
    const state = { status: "deposited" as const, amount: 5n };
    store.upsert(1, 1, state);
    state.amount = 999n;
    expect(store.get(1, 1)).toEqual({ status: "deposited", amount: 5n });
  });
});
