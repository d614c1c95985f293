/**
 * Identifier Types
 *
 * Clients and transactions are addressed by unsigned integers.
 * The ranges are fixed by the input format, not by the ledger.
 */

/** Largest client id: 16-bit unsigned. */
export const MAX_CLIENT_ID = 0xffff;

/** Largest transaction id: 32-bit unsigned. */
export const MAX_TX_ID = 0xffff_ffff;

/** A client (account holder) identifier in `[0, 65535]`. */
export type ClientId = number;

/** A transaction identifier in `[0, 4294967295]`, unique across all clients. */
export type TxId = number;
