/**
 * @ledgerline/cli — Balance report.
 *
 * One CSV line per client: `client,available,held,total,locked`.
 */

import type { AccountBalance } from "@ledgerline/types";
import { formatAmount } from "@ledgerline/ledger";

export const REPORT_HEADER = "client,available,held,total,locked";

export function formatBalanceRow(balance: AccountBalance, decimals: number): string {
  return [
    String(balance.client),
    formatAmount(balance.available, decimals),
    formatAmount(balance.held, decimals),
    formatAmount(balance.total, decimals),
    String(balance.locked),
  ].join(",");
}

/**
 * Header plus one row per balance, newline-terminated.
 */
export function formatBalanceReport(
  balances: readonly AccountBalance[],
  decimals: number,
): string {
  const lines = [REPORT_HEADER, ...balances.map((b) => formatBalanceRow(b, decimals))];
  return `${lines.join("\n")}\n`;
}
