/**
 * @ledgerline/ledger — Fixed-point amount arithmetic.
 *
 * Amounts are bigint values scaled by a number of decimal places.
 * One unit is 10^decimals; text is split into whole and fraction parts
 * and recombined with integer arithmetic only.
 *
 * Rules:
 * - No floating-point operations
 * - Amounts must be plain decimal strings (no exponent, no sign prefix "+")
 * - The scale is fixed per run; mixed scales are never combined
 */

import type { Amount } from "@ledgerline/types";
import { EventValidationError } from "./types.js";

const DECIMAL_PATTERN = /^(-?)(\d+)(?:\.(\d+))?$/;

/**
 * Assert the scale is a usable number of decimal places.
 */
export function assertDecimals(decimals: number): void {
  if (!Number.isInteger(decimals) || decimals < 0 || decimals > 18) {
    throw new RangeError(`Decimals must be an integer in [0, 18], got: ${String(decimals)}`);
  }
}

function unitOf(decimals: number): bigint {
  return 10n ** BigInt(decimals);
}

/**
 * Parse decimal text into a bigint scaled by decimals.
 *
 * "100.50" with decimals=4 → 1005000n
 * "2" with decimals=4 → 20000n
 * "-0.5" with decimals=1 → -5n
 */
export function parseAmount(amount: string, decimals: number): Amount {
  assertDecimals(decimals);
  const text = amount.trim();

  const match = DECIMAL_PATTERN.exec(text);
  if (match === null) {
    throw new EventValidationError("INVALID_AMOUNT", `Invalid amount format: "${text}"`);
  }

  const [, sign = "", whole = "0", fraction = ""] = match;
  if (fraction.length > decimals) {
    throw new EventValidationError(
      "INVALID_AMOUNT",
      `Amount "${text}" has ${String(fraction.length)} decimal places, but at most ${String(decimals)} are allowed`,
    );
  }

  const fractionUnits = fraction === "" ? 0n : BigInt(fraction) * unitOf(decimals - fraction.length);
  const units = BigInt(whole) * unitOf(decimals) + fractionUnits;
  return sign === "-" ? -units : units;
}

/**
 * Render a scaled bigint with exactly `decimals` places.
 *
 * 1005000n with decimals=4 → "100.5000"
 * -5n with decimals=1 → "-0.5"
 */
export function formatAmount(scaled: Amount, decimals: number): string {
  assertDecimals(decimals);
  const unit = unitOf(decimals);
  const sign = scaled < 0n ? "-" : "";
  const magnitude = scaled < 0n ? -scaled : scaled;

  const whole = (magnitude / unit).toString();
  if (decimals === 0) {
    return `${sign}${whole}`;
  }
  const fraction = (magnitude % unit).toString().padStart(decimals, "0");
  return `${sign}${whole}.${fraction}`;
}

/**
 * Check if an amount is strictly positive.
 */
export function isPositiveAmount(amount: Amount): boolean {
  return amount > 0n;
}
