import { BigNumber } from 'bignumber.js';

import type { Amount } from './types.js';

const UNSIGNED_DECIMAL = /^[0-9]+(\.[0-9]+)?$/;

/**
 * Try to parse the given value into BigNumber.js BigNumber
 * @param value The value to parse.
 * @returns Parsed value in BigNumber.js BigNumber type.
 */
export function tryParseAmount(
  value: BigNumber.Value | null | undefined,
): BigNumber | null {
  try {
    if (value === null || value === undefined || value === '') return null;
    const parsed = BigNumber(value);
    if (!parsed || parsed.isNaN() || !parsed.isFinite()) return null;
    else return parsed;
  } catch {
    return null;
  }
}

/**
 * Parses an unsigned decimal string into integer minor units.
 * The value may carry a fractional part only if that part is zero.
 * @returns the amount, or null if the string is signed, fractional or not a number
 */
export function parseUnsignedAmount(value: string): Amount | null {
  const trimmed = value.trim();
  if (!UNSIGNED_DECIMAL.test(trimmed)) return null;
  const parsed = tryParseAmount(trimmed);
  if (!parsed || !parsed.isInteger()) return null;
  return BigInt(parsed.toFixed(0));
}

export function formatAmount(amount: Amount): string {
  return amount.toString(10);
}

export function isPositiveAmount(amount: Amount): boolean {
  return amount > 0n;
}
