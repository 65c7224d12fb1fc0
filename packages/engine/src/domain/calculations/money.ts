/**
 * Currency arithmetic helpers
 *
 * Amounts travel as two-decimal numbers but every sum is taken in integer
 * cents so that repeated additions never drift.
 */

import { FINANCIAL_CONFIG } from '@chipledger/shared';

const CENTS_PER_UNIT = 10 ** FINANCIAL_CONFIG.CURRENCY_DECIMALS;

/** Tolerance expressed in cents (1) */
export const EPSILON_CENTS = Math.round(FINANCIAL_CONFIG.EPSILON * CENTS_PER_UNIT);

export function toCents(amount: number): number {
  return Math.round(amount * CENTS_PER_UNIT);
}

export function fromCents(cents: number): number {
  // Normalize -0 so results compare cleanly with toBe(0)
  return cents / CENTS_PER_UNIT + 0;
}

export function roundToCurrency(amount: number): number {
  return fromCents(toCents(amount));
}

export function sumAmounts(amounts: Iterable<number>): number {
  let cents = 0;
  for (const amount of amounts) {
    cents += toCents(amount);
  }
  return fromCents(cents);
}

/**
 * Check if two amounts are equal within the currency tolerance
 */
export function areAmountsEqual(a: number, b: number): boolean {
  return Math.abs(toCents(a) - toCents(b)) <= EPSILON_CENTS;
}

export function formatAmount(amount: number): string {
  return amount.toFixed(FINANCIAL_CONFIG.CURRENCY_DECIMALS);
}
