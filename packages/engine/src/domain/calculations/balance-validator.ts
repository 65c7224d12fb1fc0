/**
 * Balance validation
 *
 * A game can only be closed once the chips bought in have all been cashed
 * out again, give or take one cent.
 */

import { SETTLEMENT_MESSAGES } from '@chipledger/shared';
import type { BalanceCheck, GameBalanceReport, PlayerBalance } from '@chipledger/shared';
import { EPSILON_CENTS, formatAmount, fromCents, toCents } from './money';
import { getGameTotals } from './ledger';

/**
 * Check whether total buy-ins equal total cash-outs within tolerance
 *
 * `discrepancy` is signed: positive when more was bought in than cashed out.
 */
export function isBalanced(balances: Map<string, PlayerBalance>): BalanceCheck {
  const totals = getGameTotals(balances);
  const discrepancyCents = toCents(totals.totalBuyin) - toCents(totals.totalCashout);

  return {
    balanced: Math.abs(discrepancyCents) <= EPSILON_CENTS,
    discrepancy: fromCents(discrepancyCents),
  };
}

/**
 * Full balance report with totals and a user-facing message
 */
export function checkGameBalance(balances: Map<string, PlayerBalance>): GameBalanceReport {
  const { totalBuyin, totalCashout } = getGameTotals(balances);
  const check = isBalanced(balances);

  const message = check.balanced
    ? SETTLEMENT_MESSAGES.BALANCED
    : `Buy-ins ($${formatAmount(totalBuyin)}) do not match cash-outs ` +
      `($${formatAmount(totalCashout)}). Difference: $${formatAmount(Math.abs(check.discrepancy))}`;

  return { ...check, totalBuyin, totalCashout, message };
}
