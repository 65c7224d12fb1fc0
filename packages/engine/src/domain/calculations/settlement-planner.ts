/**
 * Settlement planner
 *
 * Turns net balances into a short list of debtor → creditor payments.
 *
 * Algorithm (greedy debt simplification):
 * 1. Split players into debtors (net < 0) and creditors (net > 0), dropping
 *    anyone within one cent of zero
 * 2. Sort debtors by debt ascending and creditors by credit descending,
 *    ties broken by user ID (code unit order)
 * 3. Walk both lists with two pointers, paying min(debt, credit) each step
 *    and advancing past whoever is left with one cent or less
 *
 * Every step retires at least one party, so a plan never has more than
 * (debtors + creditors - 1) transfers. This is not a global optimum.
 */

import { SETTLEMENT_MESSAGES } from '@chipledger/shared';
import type { PlayerBalance, SettlementPlan, SettlementTransfer } from '@chipledger/shared';
import { EPSILON_CENTS, fromCents, toCents } from './money';
import { compareIds } from './ledger';

interface Party {
  userId: string;
  remainingCents: number;
}

/**
 * Compute the transfers that settle all net balances
 */
export function planSettlement(balances: Map<string, PlayerBalance>): SettlementTransfer[] {
  const debtors: Party[] = [];
  const creditors: Party[] = [];

  balances.forEach((balance) => {
    const netCents = toCents(balance.net);
    if (netCents < -EPSILON_CENTS) {
      debtors.push({ userId: balance.userId, remainingCents: -netCents });
    } else if (netCents > EPSILON_CENTS) {
      creditors.push({ userId: balance.userId, remainingCents: netCents });
    }
  });

  debtors.sort(
    (a, b) => a.remainingCents - b.remainingCents || compareIds(a.userId, b.userId)
  );
  creditors.sort(
    (a, b) => b.remainingCents - a.remainingCents || compareIds(a.userId, b.userId)
  );

  const transfers: SettlementTransfer[] = [];
  let i = 0;
  let j = 0;

  while (i < debtors.length && j < creditors.length) {
    const debtor = debtors[i];
    const creditor = creditors[j];
    if (!debtor || !creditor) break;

    const amountCents = Math.min(debtor.remainingCents, creditor.remainingCents);
    transfers.push({
      from: debtor.userId,
      to: creditor.userId,
      amount: fromCents(amountCents),
    });

    debtor.remainingCents -= amountCents;
    creditor.remainingCents -= amountCents;

    if (debtor.remainingCents <= EPSILON_CENTS) i++;
    if (creditor.remainingCents <= EPSILON_CENTS) j++;
  }

  return transfers;
}

/**
 * Generate a settlement plan with its summary figures
 */
export function generateSettlementPlan(balances: Map<string, PlayerBalance>): SettlementPlan {
  const transfers = planSettlement(balances);

  return {
    transfers,
    totalTransfers: transfers.length,
    totalAmount: getTotalSettlementAmount(transfers),
  };
}

export function getTotalSettlementAmount(transfers: readonly SettlementTransfer[]): number {
  const cents = transfers.reduce((sum, transfer) => sum + toCents(transfer.amount), 0);
  return fromCents(cents);
}

/**
 * Apply transfers to a copy of the balances
 *
 * A debtor paying increases their net; the creditor receiving decreases theirs.
 * Used to check that a plan leaves every player at zero.
 */
export function applyTransfers(
  balances: Map<string, PlayerBalance>,
  transfers: readonly SettlementTransfer[]
): Map<string, number> {
  const netCents = new Map<string, number>();
  balances.forEach((balance) => netCents.set(balance.userId, toCents(balance.net)));

  for (const transfer of transfers) {
    const cents = toCents(transfer.amount);
    netCents.set(transfer.from, (netCents.get(transfer.from) ?? 0) + cents);
    netCents.set(transfer.to, (netCents.get(transfer.to) ?? 0) - cents);
  }

  const result = new Map<string, number>();
  netCents.forEach((cents, userId) => result.set(userId, fromCents(cents)));
  return result;
}

/**
 * Check if a plan brings every player within one cent of zero
 */
export function isPlanComplete(
  balances: Map<string, PlayerBalance>,
  transfers: readonly SettlementTransfer[]
): boolean {
  return Array.from(applyTransfers(balances, transfers).values()).every(
    (net) => Math.abs(toCents(net)) <= EPSILON_CENTS
  );
}

/**
 * Find the planned transfer for an ordered (from, to) pair
 */
export function findTransfer(
  transfers: readonly SettlementTransfer[],
  from: string,
  to: string
): SettlementTransfer | undefined {
  return transfers.find((transfer) => transfer.from === from && transfer.to === to);
}

export function getSettlementSummaryMessage(plan: SettlementPlan): string {
  if (plan.totalTransfers === 0) return SETTLEMENT_MESSAGES.NONE_NEEDED;
  return plan.totalTransfers === 1 ? '1 payment to settle' : `${plan.totalTransfers} payments to settle`;
}
