/**
 * Game ledger
 *
 * Aggregates a game's buy-ins and cash-outs into per-player balances and
 * audit trails. Everything here is a pure function of the transaction list.
 */

import type { GameTotals, PlayerBalance, PlayerLedger, Transaction } from '@chipledger/shared';
import { fromCents, toCents } from './money';

interface CentsAccumulator {
  buyinCents: number;
  cashoutCents: number;
}

/**
 * Order IDs by UTF-16 code units, independent of the runtime locale
 */
export function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Calculate balances for every player of a game
 *
 * Participants who have not transacted yet still get a zero balance.
 * Result order: participants first (in the given order), then any other
 * transacting user sorted by ID, so the output does not depend on the
 * order of `transactions`.
 */
export function computeBalances(
  participants: readonly string[],
  transactions: readonly Transaction[]
): Map<string, PlayerBalance> {
  const totals = new Map<string, CentsAccumulator>();

  for (const userId of participants) {
    if (!totals.has(userId)) {
      totals.set(userId, { buyinCents: 0, cashoutCents: 0 });
    }
  }

  const extraUserIds = new Set<string>();
  for (const transaction of transactions) {
    let accumulator = totals.get(transaction.userId);
    if (!accumulator) {
      accumulator = { buyinCents: 0, cashoutCents: 0 };
      totals.set(transaction.userId, accumulator);
      extraUserIds.add(transaction.userId);
    }

    const cents = toCents(transaction.amount);
    if (transaction.type === 'buyin') {
      accumulator.buyinCents += cents;
    } else {
      accumulator.cashoutCents += cents;
    }
  }

  const orderedUserIds = [
    ...participants.filter((userId, index) => participants.indexOf(userId) === index),
    ...Array.from(extraUserIds).sort(compareIds),
  ];

  const balances = new Map<string, PlayerBalance>();
  for (const userId of orderedUserIds) {
    const accumulator = totals.get(userId);
    if (!accumulator) continue;

    balances.set(userId, {
      userId,
      totalBuyin: fromCents(accumulator.buyinCents),
      totalCashout: fromCents(accumulator.cashoutCents),
      net: fromCents(accumulator.cashoutCents - accumulator.buyinCents),
    });
  }

  return balances;
}

/**
 * Build per-player buy-in and cash-out lists for audit display
 *
 * Lists are sorted by timestamp ascending, ties broken by transaction ID.
 */
export function buildPlayerLedgers(
  participants: readonly string[],
  transactions: readonly Transaction[]
): Map<string, PlayerLedger> {
  const ledgers = new Map<string, PlayerLedger>();
  const ledgerFor = (userId: string): PlayerLedger => {
    let ledger = ledgers.get(userId);
    if (!ledger) {
      ledger = { userId, buyins: [], cashouts: [] };
      ledgers.set(userId, ledger);
    }
    return ledger;
  };

  participants.forEach(ledgerFor);

  for (const transaction of transactions) {
    const ledger = ledgerFor(transaction.userId);
    if (transaction.type === 'buyin') {
      ledger.buyins.push(transaction);
    } else {
      ledger.cashouts.push(transaction);
    }
  }

  ledgers.forEach((ledger) => {
    ledger.buyins.sort(compareChronologically);
    ledger.cashouts.sort(compareChronologically);
  });

  return ledgers;
}

function compareChronologically(a: Transaction, b: Transaction): number {
  return a.timestamp - b.timestamp || compareIds(a.id, b.id);
}

/**
 * Sum buy-ins and cash-outs over all players
 */
export function getGameTotals(balances: Map<string, PlayerBalance>): GameTotals {
  let buyinCents = 0;
  let cashoutCents = 0;

  balances.forEach((balance) => {
    buyinCents += toCents(balance.totalBuyin);
    cashoutCents += toCents(balance.totalCashout);
  });

  return {
    totalBuyin: fromCents(buyinCents),
    totalCashout: fromCents(cashoutCents),
    playerCount: balances.size,
  };
}

/**
 * Sum of all net balances (total cash-out minus total buy-in)
 */
export function getNetSum(balances: Map<string, PlayerBalance>): number {
  let cents = 0;
  balances.forEach((balance) => {
    cents += toCents(balance.net);
  });
  return fromCents(cents);
}
