/**
 * Balance calculation types
 */

import type { Transaction } from './transaction';

export interface PlayerBalance {
  userId: string;
  totalBuyin: number;
  totalCashout: number;
  net: number; // Positive = is owed money, Negative = owes money
}

/**
 * Per-player audit trail, both lists sorted by timestamp ascending
 */
export interface PlayerLedger {
  userId: string;
  buyins: Transaction[];
  cashouts: Transaction[];
}

export interface GameTotals {
  totalBuyin: number;
  totalCashout: number;
  playerCount: number;
}

export interface BalanceCheck {
  balanced: boolean;
  discrepancy: number; // totalBuyin - totalCashout, signed
}

export interface GameBalanceReport extends BalanceCheck {
  totalBuyin: number;
  totalCashout: number;
  message: string;
}
