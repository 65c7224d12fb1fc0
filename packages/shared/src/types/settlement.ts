/**
 * Settlement plan and settlement status types
 */

import type { PAYMENT_METHODS } from '../constants';

export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

export interface SettlementTransfer {
  from: string; // User ID who owes
  to: string; // User ID who is owed
  amount: number;
}

export interface SettlementPlan {
  transfers: SettlementTransfer[];
  totalTransfers: number;
  totalAmount: number;
}

/**
 * Persisted proof that a transfer was paid.
 * At most one record exists per (gameId, fromUserId, toUserId).
 */
export interface SettlementRecord {
  gameId: string;
  fromUserId: string;
  toUserId: string;
  amount: number;
  paymentMethod: PaymentMethod;
  settledAt: number; // Unix timestamp (ms)
}

export type SettlementStatus =
  | { state: 'unsettled' }
  | { state: 'settled'; method: PaymentMethod; settledAt: number };

export interface SettlementViewItem extends SettlementTransfer {
  status: SettlementStatus;
}

export type OrphanReason = 'pair_missing' | 'amount_changed';

export interface OrphanedSettlement {
  record: SettlementRecord;
  reason: OrphanReason;
  plannedAmount?: number; // Set when the pair is still planned with another amount
}

export interface ReconciliationReport {
  current: SettlementRecord[];
  orphaned: OrphanedSettlement[];
}
