/**
 * Settlement reconciliation
 *
 * A stored record only describes a payment while the current plan still
 * holds a transfer for the same ordered pair with the same amount (within
 * one cent). Editing a buy-in can change the plan; records that no longer
 * match are reported as orphaned instead of being shown as paid.
 */

import type {
  InconsistentStateError,
  OrphanedSettlement,
  ReconciliationReport,
  SettlementRecord,
  SettlementStatus,
  SettlementTransfer,
  SettlementViewItem,
} from '@chipledger/shared';
import { areAmountsEqual, formatAmount } from '../calculations/money';
import { findTransfer } from '../calculations/settlement-planner';

/**
 * Split stored records into those matching the plan and orphans
 */
export function reconcileSettlements(
  transfers: readonly SettlementTransfer[],
  records: readonly SettlementRecord[]
): ReconciliationReport {
  const current: SettlementRecord[] = [];
  const orphaned: OrphanedSettlement[] = [];

  for (const record of records) {
    const transfer = findTransfer(transfers, record.fromUserId, record.toUserId);

    if (!transfer) {
      orphaned.push({ record, reason: 'pair_missing' });
    } else if (!areAmountsEqual(transfer.amount, record.amount)) {
      orphaned.push({ record, reason: 'amount_changed', plannedAmount: transfer.amount });
    } else {
      current.push(record);
    }
  }

  return { current, orphaned };
}

/**
 * Overlay paid/unpaid status onto each planned transfer
 *
 * Only records that reconcile with the plan count as paid.
 */
export function buildSettlementView(
  transfers: readonly SettlementTransfer[],
  records: readonly SettlementRecord[]
): SettlementViewItem[] {
  const { current } = reconcileSettlements(transfers, records);

  return transfers.map((transfer) => {
    const record = current.find(
      (r) => r.fromUserId === transfer.from && r.toUserId === transfer.to
    );
    const status: SettlementStatus = record
      ? { state: 'settled', method: record.paymentMethod, settledAt: record.settledAt }
      : { state: 'unsettled' };

    return { ...transfer, status };
  });
}

export function toInconsistentStateError(orphan: OrphanedSettlement): InconsistentStateError {
  const { record, reason, plannedAmount } = orphan;
  const pair = `${record.fromUserId} → ${record.toUserId}`;
  const message =
    reason === 'pair_missing'
      ? `Settlement ${pair} ($${formatAmount(record.amount)}) is no longer part of the settlement plan`
      : `Settlement ${pair} was recorded for $${formatAmount(record.amount)} but the plan now ` +
        `requires $${formatAmount(plannedAmount ?? 0)}`;

  return { type: 'inconsistent_state', message, record, reason };
}
