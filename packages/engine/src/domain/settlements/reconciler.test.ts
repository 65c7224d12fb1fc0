import { describe, it, expect } from 'vitest';
import { buildSettlementView, reconcileSettlements, toInconsistentStateError } from './reconciler';
import type { SettlementRecord, SettlementTransfer } from '@chipledger/shared';

function record(from: string, to: string, amount: number): SettlementRecord {
  return {
    gameId: 'game-1',
    fromUserId: from,
    toUserId: to,
    amount,
    paymentMethod: 'cash',
    settledAt: 100,
  };
}

const transfers: SettlementTransfer[] = [
  { from: 'B', to: 'C', amount: 30 },
  { from: 'A', to: 'C', amount: 50 },
];

describe('Settlement Reconciler', () => {
  describe('reconcileSettlements', () => {
    it('should keep records that match the plan', () => {
      const report = reconcileSettlements(transfers, [record('A', 'C', 50)]);

      expect(report.current).toEqual([record('A', 'C', 50)]);
      expect(report.orphaned).toEqual([]);
    });

    it('should accept amounts within one cent', () => {
      const report = reconcileSettlements(transfers, [record('B', 'C', 30.01)]);
      expect(report.current).toHaveLength(1);
    });

    it('should flag pairs no longer planned', () => {
      const report = reconcileSettlements(transfers, [record('C', 'A', 50)]);

      expect(report.current).toEqual([]);
      expect(report.orphaned).toEqual([{ record: record('C', 'A', 50), reason: 'pair_missing' }]);
    });

    it('should flag amounts that changed', () => {
      const report = reconcileSettlements(transfers, [record('A', 'C', 40)]);

      expect(report.orphaned).toEqual([
        { record: record('A', 'C', 40), reason: 'amount_changed', plannedAmount: 50 },
      ]);
    });
  });

  describe('buildSettlementView', () => {
    it('should mark only reconciled transfers as settled', () => {
      const view = buildSettlementView(transfers, [record('B', 'C', 30), record('A', 'C', 45)]);

      expect(view).toEqual([
        {
          from: 'B',
          to: 'C',
          amount: 30,
          status: { state: 'settled', method: 'cash', settledAt: 100 },
        },
        { from: 'A', to: 'C', amount: 50, status: { state: 'unsettled' } },
      ]);
    });

    it('should show an empty plan as empty', () => {
      expect(buildSettlementView([], [record('A', 'C', 50)])).toEqual([]);
    });
  });

  describe('toInconsistentStateError', () => {
    it('should describe a missing pair', () => {
      const error = toInconsistentStateError({ record: record('A', 'C', 50), reason: 'pair_missing' });

      expect(error.type).toBe('inconsistent_state');
      expect(error.message).toBe(
        'Settlement A → C ($50.00) is no longer part of the settlement plan'
      );
    });

    it('should describe a changed amount', () => {
      const error = toInconsistentStateError({
        record: record('A', 'C', 40),
        reason: 'amount_changed',
        plannedAmount: 50,
      });

      expect(error.message).toBe(
        'Settlement A → C was recorded for $40.00 but the plan now requires $50.00'
      );
    });
  });
});
