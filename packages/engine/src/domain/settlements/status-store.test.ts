import { describe, it, expect } from 'vitest';
import { InMemorySettlementStatusStore, buildSettlementRecord, settlementKey } from './status-store';

describe('Settlement Status Store', () => {
  it('should key records by game and ordered pair', () => {
    expect(settlementKey('game-1', 'alice', 'bob')).toBe('["game-1","alice","bob"]');
    expect(settlementKey('g', 'a|b', 'c')).not.toBe(settlementKey('g', 'a', 'b|c'));
  });

  describe('buildSettlementRecord', () => {
    it('should round the amount and stamp the time', () => {
      const result = buildSettlementRecord('game-1', 'alice', 'bob', 30, 'cash', 5000);

      expect(result).toEqual({
        ok: true,
        data: {
          gameId: 'game-1',
          fromUserId: 'alice',
          toUserId: 'bob',
          amount: 30,
          paymentMethod: 'cash',
          settledAt: 5000,
        },
      });
    });

    it('should return a validation error for invalid input', () => {
      const result = buildSettlementRecord('game-1', 'alice', 'alice', 30, 'cash', 5000);

      expect(result).toEqual({
        ok: false,
        error: { type: 'validation', message: 'Payer and payee must be different people' },
      });
    });
  });

  describe('InMemorySettlementStatusStore', () => {
    it('should mark, list and reset a settlement', async () => {
      const store = new InMemorySettlementStatusStore({ now: () => 42 });

      const marked = await store.markSettled('game-1', 'alice', 'bob', 30, 'venmo');
      expect(marked.ok).toBe(true);

      const listed = await store.listSettled('game-1');
      expect(listed).toEqual({
        ok: true,
        data: [
          {
            gameId: 'game-1',
            fromUserId: 'alice',
            toUserId: 'bob',
            amount: 30,
            paymentMethod: 'venmo',
            settledAt: 42,
          },
        ],
      });

      expect(await store.reset('game-1', 'alice', 'bob')).toEqual({ ok: true, data: undefined });
      expect(await store.listSettled('game-1')).toEqual({ ok: true, data: [] });
    });

    it('should treat resetting a missing record as a no-op', async () => {
      const store = new InMemorySettlementStatusStore();

      expect(await store.reset('game-1', 'alice', 'bob')).toEqual({ ok: true, data: undefined });
      expect(await store.reset('game-1', 'alice', 'bob')).toEqual({ ok: true, data: undefined });
    });

    it('should overwrite a second mark of the same pair', async () => {
      let time = 1;
      const store = new InMemorySettlementStatusStore({ now: () => time++ });

      await store.markSettled('game-1', 'alice', 'bob', 30, 'cash');
      await store.markSettled('game-1', 'alice', 'bob', 30, 'zelle');

      const listed = await store.listSettled('game-1');
      expect(listed.ok && listed.data.map((r) => [r.paymentMethod, r.settledAt])).toEqual([
        ['zelle', 2],
      ]);
    });

    it('should keep games and pair directions apart', async () => {
      const store = new InMemorySettlementStatusStore();

      await store.markSettled('game-1', 'alice', 'bob', 30, 'cash');
      await store.markSettled('game-1', 'bob', 'alice', 10, 'cash');
      await store.markSettled('game-2', 'alice', 'bob', 30, 'cash');

      const listed = await store.listSettled('game-1');
      expect(listed.ok && listed.data.length).toBe(2);
    });

    it('should keep pairs apart when IDs contain separators', async () => {
      const store = new InMemorySettlementStatusStore({ now: () => 1 });

      await store.markSettled('g', 'a|b', 'c', 10, 'cash');
      await store.markSettled('g', 'a', 'b|c', 20, 'cash');

      const listed = await store.listSettled('g');
      expect(listed.ok && listed.data.map((r) => [r.fromUserId, r.toUserId, r.amount])).toEqual([
        ['a|b', 'c', 10],
        ['a', 'b|c', 20],
      ]);
    });

    it('should reject invalid records without storing them', async () => {
      const store = new InMemorySettlementStatusStore();

      const result = await store.markSettled('game-1', 'alice', 'bob', -1, 'cash');
      expect(result).toEqual({
        ok: false,
        error: { type: 'validation', message: 'Settlement amount cannot be negative' },
      });
      expect(await store.listSettled('game-1')).toEqual({ ok: true, data: [] });
    });

    it('should start from initial records', async () => {
      const store = new InMemorySettlementStatusStore({
        initialRecords: [
          {
            gameId: 'game-1',
            fromUserId: 'alice',
            toUserId: 'bob',
            amount: 12.5,
            paymentMethod: 'paypal',
            settledAt: 7,
          },
        ],
      });

      const listed = await store.listSettled('game-1');
      expect(listed.ok && listed.data[0]?.amount).toBe(12.5);
    });
  });
});
