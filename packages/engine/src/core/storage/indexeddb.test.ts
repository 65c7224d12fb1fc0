import { describe, it, expect, afterEach } from 'vitest';
import { SettlementStatusDB } from './indexeddb';

let dbCounter = 0;
const opened: SettlementStatusDB[] = [];

function createDB(options: { now?: () => number } = {}): SettlementStatusDB {
  dbCounter++;
  const db = new SettlementStatusDB({ dbName: `chipledger-test-${dbCounter}`, ...options });
  opened.push(db);
  return db;
}

describe('SettlementStatusDB', () => {
  afterEach(() => {
    opened.splice(0).forEach((db) => db.close());
  });

  it('should persist and list settlements by game', async () => {
    const db = createDB({ now: () => 1234 });

    await db.markSettled('game-1', 'B', 'C', 30, 'cash');
    await db.markSettled('game-1', 'A', 'C', 50, 'venmo');
    await db.markSettled('game-2', 'A', 'C', 10, 'cash');

    const listed = await db.listSettled('game-1');

    expect(listed).toEqual({
      ok: true,
      data: [
        {
          gameId: 'game-1',
          fromUserId: 'A',
          toUserId: 'C',
          amount: 50,
          paymentMethod: 'venmo',
          settledAt: 1234,
        },
        {
          gameId: 'game-1',
          fromUserId: 'B',
          toUserId: 'C',
          amount: 30,
          paymentMethod: 'cash',
          settledAt: 1234,
        },
      ],
    });
  });

  it('should overwrite the record of a pair', async () => {
    const db = createDB();

    await db.markSettled('game-1', 'A', 'C', 50, 'cash');
    await db.markSettled('game-1', 'A', 'C', 50, 'paypal');

    const listed = await db.listSettled('game-1');
    expect(listed.ok && listed.data.map((r) => r.paymentMethod)).toEqual(['paypal']);
  });

  it('should keep pairs apart when IDs contain separators', async () => {
    const db = createDB();

    await db.markSettled('g', 'a|b', 'c', 10, 'cash');
    await db.markSettled('g', 'a', 'b|c', 20, 'cash');

    const listed = await db.listSettled('g');
    expect(listed.ok && listed.data.map((r) => [r.fromUserId, r.toUserId, r.amount])).toEqual([
      ['a', 'b|c', 20],
      ['a|b', 'c', 10],
    ]);

    await db.reset('g', 'a', 'b|c');
    const remaining = await db.listSettled('g');
    expect(remaining.ok && remaining.data.map((r) => r.fromUserId)).toEqual(['a|b']);
  });

  it('should reset a record and ignore missing ones', async () => {
    const db = createDB();
    await db.markSettled('game-1', 'A', 'C', 50, 'cash');

    expect(await db.reset('game-1', 'A', 'C')).toEqual({ ok: true, data: undefined });
    expect(await db.reset('game-1', 'A', 'C')).toEqual({ ok: true, data: undefined });
    expect(await db.listSettled('game-1')).toEqual({ ok: true, data: [] });
  });

  it('should validate before writing', async () => {
    const db = createDB();

    const result = await db.markSettled('game-1', 'A', 'A', 50, 'cash');

    expect(result.ok).toBe(false);
    expect(await db.listSettled('game-1')).toEqual({ ok: true, data: [] });
  });

  it('should clear every record of a game', async () => {
    const db = createDB();
    await db.markSettled('game-1', 'A', 'C', 50, 'cash');
    await db.markSettled('game-1', 'B', 'C', 30, 'cash');
    await db.markSettled('game-2', 'A', 'C', 10, 'cash');

    await db.clearGame('game-1');

    expect(await db.listSettled('game-1')).toEqual({ ok: true, data: [] });
    const other = await db.listSettled('game-2');
    expect(other.ok && other.data).toHaveLength(1);
  });

  it('should survive reopening', async () => {
    const db = createDB();
    await db.markSettled('game-1', 'A', 'C', 50, 'cash');
    db.close();

    const reopened = new SettlementStatusDB({
      factory: indexedDB,
      dbName: `chipledger-test-${dbCounter}`,
    });
    opened.push(reopened);

    const listed = await reopened.listSettled('game-1');
    expect(listed.ok && listed.data.map((r) => r.amount)).toEqual([50]);
  });
});
