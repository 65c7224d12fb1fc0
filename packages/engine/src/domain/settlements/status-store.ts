/**
 * Settlement status store
 *
 * Records which planned transfers have been paid. Records are keyed by the
 * ordered pair (gameId, fromUserId, toUserId); writing the same key twice
 * overwrites, so a store never holds two records for one pair.
 */

import type { PaymentMethod, Result, SettlementRecord } from '@chipledger/shared';
import { validateSettlementInput } from '../validation/amount-validator';
import { roundToCurrency } from '../calculations/money';

export interface SettlementStatusStore {
  markSettled(
    gameId: string,
    fromUserId: string,
    toUserId: string,
    amount: number,
    method: PaymentMethod
  ): Promise<Result<SettlementRecord>>;

  /** Removing a record that does not exist succeeds */
  reset(gameId: string, fromUserId: string, toUserId: string): Promise<Result<void>>;

  listSettled(gameId: string): Promise<Result<SettlementRecord[]>>;
}

/**
 * Map key for an ordered pair. JSON encoding keeps IDs that contain
 * separators from colliding.
 */
export function settlementKey(gameId: string, fromUserId: string, toUserId: string): string {
  return JSON.stringify([gameId, fromUserId, toUserId]);
}

/**
 * Validate inputs and build the record every store writes
 */
export function buildSettlementRecord(
  gameId: string,
  fromUserId: string,
  toUserId: string,
  amount: number,
  method: PaymentMethod,
  settledAt: number
): Result<SettlementRecord> {
  const validation = validateSettlementInput({
    gameId,
    fromUserId,
    toUserId,
    amount,
    paymentMethod: method,
  });
  if (!validation.valid) {
    return {
      ok: false,
      error: { type: 'validation', message: validation.reason ?? 'Invalid settlement' },
    };
  }

  return {
    ok: true,
    data: {
      gameId,
      fromUserId,
      toUserId,
      amount: roundToCurrency(amount),
      paymentMethod: method,
      settledAt,
    },
  };
}

/**
 * Store scoped to one process, e.g. a single game session
 */
export class InMemorySettlementStatusStore implements SettlementStatusStore {
  private records: Map<string, SettlementRecord> = new Map();
  private now: () => number;

  constructor(options: { now?: () => number; initialRecords?: SettlementRecord[] } = {}) {
    this.now = options.now ?? Date.now;
    for (const record of options.initialRecords ?? []) {
      this.records.set(settlementKey(record.gameId, record.fromUserId, record.toUserId), {
        ...record,
      });
    }
  }

  async markSettled(
    gameId: string,
    fromUserId: string,
    toUserId: string,
    amount: number,
    method: PaymentMethod
  ): Promise<Result<SettlementRecord>> {
    const built = buildSettlementRecord(gameId, fromUserId, toUserId, amount, method, this.now());
    if (!built.ok) return built;

    this.records.set(settlementKey(gameId, fromUserId, toUserId), built.data);
    return { ok: true, data: { ...built.data } };
  }

  async reset(gameId: string, fromUserId: string, toUserId: string): Promise<Result<void>> {
    this.records.delete(settlementKey(gameId, fromUserId, toUserId));
    return { ok: true, data: undefined };
  }

  async listSettled(gameId: string): Promise<Result<SettlementRecord[]>> {
    const records = Array.from(this.records.values())
      .filter((record) => record.gameId === gameId)
      .map((record) => ({ ...record }));
    return { ok: true, data: records };
  }
}
