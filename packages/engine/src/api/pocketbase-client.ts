/**
 * PocketBase API client
 *
 * Handles communication with the PocketBase backend for:
 * - Loading a game snapshot (game, participants, transactions, settlements)
 * - Recording buy-ins and cash-outs
 * - Persisting settlement status (implements SettlementStatusStore)
 *
 * The `settlements` collection carries a unique index on
 * (gameId, fromUserId, toUserId). A create that loses a race against that
 * index is retried as an update, so the last write wins and one record remains.
 */

import PocketBase, { ClientResponseError, type RecordModel } from 'pocketbase';
import { COLLECTIONS, GAME_STATUSES } from '@chipledger/shared';
import type {
  Game,
  GameSnapshot,
  GameStatus,
  PaymentMethod,
  Result,
  SettlementRecord,
  StorageError,
  Transaction,
  TransactionInput,
} from '@chipledger/shared';
import { ENGINE_CONFIG } from '../config';
import {
  buildSettlementRecord,
  type SettlementStatusStore,
} from '../domain/settlements/status-store';
import { isPaymentMethod, validateTransactionInput } from '../domain/validation/amount-validator';

/**
 * Game record schema (matches PocketBase collection)
 */
export interface GameRecord extends RecordModel {
  groupId: string;
  name: string;
  status: string;
  currency: string;
  createdAt: number;
  completedAt?: number;
}

export interface ParticipantRecord extends RecordModel {
  gameId: string;
  userId: string;
}

export interface TransactionRecord extends RecordModel {
  gameId: string;
  userId: string;
  type: string;
  amount: number;
  timestamp: number;
  notes?: string;
}

export interface SettlementRow extends RecordModel {
  gameId: string;
  fromUserId: string;
  toUserId: string;
  amount: number;
  paymentMethod: string;
  settledAt: number;
}

/**
 * PocketBase API client wrapper
 */
export class PocketBaseClient implements SettlementStatusStore {
  private pb: PocketBase;
  private pageSize: number;
  private now: () => number;

  constructor(
    url: string = ENGINE_CONFIG.POCKETBASE_URL,
    options: { pageSize?: number; now?: () => number } = {}
  ) {
    this.pb = new PocketBase(url);
    // Parallel list requests for different games must not cancel each other
    this.pb.autoCancellation(false);
    const pageSize = options.pageSize ?? ENGINE_CONFIG.PAGE_SIZE;
    // A zero or NaN page size would never see a short page and never stop
    this.pageSize =
      Number.isInteger(pageSize) && pageSize > 0 ? pageSize : ENGINE_CONFIG.PAGE_SIZE;
    this.now = options.now ?? Date.now;
  }

  /**
   * Get the base URL of the PocketBase server
   */
  get baseUrl(): string {
    return this.pb.baseURL;
  }

  /**
   * Check if the server is reachable
   */
  async healthCheck(): Promise<boolean> {
    try {
      await this.pb.health.check();
      return true;
    } catch {
      return false;
    }
  }

  // ==================== Games API ====================

  /**
   * Load everything the engine needs for one game
   */
  async loadGameSnapshot(gameId: string): Promise<Result<GameSnapshot>> {
    try {
      const gameRecord = await this.pb.collection(COLLECTIONS.GAMES).getOne<GameRecord>(gameId);
      const gameFilter = this.pb.filter('gameId = {:gameId}', { gameId });

      const [participantRecords, transactionRecords, settlementRows] = await Promise.all([
        this.listAll<ParticipantRecord>(COLLECTIONS.PARTICIPANTS, gameFilter),
        this.listAll<TransactionRecord>(COLLECTIONS.TRANSACTIONS, gameFilter, '+timestamp'),
        this.listAll<SettlementRow>(COLLECTIONS.SETTLEMENTS, gameFilter, '+settledAt'),
      ]);

      const game = toGame(gameRecord);
      const transactions = transactionRecords.map(toTransaction);
      const settlements = settlementRows.map(toSettlementRecord);

      return {
        ok: true,
        data: {
          game,
          participants: participantRecords.map((p) => p.userId),
          transactions,
          settlements,
        },
      };
    } catch (error) {
      return storageFailure(`load game ${gameId}`, error);
    }
  }

  // ==================== Transactions API ====================

  /**
   * Record a buy-in or cash-out
   */
  async recordTransaction(input: TransactionInput): Promise<Result<Transaction>> {
    const validation = validateTransactionInput(input);
    if (!validation.valid) {
      return {
        ok: false,
        error: { type: 'validation', message: validation.reason ?? 'Invalid transaction' },
      };
    }

    try {
      const record = await this.pb
        .collection(COLLECTIONS.TRANSACTIONS)
        .create<TransactionRecord>({ ...input });
      return { ok: true, data: toTransaction(record) };
    } catch (error) {
      return storageFailure('record transaction', error);
    }
  }

  // ==================== Settlements API ====================

  async markSettled(
    gameId: string,
    fromUserId: string,
    toUserId: string,
    amount: number,
    method: PaymentMethod
  ): Promise<Result<SettlementRecord>> {
    const built = buildSettlementRecord(gameId, fromUserId, toUserId, amount, method, this.now());
    if (!built.ok) return built;

    const collection = this.pb.collection(COLLECTIONS.SETTLEMENTS);
    try {
      const existing = await this.findSettlement(gameId, fromUserId, toUserId);
      if (existing) {
        await collection.update<SettlementRow>(existing.id, { ...built.data });
        return { ok: true, data: built.data };
      }

      try {
        await collection.create<SettlementRow>({ ...built.data });
      } catch (error) {
        // Someone else created the pair in the meantime: overwrite their record
        const raced =
          error instanceof ClientResponseError && error.status === 400
            ? await this.findSettlement(gameId, fromUserId, toUserId)
            : null;
        if (!raced) throw error;

        console.warn('[PocketBase] Concurrent settlement write, updating existing record');
        await collection.update<SettlementRow>(raced.id, { ...built.data });
      }
      return { ok: true, data: built.data };
    } catch (error) {
      return storageFailure('mark settlement', error);
    }
  }

  async reset(gameId: string, fromUserId: string, toUserId: string): Promise<Result<void>> {
    try {
      const existing = await this.findSettlement(gameId, fromUserId, toUserId);
      if (existing) {
        await this.pb.collection(COLLECTIONS.SETTLEMENTS).delete(existing.id);
      }
      return { ok: true, data: undefined };
    } catch (error) {
      return storageFailure('reset settlement', error);
    }
  }

  async listSettled(gameId: string): Promise<Result<SettlementRecord[]>> {
    try {
      const rows = await this.listAll<SettlementRow>(
        COLLECTIONS.SETTLEMENTS,
        this.pb.filter('gameId = {:gameId}', { gameId }),
        '+settledAt'
      );
      return { ok: true, data: rows.map(toSettlementRecord) };
    } catch (error) {
      return storageFailure('list settlements', error);
    }
  }

  // ==================== Helpers ====================

  private async findSettlement(
    gameId: string,
    fromUserId: string,
    toUserId: string
  ): Promise<SettlementRow | null> {
    const result = await this.pb.collection(COLLECTIONS.SETTLEMENTS).getList<SettlementRow>(1, 1, {
      filter: this.pb.filter(
        'gameId = {:gameId} && fromUserId = {:fromUserId} && toUserId = {:toUserId}',
        { gameId, fromUserId, toUserId }
      ),
    });
    return result.items[0] ?? null;
  }

  private async listAll<T extends RecordModel>(
    collection: string,
    filter: string,
    sort?: string
  ): Promise<T[]> {
    const all: T[] = [];
    let page = 1;

    for (;;) {
      const result = await this.pb
        .collection(collection)
        .getList<T>(page, this.pageSize, sort ? { filter, sort } : { filter });

      all.push(...result.items);

      if (result.items.length < this.pageSize) {
        // No more pages
        break;
      }

      page++;
    }

    return all;
  }
}

// ==================== Record Mapping ====================

function isGameStatus(value: string): value is GameStatus {
  return GAME_STATUSES.some((status) => status === value);
}

function toGame(record: GameRecord): Game {
  if (!isGameStatus(record.status)) {
    throw new Error(`Game ${record.id} has unknown status "${record.status}"`);
  }
  const game: Game = {
    id: record.id,
    groupId: record.groupId,
    name: record.name,
    status: record.status,
    currency: record.currency,
    createdAt: record.createdAt,
  };
  if (record.completedAt) {
    game.completedAt = record.completedAt;
  }
  return game;
}

function toTransaction(record: TransactionRecord): Transaction {
  if (record.type !== 'buyin' && record.type !== 'cashout') {
    throw new Error(`Transaction ${record.id} has unknown type "${record.type}"`);
  }
  const transaction: Transaction = {
    id: record.id,
    gameId: record.gameId,
    userId: record.userId,
    type: record.type,
    amount: record.amount,
    timestamp: record.timestamp,
  };
  if (record.notes) {
    transaction.notes = record.notes;
  }
  return transaction;
}

function toSettlementRecord(row: SettlementRow): SettlementRecord {
  if (!isPaymentMethod(row.paymentMethod)) {
    throw new Error(`Settlement ${row.id} has unknown payment method "${row.paymentMethod}"`);
  }
  return {
    gameId: row.gameId,
    fromUserId: row.fromUserId,
    toUserId: row.toUserId,
    amount: row.amount,
    paymentMethod: row.paymentMethod,
    settledAt: row.settledAt,
  };
}

function storageFailure(action: string, error: unknown): { ok: false; error: StorageError } {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`[PocketBase] Failed to ${action}:`, error);
  return {
    ok: false,
    error: { type: 'storage', message: `Failed to ${action}: ${message}`, cause: error },
  };
}
