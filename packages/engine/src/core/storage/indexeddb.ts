/**
 * IndexedDB storage layer for settlement records
 *
 * One object store keyed by the compound key [gameId, fromUserId, toUserId],
 * with a `gameId` index for listing a game's records. `put` on the key gives upsert
 * semantics, so concurrent marks for one pair leave a single record.
 */

import { STORAGE_CONFIG } from '@chipledger/shared';
import type { PaymentMethod, Result, SettlementRecord, StorageError } from '@chipledger/shared';
import {
  buildSettlementRecord,
  type SettlementStatusStore,
} from '../../domain/settlements/status-store';
import { ENGINE_CONFIG } from '../../config';

const STORES = {
  SETTLEMENTS: 'settlements',
} as const;

const SETTLEMENT_KEY_PATH = ['gameId', 'fromUserId', 'toUserId'];

export interface SettlementStatusDBOptions {
  factory?: IDBFactory;
  dbName?: string;
  now?: () => number;
}

/**
 * SettlementStatusDB - IndexedDB-backed SettlementStatusStore
 */
export class SettlementStatusDB implements SettlementStatusStore {
  private db: IDBDatabase | null = null;
  private factory: IDBFactory | undefined;
  private dbName: string;
  private now: () => number;

  constructor(options: SettlementStatusDBOptions = {}) {
    this.factory = options.factory ?? (typeof indexedDB === 'undefined' ? undefined : indexedDB);
    this.dbName = options.dbName ?? ENGINE_CONFIG.SETTLEMENT_DB_NAME;
    this.now = options.now ?? Date.now;
  }

  /**
   * Open database connection
   */
  async open(): Promise<IDBDatabase> {
    if (this.db) return this.db;

    const factory = this.factory;
    if (!factory) {
      throw new Error('IndexedDB is not available in this environment');
    }

    return new Promise((resolve, reject) => {
      const request = factory.open(this.dbName, STORAGE_CONFIG.DB_VERSION);

      request.onerror = () => reject(request.error);
      request.onsuccess = () => {
        this.db = request.result;
        resolve(request.result);
      };

      request.onupgradeneeded = () => {
        const db = request.result;

        if (!db.objectStoreNames.contains(STORES.SETTLEMENTS)) {
          const settlementsStore = db.createObjectStore(STORES.SETTLEMENTS, {
            keyPath: SETTLEMENT_KEY_PATH,
          });
          settlementsStore.createIndex('gameId', 'gameId', { unique: false });
        }
      };
    });
  }

  /**
   * Close database connection
   */
  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  // Settlement status

  async markSettled(
    gameId: string,
    fromUserId: string,
    toUserId: string,
    amount: number,
    method: PaymentMethod
  ): Promise<Result<SettlementRecord>> {
    const built = buildSettlementRecord(gameId, fromUserId, toUserId, amount, method, this.now());
    if (!built.ok) return built;

    try {
      await this.put(STORES.SETTLEMENTS, built.data);
      return { ok: true, data: built.data };
    } catch (error) {
      return this.storageFailure('mark settlement', error);
    }
  }

  async reset(gameId: string, fromUserId: string, toUserId: string): Promise<Result<void>> {
    try {
      await this.delete(STORES.SETTLEMENTS, [gameId, fromUserId, toUserId]);
      return { ok: true, data: undefined };
    } catch (error) {
      return this.storageFailure('reset settlement', error);
    }
  }

  async listSettled(gameId: string): Promise<Result<SettlementRecord[]>> {
    try {
      const rows = await this.getAllFromIndex<SettlementRecord>(STORES.SETTLEMENTS, 'gameId', gameId);
      return { ok: true, data: rows.map(toRecord) };
    } catch (error) {
      return this.storageFailure('list settlements', error);
    }
  }

  /**
   * Delete every record of a game
   */
  async clearGame(gameId: string): Promise<void> {
    const db = await this.open();

    const transaction = db.transaction(STORES.SETTLEMENTS, 'readwrite');
    const index = transaction.objectStore(STORES.SETTLEMENTS).index('gameId');
    const request = index.openCursor(gameId);

    request.onsuccess = () => {
      const cursor = request.result;
      if (cursor) {
        cursor.delete();
        cursor.continue();
      }
    };

    return new Promise((resolve, reject) => {
      transaction.oncomplete = () => resolve();
      transaction.onerror = () => reject(transaction.error);
    });
  }

  private storageFailure(action: string, error: unknown): { ok: false; error: StorageError } {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[SettlementStatusDB] Failed to ${action}:`, error);
    return {
      ok: false,
      error: { type: 'storage', message: `Failed to ${action}: ${message}`, cause: error },
    };
  }

  // Generic IndexedDB operations

  private async getAllFromIndex<T>(
    storeName: string,
    indexName: string,
    query: IDBValidKey
  ): Promise<T[]> {
    const db = await this.open();

    return new Promise((resolve, reject) => {
      const transaction = db.transaction(storeName, 'readonly');
      const store = transaction.objectStore(storeName);
      const index = store.index(indexName);
      const request = index.getAll(query);

      request.onsuccess = () => resolve(request.result);
      request.onerror = () => reject(request.error);
    });
  }

  private async put<T>(storeName: string, value: T): Promise<void> {
    const db = await this.open();

    return new Promise((resolve, reject) => {
      const transaction = db.transaction(storeName, 'readwrite');
      const store = transaction.objectStore(storeName);
      const request = store.put(value);

      request.onsuccess = () => resolve();
      request.onerror = () => reject(request.error);
    });
  }

  private async delete(storeName: string, key: IDBValidKey): Promise<void> {
    const db = await this.open();

    return new Promise((resolve, reject) => {
      const transaction = db.transaction(storeName, 'readwrite');
      const store = transaction.objectStore(storeName);
      const request = store.delete(key);

      request.onsuccess = () => resolve();
      request.onerror = () => reject(request.error);
    });
  }
}

function toRecord(row: SettlementRecord): SettlementRecord {
  return {
    gameId: row.gameId,
    fromUserId: row.fromUserId,
    toUserId: row.toUserId,
    amount: row.amount,
    paymentMethod: row.paymentMethod,
    settledAt: row.settledAt,
  };
}
