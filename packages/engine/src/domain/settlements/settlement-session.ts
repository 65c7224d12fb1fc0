/**
 * Game Settlement Session
 *
 * Holds one game's current snapshot together with the settlement status
 * store it should write to. Balances and the plan are recomputed from
 * scratch whenever the transaction list is replaced.
 *
 * Rules:
 * - markSettled: only for a pair in the current plan, always for the planned amount
 * - resetSettlement: allowed for planned pairs and for stored orphans
 * - replaceTransactions: purges every stored record the new plan no longer backs
 * - closeGame: only from in_progress, and only with balanced books
 *
 * Mutations for the same game are serialized through a KeyedLock, so a close
 * decision never interleaves with a transaction replacement.
 */

import type {
  Game,
  GameBalanceReport,
  GameSnapshot,
  InconsistentStateError,
  PaymentMethod,
  PlayerBalance,
  PlayerLedger,
  ReconciliationReport,
  Result,
  SettlementPlan,
  SettlementRecord,
  SettlementViewItem,
  Transaction,
} from '@chipledger/shared';
import { buildPlayerLedgers, computeBalances } from '../calculations/ledger';
import { checkGameBalance } from '../calculations/balance-validator';
import {
  findTransfer,
  generateSettlementPlan,
  getSettlementSummaryMessage,
} from '../calculations/settlement-planner';
import { formatAmount } from '../calculations/money';
import { isGameEditable, transitionGame } from '../games/game-lifecycle';
import { KeyedLock } from '../../core/locks/keyed-lock';
import type { SettlementStatusStore } from './status-store';
import { buildSettlementView, reconcileSettlements, toInconsistentStateError } from './reconciler';

export interface GameSettlementSessionConfig {
  snapshot: Omit<GameSnapshot, 'settlements'>;
  store: SettlementStatusStore;
  lock?: KeyedLock; // Share one lock between sessions of the same process
  now?: () => number;
}

export interface SettlementOverview {
  items: SettlementViewItem[];
  orphaned: InconsistentStateError[];
  message: string;
}

export class GameSettlementSession {
  private game: Game;
  private participants: string[];
  private transactions: Transaction[];
  private store: SettlementStatusStore;
  private lock: KeyedLock;
  private now: () => number;

  private balances: Map<string, PlayerBalance>;
  private plan: SettlementPlan;

  constructor(config: GameSettlementSessionConfig) {
    this.game = { ...config.snapshot.game };
    this.participants = [...config.snapshot.participants];
    this.transactions = [...config.snapshot.transactions];
    this.store = config.store;
    this.lock = config.lock ?? new KeyedLock();
    this.now = config.now ?? Date.now;

    this.balances = computeBalances(this.participants, this.transactions);
    this.plan = generateSettlementPlan(this.balances);
  }

  // ==================== Derived State ====================

  getGame(): Game {
    return { ...this.game };
  }

  getTransactions(): Transaction[] {
    return [...this.transactions];
  }

  getBalances(): Map<string, PlayerBalance> {
    return new Map(this.balances);
  }

  getPlan(): SettlementPlan {
    return this.plan;
  }

  getPlayerLedgers(): Map<string, PlayerLedger> {
    return buildPlayerLedgers(this.participants, this.transactions);
  }

  checkBalance(): GameBalanceReport {
    return checkGameBalance(this.balances);
  }

  /**
   * Planned transfers with their paid/unpaid status and any orphaned records
   */
  async getSettlementView(): Promise<Result<SettlementOverview>> {
    const listed = await this.store.listSettled(this.game.id);
    if (!listed.ok) return listed;

    const { orphaned } = reconcileSettlements(this.plan.transfers, listed.data);
    const errors = orphaned.map(toInconsistentStateError);
    for (const error of errors) {
      console.warn(`[settlement-session] ${error.message}`);
    }

    return {
      ok: true,
      data: {
        items: buildSettlementView(this.plan.transfers, listed.data),
        orphaned: errors,
        message: getSettlementSummaryMessage(this.plan),
      },
    };
  }

  // ==================== Mutations ====================

  async markSettled(
    fromUserId: string,
    toUserId: string,
    method: PaymentMethod
  ): Promise<Result<SettlementRecord>> {
    return this.lock.runExclusive<Result<SettlementRecord>>(this.game.id, async () => {
      const transfer = findTransfer(this.plan.transfers, fromUserId, toUserId);
      if (!transfer) {
        return {
          ok: false,
          error: {
            type: 'not_found',
            message: `No planned settlement from ${fromUserId} to ${toUserId}`,
            from: fromUserId,
            to: toUserId,
          },
        };
      }

      return this.store.markSettled(this.game.id, fromUserId, toUserId, transfer.amount, method);
    });
  }

  async resetSettlement(fromUserId: string, toUserId: string): Promise<Result<void>> {
    return this.lock.runExclusive<Result<void>>(this.game.id, async () => {
      if (!findTransfer(this.plan.transfers, fromUserId, toUserId)) {
        const listed = await this.store.listSettled(this.game.id);
        if (!listed.ok) return listed;

        const stored = listed.data.some(
          (record) => record.fromUserId === fromUserId && record.toUserId === toUserId
        );
        if (!stored) {
          return {
            ok: false,
            error: {
              type: 'not_found',
              message: `No settlement from ${fromUserId} to ${toUserId} to reset`,
              from: fromUserId,
              to: toUserId,
            },
          };
        }
      }

      return this.store.reset(this.game.id, fromUserId, toUserId);
    });
  }

  /**
   * Swap in a new transaction list, recompute, and purge orphaned records
   */
  async replaceTransactions(transactions: Transaction[]): Promise<Result<ReconciliationReport>> {
    return this.lock.runExclusive<Result<ReconciliationReport>>(this.game.id, async () => {
      if (!isGameEditable(this.game)) {
        return {
          ok: false,
          error: {
            type: 'validation',
            message: `Transactions of a ${this.game.status} game cannot be changed`,
          },
        };
      }

      this.transactions = [...transactions];
      this.balances = computeBalances(this.participants, this.transactions);
      this.plan = generateSettlementPlan(this.balances);

      const listed = await this.store.listSettled(this.game.id);
      if (!listed.ok) return listed;

      const report = reconcileSettlements(this.plan.transfers, listed.data);
      for (const orphan of report.orphaned) {
        const { record } = orphan;
        const reset = await this.store.reset(this.game.id, record.fromUserId, record.toUserId);
        if (!reset.ok) {
          console.error(
            `[settlement-session] Failed to purge settlement ${record.fromUserId} → ${record.toUserId}:`,
            reset.error.message
          );
          return reset;
        }
        console.info(`[settlement-session] Purged: ${toInconsistentStateError(orphan).message}`);
      }

      return { ok: true, data: report };
    });
  }

  /**
   * Complete the game once buy-ins and cash-outs balance
   */
  async closeGame(): Promise<Result<Game>> {
    return this.lock.runExclusive<Result<Game>>(this.game.id, async () => {
      if (this.game.status !== 'in_progress') {
        return transitionGame(this.game, 'completed', this.now());
      }

      const report = this.checkBalance();
      if (!report.balanced) {
        console.warn(
          `[settlement-session] Refusing to close game ${this.game.id}: ` +
            `discrepancy $${formatAmount(report.discrepancy)}`
        );
        return {
          ok: false,
          error: { type: 'validation', message: report.message, discrepancy: report.discrepancy },
        };
      }

      const result = transitionGame(this.game, 'completed', this.now());
      if (result.ok) {
        this.game = result.data;
      }
      return result;
    });
  }
}
