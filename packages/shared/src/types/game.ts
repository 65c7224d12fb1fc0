/**
 * Game data types
 */

import type { GAME_STATUSES } from '../constants';
import type { Transaction } from './transaction';
import type { SettlementRecord } from './settlement';

export type GameStatus = (typeof GAME_STATUSES)[number];

export interface Game {
  id: string;
  groupId: string;
  name: string;
  status: GameStatus;
  currency: string; // ISO 4217 code
  createdAt: number; // Unix timestamp (ms)
  completedAt?: number;
}

/**
 * Everything the engine needs to evaluate one game, already fetched
 */
export interface GameSnapshot {
  game: Game;
  participants: string[]; // User IDs
  transactions: Transaction[];
  settlements: SettlementRecord[];
}
