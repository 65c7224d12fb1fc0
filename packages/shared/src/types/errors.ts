/**
 * Error and result types shared by every fallible engine operation
 */

import type { OrphanReason, SettlementRecord } from './settlement';

export interface ValidationError {
  type: 'validation';
  message: string;
  discrepancy?: number; // Set when the books do not balance
}

export interface NotFoundError {
  type: 'not_found';
  message: string;
  from: string;
  to: string;
}

export interface InconsistentStateError {
  type: 'inconsistent_state';
  message: string;
  record: SettlementRecord;
  reason: OrphanReason;
}

export interface StorageError {
  type: 'storage';
  message: string;
  cause?: unknown;
}

export type SettlementError =
  | ValidationError
  | NotFoundError
  | InconsistentStateError
  | StorageError;

export type Result<T> = { ok: true; data: T } | { ok: false; error: SettlementError };
