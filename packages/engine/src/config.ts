/**
 * Runtime configuration read from the environment
 */

import { STORAGE_CONFIG } from '@chipledger/shared';

const DEFAULT_PAGE_SIZE = 200;

/**
 * Parse a list page size, falling back to the default unless the value is a
 * positive integer
 */
export function parsePageSize(value: string | undefined): number {
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : DEFAULT_PAGE_SIZE;
}

export const ENGINE_CONFIG = {
  POCKETBASE_URL: process.env.POCKETBASE_URL || 'http://127.0.0.1:8090',
  SETTLEMENT_DB_NAME: process.env.SETTLEMENT_DB_NAME || STORAGE_CONFIG.DB_NAME,
  PAGE_SIZE: parsePageSize(process.env.POCKETBASE_PAGE_SIZE),
} as const;
