/**
 * Transaction data types (buy-ins and cash-outs)
 */

export type TransactionType = 'buyin' | 'cashout';

export interface Transaction {
  id: string;
  gameId: string;
  userId: string;
  type: TransactionType;
  amount: number; // Two-decimal currency amount, never negative
  timestamp: number; // Unix timestamp (ms)
  notes?: string;
}

/**
 * Fields a user supplies when recording a buy-in or cash-out
 */
export type TransactionInput = Omit<Transaction, 'id'>;
