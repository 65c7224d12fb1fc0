/**
 * Input validation for money amounts, transactions and settlement records
 *
 * Validators return `{ valid, reason }` instead of throwing so that callers
 * can show the reason directly.
 */

import { FINANCIAL_CONFIG, PAYMENT_METHODS } from '@chipledger/shared';
import type { PaymentMethod, TransactionInput } from '@chipledger/shared';
import { formatAmount, toCents } from '../calculations/money';

export interface InputValidation {
  valid: boolean;
  reason?: string;
}

export interface AmountBounds {
  min: number;
  max: number;
  label: string;
}

const TRANSACTION_BOUNDS: AmountBounds = {
  min: FINANCIAL_CONFIG.MIN_TRANSACTION_AMOUNT,
  max: FINANCIAL_CONFIG.MAX_TRANSACTION_AMOUNT,
  label: 'Transaction amount',
};

const SETTLEMENT_BOUNDS: AmountBounds = {
  min: FINANCIAL_CONFIG.MIN_SETTLEMENT_AMOUNT,
  max: FINANCIAL_CONFIG.MAX_SETTLEMENT_AMOUNT,
  label: 'Settlement amount',
};

/**
 * Validate that an amount is finite, within bounds and has at most two decimals
 */
export function validateAmount(amount: number, bounds: AmountBounds): InputValidation {
  const { min, max, label } = bounds;

  if (!Number.isFinite(amount)) {
    return { valid: false, reason: `${label} must be a valid number` };
  }
  if (amount < 0) {
    return { valid: false, reason: `${label} cannot be negative` };
  }
  if (amount < min) {
    return { valid: false, reason: `${label} must be at least $${formatAmount(min)}` };
  }
  if (amount > max) {
    return { valid: false, reason: `${label} exceeds maximum of $${formatAmount(max)}` };
  }
  // Anything finer than a cent shows up as a mismatch after rounding
  if (Math.abs(amount * 100 - toCents(amount)) > 1e-6) {
    return {
      valid: false,
      reason: `${label} must have at most ${FINANCIAL_CONFIG.CURRENCY_DECIMALS} decimal places`,
    };
  }
  return { valid: true };
}

export function isPaymentMethod(value: string): value is PaymentMethod {
  return PAYMENT_METHODS.some((method) => method === value);
}

/**
 * Validate a buy-in or cash-out before it is recorded
 */
export function validateTransactionInput(input: TransactionInput): InputValidation {
  if (!input.gameId) {
    return { valid: false, reason: 'Game ID is required' };
  }
  if (!input.userId) {
    return { valid: false, reason: 'User ID is required' };
  }
  if (input.type !== 'buyin' && input.type !== 'cashout') {
    return { valid: false, reason: 'Transaction type must be "buyin" or "cashout"' };
  }
  if (input.notes && input.notes.length > FINANCIAL_CONFIG.MAX_NOTES_LENGTH) {
    return {
      valid: false,
      reason: `Notes must not exceed ${FINANCIAL_CONFIG.MAX_NOTES_LENGTH} characters`,
    };
  }
  return validateAmount(input.amount, TRANSACTION_BOUNDS);
}

/**
 * Validate a settlement record before it is written to a store
 */
export function validateSettlementInput(input: {
  gameId: string;
  fromUserId: string;
  toUserId: string;
  amount: number;
  paymentMethod: string;
}): InputValidation {
  if (!input.gameId) {
    return { valid: false, reason: 'Game ID is required' };
  }
  if (!input.fromUserId || !input.toUserId) {
    return { valid: false, reason: 'Payer and payee IDs are required' };
  }
  if (input.fromUserId === input.toUserId) {
    return { valid: false, reason: 'Payer and payee must be different people' };
  }
  if (!isPaymentMethod(input.paymentMethod)) {
    return {
      valid: false,
      reason: `Invalid payment method: "${input.paymentMethod}". Must be one of: ${PAYMENT_METHODS.join(', ')}`,
    };
  }
  return validateAmount(input.amount, SETTLEMENT_BOUNDS);
}
