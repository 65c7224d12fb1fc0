export const FINANCIAL_CONFIG = {
  EPSILON: 0.01, // Tolerance for balance and settlement-remainder comparisons
  CURRENCY_DECIMALS: 2,
  MIN_TRANSACTION_AMOUNT: 0.01,
  MAX_TRANSACTION_AMOUNT: 10000,
  MIN_SETTLEMENT_AMOUNT: 0.01,
  MAX_SETTLEMENT_AMOUNT: 5000,
  MAX_NOTES_LENGTH: 500,
} as const;

export const PAYMENT_METHODS = ['cash', 'venmo', 'paypal', 'zelle'] as const;

export const GAME_STATUSES = ['scheduled', 'in_progress', 'completed', 'cancelled'] as const;

export const STORAGE_CONFIG = {
  DB_NAME: 'chipledger-db',
  DB_VERSION: 1,
} as const;

export const COLLECTIONS = {
  GAMES: 'games',
  PARTICIPANTS: 'game_participants',
  TRANSACTIONS: 'transactions',
  SETTLEMENTS: 'settlements',
} as const;

export const SETTLEMENT_MESSAGES = {
  NONE_NEEDED: 'No settlements needed',
  BALANCED: 'Buy-ins and cash-outs match!',
} as const;
