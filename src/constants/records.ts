/**
 * Transaction types written to the log
 */
export const TRANSACTION_TYPES = {
  DEPOSIT: 'Deposit',
  WITHDRAWAL: 'Withdrawal',
  TRANSFER: 'Transfer',
} as const;

/**
 * Direction of a log row relative to the acting account
 */
export const DIRECTIONS = {
  CREDIT: 'Credit',
  DEBIT: 'Debit',
} as const;

/**
 * Column order of the accounts table (header row)
 */
export const ACCOUNT_COLUMNS = [
  'account_number',
  'name',
  'pin_hash',
  'address',
  'balance',
  'is_deleted',
] as const;

/**
 * Column order of the transactions table (header row)
 *
 * account_number identifies the acting account; history lookups filter on it.
 */
export const TRANSACTION_COLUMNS = [
  'timestamp',
  'account_number',
  'type',
  'amount',
  'counterparty_account',
  'direction',
] as const;

/**
 * is_deleted flag as stored on disk
 */
export const DELETED_FLAGS = {
  ACTIVE: '0',
  DELETED: '1',
} as const;

// Type exports
export type TransactionType = (typeof TRANSACTION_TYPES)[keyof typeof TRANSACTION_TYPES];
export type Direction = (typeof DIRECTIONS)[keyof typeof DIRECTIONS];
export type AccountColumn = (typeof ACCOUNT_COLUMNS)[number];
export type TransactionColumn = (typeof TRANSACTION_COLUMNS)[number];
