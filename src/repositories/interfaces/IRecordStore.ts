import { Account, Transaction } from '@/models';

export interface InitializeResult {
  accountsCreated: boolean;
  transactionsCreated: boolean;
}

export interface FindAccountOptions {
  includeDeleted?: boolean;
}

/**
 * Record Store Interface
 * Defines the contract for the accounts table and the transactions log
 *
 * Every method rejects with StorageError on I/O or parse failure.
 */
export interface IRecordStore {
  /**
   * Create both tables with their header rows if absent.
   * Existing tables are left untouched, so repeated calls are harmless.
   */
  initialize(): Promise<InitializeResult>;

  /**
   * Every account row, soft-deleted ones included, in file order
   */
  loadAccounts(): Promise<Account[]>;

  /**
   * Overwrite the accounts table with exactly these rows
   */
  saveAccounts(accounts: readonly Account[]): Promise<void>;

  /**
   * @returns the account, or null if absent (or deleted, unless includeDeleted)
   */
  findAccount(accountNumber: string, options?: FindAccountOptions): Promise<Account | null>;

  appendTransaction(transaction: Transaction): Promise<void>;

  /**
   * Append several log rows in one write, in the given order
   */
  appendTransactions(transactions: readonly Transaction[]): Promise<void>;

  /**
   * Log rows whose acting account is accountNumber, oldest first
   */
  loadTransactions(accountNumber: string): Promise<Transaction[]>;
}
