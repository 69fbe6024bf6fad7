import {
  ACCOUNT_COLUMNS,
  AccountColumn,
  DELETED_FLAGS,
  TRANSACTION_COLUMNS,
  TransactionColumn,
} from '@/constants/records';
import { StorageError } from '@/errors';
import { Account, Transaction } from '@/models';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { accountRowSchema, describeIssues, transactionRowSchema } from '@/validators/record.validator';
import { CsvTable } from './csv/csvTable';
import { FindAccountOptions, InitializeResult, IRecordStore } from './interfaces/IRecordStore';

const logger = createLogger('RecordStore');

export interface RecordStorePaths {
  accountsFile: string;
  transactionsFile: string;
}

/**
 * CSV Record Store
 * Owns the accounts table and the transactions log
 *
 * Every call reads the file again; nothing is cached between operations.
 */
export class CsvRecordStore implements IRecordStore {
  private readonly accounts: CsvTable<AccountColumn>;
  private readonly transactions: CsvTable<TransactionColumn>;

  constructor(paths: RecordStorePaths) {
    this.accounts = new CsvTable(paths.accountsFile, ACCOUNT_COLUMNS);
    this.transactions = new CsvTable(paths.transactionsFile, TRANSACTION_COLUMNS);
  }

  async initialize(): Promise<InitializeResult> {
    const accountsCreated = await this.accounts.initialize();
    const transactionsCreated = await this.transactions.initialize();

    logger.info(
      {
        accountsFile: this.accounts.filePath,
        transactionsFile: this.transactions.filePath,
        accountsCreated,
        transactionsCreated,
      },
      'Record store initialized'
    );

    return { accountsCreated, transactionsCreated };
  }

  async loadAccounts(): Promise<Account[]> {
    const rows = await this.accounts.readRows();
    const seen = new Set<string>();

    return rows.map(({ line, values }) => {
      const parsed = accountRowSchema.safeParse(values);

      if (!parsed.success) {
        throw new StorageError(
          this.accounts.filePath,
          `Malformed account row at line ${line}: ${describeIssues(parsed.error)}`
        );
      }

      if (seen.has(parsed.data.accountNumber)) {
        throw new StorageError(
          this.accounts.filePath,
          `Duplicate account number ${parsed.data.accountNumber} at line ${line}`
        );
      }
      seen.add(parsed.data.accountNumber);

      return parsed.data;
    });
  }

  async saveAccounts(accounts: readonly Account[]): Promise<void> {
    await this.accounts.writeRows(
      accounts.map((account) => ({
        account_number: account.accountNumber,
        name: account.name,
        pin_hash: account.pinHash,
        address: account.address,
        balance: account.balance,
        is_deleted: account.isDeleted ? DELETED_FLAGS.DELETED : DELETED_FLAGS.ACTIVE,
      }))
    );

    logger.debug({ rows: accounts.length }, 'Accounts table saved');
  }

  async findAccount(
    accountNumber: string,
    options: FindAccountOptions = {}
  ): Promise<Account | null> {
    const accounts = await this.loadAccounts();
    const account = accounts.find((candidate) => candidate.accountNumber === accountNumber);

    if (!account || (account.isDeleted && !options.includeDeleted)) {
      return null;
    }
    return account;
  }

  async appendTransaction(transaction: Transaction): Promise<void> {
    await this.appendTransactions([transaction]);
  }

  async appendTransactions(transactions: readonly Transaction[]): Promise<void> {
    await this.transactions.appendRows(
      transactions.map((transaction) => ({
        timestamp: transaction.timestamp,
        account_number: transaction.accountNumber,
        type: transaction.type,
        amount: transaction.amount,
        counterparty_account: transaction.counterpartyAccount,
        direction: transaction.direction,
      }))
    );

    logger.debug({ rows: transactions.length }, 'Transaction rows appended');
  }

  async loadTransactions(accountNumber: string): Promise<Transaction[]> {
    const rows = await this.transactions.readRows();
    const history: Transaction[] = [];

    for (const { line, values } of rows) {
      const parsed = transactionRowSchema.safeParse(values);

      if (!parsed.success) {
        throw new StorageError(
          this.transactions.filePath,
          `Malformed transaction row at line ${line}: ${describeIssues(parsed.error)}`
        );
      }

      if (parsed.data.accountNumber === accountNumber) {
        history.push(parsed.data);
      }
    }

    return history;
  }
}
