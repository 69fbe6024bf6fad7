import Decimal from 'decimal.js';
import { DIRECTIONS, Direction, TRANSACTION_TYPES, TransactionType } from '@/constants/records';
import {
  AccountNotFoundError,
  AuthError,
  InsufficientFundsError,
  ValidationError,
} from '@/errors';
import { Account, Transaction } from '@/models';
import { IRecordStore } from '@/repositories/interfaces';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { hashPin, pinMatches } from '@/utils/pinHasher';
import { formatMoney } from '@/utils/money';
import { formatTimestamp } from '@/utils/timestamp';
import { assertValidPin, isValidAccountNumber, parseAmount } from '@/validators/account.validator';

const logger = createLogger('AccountService');

export interface TransferResult {
  source: Account;
  target: Account;
}

export interface ChangePinOptions {
  /**
   * When set, must match the stored PIN before anything changes
   */
  currentPin?: string;
  /**
   * When set, must equal the new PIN
   */
  confirmPin?: string;
}

/**
 * Account Service
 * Business logic for login, balance changes, PIN changes and soft deletion
 *
 * The Account passed in by callers identifies the session; balances and
 * flags are always re-read from the store before a mutation.
 */
export class AccountService {
  constructor(
    private recordStore: IRecordStore,
    private clock: () => Date = () => new Date()
  ) {}

  /**
   * Log in with account number and PIN
   *
   * PIN format is checked before any lookup. Unknown, malformed and
   * soft-deleted account numbers all fail with AuthError{NOT_FOUND}.
   */
  async authenticate(accountNumber: string, pin: string): Promise<Account> {
    assertValidPin(pin);

    const account = isValidAccountNumber(accountNumber)
      ? await this.recordStore.findAccount(accountNumber)
      : null;

    if (!account) {
      logger.warn({ accountNumber }, 'Login failed: account not found');
      throw new AuthError('NOT_FOUND', 'Account not found.');
    }

    if (!pinMatches(pin, account.pinHash)) {
      logger.warn({ accountNumber }, 'Login failed: incorrect PIN');
      throw new AuthError('BAD_PIN', 'Incorrect PIN.');
    }

    logger.info({ accountNumber }, 'Login succeeded');
    return account;
  }

  checkBalance(account: Account): string {
    return formatMoney(account.balance);
  }

  /**
   * Fresh copy of an active account, e.g. to refresh a session after a mutation
   */
  async getAccount(accountNumber: string): Promise<Account> {
    const account = isValidAccountNumber(accountNumber)
      ? await this.recordStore.findAccount(accountNumber)
      : null;

    if (!account) {
      throw new AccountNotFoundError(accountNumber);
    }
    return account;
  }

  async deposit(account: Account, amount: string | number): Promise<Account> {
    const value = parseAmount(amount);
    const accounts = await this.recordStore.loadAccounts();
    const current = this.requireActive(accounts, account.accountNumber);

    const updated: Account = {
      ...current,
      balance: formatMoney(new Decimal(current.balance).plus(value)),
    };

    await this.recordStore.saveAccounts(replaceAccount(accounts, updated));
    try {
      await this.recordStore.appendTransaction(
        this.entry(updated.accountNumber, TRANSACTION_TYPES.DEPOSIT, value, '', DIRECTIONS.CREDIT)
      );
    } catch (error) {
      logger.error(
        { accountNumber: updated.accountNumber, error },
        'Deposit log append failed, restoring balance'
      );
      await this.restoreAccounts(accounts);
      throw error;
    }

    logger.info(
      { accountNumber: updated.accountNumber, amount: formatMoney(value), balance: updated.balance },
      'Deposit completed'
    );
    return updated;
  }

  async withdraw(account: Account, amount: string | number): Promise<Account> {
    const value = parseAmount(amount);
    const accounts = await this.recordStore.loadAccounts();
    const current = this.requireActive(accounts, account.accountNumber);

    this.assertSufficientFunds(current, value);

    const updated: Account = {
      ...current,
      balance: formatMoney(new Decimal(current.balance).minus(value)),
    };

    await this.recordStore.saveAccounts(replaceAccount(accounts, updated));
    try {
      await this.recordStore.appendTransaction(
        this.entry(updated.accountNumber, TRANSACTION_TYPES.WITHDRAWAL, value, '', DIRECTIONS.DEBIT)
      );
    } catch (error) {
      logger.error(
        { accountNumber: updated.accountNumber, error },
        'Withdrawal log append failed, restoring balance'
      );
      await this.restoreAccounts(accounts);
      throw error;
    }

    logger.info(
      { accountNumber: updated.accountNumber, amount: formatMoney(value), balance: updated.balance },
      'Withdrawal completed'
    );
    return updated;
  }

  /**
   * Move money between two active accounts
   *
   * Checks run in this order: self-transfer, target lookup, amount, funds.
   * Writes run in a fixed order:
   * 1. both balances, in one accounts-table snapshot
   * 2. the Debit and Credit log rows, in one append
   * If step 2 fails the previous snapshot is written back and the error
   * is rethrown, so success is only reported once both rows exist.
   */
  async transfer(
    account: Account,
    targetAccountNumber: string,
    amount: string | number
  ): Promise<TransferResult> {
    if (targetAccountNumber === account.accountNumber) {
      throw new ValidationError('SELF_TRANSFER', 'Cannot transfer to your own account.');
    }

    const accounts = await this.recordStore.loadAccounts();
    const current = this.requireActive(accounts, account.accountNumber);
    const target = accounts.find(
      (candidate) => candidate.accountNumber === targetAccountNumber && !candidate.isDeleted
    );

    if (!target) {
      logger.warn(
        { accountNumber: current.accountNumber, targetAccountNumber },
        'Transfer rejected: target account not found'
      );
      throw new AccountNotFoundError(targetAccountNumber);
    }

    const value = parseAmount(amount);
    this.assertSufficientFunds(current, value);

    const source: Account = {
      ...current,
      balance: formatMoney(new Decimal(current.balance).minus(value)),
    };
    const credited: Account = {
      ...target,
      balance: formatMoney(new Decimal(target.balance).plus(value)),
    };

    await this.recordStore.saveAccounts(
      replaceAccount(replaceAccount(accounts, source), credited)
    );

    const timestamp = formatTimestamp(this.clock());
    try {
      await this.recordStore.appendTransactions([
        this.entry(source.accountNumber, TRANSACTION_TYPES.TRANSFER, value, credited.accountNumber, DIRECTIONS.DEBIT, timestamp),
        this.entry(credited.accountNumber, TRANSACTION_TYPES.TRANSFER, value, source.accountNumber, DIRECTIONS.CREDIT, timestamp),
      ]);
    } catch (error) {
      logger.error(
        { accountNumber: source.accountNumber, targetAccountNumber, error },
        'Transfer log append failed, restoring balances'
      );
      await this.restoreAccounts(accounts);
      throw error;
    }

    logger.info(
      {
        accountNumber: source.accountNumber,
        targetAccountNumber: credited.accountNumber,
        amount: formatMoney(value),
      },
      'Transfer completed'
    );
    return { source, target: credited };
  }

  /**
   * Replace the PIN digest of an active account
   *
   * Fails with:
   * - AuthError{BAD_PIN} if options.currentPin is given and wrong
   * - ValidationError{BAD_PIN_FORMAT} for a malformed current or new PIN
   * - ValidationError{PIN_MISMATCH} if options.confirmPin differs
   * - ValidationError{PIN_NOT_UNIQUE} if another active account uses the PIN
   */
  async changePin(
    account: Account,
    newPin: string,
    options: ChangePinOptions = {}
  ): Promise<Account> {
    const accounts = await this.recordStore.loadAccounts();
    const current = this.requireActive(accounts, account.accountNumber);

    if (options.currentPin !== undefined) {
      assertValidPin(options.currentPin);
      if (!pinMatches(options.currentPin, current.pinHash)) {
        logger.warn({ accountNumber: current.accountNumber }, 'PIN change rejected: incorrect current PIN');
        throw new AuthError('BAD_PIN', 'Incorrect PIN.');
      }
    }

    assertValidPin(newPin);

    if (options.confirmPin !== undefined && options.confirmPin !== newPin) {
      throw new ValidationError('PIN_MISMATCH', 'PINs do not match.');
    }

    const pinHash = hashPin(newPin);
    const inUse = accounts.some(
      (other) =>
        other.accountNumber !== current.accountNumber &&
        !other.isDeleted &&
        other.pinHash === pinHash
    );

    if (inUse) {
      logger.warn({ accountNumber: current.accountNumber }, 'PIN change rejected: PIN not unique');
      throw new ValidationError('PIN_NOT_UNIQUE', 'PIN already in use. Choose a different PIN.');
    }

    const updated: Account = { ...current, pinHash };
    await this.recordStore.saveAccounts(replaceAccount(accounts, updated));

    logger.info({ accountNumber: updated.accountNumber }, 'PIN changed');
    return updated;
  }

  /**
   * Mark an account deleted. The row and its history stay on disk.
   *
   * @param confirmed - the caller's explicit confirmation; false is rejected
   */
  async softDelete(account: Account, confirmed: boolean): Promise<Account> {
    if (!confirmed) {
      throw new ValidationError('NOT_CONFIRMED', 'Account deletion requires confirmation.');
    }

    const accounts = await this.recordStore.loadAccounts();
    const current = this.requireActive(accounts, account.accountNumber);
    const updated: Account = { ...current, isDeleted: true };

    await this.recordStore.saveAccounts(replaceAccount(accounts, updated));

    logger.info({ accountNumber: updated.accountNumber }, 'Account soft-deleted');
    return updated;
  }

  /**
   * Log rows for the account, oldest first. Works for deleted accounts too.
   */
  async transactionHistory(account: Account): Promise<Transaction[]> {
    return this.recordStore.loadTransactions(account.accountNumber);
  }

  private requireActive(accounts: readonly Account[], accountNumber: string): Account {
    const account = accounts.find((candidate) => candidate.accountNumber === accountNumber);

    if (!account || account.isDeleted) {
      throw new AccountNotFoundError(accountNumber);
    }
    return account;
  }

  private assertSufficientFunds(account: Account, amount: Decimal): void {
    if (amount.greaterThan(account.balance)) {
      logger.warn(
        {
          accountNumber: account.accountNumber,
          available: account.balance,
          requested: formatMoney(amount),
        },
        'Operation rejected: insufficient funds'
      );
      throw new InsufficientFundsError(account.balance, formatMoney(amount));
    }
  }

  private async restoreAccounts(accounts: readonly Account[]): Promise<void> {
    try {
      await this.recordStore.saveAccounts(accounts);
    } catch (restoreError) {
      logger.fatal(
        { error: restoreError },
        'Failed to restore balances; accounts table and log disagree'
      );
    }
  }

  private entry(
    accountNumber: string,
    type: TransactionType,
    amount: Decimal,
    counterpartyAccount: string,
    direction: Direction,
    timestamp: string = formatTimestamp(this.clock())
  ): Transaction {
    return {
      timestamp,
      accountNumber,
      type,
      amount: formatMoney(amount),
      counterpartyAccount,
      direction,
    };
  }
}

function replaceAccount(accounts: readonly Account[], updated: Account): Account[] {
  return accounts.map((account) =>
    account.accountNumber === updated.accountNumber ? updated : account
  );
}
