import { promises as fs } from 'fs';
import path from 'path';
import { CsvRecordStore } from '@/repositories/record.store';
import { StorageError } from '@/errors';
import { Transaction } from '@/models';
import { hashPin } from '@/utils/pinHasher';
import { buildAccount, FIXED_TIMESTAMP } from '@/tests/utils/fixtures';
import { createTempDir, removeTempDir } from '@/tests/utils/tempDir';

const ACCOUNTS_HEADER = 'account_number,name,pin_hash,address,balance,is_deleted';
const TRANSACTIONS_HEADER = 'timestamp,account_number,type,amount,counterparty_account,direction';

describe('CsvRecordStore', () => {
  let dir: string;
  let accountsFile: string;
  let transactionsFile: string;
  let store: CsvRecordStore;

  beforeEach(async () => {
    dir = await createTempDir();
    accountsFile = path.join(dir, 'accounts.csv');
    transactionsFile = path.join(dir, 'transactions.csv');
    store = new CsvRecordStore({ accountsFile, transactionsFile });
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  describe('initialize', () => {
    it('should create both tables once', async () => {
      await expect(store.initialize()).resolves.toEqual({
        accountsCreated: true,
        transactionsCreated: true,
      });
      await expect(store.initialize()).resolves.toEqual({
        accountsCreated: false,
        transactionsCreated: false,
      });

      await expect(fs.readFile(accountsFile, 'utf8')).resolves.toBe(`${ACCOUNTS_HEADER}\n`);
      await expect(fs.readFile(transactionsFile, 'utf8')).resolves.toBe(
        `${TRANSACTIONS_HEADER}\n`
      );
    });

    it('should fail with StorageError when a table path is not writable', async () => {
      const blocker = path.join(dir, 'blocker');
      await fs.writeFile(blocker, 'plain file', 'utf8');
      const broken = new CsvRecordStore({
        accountsFile: path.join(blocker, 'accounts.csv'),
        transactionsFile,
      });

      await expect(broken.initialize()).rejects.toThrow(StorageError);
    });
  });

  describe('accounts', () => {
    beforeEach(async () => {
      await store.initialize();
    });

    it('should save and load accounts in file order', async () => {
      const first = buildAccount({ name: 'Ahmed Khan', address: '456 Gulshan Ave, Lahore' });
      const second = buildAccount({
        accountNumber: '987654321',
        pinHash: hashPin('1234'),
        balance: '12.50',
        isDeleted: true,
      });

      await store.saveAccounts([first, second]);

      await expect(fs.readFile(accountsFile, 'utf8')).resolves.toBe(
        `${ACCOUNTS_HEADER}\n` +
          `123456789,Ahmed Khan,${hashPin('5678')},"456 Gulshan Ave, Lahore",0.00,0\n` +
          `987654321,Test User,${hashPin('1234')},1 Test Street,12.50,1\n`
      );
      await expect(store.loadAccounts()).resolves.toEqual([first, second]);
    });

    it('should normalize stored balances to two decimals', async () => {
      await fs.appendFile(
        accountsFile,
        `123456789,Test User,${hashPin('5678')},1 Test Street,5,0\n`,
        'utf8'
      );

      const [account] = await store.loadAccounts();

      expect(account?.balance).toBe('5.00');
    });

    it('should hide deleted accounts unless asked for them', async () => {
      const deleted = buildAccount({ isDeleted: true });
      await store.saveAccounts([deleted]);

      await expect(store.findAccount('123456789')).resolves.toBeNull();
      await expect(
        store.findAccount('123456789', { includeDeleted: true })
      ).resolves.toEqual(deleted);
      await expect(store.findAccount('555555555')).resolves.toBeNull();
    });

    it('should reject a row with a malformed balance', async () => {
      await fs.appendFile(
        accountsFile,
        `123456789,Test User,${hashPin('5678')},1 Test Street,lots,0\n`,
        'utf8'
      );

      await expect(store.loadAccounts()).rejects.toThrow(
        'Malformed account row at line 2: balance: balance must be a non-negative decimal'
      );
    });

    it('should reject duplicate account numbers', async () => {
      const account = buildAccount();
      await store.saveAccounts([account, { ...account, name: 'Someone Else' }]);

      await expect(store.loadAccounts()).rejects.toThrow(
        'Duplicate account number 123456789 at line 3'
      );
    });
  });

  describe('transactions', () => {
    const deposit: Transaction = {
      timestamp: FIXED_TIMESTAMP,
      accountNumber: '123456789',
      type: 'Deposit',
      amount: '100.00',
      counterpartyAccount: '',
      direction: 'Credit',
    };
    const debit: Transaction = {
      timestamp: '2026-01-15 10:00:00',
      accountNumber: '123456789',
      type: 'Transfer',
      amount: '25.00',
      counterpartyAccount: '987654321',
      direction: 'Debit',
    };
    const credit: Transaction = {
      ...debit,
      accountNumber: '987654321',
      counterpartyAccount: '123456789',
      direction: 'Credit',
    };

    beforeEach(async () => {
      await store.initialize();
    });

    it('should append rows and keep earlier ones', async () => {
      await store.appendTransaction(deposit);
      await store.appendTransactions([debit, credit]);

      await expect(fs.readFile(transactionsFile, 'utf8')).resolves.toBe(
        `${TRANSACTIONS_HEADER}\n` +
          `${FIXED_TIMESTAMP},123456789,Deposit,100.00,,Credit\n` +
          '2026-01-15 10:00:00,123456789,Transfer,25.00,987654321,Debit\n' +
          '2026-01-15 10:00:00,987654321,Transfer,25.00,123456789,Credit\n'
      );
    });

    it('should return only the acting account rows, oldest first', async () => {
      await store.appendTransactions([deposit, debit, credit]);

      await expect(store.loadTransactions('123456789')).resolves.toEqual([deposit, debit]);
      await expect(store.loadTransactions('987654321')).resolves.toEqual([credit]);
      await expect(store.loadTransactions('555555555')).resolves.toEqual([]);
    });

    it('should reject a row with an unknown type', async () => {
      await fs.appendFile(
        transactionsFile,
        `${FIXED_TIMESTAMP},123456789,Refund,1.00,,Credit\n`,
        'utf8'
      );

      await expect(store.loadTransactions('123456789')).rejects.toThrow(
        /Malformed transaction row at line 2: type:/
      );
    });
  });
});
