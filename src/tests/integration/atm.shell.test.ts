import path from 'path';
import { AtmApp, createApp } from '@/app';
import {
  AtmShell,
  FAREWELL,
  formatHistoryLine,
  MENU_LINES,
  UNEXPECTED_ERROR,
} from '@/cli/atm.shell';
import { StorageError } from '@/errors';
import { fixedClock, FIXED_TIMESTAMP } from '@/tests/utils/fixtures';
import { ScriptedPrompter } from '@/tests/utils/scriptedPrompter';
import { createTempDir, removeTempDir } from '@/tests/utils/tempDir';

const MENU = [...MENU_LINES];

describe('AtmShell', () => {
  let dir: string;
  let app: AtmApp;

  beforeEach(async () => {
    dir = await createTempDir();
    app = createApp(
      {
        accountsFile: path.join(dir, 'accounts.csv'),
        transactionsFile: path.join(dir, 'transactions.csv'),
        seedDemoAccounts: true,
      },
      fixedClock
    );
    await app.initialize();
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await removeTempDir(dir);
  });

  const runShell = async (answers: string[]): Promise<string[]> => {
    const output: string[] = [];
    const shell = new AtmShell(app.accountService, new ScriptedPrompter(answers), (line) =>
      output.push(line)
    );
    await shell.run();
    return output;
  };

  it('should serve deposit, withdrawal, balance and history in one session', async () => {
    const output = await runShell(['123456789', '5678', '2', '100', '3', '50', '1', '6', '8']);

    expect(output).toEqual([
      '--- Login ---',
      'Login successful!',
      ...MENU,
      'Deposited 100.00',
      ...MENU,
      'Withdrawn 50.00',
      ...MENU,
      'Current balance: 50.00',
      ...MENU,
      '--- Transaction History ---',
      `${FIXED_TIMESTAMP} | Deposit | 100.00 | - | Credit`,
      `${FIXED_TIMESTAMP} | Withdrawal | 50.00 | - | Debit`,
      ...MENU,
      FAREWELL,
    ]);
  });

  it('should count down PIN attempts and exit when reset is declined', async () => {
    const output = await runShell(['123456789', '1111', '12', '9999', 'no']);

    expect(output).toEqual([
      '--- Login ---',
      'Incorrect PIN. 2 attempts left.',
      'PIN must be 4 digits. 1 attempt left.',
      'Incorrect PIN. 0 attempts left.',
      'Too many attempts.',
      FAREWELL,
    ]);
  });

  it('should reset the PIN after a lockout and log in with the new one', async () => {
    const output = await runShell([
      '123456789',
      '0000',
      '0000',
      '0000',
      'yes',
      '1234',
      '1234',
      '4321',
      '4321',
      '123456789',
      '4321',
      '8',
    ]);

    expect(output).toEqual([
      '--- Login ---',
      'Incorrect PIN. 2 attempts left.',
      'Incorrect PIN. 1 attempt left.',
      'Incorrect PIN. 0 attempts left.',
      'Too many attempts.',
      'PIN already in use. Choose a different PIN.',
      'PIN changed successfully.',
      'Please try logging in again.',
      '--- Login ---',
      'Login successful!',
      ...MENU,
      FAREWELL,
    ]);
  });

  it('should report an unknown account and exit on an empty account number', async () => {
    const output = await runShell(['555555555', '']);

    expect(output).toEqual([
      '--- Login ---',
      'Account 555555555 not found',
      '--- Login ---',
      FAREWELL,
    ]);
  });

  it('should re-prompt a transfer until the target and amount are valid', async () => {
    const account = await app.accountService.authenticate('123456789', '5678');
    await app.accountService.deposit(account, '100');

    const output = await runShell([
      '123456789',
      '5678',
      '4',
      '123456789',
      '111111111',
      '987654321',
      'abc',
      '500',
      '25',
      '1',
      '8',
    ]);

    expect(output).toEqual([
      '--- Login ---',
      'Login successful!',
      ...MENU,
      'Cannot transfer to your own account.',
      'Target account not found.',
      'Invalid amount format. Use numbers (e.g., 10 or 10.50).',
      'Insufficient funds: available 100.00, requested 500.00',
      'Transferred 25.00 to account 987654321',
      ...MENU,
      'Current balance: 75.00',
      ...MENU,
      FAREWELL,
    ]);
    await expect(app.accountService.getAccount('987654321')).resolves.toMatchObject({
      balance: '25.00',
    });
  });

  it('should delete the account only after confirmation and end the session', async () => {
    const output = await runShell(['123456789', '5678', '7', 'no', '7', 'yes']);

    expect(output).toEqual([
      '--- Login ---',
      'Login successful!',
      ...MENU,
      'Account deletion cancelled.',
      ...MENU,
      'Account deleted successfully.',
      FAREWELL,
    ]);
    await expect(app.accountService.authenticate('123456789', '5678')).rejects.toMatchObject({
      reason: 'NOT_FOUND',
    });
  });

  it('should reject unknown menu options and end when input closes', async () => {
    const output = await runShell(['123456789', '5678', '9']);

    expect(output).toEqual([
      '--- Login ---',
      'Login successful!',
      ...MENU,
      'Invalid option.',
      ...MENU,
      FAREWELL,
    ]);
  });

  it('should change the PIN from the menu after a wrong current PIN', async () => {
    const output = await runShell([
      '123456789',
      '5678',
      '5',
      '0000',
      '2468',
      '2468',
      '5678',
      '2468',
      '2468',
      '8',
    ]);

    expect(output).toEqual([
      '--- Login ---',
      'Login successful!',
      ...MENU,
      'Incorrect PIN. 2 attempts left.',
      'PIN changed successfully.',
      ...MENU,
      FAREWELL,
    ]);
    await expect(app.accountService.authenticate('123456789', '2468')).resolves.toMatchObject({
      accountNumber: '123456789',
    });
  });

  it('should report a storage failure and keep serving the menu', async () => {
    jest
      .spyOn(app.recordStore, 'saveAccounts')
      .mockRejectedValueOnce(new StorageError('accounts.csv', 'Failed to write table: EACCES'));

    const output = await runShell(['123456789', '5678', '2', '100', '1', '8']);

    expect(output).toEqual([
      '--- Login ---',
      'Login successful!',
      ...MENU,
      'Failed to write table: EACCES (accounts.csv)',
      ...MENU,
      'Current balance: 0.00',
      ...MENU,
      FAREWELL,
    ]);
  });

  it('should show a generic message for unexpected errors and keep serving the menu', async () => {
    jest.spyOn(app.recordStore, 'loadTransactions').mockRejectedValueOnce(new Error('disk gone'));

    const output = await runShell(['123456789', '5678', '6', '1', '8']);

    expect(output).toEqual([
      '--- Login ---',
      'Login successful!',
      ...MENU,
      UNEXPECTED_ERROR,
      ...MENU,
      'Current balance: 0.00',
      ...MENU,
      FAREWELL,
    ]);
  });

  it('should show an empty history and cancel a deposit on an empty amount', async () => {
    const output = await runShell(['987654321', '1234', '6', '2', '', '8']);

    expect(output).toEqual([
      '--- Login ---',
      'Login successful!',
      ...MENU,
      '--- Transaction History ---',
      'No transactions found.',
      ...MENU,
      'Deposit cancelled.',
      ...MENU,
      FAREWELL,
    ]);
  });
});

describe('formatHistoryLine', () => {
  it('should show the counterparty of a transfer', () => {
    expect(
      formatHistoryLine({
        timestamp: FIXED_TIMESTAMP,
        accountNumber: '123456789',
        type: 'Transfer',
        amount: '25.00',
        counterpartyAccount: '987654321',
        direction: 'Debit',
      })
    ).toBe(`${FIXED_TIMESTAMP} | Transfer | 25.00 | 987654321 | Debit`);
  });
});
