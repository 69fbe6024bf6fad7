import { CREDENTIAL_RULES } from '@/config/businessRules';
import {
  AccountNotFoundError,
  AppError,
  AuthError,
  InsufficientFundsError,
  StorageError,
  ValidationError,
} from '@/errors';
import { Account, Transaction } from '@/models';
import { AccountService } from '@/services/account.service';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { formatMoney } from '@/utils/money';
import { Prompter } from './prompter';

const logger = createLogger('AtmShell');

export const MENU_LINES = [
  '--- ATM Menu ---',
  '1. Check Balance',
  '2. Deposit Funds',
  '3. Withdraw Funds',
  '4. Transfer Funds',
  '5. Change PIN',
  '6. View Transactions',
  '7. Delete Account',
  '8. Exit',
] as const;

export const FAREWELL = 'Thank you for using the ATM!';
export const UNEXPECTED_ERROR = 'Something went wrong. Please try again.';

type LoginOutcome = Account | 'retry' | 'exit';

/**
 * Interactive ATM shell
 *
 * Turns prompted lines into AccountService calls. Every error is rendered
 * as a message; none ends the process.
 */
export class AtmShell {
  constructor(
    private readonly accountService: AccountService,
    private readonly prompter: Prompter,
    private readonly print: (line: string) => void = (line) => console.log(line)
  ) {}

  /**
   * Log in, serve one session, and return when the user exits
   */
  async run(): Promise<void> {
    for (;;) {
      const outcome = await this.login();

      if (outcome === 'exit') {
        this.print(FAREWELL);
        return;
      }
      if (outcome !== 'retry') {
        await this.session(outcome);
        return;
      }
    }
  }

  private async login(): Promise<LoginOutcome> {
    this.print('--- Login ---');
    const accountNumber = (await this.prompter.ask('Enter account number (or press Enter to exit): '))?.trim();

    if (!accountNumber) {
      return 'exit';
    }

    let account: Account;
    try {
      account = await this.accountService.getAccount(accountNumber);
    } catch (error) {
      this.report(error);
      return 'retry';
    }

    for (let attempt = 1; attempt <= CREDENTIAL_RULES.MAX_PIN_ATTEMPTS; attempt++) {
      const pin = await this.prompter.ask(`Enter ${CREDENTIAL_RULES.PIN_LENGTH}-digit PIN: `);
      if (pin === null) {
        return 'exit';
      }

      try {
        const authenticated = await this.accountService.authenticate(accountNumber, pin.trim());
        this.print('Login successful!');
        return authenticated;
      } catch (error) {
        if (error instanceof ValidationError || (error instanceof AuthError && error.reason === 'BAD_PIN')) {
          this.print(`${error.message} ${attemptsLeft(attempt)}`);
          continue;
        }
        this.report(error);
        return 'retry';
      }
    }

    return this.offerPinReset(account);
  }

  private async offerPinReset(account: Account): Promise<LoginOutcome> {
    this.print('Too many attempts.');
    const answer = await this.prompter.ask('Would you like to reset your PIN? (yes/no): ');

    if (answer?.trim().toLowerCase() !== 'yes') {
      return 'exit';
    }

    for (;;) {
      const newPin = (await this.prompter.ask('Enter new PIN (or press Enter to cancel): '))?.trim();
      if (!newPin) {
        this.print('PIN change cancelled.');
        return 'exit';
      }

      const confirmPin = await this.prompter.ask('Confirm new PIN: ');
      if (confirmPin === null) {
        return 'exit';
      }

      try {
        await this.accountService.changePin(account, newPin, { confirmPin: confirmPin.trim() });
        this.print('PIN changed successfully.');
        this.print('Please try logging in again.');
        return 'retry';
      } catch (error) {
        this.report(error);
        if (!(error instanceof ValidationError)) {
          return 'exit';
        }
      }
    }
  }

  private async session(start: Account): Promise<void> {
    let account = start;

    for (;;) {
      MENU_LINES.forEach((line) => this.print(line));
      const choice = await this.prompter.ask('Choose (1-8): ');

      if (choice === null) {
        break;
      }

      try {
        const next = await this.handleChoice(account, choice.trim());
        if (next === null) {
          break;
        }
        account = next;
      } catch (error) {
        this.report(error);
      }
    }

    this.print(FAREWELL);
  }

  /**
   * @returns the session account after the operation, or null to end the session
   */
  private async handleChoice(account: Account, choice: string): Promise<Account | null> {
    switch (choice) {
      case '1':
        this.print(`Current balance: ${this.accountService.checkBalance(account)}`);
        return account;
      case '2':
        return this.deposit(account);
      case '3':
        return this.withdraw(account);
      case '4':
        return this.transfer(account);
      case '5':
        return this.changePin(account);
      case '6':
        await this.showHistory(account);
        return account;
      case '7':
        return this.deleteAccount(account);
      case '8':
        return null;
      default:
        this.print('Invalid option.');
        return account;
    }
  }

  private async deposit(account: Account): Promise<Account> {
    const updated = await this.retryOnInputError(
      account,
      'Enter amount to deposit (or press Enter to cancel): ',
      'Deposit cancelled.',
      async (amount) => {
        const result = await this.accountService.deposit(account, amount);
        this.print(`Deposited ${formatMoney(amount)}`);
        return result;
      }
    );
    return updated ?? account;
  }

  private async withdraw(account: Account): Promise<Account> {
    const updated = await this.retryOnInputError(
      account,
      'Enter amount to withdraw (or press Enter to cancel): ',
      'Withdrawal cancelled.',
      async (amount) => {
        const result = await this.accountService.withdraw(account, amount);
        this.print(`Withdrawn ${formatMoney(amount)}`);
        return result;
      }
    );
    return updated ?? account;
  }

  private async transfer(account: Account): Promise<Account> {
    for (;;) {
      const target = (await this.prompter.ask('Enter target account number (or press Enter to cancel): '))?.trim();

      if (!target) {
        this.print('Transfer cancelled.');
        return account;
      }

      if (target === account.accountNumber) {
        this.print('Cannot transfer to your own account.');
        continue;
      }

      try {
        await this.accountService.getAccount(target);
      } catch (error) {
        if (error instanceof AccountNotFoundError) {
          this.print('Target account not found.');
          continue;
        }
        throw error;
      }

      const result = await this.retryOnInputError(
        account,
        'Enter amount to transfer (or press Enter to cancel): ',
        'Transfer cancelled.',
        async (amount) => {
          const transferred = await this.accountService.transfer(account, target, amount);
          this.print(`Transferred ${formatMoney(amount)} to account ${target}`);
          return transferred;
        }
      );
      return result?.source ?? account;
    }
  }

  private async changePin(account: Account): Promise<Account> {
    for (let attempt = 1; attempt <= CREDENTIAL_RULES.MAX_PIN_ATTEMPTS; attempt++) {
      const currentPin = (await this.prompter.ask('Enter current PIN (or press Enter to cancel): '))?.trim();
      if (!currentPin) {
        this.print('PIN change cancelled.');
        return account;
      }

      const newPin = await this.prompter.ask('Enter new PIN: ');
      const confirmPin = await this.prompter.ask('Confirm new PIN: ');
      if (newPin === null || confirmPin === null) {
        return account;
      }

      try {
        const updated = await this.accountService.changePin(account, newPin.trim(), {
          currentPin,
          confirmPin: confirmPin.trim(),
        });
        this.print('PIN changed successfully.');
        return updated;
      } catch (error) {
        if (error instanceof AuthError && error.reason === 'BAD_PIN') {
          this.print(`${error.message} ${attemptsLeft(attempt)}`);
          continue;
        }
        this.report(error);
        return account;
      }
    }

    this.print('Too many attempts.');
    return account;
  }

  private async showHistory(account: Account): Promise<void> {
    const history = await this.accountService.transactionHistory(account);

    this.print('--- Transaction History ---');
    if (history.length === 0) {
      this.print('No transactions found.');
      return;
    }
    history.forEach((transaction) => this.print(formatHistoryLine(transaction)));
  }

  private async deleteAccount(account: Account): Promise<Account | null> {
    const answer = await this.prompter.ask('Are you sure you want to delete your account? (yes/no): ');

    if (answer?.trim().toLowerCase() !== 'yes') {
      this.print('Account deletion cancelled.');
      return account;
    }

    await this.accountService.softDelete(account, true);
    this.print('Account deleted successfully.');
    return null;
  }

  /**
   * Prompt until the operation succeeds or the user enters an empty line.
   * Input errors re-prompt; anything else propagates to the menu loop.
   */
  private async retryOnInputError<T>(
    account: Account,
    question: string,
    cancelMessage: string,
    operation: (input: string) => Promise<T>
  ): Promise<T | null> {
    for (;;) {
      const input = (await this.prompter.ask(question))?.trim();

      if (!input) {
        this.print(cancelMessage);
        return null;
      }

      try {
        return await operation(input);
      } catch (error) {
        if (!isInputError(error, account)) {
          throw error;
        }
        this.print(error.message);
      }
    }
  }

  private report(error: unknown): void {
    if (error instanceof StorageError) {
      logger.error({ error, filePath: error.filePath }, 'Storage operation failed');
    }
    if (error instanceof AppError) {
      this.print(error.message);
      return;
    }
    logger.error({ error }, 'Unexpected error in ATM shell');
    this.print(UNEXPECTED_ERROR);
  }
}

export function formatHistoryLine(transaction: Transaction): string {
  return [
    transaction.timestamp,
    transaction.type,
    transaction.amount,
    transaction.counterpartyAccount || '-',
    transaction.direction,
  ].join(' | ');
}

/**
 * Errors the user can fix by typing something else. A missing target account
 * counts; the session's own account disappearing does not.
 */
function isInputError(error: unknown, account: Account): error is AppError {
  return (
    error instanceof ValidationError ||
    error instanceof InsufficientFundsError ||
    (error instanceof AccountNotFoundError && error.accountNumber !== account.accountNumber)
  );
}

function attemptsLeft(attempt: number): string {
  const remaining = CREDENTIAL_RULES.MAX_PIN_ATTEMPTS - attempt;
  return `${remaining} attempt${remaining === 1 ? '' : 's'} left.`;
}
