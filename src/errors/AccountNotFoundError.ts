import { NotFoundError } from './NotFoundError';

/**
 * Account Not Found Error
 * Lookup failure for an account other than the one being authenticated,
 * e.g. a transfer target that is missing or soft-deleted
 */
export class AccountNotFoundError extends NotFoundError {
  public readonly accountNumber: string;

  constructor(accountNumber: string, message = `Account ${accountNumber} not found`) {
    super(message);
    this.accountNumber = accountNumber;
    Object.setPrototypeOf(this, AccountNotFoundError.prototype);
  }
}
