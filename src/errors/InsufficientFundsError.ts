import { BusinessRuleError } from './BusinessRuleError';

export class InsufficientFundsError extends BusinessRuleError {
  public readonly available: string;
  public readonly requested: string;

  constructor(available: string, requested: string) {
    super(`Insufficient funds: available ${available}, requested ${requested}`);
    this.available = available;
    this.requested = requested;
    Object.setPrototypeOf(this, InsufficientFundsError.prototype);
  }
}
