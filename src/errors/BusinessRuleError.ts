import { AppError } from './AppError';

/**
 * Business Rule Error
 * Thrown when input is well-formed but the operation is not allowed
 */
export class BusinessRuleError extends AppError {
  constructor(message: string) {
    super(message, 'BUSINESS_RULE');
    Object.setPrototypeOf(this, BusinessRuleError.prototype);
  }
}
