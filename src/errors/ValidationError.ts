import { AppError } from './AppError';

export type ValidationReason =
  | 'FORMAT'
  | 'NON_POSITIVE'
  | 'TOO_LARGE'
  | 'BAD_PIN_FORMAT'
  | 'PIN_MISMATCH'
  | 'PIN_NOT_UNIQUE'
  | 'SELF_TRANSFER'
  | 'NOT_CONFIRMED';

/**
 * Validation Error
 * Thrown when user input is malformed or out of range
 * Examples: "10.555" as an amount, a 3-digit PIN, transferring to yourself
 */
export class ValidationError extends AppError {
  public readonly reason: ValidationReason;
  public readonly errors?: unknown;

  constructor(reason: ValidationReason, message: string, errors?: unknown) {
    super(message, 'VALIDATION');
    this.reason = reason;
    this.errors = errors;
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}
