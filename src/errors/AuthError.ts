import { AppError } from './AppError';

export type AuthReason = 'NOT_FOUND' | 'BAD_PIN';

/**
 * Authentication Error
 * NOT_FOUND covers both unknown and soft-deleted accounts
 */
export class AuthError extends AppError {
  public readonly reason: AuthReason;

  constructor(reason: AuthReason, message: string) {
    super(message, 'AUTH');
    this.reason = reason;
    Object.setPrototypeOf(this, AuthError.prototype);
  }
}
