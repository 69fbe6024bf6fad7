/**
 * Error codes surfaced to the shell
 * One per error class, so callers can branch without instanceof chains
 */
export type ErrorCode =
  | 'VALIDATION'
  | 'AUTH'
  | 'NOT_FOUND'
  | 'BUSINESS_RULE'
  | 'STORAGE';

/**
 * Base Application Error
 * Every error the core raises on purpose extends this class.
 * Anything that is not an AppError is treated as a bug.
 */
export class AppError extends Error {
  public readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    Object.setPrototypeOf(this, AppError.prototype);
  }
}
