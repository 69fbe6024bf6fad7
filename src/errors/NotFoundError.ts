import { AppError } from './AppError';

/**
 * Not Found Error
 * Thrown when a requested record doesn't exist
 */
export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 'NOT_FOUND');
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}
