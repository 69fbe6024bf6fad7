import { AppError } from './AppError';

/**
 * Storage Error
 * Wraps every I/O or parse failure of the CSV tables.
 * Fatal to the current operation; the shell reports it and returns to the menu.
 */
export class StorageError extends AppError {
  public readonly filePath: string;
  public readonly cause?: unknown;

  constructor(filePath: string, message: string, cause?: unknown) {
    super(`${message} (${filePath})`, 'STORAGE');
    this.filePath = filePath;
    this.cause = cause;
    Object.setPrototypeOf(this, StorageError.prototype);
  }
}
