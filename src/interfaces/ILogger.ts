/**
 * Logger Interface
 *
 * Abstraction for logging so services never import pino directly.
 * The shell owns stdout; every adapter behind this interface writes elsewhere.
 */

/**
 * Log metadata - structured data attached to log entries
 */
export type LogMetadata = Record<string, unknown>;

/**
 * Logger interface following common logging patterns (pino, winston, etc.)
 */
export interface ILogger {
  /**
   * Debug level - Detailed diagnostic information
   * Example: "Accounts table loaded", "Transaction rows appended"
   */
  debug(message: string): void;
  debug(metadata: LogMetadata, message: string): void;

  /**
   * Info level - Business events and audit trail
   * Example: "Deposit completed", "PIN changed", "Account soft-deleted"
   */
  info(message: string): void;
  info(metadata: LogMetadata, message: string): void;

  /**
   * Warn level - Rejected operations and recoverable problems
   * Example: "Withdrawal rejected: insufficient funds", "Login failed: bad PIN"
   */
  warn(message: string): void;
  warn(metadata: LogMetadata, message: string): void;

  /**
   * Error level - Failed operations
   * Example: "Failed to write accounts table", "Transfer rolled back"
   */
  error(message: string): void;
  error(metadata: LogMetadata, message: string): void;

  /**
   * Fatal level - Errors that abort startup
   * Example: "Cannot create data directory"
   */
  fatal(message: string): void;
  fatal(metadata: LogMetadata, message: string): void;
}

/**
 * Logger Factory Interface
 */
export interface ILoggerFactory {
  /**
   * @param context - Optional context name for logger (e.g., "AccountService", "RecordStore")
   */
  createLogger(context?: string): ILogger;
}
