/**
 * Logger Interface
 *
 * Abstraction for logging across the ledger. Services depend on this
 * interface, not on pino, so tests and embedding applications can supply
 * their own implementation.
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
   * Example: "Account number allocated", "Ledger file written"
   */
  debug(message: string): void;
  debug(metadata: LogMetadata, message: string): void;

  /**
   * Info level - Business events and audit trail
   * Example: "Deposit recorded", "User registered"
   */
  info(message: string): void;
  info(metadata: LogMetadata, message: string): void;

  /**
   * Warn level - Recoverable problems that should be reviewed
   * Example: "Skipping malformed user line", "Insufficient funds"
   */
  warn(message: string): void;
  warn(metadata: LogMetadata, message: string): void;

  /**
   * Error level - Failed operations
   * Example: "Could not save accounts file"
   */
  error(message: string): void;
  error(metadata: LogMetadata, message: string): void;

  /**
   * Fatal level - Errors that stop the process
   * Example: "First-run admin could not be created"
   */
  fatal(message: string): void;
  fatal(metadata: LogMetadata, message: string): void;
}

/**
 * Logger Factory Interface
 */
export interface ILoggerFactory {
  /**
   * Create a logger instance
   * @param context - Optional context name for logger (e.g., "AccountService", "LedgerStore")
   */
  createLogger(context?: string): ILogger;
}
