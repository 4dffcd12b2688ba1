/**
 * Logging level enumeration
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  FATAL = 4,
  OFF = 100, // Disable all logs
}

/**
 * Structured metadata attached to logged events
 */
export type LogEventMetadata = Readonly<Record<string, string | number | boolean | null>>;

/**
 * Logger interface
 */
export interface ILogger {
  /**
   * Sets logging level
   * @param level Logging level to set
   */
  setLevel(level: LogLevel): void;

  /**
   * Gets current logging level
   */
  getLevel(): LogLevel;

  /**
   * Checks if specified logging level is enabled
   */
  isLevelEnabled(level: LogLevel): boolean;

  /**
   * Logs message with specified level
   * @param level Logging level
   * @param message Message to log
   * @param args Additional arguments to log
   */
  log(level: LogLevel, message: string, ...args: readonly unknown[]): void;

  debug(message: string, ...args: readonly unknown[]): void;

  info(message: string, ...args: readonly unknown[]): void;

  warn(message: string, ...args: readonly unknown[]): void;

  error(message: string, ...args: readonly unknown[]): void;

  fatal(message: string, ...args: readonly unknown[]): void;

  /**
   * Logs a structured event at DEBUG level
   * @param category Event category (e.g. 'graph', 'evaluator', 'worker-pool')
   * @param eventName Event name
   * @param metadata Additional metadata
   */
  logEvent(category: string, eventName: string, metadata?: LogEventMetadata): void;
}
