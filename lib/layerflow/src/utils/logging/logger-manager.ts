import { ILogger, LogLevel } from '../../types/logger';
import { ConsoleLoggerAdapter } from './console-logger-adapter';

/**
 * Logger manager for implementing inversion of control principle.
 * Holds the process-wide logger every engine component falls back to
 * when it is not given one explicitly.
 */
export class LoggerManager {
  private static instance: LoggerManager;
  private logger: ILogger;

  private constructor() {
    this.logger = new ConsoleLoggerAdapter();
    this.logger.setLevel(LogLevel.INFO);
  }

  /**
   * Get logger manager instance
   */
  public static getInstance(): LoggerManager {
    if (!LoggerManager.instance) {
      LoggerManager.instance = new LoggerManager();
    }
    return LoggerManager.instance;
  }

  /**
   * Set custom logger (IoC implementation)
   */
  public setLogger(logger: ILogger): void {
    this.logger = logger;
  }

  /**
   * Get current logger
   */
  public getLogger(): ILogger {
    return this.logger;
  }

  /**
   * Enables logs with specified level (default INFO)
   */
  public static enableLogs(level: LogLevel = LogLevel.INFO): void {
    LoggerManager.getInstance().logger.setLevel(level);
  }

  /**
   * Disables all logs
   */
  public static disableLogs(): void {
    LoggerManager.getInstance().logger.setLevel(LogLevel.OFF);
  }

  public static debug(message: string, ...args: unknown[]): void {
    LoggerManager.getInstance().logger.debug(message, ...args);
  }

  public static info(message: string, ...args: unknown[]): void {
    LoggerManager.getInstance().logger.info(message, ...args);
  }

  public static warn(message: string, ...args: unknown[]): void {
    LoggerManager.getInstance().logger.warn(message, ...args);
  }

  public static error(message: string, ...args: unknown[]): void {
    LoggerManager.getInstance().logger.error(message, ...args);
  }

  public static fatal(message: string, ...args: unknown[]): void {
    LoggerManager.getInstance().logger.fatal(message, ...args);
  }
}
