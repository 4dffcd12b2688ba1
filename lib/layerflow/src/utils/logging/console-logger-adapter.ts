import { LogLevel } from '../../types/logger';
import { LoggerAdapter } from './logger-adapter';

/**
 * Adapter for console logging with additional capabilities:
 * - storing log history in memory
 * - stack output for errors passed as arguments
 */
export class ConsoleLoggerAdapter extends LoggerAdapter {
  private logStorage: string[] = [];
  private maxLogSize = 100;

  log(level: LogLevel, message: string, ...args: unknown[]): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const timestamp = new Date().toISOString();
    const formattedMessage = `[${timestamp}] ${this.getLevelPrefix(level)}: ${message}`;

    /* eslint-disable no-console */
    switch (level) {
      case LogLevel.DEBUG:
        console.debug(formattedMessage, ...args);
        break;
      case LogLevel.INFO:
        console.info(formattedMessage, ...args);
        break;
      case LogLevel.WARN:
        console.warn(formattedMessage, ...args);
        break;
      case LogLevel.ERROR:
        console.error(formattedMessage, ...args);
        break;
      case LogLevel.FATAL:
        console.error(`FATAL ${formattedMessage}`, ...args);
        break;
      default:
        console.log(formattedMessage, ...args);
    }
    /* eslint-enable no-console */

    this.addToStorage(formattedMessage);
  }

  private getLevelPrefix(level: LogLevel): string {
    switch (level) {
      case LogLevel.DEBUG:
        return 'DEBUG';
      case LogLevel.INFO:
        return 'INFO';
      case LogLevel.WARN:
        return 'WARN';
      case LogLevel.ERROR:
        return 'ERROR';
      case LogLevel.FATAL:
        return 'FATAL';
      default:
        return 'LOG';
    }
  }

  private addToStorage(message: string): void {
    this.logStorage.push(message);

    if (this.logStorage.length > this.maxLogSize) {
      this.logStorage.shift();
    }
  }

  /**
   * Sets maximum size of stored logs
   */
  setMaxLogSize(size: number): void {
    this.maxLogSize = size > 0 ? size : 100;
    while (this.logStorage.length > this.maxLogSize) {
      this.logStorage.shift();
    }
  }

  /**
   * Clears all logs
   */
  clear(): void {
    this.logStorage = [];
  }

  /**
   * Returns all log entries
   */
  getLogs(): string[] {
    return [...this.logStorage];
  }

  /**
   * Extended version of error method with error stack support
   */
  public override error(message: string, ...args: unknown[]): void {
    this.logWithStack(LogLevel.ERROR, message, args);
  }

  /**
   * Extended version of fatal method with error stack support
   */
  public override fatal(message: string, ...args: unknown[]): void {
    this.logWithStack(LogLevel.FATAL, message, args);
  }

  private logWithStack(level: LogLevel, message: string, args: unknown[]): void {
    const errorObj = args.find((arg): arg is Error => arg instanceof Error);
    const otherArgs = args.filter(arg => !(arg instanceof Error));

    const fullMessage = errorObj ? `${message}: ${errorObj.message}` : message;
    this.log(level, fullMessage, ...otherArgs);

    if (errorObj?.stack) {
      this.log(LogLevel.DEBUG, `Stack: ${errorObj.stack}`);
    }
  }
}
