import { LogLevel } from '../../lib/layerflow/src/types/logger';
import { LoggerAdapter } from '../../lib/layerflow/src/utils/logging/logger-adapter';

export interface LogEntry {
  level: LogLevel;
  message: string;
  args: unknown[];
}

/**
 * Test logger adapter
 * Keeps every enabled entry in memory so tests can assert on it
 */
export class TestLoggerAdapter extends LoggerAdapter {
  // Flag for test mode (local only in tests)
  private testMode = false;
  readonly entries: LogEntry[] = [];

  /**
   * Sets test mode. In test mode nothing reaches the console.
   */
  setTestMode(enabled: boolean): void {
    this.testMode = enabled;
  }

  isTestMode(): boolean {
    return this.testMode;
  }

  log(level: LogLevel, message: string, ...args: unknown[]): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }
    this.entries.push({ level, message, args });

    if (this.testMode) {
      return;
    }
    const timestamp = new Date().toISOString();
    console.log(`[${timestamp}] ${LogLevel[level]}: ${message}`, ...args);
  }

  messages(level?: LogLevel): string[] {
    return this.entries
      .filter(entry => level === undefined || entry.level === level)
      .map(entry => entry.message);
  }

  clear(): void {
    this.entries.length = 0;
  }
}
