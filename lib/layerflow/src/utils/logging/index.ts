// Export main classes and interfaces for logging
export { LoggerAdapter } from './logger-adapter';
export { ConsoleLoggerAdapter } from './console-logger-adapter';
export { LoggerManager } from './logger-manager';

// For convenience also export types from root module
export { LogLevel } from '../../types/logger';
export type { ILogger, LogEventMetadata } from '../../types/logger';
