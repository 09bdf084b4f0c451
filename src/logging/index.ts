/**
 * Logging Module
 *
 * @module logging
 */

export {
  createConsoleLogger,
  createMemoryLogger,
  silentLogger,
  type ConsoleLoggerOptions,
  type LogEntry,
  type LogLevel,
  type Logger,
} from './logger.js';
