/**
 * @ontocache/utils - Shared utilities package
 *
 * Public API exports for the utils package:
 * - Logger utilities
 * - Configuration loading
 * - Error classes and handling
 * - In-process locks
 */

// Logger
export { logger, Logger, LogLevel, winstonLogger, createLogger } from './logger.js';
export type { LogContext } from './logger.js';

// Configuration loading
export * from './config/index.js';

// Error handling
export * from './errors.js';
export { handleError } from './error-handler.js';
export type { ErrorHandlerResult } from './error-handler.js';

// Concurrency
export { AsyncMutex, KeyedAsyncMutex } from './async-mutex.js';
