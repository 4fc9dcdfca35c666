/**
 * Utility functions and classes for the knowledge graph
 */

export { VectorUtils } from './vector-utils.js';
export { ErrorHandler, ErrorCategory, ErrorSeverity, type ErrorInfo } from './error-handler.js';
export { Logger, resolveLogLevel, isLogLevel, type LogMeta } from './logger.js';
export { ReadWriteLock } from './rw-lock.js';
export { CancellationTracker, isCancelled } from './cancellation.js';
export { compareIds } from './compare.js';
