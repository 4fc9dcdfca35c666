/**
 * Standardized error handling utilities for the knowledge graph
 *
 * Provides consistent error logging and categorization across all
 * components. Collaborator failures are wrapped and propagated; nothing
 * here retries.
 */

import { CollaboratorError, KnowledgeGraphError } from '../core/errors.js';
import { Logger } from './logger.js';

/**
 * Error categories for better classification and handling
 */
export enum ErrorCategory {
  STORAGE = 'storage',
  INDEXING = 'indexing',
  VALIDATION = 'validation',
  TRAVERSAL = 'traversal',
  ARCHIVE = 'archive',
  CONFIGURATION = 'configuration'
}

/**
 * Error severity levels for prioritization
 */
export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

/**
 * Structured error information
 */
export interface ErrorInfo {
  category: ErrorCategory;
  severity: ErrorSeverity;
  message: string;
  originalError?: Error;
  context?: Record<string, unknown>;
  timestamp: Date;
  recoveryHint?: string;
}

/**
 * Standard error handler with categorization and frequency tracking
 */
export class ErrorHandler {
  private static errorCounts = new Map<string, number>();
  private static logger = new Logger('errors');

  /**
   * Replace the logger used for error reports
   */
  static useLogger(logger: Logger): void {
    this.logger = logger;
  }

  /**
   * Handle an error with proper categorization and logging
   */
  static handle(
    category: ErrorCategory,
    severity: ErrorSeverity,
    message: string,
    originalError?: Error,
    context?: Record<string, unknown>,
    recoveryHint?: string
  ): ErrorInfo {
    const errorInfo: ErrorInfo = {
      category,
      severity,
      message,
      originalError,
      context,
      timestamp: new Date(),
      recoveryHint
    };

    this.logError(errorInfo);
    this.trackErrorFrequency(category, message);

    return errorInfo;
  }

  /**
   * Run a blob store or vector index call, converting its failure into a
   * `CollaboratorError`. Errors already raised by the graph pass through.
   */
  static async wrapCollaborator<T>(
    collaborator: 'blob_store' | 'vector_index',
    operationName: string,
    operation: () => Promise<T>,
    context?: Record<string, unknown>
  ): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (error instanceof KnowledgeGraphError) {
        throw error;
      }

      const wrapped = new CollaboratorError(collaborator, operationName, error);
      this.handle(
        collaborator === 'blob_store' ? ErrorCategory.STORAGE : ErrorCategory.INDEXING,
        ErrorSeverity.HIGH,
        wrapped.message,
        error instanceof Error ? error : undefined,
        context,
        `Check the ${collaborator.replace('_', ' ')} and retry the call`
      );
      throw wrapped;
    }
  }

  /**
   * Log error with appropriate formatting
   */
  private static logError(errorInfo: ErrorInfo): void {
    const meta: Record<string, unknown> = {
      severity: errorInfo.severity,
      time: errorInfo.timestamp.toISOString()
    };
    if (errorInfo.context) meta.context = errorInfo.context;
    if (errorInfo.recoveryHint) meta.hint = errorInfo.recoveryHint;
    if (errorInfo.originalError) meta.original = errorInfo.originalError.message;

    const line = `[${errorInfo.category.toUpperCase()}] ${errorInfo.message}`;

    if (errorInfo.severity === ErrorSeverity.CRITICAL || errorInfo.severity === ErrorSeverity.HIGH) {
      this.logger.error(line, meta);
    } else if (errorInfo.severity === ErrorSeverity.MEDIUM) {
      this.logger.warn(line, meta);
    } else {
      this.logger.info(line, meta);
    }
  }

  /**
   * Track error frequency for monitoring
   */
  private static trackErrorFrequency(category: ErrorCategory, message: string): void {
    const key = `${category}:${message}`;
    const currentCount = this.errorCounts.get(key) ?? 0;
    this.errorCounts.set(key, currentCount + 1);

    if (currentCount > 5) {
      this.logger.warn(`Frequent error detected: ${key} (${currentCount + 1} times)`);
    }
  }

  /**
   * Get error statistics for monitoring
   */
  static getErrorStats(): Record<string, number> {
    return Object.fromEntries(this.errorCounts.entries());
  }

  /**
   * Reset error statistics
   */
  static resetErrorStats(): void {
    this.errorCounts.clear();
  }
}
