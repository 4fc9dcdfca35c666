/**
 * Unit tests for error handling and logging utilities
 */

import { CollaboratorError, NotFoundError } from '../../core/errors.js';
import { ErrorCategory, ErrorHandler, ErrorSeverity } from '../../utils/error-handler.js';
import { Logger, resolveLogLevel } from '../../utils/logger.js';

describe('ErrorHandler', () => {
  beforeEach(() => {
    ErrorHandler.useLogger(new Logger('errors', 'silent'));
    ErrorHandler.resetErrorStats();
  });

  test('should wrap collaborator failures and keep the cause', async () => {
    const cause = new Error('connection reset');

    const failure = ErrorHandler.wrapCollaborator('vector_index', 'search', async () => {
      throw cause;
    });

    await expect(failure).rejects.toThrow(CollaboratorError);
    await expect(failure).rejects.toMatchObject({
      message: 'vector_index failed to search: connection reset',
      code: 'COLLABORATOR_FAILURE',
      collaborator: 'vector_index',
      cause
    });
    expect(ErrorHandler.getErrorStats()).toEqual({
      'indexing:vector_index failed to search: connection reset': 1
    });
  });

  test('should pass graph errors through untouched', async () => {
    const notFound = new NotFoundError('Block missing');

    await expect(
      ErrorHandler.wrapCollaborator('blob_store', 'retrieve block', async () => {
        throw notFound;
      })
    ).rejects.toBe(notFound);
    expect(ErrorHandler.getErrorStats()).toEqual({});
  });

  test('should return the structured error it handled', () => {
    const info = ErrorHandler.handle(ErrorCategory.ARCHIVE, ErrorSeverity.HIGH, 'Archive import aborted');

    expect(info).toMatchObject({ category: 'archive', severity: 'high', message: 'Archive import aborted' });
  });
});

describe('Logger', () => {
  test('should drop messages below its level', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = new Logger('graph', 'warn');

    logger.info('hidden');
    logger.warn('shown', { key: 'value' });

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('⚠️ [graph] shown', { key: 'value' });

    warn.mockRestore();
    log.mockRestore();
  });

  test('should prefer an explicit level over the environment', () => {
    const previous = process.env.KNOWLEDGE_GRAPH_LOG_LEVEL;
    process.env.KNOWLEDGE_GRAPH_LOG_LEVEL = 'DEBUG';

    expect(resolveLogLevel()).toBe('debug');
    expect(resolveLogLevel('error')).toBe('error');

    process.env.KNOWLEDGE_GRAPH_LOG_LEVEL = 'loud';
    expect(resolveLogLevel()).toBe('warn');

    if (previous === undefined) {
      delete process.env.KNOWLEDGE_GRAPH_LOG_LEVEL;
    } else {
      process.env.KNOWLEDGE_GRAPH_LOG_LEVEL = previous;
    }
  });
});
