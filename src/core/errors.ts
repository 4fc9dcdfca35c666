/**
 * Error taxonomy for the knowledge graph
 *
 * Lookup misses and bad arguments surface synchronously at the offending
 * call. Integrity failures abort archive imports as a whole. Failures of
 * the blob store or vector index are wrapped in `CollaboratorError` and
 * propagated without retrying.
 */

export type ErrorCode =
  | 'NOT_FOUND'
  | 'ENTITY_NOT_FOUND'
  | 'INVALID_ARGUMENT'
  | 'CONTENT_MISMATCH'
  | 'CORRUPT_ARCHIVE'
  | 'COLLABORATOR_FAILURE';

export type ErrorContext = Record<string, string | number | boolean | undefined>;

/**
 * Base class for every error raised by the graph
 */
export class KnowledgeGraphError extends Error {
  readonly code: ErrorCode;
  readonly context?: ErrorContext;

  constructor(code: ErrorCode, message: string, context?: ErrorContext, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.context = context;
  }
}

/**
 * Lookup miss for a relationship, a block or any other addressed item
 */
export class NotFoundError extends KnowledgeGraphError {
  constructor(message: string, context?: ErrorContext, code: ErrorCode = 'NOT_FOUND', options?: { cause?: unknown }) {
    super(code, message, context, options);
  }
}

/**
 * An entity referenced by ID does not exist in the graph
 */
export class EntityNotFoundError extends NotFoundError {
  readonly entityId: string;

  constructor(entityId: string, role = 'Entity') {
    super(`${role} ${entityId} not found in the graph`, { entityId, role }, 'ENTITY_NOT_FOUND');
    this.entityId = entityId;
  }
}

/**
 * Out-of-range confidence, empty required field, malformed path or option
 */
export class InvalidArgumentError extends KnowledgeGraphError {
  constructor(message: string, context?: ErrorContext) {
    super('INVALID_ARGUMENT', message, context);
  }
}

/**
 * A block's recomputed address differs from the address it was stored under
 */
export class ContentMismatchError extends KnowledgeGraphError {
  readonly expected: string;
  readonly actual: string;

  constructor(expected: string, actual: string, context?: ErrorContext) {
    super('CONTENT_MISMATCH', `Content mismatch: expected ${expected}, computed ${actual}`, {
      ...context,
      expected,
      actual
    });
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * An archive or root block could not be decoded
 */
export class CorruptArchiveError extends KnowledgeGraphError {
  constructor(message: string, context?: ErrorContext, options?: { cause?: unknown }) {
    super('CORRUPT_ARCHIVE', message, context, options);
  }
}

/**
 * Failure raised by the blob store or the vector index
 */
export class CollaboratorError extends KnowledgeGraphError {
  readonly collaborator: 'blob_store' | 'vector_index';

  constructor(collaborator: 'blob_store' | 'vector_index', operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('COLLABORATOR_FAILURE', `${collaborator} failed to ${operation}: ${reason}`, { collaborator, operation }, {
      cause
    });
    this.collaborator = collaborator;
  }
}
