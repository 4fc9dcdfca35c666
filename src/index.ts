/**
 * Core exports for the content-addressed knowledge graph
 *
 * This module exports the graph facade, its engines, the storage and
 * vector index collaborators, and all public types.
 */

// Core graph components
export { KnowledgeGraph } from './core/graph.js';
export type { KnowledgeGraphOptions, FromCidOptions, ArchiveSummary, GraphStats } from './core/graph.js';
export { TraversalEngine } from './core/traversal.js';
export type {
  GraphReader,
  TraversalOptions,
  TraversalMetadata,
  TraversalResult,
  PathQueryOptions,
  PathQueryResult,
  PathMatch,
  BestPath,
  BestPathOptions,
  HopRule
} from './core/traversal.js';
export { AdjacencyIndex } from './core/adjacency.js';
export { EntityRegistry, RelationshipRegistry } from './core/registry.js';
export { createDefaultGraphConfig, resolveGraphConfig, validateGraphConfig, DEFAULT_GRAPH_NAME } from './core/config.js';

// Identity codec
export {
  ADDRESS_PREFIX,
  canonicalStringify,
  canonicalBytes,
  computeAddress,
  isContentAddress,
  encodeEntity,
  encodeRelationship,
  encodeBlock
} from './core/identity.js';
export type { EntityContent, RelationshipContent } from './core/identity.js';

// Errors
export {
  KnowledgeGraphError,
  NotFoundError,
  EntityNotFoundError,
  InvalidArgumentError,
  ContentMismatchError,
  CorruptArchiveError,
  CollaboratorError
} from './core/errors.js';
export type { ErrorCode, ErrorContext } from './core/errors.js';

// Retrieval engines
export { RankingEngine } from './retrieval/ranking.js';
export type { RelationshipConstraint, VectorQueryOptions, VectorQueryResult, RankedEntity } from './retrieval/ranking.js';
export { ReasoningEngine } from './retrieval/reasoning.js';
export type {
  ReasoningDepth,
  CrossDocumentOptions,
  CrossDocumentResult,
  DocumentSummary,
  EvidencePath,
  DocumentChain
} from './retrieval/reasoning.js';

// Collaborators
export * from './storage/index.js';
export * from './indexing/index.js';
export * from './utils/index.js';

// Type definitions
export type {
  EntityId,
  RelationshipId,
  ContentAddress,
  VectorRef,
  PropertyValue,
  PropertyMap,
  Entity,
  Relationship,
  EntityInput,
  RelationshipInput,
  Direction,
  PathStep,
  CancellationPoint,
  LogLevel,
  CompressionMode,
  ReasoningWeights,
  GraphConfig
} from './core/types.js';
