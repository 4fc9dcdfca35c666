/**
 * Core type definitions for the content-addressed knowledge graph
 *
 * Entities and relationships are referenced by opaque IDs held in flat
 * registries, so cyclic graphs never need owning pointers. Everything a
 * caller receives from the graph is frozen: the model is append-only.
 */

/** Opaque identifier of an entity */
export type EntityId = string;

/** Opaque identifier of a relationship */
export type RelationshipId = string;

/** Content address: `sha256-` followed by the hex digest of a block */
export type ContentAddress = string;

/** Opaque handle into an external vector index */
export type VectorRef = string;

/**
 * Schema-free property value
 * Scalars, arrays and nested string-keyed maps; numbers must be finite.
 */
export type PropertyValue =
  | string
  | number
  | boolean
  | null
  | PropertyValue[]
  | { [key: string]: PropertyValue };

/** String-keyed property map attached to entities and relationships */
export type PropertyMap = { [key: string]: PropertyValue };

/**
 * A typed node in the knowledge graph
 */
export interface Entity {
  /** Unique identifier for the entity */
  readonly id: EntityId;
  /** Type classification (e.g., 'person', 'document', 'organization') */
  readonly type: string;
  readonly name: string;
  readonly properties: Readonly<PropertyMap>;
  /** Extraction confidence in [0, 1] */
  readonly confidence: number;
  /** Text the entity was extracted from */
  readonly sourceText?: string;
  /** Handle of the entity's embedding in the vector index */
  readonly vectorRef?: VectorRef;
  /** Content address of the entity's canonical encoding */
  readonly address: ContentAddress;
}

/**
 * A typed directed edge between two entities
 */
export interface Relationship {
  readonly id: RelationshipId;
  /** Relationship type (e.g., 'knows', 'mentions', 'works_at') */
  readonly type: string;
  readonly sourceId: EntityId;
  readonly targetId: EntityId;
  readonly properties: Readonly<PropertyMap>;
  readonly confidence: number;
  readonly sourceText?: string;
  readonly address: ContentAddress;
}

/**
 * Input accepted by `KnowledgeGraph.addEntity`
 */
export interface EntityInput {
  type: string;
  name?: string;
  properties?: PropertyMap;
  confidence?: number;
  sourceText?: string;
  /** Generated (UUID v4) when omitted */
  id?: EntityId;
  /** Embedding registered with the vector index when supplied */
  vector?: Float32Array | number[];
}

/**
 * Input accepted by `KnowledgeGraph.addRelationship`
 * Endpoints may be given either as entities or as entity IDs.
 */
export interface RelationshipInput {
  type: string;
  source: Entity | EntityId;
  target: Entity | EntityId;
  properties?: PropertyMap;
  confidence?: number;
  sourceText?: string;
  id?: RelationshipId;
}

/** Edge direction relative to an entity */
export type Direction = 'outgoing' | 'incoming' | 'both';

/**
 * One hop of a path through the graph
 * `fromId` and `toId` follow the direction the hop was walked, which
 * differs from the relationship's own source/target on incoming hops.
 */
export interface PathStep {
  relationshipId: RelationshipId;
  relationshipType: string;
  fromId: EntityId;
  toId: EntityId;
  direction: 'outgoing' | 'incoming';
  confidence: number;
}

/**
 * Where a cancelled operation stopped
 */
export interface CancellationPoint {
  /** Operation stage, e.g. 'traversal', 'path_query', 'seed_expansion' */
  stage: string;
  /** Hop or path step that was about to be expanded */
  hop: number;
  /** Free-form detail such as the seed or document pair being processed */
  detail?: string;
}

/** Log verbosity */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/** Compression applied to exported archives and file-backed blobs */
export type CompressionMode = 'none' | 'gzip';

/**
 * Weights of the three terms of the cross-document confidence score
 */
export interface ReasoningWeights {
  similarity: number;
  pathConfidence: number;
  coverage: number;
}

/**
 * Configuration for a knowledge graph instance
 */
export type GraphConfig = {
  /** Graph name, part of the root block */
  name: string;
  /** Per-hop score attenuation for vector-augmented queries, in (0, 1) */
  decay: number;
  /** Vector seeds requested per result slot when no explicit seed count is given */
  seedMultiplier: number;
  /** Pair lists larger than this are moved out of the root block */
  maxInlineBlockBytes: number;
  /** Compression for exported archives */
  archiveCompression: CompressionMode;
  /** Longest document chain built by deep reasoning */
  maxChainLength: number;
  reasoningWeights: ReasoningWeights;
  logLevel: LogLevel;
};
