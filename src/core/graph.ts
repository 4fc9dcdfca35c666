/**
 * Content-addressed knowledge graph
 *
 * Entities and relationships live in flat registries keyed by ID, with
 * adjacency lists for traversal. Every record is encoded canonically and
 * stored in a shared blob store under its content address; after each
 * mutation the graph recomputes a root address that summarizes its whole
 * logical content.
 *
 * Mutations take an exclusive write lock; lookups, traversals, ranking
 * and reasoning share a read lock, so reads run in parallel with each
 * other but never alongside a mutation.
 */

import { promises as fs } from 'fs';
import { v4 as uuidv4 } from 'uuid';
import { AdjacencyIndex } from './adjacency.js';
import { resolveGraphConfig } from './config.js';
import { CorruptArchiveError, EntityNotFoundError, InvalidArgumentError, NotFoundError, ContentMismatchError } from './errors.js';
import { encodeEntity, encodeRelationship, type EntityContent, type RelationshipContent } from './identity.js';
import {
  createEntity,
  createRelationship,
  decodeEntity,
  decodeRelationship,
  entityContent,
  relationshipContent,
  verifyBlock
} from './records.js';
import { EntityRegistry, RelationshipRegistry } from './registry.js';
import { ConfidenceSchema, PropertyMapSchema } from './schemas.js';
import {
  TraversalEngine,
  type GraphReader,
  type PathQueryOptions,
  type PathQueryResult,
  type TraversalOptions,
  type TraversalResult
} from './traversal.js';
import type {
  ContentAddress,
  Direction,
  Entity,
  EntityId,
  EntityInput,
  GraphConfig,
  PropertyMap,
  Relationship,
  RelationshipId,
  RelationshipInput,
  VectorRef
} from './types.js';
import type { VectorIndex } from '../indexing/types.js';
import { ReasoningEngine, type CrossDocumentOptions, type CrossDocumentResult } from '../retrieval/reasoning.js';
import { RankingEngine, type VectorQueryOptions, type VectorQueryResult } from '../retrieval/ranking.js';
import { decodeArchive, encodeArchive } from '../storage/archive.js';
import { MemoryBlobStore } from '../storage/memory-blob-store.js';
import { decodeRootBlock, encodeRootBlock, type EncodedBlock, type EncodedRoot } from '../storage/root-block.js';
import type { BlobStore } from '../storage/types.js';
import { ErrorCategory, ErrorHandler, ErrorSeverity } from '../utils/error-handler.js';
import { Logger } from '../utils/logger.js';
import { ReadWriteLock } from '../utils/rw-lock.js';
import { VectorUtils } from '../utils/vector-utils.js';

export interface KnowledgeGraphOptions {
  /** Shared block storage; a private in-memory store when omitted */
  blobStore?: BlobStore;
  /** Shared vector index; required for vectors and vector queries */
  vectorIndex?: VectorIndex;
  config?: Partial<GraphConfig>;
  logger?: Logger;
}

export interface FromCidOptions extends KnowledgeGraphOptions {
  blobStore: BlobStore;
  /** Defer fetching entity blocks until they are first read */
  lazy?: boolean;
}

/**
 * Summary of an exported archive
 */
export interface ArchiveSummary {
  rootAddress: ContentAddress;
  blockCount: number;
  byteLength: number;
}

export interface GraphStats {
  name: string;
  version: number;
  rootAddress: ContentAddress;
  entityCount: number;
  relationshipCount: number;
  /** Entities whose blocks have been fetched and decoded */
  loadedEntityCount: number;
  vectorCount: number;
  entityTypes: string[];
  relationshipTypes: string[];
}

/**
 * Read-only view over the registries, handed to the engines
 */
class RegistryReader implements GraphReader {
  constructor(
    readonly config: GraphConfig,
    readonly logger: Logger,
    readonly vectorIndex: VectorIndex | undefined,
    private readonly entities: EntityRegistry,
    private readonly relationships: RelationshipRegistry,
    private readonly adjacency: AdjacencyIndex,
    private readonly blobStore: BlobStore
  ) {}

  get vectorCount(): number {
    return this.entities.vectorCount;
  }

  hasEntity(entityId: EntityId): boolean {
    return this.entities.has(entityId);
  }

  async loadEntity(entityId: EntityId): Promise<Entity> {
    const entity = await this.entities.resolve(entityId, this.blobStore);
    if (!entity) {
      throw new EntityNotFoundError(entityId);
    }
    return entity;
  }

  relationship(relationshipId: RelationshipId): Relationship {
    const relationship = this.relationships.cached(relationshipId);
    if (!relationship) {
      throw new NotFoundError(`Relationship ${relationshipId} not found in the graph`, { relationshipId });
    }
    return relationship;
  }

  relationshipsOf(entityId: EntityId, direction: Direction, relationshipTypes?: readonly string[]): Relationship[] {
    return this.adjacency.relationshipIds(entityId, direction, relationshipTypes).map(id => this.relationship(id));
  }

  ownerOfVectorRef(vectorRef: VectorRef): EntityId | undefined {
    return this.entities.ownerOf(vectorRef);
  }

  entityTypeOf(entityId: EntityId): string | undefined {
    return this.entities.typeOf(entityId);
  }
}

/**
 * Normalized, validated entity fields
 */
interface EntityDraft {
  id?: EntityId;
  content: EntityContent;
  vector?: Float32Array;
}

interface RelationshipDraft {
  id?: RelationshipId;
  type: string;
  sourceId: EntityId;
  targetId: EntityId;
  properties: PropertyMap;
  confidence: number;
  sourceText?: string;
}

export class KnowledgeGraph {
  private readonly entities = new EntityRegistry();
  private readonly relationships = new RelationshipRegistry();
  private readonly adjacency = new AdjacencyIndex();
  private readonly lock = new ReadWriteLock();

  private readonly blobStore: BlobStore;
  private readonly vectorIndex?: VectorIndex;
  private readonly config: GraphConfig;
  private readonly logger: Logger;

  private readonly reader: RegistryReader;
  private readonly traversal: TraversalEngine;
  private readonly ranking: RankingEngine;
  private readonly reasoning: ReasoningEngine;

  private root: EncodedRoot;
  private currentVersion = 0;

  constructor(options: KnowledgeGraphOptions = {}) {
    this.config = resolveGraphConfig(options.config);
    this.logger = options.logger ?? new Logger('knowledge-graph', this.config.logLevel);
    this.blobStore = options.blobStore ?? new MemoryBlobStore();
    this.vectorIndex = options.vectorIndex;

    this.reader = new RegistryReader(
      this.config,
      this.logger,
      this.vectorIndex,
      this.entities,
      this.relationships,
      this.adjacency,
      this.blobStore
    );
    this.traversal = new TraversalEngine(this.reader);
    this.ranking = new RankingEngine(this.reader, this.traversal);
    this.reasoning = new ReasoningEngine(this.reader, this.traversal);

    this.root = this.encodeRoot();
  }

  get name(): string {
    return this.config.name;
  }

  /** Number of mutations applied to this instance */
  get version(): number {
    return this.currentVersion;
  }

  /** Address of the root block summarizing the current content */
  get rootAddress(): ContentAddress {
    return this.root.address;
  }

  get entityCount(): number {
    return this.entities.size;
  }

  get relationshipCount(): number {
    return this.relationships.size;
  }

  /**
   * Add an entity
   *
   * Validation failures throw `InvalidArgumentError` before anything is
   * changed. When a vector is supplied it is registered with the vector
   * index first, since its reference is part of the entity's content.
   */
  async addEntity(input: EntityInput): Promise<Entity> {
    const draft = this.validateEntityInput(input);

    return this.lock.withWrite(async () => {
      const id = draft.id ?? uuidv4();
      if (this.entities.has(id)) {
        throw new InvalidArgumentError(`Entity ${id} already exists`, { entityId: id });
      }

      let content = draft.content;
      const vector = draft.vector;
      const vectorIndex = this.vectorIndex;
      if (vector && vectorIndex) {
        const vectorRef = await ErrorHandler.wrapCollaborator(
          'vector_index',
          'add vector',
          () => vectorIndex.add(vector, id),
          { entityId: id }
        );
        content = { ...content, vectorRef };
      }

      const { bytes, address } = encodeEntity(content);
      await this.storeBlock({ address, bytes });

      const entity = createEntity(id, content, address);
      this.installEntity(entity);
      this.commit();

      this.logger.debug('Added entity', { id, type: entity.type, address, version: this.currentVersion });
      return entity;
    });
  }

  /**
   * Add a relationship between two existing entities
   * A missing endpoint throws `EntityNotFoundError` and changes nothing.
   */
  async addRelationship(input: RelationshipInput): Promise<Relationship> {
    const draft = this.validateRelationshipInput(input);

    return this.lock.withWrite(async () => {
      if (!this.entities.has(draft.sourceId)) {
        throw new EntityNotFoundError(draft.sourceId, 'Source entity');
      }
      if (!this.entities.has(draft.targetId)) {
        throw new EntityNotFoundError(draft.targetId, 'Target entity');
      }

      const id = draft.id ?? uuidv4();
      if (this.relationships.has(id)) {
        throw new InvalidArgumentError(`Relationship ${id} already exists`, { relationshipId: id });
      }

      const content: RelationshipContent = {
        type: draft.type,
        sourceId: draft.sourceId,
        targetId: draft.targetId,
        properties: draft.properties,
        confidence: draft.confidence,
        ...(draft.sourceText !== undefined ? { sourceText: draft.sourceText } : {})
      };
      const { bytes, address } = encodeRelationship(content);
      await this.storeBlock({ address, bytes });

      const relationship = createRelationship(id, content, address);
      this.installRelationship(relationship);
      this.commit();

      this.logger.debug('Added relationship', {
        id,
        type: relationship.type,
        sourceId: relationship.sourceId,
        targetId: relationship.targetId,
        version: this.currentVersion
      });
      return relationship;
    });
  }

  /**
   * Entity by ID; throws `EntityNotFoundError` when absent
   */
  async getEntity(entityId: EntityId): Promise<Entity> {
    return this.lock.withRead(() => this.reader.loadEntity(entityId));
  }

  /**
   * Entity by ID, or undefined when absent
   */
  async findEntity(entityId: EntityId): Promise<Entity | undefined> {
    return this.lock.withRead(() => this.entities.resolve(entityId, this.blobStore));
  }

  /**
   * Relationship by ID; throws `NotFoundError` when absent
   */
  async getRelationship(relationshipId: RelationshipId): Promise<Relationship> {
    return this.lock.withRead(() => this.reader.relationship(relationshipId));
  }

  /**
   * Entities of a type in the order they were added; empty for unknown types
   */
  async getEntitiesByType(type: string): Promise<Entity[]> {
    return this.lock.withRead(() => Promise.all(this.entities.idsByType(type).map(id => this.reader.loadEntity(id))));
  }

  async getRelationshipsByType(type: string): Promise<Relationship[]> {
    return this.lock.withRead(() => this.relationships.idsByType(type).map(id => this.reader.relationship(id)));
  }

  /**
   * Relationships touching an entity; `both` lists outgoing before incoming
   */
  async getEntityRelationships(
    entityId: EntityId,
    direction: Direction = 'both',
    relationshipTypes?: string[]
  ): Promise<Relationship[]> {
    return this.lock.withRead(() => {
      if (!this.entities.has(entityId)) {
        throw new EntityNotFoundError(entityId);
      }
      return this.reader.relationshipsOf(entityId, direction, relationshipTypes);
    });
  }

  /**
   * Entities owning any of the given vector references; foreign references are skipped
   */
  async getEntitiesByVectorRefs(vectorRefs: VectorRef[]): Promise<Entity[]> {
    return this.lock.withRead(async () => {
      const owners: EntityId[] = [];
      for (const vectorRef of vectorRefs) {
        const owner = this.entities.ownerOf(vectorRef);
        if (owner !== undefined && !owners.includes(owner)) {
          owners.push(owner);
        }
      }
      return Promise.all(owners.map(id => this.reader.loadEntity(id)));
    });
  }

  async traverseFromEntities(seeds: Array<Entity | EntityId>, options: TraversalOptions = {}): Promise<TraversalResult> {
    return this.lock.withRead(() => this.traversal.traverseFromEntities(seeds, options));
  }

  /**
   * Traversal result as `(entity, depth)` pairs in discovery order
   */
  async traverseFromEntitiesWithDepths(
    seeds: Array<Entity | EntityId>,
    options: TraversalOptions = {}
  ): Promise<Array<{ entity: Entity; depth: number }>> {
    const result = await this.traverseFromEntities(seeds, options);
    return result.entities.map(entity => ({ entity, depth: result.depths.get(entity.id) ?? 0 }));
  }

  async query(
    startEntity: Entity | EntityId,
    relationshipPath: string[],
    options: PathQueryOptions = {}
  ): Promise<PathQueryResult> {
    return this.lock.withRead(() => this.traversal.query(startEntity, relationshipPath, options));
  }

  async vectorAugmentedQuery(options: VectorQueryOptions): Promise<VectorQueryResult> {
    return this.lock.withRead(() => this.ranking.vectorAugmentedQuery(options));
  }

  async crossDocumentReasoning(options: CrossDocumentOptions): Promise<CrossDocumentResult> {
    return this.lock.withRead(() => this.reasoning.crossDocumentReasoning(options));
  }

  /**
   * Persist the current root block (and its chunks) and return its address
   */
  async snapshot(): Promise<ContentAddress> {
    return this.lock.withRead(async () => {
      for (const block of [...this.root.chunks, this.root]) {
        await this.storeBlock(block);
      }
      this.logger.info('Stored graph snapshot', { rootAddress: this.root.address, version: this.currentVersion });
      return this.root.address;
    });
  }

  /**
   * Archive bytes for the current state; identical state gives identical bytes
   */
  async encodeArchive(): Promise<Buffer> {
    const { bytes } = await this.lock.withRead(() => this.buildArchive());
    return bytes;
  }

  /**
   * Write the current state to an archive file
   */
  async exportToCar(path: string): Promise<ArchiveSummary> {
    const { bytes, blockCount, rootAddress } = await this.lock.withRead(() => this.buildArchive());
    await fs.writeFile(path, bytes);

    this.logger.info('Exported graph archive', { path, rootAddress, blockCount, bytes: bytes.byteLength });
    return { rootAddress, blockCount, byteLength: bytes.byteLength };
  }

  /**
   * Load a graph from an archive file, verifying every block
   */
  static async fromCar(path: string, options: KnowledgeGraphOptions = {}): Promise<KnowledgeGraph> {
    let bytes: Buffer;
    try {
      bytes = await fs.readFile(path);
    } catch (error) {
      if (isMissingFile(error)) {
        throw new NotFoundError(`Archive ${path} does not exist`, { path }, 'NOT_FOUND', { cause: error });
      }
      throw error;
    }
    return KnowledgeGraph.fromArchive(bytes, options);
  }

  /**
   * Load a graph from archive bytes
   *
   * The graph is only returned once every block has been verified and the
   * rebuilt root matches the archive's root; the blocks are then copied
   * into the graph's blob store.
   */
  static async fromArchive(bytes: Uint8Array, options: KnowledgeGraphOptions = {}): Promise<KnowledgeGraph> {
    const logger = options.logger ?? new Logger('knowledge-graph', options.config?.logLevel);
    try {
      const archive = await decodeArchive(bytes);
      const fetchBlock = async (address: ContentAddress): Promise<Uint8Array> => {
        const block = archive.blocks.get(address);
        if (!block) {
          throw new CorruptArchiveError(`Archive is missing block ${address}`, { address });
        }
        return block;
      };

      const graph = await KnowledgeGraph.rebuild(archive.root, fetchBlock, { ...options, logger }, false);
      for (const [address, block] of archive.blocks) {
        await graph.storeBlock({ address, bytes: block });
      }

      logger.info('Imported graph archive', {
        rootAddress: graph.rootAddress,
        entities: graph.entityCount,
        relationships: graph.relationshipCount
      });
      return graph;
    } catch (error) {
      if (error instanceof CorruptArchiveError || error instanceof ContentMismatchError) {
        ErrorHandler.handle(ErrorCategory.ARCHIVE, ErrorSeverity.HIGH, 'Archive import aborted', error);
      }
      throw error;
    }
  }

  /**
   * Rebuild a graph from a root address held in a blob store
   * With `lazy`, entity blocks are fetched and verified on first read.
   */
  static async fromCid(rootAddress: ContentAddress, options: FromCidOptions): Promise<KnowledgeGraph> {
    const blobStore = options.blobStore;
    const fetchBlock = (address: ContentAddress): Promise<Uint8Array> =>
      ErrorHandler.wrapCollaborator('blob_store', 'retrieve block', () => blobStore.retrieve(address), { address });

    const graph = await KnowledgeGraph.rebuild(rootAddress, fetchBlock, options, options.lazy ?? false);
    graph.logger.info('Loaded graph from blob store', {
      rootAddress,
      lazy: options.lazy ?? false,
      entities: graph.entityCount,
      relationships: graph.relationshipCount
    });
    return graph;
  }

  /**
   * Cross-check registries, adjacency and vector references
   * Returns one message per inconsistency; empty when healthy.
   */
  async validateConsistency(): Promise<string[]> {
    return this.lock.withRead(() => {
      const errors = this.adjacency.validate(id => this.relationships.cached(id));

      for (const id of this.relationships.ids()) {
        const relationship = this.relationships.cached(id);
        if (!relationship) {
          errors.push(`Relationship ${id} is registered but not loaded`);
          continue;
        }
        if (!this.entities.has(relationship.sourceId)) {
          errors.push(`Relationship ${id} references non-existent source entity: ${relationship.sourceId}`);
        }
        if (!this.entities.has(relationship.targetId)) {
          errors.push(`Relationship ${id} references non-existent target entity: ${relationship.targetId}`);
        }
      }

      for (const [vectorRef, owner] of this.entities.sortedVectorRefs()) {
        if (!this.entities.has(owner)) {
          errors.push(`Vector reference ${vectorRef} belongs to non-existent entity: ${owner}`);
        }
      }

      if (this.adjacency.entityCount !== this.entities.size) {
        errors.push(`Adjacency covers ${this.adjacency.entityCount} entities, registry holds ${this.entities.size}`);
      }

      return errors;
    });
  }

  getStats(): GraphStats {
    return {
      name: this.config.name,
      version: this.currentVersion,
      rootAddress: this.root.address,
      entityCount: this.entities.size,
      relationshipCount: this.relationships.size,
      loadedEntityCount: this.entities.cachedCount,
      vectorCount: this.entities.vectorCount,
      entityTypes: this.entities.typeNames(),
      relationshipTypes: this.relationships.typeNames()
    };
  }

  /**
   * Shared rebuild path of `fromArchive` and `fromCid`
   *
   * Entities and relationships are registered in ID order, which is the
   * order the root block lists them in.
   */
  private static async rebuild(
    rootAddress: ContentAddress,
    fetchBlock: (address: ContentAddress) => Promise<Uint8Array>,
    options: KnowledgeGraphOptions,
    lazy: boolean
  ): Promise<KnowledgeGraph> {
    const rootBytes = await fetchBlock(rootAddress);
    const content = await decodeRootBlock(rootAddress, rootBytes, fetchBlock);

    const graph = new KnowledgeGraph({ ...options, config: { ...options.config, name: content.name } });

    const entityTypes = new Map<EntityId, string>();
    for (const [type, ids] of Object.entries(content.entityTypes)) {
      for (const id of ids) entityTypes.set(id, type);
    }

    if (lazy) {
      for (const [id, address] of content.entities) {
        const type = entityTypes.get(id);
        if (type === undefined) {
          throw new CorruptArchiveError(`Entity ${id} is missing from the root's type index`, { entityId: id });
        }
        graph.entities.register(id, type, address);
        graph.adjacency.addEntity(id);
      }
    } else {
      const decoded = await Promise.all(
        content.entities.map(async ([id, address]) => decodeEntity(id, address, await fetchBlock(address)))
      );
      for (const entity of decoded) {
        graph.installEntity(entity);
      }
    }

    for (const [vectorRef, owner] of content.vectorRefs) {
      if (!graph.entities.has(owner)) {
        throw new CorruptArchiveError(`Vector reference ${vectorRef} belongs to unknown entity ${owner}`, { vectorRef });
      }
      graph.entities.registerVectorRef(vectorRef, owner);
    }

    const relationships = await Promise.all(
      content.relationships.map(async ([id, address]) => decodeRelationship(id, address, await fetchBlock(address)))
    );
    for (const relationship of relationships) {
      if (!graph.entities.has(relationship.sourceId) || !graph.entities.has(relationship.targetId)) {
        throw new CorruptArchiveError(`Relationship ${relationship.id} references an entity outside the graph`, {
          relationshipId: relationship.id
        });
      }
      graph.installRelationship(relationship);
    }

    graph.root = graph.encodeRoot();
    if (graph.root.address !== rootAddress) {
      throw new CorruptArchiveError(`Root block ${rootAddress} does not match the blocks it references`, {
        rootAddress,
        rebuiltAddress: graph.root.address
      });
    }

    return graph;
  }

  private validateEntityInput(input: EntityInput): EntityDraft {
    if (typeof input.type !== 'string' || input.type.trim().length === 0) {
      throw new InvalidArgumentError('Entity type must be a non-empty string');
    }
    if (input.id !== undefined && (typeof input.id !== 'string' || input.id.length === 0)) {
      throw new InvalidArgumentError('Entity ID must be a non-empty string');
    }
    if (input.name !== undefined && typeof input.name !== 'string') {
      throw new InvalidArgumentError('Entity name must be a string');
    }
    if (input.sourceText !== undefined && typeof input.sourceText !== 'string') {
      throw new InvalidArgumentError('Entity sourceText must be a string');
    }

    const confidence = parseConfidence(input.confidence, 'Entity');
    const properties = parseProperties(input.properties, 'Entity');

    let vector: Float32Array | undefined;
    if (input.vector !== undefined) {
      if (!this.vectorIndex) {
        throw new InvalidArgumentError('A vector was supplied but the graph has no vector index');
      }
      if (!VectorUtils.isValid(input.vector)) {
        throw new InvalidArgumentError('Entity vector must be non-empty and contain only finite values');
      }
      vector = VectorUtils.toFloat32(input.vector);
    }

    return {
      ...(input.id !== undefined ? { id: input.id } : {}),
      content: {
        type: input.type,
        name: input.name ?? '',
        properties,
        confidence,
        ...(input.sourceText !== undefined ? { sourceText: input.sourceText } : {})
      },
      ...(vector ? { vector } : {})
    };
  }

  private validateRelationshipInput(input: RelationshipInput): RelationshipDraft {
    if (typeof input.type !== 'string' || input.type.trim().length === 0) {
      throw new InvalidArgumentError('Relationship type must be a non-empty string');
    }
    if (input.id !== undefined && (typeof input.id !== 'string' || input.id.length === 0)) {
      throw new InvalidArgumentError('Relationship ID must be a non-empty string');
    }
    if (input.sourceText !== undefined && typeof input.sourceText !== 'string') {
      throw new InvalidArgumentError('Relationship sourceText must be a string');
    }

    const sourceId = typeof input.source === 'string' ? input.source : input.source.id;
    const targetId = typeof input.target === 'string' ? input.target : input.target.id;

    return {
      ...(input.id !== undefined ? { id: input.id } : {}),
      type: input.type,
      sourceId,
      targetId,
      properties: parseProperties(input.properties, 'Relationship'),
      confidence: parseConfidence(input.confidence, 'Relationship'),
      ...(input.sourceText !== undefined ? { sourceText: input.sourceText } : {})
    };
  }

  private installEntity(entity: Entity): void {
    this.entities.register(entity.id, entity.type, entity.address, entity);
    if (entity.vectorRef !== undefined) {
      this.entities.registerVectorRef(entity.vectorRef, entity.id);
    }
    this.adjacency.addEntity(entity.id);
  }

  private installRelationship(relationship: Relationship): void {
    this.relationships.register(relationship.id, relationship.type, relationship.address, relationship);
    this.adjacency.addRelationship(relationship);
  }

  /**
   * Recompute the root after a mutation and advance the version
   */
  private commit(): void {
    this.root = this.encodeRoot();
    this.currentVersion++;
  }

  private encodeRoot(): EncodedRoot {
    return encodeRootBlock(
      {
        name: this.config.name,
        entities: this.entities.sortedPairs(),
        relationships: this.relationships.sortedPairs(),
        entityTypes: this.entities.sortedTypeIndex(),
        relationshipTypes: this.relationships.sortedTypeIndex(),
        vectorRefs: this.entities.sortedVectorRefs()
      },
      this.config.maxInlineBlockBytes
    );
  }

  /**
   * Store a block and check the address the blob store reports
   */
  private async storeBlock(block: EncodedBlock): Promise<void> {
    const stored = await ErrorHandler.wrapCollaborator('blob_store', 'store block', () => this.blobStore.store(block.bytes), {
      address: block.address
    });
    if (stored !== block.address) {
      throw new ContentMismatchError(block.address, stored, { collaborator: 'blob_store' });
    }
  }

  /**
   * Every block reachable from the root, encoded as an archive
   */
  private async buildArchive(): Promise<{ bytes: Buffer; blockCount: number; rootAddress: ContentAddress }> {
    const blocks = new Map<ContentAddress, Uint8Array>();
    blocks.set(this.root.address, this.root.bytes);
    for (const chunk of this.root.chunks) {
      blocks.set(chunk.address, chunk.bytes);
    }

    for (const [id, address] of this.entities.sortedPairs()) {
      if (blocks.has(address)) continue;
      const cached = this.entities.cached(id);
      if (cached) {
        blocks.set(address, encodeEntity(entityContent(cached)).bytes);
      } else {
        const bytes = await ErrorHandler.wrapCollaborator(
          'blob_store',
          'retrieve block',
          () => this.blobStore.retrieve(address),
          { id, address }
        );
        verifyBlock(address, bytes);
        blocks.set(address, bytes);
      }
    }

    for (const [id, address] of this.relationships.sortedPairs()) {
      if (blocks.has(address)) continue;
      blocks.set(address, encodeRelationship(relationshipContent(this.reader.relationship(id))).bytes);
    }

    const bytes = await encodeArchive(
      this.root.address,
      [...blocks].map(([address, block]) => ({ address, bytes: block })),
      this.config.archiveCompression
    );
    return { bytes, blockCount: blocks.size, rootAddress: this.root.address };
  }
}

function parseConfidence(value: number | undefined, owner: string): number {
  if (value === undefined) return 1;
  const parsed = ConfidenceSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError(`${owner} confidence must be a number in [0, 1], got ${String(value)}`);
  }
  return parsed.data;
}

function parseProperties(value: PropertyMap | undefined, owner: string): PropertyMap {
  const parsed = PropertyMapSchema.safeParse(value ?? {});
  if (!parsed.success) {
    throw new InvalidArgumentError(`${owner} properties are not a valid property map: ${parsed.error.message}`);
  }
  return parsed.data;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
