/**
 * Test setup and utilities
 *
 * Global test configuration and helper functions for Jest tests.
 * Sets up common test utilities and environment for all test suites.
 */

import { AdjacencyIndex } from '../core/adjacency.js';
import { createDefaultGraphConfig } from '../core/config.js';
import { EntityNotFoundError } from '../core/errors.js';
import { KnowledgeGraph, type KnowledgeGraphOptions } from '../core/graph.js';
import { encodeEntity, encodeRelationship } from '../core/identity.js';
import { createEntity, createRelationship } from '../core/records.js';
import type { GraphReader } from '../core/traversal.js';
import type { Direction, Entity, EntityId, EntityInput, GraphConfig, Relationship } from '../core/types.js';
import { Logger } from '../utils/logger.js';
import { InMemoryVectorIndex } from '../indexing/vector-index.js';
import { MemoryBlobStore } from '../storage/memory-blob-store.js';

// Global test timeout for async operations
jest.setTimeout(10000);

// Mock console methods for cleaner test output
const originalConsoleLog = console.log;
const originalConsoleDebug = console.debug;
const originalConsoleWarn = console.warn;
const originalConsoleError = console.error;

beforeEach(() => {
  // Mock console output to reduce noise during tests (unless VERBOSE_TESTS is set)
  if (!process.env.VERBOSE_TESTS) {
    console.log = jest.fn();
    console.debug = jest.fn();
    console.warn = jest.fn();
    console.error = jest.fn();
  }
});

afterEach(() => {
  // Restore console methods
  if (!process.env.VERBOSE_TESTS) {
    console.log = originalConsoleLog;
    console.debug = originalConsoleDebug;
    console.warn = originalConsoleWarn;
    console.error = originalConsoleError;
  }
});

/**
 * Minimal in-memory graph reader for exercising the engines directly
 * `onExpand` runs whenever an engine asks for an entity's relationships.
 */
export class StubGraphReader implements GraphReader {
  readonly config: GraphConfig = createDefaultGraphConfig();
  readonly logger = new Logger('test', 'silent');
  readonly vectorCount = 0;
  onExpand?: (entityId: EntityId) => void;

  private adjacency = new AdjacencyIndex();
  private entities = new Map<EntityId, Entity>();
  private relationships = new Map<string, Relationship>();

  addEntity(id: EntityId, type: string = 'node', confidence: number = 1): Entity {
    const content = { type, name: id, properties: {}, confidence };
    const entity = createEntity(id, content, encodeEntity(content).address);
    this.entities.set(id, entity);
    this.adjacency.addEntity(id);
    return entity;
  }

  link(id: string, sourceId: EntityId, targetId: EntityId, type: string = 'link', confidence: number = 1): Relationship {
    const content = { type, sourceId, targetId, properties: {}, confidence };
    const relationship = createRelationship(id, content, encodeRelationship(content).address);
    this.relationships.set(id, relationship);
    this.adjacency.addRelationship(relationship);
    return relationship;
  }

  hasEntity(entityId: EntityId): boolean {
    return this.entities.has(entityId);
  }

  async loadEntity(entityId: EntityId): Promise<Entity> {
    const entity = this.entities.get(entityId);
    if (!entity) throw new EntityNotFoundError(entityId);
    return entity;
  }

  relationshipsOf(entityId: EntityId, direction: Direction, relationshipTypes?: readonly string[]): Relationship[] {
    this.onExpand?.(entityId);
    return this.adjacency
      .relationshipIds(entityId, direction, relationshipTypes)
      .flatMap(id => this.relationships.get(id) ?? []);
  }

  ownerOfVectorRef(): EntityId | undefined {
    return undefined;
  }

  entityTypeOf(entityId: EntityId): string | undefined {
    return this.entities.get(entityId)?.type;
  }
}

/**
 * A graph together with the collaborators it was built on
 */
export interface TestGraph {
  graph: KnowledgeGraph;
  blobStore: MemoryBlobStore;
  vectorIndex: InMemoryVectorIndex;
}

// Export test utilities
export const TestHelpers = {
  /**
   * Graph with a fresh in-memory blob store and vector index
   */
  createTestGraph(options: Omit<KnowledgeGraphOptions, 'blobStore' | 'vectorIndex'> = {}): TestGraph {
    const blobStore = new MemoryBlobStore();
    const vectorIndex = new InMemoryVectorIndex();
    const graph = new KnowledgeGraph({ ...options, blobStore, vectorIndex });
    return { graph, blobStore, vectorIndex };
  },

  /**
   * Generate deterministic test entity input
   */
  generateTestEntity(name: string, type: string = 'person', overrides: Partial<EntityInput> = {}): EntityInput {
    return {
      id: `${type}_${name.toLowerCase().replace(/\s+/g, '_')}`,
      type,
      name,
      properties: { testGenerated: true },
      confidence: 0.9,
      ...overrides
    };
  },

  /**
   * Add a chain of entities linked by one relationship type: ids[0] -> ids[1] -> ...
   */
  async addChain(
    graph: KnowledgeGraph,
    ids: string[],
    relationshipType: string = 'next'
  ): Promise<{ entities: Entity[]; relationships: Relationship[] }> {
    const entities: Entity[] = [];
    for (const id of ids) {
      entities.push(await graph.addEntity({ id, type: 'node', name: id }));
    }

    const relationships: Relationship[] = [];
    for (let i = 0; i + 1 < ids.length; i++) {
      const source = ids[i];
      const target = ids[i + 1];
      if (source === undefined || target === undefined) continue;
      relationships.push(
        await graph.addRelationship({ id: `${source}-${target}`, type: relationshipType, source, target })
      );
    }

    return { entities, relationships };
  },

  /**
   * IDs of a list of records, in order
   */
  ids(records: ReadonlyArray<{ id: string }>): string[] {
    return records.map(record => record.id);
  }
};
