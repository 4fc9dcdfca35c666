/**
 * Graph traversal algorithms for GraphRAG operations
 *
 * Implements the two primitives every retrieval operation is built on:
 * undirected multi-source breadth-first expansion, and directed path
 * matching along an ordered list of relationship types. Both keep an
 * explicit frontier so cancellation and result limits are checked at each
 * expansion step.
 *
 * Time Complexity: O(V + E) for expansion, O(branches) for path matching
 * Space Complexity: O(V) for expansion, O(frontier) for path matching
 */

import { EntityNotFoundError, InvalidArgumentError } from './errors.js';
import type { CancellationPoint, Direction, Entity, EntityId, GraphConfig, PathStep, Relationship, VectorRef } from './types.js';
import type { VectorIndex } from '../indexing/types.js';
import { CancellationTracker } from '../utils/cancellation.js';
import type { Logger } from '../utils/logger.js';

/**
 * Read-only view of a graph used by the traversal, ranking and reasoning
 * engines. Callers hold the graph's read lock for the lifetime of an
 * operation, so nothing here locks again.
 */
export interface GraphReader {
  readonly config: GraphConfig;
  readonly logger: Logger;
  readonly vectorIndex?: VectorIndex;
  /** Number of vectors registered by this graph */
  readonly vectorCount: number;
  hasEntity(entityId: EntityId): boolean;
  /** Decoded entity; rejects with `EntityNotFoundError` for unknown IDs */
  loadEntity(entityId: EntityId): Promise<Entity>;
  /** Relationships touching an entity, in adjacency order */
  relationshipsOf(entityId: EntityId, direction: Direction, relationshipTypes?: readonly string[]): Relationship[];
  /** Entity owning a vector reference, if this graph registered it */
  ownerOfVectorRef(vectorRef: VectorRef): EntityId | undefined;
  entityTypeOf(entityId: EntityId): string | undefined;
}

/**
 * Options for `traverseFromEntities`
 */
export interface TraversalOptions {
  /** Relationship types to follow (undefined = all types) */
  relationshipTypes?: string[];
  /** Maximum depth to traverse */
  maxDepth?: number;
  /** Stop after discovering this many entities */
  maxNodes?: number;
  /** Stop after examining this many relationships */
  maxEdges?: number;
  signal?: AbortSignal;
}

export interface TraversalMetadata {
  nodesVisited: number;
  edgesTraversed: number;
  maxDepthReached: number;
  executionTime: number;
  /** False when the search was cancelled */
  complete: boolean;
  /** True when a node or edge budget stopped the search */
  truncated: boolean;
  cancelledAt?: CancellationPoint;
}

/**
 * Result of a traversal operation
 */
export interface TraversalResult {
  /** Entities in discovery order */
  entities: Entity[];
  /** Depth at which each returned entity was discovered */
  depths: Map<EntityId, number>;
  /** Relationship through which each entity was discovered, in discovery order */
  relationships: Relationship[];
  metadata: TraversalMetadata;
}

/**
 * Options for `query`
 */
export interface PathQueryOptions {
  maxResults?: number;
  minConfidence?: number;
  signal?: AbortSignal;
}

/**
 * A completed branch of a path query
 */
export interface PathMatch {
  entity: Entity;
  path: PathStep[];
  /** Product of the confidences of the relationships along the path */
  pathConfidence: number;
}

export interface PathQueryResult {
  /** Distinct destination entities, in order of first match */
  entities: Entity[];
  /** One record per completed branch */
  matches: PathMatch[];
  metadata: {
    executionTime: number;
    complete: boolean;
    /** True when more branches completed than `maxResults` allowed */
    truncated: boolean;
    /** Largest frontier held between two steps */
    peakFrontier: number;
    cancelledAt?: CancellationPoint;
  };
}

/**
 * Which relationships a hop of a best-path expansion may follow
 */
export interface HopRule {
  direction: Direction;
  types?: readonly string[];
}

/**
 * Options for `bestPaths`
 */
export interface BestPathOptions {
  maxHops: number;
  /** Rule for hop n (1-based); defaults to every type in both directions */
  hopRule?: (hop: number) => HopRule;
  /** Relationships and entities below this confidence are not walked */
  minConfidence?: number;
  /** Entities that may be reached but are never expanded further */
  terminals?: ReadonlySet<EntityId>;
  /** Terminals closer than this many hops are ignored */
  minTerminalHops?: number;
  tracker?: CancellationTracker;
  stage?: string;
  detail?: string;
}

/**
 * Best path found to an entity: fewest hops, then highest confidence
 */
export interface BestPath {
  entityId: EntityId;
  hops: number;
  steps: PathStep[];
  confidence: number;
}

/**
 * Partial-path record held in the frontier of a path query
 */
interface PartialPath {
  entityId: EntityId;
  steps: PathStep[];
  confidence: number;
}

/**
 * Traversal engine over a graph reader
 */
export class TraversalEngine {
  private graph: GraphReader;

  constructor(graph: GraphReader) {
    this.graph = graph;
  }

  /**
   * Multi-source breadth-first search
   *
   * Every relationship is walked in both directions. The visited set
   * starts with all seeds; a seed is only reported when the search that
   * started from a different seed reaches it.
   */
  async traverseFromEntities(seeds: Array<Entity | EntityId>, options: TraversalOptions = {}): Promise<TraversalResult> {
    const startTime = Date.now();
    const maxDepth = options.maxDepth ?? 2;
    validateTraversalOptions(maxDepth, options);

    const seedIds = [...new Set(seeds.map(seed => (typeof seed === 'string' ? seed : seed.id)))];
    for (const seedId of seedIds) {
      if (!this.graph.hasEntity(seedId)) {
        throw new EntityNotFoundError(seedId, 'Seed entity');
      }
    }

    const tracker = new CancellationTracker(options.signal);
    const seedSet = new Set(seedIds);
    const visited = new Set(seedIds);
    const origin = new Map<EntityId, EntityId>(seedIds.map(id => [id, id]));
    const discovered: EntityId[] = [];
    const depths = new Map<EntityId, number>();
    const traversed: Relationship[] = [];

    let nodesVisited = 0;
    let edgesTraversed = 0;
    let maxDepthReached = 0;
    let truncated = false;

    let frontier = maxDepth > 0 ? seedIds : [];

    levels: for (let depth = 1; depth <= maxDepth && frontier.length > 0; depth++) {
      if (tracker.check('traversal', depth)) break;

      const next: EntityId[] = [];
      for (const nodeId of frontier) {
        nodesVisited++;
        const nodeOrigin = origin.get(nodeId) ?? nodeId;

        for (const relationship of this.graph.relationshipsOf(nodeId, 'both', options.relationshipTypes)) {
          if (options.maxEdges !== undefined && edgesTraversed >= options.maxEdges) {
            truncated = true;
            break levels;
          }
          edgesTraversed++;

          const neighborId = relationship.sourceId === nodeId ? relationship.targetId : relationship.sourceId;
          const reachedOtherSeed = seedSet.has(neighborId) && neighborId !== nodeOrigin && !depths.has(neighborId);

          if (!visited.has(neighborId) || reachedOtherSeed) {
            if (options.maxNodes !== undefined && discovered.length >= options.maxNodes) {
              truncated = true;
              break levels;
            }
            if (!visited.has(neighborId)) {
              visited.add(neighborId);
              origin.set(neighborId, nodeOrigin);
              next.push(neighborId);
            }
            discovered.push(neighborId);
            depths.set(neighborId, depth);
            traversed.push(relationship);
            maxDepthReached = Math.max(maxDepthReached, depth);
          }
        }
      }
      frontier = next;
    }

    const entities = await Promise.all(discovered.map(id => this.graph.loadEntity(id)));

    this.graph.logger.debug('Traversal finished', {
      seeds: seedIds.length,
      discovered: entities.length,
      edgesTraversed,
      cancelled: tracker.cancelled
    });

    return {
      entities,
      depths,
      relationships: traversed,
      metadata: {
        nodesVisited,
        edgesTraversed,
        maxDepthReached,
        executionTime: Date.now() - startTime,
        complete: !tracker.cancelled,
        truncated,
        ...(tracker.cancelledAt ? { cancelledAt: tracker.cancelledAt } : {})
      }
    };
  }

  /**
   * Directed, ordered path matching
   *
   * Step i expands every partial path along outgoing relationships of type
   * `relationshipPath[i]`. Relationships and destination entities below
   * `minConfidence` prune their branch silently.
   */
  async query(
    startEntity: Entity | EntityId,
    relationshipPath: readonly string[],
    options: PathQueryOptions = {}
  ): Promise<PathQueryResult> {
    const startTime = Date.now();
    const maxResults = options.maxResults ?? 100;
    const minConfidence = options.minConfidence ?? 0;

    if (!Number.isInteger(maxResults) || maxResults <= 0) {
      throw new InvalidArgumentError(`maxResults must be a positive integer, got ${maxResults}`);
    }
    if (!(minConfidence >= 0 && minConfidence <= 1)) {
      throw new InvalidArgumentError(`minConfidence must be in [0, 1], got ${minConfidence}`);
    }
    relationshipPath.forEach((segment, index) => {
      if (typeof segment !== 'string' || segment.length === 0) {
        throw new InvalidArgumentError(`Relationship path segment ${index} must be a non-empty string`);
      }
    });

    const startId = typeof startEntity === 'string' ? startEntity : startEntity.id;
    if (!this.graph.hasEntity(startId)) {
      throw new EntityNotFoundError(startId, 'Start entity');
    }

    const tracker = new CancellationTracker(options.signal);
    const matches: PathMatch[] = [];
    let truncated = false;
    let peakFrontier = 1;

    if (relationshipPath.length === 0) {
      const start = await this.graph.loadEntity(startId);
      if (start.confidence >= minConfidence) {
        matches.push({ entity: start, path: [], pathConfidence: 1 });
      }
    } else {
      let frontier: PartialPath[] = [{ entityId: startId, steps: [], confidence: 1 }];
      const lastStep = relationshipPath.length - 1;

      steps: for (let step = 0; step <= lastStep && frontier.length > 0; step++) {
        if (tracker.check('path_query', step)) break;

        const relationshipType = relationshipPath[step] ?? '';
        const next: PartialPath[] = [];

        for (const partial of frontier) {
          for (const relationship of this.graph.relationshipsOf(partial.entityId, 'outgoing', [relationshipType])) {
            if (relationship.confidence < minConfidence) continue;

            const destination = await this.graph.loadEntity(relationship.targetId);
            if (destination.confidence < minConfidence) continue;

            const extended: PartialPath = {
              entityId: destination.id,
              steps: [
                ...partial.steps,
                {
                  relationshipId: relationship.id,
                  relationshipType: relationship.type,
                  fromId: relationship.sourceId,
                  toId: relationship.targetId,
                  direction: 'outgoing',
                  confidence: relationship.confidence
                }
              ],
              confidence: partial.confidence * relationship.confidence
            };

            if (step < lastStep) {
              next.push(extended);
              continue;
            }

            if (matches.length >= maxResults) {
              truncated = true;
              break steps;
            }
            matches.push({ entity: destination, path: extended.steps, pathConfidence: extended.confidence });
          }
        }

        frontier = next;
        peakFrontier = Math.max(peakFrontier, next.length);
      }
    }

    const entities: Entity[] = [];
    const seen = new Set<EntityId>();
    for (const match of matches) {
      if (!seen.has(match.entity.id)) {
        seen.add(match.entity.id);
        entities.push(match.entity);
      }
    }

    return {
      entities,
      matches,
      metadata: {
        executionTime: Date.now() - startTime,
        complete: !tracker.cancelled,
        truncated,
        peakFrontier,
        ...(tracker.cancelledAt ? { cancelledAt: tracker.cancelledAt } : {})
      }
    };
  }

  /**
   * Level-synchronous expansion keeping one best path per entity
   *
   * An entity keeps the path of the level that first reached it; among the
   * paths reaching it on that level the most confident wins, and the first
   * one found wins ties. The start entity is included at hop 0. A fired
   * tracker stops the expansion and the paths found so far are returned.
   */
  async bestPaths(startId: EntityId, options: BestPathOptions): Promise<Map<EntityId, BestPath>> {
    const minConfidence = options.minConfidence ?? 0;
    const minTerminalHops = options.minTerminalHops ?? 1;
    const origin: BestPath = { entityId: startId, hops: 0, steps: [], confidence: 1 };
    const best = new Map<EntityId, BestPath>([[startId, origin]]);
    let frontier: BestPath[] = [origin];

    for (let hop = 1; hop <= options.maxHops && frontier.length > 0; hop++) {
      if (options.tracker?.check(options.stage ?? 'expansion', hop, options.detail)) break;

      const rule = options.hopRule?.(hop) ?? { direction: 'both' };
      const level = new Map<EntityId, BestPath>();

      for (const current of frontier) {
        for (const relationship of this.graph.relationshipsOf(current.entityId, rule.direction, rule.types)) {
          if (relationship.confidence < minConfidence) continue;

          const walkedOutgoing = relationship.sourceId === current.entityId && rule.direction !== 'incoming';
          const neighborId = walkedOutgoing ? relationship.targetId : relationship.sourceId;
          if (best.has(neighborId)) continue;

          const isTerminal = options.terminals?.has(neighborId) ?? false;
          if (isTerminal && hop < minTerminalHops) continue;

          const confidence = current.confidence * relationship.confidence;
          const existing = level.get(neighborId);
          if (existing && existing.confidence >= confidence) continue;

          if (minConfidence > 0) {
            const neighbor = await this.graph.loadEntity(neighborId);
            if (neighbor.confidence < minConfidence) continue;
          }

          level.set(neighborId, {
            entityId: neighborId,
            hops: hop,
            steps: [
              ...current.steps,
              {
                relationshipId: relationship.id,
                relationshipType: relationship.type,
                fromId: current.entityId,
                toId: neighborId,
                direction: walkedOutgoing ? 'outgoing' : 'incoming',
                confidence: relationship.confidence
              }
            ],
            confidence
          });
        }
      }

      frontier = [];
      for (const [entityId, path] of level) {
        best.set(entityId, path);
        if (!(options.terminals?.has(entityId) ?? false)) {
          frontier.push(path);
        }
      }
    }

    return best;
  }
}

function validateTraversalOptions(maxDepth: number, options: TraversalOptions): void {
  if (!Number.isInteger(maxDepth) || maxDepth < 0) {
    throw new InvalidArgumentError(`maxDepth must be a non-negative integer, got ${maxDepth}`);
  }
  for (const key of ['maxNodes', 'maxEdges'] as const) {
    const limit = options[key];
    if (limit !== undefined && (!Number.isInteger(limit) || limit <= 0)) {
      throw new InvalidArgumentError(`${key} must be a positive integer, got ${limit}`);
    }
  }
}
