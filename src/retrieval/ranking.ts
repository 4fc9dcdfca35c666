/**
 * Vector-augmented graph ranking (GraphRAG)
 *
 * Seeds come from the vector index's nearest neighbours of a query vector.
 * From each seed a bounded breadth-first expansion reaches related
 * entities, whose score is the seed's similarity attenuated once per hop:
 *
 *   score = seedSimilarity * decay^hops
 *
 * Negative similarities score as 0, so no neighbour outranks its seed.
 * An entity reached from several seeds keeps its best score and the path
 * that produced it.
 */

import { InvalidArgumentError } from '../core/errors.js';
import type { BestPath, GraphReader, HopRule, TraversalEngine } from '../core/traversal.js';
import type { CancellationPoint, Direction, Entity, EntityId, PathStep } from '../core/types.js';
import { CancellationTracker } from '../utils/cancellation.js';
import { compareIds } from '../utils/compare.js';
import { ErrorHandler } from '../utils/error-handler.js';
import { VectorUtils } from '../utils/vector-utils.js';

/**
 * Relationships a hop may follow; omitted fields allow everything
 */
export interface RelationshipConstraint {
  types?: string[];
  direction?: Direction;
}

export interface VectorQueryOptions {
  queryVector: Float32Array | number[];
  /** Entry i governs hop i + 1; hops past the end reuse the last entry */
  relationshipConstraints?: RelationshipConstraint[];
  topK?: number;
  maxHops?: number;
  minConfidence?: number;
  /** Nearest neighbours requested from the vector index */
  seedCount?: number;
  /** Per-hop attenuation in (0, 1) */
  decay?: number;
  signal?: AbortSignal;
}

export interface RankedEntity {
  entity: Entity;
  score: number;
  /** Similarity of the seed the entity was reached from */
  similarity: number;
  hops: number;
  seedId: EntityId;
  path: PathStep[];
  pathConfidence: number;
}

export interface VectorQueryResult {
  results: RankedEntity[];
  metadata: {
    seedsConsidered: number;
    candidatesScored: number;
    executionTime: number;
    complete: boolean;
    cancelledAt?: CancellationPoint;
  };
}

interface Seed {
  entityId: EntityId;
  similarity: number;
}

interface Candidate {
  entityId: EntityId;
  seed: Seed;
  path: BestPath;
  score: number;
}

/**
 * Ordering of ranked candidates: score desc, hops asc, path confidence
 * desc, then entity ID
 */
function compareCandidates(a: Candidate, b: Candidate): number {
  return (
    b.score - a.score ||
    a.path.hops - b.path.hops ||
    b.path.confidence - a.path.confidence ||
    compareIds(a.entityId, b.entityId) ||
    compareIds(a.seed.entityId, b.seed.entityId)
  );
}

export class RankingEngine {
  private graph: GraphReader;
  private traversal: TraversalEngine;

  constructor(graph: GraphReader, traversal: TraversalEngine) {
    this.graph = graph;
    this.traversal = traversal;
  }

  async vectorAugmentedQuery(options: VectorQueryOptions): Promise<VectorQueryResult> {
    const startTime = Date.now();
    const vectorIndex = this.graph.vectorIndex;
    if (!vectorIndex) {
      throw new InvalidArgumentError('vectorAugmentedQuery requires a vector index');
    }

    const topK = options.topK ?? 10;
    const maxHops = options.maxHops ?? 2;
    const minConfidence = options.minConfidence ?? 0;
    const decay = options.decay ?? this.graph.config.decay;
    const seedCount = options.seedCount ?? topK * this.graph.config.seedMultiplier;
    const constraints = options.relationshipConstraints ?? [];

    assertPositiveInteger('topK', topK);
    assertPositiveInteger('seedCount', seedCount);
    if (!Number.isInteger(maxHops) || maxHops < 0) {
      throw new InvalidArgumentError(`maxHops must be a non-negative integer, got ${maxHops}`);
    }
    if (!(minConfidence >= 0 && minConfidence <= 1)) {
      throw new InvalidArgumentError(`minConfidence must be in [0, 1], got ${minConfidence}`);
    }
    if (!(decay > 0 && decay < 1)) {
      throw new InvalidArgumentError(`decay must be in (0, 1), got ${decay}`);
    }
    if (!VectorUtils.isValid(options.queryVector)) {
      throw new InvalidArgumentError('queryVector must be non-empty and contain only finite values');
    }

    const queryVector = VectorUtils.toFloat32(options.queryVector);
    const matches = await ErrorHandler.wrapCollaborator('vector_index', 'search', () =>
      vectorIndex.search(queryVector, seedCount)
    );

    const seeds: Seed[] = [];
    const seen = new Set<EntityId>();
    for (const match of matches) {
      const owner = this.graph.ownerOfVectorRef(match.vectorRef);
      if (owner === undefined || seen.has(owner)) continue;
      seen.add(owner);

      const entity = await this.graph.loadEntity(owner);
      if (entity.confidence < minConfidence) continue;
      seeds.push({ entityId: owner, similarity: match.similarity });
    }

    const tracker = new CancellationTracker(options.signal);
    const hopRule = (hop: number): HopRule => {
      const constraint = constraints[Math.min(hop, constraints.length) - 1];
      return {
        direction: constraint?.direction ?? 'both',
        ...(constraint?.types ? { types: constraint.types } : {})
      };
    };

    const expansions = await Promise.all(
      seeds.map(seed =>
        this.traversal.bestPaths(seed.entityId, {
          maxHops,
          hopRule,
          minConfidence,
          tracker,
          stage: 'seed_expansion',
          detail: seed.entityId
        })
      )
    );

    const merged = new Map<EntityId, Candidate>();
    expansions.forEach((paths, index) => {
      const seed = seeds[index];
      if (!seed) return;
      for (const path of paths.values()) {
        const candidate: Candidate = {
          entityId: path.entityId,
          seed,
          path,
          score: Math.max(seed.similarity, 0) * Math.pow(decay, path.hops)
        };
        const existing = merged.get(path.entityId);
        if (!existing || compareCandidates(candidate, existing) < 0) {
          merged.set(path.entityId, candidate);
        }
      }
    });

    const ranked = [...merged.values()].sort(compareCandidates).slice(0, topK);
    const results = await Promise.all(
      ranked.map(async candidate => ({
        entity: await this.graph.loadEntity(candidate.entityId),
        score: candidate.score,
        similarity: candidate.seed.similarity,
        hops: candidate.path.hops,
        seedId: candidate.seed.entityId,
        path: candidate.path.steps,
        pathConfidence: candidate.path.confidence
      }))
    );

    this.graph.logger.debug('Vector-augmented query ranked candidates', {
      seeds: seeds.length,
      candidates: merged.size,
      returned: results.length
    });

    return {
      results,
      metadata: {
        seedsConsidered: seeds.length,
        candidatesScored: merged.size,
        executionTime: Date.now() - startTime,
        complete: !tracker.cancelled,
        ...(tracker.cancelledAt ? { cancelledAt: tracker.cancelledAt } : {})
      }
    };
  }
}

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidArgumentError(`${name} must be a positive integer, got ${value}`);
  }
}
