/**
 * Cross-document reasoning
 *
 * Finds the documents most similar to a query, then looks for evidence
 * connecting them through the entities they share. Every decision is
 * written to a numbered trace so a result can be explained and reproduced.
 *
 * Depths:
 * - basic: document -> entity -> document paths through a shared entity
 * - moderate: basic paths, plus the best longer path for pairs that share
 *   no entity
 * - deep: moderate paths, plus chains of three or more documents linked
 *   pairwise by those paths
 */

import { InvalidArgumentError } from '../core/errors.js';
import type { BestPath, GraphReader, TraversalEngine } from '../core/traversal.js';
import type { CancellationPoint, Entity, EntityId, PathStep, Relationship } from '../core/types.js';
import type { VectorMatch } from '../indexing/types.js';
import { CancellationTracker } from '../utils/cancellation.js';
import { compareIds } from '../utils/compare.js';
import { ErrorHandler } from '../utils/error-handler.js';
import { VectorUtils } from '../utils/vector-utils.js';

export type ReasoningDepth = 'basic' | 'moderate' | 'deep';

export interface CrossDocumentOptions {
  query: string;
  queryVector: Float32Array | number[];
  documentNodeTypes?: string[];
  maxHops?: number;
  minRelevance?: number;
  maxDocuments?: number;
  reasoningDepth?: ReasoningDepth;
  /** Evidence paths below this confidence are rejected */
  minPathConfidence?: number;
  signal?: AbortSignal;
}

export interface DocumentSummary {
  id: EntityId;
  type: string;
  /** The `title` property when it is a string, otherwise the entity name */
  title: string;
  similarity: number;
}

/**
 * A path connecting two candidate documents
 */
export interface EvidencePath {
  sourceDocumentId: EntityId;
  targetDocumentId: EntityId;
  kind: 'shared_entity' | 'multi_hop';
  /** Intermediate entities, in walk order */
  viaEntityIds: EntityId[];
  steps: PathStep[];
  /** Product of the relationship confidences along the path */
  confidence: number;
  hops: number;
}

export interface DocumentChain {
  documentIds: EntityId[];
  /** Product of the strongest evidence confidence of each link */
  confidence: number;
}

export interface CrossDocumentResult {
  query: string;
  answer: string;
  /** Candidate documents connected by at least one evidence path */
  documents: DocumentSummary[];
  evidencePaths: EvidencePath[];
  documentChains: DocumentChain[];
  confidence: number;
  reasoningTrace: string[];
  metadata: {
    candidatesConsidered: number;
    reasoningDepth: ReasoningDepth;
    executionTime: number;
    complete: boolean;
    cancelledAt?: CancellationPoint;
  };
}

interface Candidate {
  entity: Entity;
  similarity: number;
}

interface PairOutcome {
  accepted: EvidencePath[];
  notes: string[];
}

/**
 * Numbered, deterministic reasoning trace
 */
class ReasoningTrace {
  private steps: string[] = [];

  add(step: string): void {
    this.steps.push(`${this.steps.length + 1}. ${step}`);
  }

  addAll(steps: readonly string[]): void {
    steps.forEach(step => this.add(step));
  }

  toArray(): string[] {
    return [...this.steps];
  }
}

function formatScore(value: number): string {
  return value.toFixed(3);
}

function describePath(path: EvidencePath): string {
  const via = path.viaEntityIds.join(' -> ');
  return `${path.sourceDocumentId} -> ${via} -> ${path.targetDocumentId}`;
}

export class ReasoningEngine {
  private graph: GraphReader;
  private traversal: TraversalEngine;

  constructor(graph: GraphReader, traversal: TraversalEngine) {
    this.graph = graph;
    this.traversal = traversal;
  }

  async crossDocumentReasoning(options: CrossDocumentOptions): Promise<CrossDocumentResult> {
    const startTime = Date.now();
    const vectorIndex = this.graph.vectorIndex;
    if (!vectorIndex) {
      throw new InvalidArgumentError('crossDocumentReasoning requires a vector index');
    }

    const documentNodeTypes = options.documentNodeTypes ?? ['document', 'paper'];
    const maxHops = options.maxHops ?? 2;
    const minRelevance = options.minRelevance ?? 0.6;
    const maxDocuments = options.maxDocuments ?? 5;
    const depth = options.reasoningDepth ?? 'moderate';
    const minPathConfidence = options.minPathConfidence ?? 0;

    if (!Number.isInteger(maxHops) || maxHops < 0) {
      throw new InvalidArgumentError(`maxHops must be a non-negative integer, got ${maxHops}`);
    }
    if (!Number.isInteger(maxDocuments) || maxDocuments <= 0) {
      throw new InvalidArgumentError(`maxDocuments must be a positive integer, got ${maxDocuments}`);
    }
    if (depth !== 'basic' && depth !== 'moderate' && depth !== 'deep') {
      throw new InvalidArgumentError(`Unknown reasoning depth: ${String(depth)}`);
    }
    if (!(minPathConfidence >= 0 && minPathConfidence <= 1)) {
      throw new InvalidArgumentError(`minPathConfidence must be in [0, 1], got ${minPathConfidence}`);
    }
    if (!VectorUtils.isValid(options.queryVector)) {
      throw new InvalidArgumentError('queryVector must be non-empty and contain only finite values');
    }

    const trace = new ReasoningTrace();
    const tracker = new CancellationTracker(options.signal);
    trace.add(`Query: "${options.query}" (depth ${depth}, maxHops ${maxHops}, minRelevance ${formatScore(minRelevance)})`);

    const candidates = await this.selectCandidates(
      VectorUtils.toFloat32(options.queryVector),
      new Set(documentNodeTypes),
      minRelevance,
      maxDocuments,
      trace
    );

    if (candidates.length === 0) {
      trace.add(`No documents of type ${documentNodeTypes.join(', ')} reached similarity ${formatScore(minRelevance)}`);
      return this.finish(options.query, depth, [], [], [], [], 0, trace, tracker, startTime);
    }

    const candidateIds = new Set(candidates.map(candidate => candidate.entity.id));
    const pairs: Array<[Candidate, Candidate]> = [];
    for (let i = 0; i < candidates.length; i++) {
      for (let j = i + 1; j < candidates.length; j++) {
        const source = candidates[i];
        const target = candidates[j];
        if (source && target) pairs.push([source, target]);
      }
    }
    if (pairs.length === 0) {
      trace.add('Only one candidate document; no pairs to connect');
    }

    const outcomes = await Promise.all(
      pairs.map(([source, target]) =>
        this.connectPair(source.entity.id, target.entity.id, candidateIds, depth, maxHops, minPathConfidence, tracker)
      )
    );

    const evidencePaths: EvidencePath[] = [];
    for (const outcome of outcomes) {
      trace.addAll(outcome.notes);
      evidencePaths.push(...outcome.accepted);
    }

    const documentChains =
      depth === 'deep' && !tracker.cancelled ? this.buildChains(candidates, evidencePaths, tracker, trace) : [];

    const connectedIds = new Set<EntityId>();
    for (const path of evidencePaths) {
      connectedIds.add(path.sourceDocumentId);
      connectedIds.add(path.targetDocumentId);
    }
    const connected = candidates.filter(candidate => connectedIds.has(candidate.entity.id));

    const confidence = this.scoreConfidence(connected, evidencePaths, candidates.length, trace);

    return this.finish(
      options.query,
      depth,
      candidates,
      connected,
      evidencePaths,
      documentChains,
      confidence,
      trace,
      tracker,
      startTime
    );
  }

  /**
   * Documents of the requested types above the relevance bar, best first
   */
  private async selectCandidates(
    queryVector: Float32Array,
    documentTypes: ReadonlySet<string>,
    minRelevance: number,
    maxDocuments: number,
    trace: ReasoningTrace
  ): Promise<Candidate[]> {
    const poolSize = this.graph.vectorCount;
    if (poolSize === 0) {
      trace.add('The graph has no registered vectors');
      return [];
    }

    const matches = await this.searchOwnVectors(queryVector, poolSize, minRelevance);

    const similarities = new Map<EntityId, number>();
    for (const match of matches) {
      const owner = this.graph.ownerOfVectorRef(match.vectorRef);
      if (owner === undefined || similarities.has(owner)) continue;
      const type = this.graph.entityTypeOf(owner);
      if (type === undefined || !documentTypes.has(type)) continue;
      similarities.set(owner, match.similarity);
    }

    const ranked = [...similarities.entries()].sort((a, b) => b[1] - a[1] || compareIds(a[0], b[0]));
    const selected: Candidate[] = [];

    for (const [entityId, similarity] of ranked) {
      if (similarity < minRelevance) {
        trace.add(`Skipped ${entityId}: similarity ${formatScore(similarity)} below ${formatScore(minRelevance)}`);
      } else if (selected.length >= maxDocuments) {
        trace.add(`Skipped ${entityId}: document limit of ${maxDocuments} reached`);
      } else {
        selected.push({ entity: await this.graph.loadEntity(entityId), similarity });
        trace.add(`Selected ${entityId} (similarity ${formatScore(similarity)})`);
      }
    }

    return selected;
  }

  /**
   * Search the vector index until this graph's relevant vectors are all in view
   *
   * The index may hold other graphs' vectors, so the page size doubles
   * until no relevant vector of this graph can lie past the last page.
   */
  private async searchOwnVectors(
    queryVector: Float32Array,
    poolSize: number,
    minRelevance: number
  ): Promise<VectorMatch[]> {
    const vectorIndex = this.graph.vectorIndex;
    if (!vectorIndex) return [];

    let pageSize = poolSize;
    for (;;) {
      const size = pageSize;
      const matches = await ErrorHandler.wrapCollaborator('vector_index', 'search', () =>
        vectorIndex.search(queryVector, size)
      );
      const owned = matches.filter(match => this.graph.ownerOfVectorRef(match.vectorRef) !== undefined).length;
      const weakest = matches[matches.length - 1];
      if (matches.length < size || owned >= poolSize || weakest === undefined || weakest.similarity < minRelevance) {
        return matches;
      }
      pageSize = size * 2;
    }
  }

  /**
   * Evidence connecting one pair of candidate documents
   */
  private async connectPair(
    sourceId: EntityId,
    targetId: EntityId,
    candidateIds: ReadonlySet<EntityId>,
    depth: ReasoningDepth,
    maxHops: number,
    minPathConfidence: number,
    tracker: CancellationTracker
  ): Promise<PairOutcome> {
    const outcome: PairOutcome = { accepted: [], notes: [] };
    const pairLabel = `${sourceId} <-> ${targetId}`;

    if (tracker.check('pair_search', 0, pairLabel)) {
      return outcome;
    }

    const shared = maxHops >= 2 ? this.sharedEntityPaths(sourceId, targetId, candidateIds) : [];
    for (const path of shared) {
      this.judge(path, minPathConfidence, outcome);
    }

    if (shared.length > 0) {
      outcome.notes.push(
        `Pair ${pairLabel}: ${shared.length} shared-entity path(s), best confidence ${formatScore(
          Math.max(...shared.map(path => path.confidence))
        )}`
      );
      return outcome;
    }

    const longer = await this.bestLongerPath(sourceId, targetId, candidateIds, maxHops, tracker, pairLabel);
    if (!longer) {
      outcome.notes.push(`Pair ${pairLabel}: no entity-mediated path within ${maxHops} hops`);
      return outcome;
    }

    if (depth === 'basic') {
      outcome.notes.push(
        `Rejected ${describePath(longer)} (${longer.hops} hops): basic reasoning accepts shared-entity paths only`
      );
      return outcome;
    }

    this.judge(longer, minPathConfidence, outcome);
    return outcome;
  }

  private judge(path: EvidencePath, minPathConfidence: number, outcome: PairOutcome): void {
    if (path.confidence < minPathConfidence) {
      outcome.notes.push(
        `Rejected ${describePath(path)}: confidence ${formatScore(path.confidence)} below ${formatScore(minPathConfidence)}`
      );
      return;
    }
    outcome.accepted.push(path);
    outcome.notes.push(`Accepted ${describePath(path)} (${path.hops} hops, confidence ${formatScore(path.confidence)})`);
  }

  /**
   * One document-entity-document path per shared entity, using the
   * strongest relationship on each side
   */
  private sharedEntityPaths(sourceId: EntityId, targetId: EntityId, candidateIds: ReadonlySet<EntityId>): EvidencePath[] {
    const sourceSide = this.strongestLinks(sourceId, candidateIds);
    const targetSide = this.strongestLinks(targetId, candidateIds);
    const paths: EvidencePath[] = [];

    for (const [entityId, fromSource] of sourceSide) {
      const fromTarget = targetSide.get(entityId);
      if (!fromTarget) continue;

      const first = stepBetween(fromSource, sourceId);
      const second = stepBetween(fromTarget, entityId);
      paths.push({
        sourceDocumentId: sourceId,
        targetDocumentId: targetId,
        kind: 'shared_entity',
        viaEntityIds: [entityId],
        steps: [first, second],
        confidence: first.confidence * second.confidence,
        hops: 2
      });
    }

    return paths;
  }

  /**
   * Strongest relationship from a document to each non-document neighbour,
   * in adjacency order of first appearance
   */
  private strongestLinks(documentId: EntityId, candidateIds: ReadonlySet<EntityId>): Map<EntityId, Relationship> {
    const links = new Map<EntityId, Relationship>();
    for (const relationship of this.graph.relationshipsOf(documentId, 'both')) {
      const neighborId = relationship.sourceId === documentId ? relationship.targetId : relationship.sourceId;
      if (neighborId === documentId || candidateIds.has(neighborId)) continue;

      const existing = links.get(neighborId);
      if (!existing || relationship.confidence > existing.confidence) {
        links.set(neighborId, relationship);
      }
    }
    return links;
  }

  /**
   * Shortest, then most confident, path of three or more hops whose
   * intermediates are not candidate documents
   */
  private async bestLongerPath(
    sourceId: EntityId,
    targetId: EntityId,
    candidateIds: ReadonlySet<EntityId>,
    maxHops: number,
    tracker: CancellationTracker,
    pairLabel: string
  ): Promise<EvidencePath | undefined> {
    if (maxHops < 3) return undefined;

    const paths = await this.traversal.bestPaths(sourceId, {
      maxHops,
      terminals: candidateIds,
      minTerminalHops: 2,
      tracker,
      stage: 'pair_search',
      detail: pairLabel
    });

    const found: BestPath | undefined = paths.get(targetId);
    if (!found) return undefined;

    return {
      sourceDocumentId: sourceId,
      targetDocumentId: targetId,
      kind: 'multi_hop',
      viaEntityIds: found.steps.slice(0, -1).map(step => step.toId),
      steps: found.steps,
      confidence: found.confidence,
      hops: found.hops
    };
  }

  /**
   * Maximal simple chains of three or more documents over the pairwise
   * connections, up to the configured chain length
   */
  private buildChains(
    candidates: Candidate[],
    evidencePaths: EvidencePath[],
    tracker: CancellationTracker,
    trace: ReasoningTrace
  ): DocumentChain[] {
    const strength = new Map<string, number>();
    const neighbors = new Map<EntityId, EntityId[]>();
    const order = new Map(candidates.map((candidate, index) => [candidate.entity.id, index]));

    const link = (a: EntityId, b: EntityId, confidence: number): void => {
      const key = pairKey(a, b);
      if (!strength.has(key)) {
        neighbors.set(a, [...(neighbors.get(a) ?? []), b]);
        neighbors.set(b, [...(neighbors.get(b) ?? []), a]);
      }
      strength.set(key, Math.max(strength.get(key) ?? 0, confidence));
    };
    for (const path of evidencePaths) {
      link(path.sourceDocumentId, path.targetDocumentId, path.confidence);
    }
    for (const list of neighbors.values()) {
      list.sort((a, b) => (order.get(a) ?? 0) - (order.get(b) ?? 0));
    }

    const maxLength = this.graph.config.maxChainLength;
    const chains = new Map<string, DocumentChain>();

    const extend = (chain: EntityId[], confidence: number): void => {
      const last = chain[chain.length - 1] ?? '';
      const next = (neighbors.get(last) ?? []).filter(id => !chain.includes(id));

      if (next.length === 0 || chain.length >= maxLength) {
        if (chain.length >= 3) {
          const canonical = compareIds(chain[0] ?? '', last) <= 0 ? chain : [...chain].reverse();
          chains.set(canonical.join('|'), { documentIds: canonical, confidence });
        }
        return;
      }

      for (const id of next) {
        extend([...chain, id], confidence * (strength.get(pairKey(last, id)) ?? 0));
      }
    };

    for (const candidate of candidates) {
      if (tracker.check('chain_building', 0, candidate.entity.id)) break;
      extend([candidate.entity.id], 1);
    }

    const sorted = [...chains.values()].sort(
      (a, b) =>
        b.documentIds.length - a.documentIds.length ||
        b.confidence - a.confidence ||
        compareIds(a.documentIds.join('|'), b.documentIds.join('|'))
    );

    if (sorted.length === 0) {
      trace.add('No document chains of three or more documents');
    }
    for (const chain of sorted) {
      trace.add(`Chain ${chain.documentIds.join(' -> ')} (confidence ${formatScore(chain.confidence)})`);
    }
    return sorted;
  }

  /**
   * Weighted mean of mean similarity, mean path confidence and coverage
   */
  private scoreConfidence(
    connected: Candidate[],
    evidencePaths: EvidencePath[],
    candidateCount: number,
    trace: ReasoningTrace
  ): number {
    if (connected.length === 0 || evidencePaths.length === 0) {
      trace.add('No candidate documents were connected; confidence 0.000');
      return 0;
    }

    const weights = this.graph.config.reasoningWeights;
    const meanSimilarity = connected.reduce((sum, candidate) => sum + candidate.similarity, 0) / connected.length;
    const meanPathConfidence = evidencePaths.reduce((sum, path) => sum + path.confidence, 0) / evidencePaths.length;
    const coverage = connected.length / candidateCount;
    const totalWeight = weights.similarity + weights.pathConfidence + weights.coverage;

    const confidence =
      (weights.similarity * meanSimilarity + weights.pathConfidence * meanPathConfidence + weights.coverage * coverage) /
      totalWeight;

    trace.add(
      `Scores: mean similarity ${formatScore(meanSimilarity)}, mean path confidence ${formatScore(
        meanPathConfidence
      )}, coverage ${formatScore(coverage)}, confidence ${formatScore(confidence)}`
    );
    return confidence;
  }

  private async finish(
    query: string,
    depth: ReasoningDepth,
    candidates: Candidate[],
    connected: Candidate[],
    evidencePaths: EvidencePath[],
    documentChains: DocumentChain[],
    confidence: number,
    trace: ReasoningTrace,
    tracker: CancellationTracker,
    startTime: number
  ): Promise<CrossDocumentResult> {
    const cancelledAt = tracker.cancelledAt;
    if (cancelledAt) {
      const detail = cancelledAt.detail ? ` (${cancelledAt.detail})` : '';
      trace.add(`Cancelled during ${cancelledAt.stage} at hop ${cancelledAt.hop}${detail}; results are partial`);
    }

    const answer = await this.composeAnswer(query, connected.length, evidencePaths, candidates.length);

    this.graph.logger.debug('Cross-document reasoning finished', {
      candidates: candidates.length,
      connected: connected.length,
      paths: evidencePaths.length,
      cancelled: tracker.cancelled
    });

    return {
      query,
      answer,
      documents: connected.map(candidate => summarize(candidate)),
      evidencePaths,
      documentChains,
      confidence,
      reasoningTrace: trace.toArray(),
      metadata: {
        candidatesConsidered: candidates.length,
        reasoningDepth: depth,
        executionTime: Date.now() - startTime,
        complete: !tracker.cancelled,
        ...(cancelledAt ? { cancelledAt } : {})
      }
    };
  }

  private async composeAnswer(
    query: string,
    documentCount: number,
    evidencePaths: EvidencePath[],
    candidateCount: number
  ): Promise<string> {
    if (evidencePaths.length === 0) {
      return `No connected evidence was found for '${query}' among ${candidateCount} candidate document(s).`;
    }

    const viaIds: EntityId[] = [];
    for (const path of evidencePaths) {
      for (const id of path.viaEntityIds) {
        if (!viaIds.includes(id)) viaIds.push(id);
      }
    }
    const names = await Promise.all(viaIds.slice(0, 3).map(async id => (await this.graph.loadEntity(id)).name || id));

    return (
      `Based on the analysis of ${documentCount} documents with ${evidencePaths.length} entity-mediated connections, ` +
      `the answer to '${query}' involves information connected through entities like ${names.join(', ')}`
    );
  }
}

function summarize(candidate: Candidate): DocumentSummary {
  const title = candidate.entity.properties['title'];
  return {
    id: candidate.entity.id,
    type: candidate.entity.type,
    title: typeof title === 'string' ? title : candidate.entity.name,
    similarity: candidate.similarity
  };
}

/**
 * Step walking `relationship` away from `fromId`
 */
function stepBetween(relationship: Relationship, fromId: EntityId): PathStep {
  const outgoing = relationship.sourceId === fromId;
  return {
    relationshipId: relationship.id,
    relationshipType: relationship.type,
    fromId,
    toId: outgoing ? relationship.targetId : relationship.sourceId,
    direction: outgoing ? 'outgoing' : 'incoming',
    confidence: relationship.confidence
  };
}

function pairKey(a: EntityId, b: EntityId): string {
  return compareIds(a, b) <= 0 ? `${a}|${b}` : `${b}|${a}`;
}
