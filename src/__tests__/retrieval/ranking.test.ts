/**
 * Unit tests for vector-augmented ranking
 */

import { InvalidArgumentError } from '../../core/errors.js';
import { KnowledgeGraph } from '../../core/graph.js';
import type { VectorQueryOptions } from '../../retrieval/ranking.js';
import { TestHelpers } from '../setup.js';

describe('vectorAugmentedQuery', () => {
  let graph: KnowledgeGraph;

  describe('single seed', () => {
    beforeEach(async () => {
      graph = TestHelpers.createTestGraph().graph;
      await graph.addEntity({ id: 'a', type: 'document', name: 'A', vector: [1, 0] });
      await graph.addEntity({ id: 'b', type: 'document', name: 'B', vector: [0, 1] });
      await graph.addEntity({ id: 'c', type: 'concept', name: 'C' });
      await graph.addRelationship({ id: 'a-c', type: 'mentions', source: 'a', target: 'c', confidence: 0.9 });
    });

    test('should score entities by seed similarity attenuated per hop', async () => {
      const result = await graph.vectorAugmentedQuery({ queryVector: [1, 0] });

      expect(result.results.map(r => [r.entity.id, r.score, r.hops])).toEqual([
        ['a', 1, 0],
        ['c', 0.5, 1],
        ['b', 0, 0]
      ]);
      expect(result.metadata).toMatchObject({ seedsConsidered: 2, candidatesScored: 3, complete: true });
    });

    test('should report the path that produced a score', async () => {
      const result = await graph.vectorAugmentedQuery({ queryVector: [1, 0] });
      const concept = result.results.find(r => r.entity.id === 'c');

      expect(concept).toMatchObject({ seedId: 'a', similarity: 1, pathConfidence: 0.9 });
      expect(concept?.path.map(step => [step.relationshipId, step.direction])).toEqual([['a-c', 'outgoing']]);
    });

    test('should use the requested decay', async () => {
      const result = await graph.vectorAugmentedQuery({ queryVector: [1, 0], decay: 0.25 });

      expect(result.results[1]?.score).toBe(0.25);
    });

    test('should keep only the top results', async () => {
      const result = await graph.vectorAugmentedQuery({ queryVector: [1, 0], topK: 2 });

      expect(TestHelpers.ids(result.results.map(r => r.entity))).toEqual(['a', 'c']);
    });

    test('should return only seeds when no hops are allowed', async () => {
      const result = await graph.vectorAugmentedQuery({ queryVector: [1, 0], maxHops: 0 });

      expect(TestHelpers.ids(result.results.map(r => r.entity))).toEqual(['a', 'b']);
    });

    test('should honour relationship direction constraints', async () => {
      const incomingOnly = await graph.vectorAugmentedQuery({
        queryVector: [1, 0],
        relationshipConstraints: [{ direction: 'incoming' }]
      });
      const typed = await graph.vectorAugmentedQuery({
        queryVector: [1, 0],
        relationshipConstraints: [{ types: ['mentions'], direction: 'outgoing' }]
      });

      expect(TestHelpers.ids(incomingOnly.results.map(r => r.entity))).toEqual(['a', 'b']);
      expect(TestHelpers.ids(typed.results.map(r => r.entity))).toEqual(['a', 'c', 'b']);
    });

    test('should drop seeds below the confidence bar', async () => {
      await graph.addEntity({ id: 'weak', type: 'document', name: 'Weak', confidence: 0.2, vector: [1, 0] });

      const result = await graph.vectorAugmentedQuery({ queryVector: [1, 0], minConfidence: 0.5 });

      expect(result.results.map(r => r.entity.id)).not.toContain('weak');
      expect(result.metadata.seedsConsidered).toBe(2);
    });

    test('should return partial results when cancelled', async () => {
      const controller = new AbortController();
      controller.abort();

      const result = await graph.vectorAugmentedQuery({ queryVector: [1, 0], signal: controller.signal });

      expect(TestHelpers.ids(result.results.map(r => r.entity))).toEqual(['a', 'b']);
      expect(result.metadata.complete).toBe(false);
      expect(result.metadata.cancelledAt).toEqual({ stage: 'seed_expansion', hop: 1, detail: 'a' });
    });

    test.each<[string, Partial<VectorQueryOptions>]>([
      ['topK of 0', { topK: 0 }],
      ['negative maxHops', { maxHops: -1 }],
      ['decay of 1', { decay: 1 }],
      ['minConfidence above 1', { minConfidence: 1.5 }]
    ])('should reject %s', async (_label, overrides) => {
      await expect(graph.vectorAugmentedQuery({ queryVector: [1, 0], ...overrides })).rejects.toThrow(
        InvalidArgumentError
      );
    });

    test('should reject an empty query vector', async () => {
      await expect(graph.vectorAugmentedQuery({ queryVector: [] })).rejects.toThrow(InvalidArgumentError);
    });
  });

  describe('several seeds', () => {
    beforeEach(async () => {
      graph = TestHelpers.createTestGraph().graph;
      await graph.addEntity({ id: 'a', type: 'document', name: 'A', vector: [1, 0] });
      await graph.addEntity({ id: 'b', type: 'document', name: 'B', vector: [0.6, 0.8] });
      await graph.addEntity({ id: 'm', type: 'concept', name: 'M' });
      await graph.addEntity({ id: 'x', type: 'concept', name: 'X' });
      await graph.addRelationship({ id: 'a-m', type: 'mentions', source: 'a', target: 'm' });
      await graph.addRelationship({ id: 'm-x', type: 'related_to', source: 'm', target: 'x' });
      await graph.addRelationship({ id: 'b-x', type: 'mentions', source: 'b', target: 'x' });
    });

    test('should keep the best score for entities reached from several seeds', async () => {
      const result = await graph.vectorAugmentedQuery({ queryVector: [1, 0] });

      expect(TestHelpers.ids(result.results.map(r => r.entity))).toEqual(['a', 'b', 'm', 'x']);

      const x = result.results[3];
      expect(x?.seedId).toBe('b');
      expect(x?.hops).toBe(1);
      expect(x?.score).toBeCloseTo(0.3, 5);

      const m = result.results[2];
      expect(m?.seedId).toBe('a');
      expect(m?.score).toBe(0.5);
    });
  });

  describe('score ordering', () => {
    beforeEach(() => {
      graph = TestHelpers.createTestGraph().graph;
    });

    test('should rank the more confident path first at equal distance', async () => {
      await graph.addEntity({ id: 'hub', type: 'document', name: 'Hub', vector: [1, 0] });
      await graph.addEntity({ id: 'w', type: 'concept', name: 'W' });
      await graph.addEntity({ id: 'x', type: 'concept', name: 'X' });
      await graph.addRelationship({ id: 'hub-w', type: 'mentions', source: 'hub', target: 'w', confidence: 0.4 });
      await graph.addRelationship({ id: 'hub-x', type: 'mentions', source: 'hub', target: 'x', confidence: 0.9 });

      const result = await graph.vectorAugmentedQuery({ queryVector: [1, 0] });

      expect(result.results.map(r => [r.entity.id, r.score, r.hops, r.pathConfidence])).toEqual([
        ['hub', 1, 0, 1],
        ['x', 0.5, 1, 0.9],
        ['w', 0.5, 1, 0.4]
      ]);
    });

    test('should never rank a neighbour above a seed with negative similarity', async () => {
      await graph.addEntity({ id: 's', type: 'document', name: 'S', vector: [-1, 0] });
      await graph.addEntity({ id: 'n', type: 'concept', name: 'N' });
      await graph.addRelationship({ id: 's-n', type: 'mentions', source: 's', target: 'n' });

      const result = await graph.vectorAugmentedQuery({ queryVector: [1, 0] });

      expect(result.results.map(r => [r.entity.id, r.score, r.hops, r.similarity])).toEqual([
        ['s', 0, 0, -1],
        ['n', 0, 1, -1]
      ]);
    });
  });

  describe('shared vector index', () => {
    test('should ignore vectors registered by other graphs', async () => {
      const { graph: first, blobStore, vectorIndex } = TestHelpers.createTestGraph();
      const second = new KnowledgeGraph({ blobStore, vectorIndex });
      await first.addEntity({ id: 'mine', type: 'document', name: 'Mine', vector: [1, 0] });
      await second.addEntity({ id: 'theirs', type: 'document', name: 'Theirs', vector: [1, 0] });

      const result = await first.vectorAugmentedQuery({ queryVector: [1, 0] });

      expect(TestHelpers.ids(result.results.map(r => r.entity))).toEqual(['mine']);
      expect(result.metadata.seedsConsidered).toBe(1);
    });
  });

  test('should require a vector index', async () => {
    const bare = new KnowledgeGraph();
    await expect(bare.vectorAugmentedQuery({ queryVector: [1, 0] })).rejects.toThrow(InvalidArgumentError);
  });
});
