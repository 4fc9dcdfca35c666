/**
 * Unit tests for the in-memory vector index and vector helpers
 */

import { InMemoryVectorIndex } from '../../indexing/vector-index.js';
import { VectorUtils } from '../../utils/vector-utils.js';

describe('InMemoryVectorIndex', () => {
  let index: InMemoryVectorIndex;

  beforeEach(() => {
    index = new InMemoryVectorIndex();
  });

  test('should return the nearest vectors first', async () => {
    const east = await index.add(new Float32Array([1, 0]), 'east');
    const north = await index.add(new Float32Array([0, 1]), 'north');
    const west = await index.add(new Float32Array([-1, 0]), 'west');

    const matches = await index.search(new Float32Array([1, 0]), 2);

    expect(matches).toEqual([
      { vectorRef: east, similarity: 1 },
      { vectorRef: north, similarity: 0 }
    ]);
    expect(index.getAssociatedId(west)).toBe('west');
  });

  test('should derive references from the owner and the vector', async () => {
    const first = await index.add(new Float32Array([1, 2]), 'doc');
    const again = await new InMemoryVectorIndex().add(new Float32Array([1, 2]), 'doc');
    const otherOwner = await index.add(new Float32Array([1, 2]), 'other');

    expect(again).toBe(first);
    expect(otherOwner).not.toBe(first);
    expect(first).toMatch(/^vec-[0-9a-f]{32}$/);
  });

  test('should keep its own copy of each vector', async () => {
    const vector = new Float32Array([1, 0]);
    const ref = await index.add(vector, 'doc');
    vector[0] = 5;

    expect(Array.from(index.getVector(ref) ?? [])).toEqual([1, 0]);
  });

  test('should reject vectors of another dimension', async () => {
    await index.add(new Float32Array([1, 0]), 'a');

    await expect(index.add(new Float32Array([1, 0, 0]), 'b')).rejects.toThrow('dimension mismatch');
    await expect(index.search(new Float32Array([1]), 1)).rejects.toThrow('dimension mismatch');
  });

  test('should reject empty and non-finite vectors', async () => {
    await expect(index.add(new Float32Array([]), 'a')).rejects.toThrow();
    await expect(index.add(new Float32Array([Number.NaN]), 'a')).rejects.toThrow();
  });

  test('should return nothing from an empty index', async () => {
    expect(await index.search(new Float32Array([1, 0]), 5)).toEqual([]);
    expect(index.getStats()).toMatchObject({ totalVectors: 0, queryCount: 1 });
  });
});

describe('VectorUtils', () => {
  test('should compute cosine similarity', () => {
    expect(VectorUtils.cosineSimilarity(new Float32Array([1, 0]), new Float32Array([0, 1]))).toBe(0);
    expect(VectorUtils.cosineSimilarity(new Float32Array([2, 0]), new Float32Array([3, 0]))).toBe(1);
    expect(VectorUtils.cosineSimilarity(new Float32Array([0, 0]), new Float32Array([1, 0]))).toBe(0);
  });

  test('should validate vectors', () => {
    expect(VectorUtils.isValid([1, 2])).toBe(true);
    expect(VectorUtils.isValid([])).toBe(false);
    expect(VectorUtils.isValid([1, Number.POSITIVE_INFINITY])).toBe(false);
  });
});
