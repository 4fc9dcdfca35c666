/**
 * In-memory vector index
 *
 * Exact cosine-similarity search over every registered vector. Vector
 * references are derived from the associated ID and the vector's bytes, so
 * the same registration always yields the same reference regardless of
 * the order in which vectors arrive.
 *
 * Example: register entity embeddings, then find the entities closest to a
 * query embedding.
 */

import { createHash } from 'crypto';
import type { VectorRef } from '../core/types.js';
import { compareIds } from '../utils/compare.js';
import { VectorUtils } from '../utils/vector-utils.js';
import type { VectorIndex, VectorIndexStats, VectorMatch } from './types.js';

interface StoredVector {
  vector: Float32Array;
  associatedId: string;
}

export class InMemoryVectorIndex implements VectorIndex {
  public readonly name = 'vector_index';

  private vectors: Map<VectorRef, StoredVector> = new Map();
  private dimension = 0;
  private queryCount = 0;

  async add(vector: Float32Array, associatedId: string): Promise<VectorRef> {
    if (vector.length === 0 || !VectorUtils.isValid(vector)) {
      throw new Error('Vector must be non-empty and contain only finite values');
    }

    // Set dimension on first vector
    if (this.dimension === 0) {
      this.dimension = vector.length;
    } else if (vector.length !== this.dimension) {
      throw new Error(`Vector dimension mismatch: expected ${this.dimension}, got ${vector.length}`);
    }

    const copy = new Float32Array(vector);
    const vectorRef = this.referenceFor(copy, associatedId);
    this.vectors.set(vectorRef, { vector: copy, associatedId });
    return vectorRef;
  }

  async search(queryVector: Float32Array, topK: number): Promise<VectorMatch[]> {
    this.queryCount++;

    if (topK <= 0 || this.vectors.size === 0) {
      return [];
    }
    if (queryVector.length !== this.dimension) {
      throw new Error(`Query vector dimension mismatch: expected ${this.dimension}, got ${queryVector.length}`);
    }

    const matches: VectorMatch[] = [];
    for (const [vectorRef, stored] of this.vectors) {
      matches.push({ vectorRef, similarity: VectorUtils.cosineSimilarity(queryVector, stored.vector) });
    }

    // Sort by similarity (descending), reference as tie-breaker
    matches.sort((a, b) => b.similarity - a.similarity || compareIds(a.vectorRef, b.vectorRef));

    return matches.slice(0, topK);
  }

  /**
   * ID the vector was registered for
   */
  getAssociatedId(vectorRef: VectorRef): string | undefined {
    return this.vectors.get(vectorRef)?.associatedId;
  }

  /**
   * Get vector for a reference
   */
  getVector(vectorRef: VectorRef): Float32Array | undefined {
    return this.vectors.get(vectorRef)?.vector;
  }

  get size(): number {
    return this.vectors.size;
  }

  getStats(): VectorIndexStats {
    return {
      totalVectors: this.vectors.size,
      dimension: this.dimension,
      queryCount: this.queryCount,
      memoryUsage: this.estimateMemoryUsage()
    };
  }

  private referenceFor(vector: Float32Array, associatedId: string): VectorRef {
    const hash = createHash('sha256');
    hash.update(associatedId);
    hash.update('\u0000');
    hash.update(Buffer.from(vector.buffer, vector.byteOffset, vector.byteLength));
    return `vec-${hash.digest('hex').slice(0, 32)}`;
  }

  private estimateMemoryUsage(): number {
    // Float32Array uses 4 bytes per element, plus map overhead
    return this.vectors.size * (this.dimension * 4 + 50);
  }
}
