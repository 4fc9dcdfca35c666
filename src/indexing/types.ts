/**
 * Vector index contract consumed by the knowledge graph
 *
 * The index is an external, shared collaborator: several graphs may
 * register vectors with the same instance. The graph only ever adds
 * vectors and searches them.
 */

import type { VectorRef } from '../core/types.js';

/**
 * A search hit, ordered by descending similarity
 */
export interface VectorMatch {
  vectorRef: VectorRef;
  similarity: number;
}

export interface VectorIndex {
  /** Register a vector on behalf of `associatedId`, returning its handle */
  add(vector: Float32Array, associatedId: string): Promise<VectorRef>;

  /** The `topK` nearest vectors to `queryVector`, best first */
  search(queryVector: Float32Array, topK: number): Promise<VectorMatch[]>;
}

/**
 * Index statistics for monitoring
 */
export interface VectorIndexStats {
  totalVectors: number;
  dimension: number;
  queryCount: number;
  memoryUsage: number;
}
