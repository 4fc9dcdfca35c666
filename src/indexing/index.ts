/**
 * Vector indexing for the knowledge graph
 */

export type { VectorIndex, VectorMatch, VectorIndexStats } from './types.js';
export { InMemoryVectorIndex } from './vector-index.js';
