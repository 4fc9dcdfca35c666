/**
 * Content-addressed knowledge graph
 *
 * Entities and relationships are stored as content-addressed blocks and
 * summarized by a root address that only depends on what the graph
 * contains. On top of the graph sit multi-hop traversal, vector-augmented
 * ranking (GraphRAG) and cross-document reasoning, and the whole graph can
 * be exported to and verified from a portable archive.
 */

export * from "./src/index.js";
