/**
 * Vector utility functions for similarity calculations
 */

export class VectorUtils {
  /**
   * Copy any numeric vector into a Float32Array
   */
  static toFloat32(vector: Float32Array | number[]): Float32Array {
    return vector instanceof Float32Array ? new Float32Array(vector) : Float32Array.from(vector);
  }

  /**
   * Calculate cosine similarity between two vectors
   */
  static cosineSimilarity(a: Float32Array, b: Float32Array): number {
    if (a.length !== b.length) {
      throw new Error(`Vectors must have the same length (${a.length} vs ${b.length})`);
    }

    let dotProduct = 0;
    let normA = 0;
    let normB = 0;

    for (let i = 0; i < a.length; i++) {
      const x = a[i] ?? 0;
      const y = b[i] ?? 0;
      dotProduct += x * y;
      normA += x * x;
      normB += y * y;
    }

    if (normA === 0 || normB === 0) {
      return 0;
    }

    return dotProduct / (Math.sqrt(normA) * Math.sqrt(normB));
  }

  /**
   * Check if vector has valid values (not NaN or infinite)
   */
  static isValid(vector: Float32Array | number[]): boolean {
    for (let i = 0; i < vector.length; i++) {
      if (!Number.isFinite(vector[i])) {
        return false;
      }
    }
    return vector.length > 0;
  }
}
