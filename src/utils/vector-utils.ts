/**
 * Vector utility functions for similarity calculations over embeddings
 *
 * Vectors are plain number arrays as returned by embedding backends.
 * Dimension mismatches yield neutral results (similarity 0) rather than
 * throwing, so one malformed embedding cannot abort a ranking pass.
 */

/**
 * Dense row-major similarity matrix
 */
export interface SimilarityMatrix {
  /** Number of rows (and columns) */
  size: number;
  /** size * size values, row-major */
  values: Float64Array;
}

/**
 * Index pair scored above a similarity threshold (always i < j)
 */
export interface SimilarPair {
  i: number;
  j: number;
  similarity: number;
}

export interface SimilarityResult {
  index: number;
  score: number;
}

// Rows per block in the matrix product; keeps both operand blocks cache-resident
const BLOCK_SIZE = 64;

export class VectorUtils {
  /**
   * Cosine similarity of two vectors
   *
   * 0 for empty, zero-norm or different-length vectors.
   */
  static cosineSimilarity(a: readonly number[], b: readonly number[]): number {
    if (a.length !== b.length || a.length === 0) {
      return 0;
    }

    let dotProduct = 0;
    let normA = 0;
    let normB = 0;

    for (let i = 0; i < a.length; i++) {
      dotProduct += a[i] * b[i];
      normA += a[i] * a[i];
      normB += b[i] * b[i];
    }

    if (normA === 0 || normB === 0) {
      return 0;
    }

    return dotProduct / (Math.sqrt(normA) * Math.sqrt(normB));
  }

  /**
   * Euclidean distance; Infinity for different-length vectors
   */
  static l2Distance(a: readonly number[], b: readonly number[]): number {
    if (a.length !== b.length) {
      return Infinity;
    }

    let sum = 0;
    for (let i = 0; i < a.length; i++) {
      const diff = a[i] - b[i];
      sum += diff * diff;
    }

    return Math.sqrt(sum);
  }

  /**
   * Normalize a vector to unit length; a zero vector stays zero
   */
  static normalize(vector: readonly number[]): number[] {
    const norm = Math.sqrt(vector.reduce((sum, val) => sum + val * val, 0));
    if (norm === 0) return new Array<number>(vector.length).fill(0);

    return vector.map(val => val / norm);
  }

  /**
   * Check that a vector has no NaN or infinite values
   */
  static isValid(vector: readonly number[]): boolean {
    return vector.every(val => Number.isFinite(val));
  }

  /**
   * Pairwise cosine similarities
   *
   * Rows are normalized into one flat buffer, then multiplied by their own
   * transpose block by block. Rows whose length differs from the first row
   * are treated as zero vectors.
   */
  static similarityMatrix(vectors: ReadonlyArray<readonly number[]>): SimilarityMatrix {
    const n = vectors.length;
    const values = new Float64Array(n * n);
    if (n === 0) {
      return { size: 0, values };
    }

    const dimension = vectors[0].length;
    const rows = new Float64Array(n * dimension);

    for (let r = 0; r < n; r++) {
      const vector = vectors[r];
      if (vector.length !== dimension) continue;

      let norm = 0;
      for (let k = 0; k < dimension; k++) {
        norm += vector[k] * vector[k];
      }
      if (norm === 0) continue;

      const scale = 1 / Math.sqrt(norm);
      const offset = r * dimension;
      for (let k = 0; k < dimension; k++) {
        rows[offset + k] = vector[k] * scale;
      }
    }

    for (let blockI = 0; blockI < n; blockI += BLOCK_SIZE) {
      const endI = Math.min(blockI + BLOCK_SIZE, n);
      for (let blockJ = blockI; blockJ < n; blockJ += BLOCK_SIZE) {
        const endJ = Math.min(blockJ + BLOCK_SIZE, n);

        for (let i = blockI; i < endI; i++) {
          const offsetI = i * dimension;
          for (let j = Math.max(i, blockJ); j < endJ; j++) {
            const offsetJ = j * dimension;
            let dot = 0;
            for (let k = 0; k < dimension; k++) {
              dot += rows[offsetI + k] * rows[offsetJ + k];
            }
            values[i * n + j] = dot;
            values[j * n + i] = dot;
          }
        }
      }
    }

    return { size: n, values };
  }

  /**
   * All index pairs (i < j) with similarity strictly above the threshold
   *
   * Sorted by similarity descending, then by (i, j) ascending.
   */
  static findSimilarPairs(vectors: ReadonlyArray<readonly number[]>, threshold = 0.9): SimilarPair[] {
    const { size, values } = this.similarityMatrix(vectors);
    const pairs: SimilarPair[] = [];

    for (let i = 0; i < size; i++) {
      for (let j = i + 1; j < size; j++) {
        const similarity = values[i * size + j];
        if (similarity > threshold) {
          pairs.push({ i, j, similarity });
        }
      }
    }

    pairs.sort((a, b) => b.similarity - a.similarity || a.i - b.i || a.j - b.j);
    return pairs;
  }

  /**
   * The k candidates most similar to the query, at or above the threshold
   */
  static topKSimilar(
    query: readonly number[],
    candidates: ReadonlyArray<readonly number[]>,
    k: number = 5,
    threshold: number = -Infinity
  ): SimilarityResult[] {
    const results: SimilarityResult[] = [];

    for (let i = 0; i < candidates.length; i++) {
      const score = this.cosineSimilarity(query, candidates[i]);
      if (score >= threshold) {
        results.push({ index: i, score });
      }
    }

    results.sort((a, b) => b.score - a.score || a.index - b.index);
    return results.slice(0, Math.max(0, k));
  }

  /**
   * Validate a batch of embeddings
   */
  static validateEmbeddings(embeddings: ReadonlyArray<readonly number[]>): {
    isValid: boolean;
    issues: string[];
  } {
    const issues: string[] = [];

    if (embeddings.length === 0) {
      issues.push('No embeddings provided');
      return { isValid: false, issues };
    }

    const dimensions = embeddings[0].length;

    for (let i = 1; i < embeddings.length; i++) {
      if (embeddings[i].length !== dimensions) {
        issues.push(`Embedding ${i} has inconsistent dimensions (${embeddings[i].length} vs ${dimensions})`);
      }
    }

    for (let i = 0; i < embeddings.length; i++) {
      if (!this.isValid(embeddings[i])) {
        issues.push(`Embedding ${i} contains invalid values (NaN or infinite)`);
      }
    }

    for (let i = 0; i < embeddings.length; i++) {
      if (embeddings[i].every(val => val === 0)) {
        issues.push(`Embedding ${i} is a zero vector`);
      }
    }

    return {
      isValid: issues.length === 0,
      issues
    };
  }

  /**
   * Create a bounded embedding cache; the oldest entry is evicted first
   */
  static createEmbeddingCache(maxSize: number = 1000): EmbeddingCache {
    const cache = new Map<string, number[]>();

    return {
      get: (key: string) => cache.get(key),
      set: (key: string, embedding: number[]) => {
        if (cache.has(key)) {
          cache.delete(key);
        } else if (cache.size >= maxSize) {
          const oldest = cache.keys().next();
          if (!oldest.done) {
            cache.delete(oldest.value);
          }
        }
        cache.set(key, embedding);
      },
      clear: () => cache.clear(),
      size: () => cache.size
    };
  }
}

export interface EmbeddingCache {
  get(key: string): number[] | undefined;
  set(key: string, embedding: number[]): void;
  clear(): void;
  size(): number;
}
