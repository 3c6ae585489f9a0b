/**
 * Node embedding store
 *
 * Maps node ids to embedding vectors of one shared dimensionality.
 * The dimension is fixed by the first vector stored.
 */

import { ValidationError } from '../utils/error-handler.js';
import { VectorUtils } from '../utils/vector-utils.js';

export interface NodeSimilarity {
  node: string;
  similarity: number;
}

export class NodeEmbeddings {
  private vectors: Map<string, number[]> = new Map();
  private dim: number | undefined;

  constructor(entries?: Iterable<readonly [string, readonly number[]]>) {
    if (!entries) return;

    for (const [node, vector] of entries) {
      this.set(node, vector);
    }
  }

  static fromRecord(record: Record<string, readonly number[]>): NodeEmbeddings {
    return new NodeEmbeddings(Object.entries(record));
  }

  /**
   * Vector length shared by every stored embedding; undefined while empty
   */
  get dimension(): number | undefined {
    return this.dim;
  }

  get size(): number {
    return this.vectors.size;
  }

  get nodeIds(): string[] {
    return [...this.vectors.keys()];
  }

  get(node: string): number[] | undefined {
    const vector = this.vectors.get(node);
    return vector ? [...vector] : undefined;
  }

  has(node: string): boolean {
    return this.vectors.has(node);
  }

  /**
   * Store a vector, rejecting one whose length differs from the stored dimension
   */
  set(node: string, vector: readonly number[]): void {
    if (vector.length === 0) {
      throw new ValidationError(`Embedding for "${node}" is empty`);
    }
    if (this.dim !== undefined && vector.length !== this.dim) {
      throw new ValidationError(
        `Embedding for "${node}" has dimension ${vector.length}, expected ${this.dim}`
      );
    }
    this.dim = vector.length;
    this.vectors.set(node, [...vector]);
  }

  remove(node: string): boolean {
    const removed = this.vectors.delete(node);
    if (this.vectors.size === 0) {
      this.dim = undefined;
    }
    return removed;
  }

  /**
   * Copy every entry of another store into this one, overwriting shared ids
   */
  merge(other: NodeEmbeddings): void {
    for (const [node, vector] of other.vectors) {
      this.set(node, vector);
    }
  }

  /**
   * New store containing only the listed nodes
   */
  filtered(nodes: Iterable<string>): NodeEmbeddings {
    const result = new NodeEmbeddings();
    for (const node of nodes) {
      const vector = this.vectors.get(node);
      if (vector) result.set(node, vector);
    }
    return result;
  }

  /**
   * Listed nodes that have no embedding, in input order
   */
  missing(nodes: Iterable<string>): string[] {
    const result: string[] = [];
    for (const node of nodes) {
      if (!this.vectors.has(node)) result.push(node);
    }
    return result;
  }

  /**
   * Drop every entry not in the given node set; returns the number removed
   */
  prune(nodes: Iterable<string>): number {
    const keep = new Set(nodes);
    let removed = 0;
    for (const node of [...this.vectors.keys()]) {
      if (!keep.has(node)) {
        this.remove(node);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Nodes most similar to a vector, descending, ties broken by node id
   */
  findSimilar(vector: readonly number[], topK: number = 5, threshold: number = 0): NodeSimilarity[] {
    const results: NodeSimilarity[] = [];

    for (const [node, candidate] of this.vectors) {
      const similarity = VectorUtils.cosineSimilarity(vector, candidate);
      if (similarity >= threshold) {
        results.push({ node, similarity });
      }
    }

    results.sort((a, b) => b.similarity - a.similarity || (a.node < b.node ? -1 : a.node > b.node ? 1 : 0));
    return results.slice(0, Math.max(0, topK));
  }

  /**
   * Nodes most similar to a stored node, excluding the node itself
   */
  findSimilarToNode(node: string, topK: number = 5, threshold: number = 0): NodeSimilarity[] {
    const vector = this.vectors.get(node);
    if (!vector) return [];

    return this.findSimilar(vector, topK + 1, threshold)
      .filter(result => result.node !== node)
      .slice(0, Math.max(0, topK));
  }

  clone(): NodeEmbeddings {
    return new NodeEmbeddings(this.vectors);
  }

  /**
   * Plain object form, keys in insertion order
   */
  toRecord(): Record<string, number[]> {
    const record: Record<string, number[]> = {};
    for (const [node, vector] of this.vectors) {
      record[node] = [...vector];
    }
    return record;
  }

  *entries(): IterableIterator<[string, readonly number[]]> {
    for (const [node, vector] of this.vectors) {
      yield [node, vector];
    }
  }
}
