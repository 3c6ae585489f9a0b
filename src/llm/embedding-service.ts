/**
 * Embedding Service for hypergraph nodes
 *
 * Wraps an EmbeddingProvider with batching and a bounded text -> vector
 * cache, and keeps a NodeEmbeddings store in step with a hypergraph as
 * nodes are added or removed.
 */

import { NodeEmbeddings, type NodeSimilarity } from '../core/embeddings.js';
import type { Hypergraph } from '../core/hypergraph.js';
import { EmbeddingError, toError } from '../utils/error-handler.js';
import { VectorUtils, type EmbeddingCache } from '../utils/vector-utils.js';
import type { EmbeddingProvider } from './provider.js';

export interface EmbeddingServiceConfig {
  /** Texts sent to the provider per request */
  batchSize: number;
  cache: {
    enabled: boolean;
    maxSize: number;
  };
}

/**
 * Constructor options; every field, including those of `cache`, is optional
 */
export interface EmbeddingServiceOptions {
  batchSize?: number;
  cache?: Partial<EmbeddingServiceConfig['cache']>;
}

export class EmbeddingService {
  private provider: EmbeddingProvider;
  private config: EmbeddingServiceConfig;
  private cache: EmbeddingCache;

  constructor(provider: EmbeddingProvider, config: EmbeddingServiceOptions = {}) {
    this.provider = provider;
    this.config = {
      batchSize: Math.max(1, config.batchSize ?? 100),
      cache: {
        enabled: config.cache?.enabled ?? true,
        maxSize: config.cache?.maxSize ?? 10000
      }
    };

    this.cache = VectorUtils.createEmbeddingCache(this.config.cache.maxSize);
  }

  get model(): string {
    return this.provider.embeddingModel;
  }

  /**
   * Embed a single text
   */
  async embedText(text: string): Promise<number[]> {
    const [embedding] = await this.embedTexts([text]);
    return embedding;
  }

  /**
   * Embed texts in order, serving repeats from the cache
   */
  async embedTexts(texts: string[]): Promise<number[][]> {
    const results = new Map<string, number[]>();
    const pending: string[] = [];

    for (const text of new Set(texts)) {
      const cached = this.config.cache.enabled ? this.cache.get(text) : undefined;
      if (cached) {
        results.set(text, cached);
      } else {
        pending.push(text);
      }
    }

    for (let start = 0; start < pending.length; start += this.config.batchSize) {
      const batch = pending.slice(start, start + this.config.batchSize);
      let vectors: number[][];
      try {
        vectors = await this.provider.embed(batch);
      } catch (error) {
        if (error instanceof EmbeddingError) throw error;
        throw new EmbeddingError(`Embedding request failed: ${toError(error).message}`, { cause: error });
      }

      if (vectors.length !== batch.length) {
        throw new EmbeddingError(`Embedding provider returned ${vectors.length} vectors for ${batch.length} texts`);
      }

      batch.forEach((text, i) => {
        results.set(text, vectors[i]);
        if (this.config.cache.enabled) {
          this.cache.set(text, vectors[i]);
        }
      });
    }

    return texts.map(text => {
      const vector = results.get(text);
      if (!vector) {
        throw new EmbeddingError(`No embedding produced for "${text}"`);
      }
      return vector;
    });
  }

  /**
   * Embed node names into a new store
   */
  async generateEmbeddings(nodes: string[]): Promise<NodeEmbeddings> {
    const result = new NodeEmbeddings();
    if (nodes.length === 0) return result;

    const vectors = await this.embedTexts(nodes);
    nodes.forEach((node, i) => result.set(node, vectors[i]));
    return result;
  }

  /**
   * Embed every node of a hypergraph
   */
  async embedGraph(graph: Hypergraph<string, string>): Promise<NodeEmbeddings> {
    return this.generateEmbeddings([...graph.nodes].sort());
  }

  /**
   * Embed nodes the store is missing; optionally drop entries for nodes
   * no longer in the graph. The existing store is not mutated.
   */
  async updateEmbeddings(
    existing: NodeEmbeddings,
    graph: Hypergraph<string, string>,
    pruneOrphans: boolean = true
  ): Promise<NodeEmbeddings> {
    const graphNodes = [...graph.nodes].sort();
    const updated = existing.clone();

    const missing = updated.missing(graphNodes);
    if (missing.length > 0) {
      console.log(`🧮 Embedding ${missing.length} new nodes`);
      updated.merge(await this.generateEmbeddings(missing));
    }

    if (pruneOrphans) {
      const pruned = updated.prune(graphNodes);
      if (pruned > 0) {
        console.log(`🧹 Pruned ${pruned} orphaned embeddings`);
      }
    }

    return updated;
  }

  /**
   * Guarantee an embedding for each listed node
   */
  async ensureEmbeddings(existing: NodeEmbeddings, nodes: Iterable<string>): Promise<NodeEmbeddings> {
    const missing = existing.missing(new Set(nodes));
    if (missing.length === 0) return existing;

    const updated = existing.clone();
    updated.merge(await this.generateEmbeddings(missing));
    return updated;
  }

  /**
   * Nodes whose embeddings are closest to a free-text query
   */
  async findSimilarNodes(
    query: string,
    embeddings: NodeEmbeddings,
    topK: number = 10,
    threshold: number = 0
  ): Promise<NodeSimilarity[]> {
    const vector = await this.embedText(query);
    return embeddings.findSimilar(vector, topK, threshold);
  }

  clearCache(): void {
    this.cache.clear();
  }

  getCacheSize(): number {
    return this.cache.size();
  }
}
