/**
 * Hypergraph simplification by merging near-duplicate nodes
 *
 * Nodes whose embeddings are more similar than a threshold are collapsed
 * into one. Pairs are processed greedily from most to least similar; the
 * endpoint with the higher degree survives. Merges are single-level: a node
 * that was merged away is never merged again, and a node that has absorbed
 * another is never merged away, so no chains form within one pass.
 *
 * Steps:
 * 1. Select eligible nodes (present, embedded, not excluded by suffix)
 * 2. Find pairs above the threshold via the similarity matrix
 * 3. Plan merges greedily, recording a MergeRecord for each
 * 4. Rewrite edges through the merge map and drop edges under two members
 * 5. Remove embeddings of merged-away nodes and prune to the new graph
 */

import { Hypergraph, compareIds } from '../core/hypergraph.js';
import type { NodeEmbeddings } from '../core/embeddings.js';
import type { EdgeMetadata, MergeRecord } from '../core/types.js';
import { VectorUtils } from '../utils/vector-utils.js';
import type { EmbeddingService } from '../llm/embedding-service.js';

/**
 * Configuration for a simplification pass
 */
export interface SimplifierConfig {
  /** Minimum cosine similarity (exclusive) for two nodes to merge */
  similarityThreshold: number;
  /** Nodes ending with any of these suffixes never take part in merging */
  excludeSuffixes: string[];
}

export interface SimplificationResult {
  hypergraph: Hypergraph<string, string>;
  embeddings: NodeEmbeddings;
  mergeCount: number;
  nodesRemoved: number;
  /** Edges dropped because merging left them with fewer than two members */
  edgesRemoved: number;
  embeddingsRecomputed: number;
  mergeHistory: MergeRecord[];
}

/**
 * A pair of nodes that would merge at the given threshold
 */
export interface MergeCandidate {
  nodeA: string;
  nodeB: string;
  similarity: number;
}

export const DEFAULT_SIMILARITY_THRESHOLD = 0.9;
export const MINIMUM_EDGE_SIZE = 2;

export class HypergraphSimplifier {
  private config: SimplifierConfig;

  constructor(config: Partial<SimplifierConfig> = {}) {
    this.config = {
      similarityThreshold: config.similarityThreshold ?? DEFAULT_SIMILARITY_THRESHOLD,
      excludeSuffixes: config.excludeSuffixes ?? []
    };
  }

  /**
   * Merge similar nodes and return the rewritten graph and embeddings
   *
   * Inputs are never mutated.
   */
  simplify(
    graph: Hypergraph<string, string>,
    embeddings: NodeEmbeddings,
    options: Partial<SimplifierConfig> = {}
  ): SimplificationResult {
    const threshold = options.similarityThreshold ?? this.config.similarityThreshold;
    const excludeSuffixes = options.excludeSuffixes ?? this.config.excludeSuffixes;

    const eligible = this.eligibleNodes(graph, embeddings, excludeSuffixes);
    if (eligible.nodes.length < 2) {
      return this.unchanged(graph, embeddings);
    }

    const pairs = VectorUtils.findSimilarPairs(eligible.vectors, threshold);
    if (pairs.length === 0) {
      return this.unchanged(graph, embeddings);
    }

    // removed -> kept
    const mapping = new Map<string, string>();
    const keepers = new Set<string>();
    const mergeHistory: MergeRecord[] = [];

    for (const pair of pairs) {
      const nodeI = eligible.nodes[pair.i];
      const nodeJ = eligible.nodes[pair.j];

      if (mapping.has(nodeI) || mapping.has(nodeJ)) {
        continue;
      }

      const degreeI = graph.degree(nodeI);
      const degreeJ = graph.degree(nodeJ);
      const keepI = degreeI >= degreeJ;
      const keptNode = keepI ? nodeI : nodeJ;
      const removedNode = keepI ? nodeJ : nodeI;

      if (keepers.has(removedNode)) {
        continue;
      }

      mapping.set(removedNode, keptNode);
      keepers.add(keptNode);
      mergeHistory.push({
        keptNode,
        removedNode,
        similarity: pair.similarity,
        keptNodeDegree: keepI ? degreeI : degreeJ,
        removedNodeDegree: keepI ? degreeJ : degreeI
      });
    }

    const rewritten = new Hypergraph<string, string>();
    let edgesRemoved = 0;

    for (const [edgeId, members] of graph.entries()) {
      const newMembers = new Set<string>();
      for (const member of members) {
        newMembers.add(mapping.get(member) ?? member);
      }

      if (newMembers.size >= MINIMUM_EDGE_SIZE) {
        rewritten.addEdge(edgeId, newMembers);
      } else {
        edgesRemoved++;
      }
    }

    const newEmbeddings = embeddings.clone();
    for (const removedNode of mapping.keys()) {
      newEmbeddings.remove(removedNode);
    }
    newEmbeddings.prune(rewritten.nodes);

    if (mergeHistory.length > 0) {
      console.log(`🔗 Merged ${mergeHistory.length} node pairs, dropped ${edgesRemoved} edges`);
    }

    return {
      hypergraph: rewritten,
      embeddings: newEmbeddings,
      mergeCount: mergeHistory.length,
      nodesRemoved: mapping.size,
      edgesRemoved,
      embeddingsRecomputed: 0,
      mergeHistory
    };
  }

  /**
   * Simplify, then regenerate embeddings for kept nodes that absorbed a merge
   *
   * Embedding failures propagate to the caller.
   */
  async simplifyWithRecompute(
    graph: Hypergraph<string, string>,
    embeddings: NodeEmbeddings,
    options: Partial<SimplifierConfig>,
    embeddingService: Pick<EmbeddingService, 'generateEmbeddings'>
  ): Promise<SimplificationResult> {
    const result = this.simplify(graph, embeddings, options);
    if (result.mergeHistory.length === 0) {
      return result;
    }

    const keepers = new Set(result.mergeHistory.map(record => record.keptNode));
    const toRecompute = [...keepers].filter(node => result.hypergraph.hasNode(node)).sort(compareIds);
    if (toRecompute.length === 0) {
      return result;
    }

    const recomputed = await embeddingService.generateEmbeddings(toRecompute);
    const updated = result.embeddings.clone();
    updated.merge(recomputed);

    console.log(`🔄 Recomputed ${recomputed.size} keeper embeddings`);

    return {
      ...result,
      embeddings: updated,
      embeddingsRecomputed: recomputed.size
    };
  }

  /**
   * Pairs that would be considered for merging, without merging anything
   */
  findMergeCandidates(
    graph: Hypergraph<string, string>,
    embeddings: NodeEmbeddings,
    threshold: number = this.config.similarityThreshold
  ): MergeCandidate[] {
    const eligible = this.eligibleNodes(graph, embeddings, this.config.excludeSuffixes);
    if (eligible.nodes.length < 2) return [];

    return VectorUtils.findSimilarPairs(eligible.vectors, threshold).map(pair => ({
      nodeA: eligible.nodes[pair.i],
      nodeB: eligible.nodes[pair.j],
      similarity: pair.similarity
    }));
  }

  /**
   * Embedded, non-excluded graph nodes in lexicographic order with their vectors
   */
  private eligibleNodes(
    graph: Hypergraph<string, string>,
    embeddings: NodeEmbeddings,
    excludeSuffixes: string[]
  ): { nodes: string[]; vectors: number[][] } {
    const nodes: string[] = [];
    const vectors: number[][] = [];

    for (const node of [...graph.nodes].sort(compareIds)) {
      if (excludeSuffixes.some(suffix => node.endsWith(suffix))) continue;
      const vector = embeddings.get(node);
      if (!vector) continue;
      nodes.push(node);
      vectors.push(vector);
    }

    return { nodes, vectors };
  }

  private unchanged(graph: Hypergraph<string, string>, embeddings: NodeEmbeddings): SimplificationResult {
    return {
      hypergraph: graph.clone(),
      embeddings: embeddings.clone(),
      mergeCount: 0,
      nodesRemoved: 0,
      edgesRemoved: 0,
      embeddingsRecomputed: 0,
      mergeHistory: []
    };
  }
}

function renameMembers(members: string[], mapping: ReadonlyMap<string, string>): string[] {
  return [...new Set(members.map(member => mapping.get(member) ?? member))];
}

/**
 * Carry merges over to edge metadata: merged-away names in `source`,
 * `target` and `nodes` become their kept node. When `graph` is given,
 * entries for edges it no longer contains are dropped.
 */
export function applyMergesToMetadata(
  metadata: readonly EdgeMetadata[],
  mergeHistory: readonly MergeRecord[],
  graph?: Hypergraph<string, string>
): EdgeMetadata[] {
  const mapping = new Map(mergeHistory.map(record => [record.removedNode, record.keptNode] as const));

  return metadata
    .filter(entry => !graph || graph.hasEdge(entry.edge))
    .map(entry =>
      mapping.size === 0
        ? { ...entry }
        : {
            ...entry,
            nodes: renameMembers(entry.nodes, mapping),
            source: renameMembers(entry.source, mapping),
            target: renameMembers(entry.target, mapping)
          }
    );
}
