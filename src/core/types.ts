/**
 * Core type definitions for the hypergraph reasoning system
 *
 * This module defines the data structures shared by the hypergraph model,
 * the simplification engine and the GraphRAG retrieval pipeline.
 */

/**
 * Incidence map in its serializable form: edge id -> member node ids.
 * Accepted by the Hypergraph constructor alongside the Set-valued form.
 */
export type IncidenceRecord<N = string, E = string> = Map<E, Iterable<N>> | Iterable<readonly [E, Iterable<N>]>;

/**
 * A single extracted fact: one hyperedge connecting every source and target.
 * Produced by the LLM extraction step, consumed by the hypergraph builder.
 */
export interface Fact {
  /** Subjects of the relation (always a list, even for a single subject) */
  source: string[];
  /** Relation label, verbatim from extraction */
  relation: string;
  /** Objects of the relation */
  target: string[];
}

/**
 * Structured provenance for one hyperedge.
 *
 * Relation and chunk are carried as fields rather than parsed back out of
 * the edge id, which only keeps the `<relation>_chunk<id>_<index>` shape
 * for compatibility with existing graph files.
 */
export interface EdgeMetadata {
  /** Edge identifier in the hypergraph */
  edge: string;
  /** Member nodes (source ∪ target) at build time */
  nodes: string[];
  /** Ordered sources as extracted */
  source: string[];
  /** Ordered targets as extracted */
  target: string[];
  /** Normalized relation label (underscores replaced by spaces) */
  relation: string;
  /** Chunk the fact was extracted from; empty when built without a chunk */
  chunkId: string;
  /** Position of the fact within its chunk */
  index: number;
}

/**
 * Audit entry for one merge performed by the simplifier.
 * Informational only; nothing downstream consumes it except display/export.
 */
export interface MergeRecord {
  readonly keptNode: string;
  readonly removedNode: string;
  /** Cosine similarity between the two nodes */
  readonly similarity: number;
  /** Degree of the kept node before the merge */
  readonly keptNodeDegree: number;
  /** Degree of the removed node before the merge */
  readonly removedNodeDegree: number;
}

/**
 * How a keyword was mapped onto a node
 */
export type MatchType = 'exact' | 'substring' | 'embedding';

/**
 * A keyword -> node match produced by the node matcher for one retrieval call
 */
export interface NodeMatch {
  node: string;
  /** Keyword that produced this match */
  keyword: string;
  /** Score in [0, 1]; 1.0 for exact matches */
  similarity: number;
  matchType: MatchType;
}

/**
 * A keyword whose embedding could not be generated during matching
 */
export interface MatchFailure {
  keyword: string;
  error: Error;
}

/**
 * Context retrieved from the hypergraph for one query.
 * Carries every intermediate stage so callers can render a debug view.
 */
export interface RAGContext {
  query: string;
  keywords: string[];
  matchedNodes: NodeMatch[];
  /** Node sequences connecting matched nodes */
  paths: string[][];
  /** Deduplicated evidence sentences, lexicographically ordered */
  contextSentences: string[];
  /** Token-budgeted context text ready for prompt injection */
  formattedContext: string;
  /** True when no path was found and direct node edges were used instead */
  usedFallback: boolean;
}

/**
 * Answer generated for a question together with its retrieved context
 */
export interface RAGResponse {
  answer: string;
  context: RAGContext;
  /** Whether any evidence was available when generating the answer */
  hadContext: boolean;
}

/**
 * Options controlling one retrieval call
 */
export interface RetrievalOptions {
  /** Maximum embedding matches per keyword */
  topK: number;
  /** Maximum number of nodes in a connecting path */
  maxPathLength: number;
  /** Minimum similarity for embedding matches */
  similarityThreshold: number;
}

/**
 * Summary statistics of a hypergraph
 */
export interface HypergraphStatistics {
  nodeCount: number;
  edgeCount: number;
  componentCount: number;
  largestComponentSize: number;
  /** Edge size -> number of edges of that size, ascending by size */
  edgeSizeDistribution: Array<{ size: number; count: number }>;
  /** Highest-degree nodes, ties broken by name */
  topNodesByDegree: Array<{ node: string; degree: number }>;
}

/**
 * Build an empty context for a query that produced no keywords
 */
export function emptyContext(query: string): RAGContext {
  return {
    query,
    keywords: [],
    matchedNodes: [],
    paths: [],
    contextSentences: [],
    formattedContext: '',
    usedFallback: false
  };
}

/**
 * Whether any relevant evidence was retrieved
 */
export function hasContext(context: RAGContext): boolean {
  return context.contextSentences.length > 0;
}

/**
 * Number of distinct nodes matched for a context
 */
export function matchedNodeCount(context: RAGContext): number {
  return new Set(context.matchedNodes.map(match => match.node)).size;
}
