/**
 * Public exports for the hypergraph RAG library
 */

// Core model
export { Hypergraph, compareIds } from './core/hypergraph.js';
export { NodeEmbeddings, type NodeSimilarity } from './core/embeddings.js';
export { PathFinder, type HypergraphPath } from './core/path-finder.js';
export { computeStatistics, formatStatistics } from './core/statistics.js';
export { emptyContext, hasContext, matchedNodeCount } from './core/types.js';

// Simplification
export {
  HypergraphSimplifier,
  DEFAULT_SIMILARITY_THRESHOLD,
  applyMergesToMetadata,
  type SimplifierConfig,
  type SimplificationResult,
  type MergeCandidate
} from './simplification/simplifier.js';

// Retrieval
export { GraphRAGService, DEFAULT_RETRIEVAL_OPTIONS, type GraphRAGServiceOptions } from './rag/graph-rag-service.js';
export { NodeMatcher, type MatchOptions, type MatchResult } from './rag/node-matcher.js';
export { ContextAssembler, DEFAULT_CONTEXT_HEADER, type ContextAssemblerConfig } from './rag/context-assembler.js';
export { KeywordExtractor, cleanKeywords, type KeywordExtractorConfig } from './rag/keyword-extractor.js';

// Extraction
export {
  buildHypergraph,
  filterVagueNodes,
  isVagueNode,
  chunkIdFor,
  formatEdgeId,
  parseEdgeId,
  indexMetadata,
  type BuildResult
} from './extraction/hypergraph-builder.js';
export {
  RecursiveTextSplitter,
  createChunk,
  previewChunk,
  type TextChunk,
  type TextSplitterConfig
} from './extraction/text-splitter.js';
export {
  HypergraphExtractor,
  type ExtractorConfig,
  type DocumentExtraction,
  type ChunkFailure,
  type SourceDocument
} from './extraction/hypergraph-extractor.js';

// LLM backends
export type { LLMProvider, EmbeddingProvider, ChatOptions } from './llm/provider.js';
export { OllamaProvider, type OllamaConfig } from './llm/ollama-provider.js';
export { OpenRouterProvider, type OpenRouterConfig } from './llm/openrouter-provider.js';
export { EmbeddingService, type EmbeddingServiceConfig, type EmbeddingServiceOptions } from './llm/embedding-service.js';
export { HttpRequestError, type FetchLike } from './llm/http.js';

// Persistence
export {
  serializeHypergraph,
  deserializeHypergraph,
  serializeEmbeddings,
  deserializeEmbeddings,
  serializeMetadata,
  deserializeMetadata,
  serializeChunks,
  deserializeChunks,
  saveHypergraph,
  loadHypergraph,
  saveEmbeddings,
  loadEmbeddings,
  saveMetadata,
  loadMetadata,
  saveChunks,
  loadChunks
} from './storage/serialization.js';

// Configuration and HTTP
export { loadConfig, createProviders, type AppConfig, type Providers } from './config.js';
export { createApp, type ApiDependencies, type GraphState } from './server/api.js';

// Type definitions
export type {
  Fact,
  EdgeMetadata,
  MergeRecord,
  MatchType,
  NodeMatch,
  MatchFailure,
  RAGContext,
  RAGResponse,
  RetrievalOptions,
  HypergraphStatistics,
  IncidenceRecord
} from './core/types.js';

export * from './utils/index.js';
