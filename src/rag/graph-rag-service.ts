/**
 * GraphRAG retrieval and question answering over a hypergraph
 *
 * Pipeline: keywords -> matched nodes -> connecting paths -> evidence
 * sentences -> token-budgeted context -> answer.
 */

import type { NodeEmbeddings } from '../core/embeddings.js';
import type { Hypergraph } from '../core/hypergraph.js';
import { PathFinder } from '../core/path-finder.js';
import { emptyContext, hasContext, type EdgeMetadata, type RAGContext, type RAGResponse, type RetrievalOptions } from '../core/types.js';
import type { EmbeddingService } from '../llm/embedding-service.js';
import type { LLMProvider } from '../llm/provider.js';
import { ErrorCategory, ErrorHandler, ErrorSeverity } from '../utils/error-handler.js';
import { ContextAssembler } from './context-assembler.js';
import { KeywordExtractor } from './keyword-extractor.js';
import { NodeMatcher } from './node-matcher.js';
import { QUESTION_ANSWERING_PROMPT, contextTemplate } from './prompts.js';

export interface GraphRAGServiceOptions {
  graph: Hypergraph<string, string>;
  embeddings: NodeEmbeddings;
  llm: LLMProvider;
  embeddingService: Pick<EmbeddingService, 'embedText'>;
  metadata?: Iterable<EdgeMetadata>;
  /** Model for keyword extraction and answers; provider default when unset */
  chatModel?: string;
  /** Token budget of the formatted context */
  maxContextTokens?: number;
  /** Sampling temperature for answers */
  answerTemperature?: number;
}

export const DEFAULT_RETRIEVAL_OPTIONS: RetrievalOptions = {
  topK: 5,
  maxPathLength: 4,
  similarityThreshold: 0.5
};

function resolveOptions(options: Partial<RetrievalOptions>): RetrievalOptions {
  return {
    topK: options.topK ?? DEFAULT_RETRIEVAL_OPTIONS.topK,
    maxPathLength: options.maxPathLength ?? DEFAULT_RETRIEVAL_OPTIONS.maxPathLength,
    similarityThreshold: options.similarityThreshold ?? DEFAULT_RETRIEVAL_OPTIONS.similarityThreshold
  };
}

export class GraphRAGService {
  private graph: Hypergraph<string, string>;
  private llm: LLMProvider;
  private chatModel?: string;
  private maxContextTokens: number;
  private answerTemperature: number;
  private keywordExtractor: KeywordExtractor;
  private nodeMatcher: NodeMatcher;
  private pathFinder: PathFinder;
  private assembler: ContextAssembler;

  constructor(options: GraphRAGServiceOptions) {
    this.graph = options.graph;
    this.llm = options.llm;
    this.chatModel = options.chatModel;
    this.maxContextTokens = options.maxContextTokens ?? 2000;
    this.answerTemperature = options.answerTemperature ?? 0.7;

    this.keywordExtractor = new KeywordExtractor(options.llm, { model: options.chatModel });
    this.nodeMatcher = new NodeMatcher(options.graph, options.embeddings, options.embeddingService);
    this.pathFinder = new PathFinder(options.graph);
    this.assembler = new ContextAssembler(options.graph, options.metadata ?? []);
  }

  get hypergraph(): Hypergraph<string, string> {
    return this.graph;
  }

  /**
   * Retrieve evidence for a query using LLM keyword extraction
   *
   * Keyword failures reject with GenerationError and embedding failures with
   * EmbeddingError. A query with no keywords or no matches resolves to a
   * context without sentences.
   */
  async retrieveContext(query: string, options: Partial<RetrievalOptions> = {}): Promise<RAGContext> {
    const keywords = await this.keywordExtractor.extract(query);
    return this.retrieveForKeywords(query, keywords, resolveOptions(options));
  }

  /**
   * Retrieve evidence using local keyword extraction only
   */
  async retrieveContextSimple(query: string, topK: number = 5): Promise<RAGContext> {
    const keywords = this.keywordExtractor.simpleExtract(query);
    return this.retrieveForKeywords(query, keywords, resolveOptions({ topK }));
  }

  /**
   * Retrieve evidence and answer the question with it
   */
  async query(question: string, options: Partial<RetrievalOptions> = {}): Promise<RAGResponse> {
    const context = await this.retrieveContext(question, options);

    const answer = await this.llm.chat(QUESTION_ANSWERING_PROMPT, contextTemplate(context.formattedContext, question), {
      model: this.chatModel,
      temperature: this.answerTemperature
    });

    return { answer, context, hadContext: hasContext(context) };
  }

  private async retrieveForKeywords(query: string, keywords: string[], options: RetrievalOptions): Promise<RAGContext> {
    if (keywords.length === 0) {
      return emptyContext(query);
    }

    const { matches, failures } = await this.nodeMatcher.findMatchingNodes(keywords, {
      topK: options.topK,
      threshold: options.similarityThreshold
    });

    for (const failure of failures) {
      ErrorHandler.handle(ErrorCategory.EMBEDDING, ErrorSeverity.LOW, 'Keyword could not be embedded', failure.error, {
        keyword: failure.keyword
      });
    }

    if (matches.length === 0) {
      return { ...emptyContext(query), keywords };
    }

    const nodes = NodeMatcher.uniqueNodes(matches);
    const paths = this.pathFinder.findShortestPaths(nodes, options.maxPathLength);

    const usedFallback = paths.length === 0;
    const contextSentences = usedFallback
      ? this.assembler.collectDirectNodeContext(nodes)
      : this.assembler.collectSentences(paths);

    return {
      query,
      keywords,
      matchedNodes: matches,
      paths,
      contextSentences,
      formattedContext: this.assembler.formatContext(contextSentences, this.maxContextTokens),
      usedFallback
    };
  }
}
