/**
 * LLM-driven fact extraction into hypergraph fragments
 *
 * Documents are split into chunks, each chunk is (optionally distilled and)
 * sent to the LLM for `{"events": [...]}` facts, and the per-chunk fragments
 * are combined with a union. A chunk that keeps failing after retries is
 * recorded and skipped; the rest of the document still contributes.
 */

import { z } from 'zod';
import { Hypergraph } from '../core/hypergraph.js';
import type { EdgeMetadata, Fact } from '../core/types.js';
import type { LLMProvider } from '../llm/provider.js';
import { ErrorCategory, ErrorHandler, GenerationError, toError, type RetryOptions } from '../utils/error-handler.js';
import { buildHypergraph, filterVagueNodes, type BuildResult } from './hypergraph-builder.js';
import { DISTILLATION_PROMPT, EXTRACTION_PROMPT, distillationUserPrompt, extractionUserPrompt } from './prompts.js';
import { RecursiveTextSplitter, createChunk, type TextChunk } from './text-splitter.js';

const memberList = z.union([z.array(z.string()), z.string().transform(value => [value])]);

export const factsResponseSchema = z.object({
  events: z.array(
    z.object({
      source: memberList,
      relation: z.string(),
      target: memberList
    })
  )
});

export interface ExtractorConfig {
  /** Chat model override; the provider default when unset */
  model?: string;
  chunkSize: number;
  chunkOverlap: number;
  distillByDefault: boolean;
  /** Chunks extracted in parallel */
  concurrency: number;
  retry: RetryOptions;
}

export interface ChunkFailure {
  chunkId: string;
  error: Error;
}

export interface DocumentExtraction extends BuildResult {
  /** Chunks of the document by id */
  chunks: Map<string, TextChunk>;
  failures: ChunkFailure[];
}

export interface SourceDocument {
  id: string;
  text: string;
}

export class HypergraphExtractor {
  private llm: LLMProvider;
  private config: ExtractorConfig;
  private splitter: RecursiveTextSplitter;

  constructor(llm: LLMProvider, config: Partial<ExtractorConfig> = {}) {
    this.llm = llm;
    this.config = {
      model: config.model,
      chunkSize: config.chunkSize ?? 1000,
      chunkOverlap: config.chunkOverlap ?? 0,
      distillByDefault: config.distillByDefault ?? false,
      concurrency: Math.max(1, config.concurrency ?? 4),
      retry: {
        maxRetries: config.retry?.maxRetries ?? 2,
        baseDelayMs: config.retry?.baseDelayMs ?? 1000
      }
    };
    this.splitter = new RecursiveTextSplitter({
      chunkSize: this.config.chunkSize,
      chunkOverlap: this.config.chunkOverlap
    });
  }

  /**
   * Facts of one chunk as a hypergraph fragment with edge metadata
   */
  async extractFromChunk(chunk: TextChunk, distill?: boolean): Promise<BuildResult> {
    const text = (distill ?? this.config.distillByDefault) ? await this.distill(chunk.text) : chunk.text;
    const facts = await this.extractFacts(text);
    return buildHypergraph(facts, chunk.chunkId);
  }

  async extractFromText(text: string, distill?: boolean): Promise<BuildResult> {
    return this.extractFromChunk(createChunk(text), distill);
  }

  /**
   * Split a document and extract every chunk, `concurrency` at a time
   */
  async extractFromDocument(text: string, distill?: boolean): Promise<DocumentExtraction> {
    const chunkList = this.splitter.split(text);
    const chunks = new Map(chunkList.map(chunk => [chunk.chunkId, chunk] as const));

    const fragments: Hypergraph<string, string>[] = [];
    const metadata: EdgeMetadata[] = [];
    const failures: ChunkFailure[] = [];

    for (let start = 0; start < chunkList.length; start += this.config.concurrency) {
      const batch = chunkList.slice(start, start + this.config.concurrency);
      const results = await Promise.allSettled(batch.map(chunk => this.extractWithRetry(chunk, distill)));

      results.forEach((result, offset) => {
        if (result.status === 'fulfilled') {
          fragments.push(result.value.hypergraph);
          metadata.push(...result.value.metadata);
        } else {
          failures.push({ chunkId: batch[offset].chunkId, error: toError(result.reason) });
        }
      });
    }

    if (failures.length > 0) {
      console.warn(`⚠️ ${failures.length}/${chunkList.length} chunks failed extraction and were skipped`);
    }

    return { hypergraph: Hypergraph.unionAll(fragments), metadata, chunks, failures };
  }

  /**
   * Extract every document and combine the results
   */
  async processAndMergeDocuments(documents: SourceDocument[], distill?: boolean): Promise<DocumentExtraction> {
    const fragments: Hypergraph<string, string>[] = [];
    const metadata: EdgeMetadata[] = [];
    const chunks = new Map<string, TextChunk>();
    const failures: ChunkFailure[] = [];

    for (const document of documents) {
      const result = await this.extractFromDocument(document.text, distill);
      console.log(`📄 ${document.id}: ${result.hypergraph.edgeCount} edges from ${result.chunks.size} chunks`);

      fragments.push(result.hypergraph);
      metadata.push(...result.metadata);
      for (const [id, chunk] of result.chunks) chunks.set(id, chunk);
      failures.push(...result.failures);
    }

    return { hypergraph: Hypergraph.unionAll(fragments), metadata, chunks, failures };
  }

  private async extractWithRetry(chunk: TextChunk, distill?: boolean): Promise<BuildResult> {
    const result = await ErrorHandler.wrapOperationWithRetry(
      () => this.extractFromChunk(chunk, distill),
      ErrorCategory.EXTRACTION,
      'extract facts from chunk',
      { chunkId: chunk.chunkId },
      this.config.retry
    );
    return ErrorHandler.unwrap(result);
  }

  private async distill(text: string): Promise<string> {
    return this.llm.chat(DISTILLATION_PROMPT, distillationUserPrompt(text), { model: this.config.model });
  }

  private async extractFacts(text: string): Promise<Fact[]> {
    try {
      const response = await this.llm.generate(EXTRACTION_PROMPT, extractionUserPrompt(text), factsResponseSchema, {
        model: this.config.model
      });
      return filterVagueNodes(response.events);
    } catch (error) {
      if (error instanceof GenerationError) throw error;
      throw new GenerationError(`Fact extraction failed: ${toError(error).message}`, { cause: error });
    }
  }
}
