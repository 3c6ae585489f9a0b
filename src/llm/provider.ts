/**
 * Capability interfaces for text generation and embedding
 *
 * Retrieval, extraction and simplification are written against these
 * interfaces only, so any backend (or an in-process stub) can be plugged in.
 */

import type { z } from 'zod';

export interface ChatOptions {
  /** Overrides the provider's default model */
  model?: string;
  /** Overrides the provider's default temperature */
  temperature?: number;
}

/**
 * Text generation backend
 */
export interface LLMProvider {
  readonly name: string;
  readonly defaultModel: string;

  /**
   * Free-text completion
   */
  chat(systemPrompt: string, userPrompt: string, options?: ChatOptions): Promise<string>;

  /**
   * Completion decoded into a value validated by the schema.
   * Undecodable or mismatching output rejects with a GenerationError.
   */
  generate<T>(
    systemPrompt: string,
    userPrompt: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options?: ChatOptions
  ): Promise<T>;
}

/**
 * Embedding backend. Output order matches input order.
 * Failures reject with an EmbeddingError.
 */
export interface EmbeddingProvider {
  readonly embeddingModel: string;
  embed(texts: string[]): Promise<number[][]>;
}
