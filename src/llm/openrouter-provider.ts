/**
 * OpenRouter backend for chat and embeddings
 *
 * Uses the OpenAI-compatible endpoints under https://openrouter.ai/api/v1.
 * Structured output is requested through the system prompt and recovered
 * from the reply with extractJSON, since models often wrap JSON in prose
 * or markdown fences.
 */

import { z } from 'zod';
import { EmbeddingError, GenerationError, ValidationError, toError } from '../utils/error-handler.js';
import { HttpRequestError, postJSON, type FetchLike } from './http.js';
import { decodeStructured } from './json.js';
import type { ChatOptions, EmbeddingProvider, LLMProvider } from './provider.js';

export interface OpenRouterConfig {
  apiKey: string;
  baseUrl: string;
  model: string;
  embeddingModel: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
  fetchImpl?: FetchLike;
}

export const DEFAULT_OPENROUTER_MODEL = 'meta-llama/llama-4-maverick';

const JSON_INSTRUCTION = 'IMPORTANT: You must respond with valid JSON only. No additional text or explanation.';

const completionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable()
        })
      })
    )
    .min(1)
});

const embeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number().int().nonnegative()
    })
  )
});

export class OpenRouterProvider implements LLMProvider, EmbeddingProvider {
  readonly name = 'openrouter';
  private config: OpenRouterConfig;

  constructor(config: Partial<OpenRouterConfig> & { apiKey: string }) {
    if (config.apiKey.trim().length === 0) {
      throw new ValidationError('OpenRouter requires an API key');
    }

    this.config = {
      apiKey: config.apiKey,
      baseUrl: (config.baseUrl ?? 'https://openrouter.ai/api/v1').replace(/\/+$/, ''),
      model: config.model ?? DEFAULT_OPENROUTER_MODEL,
      embeddingModel: config.embeddingModel ?? 'openai/text-embedding-3-small',
      temperature: config.temperature ?? 0.333,
      maxTokens: config.maxTokens ?? 8192,
      timeoutMs: config.timeoutMs ?? 300_000,
      maxRetries: config.maxRetries ?? 2,
      retryDelayMs: config.retryDelayMs ?? 250,
      fetchImpl: config.fetchImpl
    };
  }

  get defaultModel(): string {
    return this.config.model;
  }

  get embeddingModel(): string {
    return this.config.embeddingModel;
  }

  async chat(systemPrompt: string, userPrompt: string, options: ChatOptions = {}): Promise<string> {
    return this.complete(systemPrompt, userPrompt, options);
  }

  async generate<T>(
    systemPrompt: string,
    userPrompt: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: ChatOptions = {}
  ): Promise<T> {
    const content = await this.complete(`${systemPrompt}\n\n${JSON_INSTRUCTION}`, userPrompt, options);
    return decodeStructured(content, schema);
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    let raw: unknown;
    try {
      raw = await postJSON(
        `${this.config.baseUrl}/embeddings`,
        { model: this.config.embeddingModel, input: texts },
        this.httpOptions()
      );
    } catch (error) {
      throw new EmbeddingError(`OpenRouter embedding request failed: ${toError(error).message}`, { cause: error });
    }

    const parsed = embeddingResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new EmbeddingError('Invalid embedding response from OpenRouter', { cause: parsed.error });
    }
    if (parsed.data.data.length !== texts.length) {
      throw new EmbeddingError(`OpenRouter returned ${parsed.data.data.length} embeddings for ${texts.length} inputs`);
    }

    return [...parsed.data.data].sort((a, b) => a.index - b.index).map(item => item.embedding);
  }

  private async complete(systemPrompt: string, userPrompt: string, options: ChatOptions): Promise<string> {
    const model = options.model ?? this.config.model;

    let raw: unknown;
    try {
      raw = await postJSON(
        `${this.config.baseUrl}/chat/completions`,
        {
          model,
          messages: [
            { role: 'system', content: systemPrompt },
            { role: 'user', content: userPrompt }
          ],
          temperature: options.temperature ?? this.config.temperature,
          max_tokens: this.config.maxTokens
        },
        this.httpOptions()
      );
    } catch (error) {
      throw new GenerationError(this.describeFailure(error, model), { cause: error });
    }

    const parsed = completionResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new GenerationError(`Invalid completion response from model '${model}'`, { cause: parsed.error });
    }

    const content = parsed.data.choices[0].message.content ?? '';
    if (content.trim().length === 0) {
      throw new GenerationError(`Empty response from model '${model}'`);
    }
    return content;
  }

  private describeFailure(error: unknown, model: string): string {
    if (error instanceof HttpRequestError) {
      if (error.status === 401) return 'OpenRouter rejected the API key';
      if (error.status === 403 || error.status === 404) {
        return `Model '${model}' is not available to this account: ${error.message}`;
      }
      if (error.status === 429) return 'OpenRouter rate limit exceeded';
    }
    return `OpenRouter request failed: ${toError(error).message}`;
  }

  private httpOptions() {
    return {
      fetchImpl: this.config.fetchImpl,
      headers: { Authorization: `Bearer ${this.config.apiKey}` },
      maxRetries: this.config.maxRetries,
      retryDelayMs: this.config.retryDelayMs,
      timeoutMs: this.config.timeoutMs
    };
  }
}
