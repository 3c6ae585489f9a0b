/**
 * Ollama backend for chat and embeddings
 *
 * Talks to a local Ollama server over its REST API:
 * - POST /api/chat with `stream: false` (and `format: "json"` for structured output)
 * - POST /api/embed with a batch of inputs
 */

import { z } from 'zod';
import { EmbeddingError, GenerationError, toError } from '../utils/error-handler.js';
import { postJSON, type FetchLike } from './http.js';
import { decodeStructured } from './json.js';
import type { ChatOptions, EmbeddingProvider, LLMProvider } from './provider.js';

export interface OllamaConfig {
  baseUrl: string;
  chatModel: string;
  embeddingModel: string;
  temperature: number;
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
  fetchImpl?: FetchLike;
}

const chatResponseSchema = z.object({
  message: z.object({
    content: z.string()
  })
});

const embedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number()))
});

export class OllamaProvider implements LLMProvider, EmbeddingProvider {
  readonly name = 'ollama';
  private config: OllamaConfig;

  constructor(config: Partial<OllamaConfig> = {}) {
    this.config = {
      baseUrl: (config.baseUrl ?? 'http://localhost:11434').replace(/\/+$/, ''),
      chatModel: config.chatModel ?? 'gpt-oss:20b',
      embeddingModel: config.embeddingModel ?? 'nomic-embed-text:v1.5',
      temperature: config.temperature ?? 0.333,
      timeoutMs: config.timeoutMs ?? 300_000,
      maxRetries: config.maxRetries ?? 2,
      retryDelayMs: config.retryDelayMs ?? 250,
      fetchImpl: config.fetchImpl
    };
  }

  get defaultModel(): string {
    return this.config.chatModel;
  }

  get embeddingModel(): string {
    return this.config.embeddingModel;
  }

  async chat(systemPrompt: string, userPrompt: string, options: ChatOptions = {}): Promise<string> {
    return this.complete(systemPrompt, userPrompt, options, false);
  }

  async generate<T>(
    systemPrompt: string,
    userPrompt: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: ChatOptions = {}
  ): Promise<T> {
    const content = await this.complete(systemPrompt, userPrompt, options, true);
    return decodeStructured(content, schema);
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    let raw: unknown;
    try {
      raw = await postJSON(
        `${this.config.baseUrl}/api/embed`,
        { model: this.config.embeddingModel, input: texts },
        this.httpOptions()
      );
    } catch (error) {
      throw new EmbeddingError(`Ollama embedding request failed: ${toError(error).message}`, { cause: error });
    }

    const parsed = embedResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new EmbeddingError('Invalid embedding response from Ollama', { cause: parsed.error });
    }
    if (parsed.data.embeddings.length !== texts.length) {
      throw new EmbeddingError(
        `Ollama returned ${parsed.data.embeddings.length} embeddings for ${texts.length} inputs`
      );
    }
    return parsed.data.embeddings;
  }

  private async complete(
    systemPrompt: string,
    userPrompt: string,
    options: ChatOptions,
    json: boolean
  ): Promise<string> {
    const model = options.model ?? this.config.chatModel;
    const body = {
      model,
      messages: [
        { role: 'system', content: systemPrompt },
        { role: 'user', content: userPrompt }
      ],
      stream: false,
      options: { temperature: options.temperature ?? this.config.temperature },
      ...(json ? { format: 'json' } : {})
    };

    let raw: unknown;
    try {
      raw = await postJSON(`${this.config.baseUrl}/api/chat`, body, this.httpOptions());
    } catch (error) {
      throw new GenerationError(`Ollama chat request failed for model '${model}': ${toError(error).message}`, {
        cause: error
      });
    }

    const parsed = chatResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new GenerationError(`Invalid chat response from Ollama model '${model}'`, { cause: parsed.error });
    }
    return parsed.data.message.content;
  }

  private httpOptions() {
    return {
      fetchImpl: this.config.fetchImpl,
      maxRetries: this.config.maxRetries,
      retryDelayMs: this.config.retryDelayMs,
      timeoutMs: this.config.timeoutMs
    };
  }
}
