/**
 * Environment configuration
 *
 * Variables:
 * - PORT, HOST: HTTP listener (3000, 127.0.0.1)
 * - LLM_PROVIDER: "ollama" (default) or "openrouter"
 * - OLLAMA_URL: Ollama base URL
 * - CHAT_MODEL, EMBEDDING_MODEL: model overrides for either provider
 * - OPENROUTER_API_KEY: required when LLM_PROVIDER is "openrouter"
 * - GRAPH_PATH, EMBEDDINGS_PATH, METADATA_PATH, CHUNKS_PATH: data files
 */

import { z } from 'zod';
import type { EmbeddingProvider, LLMProvider } from './llm/provider.js';
import { OllamaProvider } from './llm/ollama-provider.js';
import { OpenRouterProvider } from './llm/openrouter-provider.js';
import type { FetchLike } from './llm/http.js';
import { ValidationError } from './utils/error-handler.js';

const optionalString = z
  .string()
  .optional()
  .transform(value => {
    const trimmed = value?.trim();
    return trimmed && trimmed.length > 0 ? trimmed : undefined;
  });

export const envSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    HOST: z.string().default('127.0.0.1'),
    LLM_PROVIDER: z.enum(['ollama', 'openrouter']).default('ollama'),
    OLLAMA_URL: z.string().url().default('http://localhost:11434'),
    CHAT_MODEL: optionalString,
    EMBEDDING_MODEL: optionalString,
    OPENROUTER_API_KEY: optionalString,
    GRAPH_PATH: z.string().default('data/hypergraph.json'),
    EMBEDDINGS_PATH: z.string().default('data/embeddings.json'),
    METADATA_PATH: z.string().default('data/metadata.json'),
    CHUNKS_PATH: z.string().default('data/chunks.json')
  })
  .superRefine((env, ctx) => {
    if (env.LLM_PROVIDER === 'openrouter' && !env.OPENROUTER_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['OPENROUTER_API_KEY'],
        message: 'OPENROUTER_API_KEY is required when LLM_PROVIDER is openrouter'
      });
    }
  });

export type LLMProviderName = 'ollama' | 'openrouter';

export interface AppConfig {
  port: number;
  host: string;
  llm: {
    provider: LLMProviderName;
    ollamaUrl: string;
    chatModel?: string;
    embeddingModel?: string;
    openRouterApiKey?: string;
  };
  paths: {
    graph: string;
    embeddings: string;
    metadata: string;
    /** Chunk id -> source text */
    chunks: string;
  };
}

/**
 * Read configuration from the environment; throws ValidationError listing
 * every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ValidationError(`Invalid configuration: ${problems.join('; ')}`);
  }

  const values = parsed.data;
  return {
    port: values.PORT,
    host: values.HOST,
    llm: {
      provider: values.LLM_PROVIDER,
      ollamaUrl: values.OLLAMA_URL,
      chatModel: values.CHAT_MODEL,
      embeddingModel: values.EMBEDDING_MODEL,
      openRouterApiKey: values.OPENROUTER_API_KEY
    },
    paths: {
      graph: values.GRAPH_PATH,
      embeddings: values.EMBEDDINGS_PATH,
      metadata: values.METADATA_PATH,
      chunks: values.CHUNKS_PATH
    }
  };
}

export interface Providers {
  llm: LLMProvider;
  embeddings: EmbeddingProvider;
}

/**
 * Backend for the configured provider; one instance serves both capabilities
 */
export function createProviders(config: AppConfig['llm'], fetchImpl?: FetchLike): Providers {
  if (config.provider === 'openrouter') {
    if (!config.openRouterApiKey) {
      throw new ValidationError('OPENROUTER_API_KEY is required when LLM_PROVIDER is openrouter');
    }
    const provider = new OpenRouterProvider({
      apiKey: config.openRouterApiKey,
      model: config.chatModel,
      embeddingModel: config.embeddingModel,
      fetchImpl
    });
    return { llm: provider, embeddings: provider };
  }

  const provider = new OllamaProvider({
    baseUrl: config.ollamaUrl,
    chatModel: config.chatModel,
    embeddingModel: config.embeddingModel,
    fetchImpl
  });
  return { llm: provider, embeddings: provider };
}
