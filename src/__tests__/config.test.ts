/**
 * Unit tests for environment configuration and provider selection
 */

import { createProviders, loadConfig } from '../config.js';
import { OllamaProvider } from '../llm/ollama-provider.js';
import { OpenRouterProvider } from '../llm/openrouter-provider.js';
import { ValidationError } from '../utils/error-handler.js';
import { TestHelpers } from './helpers.js';

describe('loadConfig', () => {
  test('should apply defaults to an empty environment', () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      host: '127.0.0.1',
      llm: {
        provider: 'ollama',
        ollamaUrl: 'http://localhost:11434'
      },
      paths: {
        graph: 'data/hypergraph.json',
        embeddings: 'data/embeddings.json',
        metadata: 'data/metadata.json',
        chunks: 'data/chunks.json'
      }
    });
  });

  test('should read overrides and ignore blank model names', () => {
    const config = loadConfig({
      PORT: '8080',
      LLM_PROVIDER: 'openrouter',
      OPENROUTER_API_KEY: ' test-secret ',
      CHAT_MODEL: '  ',
      EMBEDDING_MODEL: 'custom-embed',
      GRAPH_PATH: '/srv/graph.json',
      CHUNKS_PATH: '/srv/chunks.json'
    });

    expect(config.port).toBe(8080);
    expect(config.llm).toEqual({
      provider: 'openrouter',
      ollamaUrl: 'http://localhost:11434',
      chatModel: undefined,
      embeddingModel: 'custom-embed',
      openRouterApiKey: 'test-secret'
    });
    expect(config.paths.graph).toBe('/srv/graph.json');
    expect(config.paths.chunks).toBe('/srv/chunks.json');
  });

  test('should require an API key for OpenRouter', () => {
    expect(() => loadConfig({ LLM_PROVIDER: 'openrouter' })).toThrow(
      'Invalid configuration: OPENROUTER_API_KEY: OPENROUTER_API_KEY is required when LLM_PROVIDER is openrouter'
    );
  });

  test('should reject invalid values', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow(ValidationError);
    expect(() => loadConfig({ LLM_PROVIDER: 'other' })).toThrow(/^Invalid configuration: LLM_PROVIDER: /);
    expect(() => loadConfig({ OLLAMA_URL: 'not a url' })).toThrow(/^Invalid configuration: OLLAMA_URL: /);
  });
});

describe('createProviders', () => {
  test('should build one Ollama backend for chat and embeddings', async () => {
    const { fetchImpl, requests } = TestHelpers.fetchStub(() => TestHelpers.jsonResponse({ embeddings: [[1, 0]] }));
    const config = loadConfig({ OLLAMA_URL: 'http://gpu-box:11434', CHAT_MODEL: 'local-chat' });

    const { llm, embeddings } = createProviders(config.llm, fetchImpl);

    expect(llm).toBeInstanceOf(OllamaProvider);
    expect(embeddings).toBe(llm);
    expect(llm.defaultModel).toBe('local-chat');

    await embeddings.embed(['x']);
    expect(requests[0].url).toBe('http://gpu-box:11434/api/embed');
  });

  test('should build an OpenRouter backend when configured', () => {
    const config = loadConfig({ LLM_PROVIDER: 'openrouter', OPENROUTER_API_KEY: 'test-secret' });

    const { llm } = createProviders(config.llm);

    expect(llm).toBeInstanceOf(OpenRouterProvider);
    expect(llm.name).toBe('openrouter');
  });

  test('should refuse OpenRouter without a key', () => {
    expect(() => createProviders({ provider: 'openrouter', ollamaUrl: 'http://localhost:11434' })).toThrow(
      ValidationError
    );
  });
});
