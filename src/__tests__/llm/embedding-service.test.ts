/**
 * Unit tests for batching, caching and incremental embedding updates
 */

import { EmbeddingService } from '../../llm/embedding-service.js';
import type { EmbeddingProvider } from '../../llm/provider.js';
import { EmbeddingError } from '../../utils/error-handler.js';
import { StubEmbeddingProvider, TestHelpers } from '../helpers.js';

describe('EmbeddingService', () => {
  let provider: StubEmbeddingProvider;
  let service: EmbeddingService;

  beforeEach(() => {
    provider = new StubEmbeddingProvider({
      alpha: [1, 0],
      beta: [0, 1],
      gamma: [1, 1],
      delta: [-1, 0]
    });
    service = new EmbeddingService(provider, { batchSize: 2 });
  });

  test('should expose the provider model', () => {
    expect(service.model).toBe('stub-embedding');
  });

  test('should embed texts in input order across batches', async () => {
    const vectors = await service.embedTexts(['gamma', 'alpha', 'beta']);

    expect(vectors).toEqual([
      [1, 1],
      [1, 0],
      [0, 1]
    ]);
    expect(provider.batches).toEqual([['gamma', 'alpha'], ['beta']]);
  });

  test('should send duplicates once and serve repeats from the cache', async () => {
    await service.embedTexts(['alpha', 'alpha']);
    await service.embedText('alpha');

    expect(provider.batches).toEqual([['alpha']]);
    expect(service.getCacheSize()).toBe(1);

    service.clearCache();
    await service.embedText('alpha');
    expect(provider.callCount).toBe(2);
  });

  test('should bypass the cache when disabled', async () => {
    const uncached = new EmbeddingService(provider, { cache: { enabled: false } });
    await uncached.embedText('beta');
    await uncached.embedText('beta');

    expect(provider.callCount).toBe(2);
  });

  test('should bound the cache by maxSize alone', async () => {
    const small = new EmbeddingService(provider, { cache: { maxSize: 1 } });
    await small.embedTexts(['alpha', 'beta']);
    await small.embedText('beta');
    await small.embedText('alpha');

    expect(small.getCacheSize()).toBe(1);
    expect(provider.batches).toEqual([['alpha', 'beta'], ['alpha']]);
  });

  test('should propagate embedding errors', async () => {
    await expect(service.embedText('unknown')).rejects.toThrow(EmbeddingError);
  });

  test('should wrap foreign errors and reject count mismatches', async () => {
    const broken: EmbeddingProvider = {
      embeddingModel: 'broken',
      embed: async () => {
        throw new TypeError('socket closed');
      }
    };
    await expect(new EmbeddingService(broken).embedText('x')).rejects.toThrow(
      'Embedding request failed: socket closed'
    );

    const short: EmbeddingProvider = { embeddingModel: 'short', embed: async () => [] };
    await expect(new EmbeddingService(short).embedTexts(['x'])).rejects.toThrow(
      'Embedding provider returned 0 vectors for 1 texts'
    );
  });

  test('should embed every node of a graph', async () => {
    const embeddings = await service.embedGraph(TestHelpers.graph({ e1: ['beta', 'alpha'] }));

    expect(embeddings.toRecord()).toEqual({ alpha: [1, 0], beta: [0, 1] });
  });

  test('should add missing nodes and prune orphans without mutating the input', async () => {
    const existing = TestHelpers.embeddings({ alpha: [1, 0], delta: [-1, 0] });
    const graph = TestHelpers.graph({ e1: ['alpha', 'beta'] });

    const updated = await service.updateEmbeddings(existing, graph);

    expect(TestHelpers.sorted(updated.nodeIds)).toEqual(['alpha', 'beta']);
    expect(provider.batches).toEqual([['beta']]);
    expect(existing.has('delta')).toBe(true);

    const kept = await service.updateEmbeddings(existing, graph, false);
    expect(TestHelpers.sorted(kept.nodeIds)).toEqual(['alpha', 'beta', 'delta']);
  });

  test('should return the same store when nothing is missing', async () => {
    const existing = TestHelpers.embeddings({ alpha: [1, 0] });

    expect(await service.ensureEmbeddings(existing, ['alpha'])).toBe(existing);

    const extended = await service.ensureEmbeddings(existing, ['alpha', 'gamma']);
    expect(extended.get('gamma')).toEqual([1, 1]);
    expect(existing.has('gamma')).toBe(false);
  });

  test('should rank stored nodes against a free-text query', async () => {
    const embeddings = TestHelpers.embeddings({ alpha: [1, 0], beta: [0, 1] });

    const results = await service.findSimilarNodes('delta', embeddings, 5, -1);

    expect(results.map(result => result.node)).toEqual(['beta', 'alpha']);
    expect(results[1].similarity).toBe(-1);
  });
});
