/**
 * Unit tests for keyword to node matching
 */

import { EmbeddingService } from '../../llm/embedding-service.js';
import { NodeMatcher } from '../../rag/node-matcher.js';
import { EmbeddingError } from '../../utils/error-handler.js';
import { StubEmbeddingProvider, TestHelpers } from '../helpers.js';

describe('NodeMatcher', () => {
  const graph = TestHelpers.graph({
    e1: ['Graphene', 'Carbon nanotube'],
    e2: ['carbon', 'Steel']
  });
  const embeddings = TestHelpers.embeddings({
    Steel: [1, 0],
    Graphene: [0, 1],
    carbon: [3, 4]
  });

  let provider: StubEmbeddingProvider;
  let matcher: NodeMatcher;

  beforeEach(() => {
    provider = new StubEmbeddingProvider({ metal: [1, 0], conductor: [0, 1] });
    matcher = new NodeMatcher(graph, embeddings, new EmbeddingService(provider));
  });

  describe('findExactMatches', () => {
    test('should match names case-insensitively', () => {
      expect(matcher.findExactMatches('GRAPHENE')).toEqual([
        { node: 'Graphene', keyword: 'GRAPHENE', similarity: 1, matchType: 'exact' }
      ]);
    });

    test('should prefer exact matches over substrings', () => {
      expect(matcher.findExactMatches('carbon').map(match => match.node)).toEqual(['carbon']);
    });

    test('should score substrings by length ratio with a floor', () => {
      expect(matcher.findExactMatches('carbon nanotubes')).toEqual([
        { node: 'Carbon nanotube', keyword: 'carbon nanotubes', similarity: 15 / 16, matchType: 'substring' },
        { node: 'carbon', keyword: 'carbon nanotubes', similarity: 0.8, matchType: 'substring' }
      ]);
    });

    test('should ignore blank keywords', () => {
      expect(matcher.findExactMatches('   ')).toEqual([]);
    });
  });

  describe('findMatchingNodes', () => {
    test('should not embed keywords that matched by name', async () => {
      const { matches, failures } = await matcher.findMatchingNodes(['graphene']);

      expect(matches.map(match => match.node)).toEqual(['Graphene']);
      expect(failures).toEqual([]);
      expect(provider.callCount).toBe(0);
    });

    test('should fall back to embedding similarity above the threshold', async () => {
      const { matches } = await matcher.findMatchingNodes(['metal'], { threshold: 0.5 });

      expect(matches).toEqual([
        { node: 'Steel', keyword: 'metal', similarity: 1, matchType: 'embedding' },
        { node: 'carbon', keyword: 'metal', similarity: 0.6, matchType: 'embedding' }
      ]);
    });

    test('should keep the best score per node across keywords', async () => {
      const { matches } = await matcher.findMatchingNodes(['metal', 'carbon']);

      expect(matches.map(({ node, similarity }) => [node, similarity])).toEqual([
        ['Steel', 1],
        ['carbon', 1]
      ]);
    });

    test('should report failed keywords while keeping other matches', async () => {
      const { matches, failures } = await matcher.findMatchingNodes(['mystery', 'conductor']);

      expect(matches.map(match => match.node)).toEqual(['Graphene', 'carbon']);
      expect(failures).toHaveLength(1);
      expect(failures[0].keyword).toBe('mystery');
      expect(failures[0].error).toBeInstanceOf(EmbeddingError);
    });

    test('should throw when every embedding attempt failed', async () => {
      await expect(matcher.findMatchingNodes(['mystery'])).rejects.toThrow('No stub embedding for "mystery"');
    });

    test('should return nothing for no keywords', async () => {
      expect(await matcher.findMatchingNodes([])).toEqual({ matches: [], failures: [] });
    });
  });

  describe('findBestMatches', () => {
    test('should map each keyword to its top node', async () => {
      const best = await matcher.findBestMatches(['metal', 'graphene']);

      expect([...best.entries()]).toEqual([
        ['metal', 'Steel'],
        ['graphene', 'Graphene']
      ]);
    });
  });

  describe('uniqueNodes', () => {
    test('should order distinct nodes by best score', () => {
      expect(
        NodeMatcher.uniqueNodes([
          { node: 'b', keyword: 'x', similarity: 0.7, matchType: 'embedding' },
          { node: 'a', keyword: 'y', similarity: 0.9, matchType: 'embedding' },
          { node: 'b', keyword: 'z', similarity: 0.95, matchType: 'substring' }
        ])
      ).toEqual(['b', 'a']);
    });
  });
});
