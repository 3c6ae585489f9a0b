/**
 * Keyword to node matching
 *
 * Per keyword, in priority order:
 * 1. exact case-insensitive name match (similarity 1.0, nothing else tried)
 * 2. substring match in either direction, scored max(0.8, shorter/longer)
 * 3. embedding similarity against every stored node embedding
 */

import type { NodeEmbeddings } from '../core/embeddings.js';
import { compareIds, type Hypergraph } from '../core/hypergraph.js';
import type { MatchFailure, NodeMatch } from '../core/types.js';
import type { EmbeddingService } from '../llm/embedding-service.js';
import { EmbeddingError, toError } from '../utils/error-handler.js';

export interface MatchOptions {
  /** Maximum embedding matches per keyword */
  topK: number;
  /** Minimum similarity for embedding matches */
  threshold: number;
}

export interface MatchResult {
  /** One match per node, best score first */
  matches: NodeMatch[];
  /** Keywords whose embedding could not be generated */
  failures: MatchFailure[];
}

export const SUBSTRING_SCORE_FLOOR = 0.8;

function compareMatches(a: NodeMatch, b: NodeMatch): number {
  return b.similarity - a.similarity || compareIds(a.node, b.node);
}

export class NodeMatcher {
  private candidates: string[];
  private embeddings: NodeEmbeddings;
  private embeddingService: Pick<EmbeddingService, 'embedText'>;

  constructor(
    graph: Hypergraph<string, string>,
    embeddings: NodeEmbeddings,
    embeddingService: Pick<EmbeddingService, 'embedText'>
  ) {
    this.candidates = [...new Set([...graph.nodes, ...embeddings.nodeIds])].sort(compareIds);
    this.embeddings = embeddings;
    this.embeddingService = embeddingService;
  }

  /**
   * Match every keyword and keep each node's best score
   *
   * A keyword whose embedding fails is reported in `failures` and does not
   * affect the others. If every keyword that needed an embedding failed and
   * nothing matched, the first failure is rethrown as an EmbeddingError.
   */
  async findMatchingNodes(keywords: string[], options: Partial<MatchOptions> = {}): Promise<MatchResult> {
    const topK = options.topK ?? 5;
    const threshold = options.threshold ?? 0.5;

    const all: NodeMatch[] = [];
    const failures: MatchFailure[] = [];
    let embeddingAttempts = 0;

    for (const keyword of keywords) {
      const lexical = this.findExactMatches(keyword);
      if (lexical.length > 0) {
        all.push(...lexical);
        continue;
      }

      embeddingAttempts++;
      try {
        all.push(...(await this.findEmbeddingMatches(keyword, topK, threshold)));
      } catch (error) {
        failures.push({ keyword, error: toError(error) });
      }
    }

    const matches = this.deduplicate(all);

    if (matches.length === 0 && embeddingAttempts > 0 && failures.length === embeddingAttempts) {
      const first = failures[0].error;
      throw first instanceof EmbeddingError
        ? first
        : new EmbeddingError(`Could not embed keywords: ${first.message}`, { cause: first });
    }

    return { matches, failures };
  }

  /**
   * Matches for a single keyword; embedding failures propagate
   */
  async findMatches(keyword: string, options: Partial<MatchOptions> = {}): Promise<NodeMatch[]> {
    const lexical = this.findExactMatches(keyword);
    if (lexical.length > 0) return lexical;

    return this.findEmbeddingMatches(keyword, options.topK ?? 5, options.threshold ?? 0.5);
  }

  /**
   * Exact matches if any, otherwise substring matches; no embeddings involved
   */
  findExactMatches(keyword: string): NodeMatch[] {
    const needle = keyword.trim().toLowerCase();
    if (needle.length === 0) return [];

    const exact: NodeMatch[] = [];
    const substring: NodeMatch[] = [];

    for (const node of this.candidates) {
      const name = node.toLowerCase();

      if (name === needle) {
        exact.push({ node, keyword, similarity: 1.0, matchType: 'exact' });
      } else if (name.includes(needle) || needle.includes(name)) {
        const ratio = Math.min(name.length, needle.length) / Math.max(name.length, needle.length);
        substring.push({
          node,
          keyword,
          similarity: Math.max(SUBSTRING_SCORE_FLOOR, ratio),
          matchType: 'substring'
        });
      }
    }

    return (exact.length > 0 ? exact : substring).sort(compareMatches);
  }

  /**
   * Keyword -> single best node, for keywords that matched anything
   */
  async findBestMatches(keywords: string[], threshold: number = 0.5): Promise<Map<string, string>> {
    const best = new Map<string, string>();

    for (const keyword of keywords) {
      const [top] = await this.findMatches(keyword, { topK: 1, threshold });
      if (top) best.set(keyword, top.node);
    }

    return best;
  }

  /**
   * Distinct nodes of a match list, best score first
   */
  static uniqueNodes(matches: NodeMatch[]): string[] {
    const seen = new Set<string>();
    const nodes: string[] = [];

    for (const match of [...matches].sort(compareMatches)) {
      if (!seen.has(match.node)) {
        seen.add(match.node);
        nodes.push(match.node);
      }
    }

    return nodes;
  }

  private async findEmbeddingMatches(keyword: string, topK: number, threshold: number): Promise<NodeMatch[]> {
    const vector = await this.embeddingService.embedText(keyword);

    return this.embeddings.findSimilar(vector, topK, threshold).map(({ node, similarity }) => ({
      node,
      keyword,
      similarity,
      matchType: 'embedding' as const
    }));
  }

  private deduplicate(matches: NodeMatch[]): NodeMatch[] {
    const bestByNode = new Map<string, NodeMatch>();

    for (const match of matches) {
      const existing = bestByNode.get(match.node);
      if (!existing || match.similarity > existing.similarity) {
        bestByNode.set(match.node, match);
      }
    }

    return [...bestByNode.values()].sort(compareMatches);
  }
}
