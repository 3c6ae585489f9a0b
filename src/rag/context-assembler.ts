/**
 * Evidence sentences and token-budgeted context from hypergraph edges
 *
 * Sentence sets are deduplicated and sorted so that identical inputs always
 * produce identical context text.
 */

import { compareIds, type Hypergraph } from '../core/hypergraph.js';
import type { EdgeMetadata } from '../core/types.js';
import { indexMetadata, parseEdgeId } from '../extraction/hypergraph-builder.js';

export const DEFAULT_CONTEXT_HEADER = 'Relevant knowledge from the graph:';
export const DEFAULT_MAX_TOKENS = 2000;

// Approximate characters per token
const CHARS_PER_TOKEN = 4;

export interface ContextAssemblerConfig {
  /** Use relation labels in sentences when they are known */
  includeEdgeLabels: boolean;
}

function sortedUnique(sentences: Iterable<string>): string[] {
  return [...new Set(sentences)].sort(compareIds);
}

export class ContextAssembler {
  private graph: Hypergraph<string, string>;
  private metadata: Map<string, EdgeMetadata>;
  private config: ContextAssemblerConfig;

  constructor(
    graph: Hypergraph<string, string>,
    metadata: Iterable<EdgeMetadata> = [],
    config: Partial<ContextAssemblerConfig> = {}
  ) {
    this.graph = graph;
    this.metadata = indexMetadata(metadata);
    this.config = {
      includeEdgeLabels: config.includeEdgeLabels ?? true
    };
  }

  /**
   * Relation label of an edge: metadata first, then the legacy id convention
   */
  relationOf(edgeId: string): string | undefined {
    if (!this.config.includeEdgeLabels) return undefined;

    const relation = this.metadata.get(edgeId)?.relation ?? parseEdgeId(edgeId)?.relation;
    return relation && relation.length > 0 ? relation : undefined;
  }

  /**
   * Render one edge as a sentence
   *
   * With metadata: "<sources> <relation> <targets>." using the members
   * still present in the edge, as long as the sentence names both ends of
   * the step. Otherwise, for a step from `from` to `to`:
   * "<from> <relation> <to>." Otherwise by member count:
   * "<a> is related to <b>." or "<a>, <b>, <c> are related."
   */
  edgeToSentence(edgeId: string, nodes: ReadonlySet<string>, from?: string, to?: string): string {
    const relation = this.relationOf(edgeId);
    const meta = this.metadata.get(edgeId);

    if (meta) {
      const source = meta.source.filter(node => nodes.has(node));
      const target = meta.target.filter(node => nodes.has(node));
      const namesStep =
        from === undefined ||
        to === undefined ||
        ((source.includes(from) || target.includes(from)) && (source.includes(to) || target.includes(to)));
      if (source.length > 0 && target.length > 0 && namesStep) {
        return `${source.join(', ')} ${relation ?? 'is related to'} ${target.join(', ')}.`;
      }
    }

    if (from !== undefined && to !== undefined) {
      return `${from} ${relation ?? 'is related to'} ${to}.`;
    }

    const members = [...nodes].sort(compareIds);
    if (members.length === 2) {
      return `${members[0]} ${relation ?? 'is related to'} ${members[1]}.`;
    }
    if (members.length > 2) {
      return `${members.join(', ')} ${relation ?? 'are related'}.`;
    }
    return `${members.join(', ')}.`;
  }

  /**
   * Sentences for every consecutive pair of every path, using the first
   * edge (by id) that contains both nodes
   */
  collectSentences(paths: string[][]): string[] {
    const sentences: string[] = [];

    for (const path of paths) {
      for (let i = 0; i < path.length - 1; i++) {
        const from = path[i];
        const to = path[i + 1];
        const edgeId = this.firstEdgeContaining(from, to);
        if (edgeId === undefined) continue;

        const members = this.graph.nodesIn(edgeId) ?? new Set<string>();
        sentences.push(this.edgeToSentence(edgeId, members, from, to));
      }
    }

    return sortedUnique(sentences);
  }

  /**
   * One sentence per edge of a subgraph
   */
  collectSubgraphSentences(subgraph: Hypergraph<string, string>): string[] {
    const sentences: string[] = [];
    for (const [edgeId, members] of subgraph.entries()) {
      sentences.push(this.edgeToSentence(edgeId, members));
    }
    return sortedUnique(sentences);
  }

  /**
   * Fallback evidence when no paths connect the matched nodes: up to
   * maxEdgesPerNode edges (by id) per node, phrased from that node
   */
  collectDirectNodeContext(nodes: string[], maxEdgesPerNode: number = 5): string[] {
    const sentences: string[] = [];

    for (const node of nodes) {
      const edgeIds = [...this.graph.incidentEdges(node)].sort(compareIds).slice(0, Math.max(0, maxEdgesPerNode));

      for (const edgeId of edgeIds) {
        const members = this.graph.nodesIn(edgeId);
        if (!members) continue;

        const others = [...members].filter(member => member !== node).sort(compareIds);
        if (others.length === 0) continue;

        if (this.metadata.has(edgeId)) {
          sentences.push(this.edgeToSentence(edgeId, members));
        } else {
          sentences.push(`${node} ${this.relationOf(edgeId) ?? 'is related to'} ${others.join(', ')}.`);
        }
      }
    }

    return sortedUnique(sentences);
  }

  /**
   * Bulleted context under a character budget of maxTokens * 4
   *
   * When sentences are left out, a final "- (... and N more relationships)"
   * line says how many, even if not a single sentence fit. A null header
   * omits the header line.
   */
  formatContext(
    sentences: string[],
    maxTokens: number = DEFAULT_MAX_TOKENS,
    header: string | null = DEFAULT_CONTEXT_HEADER
  ): string {
    if (sentences.length === 0) return '';

    const maxChars = maxTokens * CHARS_PER_TOKEN;

    let result = header !== null ? `${header}\n\n` : '';
    let currentChars = result.length;

    for (let index = 0; index < sentences.length; index++) {
      const line = `- ${sentences[index]}\n`;
      if (currentChars + line.length > maxChars) {
        result += `- (... and ${sentences.length - index} more relationships)\n`;
        break;
      }
      result += line;
      currentChars += line.length;
    }

    return result.trim();
  }

  private firstEdgeContaining(a: string, b: string): string | undefined {
    let first: string | undefined;
    for (const edgeId of this.graph.incidentEdges(a)) {
      if (!this.graph.nodesIn(edgeId)?.has(b)) continue;
      if (first === undefined || compareIds(edgeId, first) < 0) {
        first = edgeId;
      }
    }
    return first;
  }
}
