/**
 * Conversion of extracted facts into hypergraph fragments
 *
 * Each fact becomes one hyperedge whose members are its sources and targets.
 * Edge ids keep the `<relation>_chunk<chunkId>_<index>` shape used by existing
 * graph files, but relation and provenance travel as EdgeMetadata so nothing
 * downstream has to parse them back out of the id.
 */

import { v5 as uuidv5 } from 'uuid';
import { Hypergraph } from '../core/hypergraph.js';
import type { EdgeMetadata, Fact } from '../core/types.js';
import vagueTerms from './vague-terms.json';

export interface BuildResult {
  hypergraph: Hypergraph<string, string>;
  metadata: EdgeMetadata[];
}

// Fixed namespace so that identical chunk text always yields the same id
const CHUNK_NAMESPACE = '6f1c0a52-8d0e-4f7b-9a43-2c5e1d7b9e10';

const PRONOUNS = new Set(vagueTerms.pronouns);
const DETERMINERS = vagueTerms.determiners;
const VAGUE_NOUNS = new Set(vagueTerms.vagueNouns);

const LEGACY_EDGE_PATTERN = /^(.+?)_chunk([0-9A-Za-z]+)_(\d+)$/i;

/**
 * Deterministic 32-character id for a chunk of text
 */
export function chunkIdFor(text: string): string {
  return uuidv5(text, CHUNK_NAMESPACE).replace(/-/g, '');
}

/**
 * Relation label as stored: trimmed, underscores read as spaces
 */
export function normalizeRelation(relation: string): string {
  return relation.replace(/_/g, ' ').trim();
}

export function formatEdgeId(relation: string, index: number, chunkId?: string): string {
  return chunkId ? `${relation}_chunk${chunkId}_${index}` : `${relation}_${index}`;
}

/**
 * Recover relation and chunk from a `<relation>_chunk<id>_<index>` edge id.
 * Only for graphs loaded without metadata; ids of any other shape yield undefined.
 */
export function parseEdgeId(edgeId: string): { relation: string; chunkId: string; index: number } | undefined {
  const match = LEGACY_EDGE_PATTERN.exec(edgeId);
  if (!match) return undefined;

  const relation = match[1].trim();
  if (relation.length === 0) return undefined;

  return { relation, chunkId: match[2], index: Number(match[3]) };
}

/**
 * Whether a node name is a pronoun or a generic term with no referent
 */
export function isVagueNode(node: string): boolean {
  const name = node.trim().toLowerCase().replace(/\s+/g, ' ');
  if (name.length === 0) return true;
  if (PRONOUNS.has(name) || VAGUE_NOUNS.has(name)) return true;

  for (const determiner of DETERMINERS) {
    const prefix = `${determiner} `;
    if (name.startsWith(prefix) && VAGUE_NOUNS.has(name.slice(prefix.length))) {
      return true;
    }
  }
  return false;
}

/**
 * Drop vague nodes from every fact; facts left without a source or a
 * target are dropped entirely
 */
export function filterVagueNodes(facts: Fact[]): Fact[] {
  const result: Fact[] = [];

  for (const fact of facts) {
    const source = fact.source.map(node => node.trim()).filter(node => !isVagueNode(node));
    const target = fact.target.map(node => node.trim()).filter(node => !isVagueNode(node));
    if (source.length > 0 && target.length > 0) {
      result.push({ source, relation: fact.relation, target });
    }
  }

  return result;
}

/**
 * One edge per fact; facts without any non-empty member are skipped
 * (their index is still consumed so ids stay aligned with the input)
 */
export function buildHypergraph(facts: Fact[], chunkId?: string): BuildResult {
  const hypergraph = new Hypergraph<string, string>();
  const metadata: EdgeMetadata[] = [];

  facts.forEach((fact, index) => {
    const relation = normalizeRelation(fact.relation);
    const source = fact.source.map(node => node.trim()).filter(node => node.length > 0);
    const target = fact.target.map(node => node.trim()).filter(node => node.length > 0);
    const nodes = [...new Set([...source, ...target])];
    if (nodes.length === 0) return;

    const edge = formatEdgeId(relation, index, chunkId);
    hypergraph.addEdge(edge, nodes);
    metadata.push({
      edge,
      nodes: [...nodes].sort(),
      source,
      target,
      relation,
      chunkId: chunkId ?? '',
      index
    });
  });

  return { hypergraph, metadata };
}

/**
 * Metadata keyed by edge id; later entries win
 */
export function indexMetadata(metadata: Iterable<EdgeMetadata>): Map<string, EdgeMetadata> {
  const index = new Map<string, EdgeMetadata>();
  for (const entry of metadata) {
    index.set(entry.edge, entry);
  }
  return index;
}
