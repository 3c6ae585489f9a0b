/**
 * JSON persistence for hypergraphs, node embeddings and edge metadata
 *
 * Formats:
 * - hypergraph: `{"incidence_dict": {"<edge>": ["<node>", ...]}}` with edge
 *   keys and member lists sorted, so the same graph always writes the same bytes
 * - embeddings: flat `{"<node>": [number, ...]}`
 * - metadata: array of EdgeMetadata objects
 * - chunks: `{"<chunkId>": "<text>"}`, the source text behind each edge's
 *   chunkId, kept for citations
 */

import { promises as fs } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import { NodeEmbeddings } from '../core/embeddings.js';
import { Hypergraph, compareIds } from '../core/hypergraph.js';
import type { EdgeMetadata } from '../core/types.js';
import type { TextChunk } from '../extraction/text-splitter.js';
import { StorageError, ValidationError, toError } from '../utils/error-handler.js';

export const hypergraphFileSchema = z.object({
  incidence_dict: z.record(z.string(), z.array(z.string()))
});

export const embeddingsFileSchema = z.record(z.string(), z.array(z.number()));

export const edgeMetadataSchema = z.object({
  edge: z.string(),
  nodes: z.array(z.string()),
  source: z.array(z.string()),
  target: z.array(z.string()),
  relation: z.string(),
  chunkId: z.string(),
  index: z.number().int()
});

export const metadataFileSchema = z.array(edgeMetadataSchema);

export const chunksFileSchema = z.record(z.string(), z.string());

export type HypergraphFile = z.infer<typeof hypergraphFileSchema>;

function parseDocument<T>(json: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, what: string): T {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new ValidationError(`Invalid ${what} JSON: ${toError(error).message}`, { cause: error });
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new ValidationError(`Invalid ${what}${where}: ${issue?.message ?? 'unexpected shape'}`);
  }
  return parsed.data;
}

export function toHypergraphFile(graph: Hypergraph<string, string>): HypergraphFile {
  const incidence: Record<string, string[]> = {};
  const edges = [...graph.entries()].sort(([a], [b]) => compareIds(a, b));
  for (const [edge, members] of edges) {
    incidence[edge] = [...members].sort(compareIds);
  }
  return { incidence_dict: incidence };
}

export function serializeHypergraph(graph: Hypergraph<string, string>, pretty: boolean = true): string {
  return JSON.stringify(toHypergraphFile(graph), null, pretty ? 2 : undefined);
}

/**
 * Throws ValidationError on malformed input. Edges with no members are dropped.
 */
export function deserializeHypergraph(json: string): Hypergraph<string, string> {
  const file = parseDocument(json, hypergraphFileSchema, 'hypergraph');
  return new Hypergraph<string, string>(Object.entries(file.incidence_dict));
}

export function serializeEmbeddings(embeddings: NodeEmbeddings, pretty: boolean = false): string {
  const record = embeddings.toRecord();
  const sorted: Record<string, number[]> = {};
  for (const node of Object.keys(record).sort(compareIds)) {
    sorted[node] = record[node];
  }
  return JSON.stringify(sorted, null, pretty ? 2 : undefined);
}

/**
 * Throws ValidationError on malformed input or mixed dimensions
 */
export function deserializeEmbeddings(json: string): NodeEmbeddings {
  return NodeEmbeddings.fromRecord(parseDocument(json, embeddingsFileSchema, 'embeddings'));
}

export function serializeMetadata(metadata: EdgeMetadata[], pretty: boolean = true): string {
  const sorted = [...metadata].sort((a, b) => compareIds(a.edge, b.edge));
  return JSON.stringify(sorted, null, pretty ? 2 : undefined);
}

export function deserializeMetadata(json: string): EdgeMetadata[] {
  return parseDocument(json, metadataFileSchema, 'metadata');
}

export function serializeChunks(chunks: ReadonlyMap<string, TextChunk>, pretty: boolean = true): string {
  const record: Record<string, string> = {};
  for (const chunkId of [...chunks.keys()].sort(compareIds)) {
    const chunk = chunks.get(chunkId);
    if (chunk) record[chunkId] = chunk.text;
  }
  return JSON.stringify(record, null, pretty ? 2 : undefined);
}

export function deserializeChunks(json: string): Map<string, TextChunk> {
  const record = parseDocument(json, chunksFileSchema, 'chunk index');
  return new Map(Object.entries(record).map(([chunkId, text]) => [chunkId, { chunkId, text }] as const));
}

async function writeFile(path: string, contents: string): Promise<void> {
  try {
    await fs.mkdir(dirname(path), { recursive: true });
    await fs.writeFile(path, contents, 'utf-8');
  } catch (error) {
    throw new StorageError(`Failed to write ${path}: ${toError(error).message}`, { cause: error });
  }
}

async function readFile(path: string): Promise<string> {
  try {
    return await fs.readFile(path, 'utf-8');
  } catch (error) {
    throw new StorageError(`Failed to read ${path}: ${toError(error).message}`, { cause: error });
  }
}

export async function saveHypergraph(graph: Hypergraph<string, string>, path: string): Promise<void> {
  await writeFile(path, serializeHypergraph(graph));
}

export async function loadHypergraph(path: string): Promise<Hypergraph<string, string>> {
  return deserializeHypergraph(await readFile(path));
}

export async function saveEmbeddings(embeddings: NodeEmbeddings, path: string): Promise<void> {
  await writeFile(path, serializeEmbeddings(embeddings));
}

export async function loadEmbeddings(path: string): Promise<NodeEmbeddings> {
  return deserializeEmbeddings(await readFile(path));
}

export async function saveMetadata(metadata: EdgeMetadata[], path: string): Promise<void> {
  await writeFile(path, serializeMetadata(metadata));
}

export async function loadMetadata(path: string): Promise<EdgeMetadata[]> {
  return deserializeMetadata(await readFile(path));
}

export async function saveChunks(chunks: ReadonlyMap<string, TextChunk>, path: string): Promise<void> {
  await writeFile(path, serializeChunks(chunks));
}

export async function loadChunks(path: string): Promise<Map<string, TextChunk>> {
  return deserializeChunks(await readFile(path));
}

/**
 * Whether a file exists and is readable
 */
export async function fileExists(path: string): Promise<boolean> {
  try {
    await fs.access(path);
    return true;
  } catch {
    return false;
  }
}
