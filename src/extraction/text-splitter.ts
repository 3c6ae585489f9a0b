/**
 * Recursive character text splitter
 *
 * Splits on the first separator present in the text, recursing with the
 * remaining separators into pieces that are still too long, then greedily
 * merges pieces back up to chunkSize characters.
 */

import { ValidationError } from '../utils/error-handler.js';
import { chunkIdFor } from './hypergraph-builder.js';

export interface TextChunk {
  text: string;
  /** Deterministic id derived from the text */
  chunkId: string;
}

export interface TextSplitterConfig {
  chunkSize: number;
  chunkOverlap: number;
  separators: string[];
  /** Keep each separator at the end of the piece it terminated */
  keepSeparator: boolean;
}

export const DEFAULT_SEPARATORS = ['\n\n', '\n', '. ', ' ', ''];

export function createChunk(text: string): TextChunk {
  return { text, chunkId: chunkIdFor(text) };
}

export const DEFAULT_PREVIEW_LENGTH = 200;

/**
 * First maxLength characters of a chunk's text, with "..." when cut
 */
export function previewChunk(
  chunks: ReadonlyMap<string, TextChunk>,
  chunkId: string,
  maxLength: number = DEFAULT_PREVIEW_LENGTH
): string | undefined {
  const chunk = chunks.get(chunkId);
  if (!chunk) return undefined;
  return chunk.text.length <= maxLength ? chunk.text : `${chunk.text.slice(0, maxLength)}...`;
}

export class RecursiveTextSplitter {
  readonly config: TextSplitterConfig;

  constructor(config: Partial<TextSplitterConfig> = {}) {
    this.config = {
      chunkSize: config.chunkSize ?? 2500,
      chunkOverlap: config.chunkOverlap ?? 0,
      separators: config.separators ?? DEFAULT_SEPARATORS,
      keepSeparator: config.keepSeparator ?? true
    };

    const { chunkSize, chunkOverlap } = this.config;
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new ValidationError(`chunkSize must be a positive integer, got ${chunkSize}`);
    }
    if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0) {
      throw new ValidationError(`chunkOverlap cannot be negative, got ${chunkOverlap}`);
    }
    if (chunkOverlap >= chunkSize) {
      throw new ValidationError(`chunkOverlap (${chunkOverlap}) must be less than chunkSize (${chunkSize})`);
    }
  }

  split(text: string): TextChunk[] {
    return this.splitToStrings(text).map(createChunk);
  }

  splitToStrings(text: string): string[] {
    return this.splitText(text, this.config.separators);
  }

  private splitText(text: string, separators: string[]): string[] {
    const finalChunks: string[] = [];

    let separator = separators[separators.length - 1] ?? '';
    let remaining: string[] = [];

    for (let i = 0; i < separators.length; i++) {
      const candidate = separators[i];
      if (candidate === '') {
        separator = candidate;
        remaining = [];
        break;
      }
      if (text.includes(candidate)) {
        separator = candidate;
        remaining = separators.slice(i + 1);
        break;
      }
    }

    const splits = separator === '' ? Array.from(text) : this.splitWithSeparator(text, separator);

    let goodSplits: string[] = [];
    for (const piece of splits) {
      if (piece.length < this.config.chunkSize) {
        goodSplits.push(piece);
        continue;
      }

      if (goodSplits.length > 0) {
        finalChunks.push(...this.mergeSplits(goodSplits));
        goodSplits = [];
      }

      if (remaining.length === 0) {
        finalChunks.push(piece);
      } else {
        finalChunks.push(...this.splitText(piece, remaining));
      }
    }

    if (goodSplits.length > 0) {
      finalChunks.push(...this.mergeSplits(goodSplits));
    }

    return finalChunks;
  }

  private splitWithSeparator(text: string, separator: string): string[] {
    const parts = text.split(separator);

    if (!this.config.keepSeparator) {
      return parts.filter(part => part.length > 0);
    }

    return parts
      .map((part, index) => (index < parts.length - 1 ? part + separator : part))
      .filter(part => part.length > 0);
  }

  private mergeSplits(splits: string[]): string[] {
    const { chunkSize, chunkOverlap } = this.config;
    const chunks: string[] = [];
    let current = '';

    for (const piece of splits) {
      if (current.length + piece.length <= chunkSize) {
        current += piece;
        continue;
      }

      if (current.length > 0) {
        chunks.push(current);
      }

      current = chunkOverlap > 0 && chunks.length > 0 ? current.slice(-chunkOverlap) + piece : piece;

      // A piece that cannot fit even on its own becomes its own chunk
      if (current.length > chunkSize) {
        chunks.push(current);
        current = '';
      }
    }

    if (current.length > 0) {
      chunks.push(current);
    }

    return chunks;
  }
}
