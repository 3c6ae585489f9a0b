/**
 * Shared test fixtures and in-process provider stubs
 */

import type { z } from 'zod';
import { Hypergraph } from '../core/hypergraph.js';
import { NodeEmbeddings } from '../core/embeddings.js';
import { decodeStructured } from '../llm/json.js';
import type { ChatOptions, EmbeddingProvider, LLMProvider } from '../llm/provider.js';
import { EmbeddingError } from '../utils/error-handler.js';

export interface LLMCall {
  systemPrompt: string;
  userPrompt: string;
  options?: ChatOptions;
  structured: boolean;
}

/**
 * Answers with whatever the responder returns; a thrown error rejects the call
 */
export class StubLLM implements LLMProvider {
  readonly name = 'stub';
  readonly defaultModel = 'stub-model';
  readonly calls: LLMCall[] = [];

  constructor(private responder: (call: LLMCall) => string) {}

  /**
   * Replies in order; the last reply repeats once the queue runs dry
   */
  static sequence(replies: Array<string | Error>): StubLLM {
    let index = 0;
    return new StubLLM(() => {
      const reply = replies[Math.min(index, replies.length - 1)];
      index++;
      if (reply instanceof Error) throw reply;
      return reply ?? '';
    });
  }

  async chat(systemPrompt: string, userPrompt: string, options?: ChatOptions): Promise<string> {
    const call = { systemPrompt, userPrompt, options, structured: false };
    this.calls.push(call);
    return this.responder(call);
  }

  async generate<T>(
    systemPrompt: string,
    userPrompt: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options?: ChatOptions
  ): Promise<T> {
    const call = { systemPrompt, userPrompt, options, structured: true };
    this.calls.push(call);
    return decodeStructured(this.responder(call), schema);
  }
}

/**
 * Embeds texts from a lookup table (case-insensitive); unknown texts get the
 * fallback vector or fail with an EmbeddingError
 */
export class StubEmbeddingProvider implements EmbeddingProvider {
  readonly embeddingModel = 'stub-embedding';
  readonly batches: string[][] = [];
  private vectors: Map<string, number[]>;

  constructor(vectors: Record<string, number[]> = {}, private fallback?: number[]) {
    this.vectors = new Map(Object.entries(vectors).map(([text, vector]) => [text.toLowerCase(), vector]));
  }

  async embed(texts: string[]): Promise<number[][]> {
    this.batches.push([...texts]);
    return texts.map(text => {
      const vector = this.vectors.get(text.toLowerCase()) ?? this.fallback;
      if (!vector) {
        throw new EmbeddingError(`No stub embedding for "${text}"`);
      }
      return [...vector];
    });
  }

  get callCount(): number {
    return this.batches.length;
  }
}

export const TestHelpers = {
  /**
   * Hypergraph from a plain edge -> members record
   */
  graph(incidence: Record<string, string[]>): Hypergraph<string, string> {
    return new Hypergraph<string, string>(Object.entries(incidence));
  },

  embeddings(record: Record<string, number[]>): NodeEmbeddings {
    return NodeEmbeddings.fromRecord(record);
  },

  /**
   * Edge -> sorted members, for order-independent assertions
   */
  incidenceOf(graph: Hypergraph<string, string>): Record<string, string[]> {
    const result: Record<string, string[]> = {};
    for (const [edge, members] of graph.entries()) {
      result[edge] = [...members].sort();
    }
    return result;
  },

  sorted<T>(values: Iterable<T>): T[] {
    return [...values].sort();
  },

  /**
   * fetch stand-in answering from a handler and recording requests
   */
  fetchStub(handler: (url: string, body: unknown) => Response | Promise<Response>) {
    const requests: Array<{ url: string; body: unknown; headers: Headers }> = [];
    const fetchImpl = async (url: string, init?: RequestInit): Promise<Response> => {
      const body: unknown = typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
      requests.push({ url, body, headers: new Headers(init?.headers) });
      return handler(url, body);
    };
    return { fetchImpl, requests };
  },

  jsonResponse(body: unknown, status: number = 200): Response {
    return new Response(JSON.stringify(body), {
      status,
      headers: { 'Content-Type': 'application/json' }
    });
  }
};
