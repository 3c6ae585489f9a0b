/**
 * Hono HTTP API for hypergraph retrieval
 *
 * Exposes graph statistics, simplification, context retrieval and question
 * answering over the loaded hypergraph. Request bodies are validated with zod;
 * upstream model failures surface as 502. A failed write after simplification
 * is logged and reported as `persisted: false`; the new graph is still served.
 */

import { Hono, type Context } from 'hono';
import { cors } from 'hono/cors';
import { z } from 'zod';
import type { NodeEmbeddings } from '../core/embeddings.js';
import { compareIds, type Hypergraph } from '../core/hypergraph.js';
import { computeStatistics } from '../core/statistics.js';
import { hasContext, matchedNodeCount, type EdgeMetadata, type RAGContext } from '../core/types.js';
import { previewChunk, type TextChunk } from '../extraction/text-splitter.js';
import type { EmbeddingService } from '../llm/embedding-service.js';
import type { LLMProvider } from '../llm/provider.js';
import { GraphRAGService } from '../rag/graph-rag-service.js';
import { HypergraphSimplifier, applyMergesToMetadata } from '../simplification/simplifier.js';
import { ErrorCategory, ErrorHandler, HypergraphRAGError, ValidationError, toError } from '../utils/error-handler.js';

/**
 * Mutable graph data served by the API; simplification replaces it
 */
export interface GraphState {
  graph: Hypergraph<string, string>;
  embeddings: NodeEmbeddings;
  metadata: EdgeMetadata[];
  /** Source text of the chunks edges were extracted from */
  chunks: Map<string, TextChunk>;
}

export interface ApiDependencies {
  state: GraphState;
  llm: LLMProvider;
  embeddingService: EmbeddingService;
  /** Called after the state changes, e.g. to write it back to disk */
  persist?: (state: GraphState) => Promise<void>;
  corsOrigins?: string[];
}

const retrievalFields = {
  topK: z.number().int().positive().max(100).optional(),
  maxPathLength: z.number().int().min(1).max(20).optional(),
  similarityThreshold: z.number().min(-1).max(1).optional()
};

const retrieveBodySchema = z.object({
  query: z.string().trim().min(1),
  /** Local keyword extraction only */
  simple: z.boolean().optional(),
  ...retrievalFields
});

const queryBodySchema = z.object({
  question: z.string().trim().min(1),
  ...retrievalFields
});

const simplifyBodySchema = z.object({
  similarityThreshold: z.number().min(-1).max(1).optional(),
  excludeSuffixes: z.array(z.string()).optional(),
  recomputeEmbeddings: z.boolean().optional()
});

type ErrorStatus = 400 | 500 | 502;

function statusFor(error: Error): ErrorStatus {
  if (error instanceof HypergraphRAGError) {
    switch (error.category) {
      case ErrorCategory.VALIDATION:
        return 400;
      case ErrorCategory.EMBEDDING:
      case ErrorCategory.GENERATION:
      case ErrorCategory.NETWORK:
        return 502;
      default:
        return 500;
    }
  }
  return 500;
}

function errorResponse(c: Context, error: unknown, action: string) {
  const err = toError(error);
  const status = statusFor(err);
  if (status === 500) {
    console.error(`❌ Failed to ${action}:`, err);
  } else {
    console.warn(`⚠️ Could not ${action}: ${err.message}`);
  }
  return c.json({ error: err.message }, status);
}

/**
 * Parse a JSON body against a schema; failures become ValidationError
 */
async function readBody<T>(c: Context, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  let raw: unknown;
  try {
    raw = await c.req.json();
  } catch (error) {
    throw new ValidationError('Request body must be valid JSON', { cause: error });
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new ValidationError(problems.join('; '));
  }
  return parsed.data;
}

function contextBody(context: RAGContext) {
  return {
    ...context,
    hasContext: hasContext(context),
    matchedNodeCount: matchedNodeCount(context)
  };
}

function positiveInt(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function createApp(deps: ApiDependencies): Hono {
  const { state, llm, embeddingService } = deps;
  const app = new Hono();

  let service: GraphRAGService | undefined;
  const ragService = (): GraphRAGService => {
    service ??= new GraphRAGService({
      graph: state.graph,
      embeddings: state.embeddings,
      metadata: state.metadata,
      llm,
      embeddingService
    });
    return service;
  };

  app.use(
    '/*',
    cors({
      origin: deps.corsOrigins ?? ['http://localhost:5173', 'http://localhost:3000', 'http://127.0.0.1:5173'],
      allowHeaders: ['Content-Type', 'Authorization'],
      allowMethods: ['GET', 'POST', 'OPTIONS']
    })
  );

  /**
   * GET /api/health
   */
  app.get('/api/health', c => {
    return c.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      service: 'hypergraph-rag',
      provider: llm.name,
      nodes: state.graph.nodeCount,
      edges: state.graph.edgeCount,
      embeddings: state.embeddings.size,
      errors: ErrorHandler.getErrorStats()
    });
  });

  /**
   * DELETE /api/errors
   * Reset the error counters reported by /api/health
   */
  app.delete('/api/errors', c => {
    ErrorHandler.resetErrorStats();
    return c.json({ success: true });
  });

  /**
   * GET /api/graph/stats?top=N
   */
  app.get('/api/graph/stats', c => {
    return c.json(computeStatistics(state.graph, positiveInt(c.req.query('top'), 10)));
  });

  /**
   * GET /api/graph/components?limit=N
   * Components largest first, members sorted
   */
  app.get('/api/graph/components', c => {
    const components = state.graph.connectedComponents();
    const limit = positiveInt(c.req.query('limit'), components.length);

    return c.json({
      count: components.length,
      components: components.slice(0, limit).map(component => ({
        size: component.size,
        nodes: [...component].sort(compareIds)
      }))
    });
  });

  /**
   * GET /api/chunks/:chunkId?preview=N
   * Source text behind an edge's chunkId
   */
  app.get('/api/chunks/:chunkId', c => {
    const chunkId = c.req.param('chunkId');
    const chunk = state.chunks.get(chunkId);
    if (!chunk) {
      return c.json({ error: `Unknown chunk ${chunkId}` }, 404);
    }

    const edges = state.metadata
      .filter(entry => entry.chunkId === chunkId)
      .map(entry => entry.edge)
      .sort(compareIds);

    return c.json({
      chunkId,
      text: chunk.text,
      preview: previewChunk(state.chunks, chunkId, positiveInt(c.req.query('preview'), 200)),
      edges
    });
  });

  /**
   * POST /api/simplify
   * Merge near-duplicate nodes and replace the served graph
   */
  app.post('/api/simplify', async c => {
    try {
      const body = await readBody(c, simplifyBodySchema);
      const simplifier = new HypergraphSimplifier({
        similarityThreshold: body.similarityThreshold,
        excludeSuffixes: body.excludeSuffixes
      });

      const result = body.recomputeEmbeddings
        ? await simplifier.simplifyWithRecompute(state.graph, state.embeddings, {}, embeddingService)
        : simplifier.simplify(state.graph, state.embeddings);

      state.graph = result.hypergraph;
      state.embeddings = result.embeddings;
      state.metadata = applyMergesToMetadata(state.metadata, result.mergeHistory, result.hypergraph);
      service = undefined;

      const persist = deps.persist;
      const saved = persist
        ? await ErrorHandler.wrapOperation(() => persist(state), ErrorCategory.STORAGE, 'persist simplified graph')
        : undefined;

      return c.json({
        mergeCount: result.mergeCount,
        nodesRemoved: result.nodesRemoved,
        edgesRemoved: result.edgesRemoved,
        embeddingsRecomputed: result.embeddingsRecomputed,
        mergeHistory: result.mergeHistory,
        nodeCount: result.hypergraph.nodeCount,
        edgeCount: result.hypergraph.edgeCount,
        persisted: saved?.success ?? false
      });
    } catch (error) {
      return errorResponse(c, error, 'simplify graph');
    }
  });

  /**
   * POST /api/retrieve
   * Evidence for a query without answer generation
   */
  app.post('/api/retrieve', async c => {
    try {
      const { query, simple, ...options } = await readBody(c, retrieveBodySchema);
      const context = simple
        ? await ragService().retrieveContextSimple(query, options.topK)
        : await ragService().retrieveContext(query, options);

      return c.json(contextBody(context));
    } catch (error) {
      return errorResponse(c, error, 'retrieve context');
    }
  });

  /**
   * POST /api/query
   * Retrieve evidence and answer the question with it
   */
  app.post('/api/query', async c => {
    try {
      const { question, ...options } = await readBody(c, queryBodySchema);
      const response = await ragService().query(question, options);

      return c.json({
        answer: response.answer,
        hadContext: response.hadContext,
        context: contextBody(response.context)
      });
    } catch (error) {
      return errorResponse(c, error, 'answer question');
    }
  });

  return app;
}
