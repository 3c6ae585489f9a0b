/**
 * HTTP server entry point
 *
 * Loads the hypergraph, embeddings, edge metadata and chunk index named by
 * the environment, embeds any nodes without a vector, and serves the API.
 */

import { serve } from '@hono/node-server';
import { loadConfig, createProviders, type AppConfig } from '../config.js';
import { NodeEmbeddings } from '../core/embeddings.js';
import { Hypergraph } from '../core/hypergraph.js';
import type { TextChunk } from '../extraction/text-splitter.js';
import { EmbeddingService } from '../llm/embedding-service.js';
import {
  fileExists,
  loadChunks,
  loadEmbeddings,
  loadHypergraph,
  loadMetadata,
  saveEmbeddings,
  saveHypergraph,
  saveMetadata
} from '../storage/serialization.js';
import { createApp, type GraphState } from './api.js';

async function loadState(config: AppConfig, embeddingService: EmbeddingService): Promise<GraphState> {
  const { paths } = config;

  let graph = new Hypergraph<string, string>();
  if (await fileExists(paths.graph)) {
    graph = await loadHypergraph(paths.graph);
    console.log(`📂 Loaded hypergraph: ${graph.nodeCount} nodes, ${graph.edgeCount} edges`);
  } else {
    console.warn(`⚠️ No hypergraph at ${paths.graph}, serving an empty graph`);
  }

  const metadata = (await fileExists(paths.metadata)) ? await loadMetadata(paths.metadata) : [];
  if (metadata.length > 0) {
    console.log(`🏷️  Loaded metadata for ${metadata.length} edges`);
  }

  const chunks = (await fileExists(paths.chunks)) ? await loadChunks(paths.chunks) : new Map<string, TextChunk>();
  if (chunks.size > 0) {
    console.log(`🧩 Loaded ${chunks.size} source chunks`);
  }

  let embeddings = (await fileExists(paths.embeddings)) ? await loadEmbeddings(paths.embeddings) : new NodeEmbeddings();
  if (!graph.isEmpty) {
    const updated = await embeddingService.updateEmbeddings(embeddings, graph, false);
    if (updated.size !== embeddings.size) {
      await saveEmbeddings(updated, paths.embeddings);
    }
    embeddings = updated;
  }

  return { graph, embeddings, metadata, chunks };
}

async function main(): Promise<void> {
  const config = loadConfig();
  const providers = createProviders(config.llm);
  const embeddingService = new EmbeddingService(providers.embeddings);

  console.log(`🕸️  Starting hypergraph RAG server (${providers.llm.name}, ${providers.llm.defaultModel})...`);

  const state = await loadState(config, embeddingService);

  const app = createApp({
    state,
    llm: providers.llm,
    embeddingService,
    persist: async current => {
      await saveHypergraph(current.graph, config.paths.graph);
      await saveEmbeddings(current.embeddings, config.paths.embeddings);
      await saveMetadata(current.metadata, config.paths.metadata);
      console.log(`💾 Saved simplified graph to ${config.paths.graph}`);
    }
  });

  console.log(`🔗 API endpoints:`);
  console.log(`   GET  /api/health - Health check`);
  console.log(`   DELETE /api/errors - Reset error counters`);
  console.log(`   GET  /api/graph/stats - Graph statistics`);
  console.log(`   GET  /api/graph/components - Connected components`);
  console.log(`   GET  /api/chunks/:chunkId - Source text of a chunk`);
  console.log(`   POST /api/simplify - Merge similar nodes`);
  console.log(`   POST /api/retrieve - Retrieve context for a query`);
  console.log(`   POST /api/query - Answer a question`);

  serve(
    {
      fetch: app.fetch,
      port: config.port,
      hostname: config.host
    },
    info => {
      console.log(`✅ Server is running on http://${info.address}:${info.port}`);
    }
  );
}

process.on('SIGINT', () => {
  console.log('\n🛑 Shutting down...');
  process.exit(0);
});

process.on('SIGTERM', () => {
  console.log('\n🛑 Shutting down...');
  process.exit(0);
});

main().catch((error: unknown) => {
  console.error('❌ Failed to start server:', error);
  process.exit(1);
});
