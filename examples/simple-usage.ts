import { loadConfig, createProviders } from '../src/config.js';
import { formatStatistics, computeStatistics } from '../src/core/statistics.js';
import { HypergraphExtractor } from '../src/extraction/hypergraph-extractor.js';
import { EmbeddingService } from '../src/llm/embedding-service.js';
import { GraphRAGService } from '../src/rag/graph-rag-service.js';
import { HypergraphSimplifier, applyMergesToMetadata } from '../src/simplification/simplifier.js';
import { saveChunks, saveEmbeddings, saveHypergraph, saveMetadata } from '../src/storage/serialization.js';

/**
 * End-to-end walkthrough: extract a hypergraph from a few paragraphs,
 * embed and simplify it, ask questions against it, and save the files the
 * HTTP server loads.
 *
 * Uses the provider configured in the environment (Ollama by default).
 */
async function demonstrateHypergraphRAG() {
  console.log('🚀 Initializing hypergraph RAG...\n');

  const config = loadConfig();
  const providers = createProviders(config.llm);
  const embeddingService = new EmbeddingService(providers.embeddings);
  const extractor = new HypergraphExtractor(providers.llm, { chunkSize: 600 });

  console.log('📚 Phase 1: Building the hypergraph\n');
  console.log('=' + '='.repeat(50) + '\n');

  const documents = [
    {
      id: 'scaffolds',
      text:
        'Electrospun silk fibroin scaffolds have high porosity and support cell adhesion. ' +
        'Adding hydroxyapatite to silk fibroin improves compressive strength.\n\n' +
        'Silk fibroin scaffolds degrade slowly in vivo and release glycine and alanine.'
    },
    {
      id: 'graphene',
      text:
        'Graphene oxide increases the electrical conductivity of chitosan films. ' +
        'Chitosan films with graphene oxide support neural cell growth.'
    }
  ];

  const extraction = await extractor.processAndMergeDocuments(documents);
  if (extraction.failures.length > 0) {
    console.log(`⚠️ ${extraction.failures.length} chunks could not be extracted\n`);
  }

  const embeddings = await embeddingService.embedGraph(extraction.hypergraph);
  console.log(formatStatistics(computeStatistics(extraction.hypergraph, 5)));

  console.log('\n🧹 Phase 2: Merging near-duplicate nodes\n');
  console.log('=' + '='.repeat(50) + '\n');

  const simplified = new HypergraphSimplifier({ similarityThreshold: 0.9 }).simplify(
    extraction.hypergraph,
    embeddings
  );
  for (const merge of simplified.mergeHistory) {
    console.log(`   • ${merge.removedNode} → ${merge.keptNode} (${merge.similarity.toFixed(3)})`);
  }
  console.log(`   ${simplified.mergeCount} merges, ${simplified.hypergraph.nodeCount} nodes remain\n`);

  const metadata = applyMergesToMetadata(extraction.metadata, simplified.mergeHistory, simplified.hypergraph);

  console.log('🔍 Phase 3: Questions\n');
  console.log('=' + '='.repeat(50) + '\n');

  const rag = new GraphRAGService({
    graph: simplified.hypergraph,
    embeddings: simplified.embeddings,
    metadata,
    llm: providers.llm,
    embeddingService
  });

  const questions = [
    'How does hydroxyapatite affect silk fibroin?',
    'What does graphene oxide do to chitosan films?'
  ];

  for (const question of questions) {
    console.log(`❓ ${question}`);
    const response = await rag.query(question);

    console.log(`🔑 Keywords: ${response.context.keywords.join(', ')}`);
    console.log(`🔗 ${response.context.paths.length} paths, ${response.context.contextSentences.length} sentences`);
    console.log(`💬 ${response.answer}\n`);
  }

  console.log('💾 Phase 4: Saving\n');
  console.log('=' + '='.repeat(50) + '\n');

  await saveHypergraph(simplified.hypergraph, config.paths.graph);
  await saveEmbeddings(simplified.embeddings, config.paths.embeddings);
  await saveMetadata(metadata, config.paths.metadata);
  await saveChunks(extraction.chunks, config.paths.chunks);
  console.log(`   Wrote ${config.paths.graph} and ${extraction.chunks.size} source chunks to ${config.paths.chunks}\n`);

  console.log('✨ Done\n');
}

demonstrateHypergraphRAG().catch((error: unknown) => {
  console.error('❌ Demo failed:', error);
  process.exit(1);
});
