/**
 * Hypergraph RAG
 *
 * Hypergraph knowledge representation built from extracted facts, with
 * embedding-based node simplification and GraphRAG retrieval:
 * - Set-algebraic hypergraph model with components and subgraph restriction
 * - Similarity-driven merging of near-duplicate nodes
 * - Keyword -> node matching, BFS path finding and token-budgeted context
 * - Ollama and OpenRouter backends behind one provider interface
 */

export * from "./src/index.js";
