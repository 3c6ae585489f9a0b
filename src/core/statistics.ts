import { compareIds } from './hypergraph.js';
import type { Hypergraph } from './hypergraph.js';
import type { HypergraphStatistics } from './types.js';

/**
 * Summarize a hypergraph: counts, components, edge sizes and hub nodes
 */
export function computeStatistics(graph: Hypergraph<string, string>, topN: number = 10): HypergraphStatistics {
  const components = graph.connectedComponents();

  const sizeCounts = new Map<number, number>();
  for (const [, members] of graph.entries()) {
    sizeCounts.set(members.size, (sizeCounts.get(members.size) ?? 0) + 1);
  }
  const edgeSizeDistribution = [...sizeCounts.entries()]
    .map(([size, count]) => ({ size, count }))
    .sort((a, b) => a.size - b.size);

  const topNodesByDegree = [...graph.nodes]
    .map(node => ({ node, degree: graph.degree(node) }))
    .sort((a, b) => b.degree - a.degree || compareIds(a.node, b.node))
    .slice(0, Math.max(0, topN));

  return {
    nodeCount: graph.nodeCount,
    edgeCount: graph.edgeCount,
    componentCount: components.length,
    largestComponentSize: components[0]?.size ?? 0,
    edgeSizeDistribution,
    topNodesByDegree
  };
}

/**
 * Multi-line human-readable report of the statistics
 */
export function formatStatistics(stats: HypergraphStatistics): string {
  const lines = [
    '📊 Hypergraph statistics',
    `   Nodes: ${stats.nodeCount}`,
    `   Edges: ${stats.edgeCount}`,
    `   Components: ${stats.componentCount}`,
    `   Largest component: ${stats.largestComponentSize} nodes`,
    '   Edge sizes:',
    ...stats.edgeSizeDistribution.map(({ size, count }) => `     ${size} nodes: ${count} edges`),
    '   Top nodes by degree:',
    ...stats.topNodesByDegree.map(({ node, degree }, i) => `     ${i + 1}. ${node} (${degree})`)
  ];
  return lines.join('\n');
}
