/**
 * Unit tests for hypergraph statistics
 */

import { computeStatistics, formatStatistics } from '../../core/statistics.js';
import { Hypergraph } from '../../core/hypergraph.js';
import { TestHelpers } from '../helpers.js';

describe('computeStatistics', () => {
  const graph = TestHelpers.graph({
    e1: ['A', 'B', 'C'],
    e2: ['B', 'C'],
    e3: ['C', 'D'],
    e4: ['X', 'Y']
  });

  test('should count nodes, edges and components', () => {
    const stats = computeStatistics(graph);

    expect(stats.nodeCount).toBe(6);
    expect(stats.edgeCount).toBe(4);
    expect(stats.componentCount).toBe(2);
    expect(stats.largestComponentSize).toBe(4);
  });

  test('should report the edge size distribution ascending', () => {
    expect(computeStatistics(graph).edgeSizeDistribution).toEqual([
      { size: 2, count: 3 },
      { size: 3, count: 1 }
    ]);
  });

  test('should rank nodes by degree with ties broken by name', () => {
    expect(computeStatistics(graph, 3).topNodesByDegree).toEqual([
      { node: 'C', degree: 3 },
      { node: 'B', degree: 2 },
      { node: 'A', degree: 1 }
    ]);
  });

  test('should handle an empty graph', () => {
    const stats = computeStatistics(new Hypergraph<string, string>());

    expect(stats).toEqual({
      nodeCount: 0,
      edgeCount: 0,
      componentCount: 0,
      largestComponentSize: 0,
      edgeSizeDistribution: [],
      topNodesByDegree: []
    });
  });

  test('should format a readable report', () => {
    const report = formatStatistics(computeStatistics(graph, 1));

    expect(report.split('\n')).toEqual([
      '📊 Hypergraph statistics',
      '   Nodes: 6',
      '   Edges: 4',
      '   Components: 2',
      '   Largest component: 4 nodes',
      '   Edge sizes:',
      '     2 nodes: 3 edges',
      '     3 nodes: 1 edges',
      '   Top nodes by degree:',
      '     1. C (3)'
    ]);
  });
});
