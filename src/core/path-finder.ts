/**
 * Breadth-first path finding over a hypergraph
 *
 * Two nodes are adjacent when they share at least one hyperedge, so a path is
 * a node sequence whose consecutive members co-occur in some edge. BFS gives
 * the shortest such path; neighbors are expanded in lexicographic order so the
 * same graph always yields the same path.
 *
 * Time Complexity: O(V + sum of edge sizes) per search
 * Space Complexity: O(V) for the queue and visited set
 */

import { compareIds } from './hypergraph.js';
import type { Hypergraph } from './hypergraph.js';

/**
 * A path together with the edges linking each consecutive pair
 */
export interface HypergraphPath {
  nodes: string[];
  edges: string[];
}

/**
 * Order paths by length, then by their joined node ids
 */
function comparePaths(a: string[], b: string[]): number {
  if (a.length !== b.length) return a.length - b.length;
  return compareIds(a.join('\u0000'), b.join('\u0000'));
}

/**
 * Stateless path search bound to one hypergraph
 */
export class PathFinder {
  private graph: Hypergraph<string, string>;

  constructor(graph: Hypergraph<string, string>) {
    this.graph = graph;
  }

  /**
   * Shortest path from source to target with at most maxLength nodes
   *
   * Returns [source] when both ends are the same node and undefined when
   * either end is absent or no path fits within the bound.
   */
  findPath(source: string, target: string, maxLength: number = 4): string[] | undefined {
    if (source === target) return [source];
    if (!this.graph.hasNode(source) || !this.graph.hasNode(target)) {
      return undefined;
    }

    const visited = new Set<string>([source]);
    const queue: Array<{ nodeId: string; path: string[] }> = [{ nodeId: source, path: [source] }];

    while (queue.length > 0) {
      const entry = queue.shift();
      if (!entry) break;
      const { nodeId, path } = entry;

      // Extending would exceed the node budget
      if (path.length >= maxLength) {
        continue;
      }

      for (const neighbor of this.sortedNeighbors(nodeId)) {
        if (neighbor === target) {
          return [...path, neighbor];
        }
        if (!visited.has(neighbor)) {
          visited.add(neighbor);
          queue.push({ nodeId: neighbor, path: [...path, neighbor] });
        }
      }
    }

    return undefined;
  }

  /**
   * Paths connecting the given nodes
   *
   * Every pair contributes its shortest path. With three or more nodes, BFS
   * paths passing through more than one of them (and longer than a single
   * step) are added as well. Duplicate sequences are collapsed and the result
   * is ordered by length, then lexicographically.
   */
  findShortestPaths(nodes: string[], maxLength: number = 4): string[][] {
    if (nodes.length < 2) return [];

    const paths: string[][] = [];

    for (let i = 0; i < nodes.length; i++) {
      for (let j = i + 1; j < nodes.length; j++) {
        const path = this.findPath(nodes[i], nodes[j], maxLength);
        if (path) paths.push(path);
      }
    }

    if (nodes.length > 2) {
      paths.push(...this.findMultiNodePaths(nodes, maxLength));
    }

    const unique = new Map<string, string[]>();
    for (const path of paths) {
      unique.set(path.join('\u0000'), path);
    }

    return [...unique.values()].sort(comparePaths);
  }

  /**
   * One edge id per consecutive pair of the path (smallest id wins)
   */
  edgesAlongPath(path: string[]): string[] {
    const edges: string[] = [];

    for (let i = 0; i < path.length - 1; i++) {
      const edgeId = this.firstSharedEdge(path[i], path[i + 1]);
      if (edgeId !== undefined) edges.push(edgeId);
    }

    return edges;
  }

  /**
   * Path with the edges that realize each step
   */
  describePath(path: string[]): HypergraphPath {
    return { nodes: [...path], edges: this.edgesAlongPath(path) };
  }

  /**
   * Hypergraph of the edges linking consecutive path nodes, restricted to
   * path nodes; edges left with fewer than two members are dropped
   */
  extractSubgraph(paths: string[][]): Hypergraph<string, string> {
    const pathNodes = new Set<string>();
    for (const path of paths) {
      for (const node of path) pathNodes.add(node);
    }

    const relevantEdges = new Set<string>();
    for (const path of paths) {
      for (let i = 0; i < path.length - 1; i++) {
        for (const edgeId of this.sharedEdges(path[i], path[i + 1])) {
          relevantEdges.add(edgeId);
        }
      }
    }

    return this.graph
      .restrictToEdges(relevantEdges)
      .restrictToNodes(pathNodes)
      .filterEdgesBySize(2);
  }

  private findMultiNodePaths(nodes: string[], maxLength: number): string[][] {
    const targets = new Set(nodes);
    const paths: string[][] = [];

    for (const start of [...targets].sort(compareIds)) {
      for (const path of this.findReachableTargets(start, targets, maxLength)) {
        if (path.length > 2) paths.push(path);
      }
    }

    return paths;
  }

  /**
   * BFS from source recording every path that has touched more than one target
   */
  private findReachableTargets(source: string, targets: Set<string>, maxLength: number): string[][] {
    if (!this.graph.hasNode(source)) return [];

    const results: string[][] = [];
    const visited = new Set<string>([source]);
    const queue: Array<{ nodeId: string; path: string[]; found: number }> = [
      { nodeId: source, path: [source], found: targets.has(source) ? 1 : 0 }
    ];

    while (queue.length > 0) {
      const entry = queue.shift();
      if (!entry) break;
      const { nodeId, path, found } = entry;

      if (path.length >= maxLength) {
        continue;
      }

      for (const neighbor of this.sortedNeighbors(nodeId)) {
        if (visited.has(neighbor)) continue;
        visited.add(neighbor);

        const newFound = targets.has(neighbor) ? found + 1 : found;
        const newPath = [...path, neighbor];

        if (newFound > 1) {
          results.push(newPath);
        }
        queue.push({ nodeId: neighbor, path: newPath, found: newFound });
      }
    }

    return results;
  }

  private sortedNeighbors(node: string): string[] {
    return [...this.graph.neighbors(node)].sort(compareIds);
  }

  private sharedEdges(a: string, b: string): string[] {
    const shared: string[] = [];
    for (const edgeId of this.graph.incidentEdges(a)) {
      const members = this.graph.nodesIn(edgeId);
      if (members?.has(b)) shared.push(edgeId);
    }
    return shared.sort(compareIds);
  }

  private firstSharedEdge(a: string, b: string): string | undefined {
    return this.sharedEdges(a, b)[0];
  }
}
