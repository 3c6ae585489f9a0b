/**
 * Unit tests for the hypergraph data structure
 *
 * Covers:
 * - Construction, accessors and the node/edge invariants
 * - Mutation (add/remove edges and nodes, union)
 * - Connected components and their ordering
 * - Subgraph restriction and filtering
 */

import { Hypergraph, compareIds } from '../../core/hypergraph.js';
import { TestHelpers } from '../helpers.js';

describe('Hypergraph', () => {
  let graph: Hypergraph<string, string>;

  beforeEach(() => {
    graph = TestHelpers.graph({
      e1: ['A', 'B', 'C'],
      e2: ['B', 'C', 'D']
    });
  });

  describe('Accessors', () => {
    test('should derive nodes from edge membership', () => {
      expect(TestHelpers.sorted(graph.nodes)).toEqual(['A', 'B', 'C', 'D']);
      expect(TestHelpers.sorted(graph.edges)).toEqual(['e1', 'e2']);
      expect(graph.nodeCount).toBe(4);
      expect(graph.edgeCount).toBe(2);
      expect(graph.isEmpty).toBe(false);
    });

    test('should compute degree, neighbors and connectivity', () => {
      expect(graph.degree('B')).toBe(2);
      expect(graph.degree('A')).toBe(1);
      expect(TestHelpers.sorted(graph.neighbors('A'))).toEqual(['B', 'C']);
      expect(graph.connectedComponents()).toHaveLength(1);
      expect(graph.isConnected).toBe(true);
    });

    test('should exclude the node itself from its neighbors', () => {
      expect(graph.neighbors('B').has('B')).toBe(false);
      expect(TestHelpers.sorted(graph.neighbors('B'))).toEqual(['A', 'C', 'D']);
    });

    test('should return neutral values for unknown ids', () => {
      expect(graph.degree('Z')).toBe(0);
      expect(graph.neighbors('Z').size).toBe(0);
      expect(graph.nodesIn('missing')).toBeUndefined();
      expect(graph.size('missing')).toBe(0);
      expect(graph.incidentEdges('Z').size).toBe(0);
      expect(graph.hasNode('Z')).toBe(false);
    });

    test('should hand out copies of member sets', () => {
      const members = graph.nodesIn('e1');
      members?.add('X');

      expect(graph.hasNode('X')).toBe(false);
      expect(graph.size('e1')).toBe(3);
    });

    test('should skip empty edges at construction', () => {
      const withEmpty = TestHelpers.graph({ e1: ['A', 'B'], empty: [] });

      expect(withEmpty.edgeCount).toBe(1);
      expect(withEmpty.hasEdge('empty')).toBe(false);
    });

    test('should treat an empty graph as connected', () => {
      const empty = new Hypergraph<string, string>();

      expect(empty.isEmpty).toBe(true);
      expect(empty.isConnected).toBe(true);
      expect(empty.largestComponent().size).toBe(0);
    });

    test('should support non-string identifiers', () => {
      const numeric = new Hypergraph<number, number>([
        [1, [10, 20]],
        [2, [20, 30]]
      ]);

      expect(numeric.degree(20)).toBe(2);
      expect(TestHelpers.sorted(numeric.neighbors(10))).toEqual([20]);
    });
  });

  describe('Mutation', () => {
    test('should add and replace edges', () => {
      graph.addEdge('e3', ['D', 'E']);
      expect(graph.hasNode('E')).toBe(true);
      expect(graph.degree('D')).toBe(2);

      graph.addEdge('e3', ['A', 'E']);
      expect(graph.degree('D')).toBe(1);
      expect(graph.degree('A')).toBe(2);
    });

    test('should delete an edge when given no members', () => {
      graph.addEdge('e1', []);

      expect(graph.hasEdge('e1')).toBe(false);
      expect(graph.hasNode('A')).toBe(false);
    });

    test('should remove an edge and return its members', () => {
      const removed = graph.removeEdge('e2');

      expect(TestHelpers.sorted(removed ?? [])).toEqual(['B', 'C', 'D']);
      expect(graph.hasNode('D')).toBe(false);
      expect(graph.removeEdge('e2')).toBeUndefined();
    });

    test('should remove a node and delete edges it empties', () => {
      const g = TestHelpers.graph({ solo: ['X'], pair: ['X', 'Y'] });
      g.removeNode('X');

      expect(g.hasEdge('solo')).toBe(false);
      expect(TestHelpers.incidenceOf(g)).toEqual({ pair: ['Y'] });
    });

    test('should union shared edge ids by member union', () => {
      const other = TestHelpers.graph({ e1: ['A', 'Z'], e9: ['Q', 'R'] });
      const result = graph.union(other);

      expect(TestHelpers.incidenceOf(result)).toEqual({
        e1: ['A', 'B', 'C', 'Z'],
        e2: ['B', 'C', 'D'],
        e9: ['Q', 'R']
      });
      // inputs untouched
      expect(graph.size('e1')).toBe(3);
      expect(other.size('e1')).toBe(2);
    });

    test('should be idempotent under union with itself', () => {
      expect(graph.union(graph).equals(graph)).toBe(true);
    });

    test('should union commutatively and associatively', () => {
      const a = TestHelpers.graph({ shared: ['A', 'B'], onlyA: ['A', 'C'] });
      const b = TestHelpers.graph({ shared: ['B', 'D'], onlyB: ['D', 'E'] });
      const c = TestHelpers.graph({ shared: ['F'], onlyB: ['E', 'G'], onlyC: ['G', 'H'] });

      expect(a.union(b).equals(b.union(a))).toBe(true);
      expect(a.union(b).union(c).equals(a.union(b.union(c)))).toBe(true);
      expect(TestHelpers.incidenceOf(a.union(b).union(c))).toEqual({
        onlyA: ['A', 'C'],
        onlyB: ['D', 'E', 'G'],
        onlyC: ['G', 'H'],
        shared: ['A', 'B', 'D', 'F']
      });
      expect(Hypergraph.unionAll([c, a, b]).equals(a.union(b).union(c))).toBe(true);
    });

    test('should fold fragments with unionAll', () => {
      const result = Hypergraph.unionAll([
        TestHelpers.graph({ a: ['1', '2'] }),
        TestHelpers.graph({ b: ['2', '3'] }),
        TestHelpers.graph({ a: ['4'] })
      ]);

      expect(TestHelpers.incidenceOf(result)).toEqual({ a: ['1', '2', '4'], b: ['2', '3'] });
    });

    test('should clone independently', () => {
      const copy = graph.clone();
      copy.addEdge('e3', ['X', 'Y']);

      expect(graph.hasEdge('e3')).toBe(false);
      expect(copy.equals(graph)).toBe(false);
    });
  });

  describe('Connected Components', () => {
    test('should order components by size then smallest member', () => {
      const g = TestHelpers.graph({
        e1: ['M', 'N'],
        e2: ['A', 'B'],
        e3: ['X', 'Y', 'Z'],
        e4: ['K']
      });

      const components = g.connectedComponents().map(component => TestHelpers.sorted(component));

      expect(components).toEqual([['X', 'Y', 'Z'], ['A', 'B'], ['M', 'N'], ['K']]);
      expect(g.isConnected).toBe(false);
    });

    test('should partition the node set', () => {
      const g = TestHelpers.graph({ e1: ['A', 'B'], e2: ['C', 'D'], e3: ['D', 'E'] });
      const components = g.connectedComponents();
      const all = components.flatMap(component => [...component]);

      expect(all).toHaveLength(g.nodeCount);
      expect(new Set(all)).toEqual(g.nodes);
    });

    test('should return the largest component', () => {
      const g = TestHelpers.graph({ e1: ['A', 'B'], e2: ['C', 'D'], e3: ['D', 'E'] });

      expect(TestHelpers.sorted(g.largestComponent())).toEqual(['C', 'D', 'E']);
    });
  });

  describe('Subgraphs', () => {
    test('should restrict to a node set', () => {
      const restricted = graph.restrictToNodes(['A', 'B']);

      expect(TestHelpers.incidenceOf(restricted)).toEqual({ e1: ['A', 'B'], e2: ['B'] });
      for (const node of restricted.nodes) {
        expect(['A', 'B']).toContain(node);
      }
    });

    test('should drop edges with no surviving members', () => {
      const restricted = graph.restrictToNodes(['A']);

      expect(TestHelpers.incidenceOf(restricted)).toEqual({ e1: ['A'] });
    });

    test('should restrict to listed edges and ignore unknown ids', () => {
      const restricted = graph.restrictToEdges(['e2', 'nope']);

      expect(TestHelpers.incidenceOf(restricted)).toEqual({ e2: ['B', 'C', 'D'] });
    });

    test('should filter edges by predicate and by size', () => {
      const g = TestHelpers.graph({ big: ['A', 'B', 'C'], pair: ['C', 'D'], single: ['E'] });

      expect(TestHelpers.sorted(g.filterEdgesBySize(2).edges)).toEqual(['big', 'pair']);
      expect(TestHelpers.sorted(g.filterEdges(edgeId => edgeId.startsWith('s')).edges)).toEqual(['single']);
    });

    test('should remove small components', () => {
      const g = TestHelpers.graph({
        e1: ['A', 'B', 'C'],
        e2: ['D', 'E'],
        e3: ['F']
      });

      expect(TestHelpers.sorted(g.removeSmallComponents(3).nodes)).toEqual(['A', 'B', 'C']);
      expect(TestHelpers.sorted(g.removeSmallComponents(3, true).nodes)).toEqual(['A', 'B', 'C', 'F']);
      expect(g.removeSmallComponents(0).equals(g)).toBe(true);
    });
  });

  describe('compareIds', () => {
    test('should order ids by their string form', () => {
      expect(['b', 'a', 'c'].sort(compareIds)).toEqual(['a', 'b', 'c']);
      expect([10, 9, 1].sort(compareIds)).toEqual([1, 10, 9]);
      expect(compareIds('x', 'x')).toBe(0);
    });
  });
});
