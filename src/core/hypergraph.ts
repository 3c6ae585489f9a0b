/**
 * Core in-memory hypergraph implementation
 *
 * A hyperedge connects any number of nodes. The incidence map
 * (edge id -> member nodes) is the single source of truth; the adjacency
 * view (node -> incident edges) is derived lazily and cached until the next
 * structural mutation.
 *
 * Memory complexity: O(sum of edge sizes) for the incidence map, the same
 * again for the adjacency index once built.
 */

import type { IncidenceRecord } from './types.js';

/**
 * Deterministic ordering for node and edge ids of any key type
 */
export function compareIds<T>(a: T, b: T): number {
  const left = String(a);
  const right = String(b);
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

/**
 * Smallest member of a set under compareIds, undefined for an empty set
 */
function smallestMember<T>(set: ReadonlySet<T>): T | undefined {
  let smallest: T | undefined;
  for (const item of set) {
    if (smallest === undefined || compareIds(item, smallest) < 0) {
      smallest = item;
    }
  }
  return smallest;
}

/**
 * Hypergraph keyed by node ids of type N and edge ids of type E
 *
 * Invariants:
 * - a node exists iff it belongs to at least one edge
 * - no edge is stored with zero members
 * - accessors hand out copies, never the internal sets
 */
export class Hypergraph<N = string, E = string> {
  private incidence: Map<E, Set<N>> = new Map();

  // Derived node -> edges index, rebuilt on demand
  private adjacencyCache: Map<N, Set<E>> | undefined;

  constructor(incidence?: IncidenceRecord<N, E>) {
    if (incidence) {
      for (const [edgeId, members] of incidence) {
        const nodeSet = new Set(members);
        if (nodeSet.size > 0) {
          this.incidence.set(edgeId, nodeSet);
        }
      }
    }
  }

  /**
   * Fold any number of fragments into one hypergraph
   */
  static unionAll<N, E>(fragments: Iterable<Hypergraph<N, E>>): Hypergraph<N, E> {
    const result = new Hypergraph<N, E>();
    for (const fragment of fragments) {
      result.formUnion(fragment);
    }
    return result;
  }

  // ---------------------------------------------------------------------------
  // Accessors
  // ---------------------------------------------------------------------------

  /**
   * All nodes that appear in at least one edge
   */
  get nodes(): Set<N> {
    return new Set(this.adjacency().keys());
  }

  /**
   * All edge ids
   */
  get edges(): Set<E> {
    return new Set(this.incidence.keys());
  }

  get nodeCount(): number {
    return this.adjacency().size;
  }

  get edgeCount(): number {
    return this.incidence.size;
  }

  get isEmpty(): boolean {
    return this.incidence.size === 0;
  }

  hasNode(node: N): boolean {
    return this.adjacency().has(node);
  }

  hasEdge(edgeId: E): boolean {
    return this.incidence.has(edgeId);
  }

  /**
   * Number of edges containing the node; 0 for unknown nodes
   */
  degree(node: N): number {
    return this.adjacency().get(node)?.size ?? 0;
  }

  /**
   * Every node sharing at least one edge with the given node, itself excluded
   */
  neighbors(node: N): Set<N> {
    const result = new Set<N>();
    const edgeIds = this.adjacency().get(node);
    if (!edgeIds) return result;

    for (const edgeId of edgeIds) {
      const members = this.incidence.get(edgeId);
      if (!members) continue;
      for (const member of members) {
        result.add(member);
      }
    }
    result.delete(node);
    return result;
  }

  /**
   * Members of an edge, or undefined if the edge does not exist
   */
  nodesIn(edgeId: E): Set<N> | undefined {
    const members = this.incidence.get(edgeId);
    return members ? new Set(members) : undefined;
  }

  /**
   * Number of members of an edge; 0 for unknown edges
   */
  size(edgeId: E): number {
    return this.incidence.get(edgeId)?.size ?? 0;
  }

  /**
   * Ids of the edges containing the node
   */
  incidentEdges(node: N): Set<E> {
    return new Set(this.adjacency().get(node) ?? []);
  }

  /**
   * Iterate edges with read-only member views
   */
  *entries(): IterableIterator<[E, ReadonlySet<N>]> {
    for (const [edgeId, members] of this.incidence) {
      yield [edgeId, members];
    }
  }

  // ---------------------------------------------------------------------------
  // Mutation
  // ---------------------------------------------------------------------------

  /**
   * Insert or replace an edge. An empty member set removes the edge.
   */
  addEdge(edgeId: E, nodes: Iterable<N>): void {
    const nodeSet = new Set(nodes);
    if (nodeSet.size === 0) {
      this.incidence.delete(edgeId);
    } else {
      this.incidence.set(edgeId, nodeSet);
    }
    this.invalidate();
  }

  /**
   * Remove an edge, returning its former members
   */
  removeEdge(edgeId: E): Set<N> | undefined {
    const members = this.incidence.get(edgeId);
    if (!members) return undefined;
    this.incidence.delete(edgeId);
    this.invalidate();
    return members;
  }

  /**
   * Remove a node from every edge; edges left empty are deleted
   */
  removeNode(node: N): void {
    const edgeIds = this.adjacency().get(node);
    if (!edgeIds) return;

    for (const edgeId of edgeIds) {
      const members = this.incidence.get(edgeId);
      if (!members) continue;
      members.delete(node);
      if (members.size === 0) {
        this.incidence.delete(edgeId);
      }
    }
    this.invalidate();
  }

  /**
   * Merge another hypergraph into this one; shared edge ids union their members
   */
  formUnion(other: Hypergraph<N, E>): void {
    for (const [edgeId, members] of other.incidence) {
      const existing = this.incidence.get(edgeId);
      if (existing) {
        for (const member of members) {
          existing.add(member);
        }
      } else {
        this.incidence.set(edgeId, new Set(members));
      }
    }
    this.invalidate();
  }

  /**
   * Non-mutating union
   */
  union(other: Hypergraph<N, E>): Hypergraph<N, E> {
    const result = this.clone();
    result.formUnion(other);
    return result;
  }

  clone(): Hypergraph<N, E> {
    return new Hypergraph<N, E>(this.incidence);
  }

  /**
   * Incidence-map equality
   */
  equals(other: Hypergraph<N, E>): boolean {
    if (this.incidence.size !== other.incidence.size) return false;

    for (const [edgeId, members] of this.incidence) {
      const otherMembers = other.incidence.get(edgeId);
      if (!otherMembers || otherMembers.size !== members.size) return false;
      for (const member of members) {
        if (!otherMembers.has(member)) return false;
      }
    }
    return true;
  }

  // ---------------------------------------------------------------------------
  // Connectivity
  // ---------------------------------------------------------------------------

  /**
   * Connected components under shared-edge adjacency
   *
   * Sorted largest first; equal sizes are ordered by their smallest member.
   */
  connectedComponents(): Array<Set<N>> {
    const visited = new Set<N>();
    const components: Array<Set<N>> = [];

    for (const start of this.adjacency().keys()) {
      if (visited.has(start)) continue;

      const component = new Set<N>();
      const queue: N[] = [start];
      visited.add(start);

      while (queue.length > 0) {
        const current = queue.shift();
        if (current === undefined) break;
        component.add(current);

        for (const neighbor of this.neighbors(current)) {
          if (!visited.has(neighbor)) {
            visited.add(neighbor);
            queue.push(neighbor);
          }
        }
      }

      components.push(component);
    }

    const keyed = components.map(component => ({ component, smallest: smallestMember(component) }));
    keyed.sort((a, b) => {
      if (a.component.size !== b.component.size) {
        return b.component.size - a.component.size;
      }
      return compareIds(a.smallest, b.smallest);
    });

    return keyed.map(entry => entry.component);
  }

  /**
   * Largest connected component, empty for an empty hypergraph
   */
  largestComponent(): Set<N> {
    return this.connectedComponents()[0] ?? new Set<N>();
  }

  /**
   * True when every node belongs to one component (an empty graph counts)
   */
  get isConnected(): boolean {
    return this.connectedComponents().length <= 1;
  }

  // ---------------------------------------------------------------------------
  // Subgraphs and filtering
  // ---------------------------------------------------------------------------

  /**
   * Keep edges intersecting the node set, restricted to the intersection
   */
  restrictToNodes(nodes: Iterable<N>): Hypergraph<N, E> {
    const keep = new Set(nodes);
    const result = new Hypergraph<N, E>();

    for (const [edgeId, members] of this.incidence) {
      const intersection = new Set<N>();
      for (const member of members) {
        if (keep.has(member)) intersection.add(member);
      }
      if (intersection.size > 0) {
        result.incidence.set(edgeId, intersection);
      }
    }
    return result;
  }

  /**
   * Keep only the listed edges; unknown ids are ignored
   */
  restrictToEdges(edgeIds: Iterable<E>): Hypergraph<N, E> {
    const result = new Hypergraph<N, E>();
    for (const edgeId of edgeIds) {
      const members = this.incidence.get(edgeId);
      if (members) {
        result.incidence.set(edgeId, new Set(members));
      }
    }
    return result;
  }

  /**
   * Keep the edges accepted by the predicate
   */
  filterEdges(predicate: (edgeId: E, nodes: ReadonlySet<N>) => boolean): Hypergraph<N, E> {
    const result = new Hypergraph<N, E>();
    for (const [edgeId, members] of this.incidence) {
      if (predicate(edgeId, members)) {
        result.incidence.set(edgeId, new Set(members));
      }
    }
    return result;
  }

  /**
   * Keep edges with at least minSize members
   */
  filterEdgesBySize(minSize: number): Hypergraph<N, E> {
    return this.filterEdges((_, members) => members.size >= minSize);
  }

  /**
   * Drop components with fewer than sizeThreshold nodes
   */
  removeSmallComponents(sizeThreshold: number, keepSingletons = false): Hypergraph<N, E> {
    if (sizeThreshold <= 0) {
      return this.clone();
    }

    const keep = new Set<N>();
    for (const component of this.connectedComponents()) {
      const shouldKeep = component.size >= sizeThreshold || (keepSingletons && component.size === 1);
      if (shouldKeep) {
        for (const node of component) keep.add(node);
      }
    }
    return this.restrictToNodes(keep);
  }

  // ---------------------------------------------------------------------------
  // Internal
  // ---------------------------------------------------------------------------

  private adjacency(): Map<N, Set<E>> {
    if (this.adjacencyCache) {
      return this.adjacencyCache;
    }

    const adjacency = new Map<N, Set<E>>();
    for (const [edgeId, members] of this.incidence) {
      for (const member of members) {
        let edgeIds = adjacency.get(member);
        if (!edgeIds) {
          edgeIds = new Set<E>();
          adjacency.set(member, edgeIds);
        }
        edgeIds.add(edgeId);
      }
    }
    this.adjacencyCache = adjacency;
    return adjacency;
  }

  private invalidate(): void {
    this.adjacencyCache = undefined;
  }
}
