/**
 * Unit tests for the node embedding store
 */

import { NodeEmbeddings } from '../../core/embeddings.js';
import { ValidationError } from '../../utils/error-handler.js';
import { TestHelpers } from '../helpers.js';

describe('NodeEmbeddings', () => {
  let store: NodeEmbeddings;

  beforeEach(() => {
    store = TestHelpers.embeddings({
      cat: [1, 0, 0],
      kitten: [0.9, 0.1, 0],
      car: [0, 1, 0]
    });
  });

  test('should fix the dimension from the first vector', () => {
    expect(store.dimension).toBe(3);
    expect(store.size).toBe(3);
    expect(new NodeEmbeddings().dimension).toBeUndefined();
  });

  test('should reject vectors of another dimension', () => {
    expect(() => store.set('dog', [1, 0])).toThrow(ValidationError);
    expect(() => store.set('dog', [])).toThrow('is empty');
    expect(store.has('dog')).toBe(false);
  });

  test('should reset the dimension once emptied', () => {
    const small = TestHelpers.embeddings({ a: [1, 2] });
    small.remove('a');
    small.set('b', [1, 2, 3, 4]);

    expect(small.dimension).toBe(4);
  });

  test('should return copies of stored vectors', () => {
    const vector = store.get('cat');
    vector?.push(42);

    expect(store.get('cat')).toEqual([1, 0, 0]);
  });

  test('should rank similar nodes with ties broken by id', () => {
    const tied = TestHelpers.embeddings({ b: [1, 0], a: [1, 0], c: [0, 1] });

    expect(tied.findSimilar([1, 0], 5, 0.5)).toEqual([
      { node: 'a', similarity: 1 },
      { node: 'b', similarity: 1 }
    ]);
  });

  test('should limit results to topK', () => {
    const results = store.findSimilar([1, 0, 0], 1);

    expect(results).toHaveLength(1);
    expect(results[0].node).toBe('cat');
  });

  test('should find nodes similar to a stored node, excluding itself', () => {
    const results = store.findSimilarToNode('cat', 1);

    expect(results).toHaveLength(1);
    expect(results[0].node).toBe('kitten');
    expect(store.findSimilarToNode('missing')).toEqual([]);
  });

  test('should report missing nodes in input order', () => {
    expect(store.missing(['zebra', 'cat', 'ant'])).toEqual(['zebra', 'ant']);
  });

  test('should prune entries outside a node set', () => {
    const removed = store.prune(['cat']);

    expect(removed).toBe(2);
    expect(store.nodeIds).toEqual(['cat']);
  });

  test('should filter into a new store', () => {
    const subset = store.filtered(['car', 'unknown']);

    expect(subset.nodeIds).toEqual(['car']);
    expect(store.size).toBe(3);
  });

  test('should merge another store, overwriting shared ids', () => {
    store.merge(TestHelpers.embeddings({ cat: [0, 0, 1], dog: [0, 1, 1] }));

    expect(store.get('cat')).toEqual([0, 0, 1]);
    expect(store.get('dog')).toEqual([0, 1, 1]);
    expect(store.size).toBe(4);
  });

  test('should round-trip through a plain record', () => {
    const copy = NodeEmbeddings.fromRecord(store.toRecord());

    expect(copy.toRecord()).toEqual(store.toRecord());
  });

  test('should clone independently', () => {
    const copy = store.clone();
    copy.remove('cat');

    expect(store.has('cat')).toBe(true);
  });
});
