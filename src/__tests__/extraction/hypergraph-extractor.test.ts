/**
 * Unit tests for LLM fact extraction over chunks and documents
 */

import { chunkIdFor } from '../../extraction/hypergraph-builder.js';
import { HypergraphExtractor } from '../../extraction/hypergraph-extractor.js';
import { DISTILLATION_PROMPT, EXTRACTION_PROMPT, extractionUserPrompt } from '../../extraction/prompts.js';
import { GenerationError } from '../../utils/error-handler.js';
import { StubLLM, TestHelpers } from '../helpers.js';

const graphenePayload = JSON.stringify({
  events: [
    { source: 'Graphene', relation: 'conducts', target: ['electricity'] },
    { source: ['it'], relation: 'has', target: ['strength'] }
  ]
});

const steelPayload = JSON.stringify({
  events: [{ source: ['Steel'], relation: 'contains', target: ['iron', 'carbon'] }]
});

describe('HypergraphExtractor', () => {
  test('should extract facts from text into an edge per fact', async () => {
    const llm = new StubLLM(() => graphenePayload);
    const extractor = new HypergraphExtractor(llm);
    const text = 'Graphene conducts electricity. It is strong.';

    const { hypergraph, metadata } = await extractor.extractFromText(text);
    const chunkId = chunkIdFor(text);

    expect(TestHelpers.incidenceOf(hypergraph)).toEqual({ [`conducts_chunk${chunkId}_0`]: ['Graphene', 'electricity'] });
    expect(metadata.map(entry => entry.chunkId)).toEqual([chunkId]);
    expect(llm.calls).toEqual([
      {
        systemPrompt: EXTRACTION_PROMPT,
        userPrompt: extractionUserPrompt(text),
        options: { model: undefined },
        structured: true
      }
    ]);
  });

  test('should distill the text before extraction when asked', async () => {
    const llm = new StubLLM(call => (call.structured ? steelPayload : 'Steel contains iron and carbon.'));
    const extractor = new HypergraphExtractor(llm, { model: 'extract-model' });

    await extractor.extractFromText('Steel, an alloy, contains iron and some carbon.', true);

    expect(llm.calls.map(call => call.systemPrompt)).toEqual([DISTILLATION_PROMPT, EXTRACTION_PROMPT]);
    expect(llm.calls[1].userPrompt).toBe(extractionUserPrompt('Steel contains iron and carbon.'));
    expect(llm.calls[1].options).toEqual({ model: 'extract-model' });
  });

  test('should wrap unexpected failures in a GenerationError', async () => {
    const extractor = new HypergraphExtractor(StubLLM.sequence([new TypeError('socket hang up')]));

    await expect(extractor.extractFromText('x')).rejects.toThrow('Fact extraction failed: socket hang up');
  });

  test('should skip chunks that keep failing and keep the rest', async () => {
    const llm = new StubLLM(call => {
      if (call.userPrompt.includes('Steel')) throw new GenerationError('model overloaded');
      return graphenePayload;
    });
    const extractor = new HypergraphExtractor(llm, { chunkSize: 40, retry: { maxRetries: 1, baseDelayMs: 1 } });

    const result = await extractor.extractFromDocument('Graphene conducts electricity.\n\nSteel contains iron.');

    expect(result.chunks.size).toBe(2);
    expect(result.hypergraph.edgeCount).toBe(1);
    expect(result.failures).toHaveLength(1);
    expect(result.failures[0].chunkId).toBe(chunkIdFor('Steel contains iron.'));
    expect(result.failures[0].error.message).toBe('model overloaded');
  });

  test('should retry a chunk until it succeeds', async () => {
    const llm = StubLLM.sequence([new GenerationError('timeout'), steelPayload]);
    const extractor = new HypergraphExtractor(llm, { retry: { maxRetries: 2, baseDelayMs: 1 } });

    const result = await extractor.extractFromDocument('Steel contains iron and carbon.');

    expect(result.failures).toEqual([]);
    expect(TestHelpers.sorted(result.hypergraph.nodes)).toEqual(['Steel', 'carbon', 'iron']);
    expect(llm.calls).toHaveLength(2);
  });

  test('should merge the graphs of several documents', async () => {
    const llm = new StubLLM(call => (call.userPrompt.includes('Steel') ? steelPayload : graphenePayload));
    const extractor = new HypergraphExtractor(llm, { retry: { maxRetries: 1 } });

    const result = await extractor.processAndMergeDocuments([
      { id: 'doc-1', text: 'Graphene conducts electricity.' },
      { id: 'doc-2', text: 'Steel contains iron.' }
    ]);

    expect(result.hypergraph.edgeCount).toBe(2);
    expect(result.metadata.map(entry => entry.relation)).toEqual(['conducts', 'contains']);
    expect(result.chunks.size).toBe(2);
  });
});
