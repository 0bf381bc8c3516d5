// src/retrieval/__tests__/normalizer.test.ts

import { normalizeChunk, normalizeRetrievalPayload, UPSTREAM_TAGS } from '../normalizer';

describe('normalizeRetrievalPayload', () => {
  it('should map a chunk onto a fragment', () => {
    const result = normalizeRetrievalPayload(
      { retrieved_chunks: [{ content: 'Dharma is duty', file: 'veda1.txt', score: 0.9, index: 0 }], groq_answer: '' },
      'What is dharma?'
    );

    expect(result.origin).toBe('upstream');
    expect(result.statusCode).toBe(200);
    expect(result.query).toBe('What is dharma?');
    expect(result.fragments).toEqual([
      { content: 'Dharma is duty', sourceId: 'rag:veda1.txt', score: 0.9, documentId: 'veda1.txt_0', originRegion: 'rag_api' },
    ]);
    expect(result.synthesizedAnswer).toBeUndefined();
    expect(result.tags).toEqual(['semantic_search', 'rag_api', 'groq_enhanced']);
    expect(result.metadata).toEqual({
      retriever: 'external_rag_api',
      totalResults: 1,
      hasSynthesizedAnswer: false,
      timestamp: '',
    });
  });

  it('should keep the synthesized answer and timestamp', () => {
    const result = normalizeRetrievalPayload(
      { retrieved_chunks: [], groq_answer: 'Dharma means duty.', timestamp: '2024-05-01T10:00:00Z' },
      'q'
    );

    expect(result.synthesizedAnswer).toBe('Dharma means duty.');
    expect(result.metadata.hasSynthesizedAnswer).toBe(true);
    expect(result.metadata.timestamp).toBe('2024-05-01T10:00:00Z');
    expect(result.metadata.totalResults).toBe(0);
  });

  it('should preserve the upstream order of chunks', () => {
    const result = normalizeRetrievalPayload(
      {
        retrieved_chunks: [
          { content: 'low', file: 'a.txt', score: 0.2, index: 0 },
          { content: 'high', file: 'b.txt', score: 0.9, index: 1 },
        ],
      },
      'q'
    );

    expect(result.fragments.map((fragment) => fragment.content)).toEqual(['low', 'high']);
  });

  it.each([[null], ['oops'], [42], [[]], [{ retrieved_chunks: 'nope' }], [{}]])(
    'should yield no fragments for malformed payload %p',
    (payload) => {
      const result = normalizeRetrievalPayload(payload, 'q');
      expect(result.fragments).toEqual([]);
      expect(result.origin).toBe('upstream');
    }
  );

  it('should be deterministic for the same input', () => {
    const payload = { retrieved_chunks: [{ content: 'c', file: 'f.txt', score: '0.5', index: 3 }], groq_answer: 'a' };
    expect(normalizeRetrievalPayload(payload, 'q')).toEqual(normalizeRetrievalPayload(payload, 'q'));
  });

  it('should return a fresh copy of the tags', () => {
    const result = normalizeRetrievalPayload({}, 'q');
    expect(result.tags).not.toBe(UPSTREAM_TAGS);
    expect(result.tags).toEqual(UPSTREAM_TAGS);
  });
});

describe('normalizeChunk', () => {
  it('should default every missing field', () => {
    expect(normalizeChunk({})).toEqual({
      content: '',
      sourceId: 'rag:unknown',
      score: 0,
      documentId: 'unknown_0',
      originRegion: 'rag_api',
    });
  });

  it('should treat a non-object chunk as empty', () => {
    expect(normalizeChunk('just text').sourceId).toBe('rag:unknown');
  });

  it.each([
    ['0.42', 0.42],
    ['abc', 0],
    [1.7, 1],
    [-0.3, 0],
    [null, 0],
  ])('should coerce and clamp score %p to %p', (score, expected) => {
    expect(normalizeChunk({ file: 'f.txt', score }).score).toBe(expected);
  });

  it('should accept string indexes and ignore other index types', () => {
    expect(normalizeChunk({ file: 'f.txt', index: 'a3' }).documentId).toBe('f.txt_a3');
    expect(normalizeChunk({ file: 'f.txt', index: { n: 1 } }).documentId).toBe('f.txt_0');
  });

  it('should return frozen fragments', () => {
    expect(Object.isFrozen(normalizeChunk({ file: 'f.txt' }))).toBe(true);
  });
});
