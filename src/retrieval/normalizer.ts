// src/retrieval/normalizer.ts

/**
 * @file Maps the retrieval service's JSON payload onto a {@link RetrievalResult}.
 *
 * Expected input: `{ retrieved_chunks: [{ content, file, score, index }], groq_answer, timestamp? }`.
 * Every field is optional as far as this module is concerned: a malformed field takes
 * its default value and normalization carries on.
 */

import { Fragment, RetrievalResult } from './types';
import { asJsonObject, clamp, coerceNumber, coerceString } from '../core/utils';

export const UPSTREAM_TAGS: readonly string[] = ['semantic_search', 'rag_api', 'groq_enhanced'];
export const UPSTREAM_ORIGIN_REGION = 'rag_api';

/** Builds a frozen fragment. */
export function createFragment(fields: Fragment): Fragment {
  return Object.freeze({
    content: fields.content,
    sourceId: fields.sourceId,
    score: fields.score,
    documentId: fields.documentId,
    originRegion: fields.originRegion,
  });
}

/**
 * Converts one raw chunk. Non-object chunks are treated as empty objects.
 */
export function normalizeChunk(rawChunk: unknown): Fragment {
  const chunk = asJsonObject(rawChunk);
  const file = coerceString(chunk.file) || 'unknown';
  const index = typeof chunk.index === 'number' || typeof chunk.index === 'string' ? chunk.index : 0;

  return createFragment({
    content: coerceString(chunk.content),
    sourceId: `rag:${file}`,
    score: clamp(coerceNumber(chunk.score, 0), 0, 1),
    documentId: `${file}_${index}`,
    originRegion: UPSTREAM_ORIGIN_REGION,
  });
}

/**
 * Normalizes a raw retrieval payload. Pure: the same input always yields an equal result.
 * Fragment order follows the upstream order.
 */
export function normalizeRetrievalPayload(rawPayload: unknown, originalQuery: string): RetrievalResult {
  const payload = asJsonObject(rawPayload);
  const rawChunks = Array.isArray(payload.retrieved_chunks) ? payload.retrieved_chunks : [];
  const fragments = rawChunks.map(normalizeChunk);
  const synthesizedAnswer = coerceString(payload.groq_answer);

  return {
    origin: 'upstream',
    fragments,
    synthesizedAnswer: synthesizedAnswer || undefined,
    statusCode: 200,
    query: originalQuery,
    tags: [...UPSTREAM_TAGS],
    metadata: {
      retriever: 'external_rag_api',
      totalResults: fragments.length,
      hasSynthesizedAnswer: synthesizedAnswer !== '',
      timestamp: coerceString(payload.timestamp),
    },
  };
}
