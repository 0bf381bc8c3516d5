// src/fallback/synthesizer.ts

/**
 * @file Deterministic substitutes used when an upstream call cannot be completed,
 * so callers never receive an absent result. Nothing here is random or time-dependent.
 */

import { FALLBACK_SCORE, RetrievalResult } from '../retrieval/types';
import { createFragment } from '../retrieval/normalizer';
import { truncateCodePoints } from '../core/utils';

export const FALLBACK_TAGS: readonly string[] = ['fallback', 'error'];
export const FALLBACK_STATUS_CODE = 503;
export const FALLBACK_SOURCE_ID = 'fallback:error';

/** Number of knowledge-context characters quoted in a completion fallback. */
export const FALLBACK_CONTEXT_PREVIEW_LENGTH = 500;

/**
 * Wording of a completion fallback. Each persona supplies its own.
 */
export interface CompletionFallbackTemplate {
  /** Inserted as "As your <mentorRole>, I'm here to help you understand ..." */
  mentorRole: string;
  /** Precedes the quoted knowledge context. */
  contextLead: string;
  /** Used instead of the context when none was retrieved. */
  noContextLine: string;
  /** Appended after a blank line. */
  closing: string;
}

export const EDUCATIONAL_FALLBACK_TEMPLATE: CompletionFallbackTemplate = {
  mentorRole: 'educational mentor',
  contextLead: 'Based on educational principles: ',
  noContextLine: "Learning is a journey of discovery. Let's break this down step by step.",
  closing: 'Remember, understanding comes from consistent practice and asking questions. Keep exploring!',
};

/**
 * Builds the retrieval result returned when the retrieval service failed.
 * @param reason Diagnostic kept in the metadata.
 */
export function createRetrievalFallback(query: string, topK: number, reason = 'RAG API unavailable'): RetrievalResult {
  return {
    origin: 'fallback',
    fragments: [
      createFragment({
        content: `I apologize, but I'm currently unable to access the knowledge base. Your query was: '${query}'`,
        sourceId: FALLBACK_SOURCE_ID,
        score: FALLBACK_SCORE,
        documentId: 'fallback-001',
        originRegion: 'fallback',
      }),
    ],
    synthesizedAnswer: `I apologize, but I'm currently unable to access the knowledge base to provide a comprehensive answer to your query: '${query}'. Please try again later.`,
    statusCode: FALLBACK_STATUS_CODE,
    query,
    tags: [...FALLBACK_TAGS],
    metadata: {
      retriever: 'none',
      totalResults: 1,
      hasSynthesizedAnswer: true,
      timestamp: '',
      error: reason,
      requestedTopK: topK,
    },
  };
}

/**
 * Builds the text returned in place of a completion.
 * @param knowledgeContext Retrieved context; only its first 500 code points are quoted.
 */
export function createCompletionFallback(
  query: string,
  knowledgeContext = '',
  template: CompletionFallbackTemplate = EDUCATIONAL_FALLBACK_TEMPLATE
): string {
  let text = `As your ${template.mentorRole}, I'm here to help you understand '${query}'. `;

  if (knowledgeContext) {
    text += `${template.contextLead}${truncateCodePoints(knowledgeContext, FALLBACK_CONTEXT_PREVIEW_LENGTH)}...`;
  } else {
    text += template.noContextLine;
  }

  return `${text}\n\n${template.closing}`;
}
