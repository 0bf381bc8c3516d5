// src/retrieval/types.ts

/**
 * @file Canonical shapes produced by retrieval: fragments and the result that carries them.
 */

/**
 * One retrieved snippet of source content with a relevance score.
 * Instances are frozen once built.
 */
export interface Fragment {
  readonly content: string;
  /** Where the snippet came from, e.g. `rag:veda1.txt` or `fallback:error`. */
  readonly sourceId: string;
  /** Relevance in [0, 1]; fallbacks carry {@link FALLBACK_SCORE}. */
  readonly score: number;
  readonly documentId: string;
  /** The collection the fragment belongs to, e.g. `rag_api`. */
  readonly originRegion: string;
}

/** Score carried by the single fragment of a fallback result. */
export const FALLBACK_SCORE = 0.1;

export interface RetrievalMetadata {
  readonly retriever: string;
  readonly totalResults: number;
  readonly hasSynthesizedAnswer: boolean;
  /** Timestamp reported by the upstream, or '' when absent. */
  readonly timestamp: string;
  /** Why the result is a fallback. */
  readonly error?: string;
  readonly requestedTopK?: number;
}

/**
 * The normalized outcome of one retrieval query.
 * `fragments` is always present: an empty array means "no matches".
 */
export interface RetrievalResult {
  /** Whether the fragments came from the upstream service or were synthesized locally. */
  readonly origin: 'upstream' | 'fallback';
  readonly fragments: readonly Fragment[];
  readonly synthesizedAnswer?: string;
  readonly statusCode: number;
  readonly query: string;
  /** Duplicate-free labels describing how the result was produced. */
  readonly tags: readonly string[];
  readonly metadata: RetrievalMetadata;
}

/** Availability report of a retrieval upstream. */
export interface RetrievalHealth {
  available: boolean;
  status: 'healthy' | 'unhealthy';
  apiUrl: string;
  error?: string;
}

/** What an orchestrator needs from a retrieval client. */
export interface IRetrievalClient {
  query(query: string, topK?: number): Promise<RetrievalResult>;
  healthCheck(): Promise<RetrievalHealth>;
}
