// src/retrieval/rag-client.ts

/**
 * @file Client for the external retrieval (RAG) API.
 */

import { HttpGateway } from '../gateway/http-gateway';
import { IRetrievalClient, RetrievalHealth, RetrievalResult } from './types';
import { normalizeRetrievalPayload } from './normalizer';
import { createRetrievalFallback } from '../fallback/synthesizer';
import { truncateForLog } from '../core/utils';

export interface RagClientOptions {
  /** Timeout of each query. @default 30 */
  timeoutSeconds?: number;
  /** `top_k` sent when a query does not pass one. @default 5 */
  defaultTopK?: number;
}

/**
 * Queries the retrieval service through a gateway whose base URL is the query endpoint.
 * Every failure is folded into a fallback result; `query` never rejects.
 */
export class RagClient implements IRetrievalClient {
  private gateway: HttpGateway;
  private timeoutSeconds: number;
  private defaultTopK: number;

  constructor(gateway: HttpGateway, options: RagClientOptions = {}) {
    this.gateway = gateway;
    this.timeoutSeconds = options.timeoutSeconds ?? 30;
    this.defaultTopK = options.defaultTopK ?? 5;
  }

  async query(query: string, topK: number = this.defaultTopK): Promise<RetrievalResult> {
    console.info(`[RagClient] Querying RAG API: '${truncateForLog(query)}'`);

    const result = await this.gateway.call('', { query, top_k: topK }, this.timeoutSeconds);

    if (!result.ok) {
      console.warn(`[RagClient] Creating fallback response: ${result.error}`);
      return createRetrievalFallback(query, topK, result.error);
    }
    if (result.status !== 200) {
      const reason = `RAG API answered with status ${result.status}`;
      console.warn(`[RagClient] Creating fallback response: ${reason}`);
      return createRetrievalFallback(query, topK, reason);
    }

    const normalized = normalizeRetrievalPayload(result.data, query);
    console.info(`[RagClient] RAG API returned ${normalized.fragments.length} chunks`);
    return normalized;
  }

  /**
   * Probes the service with a one-result test query.
   * A fallback result means the service is unavailable.
   */
  async healthCheck(): Promise<RetrievalHealth> {
    const apiUrl = this.gateway.getBaseUrl();
    const probe = await this.query('test', 1);

    if (probe.origin === 'upstream' && probe.statusCode === 200) {
      return { available: true, status: 'healthy', apiUrl };
    }
    return { available: false, status: 'unhealthy', apiUrl, error: probe.metadata.error };
  }
}
