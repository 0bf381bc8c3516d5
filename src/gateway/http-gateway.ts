// src/gateway/http-gateway.ts

/**
 * @file HttpGateway wraps every request to one upstream service.
 * It attaches the default headers, enforces a timeout per call and turns every
 * transport-level failure into a {@link TransportFailure} value instead of throwing.
 * Requests go through the global `fetch`, whose dispatcher keeps a pooled
 * keep-alive connection per origin, so one gateway instance per service is enough.
 */

import { FetchLike, GatewayResult, HttpGatewayOptions, UNREACHABLE_STATUS } from './types';
import { errorMessage } from '../core/utils';

const DEFAULT_HEADERS: Record<string, string> = {
  'Content-Type': 'application/json',
  'User-Agent': 'Knowledge-Mentor-Client/1.0',
};

type HttpMethod = 'GET' | 'POST';

export class HttpGateway {
  protected readonly baseUrl: string;
  protected readonly label: string;
  private readonly headers: Record<string, string>;
  private readonly defaultTimeoutSeconds: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: HttpGatewayOptions) {
    this.baseUrl = options.baseUrl;
    this.label = options.label || 'HttpGateway';
    this.headers = { ...DEFAULT_HEADERS, ...options.defaultHeaders };
    this.defaultTimeoutSeconds = options.defaultTimeoutSeconds ?? 30;
    // Resolved at call time so a replaced global fetch is picked up.
    this.fetchImpl = options.fetchImpl || ((input, init) => fetch(input, init));
  }

  /**
   * POSTs a JSON payload to an endpoint.
   * @param endpoint Path relative to the base URL, an absolute URL, or '' for the base URL itself.
   * @returns The parsed JSON body and status, or a TransportFailure. Never rejects.
   */
  async call(endpoint: string, payload: unknown, timeoutSeconds?: number): Promise<GatewayResult> {
    return this.request('POST', endpoint, payload, timeoutSeconds);
  }

  /** GETs an endpoint. Same failure contract as {@link call}. */
  async get(endpoint: string, timeoutSeconds?: number): Promise<GatewayResult> {
    return this.request('GET', endpoint, undefined, timeoutSeconds);
  }

  public getBaseUrl(): string {
    return this.baseUrl;
  }

  /**
   * Extra headers for an outgoing request. Subclasses override this to add credentials.
   */
  protected async authorizationHeaders(): Promise<Record<string, string>> {
    return {};
  }

  private async request(
    method: HttpMethod,
    endpoint: string,
    payload: unknown,
    timeoutSeconds?: number
  ): Promise<GatewayResult> {
    const headers = { ...this.headers, ...(await this.authorizationHeaders()) };
    return this.send(method, endpoint, payload, timeoutSeconds, headers);
  }

  /**
   * Performs the HTTP exchange with an explicit header set.
   * @internal Used directly by subclasses for calls that must skip {@link authorizationHeaders}.
   */
  protected async send(
    method: HttpMethod,
    endpoint: string,
    payload: unknown,
    timeoutSeconds: number | undefined,
    headers: Record<string, string> = this.headers
  ): Promise<GatewayResult> {
    const url = this.resolveUrl(endpoint);
    const seconds = timeoutSeconds ?? this.defaultTimeoutSeconds;
    const opLabel = `${method} ${url}`;

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers,
        body: payload === undefined ? undefined : JSON.stringify(payload),
        signal: AbortSignal.timeout(seconds * 1000),
      });
    } catch (networkError: unknown) {
      const timedOut =
        networkError instanceof Error && (networkError.name === 'TimeoutError' || networkError.name === 'AbortError');
      const message = timedOut ? `timed out after ${seconds}s` : errorMessage(networkError);
      console.error(`[${this.label}] Network error during ${opLabel}: ${message}`);
      return { ok: false, status: UNREACHABLE_STATUS, error: `Network error for ${opLabel}: ${message}` };
    }

    const text = await this.readBody(response, opLabel);

    if (!response.ok) {
      const error = `${opLabel} failed with status ${response.status}: ${response.statusText}`;
      console.error(`[${this.label}] ${error}.`, 'Response body:', text || '(empty body)');
      return { ok: false, status: response.status, error, body: parseJsonOrText(text) };
    }

    if (text.trim() === '') {
      return { ok: true, status: response.status, data: null };
    }

    try {
      return { ok: true, status: response.status, data: JSON.parse(text) };
    } catch (parseError: unknown) {
      const error = `${opLabel} returned status ${response.status} with a body that is not JSON: ${errorMessage(parseError)}`;
      console.warn(`[${this.label}] ${error}`);
      return { ok: false, status: response.status, error, body: text };
    }
  }

  private async readBody(response: Response, opLabel: string): Promise<string> {
    try {
      return await response.text();
    } catch (readError: unknown) {
      console.warn(`[${this.label}] Could not read response body of ${opLabel}: ${errorMessage(readError)}`);
      return '';
    }
  }

  private resolveUrl(endpoint: string): string {
    if (endpoint === '') {
      return this.baseUrl;
    }
    if (/^https?:\/\//i.test(endpoint)) {
      return endpoint;
    }
    const base = this.baseUrl.replace(/\/+$/, '');
    return endpoint.startsWith('/') ? `${base}${endpoint}` : `${base}/${endpoint}`;
  }
}

function parseJsonOrText(text: string): unknown {
  if (!text) {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}
