// src/gateway/types.ts

/**
 * @file Result types returned by the HTTP gateways.
 */

/** Status reported when the upstream could not be reached at all (network error, timeout). */
export const UNREACHABLE_STATUS = 0;

export interface GatewaySuccess<T> {
  ok: true;
  /** The 2xx status returned by the upstream. */
  status: number;
  data: T;
}

/**
 * A failed call. Carries the upstream status, or {@link UNREACHABLE_STATUS}, and a
 * diagnostic message. Gateways return this instead of throwing.
 */
export interface TransportFailure {
  ok: false;
  status: number;
  error: string;
  /** Parsed error body when the upstream sent one. */
  body?: unknown;
}

export type GatewayResult<T = unknown> = GatewaySuccess<T> | TransportFailure;

/** The subset of the global `fetch` signature the gateways rely on. */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpGatewayOptions {
  /** Base URL every endpoint is resolved against. */
  baseUrl: string;
  /** Headers sent with every request, merged over the gateway defaults. */
  defaultHeaders?: Record<string, string>;
  /** Timeout used when a call does not pass one. @default 30 */
  defaultTimeoutSeconds?: number;
  /** Replacement for the global `fetch`, mainly for tests. */
  fetchImpl?: FetchLike;
  /** Label used in log lines. @default 'HttpGateway' */
  label?: string;
}

export interface GatewayCredentials {
  username: string;
  password: string;
}

export interface AuthenticatedGatewayOptions extends HttpGatewayOptions {
  credentials: GatewayCredentials;
  /** Login endpoint, relative to the base URL. @default '/api/v1/auth/login' */
  loginEndpoint?: string;
  /** Timeout for the login call. @default 30 */
  loginTimeoutSeconds?: number;
}
