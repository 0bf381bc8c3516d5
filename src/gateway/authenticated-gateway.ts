// src/gateway/authenticated-gateway.ts

import { HttpGateway } from './http-gateway';
import { AuthenticatedGatewayOptions, GatewayCredentials } from './types';
import { isJsonObject } from '../core/utils';

/**
 * An HttpGateway that exchanges fixed credentials for a bearer token and sends it
 * with every call.
 *
 * Login starts in the constructor and is awaited by the first call. If no token is
 * held when a call is made, the gateway logs in once more before sending it.
 * Tokens are never refreshed on expiry: a 401 comes back as an ordinary TransportFailure.
 *
 * The token is read and rewritten without a lock. Concurrent callers that all find it
 * missing may each log in; the last token written wins.
 */
export class AuthenticatedGateway extends HttpGateway {
  private readonly credentials: GatewayCredentials;
  private readonly loginEndpoint: string;
  private readonly loginTimeoutSeconds: number;
  private token: string | null = null;
  private authenticationPromise: Promise<boolean>;

  constructor(options: AuthenticatedGatewayOptions) {
    super({ ...options, label: options.label || 'AuthenticatedGateway' });
    this.credentials = options.credentials;
    this.loginEndpoint = options.loginEndpoint || '/api/v1/auth/login';
    this.loginTimeoutSeconds = options.loginTimeoutSeconds ?? 30;
    this.authenticationPromise = this.authenticate();
  }

  /**
   * Logs in and stores the returned `access_token`.
   * @returns true when a token is now held. Never rejects.
   */
  async authenticate(): Promise<boolean> {
    const result = await this.send('POST', this.loginEndpoint, this.credentials, this.loginTimeoutSeconds);

    if (result.ok && isJsonObject(result.data) && typeof result.data.access_token === 'string' && result.data.access_token) {
      this.token = result.data.access_token;
      console.info(`[${this.label}] Authentication successful.`);
      return true;
    }

    this.token = null;
    const reason = result.ok ? 'response carried no access_token' : result.error;
    console.error(`[${this.label}] Authentication failed: ${reason}`);
    return false;
  }

  /** Resolves once the pending login (if any) has settled. */
  async whenReady(): Promise<boolean> {
    return this.authenticationPromise;
  }

  public isAuthenticated(): boolean {
    return this.token !== null;
  }

  protected async authorizationHeaders(): Promise<Record<string, string>> {
    await this.ensureAuthenticated();
    if (!this.token) {
      console.warn(`[${this.label}] Sending request without a bearer token.`);
      return {};
    }
    return { Authorization: `Bearer ${this.token}` };
  }

  private async ensureAuthenticated(): Promise<void> {
    await this.authenticationPromise;
    if (!this.token) {
      this.authenticationPromise = this.authenticate();
      await this.authenticationPromise;
    }
  }
}
