// src/gateway/__tests__/authenticated-gateway.test.ts

import { AuthenticatedGateway } from '../authenticated-gateway';
import { FetchMock, jsonResponse, routeFetch, sentBody, sentHeaders, textResponse } from './fetch-fakes';

const credentials = { username: 'mentor', password: 'test-secret' };

function createGateway(fetchImpl: FetchMock): AuthenticatedGateway {
  return new AuthenticatedGateway({ baseUrl: 'https://content.test', credentials, fetchImpl });
}

describe('AuthenticatedGateway', () => {
  beforeEach(() => {
    jest.spyOn(console, 'info').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should log in on construction and attach the bearer token to calls', async () => {
    const fetchImpl = routeFetch({
      '/api/v1/auth/login': () => jsonResponse({ access_token: 'test-token' }),
      '/api/v1/content/create': () => jsonResponse({ content_id: 'c-1' }),
    });
    const gateway = createGateway(fetchImpl);

    expect(await gateway.whenReady()).toBe(true);
    expect(gateway.isAuthenticated()).toBe(true);

    const result = await gateway.call('/api/v1/content/create', { text: 'x' });

    expect(result).toEqual({ ok: true, status: 200, data: { content_id: 'c-1' } });
    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(fetchImpl.mock.calls[0][0]).toBe('https://content.test/api/v1/auth/login');
    expect(sentBody(fetchImpl, 0)).toEqual(credentials);
    expect(sentHeaders(fetchImpl, 0).Authorization).toBeUndefined();
    expect(sentHeaders(fetchImpl, 1).Authorization).toBe('Bearer test-token');
  });

  it('should log in again before a call when the first login failed', async () => {
    const logins = [textResponse('down', 503, 'Service Unavailable'), jsonResponse({ access_token: 'second-token' })];
    const fetchImpl = routeFetch({
      '/api/v1/auth/login': () => logins.shift() || textResponse('unexpected', 500),
      '/api/v1/content/create': () => jsonResponse({ content_id: 'c-2' }),
    });
    const gateway = createGateway(fetchImpl);

    expect(await gateway.whenReady()).toBe(false);

    const result = await gateway.call('/api/v1/content/create', {});

    expect(result.ok).toBe(true);
    expect(fetchImpl).toHaveBeenCalledTimes(3);
    expect(sentHeaders(fetchImpl, 2).Authorization).toBe('Bearer second-token');
    expect(gateway.isAuthenticated()).toBe(true);
  });

  it('should send the call without a token when login keeps failing', async () => {
    const fetchImpl = routeFetch({
      '/api/v1/auth/login': () => jsonResponse({ message: 'no token here' }),
      '/api/v1/content/create': () => textResponse('unauthorized', 401, 'Unauthorized'),
    });
    const gateway = createGateway(fetchImpl);

    const result = await gateway.call('/api/v1/content/create', {});

    expect(result).toEqual({
      ok: false,
      status: 401,
      error: 'POST https://content.test/api/v1/content/create failed with status 401: Unauthorized',
      body: 'unauthorized',
    });
    expect(fetchImpl).toHaveBeenCalledTimes(3);
    expect(sentHeaders(fetchImpl, 2).Authorization).toBeUndefined();
    expect(gateway.isAuthenticated()).toBe(false);
  });

  it('should not refresh a held token when a call returns 401', async () => {
    const fetchImpl = routeFetch({
      '/api/v1/auth/login': () => jsonResponse({ access_token: 'expired-token' }),
      '/api/v1/content/create': () => textResponse('', 401, 'Unauthorized'),
    });
    const gateway = createGateway(fetchImpl);

    const result = await gateway.call('/api/v1/content/create', {});

    expect(result.status).toBe(401);
    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(gateway.isAuthenticated()).toBe(true);
  });

  it('should use a custom login endpoint', async () => {
    const fetchImpl = routeFetch({ '/auth': () => jsonResponse({ access_token: 't' }) });
    const gateway = new AuthenticatedGateway({
      baseUrl: 'https://content.test',
      credentials,
      loginEndpoint: '/auth',
      fetchImpl,
    });

    expect(await gateway.whenReady()).toBe(true);
    expect(fetchImpl.mock.calls[0][0]).toBe('https://content.test/auth');
  });
});
