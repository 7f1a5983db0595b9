// ============================================================================
// Tests: Identity Platform Token Client
// ============================================================================
//
// fetch is stubbed globally; responses are plain objects exposing the
// Response members the client reads.

import { describe, test, expect, vi, beforeEach, afterEach } from 'vitest';
import { buildAuthorizationUrl, createIdentityClient, tokenEndpoint } from '../identity-client.js';
import { AuthError } from '../errors.js';

const settings = {
  clientId: 'client-123',
  clientSecret: 'test-secret',
  tenantId: 'common',
  authorityHost: 'https://login.example.test',
};

const REDIRECT_URI = 'http://localhost:8080/callback';
const now = () => 1_700_000_000_000;

const mockFetch = vi.fn();

function jsonResponse(status: number, statusText: string, body: unknown) {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText,
    text: async () => (typeof body === 'string' ? body : JSON.stringify(body)),
  };
}

function sentForm(): Array<[string, string]> {
  const [, init] = mockFetch.mock.calls[0];
  return [...new URLSearchParams(init.body).entries()];
}

beforeEach(() => {
  vi.stubGlobal('fetch', mockFetch);
  mockFetch.mockReset();
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllGlobals();
});

// ============================================================================
// Endpoints
// ============================================================================

describe('endpoints', () => {
  test('token endpoint is tenant scoped', () => {
    expect(tokenEndpoint(settings)).toBe('https://login.example.test/common/oauth2/v2.0/token');
  });

  test('authorization URL carries the sign-in parameters in order', () => {
    expect(buildAuthorizationUrl(settings, REDIRECT_URI, 'state-1')).toBe(
      'https://login.example.test/common/oauth2/v2.0/authorize' +
        '?client_id=client-123' +
        '&response_type=code' +
        '&redirect_uri=http%3A%2F%2Flocalhost%3A8080%2Fcallback' +
        '&response_mode=query' +
        '&scope=offline_access+Mail.Send' +
        '&state=state-1',
    );
  });

  test('authorization URL omits state when none is given', () => {
    expect(new URL(buildAuthorizationUrl(settings, REDIRECT_URI)).searchParams.has('state')).toBe(false);
  });
});

// ============================================================================
// exchange
// ============================================================================

describe('exchange', () => {
  test('posts the authorization code grant and stamps expires_at', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse(200, 'OK', {
      access_token: 'access-1',
      token_type: 'Bearer',
      expires_in: 3600,
      refresh_token: 'refresh-1',
    }));

    const credential = await createIdentityClient(settings, now).exchange('auth-code-1', REDIRECT_URI);

    expect(credential).toEqual({
      access_token: 'access-1',
      token_type: 'Bearer',
      expires_in: 3600,
      refresh_token: 'refresh-1',
      expires_at: 1_700_003_600,
    });

    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('https://login.example.test/common/oauth2/v2.0/token');
    expect(init.method).toBe('POST');
    expect(init.headers['Content-Type']).toBe('application/x-www-form-urlencoded');
    expect(sentForm()).toEqual([
      ['client_id', 'client-123'],
      ['scope', 'Mail.Send'],
      ['code', 'auth-code-1'],
      ['redirect_uri', REDIRECT_URI],
      ['grant_type', 'authorization_code'],
      ['client_secret', 'test-secret'],
    ]);
  });

  test('throws AUTH_TOKEN_REQUEST_FAILED on network failure', async () => {
    mockFetch.mockRejectedValueOnce(new Error('Connection refused'));

    await expect(createIdentityClient(settings, now).exchange('auth-code-1', REDIRECT_URI)).rejects.toMatchObject({
      code: 'AUTH_TOKEN_REQUEST_FAILED',
      message: 'Token request (authorization_code) failed: Connection refused',
    });
  });

  test('keeps a non-JSON error body verbatim', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse(503, 'Service Unavailable', 'upstream down'));

    await expect(createIdentityClient(settings, now).exchange('auth-code-1', REDIRECT_URI)).rejects.toMatchObject({
      code: 'AUTH_TOKEN_REJECTED',
      message: 'Token request (authorization_code) rejected: 503 Service Unavailable',
      statusCode: 503,
      responseBody: 'upstream down',
    });
  });

  test('throws AUTH_TOKEN_MALFORMED when the body is not JSON', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse(200, 'OK', '<html>'));

    await expect(createIdentityClient(settings, now).exchange('auth-code-1', REDIRECT_URI)).rejects.toMatchObject({
      code: 'AUTH_TOKEN_MALFORMED',
    });
  });
});

// ============================================================================
// refresh
// ============================================================================

describe('refresh', () => {
  test('posts the refresh grant with the Graph default scope', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse(200, 'OK', {
      access_token: 'access-2',
      token_type: 'Bearer',
      expires_in: 600,
    }));

    const credential = await createIdentityClient(settings, now).refresh('refresh-1');

    expect(credential.expires_at).toBe(1_700_000_600);
    expect(credential.refresh_token).toBeUndefined();
    expect(sentForm()).toEqual([
      ['client_id', 'client-123'],
      ['scope', 'https://graph.microsoft.com/.default'],
      ['refresh_token', 'refresh-1'],
      ['grant_type', 'refresh_token'],
      ['client_secret', 'test-secret'],
    ]);
  });

  test('surfaces the first line of error_description on rejection', async () => {
    const body = {
      error: 'invalid_grant',
      error_description: 'AADSTS70000: The grant is expired.\r\nTrace ID: trace-1',
    };
    mockFetch.mockResolvedValueOnce(jsonResponse(400, 'Bad Request', body));

    const error = await createIdentityClient(settings, now).refresh('refresh-1').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(AuthError);
    expect(error).toMatchObject({
      code: 'AUTH_TOKEN_REJECTED',
      message: 'Token request (refresh_token) rejected: 400 Bad Request (AADSTS70000: The grant is expired.)',
      statusCode: 400,
      responseBody: JSON.stringify(body),
    });
  });

  test('names the missing fields of an incomplete token response', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse(200, 'OK', { token_type: 'Bearer', expires_in: 600 }));

    await expect(createIdentityClient(settings, now).refresh('refresh-1')).rejects.toMatchObject({
      code: 'AUTH_TOKEN_MALFORMED',
      message: 'Token response (refresh_token) is missing or has invalid fields: access_token',
    });
  });
});
