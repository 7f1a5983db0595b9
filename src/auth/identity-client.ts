/**
 * Identity Platform Token Client
 *
 * Two POSTs to the tenant's v2.0 token endpoint, form-encoded:
 * - exchange(): grant_type=authorization_code, scope Mail.Send
 * - refresh():  grant_type=refresh_token, scope <graph>/.default
 *
 * Both return a Credential with expires_at stamped at acquisition time.
 * A single attempt per call; retry policy belongs to the caller.
 *
 * Security: never logs tokens, codes or the client secret.
 */

import { stampCredential } from './credential.js';
import { errorMessage } from '../errors.js';
import { AuthError } from './errors.js';
import { TokenResponseSchema } from './types.js';
import type { AuthSettings, Clock, Credential } from './types.js';

export const AUTHORIZATION_SCOPES = ['offline_access', 'Mail.Send'];
export const EXCHANGE_SCOPE = 'Mail.Send';
export const REFRESH_SCOPE = 'https://graph.microsoft.com/.default';

export interface IdentityClient {
  exchange(code: string, redirectUri: string): Promise<Credential>;
  refresh(refreshToken: string): Promise<Credential>;
}

type IdentitySettings = Pick<AuthSettings, 'clientId' | 'clientSecret' | 'tenantId' | 'authorityHost'>;

export function tokenEndpoint(settings: IdentitySettings): string {
  return `${settings.authorityHost}/${encodeURIComponent(settings.tenantId)}/oauth2/v2.0/token`;
}

export function authorizeEndpoint(settings: IdentitySettings): string {
  return `${settings.authorityHost}/${encodeURIComponent(settings.tenantId)}/oauth2/v2.0/authorize`;
}

/**
 * Builds the URL the user opens to sign in and consent.
 */
export function buildAuthorizationUrl(settings: IdentitySettings, redirectUri: string, state?: string): string {
  const url = new URL(authorizeEndpoint(settings));
  url.searchParams.set('client_id', settings.clientId);
  url.searchParams.set('response_type', 'code');
  url.searchParams.set('redirect_uri', redirectUri);
  url.searchParams.set('response_mode', 'query');
  url.searchParams.set('scope', AUTHORIZATION_SCOPES.join(' '));
  if (state) url.searchParams.set('state', state);
  return url.toString();
}

/** Pulls error_description (or error) out of an identity platform error body */
function describeTokenError(body: string): string | undefined {
  try {
    const parsed: unknown = JSON.parse(body);
    if (parsed !== null && typeof parsed === 'object') {
      if ('error_description' in parsed && typeof parsed.error_description === 'string') {
        return parsed.error_description.split(/\r?\n/)[0];
      }
      if ('error' in parsed && typeof parsed.error === 'string') return parsed.error;
    }
  } catch {
    // not JSON; the raw body stays on the error
  }
  return undefined;
}

export function createIdentityClient(settings: IdentitySettings, now: Clock = Date.now): IdentityClient {
  async function requestToken(grant: string, params: Record<string, string>): Promise<Credential> {
    const url = tokenEndpoint(settings);
    const body = new URLSearchParams({
      client_id: settings.clientId,
      ...params,
      client_secret: settings.clientSecret,
    });

    let response: Response;
    let text: string;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Accept: 'application/json',
        },
        body: body.toString(),
      });
      text = await response.text();
    } catch (err) {
      throw new AuthError(
        `Token request (${grant}) failed: ${errorMessage(err)}`,
        'AUTH_TOKEN_REQUEST_FAILED',
        { cause: err },
      );
    }

    if (!response.ok) {
      const detail = describeTokenError(text);
      throw new AuthError(
        `Token request (${grant}) rejected: ${response.status} ${response.statusText}${detail ? ` (${detail})` : ''}`,
        'AUTH_TOKEN_REJECTED',
        { statusCode: response.status, responseBody: text },
      );
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new AuthError(
        `Token response (${grant}) is not valid JSON: ${errorMessage(err)}`,
        'AUTH_TOKEN_MALFORMED',
        { statusCode: response.status, responseBody: text },
      );
    }

    const parsed = TokenResponseSchema.safeParse(raw);
    if (!parsed.success) {
      const fields = parsed.error.issues.map(i => i.path.join('.')).join(', ');
      throw new AuthError(
        `Token response (${grant}) is missing or has invalid fields: ${fields}`,
        'AUTH_TOKEN_MALFORMED',
        { statusCode: response.status },
      );
    }

    const credential = stampCredential(parsed.data, now);
    console.log('[auth] Token acquired', {
      grant,
      expiresIn: credential.expires_in,
      hasRefreshToken: credential.refresh_token !== undefined,
    });
    return credential;
  }

  return {
    exchange(code: string, redirectUri: string): Promise<Credential> {
      return requestToken('authorization_code', {
        scope: EXCHANGE_SCOPE,
        code,
        redirect_uri: redirectUri,
        grant_type: 'authorization_code',
      });
    },

    refresh(refreshToken: string): Promise<Credential> {
      return requestToken('refresh_token', {
        scope: REFRESH_SCOPE,
        refresh_token: refreshToken,
        grant_type: 'refresh_token',
      });
    },
  };
}
