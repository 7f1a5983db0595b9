import type { Clock, Credential, TokenResponse } from './types.js';

export function epochSeconds(now: Clock = Date.now): number {
  return Math.floor(now() / 1000);
}

/**
 * Builds a Credential from a fresh token response, stamping expires_at.
 * This is the only place expires_at is computed.
 */
export function stampCredential(response: TokenResponse, now: Clock = Date.now): Credential {
  return {
    ...response,
    expires_at: epochSeconds(now) + response.expires_in,
  };
}

/** A credential without expires_at is never valid */
export function isCredentialValid(credential: Credential, now: Clock = Date.now): boolean {
  if (credential.expires_at === undefined) return false;
  return epochSeconds(now) < credential.expires_at;
}
