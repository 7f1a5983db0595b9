/**
 * Authentication Manager
 *
 * Produces a usable Microsoft Graph access token with as little user
 * interaction as possible. Resolution is an ordered chain; each step runs only
 * if every earlier one produced nothing, and there is no way back:
 *
 *   1. cached:       stored credential with expires_at in the future (no network)
 *   2. refreshed:    stored refresh_token exchanged for a new credential.
 *                     A failed refresh falls through to step 3.
 *   3. interactive:  local callback listener + browser sign-in + code exchange
 *
 * Side effects per run: the credential file is read once and written at most
 * once (steps 2 or 3), and the listener only exists during step 3.
 */

import { randomUUID } from 'node:crypto';
import open from 'open';
import { listenerAddressFromRedirectUri, startCallbackListener } from './callback-listener.js';
import type { CallbackListener, CallbackListenerOptions } from './callback-listener.js';
import { errorMessage } from '../errors.js';
import { isCredentialValid } from './credential.js';
import { AuthError } from './errors.js';
import { buildAuthorizationUrl } from './identity-client.js';
import type { IdentityClient } from './identity-client.js';
import type { TokenStore } from './token-store.js';
import type { AuthSettings, Clock, Credential, CredentialSource, ResolvedCredential } from './types.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AuthenticationManagerDeps {
  settings: AuthSettings;
  tokenStore: TokenStore;
  identityClient: IdentityClient;
  startListener?: (options: CallbackListenerOptions) => Promise<CallbackListener>;
  openBrowser?: (url: string) => Promise<unknown>;
  createState?: () => string;
  now?: Clock;
}

export interface AuthenticationManager {
  obtainAccessToken(): Promise<string>;
  resolveCredential(): Promise<ResolvedCredential>;
}

/** A step that may produce nothing; interactive sign-in always ends the chain */
interface ResolutionStep {
  source: Exclude<CredentialSource, 'interactive'>;
  attempt: () => Promise<Credential | null>;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createAuthenticationManager(deps: AuthenticationManagerDeps): AuthenticationManager {
  const {
    settings,
    tokenStore,
    identityClient,
    startListener = startCallbackListener,
    openBrowser = (url: string) => open(url),
    createState = randomUUID,
    now = Date.now,
  } = deps;

  async function useCached(stored: Credential | null): Promise<Credential | null> {
    if (stored && isCredentialValid(stored, now)) {
      console.log('[auth] Using cached access token');
      return stored;
    }
    return null;
  }

  async function refresh(stored: Credential | null): Promise<Credential | null> {
    if (!stored?.refresh_token) return null;

    console.log('[auth] Cached token expired, refreshing');
    let refreshed: Credential;
    try {
      refreshed = await identityClient.refresh(stored.refresh_token);
    } catch (err) {
      if (!(err instanceof AuthError)) throw err;
      console.warn('[auth] Token refresh failed, falling back to interactive sign-in', { code: err.code, error: err.message });
      return null;
    }

    await tokenStore.save(refreshed);
    return refreshed;
  }

  async function signInInteractively(): Promise<Credential> {
    const state = createState();
    const address = listenerAddressFromRedirectUri(settings.redirectUri);
    const listener = await startListener({
      ...address,
      expectedState: state,
      timeoutMs: settings.callbackTimeoutMs,
    });

    let code: string;
    try {
      const authUrl = buildAuthorizationUrl(settings, settings.redirectUri, state);
      console.log(`[auth] Please open the following URL in your browser:\n${authUrl}`);

      if (settings.openBrowser) {
        openBrowser(authUrl).catch((err: unknown) => {
          console.warn('[auth] Could not open browser automatically. Open the URL above manually.', {
            error: errorMessage(err),
          });
        });
      }

      code = await listener.waitForCode();
    } finally {
      await listener.close();
    }

    const credential = await identityClient.exchange(code, settings.redirectUri);
    await tokenStore.save(credential);
    return credential;
  }

  async function resolveCredential(): Promise<ResolvedCredential> {
    console.log('[auth] Authenticating with Microsoft identity platform');
    const stored = await tokenStore.load();

    const chain: ResolutionStep[] = [
      { source: 'cached', attempt: () => useCached(stored) },
      { source: 'refreshed', attempt: () => refresh(stored) },
    ];

    for (const step of chain) {
      const credential = await step.attempt();
      if (credential) {
        console.log('[auth] Authenticated', { source: step.source });
        return { source: step.source, credential };
      }
    }

    const credential = await signInInteractively();
    console.log('[auth] Authenticated', { source: 'interactive' });
    return { source: 'interactive', credential };
  }

  return {
    resolveCredential,
    async obtainAccessToken(): Promise<string> {
      const { credential } = await resolveCredential();
      return credential.access_token;
    },
  };
}
