// ============================================================================
// Auth Module — Barrel Export
// ============================================================================
//
// Public API for credential acquisition. The delivery orchestrator only needs
// AuthenticationManager; the rest is exported for the CLI and tests.

export type {
  AuthSettings,
  Credential,
  CredentialSource,
  ResolvedCredential,
  TokenResponse,
} from './types.js';

export { AuthError } from './errors.js';
export type { AuthErrorCode } from './errors.js';

export { isCredentialValid, stampCredential } from './credential.js';
export { createFileTokenStore } from './token-store.js';
export type { TokenStore } from './token-store.js';
export { createIdentityClient, buildAuthorizationUrl } from './identity-client.js';
export type { IdentityClient } from './identity-client.js';
export { startCallbackListener, listenerAddressFromRedirectUri } from './callback-listener.js';
export type { CallbackListener, CallbackListenerOptions } from './callback-listener.js';
export { createAuthenticationManager } from './authentication-manager.js';
export type { AuthenticationManager, AuthenticationManagerDeps } from './authentication-manager.js';
