/**
 * Auth Module Type Definitions
 *
 * - TokenResponseSchema: the identity platform's token endpoint reply
 * - CredentialSchema: the persisted record (token response + local expiry stamp)
 * - AuthSettings: the slice of AppConfig the auth module borrows
 *
 * Field names follow the wire format so the credential file is the token
 * response as received, plus `expires_at`.
 */

import { z } from 'zod';

// ---------------------------------------------------------------------------
// Token Endpoint Response
// ---------------------------------------------------------------------------

export const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string(),
  expires_in: z.number().int().nonnegative(),
  refresh_token: z.string().min(1).optional(),
  id_token: z.string().optional(),
});

export type TokenResponse = z.infer<typeof TokenResponseSchema>;

// ---------------------------------------------------------------------------
// Persisted Credential
// ---------------------------------------------------------------------------

export const CredentialSchema = TokenResponseSchema.extend({
  /** Unix seconds; stamped once at acquisition as now + expires_in */
  expires_at: z.number().int().optional(),
});

export type Credential = z.infer<typeof CredentialSchema>;

/** How an access token was obtained on this run */
export type CredentialSource = 'cached' | 'refreshed' | 'interactive';

export interface ResolvedCredential {
  source: CredentialSource;
  credential: Credential;
}

// ---------------------------------------------------------------------------
// Settings
// ---------------------------------------------------------------------------

export interface AuthSettings {
  clientId: string;
  clientSecret: string;
  tenantId: string;
  authorityHost: string;
  redirectUri: string;
  tokenPath: string;
  callbackTimeoutMs: number;
  openBrowser: boolean;
}

/** Clock returning epoch milliseconds, injectable for tests */
export type Clock = () => number;
