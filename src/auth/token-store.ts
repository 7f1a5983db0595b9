/**
 * Token Store: credential file persistence
 *
 * Reads and writes the single credential record. No business logic: expiry
 * checks live in credential.ts, resolution order in authentication-manager.ts.
 *
 * - load(): missing file → null. Unreadable or malformed file → warning + null,
 *   which forces re-authentication instead of failing the run.
 * - save(): wholesale overwrite via temp file → rename, mode 0600.
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { errorMessage } from '../errors.js';
import { AuthError } from './errors.js';
import { CredentialSchema } from './types.js';
import type { Credential } from './types.js';

export interface TokenStore {
  readonly path: string;
  load(): Promise<Credential | null>;
  save(credential: Credential): Promise<void>;
  clear(): Promise<boolean>;
}

function isMissingFile(err: unknown): boolean {
  return err !== null && typeof err === 'object' && 'code' in err && err.code === 'ENOENT';
}

export function createFileTokenStore(tokenPath: string): TokenStore {
  return {
    path: tokenPath,

    async load(): Promise<Credential | null> {
      let content: string;
      try {
        content = await readFile(tokenPath, 'utf8');
      } catch (err) {
        if (!isMissingFile(err)) {
          console.warn('[auth] Could not read credential file, ignoring it', { tokenPath, error: errorMessage(err) });
        }
        return null;
      }

      let raw: unknown;
      try {
        raw = JSON.parse(content);
      } catch (err) {
        console.warn('[auth] Credential file is not valid JSON, ignoring it', { tokenPath, error: errorMessage(err) });
        return null;
      }

      const parsed = CredentialSchema.safeParse(raw);
      if (!parsed.success) {
        console.warn('[auth] Credential file has an unexpected shape, ignoring it', {
          tokenPath,
          issues: parsed.error.issues.map(i => i.path.join('.') || i.message),
        });
        return null;
      }

      return parsed.data;
    },

    async save(credential: Credential): Promise<void> {
      const tempPath = `${tokenPath}.tmp`;
      try {
        await mkdir(dirname(tokenPath), { recursive: true, mode: 0o700 });
        await writeFile(tempPath, JSON.stringify(credential, null, 2), { mode: 0o600 });
        await rename(tempPath, tokenPath);
      } catch (err) {
        await rm(tempPath, { force: true }).catch((cleanupErr: unknown) => {
          console.warn('[auth] Could not remove temporary credential file', { tempPath, error: errorMessage(cleanupErr) });
        });
        throw new AuthError(
          `Error writing token to file ${tokenPath}: ${errorMessage(err)}`,
          'AUTH_TOKEN_WRITE_FAILED',
          { cause: err },
        );
      }
    },

    async clear(): Promise<boolean> {
      try {
        await rm(tokenPath);
        return true;
      } catch (err) {
        if (isMissingFile(err)) return false;
        throw err;
      }
    },
  };
}
