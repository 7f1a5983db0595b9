import { createFileTokenStore } from '../auth/index.js';
import type { AppConfig } from '../config.js';

/**
 * Deletes the cached credential file so the next send signs in interactively.
 * @returns whether a file was removed
 */
export async function executeLogoutCommand(config: AppConfig): Promise<boolean> {
  const removed = await createFileTokenStore(config.auth.tokenPath).clear();
  if (removed) {
    console.log('[cli] Signed out, removed cached credentials', { tokenPath: config.auth.tokenPath });
  } else {
    console.log('[cli] No cached credentials to remove', { tokenPath: config.auth.tokenPath });
  }
  return removed;
}
