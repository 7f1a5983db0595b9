/**
 * Delivery Orchestrator
 *
 * One run, end to end:
 *   list source dir → (empty? stop) → obtain one access token →
 *   for each file in name order: send → move to sent dir
 *
 * Whole-run failures (listing, authentication) throw OrchestrationError before
 * any file is touched. Per-file failures are recorded in the BatchOutcome and
 * the loop moves on; a file that failed either step stays in the source
 * directory and is picked up by the next run.
 *
 * Files are processed one at a time, so at most one send is in flight.
 */

import { basename } from 'node:path';
import { errorMessage } from '../errors.js';
import { SendError } from '../mail/errors.js';
import type { MailGatewayClient } from '../mail/graph-mail-client.js';
import type { AuthenticationManager } from '../auth/authentication-manager.js';
import { DeliveryIncompleteError, OrchestrationError } from './errors.js';
import { nodeFileSystem } from './file-system.js';
import type { FileSystem } from './file-system.js';
import type { BatchOutcome, DeliverySettings, FileResult } from './types.js';

export interface DeliveryDeps {
  settings: DeliverySettings;
  auth: Pick<AuthenticationManager, 'obtainAccessToken'>;
  mailer: MailGatewayClient;
  fileSystem?: FileSystem;
}

function asSendError(err: unknown, filePath: string): SendError {
  if (err instanceof SendError) return err;
  return new SendError(`Failed to send ${basename(filePath)}: ${errorMessage(err)}`, 'transport', filePath, { cause: err });
}

export function summarize(results: FileResult[]): BatchOutcome {
  const successCount = results.filter((r) => r.status === 'delivered').length;
  return {
    successCount,
    failureCount: results.length - successCount,
    results,
  };
}

async function deliverFile(
  filePath: string,
  accessToken: string,
  deps: Required<Omit<DeliveryDeps, 'auth'>>,
): Promise<FileResult> {
  const fileName = basename(filePath);
  console.log('[delivery] Sending file', { file: fileName });

  try {
    await deps.mailer.send(accessToken, filePath);
  } catch (err) {
    const error = asSendError(err, filePath);
    console.warn('[delivery] Failed to send file', { file: fileName, stage: error.stage, error: error.message });
    return { status: 'send_failed', filePath, fileName, error };
  }

  console.log('[delivery] Successfully sent', { file: fileName });

  try {
    const movedTo = await deps.fileSystem.moveFile(filePath, deps.settings.sentDir);
    console.log('[delivery] Moved file to sent directory', { file: fileName, movedTo });
    return { status: 'delivered', filePath, fileName, movedTo };
  } catch (err) {
    const error = new SendError(
      `Sent ${fileName} but failed to move it to ${deps.settings.sentDir}: ${errorMessage(err)}`,
      'relocation',
      filePath,
      { cause: err },
    );
    console.warn('[delivery] File was sent but not moved; it will be sent again next run', {
      file: fileName,
      error: error.message,
    });
    return { status: 'relocation_failed', filePath, fileName, error };
  }
}

/**
 * Send every file in the source directory and move each sent file to the sent
 * directory. An empty source directory returns a zero outcome without
 * authenticating.
 */
export async function runDelivery(deps: DeliveryDeps): Promise<BatchOutcome> {
  const fileSystem = deps.fileSystem ?? nodeFileSystem;
  const { settings } = deps;

  let files: string[];
  try {
    files = await fileSystem.listFiles(settings.sourceDir);
  } catch (err) {
    throw new OrchestrationError(
      `Failed to list files in ${settings.sourceDir}: ${errorMessage(err)}`,
      'DELIVERY_LIST_FAILED',
      err,
    );
  }

  if (files.length === 0) {
    console.log('[delivery] No files to send', { sourceDir: settings.sourceDir });
    return summarize([]);
  }

  console.log('[delivery] Found files to send', { count: files.length, sourceDir: settings.sourceDir });

  let accessToken: string;
  try {
    accessToken = await deps.auth.obtainAccessToken();
  } catch (err) {
    throw new OrchestrationError(`Authentication failed: ${errorMessage(err)}`, 'DELIVERY_AUTH_FAILED', err);
  }

  const results: FileResult[] = [];
  for (const filePath of files) {
    results.push(await deliverFile(filePath, accessToken, { settings, mailer: deps.mailer, fileSystem }));
  }

  const outcome = summarize(results);
  const sentNotMoved = results.filter((r) => r.status === 'relocation_failed').length;
  const notMovedNote = sentNotMoved > 0 ? ` (${sentNotMoved} sent but not moved)` : '';
  console.log(
    `[delivery] Sending process completed. Successfully sent: ${outcome.successCount}, Failed: ${outcome.failureCount}${notMovedNote}`,
  );
  return outcome;
}

/** Throws DeliveryIncompleteError when any file in the outcome failed. */
export function assertDeliveryComplete(outcome: BatchOutcome): void {
  if (outcome.failureCount > 0) {
    throw new DeliveryIncompleteError(outcome);
  }
}
