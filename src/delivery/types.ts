/**
 * Delivery Module Type Definitions
 *
 * - DeliverySettings: the folders a run works between
 * - FileResult: per-file outcome, tagged by which step decided it
 * - BatchOutcome: aggregate of one run, returned to the caller
 */

import type { SendError } from '../mail/errors.js';

export interface DeliverySettings {
  /** Directory enumerated (non-recursively) for files to send */
  sourceDir: string;
  /** Directory files are moved into after a confirmed send */
  sentDir: string;
}

interface FileResultBase {
  filePath: string;
  fileName: string;
}

/** Sent and moved to the sent directory */
export interface DeliveredFile extends FileResultBase {
  status: 'delivered';
  movedTo: string;
}

/** Not sent; the file stays in the source directory */
export interface SendFailedFile extends FileResultBase {
  status: 'send_failed';
  error: SendError;
}

/**
 * Sent, but moving it failed. The file stays in the source directory, so the
 * next run mails it again.
 */
export interface RelocationFailedFile extends FileResultBase {
  status: 'relocation_failed';
  error: SendError;
}

export type FileResult = DeliveredFile | SendFailedFile | RelocationFailedFile;

export interface BatchOutcome {
  successCount: number;
  /** send_failed + relocation_failed */
  failureCount: number;
  results: FileResult[];
}
