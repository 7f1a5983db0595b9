// ============================================================================
// Delivery Error Types
// ============================================================================

import type { BatchOutcome } from './types.js';

export type OrchestrationErrorCode = 'DELIVERY_LIST_FAILED' | 'DELIVERY_AUTH_FAILED';

/**
 * Whole-run failure raised before any file is processed: the source directory
 * could not be listed, or authentication failed. `cause` holds the underlying error.
 */
export class OrchestrationError extends Error {
  readonly code: OrchestrationErrorCode;

  constructor(message: string, code: OrchestrationErrorCode, cause: unknown) {
    super(message, { cause });
    this.name = 'OrchestrationError';
    this.code = code;
  }
}

/**
 * The run finished but at least one file failed to send or to move.
 * Carries the full outcome so callers can still report the counts.
 */
export class DeliveryIncompleteError extends Error {
  readonly code = 'DELIVERY_INCOMPLETE';
  readonly outcome: BatchOutcome;

  constructor(outcome: BatchOutcome) {
    super(`Failed to process ${outcome.failureCount} files`);
    this.name = 'DeliveryIncompleteError';
    this.outcome = outcome;
  }
}
