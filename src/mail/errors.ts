// ============================================================================
// Mail Error Types
// ============================================================================

/**
 * Which step of delivering one file failed.
 * - read: file could not be opened or read (including a file that vanished)
 * - filename: the path has no final segment to name the attachment
 * - transport: the request to the mail gateway never got a response
 * - rejected: the gateway answered with a non-2xx status
 * - relocation: the mail went out but moving the file afterwards failed
 */
export type SendStage = 'read' | 'filename' | 'transport' | 'rejected' | 'relocation';

/**
 * Per-file delivery failure. Absorbed by the orchestrator, never fatal to a run.
 * For `rejected`, statusCode and responseBody are the gateway's, verbatim.
 */
export class SendError extends Error {
  readonly stage: SendStage;
  readonly filePath: string;
  readonly statusCode: number;
  readonly responseBody: string;

  constructor(
    message: string,
    stage: SendStage,
    filePath: string,
    options: { statusCode?: number; responseBody?: string; cause?: unknown } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'SendError';
    this.stage = stage;
    this.filePath = filePath;
    this.statusCode = options.statusCode ?? 0;
    this.responseBody = options.responseBody ?? '';
  }
}
