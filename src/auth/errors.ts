// ============================================================================
// Auth Error Types
// ============================================================================

export type AuthErrorCode =
  | 'AUTH_CODE_NOT_RECEIVED'
  | 'AUTH_LISTENER_FAILED'
  | 'AUTH_LISTENER_BUSY'
  | 'AUTH_PROVIDER_DENIED'
  | 'AUTH_TOKEN_REQUEST_FAILED'
  | 'AUTH_TOKEN_REJECTED'
  | 'AUTH_TOKEN_MALFORMED'
  | 'AUTH_TOKEN_WRITE_FAILED';

/**
 * Thrown when a credential cannot be acquired.
 * Fatal to a delivery run: raised before any file is sent.
 * Messages never include tokens, codes or the client secret.
 */
export class AuthError extends Error {
  readonly code: AuthErrorCode;
  /** HTTP status of a rejected token request, 0 otherwise */
  readonly statusCode: number;
  /** Raw body of a rejected token request, '' otherwise */
  readonly responseBody: string;

  constructor(
    message: string,
    code: AuthErrorCode,
    options: { statusCode?: number; responseBody?: string; cause?: unknown } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'AuthError';
    this.code = code;
    this.statusCode = options.statusCode ?? 0;
    this.responseBody = options.responseBody ?? '';
  }
}
