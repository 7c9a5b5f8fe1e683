/**
 * Error Codes
 *
 * Central definition of the error codes raised by the security middleware,
 * each with a string identifier and the HTTP status it maps to when it
 * escapes to the host's error handler.
 *
 * Status Code Ranges:
 * - 400-499: Client-side outcomes (forbidden path, missing file)
 * - 500-599: Server-side failures and programmer errors
 */

/**
 * Error code definition with string identifier and numeric status
 */
export interface ErrorCodeDef {
  /** String identifier (e.g., 'FILE_MISSING') */
  code: string
  /** Numeric status code (e.g., 404) */
  status: number
  /** Default message */
  message: string
}

export const ErrorCodes = {
  // ─────────────────────────────────────────────────────────────
  // 4xx - Client Errors
  // ─────────────────────────────────────────────────────────────

  /** Normalized path resolved outside the served root */
  PATH_ESCAPE: {
    code: 'PATH_ESCAPE',
    status: 403,
    message: 'Path escapes the served root',
  },

  /** Path resolved to a directory and no index file is configured */
  DIRECTORY_LISTING: {
    code: 'DIRECTORY_LISTING',
    status: 403,
    message: 'Directory listing is not allowed',
  },

  /** No file at the resolved path */
  FILE_MISSING: {
    code: 'FILE_MISSING',
    status: 404,
    message: 'File not found',
  },

  // ─────────────────────────────────────────────────────────────
  // 5xx - Server Errors
  // ─────────────────────────────────────────────────────────────

  /** Secure random source failed or returned short */
  ENTROPY_FAILURE: {
    code: 'ENTROPY_FAILURE',
    status: 500,
    message: 'Secure random source failed',
  },

  /** Nonce read from a request that never had one set */
  NONCE_MISSING: {
    code: 'NONCE_MISSING',
    status: 500,
    message: 'No nonce is set for this request',
  },

  /** Nonce written twice for the same request */
  NONCE_ALREADY_SET: {
    code: 'NONCE_ALREADY_SET',
    status: 500,
    message: 'A nonce is already set for this request',
  },

  /** Cookie name that is not an RFC 6265 token */
  INVALID_COOKIE_NAME: {
    code: 'INVALID_COOKIE_NAME',
    status: 500,
    message: 'Invalid cookie name',
  },

  /** Startup configuration rejected */
  INVALID_CONFIG: {
    code: 'INVALID_CONFIG',
    status: 500,
    message: 'Invalid configuration',
  },

  /** Filesystem failure other than a missing entry */
  FILESYSTEM_ERROR: {
    code: 'FILESYSTEM_ERROR',
    status: 500,
    message: 'Filesystem error',
  },
} as const satisfies Record<string, ErrorCodeDef>

/**
 * Error code type (string union)
 */
export type ErrorCode = keyof typeof ErrorCodes

function isErrorCode(code: string): code is ErrorCode {
  return Object.prototype.hasOwnProperty.call(ErrorCodes, code)
}

/**
 * Get error code definition by string code
 */
export function getErrorCode(code: string): ErrorCodeDef {
  if (isErrorCode(code)) {
    return ErrorCodes[code]
  }

  return {
    code,
    status: 500,
    message: code,
  }
}

/**
 * Get numeric status for a string code
 */
export function getStatusForCode(code: string): number {
  return getErrorCode(code).status
}

/**
 * Check if status code is a client error (4xx)
 */
export function isClientError(status: number): boolean {
  return status >= 400 && status < 500
}

/**
 * Check if status code is a server error (5xx)
 */
export function isServerError(status: number): boolean {
  return status >= 500 && status < 600
}
