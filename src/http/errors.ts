/**
 * HTTP Error Classes
 *
 * Typed error classes for the HTTP error responses the middleware produces,
 * plus the ErrorReporter seam through which they are written.
 *
 * @example
 * import { HttpNotFoundError, createHttpError } from 'rampart/http'
 *
 * throw new HttpNotFoundError('User not found')
 * throw createHttpError(403, 'Access denied')
 *
 * app.onError((err, c) => {
 *   if (err instanceof HttpError) {
 *     return err.toResponse()
 *   }
 *   return c.json({ error: 'Internal Server Error' }, 500)
 * })
 */

import type { HttpRequest } from './context.js'

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface HttpErrorOptions {
  /** Error code (e.g., 'NOT_FOUND') */
  code?: string
  /** Additional error details, included in the response body */
  details?: unknown
  /** Original error that caused this error (never serialized) */
  cause?: unknown
}

/** Statuses the static file server maps filesystem outcomes to */
export type FileErrorStatus = 403 | 404 | 500

/**
 * Host-provided collaborator that writes error responses.
 * Receives only the coarse status, never the underlying error.
 */
export type ErrorReporter = (
  status: FileErrorStatus,
  req: HttpRequest
) => Response | Promise<Response>

const DEFAULT_CODES: Record<number, string> = {
  400: 'BAD_REQUEST',
  401: 'UNAUTHORIZED',
  403: 'FORBIDDEN',
  404: 'NOT_FOUND',
  405: 'METHOD_NOT_ALLOWED',
  416: 'RANGE_NOT_SATISFIABLE',
  500: 'INTERNAL_SERVER_ERROR',
}

// ─────────────────────────────────────────────────────────────────────────────
// Base Error Class
// ─────────────────────────────────────────────────────────────────────────────

export class HttpError extends Error {
  /** HTTP status code */
  readonly status: number
  /** Error code for programmatic handling */
  readonly code: string
  /** Additional error details */
  readonly details?: unknown

  constructor(message: string, status: number, options: HttpErrorOptions = {}) {
    super(message, { cause: options.cause })
    this.name = 'HttpError'
    this.status = status
    this.code = options.code ?? DEFAULT_CODES[status] ?? 'ERROR'
    this.details = options.details
  }

  /**
   * Convert error to JSON response
   */
  toResponse(): Response {
    const body = {
      success: false,
      error: {
        message: this.message,
        code: this.code,
        ...(this.details !== undefined && { details: this.details }),
      },
    }

    return new Response(JSON.stringify(body), {
      status: this.status,
      headers: {
        'Content-Type': 'application/json; charset=UTF-8',
      },
    })
  }

  toJSON(): { name: string; message: string; status: number; code: string; details?: unknown } {
    return {
      name: this.name,
      message: this.message,
      status: this.status,
      code: this.code,
      ...(this.details !== undefined && { details: this.details }),
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Status Classes
// ─────────────────────────────────────────────────────────────────────────────

/**
 * 403 Forbidden Error
 */
export class HttpForbiddenError extends HttpError {
  constructor(message: string = 'Forbidden', options?: HttpErrorOptions) {
    super(message, 403, { code: 'FORBIDDEN', ...options })
    this.name = 'HttpForbiddenError'
  }
}

/**
 * 404 Not Found Error
 */
export class HttpNotFoundError extends HttpError {
  constructor(message: string = 'Not Found', options?: HttpErrorOptions) {
    super(message, 404, { code: 'NOT_FOUND', ...options })
    this.name = 'HttpNotFoundError'
  }
}

/**
 * 500 Internal Server Error
 */
export class HttpInternalServerError extends HttpError {
  constructor(message: string = 'Internal Server Error', options?: HttpErrorOptions) {
    super(message, 500, { code: 'INTERNAL_SERVER_ERROR', ...options })
    this.name = 'HttpInternalServerError'
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Factory Function
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Create an HTTP error dynamically based on status code
 *
 * @example
 * throw createHttpError(404, 'User not found')
 */
export function createHttpError(status: number, message?: string, details?: unknown): HttpError {
  const options: HttpErrorOptions = details !== undefined ? { details } : {}

  switch (status) {
    case 403:
      return new HttpForbiddenError(message, options)
    case 404:
      return new HttpNotFoundError(message, options)
    case 500:
      return new HttpInternalServerError(message, options)
    default:
      return new HttpError(message ?? 'Error', status, options)
  }
}

/**
 * Check if an error is an HTTP error
 */
export function isHttpError(error: unknown): error is HttpError {
  return error instanceof HttpError
}

/**
 * Default ErrorReporter: JSON bodies from the HttpError classes
 */
export const defaultErrorReporter: ErrorReporter = (status) => createHttpError(status).toResponse()
