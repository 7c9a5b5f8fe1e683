import { getStatusForCode, type ErrorCode } from './codes.js'

/**
 * Error raised by the security middleware.
 *
 * Carries a string code from {@link ErrorCodes} and the HTTP status derived
 * from it. Details are for logs; the host never writes them to a client.
 */
export class RampartError extends Error {
  /**
   * Numeric status code (HTTP-compatible)
   */
  public readonly status: number

  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: unknown,
    options: { cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause })
    this.name = 'RampartError'
    this.status = getStatusForCode(code)
  }

  /**
   * Convert to plain object for serialization
   */
  toJSON(): { code: string; status: number; message: string; details?: unknown } {
    return {
      code: this.code,
      status: this.status,
      message: this.message,
      ...(this.details !== undefined && { details: this.details }),
    }
  }
}

/**
 * Check if an error is a RampartError, optionally with a given code
 */
export function isRampartError(error: unknown, code?: ErrorCode): error is RampartError {
  return error instanceof RampartError && (code === undefined || error.code === code)
}
