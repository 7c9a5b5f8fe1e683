/**
 * Error Factories
 *
 * Pre-built helpers for every error the middleware raises.
 */

import { RampartError } from './rampart-error.js'
import { ErrorCodes } from './codes.js'

/**
 * @example
 * ```typescript
 * throw Errors.nonceMissing()
 * // Creates: { code: 'NONCE_MISSING', status: 500 }
 * ```
 */
export const Errors = {
  /**
   * The secure random source threw or returned fewer bytes than requested
   */
  entropyFailure(requested: number, cause?: unknown): RampartError {
    return new RampartError(
      'ENTROPY_FAILURE',
      `Secure random source could not supply ${requested} bytes`,
      { requested },
      { cause }
    )
  },

  nonceMissing(): RampartError {
    return new RampartError(
      'NONCE_MISSING',
      'No nonce is set for this request; is nonceHeaders() installed ahead of this handler?'
    )
  },

  nonceAlreadySet(): RampartError {
    return new RampartError('NONCE_ALREADY_SET', ErrorCodes.NONCE_ALREADY_SET.message)
  },

  /**
   * Configuration rejected at startup
   * @param subject - What was being configured (e.g., 'csp', 'fileServer')
   * @param issues - Validation issues
   */
  invalidConfig(subject: string, issues: Array<{ path: string; message: string }>): RampartError {
    const summary = issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join('; ')
    return new RampartError('INVALID_CONFIG', `Invalid ${subject} configuration: ${summary}`, {
      subject,
      issues,
    })
  },

  invalidCookieName(name: string): RampartError {
    return new RampartError(
      'INVALID_COOKIE_NAME',
      `Invalid cookie name ${JSON.stringify(name)}`,
      { name }
    )
  },

  pathEscape(requestPath: string): RampartError {
    return new RampartError('PATH_ESCAPE', ErrorCodes.PATH_ESCAPE.message, { requestPath })
  },

  directoryListing(requestPath: string): RampartError {
    return new RampartError('DIRECTORY_LISTING', ErrorCodes.DIRECTORY_LISTING.message, {
      requestPath,
    })
  },

  fileMissing(requestPath: string): RampartError {
    return new RampartError('FILE_MISSING', ErrorCodes.FILE_MISSING.message, { requestPath })
  },

  filesystem(requestPath: string, cause: unknown): RampartError {
    return new RampartError(
      'FILESYSTEM_ERROR',
      ErrorCodes.FILESYSTEM_ERROR.message,
      { requestPath },
      { cause }
    )
  },
}
