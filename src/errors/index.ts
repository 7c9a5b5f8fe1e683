/**
 * Error Module
 *
 * Error factories, the error class and error code definitions.
 */

export { Errors } from './factories.js'

export {
  ErrorCodes,
  type ErrorCode,
  type ErrorCodeDef,
  getErrorCode,
  getStatusForCode,
  isClientError,
  isServerError,
} from './codes.js'

export { RampartError, isRampartError } from './rampart-error.js'
