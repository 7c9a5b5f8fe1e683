/**
 * rampart - security middleware for Fetch-style HTTP apps
 *
 * CSP nonces, signed cookies, safe static files.
 */

// === HTTP ===
export * from './http/index.js'

// === Errors ===
export {
  Errors,
  ErrorCodes,
  getErrorCode,
  getStatusForCode,
  isClientError,
  isServerError,
  RampartError,
  isRampartError,
} from './errors/index.js'
export type { ErrorCode, ErrorCodeDef } from './errors/index.js'

// === Configuration ===
export {
  cspConfigSchema,
  fileServingConfigSchema,
  compressOptionsSchema,
  parseCspConfig,
  parseFileServingConfig,
  safeParseCompressOptions,
} from './config.js'
export type {
  FileServingConfig,
  FileServingConfigInput,
  CompressOptions,
  CompressOptionsInput,
} from './config.js'

// === Utils ===
export { createLogger, getLogger } from './utils/index.js'
export type { Logger } from './utils/index.js'
