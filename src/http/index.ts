/**
 * HTTP Module
 *
 * Security middleware for Fetch-style HTTP apps:
 * - nonceHeaders / getNonce: per-request CSP nonce and header
 * - securityHeaders, cors: fixed response headers
 * - cookieManager / CookieManager: signed cookies and flash messages
 * - mountFileServer: static files with a cache policy
 * - compress: gzip response bodies
 * - HttpApp / HttpContext: the router the middleware runs in
 */

// ─────────────────────────────────────────────────────────────────────────────
// HttpApp - Router
// ─────────────────────────────────────────────────────────────────────────────

export { HttpApp } from './app.js'
export type {
  HttpMethod,
  HttpHandler,
  HttpMiddleware,
  HttpErrorHandler,
  HttpNotFoundHandler,
  HttpAppOptions,
} from './app.js'

// ─────────────────────────────────────────────────────────────────────────────
// HttpContext - Request/Response Helpers
// ─────────────────────────────────────────────────────────────────────────────

export { HttpContext } from './context.js'
export type { HttpContextInterface, HttpRequest, HeaderOptions, RedirectStatus } from './context.js'

// ─────────────────────────────────────────────────────────────────────────────
// CSP & Security Headers
// ─────────────────────────────────────────────────────────────────────────────

export { generateNonce, NONCE_SIZE, NONCE_LENGTH, NONCE_PATTERN } from './nonce.js'
export type { RandomSource } from './nonce.js'

export { buildCsp, hasCspDirectives, nonceSource, CSP_DIRECTIVES } from './csp.js'
export type { CspConfig, CspDirectiveKey, CspDirective } from './csp.js'

export {
  setNonce,
  getNonce,
  hasNonce,
  nonceHeaders,
  securityHeaders,
  cors,
  SECURITY_HEADERS,
  CORS_HEADERS,
} from './security.js'
export type { NonceHeadersOptions } from './security.js'

// ─────────────────────────────────────────────────────────────────────────────
// Cookies
// ─────────────────────────────────────────────────────────────────────────────

export {
  parseCookies,
  getCookie,
  getCookies,
  generateCookie,
  isCookieName,
  encodeCookieValue,
  setCookie,
  deleteCookie,
} from './cookie.js'
export type { CookieOptions, CookieContext } from './cookie.js'

export { CookieSigner, decodeBase64Url, encodeBase64Url } from './cookie-signer.js'
export type { SignerKey } from './cookie-signer.js'

export { CookieManager, cookieManager, getCookieManager, MAX_COOKIE_AGE_SECONDS } from './cookie-manager.js'
export type { CookieManagerOptions } from './cookie-manager.js'

// ─────────────────────────────────────────────────────────────────────────────
// Static Files
// ─────────────────────────────────────────────────────────────────────────────

export {
  resolveFile,
  openFile,
  cacheControlFor,
  mountFileServer,
  sendFile,
  parseRange,
  contentTypeFor,
} from './file-server.js'
export type { ResolvedFile, FileRejection, OpenedFile, FileServerOptions } from './file-server.js'

// ─────────────────────────────────────────────────────────────────────────────
// Compression
// ─────────────────────────────────────────────────────────────────────────────

export {
  compress,
  acceptsGzip,
  DEFAULT_COMPRESSIBLE_TYPES,
  HUFFMAN_ONLY,
  DEFAULT_COMPRESSION,
} from './compress.js'
export type { CompressMiddlewareOptions } from './compress.js'

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

export {
  HttpError,
  HttpForbiddenError,
  HttpNotFoundError,
  HttpInternalServerError,
  createHttpError,
  isHttpError,
  defaultErrorReporter,
} from './errors.js'
export type { HttpErrorOptions, ErrorReporter, FileErrorStatus } from './errors.js'
