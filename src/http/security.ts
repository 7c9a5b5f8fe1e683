/**
 * Security Headers Middleware
 *
 * - nonceHeaders(): per-request CSP nonce + Content-Security-Policy header
 * - getNonce(): read the request's nonce from a handler
 * - securityHeaders(): fixed hardening headers
 * - cors(): permissive CORS headers and OPTIONS preflight answer
 *
 * @example
 * import { nonceHeaders, getNonce, securityHeaders } from 'rampart/http'
 *
 * app.use(securityHeaders())
 * app.use(nonceHeaders({
 *   defaultSrc: ["'self'"],
 *   scriptSrc: ["'self'", 'https://cdn.example.com'],
 *   imgSrc: ["'self'", 'data:'],
 * }))
 *
 * app.get('/', (c) => c.html(`<script nonce="${getNonce(c)}">boot()</script>`))
 */

import type { HttpMiddleware } from './app.js'
import { buildCsp, hasCspDirectives, type CspConfig } from './csp.js'
import { generateNonce, type RandomSource } from './nonce.js'
import { parseCspConfig } from '../config.js'
import { Errors } from '../errors/index.js'

// ─────────────────────────────────────────────────────────────────────────────
// Request Security Context
// ─────────────────────────────────────────────────────────────────────────────

// Keyed by the request context; entries go away with the request.
const nonces = new WeakMap<object, string>()

/**
 * Associate a nonce with a request. Write-once.
 *
 * @throws RampartError NONCE_ALREADY_SET
 */
export function setNonce(c: object, nonce: string): void {
  if (nonces.has(c)) {
    throw Errors.nonceAlreadySet()
  }
  nonces.set(c, nonce)
}

/**
 * Get the request's nonce.
 *
 * Reading a nonce that was never set is a wiring bug, so this throws instead
 * of returning an empty value that would render a CSP matching no script.
 *
 * @throws RampartError NONCE_MISSING
 */
export function getNonce(c: object): string {
  const nonce = nonces.get(c)
  if (nonce === undefined) {
    throw Errors.nonceMissing()
  }
  return nonce
}

/**
 * Whether a nonce has been set for the request
 */
export function hasNonce(c: object): boolean {
  return nonces.has(c)
}

// ─────────────────────────────────────────────────────────────────────────────
// Nonce + CSP Middleware
// ─────────────────────────────────────────────────────────────────────────────

export interface NonceHeadersOptions {
  /** Secure byte source (defaults to crypto.randomBytes) */
  randomSource?: RandomSource
  /**
   * Use Content-Security-Policy-Report-Only instead of enforcing
   * @default false
   */
  reportOnly?: boolean
}

/**
 * Create the nonce middleware.
 *
 * The config is validated and frozen here, once. Per request: generate a
 * nonce (an entropy failure aborts the request), store it for handlers,
 * set the CSP header unless the policy is empty, then continue.
 *
 * @throws RampartError INVALID_CONFIG when the config is rejected
 */
export function nonceHeaders<E extends Record<string, unknown> = Record<string, unknown>>(
  config: CspConfig,
  options: NonceHeadersOptions = {}
): HttpMiddleware<E> {
  const policy = parseCspConfig(config)
  const emitHeader = hasCspDirectives(policy)
  const headerName = options.reportOnly
    ? 'Content-Security-Policy-Report-Only'
    : 'Content-Security-Policy'
  const randomSource = options.randomSource

  return async (c, next) => {
    const nonce = generateNonce(randomSource)
    setNonce(c, nonce)

    if (emitHeader) {
      c.header(headerName, buildCsp(policy, nonce))
    }

    await next()
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Fixed Headers
// ─────────────────────────────────────────────────────────────────────────────

export const SECURITY_HEADERS: ReadonlyArray<readonly [string, string]> = [
  ['X-XSS-Protection', '1; mode=block'],
  ['X-Content-Type-Options', 'nosniff'],
  ['X-Frame-Options', 'SAMEORIGIN'],
  ['Referrer-Policy', 'strict-origin-when-cross-origin'],
  ['Strict-Transport-Security', 'max-age=31536000; includeSubDomains'],
]

/**
 * Set the fixed hardening headers. A handler may still override any of them.
 */
export function securityHeaders<
  E extends Record<string, unknown> = Record<string, unknown>
>(): HttpMiddleware<E> {
  return async (c, next) => {
    for (const [name, value] of SECURITY_HEADERS) {
      c.header(name, value)
    }
    await next()
  }
}

export const CORS_HEADERS: ReadonlyArray<readonly [string, string]> = [
  ['Access-Control-Allow-Origin', '*'],
  ['Access-Control-Allow-Methods', 'GET, POST, PUT, DELETE, OPTIONS'],
  ['Access-Control-Allow-Headers', 'Accept, Content-Type, Content-Length, Authorization'],
]

/**
 * Set CORS headers and answer preflight requests with an empty 200.
 */
export function cors<E extends Record<string, unknown> = Record<string, unknown>>(): HttpMiddleware<E> {
  return async (c, next) => {
    for (const [name, value] of CORS_HEADERS) {
      c.header(name, value)
    }

    if (c.req.method === 'OPTIONS') {
      return new Response(null, { status: 200 })
    }

    await next()
  }
}
