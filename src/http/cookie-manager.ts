/**
 * CookieManager
 *
 * Signed cookies and one-shot flash messages.
 *
 * Wire format: `base64url(value) + "|" + base64url(HMAC-SHA256(key, value))`,
 * both in padded URL-safe base64.
 * Every cookie is written `Path=/; HttpOnly; Secure; SameSite=Strict`.
 * A missing, malformed or tampered cookie reads as "".
 *
 * @example
 * ```typescript
 * app.use(cookieManager(process.env.COOKIE_SECRET ?? ''))
 *
 * app.post('/login', (c) => {
 *   getCookieManager(c)?.setCookie(c, 'flash', 'Welcome back', 60)
 *   return c.redirect('/')
 * })
 *
 * app.get('/', (c) => {
 *   const message = getCookieManager(c)?.readFlash(c, 'flash') ?? ''
 *   return c.html(`<p>${message}</p>`)
 * })
 * ```
 */

import type { HttpMiddleware } from './app.js'
import { deleteCookie, getCookie, setCookie, type CookieContext } from './cookie.js'
import { CookieSigner, decodeBase64Url, encodeBase64Url, type SignerKey } from './cookie-signer.js'
import { Errors } from '../errors/index.js'

export interface CookieManagerOptions {
  /** Clock used for Expires (defaults to the system clock) */
  now?: () => Date
}

const SEPARATOR = '|'

/** Longest lifetime a browser keeps (RFC 6265bis caps Max-Age at 400 days) */
export const MAX_COOKIE_AGE_SECONDS = 400 * 24 * 60 * 60

export class CookieManager {
  private readonly signer: CookieSigner
  private readonly now: () => Date
  // Values written (or "" for deleted) during each request
  private readonly written = new WeakMap<object, Map<string, string>>()

  /**
   * @throws RampartError INVALID_CONFIG when the secret is empty
   */
  constructor(secret: SignerKey, options: CookieManagerOptions = {}) {
    if (secret.length === 0) {
      throw Errors.invalidConfig('cookieManager', [
        { path: 'secret', message: 'secret must not be empty' },
      ])
    }
    this.signer = new CookieSigner(secret)
    this.now = options.now ?? (() => new Date())
  }

  /**
   * Write a signed cookie.
   *
   * @param maxAgeSeconds - 0 omits Max-Age (session cookie); negative expires it;
   *   capped at MAX_COOKIE_AGE_SECONDS
   * @throws RampartError INVALID_COOKIE_NAME when the name is not a token
   */
  setCookie(c: CookieContext, name: string, value: string, maxAgeSeconds: number): void {
    const maxAge = Number.isNaN(maxAgeSeconds) ? 0 : Math.min(maxAgeSeconds, MAX_COOKIE_AGE_SECONDS)
    const encoded = encodeBase64Url(Buffer.from(value, 'utf8'))
    const signature = this.signer.sign(value)

    setCookie(c, name, `${encoded}${SEPARATOR}${signature}`, {
      path: '/',
      expires: new Date(this.now().getTime() + Math.max(maxAge, -MAX_COOKIE_AGE_SECONDS) * 1000),
      maxAge: maxAge === 0 ? undefined : maxAge,
      httpOnly: true,
      secure: true,
      sameSite: 'Strict',
    })

    // A negative max-age deletes the cookie on the client
    this.overlay(c).set(name, maxAge < 0 ? '' : value)
  }

  /**
   * Read and verify a signed cookie. Returns "" when the cookie is absent,
   * malformed or carries a signature that does not match.
   */
  readCookie(c: CookieContext, name: string): string {
    const pending = this.written.get(c)?.get(name)
    if (pending !== undefined) {
      return pending
    }

    const raw = getCookie(c, name)
    if (!raw) return ''

    const separator = raw.indexOf(SEPARATOR)
    if (separator === -1) return ''

    const payload = decodeBase64Url(raw.slice(0, separator))
    if (payload === null) return ''

    if (!this.signer.verify(payload, raw.slice(separator + 1))) return ''

    return payload.toString('utf8')
  }

  /**
   * Expire a cookie on the client.
   *
   * @throws RampartError INVALID_COOKIE_NAME when the name is not a token
   */
  delCookie(c: CookieContext, name: string): void {
    deleteCookie(c, name, { path: '/', httpOnly: true, secure: true })
    this.overlay(c).set(name, '')
  }

  /**
   * Read a cookie and delete it, whatever the read returned.
   */
  readFlash(c: CookieContext, name: string): string {
    const value = this.readCookie(c, name)
    this.delCookie(c, name)
    return value
  }

  private overlay(c: CookieContext): Map<string, string> {
    let entries = this.written.get(c)
    if (!entries) {
      entries = new Map()
      this.written.set(c, entries)
    }
    return entries
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Middleware
// ─────────────────────────────────────────────────────────────────────────────

const managers = new WeakMap<object, CookieManager>()

/**
 * Create one CookieManager and attach it to every request.
 *
 * @throws RampartError INVALID_CONFIG when the secret is empty
 */
export function cookieManager<E extends Record<string, unknown> = Record<string, unknown>>(
  secret: SignerKey,
  options: CookieManagerOptions = {}
): HttpMiddleware<E> {
  const manager = new CookieManager(secret, options)

  return async (c, next) => {
    managers.set(c, manager)
    await next()
  }
}

/**
 * The request's CookieManager, or undefined when cookieManager() is not installed
 */
export function getCookieManager(c: object): CookieManager | undefined {
  return managers.get(c)
}
