/**
 * Cookie Utilities
 *
 * Raw cookie codec used by the cookie manager: parse the Cookie request
 * header, build Set-Cookie values, queue them on the context.
 *
 * @example
 * ```typescript
 * import { getCookie, setCookie, deleteCookie } from 'rampart/http'
 *
 * const theme = getCookie(ctx, 'theme')
 * setCookie(ctx, 'theme', 'dark', { path: '/', httpOnly: true })
 * deleteCookie(ctx, 'old-theme', { path: '/' })
 * ```
 */

import { Errors } from '../errors/index.js'

/**
 * Cookie options for setCookie
 */
export interface CookieOptions {
  /** Domain for the cookie */
  domain?: string
  /** Expiration date */
  expires?: Date
  /** HTTP only flag (not accessible via JavaScript) */
  httpOnly?: boolean
  /** Max age in seconds */
  maxAge?: number
  /** Cookie path */
  path?: string
  /** Secure flag (HTTPS only) */
  secure?: boolean
  /** SameSite attribute */
  sameSite?: 'Strict' | 'Lax' | 'None'
}

/**
 * What the cookie helpers need from a request context.
 * HttpContext satisfies it; so does a two-method test double.
 */
export interface CookieContext {
  req: {
    header(name: string): string | undefined
  }
  header(name: string, value: string, options?: { append?: boolean }): void
}

/**
 * Parse a cookie header string into key-value pairs.
 * When a name repeats, the first occurrence wins.
 *
 * @example
 * ```typescript
 * parseCookies('session=abc123; theme=dark; theme=light')
 * // => { session: 'abc123', theme: 'dark' }
 * ```
 */
export function parseCookies(cookieHeader: string | undefined | null): Record<string, string> {
  const cookies: Record<string, string> = Object.create(null)

  if (!cookieHeader) {
    return cookies
  }

  for (const pair of cookieHeader.split(';')) {
    const eqIndex = pair.indexOf('=')
    if (eqIndex === -1) continue

    const key = pair.slice(0, eqIndex).trim()
    if (!key || key in cookies) continue

    let value = pair.slice(eqIndex + 1).trim()

    // Handle quoted values
    if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
      value = value.slice(1, -1)
    }

    try {
      cookies[key] = decodeURIComponent(value)
    } catch {
      // Not percent-encoding; keep the raw value
      cookies[key] = value
    }
  }

  return cookies
}

/**
 * Get a specific cookie value from the request
 *
 * @example
 * ```typescript
 * const theme = getCookie(ctx, 'theme') ?? 'light'
 * ```
 */
export function getCookie(ctx: CookieContext, name: string): string | undefined {
  return parseCookies(ctx.req.header('cookie'))[name]
}

/**
 * Get all cookies from the request
 */
export function getCookies(ctx: CookieContext): Record<string, string> {
  return parseCookies(ctx.req.header('cookie'))
}

const TOKEN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/

/**
 * Whether a name can be used as a cookie name (an RFC 6265 token: no
 * separators, spaces or control characters).
 */
export function isCookieName(name: string): boolean {
  return TOKEN.test(name)
}

// RFC 6265 cookie-octet, minus '%' so that parseCookies can decode the result
function isCookieOctet(code: number): boolean {
  return (
    code === 0x21 ||
    (code >= 0x23 && code <= 0x2b && code !== 0x25) ||
    (code >= 0x2d && code <= 0x3a) ||
    (code >= 0x3c && code <= 0x5b) ||
    (code >= 0x5d && code <= 0x7e)
  )
}

/**
 * Percent-encode the characters a cookie value may not carry.
 * Base64url text and the '|' separator pass through unchanged.
 */
export function encodeCookieValue(value: string): string {
  let encoded = ''
  for (const char of value) {
    const code = char.codePointAt(0) ?? 0
    encoded += isCookieOctet(code) ? char : encodeURIComponent(char)
  }
  return encoded
}

/**
 * Generate a Set-Cookie header value string
 *
 * @example
 * ```typescript
 * generateCookie('session', 'abc123', { httpOnly: true, secure: true, sameSite: 'Lax', maxAge: 3600 })
 * // => "session=abc123; Max-Age=3600; HttpOnly; Secure; SameSite=Lax"
 * ```
 *
 * @throws RampartError INVALID_COOKIE_NAME when the name is not a token
 */
export function generateCookie(name: string, value: string, options: CookieOptions = {}): string {
  if (!isCookieName(name)) {
    throw Errors.invalidCookieName(name)
  }

  const parts: string[] = [`${name}=${encodeCookieValue(value)}`]

  if (options.domain) {
    parts.push(`Domain=${options.domain}`)
  }

  if (options.path) {
    parts.push(`Path=${options.path}`)
  }

  if (options.expires) {
    parts.push(`Expires=${options.expires.toUTCString()}`)
  }

  if (options.maxAge !== undefined) {
    parts.push(`Max-Age=${Math.max(0, Math.floor(options.maxAge))}`)
  }

  if (options.httpOnly) {
    parts.push('HttpOnly')
  }

  if (options.secure) {
    parts.push('Secure')
  }

  if (options.sameSite) {
    parts.push(`SameSite=${options.sameSite}`)
  }

  return parts.join('; ')
}

/**
 * Queue a Set-Cookie line on the response. Never replaces earlier lines.
 */
export function setCookie(
  ctx: CookieContext,
  name: string,
  value: string,
  options: CookieOptions = {}
): void {
  ctx.header('set-cookie', generateCookie(name, value, options), { append: true })
}

/**
 * Delete a cookie by setting it to expire immediately
 *
 * @example
 * ```typescript
 * deleteCookie(ctx, 'session', { path: '/', httpOnly: true, secure: true })
 * ```
 */
export function deleteCookie(
  ctx: CookieContext,
  name: string,
  options: Pick<CookieOptions, 'domain' | 'path' | 'httpOnly' | 'secure'> = {}
): void {
  setCookie(ctx, name, '', {
    ...options,
    expires: new Date(0),
    maxAge: 0,
  })
}
