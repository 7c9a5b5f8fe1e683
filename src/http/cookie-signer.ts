/**
 * CookieSigner
 *
 * HMAC-SHA256 tags for cookie payloads, encoded as padded URL-safe base64
 * (RFC 4648 §5 with '=' padding).
 */

import { createHmac, timingSafeEqual } from 'node:crypto'

export type SignerKey = string | Uint8Array

function toBytes(data: string | Uint8Array): Buffer {
  return typeof data === 'string' ? Buffer.from(data, 'utf8') : Buffer.from(data)
}

export class CookieSigner {
  private readonly key: Buffer

  /**
   * @param key - Secret key. Copied; later changes to the caller's buffer have no effect.
   */
  constructor(key: SignerKey) {
    this.key = toBytes(key)
  }

  /** Tag bytes for a payload */
  digest(payload: string | Uint8Array): Buffer {
    return createHmac('sha256', this.key).update(toBytes(payload)).digest()
  }

  /** URL-safe base64 tag for a payload */
  sign(payload: string | Uint8Array): string {
    return encodeBase64Url(this.digest(payload))
  }

  /**
   * Check a URL-safe base64 tag against a payload in constant time.
   * A tag that is not in canonical padded form never verifies.
   */
  verify(payload: string | Uint8Array, signature: string): boolean {
    const given = decodeBase64Url(signature)
    if (given === null) return false

    const expected = this.digest(payload)
    if (given.length !== expected.length) return false

    return timingSafeEqual(given, expected)
  }
}

const PADDED_BASE64URL = /^(?:[A-Za-z0-9_-]{4})*(?:[A-Za-z0-9_-]{2}==|[A-Za-z0-9_-]{3}=)?$/

/** Padded URL-safe base64 */
export function encodeBase64Url(data: Uint8Array): string {
  return Buffer.from(data).toString('base64').replace(/\+/g, '-').replace(/\//g, '_')
}

/**
 * Strict padded URL-safe base64 decode.
 * Returns null for missing padding, foreign characters or non-canonical trailing bits.
 */
export function decodeBase64Url(encoded: string): Buffer | null {
  if (!PADDED_BASE64URL.test(encoded)) return null
  const bytes = Buffer.from(encoded, 'base64url')
  return encodeBase64Url(bytes) === encoded ? bytes : null
}
