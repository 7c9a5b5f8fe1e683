/**
 * Nonce Generation
 *
 * One nonce per request: 16 bytes from the system CSPRNG, encoded as
 * unpadded base64url (22 characters, safe in headers and HTML attributes).
 */

import { randomBytes } from 'node:crypto'
import { Errors } from '../errors/index.js'

/** Raw nonce size in bytes */
export const NONCE_SIZE = 16

/** Encoded nonce length in characters */
export const NONCE_LENGTH = 22

/** Shape of every nonce this module produces */
export const NONCE_PATTERN = /^[A-Za-z0-9_-]{22}$/

/**
 * Source of cryptographically secure bytes
 */
export type RandomSource = (size: number) => Uint8Array

/**
 * Generate a nonce.
 *
 * A source that throws or returns short is fatal for the request: the error
 * propagates, and no weaker randomness is substituted.
 *
 * @throws RampartError ENTROPY_FAILURE
 */
export function generateNonce(source: RandomSource = randomBytes): string {
  let bytes: Uint8Array
  try {
    bytes = source(NONCE_SIZE)
  } catch (err) {
    throw Errors.entropyFailure(NONCE_SIZE, err)
  }

  if (bytes.length < NONCE_SIZE) {
    throw Errors.entropyFailure(NONCE_SIZE)
  }

  return Buffer.from(bytes.buffer, bytes.byteOffset, NONCE_SIZE).toString('base64url')
}
