/**
 * Compression Middleware
 *
 * Gzip-compresses response bodies for clients that accept it.
 *
 * @example
 * import { compress } from 'rampart/http'
 *
 * // Defaults: 1KB threshold, default level, built-in type list
 * app.use('*', compress())
 *
 * app.use('*', compress({
 *   minSize: 2048,
 *   level: 6,
 *   contentTypes: ['text/html', 'application/json'],
 * }))
 */

import { readFileSync } from 'node:fs'
import { gzip, constants } from 'node:zlib'
import { promisify } from 'node:util'
import { z } from 'zod'
import type { HttpMiddleware } from './app.js'
import { safeParseCompressOptions, type CompressOptionsInput } from '../config.js'
import { createLogger, type Logger } from '../utils/logger.js'

const gzipAsync = promisify(gzip)

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** Level that selects Huffman-only coding */
export const HUFFMAN_ONLY = -2

/** Level that selects zlib's default */
export const DEFAULT_COMPRESSION = -1

/**
 * Content types compressed when no list is given
 */
export const DEFAULT_COMPRESSIBLE_TYPES: readonly string[] = Object.freeze(
  z
    .array(z.string())
    .parse(
      JSON.parse(
        readFileSync(new URL('./data/compressible-types.json', import.meta.url), 'utf8')
      )
    )
)

// Statuses whose body must not be re-encoded
const SKIP_STATUSES = new Set([204, 206, 304])

export interface CompressMiddlewareOptions extends CompressOptionsInput {
  logger?: Logger
}

// ─────────────────────────────────────────────────────────────────────────────
// Compression Middleware
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Create compression middleware.
 *
 * Options that fail validation are logged and yield a middleware that
 * passes every response through untouched.
 */
export function compress<E extends Record<string, unknown> = Record<string, unknown>>(
  options: CompressMiddlewareOptions = {}
): HttpMiddleware<E> {
  const { logger: customLogger, ...input } = options
  const logger = customLogger ?? createLogger('compress')

  const parsed = safeParseCompressOptions(input)
  if (!parsed.success) {
    logger.error({ issues: parsed.issues }, 'Compression disabled: invalid options')
    return async (_c, next) => {
      await next()
    }
  }

  const { minSize } = parsed.data
  const level = resolveLevel(parsed.data.level, logger)
  const types = new Set(
    (parsed.data.contentTypes?.length ? parsed.data.contentTypes : DEFAULT_COMPRESSIBLE_TYPES).map(
      (type) => type.toLowerCase()
    )
  )

  return async (c, next) => {
    await next()

    const res = c.res
    if (!res || !res.body) {
      return
    }

    if (c.req.method === 'HEAD' || SKIP_STATUSES.has(res.status)) {
      return
    }

    if (!acceptsGzip(c.req.header('accept-encoding'))) {
      return
    }

    const contentType = res.headers.get('content-type')
    if (!contentType || !types.has(baseType(contentType))) {
      return
    }

    if (res.headers.has('content-encoding')) {
      return
    }

    const body = new Uint8Array(await res.arrayBuffer())

    if (body.byteLength < minSize) {
      // The original body is consumed; hand back the buffered copy
      c.res = new Response(body, {
        status: res.status,
        statusText: res.statusText,
        headers: res.headers,
      })
      return
    }

    const compressed = await gzipAsync(body, level)

    const headers = new Headers(res.headers)
    headers.set('Content-Encoding', 'gzip')
    headers.set('Content-Length', compressed.length.toString())

    // A strong ETag names the identity bytes
    const etag = headers.get('ETag')
    if (etag && !etag.startsWith('W/')) {
      headers.set('ETag', `W/${etag}`)
    }

    // Add Vary header
    const vary = headers.get('Vary')
    if (vary) {
      if (!vary.toLowerCase().includes('accept-encoding')) {
        headers.set('Vary', `${vary}, Accept-Encoding`)
      }
    } else {
      headers.set('Vary', 'Accept-Encoding')
    }

    c.res = new Response(new Uint8Array(compressed), {
      status: res.status,
      statusText: res.statusText,
      headers,
    })
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Helper Functions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Map a level to zlib options. Out-of-range levels fall back to the default.
 */
function resolveLevel(
  level: number | undefined,
  logger: Logger
): { level: number; strategy?: number } {
  if (level === undefined || level === DEFAULT_COMPRESSION) {
    return { level: constants.Z_DEFAULT_COMPRESSION }
  }
  if (level === HUFFMAN_ONLY) {
    return { level: constants.Z_DEFAULT_COMPRESSION, strategy: constants.Z_HUFFMAN_ONLY }
  }
  if (level >= constants.Z_NO_COMPRESSION && level <= constants.Z_BEST_COMPRESSION) {
    return { level }
  }

  logger.warn({ level }, 'Invalid compression level, using default')
  return { level: constants.Z_DEFAULT_COMPRESSION }
}

/**
 * Whether Accept-Encoding admits gzip (explicitly or through *) with q > 0
 */
export function acceptsGzip(acceptEncoding: string | undefined): boolean {
  if (!acceptEncoding) return false

  let wildcard = false
  for (const part of acceptEncoding.toLowerCase().split(',')) {
    const [coding, ...params] = part.split(';').map((s) => s.trim())
    const qParam = params.find((p) => p.startsWith('q='))
    const q = qParam ? Number(qParam.slice(2)) : 1
    const accepted = !Number.isNaN(q) && q > 0

    if (coding === 'gzip' || coding === 'x-gzip') return accepted
    if (coding === '*') wildcard = accepted
  }
  return wildcard
}

function baseType(contentType: string): string {
  return contentType.split(';')[0].trim().toLowerCase()
}
