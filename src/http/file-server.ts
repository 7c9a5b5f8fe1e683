/**
 * Static File Serving
 *
 * Serves files from a directory under a mount point:
 * - One resolver for every request: path cleaned, prefix joined, symlinks
 *   followed and checked against the real root
 * - Directories are never listed (403), unless an index file is configured
 * - Cache-Control from a signed max-age (see cacheControlFor)
 * - ETag/Last-Modified conditional requests, single byte ranges
 *
 * @example
 * import { HttpApp, mountFileServer } from 'rampart/http'
 *
 * const app = new HttpApp()
 * mountFileServer(app, {
 *   urlPath: '/static',
 *   root: './public',
 *   cacheMaxAgeSeconds: 86400,
 * })
 */

import * as fs from 'node:fs'
import * as path from 'node:path'
import { createHash } from 'node:crypto'
import { z } from 'zod'
import type { HttpApp, HttpHandler } from './app.js'
import type { HttpRequest } from './context.js'
import { defaultErrorReporter, type ErrorReporter, type FileErrorStatus } from './errors.js'
import {
  parseFileServingConfig,
  type FileServingConfig,
  type FileServingConfigInput,
} from '../config.js'
import { Errors, type ErrorCode, type RampartError } from '../errors/index.js'
import { createLogger, type Logger } from '../utils/logger.js'

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type ResolvedFile =
  | { kind: 'file'; filePath: string; stats: fs.Stats }
  | { kind: 'rejected'; status: FileErrorStatus; error: RampartError }

export type FileRejection = Extract<ResolvedFile, { kind: 'rejected' }>

/** A resolved file, open for reading */
export interface OpenedFile {
  kind: 'opened'
  filePath: string
  stats: fs.Stats
  handle: fs.promises.FileHandle
}

export interface FileServerOptions {
  /** Writes 403/404/500 responses (defaults to JSON error bodies) */
  errorReporter?: ErrorReporter
  logger?: Logger
}

// ─────────────────────────────────────────────────────────────────────────────
// MIME Types
// ─────────────────────────────────────────────────────────────────────────────

const MIME_TYPES = z
  .record(z.string())
  .parse(JSON.parse(fs.readFileSync(new URL('./data/mime-types.json', import.meta.url), 'utf8')))

export function contentTypeFor(filePath: string): string {
  return MIME_TYPES[path.extname(filePath).toLowerCase()] ?? 'application/octet-stream'
}

// ─────────────────────────────────────────────────────────────────────────────
// Resolution
// ─────────────────────────────────────────────────────────────────────────────

function statusFor(code: ErrorCode): FileErrorStatus {
  switch (code) {
    case 'PATH_ESCAPE':
    case 'DIRECTORY_LISTING':
      return 403
    case 'FILE_MISSING':
      return 404
    default:
      return 500
  }
}

function reject(error: RampartError): FileRejection {
  return { kind: 'rejected', status: statusFor(error.code), error }
}

function isInside(root: string, candidate: string): boolean {
  return candidate === root || candidate.startsWith(root.endsWith(path.sep) ? root : root + path.sep)
}

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code
  }
  return undefined
}

function isMissing(err: unknown): boolean {
  const code = errnoCode(err)
  return code === 'ENOENT' || code === 'ENOTDIR'
}

/**
 * Resolve a request path (relative to the mount point) to a regular file.
 *
 * `Start → PathNormalize → PrefixJoin → Stat`, then:
 * - regular file inside the real root → file
 * - directory → its index file when configured, otherwise DIRECTORY_LISTING
 * - real path outside the real root → PATH_ESCAPE
 * - nothing there (or a parent is not a directory) → FILE_MISSING
 * - anything else the filesystem reports → FILESYSTEM_ERROR
 */
export async function resolveFile(config: FileServingConfig, urlPath: string): Promise<ResolvedFile> {
  if (urlPath.includes('\0')) {
    return reject(Errors.fileMissing(urlPath))
  }

  const cleaned = path.posix.normalize(urlPath.startsWith('/') ? urlPath : `/${urlPath}`)
  const root = path.resolve(config.root)
  const candidate = path.join(root, config.prefix, cleaned)

  if (!isInside(root, candidate)) {
    return reject(Errors.pathEscape(urlPath))
  }

  try {
    const realRoot = await fs.promises.realpath(root)
    const realPath = await fs.promises.realpath(candidate)
    if (!isInside(realRoot, realPath)) {
      return reject(Errors.pathEscape(urlPath))
    }

    const stats = await fs.promises.stat(realPath)
    if (stats.isFile()) {
      return { kind: 'file', filePath: realPath, stats }
    }
    if (!stats.isDirectory() || !config.index) {
      return reject(Errors.directoryListing(urlPath))
    }

    return await resolveIndex(realRoot, path.join(realPath, config.index), urlPath)
  } catch (err) {
    if (isMissing(err)) {
      return reject(Errors.fileMissing(urlPath))
    }
    return reject(Errors.filesystem(urlPath, err))
  }
}

async function resolveIndex(realRoot: string, indexPath: string, urlPath: string): Promise<ResolvedFile> {
  let realIndex: string
  try {
    realIndex = await fs.promises.realpath(indexPath)
  } catch (err) {
    if (isMissing(err)) {
      return reject(Errors.directoryListing(urlPath))
    }
    throw err
  }

  if (!isInside(realRoot, realIndex)) {
    return reject(Errors.pathEscape(urlPath))
  }

  const stats = await fs.promises.stat(realIndex)
  if (!stats.isFile()) {
    return reject(Errors.directoryListing(urlPath))
  }
  return { kind: 'file', filePath: realIndex, stats }
}

/**
 * Open a resolved file. The entry can change after resolution, so headers
 * are built from the stats of the open handle, and a failed open maps like
 * a failed lookup (missing → 404, anything else → 500).
 */
export async function openFile(
  file: { filePath: string },
  urlPath: string
): Promise<OpenedFile | FileRejection> {
  let handle: fs.promises.FileHandle
  try {
    handle = await fs.promises.open(file.filePath, 'r')
  } catch (err) {
    return reject(isMissing(err) ? Errors.fileMissing(urlPath) : Errors.filesystem(urlPath, err))
  }

  let stats: fs.Stats
  try {
    stats = await handle.stat()
  } catch (err) {
    await handle.close()
    return reject(Errors.filesystem(urlPath, err))
  }

  if (!stats.isFile()) {
    await handle.close()
    return reject(Errors.directoryListing(urlPath))
  }
  return { kind: 'opened', filePath: file.filePath, stats, handle }
}

// ─────────────────────────────────────────────────────────────────────────────
// Cache Policy
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Cache-Control value for a signed max-age:
 * `public, max-age=N` when positive, `no-store` when negative, none at 0.
 */
export function cacheControlFor(maxAgeSeconds: number): string | undefined {
  if (maxAgeSeconds > 0) return `public, max-age=${maxAgeSeconds}`
  if (maxAgeSeconds < 0) return 'no-store'
  return undefined
}

// ─────────────────────────────────────────────────────────────────────────────
// Response
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Generate ETag from file stats
 */
function generateETag(stats: fs.Stats): string {
  const hash = createHash('md5')
    .update(`${stats.size}-${stats.mtime.getTime()}`)
    .digest('hex')
    .slice(0, 16)
  return `"${hash}"`
}

/**
 * Parse a single-range Range header. Returns null when unsatisfiable.
 */
export function parseRange(header: string, fileSize: number): { start: number; end: number } | null {
  const match = header.trim().match(/^bytes=(\d*)-(\d*)$/)
  if (!match || (!match[1] && !match[2])) return null

  let start: number
  let end: number

  if (!match[1]) {
    // Suffix range (e.g., bytes=-500)
    const suffix = parseInt(match[2], 10)
    if (suffix === 0) return null
    start = Math.max(0, fileSize - suffix)
    end = fileSize - 1
  } else {
    start = parseInt(match[1], 10)
    end = match[2] ? Math.min(parseInt(match[2], 10), fileSize - 1) : fileSize - 1
  }

  if (start > end || start >= fileSize) {
    return null
  }

  return { start, end }
}

function notModified(req: HttpRequest, etag: string, mtime: Date): boolean {
  const ifNoneMatch = req.header('if-none-match')
  if (ifNoneMatch) {
    // Weak comparison: a compressed variant carries W/"…" of the same tag
    return ifNoneMatch.split(',').some((tag) => {
      const trimmed = tag.trim()
      return trimmed === '*' || trimmed.replace(/^W\//, '') === etag
    })
  }

  const ifModifiedSince = req.header('if-modified-since')
  if (ifModifiedSince) {
    const since = Date.parse(ifModifiedSince)
    // HTTP dates carry whole seconds
    return !Number.isNaN(since) && Math.floor(mtime.getTime() / 1000) * 1000 <= since
  }

  return false
}

/**
 * Convert Node.js readable stream to Web ReadableStream
 */
function streamToReadableStream(nodeStream: fs.ReadStream): ReadableStream<Uint8Array> {
  return new ReadableStream({
    start(controller) {
      nodeStream.on('data', (chunk: Buffer) => {
        controller.enqueue(new Uint8Array(chunk))
      })
      nodeStream.on('end', () => {
        controller.close()
      })
      nodeStream.on('error', (err) => {
        controller.error(err)
      })
    },
    cancel() {
      nodeStream.destroy()
    },
  })
}

/**
 * Build the response for an opened file. Cache-Control goes in the same
 * header set as the body for 200, 206 and 304. The handle is closed once
 * the body has been read, or right away when there is no body.
 */
export async function sendFile(
  req: HttpRequest,
  file: OpenedFile,
  cacheControl: string | undefined
): Promise<Response> {
  const { filePath, stats, handle } = file
  const etag = generateETag(stats)

  const headers: Record<string, string> = {
    'Content-Type': contentTypeFor(filePath),
    'Content-Length': stats.size.toString(),
    'Last-Modified': stats.mtime.toUTCString(),
    ETag: etag,
    'Accept-Ranges': 'bytes',
  }
  if (cacheControl !== undefined) {
    headers['Cache-Control'] = cacheControl
  }

  if (notModified(req, etag, stats.mtime)) {
    await handle.close()
    delete headers['Content-Length']
    return new Response(null, { status: 304, headers })
  }

  const isHead = req.method === 'HEAD'
  const rangeHeader = req.header('range')

  if (rangeHeader) {
    const range = parseRange(rangeHeader, stats.size)
    if (!range) {
      await handle.close()
      return new Response('Range Not Satisfiable', {
        status: 416,
        headers: { 'Content-Range': `bytes */${stats.size}` },
      })
    }

    const { start, end } = range
    headers['Content-Range'] = `bytes ${start}-${end}/${stats.size}`
    headers['Content-Length'] = (end - start + 1).toString()

    if (isHead) {
      await handle.close()
      return new Response(null, { status: 206, headers })
    }
    return new Response(streamToReadableStream(handle.createReadStream({ start, end })), {
      status: 206,
      headers,
    })
  }

  if (isHead) {
    await handle.close()
    return new Response(null, { status: 200, headers })
  }
  return new Response(streamToReadableStream(handle.createReadStream()), { status: 200, headers })
}

// ─────────────────────────────────────────────────────────────────────────────
// Mount
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Install the file server routes on an app.
 *
 * - `GET urlPath` → 301 to `urlPath/` under the app's basePath (when urlPath lacks the slash)
 * - `GET|HEAD urlPath/*` → file, or an error response from the reporter
 *
 * @throws RampartError INVALID_CONFIG (e.g. URL parameters in urlPath)
 */
export function mountFileServer<E extends Record<string, unknown> = Record<string, unknown>>(
  app: HttpApp<E>,
  input: FileServingConfigInput,
  options: FileServerOptions = {}
): FileServingConfig {
  const config = parseFileServingConfig(input)
  const reporter = options.errorReporter ?? defaultErrorReporter
  const logger = options.logger ?? createLogger('file-server')
  const cacheControl = cacheControlFor(config.cacheMaxAgeSeconds)

  let base = config.urlPath
  if (!base.endsWith('/')) {
    // The app prefixes its basePath to the route, so the client must get it too
    const location = `${app.basePath}${base}/`
    app.get(base, () => new Response(null, { status: 301, headers: { Location: location } }))
    base = `${base}/`
  }

  const serve: HttpHandler<E> = async (c) => {
    const requestPath = c.req.param('*') ?? ''
    const resolved = await resolveFile(config, requestPath)
    const result = resolved.kind === 'file' ? await openFile(resolved, requestPath) : resolved

    if (result.kind === 'rejected') {
      if (result.status === 500) {
        logger.error({ err: result.error, path: requestPath }, 'File server error')
      } else {
        logger.debug({ code: result.error.code, path: requestPath }, 'File request rejected')
      }
      return reporter(result.status, c.req)
    }

    return sendFile(c.req, result, cacheControl)
  }

  app.get(`${base}*`, serve)
  app.head(`${base}*`, serve)

  logger.debug({ urlPath: config.urlPath, root: config.root }, 'File server mounted')
  return config
}
