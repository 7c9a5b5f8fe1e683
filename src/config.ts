/**
 * Configuration
 *
 * zod schemas for the values the middleware is constructed with. Every
 * config is validated once at startup and frozen; nothing mutates it after.
 *
 * @example
 * ```typescript
 * const csp = parseCspConfig({ defaultSrc: ["'self'"], imgSrc: ["'self'", 'data:'] })
 * const files = parseFileServingConfig({ urlPath: '/static', root: './public', cacheMaxAgeSeconds: 3600 })
 * ```
 */

import * as path from 'node:path'
import { z } from 'zod'
import { Errors } from './errors/index.js'
import { CSP_DIRECTIVES, type CspConfig, type CspDirectiveKey } from './http/csp.js'

// ─────────────────────────────────────────────────────────────────────────────
// Schemas
// ─────────────────────────────────────────────────────────────────────────────

const sourceToken = z
  .string()
  .min(1, 'source token must not be empty')
  .regex(/^[^\s;,]+$/, 'source token must not contain whitespace, ";" or ","')

const sourceList = z.array(sourceToken).optional()

export const cspConfigSchema = z
  .object({
    defaultSrc: sourceList,
    styleSrc: sourceList,
    scriptSrc: sourceList,
    imgSrc: sourceList,
    fontSrc: sourceList,
    connectSrc: sourceList,
    frameSrc: sourceList,
    mediaSrc: sourceList,
    objectSrc: sourceList,
    manifestSrc: sourceList,
    formAction: sourceList,
  })
  .strict()

export const fileServingConfigSchema = z
  .object({
    /** Mount point, e.g. '/static' */
    urlPath: z
      .string()
      .startsWith('/', 'urlPath must start with "/"')
      .refine((p) => !/[{}*:]/.test(p), 'urlPath must not contain URL parameters ({, }, *, :)'),
    /** Filesystem root */
    root: z.string().min(1),
    /** Interior path joined between root and request path; rooted and cleaned here */
    prefix: z
      .string()
      .refine((p) => !p.includes('\0'), 'prefix must not contain NUL')
      .default('')
      .transform((p) => path.posix.normalize(`/${p}`)),
    /** >0 public max-age, 0 no header, <0 no-store */
    cacheMaxAgeSeconds: z.number().int().default(0),
    /** Opt-in index file served for directory requests */
    index: z
      .string()
      .min(1)
      .refine((name) => !name.includes('/') && name !== '.' && name !== '..', {
        message: 'index must be a plain file name',
      })
      .optional(),
  })
  .strict()

export const compressOptionsSchema = z
  .object({
    minSize: z.number().int().nonnegative().default(1024),
    level: z.number().int().optional(),
    contentTypes: z.array(z.string().min(1)).optional(),
  })
  .strict()

export type FileServingConfigInput = z.input<typeof fileServingConfigSchema>
export type FileServingConfig = Readonly<z.output<typeof fileServingConfigSchema>>
export type CompressOptionsInput = z.input<typeof compressOptionsSchema>
export type CompressOptions = z.output<typeof compressOptionsSchema>

// ─────────────────────────────────────────────────────────────────────────────
// Parsers
// ─────────────────────────────────────────────────────────────────────────────

function toIssues(error: z.ZodError): Array<{ path: string; message: string }> {
  return error.issues.map((issue) => ({
    path: issue.path.map(String).join('.'),
    message: issue.message,
  }))
}

/**
 * Validate a CSP config and return a frozen copy.
 * Absent slots stay absent; empty lists are kept.
 *
 * @throws RampartError INVALID_CONFIG
 */
export function parseCspConfig(input: CspConfig): CspConfig {
  const result = cspConfigSchema.safeParse(input)
  if (!result.success) {
    throw Errors.invalidConfig('csp', toIssues(result.error))
  }

  const frozen: { -readonly [K in CspDirectiveKey]?: readonly string[] } = {}
  for (const { key } of CSP_DIRECTIVES) {
    const tokens = result.data[key]
    if (tokens !== undefined) {
      frozen[key] = Object.freeze([...tokens])
    }
  }
  return Object.freeze(frozen)
}

/**
 * Validate a file-serving config and return a frozen copy with defaults
 * applied.
 *
 * @throws RampartError INVALID_CONFIG
 */
export function parseFileServingConfig(input: FileServingConfigInput): FileServingConfig {
  const result = fileServingConfigSchema.safeParse(input)
  if (!result.success) {
    throw Errors.invalidConfig('fileServer', toIssues(result.error))
  }
  return Object.freeze(result.data)
}

/**
 * Validate compression options.
 * Returns the zod error instead of throwing: compression degrades to a
 * pass-through rather than aborting startup.
 */
export function safeParseCompressOptions(
  input: CompressOptionsInput
): { success: true; data: CompressOptions } | { success: false; issues: Array<{ path: string; message: string }> } {
  const result = compressOptionsSchema.safeParse(input)
  if (!result.success) {
    return { success: false, issues: toIssues(result.error) }
  }
  return { success: true, data: result.data }
}
