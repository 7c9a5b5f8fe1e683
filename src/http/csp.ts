/**
 * Content-Security-Policy Builder
 *
 * Renders a CSP header value from a directive config and a per-request nonce.
 *
 * @example
 * buildCsp({ defaultSrc: ["'self'"] }, nonce)
 * // => "default-src 'self' 'nonce-<nonce>'"
 */

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * CSP directive slots.
 *
 * An absent slot is not emitted. An empty list is emitted (as the bare
 * directive, or with only the nonce for the nonce-carrying directives).
 */
export interface CspConfig {
  readonly defaultSrc?: readonly string[]
  readonly styleSrc?: readonly string[]
  readonly scriptSrc?: readonly string[]
  readonly imgSrc?: readonly string[]
  readonly fontSrc?: readonly string[]
  readonly connectSrc?: readonly string[]
  readonly frameSrc?: readonly string[]
  readonly mediaSrc?: readonly string[]
  readonly objectSrc?: readonly string[]
  readonly manifestSrc?: readonly string[]
  readonly formAction?: readonly string[]
}

export type CspDirectiveKey = keyof CspConfig

export interface CspDirective {
  key: CspDirectiveKey
  name: string
  /** Whether the request nonce is appended to this directive's sources */
  nonce: boolean
}

// ─────────────────────────────────────────────────────────────────────────────
// Directive Order
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Emission order. The nonce goes on default-src, style-src and script-src
 * only; this is fixed policy.
 */
export const CSP_DIRECTIVES: readonly CspDirective[] = [
  { key: 'defaultSrc', name: 'default-src', nonce: true },
  { key: 'styleSrc', name: 'style-src', nonce: true },
  { key: 'scriptSrc', name: 'script-src', nonce: true },
  { key: 'imgSrc', name: 'img-src', nonce: false },
  { key: 'fontSrc', name: 'font-src', nonce: false },
  { key: 'connectSrc', name: 'connect-src', nonce: false },
  { key: 'frameSrc', name: 'frame-src', nonce: false },
  { key: 'mediaSrc', name: 'media-src', nonce: false },
  { key: 'objectSrc', name: 'object-src', nonce: false },
  { key: 'manifestSrc', name: 'manifest-src', nonce: false },
  { key: 'formAction', name: 'form-action', nonce: false },
]

// ─────────────────────────────────────────────────────────────────────────────
// Builder
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Format the source token for a nonce
 */
export function nonceSource(nonce: string): string {
  return `'nonce-${nonce}'`
}

/**
 * Build the Content-Security-Policy header value.
 *
 * Returns an empty string when no directive is set; callers must then leave
 * the header off entirely.
 */
export function buildCsp(config: CspConfig, nonce: string): string {
  const parts: string[] = []
  const nonceToken = nonceSource(nonce)

  for (const directive of CSP_DIRECTIVES) {
    const sources = config[directive.key]
    if (sources === undefined) continue

    const tokens = directive.nonce ? [...sources, nonceToken] : sources
    parts.push(tokens.length > 0 ? `${directive.name} ${tokens.join(' ')}` : directive.name)
  }

  return parts.join('; ')
}

/**
 * Whether a config would produce any header at all
 */
export function hasCspDirectives(config: CspConfig): boolean {
  return CSP_DIRECTIVES.some((directive) => config[directive.key] !== undefined)
}
