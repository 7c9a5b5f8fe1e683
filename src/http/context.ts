/**
 * HttpContext
 *
 * Per-request context handed to middleware and handlers:
 * - Request helpers: c.req.param(), c.req.query(), c.req.header(), c.req.json()
 * - Response helpers: c.json(), c.text(), c.html(), c.body(), c.redirect()
 * - Pending response headers: c.header() (applied to the final response)
 * - Context storage: c.set(), c.get(), c.var
 */

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/** HTTP Request wrapper interface */
export interface HttpRequest {
  /** Raw Request object */
  raw: Request

  /** HTTP method */
  readonly method: string

  /** Request URL */
  readonly url: string

  /** Request path (without query string) */
  readonly path: string

  /** Get a path parameter (e.g., 'id' for /users/:id, '*' for wildcards) */
  param(name: string): string | undefined
  /** Get all path parameters */
  param(): Record<string, string>

  /** Get a query parameter */
  query(name: string): string | undefined
  /** Get all query parameters */
  query(): Record<string, string>

  /** Get a header value (case-insensitive) */
  header(name: string): string | undefined
  /** Get all headers, keyed by lower-case name */
  header(): Record<string, string>

  /**
   * Parse request body as JSON
   * @throws If body is not valid JSON
   */
  json<T = unknown>(): Promise<T>

  /** Get request body as text */
  text(): Promise<string>
}

/** Redirect status codes */
export type RedirectStatus = 301 | 302 | 303 | 307 | 308

/** Options for c.header() */
export interface HeaderOptions {
  /** Add another value instead of replacing (Set-Cookie always gets its own line) */
  append?: boolean
}

/** HTTP Context interface */
export interface HttpContextInterface<
  E extends Record<string, unknown> = Record<string, unknown>
> {
  /** Request wrapper */
  req: HttpRequest

  /** Response (set by handler or middleware) */
  res: Response | undefined

  /** Set a variable in context storage */
  set<K extends keyof E>(key: K, value: E[K]): void

  /** Get a variable from context storage */
  get<K extends keyof E>(key: K): E[K] | undefined

  /** Access all context variables */
  readonly var: Partial<E>

  /**
   * Queue a response header.
   *
   * Queued headers are applied to whichever response ends the request.
   * Set-Cookie lines are added; other headers are only set when the
   * response does not already carry them.
   */
  header(name: string, value: string, options?: HeaderOptions): void

  /** Create a JSON response */
  json<T>(data: T, status?: number, headers?: HeadersInit): Response

  /** Create a text response */
  text(data: string, status?: number, headers?: HeadersInit): Response

  /** Create an HTML response */
  html(data: string, status?: number, headers?: HeadersInit): Response

  /** Create a response with a body */
  body(data: BodyInit | null, status?: number, headers?: HeadersInit): Response

  /** Create a redirect response (relative locations are kept as-is) */
  redirect(location: string, status?: RedirectStatus): Response

  /** Apply queued headers to a response */
  finalize(response: Response): Response
}

// ─────────────────────────────────────────────────────────────────────────────
// HttpRequest Implementation
// ─────────────────────────────────────────────────────────────────────────────

class HttpRequestImpl implements HttpRequest {
  raw: Request
  private params: Record<string, string>
  private parsedUrl: URL
  private queryParams: Record<string, string> | null = null
  private headersObj: Record<string, string> | null = null
  private cachedText: string | undefined

  constructor(request: Request, params: Record<string, string>) {
    this.raw = request
    this.params = params
    this.parsedUrl = new URL(request.url)
  }

  get method(): string {
    return this.raw.method
  }

  get url(): string {
    return this.raw.url
  }

  get path(): string {
    return this.parsedUrl.pathname
  }

  param(name: string): string | undefined
  param(): Record<string, string>
  param(name?: string): string | undefined | Record<string, string> {
    if (name === undefined) {
      return { ...this.params }
    }
    return this.params[name]
  }

  query(name: string): string | undefined
  query(): Record<string, string>
  query(name?: string): string | undefined | Record<string, string> {
    if (this.queryParams === null) {
      const collected: Record<string, string> = {}
      for (const [key, value] of this.parsedUrl.searchParams) {
        collected[key] = value
      }
      this.queryParams = collected
    }

    if (name === undefined) {
      return { ...this.queryParams }
    }
    return this.queryParams[name]
  }

  header(name: string): string | undefined
  header(): Record<string, string>
  header(name?: string): string | undefined | Record<string, string> {
    if (this.headersObj === null) {
      const collected: Record<string, string> = {}
      this.raw.headers.forEach((value, key) => {
        collected[key.toLowerCase()] = value
      })
      this.headersObj = collected
    }

    if (name === undefined) {
      return { ...this.headersObj }
    }
    return this.headersObj[name.toLowerCase()]
  }

  async json<T = unknown>(): Promise<T> {
    const parsed: T = JSON.parse(await this.text())
    return parsed
  }

  async text(): Promise<string> {
    if (this.cachedText !== undefined) {
      return this.cachedText
    }
    this.cachedText = await this.raw.text()
    return this.cachedText
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// HttpContext Implementation
// ─────────────────────────────────────────────────────────────────────────────

export class HttpContext<E extends Record<string, unknown> = Record<string, unknown>>
  implements HttpContextInterface<E>
{
  req: HttpRequest
  res: Response | undefined

  private variables: Partial<E> = {}
  private pendingHeaders = new Map<string, { name: string; value: string }>()
  private pendingCookies: string[] = []

  constructor(request: Request, params: Record<string, string> = {}) {
    this.req = new HttpRequestImpl(request, params)
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Context Storage
  // ───────────────────────────────────────────────────────────────────────────

  set<K extends keyof E>(key: K, value: E[K]): void {
    this.variables[key] = value
  }

  get<K extends keyof E>(key: K): E[K] | undefined {
    return this.variables[key]
  }

  get var(): Partial<E> {
    return this.variables
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Response Headers
  // ───────────────────────────────────────────────────────────────────────────

  header(name: string, value: string, options: HeaderOptions = {}): void {
    const key = name.toLowerCase()

    if (key === 'set-cookie') {
      if (options.append) {
        this.pendingCookies.push(value)
      } else {
        this.pendingCookies = [value]
      }
      return
    }

    const existing = this.pendingHeaders.get(key)
    if (options.append && existing) {
      existing.value = `${existing.value}, ${value}`
    } else {
      this.pendingHeaders.set(key, { name, value })
    }
  }

  finalize(response: Response): Response {
    if (this.pendingHeaders.size === 0 && this.pendingCookies.length === 0) {
      return response
    }

    const headers = new Headers(response.headers)
    for (const { name, value } of this.pendingHeaders.values()) {
      if (!headers.has(name)) {
        headers.set(name, value)
      }
    }
    for (const cookie of this.pendingCookies) {
      headers.append('Set-Cookie', cookie)
    }

    return new Response(response.body, {
      status: response.status,
      statusText: response.statusText,
      headers,
    })
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Response Helpers
  // ───────────────────────────────────────────────────────────────────────────

  json<T>(data: T, status = 200, headers?: HeadersInit): Response {
    const responseHeaders = new Headers(headers)
    responseHeaders.set('Content-Type', 'application/json; charset=UTF-8')
    return new Response(JSON.stringify(data), { status, headers: responseHeaders })
  }

  text(data: string, status = 200, headers?: HeadersInit): Response {
    const responseHeaders = new Headers(headers)
    responseHeaders.set('Content-Type', 'text/plain; charset=UTF-8')
    return new Response(data, { status, headers: responseHeaders })
  }

  html(data: string, status = 200, headers?: HeadersInit): Response {
    const responseHeaders = new Headers(headers)
    responseHeaders.set('Content-Type', 'text/html; charset=UTF-8')
    return new Response(data, { status, headers: responseHeaders })
  }

  body(data: BodyInit | null, status = 200, headers?: HeadersInit): Response {
    return new Response(data, { status, headers: new Headers(headers) })
  }

  redirect(location: string, status: RedirectStatus = 302): Response {
    return new Response(null, { status, headers: { Location: location } })
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Exports
// ─────────────────────────────────────────────────────────────────────────────

export default HttpContext
