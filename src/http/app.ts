/**
 * HttpApp - Fetch-style HTTP Router
 *
 * The host the middleware runs in:
 * - Routes: get, post, head, on
 * - Middleware: use with next() pattern
 * - Error handling: notFound(), onError()
 * - Fetch handler: fetch() for any Fetch-compatible server or for tests
 *
 * Headers queued on the context with c.header() are applied to the response
 * that ends the request, including error and not-found responses.
 */

import { HttpContext, type HttpContextInterface } from './context.js'
import { createLogger, type Logger } from '../utils/logger.js'

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/** HTTP methods */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'OPTIONS' | 'HEAD'

/** Handler function for routes */
export type HttpHandler<E extends Record<string, unknown> = Record<string, unknown>> = (
  c: HttpContextInterface<E>
) => Response | Promise<Response>

/** Middleware function with next() */
export type HttpMiddleware<E extends Record<string, unknown> = Record<string, unknown>> = (
  c: HttpContextInterface<E>,
  next: () => Promise<void>
) => void | Promise<void | Response> | Response

/** Error handler function */
export type HttpErrorHandler<E extends Record<string, unknown> = Record<string, unknown>> = (
  err: Error,
  c: HttpContextInterface<E>
) => Response | Promise<Response>

/** Not found handler function */
export type HttpNotFoundHandler<E extends Record<string, unknown> = Record<string, unknown>> = (
  c: HttpContextInterface<E>
) => Response | Promise<Response>

export interface HttpAppOptions {
  /** Prefix for every registered route */
  basePath?: string
  /** Logger for unhandled errors */
  logger?: Logger
}

/** Route definition */
interface Route<E extends Record<string, unknown>> {
  method: HttpMethod
  pattern: RegExp
  paramNames: string[]
  handler: HttpHandler<E>
  middlewares: HttpMiddleware<E>[]
  path: string
}

/** Pattern compilation result */
interface CompiledPattern {
  pattern: RegExp
  paramNames: string[]
}

// ─────────────────────────────────────────────────────────────────────────────
// Path Pattern Compilation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Compile a path pattern into a regex
 *
 * Supports:
 * - Static paths: /users
 * - Parameters: /users/:id
 * - Wildcards: /assets/* (matches /assets/app.js)
 * - Optional params: /users/:id?
 *
 * @example
 * compilePath('/users/:id') → { pattern: /^\/users\/([^/]+)$/, paramNames: ['id'] }
 * compilePath('/assets/*') → { pattern: /^\/assets\/(.*)$/, paramNames: ['*'] }
 */
function compilePath(path: string): CompiledPattern {
  const paramNames: string[] = []

  const pattern = path
    .replace(/[.+^${}()|[\]\\]/g, '\\$&')
    .replace(/:([a-zA-Z_][a-zA-Z0-9_]*)(\?)?/g, (_, name: string, optional: string) => {
      paramNames.push(name)
      return optional ? '([^/]*)?' : '([^/]+)'
    })
    .replace(/\*$/, '(.*)')
    .replace(/\*/g, '([^/]*)')

  if (path.includes('*')) {
    paramNames.push('*')
  }

  return {
    pattern: new RegExp(`^${pattern}$`),
    paramNames,
  }
}

/**
 * Match a path against a pattern and extract params.
 * A param that is not valid percent-encoding makes the route not match.
 */
function matchPath(
  pathname: string,
  pattern: RegExp,
  paramNames: string[]
): Record<string, string> | null {
  const match = pathname.match(pattern)
  if (!match) return null

  const params: Record<string, string> = {}
  for (let i = 0; i < paramNames.length; i++) {
    const value = match[i + 1]
    if (value !== undefined) {
      try {
        params[paramNames[i]] = decodeURIComponent(value)
      } catch {
        return null
      }
    }
  }
  return params
}

function middlewarePattern(path: string): RegExp {
  const patternStr = path.replace(/[.+^${}()|[\]\\]/g, '\\$&').replace(/\*/g, '.*')
  return new RegExp(`^${patternStr}`)
}

// ─────────────────────────────────────────────────────────────────────────────
// HttpApp Class
// ─────────────────────────────────────────────────────────────────────────────

/**
 * @example
 * const app = new HttpApp()
 *
 * app.use(nonceHeaders({ defaultSrc: ["'self'"] }))
 * app.use(cookieManager(secret))
 *
 * app.get('/', (c) => c.html(`<script nonce="${getNonce(c)}">…</script>`))
 *
 * const res = await app.fetch(new Request('http://localhost/'))
 */
export class HttpApp<E extends Record<string, unknown> = Record<string, unknown>> {
  private routes: Route<E>[] = []
  private globalMiddlewares: { path: string; pattern: RegExp; middleware: HttpMiddleware<E> }[] = []
  private notFoundHandler: HttpNotFoundHandler<E> | null = null
  private errorHandler: HttpErrorHandler<E> | null = null
  /** Prefix added to every route and middleware path */
  readonly basePath: string
  private readonly logger: Logger

  constructor(options: HttpAppOptions = {}) {
    this.basePath = options.basePath ?? ''
    this.logger = options.logger ?? createLogger('http')
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Route Registration Methods
  // ───────────────────────────────────────────────────────────────────────────

  get(path: string, handler: HttpHandler<E>, ...middlewares: HttpMiddleware<E>[]): this {
    return this.on('GET', path, handler, ...middlewares)
  }

  post(path: string, handler: HttpHandler<E>, ...middlewares: HttpMiddleware<E>[]): this {
    return this.on('POST', path, handler, ...middlewares)
  }

  head(path: string, handler: HttpHandler<E>, ...middlewares: HttpMiddleware<E>[]): this {
    return this.on('HEAD', path, handler, ...middlewares)
  }

  /**
   * Register a route for a specific method.
   * Route middlewares run after the global ones, in the order given.
   */
  on(
    method: HttpMethod,
    path: string,
    handler: HttpHandler<E>,
    ...middlewares: HttpMiddleware<E>[]
  ): this {
    const fullPath = this.basePath + path
    const { pattern, paramNames } = compilePath(fullPath)

    this.routes.push({
      method,
      pattern,
      paramNames,
      handler,
      middlewares,
      path: fullPath,
    })

    return this
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Middleware Methods
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Register middleware for a path pattern
   *
   * @example
   * app.use('*', securityHeaders())  // All routes
   * app.use('/app/*', nonceHeaders(csp)) // Only /app/* routes
   */
  use(path: string, middleware: HttpMiddleware<E>): this
  use(middleware: HttpMiddleware<E>): this
  use(pathOrMiddleware: string | HttpMiddleware<E>, maybeMiddleware?: HttpMiddleware<E>): this {
    let path = '*'
    let middleware: HttpMiddleware<E>

    if (typeof pathOrMiddleware === 'string') {
      if (!maybeMiddleware) {
        throw new Error(`use('${pathOrMiddleware}') requires a middleware`)
      }
      path = pathOrMiddleware
      middleware = maybeMiddleware
    } else {
      middleware = pathOrMiddleware
    }

    const fullPath = this.basePath + path
    this.globalMiddlewares.push({
      path: fullPath,
      pattern: middlewarePattern(fullPath),
      middleware,
    })

    return this
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Error Handlers
  // ───────────────────────────────────────────────────────────────────────────

  notFound(handler: HttpNotFoundHandler<E>): this {
    this.notFoundHandler = handler
    return this
  }

  onError(handler: HttpErrorHandler<E>): this {
    this.errorHandler = handler
    return this
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Request Handling
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Fetch handler - compatible with Web Fetch API
   */
  fetch = async (request: Request): Promise<Response> => {
    const url = new URL(request.url)
    const method = request.method.toUpperCase()
    const pathname = url.pathname

    let matchedRoute: Route<E> | null = null
    let params: Record<string, string> = {}

    for (const route of this.routes) {
      if (route.method !== method) continue

      const matchedParams = matchPath(pathname, route.pattern, route.paramNames)
      if (matchedParams) {
        matchedRoute = route
        params = matchedParams
        break
      }
    }

    const ctx = new HttpContext<E>(request, params)

    try {
      const matchingMiddlewares = this.globalMiddlewares
        .filter((mw) => mw.pattern.test(pathname))
        .map((mw) => mw.middleware)

      const routeMiddlewares = matchedRoute ? matchedRoute.middlewares : []
      const allMiddlewares = [...matchingMiddlewares, ...routeMiddlewares]
      const route = matchedRoute

      let index = 0
      const executeNext = async (): Promise<void> => {
        if (index < allMiddlewares.length) {
          const middleware = allMiddlewares[index++]
          const result = await middleware(ctx, executeNext)
          // A middleware returning a Response short-circuits the chain
          if (result instanceof Response) {
            ctx.res = result
          }
        } else if (route) {
          ctx.res = await route.handler(ctx)
        }
      }

      await executeNext()

      if (!ctx.res) {
        if (matchedRoute) {
          return ctx.finalize(new Response('Internal Server Error', { status: 500 }))
        }
        if (this.notFoundHandler) {
          return ctx.finalize(await this.notFoundHandler(ctx))
        }
        return ctx.finalize(new Response('Not Found', { status: 404 }))
      }

      return ctx.finalize(ctx.res)
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err))

      if (this.errorHandler) {
        try {
          return ctx.finalize(await this.errorHandler(error, ctx))
        } catch (handlerError) {
          this.logger.error({ err: handlerError }, 'Error in error handler')
          return this.internalError(ctx)
        }
      }

      this.logger.error({ err: error, method, path: pathname }, 'Unhandled error')
      return this.internalError(ctx)
    }
  }

  /**
   * Last-resort 500. Queued headers are dropped when they cannot be applied
   * (e.g. a value the Headers class rejects).
   */
  private internalError(ctx: HttpContext<E>): Response {
    const response = new Response('Internal Server Error', { status: 500 })
    try {
      return ctx.finalize(response)
    } catch (err) {
      this.logger.error({ err }, 'Queued headers rejected')
      return new Response('Internal Server Error', { status: 500 })
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Inspection & Debugging
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Get all registered routes (for debugging/documentation)
   */
  getRoutes(): { method: string; path: string }[] {
    return this.routes.map((r) => ({
      method: r.method,
      path: r.path,
    }))
  }
}

export default HttpApp
