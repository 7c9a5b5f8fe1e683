/**
 * HttpApp Tests
 */

import { describe, it, expect } from 'vitest'
import { pino } from 'pino'
import { HttpApp } from './app.js'
import { HttpContext } from './context.js'

function request(path: string, init?: RequestInit): Request {
  return new Request(`http://localhost${path}`, init)
}

describe('HttpApp routing', () => {
  it('should match methods and params', async () => {
    const app = new HttpApp()
    app.get('/users/:id', (c) => c.json({ id: c.req.param('id') }))
    app.post('/users', (c) => c.text('created', 201))

    const res = await app.fetch(request('/users/42'))
    const created = await app.fetch(request('/users', { method: 'POST' }))

    expect(await res.json()).toEqual({ id: '42' })
    expect(created.status).toBe(201)
  })

  it('should capture the rest of the path for a trailing wildcard', async () => {
    const app = new HttpApp()
    app.get('/files/*', (c) => c.text(c.req.param('*') ?? ''))

    const res = await app.fetch(request('/files/css/site%20main.css'))

    expect(await res.text()).toBe('css/site main.css')
  })

  it('should not match params that are not valid percent-encoding', async () => {
    const app = new HttpApp()
    app.get('/files/*', (c) => c.text('matched'))

    const res = await app.fetch(request('/files/%E0%A4%A'))

    expect(res.status).toBe(404)
  })

  it('should prefix routes with the base path', async () => {
    const app = new HttpApp({ basePath: '/api' })
    app.get('/ping', (c) => c.text('pong'))

    expect(await (await app.fetch(request('/api/ping'))).text()).toBe('pong')
    expect(app.getRoutes()).toEqual([{ method: 'GET', path: '/api/ping' }])
  })

  it('should use the custom not-found handler', async () => {
    const app = new HttpApp()
    app.notFound((c) => c.json({ missing: c.req.path }, 404))

    const res = await app.fetch(request('/nope'))

    expect(res.status).toBe(404)
    expect(await res.json()).toEqual({ missing: '/nope' })
  })

  it('should run middleware in order around the handler', async () => {
    const order: string[] = []
    const app = new HttpApp()
    app.use(async (_c, next) => {
      order.push('a:before')
      await next()
      order.push('a:after')
    })
    app.use('/admin/*', async (_c, next) => {
      order.push('admin')
      await next()
    })
    app.get(
      '/page',
      (c) => {
        order.push('handler')
        return c.text('ok')
      },
      async (_c, next) => {
        order.push('route')
        await next()
      }
    )

    await app.fetch(request('/page'))

    expect(order).toEqual(['a:before', 'route', 'handler', 'a:after'])
  })
})

describe('HttpApp response headers', () => {
  it('should apply queued headers to the handler response', async () => {
    const app = new HttpApp()
    app.use(async (c, next) => {
      c.header('X-One', '1')
      c.header('X-Two', '2')
      await next()
    })
    app.get('/', (c) => c.text('ok'))

    const res = await app.fetch(request('/'))

    expect(res.headers.get('X-One')).toBe('1')
    expect(res.headers.get('X-Two')).toBe('2')
    expect(res.headers.get('Content-Type')).toBe('text/plain; charset=UTF-8')
  })

  it('should let the handler response win over queued headers', async () => {
    const app = new HttpApp()
    app.use(async (c, next) => {
      c.header('Cache-Control', 'no-store')
      await next()
    })
    app.get('/', (c) => c.text('ok', 200, { 'Cache-Control': 'public, max-age=60' }))

    const res = await app.fetch(request('/'))

    expect(res.headers.get('Cache-Control')).toBe('public, max-age=60')
  })

  it('should keep every Set-Cookie line', async () => {
    const app = new HttpApp()
    app.use(async (c, next) => {
      c.header('Set-Cookie', 'a=1', { append: true })
      await next()
    })
    app.get('/', (c) => {
      c.header('Set-Cookie', 'b=2', { append: true })
      return c.text('ok', 200, { 'Set-Cookie': 'c=3' })
    })

    const res = await app.fetch(request('/'))

    expect(res.headers.getSetCookie()).toEqual(['c=3', 'a=1', 'b=2'])
  })

  it('should replace a queued header unless appending', () => {
    const c = new HttpContext(request('/'))
    c.header('Vary', 'Origin')
    c.header('Vary', 'Accept-Encoding', { append: true })
    c.header('X-Mode', 'a')
    c.header('X-Mode', 'b')

    const res = c.finalize(new Response('ok'))

    expect(res.headers.get('Vary')).toBe('Origin, Accept-Encoding')
    expect(res.headers.get('X-Mode')).toBe('b')
  })

  it('should apply queued headers to error handler responses', async () => {
    const app = new HttpApp()
    app.use(async (c, next) => {
      c.header('X-Frame-Options', 'SAMEORIGIN')
      await next()
    })
    app.get('/', () => {
      throw new Error('boom')
    })
    app.onError((err, c) => c.json({ error: err.message }, 500))

    const res = await app.fetch(request('/'))

    expect(res.status).toBe(500)
    expect(await res.json()).toEqual({ error: 'boom' })
    expect(res.headers.get('X-Frame-Options')).toBe('SAMEORIGIN')
  })

  it('should answer and log a plain 500 without an error handler', async () => {
    const lines: string[] = []
    const logger = pino({ level: 'error' }, { write: (msg: string) => lines.push(msg) })
    const app = new HttpApp({ logger })
    app.use(async (c, next) => {
      c.header('X-Content-Type-Options', 'nosniff')
      await next()
    })
    app.get('/', () => {
      throw new Error('secret detail')
    })

    const res = await app.fetch(request('/'))
    const entry: { msg: string; path: string } = JSON.parse(lines[0])

    expect(res.status).toBe(500)
    expect(await res.text()).toBe('Internal Server Error')
    expect(res.headers.get('X-Content-Type-Options')).toBe('nosniff')
    expect(entry.msg).toBe('Unhandled error')
    expect(entry.path).toBe('/')
  })

  it('should answer a plain 500 when queued headers cannot be applied', async () => {
    const lines: string[] = []
    const logger = pino({ level: 'error' }, { write: (msg: string) => lines.push(msg) })
    const app = new HttpApp({ logger })
    app.get('/', (c) => {
      c.header('Set-Cookie', 'bad\nname=1', { append: true })
      return c.text('ok')
    })

    const res = await app.fetch(request('/'))
    const messages = lines.map((line) => {
      const entry: { msg: string } = JSON.parse(line)
      return entry.msg
    })

    expect(res.status).toBe(500)
    expect(await res.text()).toBe('Internal Server Error')
    expect(res.headers.getSetCookie()).toEqual([])
    expect(messages).toEqual(['Unhandled error', 'Queued headers rejected'])
  })

  it('should let middleware short-circuit with a response', async () => {
    const app = new HttpApp()
    app.use(async (c) => {
      c.header('X-Blocked', 'yes')
      return c.text('blocked', 403)
    })
    app.get('/', (c) => c.text('ok'))

    const res = await app.fetch(request('/'))

    expect(res.status).toBe(403)
    expect(await res.text()).toBe('blocked')
    expect(res.headers.get('X-Blocked')).toBe('yes')
  })
})

describe('HttpContext', () => {
  it('should read query, headers and body', async () => {
    const c = new HttpContext(
      request('/search?q=cats&page=2', {
        method: 'POST',
        headers: { 'X-Request-Id': 'abc' },
        body: JSON.stringify({ ok: true }),
      })
    )

    expect(c.req.query('q')).toBe('cats')
    expect(c.req.query()).toEqual({ q: 'cats', page: '2' })
    expect(c.req.header('x-request-id')).toBe('abc')
    expect(await c.req.json()).toEqual({ ok: true })
    expect(await c.req.text()).toBe('{"ok":true}')
  })

  it('should store typed variables', () => {
    const c = new HttpContext<{ user: string }>(request('/'))
    c.set('user', 'ada')

    expect(c.get('user')).toBe('ada')
    expect(c.var.user).toBe('ada')
  })

  it('should build redirects with relative locations', () => {
    const c = new HttpContext(request('/'))
    const res = c.redirect('/login', 303)

    expect(res.status).toBe(303)
    expect(res.headers.get('Location')).toBe('/login')
  })
})
