/**
 * CookieManager Tests
 */

import { describe, it, expect } from 'vitest'
import { CookieManager, cookieManager, getCookieManager, MAX_COOKIE_AGE_SECONDS } from './cookie-manager.js'
import type { CookieContext } from './cookie.js'
import { HttpApp } from './app.js'
import { RampartError } from '../errors/index.js'

const SECRET = 'test-secret'
const NOW = new Date('2024-01-01T00:00:00Z')
const now = () => NOW

// 'hello' signed with SECRET
const HELLO = 'aGVsbG8=|vMiJpAZnyrcV4dwirSgGks9L8cOigO7spg2NvNjkuZM='
const DELETED = 'flash=; Path=/; Expires=Thu, 01 Jan 1970 00:00:00 GMT; Max-Age=0; HttpOnly; Secure'

function createMockContext(cookieHeader?: string) {
  const setCookies: string[] = []
  const ctx: CookieContext = {
    req: {
      header: (name) => (name.toLowerCase() === 'cookie' ? cookieHeader : undefined),
    },
    header: (name, value) => {
      if (name.toLowerCase() === 'set-cookie') setCookies.push(value)
    },
  }
  return { ctx, setCookies }
}

// "name=value" part of a Set-Cookie line, as a browser would send it back
function cookiePair(setCookie: string): string {
  return setCookie.split(';')[0]
}

describe('CookieManager', () => {
  describe('setCookie', () => {
    it('should write the signed value with fixed attributes', () => {
      const manager = new CookieManager(SECRET, { now })
      const { ctx, setCookies } = createMockContext()

      manager.setCookie(ctx, 'flash', 'hello', 3600)

      expect(setCookies).toEqual([
        `flash=${HELLO}; Path=/; Expires=Mon, 01 Jan 2024 01:00:00 GMT; Max-Age=3600; HttpOnly; Secure; SameSite=Strict`,
      ])
    })

    it('should omit Max-Age for a zero max-age', () => {
      const manager = new CookieManager(SECRET, { now })
      const { ctx, setCookies } = createMockContext()

      manager.setCookie(ctx, 'flash', 'hello', 0)

      expect(setCookies[0]).toBe(
        `flash=${HELLO}; Path=/; Expires=Mon, 01 Jan 2024 00:00:00 GMT; HttpOnly; Secure; SameSite=Strict`
      )
    })

    it('should write Max-Age=0 and a past Expires for a negative max-age', () => {
      const manager = new CookieManager(SECRET, { now })
      const { ctx, setCookies } = createMockContext()

      manager.setCookie(ctx, 'flash', 'hello', -60)

      expect(setCookies[0]).toBe(
        `flash=${HELLO}; Path=/; Expires=Sun, 31 Dec 2023 23:59:00 GMT; Max-Age=0; HttpOnly; Secure; SameSite=Strict`
      )
      expect(manager.readCookie(ctx, 'flash')).toBe('')
    })

    it('should cap the lifetime at 400 days', () => {
      const manager = new CookieManager(SECRET, { now })
      const { ctx, setCookies } = createMockContext()

      manager.setCookie(ctx, 'flash', 'hello', 1e16)

      expect(MAX_COOKIE_AGE_SECONDS).toBe(34560000)
      expect(setCookies[0]).toBe(
        `flash=${HELLO}; Path=/; Expires=Tue, 04 Feb 2025 00:00:00 GMT; Max-Age=34560000; HttpOnly; Secure; SameSite=Strict`
      )
    })

    it('should refuse names that are not tokens', () => {
      const manager = new CookieManager(SECRET, { now })
      const { ctx, setCookies } = createMockContext()

      expect(() => manager.setCookie(ctx, 'flash; Domain=evil.example', 'hello', 60)).toThrow(
        'Invalid cookie name "flash; Domain=evil.example"'
      )
      expect(() => manager.setCookie(ctx, 'bad\nname', 'hello', 60)).toThrow(RampartError)
      expect(() => manager.delCookie(ctx, 'a b')).toThrow(RampartError)
      expect(setCookies).toEqual([])
    })

    it('should keep "|" in the value', () => {
      const manager = new CookieManager(SECRET, { now })
      const { ctx, setCookies } = createMockContext()

      manager.setCookie(ctx, 'pair', 'a|b', 60)

      expect(cookiePair(setCookies[0])).toBe(
        'pair=YXxi|vmfAOtOI1gRBnAt6tvw_fBAJmsDqSns5jibFiSnCjgo='
      )
    })
  })

  describe('readCookie', () => {
    it('should return the verified value', () => {
      const manager = new CookieManager(SECRET)
      const { ctx } = createMockContext(`theme=dark; flash=${HELLO}`)

      expect(manager.readCookie(ctx, 'flash')).toBe('hello')
    })

    it('should split on the first "|" only', () => {
      const manager = new CookieManager(SECRET)
      const { ctx } = createMockContext('pair=YXxi|vmfAOtOI1gRBnAt6tvw_fBAJmsDqSns5jibFiSnCjgo=')

      expect(manager.readCookie(ctx, 'pair')).toBe('a|b')
    })

    it('should round-trip UTF-8 values', () => {
      const manager = new CookieManager(SECRET, { now })
      const writer = createMockContext()
      manager.setCookie(writer.ctx, 'msg', 'héllo wörld', 60)

      const reader = createMockContext(cookiePair(writer.setCookies[0]))

      expect(cookiePair(writer.setCookies[0])).toBe(
        'msg=aMOpbGxvIHfDtnJsZA==|uHtZZ7MtiCq9j8LRIkTilUOvortJXI2EQxD7A4TAWL8='
      )
      expect(manager.readCookie(reader.ctx, 'msg')).toBe('héllo wörld')
    })

    it('should return "" for a missing cookie', () => {
      const manager = new CookieManager(SECRET)

      expect(manager.readCookie(createMockContext().ctx, 'flash')).toBe('')
      expect(manager.readCookie(createMockContext('other=1').ctx, 'flash')).toBe('')
    })

    it('should return "" for a tampered payload', () => {
      const manager = new CookieManager(SECRET)
      // 'hell' with the tag of 'hello'
      const { ctx } = createMockContext('flash=aGVsbA==|vMiJpAZnyrcV4dwirSgGks9L8cOigO7spg2NvNjkuZM=')

      expect(manager.readCookie(ctx, 'flash')).toBe('')
    })

    it('should return "" for a signature made with another key', () => {
      const manager = new CookieManager(SECRET)
      const { ctx } = createMockContext('flash=aGVsbG8=|wg19_rtiX93tI3w2IquEgVsuWSGF4_Hb0BWtjMn7DzU=')

      expect(manager.readCookie(ctx, 'flash')).toBe('')
    })

    it('should return "" for values without a separator', () => {
      const manager = new CookieManager(SECRET)

      expect(manager.readCookie(createMockContext('flash=aGVsbG8=').ctx, 'flash')).toBe('')
    })

    it('should return "" for non-canonical base64url payloads', () => {
      const manager = new CookieManager(SECRET)
      const tag = 'vMiJpAZnyrcV4dwirSgGks9L8cOigO7spg2NvNjkuZM='

      expect(manager.readCookie(createMockContext(`flash=aGVsbG8|${tag}`).ctx, 'flash')).toBe('')
      expect(manager.readCookie(createMockContext(`flash=aGVsbG9=|${tag}`).ctx, 'flash')).toBe('')
    })

    it('should read cookies issued by another signer with the same key', () => {
      const manager = new CookieManager('secret')
      const { ctx } = createMockContext('flash=aGVsbG8=|iKqz7ejTrflNJquQ07r9SiCDBww7zOnAFO4EpEOEfAs=')

      expect(manager.readCookie(ctx, 'flash')).toBe('hello')
    })

    it('should use the first cookie of a repeated name', () => {
      const manager = new CookieManager(SECRET)

      expect(manager.readCookie(createMockContext(`flash=${HELLO}; flash=junk`).ctx, 'flash')).toBe(
        'hello'
      )
      expect(manager.readCookie(createMockContext(`flash=junk; flash=${HELLO}`).ctx, 'flash')).toBe('')
    })

    it('should see values written earlier in the same request', () => {
      const manager = new CookieManager(SECRET, { now })
      const { ctx } = createMockContext(`flash=${HELLO}`)

      manager.setCookie(ctx, 'flash', 'updated', 60)

      expect(manager.readCookie(ctx, 'flash')).toBe('updated')
    })
  })

  describe('delCookie', () => {
    it('should expire the cookie on the client', () => {
      const manager = new CookieManager(SECRET)
      const { ctx, setCookies } = createMockContext(`flash=${HELLO}`)

      manager.delCookie(ctx, 'flash')

      expect(setCookies).toEqual([DELETED])
      expect(manager.readCookie(ctx, 'flash')).toBe('')
    })
  })

  describe('readFlash', () => {
    it('should read then delete', () => {
      const manager = new CookieManager(SECRET)
      const { ctx, setCookies } = createMockContext(`flash=${HELLO}`)

      expect(manager.readFlash(ctx, 'flash')).toBe('hello')
      expect(setCookies).toEqual([DELETED])
    })

    it('should return "" on a second read in the same request', () => {
      const manager = new CookieManager(SECRET)
      const { ctx, setCookies } = createMockContext(`flash=${HELLO}`)

      manager.readFlash(ctx, 'flash')

      expect(manager.readFlash(ctx, 'flash')).toBe('')
      expect(setCookies).toEqual([DELETED, DELETED])
    })

    it('should delete even when the cookie does not verify', () => {
      const manager = new CookieManager(SECRET)
      const { ctx, setCookies } = createMockContext('flash=junk')

      expect(manager.readFlash(ctx, 'flash')).toBe('')
      expect(setCookies).toEqual([DELETED])
    })
  })

  it('should keep requests apart', () => {
    const manager = new CookieManager(SECRET, { now })
    const first = createMockContext(`flash=${HELLO}`)
    const second = createMockContext(`flash=${HELLO}`)

    manager.readFlash(first.ctx, 'flash')

    expect(manager.readCookie(second.ctx, 'flash')).toBe('hello')
  })

  it('should reject an empty secret', () => {
    expect(() => new CookieManager('')).toThrow(RampartError)
    expect(() => new CookieManager(new Uint8Array(0))).toThrow(/secret must not be empty/)
  })
})

describe('cookieManager middleware', () => {
  it('should attach one manager to every request', async () => {
    const app = new HttpApp()
    app.use(cookieManager(SECRET, { now }))
    app.post('/login', (c) => {
      getCookieManager(c)?.setCookie(c, 'flash', 'hello', 3600)
      return c.redirect('/')
    })
    app.get('/', (c) => c.text(getCookieManager(c)?.readFlash(c, 'flash') ?? 'no manager'))

    const login = await app.fetch(new Request('http://localhost/login', { method: 'POST' }))
    const [issued] = login.headers.getSetCookie()

    expect(login.status).toBe(302)
    expect(login.headers.get('Location')).toBe('/')
    expect(issued).toBe(
      `flash=${HELLO}; Path=/; Expires=Mon, 01 Jan 2024 01:00:00 GMT; Max-Age=3600; HttpOnly; Secure; SameSite=Strict`
    )

    const home = await app.fetch(
      new Request('http://localhost/', { headers: { Cookie: cookiePair(issued) } })
    )

    expect(await home.text()).toBe('hello')
    expect(home.headers.getSetCookie()).toEqual([DELETED])
  })

  it('should leave getCookieManager undefined when not installed', async () => {
    const app = new HttpApp()
    app.get('/', (c) => c.text(getCookieManager(c) === undefined ? 'none' : 'some'))

    const res = await app.fetch(new Request('http://localhost/'))

    expect(await res.text()).toBe('none')
  })
})
