/**
 * HTTP Error Classes Tests
 */

import { describe, it, expect } from 'vitest'
import {
  createHttpError,
  defaultErrorReporter,
  HttpError,
  HttpForbiddenError,
  HttpInternalServerError,
  HttpNotFoundError,
  isHttpError,
} from './errors.js'
import { HttpContext } from './context.js'

describe('HttpError', () => {
  it('should render a JSON error body', async () => {
    const res = new HttpNotFoundError('User not found').toResponse()

    expect(res.status).toBe(404)
    expect(res.headers.get('Content-Type')).toBe('application/json; charset=UTF-8')
    expect(await res.json()).toEqual({
      success: false,
      error: { message: 'User not found', code: 'NOT_FOUND' },
    })
  })

  it('should include details but never the cause', async () => {
    const err = new HttpError('Bad', 400, { details: { field: 'name' }, cause: new Error('internal') })

    expect(err.code).toBe('BAD_REQUEST')
    expect(await err.toResponse().json()).toEqual({
      success: false,
      error: { message: 'Bad', code: 'BAD_REQUEST', details: { field: 'name' } },
    })
    expect(err.toJSON()).toEqual({
      name: 'HttpError',
      message: 'Bad',
      status: 400,
      code: 'BAD_REQUEST',
      details: { field: 'name' },
    })
  })
})

describe('createHttpError', () => {
  it('should pick the class for the status', () => {
    expect(createHttpError(403)).toBeInstanceOf(HttpForbiddenError)
    expect(createHttpError(404)).toBeInstanceOf(HttpNotFoundError)
    expect(createHttpError(500)).toBeInstanceOf(HttpInternalServerError)
    expect(createHttpError(418, 'Teapot').code).toBe('ERROR')
  })

  it('should use default messages', () => {
    expect(createHttpError(403).message).toBe('Forbidden')
    expect(createHttpError(500).message).toBe('Internal Server Error')
  })
})

describe('isHttpError', () => {
  it('should recognize HTTP errors', () => {
    expect(isHttpError(new HttpForbiddenError())).toBe(true)
    expect(isHttpError(new Error('x'))).toBe(false)
  })
})

describe('defaultErrorReporter', () => {
  it('should answer with the status and a JSON body', async () => {
    const c = new HttpContext(new Request('http://localhost/static/x'))
    const res = await defaultErrorReporter(403, c.req)

    expect(res.status).toBe(403)
    expect(await res.json()).toEqual({
      success: false,
      error: { message: 'Forbidden', code: 'FORBIDDEN' },
    })
  })
})
