import { describe, it, expect } from 'vitest'
import { errorMessage, httpError, isHttpError } from '../errors.js'

describe('errorMessage', () => {
  it('reads errors, strings and serialisable values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom')
    expect(errorMessage('plain')).toBe('plain')
    expect(errorMessage({ code: 7 })).toBe('{"code":7}')
    expect(errorMessage(undefined)).toBe('undefined')
  })

  it('falls back to String for values JSON cannot encode', () => {
    const circular: { self?: unknown } = {}
    circular.self = circular
    expect(errorMessage(circular)).toBe('[object Object]')
    expect(errorMessage(10n)).toBe('10')
  })
})

describe('httpError', () => {
  it('carries the status', () => {
    const err = httpError(404, 'Campaign not found')
    expect(isHttpError(err)).toBe(true)
    expect(err).toMatchObject({ status: 404, message: 'Campaign not found' })
  })
})
