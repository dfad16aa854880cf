import { describe, it, expect, vi } from 'vitest'
import { isTransientDbError, withDb } from '../../util/withDb.js'

function pgError(code: string): Error {
  return Object.assign(new Error(`postgres ${code}`), { code })
}

describe('withDb', () => {
  it('retries transient connection errors', async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(pgError('CONNECTION_CLOSED'))
      .mockResolvedValueOnce('rows')
    await expect(withDb(fn, 3, 0)).resolves.toBe('rows')
    expect(fn).toHaveBeenCalledTimes(2)
  })

  it('rethrows other errors immediately', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(pgError('23505'))
    await expect(withDb(fn, 3, 0)).rejects.toThrow('postgres 23505')
    expect(fn).toHaveBeenCalledTimes(1)
  })

  it('gives up after the last try', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(pgError('ECONNRESET'))
    await expect(withDb(fn, 2, 0)).rejects.toThrow('postgres ECONNRESET')
    expect(fn).toHaveBeenCalledTimes(2)
  })
})

describe('isTransientDbError', () => {
  it('recognises postgres.js connection codes only', () => {
    expect(isTransientDbError(pgError('57P01'))).toBe(true)
    expect(isTransientDbError(new Error('plain'))).toBe(false)
    expect(isTransientDbError('CONNECTION_CLOSED')).toBe(false)
  })
})
