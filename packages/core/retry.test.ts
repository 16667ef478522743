import { describe, it, expect, vi } from 'vitest'
import { FetchError } from './errors.js'
import { backoffDelay, isTransient, retry, sleep } from './retry.js'

describe('backoffDelay', () => {
  it('doubles from the initial delay up to the cap', () => {
    const options = { initialDelay: 2000, maxDelay: 10000 }
    expect([1, 2, 3, 4].map(attempt => backoffDelay(attempt, options))).toEqual([2000, 4000, 8000, 10000])
  })
})

describe('isTransient', () => {
  it('follows the FetchError classification', () => {
    expect(isTransient(new FetchError('http', 'transient', 'HTTP 503', 503))).toBe(true)
    expect(isTransient(new FetchError('http', 'permanent', 'HTTP 403', 403))).toBe(false)
    expect(isTransient(new FetchError('cancelled', 'transient', 'cancelled'))).toBe(false)
  })

  it('matches connection errors by message', () => {
    expect(isTransient(new Error('read ECONNRESET'))).toBe(true)
    expect(isTransient(new Error('Unexpected token <'))).toBe(false)
  })
})

describe('retry', () => {
  it('retries transient failures until one succeeds', async () => {
    const onRetry = vi.fn()
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error('socket hang up'))
      .mockResolvedValueOnce('ok')

    const result = await retry(fn, { initialDelay: 1, maxDelay: 1, onRetry })

    expect(result).toBe('ok')
    expect(fn.mock.calls).toEqual([[1], [2]])
    expect(onRetry).toHaveBeenCalledTimes(1)
  })

  it('throws permanent failures at once', async () => {
    const fn = vi.fn(async () => {
      throw new FetchError('http', 'permanent', 'HTTP 404', 404)
    })

    await expect(retry(fn, { initialDelay: 1 })).rejects.toThrow('HTTP 404')
    expect(fn).toHaveBeenCalledTimes(1)
  })

  it('gives up after maxAttempts', async () => {
    const fn = vi.fn(async () => {
      throw new Error('timeout')
    })

    await expect(retry(fn, { maxAttempts: 3, initialDelay: 1, maxDelay: 1 })).rejects.toThrow('timeout')
    expect(fn).toHaveBeenCalledTimes(3)
  })
})

describe('sleep', () => {
  it('rejects with the abort reason', async () => {
    const controller = new AbortController()
    const pending = sleep(10_000, controller.signal)
    controller.abort(new Error('Run timeout'))
    await expect(pending).rejects.toThrow('Run timeout')
  })
})
