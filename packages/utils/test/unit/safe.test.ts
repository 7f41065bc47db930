import { describe, expect, it } from 'vitest'
import { safeError, safeResult, safeTry } from '../../src'

describe('safe result tuples', () => {
  it('should wrap a value as a result', () => {
    expect(safeResult(7)).toEqual([undefined, 7])
  })

  it('should wrap an error as a failure', () => {
    const err = new Error('boom')
    expect(safeError(err)).toEqual([err, undefined])
  })

  it('should capture a rejected promise', async () => {
    const [err, res] = await safeTry(async () => {
      throw new Error('rejected')
    })
    expect(err?.message).toBe('rejected')
    expect(res).toBeUndefined()
  })

  it('should resolve a fulfilled promise', async () => {
    const [err, res] = await safeTry(async () => 'ok')
    expect(err).toBeUndefined()
    expect(res).toBe('ok')
  })

  it('should tell a promise resolving to undefined from one rejecting with it', async () => {
    const resolved = await safeTry(async () => undefined)
    const rejected = await safeTry(() => Promise.reject(undefined))

    expect(resolved).toEqual([undefined, undefined])
    expect(rejected[0]).toBeInstanceOf(Error)
    expect(rejected[0]?.message).toBe('Rejected without a reason')
  })

  it('should convert thrown values that are not errors', async () => {
    const [err] = await safeTry(() => Promise.reject('nope'))
    expect(err?.message).toBe('nope')
  })
})
