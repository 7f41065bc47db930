import { describe, expect, it } from 'vitest'
import {
  InvalidInputError,
  InvalidRangeError,
  leafRangeSpan,
  MAX_LEAF_RANGE,
  RangeTooLargeError,
  validateLeafRange,
} from '../../../src'

describe('leafRangeSpan', () => {
  it('should count the indices of a half-open range', () => {
    expect(leafRangeSpan(0, 4)).toBe(4)
    expect(leafRangeSpan(9, 9)).toBe(0)
    expect(leafRangeSpan(5, 2)).toBeUndefined()
  })
})

describe('validateLeafRange', () => {
  it('should return the span of an allowed range', () => {
    expect(validateLeafRange({ treeId: 1, from: 100, to: 611 })).toEqual([
      undefined,
      511,
    ])
    expect(validateLeafRange({ treeId: 1, from: 3, to: 3 })).toEqual([
      undefined,
      0,
    ])
  })

  it('should reject a span at the limit with the limit attached', () => {
    const [error] = validateLeafRange({ treeId: 1, from: 0, to: MAX_LEAF_RANGE })

    expect(error).toBeInstanceOf(RangeTooLargeError)
    expect(error?.message).toBe('Requested 512 leaves, range must be below 512')
    expect(error?.recoverable).toBe(true)
    expect(error?.context).toEqual({
      treeId: 1,
      from: 0,
      to: 512,
      snapshot: undefined,
    })
  })

  it('should reject a range whose end lies before its start', () => {
    const [error, span] = validateLeafRange({ treeId: 2, from: 10, to: 9 })

    expect(error).toBeInstanceOf(InvalidRangeError)
    expect(span).toBeUndefined()
  })

  it('should reject bounds that are not non-negative integers', () => {
    for (const [from, to] of [
      [0, 1.5],
      [Number.NaN, 4],
      [0, Number.POSITIVE_INFINITY],
      [-3, -1],
    ]) {
      const [error] = validateLeafRange({ treeId: 1, from, to })
      expect(error).toBeInstanceOf(InvalidInputError)
    }
  })

  it('should name both bounds when rejecting them', () => {
    const [error] = validateLeafRange({ treeId: 1, from: -3, to: -1 })
    expect(error?.message).toBe(
      'Invalid leaf range bounds: from (-3) and to (-1) must be non-negative integers',
    )
  })

  it('should check bounds before ordering', () => {
    const [error] = validateLeafRange({ treeId: 1, from: 5, to: -1 })
    expect(error).toBeInstanceOf(InvalidInputError)
  })

  it('should check ordering before size', () => {
    const [error] = validateLeafRange({ treeId: 2, from: 4000, to: 1 })
    expect(error).toBeInstanceOf(InvalidRangeError)
  })
})
