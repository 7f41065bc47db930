import { describe, expect, it } from 'vitest'
import {
  LEAF_INDEX_BOUND,
  UINT32_MAX,
  zHexString32,
  zLeafIndex,
  zSnapshotHash,
  zUint32,
} from '../../src'

const testHex32 =
  '0xb8a6ba8f2d6c13be07a0580add9d9ccc8e4301bd1244e3b0da53d025ce926370'

// ============================================================================
// zUint32 Tests
// ============================================================================

describe('zUint32: tree identifier schema', () => {
  it('should parse number input', () => {
    const result = zUint32().safeParse(7)
    expect(result.success).toBe(true)
    if (result.success) {
      expect(result.data).toBe(7)
    }
  })

  it('should parse 0x quantity input', () => {
    const result = zUint32().safeParse('0xff')
    expect(result.success).toBe(true)
    if (result.success) {
      expect(result.data).toBe(255)
    }
  })

  it('should accept the largest uint32', () => {
    expect(zUint32().safeParse(UINT32_MAX).success).toBe(true)
  })

  it('should reject values outside uint32', () => {
    expect(zUint32().safeParse(UINT32_MAX + 1).success).toBe(false)
    expect(zUint32().safeParse(-1).success).toBe(false)
    expect(zUint32().safeParse(1.5).success).toBe(false)
  })

  it('should reject malformed quantities', () => {
    expect(zUint32().safeParse('ff').success).toBe(false)
    expect(zUint32().safeParse('0x').success).toBe(false)
    expect(zUint32().safeParse('0x01').success).toBe(false)
    expect(zUint32().safeParse(null).success).toBe(false)
  })

  it('should report the bound in the default message', () => {
    const result = zUint32().safeParse(-1)
    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error.issues[0].message).toBe(
        `Invalid input: must be an integer between 0 and ${UINT32_MAX}`,
      )
    }
  })
})

// ============================================================================
// zLeafIndex Tests
// ============================================================================

describe('zLeafIndex: range bound schema', () => {
  it('should accept one past the largest uint32 index', () => {
    const result = zLeafIndex().safeParse(LEAF_INDEX_BOUND)
    expect(result.success).toBe(true)
  })

  it('should reject values past the bound', () => {
    const result = zLeafIndex().safeParse(LEAF_INDEX_BOUND + 1)
    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error.issues[0].message).toBe(
        `Invalid leaf index: must be an integer between 0 and ${LEAF_INDEX_BOUND}`,
      )
    }
  })

  it('should use a custom error message', () => {
    const result = zLeafIndex({ errorMessage: 'bad from' }).safeParse('x')
    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error.issues[0].message).toBe('bad from')
    }
  })
})

// ============================================================================
// Hash Tests
// ============================================================================

describe('zHexString32 and zSnapshotHash', () => {
  it('should add the 0x prefix', () => {
    const result = zHexString32.safeParse(testHex32.slice(2))
    expect(result.success).toBe(true)
    if (result.success) {
      expect(result.data).toBe(testHex32)
    }
  })

  it('should reject short hashes', () => {
    const result = zHexString32.safeParse('0xabcd')
    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error.issues[0].message).toBe(
        'Must be a 64-character hex string (32 bytes)',
      )
    }
  })

  it('should map null and undefined snapshots to undefined', () => {
    const fromNull = zSnapshotHash.safeParse(null)
    const fromUndefined = zSnapshotHash.safeParse(undefined)
    expect(fromNull.success && fromNull.data).toBeUndefined()
    expect(fromUndefined.success && fromUndefined.data).toBeUndefined()
  })

  it('should keep a given snapshot hash', () => {
    const result = zSnapshotHash.safeParse(testHex32)
    expect(result.success).toBe(true)
    if (result.success) {
      expect(result.data).toBe(testHex32)
    }
  })
})
