import type { Hex } from 'viem'
import { z } from 'zod'

export const zHexString32 = z
  .string()
  .regex(
    /^(0x)?[a-fA-F0-9]{64}$/,
    'Must be a 64-character hex string (32 bytes)',
  )
  .transform(
    (val): Hex =>
      val.startsWith('0x') ? (val as Hex) : (`0x${val}` as Hex),
  )

/**
 * Optional block hash; `null` and a missing value both select the current
 * snapshot
 */
export const zSnapshotHash = zHexString32
  .nullable()
  .optional()
  .transform((val) => val ?? undefined)
