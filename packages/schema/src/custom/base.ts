import { z } from 'zod'
import type { QuantityInput, QuantityOptions } from './types'

const QUANTITY_HEX = /^0x(0|[1-9a-fA-F][0-9a-fA-F]*)$/

const toNumber = (val: QuantityInput): number =>
  typeof val === 'number' ? val : Number.parseInt(val.slice(2), 16)

/**
 * Non-negative integer given either as a JSON number or as a
 * 0x-prefixed quantity string, bounded by `max`
 */
export function zQuantity(options: QuantityOptions) {
  const { max, errorMessage } = options

  return z
    .custom<QuantityInput>(
      (val) => {
        if (typeof val === 'number') {
          return Number.isSafeInteger(val) && val >= 0 && val <= max
        }
        if (typeof val === 'string' && QUANTITY_HEX.test(val)) {
          const n = toNumber(val)
          return Number.isSafeInteger(n) && n <= max
        }
        return false
      },
      {
        message:
          errorMessage ||
          `Invalid input: must be an integer between 0 and ${max}`,
      },
    )
    .transform(toNumber)
}
