import { zQuantity } from './base'
import { UINT32_MAX } from './types'

/**
 * Bound of a leaf index range: `to` is exclusive, so it may reach one past
 * the largest uint32 index
 */
export const LEAF_INDEX_BOUND = UINT32_MAX + 1

export const zUint32 = (options: { errorMessage?: string } = {}) =>
  zQuantity({ max: UINT32_MAX, errorMessage: options.errorMessage })

export const zLeafIndex = (options: { errorMessage?: string } = {}) =>
  zQuantity({
    max: LEAF_INDEX_BOUND,
    errorMessage:
      options.errorMessage ??
      `Invalid leaf index: must be an integer between 0 and ${LEAF_INDEX_BOUND}`,
  })
