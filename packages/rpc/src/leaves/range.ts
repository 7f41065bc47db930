import { type Safe, safeError, safeResult } from '@merkle-leaves/utils'
import {
  InvalidInputError,
  InvalidRangeError,
  type LeafQueryError,
  RangeTooLargeError,
} from '../errors/index'
import type { LeafIndex, Snapshot, TreeId } from '../engine/types'

/** Spans of this many leaves or more are rejected */
export const MAX_LEAF_RANGE = 512

export interface LeafRangeRequest {
  treeId: TreeId
  /** First index, inclusive */
  from: LeafIndex
  /** Last index, exclusive */
  to: LeafIndex
  /** Snapshot to read; the engine's current one when omitted */
  snapshot?: Snapshot
}

/**
 * Number of indices in `[from, to)`, or `undefined` when `to < from`
 */
export const leafRangeSpan = (
  from: LeafIndex,
  to: LeafIndex,
): number | undefined => (to < from ? undefined : to - from)

const isLeafIndex = (value: number) =>
  Number.isSafeInteger(value) && value >= 0

/**
 * Checks bounds, ordering and size of a requested range and returns its span
 */
export function validateLeafRange(
  request: LeafRangeRequest,
): Safe<number, LeafQueryError> {
  const { treeId, from, to, snapshot } = request
  const context = { treeId, from, to, snapshot }

  if (!isLeafIndex(from) || !isLeafIndex(to)) {
    return safeError(
      new InvalidInputError(
        `Invalid leaf range bounds: from (${from}) and to (${to}) must be non-negative integers`,
        { context },
      ),
    )
  }

  const span = leafRangeSpan(from, to)
  if (span === undefined) {
    return safeError(new InvalidRangeError(from, to, { context }))
  }
  if (span >= MAX_LEAF_RANGE) {
    return safeError(new RangeTooLargeError(span, MAX_LEAF_RANGE, { context }))
  }
  return safeResult(span)
}
