import type { LeafMetrics } from '@merkle-leaves/metrics'
import {
  isBytes32,
  type Safe,
  type SafePromise,
  safeError,
  safeResult,
  safeTry,
} from '@merkle-leaves/utils'
import debugDefault from 'debug'
import { sift } from 'radash'
import type { Logger } from 'winston'
import { FETCH_CONCURRENCY_DEFAULT } from '../config/constants'
import type {
  LeafIndex,
  LeafValue,
  Snapshot,
  StateEngine,
  TreeId,
} from '../engine/types'
import {
  classifyEngineError,
  EngineUnavailableError,
  type ErrorContext,
  type LeafQueryError,
} from '../errors/index'
import { type LeafRangeRequest, validateLeafRange } from './range'

export type LeafRangeQueryOptions = {
  /** Max engine fetches in flight for one call */
  fetchConcurrency?: number
  logger?: Logger
  metrics?: LeafMetrics
}

/**
 * Serves contiguous leaf ranges of the engine's Merkle trees.
 *
 * Absent leaves are dropped from the result rather than filled in, so a
 * response shorter than the span means the range had unwritten slots.
 * Holds no state between calls.
 */
export class LeafRangeQueryService {
  private readonly fetchConcurrency: number
  private readonly logger?: Logger
  private readonly metrics?: LeafMetrics
  private readonly debug = debugDefault('merkle:leaves')

  constructor(
    private readonly engine: StateEngine,
    opts: LeafRangeQueryOptions = {},
  ) {
    this.fetchConcurrency = Math.max(
      1,
      Math.floor(opts.fetchConcurrency ?? FETCH_CONCURRENCY_DEFAULT),
    )
    this.logger = opts.logger
    this.metrics = opts.metrics
  }

  /**
   * Present leaves of `[from, to)` in ascending index order
   */
  async queryLeaves(
    request: LeafRangeRequest,
  ): SafePromise<LeafValue[], LeafQueryError> {
    const result = await this.run(request)
    const [error, leaves] = result
    if (error) {
      this.metrics?.queries.inc({ result: error.code })
      this.logger?.debug('Leaf query failed', {
        code: error.code,
        reason: error.message,
        context: error.context,
      })
    } else {
      this.metrics?.queries.inc({ result: 'ok' })
      this.metrics?.leavesServed.inc(leaves.length)
      this.metrics?.leavesAbsent.inc(request.to - request.from - leaves.length)
    }
    return result
  }

  private async run(
    request: LeafRangeRequest,
  ): SafePromise<LeafValue[], LeafQueryError> {
    const [rangeError, span] = validateLeafRange(request)
    if (rangeError) return safeError(rangeError)
    if (span === 0) return safeResult([])

    const { treeId, from, to } = request
    const [snapshotError, snapshot] = await this.resolveSnapshot(request)
    if (snapshotError) return safeError(snapshotError)

    this.debug(
      `tree=${treeId} range=[${from}, ${to}) snapshot=${snapshot} concurrency=${this.fetchConcurrency}`,
    )

    const slots = new Array<LeafValue | undefined>(span)
    const state: { next: number; failure?: LeafQueryError } = { next: 0 }

    // workers take indices in ascending order and stop starting new
    // fetches once any fetch has failed
    const worker = async () => {
      while (state.failure === undefined && state.next < span) {
        const offset = state.next++
        const [error, leaf] = await this.fetchLeaf(
          snapshot,
          treeId,
          from + offset,
        )
        if (error) {
          state.failure ??= error
          return
        }
        slots[offset] = leaf
      }
    }

    await Promise.all(
      Array.from({ length: Math.min(this.fetchConcurrency, span) }, worker),
    )

    if (state.failure !== undefined) return safeError(state.failure)
    return safeResult(sift(slots))
  }

  /**
   * Pin the snapshot once so every index of the call reads the same state
   */
  private async resolveSnapshot(
    request: LeafRangeRequest,
  ): SafePromise<Snapshot, LeafQueryError> {
    if (request.snapshot !== undefined) return safeResult(request.snapshot)

    const [error, snapshot] = await safeTry(() =>
      this.engine.getCurrentSnapshot(),
    )
    if (error) {
      const { treeId, from, to } = request
      return safeError(classifyEngineError(error, { treeId, from, to }))
    }
    return safeResult(snapshot)
  }

  private async fetchLeaf(
    snapshot: Snapshot,
    treeId: TreeId,
    index: LeafIndex,
  ): Promise<Safe<LeafValue | undefined, LeafQueryError>> {
    const context: ErrorContext = { treeId, snapshot, index }
    const [error, leaf] = await safeTry(() =>
      this.engine.getLeaf(snapshot, treeId, index),
    )
    if (error) return safeError(classifyEngineError(error, context))
    if (leaf !== undefined && !isBytes32(leaf)) {
      return safeError(
        new EngineUnavailableError(
          `State engine returned a ${leaf.length}-byte leaf at index ${index}`,
          { context },
        ),
      )
    }
    return safeResult(leaf)
  }
}
