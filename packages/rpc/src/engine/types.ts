import type { Hex } from 'viem'

/** Unsigned 32-bit identifier of one tree held by the engine */
export type TreeId = number

/** 0-based position in a tree's leaf array */
export type LeafIndex = number

/** 32-byte leaf hash */
export type LeafValue = Uint8Array

/** Block hash naming a point-in-time view of state */
export type Snapshot = Hex

/**
 * Read capability the leaf query service needs from the state engine.
 *
 * Failures are thrown. Implementations should throw
 * `SnapshotNotFoundError` for an unknown snapshot and
 * `TreeNotFoundError` for an unknown tree; anything else is treated as
 * the engine being unavailable.
 */
export interface StateEngine {
  /** Most recent known snapshot */
  getCurrentSnapshot(): Promise<Snapshot>

  /** Leaf at `index`, or `undefined` when that slot was never written */
  getLeaf(
    snapshot: Snapshot,
    treeId: TreeId,
    index: LeafIndex,
  ): Promise<LeafValue | undefined>
}
