import {
  concatBytes,
  hexToBytes,
  isBytes32,
  uint32ToBytes,
} from '@merkle-leaves/utils'
import debugDefault from 'debug'
import { keccak256 } from 'viem'
import {
  InvalidInputError,
  SnapshotNotFoundError,
  TreeNotFoundError,
} from '../errors/index'
import type {
  LeafIndex,
  LeafValue,
  Snapshot,
  StateEngine,
  TreeId,
} from './types'

const UINT32_MAX = 0xffffffff

type TreeLeaves = Map<LeafIndex, LeafValue>
type StateView = Map<TreeId, TreeLeaves>

const isUint32 = (value: number) =>
  Number.isInteger(value) && value >= 0 && value <= UINT32_MAX

const copyView = (view: StateView): StateView =>
  new Map([...view].map(([treeId, leaves]) => [treeId, new Map(leaves)]))

/**
 * In-memory versioned leaf store.
 *
 * Writes go to a working state that is only visible once {@link commit}
 * seals it as a new snapshot. Committed snapshots never change.
 *
 * ```ts
 * const engine = new MemoryStateEngine()
 * engine.createTree(7)
 * engine.setLeaf(7, 0, leaf)
 * const snapshot = engine.commit()
 * await engine.getLeaf(snapshot, 7, 0) // leaf
 * ```
 */
export class MemoryStateEngine implements StateEngine {
  private readonly committed = new Map<string, StateView>()
  private readonly history: Snapshot[] = []
  private working: StateView = new Map()
  private head: Snapshot
  private readonly debug = debugDefault('merkle:engine')

  constructor() {
    this.head = keccak256(new Uint8Array(32))
    this.committed.set(this.head, new Map())
    this.history.push(this.head)
  }

  createTree(treeId: TreeId): void {
    if (!isUint32(treeId)) {
      throw new InvalidInputError(`Invalid tree id ${treeId}`)
    }
    if (this.working.has(treeId)) {
      throw new InvalidInputError(`Tree ${treeId} already exists`, {
        context: { treeId },
      })
    }
    this.working.set(treeId, new Map())
  }

  setLeaf(treeId: TreeId, index: LeafIndex, value: LeafValue): void {
    const leaves = this.working.get(treeId)
    if (leaves === undefined) {
      throw new TreeNotFoundError(`Unknown tree ${treeId}`, {
        context: { treeId, index },
      })
    }
    if (!isUint32(index)) {
      throw new InvalidInputError(`Invalid leaf index ${index}`, {
        context: { treeId, index },
      })
    }
    if (!isBytes32(value)) {
      throw new InvalidInputError(
        `Leaf must be 32 bytes, got ${value.length}`,
        { context: { treeId, index } },
      )
    }
    leaves.set(index, value.slice())
  }

  /**
   * Seal the working state and make it the current snapshot
   */
  commit(): Snapshot {
    const height = this.history.length
    const hash = keccak256(
      concatBytes(hexToBytes(this.head), uint32ToBytes(height)),
    )
    this.committed.set(hash, copyView(this.working))
    this.history.push(hash)
    this.head = hash
    this.debug(`committed snapshot ${hash} at height ${height}`)
    return hash
  }

  /**
   * Committed snapshot hashes, oldest first
   */
  snapshots(): Snapshot[] {
    return [...this.history]
  }

  async getCurrentSnapshot(): Promise<Snapshot> {
    return this.head
  }

  async getLeaf(
    snapshot: Snapshot,
    treeId: TreeId,
    index: LeafIndex,
  ): Promise<LeafValue | undefined> {
    const view = this.committed.get(snapshot.toLowerCase())
    if (view === undefined) {
      throw new SnapshotNotFoundError(`Unknown snapshot ${snapshot}`, {
        context: { snapshot },
      })
    }
    const leaves = view.get(treeId)
    if (leaves === undefined) {
      throw new TreeNotFoundError(`Unknown tree ${treeId}`, {
        context: { snapshot, treeId },
      })
    }
    return leaves.get(index)?.slice()
  }
}
