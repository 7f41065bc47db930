import type { LeafRangeQueryService } from '../../../leaves/index'
import type { MerkleRpcMethods, RpcMethods } from '../types'
import { treeLeaves } from './tree-leaves'

export const createMerkleRpcMethods = (
  leaves: LeafRangeQueryService,
): RpcMethods<typeof MerkleRpcMethods> => {
  return {
    merkle_treeLeaves: treeLeaves(leaves),
  }
}
