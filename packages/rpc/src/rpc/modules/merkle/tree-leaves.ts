import { safeError, safeResult } from '@merkle-leaves/utils'
import type { LeafRangeQueryService } from '../../../leaves/index'
import { createRpcMethod } from '../../validation'
import { treeLeavesSchema } from './schema'

/**
 * `merkle_treeLeaves(tree_id, from, to, at?)`: present leaves of
 * `[from, to)`, each as an array of its 32 byte values, absent leaves
 * omitted
 */
export const treeLeaves = (leaves: LeafRangeQueryService) => {
  return createRpcMethod(
    treeLeavesSchema,
    async ([treeId, from, to, snapshot], _c) => {
      const [error, values] = await leaves.queryLeaves({
        treeId,
        from,
        to,
        snapshot,
      })
      if (error) return safeError(error)
      return safeResult(values.map((leaf) => Array.from(leaf)))
    },
  )
}
