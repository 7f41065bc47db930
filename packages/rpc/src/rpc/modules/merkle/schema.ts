import { zLeafIndex, zSnapshotHash, zUint32 } from '@merkle-leaves/schema'
import { z } from 'zod'

/**
 * `[tree_id, from, to, at?]`; a missing `at` reads the current snapshot
 */
export const treeLeavesSchema = z.preprocess(
  (params) =>
    Array.isArray(params) && params.length === 3 ? [...params, null] : params,
  z.tuple([
    zUint32({ errorMessage: 'Invalid tree_id: must be a uint32' }),
    zLeafIndex({ errorMessage: 'Invalid from: must be a leaf index' }),
    zLeafIndex({ errorMessage: 'Invalid to: must be a leaf index' }),
    zSnapshotHash,
  ]),
)

export type TreeLeavesParams = z.infer<typeof treeLeavesSchema>
