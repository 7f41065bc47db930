export { MemoryStateEngine } from './memory'
export type {
  LeafIndex,
  LeafValue,
  Snapshot,
  StateEngine,
  TreeId,
} from './types'
