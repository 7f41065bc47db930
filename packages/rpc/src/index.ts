export * from './config/index'
export * from './engine/index'
export * from './errors/index'
export * from './leaves/index'
export * from './logging'
export { MerkleLeavesNode } from './node'
export * from './rpc/index'
