import type { RpcMethodFn } from '../types'

export enum MerkleRpcMethods {
  merkle_treeLeaves = 'merkle_treeLeaves',
}

export type RpcMethods<T extends Record<string, string>> = {
  [key in keyof T]: RpcMethodFn
}

export type AllRpcMethods = keyof typeof MerkleRpcMethods
