import type { LeafRangeQueryService } from '../../leaves/index'
import type { RpcHandlerOptions, RpcMethodFn } from '../types'
import { createRpcHandler } from '../validation'
import { createMerkleRpcMethods } from './merkle/index'
import type { AllRpcMethods } from './types'

export * from './merkle/index'
export * from './types'

export type RpcModules = {
  leaves: LeafRangeQueryService
}

export const createRpcHandlers = (
  modules: RpcModules,
  opts: RpcHandlerOptions = {},
) => {
  const methods: Record<AllRpcMethods, RpcMethodFn> = {
    ...createMerkleRpcMethods(modules.leaves),
  }
  return {
    rpcHandlers: createRpcHandler(methods, opts),
    methods: Object.keys(methods),
  }
}
