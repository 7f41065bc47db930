export * from './error-code'
export {
  getRpcErrorResponse,
  getRpcResponse,
  RpcMethodError,
  toRpcError,
} from './helpers'
export * from './modules/index'
export { RateLimiter } from './rate-limit/index'
export type { RateLimitOptions, RateLimitResult } from './rate-limit/index'
// Export RPC server classes
export { RpcServerBase } from './server/base'
export type {
  RpcServerModules as RpcServerBaseModules,
  RpcServerOpts as RpcServerBaseOpts,
} from './server/base'
export { RpcServer, rpcServerOpts } from './server/index'
export type {
  RpcServerModulesExtended as RpcServerModules,
  RpcServerOptsExtended as RpcServerOpts,
} from './server/index'
export type { RPCError, RpcApiEnv, RpcMethodFn, RpcRequest } from './types'
export { rpcRequestSchema } from './types'
export { createRpcHandler, createRpcMethod, rpcValidator } from './validation'
