import type { Context } from 'hono'
import type { ContentfulStatusCode } from 'hono/utils/http-status'
import { isLeafQueryError, LeafQueryErrorCode } from '../errors/index'
import {
  INTERNAL_ERROR,
  INVALID_BLOCK,
  INVALID_PARAMS,
  TOO_MANY_LEAVES,
  UNKNOWN_TREE,
} from './error-code'
import type { RPCError, RpcApiEnv, RpcId } from './types'

/**
 * Error raised by the RPC layer itself, carrying its wire code
 */
export class RpcMethodError extends Error {
  constructor(
    public readonly code: number,
    message: string,
    public readonly data?: unknown,
  ) {
    super(message)
    this.name = 'RpcMethodError'
  }
}

const requestIdOf = (c: Context<RpcApiEnv>): RpcId => {
  const id = c.get('rpcId')
  return id === undefined ? null : id
}

export const getRpcResponse = (
  c: Context<RpcApiEnv>,
  result: unknown,
  status?: ContentfulStatusCode,
) => {
  return c.json(
    {
      jsonrpc: '2.0',
      id: requestIdOf(c),
      result,
    },
    status,
  )
}

export const getRpcErrorResponse = (
  c: Context<RpcApiEnv>,
  error: RPCError,
  status?: ContentfulStatusCode,
) => {
  return c.json(
    {
      jsonrpc: '2.0',
      id: requestIdOf(c),
      error,
    },
    status,
  )
}

/**
 * Map a failed method call to its JSON-RPC error object
 */
export const toRpcError = (error: Error, debug = false): RPCError => {
  const trace = debug ? error.stack : undefined

  if (error instanceof RpcMethodError) {
    return { code: error.code, message: error.message, data: error.data, trace }
  }

  if (isLeafQueryError(error)) {
    switch (error.code) {
      case LeafQueryErrorCode.RANGE_TOO_LARGE: {
        const maxRange = error.metadata?.maxRange
        return {
          code: TOO_MANY_LEAVES,
          message: 'TooManyLeaves',
          data: `MaxRange${String(maxRange)}`,
          trace,
        }
      }
      case LeafQueryErrorCode.INVALID_RANGE:
      case LeafQueryErrorCode.INVALID_INPUT:
        return { code: INVALID_PARAMS, message: error.message, trace }
      case LeafQueryErrorCode.SNAPSHOT_NOT_FOUND:
        return { code: INVALID_BLOCK, message: error.message, trace }
      case LeafQueryErrorCode.TREE_NOT_FOUND:
        return {
          code: UNKNOWN_TREE,
          message: 'UnknownTree',
          data: error.message,
          trace,
        }
      case LeafQueryErrorCode.ENGINE_UNAVAILABLE:
        return { code: INTERNAL_ERROR, message: error.message, trace }
    }
  }

  return {
    code: INTERNAL_ERROR,
    message: error.message || 'Internal error',
    trace,
  }
}
