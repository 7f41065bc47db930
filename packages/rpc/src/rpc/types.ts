import type { RPCMetrics } from '@merkle-leaves/metrics'
import type { SafePromise } from '@merkle-leaves/utils'
import type { Context } from 'hono'
import type { RequestIdVariables } from 'hono/request-id'
import { z } from 'zod'

export type RPCError = {
  code: number
  message: string
  data?: unknown
  trace?: string
}

export type RpcId = string | number | null

export type RpcApiEnv = {
  Variables: RequestIdVariables & {
    jsonrpc: string
    rpcParams: unknown[]
    rpcId: RpcId
    rpcMethod: string
  }
}

const rpcParamsSchema = z.array(z.unknown()).default([])

export const rpcRequestSchema = z.object({
  jsonrpc: z.literal('2.0', { error: 'Invalid JSON-RPC version' }),
  method: z.string({ error: 'Invalid method' }),
  id: z.union([z.string(), z.number(), z.null()]).optional(),
  params: rpcParamsSchema,
})

export type RpcRequest = z.infer<typeof rpcRequestSchema>

export type RpcMethodFn = (
  c: Context<RpcApiEnv>,
  params: unknown[],
) => SafePromise<unknown>

export type RpcHandlerOptions = {
  debug?: boolean
  metrics?: RPCMetrics
}

export type RpcHandler<T, R> = (
  parsed: T,
  c: Context<RpcApiEnv>,
) => SafePromise<R>
