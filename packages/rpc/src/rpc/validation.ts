import { type Safe, safeError, safeTry } from '@merkle-leaves/utils'
import type { Context } from 'hono'
import { createMiddleware } from 'hono/factory'
import type { z } from 'zod'
import { INVALID_PARAMS, METHOD_NOT_FOUND, PARSE_ERROR } from './error-code'
import {
  getRpcErrorResponse,
  getRpcResponse,
  RpcMethodError,
  toRpcError,
} from './helpers'
import type {
  RpcApiEnv,
  RpcHandler,
  RpcHandlerOptions,
  RpcMethodFn,
  RpcRequest,
} from './types'

export const rpcValidator = (schema: z.ZodType<RpcRequest>) =>
  createMiddleware<RpcApiEnv>(async (c, next) => {
    const requestId = c.get('requestId')
    const [jsonError, body] = await safeTry(() => c.req.json<unknown>())

    if (jsonError) {
      // stream failures (such as an exceeded body limit) belong to onError
      if (!(jsonError instanceof SyntaxError)) throw jsonError
      c.set('rpcId', null)
      return getRpcErrorResponse(
        c,
        { code: PARSE_ERROR, message: 'Parse error' },
        400,
      )
    }

    const parsed = schema.safeParse(body)
    if (!parsed.success) {
      c.set('rpcId', requestId)
      return getRpcErrorResponse(
        c,
        { code: INVALID_PARAMS, message: parsed.error.issues[0].message },
        400,
      )
    }

    const bodyParsed = parsed.data
    c.set('jsonrpc', bodyParsed.jsonrpc)
    c.set('rpcId', bodyParsed.id ?? requestId)
    c.set('rpcMethod', bodyParsed.method)
    c.set('rpcParams', bodyParsed.params)

    await next()
  })

export const createRpcHandler =
  (
    methods: Record<string, RpcMethodFn>,
    { debug = false, metrics }: RpcHandlerOptions = {},
  ) =>
  async (c: Context<RpcApiEnv>) => {
    const rpcMethod = c.get('rpcMethod')
    const rpcParams = c.get('rpcParams')

    // Check if method exists
    if (!Object.hasOwn(methods, rpcMethod)) {
      metrics?.requests.inc({ method: 'unknown', status: 'not_found' })
      return getRpcErrorResponse(
        c,
        {
          code: METHOD_NOT_FOUND,
          message: `Method ${rpcMethod} not found`,
        },
        404,
      )
    }

    const handler = methods[rpcMethod]
    const stopTimer = metrics?.requestDuration.startTimer({ method: rpcMethod })
    let outcome: Safe<unknown>
    try {
      outcome = await handler(c, rpcParams)
    } catch (thrownError) {
      outcome = safeError(
        thrownError instanceof Error
          ? thrownError
          : new Error(String(thrownError)),
      )
    } finally {
      stopTimer?.()
    }
    const [error, result] = outcome

    if (error) {
      metrics?.requests.inc({ method: rpcMethod, status: 'error' })
      return getRpcErrorResponse(c, toRpcError(error, debug), 400)
    }
    metrics?.requests.inc({ method: rpcMethod, status: 'ok' })
    return getRpcResponse(c, result)
  }

/**
 * Wrap a method implementation with validation of its positional params
 */
export const createRpcMethod =
  <T, R>(schema: z.ZodType<T>, impl: RpcHandler<T, R>): RpcMethodFn =>
  async (c, params) => {
    const parsed = schema.safeParse(params)

    if (!parsed.success) {
      return safeError(
        new RpcMethodError(INVALID_PARAMS, parsed.error.issues[0].message),
      )
    }

    return impl(parsed.data, c)
  }
