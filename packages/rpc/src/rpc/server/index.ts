import type { Metrics } from '@merkle-leaves/metrics'
import type { Context, Next } from 'hono'
import { requestId } from 'hono/request-id'
import type { LeafRangeQueryService } from '../../leaves/index'
import { RATE_LIMITED } from '../error-code'
import { getRpcErrorResponse } from '../helpers'
import { createRpcHandlers } from '../modules/index'
import { RateLimiter, type RateLimitOptions } from '../rate-limit/index'
import { type RpcApiEnv, rpcRequestSchema } from '../types'
import { rpcValidator } from '../validation'
import {
  RpcServerBase,
  type RpcServerModules,
  type RpcServerOpts,
} from './base'

export type RpcServerOptsExtended = RpcServerOpts & {
  rateLimit?: RateLimitOptions
  /** Route serving Prometheus metrics when a registry is given */
  metricsPath?: string
}

export const rpcServerOpts: RpcServerOptsExtended = {
  address: '127.0.0.1',
  port: 8545,
  cors: undefined,
  bodyLimit: 10 * 1024 * 1024, // 10MB
  stacktraces: false,
  debug: false,
  metricsPath: '/metrics',
}

export type RpcServerModulesExtended = RpcServerModules & {
  leaves: LeafRangeQueryService
  metrics?: Metrics
}

export class RpcServer extends RpcServerBase {
  readonly modules: RpcServerModulesExtended
  readonly methods: string[]
  private rateLimiter?: RateLimiter

  constructor(
    optsArg: Partial<RpcServerOptsExtended>,
    modules: RpcServerModulesExtended,
  ) {
    const opts = { ...rpcServerOpts, ...optsArg }
    super(opts, modules)
    this.modules = modules

    if (opts.rateLimit?.enabled === true) {
      this.rateLimiter = new RateLimiter(opts.rateLimit)
    }

    this.methods = this.registerRoutes(opts.metricsPath)
  }

  private registerRoutes(metricsPath?: string): string[] {
    const { rpcHandlers, methods } = createRpcHandlers(
      { leaves: this.modules.leaves },
      { debug: this.opts.debug ?? false, metrics: this.modules.metrics?.rpc },
    )

    this.app.use('*', requestId())

    const metrics = this.modules.metrics
    if (metrics && metricsPath) {
      this.app.get(metricsPath, async (c) => {
        c.header('Content-Type', metrics.register.contentType)
        return c.body(await metrics.register.metrics())
      })
    }

    // rate limiting runs after validation so buckets can key on the method
    this.app.post(
      '/',
      rpcValidator(rpcRequestSchema),
      this.rateLimit.bind(this),
      rpcHandlers,
    )
    return methods
  }

  async close(): Promise<void> {
    this.rateLimiter?.close()
    await super.close()
  }

  private async rateLimit(c: Context<RpcApiEnv>, next: Next) {
    if (!this.rateLimiter) return next()

    const ip =
      c.req.header('x-forwarded-for')?.split(',')[0]?.trim() ||
      c.req.header('x-real-ip') ||
      'unknown'
    const rpcMethod = c.get('rpcMethod')

    const result = this.rateLimiter.allows(ip, rpcMethod)

    if (!result.allowed) {
      this.modules.metrics?.rpc.rateLimited.inc({ method: rpcMethod })
      this.logger.warn(
        `Rate limit exceeded for IP ${ip} method ${rpcMethod}`,
      )

      return getRpcErrorResponse(
        c,
        {
          code: RATE_LIMITED,
          message: `Rate limit exceeded. Retry after ${result.retryAfter} seconds`,
          data: {
            retryAfter: result.retryAfter,
            remaining: result.remaining,
          },
        },
        429,
      )
    }

    return next()
  }
}
