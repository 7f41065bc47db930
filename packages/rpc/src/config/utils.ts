import {
  defaultMetricsOptions,
  type MetricsOptions,
} from '@merkle-leaves/metrics'
import { getLogger, type Logger } from '../logging'
import type { RateLimitOptions } from '../rpc/rate-limit/types'
import * as constants from './constants'
import type { ConfigOptions } from './types'

/**
 * Resolved config options with all defaults applied
 */
export interface ResolvedConfigOptions {
  readonly rpc: {
    readonly port: number
    readonly address: string
    readonly cors?: string
    readonly bodyLimit: number
    readonly stacktraces: boolean
    readonly debug: boolean
  }
  readonly fetchConcurrency: number
  readonly logger: Logger
  readonly rateLimit: RateLimitOptions
  readonly metrics: MetricsOptions
}

/**
 * Create config options from user-provided options, applying defaults
 */
export function createConfigOptions(
  options: ConfigOptions = {},
): ResolvedConfigOptions {
  const rpc = options.rpc ?? {}

  return {
    rpc: {
      port: rpc.port ?? constants.RPC_PORT_DEFAULT,
      address: rpc.address ?? constants.RPC_ADDRESS_DEFAULT,
      cors: rpc.cors,
      bodyLimit: rpc.bodyLimit ?? constants.RPC_BODY_LIMIT_DEFAULT,
      stacktraces: rpc.stacktraces ?? false,
      debug: rpc.debug ?? false,
    },
    fetchConcurrency:
      options.fetchConcurrency ?? constants.FETCH_CONCURRENCY_DEFAULT,
    logger:
      options.logger ??
      getLogger({ logLevel: options.logLevel ?? constants.LOG_LEVEL_DEFAULT }),
    rateLimit: { enabled: false, ...options.rateLimit },
    metrics: { ...defaultMetricsOptions, ...options.metrics },
  }
}
