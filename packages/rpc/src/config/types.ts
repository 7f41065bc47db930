import type { MetricsOptions } from '@merkle-leaves/metrics'
import type { Logger, LogLevel } from '../logging'
import type { RateLimitOptions } from '../rpc/rate-limit/types'

export interface RpcOptions {
  /**
   * Listening port
   *
   * Default: `8545`
   */
  port?: number

  /**
   * Bind address
   *
   * Default: `127.0.0.1`
   */
  address?: string

  /**
   * Allowed CORS origin
   *
   * Default: `*`
   */
  cors?: string

  /**
   * Largest accepted request body in bytes
   *
   * Default: 10MB
   */
  bodyLimit?: number

  /**
   * Include stack traces of unexpected server errors in responses
   */
  stacktraces?: boolean

  /**
   * Include stack traces of failed method calls in responses
   */
  debug?: boolean
}

export interface ConfigOptions {
  rpc?: RpcOptions

  /**
   * Max engine fetches in flight for one leaf query
   *
   * Default: `16`
   */
  fetchConcurrency?: number

  /**
   * Logging verbosity, ignored when `logger` is given
   *
   * Default: `info`
   */
  logLevel?: LogLevel

  /**
   * A custom winston logger can be provided
   * if setting logging verbosity is not sufficient
   */
  logger?: Logger

  rateLimit?: RateLimitOptions

  metrics?: MetricsOptions
}
