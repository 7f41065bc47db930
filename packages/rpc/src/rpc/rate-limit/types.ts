/**
 * Rate Limiting Types
 */

/**
 * Rate limit configuration options
 */
export interface RateLimitOptions {
  /**
   * Enable rate limiting
   * @default false
   */
  enabled?: boolean

  /**
   * Sustained requests per second per IP
   * @default 100
   */
  requestsPerSecond?: number

  /**
   * Burst size (maximum requests allowed in a single burst)
   * @default 200
   */
  burstSize?: number

  /**
   * Keep a separate bucket for every method an IP calls
   * @default false
   */
  perMethod?: boolean

  /**
   * IPs that bypass rate limiting
   * @default []
   */
  whitelist?: string[]

  /**
   * IPs that are always rejected
   * @default []
   */
  blacklist?: string[]
}

/**
 * Token bucket state
 */
export interface TokenBucket {
  tokens: number
  lastRefill: number
}

/**
 * Rate limit result
 */
export interface RateLimitResult {
  allowed: boolean
  retryAfter?: number
  remaining?: number
}
