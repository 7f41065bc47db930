/**
 * Token bucket rate limiting for RPC requests
 */

import type { RateLimitOptions, RateLimitResult, TokenBucket } from './types'

const BUCKET_MAX_AGE = 60 * 60 * 1000 // 1 hour
const CLEANUP_INTERVAL = 5 * 60 * 1000

export class RateLimiter {
  private buckets: Map<string, TokenBucket> = new Map()
  private readonly requestsPerSecond: number
  private readonly burstSize: number
  private readonly perMethod: boolean
  private readonly whitelist: Set<string>
  private readonly blacklist: Set<string>
  private cleanupInterval: NodeJS.Timeout | undefined

  constructor(
    options: RateLimitOptions = {},
    private readonly now: () => number = Date.now,
  ) {
    this.requestsPerSecond = options.requestsPerSecond ?? 100
    this.burstSize = options.burstSize ?? 200
    this.perMethod = options.perMethod ?? false
    this.whitelist = new Set(options.whitelist ?? [])
    this.blacklist = new Set(options.blacklist ?? [])

    this.cleanupInterval = setInterval(() => {
      this.cleanup()
    }, CLEANUP_INTERVAL)
    this.cleanupInterval.unref()
  }

  /**
   * Check if a request is allowed, consuming a token when it is
   */
  allows(ip: string, method?: string): RateLimitResult {
    if (this.whitelist.has(ip)) {
      return { allowed: true }
    }

    if (this.blacklist.has(ip)) {
      return {
        allowed: false,
        retryAfter: 60,
        remaining: 0,
      }
    }

    const key = this.perMethod && method ? `${ip}:${method}` : ip
    const bucket = this.getBucket(key)
    const now = this.now()

    // Refill tokens based on time elapsed
    const elapsedSeconds = (now - bucket.lastRefill) / 1000
    bucket.tokens = Math.min(
      this.burstSize,
      bucket.tokens + elapsedSeconds * this.requestsPerSecond,
    )
    bucket.lastRefill = now

    if (bucket.tokens >= 1) {
      bucket.tokens -= 1
      return {
        allowed: true,
        remaining: Math.floor(bucket.tokens),
      }
    }

    const tokensNeeded = 1 - bucket.tokens
    return {
      allowed: false,
      retryAfter: Math.ceil(tokensNeeded / this.requestsPerSecond),
      remaining: 0,
    }
  }

  private getBucket(key: string): TokenBucket {
    let bucket = this.buckets.get(key)
    if (!bucket) {
      bucket = {
        tokens: this.burstSize,
        lastRefill: this.now(),
      }
      this.buckets.set(key, bucket)
    }
    return bucket
  }

  /**
   * Drop buckets idle for over an hour
   */
  private cleanup(): void {
    const now = this.now()
    for (const [key, bucket] of this.buckets.entries()) {
      if (now - bucket.lastRefill > BUCKET_MAX_AGE) {
        this.buckets.delete(key)
      }
    }
  }

  reset(): void {
    this.buckets.clear()
  }

  close(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval)
      this.cleanupInterval = undefined
    }
    this.buckets.clear()
  }
}

export type { RateLimitOptions, RateLimitResult } from './types'
