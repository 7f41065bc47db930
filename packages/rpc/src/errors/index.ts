/**
 * Error Handling System
 *
 * Structured errors for leaf range queries
 */

export * from './base'
export * from './classification'
export * from './types'
