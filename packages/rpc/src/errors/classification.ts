/**
 * Error Classification Utilities
 */

import { EngineUnavailableError, LeafQueryError } from './base'
import type { ErrorContext } from './types'

export function isLeafQueryError(error: unknown): error is LeafQueryError {
  return error instanceof LeafQueryError
}

/**
 * Classify anything the state engine threw into a LeafQueryError.
 * Typed errors keep their class and are copied with the request context
 * merged in, leaving the thrown instance untouched.
 */
export function classifyEngineError(
  error: unknown,
  context?: ErrorContext,
): LeafQueryError {
  if (error instanceof LeafQueryError) {
    return context ? error.withContext(context) : error
  }

  const cause = error instanceof Error ? error : undefined
  const message =
    error instanceof Error ? error.message || 'Unknown error' : String(error)

  return new EngineUnavailableError(`State engine failure: ${message}`, {
    context,
    cause,
  })
}
