/**
 * Error Type Definitions
 *
 * Defines error categories, codes, and context for leaf queries
 */

import type { Snapshot } from '../engine/types'

/**
 * Error categories for classification
 */
export enum ErrorCategory {
  VALIDATION = 'validation',
  ENGINE = 'engine',
}

/**
 * Error codes for different failure scenarios
 */
export enum LeafQueryErrorCode {
  // Validation errors
  RANGE_TOO_LARGE = 'RANGE_TOO_LARGE',
  INVALID_RANGE = 'INVALID_RANGE',
  INVALID_INPUT = 'INVALID_INPUT',

  // Engine errors
  SNAPSHOT_NOT_FOUND = 'SNAPSHOT_NOT_FOUND',
  TREE_NOT_FOUND = 'TREE_NOT_FOUND',
  ENGINE_UNAVAILABLE = 'ENGINE_UNAVAILABLE',
}

/**
 * Error metadata type
 */
export type ErrorMetadata = Record<string, unknown>

/**
 * Request being served when the error was raised
 */
export interface ErrorContext {
  treeId?: number
  from?: number
  to?: number
  snapshot?: Snapshot
  index?: number
}
