/**
 * Base Error Classes
 *
 * Structured errors for leaf range queries and the state engine behind them
 */

import {
  ErrorCategory,
  type ErrorContext,
  type ErrorMetadata,
  LeafQueryErrorCode,
} from './types'

export type LeafQueryErrorOptions = {
  metadata?: ErrorMetadata
  context?: ErrorContext
  cause?: Error
}

/**
 * Base error class for all leaf query errors
 */
export class LeafQueryError extends Error {
  public readonly code: LeafQueryErrorCode
  public readonly category: ErrorCategory
  /** Whether the caller can succeed by changing its request */
  public readonly recoverable: boolean
  public readonly metadata?: ErrorMetadata
  public readonly context?: ErrorContext
  public readonly timestamp: number

  constructor(
    message: string,
    options: LeafQueryErrorOptions & {
      code: LeafQueryErrorCode
      category: ErrorCategory
      recoverable?: boolean
    },
  ) {
    super(message, { cause: options.cause })
    this.name = this.constructor.name
    this.code = options.code
    this.category = options.category
    this.recoverable = options.recoverable ?? false
    this.metadata = options.metadata
    this.context = options.context
    this.timestamp = Date.now()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Copy of this error with request context merged in; context the error
   * already carries wins. The original becomes the copy's cause.
   */
  withContext(context: ErrorContext): LeafQueryError {
    return this.withOptions({
      metadata: this.metadata,
      context: { ...context, ...this.context },
      cause: this,
    })
  }

  protected withOptions(options: LeafQueryErrorOptions): LeafQueryError {
    return new LeafQueryError(this.message, {
      ...options,
      code: this.code,
      category: this.category,
      recoverable: this.recoverable,
    })
  }

  /**
   * Serialize error for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      category: this.category,
      recoverable: this.recoverable,
      metadata: this.metadata,
      context: this.context,
      timestamp: this.timestamp,
    }
  }
}

/**
 * Requested span reaches the per-call limit
 */
export class RangeTooLargeError extends LeafQueryError {
  constructor(
    public readonly span: number,
    public readonly maxRange: number,
    options: Omit<LeafQueryErrorOptions, 'metadata'> = {},
  ) {
    super(`Requested ${span} leaves, range must be below ${maxRange}`, {
      ...options,
      code: LeafQueryErrorCode.RANGE_TOO_LARGE,
      category: ErrorCategory.VALIDATION,
      recoverable: true,
      metadata: { maxRange, span },
    })
  }

  protected withOptions(options: LeafQueryErrorOptions): RangeTooLargeError {
    return new RangeTooLargeError(this.span, this.maxRange, options)
  }
}

/**
 * Range end lies before its start
 */
export class InvalidRangeError extends LeafQueryError {
  constructor(
    public readonly from: number,
    public readonly to: number,
    options: LeafQueryErrorOptions = {},
  ) {
    super(`Invalid leaf range: to (${to}) is less than from (${from})`, {
      ...options,
      code: LeafQueryErrorCode.INVALID_RANGE,
      category: ErrorCategory.VALIDATION,
      recoverable: true,
    })
  }

  protected withOptions(options: LeafQueryErrorOptions): InvalidRangeError {
    return new InvalidRangeError(this.from, this.to, options)
  }
}

export class InvalidInputError extends LeafQueryError {
  constructor(message: string, options: LeafQueryErrorOptions = {}) {
    super(message, {
      ...options,
      code: LeafQueryErrorCode.INVALID_INPUT,
      category: ErrorCategory.VALIDATION,
      recoverable: true,
    })
  }

  protected withOptions(options: LeafQueryErrorOptions): InvalidInputError {
    return new InvalidInputError(this.message, options)
  }
}

export class SnapshotNotFoundError extends LeafQueryError {
  constructor(message: string, options: LeafQueryErrorOptions = {}) {
    super(message, {
      ...options,
      code: LeafQueryErrorCode.SNAPSHOT_NOT_FOUND,
      category: ErrorCategory.ENGINE,
    })
  }

  protected withOptions(options: LeafQueryErrorOptions): SnapshotNotFoundError {
    return new SnapshotNotFoundError(this.message, options)
  }
}

export class TreeNotFoundError extends LeafQueryError {
  constructor(message: string, options: LeafQueryErrorOptions = {}) {
    super(message, {
      ...options,
      code: LeafQueryErrorCode.TREE_NOT_FOUND,
      category: ErrorCategory.ENGINE,
    })
  }

  protected withOptions(options: LeafQueryErrorOptions): TreeNotFoundError {
    return new TreeNotFoundError(this.message, options)
  }
}

/**
 * Any other failure inside the state engine
 */
export class EngineUnavailableError extends LeafQueryError {
  constructor(message: string, options: LeafQueryErrorOptions = {}) {
    super(message, {
      ...options,
      code: LeafQueryErrorCode.ENGINE_UNAVAILABLE,
      category: ErrorCategory.ENGINE,
    })
  }

  protected withOptions(options: LeafQueryErrorOptions): EngineUnavailableError {
    return new EngineUnavailableError(this.message, options)
  }
}
