/**
 * Utilities for manipulating bytes and hex strings
 */
export * from './bytes'
export * from './safe'
