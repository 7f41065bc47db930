export type QuantityInput = number | string

export interface QuantityOptions {
  /** Largest accepted value, inclusive */
  max: number
  errorMessage?: string
}

export const UINT32_MAX = 0xffffffff
