export * from './custom/base'
export * from './custom/hex32'
export * from './custom/number'
export * from './custom/types'
