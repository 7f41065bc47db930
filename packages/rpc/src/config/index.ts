export * as ConfigConstants from './constants'
export { configFromEnv } from './env'
export type { ConfigOptions, RpcOptions } from './types'
export { createConfigOptions } from './utils'
export type { ResolvedConfigOptions } from './utils'
