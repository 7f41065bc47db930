export * from './metrics'
export type { LeafMetrics } from './metrics/leaves'
export type { RPCMetrics } from './metrics/rpc'
export * from './options'
export { RegistryMetricCreator } from './utils/registryMetricCreator'
