import { collectDefaultMetrics } from 'prom-client'
import { createLeafMetrics, type LeafMetrics } from './metrics/leaves'
import { createRPCMetrics, type RPCMetrics } from './metrics/rpc'
import type { MetricsOptions } from './options'
import { RegistryMetricCreator } from './utils/registryMetricCreator'

export type Metrics = {
  rpc: RPCMetrics
  leaves: LeafMetrics
  register: RegistryMetricCreator
  close: () => void
}

export function createMetrics(opts: MetricsOptions = {}): Metrics {
  const register = new RegistryMetricCreator()
  const rpc = createRPCMetrics(register)
  const leaves = createLeafMetrics(register)

  if (opts.collectDefaultMetrics) {
    collectDefaultMetrics({ register, prefix: opts.prefix })
  }

  return {
    rpc,
    leaves,
    register,
    close: () => register.clear(),
  }
}
