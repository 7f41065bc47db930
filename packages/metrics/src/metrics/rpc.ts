import type { RegistryMetricCreator } from '../utils/registryMetricCreator'

export type RPCMetrics = ReturnType<typeof createRPCMetrics>

/**
 * Create JSON-RPC server metrics
 */
export function createRPCMetrics(register: RegistryMetricCreator) {
  return {
    requests: register.counter<{ method: string; status: string }>({
      name: 'merkle_rpc_requests_total',
      help: 'Total number of JSON-RPC requests by method and outcome',
      labelNames: ['method', 'status'],
    }),
    requestDuration: register.histogram<{ method: string }>({
      name: 'merkle_rpc_request_duration_seconds',
      help: 'Time spent answering JSON-RPC requests',
      labelNames: ['method'],
      buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 5],
    }),
    rateLimited: register.counter<{ method: string }>({
      name: 'merkle_rpc_rate_limited_total',
      help: 'Total number of JSON-RPC requests rejected by the rate limiter',
      labelNames: ['method'],
    }),
  }
}
