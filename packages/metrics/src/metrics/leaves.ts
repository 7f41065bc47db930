import type { RegistryMetricCreator } from '../utils/registryMetricCreator'

export type LeafMetrics = ReturnType<typeof createLeafMetrics>

/**
 * Create leaf range query metrics
 */
export function createLeafMetrics(register: RegistryMetricCreator) {
  return {
    queries: register.counter<{ result: string }>({
      name: 'merkle_leaf_queries_total',
      help: 'Total number of leaf range queries by result',
      labelNames: ['result'],
    }),
    leavesServed: register.counter({
      name: 'merkle_leaves_served_total',
      help: 'Total number of present leaves returned to callers',
    }),
    leavesAbsent: register.counter({
      name: 'merkle_leaves_absent_total',
      help: 'Total number of requested indices with no leaf written',
    }),
  }
}
