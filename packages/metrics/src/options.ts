export type MetricsOptions = {
  enabled?: boolean
  /** Optional prefix for default Node.js metric names */
  prefix?: string
  /** Path the RPC server exposes the metrics on */
  path?: string
  /** Whether to collect default Node.js metrics */
  collectDefaultMetrics?: boolean
}

export const defaultMetricsOptions: MetricsOptions = {
  enabled: true,
  prefix: 'merkle_',
  path: '/metrics',
  collectDefaultMetrics: false,
}
