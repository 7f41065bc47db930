import { createMetrics, type Metrics } from '@merkle-leaves/metrics'
import type { ConfigOptions } from './config/types'
import { createConfigOptions, type ResolvedConfigOptions } from './config/utils'
import type { StateEngine } from './engine/types'
import { LeafRangeQueryService } from './leaves/index'
import { RpcServer } from './rpc/server/index'

/**
 * Leaf query service and the RPC server exposing it, wired from one config
 */
export class MerkleLeavesNode {
  readonly config: ResolvedConfigOptions
  readonly leaves: LeafRangeQueryService
  readonly server: RpcServer
  readonly metrics?: Metrics

  constructor(engine: StateEngine, options: ConfigOptions = {}) {
    const config = createConfigOptions(options)
    this.config = config

    if (config.metrics.enabled) {
      this.metrics = createMetrics(config.metrics)
    }

    this.leaves = new LeafRangeQueryService(engine, {
      fetchConcurrency: config.fetchConcurrency,
      logger: config.logger,
      metrics: this.metrics?.leaves,
    })

    this.server = new RpcServer(
      {
        ...config.rpc,
        rateLimit: config.rateLimit,
        metricsPath: config.metrics.path,
      },
      {
        logger: config.logger,
        leaves: this.leaves,
        metrics: this.metrics,
      },
    )
  }

  async start(): Promise<void> {
    await this.server.listen()
  }

  async stop(): Promise<void> {
    await this.server.close()
    this.metrics?.close()
  }
}
