import type { ServerType } from '@hono/node-server'
import { serve } from '@hono/node-server'
import type { Context } from 'hono'
import { Hono } from 'hono'
import { bodyLimit } from 'hono/body-limit'
import { cors } from 'hono/cors'
import type { Server } from 'node:net'
import type { Logger } from 'winston'
import { isLocalhostIP } from '../../util/ip'
import { INTERNAL_ERROR, INVALID_REQUEST } from '../error-code'
import { getRpcErrorResponse } from '../helpers'
import type { RpcApiEnv } from '../types'

export type RpcServerOpts = {
  port: number
  cors?: string
  address?: string
  bodyLimit?: number
  stacktraces?: boolean
  debug?: boolean
}

export type RpcServerModules = {
  logger: Logger
}

export class RpcServerBase {
  protected readonly app: Hono<RpcApiEnv>
  protected server?: ServerType
  protected readonly logger: Logger
  protected isListening = false

  constructor(
    protected opts: RpcServerOpts,
    modules: RpcServerModules,
  ) {
    const app = new Hono<RpcApiEnv>()
    this.logger = modules.logger

    app.use('*', cors({ origin: opts.cors ?? '*' }))
    if (opts.bodyLimit !== undefined) {
      app.use(
        '*',
        bodyLimit({
          maxSize: opts.bodyLimit,
          onError: (c) =>
            getRpcErrorResponse(
              c,
              {
                code: INVALID_REQUEST,
                message: `Request body exceeds ${opts.bodyLimit} bytes`,
              },
              413,
            ),
        }),
      )
    }
    app.onError(this.onError.bind(this))
    app.notFound(this.onNotFound.bind(this))
    this.app = app
  }

  /**
   * Answer a request in process without a listening socket
   */
  async request(path: string, init?: RequestInit): Promise<Response> {
    return this.app.request(path, init)
  }

  async listen(): Promise<void> {
    if (this.isListening) return
    this.isListening = true
    return new Promise<void>((resolve, reject) => {
      try {
        const host = this.opts.address ?? '127.0.0.1'
        const server = serve(
          {
            fetch: this.app.fetch,
            port: this.opts.port,
            hostname: host,
          },
          () => this.onListening(server, host, resolve),
        )
        const netServer: Server = server
        netServer.once('error', (e: Error) => {
          this.logger.error('Error starting RPC server', { reason: e.message })
          this.isListening = false
          reject(e)
        })
      } catch (e) {
        this.logger.error('Error starting RPC server', { port: this.opts.port })
        this.isListening = false
        reject(e)
      }
    })
  }

  async close(): Promise<void> {
    if (!this.isListening || this.server === undefined) return
    const netServer: Server = this.server
    try {
      await new Promise<void>((resolve, reject) => {
        netServer.close((err) => (err ? reject(err) : resolve()))
      })
      this.server = undefined
      this.isListening = false
      this.logger.debug('RPC server closed')
    } catch (e) {
      this.logger.error('Error closing RPC server', {
        reason: e instanceof Error ? e.message : String(e),
      })
      throw e
    }
  }

  private onError(err: Error, c: Context<RpcApiEnv>) {
    const requestId = c.get('requestId')
    const rpcMethod = c.get('rpcMethod')

    this.logger.error(`Req ${requestId} ${rpcMethod} error`, {
      reason: err.message,
    })

    const error = {
      code: INTERNAL_ERROR,
      message: err.message || 'Internal error',
      data: this.opts.stacktraces ? err.stack?.split('\n') : undefined,
    }

    return getRpcErrorResponse(c, error, 500)
  }

  private onNotFound(c: Context<RpcApiEnv>) {
    const message = `Route ${c.req.method}:${c.req.url} not found`
    this.logger.warn(message)
    const error = {
      code: INVALID_REQUEST,
      message,
    }
    return getRpcErrorResponse(c, error, 404)
  }

  private onListening(
    server: ServerType,
    host: string,
    resolve: () => void,
  ) {
    if (!isLocalhostIP(host)) {
      this.logger.warn(
        'RPC server is exposed, ensure untrusted traffic cannot reach this API',
      )
    }
    this.server = server

    const address = `http://${host}:${this.opts.port}`
    this.logger.info('Started RPC server', { address })
    resolve()
  }
}
