import { z } from 'zod'
import { InvalidInputError } from '../errors/index'
import { LOG_LEVELS } from '../logging'
import { ENV_PREFIX } from './constants'
import type { ConfigOptions } from './types'

const zFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((val) => val === 'true' || val === '1')

const zPort = z.coerce.number().int().min(0).max(65535)

const envSchema = z.object({
  RPC_PORT: zPort.optional(),
  RPC_ADDRESS: z.string().min(1).optional(),
  RPC_CORS: z.string().min(1).optional(),
  RPC_DEBUG: zFlag.optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  FETCH_CONCURRENCY: z.coerce.number().int().min(1).optional(),
  RATE_LIMIT: zFlag.optional(),
  METRICS: zFlag.optional(),
})

/**
 * Read `MERKLE_LEAVES_*` variables into config options.
 * Unset variables are left out so defaults apply.
 */
export function configFromEnv(
  env: Record<string, string | undefined> = process.env,
): ConfigOptions {
  const scoped: Record<string, string> = {}
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith(ENV_PREFIX) && value !== undefined && value !== '') {
      scoped[key.slice(ENV_PREFIX.length)] = value
    }
  }

  const parsed = envSchema.safeParse(scoped)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new InvalidInputError(
      `Invalid ${ENV_PREFIX}${issue.path.join('.')}: ${issue.message}`,
    )
  }

  const vars = parsed.data
  const options: ConfigOptions = {}

  if (
    vars.RPC_PORT !== undefined ||
    vars.RPC_ADDRESS !== undefined ||
    vars.RPC_CORS !== undefined ||
    vars.RPC_DEBUG !== undefined
  ) {
    options.rpc = {
      port: vars.RPC_PORT,
      address: vars.RPC_ADDRESS,
      cors: vars.RPC_CORS,
      debug: vars.RPC_DEBUG,
    }
  }
  if (vars.LOG_LEVEL !== undefined) options.logLevel = vars.LOG_LEVEL
  if (vars.FETCH_CONCURRENCY !== undefined) {
    options.fetchConcurrency = vars.FETCH_CONCURRENCY
  }
  if (vars.RATE_LIMIT !== undefined) {
    options.rateLimit = { enabled: vars.RATE_LIMIT }
  }
  if (vars.METRICS !== undefined) {
    options.metrics = { enabled: vars.METRICS }
  }
  return options
}
