export const RPC_PORT_DEFAULT = 8545
export const RPC_ADDRESS_DEFAULT = '127.0.0.1'
export const RPC_BODY_LIMIT_DEFAULT = 10 * 1024 * 1024 // 10MB
export const LOG_LEVEL_DEFAULT = 'info'
export const FETCH_CONCURRENCY_DEFAULT = 16
export const ENV_PREFIX = 'MERKLE_LEAVES_'
