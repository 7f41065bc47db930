// https://www.jsonrpc.org/specification#error_object
export const PARSE_ERROR = -32700
export const INVALID_REQUEST = -32600
export const METHOD_NOT_FOUND = -32601
export const INVALID_PARAMS = -32602
export const INTERNAL_ERROR = -32603
export const RATE_LIMITED = -32005

// Ethereum client convention for an unknown block
export const INVALID_BLOCK = -39001

// Server errors of the merkle module
export const UNKNOWN_TREE = 1404
export const TOO_MANY_LEAVES = 1512
