import type { Hex } from 'viem'
import { afterEach, describe, expect, it } from 'vitest'
import {
  type ConfigOptions,
  getSilentLogger,
  MemoryStateEngine,
  MerkleLeavesNode,
} from '../../../src'

const leaf = (fill: number) => new Uint8Array(32).fill(fill)
const wire = (fill: number) => new Array<number>(32).fill(fill)

const nodes: MerkleLeavesNode[] = []

const setup = (options: ConfigOptions = {}) => {
  const engine = new MemoryStateEngine()
  engine.createTree(7)
  engine.setLeaf(7, 0, leaf(0xa))
  engine.setLeaf(7, 1, leaf(0xb))
  engine.setLeaf(7, 3, leaf(0xd))
  const snapshot = engine.commit()
  const node = new MerkleLeavesNode(engine, {
    logger: getSilentLogger(),
    ...options,
  })
  nodes.push(node)
  return { engine, node, snapshot }
}

const post = (node: MerkleLeavesNode, body: unknown) =>
  node.server.request('/', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: typeof body === 'string' ? body : JSON.stringify(body),
  })

const call = (node: MerkleLeavesNode, params: unknown[], method = 'merkle_treeLeaves') =>
  post(node, { jsonrpc: '2.0', id: 1, method, params })

afterEach(async () => {
  await Promise.all(nodes.splice(0).map((node) => node.stop()))
})

describe('merkle_treeLeaves', () => {
  it('should return present leaves as byte arrays in index order', async () => {
    const { node } = setup()

    const res = await call(node, [7, 0, 4])

    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({
      jsonrpc: '2.0',
      id: 1,
      result: [wire(0xa), wire(0xb), wire(0xd)],
    })
  })

  it('should send each leaf as its 32 byte values', async () => {
    const { engine, node } = setup()
    engine.setLeaf(7, 5, Uint8Array.from({ length: 32 }, (_, i) => i * 8))
    engine.commit()

    const res = await call(node, [7, 5, 6])

    expect(await res.json()).toEqual({
      jsonrpc: '2.0',
      id: 1,
      result: [Array.from({ length: 32 }, (_, i) => i * 8)],
    })
  })

  it('should accept hex quantities and a null snapshot', async () => {
    const { node } = setup()

    const res = await call(node, ['0x7', '0x1', '0x4', null])

    expect(await res.json()).toMatchObject({ result: [wire(0xb), wire(0xd)] })
  })

  it('should answer an empty range with an empty array', async () => {
    const { node } = setup()

    const res = await call(node, [7, 2, 2])

    expect(await res.json()).toMatchObject({ result: [] })
  })

  it('should accept the widest allowed range', async () => {
    const { node } = setup()

    const res = await call(node, [7, 0, 511])

    expect(res.status).toBe(200)
    expect(await res.json()).toMatchObject({
      result: [wire(0xa), wire(0xb), wire(0xd)],
    })
  })

  it('should reject 512 leaves with TooManyLeaves', async () => {
    const { node } = setup()

    const res = await call(node, [7, 0, 512])

    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({
      jsonrpc: '2.0',
      id: 1,
      error: { code: 1512, message: 'TooManyLeaves', data: 'MaxRange512' },
    })
  })

  it('should reject an inverted range as invalid params', async () => {
    const { node } = setup()

    const res = await call(node, [7, 4, 2])

    expect(res.status).toBe(400)
    expect(await res.json()).toMatchObject({
      error: {
        code: -32602,
        message: 'Invalid leaf range: to (2) is less than from (4)',
      },
    })
  })

  it('should reject malformed params', async () => {
    const { node } = setup()

    const negative = await call(node, [7, -1, 2])
    const badTree = await call(node, ['seven', 0, 2])
    const badHash = await call(node, [7, 0, 2, '0x1234'])
    const missing = await call(node, [7])

    expect(await negative.json()).toMatchObject({
      error: { code: -32602, message: 'Invalid from: must be a leaf index' },
    })
    expect(await badTree.json()).toMatchObject({
      error: { code: -32602, message: 'Invalid tree_id: must be a uint32' },
    })
    expect(await badHash.json()).toMatchObject({
      error: {
        code: -32602,
        message: 'Must be a 64-character hex string (32 bytes)',
      },
    })
    expect(missing.status).toBe(400)
    expect(await missing.json()).toMatchObject({ error: { code: -32602 } })
  })

  it('should read a pinned snapshot given as `at`', async () => {
    const { engine, node, snapshot } = setup()
    engine.setLeaf(7, 2, leaf(0xc))
    engine.commit()

    const pinned = await call(node, [7, 0, 4, snapshot])
    const current = await call(node, [7, 0, 4])

    expect(await pinned.json()).toMatchObject({
      result: [wire(0xa), wire(0xb), wire(0xd)],
    })
    expect(await current.json()).toMatchObject({
      result: [wire(0xa), wire(0xb), wire(0xc), wire(0xd)],
    })
  })

  it('should report an unknown snapshot as an invalid block', async () => {
    const { node } = setup()
    const unknown: Hex = `0x${'11'.repeat(32)}`

    const res = await call(node, [7, 0, 4, unknown])

    expect(res.status).toBe(400)
    expect(await res.json()).toMatchObject({
      error: { code: -39001, message: `Unknown snapshot ${unknown}` },
    })
  })

  it('should report an unknown tree', async () => {
    const { node } = setup()

    const res = await call(node, [9, 0, 4])

    expect(await res.json()).toMatchObject({
      error: { code: 1404, message: 'UnknownTree', data: 'Unknown tree 9' },
    })
  })
})

describe('[RpcServer]', () => {
  it('should list the registered methods', () => {
    const { node } = setup()
    expect(node.server.methods).toEqual(['merkle_treeLeaves'])
  })

  it('should answer unknown methods with 404', async () => {
    const { node } = setup()

    const unknown = await call(node, [], 'merkle_foo')
    const inherited = await call(node, [], 'constructor')

    expect(unknown.status).toBe(404)
    expect(await unknown.json()).toEqual({
      jsonrpc: '2.0',
      id: 1,
      error: { code: -32601, message: 'Method merkle_foo not found' },
    })
    expect(inherited.status).toBe(404)
  })

  it('should answer a body that is not JSON with a parse error', async () => {
    const { node } = setup()

    const res = await post(node, '{"jsonrpc":')

    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({
      jsonrpc: '2.0',
      id: null,
      error: { code: -32700, message: 'Parse error' },
    })
  })

  it('should reject a request with the wrong protocol version', async () => {
    const { node } = setup()

    const res = await post(node, {
      jsonrpc: '1.0',
      id: 1,
      method: 'merkle_treeLeaves',
      params: [7, 0, 1],
    })

    expect(res.status).toBe(400)
    expect(await res.json()).toMatchObject({
      error: { code: -32602, message: 'Invalid JSON-RPC version' },
    })
  })

  it('should answer unknown routes with 404', async () => {
    const { node } = setup()

    const res = await node.server.request('/nope')

    expect(res.status).toBe(404)
    expect(await res.json()).toMatchObject({
      error: {
        code: -32600,
        message: 'Route GET:http://localhost/nope not found',
      },
    })
  })

  it('should reject bodies over the size limit', async () => {
    const { node } = setup({ rpc: { bodyLimit: 16 } })

    const body = JSON.stringify({
      jsonrpc: '2.0',
      id: 1,
      method: 'merkle_treeLeaves',
      params: [7, 0, 4],
    })

    const res = await node.server.request('/', {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Content-Length': String(body.length),
      },
      body,
    })

    expect(res.status).toBe(413)
    expect(await res.json()).toMatchObject({
      error: { code: -32600, message: 'Request body exceeds 16 bytes' },
    })
  })

  it('should rate limit once the burst is spent', async () => {
    const { node } = setup({
      rateLimit: { enabled: true, burstSize: 1, requestsPerSecond: 1 },
    })

    const first = await call(node, [7, 0, 1])
    const second = await call(node, [7, 0, 1])

    expect(first.status).toBe(200)
    expect(second.status).toBe(429)
    expect(await second.json()).toMatchObject({
      error: { code: -32005, data: { retryAfter: 1, remaining: 0 } },
    })
  })

  it('should serve request metrics', async () => {
    const { node } = setup()
    await call(node, [7, 0, 4])
    await call(node, [7, 0, 512])

    const res = await node.server.request('/metrics')
    const text = await res.text()

    expect(res.status).toBe(200)
    expect(text).toContain(
      'merkle_rpc_requests_total{method="merkle_treeLeaves",status="ok"} 1',
    )
    expect(text).toContain(
      'merkle_rpc_requests_total{method="merkle_treeLeaves",status="error"} 1',
    )
    expect(text).toContain('merkle_leaves_served_total 3')
    expect(text).toContain('merkle_leaves_absent_total 1')
  })

  it('should not expose metrics when they are disabled', async () => {
    const { node } = setup({ metrics: { enabled: false } })

    const res = await node.server.request('/metrics')

    expect(res.status).toBe(404)
  })
})
