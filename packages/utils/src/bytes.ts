import { hexToBytes } from 'viem'

export const BYTES_32 = 32

export const isBytes32 = (value: Uint8Array): boolean =>
  value.length === BYTES_32

export const uint32ToBytes = (value: number): Uint8Array => {
  const bytes = new Uint8Array(4)
  new DataView(bytes.buffer).setUint32(0, value)
  return bytes
}

export const concatBytes = (...arrays: Uint8Array[]): Uint8Array => {
  const out = new Uint8Array(arrays.reduce((len, a) => len + a.length, 0))
  let offset = 0
  for (const a of arrays) {
    out.set(a, offset)
    offset += a.length
  }
  return out
}

export { hexToBytes }
