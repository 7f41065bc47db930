import { isIP } from 'node:net'

/**
 * Whether `host` only accepts connections from this machine
 */
export const isLocalhostIP = (host: string): boolean => {
  if (host === 'localhost') return true
  switch (isIP(host)) {
    case 4:
      return host.startsWith('127.')
    case 6:
      return host === '::1' || host === '0:0:0:0:0:0:0:1'
    default:
      return false
  }
}
