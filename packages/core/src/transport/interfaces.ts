/**
 * Local network interface lookups
 */
import { hostname, networkInterfaces, type NetworkInterfaceInfo } from 'node:os'
import { ConfigError } from '../types/error.types.js'

export const ZERO_MAC_ADDRESS = '00:00:00:00:00:00'

export interface InterfaceAddress {
  name: string
  address: string
  mac: string
}

export type InterfaceTable = NodeJS.Dict<NetworkInterfaceInfo[]>

const isExternalIPv4 = (info: NetworkInterfaceInfo) => info.family === 'IPv4' && !info.internal

/**
 * Resolve the IPv4 address and MAC of a named interface
 * @throws ConfigError when the interface is unknown or has no IPv4 address
 */
export function resolveInterface(
  name: string,
  table: InterfaceTable = networkInterfaces()
): InterfaceAddress {
  const infos = table[name]
  if (!infos || infos.length === 0) {
    throw new ConfigError(`network interface not found: ${name}`)
  }

  const ipv4 = infos.find(info => info.family === 'IPv4')
  if (!ipv4) {
    throw new ConfigError(`network interface has no IPv4 address: ${name}`)
  }

  return { name, address: ipv4.address, mac: ipv4.mac.toUpperCase() }
}

/**
 * First external IPv4 interface, used when no bind interface is configured
 */
export function defaultInterface(
  table: InterfaceTable = networkInterfaces()
): InterfaceAddress | undefined {
  for (const [name, infos] of Object.entries(table)) {
    const ipv4 = infos?.find(isExternalIPv4)
    if (ipv4) {
      return { name, address: ipv4.address, mac: ipv4.mac.toUpperCase() }
    }
  }
  return undefined
}

export function localHostname(): string {
  return hostname()
}
