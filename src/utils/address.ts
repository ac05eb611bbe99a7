/**
 * IPv4 address helpers shared by the loader and the template helpers.
 */

const IPV4_REGEX = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/
const CIDR_REGEX = /^([^/]+)\/(\d{1,2})$/

/**
 * Checks a dotted-quad IPv4 address (each octet 0-255)
 */
export function isIPv4 (value: string): boolean {
  const match = IPV4_REGEX.exec(value)
  if (!match) {
    return false
  }
  return match.slice(1).every((octet) => Number(octet) <= 255)
}

/**
 * Checks an IPv4 address in CIDR notation, e.g. `10.0.12.1/24`
 */
export function isCidr (value: string): boolean {
  const match = CIDR_REGEX.exec(value)
  if (!match) {
    return false
  }
  return isIPv4(match[1]) && Number(match[2]) <= 32
}

/**
 * Splits a CIDR string into address and prefix length
 * @throws Error if the value is not valid CIDR notation
 */
export function splitCidr (value: string): { address: string, prefixLength: number } {
  const match = CIDR_REGEX.exec(value)
  if (!match || !isCidr(value)) {
    throw new Error(`Invalid CIDR notation: ${value}`)
  }
  return { address: match[1], prefixLength: Number(match[2]) }
}

/** `<destination> via <gateway>` */
const STATIC_ROUTE_REGEX = /^(\S+)\s+via\s+(\S+)$/

/** Destination keyword for the default route */
export const DEFAULT_ROUTE = 'default'
export const DEFAULT_ROUTE_CIDR = '0.0.0.0/0'

/**
 * Parses a static route string such as `10.0.0.0/8 via 192.168.1.1`.
 * The `default` destination is returned as `0.0.0.0/0`.
 * @returns undefined when the string does not have the `via` form
 */
export function parseStaticRoute (route: string): { destination: string, gateway: string } | undefined {
  const match = STATIC_ROUTE_REGEX.exec(route.trim())
  if (!match) {
    return undefined
  }
  const destination = match[1] === DEFAULT_ROUTE ? DEFAULT_ROUTE_CIDR : match[1]
  return { destination, gateway: match[2] }
}

function toInt (address: string): number {
  return address.split('.').reduce((acc, octet) => acc * 256 + Number(octet), 0)
}

/**
 * Checks whether an IPv4 address lies in the subnet of a CIDR address,
 * e.g. `isInSubnet('10.0.1.254', '10.0.1.1/24')` is true.
 */
export function isInSubnet (address: string, cidr: string): boolean {
  if (!isIPv4(address) || !isCidr(cidr)) {
    return false
  }
  const { address: network, prefixLength } = splitCidr(cidr)
  const size = 2 ** (32 - prefixLength)
  return Math.floor(toInt(address) / size) === Math.floor(toInt(network) / size)
}
