import { createHash } from 'crypto'

/** MAC address string in colon-separated lowercase hex */
export type MacAddress = string

/**
 * MacAddressGenerator derives stable, locally administered unicast MAC
 * addresses for lab interfaces. All methods are static - no instance needed.
 *
 * @example
 * // Deterministic MAC for R1's eth1 in topology "lab1"
 * const mac = MacAddressGenerator.generateFromSeed('lab1-R1-eth1')
 *
 * MacAddressGenerator.validate('02:54:00:a3:b2:c1') // => true
 * MacAddressGenerator.validate('invalid') // => false
 *
 * MacAddressGenerator.isLocallyAdministered('02:00:00:00:00:01') // => true
 */
export class MacAddressGenerator {
  /** MAC address validation regex */
  private static readonly MAC_REGEX = /^([0-9A-Fa-f]{2}:){5}[0-9A-Fa-f]{2}$/

  /**
   * Generates a MAC address from a seed string.
   * Same seed always produces the same MAC address.
   * @param seed - Usually `<topologyId>-<node>-<interface>`
   */
  static generateFromSeed (seed: string): MacAddress {
    const digest = createHash('md5').update(seed, 'utf8').digest()
    const octets = Array.from(digest.subarray(0, 6))

    // Unicast, locally administered
    octets[0] = (octets[0] & 0xfe) | 0x02

    return octets.map((byte) => byte.toString(16).padStart(2, '0')).join(':')
  }

  /**
   * Validates a MAC address format
   * @returns true if valid format, false otherwise
   */
  static validate (mac: string): boolean {
    return MacAddressGenerator.MAC_REGEX.test(mac)
  }

  /**
   * Normalizes a valid MAC address to lowercase
   * @throws Error if the address is not a valid MAC
   */
  static normalize (mac: string): MacAddress {
    if (!MacAddressGenerator.validate(mac)) {
      throw new Error(`Invalid MAC address: ${mac}`)
    }
    return mac.toLowerCase()
  }

  /**
   * Checks the locally administered bit of the first octet
   */
  static isLocallyAdministered (mac: string): boolean {
    if (!MacAddressGenerator.validate(mac)) {
      return false
    }
    return (parseInt(mac.substring(0, 2), 16) & 0x02) === 0x02
  }
}
