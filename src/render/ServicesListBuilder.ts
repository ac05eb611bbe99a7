import { InternalNode } from '../types/internal.types'

/** Path of the unit list, relative to the node's output directory */
export const SERVICES_LIST_PATH = 'services.list'

/**
 * Template that replaces the built-in list when a search path provides it.
 * Its directory is not a template set.
 */
export const SERVICES_TEMPLATE_DIR = 'services'
export const SERVICES_TEMPLATE_ID = `${SERVICES_TEMPLATE_DIR}/services.list`

/**
 * ServicesListBuilder lists the systemd units the guest agent must enable
 * (`+ unit`) or disable (`- unit`) for a node. It is the fallback used when
 * no `services/services.list.njk` template is found.
 *
 * @example
 * ServicesListBuilder.build(router)
 * // => '+ systemd-networkd\n+ bird\n'
 */
export class ServicesListBuilder {
  static entries (node: InternalNode): string[] {
    const entries: string[] = []

    const bridgeActive = node.bridge?.configured === true && node.role === 'switch'
    const hasNetworkd = node.interfaces.some((iface) => iface.configured) ||
      node.vlans.length > 0 ||
      node.tunnels.length > 0 ||
      bridgeActive
    if (hasNetworkd) {
      entries.push('+ systemd-networkd')
    }

    const routing = node.routing
    if (routing?.configured === true && (routing.engine === 'bird' || routing.engine === 'frr')) {
      entries.push(`+ ${routing.engine}`)
    }

    if (node.services?.firewall !== undefined) {
      entries.push('- iptables', '+ nftables')
    }

    // wg-quick cannot bring up an interface without its private key
    const privateKey = node.services?.wireguard?.privateKey
    if (privateKey !== undefined && privateKey !== '') {
      entries.push('+ wg-quick@wg0')
    }

    return entries
  }

  /**
   * @returns the file content, or undefined when the node needs no units
   */
  static build (node: InternalNode): string | undefined {
    const entries = ServicesListBuilder.entries(node)
    if (entries.length === 0) {
      return undefined
    }
    return `${entries.join('\n')}\n`
  }
}
