import { TEMPLATE_EXTENSION, TemplateScope } from '../types/render.types'

/** Directory consumed by systemd-networkd */
export const NETWORKD_DIR = 'etc/systemd/network'

/** Placeholders substituted with the entity name of per-entity templates */
export const PATH_PLACEHOLDERS = ['{iface}', '{vlan}', '{tunnel}', '{bridge}'] as const

interface PathRule {
  pattern: string
  scope: TemplateScope
}

/**
 * Numeric prefixes order systemd-networkd files: networkd applies them in
 * ascending lexical order, so a bridge must sort before its ports, a parent
 * interface before its VLANs, and all links before tunnels.
 *
 *   05/06 bridge, 07 bridge ports, 09 VLAN parents, 10 interfaces,
 *   11 VLANs, 20 routes, 25 tunnels
 */
const STEM_RULES: Readonly<Record<string, PathRule>> = {
  hostname: { pattern: 'etc/hostname', scope: 'node' },
  'sysctl.conf': { pattern: 'etc/sysctl.d/99-netloom.conf', scope: 'node' },
  'bridge.netdev': { pattern: `${NETWORKD_DIR}/05-{bridge}.netdev`, scope: 'bridge' },
  'bridge.network': { pattern: `${NETWORKD_DIR}/06-{bridge}.network`, scope: 'bridge' },
  'bridge-port.network': { pattern: `${NETWORKD_DIR}/07-{iface}-bridge.network`, scope: 'bridge-port' },
  'vlan-parent.network': { pattern: `${NETWORKD_DIR}/09-{iface}-vlan.network`, scope: 'vlan-parent' },
  'interface.link': { pattern: `${NETWORKD_DIR}/10-{iface}.link`, scope: 'interface' },
  'interface.network': { pattern: `${NETWORKD_DIR}/10-{iface}.network`, scope: 'interface' },
  'vlan.netdev': { pattern: `${NETWORKD_DIR}/11-{vlan}.netdev`, scope: 'vlan' },
  'vlan.network': { pattern: `${NETWORKD_DIR}/11-{vlan}.network`, scope: 'vlan' },
  'routes.network': { pattern: `${NETWORKD_DIR}/20-routes.network`, scope: 'routing' },
  'tunnel.netdev': { pattern: `${NETWORKD_DIR}/25-{tunnel}.netdev`, scope: 'tunnel' },
  'tunnel.network': { pattern: `${NETWORKD_DIR}/25-{tunnel}.network`, scope: 'tunnel' },
  'wg0.conf': { pattern: 'etc/wireguard/wg0.conf', scope: 'node' }
}

/** Routing daemon sets: every template belongs to the routing block */
const ROUTING_SET_DIRS: Readonly<Record<string, string>> = {
  bird: 'etc/bird',
  frr: 'etc/frr'
}

const NETWORKD_SUFFIXES = ['.network', '.netdev', '.link']

/**
 * OutputPathMapper maps a template identifier to the path of the artifact it
 * renders, relative to the node's output directory. It depends on the
 * template identity only, never on node data; per-entity paths carry a
 * placeholder filled in by `expand`.
 *
 * Template identifiers are `<set>/<stem>` where the stem is the template file
 * name without `.njk`, e.g. `networkd/interface.network`.
 *
 * @example
 * OutputPathMapper.mapPath('networkd/hostname')           // => 'etc/hostname'
 * OutputPathMapper.mapPath('networkd/vlan.netdev')        // => 'etc/systemd/network/11-{vlan}.netdev'
 * OutputPathMapper.expand('etc/systemd/network/11-{vlan}.netdev', 'eth1.100')
 * // => 'etc/systemd/network/11-eth1.100.netdev'
 */
export class OutputPathMapper {
  /**
   * Splits a template identifier into its set and stem. A bare stem has no set.
   */
  static parseTemplateId (templateId: string): { set?: string, stem: string } {
    const withoutExt = templateId.endsWith(TEMPLATE_EXTENSION)
      ? templateId.slice(0, -TEMPLATE_EXTENSION.length)
      : templateId
    const slash = withoutExt.lastIndexOf('/')
    if (slash === -1) {
      return { stem: withoutExt }
    }
    return { set: withoutExt.slice(0, slash), stem: withoutExt.slice(slash + 1) }
  }

  /**
   * @returns the output path pattern, or undefined when no rule matches
   */
  static mapPath (templateId: string): string | undefined {
    return OutputPathMapper.rule(templateId)?.pattern
  }

  /**
   * @returns the entity a template renders for, or undefined when unmapped
   */
  static scopeOf (templateId: string): TemplateScope | undefined {
    return OutputPathMapper.rule(templateId)?.scope
  }

  /**
   * Substitutes the entity name into a path pattern
   */
  static expand (pattern: string, entityName?: string): string {
    const placeholder = PATH_PLACEHOLDERS.find((p) => pattern.includes(p))
    if (placeholder === undefined) {
      return pattern
    }
    if (entityName === undefined) {
      throw new Error(`Path pattern ${pattern} needs an entity name for ${placeholder}`)
    }
    return pattern.replace(placeholder, entityName)
  }

  private static rule (templateId: string): PathRule | undefined {
    const { set, stem } = OutputPathMapper.parseTemplateId(templateId)

    const routingDir = set !== undefined ? ROUTING_SET_DIRS[set] : undefined
    if (routingDir !== undefined) {
      // bird keeps protocol snippets under conf.d and includes them from bird.conf
      if (set === 'bird' && stem !== 'bird.conf') {
        return { pattern: `${routingDir}/conf.d/${stem}`, scope: 'routing' }
      }
      return { pattern: `${routingDir}/${stem}`, scope: 'routing' }
    }

    const exact = STEM_RULES[stem]
    if (exact !== undefined) {
      return exact
    }
    // Generic stems render once per node and have no entity to fill a placeholder
    if (PATH_PLACEHOLDERS.some((placeholder) => stem.includes(placeholder))) {
      return undefined
    }
    if (NETWORKD_SUFFIXES.some((suffix) => stem.endsWith(suffix))) {
      return { pattern: `${NETWORKD_DIR}/${stem}`, scope: 'node' }
    }
    if (stem.endsWith('.conf')) {
      return { pattern: `etc/${stem}`, scope: 'node' }
    }
    return undefined
  }
}
