/**
 * External topology model: the document a user writes, after structural
 * validation by the TopologyLoader. Property names are camelCase; the wire
 * names used in YAML are listed next to each field where they differ.
 */

// ============================================================================
// Enumerations
// ============================================================================

export const NODE_ROLES = ['router', 'switch', 'host'] as const
export type NodeRole = typeof NODE_ROLES[number]

export const ROUTING_ENGINES = ['bird', 'frr', 'none'] as const
export type RoutingEngine = typeof ROUTING_ENGINES[number]

export const TUNNEL_TYPES = ['ipip', 'gre', 'sit'] as const
export type TunnelType = typeof TUNNEL_TYPES[number]

export const FIREWALL_ACTIONS = ['accept', 'drop', 'reject'] as const
export type FirewallAction = typeof FIREWALL_ACTIONS[number]

export const FIREWALL_IMPLEMENTATIONS = ['nftables'] as const
export type FirewallImplementation = typeof FIREWALL_IMPLEMENTATIONS[number]

export const RIP_VERSIONS = [1, 2] as const
export type RipVersion = typeof RIP_VERSIONS[number]

export const PARAVIRT_PROVIDERS = ['default', 'legacy', 'minimal', 'hyperv', 'kvm', 'none'] as const
export type ParavirtProvider = typeof PARAVIRT_PROVIDERS[number]

export const VBOX_CHIPSETS = ['piix3', 'ich9'] as const
export type VBoxChipset = typeof VBOX_CHIPSETS[number]

/** Lowest and highest 802.1Q VLAN identifiers */
export const VLAN_ID_MIN = 1
export const VLAN_ID_MAX = 4094

/** Scalar values accepted in sysctl mappings */
export type SysctlValue = string | number | boolean

// ============================================================================
// Topology sections
// ============================================================================

export interface TopologyMeta {
  id: string
  name: string
  description?: string
}

/** VirtualBox VM settings (`defaults.vbox`), all optional on the wire */
export interface ExternalVBoxSettings {
  /** `paravirt_provider` */
  paravirtProvider?: ParavirtProvider
  chipset?: VBoxChipset
  ioapic?: boolean
  hpet?: boolean
}

export interface TopologyDefaults {
  /** `ip_forwarding` */
  ipForwarding: boolean
  sysctl: Record<string, SysctlValue>
  vbox?: ExternalVBoxSettings
}

export interface ExternalLink {
  endpoints: [string, string]
}

export interface ExternalInterface {
  /** Address in CIDR notation, e.g. 10.0.12.1/24 */
  ip?: string
  gateway?: string
  /** Pinned MAC address; derived from the topology when absent */
  mac?: string
  configured: boolean
}

export interface ExternalVlan {
  id: number
  /** Computed name of the parent interface, e.g. eth1 */
  parent: string
  ip?: string
  gateway?: string
}

export interface ExternalTunnel {
  name?: string
  type?: TunnelType
  local: string
  remote: string
  ip?: string
}

export interface ExternalBridge {
  name?: string
  stp?: boolean
  configured?: boolean
}

export interface ExternalOspfArea {
  id?: string
  interfaces: string[]
}

export interface ExternalOspf {
  enabled?: boolean
  areas: ExternalOspfArea[]
}

export interface ExternalRip {
  enabled?: boolean
  version?: RipVersion
  interfaces: string[]
}

export interface ExternalRouting {
  engine?: RoutingEngine
  /** `router_id` */
  routerId?: string
  /** Static routes written as `<destination> via <gateway>` */
  static: string[]
  ospf?: ExternalOspf
  rip?: ExternalRip
  configured?: boolean
}

export interface WireguardPeer {
  /** `public_key` */
  publicKey?: string
  /** `allowed_ips` */
  allowedIps?: string
  endpoint?: string
}

export interface WireguardSettings {
  /** `private_key` */
  privateKey?: string
  /** `listen_port` */
  listenPort?: number
  address?: string
  peers: WireguardPeer[]
}

export interface FirewallRule {
  action: FirewallAction
  src?: string
  dst?: string
  proto?: string
  dport?: number
}

export interface FirewallSettings {
  impl: FirewallImplementation
  rules: FirewallRule[]
}

export interface ServicesSettings {
  /** `http_server`: port of the lab HTTP server */
  httpServer?: number
  wireguard?: WireguardSettings
  firewall?: FirewallSettings
}

export interface ExternalNode {
  name: string
  role: NodeRole
  sysctl: Record<string, SysctlValue>
  interfaces: ExternalInterface[]
  vlans: ExternalVlan[]
  tunnels: ExternalTunnel[]
  bridge?: ExternalBridge
  routing?: ExternalRouting
  services?: ServicesSettings
  commands: string[]
}

export interface ExternalTopology {
  meta: TopologyMeta
  defaults: TopologyDefaults
  links: ExternalLink[]
  nodes: ExternalNode[]
}
