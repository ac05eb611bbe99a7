/**
 * Internal topology model produced by the TopologyResolver.
 *
 * The model is immutable: every object is frozen once resolution completes.
 * Interfaces never hold their peer object; peers are referenced by
 * `(node, interface)` name pairs and looked up through `InternalTopology.peers`.
 */

import {
  FirewallSettings,
  NodeRole,
  ParavirtProvider,
  RipVersion,
  RoutingEngine,
  ServicesSettings,
  SysctlValue,
  TunnelType,
  VBoxChipset,
  WireguardSettings
} from './topology.types'

/** Prefix of computed physical interface names */
export const INTERFACE_NAME_PREFIX = 'eth'

export const DEFAULT_TUNNEL_NAME = 'tun0'
export const DEFAULT_TUNNEL_TYPE: TunnelType = 'ipip'
export const DEFAULT_BRIDGE_NAME = 'br0'
export const DEFAULT_OSPF_AREA = '0.0.0.0'
export const DEFAULT_RIP_VERSION: RipVersion = 2

/** Non-owning reference to an interface of a node */
export interface InterfaceRef {
  readonly node: string
  readonly interface: string
}

export interface InternalVBoxSettings {
  readonly paravirtProvider: ParavirtProvider
  readonly chipset: VBoxChipset
  readonly ioapic: boolean
  readonly hpet: boolean
}

export const DEFAULT_VBOX_SETTINGS: InternalVBoxSettings = {
  paravirtProvider: 'kvm',
  chipset: 'ich9',
  ioapic: true,
  hpet: true
}

export interface InternalInterface {
  /** Computed name, `eth<index>` */
  readonly name: string
  /** 1-based position in link-arrival order */
  readonly index: number
  readonly ip?: string
  readonly gateway?: string
  readonly configured: boolean
  readonly mac: string
  readonly peer: InterfaceRef
  /** Hypervisor internal network shared by both link endpoints */
  readonly networkName: string
  /** Hypervisor NIC slot (slot 1 is reserved for management) */
  readonly adapterIndex: number
}

export interface InternalVlan {
  readonly id: number
  readonly parent: string
  /** `<parent>.<id>` */
  readonly name: string
  readonly ip?: string
  readonly gateway?: string
}

export interface InternalTunnel {
  readonly name: string
  readonly type: TunnelType
  readonly local: string
  readonly remote: string
  readonly ip?: string
}

export interface InternalBridge {
  readonly name: string
  readonly stp: boolean
  readonly configured: boolean
  /** Interfaces enslaved to the bridge */
  readonly ports: readonly string[]
}

export interface StaticRoute {
  readonly destination: string
  readonly gateway: string
}

export interface InternalOspfArea {
  readonly id: string
  readonly interfaces: readonly string[]
}

export interface InternalOspf {
  readonly enabled: boolean
  readonly areas: readonly InternalOspfArea[]
}

export interface InternalRip {
  readonly enabled: boolean
  readonly version: RipVersion
  readonly interfaces: readonly string[]
}

export interface InternalRouting {
  readonly engine?: RoutingEngine
  readonly routerId?: string
  readonly staticRoutes: readonly StaticRoute[]
  readonly ospf?: InternalOspf
  readonly rip?: InternalRip
  readonly configured: boolean
}

export type InternalServices = Readonly<ServicesSettings>
export type InternalFirewall = Readonly<FirewallSettings>
export type InternalWireguard = Readonly<WireguardSettings>

export interface InternalNode {
  readonly name: string
  readonly role: NodeRole
  readonly interfaces: readonly InternalInterface[]
  readonly vlans: readonly InternalVlan[]
  readonly tunnels: readonly InternalTunnel[]
  readonly bridge?: InternalBridge
  readonly routing?: InternalRouting
  readonly services?: InternalServices
  /** Topology defaults overlaid with the node's own entries */
  readonly sysctl: Readonly<Record<string, SysctlValue>>
  readonly ipForwarding: boolean
  readonly commands: readonly string[]
}

export interface InternalLink {
  /** Position of the link in the topology's link list */
  readonly index: number
  readonly a: InterfaceRef
  readonly b: InterfaceRef
  readonly networkName: string
}

export interface InternalTopology {
  readonly id: string
  readonly name: string
  readonly description?: string
  readonly vbox: InternalVBoxSettings
  readonly nodes: ReadonlyMap<string, InternalNode>
  readonly links: readonly InternalLink[]
  /** Peer lookup keyed by `peerKey(node, interface)` */
  readonly peers: ReadonlyMap<string, InterfaceRef>
}

/**
 * Key used in `InternalTopology.peers`
 */
export function peerKey (node: string, iface: string): string {
  return `${node}/${iface}`
}

/**
 * Converts a computed interface name into its hypervisor NIC slot.
 * NIC slot 1 carries the management network, so `eth1` maps to slot 2.
 */
export function interfaceToAdapterIndex (ifname: string): number {
  const match = /^eth(\d+)$/.exec(ifname)
  if (!match) {
    throw new Error(`Only ethN interfaces map to hypervisor NICs: ${ifname}`)
  }
  return Number(match[1]) + 1
}
