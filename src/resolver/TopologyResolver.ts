import { Debugger } from '@utils/debug'
import { parseStaticRoute } from '@utils/address'
import { FrozenMap, deepFreeze } from '@utils/freeze'
import { MacAddressGenerator } from '@network/MacAddressGenerator'
import {
  DuplicateInterfaceAssignmentError,
  DuplicateNodeError,
  UnknownInterfaceReferenceError,
  UnresolvedPeerError,
  VlanParentNotFoundError
} from '../types/errors.types'
import {
  DEFAULT_BRIDGE_NAME,
  DEFAULT_OSPF_AREA,
  DEFAULT_RIP_VERSION,
  DEFAULT_TUNNEL_NAME,
  DEFAULT_TUNNEL_TYPE,
  DEFAULT_VBOX_SETTINGS,
  INTERFACE_NAME_PREFIX,
  InterfaceRef,
  InternalBridge,
  InternalInterface,
  InternalLink,
  InternalNode,
  InternalRouting,
  InternalTopology,
  InternalTunnel,
  InternalVBoxSettings,
  InternalVlan,
  StaticRoute,
  interfaceToAdapterIndex,
  peerKey
} from '../types/internal.types'
import {
  ExternalNode,
  ExternalRouting,
  ExternalTopology,
  SysctlValue
} from '../types/topology.types'

/**
 * Interfaces bound to one node during the link walk
 */
interface NodeBindings {
  interfaces: InternalInterface[]
  /** Every interface-like name taken on the node (ethN, VLANs, tunnels, bridge) */
  names: Set<string>
}

/**
 * TopologyResolver turns a validated ExternalTopology into the immutable
 * InternalTopology used by the rendering pipeline.
 *
 * Resolution is pure and deterministic. It runs in two phases:
 * 1. A global link walk that numbers interfaces and binds peers.
 * 2. Per-node resolution of sysctl, VLANs, tunnels, bridge, routing and
 *    services. Nodes are independent of each other in this phase.
 *
 * Errors are fail-fast: each step relies on the previous one.
 *
 * @example
 * const resolver = new TopologyResolver()
 * const internal = resolver.resolve(loader.load(text))
 * internal.peers.get(peerKey('R1', 'eth1')) // => { node: 'R2', interface: 'eth1' }
 */
export class TopologyResolver {
  private debug: Debugger

  constructor () {
    this.debug = new Debugger('resolver')
  }

  /**
   * Resolves an external topology.
   * @throws DuplicateNodeError if two nodes share a name
   * @throws UnresolvedPeerError if a link names an undeclared node
   * @throws VlanParentNotFoundError if a VLAN parent is not a computed interface
   * @throws UnknownInterfaceReferenceError if OSPF/RIP lists an unknown interface
   * @throws DuplicateInterfaceAssignmentError if two interfaces share a name
   */
  resolve (topology: ExternalTopology): InternalTopology {
    this.debug.log(`Resolving topology ${topology.meta.id}`)

    const registry = this.buildRegistry(topology.nodes)
    const { bindings, links, peers } = this.walkLinks(topology, registry)

    const nodes = new Map<string, InternalNode>()
    for (const node of topology.nodes) {
      const bound = bindings.get(node.name) ?? { interfaces: [], names: new Set<string>() }
      nodes.set(node.name, this.resolveNode(node, bound, topology))
    }

    const resolved: InternalTopology = {
      id: topology.meta.id,
      name: topology.meta.name,
      description: topology.meta.description,
      vbox: this.resolveVBox(topology),
      nodes: new FrozenMap(nodes),
      links,
      peers: new FrozenMap(peers)
    }

    this.debug.log(`Resolved topology ${resolved.id}: ${nodes.size} nodes, ${links.length} links`)
    return deepFreeze(resolved)
  }

  private buildRegistry (nodes: readonly ExternalNode[]): Map<string, ExternalNode> {
    const registry = new Map<string, ExternalNode>()
    for (const node of nodes) {
      if (registry.has(node.name)) {
        throw new DuplicateNodeError(node.name)
      }
      registry.set(node.name, node)
    }
    return registry
  }

  /**
   * Walks links in declaration order. The Nth link touching a node becomes
   * that node's `eth<N>` and consumes its Nth declared interface entry.
   */
  private walkLinks (
    topology: ExternalTopology,
    registry: ReadonlyMap<string, ExternalNode>
  ): { bindings: Map<string, NodeBindings>, links: InternalLink[], peers: Map<string, InterfaceRef> } {
    const bindings = new Map<string, NodeBindings>()
    const links: InternalLink[] = []
    const peers = new Map<string, InterfaceRef>()
    const networkNames = new Set<string>()

    topology.links.forEach((link, index) => {
      const [nodeA, nodeB] = link.endpoints
      for (const endpoint of link.endpoints) {
        if (!registry.has(endpoint)) {
          throw new UnresolvedPeerError(endpoint, index)
        }
      }

      const a: InterfaceRef = { node: nodeA, interface: this.nextInterfaceName(bindings, nodeA) }
      const b: InterfaceRef = { node: nodeB, interface: this.nextInterfaceName(bindings, nodeB) }
      const networkName = this.uniqueNetworkName(topology.meta.id, nodeA, nodeB, networkNames)

      this.bindInterface(bindings, registry, topology.meta.id, a, b, networkName)
      this.bindInterface(bindings, registry, topology.meta.id, b, a, networkName)

      peers.set(peerKey(a.node, a.interface), b)
      peers.set(peerKey(b.node, b.interface), a)
      links.push({ index, a, b, networkName })

      this.debug.log(`Link ${index}: ${a.node}.${a.interface} <-> ${b.node}.${b.interface}`)
    })

    for (const [name, node] of registry) {
      const used = bindings.get(name)?.interfaces.length ?? 0
      if (node.interfaces.length > used) {
        this.debug.log('warn', `Node ${name} declares ${node.interfaces.length} interfaces but only ${used} links touch it`)
      }
    }

    return { bindings, links, peers }
  }

  private nextInterfaceName (bindings: ReadonlyMap<string, NodeBindings>, node: string): string {
    const count = bindings.get(node)?.interfaces.length ?? 0
    return `${INTERFACE_NAME_PREFIX}${count + 1}`
  }

  private bindInterface (
    bindings: Map<string, NodeBindings>,
    registry: ReadonlyMap<string, ExternalNode>,
    topologyId: string,
    self: InterfaceRef,
    peer: InterfaceRef,
    networkName: string
  ): void {
    let bound = bindings.get(self.node)
    if (!bound) {
      bound = { interfaces: [], names: new Set<string>() }
      bindings.set(self.node, bound)
    }
    if (bound.names.has(self.interface)) {
      throw new DuplicateInterfaceAssignmentError(self.node, self.interface)
    }

    const index = bound.interfaces.length + 1
    const entry = registry.get(self.node)?.interfaces[index - 1]
    const mac = entry?.mac !== undefined
      ? MacAddressGenerator.normalize(entry.mac)
      : MacAddressGenerator.generateFromSeed(`${topologyId}-${self.node}-${self.interface}`)

    bound.interfaces.push({
      name: self.interface,
      index,
      ip: entry?.ip,
      gateway: entry?.gateway,
      configured: entry?.configured ?? true,
      mac,
      peer,
      networkName,
      adapterIndex: interfaceToAdapterIndex(self.interface)
    })
    bound.names.add(self.interface)
  }

  /**
   * `<topologyId>_<a>_<b>` with node names sorted; parallel links between
   * the same pair get a numeric suffix.
   */
  private uniqueNetworkName (topologyId: string, nodeA: string, nodeB: string, taken: Set<string>): string {
    const [first, second] = [nodeA, nodeB].sort()
    const base = `${topologyId}_${first}_${second}`
    let name = base
    for (let n = 2; taken.has(name); n++) {
      name = `${base}_${n}`
    }
    taken.add(name)
    return name
  }

  private resolveNode (node: ExternalNode, bound: NodeBindings, topology: ExternalTopology): InternalNode {
    const names = new Set(bound.names)
    const interfaceNames = bound.interfaces.map((iface) => iface.name)

    const sysctl: Record<string, SysctlValue> = { ...topology.defaults.sysctl, ...node.sysctl }
    const vlans = this.resolveVlans(node, interfaceNames, names)
    const tunnels = this.resolveTunnels(node, names)
    const bridge = this.resolveBridge(node, interfaceNames, names)
    const routing = node.routing
      ? this.resolveRouting(node.name, node.routing, [...interfaceNames, ...vlans.map((v) => v.name)])
      : undefined

    if (bridge && node.role !== 'switch') {
      this.debug.log('warn', `Node ${node.name} has role ${node.role}; its bridge is kept but not rendered`)
    }

    return {
      name: node.name,
      role: node.role,
      interfaces: bound.interfaces,
      vlans,
      tunnels,
      bridge,
      routing,
      services: node.services ? structuredClone(node.services) : undefined,
      sysctl,
      ipForwarding: node.role === 'router' || topology.defaults.ipForwarding,
      commands: [...node.commands]
    }
  }

  private resolveVlans (node: ExternalNode, interfaceNames: readonly string[], names: Set<string>): InternalVlan[] {
    return node.vlans.map((vlan) => {
      if (!interfaceNames.includes(vlan.parent)) {
        throw new VlanParentNotFoundError(node.name, vlan.id, vlan.parent)
      }
      const name = `${vlan.parent}.${vlan.id}`
      this.claimName(node.name, name, names)
      return { id: vlan.id, parent: vlan.parent, name, ip: vlan.ip, gateway: vlan.gateway }
    })
  }

  private resolveTunnels (node: ExternalNode, names: Set<string>): InternalTunnel[] {
    return node.tunnels.map((tunnel) => {
      const name = tunnel.name ?? DEFAULT_TUNNEL_NAME
      this.claimName(node.name, name, names)
      return {
        name,
        type: tunnel.type ?? DEFAULT_TUNNEL_TYPE,
        local: tunnel.local,
        remote: tunnel.remote,
        ip: tunnel.ip
      }
    })
  }

  private resolveBridge (node: ExternalNode, interfaceNames: readonly string[], names: Set<string>): InternalBridge | undefined {
    if (!node.bridge) {
      return undefined
    }
    const name = node.bridge.name ?? DEFAULT_BRIDGE_NAME
    this.claimName(node.name, name, names)
    return {
      name,
      stp: node.bridge.stp ?? false,
      configured: node.bridge.configured ?? true,
      ports: [...interfaceNames]
    }
  }

  private resolveRouting (nodeName: string, routing: ExternalRouting, known: readonly string[]): InternalRouting {
    const staticRoutes: StaticRoute[] = []
    for (const route of routing.static) {
      const parsed = parseStaticRoute(route)
      if (parsed) {
        staticRoutes.push(parsed)
      } else {
        this.debug.log('warn', `Node ${nodeName}: skipping malformed static route '${route}'`)
      }
    }

    const ospf = routing.ospf
      ? {
          enabled: routing.ospf.enabled ?? false,
          areas: routing.ospf.areas.map((area) => ({
            id: area.id ?? DEFAULT_OSPF_AREA,
            interfaces: [...area.interfaces]
          }))
        }
      : undefined

    const rip = routing.rip
      ? {
          enabled: routing.rip.enabled ?? false,
          version: routing.rip.version ?? DEFAULT_RIP_VERSION,
          interfaces: [...routing.rip.interfaces]
        }
      : undefined

    for (const area of ospf?.areas ?? []) {
      this.checkInterfaceReferences(nodeName, area.interfaces, known, 'ospf')
    }
    if (rip) {
      this.checkInterfaceReferences(nodeName, rip.interfaces, known, 'rip')
    }

    return {
      engine: routing.engine,
      routerId: routing.routerId,
      staticRoutes,
      ospf,
      rip,
      configured: routing.configured ?? true
    }
  }

  private checkInterfaceReferences (
    nodeName: string,
    referenced: readonly string[],
    known: readonly string[],
    protocol: 'ospf' | 'rip'
  ): void {
    for (const name of referenced) {
      if (!known.includes(name)) {
        throw new UnknownInterfaceReferenceError(nodeName, name, protocol)
      }
    }
  }

  private claimName (nodeName: string, name: string, names: Set<string>): void {
    if (names.has(name)) {
      throw new DuplicateInterfaceAssignmentError(nodeName, name)
    }
    names.add(name)
  }

  private resolveVBox (topology: ExternalTopology): InternalVBoxSettings {
    const vbox = topology.defaults.vbox
    return {
      paravirtProvider: vbox?.paravirtProvider ?? DEFAULT_VBOX_SETTINGS.paravirtProvider,
      chipset: vbox?.chipset ?? DEFAULT_VBOX_SETTINGS.chipset,
      ioapic: vbox?.ioapic ?? DEFAULT_VBOX_SETTINGS.ioapic,
      hpet: vbox?.hpet ?? DEFAULT_VBOX_SETTINGS.hpet
    }
  }
}
