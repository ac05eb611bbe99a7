import * as YAML from 'yaml'
import { Debugger } from '@utils/debug'
import { isCidr, isIPv4, parseStaticRoute } from '@utils/address'
import { MacAddressGenerator } from '@network/MacAddressGenerator'
import { DocumentReader, Mapping, isMapping, joinPath } from './DocumentReader'
import {
  FieldViolation,
  SchemaError,
  SchemaErrorCode,
  ValidationError
} from '../types/errors.types'
import {
  ExternalBridge,
  ExternalInterface,
  ExternalLink,
  ExternalNode,
  ExternalRouting,
  ExternalTopology,
  ExternalTunnel,
  ExternalVBoxSettings,
  ExternalVlan,
  FIREWALL_ACTIONS,
  FIREWALL_IMPLEMENTATIONS,
  FirewallRule,
  NODE_ROLES,
  PARAVIRT_PROVIDERS,
  RIP_VERSIONS,
  ROUTING_ENGINES,
  ServicesSettings,
  TUNNEL_TYPES,
  TopologyDefaults,
  TopologyMeta,
  VBOX_CHIPSETS,
  VLAN_ID_MAX,
  VLAN_ID_MIN,
  WireguardPeer
} from '../types/topology.types'

/** Valid node identifier: alphanumeric with underscores and dashes */
const NODE_NAME_REGEX = /^[a-zA-Z0-9_-]+$/

const PORT_MIN = 1
const PORT_MAX = 65535

/** Keys understood at each level; anything else is reported on the warn channel */
const KNOWN_KEYS: Record<string, readonly string[]> = {
  root: ['meta', 'defaults', 'links', 'nodes'],
  node: ['name', 'role', 'sysctl', 'interfaces', 'vlans', 'tunnels', 'bridge', 'routing', 'services', 'commands']
}

export type LoadResult =
  | { ok: true, topology: ExternalTopology }
  | { ok: false, violations: FieldViolation[] }

/**
 * TopologyLoader parses a topology document and validates its structure.
 *
 * Structural violations are collected exhaustively and reported together in
 * one ValidationError; only documents that cannot be read as a topology at
 * all (bad YAML, wrong root or section kinds) fail early with a SchemaError.
 *
 * @example
 * const loader = new TopologyLoader()
 * const topology = loader.load(fs.readFileSync('lab.yaml', 'utf8'))
 *
 * const result = loader.validate(YAML.parse(text))
 * if (!result.ok) {
 *   result.violations.forEach((v) => console.error(`${v.path}: ${v.message}`))
 * }
 */
export class TopologyLoader {
  private debug: Debugger

  constructor () {
    this.debug = new Debugger('loader')
  }

  /**
   * Loads a topology from YAML text or an already parsed document.
   * @throws SchemaError if the document is malformed
   * @throws ValidationError with every violation found
   */
  load (document: unknown): ExternalTopology {
    const parsed = typeof document === 'string' ? this.parse(document) : document
    const result = this.validate(parsed)

    if (!result.ok) {
      const error = new ValidationError(result.violations)
      this.debug.log('error', error.message)
      throw error
    }

    this.debug.log(
      `Loaded topology ${result.topology.meta.id}: ${result.topology.nodes.length} nodes, ${result.topology.links.length} links`
    )
    return result.topology
  }

  /**
   * Parses YAML text into an untyped document.
   * @throws SchemaError on YAML syntax errors
   */
  parse (text: string): unknown {
    try {
      return YAML.parse(text)
    } catch (error) {
      if (error instanceof YAML.YAMLParseError) {
        throw new SchemaError(SchemaErrorCode.YAML_SYNTAX, `YAML syntax error: ${error.message}`, {
          linePos: error.linePos
        })
      }
      throw error
    }
  }

  /**
   * Validates a parsed document.
   * @throws SchemaError if the root or a top-level section has the wrong kind
   */
  validate (document: unknown): LoadResult {
    if (!isMapping(document)) {
      throw new SchemaError(SchemaErrorCode.NOT_A_MAPPING, 'Topology document must be a mapping')
    }
    this.checkSections(document)
    this.warnUnknownKeys(document, KNOWN_KEYS.root, '')

    const reader = new DocumentReader()

    const meta = this.readMeta(reader, document)
    const defaults = this.readDefaults(reader, document)
    const nodes = this.readNodes(reader, document)
    const links = this.readLinks(reader, document, new Set(nodes.map((n) => n.name)))

    if (!reader.valid) {
      return { ok: false, violations: reader.violations }
    }
    return { ok: true, topology: { meta, defaults, links, nodes } }
  }

  private checkSections (document: Mapping): void {
    const sections: Array<[string, 'mapping' | 'sequence']> = [
      ['meta', 'mapping'],
      ['defaults', 'mapping'],
      ['links', 'sequence'],
      ['nodes', 'sequence']
    ]
    for (const [key, kind] of sections) {
      const value = document[key]
      if (value === undefined || value === null) {
        continue
      }
      const matches = kind === 'mapping' ? isMapping(value) : Array.isArray(value)
      if (!matches) {
        throw new SchemaError(SchemaErrorCode.INVALID_SECTION, `Top-level section '${key}' must be a ${kind}`, {
          section: key
        })
      }
    }
  }

  private warnUnknownKeys (entry: Mapping, known: readonly string[], path: string): void {
    for (const key of Object.keys(entry)) {
      if (!known.includes(key)) {
        this.debug.log('warn', `Ignoring unknown key ${joinPath(path, key)}`)
      }
    }
  }

  private readMeta (reader: DocumentReader, document: Mapping): TopologyMeta {
    const meta = reader.mapping(document, 'meta', '')
    if (!meta) {
      reader.report('meta', 'is required')
      return { id: '', name: '' }
    }
    return {
      id: reader.requiredString(meta, 'id', 'meta'),
      name: reader.requiredString(meta, 'name', 'meta'),
      description: reader.string(meta, 'description', 'meta')
    }
  }

  private readDefaults (reader: DocumentReader, document: Mapping): TopologyDefaults {
    const defaults = reader.mapping(document, 'defaults', '')
    if (!defaults) {
      return { ipForwarding: false, sysctl: {} }
    }

    let vbox: ExternalVBoxSettings | undefined
    const vboxEntry = reader.mapping(defaults, 'vbox', 'defaults')
    if (vboxEntry) {
      const path = 'defaults.vbox'
      vbox = {
        paravirtProvider: reader.oneOf(vboxEntry, 'paravirt_provider', path, PARAVIRT_PROVIDERS),
        chipset: reader.oneOf(vboxEntry, 'chipset', path, VBOX_CHIPSETS),
        ioapic: reader.boolean(vboxEntry, 'ioapic', path),
        hpet: reader.boolean(vboxEntry, 'hpet', path)
      }
    }

    return {
      ipForwarding: reader.boolean(defaults, 'ip_forwarding', 'defaults') ?? false,
      sysctl: reader.scalars(defaults, 'sysctl', 'defaults'),
      vbox
    }
  }

  private readNodes (reader: DocumentReader, document: Mapping): ExternalNode[] {
    if (document.nodes === undefined || document.nodes === null) {
      reader.report('nodes', 'is required')
      return []
    }

    const nodes: ExternalNode[] = []
    const firstSeen = new Map<string, string>()

    for (const { entry, path } of reader.mappings(document, 'nodes', '')) {
      const node = this.readNode(reader, entry, path)

      if (node.name !== '') {
        const previous = firstSeen.get(node.name)
        if (previous !== undefined) {
          reader.report(joinPath(path, 'name'), `duplicate node name '${node.name}' (first declared at ${previous})`)
        } else {
          firstSeen.set(node.name, path)
        }
      }
      nodes.push(node)
    }
    return nodes
  }

  private readNode (reader: DocumentReader, entry: Mapping, path: string): ExternalNode {
    this.warnUnknownKeys(entry, KNOWN_KEYS.node, path)

    const name = reader.requiredString(entry, 'name', path)
    if (name !== '' && !NODE_NAME_REGEX.test(name)) {
      reader.report(joinPath(path, 'name'), `must contain only letters, digits, '_' or '-', got '${name}'`)
    }

    const bridgeEntry = reader.mapping(entry, 'bridge', path)
    const routingEntry = reader.mapping(entry, 'routing', path)
    const servicesEntry = reader.mapping(entry, 'services', path)

    return {
      name,
      role: reader.oneOf(entry, 'role', path, NODE_ROLES) ?? 'host',
      sysctl: reader.scalars(entry, 'sysctl', path),
      interfaces: reader.mappings(entry, 'interfaces', path).map((item) => this.readInterface(reader, item.entry, item.path)),
      vlans: reader.mappings(entry, 'vlans', path).map((item) => this.readVlan(reader, item.entry, item.path)),
      tunnels: reader.mappings(entry, 'tunnels', path).map((item) => this.readTunnel(reader, item.entry, item.path)),
      bridge: bridgeEntry ? this.readBridge(reader, bridgeEntry, joinPath(path, 'bridge')) : undefined,
      routing: routingEntry ? this.readRouting(reader, routingEntry, joinPath(path, 'routing')) : undefined,
      services: servicesEntry ? this.readServices(reader, servicesEntry, joinPath(path, 'services')) : undefined,
      commands: reader.strings(entry, 'commands', path)
    }
  }

  private readInterface (reader: DocumentReader, entry: Mapping, path: string): ExternalInterface {
    return {
      ip: reader.formatted(entry, 'ip', path, isCidr, 'an IPv4 CIDR address'),
      gateway: reader.formatted(entry, 'gateway', path, isIPv4, 'an IPv4 address'),
      mac: reader.formatted(entry, 'mac', path, (v) => MacAddressGenerator.validate(v), 'a MAC address'),
      configured: reader.boolean(entry, 'configured', path) ?? true
    }
  }

  private readVlan (reader: DocumentReader, entry: Mapping, path: string): ExternalVlan {
    if (entry.id === undefined || entry.id === null) {
      reader.report(joinPath(path, 'id'), 'is required')
    }
    return {
      id: reader.integer(entry, 'id', path, VLAN_ID_MIN, VLAN_ID_MAX) ?? 0,
      parent: reader.requiredString(entry, 'parent', path),
      ip: reader.formatted(entry, 'ip', path, isCidr, 'an IPv4 CIDR address'),
      gateway: reader.formatted(entry, 'gateway', path, isIPv4, 'an IPv4 address')
    }
  }

  private readTunnel (reader: DocumentReader, entry: Mapping, path: string): ExternalTunnel {
    const local = reader.requiredString(entry, 'local', path)
    const remote = reader.requiredString(entry, 'remote', path)
    for (const [key, value] of [['local', local], ['remote', remote]]) {
      if (value !== '' && !isIPv4(value)) {
        reader.report(joinPath(path, key), `must be an IPv4 address, got '${value}'`)
      }
    }
    return {
      name: reader.string(entry, 'name', path),
      type: reader.oneOf(entry, 'type', path, TUNNEL_TYPES),
      local,
      remote,
      ip: reader.formatted(entry, 'ip', path, isCidr, 'an IPv4 CIDR address')
    }
  }

  private readBridge (reader: DocumentReader, entry: Mapping, path: string): ExternalBridge {
    return {
      name: reader.string(entry, 'name', path),
      stp: reader.boolean(entry, 'stp', path),
      configured: reader.boolean(entry, 'configured', path)
    }
  }

  private readRouting (reader: DocumentReader, entry: Mapping, path: string): ExternalRouting {
    const staticRoutes = reader.strings(entry, 'static', path)
    staticRoutes.forEach((route, index) => {
      const parsed = parseStaticRoute(route)
      const routePath = joinPath(joinPath(path, 'static'), index)
      if (!parsed) {
        reader.report(routePath, `must have the form '<destination> via <gateway>', got '${route}'`)
        return
      }
      if (!isCidr(parsed.destination)) {
        reader.report(routePath, `destination must be an IPv4 CIDR address or 'default', got '${parsed.destination}'`)
      }
      if (!isIPv4(parsed.gateway)) {
        reader.report(routePath, `gateway must be an IPv4 address, got '${parsed.gateway}'`)
      }
    })

    const routing: ExternalRouting = {
      engine: reader.oneOf(entry, 'engine', path, ROUTING_ENGINES),
      routerId: reader.formatted(entry, 'router_id', path, isIPv4, 'a dotted-quad router id'),
      static: staticRoutes,
      configured: reader.boolean(entry, 'configured', path)
    }

    const ospf = reader.mapping(entry, 'ospf', path)
    if (ospf) {
      const ospfPath = joinPath(path, 'ospf')
      routing.ospf = {
        enabled: reader.boolean(ospf, 'enabled', ospfPath),
        areas: reader.mappings(ospf, 'areas', ospfPath).map((area) => ({
          id: reader.formatted(area.entry, 'id', area.path, isIPv4, 'a dotted-quad area id'),
          interfaces: reader.strings(area.entry, 'interfaces', area.path)
        }))
      }
    }

    const rip = reader.mapping(entry, 'rip', path)
    if (rip) {
      const ripPath = joinPath(path, 'rip')
      routing.rip = {
        enabled: reader.boolean(rip, 'enabled', ripPath),
        version: reader.oneOf(rip, 'version', ripPath, RIP_VERSIONS),
        interfaces: reader.strings(rip, 'interfaces', ripPath)
      }
    }

    return routing
  }

  private readServices (reader: DocumentReader, entry: Mapping, path: string): ServicesSettings {
    const services: ServicesSettings = {
      httpServer: reader.integer(entry, 'http_server', path, PORT_MIN, PORT_MAX)
    }

    const wireguard = reader.mapping(entry, 'wireguard', path)
    if (wireguard) {
      const wgPath = joinPath(path, 'wireguard')
      services.wireguard = {
        privateKey: reader.string(wireguard, 'private_key', wgPath),
        listenPort: reader.integer(wireguard, 'listen_port', wgPath, PORT_MIN, PORT_MAX),
        address: reader.formatted(wireguard, 'address', wgPath, isCidr, 'an IPv4 CIDR address'),
        peers: reader.mappings(wireguard, 'peers', wgPath).map((peer): WireguardPeer => ({
          publicKey: reader.string(peer.entry, 'public_key', peer.path),
          allowedIps: reader.string(peer.entry, 'allowed_ips', peer.path),
          endpoint: reader.string(peer.entry, 'endpoint', peer.path)
        }))
      }
    }

    const firewall = reader.mapping(entry, 'firewall', path)
    if (firewall) {
      const fwPath = joinPath(path, 'firewall')
      services.firewall = {
        impl: reader.oneOf(firewall, 'impl', fwPath, FIREWALL_IMPLEMENTATIONS) ?? 'nftables',
        rules: reader.mappings(firewall, 'rules', fwPath).map((rule) => this.readFirewallRule(reader, rule.entry, rule.path))
      }
    }

    return services
  }

  private readFirewallRule (reader: DocumentReader, entry: Mapping, path: string): FirewallRule {
    if (entry.action === undefined || entry.action === null) {
      reader.report(joinPath(path, 'action'), 'is required')
    }
    return {
      action: reader.oneOf(entry, 'action', path, FIREWALL_ACTIONS) ?? 'drop',
      src: reader.string(entry, 'src', path),
      dst: reader.string(entry, 'dst', path),
      proto: reader.string(entry, 'proto', path),
      dport: reader.integer(entry, 'dport', path, PORT_MIN, PORT_MAX)
    }
  }

  private readLinks (reader: DocumentReader, document: Mapping, declared: ReadonlySet<string>): ExternalLink[] {
    if (document.links === undefined || document.links === null) {
      reader.report('links', 'is required')
      return []
    }

    const links: ExternalLink[] = []
    for (const { entry, path } of reader.mappings(document, 'links', '')) {
      const endpointsPath = joinPath(path, 'endpoints')
      const endpoints = reader.strings(entry, 'endpoints', path)

      if (endpoints.length !== 2) {
        reader.report(endpointsPath, `must list exactly 2 node names, got ${endpoints.length}`)
        continue
      }
      const [a, b] = endpoints
      if (a === b) {
        reader.report(endpointsPath, `must name two distinct nodes, got '${a}' twice`)
        continue
      }
      endpoints.forEach((endpoint, index) => {
        if (!declared.has(endpoint)) {
          reader.report(joinPath(endpointsPath, index), `references undeclared node '${endpoint}'`)
        }
      })
      links.push({ endpoints: [a, b] })
    }
    return links
  }
}
