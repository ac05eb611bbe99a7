import { TopologyResolver } from '../src/resolver/TopologyResolver'
import { InternalNode, InternalTopology } from '../src/types/internal.types'
import { ExternalNode, ExternalTopology } from '../src/types/topology.types'

/**
 * Builds an ExternalNode with empty collections
 */
export function externalNode (name: string, overrides: Partial<ExternalNode> = {}): ExternalNode {
  return {
    name,
    role: 'host',
    sysctl: {},
    interfaces: [],
    vlans: [],
    tunnels: [],
    commands: [],
    ...overrides
  }
}

export function externalTopology (
  links: Array<[string, string]>,
  nodes: ExternalNode[],
  overrides: Partial<ExternalTopology> = {}
): ExternalTopology {
  return {
    meta: { id: 'lab1', name: 'Test lab' },
    defaults: { ipForwarding: false, sysctl: {} },
    links: links.map((endpoints) => ({ endpoints })),
    nodes,
    ...overrides
  }
}

export function resolveTopology (
  links: Array<[string, string]>,
  nodes: ExternalNode[],
  overrides: Partial<ExternalTopology> = {}
): InternalTopology {
  return new TopologyResolver().resolve(externalTopology(links, nodes, overrides))
}

export function nodeOf (topology: InternalTopology, name: string): InternalNode {
  const node = topology.nodes.get(name)
  if (!node) {
    throw new Error(`Node ${name} not found`)
  }
  return node
}

/** Two routers on one link */
export const TWO_ROUTERS_YAML = `
meta:
  id: lab1
  name: Two routers
nodes:
  - name: R1
    role: router
    interfaces:
      - ip: 10.0.1.1/24
  - name: R2
    role: router
    interfaces:
      - ip: 10.0.1.2/24
links:
  - endpoints: [R1, R2]
`
