/**
 * Topology resolver tests
 *
 * Covers interface numbering, peer binding, per-node defaults and the
 * reference errors raised while resolving.
 */

import { TopologyResolver } from '../src/resolver/TopologyResolver'
import { MacAddressGenerator } from '../src/network/MacAddressGenerator'
import { FrozenMap } from '../src/utils/freeze'
import {
  DuplicateInterfaceAssignmentError,
  DuplicateNodeError,
  ReferenceErrorCode,
  UnknownInterfaceReferenceError,
  UnresolvedPeerError,
  VlanParentNotFoundError
} from '../src/types/errors.types'
import { peerKey } from '../src/types/internal.types'
import { externalNode, externalTopology, nodeOf, resolveTopology } from './fixtures'

describe('TopologyResolver', () => {
  describe('interface numbering', () => {
    const topology = resolveTopology(
      [['A', 'B'], ['B', 'C'], ['A', 'D']],
      ['A', 'B', 'C', 'D'].map((name) => externalNode(name))
    )

    it('numbers interfaces by link arrival per node', () => {
      expect(topology.peers.get(peerKey('A', 'eth1'))).toEqual({ node: 'B', interface: 'eth1' })
      expect(topology.peers.get(peerKey('B', 'eth1'))).toEqual({ node: 'A', interface: 'eth1' })
      expect(topology.peers.get(peerKey('B', 'eth2'))).toEqual({ node: 'C', interface: 'eth1' })
      expect(topology.peers.get(peerKey('A', 'eth2'))).toEqual({ node: 'D', interface: 'eth1' })
      expect(topology.peers.get(peerKey('D', 'eth1'))).toEqual({ node: 'A', interface: 'eth2' })
    })

    it('records links in declaration order', () => {
      expect(topology.links).toEqual([
        { index: 0, a: { node: 'A', interface: 'eth1' }, b: { node: 'B', interface: 'eth1' }, networkName: 'lab1_A_B' },
        { index: 1, a: { node: 'B', interface: 'eth2' }, b: { node: 'C', interface: 'eth1' }, networkName: 'lab1_B_C' },
        { index: 2, a: { node: 'A', interface: 'eth2' }, b: { node: 'D', interface: 'eth1' }, networkName: 'lab1_A_D' }
      ])
    })

    it('derives index and adapter slot from the interface name', () => {
      const a = nodeOf(topology, 'A')
      expect(a.interfaces.map((i) => [i.name, i.index, i.adapterIndex])).toEqual([
        ['eth1', 1, 2],
        ['eth2', 2, 3]
      ])
      expect(nodeOf(topology, 'C').interfaces.map((i) => i.networkName)).toEqual(['lab1_B_C'])
    })
  })

  it('suffixes network names of parallel links', () => {
    const topology = resolveTopology(
      [['R2', 'R1'], ['R1', 'R2']],
      [externalNode('R1'), externalNode('R2')]
    )

    expect(topology.links.map((l) => l.networkName)).toEqual(['lab1_R1_R2', 'lab1_R1_R2_2'])
  })

  it('binds declared interface entries by position', () => {
    const topology = resolveTopology(
      [['A', 'B'], ['A', 'C']],
      [
        externalNode('A', {
          interfaces: [
            { ip: '10.0.1.1/24', configured: true },
            { ip: '10.0.2.1/24', gateway: '10.0.2.254', configured: true, mac: 'AA:BB:CC:00:00:01' }
          ]
        }),
        externalNode('B'),
        externalNode('C')
      ]
    )

    const [eth1, eth2] = nodeOf(topology, 'A').interfaces
    expect(eth1.ip).toBe('10.0.1.1/24')
    expect(eth2).toMatchObject({
      name: 'eth2',
      ip: '10.0.2.1/24',
      gateway: '10.0.2.254',
      mac: 'aa:bb:cc:00:00:01',
      configured: true
    })
    expect(nodeOf(topology, 'B').interfaces[0].ip).toBeUndefined()
  })

  it('derives MAC addresses from topology, node and interface', () => {
    const build = (): string[] => {
      const topology = resolveTopology([['R1', 'R2']], [externalNode('R1'), externalNode('R2')])
      return [...topology.nodes.values()].flatMap((n) => n.interfaces.map((i) => i.mac))
    }

    const macs = build()
    expect(build()).toEqual(macs)
    expect(macs).toEqual([
      MacAddressGenerator.generateFromSeed('lab1-R1-eth1'),
      MacAddressGenerator.generateFromSeed('lab1-R2-eth1')
    ])
  })

  it('keeps unconfigured interfaces in the peer graph', () => {
    const topology = resolveTopology(
      [['R1', 'R2']],
      [externalNode('R1', { interfaces: [{ configured: false }] }), externalNode('R2')]
    )

    expect(nodeOf(topology, 'R1').interfaces[0]).toMatchObject({ name: 'eth1', configured: false })
    expect(nodeOf(topology, 'R2').interfaces[0].peer).toEqual({ node: 'R1', interface: 'eth1' })
  })

  it('overlays node sysctl entries on the defaults', () => {
    const topology = resolveTopology(
      [],
      [externalNode('H1', { sysctl: { y: 3, z: 4 } })],
      { defaults: { ipForwarding: false, sysctl: { x: 1, y: 2 } } }
    )

    expect(nodeOf(topology, 'H1').sysctl).toEqual({ x: 1, y: 3, z: 4 })
  })

  it('enables IP forwarding for routers and when the defaults ask for it', () => {
    const plain = resolveTopology([], [externalNode('R1', { role: 'router' }), externalNode('H1')])
    expect(nodeOf(plain, 'R1').ipForwarding).toBe(true)
    expect(nodeOf(plain, 'H1').ipForwarding).toBe(false)

    const forwarding = resolveTopology([], [externalNode('H1')], {
      defaults: { ipForwarding: true, sysctl: {} }
    })
    expect(nodeOf(forwarding, 'H1').ipForwarding).toBe(true)
  })

  it('applies defaults to tunnels, bridges, routing and hypervisor settings', () => {
    const topology = resolveTopology(
      [['S1', 'H1']],
      [
        externalNode('S1', {
          role: 'switch',
          bridge: {},
          tunnels: [{ local: '10.0.0.1', remote: '10.0.0.2' }],
          routing: {
            static: ['default via 10.0.0.254'],
            ospf: { areas: [{ interfaces: ['eth1'] }] },
            rip: { interfaces: ['eth1'] }
          }
        }),
        externalNode('H1')
      ],
      { defaults: { ipForwarding: false, sysctl: {}, vbox: { chipset: 'piix3' } } }
    )

    const s1 = nodeOf(topology, 'S1')
    expect(s1.tunnels).toEqual([{ name: 'tun0', type: 'ipip', local: '10.0.0.1', remote: '10.0.0.2' }])
    expect(s1.bridge).toEqual({ name: 'br0', stp: false, configured: true, ports: ['eth1'] })
    expect(s1.routing).toEqual({
      staticRoutes: [{ destination: '0.0.0.0/0', gateway: '10.0.0.254' }],
      ospf: { enabled: false, areas: [{ id: '0.0.0.0', interfaces: ['eth1'] }] },
      rip: { enabled: false, version: 2, interfaces: ['eth1'] },
      configured: true
    })
    expect(topology.vbox).toEqual({ paravirtProvider: 'kvm', chipset: 'piix3', ioapic: true, hpet: true })
  })

  it('accepts routing protocol references to VLAN interfaces', () => {
    const topology = resolveTopology(
      [['R1', 'R2']],
      [
        externalNode('R1', {
          vlans: [{ id: 100, parent: 'eth1' }],
          routing: { static: [], ospf: { enabled: true, areas: [{ interfaces: ['eth1.100'] }] } }
        }),
        externalNode('R2')
      ]
    )

    expect(nodeOf(topology, 'R1').vlans).toEqual([{ id: 100, parent: 'eth1', name: 'eth1.100' }])
  })

  it('freezes the resolved model', () => {
    const topology = resolveTopology([['R1', 'R2']], [externalNode('R1'), externalNode('R2')])
    const r1 = nodeOf(topology, 'R1')

    expect(Object.isFrozen(topology)).toBe(true)
    expect(Object.isFrozen(r1)).toBe(true)
    expect(Object.isFrozen(r1.interfaces)).toBe(true)
    expect(Object.isFrozen(r1.interfaces[0].peer)).toBe(true)
    expect(topology.nodes).toBeInstanceOf(FrozenMap)
    expect(topology.peers).toBeInstanceOf(FrozenMap)
  })

  describe('reference errors', () => {
    const resolver = new TopologyResolver()

    it('rejects links to undeclared nodes', () => {
      const topology = externalTopology([['R1', 'R9']], [externalNode('R1')])

      expect(() => resolver.resolve(topology)).toThrow(UnresolvedPeerError)
      expect(() => resolver.resolve(topology)).toThrow("Link 0 references undeclared node 'R9'")
      try {
        resolver.resolve(topology)
      } catch (error) {
        expect(error).toMatchObject({ nodeName: 'R9', code: ReferenceErrorCode.UNRESOLVED_PEER })
      }
    })

    it('rejects VLANs on unknown parents', () => {
      const topology = externalTopology(
        [['R1', 'R2']],
        [externalNode('R1', { vlans: [{ id: 10, parent: 'eth9' }] }), externalNode('R2')]
      )

      expect(() => resolver.resolve(topology)).toThrow(VlanParentNotFoundError)
      expect(() => resolver.resolve(topology))
        .toThrow("VLAN 10 on node 'R1' references unknown parent interface 'eth9'")
    })

    it('rejects OSPF and RIP references to unknown interfaces', () => {
      const ospf = externalTopology(
        [['R1', 'R2']],
        [externalNode('R1', { routing: { static: [], ospf: { areas: [{ interfaces: ['eth5'] }] } } }), externalNode('R2')]
      )
      expect(() => resolver.resolve(ospf)).toThrow(UnknownInterfaceReferenceError)
      expect(() => resolver.resolve(ospf)).toThrow("OSPF on node 'R1' references unknown interface 'eth5'")

      const rip = externalTopology(
        [['R1', 'R2']],
        [externalNode('R1', { routing: { static: [], rip: { interfaces: ['eth2'] } } }), externalNode('R2')]
      )
      expect(() => resolver.resolve(rip)).toThrow("RIP on node 'R1' references unknown interface 'eth2'")
    })

    it('rejects duplicate node names', () => {
      const topology = externalTopology([], [externalNode('R1'), externalNode('R1')])

      expect(() => resolver.resolve(topology)).toThrow(DuplicateNodeError)
      expect(() => resolver.resolve(topology)).toThrow("Node 'R1' is declared more than once")
    })

    it('rejects interface name clashes', () => {
      const tunnels = externalTopology([], [
        externalNode('R1', {
          tunnels: [
            { local: '10.0.0.1', remote: '10.0.0.2' },
            { local: '10.0.0.1', remote: '10.0.0.3' }
          ]
        })
      ])
      expect(() => resolver.resolve(tunnels)).toThrow(DuplicateInterfaceAssignmentError)
      expect(() => resolver.resolve(tunnels)).toThrow("Interface 'tun0' is assigned more than once on node 'R1'")

      const tunnelNamedEth = externalTopology([['R1', 'R2']], [
        externalNode('R1', { tunnels: [{ name: 'eth1', local: '10.0.0.1', remote: '10.0.0.2' }] }),
        externalNode('R2')
      ])
      expect(() => resolver.resolve(tunnelNamedEth)).toThrow(DuplicateInterfaceAssignmentError)
    })
  })
})
