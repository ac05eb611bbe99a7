/**
 * Config generator tests
 *
 * End-to-end runs from a topology document to per-node artifacts.
 */

import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import { ConfigGenerator, DEBUG_JSON_PATH } from '../src/core/ConfigGenerator'
import { BUNDLED_TEMPLATES_DIR, resolveGeneratorConfig } from '../src/config/GeneratorConfig'
import { ValidationError, VlanParentNotFoundError } from '../src/types/errors.types'
import { NodeArtifacts } from '../src/types/render.types'
import { TWO_ROUTERS_YAML, externalNode, nodeOf, resolveTopology } from './fixtures'

function artifactsOf (nodes: NodeArtifacts[], name: string): NodeArtifacts {
  const node = nodes.find((n) => n.node === name)
  if (!node) {
    throw new Error(`No artifacts for ${name}`)
  }
  return node
}

describe('ConfigGenerator', () => {
  const env = {}

  describe('generateFromDocument', () => {
    it('renders the two-router topology', () => {
      const generator = new ConfigGenerator(resolveGeneratorConfig({}, env))

      const result = generator.generateFromDocument(TWO_ROUTERS_YAML)

      expect(result.ok).toBe(true)
      expect(result.topologyId).toBe('lab1')
      expect(result.nodes.map((n) => n.node)).toEqual(['R1', 'R2'])

      const r1 = artifactsOf(result.nodes, 'R1')
      expect(r1.templateSets).toEqual(['networkd'])
      expect(r1.artifacts.map((a) => a.path)).toEqual([
        'etc/hostname',
        'etc/sysctl.d/99-netloom.conf',
        'etc/systemd/network/10-eth1.link',
        'etc/systemd/network/10-eth1.network',
        'services.list'
      ])
      expect(r1.artifacts[0].content).toBe('R1\n')
      expect(r1.artifacts[3].content).toContain('Address=10.0.1.1/24\n')
      expect(r1.artifacts[3].content).toContain('Description=Link to R2.eth1\n')
      expect(r1.artifacts[4].content).toBe('+ systemd-networkd\n')
    })

    it('rejects invalid documents before rendering', () => {
      const generator = new ConfigGenerator(resolveGeneratorConfig({}, env))

      expect(() => generator.generateFromDocument({ meta: { id: 'x', name: 'x' }, nodes: [] }))
        .toThrow(ValidationError)
    })
  })

  describe('generate', () => {
    it('adds a debug summary when asked to', () => {
      const generator = new ConfigGenerator({ emitDebugJson: true, templatesDir: BUNDLED_TEMPLATES_DIR })
      const topology = resolveTopology(
        [['R1', 'R2']],
        [
          externalNode('R1', { role: 'router', interfaces: [{ ip: '10.0.1.1/24', configured: true }] }),
          externalNode('R2', { role: 'router' })
        ]
      )

      const result = generator.generate(topology)
      const debugArtifact = artifactsOf(result.nodes, 'R1').artifacts.find((a) => a.path === DEBUG_JSON_PATH)

      expect(debugArtifact?.content.endsWith('}\n')).toBe(true)
      expect(JSON.parse(debugArtifact?.content ?? '')).toEqual({
        name: 'R1',
        role: 'router',
        interfaces: [{
          name: 'eth1',
          ip: '10.0.1.1/24',
          mac: nodeOf(topology, 'R1').interfaces[0].mac,
          peer: 'R2.eth1'
        }]
      })
    })

    it('omits the services list when disabled or empty', () => {
      const topology = resolveTopology([], [externalNode('H1')])

      const withList = new ConfigGenerator(resolveGeneratorConfig({}, env)).generate(topology)
      expect(artifactsOf(withList.nodes, 'H1').artifacts.map((a) => a.path)).toEqual(['etc/hostname'])

      const tunnelTopology = resolveTopology([], [
        externalNode('H1', { tunnels: [{ local: '10.0.0.1', remote: '10.0.0.2' }] })
      ])
      const disabled = new ConfigGenerator(resolveGeneratorConfig({ emitServicesList: false }, env)).generate(tunnelTopology)
      expect(artifactsOf(disabled.nodes, 'H1').artifacts.map((a) => a.path)).not.toContain('services.list')
    })

    it('is deterministic', () => {
      const first = new ConfigGenerator(resolveGeneratorConfig({}, env)).generateFromDocument(TWO_ROUTERS_YAML)
      const second = new ConfigGenerator(resolveGeneratorConfig({}, env)).generateFromDocument(TWO_ROUTERS_YAML)

      expect(second).toEqual(first)
    })

    it('propagates resolver errors', () => {
      const generator = new ConfigGenerator(resolveGeneratorConfig({}, env))
      const document = `
meta: { id: x, name: x }
nodes:
  - name: R1
    vlans:
      - id: 10
        parent: eth1
links: []
`

      expect(() => generator.generateFromDocument(document)).toThrow(VlanParentNotFoundError)
      expect(() => generator.generateFromDocument(document))
        .toThrow("VLAN 10 on node 'R1' references unknown parent interface 'eth1'")
    })
  })

  describe('custom template directories', () => {
    let tmpDir: string

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'netloom-generator-'))
    })

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true })
    })

    function writeTemplate (set: string, file: string, content: string): void {
      fs.mkdirSync(path.join(tmpDir, set), { recursive: true })
      fs.writeFileSync(path.join(tmpDir, set, file), content)
    }

    it('lets later template sets overwrite the same path', () => {
      writeTemplate('wireguard', 'hostname.njk', 'wg-{{ node.name }}\n')
      const generator = new ConfigGenerator(resolveGeneratorConfig({ searchPaths: [tmpDir] }, env))
      const topology = resolveTopology([], [
        externalNode('H1', { services: { wireguard: { peers: [] } } })
      ])

      const result = generator.generate(topology)
      const h1 = artifactsOf(result.nodes, 'H1')

      expect(h1.templateSets).toEqual(['networkd', 'wireguard'])
      expect(h1.artifacts.find((a) => a.path === 'etc/hostname')?.content).toBe('wg-H1\n')
      expect(h1.artifacts.filter((a) => a.path === 'etc/hostname')).toHaveLength(1)
    })

    it('collects template errors per node and marks the run as failed', () => {
      writeTemplate('networkd', 'hostname.njk', '{{ node.missing }}\n')
      const generator = new ConfigGenerator(resolveGeneratorConfig({ searchPaths: [tmpDir] }, env))

      const result = generator.generateFromDocument(TWO_ROUTERS_YAML)

      expect(result.ok).toBe(false)
      expect(result.errors.map((e) => [e.nodeName, e.templateId])).toEqual([
        ['R1', 'networkd/hostname'],
        ['R2', 'networkd/hostname']
      ])
      expect(artifactsOf(result.nodes, 'R2').artifacts.map((a) => a.path)).toEqual([
        'etc/sysctl.d/99-netloom.conf',
        'etc/systemd/network/10-eth1.link',
        'etc/systemd/network/10-eth1.network',
        'services.list'
      ])
    })

    it('ignores a per-node template whose file name carries a placeholder', () => {
      writeTemplate('networkd', '30-{iface}-extra.network.njk', '[Match]\nName={{ node.name }}\n')
      const generator = new ConfigGenerator(resolveGeneratorConfig({ searchPaths: [tmpDir] }, env))

      const result = generator.generateFromDocument(TWO_ROUTERS_YAML)

      expect(result.ok).toBe(true)
      expect(result.nodes.map((n) => n.node)).toEqual(['R1', 'R2'])
      expect(artifactsOf(result.nodes, 'R2').artifacts.map((a) => a.path)).toEqual([
        'etc/hostname',
        'etc/sysctl.d/99-netloom.conf',
        'etc/systemd/network/10-eth1.link',
        'etc/systemd/network/10-eth1.network',
        'services.list'
      ])
    })

    it('keeps every node when a template tries to remove one from the topology', () => {
      writeTemplate('networkd', 'hostname.njk', '{% set _ = topology.nodes.delete("R2") %}{{ node.name }}\n')
      const generator = new ConfigGenerator(resolveGeneratorConfig({ searchPaths: [tmpDir] }, env))

      const result = generator.generateFromDocument(TWO_ROUTERS_YAML)

      expect(result.ok).toBe(false)
      expect(result.nodes.map((n) => n.node)).toEqual(['R1', 'R2'])
      expect(result.errors.map((e) => [e.nodeName, e.templateId])).toEqual([
        ['R1', 'networkd/hostname'],
        ['R2', 'networkd/hostname']
      ])
    })

    it('renders the services list from a template when one is provided', () => {
      writeTemplate('services', 'services.list.njk', '+ systemd-networkd\n+ lab-agent@{{ node.name }}\n')
      const generator = new ConfigGenerator(resolveGeneratorConfig({ searchPaths: [tmpDir] }, env))

      const result = generator.generateFromDocument(TWO_ROUTERS_YAML)

      expect(result.ok).toBe(true)
      expect(generator.listTemplateSets()).toEqual(['bird', 'frr', 'networkd', 'nftables', 'wireguard'])
      expect(artifactsOf(result.nodes, 'R2').artifacts.find((a) => a.path === 'services.list')?.content)
        .toBe('+ systemd-networkd\n+ lab-agent@R2\n')
    })

    it('reports a failing services list template', () => {
      writeTemplate('services', 'services.list.njk', '{{ node.missing }}\n')
      const generator = new ConfigGenerator(resolveGeneratorConfig({ searchPaths: [tmpDir] }, env))

      const result = generator.generateFromDocument(TWO_ROUTERS_YAML)

      expect(result.ok).toBe(false)
      expect(result.errors.map((e) => [e.nodeName, e.templateId])).toEqual([
        ['R1', 'services/services.list'],
        ['R2', 'services/services.list']
      ])
      expect(artifactsOf(result.nodes, 'R1').artifacts.map((a) => a.path)).not.toContain('services.list')
    })

    it('uses a requested base set', () => {
      writeTemplate('minimal', 'hostname.njk', '{{ node.name }}.lab\n')
      const generator = new ConfigGenerator(resolveGeneratorConfig({ templatesDir: tmpDir, baseSet: 'minimal' }, env))

      expect(generator.listTemplateSets()).toEqual(['minimal'])

      const result = generator.generate(resolveTopology([], [externalNode('H1')]))
      expect(artifactsOf(result.nodes, 'H1').artifacts).toEqual([{ path: 'etc/hostname', content: 'H1.lab\n' }])
    })
  })
})
