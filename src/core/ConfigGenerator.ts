import { Debugger } from '@utils/debug'
import { GeneratorConfig, GeneratorOptions, resolveGeneratorConfig } from '../config/GeneratorConfig'
import { TopologyLoader } from '../schema/TopologyLoader'
import { TopologyResolver } from '../resolver/TopologyResolver'
import { TemplateSelector } from '../render/TemplateSelector'
import { TemplateRenderer } from '../render/TemplateRenderer'
import { SERVICES_LIST_PATH, ServicesListBuilder } from '../render/ServicesListBuilder'
import { TemplateError } from '../types/errors.types'
import { InternalNode, InternalTopology } from '../types/internal.types'
import {
  Artifact,
  GenerationResult,
  NodeArtifacts,
  RenderedTemplate,
  TemplateSetId
} from '../types/render.types'

/** Path of the optional per-node debug summary */
export const DEBUG_JSON_PATH = '_node.json'

/**
 * ConfigGenerator drives one generation run: load, resolve, then select,
 * render and map templates for every node.
 *
 * The generator and the services it owns are stateless between calls; build
 * one per invocation. Nothing is written to disk: the result holds in-memory
 * artifacts for an ArtifactWriter.
 *
 * Template failures are collected per (node, template) and reported in
 * `GenerationResult.errors`; the other nodes and templates are still rendered.
 *
 * @example
 * const generator = new ConfigGenerator({ emitDebugJson: true })
 * const result = generator.generateFromDocument(fs.readFileSync('lab.yaml', 'utf8'))
 * if (!result.ok) {
 *   result.errors.forEach((e) => console.error(e.message))
 * }
 * await new FileSystemArtifactWriter('./work').write(result)
 */
export class ConfigGenerator {
  readonly config: GeneratorConfig
  private readonly loader: TopologyLoader
  private readonly resolver: TopologyResolver
  private readonly selector: TemplateSelector
  private readonly renderer: TemplateRenderer
  private debug: Debugger

  constructor (options: GeneratorOptions | GeneratorConfig = {}) {
    this.config = isResolvedConfig(options) ? options : resolveGeneratorConfig(options)
    this.loader = new TopologyLoader()
    this.resolver = new TopologyResolver()
    this.selector = new TemplateSelector()
    this.renderer = new TemplateRenderer(this.config.templatePaths)
    this.debug = new Debugger('generator')
  }

  /**
   * Loads, resolves and renders a topology document.
   * @throws SchemaError, ValidationError or a TopologyReferenceError before
   *   anything is rendered
   */
  generateFromDocument (document: unknown): GenerationResult {
    const external = this.loader.load(document)
    return this.generate(this.resolver.resolve(external))
  }

  /**
   * Renders every node of a resolved topology.
   */
  generate (topology: InternalTopology): GenerationResult {
    this.debug.log(`Generating configs for ${topology.id} (base set ${this.config.baseSet})`)

    const nodes: NodeArtifacts[] = []
    const errors: TemplateError[] = []

    for (const node of topology.nodes.values()) {
      const { artifacts, templateSets, nodeErrors } = this.generateNode(node, topology)
      nodes.push({ node: node.name, templateSets, artifacts })
      errors.push(...nodeErrors)
    }

    if (errors.length > 0) {
      this.debug.log('error', `${errors.length} template(s) failed for topology ${topology.id}`)
    }

    return { topologyId: topology.id, nodes, errors, ok: errors.length === 0 }
  }

  /**
   * Template sets found on the configured search paths
   */
  listTemplateSets (): TemplateSetId[] {
    return this.renderer.listTemplateSets()
  }

  private generateNode (
    node: InternalNode,
    topology: InternalTopology
  ): { artifacts: Artifact[], templateSets: readonly TemplateSetId[], nodeErrors: TemplateError[] } {
    const templateSets = this.selector.select(node, this.config.baseSet)
    const { rendered, errors } = this.renderer.render(node, topology, templateSets)
    const artifacts = this.collectArtifacts(node, rendered)

    if (this.config.emitServicesList) {
      const override = this.renderer.renderServicesList(node, topology)
      if (override !== undefined) {
        override.rendered.forEach((item) => artifacts.set(item.path, { path: item.path, content: item.content }))
        errors.push(...override.errors)
      } else {
        const services = ServicesListBuilder.build(node)
        if (services !== undefined) {
          artifacts.set(SERVICES_LIST_PATH, { path: SERVICES_LIST_PATH, content: services })
        }
      }
    }

    if (this.config.emitDebugJson) {
      artifacts.set(DEBUG_JSON_PATH, { path: DEBUG_JSON_PATH, content: debugSummary(node) })
    }

    const sorted = [...artifacts.values()].sort((a, b) => compareStrings(a.path, b.path))
    this.debug.log(`${node.name}: ${sorted.length} artifacts from sets ${templateSets.join(', ')}`)

    return { artifacts: sorted, templateSets, nodeErrors: errors }
  }

  /**
   * Keys rendered templates by output path. Later sets overwrite earlier ones.
   */
  private collectArtifacts (node: InternalNode, rendered: readonly RenderedTemplate[]): Map<string, Artifact> {
    const byPath = new Map<string, Artifact>()
    for (const item of rendered) {
      if (byPath.has(item.path)) {
        this.debug.log('warn', `${node.name}: ${item.templateId} overwrites ${item.path}`)
      }
      byPath.set(item.path, { path: item.path, content: item.content })
    }
    return byPath
  }
}

function isResolvedConfig (options: GeneratorOptions | GeneratorConfig): options is GeneratorConfig {
  return 'templatePaths' in options
}

/** Code-unit order, independent of locale */
function compareStrings (a: string, b: string): number {
  if (a === b) {
    return 0
  }
  return a < b ? -1 : 1
}

function debugSummary (node: InternalNode): string {
  const summary = {
    name: node.name,
    role: node.role,
    interfaces: node.interfaces.map((iface) => ({
      name: iface.name,
      ip: iface.ip,
      gateway: iface.gateway,
      mac: iface.mac,
      peer: `${iface.peer.node}.${iface.peer.interface}`
    }))
  }
  return `${JSON.stringify(summary, null, 2)}\n`
}
