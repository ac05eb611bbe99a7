import * as fs from 'fs'
import * as path from 'path'
import { Environment, FileSystemLoader } from 'nunjucks'
import { Debugger } from '@utils/debug'
import { isInSubnet, splitCidr } from '@utils/address'
import { OutputPathMapper } from './OutputPathMapper'
import { SERVICES_LIST_PATH, SERVICES_TEMPLATE_DIR, SERVICES_TEMPLATE_ID } from './ServicesListBuilder'
import { TemplateError } from '../types/errors.types'
import {
  InternalNode,
  InternalTopology,
  StaticRoute,
  peerKey
} from '../types/internal.types'
import {
  NodeRenderResult,
  RenderContext,
  SHARED_TEMPLATE_DIR,
  TEMPLATE_EXTENSION,
  TemplateHelpers,
  TemplateScope,
  TemplateSetId
} from '../types/render.types'

/**
 * One evaluation of a template: the entity bindings added to the context and
 * the name substituted into the output path.
 */
interface RenderInstance {
  bindings: Pick<RenderContext, 'iface' | 'vlan' | 'tunnel' | 'bridge'>
  entityName?: string
}

/**
 * TemplateRenderer evaluates the templates of the activated sets for one node.
 *
 * Templates are Nunjucks files stored as `<searchPath>/<set>/<stem>.njk`.
 * The first search path holding a template wins, and every template can
 * `{% import "_shared/macros.njk" as m %}`. Output of undefined values raises
 * an error instead of rendering an empty string.
 *
 * Each template is rendered once per logical entity of its scope (see
 * OutputPathMapper.scopeOf). Entities with `configured: false` are skipped, as
 * is blank output. A failing template is reported as a TemplateError and does
 * not stop the other templates.
 *
 * @example
 * const renderer = new TemplateRenderer(['/usr/share/netloom/templates'])
 * const { rendered, errors } = renderer.render(node, topology, ['networkd', 'bird'])
 */
export class TemplateRenderer {
  private debug: Debugger
  private env: Environment

  constructor (private readonly searchPaths: readonly string[]) {
    this.debug = new Debugger('renderer')
    this.env = new Environment(new FileSystemLoader([...searchPaths]), {
      autoescape: false,
      throwOnUndefined: true,
      trimBlocks: true,
      lstripBlocks: true
    })
  }

  /**
   * Renders every template of the given sets, in set order.
   */
  render (node: InternalNode, topology: InternalTopology, activatedSets: readonly TemplateSetId[]): NodeRenderResult {
    const result: NodeRenderResult = { rendered: [], errors: [] }
    const helpers = this.createHelpers(node, topology)

    for (const set of activatedSets) {
      const templates = this.listTemplates(set)
      if (templates.length === 0) {
        this.debug.log('warn', `Template set '${set}' not found on any search path`)
        continue
      }
      for (const templateId of templates) {
        this.renderTemplate(templateId, { node, topology, helpers }, result)
      }
    }

    return result
  }

  /**
   * Renders the `services/services.list` template for a node.
   * @returns undefined when no search path provides the template
   */
  renderServicesList (node: InternalNode, topology: InternalTopology): NodeRenderResult | undefined {
    const file = `${SERVICES_TEMPLATE_ID}${TEMPLATE_EXTENSION}`
    if (!this.searchPaths.some((searchPath) => fs.existsSync(path.join(searchPath, file)))) {
      return undefined
    }
    const result: NodeRenderResult = { rendered: [], errors: [] }
    const context: RenderContext = { node, topology, helpers: this.createHelpers(node, topology) }
    this.renderInstance(SERVICES_TEMPLATE_ID, SERVICES_LIST_PATH, context, undefined, result)
    return result
  }

  /**
   * Template set directories available on the search paths, sorted.
   * Directories starting with `_` hold shared files and are not sets, nor is
   * the services list directory.
   */
  listTemplateSets (): TemplateSetId[] {
    const sets = new Set<string>()
    for (const searchPath of this.searchPaths) {
      if (!fs.existsSync(searchPath)) {
        continue
      }
      for (const entry of fs.readdirSync(searchPath, { withFileTypes: true })) {
        if (entry.isDirectory() && !entry.name.startsWith('_') && entry.name !== SERVICES_TEMPLATE_DIR) {
          sets.add(entry.name)
        }
      }
    }
    return [...sets].sort()
  }

  /**
   * Template identifiers (`<set>/<stem>`) of a set, sorted.
   */
  listTemplates (set: TemplateSetId): string[] {
    if (set.startsWith('_') || set === SHARED_TEMPLATE_DIR) {
      return []
    }
    const stems = new Set<string>()
    for (const searchPath of this.searchPaths) {
      const setDir = path.join(searchPath, set)
      if (!fs.existsSync(setDir)) {
        continue
      }
      for (const file of fs.readdirSync(setDir)) {
        if (file.endsWith(TEMPLATE_EXTENSION)) {
          stems.add(file.slice(0, -TEMPLATE_EXTENSION.length))
        }
      }
    }
    return [...stems].sort().map((stem) => `${set}/${stem}`)
  }

  private renderTemplate (templateId: string, base: RenderContext, result: NodeRenderResult): void {
    const pattern = OutputPathMapper.mapPath(templateId)
    const scope = OutputPathMapper.scopeOf(templateId)
    if (pattern === undefined || scope === undefined) {
      this.debug.log('warn', `No output path for template ${templateId}, skipping`)
      return
    }

    for (const instance of this.instancesFor(scope, base.node)) {
      this.renderInstance(templateId, pattern, { ...base, ...instance.bindings }, instance.entityName, result)
    }
  }

  /**
   * Renders one template instance into `result`. Failures, including a path
   * that cannot be expanded, become TemplateErrors.
   */
  private renderInstance (
    templateId: string,
    pattern: string,
    context: RenderContext,
    entityName: string | undefined,
    result: NodeRenderResult
  ): void {
    let content: string
    let outputPath: string
    try {
      outputPath = OutputPathMapper.expand(pattern, entityName)
      content = this.env.render(`${templateId}${TEMPLATE_EXTENSION}`, context)
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      const templateError = new TemplateError(context.node.name, templateId, message, entityName)
      this.debug.log('error', templateError.message)
      result.errors.push(templateError)
      return
    }

    if (content.trim() === '') {
      return
    }
    result.rendered.push({ templateId, path: outputPath, content: normalizeContent(content) })
  }

  /**
   * Entities a template of the given scope renders for. Unconfigured
   * entities produce no instance.
   */
  private instancesFor (scope: TemplateScope, node: InternalNode): RenderInstance[] {
    switch (scope) {
      case 'node':
        return [{ bindings: {} }]
      case 'interface':
        return node.interfaces
          .filter((iface) => iface.configured)
          .map((iface) => ({ bindings: { iface }, entityName: iface.name }))
      case 'vlan-parent':
        return node.interfaces
          .filter((iface) => iface.configured && node.vlans.some((vlan) => vlan.parent === iface.name))
          .map((iface) => ({ bindings: { iface }, entityName: iface.name }))
      case 'vlan':
        return node.vlans.map((vlan) => ({ bindings: { vlan }, entityName: vlan.name }))
      case 'tunnel':
        return node.tunnels.map((tunnel) => ({ bindings: { tunnel }, entityName: tunnel.name }))
      case 'bridge':
      case 'bridge-port': {
        const bridge = node.bridge
        if (!bridge || !bridge.configured || node.role !== 'switch') {
          return []
        }
        if (scope === 'bridge') {
          return [{ bindings: { bridge }, entityName: bridge.name }]
        }
        return node.interfaces
          .filter((iface) => iface.configured && bridge.ports.includes(iface.name))
          .map((iface) => ({ bindings: { iface, bridge }, entityName: iface.name }))
      }
      case 'routing':
        return node.routing?.configured === true ? [{ bindings: {} }] : []
    }
  }

  private createHelpers (node: InternalNode, topology: InternalTopology): TemplateHelpers {
    const kernelRoutes = kernelStaticRoutes(node)
    return {
      address: (cidr) => splitCidr(cidr).address,
      prefixLength: (cidr) => splitCidr(cidr).prefixLength,
      peerOf: (iface) => topology.peers.get(peerKey(node.name, iface)),
      vlansOf: (iface) => node.vlans.filter((vlan) => vlan.parent === iface),
      routesVia: (cidr) => cidr === undefined
        ? []
        : kernelRoutes.filter((route) => isInSubnet(route.gateway, cidr)),
      tunnelsOn: (cidr) => cidr === undefined
        ? []
        : node.tunnels.filter((tunnel) => tunnel.local === splitCidr(cidr).address),
      sysctlEntries: () => sysctlEntries(node)
    }
  }
}

/**
 * Static routes installed by systemd-networkd: those of a configured routing
 * block without a routing daemon.
 */
function kernelStaticRoutes (node: InternalNode): readonly StaticRoute[] {
  const routing = node.routing
  if (!routing || !routing.configured || routing.engine === 'bird' || routing.engine === 'frr') {
    return []
  }
  return routing.staticRoutes
}

const IP_FORWARD_KEY = 'net.ipv4.ip_forward'

function sysctlEntries (node: InternalNode): Array<{ key: string, value: string }> {
  const entries: Array<{ key: string, value: string }> = []
  if (node.ipForwarding && !(IP_FORWARD_KEY in node.sysctl)) {
    entries.push({ key: IP_FORWARD_KEY, value: '1' })
  }
  for (const [key, value] of Object.entries(node.sysctl)) {
    entries.push({ key, value: typeof value === 'boolean' ? (value ? '1' : '0') : String(value) })
  }
  return entries
}

/**
 * Strips trailing whitespace and ends the file with exactly one newline
 */
function normalizeContent (content: string): string {
  return `${content.replace(/\s+$/, '')}\n`
}
