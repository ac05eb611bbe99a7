import { InternalNode } from '../types/internal.types'
import { DEFAULT_BASE_SET, FeatureSet, TemplateSetId } from '../types/render.types'

/**
 * One row of the activation table. Rows are evaluated independently and in
 * order; the order is also the overwrite precedence (later wins).
 */
interface ActivationRule {
  set: FeatureSet
  when: (node: InternalNode) => boolean
}

const ACTIVATION_RULES: readonly ActivationRule[] = [
  { set: 'bird', when: (node) => node.routing?.engine === 'bird' },
  { set: 'frr', when: (node) => node.routing?.engine === 'frr' },
  { set: 'nftables', when: (node) => node.services?.firewall !== undefined },
  { set: 'wireguard', when: (node) => node.services?.wireguard !== undefined }
]

/**
 * TemplateSelector decides which template sets apply to a node.
 *
 * The base set always applies, followed by the routing engine set, the
 * firewall set and the VPN set. Whether an individual entity (a routing block
 * with `configured: false`, say) produces output is decided by the renderer.
 */
export class TemplateSelector {
  select (node: InternalNode, requestedBaseSet: TemplateSetId = DEFAULT_BASE_SET): readonly TemplateSetId[] {
    const sets: TemplateSetId[] = [requestedBaseSet]
    for (const rule of ACTIVATION_RULES) {
      if (rule.when(node) && !sets.includes(rule.set)) {
        sets.push(rule.set)
      }
    }
    return sets
  }
}
