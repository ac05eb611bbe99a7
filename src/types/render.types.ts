/**
 * Types shared by the template selector, renderer, path mapper and generator.
 */

import { TemplateError } from './errors.types'
import {
  InterfaceRef,
  InternalBridge,
  InternalInterface,
  InternalNode,
  InternalTopology,
  InternalTunnel,
  InternalVlan,
  StaticRoute
} from './internal.types'

/** Template set rendered for every node unless another base is requested */
export const DEFAULT_BASE_SET = 'networkd'

/** Optional feature sets, in activation order after the base set */
export const FEATURE_SETS = ['bird', 'frr', 'nftables', 'wireguard'] as const
export type FeatureSet = typeof FEATURE_SETS[number]

/** Template set identifier: a directory name under a template search path */
export type TemplateSetId = string

/** Template file extension */
export const TEMPLATE_EXTENSION = '.njk'

/** Directory holding macros importable from every template set */
export const SHARED_TEMPLATE_DIR = '_shared'

/**
 * Logical entity a template is rendered for. Decides iteration and skipping.
 */
export type TemplateScope =
  | 'node'
  | 'interface'
  | 'vlan-parent'
  | 'vlan'
  | 'tunnel'
  | 'bridge'
  | 'bridge-port'
  | 'routing'

/**
 * Helper functions exposed to every template as `helpers`
 */
export interface TemplateHelpers {
  /** Address part of a CIDR string, `10.0.0.1/24` -> `10.0.0.1` */
  address: (cidr: string) => string
  /** Prefix length of a CIDR string, `10.0.0.1/24` -> `24` */
  prefixLength: (cidr: string) => number
  /** Peer of an interface on this node, or undefined */
  peerOf: (iface: string) => InterfaceRef | undefined
  /** VLANs on this node whose parent is the given interface */
  vlansOf: (iface: string) => readonly InternalVlan[]
  /**
   * Static routes whose gateway lies in the subnet of `cidr`. Empty when a
   * routing daemon (bird, frr) owns the routes or routing is unconfigured.
   */
  routesVia: (cidr?: string) => readonly StaticRoute[]
  /** Tunnels whose local endpoint is the address of `cidr` */
  tunnelsOn: (cidr?: string) => readonly InternalTunnel[]
  /** sysctl lines in output order, booleans written as 1/0 */
  sysctlEntries: () => ReadonlyArray<{ key: string, value: string }>
}

/**
 * Context a template is evaluated against. The per-entity fields are only set
 * for templates of the matching scope.
 */
export interface RenderContext {
  node: InternalNode
  topology: InternalTopology
  helpers: TemplateHelpers
  iface?: InternalInterface
  vlan?: InternalVlan
  tunnel?: InternalTunnel
  bridge?: InternalBridge
}

/** One rendered template instance */
export interface RenderedTemplate {
  templateId: string
  /** Path relative to the node's output directory */
  path: string
  content: string
}

export interface NodeRenderResult {
  rendered: RenderedTemplate[]
  errors: TemplateError[]
}

/** A generated file for one node */
export interface Artifact {
  path: string
  content: string
}

export interface NodeArtifacts {
  node: string
  templateSets: readonly TemplateSetId[]
  artifacts: Artifact[]
}

export interface GenerationResult {
  topologyId: string
  nodes: NodeArtifacts[]
  errors: TemplateError[]
  /** False when any template failed */
  ok: boolean
}
