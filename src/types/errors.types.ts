/**
 * Error taxonomy for loading, resolving and rendering topologies.
 *
 * - SchemaError: the document cannot be read as a topology at all
 * - ValidationError: field-level violations, reported together
 * - TopologyReferenceError family: dangling or conflicting references found
 *   while resolving (fail-fast)
 * - TemplateError: one template failed for one node (collected, not thrown)
 */

// ============================================================================
// Error Codes
// ============================================================================

export enum SchemaErrorCode {
  YAML_SYNTAX = 'YAML_SYNTAX',
  NOT_A_MAPPING = 'NOT_A_MAPPING',
  INVALID_SECTION = 'INVALID_SECTION'
}

export enum ReferenceErrorCode {
  UNRESOLVED_PEER = 'UNRESOLVED_PEER',
  DUPLICATE_NODE = 'DUPLICATE_NODE',
  DUPLICATE_INTERFACE_ASSIGNMENT = 'DUPLICATE_INTERFACE_ASSIGNMENT',
  VLAN_PARENT_NOT_FOUND = 'VLAN_PARENT_NOT_FOUND',
  UNKNOWN_INTERFACE_REFERENCE = 'UNKNOWN_INTERFACE_REFERENCE'
}

// ============================================================================
// Loader errors
// ============================================================================

/**
 * Raised when the document is malformed before typed parsing is possible:
 * YAML syntax errors, a root that is not a mapping, or a top-level section of
 * the wrong kind.
 */
export class SchemaError extends Error {
  public readonly code: SchemaErrorCode
  public readonly context?: Record<string, unknown>

  constructor (code: SchemaErrorCode, message: string, context?: Record<string, unknown>) {
    super(message)
    this.name = 'SchemaError'
    this.code = code
    this.context = context

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SchemaError)
    }
  }
}

/**
 * A single field-level violation. `path` uses dotted/indexed notation,
 * e.g. `nodes[2].vlans[0].id`.
 */
export interface FieldViolation {
  path: string
  message: string
}

/**
 * Raised with every structural violation found in a document.
 */
export class ValidationError extends Error {
  public readonly violations: readonly FieldViolation[]

  constructor (violations: FieldViolation[]) {
    super(ValidationError.format(violations))
    this.name = 'ValidationError'
    this.violations = violations

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ValidationError)
    }
  }

  private static format (violations: FieldViolation[]): string {
    const lines = violations.map((v) => `  - ${v.path}: ${v.message}`)
    const noun = violations.length === 1 ? 'violation' : 'violations'
    return `Topology validation failed with ${violations.length} ${noun}:\n${lines.join('\n')}`
  }
}

// ============================================================================
// Resolver errors
// ============================================================================

/**
 * Base class for dangling or conflicting cross-references discovered while
 * resolving a topology.
 */
export class TopologyReferenceError extends Error {
  public readonly code: ReferenceErrorCode
  public readonly nodeName: string
  public readonly context?: Record<string, unknown>

  constructor (code: ReferenceErrorCode, nodeName: string, message: string, context?: Record<string, unknown>) {
    super(message)
    this.name = 'TopologyReferenceError'
    this.code = code
    this.nodeName = nodeName
    this.context = context

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }
  }
}

/** A link endpoint names a node that is not declared */
export class UnresolvedPeerError extends TopologyReferenceError {
  constructor (nodeName: string, linkIndex: number) {
    super(
      ReferenceErrorCode.UNRESOLVED_PEER,
      nodeName,
      `Link ${linkIndex} references undeclared node '${nodeName}'`,
      { linkIndex }
    )
    this.name = 'UnresolvedPeerError'
  }
}

/** Two nodes share a name */
export class DuplicateNodeError extends TopologyReferenceError {
  constructor (nodeName: string) {
    super(ReferenceErrorCode.DUPLICATE_NODE, nodeName, `Node '${nodeName}' is declared more than once`)
    this.name = 'DuplicateNodeError'
  }
}

/** Two interfaces, VLANs or tunnels on one node resolve to the same name */
export class DuplicateInterfaceAssignmentError extends TopologyReferenceError {
  constructor (nodeName: string, interfaceName: string) {
    super(
      ReferenceErrorCode.DUPLICATE_INTERFACE_ASSIGNMENT,
      nodeName,
      `Interface '${interfaceName}' is assigned more than once on node '${nodeName}'`,
      { interfaceName }
    )
    this.name = 'DuplicateInterfaceAssignmentError'
  }
}

/** A VLAN's parent is not one of the node's computed interfaces */
export class VlanParentNotFoundError extends TopologyReferenceError {
  constructor (nodeName: string, vlanId: number, parent: string) {
    super(
      ReferenceErrorCode.VLAN_PARENT_NOT_FOUND,
      nodeName,
      `VLAN ${vlanId} on node '${nodeName}' references unknown parent interface '${parent}'`,
      { vlanId, parent }
    )
    this.name = 'VlanParentNotFoundError'
  }
}

/** A routing protocol lists an interface the node does not have */
export class UnknownInterfaceReferenceError extends TopologyReferenceError {
  constructor (nodeName: string, interfaceName: string, protocol: 'ospf' | 'rip') {
    super(
      ReferenceErrorCode.UNKNOWN_INTERFACE_REFERENCE,
      nodeName,
      `${protocol.toUpperCase()} on node '${nodeName}' references unknown interface '${interfaceName}'`,
      { interfaceName, protocol }
    )
    this.name = 'UnknownInterfaceReferenceError'
  }
}

// ============================================================================
// Rendering errors
// ============================================================================

/**
 * A template failed to render for one node. Collected by the renderer and
 * surfaced at the end of a generation run.
 */
export class TemplateError extends Error {
  public readonly nodeName: string
  public readonly templateId: string
  /** Entity the template was rendered for, e.g. `eth1` */
  public readonly entity?: string

  constructor (nodeName: string, templateId: string, cause: string, entity?: string) {
    const target = entity ? `${templateId} (${entity})` : templateId
    super(`Template ${target} failed for node '${nodeName}': ${cause}`)
    this.name = 'TemplateError'
    this.nodeName = nodeName
    this.templateId = templateId
    this.entity = entity

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TemplateError)
    }
  }
}
