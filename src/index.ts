// Core classes
export { ConfigGenerator, DEBUG_JSON_PATH } from './core/ConfigGenerator'

// Schema classes
export { TopologyLoader, LoadResult } from './schema/TopologyLoader'
export { DocumentReader, Mapping, isMapping, joinPath } from './schema/DocumentReader'

// Resolver classes
export { TopologyResolver } from './resolver/TopologyResolver'

// Render classes
export { TemplateSelector } from './render/TemplateSelector'
export { TemplateRenderer } from './render/TemplateRenderer'
export { OutputPathMapper, NETWORKD_DIR, PATH_PLACEHOLDERS } from './render/OutputPathMapper'
export { ServicesListBuilder, SERVICES_LIST_PATH } from './render/ServicesListBuilder'

// Network classes
export { MacAddressGenerator, MacAddress } from './network/MacAddressGenerator'

// I/O
export { ArtifactWriter, FileSystemArtifactWriter, CONFIGS_DIR } from './io/FileSystemArtifactWriter'
export { readTopologyFile } from './io/readTopologyFile'

// Configuration
export {
  BUNDLED_TEMPLATES_DIR,
  Environment,
  GeneratorConfig,
  GeneratorOptions,
  resolveGeneratorConfig
} from './config/GeneratorConfig'

// Types - External topology
export {
  NODE_ROLES,
  NodeRole,
  ROUTING_ENGINES,
  RoutingEngine,
  TUNNEL_TYPES,
  TunnelType,
  FIREWALL_ACTIONS,
  FirewallAction,
  FIREWALL_IMPLEMENTATIONS,
  FirewallImplementation,
  RIP_VERSIONS,
  RipVersion,
  PARAVIRT_PROVIDERS,
  ParavirtProvider,
  VBOX_CHIPSETS,
  VBoxChipset,
  VLAN_ID_MIN,
  VLAN_ID_MAX,
  SysctlValue,
  TopologyMeta,
  TopologyDefaults,
  ExternalVBoxSettings,
  ExternalLink,
  ExternalInterface,
  ExternalVlan,
  ExternalTunnel,
  ExternalBridge,
  ExternalOspf,
  ExternalOspfArea,
  ExternalRip,
  ExternalRouting,
  WireguardPeer,
  WireguardSettings,
  FirewallRule,
  FirewallSettings,
  ServicesSettings,
  ExternalNode,
  ExternalTopology
} from './types/topology.types'

// Types - Internal model
export {
  INTERFACE_NAME_PREFIX,
  DEFAULT_TUNNEL_NAME,
  DEFAULT_TUNNEL_TYPE,
  DEFAULT_BRIDGE_NAME,
  DEFAULT_OSPF_AREA,
  DEFAULT_RIP_VERSION,
  DEFAULT_VBOX_SETTINGS,
  InterfaceRef,
  InternalVBoxSettings,
  InternalInterface,
  InternalVlan,
  InternalTunnel,
  InternalBridge,
  StaticRoute,
  InternalOspf,
  InternalOspfArea,
  InternalRip,
  InternalRouting,
  InternalServices,
  InternalFirewall,
  InternalWireguard,
  InternalNode,
  InternalLink,
  InternalTopology,
  peerKey,
  interfaceToAdapterIndex
} from './types/internal.types'

// Types - Rendering
export {
  DEFAULT_BASE_SET,
  FEATURE_SETS,
  FeatureSet,
  TemplateSetId,
  TEMPLATE_EXTENSION,
  SHARED_TEMPLATE_DIR,
  TemplateScope,
  TemplateHelpers,
  RenderContext,
  RenderedTemplate,
  NodeRenderResult,
  Artifact,
  NodeArtifacts,
  GenerationResult
} from './types/render.types'

// Types - Errors
export {
  SchemaErrorCode,
  ReferenceErrorCode,
  SchemaError,
  FieldViolation,
  ValidationError,
  TopologyReferenceError,
  UnresolvedPeerError,
  DuplicateNodeError,
  DuplicateInterfaceAssignmentError,
  VlanParentNotFoundError,
  UnknownInterfaceReferenceError,
  TemplateError
} from './types/errors.types'

// Utilities
export { Debugger } from './utils/debug'
export { isIPv4, isCidr, splitCidr, parseStaticRoute, isInSubnet, DEFAULT_ROUTE, DEFAULT_ROUTE_CIDR } from './utils/address'
export { FrozenMap, deepFreeze } from './utils/freeze'
