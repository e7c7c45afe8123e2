export { GraphStore, edgeId, isNodeOfType } from "./graph-store"
export {
  NODE_TYPES,
  EDGE_TYPES,
  EDGE_ENDPOINTS,
  METRIC_FAMILIES,
} from "./types"
export type {
  NodeType,
  EdgeType,
  Direction,
  MetricFamily,
  ColorScheme,
  ClusterType,
  AnomalyType,
  DerivedAttributes,
  StoredNode,
  StoredNodeOf,
  StoredEdge,
  MutationOperation,
  GraphMutationEvent,
  GraphMutationListener,
  BatchSnapshot,
  GraphExport,
  GraphStats,
} from "./types"
