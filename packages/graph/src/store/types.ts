/**
 * Graph Store Types
 *
 * Core data structures for the blockchain activity graph.
 */

import type { NodePayload } from "../schema"

// =============================================================================
// NODE & EDGE KINDS
// =============================================================================

export type NodeType = "block" | "transaction" | "address"

export const NODE_TYPES: readonly NodeType[] = ["block", "transaction", "address"]

export type EdgeType = "block_contains_tx" | "address_inputs_tx" | "tx_outputs_address"

export const EDGE_TYPES: readonly EdgeType[] = [
  "block_contains_tx",
  "address_inputs_tx",
  "tx_outputs_address",
]

/**
 * Node types each edge type connects.
 */
export const EDGE_ENDPOINTS = {
  block_contains_tx: { source: "block", target: "transaction" },
  address_inputs_tx: { source: "address", target: "transaction" },
  tx_outputs_address: { source: "transaction", target: "address" },
} as const satisfies Record<EdgeType, { source: NodeType; target: NodeType }>

export type Direction = "in" | "out" | "both"

// =============================================================================
// DERIVED ANALYTICS
// =============================================================================

export type MetricFamily = "degree" | "activity" | "anomaly" | "cluster" | "flow"

export const METRIC_FAMILIES: readonly MetricFamily[] = [
  "degree",
  "activity",
  "anomaly",
  "cluster",
  "flow",
]

export type ColorScheme = "heatmap" | "activity" | "grayscale"

export type ClusterType = "address" | "transaction"

export type AnomalyType =
  | "high_transaction_count"
  | "low_transaction_count"
  | "high_transaction_value"
  | "low_transaction_value"

/**
 * Attributes written by the analytics engine. Everything is optional
 * until the owning metric family has been computed at least once.
 */
export interface DerivedAttributes {
  inDegree?: number
  outDegree?: number
  totalDegree?: number
  typeDegree?: number
  /** Normalized activity (0-100) */
  activityScore?: number
  color?: string
  colorScheme?: ColorScheme
  isAnomaly?: boolean
  anomalyScore?: number
  anomalyType?: AnomalyType | null
  /** -1 when the node is not part of any cluster */
  clusterId?: number
  clusterType?: ClusterType
  clusterColor?: string
}

// =============================================================================
// STORED RECORDS
// =============================================================================

/**
 * Stored node: the tagged payload plus derived analytics and metadata.
 */
export type StoredNode = NodePayload & {
  /** Unique identifier */
  id: string
  derived: DerivedAttributes
  createdAt: Date
  updatedAt: Date
}

export type StoredNodeOf<T extends NodeType> = Extract<StoredNode, { type: T }>

/**
 * Stored edge. The id is derived from `(sourceId, targetId, type)`.
 */
export interface StoredEdge {
  id: string
  type: EdgeType
  sourceId: string
  targetId: string
  /** Value moved, in minor currency units */
  weight?: number
  createdAt: Date
}

// =============================================================================
// MUTATION NOTIFICATIONS
// =============================================================================

export type MutationOperation = "addNode" | "updateNode" | "addEdge" | "updateEdge" | "batch"

/**
 * Delivered synchronously to every listener before the mutating call returns.
 */
export interface GraphMutationEvent {
  operation: MutationOperation
  changedNodeIds: ReadonlySet<string>
  changedEdgeIds: ReadonlySet<string>
  affectedFamilies: ReadonlySet<MetricFamily>
  /** Node-type groups whose members were touched */
  affectedGroups: ReadonlySet<NodeType>
}

export interface GraphMutationListener {
  notify(event: GraphMutationEvent): void
}

// =============================================================================
// SNAPSHOTS
// =============================================================================

/**
 * Batch snapshot for rollback support.
 */
export interface BatchSnapshot {
  nodes: Map<string, StoredNode>
  edges: Map<string, StoredEdge>
  outEdges: Map<string, Set<string>>
  inEdges: Map<string, Set<string>>
  lastUpdate: Date | undefined
}

export interface GraphExport {
  nodes: StoredNode[]
  edges: StoredEdge[]
  metadata: {
    nodeCount: number
    edgeCount: number
    latestBlockHeight: number | null
    lastUpdate: string | null
  }
}

export interface GraphStats {
  nodes: number
  edges: number
  nodesByType: Record<NodeType, number>
  edgesByType: Record<EdgeType, number>
}
