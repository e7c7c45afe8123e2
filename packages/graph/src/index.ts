/**
 * txgraph Graph Store
 *
 * Typed in-memory graph of blocks, transactions and addresses, with
 * synchronous mutation notifications for derived-metric caches.
 *
 * @example
 * ```typescript
 * import { GraphStore } from '@txgraph/graph';
 *
 * const store = new GraphStore();
 * store.subscribe({ notify: (event) => console.log(event.affectedGroups) });
 *
 * store.addNode('block_1', 'block', { height: 1, timestamp: '2024-01-01T00:00:00Z' });
 * store.addNode('tx_a', 'transaction', { fee: 170000, totalValue: 5000000 });
 * store.addEdge('block_1', 'tx_a', 'block_contains_tx');
 *
 * store.neighbors('tx_a', 'in'); // ['block_1']
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// STORE
// =============================================================================

export { GraphStore, edgeId, isNodeOfType } from "./store"
export { NODE_TYPES, EDGE_TYPES, EDGE_ENDPOINTS, METRIC_FAMILIES } from "./store"
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
  GraphExport,
  GraphStats,
} from "./store"

// =============================================================================
// SCHEMA
// =============================================================================

export {
  blockAttributesSchema,
  transactionAttributesSchema,
  addressAttributesSchema,
  nodePayloadSchema,
} from "./schema"
export type {
  NodePayload,
  BlockAttributes,
  TransactionAttributes,
  AddressAttributes,
  NodeAttributesInputMap,
} from "./schema"

// =============================================================================
// ERRORS
// =============================================================================

export { TxGraphError, GraphIntegrityError, PayloadValidationError } from "./errors"
export type { GraphIntegrityReason } from "./errors"

// =============================================================================
// BUILDER
// =============================================================================

export {
  ingestBlock,
  ingestTransaction,
  blockNodeId,
  transactionNodeId,
  addressNodeId,
} from "./builder"
export type {
  BlockRecord,
  TransactionRecord,
  TransactionInputRecord,
  TransactionOutputRecord,
} from "./builder"
