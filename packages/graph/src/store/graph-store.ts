/**
 * Blockchain Graph Store
 *
 * Owns the directed graph of blocks, transactions and addresses. Single
 * source of truth for topology; every mutation notifies listeners before
 * returning. Append-only: nothing here removes a node or an edge.
 */

import { GraphIntegrityError, PayloadValidationError } from "../errors"
import { MutationNotifier } from "../observer"
import { nodePayloadSchema, type NodeAttributesInputMap } from "../schema"
import {
  EDGE_ENDPOINTS,
  METRIC_FAMILIES,
  type BatchSnapshot,
  type DerivedAttributes,
  type Direction,
  type EdgeType,
  type GraphExport,
  type GraphMutationListener,
  type GraphStats,
  type MutationOperation,
  type NodeType,
  type StoredEdge,
  type StoredNode,
  type StoredNodeOf,
} from "./types"

/**
 * Deep clone a stored record (keeps Dates intact).
 */
function clone<T>(value: T): T {
  return structuredClone(value)
}

function toList(value: EdgeType | readonly EdgeType[] | undefined): readonly EdgeType[] | undefined {
  if (value === undefined) return undefined
  return typeof value === "string" ? [value] : value
}

/**
 * Edge id for a `(source, target, type)` tuple.
 */
export function edgeId(sourceId: string, targetId: string, type: EdgeType): string {
  return `${type}:${sourceId}->${targetId}`
}

export function isNodeOfType<T extends NodeType>(node: StoredNode, type: T): node is StoredNodeOf<T> {
  return node.type === type
}

/**
 * In-memory blockchain graph with:
 * - Typed, schema-validated node payloads
 * - Adjacency lists for fast traversal
 * - Type-based node and edge lookup
 * - Batches with rollback and a single merged notification
 */
export class GraphStore {
  /** All nodes by ID */
  private nodes = new Map<string, StoredNode>()

  /** All edges by ID */
  private edges = new Map<string, StoredEdge>()

  /** Outgoing edges per node: nodeId -> Set<edgeId> */
  private outEdges = new Map<string, Set<string>>()

  /** Incoming edges per node: nodeId -> Set<edgeId> */
  private inEdges = new Map<string, Set<string>>()

  /** Nodes by type: type -> Set<nodeId> */
  private nodesByType = new Map<NodeType, Set<string>>()

  /** Edges by type: type -> Set<edgeId> */
  private edgesByType = new Map<EdgeType, Set<string>>()

  private readonly notifier = new MutationNotifier()

  /** Batch state */
  private batchSnapshot: BatchSnapshot | null = null

  private lastUpdate: Date | undefined

  // ===========================================================================
  // NODE OPERATIONS
  // ===========================================================================

  /**
   * Add a node, or merge new attributes into an existing node of the same type.
   */
  addNode<T extends NodeType>(id: string, type: T, attributes: NodeAttributesInputMap[T]): StoredNode {
    const existing = this.nodes.get(id)
    if (existing && existing.type !== type) {
      throw new GraphIntegrityError(
        `Node '${id}' already exists as ${existing.type}, cannot re-add it as ${type}`,
        "NODE_TYPE_CONFLICT",
        id,
      )
    }

    const parsed = nodePayloadSchema.safeParse({
      type,
      attributes: existing ? { ...existing.attributes, ...attributes } : attributes,
    })
    if (!parsed.success) {
      throw new PayloadValidationError(id, type, parsed.error.issues)
    }

    const now = new Date()
    const stored: StoredNode = {
      ...parsed.data,
      id,
      derived: existing ? existing.derived : {},
      createdAt: existing ? existing.createdAt : now,
      updatedAt: now,
    }
    this.nodes.set(id, stored)

    if (!existing) {
      this.indexNode(stored)
    }

    this.lastUpdate = now
    this.emit(existing ? "updateNode" : "addNode", [id], [], [type])
    return clone(stored)
  }

  /**
   * Get a node by ID.
   */
  getNode(id: string): StoredNode | undefined {
    const node = this.nodes.get(id)
    return node ? clone(node) : undefined
  }

  /**
   * Get a node by ID, only if it has the given type.
   */
  getNodeOfType<T extends NodeType>(id: string, type: T): StoredNodeOf<T> | undefined {
    const node = this.nodes.get(id)
    if (!node || !isNodeOfType(node, type)) return undefined
    return clone(node)
  }

  /**
   * Check if a node exists.
   */
  hasNode(id: string): boolean {
    return this.nodes.has(id)
  }

  /**
   * Get all nodes, optionally restricted to one type.
   */
  allNodes(type?: NodeType): StoredNode[] {
    if (!type) {
      return Array.from(this.nodes.values()).map(clone)
    }
    const ids = this.nodesByType.get(type)
    if (!ids) return []
    return Array.from(ids)
      .map((id) => this.nodes.get(id))
      .filter((n): n is StoredNode => n !== undefined)
      .map(clone)
  }

  /**
   * Get all nodes of a type, narrowed to that type's payload.
   */
  nodesOfType<T extends NodeType>(type: T): StoredNodeOf<T>[] {
    return this.allNodes(type).filter((n): n is StoredNodeOf<T> => isNodeOfType(n, type))
  }

  // ===========================================================================
  // EDGE OPERATIONS
  // ===========================================================================

  /**
   * Add an edge. Both endpoints must exist and have the types the edge
   * type requires. Re-adding an existing edge is idempotent; a new weight,
   * when given, replaces the stored one.
   */
  addEdge(sourceId: string, targetId: string, type: EdgeType, weight?: number): StoredEdge {
    const source = this.nodes.get(sourceId)
    if (!source) {
      throw GraphIntegrityError.missingEndpoint(type, "source", sourceId)
    }

    const target = this.nodes.get(targetId)
    if (!target) {
      throw GraphIntegrityError.missingEndpoint(type, "target", targetId)
    }

    const expected = EDGE_ENDPOINTS[type]
    if (source.type !== expected.source) {
      throw GraphIntegrityError.endpointTypeMismatch(type, "source", sourceId, expected.source, source.type)
    }
    if (target.type !== expected.target) {
      throw GraphIntegrityError.endpointTypeMismatch(type, "target", targetId, expected.target, target.type)
    }

    if (weight !== undefined && (!Number.isFinite(weight) || weight < 0)) {
      throw new GraphIntegrityError(
        `Edge weight must be a non-negative finite number, got ${weight}`,
        "INVALID_WEIGHT",
        sourceId,
        type,
      )
    }

    const id = edgeId(sourceId, targetId, type)
    const existing = this.edges.get(id)
    if (existing) {
      if (weight === undefined || existing.weight === weight) {
        return clone(existing)
      }
      existing.weight = weight
      this.lastUpdate = new Date()
      this.emit("updateEdge", [sourceId, targetId], [id], [source.type, target.type])
      return clone(existing)
    }

    const stored: StoredEdge = { id, type, sourceId, targetId, createdAt: new Date() }
    if (weight !== undefined) {
      stored.weight = weight
    }
    this.indexEdge(stored)

    this.lastUpdate = stored.createdAt
    this.emit("addEdge", [sourceId, targetId], [id], [source.type, target.type])
    return clone(stored)
  }

  /**
   * Get an edge by its `(source, target, type)` tuple.
   */
  getEdge(sourceId: string, targetId: string, type: EdgeType): StoredEdge | undefined {
    const edge = this.edges.get(edgeId(sourceId, targetId, type))
    return edge ? clone(edge) : undefined
  }

  /**
   * Check if an edge exists.
   */
  hasEdge(sourceId: string, targetId: string, type: EdgeType): boolean {
    return this.edges.has(edgeId(sourceId, targetId, type))
  }

  /**
   * Get all edges, optionally restricted to one type.
   */
  allEdges(type?: EdgeType): StoredEdge[] {
    if (!type) {
      return Array.from(this.edges.values()).map(clone)
    }
    const ids = this.edgesByType.get(type)
    if (!ids) return []
    return Array.from(ids)
      .map((id) => this.edges.get(id))
      .filter((e): e is StoredEdge => e !== undefined)
      .map(clone)
  }

  /**
   * Edges incident to a node in the given direction.
   */
  incidentEdges(
    nodeId: string,
    direction: Direction = "both",
    edgeTypes?: EdgeType | readonly EdgeType[],
  ): StoredEdge[] {
    const types = toList(edgeTypes)
    const ids: string[] = []
    if (direction !== "in") ids.push(...(this.outEdges.get(nodeId) ?? []))
    if (direction !== "out") ids.push(...(this.inEdges.get(nodeId) ?? []))

    return ids
      .map((id) => this.edges.get(id))
      .filter((e): e is StoredEdge => e !== undefined && (!types || types.includes(e.type)))
      .map(clone)
  }

  /**
   * Ids of nodes adjacent to `nodeId` in the given direction, without duplicates.
   */
  neighbors(nodeId: string, direction: Direction = "both", edgeTypes?: EdgeType | readonly EdgeType[]): string[] {
    const result = new Set<string>()
    for (const edge of this.incidentEdges(nodeId, direction, edgeTypes)) {
      result.add(edge.sourceId === nodeId ? edge.targetId : edge.sourceId)
    }
    return Array.from(result)
  }

  // ===========================================================================
  // DERIVED ATTRIBUTES
  // ===========================================================================

  /**
   * Write a complete batch of derived attributes. Every id is checked
   * before anything is written, so a bad batch leaves the graph as it was.
   * Topology is unchanged, so listeners are not notified.
   */
  applyDerived(patches: Iterable<readonly [string, DerivedAttributes]>): void {
    const entries = Array.from(patches)
    for (const [id] of entries) {
      if (!this.nodes.has(id)) {
        throw new GraphIntegrityError(`Cannot write derived attributes: node '${id}' does not exist`, "UNKNOWN_NODE", id)
      }
    }
    for (const [id, patch] of entries) {
      const node = this.nodes.get(id)
      if (node) {
        node.derived = { ...node.derived, ...patch }
      }
    }
  }

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  /**
   * Node-induced subgraph: the matching nodes and the edges between them,
   * as a detached store.
   */
  subgraphWhere(predicate: (node: StoredNode) => boolean): GraphStore {
    const subgraph = new GraphStore()
    for (const node of this.nodes.values()) {
      if (predicate(clone(node))) {
        subgraph.insertNode(clone(node))
      }
    }
    for (const edge of this.edges.values()) {
      if (subgraph.hasNode(edge.sourceId) && subgraph.hasNode(edge.targetId)) {
        subgraph.indexEdge(clone(edge))
      }
    }
    subgraph.lastUpdate = this.lastUpdate
    return subgraph
  }

  /**
   * Highest block height in the graph.
   */
  latestBlockHeight(): number | undefined {
    let latest: number | undefined
    for (const id of this.nodesByType.get("block") ?? []) {
      const node = this.nodes.get(id)
      if (node?.type === "block" && (latest === undefined || node.attributes.height > latest)) {
        latest = node.attributes.height
      }
    }
    return latest
  }

  /**
   * Height of the block containing a transaction. Falls back to the
   * transaction's own `blockHeight` when its block isn't in the graph.
   */
  containingBlockHeight(transactionId: string): number | undefined {
    const tx = this.nodes.get(transactionId)
    if (!tx || tx.type !== "transaction") return undefined

    let height: number | undefined
    for (const id of this.inEdges.get(transactionId) ?? []) {
      const edge = this.edges.get(id)
      if (edge?.type !== "block_contains_tx") continue
      const block = this.nodes.get(edge.sourceId)
      if (block?.type === "block" && (height === undefined || block.attributes.height > height)) {
        height = block.attributes.height
      }
    }
    return height ?? tx.attributes.blockHeight
  }

  /**
   * Shortest directed path between two nodes (BFS), or undefined.
   */
  findPath(fromId: string, toId: string): string[] | undefined {
    if (!this.nodes.has(fromId) || !this.nodes.has(toId)) return undefined
    if (fromId === toId) return [fromId]

    const previous = new Map<string, string>([[fromId, fromId]])
    const queue = [fromId]
    while (queue.length > 0) {
      const current = queue.shift()
      if (current === undefined) break
      for (const id of this.outEdges.get(current) ?? []) {
        const edge = this.edges.get(id)
        if (!edge || previous.has(edge.targetId)) continue
        previous.set(edge.targetId, current)
        if (edge.targetId === toId) {
          const path = [toId]
          let step = current
          while (step !== fromId) {
            path.unshift(step)
            step = previous.get(step) ?? fromId
          }
          path.unshift(fromId)
          return path
        }
        queue.push(edge.targetId)
      }
    }
    return undefined
  }

  // ===========================================================================
  // NOTIFICATIONS
  // ===========================================================================

  /**
   * Register a mutation listener. Returns an unsubscribe function.
   */
  subscribe(listener: GraphMutationListener): () => void {
    return this.notifier.subscribe(listener)
  }

  private emit(
    operation: MutationOperation,
    nodeIds: readonly string[],
    edgeIds: readonly string[],
    groups: readonly NodeType[],
  ): void {
    this.notifier.emit({
      operation,
      changedNodeIds: new Set(nodeIds),
      changedEdgeIds: new Set(edgeIds),
      affectedFamilies: new Set(METRIC_FAMILIES),
      affectedGroups: new Set(groups),
    })
  }

  // ===========================================================================
  // BATCHES
  // ===========================================================================

  /**
   * Apply several mutations as one unit. Listeners receive a single merged
   * event when `fn` returns. If `fn` throws, the store is rolled back and
   * nothing is delivered. Nested batches join the outermost one.
   */
  batch<T>(fn: (store: GraphStore) => T): T {
    if (this.batchSnapshot) {
      return fn(this)
    }

    const snapshot = this.takeSnapshot()
    this.batchSnapshot = snapshot
    this.notifier.hold()

    let result: T
    try {
      result = fn(this)
    } catch (error) {
      this.restore(snapshot)
      this.batchSnapshot = null
      this.notifier.discard()
      throw error
    }

    this.batchSnapshot = null
    this.notifier.release()
    return result
  }

  /**
   * Check if in a batch.
   */
  inBatch(): boolean {
    return this.batchSnapshot !== null
  }

  private takeSnapshot(): BatchSnapshot {
    return {
      nodes: new Map(Array.from(this.nodes.entries()).map(([k, v]) => [k, clone(v)])),
      edges: new Map(Array.from(this.edges.entries()).map(([k, v]) => [k, clone(v)])),
      outEdges: new Map(Array.from(this.outEdges.entries()).map(([k, v]) => [k, new Set(v)])),
      inEdges: new Map(Array.from(this.inEdges.entries()).map(([k, v]) => [k, new Set(v)])),
      lastUpdate: this.lastUpdate,
    }
  }

  private restore(snapshot: BatchSnapshot): void {
    this.nodes = snapshot.nodes
    this.edges = snapshot.edges
    this.outEdges = snapshot.outEdges
    this.inEdges = snapshot.inEdges
    this.lastUpdate = snapshot.lastUpdate

    this.nodesByType.clear()
    for (const node of this.nodes.values()) {
      this.addToIndex(this.nodesByType, node.type, node.id)
    }
    this.edgesByType.clear()
    for (const edge of this.edges.values()) {
      this.addToIndex(this.edgesByType, edge.type, edge.id)
    }
  }

  // ===========================================================================
  // INDEXES
  // ===========================================================================

  private insertNode(node: StoredNode): void {
    this.nodes.set(node.id, node)
    this.indexNode(node)
  }

  private indexNode(node: StoredNode): void {
    this.addToIndex(this.nodesByType, node.type, node.id)
    this.outEdges.set(node.id, new Set())
    this.inEdges.set(node.id, new Set())
  }

  private indexEdge(edge: StoredEdge): void {
    this.edges.set(edge.id, edge)
    this.addToIndex(this.edgesByType, edge.type, edge.id)
    this.outEdges.get(edge.sourceId)?.add(edge.id)
    this.inEdges.get(edge.targetId)?.add(edge.id)
  }

  private addToIndex<K>(index: Map<K, Set<string>>, key: K, id: string): void {
    let ids = index.get(key)
    if (!ids) {
      ids = new Set()
      index.set(key, ids)
    }
    ids.add(id)
  }

  // ===========================================================================
  // UTILITIES
  // ===========================================================================

  /**
   * Get store statistics.
   */
  stats(): GraphStats {
    const nodeCount = (type: NodeType) => this.nodesByType.get(type)?.size ?? 0
    const edgeCount = (type: EdgeType) => this.edgesByType.get(type)?.size ?? 0

    return {
      nodes: this.nodes.size,
      edges: this.edges.size,
      nodesByType: {
        block: nodeCount("block"),
        transaction: nodeCount("transaction"),
        address: nodeCount("address"),
      },
      edgesByType: {
        block_contains_tx: edgeCount("block_contains_tx"),
        address_inputs_tx: edgeCount("address_inputs_tx"),
        tx_outputs_address: edgeCount("tx_outputs_address"),
      },
    }
  }

  /**
   * Export graph data for the visualization layer.
   */
  export(): GraphExport {
    return {
      nodes: this.allNodes(),
      edges: this.allEdges(),
      metadata: {
        nodeCount: this.nodes.size,
        edgeCount: this.edges.size,
        latestBlockHeight: this.latestBlockHeight() ?? null,
        lastUpdate: this.lastUpdate ? this.lastUpdate.toISOString() : null,
      },
    }
  }
}
