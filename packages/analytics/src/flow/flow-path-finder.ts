/**
 * Flow Path Finder
 *
 * Enumerates value-transfer paths from a seed address or transaction.
 * One hop is one transfer: address -> transaction -> address, or from a
 * transaction seed, transaction -> output address. Only transactions in
 * the trailing `maxBlocks` window are traversed and paths never revisit a
 * node.
 */

import type { EdgeType, GraphStore } from "@txgraph/graph"
import { trailingWindow, inWindow, type BlockWindow } from "../cluster"
import { InvalidParameterError, NotFoundError } from "../errors"
import { silentLogger, type Logger } from "../logging"

// =============================================================================
// TYPES
// =============================================================================

export type FlowSeed = { kind: "address"; id: string } | { kind: "transaction"; id: string }

export interface FlowEdge {
  sourceId: string
  targetId: string
  type: EdgeType
  weight: number | null
}

export interface FlowPath {
  pathNodes: string[]
  pathEdges: FlowEdge[]
  /** Sum of the output edges on the path */
  totalValue: number
  /** Number of hops */
  pathLength: number
  /** false when the path was cut at maxDepth while a further transfer existed */
  isComplete: boolean
}

export interface FlowReport {
  seed: FlowSeed
  maxDepth: number
  maxBlocks: number
  /** null when the graph has no blocks */
  window: BlockWindow | null
  paths: FlowPath[]
  /** Paths found before the search stopped */
  pathsExplored: number
  /** The exploration cap was hit and only the highest-value paths are returned */
  truncated: boolean
}

export interface FlowPathFinderOptions {
  /** Paths explored before the search stops (default 1000) */
  maxPaths?: number
  /** Paths returned when the cap is hit (default 100) */
  maxResults?: number
  logger?: Logger
}

export const MIN_FLOW_DEPTH = 1
export const MAX_FLOW_DEPTH = 10
export const MIN_FLOW_BLOCKS = 1
export const MAX_FLOW_BLOCKS = 10

interface Hop {
  transactionId: string
  inputEdge: FlowEdge | null
  outputEdge: FlowEdge
}

interface SearchState {
  found: FlowPath[]
  capped: boolean
}

// =============================================================================
// FINDER
// =============================================================================

export class FlowPathFinder {
  private readonly maxPaths: number
  private readonly maxResults: number
  private readonly logger: Logger

  constructor(options: FlowPathFinderOptions = {}) {
    this.maxPaths = options.maxPaths ?? 1000
    this.maxResults = options.maxResults ?? 100
    this.logger = options.logger ?? silentLogger()
  }

  /**
   * @throws NotFoundError when the seed is unknown or has the wrong node type
   * @throws InvalidParameterError when maxDepth or maxBlocks is out of range
   */
  find(store: GraphStore, seed: FlowSeed, maxDepth = 5, maxBlocks = 5): FlowReport {
    checkRange("maxDepth", maxDepth, MIN_FLOW_DEPTH, MAX_FLOW_DEPTH)
    checkRange("maxBlocks", maxBlocks, MIN_FLOW_BLOCKS, MAX_FLOW_BLOCKS)
    if (!store.getNodeOfType(seed.id, seed.kind)) {
      throw new NotFoundError(seed.kind, seed.id)
    }

    const window = trailingWindow(store, maxBlocks)
    const state: SearchState = { found: [], capped: false }
    const report = (): FlowReport => ({
      seed,
      maxDepth,
      maxBlocks,
      window: window ?? null,
      paths: this.rank(state),
      pathsExplored: state.found.length,
      truncated: state.capped,
    })
    if (!window) return report()

    if (seed.kind === "transaction") {
      if (!inWindow(store.containingBlockHeight(seed.id), window)) return report()
      const visited = new Set([seed.id])
      for (const hop of outputHops(store, seed.id, null, visited)) {
        if (state.capped) break
        this.extend(store, window, maxDepth, [seed.id], [hop], visited, state)
      }
    } else {
      this.walk(store, window, maxDepth, [seed.id], [], new Set([seed.id]), state)
    }

    if (state.capped) {
      this.logger.warn("flow exploration cap reached", {
        seed: seed.id,
        maxPaths: this.maxPaths,
        returned: Math.min(this.maxResults, state.found.length),
      })
    }
    return report()
  }

  /**
   * Apply a hop to the path, then continue from its output address.
   */
  private extend(
    store: GraphStore,
    window: BlockWindow,
    maxDepth: number,
    nodes: string[],
    hops: Hop[],
    visited: Set<string>,
    state: SearchState,
  ): void {
    const last = hops[hops.length - 1]
    if (!last) return
    const added = nodes[nodes.length - 1] === last.transactionId ? [] : [last.transactionId]
    added.push(last.outputEdge.targetId)

    for (const id of added) visited.add(id)
    this.walk(store, window, maxDepth, [...nodes, ...added], hops, visited, state)
    for (const id of added) visited.delete(id)
  }

  /**
   * Continue from the address at the end of `nodes`, recording the path
   * when it can go no further or reaches maxDepth.
   */
  private walk(
    store: GraphStore,
    window: BlockWindow,
    maxDepth: number,
    nodes: string[],
    hops: Hop[],
    visited: Set<string>,
    state: SearchState,
  ): void {
    const address = nodes[nodes.length - 1]
    if (address === undefined) return
    const next = transferHops(store, window, address, visited)

    if (next.length === 0 || hops.length >= maxDepth) {
      if (hops.length > 0) this.record(nodes, hops, next.length === 0, state)
      return
    }
    for (const hop of next) {
      if (state.capped) return
      this.extend(store, window, maxDepth, nodes, [...hops, hop], visited, state)
    }
  }

  private record(nodes: string[], hops: Hop[], isComplete: boolean, state: SearchState): void {
    const pathEdges: FlowEdge[] = []
    let totalValue = 0
    for (const hop of hops) {
      if (hop.inputEdge) pathEdges.push(hop.inputEdge)
      pathEdges.push(hop.outputEdge)
      totalValue += hop.outputEdge.weight ?? 0
    }
    state.found.push({
      pathNodes: [...nodes],
      pathEdges,
      totalValue,
      pathLength: hops.length,
      isComplete,
    })
    if (state.found.length >= this.maxPaths) state.capped = true
  }

  private rank(state: SearchState): FlowPath[] {
    const sorted = [...state.found].sort((a, b) => b.totalValue - a.totalValue)
    return state.capped ? sorted.slice(0, this.maxResults) : sorted
  }
}

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Transfers leaving an address: every unvisited output of every unvisited
 * window transaction the address funds.
 */
function transferHops(store: GraphStore, window: BlockWindow, addressId: string, visited: ReadonlySet<string>): Hop[] {
  const hops: Hop[] = []
  for (const edge of store.incidentEdges(addressId, "out", "address_inputs_tx")) {
    const txId = edge.targetId
    if (visited.has(txId) || !inWindow(store.containingBlockHeight(txId), window)) continue
    const inputEdge: FlowEdge = { sourceId: addressId, targetId: txId, type: edge.type, weight: edge.weight ?? null }
    hops.push(...outputHops(store, txId, inputEdge, visited))
  }
  return hops
}

function outputHops(store: GraphStore, txId: string, inputEdge: FlowEdge | null, visited: ReadonlySet<string>): Hop[] {
  return store
    .incidentEdges(txId, "out", "tx_outputs_address")
    .filter((edge) => !visited.has(edge.targetId))
    .map((edge) => ({
      transactionId: txId,
      inputEdge,
      outputEdge: { sourceId: txId, targetId: edge.targetId, type: edge.type, weight: edge.weight ?? null },
    }))
}

function checkRange(name: string, value: number, min: number, max: number): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new InvalidParameterError(`Invalid parameter: ${name} must be an integer in [${min}, ${max}]`, name, value)
  }
}
