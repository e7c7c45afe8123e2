/**
 * Projection of the window's transactions onto an undirected graph of one
 * node type. Link weight counts the window transactions (or shared
 * addresses) connecting the pair.
 */

import { UndirectedGraph } from "graphology"
import type { ClusterType, GraphStore } from "@txgraph/graph"

export interface LinkAttributes {
  weight: number
}

export type ProjectionGraph = UndirectedGraph<Record<string, unknown>, LinkAttributes>

export interface BlockWindow {
  fromHeight: number
  toHeight: number
}

/**
 * Trailing window of `size` block heights ending at the latest block, or
 * undefined when the graph has no blocks.
 */
export function trailingWindow(store: GraphStore, size: number): BlockWindow | undefined {
  const latest = store.latestBlockHeight()
  if (latest === undefined) return undefined
  return { fromHeight: latest - size + 1, toHeight: latest }
}

export function inWindow(height: number | undefined, window: BlockWindow): boolean {
  return height !== undefined && height >= window.fromHeight && height <= window.toHeight
}

/**
 * Transactions whose containing block falls in the window, in id order.
 */
export function windowTransactions(store: GraphStore, window: BlockWindow): string[] {
  return store
    .nodesOfType("transaction")
    .map((tx) => tx.id)
    .filter((id) => inWindow(store.containingBlockHeight(id), window))
    .sort(compareIds)
}

export function buildProjection(store: GraphStore, clusterType: ClusterType, transactions: readonly string[]): ProjectionGraph {
  return clusterType === "address" ? projectAddresses(store, transactions) : projectTransactions(store, transactions)
}

/**
 * Addresses are linked when one funds a transaction the other receives
 * from, or when both fund it. Two outputs of the same transaction are not
 * linked.
 */
function projectAddresses(store: GraphStore, transactions: readonly string[]): ProjectionGraph {
  const nodes = new Set<string>()
  const weights = new Map<string, number>()

  for (const tx of transactions) {
    const inputs = store.neighbors(tx, "in", "address_inputs_tx")
    const outputs = store.neighbors(tx, "out", "tx_outputs_address")
    for (const id of [...inputs, ...outputs]) nodes.add(id)

    const pairs = new Set<string>()
    inputs.forEach((a, i) => {
      for (const b of inputs.slice(i + 1)) pairs.add(pairKey(a, b))
      for (const b of outputs) if (a !== b) pairs.add(pairKey(a, b))
    })
    for (const pair of pairs) weights.set(pair, (weights.get(pair) ?? 0) + 1)
  }

  return toGraph(nodes, weights)
}

/**
 * Transactions are linked once for every address they share.
 */
function projectTransactions(store: GraphStore, transactions: readonly string[]): ProjectionGraph {
  const byAddress = new Map<string, Set<string>>()
  for (const tx of transactions) {
    const addresses = [
      ...store.neighbors(tx, "in", "address_inputs_tx"),
      ...store.neighbors(tx, "out", "tx_outputs_address"),
    ]
    for (const address of addresses) {
      const txs = byAddress.get(address) ?? new Set<string>()
      txs.add(tx)
      byAddress.set(address, txs)
    }
  }

  const weights = new Map<string, number>()
  for (const txs of byAddress.values()) {
    const list = Array.from(txs)
    list.forEach((a, i) => {
      for (const b of list.slice(i + 1)) {
        const pair = pairKey(a, b)
        weights.set(pair, (weights.get(pair) ?? 0) + 1)
      }
    })
  }

  return toGraph(new Set(transactions), weights)
}

const PAIR_SEPARATOR = "\u0000"

function pairKey(a: string, b: string): string {
  return compareIds(a, b) <= 0 ? `${a}${PAIR_SEPARATOR}${b}` : `${b}${PAIR_SEPARATOR}${a}`
}

function toGraph(nodes: Set<string>, weights: Map<string, number>): ProjectionGraph {
  const graph: ProjectionGraph = new UndirectedGraph<Record<string, unknown>, LinkAttributes>()
  for (const id of Array.from(nodes).sort(compareIds)) graph.addNode(id)
  for (const [pair, weight] of weights) {
    const [a, b] = pair.split(PAIR_SEPARATOR)
    if (a !== undefined && b !== undefined) graph.addEdge(a, b, { weight })
  }
  return graph
}

export function compareIds(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}
