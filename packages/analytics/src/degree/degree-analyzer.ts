/**
 * Degree Analyzer
 *
 * One pass over nodes and edges. `typeDegree` counts the edges that carry
 * meaning for each node type:
 * - block: outgoing block_contains_tx (transactions in the block)
 * - transaction: incoming address_inputs_tx plus outgoing tx_outputs_address
 * - address: every incident edge
 */

import type { DerivedAttributes, GraphStore, NodeType } from "@txgraph/graph"
import { silentLogger, type Logger } from "../logging"

export interface DegreeRecord {
  nodeId: string
  nodeType: NodeType
  inDegree: number
  outDegree: number
  totalDegree: number
  typeDegree: number
}

export type DegreeTable = ReadonlyMap<string, DegreeRecord>

export function computeDegrees(store: GraphStore): DegreeTable {
  const table = new Map<string, DegreeRecord>()
  for (const node of store.allNodes()) {
    table.set(node.id, {
      nodeId: node.id,
      nodeType: node.type,
      inDegree: 0,
      outDegree: 0,
      totalDegree: 0,
      typeDegree: 0,
    })
  }

  for (const edge of store.allEdges()) {
    const source = table.get(edge.sourceId)
    const target = table.get(edge.targetId)
    if (!source || !target) continue

    source.outDegree++
    target.inDegree++
    switch (edge.type) {
      case "block_contains_tx":
        source.typeDegree++
        break
      case "address_inputs_tx":
      case "tx_outputs_address":
        source.typeDegree++
        target.typeDegree++
        break
    }
  }

  for (const record of table.values()) {
    record.totalDegree = record.inDegree + record.outDegree
  }
  return table
}

export interface DegreeAnalyzerOptions {
  logger?: Logger
}

export class DegreeAnalyzer {
  private readonly logger: Logger

  constructor(options: DegreeAnalyzerOptions = {}) {
    this.logger = options.logger ?? silentLogger()
  }

  /**
   * Compute the degree table and write it to every node's derived attributes.
   */
  analyze(store: GraphStore): DegreeTable {
    const table = computeDegrees(store)
    store.applyDerived(
      Array.from(table.values(), (record): [string, DerivedAttributes] => [
        record.nodeId,
        {
          inDegree: record.inDegree,
          outDegree: record.outDegree,
          totalDegree: record.totalDegree,
          typeDegree: record.typeDegree,
        },
      ]),
    )
    this.logger.debug("degrees computed", { nodes: table.size })
    return table
  }
}
