/**
 * Blockchain Graph Builder
 *
 * Turns upstream block and transaction records into graph mutations.
 * Each transaction is ingested as one batch, so listeners never see the
 * transaction node without its edges.
 */

import type { GraphStore } from "../store/graph-store"

export interface BlockRecord {
  hash: string
  height: number
  /** ISO-8601 creation time */
  timestamp: string
  slot?: number
  txCount?: number
}

export interface TransactionInputRecord {
  /** Address owning the spent output, when the source reports one */
  address?: string
  amount?: number
}

export interface TransactionOutputRecord {
  address: string
  amount: number
}

export interface TransactionRecord {
  hash: string
  blockHash: string
  blockHeight?: number
  fee?: number
  timestamp?: string
  inputs: TransactionInputRecord[]
  outputs: TransactionOutputRecord[]
}

interface AddressDelta {
  totalSent: number
  totalReceived: number
  utxoCount: number
}

export const blockNodeId = (hash: string) => `block_${hash}`
export const transactionNodeId = (hash: string) => `tx_${hash}`
export const addressNodeId = (address: string) => `addr_${address}`

/**
 * Add a block node. Returns its node id.
 */
export function ingestBlock(store: GraphStore, block: BlockRecord): string {
  const id = blockNodeId(block.hash)
  store.addNode(id, "block", {
    height: block.height,
    timestamp: block.timestamp,
    slot: block.slot,
    txCount: block.txCount,
  })
  return id
}

/**
 * Add a transaction with its block link, input and output edges. Missing
 * address nodes are created; address statistics are aggregated the first
 * time a transaction is seen, counting the transaction once per address.
 * Returns the transaction node id.
 */
export function ingestTransaction(store: GraphStore, tx: TransactionRecord): string {
  const txId = transactionNodeId(tx.hash)

  return store.batch((graph) => {
    const firstSeen = !graph.hasNode(txId)
    const totalValue = tx.outputs.reduce((sum, output) => sum + output.amount, 0)

    graph.addNode(txId, "transaction", {
      fee: tx.fee ?? 0,
      totalValue,
      blockHeight: tx.blockHeight,
      timestamp: tx.timestamp,
    })

    const blockId = blockNodeId(tx.blockHash)
    if (graph.hasNode(blockId)) {
      graph.addEdge(blockId, txId, "block_contains_tx")
    }

    const deltas = new Map<string, AddressDelta>()
    const deltaFor = (addrId: string): AddressDelta => {
      const existing = deltas.get(addrId)
      if (existing) return existing
      const delta = { totalSent: 0, totalReceived: 0, utxoCount: 0 }
      deltas.set(addrId, delta)
      return delta
    }
    const inputIds: string[] = []
    for (const input of tx.inputs) {
      if (!input.address) continue
      const addrId = addressNodeId(input.address)
      deltaFor(addrId).totalSent += input.amount ?? 0
      inputIds.push(addrId)
    }
    for (const output of tx.outputs) {
      const delta = deltaFor(addressNodeId(output.address))
      delta.totalReceived += output.amount
      delta.utxoCount++
    }

    // Each address counts the transaction once
    for (const [addrId, delta] of deltas) {
      const current = graph.getNodeOfType(addrId, "address")?.attributes
      if (current && !firstSeen) continue
      const seenAt = current?.firstSeen ?? tx.timestamp
      graph.addNode(addrId, "address", {
        totalSent: (current?.totalSent ?? 0) + delta.totalSent,
        totalReceived: (current?.totalReceived ?? 0) + delta.totalReceived,
        utxoCount: (current?.utxoCount ?? 0) + delta.utxoCount,
        transactionCount: (current?.transactionCount ?? 0) + 1,
        ...(seenAt === undefined ? {} : { firstSeen: seenAt }),
      })
    }

    for (const addrId of inputIds) {
      graph.addEdge(addrId, txId, "address_inputs_tx")
    }
    for (const output of tx.outputs) {
      graph.addEdge(txId, addressNodeId(output.address), "tx_outputs_address", output.amount)
    }

    return txId
  })
}
