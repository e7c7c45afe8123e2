import { describe, it, expect, beforeEach, vi } from "vitest"
import {
  GraphStore,
  ingestBlock,
  ingestTransaction,
  type TransactionRecord,
} from "../src"

const payment: TransactionRecord = {
  hash: "aa01",
  blockHash: "b100",
  fee: 170000,
  timestamp: "2024-03-01T10:00:00Z",
  inputs: [{ address: "alice", amount: 5000 }, { amount: 20 }],
  outputs: [
    { address: "bob", amount: 3000 },
    { address: "alice", amount: 1800 },
  ],
}

describe("blockchain builder", () => {
  let store: GraphStore

  beforeEach(() => {
    store = new GraphStore()
    ingestBlock(store, { hash: "b100", height: 100, timestamp: "2024-03-01T09:59:40Z" })
  })

  it("should add a block node keyed by hash", () => {
    expect(store.getNodeOfType("block_b100", "block")?.attributes.height).toBe(100)
  })

  it("should ingest a transaction with its block, input and output edges", () => {
    const txId = ingestTransaction(store, payment)

    expect(txId).toBe("tx_aa01")
    expect(store.getNodeOfType(txId, "transaction")?.attributes).toMatchObject({
      fee: 170000,
      totalValue: 4800,
    })
    expect(store.hasEdge("block_b100", txId, "block_contains_tx")).toBe(true)
    expect(store.neighbors(txId, "in", "address_inputs_tx")).toEqual(["addr_alice"])
    expect(store.getEdge(txId, "addr_bob", "tx_outputs_address")?.weight).toBe(3000)
    expect(store.getEdge(txId, "addr_alice", "tx_outputs_address")?.weight).toBe(1800)
  })

  it("should aggregate address statistics", () => {
    ingestTransaction(store, payment)

    expect(store.getNodeOfType("addr_alice", "address")?.attributes).toMatchObject({
      totalSent: 5000,
      totalReceived: 1800,
      transactionCount: 1,
      utxoCount: 1,
      firstSeen: "2024-03-01T10:00:00Z",
    })
    expect(store.getNodeOfType("addr_bob", "address")?.attributes).toMatchObject({
      totalReceived: 3000,
      transactionCount: 1,
      utxoCount: 1,
    })
  })

  it("should count a change output once for the spending address", () => {
    ingestTransaction(store, {
      hash: "cc01",
      blockHash: "b100",
      inputs: [{ address: "carol", amount: 10 }],
      outputs: [
        { address: "carol", amount: 4 },
        { address: "dave", amount: 6 },
      ],
    })

    expect(store.getNodeOfType("addr_carol", "address")?.attributes).toEqual({
      totalSent: 10,
      totalReceived: 4,
      transactionCount: 1,
      utxoCount: 1,
    })
    expect(store.getNodeOfType("addr_dave", "address")?.attributes).toEqual({
      totalSent: 0,
      totalReceived: 6,
      transactionCount: 1,
      utxoCount: 1,
    })
  })

  it("should keep the first timestamp an address was seen at", () => {
    ingestTransaction(store, payment)
    ingestTransaction(store, {
      hash: "aa03",
      blockHash: "b100",
      timestamp: "2024-03-02T00:00:00Z",
      inputs: [],
      outputs: [{ address: "bob", amount: 50 }],
    })

    expect(store.getNodeOfType("addr_bob", "address")?.attributes).toMatchObject({
      totalReceived: 3050,
      transactionCount: 2,
      utxoCount: 2,
      firstSeen: "2024-03-01T10:00:00Z",
    })
  })

  it("should not aggregate statistics twice for a repeated transaction", () => {
    ingestTransaction(store, payment)
    ingestTransaction(store, payment)

    expect(store.getNodeOfType("addr_bob", "address")?.attributes.totalReceived).toBe(3000)
    expect(store.stats().edges).toBe(4)
  })

  it("should skip the block edge when the block is unknown", () => {
    ingestTransaction(store, { ...payment, hash: "aa02", blockHash: "b999", blockHeight: 999 })

    expect(store.neighbors("tx_aa02", "in", "block_contains_tx")).toEqual([])
    expect(store.containingBlockHeight("tx_aa02")).toBe(999)
  })

  it("should emit a single notification per transaction", () => {
    const notify = vi.fn()
    store.subscribe({ notify })

    ingestTransaction(store, payment)

    expect(notify).toHaveBeenCalledTimes(1)
    expect(notify.mock.calls[0]?.[0].changedNodeIds).toEqual(
      new Set(["tx_aa01", "block_b100", "addr_alice", "addr_bob"]),
    )
  })
})
