import { describe, it, expect } from "vitest"
import { DegreeAnalyzer, computeDegrees } from "../src"
import { paymentGraph } from "./fixtures/graphs"

describe("DegreeAnalyzer", () => {
  it("should count in, out and type-specific degrees", () => {
    const table = computeDegrees(paymentGraph())

    expect(table.get("block_1")).toEqual({
      nodeId: "block_1",
      nodeType: "block",
      inDegree: 0,
      outDegree: 2,
      totalDegree: 2,
      typeDegree: 2,
    })
    expect(table.get("tx_a")).toMatchObject({ inDegree: 2, outDegree: 2, totalDegree: 4, typeDegree: 3 })
    expect(table.get("tx_b")).toMatchObject({ inDegree: 2, outDegree: 1, totalDegree: 3, typeDegree: 2 })
    expect(table.get("addr_x")).toMatchObject({ inDegree: 1, outDegree: 1, totalDegree: 2, typeDegree: 2 })
    expect(table.get("addr_z")).toMatchObject({ inDegree: 1, outDegree: 0, totalDegree: 1, typeDegree: 1 })
  })

  it("should keep totalDegree equal to inDegree plus outDegree for every node", () => {
    const store = paymentGraph()
    const table = computeDegrees(store)

    expect(table.size).toBe(store.stats().nodes)
    for (const record of table.values()) {
      expect(record.totalDegree).toBe(record.inDegree + record.outDegree)
    }
  })

  it("should write degrees to every node's derived attributes", () => {
    const store = paymentGraph()

    new DegreeAnalyzer().analyze(store)

    for (const node of store.allNodes()) {
      expect(node.derived.totalDegree).toBeDefined()
    }
    expect(store.getNode("tx_a")?.derived).toEqual({
      inDegree: 2,
      outDegree: 2,
      totalDegree: 4,
      typeDegree: 3,
    })
  })

  it("should report isolated nodes with zero degree", () => {
    const store = paymentGraph()
    store.addNode("addr_idle", "address", {})

    expect(computeDegrees(store).get("addr_idle")).toMatchObject({ totalDegree: 0, typeDegree: 0 })
  })
})
