import { describe, it, expect, beforeEach, vi } from "vitest"
import type { GraphStore } from "@txgraph/graph"
import {
  ActivityColorMapper,
  AnalyticsFacade,
  AnomalyDetector,
  DegreeAnalyzer,
  InsufficientDataError,
  InvalidParameterError,
  NotFoundError,
  silentLogger,
} from "../src"
import { addTx, paymentGraph, transactionsWithValues } from "./fixtures/graphs"

function thrown(fn: () => unknown): unknown {
  try {
    fn()
  } catch (error) {
    return error
  }
  return undefined
}

describe("AnalyticsFacade", () => {
  let store: GraphStore
  let degreeAnalyzer: DegreeAnalyzer
  let facade: AnalyticsFacade

  beforeEach(() => {
    store = paymentGraph()
    degreeAnalyzer = new DegreeAnalyzer()
    facade = new AnalyticsFacade(store, { logger: silentLogger(), degreeAnalyzer })
  })

  // ===========================================================================
  // CACHING
  // ===========================================================================

  describe("caching", () => {
    it("should answer a repeated query without re-running the analyzer", () => {
      const analyze = vi.spyOn(degreeAnalyzer, "analyze")

      const first = facade.getDegrees()
      const second = facade.getDegrees()

      expect(second).toEqual(first)
      expect(analyze).toHaveBeenCalledTimes(1)
      expect(facade.cacheStats().degree).toMatchObject({ hits: 1, misses: 1 })
    })

    it("should recompute after a graph mutation", () => {
      const analyze = vi.spyOn(degreeAnalyzer, "analyze")
      expect(facade.getDegrees({ nodeId: "addr_z" }).metrics[0]?.totalDegree).toBe(1)

      addTx(store, { id: "tx_c", height: 1, inputs: ["addr_z"], outputs: [["addr_y", 1]] })

      expect(facade.isDirty("degree")).toBe(true)
      expect(facade.getDegrees({ nodeId: "addr_z" }).metrics[0]?.totalDegree).toBe(2)
      expect(analyze).toHaveBeenCalledTimes(2)
    })

    it("should keep activity cached when only another group changes", () => {
      const activityMapper = new ActivityColorMapper()
      const analyze = vi.spyOn(activityMapper, "analyze")
      facade = new AnalyticsFacade(store, { logger: silentLogger(), activityMapper })

      facade.getActivity({ nodeType: "address" })
      store.addNode("block_9", "block", { height: 9, timestamp: "2024-01-01T00:03:00Z" })
      facade.getActivity({ nodeType: "address" })

      expect(analyze).toHaveBeenCalledTimes(1)
    })

    it("should restore the derived attributes of a cached answer", () => {
      facade.getActivity({ nodeType: "address", colorScheme: "heatmap" })
      facade.getActivity({ nodeType: "address", colorScheme: "grayscale" })
      const again = facade.getActivity({ nodeType: "address", colorScheme: "heatmap" })

      expect(again.metrics.find((m) => m.nodeId === "addr_x")?.colorHex).toBe("#00ff00")
      expect(store.getNode("addr_x")?.derived).toMatchObject({ color: "#00ff00", colorScheme: "heatmap" })
      expect(facade.cacheStats().activity).toMatchObject({ hits: 1, misses: 2 })
    })

    it("should restore cluster attributes of a cached window", () => {
      facade.getClusters({ clusterType: "address", timeWindowBlocks: 20 })
      store.applyDerived([["addr_x", { clusterId: 7, clusterType: "transaction" }]])

      facade.getClusters({ clusterType: "address", timeWindowBlocks: 20 })

      expect(store.getNode("addr_x")?.derived).toMatchObject({ clusterId: 0, clusterType: "address" })
    })

    it("should hand out copies of cached results", () => {
      const degrees = facade.getDegrees({ nodeId: "tx_a" })
      const record = degrees.metrics[0]
      if (record) record.totalDegree = 999
      const clusters = facade.getClusters({ clusterType: "address" })
      clusters.clusters.length = 0
      const flow = facade.getFlow({ transactionId: "tx_a" })
      flow.paths.length = 0

      expect(facade.getDegrees({ nodeId: "tx_a" }).metrics[0]).toMatchObject({
        inDegree: 2,
        outDegree: 2,
        totalDegree: 4,
      })
      expect(facade.getClusters({ clusterType: "address" }).totalClusters).toBe(1)
      expect(facade.getClusters({ clusterType: "address" }).clusters).toHaveLength(1)
      expect(facade.getFlow({ transactionId: "tx_a" }).paths).toHaveLength(2)
    })

    it("should stop invalidating after dispose", () => {
      const analyze = vi.spyOn(degreeAnalyzer, "analyze")
      facade.getDegrees()
      facade.dispose()

      store.addNode("addr_new", "address", {})

      expect(facade.getDegrees().total).toBe(6)
      expect(analyze).toHaveBeenCalledTimes(1)
    })
  })

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  describe("queries", () => {
    it("should filter degrees by node type and id", () => {
      expect(facade.getDegrees({ nodeType: "transaction" }).metrics.map((m) => m.nodeId)).toEqual([
        "tx_a",
        "tx_b",
      ])
      expect(facade.getDegrees({ nodeId: "tx_a" })).toEqual({
        metrics: [
          { nodeId: "tx_a", nodeType: "transaction", inDegree: 2, outDegree: 2, totalDegree: 4, typeDegree: 3 },
        ],
        total: 1,
      })
    })

    it("should echo the color scheme with activity metrics", () => {
      const result = facade.getActivity({ nodeType: "address", colorScheme: "grayscale" })

      expect(result.colorScheme).toBe("grayscale")
      expect(result.total).toBe(3)
      expect(result.metrics.find((m) => m.nodeId === "addr_z")?.colorHex).toBe("#000000")
    })

    it("should default activity to the heatmap scheme", () => {
      expect(facade.getActivity().colorScheme).toBe("heatmap")
    })

    it("should report anomalies with counts", () => {
      const values = transactionsWithValues([1, 1, 1, 1, 1, 1, 1, 1, 1, 100])
      facade = new AnalyticsFacade(values, { logger: silentLogger() })

      const result = facade.getAnomalies({ nodeType: "transaction", method: "zscore" })

      expect(result).toMatchObject({ method: "zscore", threshold: 2, total: 10, anomalyCount: 1 })
      expect(facade.getAnomalies({ nodeType: "transaction", method: "zscore", nodeId: "tx_9" }).records).toEqual([
        {
          nodeId: "tx_9",
          nodeType: "transaction",
          isAnomaly: true,
          anomalyScore: 100,
          anomalyType: "high_transaction_value",
          actualValue: 100,
        },
      ])
      expect(facade.cacheStats().anomaly).toMatchObject({ hits: 1, misses: 1 })
    })

    it("should surface insufficient data and unsupported groups", () => {
      expect(() => facade.getAnomalies({ nodeType: "transaction" })).toThrow(InsufficientDataError)
      expect(() => facade.getAnomalies({ nodeType: "address" })).toThrow(InvalidParameterError)
    })

    it("should honor the configured minimum sample", () => {
      facade = new AnalyticsFacade(transactionsWithValues([1, 2, 3, 4, 5]), {
        logger: silentLogger(),
        config: { anomalyMinSample: 5 },
      })

      expect(facade.getAnomalies({ nodeType: "transaction" }).anomalyCount).toBe(2)
    })

    it("should find flow paths from a transaction", () => {
      const report = facade.getFlow({ transactionId: "tx_a", maxDepth: "3" })

      expect(report.maxDepth).toBe(3)
      expect(report.paths.map((p) => [p.pathNodes, p.totalValue])).toEqual([
        [["tx_a", "addr_y", "tx_b", "addr_x"], 13],
        [["tx_a", "addr_z"], 5],
      ])
    })

    it("should fail a flow query for an unknown seed without caching it", () => {
      expect(() => facade.getFlow({ startAddress: "addr_ghost" })).toThrow(NotFoundError)
      expect(facade.cacheStats().flow.entries).toBe(0)
    })

    it("should cluster through the cache", () => {
      const first = facade.getClusters({ clusterType: "address" })
      const second = facade.getClusters({ clusterType: "address", timeWindowBlocks: 30 })

      expect(second).toEqual(first)
      expect(first.timeWindowBlocks).toBe(30)
      expect(facade.cacheStats().cluster).toMatchObject({ hits: 1, misses: 1 })
    })

    it("should never modify block, transaction or address payloads", () => {
      const before = store.allNodes().map((node) => [node.id, node.attributes])

      facade.getDegrees()
      facade.getActivity({ colorScheme: "activity" })
      facade.getClusters({ clusterType: "transaction" })
      facade.getFlow({ startAddress: "addr_x" })

      expect(store.allNodes().map((node) => [node.id, node.attributes])).toEqual(before)
    })
  })

  // ===========================================================================
  // PARAMETERS
  // ===========================================================================

  describe("parameters", () => {
    it("should coerce numeric strings", () => {
      expect(facade.getClusters({ clusterType: "address", timeWindowBlocks: "25" }).timeWindowBlocks).toBe(25)
    })

    it("should not coerce booleans or blank strings to numbers", () => {
      expect(() => facade.getFlow({ startAddress: "addr_x", maxDepth: true })).toThrow(InvalidParameterError)
      expect(() => facade.getClusters({ clusterType: "address", timeWindowBlocks: " " })).toThrow(
        InvalidParameterError,
      )
      expect(() => facade.getAnomalies({ threshold: false })).toThrow(InvalidParameterError)
    })

    it("should name the offending parameter", () => {
      const error = thrown(() => facade.getClusters({ clusterType: "address", timeWindowBlocks: 10 }))

      expect(error).toBeInstanceOf(InvalidParameterError)
      expect(error).toMatchObject({ parameter: "timeWindowBlocks", received: 10 })
    })

    it("should reject unknown enum values", () => {
      expect(() => facade.getClusters({ clusterType: "block" })).toThrow(InvalidParameterError)
      expect(() => facade.getActivity({ colorScheme: "neon" })).toThrow(InvalidParameterError)
      expect(() => facade.getAnomalies({ method: "median" })).toThrow(InvalidParameterError)
      expect(() => facade.getDegrees({ nodeType: "utxo" })).toThrow(InvalidParameterError)
    })

    it("should reject thresholds outside (0, 10]", () => {
      expect(() => facade.getAnomalies({ threshold: 0 })).toThrow(InvalidParameterError)
      expect(() => facade.getAnomalies({ threshold: 10.5 })).toThrow(InvalidParameterError)
      expect(() => facade.getAnomalies({ threshold: "abc" })).toThrow(InvalidParameterError)
    })

    it("should require exactly one flow seed", () => {
      expect(() => facade.getFlow({})).toThrow("exactly one of startAddress or transactionId is required")
      expect(() => facade.getFlow({ startAddress: "addr_x", transactionId: "tx_a" })).toThrow(InvalidParameterError)
      expect(() => facade.getFlow({ startAddress: "addr_x", maxBlocks: 11 })).toThrow(InvalidParameterError)
    })
  })

  // ===========================================================================
  // RECALCULATION
  // ===========================================================================

  describe("recalculateAll", () => {
    it("should recompute cached queries so later reads are fresh", () => {
      const analyze = vi.spyOn(degreeAnalyzer, "analyze")
      facade.getDegrees()
      facade.getActivity({ colorScheme: "grayscale" })
      addTx(store, { id: "tx_c", height: 1, inputs: ["addr_z"], outputs: [["addr_y", 1]] })

      const summary = facade.recalculateAll()

      expect(summary.recomputed).toEqual([
        { family: "degree", key: "*" },
        { family: "activity", key: "grayscale|*" },
      ])
      expect(summary.failed).toEqual([])
      expect(summary).toMatchObject({ degreeNodes: 7, activityNodes: 7 })
      expect(facade.getDegrees({ nodeId: "addr_z" }).metrics[0]?.totalDegree).toBe(2)
      expect(analyze).toHaveBeenCalledTimes(2)
      expect(facade.isDirty("cluster")).toBe(false)
    })

    it("should compute degree and heatmap activity even when nothing was cached", () => {
      const summary = facade.recalculateAll()

      expect(summary.recomputed).toEqual([])
      expect(summary).toMatchObject({ degreeNodes: 6, activityNodes: 6 })
      expect(store.getNode("block_1")?.derived).toMatchObject({ totalDegree: 2, colorScheme: "heatmap" })
    })

    it("should report a query that fails to recompute and keep the others", () => {
      const anomalyDetector = new AnomalyDetector()
      facade = new AnalyticsFacade(transactionsWithValues([1, 1, 1, 1, 1, 1, 1, 1, 1, 100]), {
        logger: silentLogger(),
        anomalyDetector,
      })
      facade.getAnomalies({ nodeType: "transaction", method: "zscore" })
      vi.spyOn(anomalyDetector, "analyze").mockImplementation(() => {
        throw new InsufficientDataError("transaction", 0, 10)
      })

      const summary = facade.recalculateAll()

      expect(summary.failed).toEqual([
        {
          family: "anomaly",
          key: "zscore|2|transaction",
          error: "Insufficient data: transaction sample has 0 values, at least 10 required",
        },
      ])
      expect(summary.recomputed).toEqual([{ family: "degree", key: "*" }])
      expect(facade.cacheStats().anomaly.entries).toBe(0)
    })
  })
})
