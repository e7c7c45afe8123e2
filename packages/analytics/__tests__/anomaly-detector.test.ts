import { describe, it, expect } from "vitest"
import { GraphStore } from "@txgraph/graph"
import {
  AnomalyDetector,
  InsufficientDataError,
  InvalidParameterError,
  computeDegrees,
  summarize,
  type AnomalyRecord,
} from "../src"
import { addTx, transactionsWithValues } from "./fixtures/graphs"

function detect(store: GraphStore, method: "zscore" | "percentile" | "threshold", threshold = 2) {
  return new AnomalyDetector().analyze(store, computeDegrees(store), method, threshold, "transaction")
}

function flaggedValues(records: AnomalyRecord[]): number[] {
  return records
    .filter((r) => r.isAnomaly)
    .map((r) => r.actualValue)
    .sort((a, b) => a - b)
}

describe("summarize", () => {
  it("should use population standard deviation", () => {
    const s = summarize([2, 4, 4, 4, 5, 5, 7, 9])

    expect(s.mean).toBe(5)
    expect(s.std).toBe(2)
    expect(s.min).toBe(2)
    expect(s.max).toBe(9)
  })

  it("should take percentile boundaries as order statistics", () => {
    const values = Array.from({ length: 20 }, (_, i) => 20 - i)

    expect(summarize(values)).toMatchObject({ p5: 2, p95: 19 })
  })
})

describe("AnomalyDetector", () => {
  describe("zscore", () => {
    it("should flag the outlier and none of the common values", () => {
      const store = transactionsWithValues([1, 1, 1, 1, 1, 1, 1, 1, 1, 100])

      const report = detect(store, "zscore")

      expect(flaggedValues(report.records)).toEqual([100])
      const outlier = report.records.find((r) => r.nodeId === "tx_9")
      expect(outlier).toMatchObject({ isAnomaly: true, anomalyScore: 100, anomalyType: "high_transaction_value" })
      const common = report.records.find((r) => r.nodeId === "tx_0")
      expect(common?.anomalyType).toBeNull()
      expect(common?.anomalyScore).toBeCloseTo(16.667, 2)
      expect(report.statistics.transaction?.mean).toBeCloseTo(10.9, 10)
      expect(report.statistics.transaction?.std).toBeCloseTo(29.7, 10)
    })

    it("should flag nothing when every value is equal", () => {
      const store = transactionsWithValues(Array.from({ length: 12 }, () => 5))

      const report = detect(store, "zscore")

      expect(flaggedValues(report.records)).toEqual([])
      expect(report.records.every((r) => r.anomalyScore === 0)).toBe(true)
    })
  })

  describe("percentile", () => {
    it("should flag values at or beyond the 5th and 95th percentiles", () => {
      const store = transactionsWithValues(Array.from({ length: 20 }, (_, i) => i + 1))

      const report = detect(store, "percentile")

      expect(flaggedValues(report.records)).toEqual([1, 2, 19, 20])
      expect(report.statistics.transaction).toMatchObject({
        p5: 2,
        p95: 19,
        lowerBoundary: 2,
        upperBoundary: 19,
      })
    })

    it("should score from 50 at the boundary to 100 at the extreme", () => {
      const store = transactionsWithValues(Array.from({ length: 20 }, (_, i) => i + 1))
      const byValue = new Map(detect(store, "percentile").records.map((r) => [r.actualValue, r]))

      expect(byValue.get(19)).toMatchObject({ anomalyScore: 50, anomalyType: "high_transaction_value" })
      expect(byValue.get(20)).toMatchObject({ anomalyScore: 100, anomalyType: "high_transaction_value" })
      expect(byValue.get(2)).toMatchObject({ anomalyScore: 50, anomalyType: "low_transaction_value" })
      expect(byValue.get(1)).toMatchObject({ anomalyScore: 100, anomalyType: "low_transaction_value" })
      expect(byValue.get(10)).toMatchObject({ isAnomaly: false, anomalyScore: 0, anomalyType: null })
    })
  })

  describe("threshold", () => {
    it("should flag values above threshold times the mean", () => {
      const store = transactionsWithValues([10, 10, 10, 10, 10, 10, 10, 10, 40, 60])

      const report = detect(store, "threshold", 2)
      const byValue = new Map(report.records.map((r) => [r.actualValue, r]))

      expect(flaggedValues(report.records)).toEqual([40, 60])
      expect(report.statistics.transaction?.upperBoundary).toBe(36)
      expect(report.statistics.transaction?.lowerBoundary).toBeNull()
      expect(byValue.get(40)?.anomalyScore).toBeCloseTo(58.333, 2)
      expect(byValue.get(60)?.anomalyScore).toBe(100)
      expect(byValue.get(10)?.anomalyScore).toBe(0)
    })
  })

  describe("groups", () => {
    it("should evaluate block transaction counts and transaction values when unfiltered", () => {
      const store = new GraphStore()
      const counts = [1, 1, 1, 1, 1, 1, 1, 1, 1, 10]
      counts.forEach((count, b) => {
        for (let t = 0; t < count; t++) {
          addTx(store, { id: `tx_${b}_${t}`, height: b + 1, outputs: [[`addr_${b}_${t}`, 5]] })
        }
      })

      const report = new AnomalyDetector().analyze(store, computeDegrees(store), "zscore", 2)

      expect(Object.keys(report.statistics).sort()).toEqual(["block", "transaction"])
      expect(report.records).toHaveLength(10 + 19)
      expect(report.records.filter((r) => r.isAnomaly).map((r) => r.nodeId)).toEqual(["block_10"])
      expect(report.records.find((r) => r.nodeId === "block_10")?.anomalyType).toBe("high_transaction_count")
      expect(report.statistics.block).toMatchObject({ metric: "transaction_count", size: 10 })
    })

    it("should write anomaly attributes to the evaluated nodes", () => {
      const store = transactionsWithValues([1, 1, 1, 1, 1, 1, 1, 1, 1, 100])

      detect(store, "zscore")

      expect(store.getNode("tx_9")?.derived).toEqual({
        isAnomaly: true,
        anomalyScore: 100,
        anomalyType: "high_transaction_value",
      })
      expect(store.getNode("tx_0")?.derived.isAnomaly).toBe(false)
      expect(store.getNode("addr_9")?.derived).toEqual({})
    })

    it("should reject the address group", () => {
      const store = transactionsWithValues(Array.from({ length: 12 }, (_, i) => i))

      expect(() =>
        new AnomalyDetector().analyze(store, computeDegrees(store), "zscore", 2, "address"),
      ).toThrow(InvalidParameterError)
    })
  })

  describe("insufficient data", () => {
    it("should fail below the minimum sample without writing anything", () => {
      const store = transactionsWithValues([1, 2, 3, 4, 5, 6, 7, 8, 100])

      expect(() => detect(store, "zscore")).toThrow(InsufficientDataError)
      expect(store.getNode("tx_8")?.derived).toEqual({})
    })

    it("should fail when any evaluated group is too small", () => {
      const store = transactionsWithValues(Array.from({ length: 12 }, (_, i) => i))

      expect(() => new AnomalyDetector().analyze(store, computeDegrees(store), "percentile", 2)).toThrow(
        "Insufficient data: block sample has 1 values, at least 10 required",
      )
    })

    it("should honor a configured minimum sample", () => {
      const store = transactionsWithValues([1, 2, 3, 4, 5])

      const report = new AnomalyDetector({ minSampleSize: 5 }).analyze(
        store,
        computeDegrees(store),
        "percentile",
        2,
        "transaction",
      )

      expect(flaggedValues(report.records)).toEqual([1, 5])
    })
  })
})
