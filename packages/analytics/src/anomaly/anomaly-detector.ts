/**
 * Anomaly Detector
 *
 * Flags blocks with unusual transaction counts and transactions with
 * unusual output value. Statistics are computed per call; every node of an
 * evaluated group is reported, flagged or not.
 */

import type { AnomalyType, DerivedAttributes, GraphStore, NodeType } from "@txgraph/graph"
import type { DegreeTable } from "../degree"
import { InsufficientDataError, InvalidParameterError } from "../errors"
import { silentLogger, type Logger } from "../logging"
import { boundaryScore, summarize, type SampleSummary } from "./statistics"

// =============================================================================
// TYPES
// =============================================================================

export type AnomalyMethod = "zscore" | "percentile" | "threshold"

export const ANOMALY_METHODS: readonly AnomalyMethod[] = ["zscore", "percentile", "threshold"]

export type AnomalyGroup = "block" | "transaction"

export const ANOMALY_GROUPS: readonly AnomalyGroup[] = ["block", "transaction"]

export interface AnomalyRecord {
  nodeId: string
  nodeType: AnomalyGroup
  isAnomaly: boolean
  /** 0-100 */
  anomalyScore: number
  anomalyType: AnomalyType | null
  actualValue: number
}

export interface GroupStatistics extends SampleSummary {
  metric: "transaction_count" | "transaction_value"
  /** Values at or beyond these boundaries are flagged; null when one side is never flagged */
  lowerBoundary: number | null
  upperBoundary: number | null
}

export interface AnomalyReport {
  method: AnomalyMethod
  threshold: number
  records: AnomalyRecord[]
  statistics: Partial<Record<AnomalyGroup, GroupStatistics>>
}

export interface AnomalyDetectorOptions {
  /** Smallest sample evaluated (default 10) */
  minSampleSize?: number
  logger?: Logger
}

interface Verdict {
  isAnomaly: boolean
  score: number
  direction: "high" | "low" | null
}

const METRIC_BY_GROUP = {
  block: "transaction_count",
  transaction: "transaction_value",
} as const satisfies Record<AnomalyGroup, GroupStatistics["metric"]>

export function isAnomalyGroup(type: NodeType): type is AnomalyGroup {
  return type === "block" || type === "transaction"
}

// =============================================================================
// DETECTOR
// =============================================================================

export class AnomalyDetector {
  private readonly minSampleSize: number
  private readonly logger: Logger

  constructor(options: AnomalyDetectorOptions = {}) {
    this.minSampleSize = options.minSampleSize ?? 10
    this.logger = options.logger ?? silentLogger()
  }

  /**
   * Evaluate `nodeType` (or both block and transaction groups) and write
   * `isAnomaly`, `anomalyScore` and `anomalyType` to the evaluated nodes.
   *
   * @throws InvalidParameterError for the address group or a non-positive threshold
   * @throws InsufficientDataError when an evaluated group is below the minimum sample
   */
  analyze(
    store: GraphStore,
    degrees: DegreeTable,
    method: AnomalyMethod,
    threshold: number,
    nodeType?: NodeType,
  ): AnomalyReport {
    if (!(threshold > 0)) {
      throw new InvalidParameterError(`Invalid parameter: threshold must be positive`, "threshold", threshold)
    }
    const groups = this.groupsFor(nodeType)

    const samples = new Map<AnomalyGroup, Array<{ nodeId: string; value: number }>>()
    for (const group of groups) {
      const sample = extractSample(store, degrees, group)
      if (sample.length < this.minSampleSize) {
        throw new InsufficientDataError(group, sample.length, this.minSampleSize)
      }
      samples.set(group, sample)
    }

    const records: AnomalyRecord[] = []
    const statistics: AnomalyReport["statistics"] = {}
    for (const [group, sample] of samples) {
      const summary = summarize(sample.map((s) => s.value))
      const { lower, upper, judge } = rule(method, threshold, summary)
      statistics[group] = {
        ...summary,
        metric: METRIC_BY_GROUP[group],
        lowerBoundary: lower,
        upperBoundary: upper,
      }

      for (const { nodeId, value } of sample) {
        const verdict = judge(value)
        records.push({
          nodeId,
          nodeType: group,
          isAnomaly: verdict.isAnomaly,
          anomalyScore: verdict.score,
          anomalyType: verdict.direction ? `${verdict.direction}_${METRIC_BY_GROUP[group]}` : null,
          actualValue: value,
        })
      }
    }

    const report = { method, threshold, records, statistics }
    store.applyDerived(this.derivedAttributes(report))
    this.logger.debug("anomalies evaluated", {
      method,
      threshold,
      groups,
      flagged: records.filter((r) => r.isAnomaly).length,
    })
    return report
  }

  /**
   * Derived attribute patches carried by a report.
   */
  derivedAttributes(report: AnomalyReport): Array<[string, DerivedAttributes]> {
    return report.records.map((r): [string, DerivedAttributes] => [
      r.nodeId,
      { isAnomaly: r.isAnomaly, anomalyScore: r.anomalyScore, anomalyType: r.anomalyType },
    ])
  }

  private groupsFor(nodeType: NodeType | undefined): readonly AnomalyGroup[] {
    if (nodeType === undefined) return ANOMALY_GROUPS
    if (!isAnomalyGroup(nodeType)) {
      throw new InvalidParameterError(
        `Invalid parameter: anomaly detection supports block and transaction nodes, got ${nodeType}`,
        "nodeType",
        nodeType,
      )
    }
    return [nodeType]
  }
}

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Block samples reuse the degree table's transaction count; transaction
 * samples sum the weights of outgoing output edges.
 */
function extractSample(
  store: GraphStore,
  degrees: DegreeTable,
  group: AnomalyGroup,
): Array<{ nodeId: string; value: number }> {
  if (group === "block") {
    return store.nodesOfType("block").map((node) => ({
      nodeId: node.id,
      value: degrees.get(node.id)?.typeDegree ?? 0,
    }))
  }
  return store.nodesOfType("transaction").map((node) => ({
    nodeId: node.id,
    value: store
      .incidentEdges(node.id, "out", "tx_outputs_address")
      .reduce((sum, edge) => sum + (edge.weight ?? 0), 0),
  }))
}

function rule(
  method: AnomalyMethod,
  threshold: number,
  s: SampleSummary,
): { lower: number | null; upper: number | null; judge: (value: number) => Verdict } {
  const calm: Verdict = { isAnomaly: false, score: 0, direction: null }

  switch (method) {
    case "zscore": {
      const band = threshold * s.std
      return {
        lower: s.mean - band,
        upper: s.mean + band,
        judge: (value) => {
          if (band === 0) return calm
          const distance = Math.abs(value - s.mean)
          const score = Math.min(100, (100 * distance) / band)
          if (distance <= band) return { ...calm, score }
          return { isAnomaly: true, score, direction: value > s.mean ? "high" : "low" }
        },
      }
    }

    case "percentile":
      // No spread means no outliers
      if (s.p5 === s.p95) {
        return { lower: s.p5, upper: s.p95, judge: () => calm }
      }
      return {
        lower: s.p5,
        upper: s.p95,
        judge: (value) => {
          if (value >= s.p95) {
            return { isAnomaly: true, score: boundaryScore(value, s.p95, s.max), direction: "high" }
          }
          if (value <= s.p5) {
            return { isAnomaly: true, score: boundaryScore(value, s.p5, s.min), direction: "low" }
          }
          return calm
        },
      }

    case "threshold": {
      const limit = threshold * s.mean
      return {
        lower: null,
        upper: limit,
        judge: (value) => {
          if (value <= limit) return calm
          return { isAnomaly: true, score: boundaryScore(value, limit, s.max), direction: "high" }
        },
      }
    }
  }
}
