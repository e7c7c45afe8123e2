/**
 * Activity Color Mapper
 *
 * Normalizes a raw activity metric to 0-100 within each node-type group
 * and maps it to a display color. The raw metric is the node's
 * `typeDegree`: transactions per block, inputs plus outputs per
 * transaction, UTxO-carrying edges per address.
 */

import {
  NODE_TYPES,
  type ColorScheme,
  type DerivedAttributes,
  type GraphStore,
  type NodeType,
} from "@txgraph/graph"
import type { DegreeTable } from "../degree"
import { silentLogger, type Logger } from "../logging"
import { hslToHex, schemeToHsl, type Hsl } from "./color"

export interface ActivityRecord {
  nodeId: string
  nodeType: NodeType
  rawValue: number
  normalizedValue: number
  colorHex: string
  colorHsl: Hsl
}

export interface ValueRange {
  min: number
  max: number
}

export interface ActivityReport {
  colorScheme: ColorScheme
  metrics: ActivityRecord[]
  /** Min and max raw value per evaluated group; null for an empty group */
  ranges: Partial<Record<NodeType, ValueRange | null>>
}

/**
 * Min-max normalization to 0-100. A range with max equal to min maps
 * every value to 50.
 */
export function normalize(value: number, range: ValueRange): number {
  if (range.max === range.min) return 50
  return ((value - range.min) / (range.max - range.min)) * 100
}

export interface ActivityColorMapperOptions {
  logger?: Logger
}

export class ActivityColorMapper {
  private readonly logger: Logger

  constructor(options: ActivityColorMapperOptions = {}) {
    this.logger = options.logger ?? silentLogger()
  }

  /**
   * Compute activity for `groups` from a degree table and write
   * `activityScore`, `color` and `colorScheme` to the evaluated nodes.
   */
  analyze(
    store: GraphStore,
    degrees: DegreeTable,
    colorScheme: ColorScheme,
    groups: readonly NodeType[] = NODE_TYPES,
  ): ActivityReport {
    const byGroup = new Map<NodeType, Array<{ nodeId: string; rawValue: number }>>()
    for (const group of groups) byGroup.set(group, [])
    for (const record of degrees.values()) {
      byGroup.get(record.nodeType)?.push({ nodeId: record.nodeId, rawValue: record.typeDegree })
    }

    const metrics: ActivityRecord[] = []
    const ranges: ActivityReport["ranges"] = {}
    for (const [group, samples] of byGroup) {
      if (samples.length === 0) {
        ranges[group] = null
        continue
      }
      const values = samples.map((s) => s.rawValue)
      const range = { min: Math.min(...values), max: Math.max(...values) }
      ranges[group] = range

      for (const { nodeId, rawValue } of samples) {
        const normalizedValue = normalize(rawValue, range)
        const colorHsl = schemeToHsl(normalizedValue, colorScheme)
        metrics.push({
          nodeId,
          nodeType: group,
          rawValue,
          normalizedValue,
          colorHex: hslToHex(colorHsl),
          colorHsl,
        })
      }
    }

    const report = { colorScheme, metrics, ranges }
    store.applyDerived(this.derivedAttributes(report))
    this.logger.debug("activity mapped", { colorScheme, groups, nodes: metrics.length })
    return report
  }

  /**
   * Derived attribute patches carried by a report.
   */
  derivedAttributes(report: ActivityReport): Array<[string, DerivedAttributes]> {
    return report.metrics.map((m): [string, DerivedAttributes] => [
      m.nodeId,
      { activityScore: m.normalizedValue, color: m.colorHex, colorScheme: report.colorScheme },
    ])
  }
}
