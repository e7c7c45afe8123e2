/**
 * Cluster Detector
 *
 * Groups addresses or transactions of the trailing block window into
 * communities of repeated interaction. Communities are numbered from 0 by
 * descending size (ties broken by smallest member id). Singletons are not
 * clusters: they get clusterId -1 and are reported as unclustered.
 */

import type { ClusterType, DerivedAttributes, GraphStore } from "@txgraph/graph"
import { InvalidParameterError } from "../errors"
import { silentLogger, type Logger } from "../logging"
import { greedyModularity } from "./modularity"
import {
  buildProjection,
  compareIds,
  trailingWindow,
  windowTransactions,
  type BlockWindow,
} from "./projection"

export const CLUSTER_PALETTE: readonly string[] = [
  "#ff5733",
  "#33ff57",
  "#3357ff",
  "#ff33f5",
  "#f5ff33",
  "#33fff5",
  "#ff8c33",
  "#8c33ff",
  "#33ff8c",
  "#ff338c",
]

export const MIN_WINDOW_BLOCKS = 20
export const MAX_WINDOW_BLOCKS = 50
export const DEFAULT_WINDOW_BLOCKS = 30

export interface ClusterRecord {
  clusterId: number
  nodeIds: string[]
  size: number
  colorHex: string
}

export interface ClusterReport {
  clusterType: ClusterType
  timeWindowBlocks: number
  /** null when the graph has no blocks */
  window: BlockWindow | null
  clusters: ClusterRecord[]
  unclustered: string[]
  totalClusters: number
  nodesClustered: number
  /** Nodes in the projection */
  totalNodes: number
  modularity: number
}

export function clusterColor(clusterId: number): string {
  return CLUSTER_PALETTE[clusterId % CLUSTER_PALETTE.length] ?? "#cccccc"
}

export interface ClusterDetectorOptions {
  logger?: Logger
}

export class ClusterDetector {
  private readonly logger: Logger

  constructor(options: ClusterDetectorOptions = {}) {
    this.logger = options.logger ?? silentLogger()
  }

  /**
   * Detect communities and write `clusterId`, `clusterType` and
   * `clusterColor` to every node of the clustered type.
   */
  analyze(store: GraphStore, clusterType: ClusterType, timeWindowBlocks = DEFAULT_WINDOW_BLOCKS): ClusterReport {
    if (
      !Number.isInteger(timeWindowBlocks) ||
      timeWindowBlocks < MIN_WINDOW_BLOCKS ||
      timeWindowBlocks > MAX_WINDOW_BLOCKS
    ) {
      throw new InvalidParameterError(
        `Invalid parameter: timeWindowBlocks must be an integer in [${MIN_WINDOW_BLOCKS}, ${MAX_WINDOW_BLOCKS}]`,
        "timeWindowBlocks",
        timeWindowBlocks,
      )
    }

    const window = trailingWindow(store, timeWindowBlocks)
    const transactions = window ? windowTransactions(store, window) : []
    const projection = buildProjection(store, clusterType, transactions)
    const { communities, modularity } = greedyModularity(projection)

    const ranked = communities
      .filter((members) => members.length > 1)
      .sort((x, y) => y.length - x.length || compareIds(x[0] ?? "", y[0] ?? ""))
    const clusters = ranked.map((nodeIds, clusterId) => ({
      clusterId,
      nodeIds,
      size: nodeIds.length,
      colorHex: clusterColor(clusterId),
    }))
    const unclustered = communities
      .filter((members) => members.length === 1)
      .flat()
      .sort(compareIds)

    const report: ClusterReport = {
      clusterType,
      timeWindowBlocks,
      window: window ?? null,
      clusters,
      unclustered,
      totalClusters: clusters.length,
      nodesClustered: clusters.reduce((sum, cluster) => sum + cluster.size, 0),
      totalNodes: projection.order,
      modularity,
    }
    store.applyDerived(this.derivedAttributes(store, report))
    this.logger.debug("clusters detected", {
      clusterType,
      window: report.window,
      clusters: clusters.length,
      modularity,
    })
    return report
  }

  /**
   * Derived attribute patches for every node of the report's cluster type.
   */
  derivedAttributes(store: GraphStore, report: ClusterReport): Array<[string, DerivedAttributes]> {
    const assigned = new Map<string, ClusterRecord>()
    for (const cluster of report.clusters) {
      for (const id of cluster.nodeIds) assigned.set(id, cluster)
    }
    return store.nodesOfType(report.clusterType).map((node): [string, DerivedAttributes] => {
      const cluster = assigned.get(node.id)
      return [
        node.id,
        {
          clusterId: cluster ? cluster.clusterId : -1,
          clusterType: report.clusterType,
          clusterColor: cluster?.colorHex,
        },
      ]
    })
  }
}
