/**
 * Analytics Facade
 *
 * Query entry point for the rendering layer. Every query validates its
 * parameters, routes through the MetricsCache and only ever writes derived
 * attributes; block, transaction and address payloads are never touched.
 * A cached answer re-applies its derived attributes, so the graph always
 * reflects the last query served. Callers get copies of cached results.
 */

import { NODE_TYPES, type GraphStore, type MetricFamily, type NodeType } from "@txgraph/graph"
import { ActivityColorMapper, type ActivityRecord, type ActivityReport } from "../activity"
import { AnomalyDetector, ANOMALY_GROUPS, isAnomalyGroup, type AnomalyReport } from "../anomaly"
import { MetricsCache, type FamilyStats, type RecomputeSummary } from "../cache"
import { ClusterDetector, type ClusterReport } from "../cluster"
import { resolveConfig, type AnalyticsConfig } from "../config"
import { DegreeAnalyzer, type DegreeRecord, type DegreeTable } from "../degree"
import { FlowPathFinder, type FlowReport, type FlowSeed } from "../flow"
import { componentLogger, createLogger, timed, type Logger } from "../logging"
import {
  activityQuerySchema,
  anomalyQuerySchema,
  clusterQuerySchema,
  flowQuerySchema,
  nodeFilterSchema,
  parseParams,
  type ActivityQuery,
  type AnomalyQuery,
  type ClusterQuery,
  type FlowQuery,
  type NodeFilter,
  type RawParams,
} from "./params"

// =============================================================================
// TYPES
// =============================================================================

/**
 * Value cached for each metric family.
 */
export interface AnalyticsValues {
  degree: DegreeTable
  activity: ActivityReport
  anomaly: AnomalyReport
  cluster: ClusterReport
  flow: FlowReport
}

export interface DegreeResult {
  metrics: DegreeRecord[]
  total: number
}

export interface ActivityResult extends ActivityReport {
  total: number
}

export interface AnomalyResult extends AnomalyReport {
  total: number
  anomalyCount: number
}

export interface RecalculateSummary extends RecomputeSummary {
  degreeNodes: number
  activityNodes: number
}

export interface AnalyticsFacadeOptions {
  config?: Partial<AnalyticsConfig>
  logger?: Logger
  degreeAnalyzer?: DegreeAnalyzer
  activityMapper?: ActivityColorMapper
  anomalyDetector?: AnomalyDetector
  clusterDetector?: ClusterDetector
  flowPathFinder?: FlowPathFinder
}

const ALL = "*"

// =============================================================================
// FACADE
// =============================================================================

export class AnalyticsFacade {
  readonly config: AnalyticsConfig
  private readonly cache: MetricsCache<AnalyticsValues>
  private readonly logger: Logger
  private readonly degreeAnalyzer: DegreeAnalyzer
  private readonly activityMapper: ActivityColorMapper
  private readonly anomalyDetector: AnomalyDetector
  private readonly clusterDetector: ClusterDetector
  private readonly flowPathFinder: FlowPathFinder
  private readonly unsubscribe: () => void

  constructor(
    private readonly store: GraphStore,
    options: AnalyticsFacadeOptions = {},
  ) {
    this.config = resolveConfig(options.config)
    const root = options.logger ?? createLogger(this.config)
    this.logger = componentLogger(root, "facade")

    this.cache = new MetricsCache<AnalyticsValues>({ logger: componentLogger(root, "metrics-cache") })
    this.degreeAnalyzer = options.degreeAnalyzer ?? new DegreeAnalyzer({ logger: componentLogger(root, "degree") })
    this.activityMapper =
      options.activityMapper ?? new ActivityColorMapper({ logger: componentLogger(root, "activity") })
    this.anomalyDetector =
      options.anomalyDetector ??
      new AnomalyDetector({
        minSampleSize: this.config.anomalyMinSample,
        logger: componentLogger(root, "anomaly"),
      })
    this.clusterDetector = options.clusterDetector ?? new ClusterDetector({ logger: componentLogger(root, "cluster") })
    this.flowPathFinder =
      options.flowPathFinder ??
      new FlowPathFinder({
        maxPaths: this.config.flowMaxPaths,
        maxResults: this.config.flowMaxResults,
        logger: componentLogger(root, "flow"),
      })

    this.unsubscribe = store.subscribe(this.cache)
  }

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  getDegrees(params: RawParams<NodeFilter> = {}): DegreeResult {
    const filter = parseParams(nodeFilterSchema, params)
    const metrics = Array.from(this.degreeTable().values())
      .filter((record) => matches(record.nodeId, record.nodeType, filter))
      .map((record) => ({ ...record }))
    return { metrics, total: metrics.length }
  }

  getActivity(params: RawParams<ActivityQuery> = {}): ActivityResult {
    const query = parseParams(activityQuerySchema, params)
    const groups: readonly NodeType[] = query.nodeType ? [query.nodeType] : NODE_TYPES
    const key = `${query.colorScheme}|${query.nodeType ?? ALL}`

    const report = this.cache.resolve(
      "activity",
      key,
      groups,
      () => this.activityMapper.analyze(this.store, this.degreeTable(), query.colorScheme, groups),
      (cached) => this.store.applyDerived(this.activityMapper.derivedAttributes(cached)),
    )
    const metrics = report.metrics.filter((m: ActivityRecord) => matches(m.nodeId, m.nodeType, query))
    return structuredClone({ ...report, metrics, total: metrics.length })
  }

  /**
   * @throws InsufficientDataError when an evaluated group is too small
   * @throws InvalidParameterError for the address group
   */
  getAnomalies(params: RawParams<AnomalyQuery> = {}): AnomalyResult {
    const query = parseParams(anomalyQuerySchema, params)
    const groups = query.nodeType && isAnomalyGroup(query.nodeType) ? [query.nodeType] : ANOMALY_GROUPS
    const key = `${query.method}|${query.threshold}|${query.nodeType ?? ALL}`

    const report = this.cache.resolve(
      "anomaly",
      key,
      groups,
      () => this.anomalyDetector.analyze(this.store, this.degreeTable(), query.method, query.threshold, query.nodeType),
      (cached) => this.store.applyDerived(this.anomalyDetector.derivedAttributes(cached)),
    )
    const records = report.records.filter((r) => matches(r.nodeId, r.nodeType, query))
    return structuredClone({
      ...report,
      records,
      total: records.length,
      anomalyCount: records.filter((r) => r.isAnomaly).length,
    })
  }

  getClusters(params: RawParams<ClusterQuery>): ClusterReport {
    const query = parseParams(clusterQuerySchema, params)
    const key = `${query.clusterType}|${query.timeWindowBlocks}`

    const report = this.cache.resolve(
      "cluster",
      key,
      NODE_TYPES,
      () => this.clusterDetector.analyze(this.store, query.clusterType, query.timeWindowBlocks),
      (cached) => this.store.applyDerived(this.clusterDetector.derivedAttributes(this.store, cached)),
    )
    return structuredClone(report)
  }

  /**
   * @throws NotFoundError when the seed is unknown or has the wrong type
   */
  getFlow(params: RawParams<FlowQuery>): FlowReport {
    const query = parseParams(flowQuerySchema, params)
    const seed: FlowSeed =
      query.startAddress !== undefined
        ? { kind: "address", id: query.startAddress }
        : { kind: "transaction", id: query.transactionId ?? "" }
    const key = `${seed.kind}:${seed.id}|${query.maxDepth}|${query.maxBlocks}`

    const report = this.cache.resolve("flow", key, NODE_TYPES, () =>
      this.flowPathFinder.find(this.store, seed, query.maxDepth, query.maxBlocks),
    )
    return structuredClone(report)
  }

  // ===========================================================================
  // RECALCULATION
  // ===========================================================================

  /**
   * Invalidate every family, then recompute the degree table, the heatmap
   * activity table and every cached query before returning.
   */
  recalculateAll(): RecalculateSummary {
    const { value, durationMs } = timed(() => {
      this.cache.invalidateAll()
      const summary = this.cache.recomputeAll()
      const degrees = this.degreeTable()
      const activity = this.getActivity({ colorScheme: "heatmap" })
      return { ...summary, degreeNodes: degrees.size, activityNodes: activity.total }
    })

    const summary = { ...value, durationMs }
    this.logger.info("recalculated all metrics", {
      recomputed: summary.recomputed.length,
      failed: summary.failed.length,
      durationMs,
    })
    return summary
  }

  // ===========================================================================
  // INSPECTION
  // ===========================================================================

  cacheStats(): Record<MetricFamily, FamilyStats> {
    return this.cache.stats()
  }

  isDirty(family: MetricFamily): boolean {
    return this.cache.isDirty(family)
  }

  /**
   * Stop listening to graph mutations.
   */
  dispose(): void {
    this.unsubscribe()
  }

  private degreeTable(): DegreeTable {
    return this.cache.resolve("degree", ALL, NODE_TYPES, () => this.degreeAnalyzer.analyze(this.store))
  }
}

function matches(nodeId: string, nodeType: NodeType, filter: NodeFilter): boolean {
  return (filter.nodeType === undefined || filter.nodeType === nodeType) && (filter.nodeId === undefined || filter.nodeId === nodeId)
}
