/**
 * txgraph Analytics
 *
 * Derived metrics over a `@txgraph/graph` store: degrees, activity colors,
 * anomalies, clusters and value-flow paths, cached per metric family and
 * invalidated by graph mutations.
 *
 * @example
 * ```typescript
 * import { GraphStore } from '@txgraph/graph';
 * import { AnalyticsFacade, loadConfig } from '@txgraph/analytics';
 *
 * const store = new GraphStore();
 * const analytics = new AnalyticsFacade(store, { config: loadConfig() });
 *
 * analytics.getActivity({ nodeType: 'block', colorScheme: 'heatmap' });
 * analytics.getFlow({ transactionId: 'tx_aa01', maxDepth: 3 });
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// FACADE
// =============================================================================

export {
  AnalyticsFacade,
  nodeFilterSchema,
  activityQuerySchema,
  anomalyQuerySchema,
  clusterQuerySchema,
  flowQuerySchema,
  parseParams,
} from "./facade"
export type {
  AnalyticsValues,
  AnalyticsFacadeOptions,
  DegreeResult,
  ActivityResult,
  AnomalyResult,
  RecalculateSummary,
  NodeFilter,
  ActivityQuery,
  AnomalyQuery,
  ClusterQuery,
  FlowQuery,
  RawParams,
} from "./facade"

// =============================================================================
// CACHE
// =============================================================================

export { MetricsCache, FamilyCache } from "./cache"
export type {
  FamilyValueMap,
  MetricsCacheOptions,
  RecomputeFailure,
  RecomputeSummary,
  CacheEntry,
  DirtyState,
  FamilyStats,
} from "./cache"

// =============================================================================
// ANALYZERS
// =============================================================================

export { DegreeAnalyzer, computeDegrees } from "./degree"
export type { DegreeAnalyzerOptions, DegreeRecord, DegreeTable } from "./degree"

export { ActivityColorMapper, normalize, COLOR_SCHEMES, schemeToHsl, hslToRgb, rgbToHex, hslToHex } from "./activity"
export type { ActivityColorMapperOptions, ActivityRecord, ActivityReport, ValueRange, Hsl, Rgb } from "./activity"

export { AnomalyDetector, ANOMALY_METHODS, ANOMALY_GROUPS, summarize } from "./anomaly"
export type {
  AnomalyDetectorOptions,
  AnomalyMethod,
  AnomalyGroup,
  AnomalyRecord,
  AnomalyReport,
  GroupStatistics,
  SampleSummary,
} from "./anomaly"

export { ClusterDetector, CLUSTER_PALETTE, greedyModularity, buildProjection } from "./cluster"
export type {
  ClusterDetectorOptions,
  ClusterRecord,
  ClusterReport,
  CommunityResult,
  BlockWindow,
  ProjectionGraph,
} from "./cluster"

export { FlowPathFinder } from "./flow"
export type { FlowPathFinderOptions, FlowSeed, FlowEdge, FlowPath, FlowReport } from "./flow"

// =============================================================================
// AMBIENT
// =============================================================================

export { InsufficientDataError, InvalidParameterError, NotFoundError } from "./errors"
export { analyticsConfigSchema, defaultConfig, loadConfig, resolveConfig } from "./config"
export type { AnalyticsConfig, LogLevel } from "./config"
export { createLogger, componentLogger, silentLogger } from "./logging"
export type { Logger } from "./logging"
