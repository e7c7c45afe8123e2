export { AnalyticsFacade } from "./analytics-facade"
export type {
  AnalyticsValues,
  AnalyticsFacadeOptions,
  DegreeResult,
  ActivityResult,
  AnomalyResult,
  RecalculateSummary,
} from "./analytics-facade"
export {
  nodeFilterSchema,
  activityQuerySchema,
  anomalyQuerySchema,
  clusterQuerySchema,
  flowQuerySchema,
  parseParams,
} from "./params"
export type {
  NodeFilter,
  ActivityQuery,
  AnomalyQuery,
  ClusterQuery,
  FlowQuery,
  RawParams,
} from "./params"
