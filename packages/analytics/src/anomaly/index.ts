export {
  AnomalyDetector,
  ANOMALY_METHODS,
  ANOMALY_GROUPS,
  isAnomalyGroup,
} from "./anomaly-detector"
export type {
  AnomalyMethod,
  AnomalyGroup,
  AnomalyRecord,
  AnomalyReport,
  AnomalyDetectorOptions,
  GroupStatistics,
} from "./anomaly-detector"
export { summarize, boundaryScore } from "./statistics"
export type { SampleSummary } from "./statistics"
