export { MetricsCache } from "./metrics-cache"
export type {
  FamilyValueMap,
  MetricsCacheOptions,
  RecomputeFailure,
  RecomputeSummary,
} from "./metrics-cache"
export { FamilyCache } from "./family-cache"
export type { CacheEntry, DirtyState, FamilyStats, LookupOutcome } from "./family-cache"
