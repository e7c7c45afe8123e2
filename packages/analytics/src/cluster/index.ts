export {
  ClusterDetector,
  CLUSTER_PALETTE,
  MIN_WINDOW_BLOCKS,
  MAX_WINDOW_BLOCKS,
  DEFAULT_WINDOW_BLOCKS,
  clusterColor,
} from "./cluster-detector"
export type { ClusterDetectorOptions, ClusterRecord, ClusterReport } from "./cluster-detector"
export { greedyModularity } from "./modularity"
export type { CommunityResult } from "./modularity"
export {
  buildProjection,
  trailingWindow,
  inWindow,
  windowTransactions,
  compareIds,
} from "./projection"
export type { BlockWindow, LinkAttributes, ProjectionGraph } from "./projection"
