export {
  FlowPathFinder,
  MIN_FLOW_DEPTH,
  MAX_FLOW_DEPTH,
  MIN_FLOW_BLOCKS,
  MAX_FLOW_BLOCKS,
} from "./flow-path-finder"
export type {
  FlowSeed,
  FlowEdge,
  FlowPath,
  FlowReport,
  FlowPathFinderOptions,
} from "./flow-path-finder"
