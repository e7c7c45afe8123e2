export { DegreeAnalyzer, computeDegrees } from "./degree-analyzer"
export type { DegreeAnalyzerOptions, DegreeRecord, DegreeTable } from "./degree-analyzer"
