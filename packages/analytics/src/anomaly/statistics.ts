/**
 * Sample statistics for anomaly detection.
 */

export interface SampleSummary {
  size: number
  mean: number
  /** Population standard deviation */
  std: number
  min: number
  max: number
  p5: number
  p95: number
}

/**
 * Summarize a non-empty sample. Percentile boundaries are order
 * statistics: with k = floor(0.05 * n), p5 is the (k+1)-th smallest value
 * and p95 the (k+1)-th largest.
 */
export function summarize(values: readonly number[]): SampleSummary {
  const size = values.length
  const sorted = [...values].sort((a, b) => a - b)
  const mean = values.reduce((sum, v) => sum + v, 0) / size
  const variance = values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / size
  const k = Math.floor(0.05 * size)

  return {
    size,
    mean,
    std: Math.sqrt(variance),
    min: sorted[0] ?? 0,
    max: sorted[size - 1] ?? 0,
    p5: sorted[k] ?? 0,
    p95: sorted[size - 1 - k] ?? 0,
  }
}

/**
 * Linear score from 50 at `boundary` to 100 at `extreme`.
 */
export function boundaryScore(value: number, boundary: number, extreme: number): number {
  const span = Math.abs(extreme - boundary)
  if (span === 0) return 100
  return Math.min(100, 50 + (50 * Math.abs(value - boundary)) / span)
}
