/**
 * Metrics Cache
 *
 * Listens to graph mutations and keeps one FamilyCache per metric family.
 * Degree, activity and anomaly results depend on whole node-type groups
 * (normalization and statistics use the full sample), so a mutation marks
 * the touched groups dirty. Cluster and flow results depend on window
 * membership, so any mutation marks them dirty as a whole.
 */

import {
  METRIC_FAMILIES,
  type GraphMutationEvent,
  type GraphMutationListener,
  type MetricFamily,
  type NodeType,
} from "@txgraph/graph"
import { silentLogger, timed, type Logger } from "../logging"
import { FamilyCache, type DirtyState, type FamilyStats } from "./family-cache"

const GROUP_SCOPED: ReadonlySet<MetricFamily> = new Set<MetricFamily>(["degree", "activity", "anomaly"])

export type FamilyValueMap = Record<MetricFamily, unknown>

export interface RecomputeFailure {
  family: MetricFamily
  key: string
  error: string
}

export interface RecomputeSummary {
  recomputed: Array<{ family: MetricFamily; key: string }>
  failed: RecomputeFailure[]
  durationMs: number
}

export interface MetricsCacheOptions {
  logger?: Logger
}

export class MetricsCache<V extends FamilyValueMap> implements GraphMutationListener {
  private readonly families: { [F in MetricFamily]: FamilyCache<V[F]> }
  private readonly logger: Logger

  constructor(options: MetricsCacheOptions = {}) {
    this.logger = options.logger ?? silentLogger()
    this.families = {
      degree: new FamilyCache<V["degree"]>("degree"),
      activity: new FamilyCache<V["activity"]>("activity"),
      anomaly: new FamilyCache<V["anomaly"]>("anomaly"),
      cluster: new FamilyCache<V["cluster"]>("cluster"),
      flow: new FamilyCache<V["flow"]>("flow"),
    }
  }

  // ===========================================================================
  // NOTIFICATIONS
  // ===========================================================================

  notify(event: GraphMutationEvent): void {
    for (const family of event.affectedFamilies) {
      const cache = this.families[family]
      if (GROUP_SCOPED.has(family)) {
        cache.markGroups(event.affectedGroups, event.changedNodeIds)
      } else {
        cache.markAll(event.changedNodeIds)
      }
    }
  }

  invalidateAll(): void {
    for (const family of METRIC_FAMILIES) {
      this.families[family].markAll()
    }
    this.logger.debug("all metric families invalidated")
  }

  // ===========================================================================
  // LOOKUP
  // ===========================================================================

  /**
   * Cached result for `key` in `family`. Stale entries are dropped first;
   * on a miss `compute` runs and its result is stored with `groups` as
   * its dependencies. `onHit` runs with the cached value when no
   * computation was needed.
   */
  resolve<F extends MetricFamily>(
    family: F,
    key: string,
    groups: Iterable<NodeType>,
    compute: () => V[F],
    onHit?: (value: V[F]) => void,
  ): V[F] {
    const cache = this.families[family]
    const dropped = cache.sweep()
    if (dropped.length > 0) {
      this.logger.debug("stale entries dropped", { family, keys: dropped })
    }

    const { value, outcome } = cache.resolve(key, groups, () => {
      const result = timed(compute)
      this.logger.debug("recomputed", { family, key, durationMs: result.durationMs })
      return result.value
    })
    if (outcome === "hit") onHit?.(value)
    return value
  }

  /**
   * Re-run every cached entry's computation, family by family in
   * dependency order, and clear every dirty flag. An entry whose
   * computation throws is dropped and reported; the others still run.
   */
  recomputeAll(): RecomputeSummary {
    const recomputed: RecomputeSummary["recomputed"] = []
    const failed: RecomputeFailure[] = []

    const { durationMs } = timed(() => {
      for (const family of METRIC_FAMILIES) {
        const cache = this.families[family]
        cache.clearDirty()
        for (const key of cache.keys()) {
          try {
            cache.recompute(key)
            recomputed.push({ family, key })
          } catch (error) {
            cache.delete(key)
            const message = error instanceof Error ? error.message : String(error)
            failed.push({ family, key, error: message })
            this.logger.warn("recompute failed, entry dropped", { family, key, error: message })
          }
        }
      }
    })

    return { recomputed, failed, durationMs }
  }

  // ===========================================================================
  // INSPECTION
  // ===========================================================================

  isDirty(family: MetricFamily): boolean {
    return this.families[family].isDirty()
  }

  dirtyState(family: MetricFamily): DirtyState {
    return this.families[family].dirtyState()
  }

  has(family: MetricFamily, key: string): boolean {
    return this.families[family].has(key)
  }

  keys(family: MetricFamily): string[] {
    return this.families[family].keys()
  }

  stats(): Record<MetricFamily, FamilyStats> {
    return {
      degree: this.families.degree.stats(),
      activity: this.families.activity.stats(),
      anomaly: this.families.anomaly.stats(),
      cluster: this.families.cluster.stats(),
      flow: this.families.flow.stats(),
    }
  }
}
