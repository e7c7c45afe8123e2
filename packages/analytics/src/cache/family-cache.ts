/**
 * Family Cache
 *
 * Cached results of one metric family, keyed by the query parameters that
 * shaped them. Each entry is tagged with the node-type groups it was
 * computed from and keeps the computation that produced it.
 */

import type { MetricFamily, NodeType } from "@txgraph/graph"

export interface CacheEntry<T> {
  value: T
  groups: ReadonlySet<NodeType>
  compute: () => T
  computedAt: Date
}

export interface FamilyStats {
  hits: number
  misses: number
  recomputations: number
  entries: number
}

export interface DirtyState {
  /** Coarse flag: every entry of the family is stale */
  dirty: boolean
  dirtyGroups: ReadonlySet<NodeType>
  dirtyNodeIds: ReadonlySet<string>
}

export type LookupOutcome = "hit" | "miss"

export class FamilyCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>()
  private dirty = false
  private readonly dirtyGroups = new Set<NodeType>()
  private readonly dirtyNodeIds = new Set<string>()
  private hits = 0
  private misses = 0
  private recomputations = 0

  constructor(readonly family: MetricFamily) {}

  // ===========================================================================
  // DIRTY TRACKING
  // ===========================================================================

  markGroups(groups: Iterable<NodeType>, nodeIds: Iterable<string> = []): void {
    for (const group of groups) this.dirtyGroups.add(group)
    for (const id of nodeIds) this.dirtyNodeIds.add(id)
  }

  markAll(nodeIds: Iterable<string> = []): void {
    this.dirty = true
    for (const id of nodeIds) this.dirtyNodeIds.add(id)
  }

  isDirty(): boolean {
    return this.dirty || this.dirtyGroups.size > 0
  }

  dirtyState(): DirtyState {
    return {
      dirty: this.dirty,
      dirtyGroups: new Set(this.dirtyGroups),
      dirtyNodeIds: new Set(this.dirtyNodeIds),
    }
  }

  clearDirty(): void {
    this.dirty = false
    this.dirtyGroups.clear()
    this.dirtyNodeIds.clear()
  }

  /**
   * Drop every entry invalidated by the pending dirty state, then clear it.
   * Returns the keys that were dropped.
   */
  sweep(): string[] {
    if (!this.isDirty()) return []
    const dropped: string[] = []
    for (const [key, entry] of this.entries) {
      if (this.dirty || intersects(entry.groups, this.dirtyGroups)) {
        this.entries.delete(key)
        dropped.push(key)
      }
    }
    this.clearDirty()
    return dropped
  }

  // ===========================================================================
  // ENTRIES
  // ===========================================================================

  /**
   * Cached value for `key`, computing and storing it on a miss. Nothing is
   * stored when `compute` throws.
   */
  resolve(key: string, groups: Iterable<NodeType>, compute: () => T): { value: T; outcome: LookupOutcome } {
    const cached = this.entries.get(key)
    if (cached) {
      this.hits++
      return { value: cached.value, outcome: "hit" }
    }

    this.misses++
    const value = compute()
    this.recomputations++
    this.entries.set(key, { value, groups: new Set(groups), compute, computedAt: new Date() })
    return { value, outcome: "miss" }
  }

  /**
   * Re-run the stored computation of one entry and replace its value.
   * The old value stays in place when the computation throws.
   */
  recompute(key: string): T | undefined {
    const entry = this.entries.get(key)
    if (!entry) return undefined
    const value = entry.compute()
    this.recomputations++
    this.entries.set(key, { ...entry, value, computedAt: new Date() })
    return value
  }

  keys(): string[] {
    return Array.from(this.entries.keys())
  }

  has(key: string): boolean {
    return this.entries.has(key)
  }

  delete(key: string): boolean {
    return this.entries.delete(key)
  }

  stats(): FamilyStats {
    return {
      hits: this.hits,
      misses: this.misses,
      recomputations: this.recomputations,
      entries: this.entries.size,
    }
  }
}

function intersects<V>(a: ReadonlySet<V>, b: ReadonlySet<V>): boolean {
  for (const value of a) {
    if (b.has(value)) return true
  }
  return false
}
