/**
 * Mutation Notifier
 *
 * Delivers graph mutation events to registered listeners, in registration
 * order, synchronously. While held (inside a batch) events are merged and
 * delivered once on release.
 */

import type {
  GraphMutationEvent,
  GraphMutationListener,
  MetricFamily,
  MutationOperation,
  NodeType,
} from "../store/types"

interface PendingEvent {
  operation: MutationOperation
  changedNodeIds: Set<string>
  changedEdgeIds: Set<string>
  affectedFamilies: Set<MetricFamily>
  affectedGroups: Set<NodeType>
}

export class MutationNotifier {
  private readonly listeners: GraphMutationListener[] = []
  private pending: PendingEvent | null = null
  private holds = 0

  subscribe(listener: GraphMutationListener): () => void {
    this.listeners.push(listener)
    return () => {
      const index = this.listeners.indexOf(listener)
      if (index >= 0) this.listeners.splice(index, 1)
    }
  }

  get listenerCount(): number {
    return this.listeners.length
  }

  emit(event: GraphMutationEvent): void {
    if (this.holds > 0) {
      this.merge(event)
      return
    }
    this.deliver(event)
  }

  /**
   * Start collecting events instead of delivering them.
   */
  hold(): void {
    this.holds++
  }

  /**
   * Deliver everything collected since the outermost `hold()` as one event.
   */
  release(): void {
    if (this.holds === 0) {
      throw new Error("MutationNotifier.release() called without hold()")
    }
    this.holds--
    if (this.holds > 0 || !this.pending) return

    const event = this.pending
    this.pending = null
    this.deliver(event)
  }

  /**
   * Drop collected events (the batch was rolled back).
   */
  discard(): void {
    if (this.holds === 0) {
      throw new Error("MutationNotifier.discard() called without hold()")
    }
    this.holds--
    if (this.holds === 0) this.pending = null
  }

  private merge(event: GraphMutationEvent): void {
    if (!this.pending) {
      this.pending = {
        operation: "batch",
        changedNodeIds: new Set(),
        changedEdgeIds: new Set(),
        affectedFamilies: new Set(),
        affectedGroups: new Set(),
      }
    }
    for (const id of event.changedNodeIds) this.pending.changedNodeIds.add(id)
    for (const id of event.changedEdgeIds) this.pending.changedEdgeIds.add(id)
    for (const family of event.affectedFamilies) this.pending.affectedFamilies.add(family)
    for (const group of event.affectedGroups) this.pending.affectedGroups.add(group)
  }

  private deliver(event: GraphMutationEvent): void {
    for (const listener of [...this.listeners]) {
      listener.notify(event)
    }
  }
}
