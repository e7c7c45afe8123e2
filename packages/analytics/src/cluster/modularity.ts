/**
 * Greedy modularity community detection (Clauset-Newman-Moore).
 *
 * Starts from singleton communities and repeatedly merges the connected
 * pair with the largest modularity gain dQ = 2(e_ij - a_i * a_j), where
 * e_ij is the fraction of edge weight between i and j (one direction) and
 * a_i the fraction of edge endpoints in i. Stops when no merge gains.
 * Ties go to the pair with the smallest community indices, which follow
 * the sorted node ids, so the result is deterministic.
 */

import type { ProjectionGraph } from "./projection"
import { compareIds } from "./projection"

export interface CommunityResult {
  /** Member ids of each community, sorted */
  communities: string[][]
  modularity: number
}

export function greedyModularity(graph: ProjectionGraph): CommunityResult {
  const ids = graph.nodes().sort(compareIds)
  const index = new Map(ids.map((id, i) => [id, i]))

  let totalWeight = 0
  graph.forEachEdge((_edge, attributes) => {
    totalWeight += attributes.weight
  })
  if (totalWeight === 0) {
    return { communities: ids.map((id) => [id]), modularity: 0 }
  }
  const m2 = 2 * totalWeight

  const members = new Map<number, string[]>()
  const a = new Map<number, number>()
  const e = new Map<number, Map<number, number>>()
  ids.forEach((id, i) => {
    members.set(i, [id])
    a.set(i, 0)
    e.set(i, new Map())
  })

  graph.forEachEdge((_edge, attributes, source, target) => {
    const i = index.get(source)
    const j = index.get(target)
    if (i === undefined || j === undefined || i === j) return
    const share = attributes.weight / m2
    a.set(i, (a.get(i) ?? 0) + share)
    a.set(j, (a.get(j) ?? 0) + share)
    addLink(e, i, j, share)
    addLink(e, j, i, share)
  })

  let modularity = 0
  for (const ai of a.values()) modularity -= ai * ai

  for (;;) {
    const best = bestMerge(e, a)
    if (!best || best.gain <= 0) break
    merge(best.i, best.j, members, a, e)
    modularity += best.gain
  }

  return {
    communities: Array.from(members.values(), (list) => list.sort(compareIds)),
    modularity,
  }
}

function addLink(e: Map<number, Map<number, number>>, from: number, to: number, share: number): void {
  const row = e.get(from) ?? new Map<number, number>()
  row.set(to, (row.get(to) ?? 0) + share)
  e.set(from, row)
}

function bestMerge(
  e: Map<number, Map<number, number>>,
  a: Map<number, number>,
): { i: number; j: number; gain: number } | undefined {
  let best: { i: number; j: number; gain: number } | undefined
  const rows = Array.from(e.keys()).sort((x, y) => x - y)
  for (const i of rows) {
    const row = e.get(i)
    if (!row) continue
    const columns = Array.from(row.keys())
      .filter((j) => j > i)
      .sort((x, y) => x - y)
    for (const j of columns) {
      const gain = 2 * ((row.get(j) ?? 0) - (a.get(i) ?? 0) * (a.get(j) ?? 0))
      if (!best || gain > best.gain) best = { i, j, gain }
    }
  }
  return best
}

/**
 * Fold community j into community i.
 */
function merge(
  i: number,
  j: number,
  members: Map<number, string[]>,
  a: Map<number, number>,
  e: Map<number, Map<number, number>>,
): void {
  const rowJ = e.get(j) ?? new Map<number, number>()
  for (const [k, share] of rowJ) {
    e.get(k)?.delete(j)
    if (k === i) continue
    addLink(e, i, k, share)
    addLink(e, k, i, share)
  }
  e.get(i)?.delete(j)
  e.delete(j)

  a.set(i, (a.get(i) ?? 0) + (a.get(j) ?? 0))
  a.delete(j)

  members.set(i, [...(members.get(i) ?? []), ...(members.get(j) ?? [])])
  members.delete(j)
}
