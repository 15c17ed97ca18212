/**
 * Schedule Optimizer
 *
 * Turns a catalog and a conflict predicate into a decision model, runs the
 * two-pass exact search and re-checks every pair of the returned selection
 * before assembling the annotated schedule.
 */

import type { EventCatalog, Occurrence } from './event-catalog'
import type { ConflictGraph, ConflictPredicate } from './compatibility'
import type { DecisionModel, SearchLimits, SearchPhase } from './search'
import type { ScheduleResult } from './schedule-result'
import { buildConflictGraph } from './compatibility'
import { solveTwoPhase } from './search'
import { buildScheduleResult } from './schedule-result'
import { sameDate } from './time-date'
import { ScheduleVerificationError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type ImprovementEvent = {
  phase: SearchPhase
  attendance: number
  totalTransitMinutes: number
  selected: readonly Occurrence[]
}

export type OptimizeOptions = SearchLimits & {
  onImprovement?: (event: ImprovementEvent) => void
}

export type ScheduleDecisionModel = DecisionModel & {
  readonly graph: ConflictGraph
  /** Occurrences sharing a title share a group */
  group(index: number): number
}

export type ViolationReason = 'duplicateTitle' | 'insufficientTransit'

export type Violation = {
  earlier: Occurrence
  later: Occurrence
  reason: ViolationReason
}

// ============================================================================
// Decision Model
// ============================================================================

/**
 * Same-day consecutive selections are charged the predicate's transit time;
 * a selection on a new day starts fresh and costs nothing.
 */
export function buildDecisionModel(
  catalog: EventCatalog,
  predicate: ConflictPredicate
): ScheduleDecisionModel {
  const n = catalog.size
  const graph = buildConflictGraph(catalog, predicate)

  const costs = new Int32Array(n * n)
  for (let i = 0; i < n; i++) {
    const a = catalog.at(i)
    for (let j = i + 1; j < n; j++) {
      const b = catalog.at(j)
      if (sameDate(a.start, b.start)) costs[i * n + j] = predicate.transitMinutes(a, b)
    }
  }

  return {
    size: n,
    graph,
    neighbours(index: number) {
      return graph.adjacency[index] ?? []
    },
    transitionCost(prev: number, next: number) {
      return costs[prev * n + next] ?? 0
    },
    group: titleGroups(catalog, graph),
  }
}

/**
 * Groups showings of one title, but only where the conflict graph has every
 * pair of them as a conflict; otherwise each showing is its own group. The
 * attendance bound counts one per group, so a group must never hold two
 * showings that could both be attended.
 */
function titleGroups(catalog: EventCatalog, graph: ConflictGraph): (index: number) => number {
  const byTitle = new Map<string, number[]>()
  for (const o of catalog.occurrences) {
    const list = byTitle.get(o.title) ?? []
    list.push(o.index)
    byTitle.set(o.title, list)
  }

  const groupOf = new Int32Array(catalog.size)
  let next = 0
  for (const indices of byTitle.values()) {
    const exclusive = indices.every((a, k) => indices.slice(k + 1).every(b => graph.conflicts(a, b)))
    if (exclusive) {
      const id = next++
      for (const i of indices) groupOf[i] = id
    } else {
      for (const i of indices) groupOf[i] = next++
    }
  }

  return index => groupOf[index] ?? index
}

// ============================================================================
// Verification
// ============================================================================

/** Re-checks every selected pair; the search's own bookkeeping is not trusted */
export function findViolations(
  catalog: EventCatalog,
  predicate: ConflictPredicate,
  selected: readonly boolean[]
): Violation[] {
  const chosen = catalog.occurrences.filter(o => selected[o.index] === true)
  const violations: Violation[] = []
  for (let i = 0; i < chosen.length; i++) {
    for (let j = i + 1; j < chosen.length; j++) {
      const earlier = chosen[i]
      const later = chosen[j]
      if (!earlier || !later) continue
      if (predicate.pairFeasible(earlier, later)) continue
      violations.push({
        earlier,
        later,
        reason: earlier.title === later.title ? 'duplicateTitle' : 'insufficientTransit',
      })
    }
  }
  return violations
}

// ============================================================================
// Optimize
// ============================================================================

export function optimizeSchedule(
  catalog: EventCatalog,
  predicate: ConflictPredicate,
  options: OptimizeOptions = {}
): ScheduleResult {
  const model = buildDecisionModel(catalog, predicate)
  const { onImprovement, ...limits } = options

  const outcome = solveTwoPhase(model, {
    ...limits,
    onImprovement: onImprovement
      ? snapshot => onImprovement({
        phase: snapshot.phase,
        attendance: snapshot.attendance,
        totalTransitMinutes: snapshot.totalTransit,
        selected: catalog.occurrences.filter(o => snapshot.selected[o.index] === true),
      })
      : undefined,
  })

  const violations = findViolations(catalog, predicate, outcome.selected)
  const first = violations[0]
  if (first) {
    throw new ScheduleVerificationError(
      `Selected schedule violates ${violations.length} pair constraint(s); first: ` +
      `'${first.earlier.title}' at ${first.earlier.start} and '${first.later.title}' at ${first.later.start} (${first.reason})`
    )
  }

  return buildScheduleResult(catalog, predicate, outcome)
}
