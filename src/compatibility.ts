/**
 * Compatibility Oracle
 *
 * Pairwise feasibility between two occurrences: can an attendee leave the
 * first, travel to the second's venue and be seated before it starts, and are
 * they different titles. The optimizer asks this for every pair in the
 * catalog, not only for pairs that end up adjacent in a schedule. With a
 * transit table that breaks the triangle inequality this can reject a
 * schedule that a detour would make possible; that behaviour is intended.
 */

import type { LocalDateTime } from './time-date'
import type { TransitCostTable } from './transit-table'
import type { EventCatalog, Occurrence } from './event-catalog'
import { addMinutes } from './time-date'

// ============================================================================
// Types
// ============================================================================

/**
 * Pure predicate over two occurrences, `earlier` never starting after `later`.
 * The optimizer depends only on this interface.
 */
export interface ConflictPredicate {
  pairFeasible(earlier: Occurrence, later: Occurrence): boolean
  transitMinutes(earlier: Occurrence, later: Occurrence): number
}

export interface CompatibilityOracle extends ConflictPredicate {
  earliestStart(earlier: Occurrence, later: Occurrence): LocalDateTime
}

/** Symmetric adjacency of `NOT pairFeasible` over catalog indices */
export type ConflictGraph = {
  readonly size: number
  readonly adjacency: readonly (readonly number[])[]
  conflicts(a: number, b: number): boolean
}

// ============================================================================
// Oracle
// ============================================================================

export function createCompatibilityOracle(table: TransitCostTable): CompatibilityOracle {
  function transitMinutes(earlier: Occurrence, later: Occurrence): number {
    if (earlier.venue === later.venue) return table.sameVenueMinutes
    return table.minutes(earlier.venue, later.venue)
  }

  function earliestStart(earlier: Occurrence, later: Occurrence): LocalDateTime {
    return addMinutes(earlier.end, transitMinutes(earlier, later))
  }

  return {
    transitMinutes,
    earliestStart,
    pairFeasible(earlier: Occurrence, later: Occurrence) {
      if (earlier.title === later.title) return false
      return later.start >= earliestStart(earlier, later)
    },
  }
}

// ============================================================================
// Conflict Graph
// ============================================================================

export function buildConflictGraph(catalog: EventCatalog, predicate: ConflictPredicate): ConflictGraph {
  const n = catalog.size
  const matrix = new Uint8Array(n * n)
  const adjacency: number[][] = Array.from({ length: n }, () => [])

  for (let i = 0; i < n; i++) {
    const a = catalog.at(i)
    for (let j = i + 1; j < n; j++) {
      if (predicate.pairFeasible(a, catalog.at(j))) continue
      matrix[i * n + j] = 1
      matrix[j * n + i] = 1
      adjacency[i]?.push(j)
      adjacency[j]?.push(i)
    }
  }

  return {
    size: n,
    adjacency,
    conflicts(a: number, b: number) {
      return matrix[a * n + b] === 1
    },
  }
}
