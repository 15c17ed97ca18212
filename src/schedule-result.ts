/**
 * Schedule Result
 *
 * Derived view of a finished search: the attended occurrences in start
 * order, each annotated against the previous one when both start on the
 * same calendar day.
 */

import type { EventCatalog, Occurrence } from './event-catalog'
import type { ConflictPredicate } from './compatibility'
import type { SearchOutcome, SearchStats, SearchStatus } from './search'
import { sameDate, minutesBetween, formatDateTimeShort } from './time-date'

// ============================================================================
// Types
// ============================================================================

export type ScheduleEntry = {
  occurrence: Occurrence
  /** Minutes travelling from the previous same-day occurrence */
  transitMinutes?: number
  /** Free minutes left after the previous occurrence's end plus transit */
  downtimeMinutes?: number
}

export type ScheduleResult = {
  entries: ScheduleEntry[]
  attendance: number
  totalTransitMinutes: number
  assignment: readonly boolean[]
  status: SearchStatus
  stats: SearchStats
}

// Gaps this short are just the walk between screens
const NEGLIGIBLE_DOWNTIME_MINUTES = 5

// ============================================================================
// Assembly
// ============================================================================

export function buildScheduleResult(
  catalog: EventCatalog,
  predicate: ConflictPredicate,
  outcome: SearchOutcome
): ScheduleResult {
  const entries: ScheduleEntry[] = []
  let prev: Occurrence | undefined

  for (const occurrence of catalog.occurrences) {
    if (outcome.selected[occurrence.index] !== true) continue
    if (prev && sameDate(prev.start, occurrence.start)) {
      const transitMinutes = predicate.transitMinutes(prev, occurrence)
      entries.push({
        occurrence,
        transitMinutes,
        downtimeMinutes: minutesBetween(prev.end, occurrence.start) - transitMinutes,
      })
    } else {
      entries.push({ occurrence })
    }
    prev = occurrence
  }

  return {
    entries,
    attendance: outcome.attendance,
    totalTransitMinutes: outcome.totalTransit,
    assignment: outcome.selected,
    status: outcome.status,
    stats: outcome.stats,
  }
}

// ============================================================================
// Rendering
// ============================================================================

function describeMove(from: Occurrence, entry: ScheduleEntry): string {
  const to = entry.occurrence
  const transit = from.venue === to.venue ? 'none' : `${entry.transitMinutes ?? 0}m to ${to.venue}`
  const downtime = entry.downtimeMinutes ?? 0
  return ` ... (transit: ${transit}, downtime: ${downtime <= NEGLIGIBLE_DOWNTIME_MINUTES ? 'none' : `${downtime}m`})`
}

/**
 * Plain-text itinerary, one line per occurrence. A line is followed by the
 * move to the next occurrence when that one is on the same day.
 */
export function renderSchedule(result: ScheduleResult): string {
  const header = `attendance: ${result.attendance}, transit: ${result.totalTransitMinutes}m` +
    (result.status === 'interrupted' ? ' (interrupted)' : '')

  const lines = result.entries.map((entry, i) => {
    const occ = entry.occurrence
    let line = `${formatDateTimeShort(occ.start)} @ ${occ.venue}: "${occ.title}"`
    const next = result.entries[i + 1]
    if (next && next.transitMinutes !== undefined) line += describeMove(occ, next)
    return line
  })

  return [header, ...lines].join('\n')
}
