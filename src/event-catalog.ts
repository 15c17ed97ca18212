/**
 * Event Catalog
 *
 * Flattens a programme's events into individual occurrences, validates them
 * against the transit table and orders them by start time. The position of an
 * occurrence in the sorted list is its identity for the rest of a run.
 */

import type { EventInput, VenueId } from './types'
import type { LocalDateTime } from './time-date'
import type { TransitCostTable } from './transit-table'
import { venueId } from './types'
import { parseDateTime, addMinutes, compareDateTimes } from './time-date'
import { MalformedEventError, InvalidDataError } from './errors'

export { MalformedEventError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type Occurrence = {
  readonly index: number
  readonly title: string
  readonly start: LocalDateTime
  readonly end: LocalDateTime
  readonly durationMinutes: number
  readonly venue: VenueId
}

export interface EventCatalog {
  readonly size: number
  readonly occurrences: readonly Occurrence[]
  at(index: number): Occurrence
  /** Distinct titles, in order of first showing */
  titles(): string[]
}

type PendingOccurrence = Omit<Occurrence, 'index'> & { inputOrder: number }

// ============================================================================
// Construction
// ============================================================================

/**
 * @throws MalformedEventError when a title is empty, a duration is not a
 *   positive whole number of minutes, a start cannot be parsed, or a venue
 *   is not in the transit table
 */
export function createEventCatalog(
  events: readonly EventInput[],
  table: TransitCostTable
): EventCatalog {
  const pending: PendingOccurrence[] = []

  for (const event of events) {
    if (event.title.trim() === '') {
      throw new MalformedEventError('Event title must not be empty')
    }
    if (!Number.isInteger(event.durationMinutes) || event.durationMinutes <= 0) {
      throw new MalformedEventError(
        `Event '${event.title}' has non-positive duration: ${event.durationMinutes}`
      )
    }

    for (const occ of event.occurrences) {
      const parsed = parseDateTime(occ.start)
      if (!parsed.ok) {
        throw new MalformedEventError(
          `Event '${event.title}' has an unparseable start: ${parsed.error.message}`
        )
      }
      if (!table.has(occ.venue)) {
        throw new MalformedEventError(
          `Event '${event.title}' at ${occ.start} uses unknown venue '${occ.venue}'`
        )
      }

      pending.push({
        title: event.title,
        start: parsed.value,
        end: addMinutes(parsed.value, event.durationMinutes),
        durationMinutes: event.durationMinutes,
        venue: venueId(occ.venue),
        inputOrder: pending.length,
      })
    }
  }

  pending.sort((a, b) => compareDateTimes(a.start, b.start) || a.inputOrder - b.inputOrder)

  const occurrences: readonly Occurrence[] = Object.freeze(
    pending.map(({ inputOrder: _inputOrder, ...rest }, index) => Object.freeze({ ...rest, index }))
  )

  return {
    size: occurrences.length,
    occurrences,

    at(index: number) {
      const occ = occurrences[index]
      if (occ === undefined) {
        throw new InvalidDataError(`No occurrence at index ${index} (catalog size ${occurrences.length})`)
      }
      return occ
    },

    titles() {
      return [...new Set(occurrences.map(o => o.title))]
    },
  }
}
