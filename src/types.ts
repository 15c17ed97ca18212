/**
 * Shared Types
 *
 * Re-exports branded types from time-date and defines domain ID types
 * used across multiple modules.
 */

export type { LocalDate, LocalTime, LocalDateTime } from './time-date'

// ============================================================================
// Branded ID Types
// ============================================================================

declare const __venueId: unique symbol

/** Key into the transit table; venue names and display are kept elsewhere */
export type VenueId = string & { readonly [__venueId]: true }

export function venueId(id: string): VenueId {
  return id as VenueId
}

// ============================================================================
// Raw Programme Shapes
// ============================================================================

/** Nested venue -> venue -> minutes table, as written in programme files */
export type TransitTimes = Record<string, Record<string, number>>

export type OccurrenceInput = {
  start: string
  venue: string
}

export type EventInput = {
  title: string
  durationMinutes: number
  occurrences: OccurrenceInput[]
}
