/**
 * Adapter
 *
 * Programme persistence interface + in-memory mock implementation.
 * All methods are async so persistent adapters can share the interface.
 */

import type { ProgrammeInput } from './programme-input'
import type { EventInput, TransitTimes } from './types'
import { DuplicateKeyError, NotFoundError, InvalidDataError } from './errors'

export { DuplicateKeyError, NotFoundError, InvalidDataError } from './errors'

// ============================================================================
// Entity Types
// ============================================================================

export type Venue = {
  id: string
  name: string
}

/** One row of the transit table, stored once per unordered pair */
export type TransitTime = {
  venueA: string
  venueB: string
  minutes: number
}

export type FestivalEvent = {
  id: string
  title: string
  durationMinutes: number
}

export type Showing = {
  id: string
  eventId: string
  start: string
  venueId: string
}

// ============================================================================
// Adapter Interface
// ============================================================================

export interface Adapter {
  transaction<T>(fn: () => Promise<T>): Promise<T>

  // Venue
  createVenue(venue: Venue): Promise<void>
  getVenue(id: string): Promise<Venue | null>
  getAllVenues(): Promise<Venue[]>

  // Transit
  setTransitTime(from: string, to: string, minutes: number): Promise<void>
  getTransitTimes(): Promise<TransitTimes>

  // Event
  createEvent(event: FestivalEvent): Promise<void>
  getEvent(id: string): Promise<FestivalEvent | null>
  getAllEvents(): Promise<FestivalEvent[]>
  deleteEvent(id: string): Promise<void>

  // Showing
  addShowing(showing: Showing): Promise<void>
  getShowingsByEvent(eventId: string): Promise<Showing[]>

  /** Whole programme in planner input form */
  loadProgramme(): Promise<ProgrammeInput>

  // Lifecycle (persistent adapters only)
  close?(): Promise<void>
}

// ============================================================================
// Shared Helpers
// ============================================================================

export function orderPair(from: string, to: string): [string, string] {
  return from < to ? [from, to] : [to, from]
}

export function assertTransitTime(from: string, to: string, minutes: number): void {
  if (from === to) {
    throw new InvalidDataError(`Transit time from '${from}' to itself is fixed by the planner`)
  }
  if (!Number.isInteger(minutes) || minutes < 0) {
    throw new InvalidDataError(`Transit time ${from} -> ${to} must be a non-negative integer, got ${minutes}`)
  }
}

export function assertDuration(event: FestivalEvent): void {
  if (!Number.isInteger(event.durationMinutes) || event.durationMinutes <= 0) {
    throw new InvalidDataError(`Event '${event.id}' duration must be a positive integer, got ${event.durationMinutes}`)
  }
}

/** Nested table keyed by the lower venue id; every venue gets a row */
export function toTransitTimes(venues: Venue[], rows: TransitTime[]): TransitTimes {
  const out: TransitTimes = {}
  for (const v of [...venues].sort((a, b) => a.id.localeCompare(b.id))) out[v.id] = {}
  for (const row of rows) {
    const entry = out[row.venueA] ?? {}
    entry[row.venueB] = row.minutes
    out[row.venueA] = entry
  }
  return out
}

export function toEventInputs(events: FestivalEvent[], showings: Showing[]): EventInput[] {
  return events.map(e => ({
    title: e.title,
    durationMinutes: e.durationMinutes,
    occurrences: showings
      .filter(s => s.eventId === e.id)
      .map(s => ({ start: s.start, venue: s.venueId })),
  }))
}

// ============================================================================
// Mock Adapter
// ============================================================================

type MockState = {
  venues: Map<string, Venue>
  transit: Map<string, TransitTime>
  events: Map<string, FestivalEvent>
  showings: Map<string, Showing>
}

export function createMockAdapter(): Adapter {
  // ---- State ----
  let state: MockState = {
    venues: new Map(),
    transit: new Map(),
    events: new Map(),
    showings: new Map(),
  }

  // ---- Transaction ----
  let txDepth = 0
  let snapshot: MockState | null = null

  function clone<T>(obj: T): T {
    return structuredClone(obj)
  }

  const adapter: Adapter = {
    // ================================================================
    // Transaction
    // ================================================================
    async transaction<T>(fn: () => Promise<T>): Promise<T> {
      if (txDepth === 0) snapshot = clone(state)
      txDepth++
      try {
        const result = await fn()
        txDepth--
        if (txDepth === 0) snapshot = null
        return result
      } catch (e) {
        txDepth--
        if (txDepth === 0 && snapshot) {
          state = snapshot
          snapshot = null
        }
        throw e
      }
    },

    // ================================================================
    // Venue
    // ================================================================
    async createVenue(venue: Venue) {
      if (state.venues.has(venue.id)) {
        throw new DuplicateKeyError(`Venue '${venue.id}' already exists`)
      }
      state.venues.set(venue.id, clone(venue))
    },

    async getVenue(id: string) {
      const v = state.venues.get(id)
      return v ? clone(v) : null
    },

    async getAllVenues() {
      return [...state.venues.values()].sort((a, b) => a.id.localeCompare(b.id)).map(clone)
    },

    // ================================================================
    // Transit
    // ================================================================
    async setTransitTime(from: string, to: string, minutes: number) {
      assertTransitTime(from, to, minutes)
      for (const id of [from, to]) {
        if (!state.venues.has(id)) throw new NotFoundError(`Venue '${id}' not found`)
      }
      const [venueA, venueB] = orderPair(from, to)
      state.transit.set(`${venueA}|${venueB}`, { venueA, venueB, minutes })
    },

    async getTransitTimes() {
      return toTransitTimes([...state.venues.values()], [...state.transit.values()])
    },

    // ================================================================
    // Event
    // ================================================================
    async createEvent(event: FestivalEvent) {
      assertDuration(event)
      if (state.events.has(event.id)) {
        throw new DuplicateKeyError(`Event '${event.id}' already exists`)
      }
      state.events.set(event.id, clone(event))
    },

    async getEvent(id: string) {
      const e = state.events.get(id)
      return e ? clone(e) : null
    },

    async getAllEvents() {
      return [...state.events.values()].map(clone)
    },

    async deleteEvent(id: string) {
      if (!state.events.delete(id)) throw new NotFoundError(`Event '${id}' not found`)
      for (const [showingId, s] of state.showings) {
        if (s.eventId === id) state.showings.delete(showingId)
      }
    },

    // ================================================================
    // Showing
    // ================================================================
    async addShowing(showing: Showing) {
      if (state.showings.has(showing.id)) {
        throw new DuplicateKeyError(`Showing '${showing.id}' already exists`)
      }
      if (!state.events.has(showing.eventId)) throw new NotFoundError(`Event '${showing.eventId}' not found`)
      if (!state.venues.has(showing.venueId)) throw new NotFoundError(`Venue '${showing.venueId}' not found`)
      state.showings.set(showing.id, clone(showing))
    },

    async getShowingsByEvent(eventId: string) {
      return [...state.showings.values()].filter(s => s.eventId === eventId).map(clone)
    },

    async loadProgramme() {
      return {
        events: toEventInputs([...state.events.values()], [...state.showings.values()]),
        transitTimes: await adapter.getTransitTimes(),
      }
    },
  }

  return adapter
}
