/**
 * SQLite Adapter
 *
 * Production implementation of the programme adapter using better-sqlite3.
 */
import Database from 'better-sqlite3'
import type { Adapter, Venue, FestivalEvent, Showing, TransitTime } from './adapter'
import {
  DuplicateKeyError, InvalidDataError, NotFoundError,
  orderPair, assertTransitTime, assertDuration, toTransitTimes, toEventInputs,
} from './adapter'

export { DuplicateKeyError, InvalidDataError, NotFoundError }

// ============================================================================
// Extended type for SQLite-specific introspection methods
// ============================================================================

export type SqliteExtras = {
  listTables(): Promise<string[]>
  getSchemaVersion(): Promise<number>
  inTransaction(): Promise<boolean>
}

export type SqliteAdapter = Adapter & SqliteExtras

// ============================================================================
// Schema DDL
// ============================================================================

const SCHEMA_VERSION = 1

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS venue (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS transit_time (
    venue_a TEXT NOT NULL REFERENCES venue(id) ON DELETE CASCADE,
    venue_b TEXT NOT NULL REFERENCES venue(id) ON DELETE CASCADE,
    minutes INTEGER NOT NULL CHECK (minutes >= 0),
    PRIMARY KEY (venue_a, venue_b),
    CHECK (venue_a < venue_b)
  );

  CREATE TABLE IF NOT EXISTS event (
    id TEXT PRIMARY KEY,
    title TEXT NOT NULL,
    duration_minutes INTEGER NOT NULL CHECK (duration_minutes > 0)
  );

  CREATE TABLE IF NOT EXISTS showing (
    id TEXT PRIMARY KEY,
    event_id TEXT NOT NULL REFERENCES event(id) ON DELETE CASCADE,
    start TEXT NOT NULL,
    venue_id TEXT NOT NULL REFERENCES venue(id) ON DELETE RESTRICT
  );
  CREATE INDEX IF NOT EXISTS idx_showing_event ON showing(event_id);
  CREATE INDEX IF NOT EXISTS idx_showing_venue ON showing(venue_id);

  CREATE TABLE IF NOT EXISTS schema_version (
    version INTEGER PRIMARY KEY,
    applied_at TEXT NOT NULL
  );
`

// ============================================================================
// Error Mapping
// ============================================================================

function mapError(e: unknown): never {
  const msg = e instanceof Error ? e.message : String(e)
  if (/UNIQUE constraint/i.test(msg)) throw new DuplicateKeyError(msg)
  if (/FOREIGN KEY constraint/i.test(msg)) throw new NotFoundError(msg)
  if (/CHECK constraint/i.test(msg)) throw new InvalidDataError(msg)
  throw e
}

function safe<T>(fn: () => T): T {
  try { return fn() }
  catch (e) { mapError(e) }
}

// ============================================================================
// SQL Row Types
// ============================================================================

type VenueRow = {
  id: string
  name: string
}

type TransitRow = {
  venue_a: string
  venue_b: string
  minutes: number
}

type EventRow = {
  id: string
  title: string
  duration_minutes: number
}

type ShowingRow = {
  id: string
  event_id: string
  start: string
  venue_id: string
}

type SchemaVersionRow = {
  v: number | null
}

type NameRow = {
  name: string
}

// ============================================================================
// Row → Domain Mappers
// ============================================================================

function toVenue(row: VenueRow): Venue {
  return { id: row.id, name: row.name }
}

function toTransitTime(row: TransitRow): TransitTime {
  return { venueA: row.venue_a, venueB: row.venue_b, minutes: row.minutes }
}

function toEvent(row: EventRow): FestivalEvent {
  return { id: row.id, title: row.title, durationMinutes: row.duration_minutes }
}

function toShowing(row: ShowingRow): Showing {
  return { id: row.id, eventId: row.event_id, start: row.start, venueId: row.venue_id }
}

// ============================================================================
// Factory
// ============================================================================

export async function createSqliteAdapter(path: string): Promise<SqliteAdapter> {
  const db = new Database(path)
  db.exec('PRAGMA foreign_keys = ON')
  db.exec(SCHEMA_SQL)

  const ver = db.prepare<[], SchemaVersionRow>('SELECT MAX(version) as v FROM schema_version').get()
  if (ver?.v == null) {
    db.prepare('INSERT INTO schema_version (version, applied_at) VALUES (?, ?)').run(
      SCHEMA_VERSION, new Date().toISOString(),
    )
  }

  let _inTx = false

  function allVenues(): Venue[] {
    const rows = db.prepare<[], VenueRow>('SELECT * FROM venue ORDER BY id').all()
    return rows.map(toVenue)
  }

  function allTransit(): TransitTime[] {
    const rows = db.prepare<[], TransitRow>('SELECT * FROM transit_time ORDER BY venue_a, venue_b').all()
    return rows.map(toTransitTime)
  }

  function allEvents(): FestivalEvent[] {
    const rows = db.prepare<[], EventRow>('SELECT * FROM event ORDER BY rowid').all()
    return rows.map(toEvent)
  }

  const adapter: SqliteAdapter = {
    // ================================================================
    // Transaction
    // ================================================================
    async transaction<T>(fn: () => Promise<T>): Promise<T> {
      if (_inTx) return await fn()
      _inTx = true
      db.exec('BEGIN IMMEDIATE')
      try {
        const result = await fn()
        db.exec('COMMIT')
        return result
      } catch (e) {
        db.exec('ROLLBACK')
        throw e
      } finally {
        _inTx = false
      }
    },

    // ================================================================
    // Venue
    // ================================================================
    async createVenue(venue: Venue) {
      safe(() => db.prepare('INSERT INTO venue (id, name) VALUES (?, ?)').run(venue.id, venue.name))
    },

    async getVenue(id: string) {
      const row = db.prepare<[string], VenueRow>('SELECT * FROM venue WHERE id = ?').get(id)
      return row ? toVenue(row) : null
    },

    async getAllVenues() {
      return allVenues()
    },

    // ================================================================
    // Transit
    // ================================================================
    async setTransitTime(from: string, to: string, minutes: number) {
      assertTransitTime(from, to, minutes)
      const [venueA, venueB] = orderPair(from, to)
      safe(() =>
        db.prepare(
          `INSERT INTO transit_time (venue_a, venue_b, minutes) VALUES (?, ?, ?)
           ON CONFLICT(venue_a, venue_b) DO UPDATE SET minutes = excluded.minutes`,
        ).run(venueA, venueB, minutes),
      )
    },

    async getTransitTimes() {
      return toTransitTimes(allVenues(), allTransit())
    },

    // ================================================================
    // Event
    // ================================================================
    async createEvent(event: FestivalEvent) {
      assertDuration(event)
      safe(() =>
        db.prepare('INSERT INTO event (id, title, duration_minutes) VALUES (?, ?, ?)').run(
          event.id, event.title, event.durationMinutes,
        ),
      )
    },

    async getEvent(id: string) {
      const row = db.prepare<[string], EventRow>('SELECT * FROM event WHERE id = ?').get(id)
      return row ? toEvent(row) : null
    },

    async getAllEvents() {
      return allEvents()
    },

    async deleteEvent(id: string) {
      const info = safe(() => db.prepare('DELETE FROM event WHERE id = ?').run(id))
      if (info.changes === 0) throw new NotFoundError(`Event '${id}' not found`)
    },

    // ================================================================
    // Showing
    // ================================================================
    async addShowing(showing: Showing) {
      safe(() =>
        db.prepare('INSERT INTO showing (id, event_id, start, venue_id) VALUES (?, ?, ?, ?)').run(
          showing.id, showing.eventId, showing.start, showing.venueId,
        ),
      )
    },

    async getShowingsByEvent(eventId: string) {
      const rows = db.prepare<[string], ShowingRow>('SELECT * FROM showing WHERE event_id = ? ORDER BY rowid').all(eventId)
      return rows.map(toShowing)
    },

    async loadProgramme() {
      const showings = db.prepare<[], ShowingRow>('SELECT * FROM showing ORDER BY rowid').all().map(toShowing)
      return {
        events: toEventInputs(allEvents(), showings),
        transitTimes: toTransitTimes(allVenues(), allTransit()),
      }
    },

    async close() {
      db.close()
    },

    // ================================================================
    // Introspection
    // ================================================================
    async listTables() {
      const rows = db.prepare<[], NameRow>(
        "SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name",
      ).all()
      return rows.map(r => r.name)
    },

    async getSchemaVersion() {
      const row = db.prepare<[], SchemaVersionRow>('SELECT MAX(version) as v FROM schema_version').get()
      return row?.v ?? 0
    },

    async inTransaction() {
      return _inTx
    },
  }

  return adapter
}
