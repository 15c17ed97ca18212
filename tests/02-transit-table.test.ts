/**
 * Segment 02: Transit Cost Table Tests
 *
 * The table must be complete and symmetric before any planning starts;
 * lookups are read-only afterwards.
 */

import { describe, it, expect } from 'vitest'
import {
  createTransitTable,
  DEFAULT_SAME_VENUE_MINUTES,
  InfeasibleTransitTableError,
} from '../src/transit-table'
import { venueId } from '../src/types'
import { TRANSIT } from './helpers/programme'

describe('Segment 02: Transit Cost Table', () => {
  describe('construction', () => {
    it('collects venues from rows and columns, sorted', () => {
      const table = createTransitTable(TRANSIT)
      expect(table.venues()).toEqual(['EAST', 'NORTH', 'WEST'])
    })

    it('defaults the same-venue cost to 5 minutes', () => {
      const table = createTransitTable(TRANSIT)
      expect(DEFAULT_SAME_VENUE_MINUTES).toBe(5)
      expect(table.sameVenueMinutes).toBe(5)
      expect(table.minutes(venueId('EAST'), venueId('EAST'))).toBe(5)
    })

    it('accepts a zero same-venue cost', () => {
      const table = createTransitTable(TRANSIT, { sameVenueMinutes: 0 })
      expect(table.minutes(venueId('WEST'), venueId('WEST'))).toBe(0)
    })

    it('accepts an empty table', () => {
      const table = createTransitTable({})
      expect(table.venues()).toEqual([])
      expect(table.has('NORTH')).toBe(false)
    })

    it('accepts a single venue with an empty row', () => {
      const table = createTransitTable({ SOLO: {} })
      expect(table.has('SOLO')).toBe(true)
      expect(table.minutes(venueId('SOLO'), venueId('SOLO'))).toBe(5)
    })
  })

  describe('lookups', () => {
    it('is symmetric when only one direction is given', () => {
      const table = createTransitTable(TRANSIT)
      expect(table.minutes(venueId('NORTH'), venueId('WEST'))).toBe(40)
      expect(table.minutes(venueId('WEST'), venueId('NORTH'))).toBe(40)
    })

    it('accepts both directions when they agree', () => {
      const table = createTransitTable({ A: { B: 12 }, B: { A: 12 } })
      expect(table.minutes(venueId('B'), venueId('A'))).toBe(12)
    })

    it('does not require the triangle inequality', () => {
      const table = createTransitTable(TRANSIT)
      const direct = table.minutes(venueId('NORTH'), venueId('WEST'))
      const viaEast = table.minutes(venueId('NORTH'), venueId('EAST')) + table.minutes(venueId('EAST'), venueId('WEST'))
      expect(direct).toBeGreaterThan(viaEast)
    })

    it('throws for an unknown venue', () => {
      const table = createTransitTable(TRANSIT)
      expect(() => table.minutes(venueId('NORTH'), venueId('SOUTH'))).toThrow(InfeasibleTransitTableError)
    })

    it('toTransitTimes fills in both directions', () => {
      const table = createTransitTable({ A: { B: 7 } })
      expect(table.toTransitTimes()).toEqual({ A: { B: 7 }, B: { A: 7 } })
    })
  })

  describe('validation', () => {
    it('rejects asymmetric entries', () => {
      expect(() => createTransitTable({ A: { B: 10 }, B: { A: 15 } })).toThrow(
        "Asymmetric transit times between 'B' and 'A': 10m vs 15m"
      )
    })

    it('rejects a missing pair', () => {
      expect(() => createTransitTable({ A: { B: 10 }, C: {} })).toThrow(
        "Transit table is missing the pair 'A' / 'C'"
      )
    })

    it('rejects negative minutes', () => {
      expect(() => createTransitTable({ A: { B: -1 } })).toThrow(InfeasibleTransitTableError)
    })

    it('rejects fractional minutes', () => {
      expect(() => createTransitTable({ A: { B: 2.5 } })).toThrow(InfeasibleTransitTableError)
    })

    it('rejects an entry from a venue to itself', () => {
      expect(() => createTransitTable({ A: { A: 0, B: 3 } })).toThrow(InfeasibleTransitTableError)
    })

    it('rejects a negative same-venue cost', () => {
      expect(() => createTransitTable(TRANSIT, { sameVenueMinutes: -5 })).toThrow(InfeasibleTransitTableError)
    })

    it('error carries the INFEASIBLE_TRANSIT_TABLE code', () => {
      try {
        createTransitTable({ A: { B: 1 }, B: { A: 2 } })
        expect.unreachable()
      } catch (e) {
        expect(e).toBeInstanceOf(InfeasibleTransitTableError)
        if (e instanceof InfeasibleTransitTableError) expect(e.code).toBe('INFEASIBLE_TRANSIT_TABLE')
      }
    })
  })
})
