/**
 * Transit Cost Table
 *
 * Immutable lookup of travel minutes between venues. Built once from the
 * nested programme table, validated for completeness and symmetry, then
 * consumed read-only by the compatibility oracle. The triangle inequality
 * is not required and not checked.
 */

import type { TransitTimes, VenueId } from './types'
import { venueId } from './types'
import { InfeasibleTransitTableError } from './errors'

export { InfeasibleTransitTableError } from './errors'

// ============================================================================
// Types
// ============================================================================

/** In-venue repositioning: finding the next screen, queueing, etc. */
export const DEFAULT_SAME_VENUE_MINUTES = 5

export interface TransitCostTable {
  readonly sameVenueMinutes: number
  venues(): readonly VenueId[]
  has(venue: string): boolean
  minutes(from: VenueId, to: VenueId): number
  /** Nested form with both directions filled in */
  toTransitTimes(): TransitTimes
}

export type TransitTableOptions = {
  sameVenueMinutes?: number
}

// ============================================================================
// Helpers
// ============================================================================

function pairKey(a: string, b: string): string {
  return a < b ? `${a}\u0000${b}` : `${b}\u0000${a}`
}

function isMinuteCount(value: number): boolean {
  return Number.isInteger(value) && value >= 0
}

// ============================================================================
// Construction
// ============================================================================

/**
 * Validates and freezes a transit table.
 *
 * An unordered pair may be given in one direction or both; when both are
 * given they must agree. Every pair of distinct venues mentioned anywhere in
 * the table must be covered.
 *
 * @throws InfeasibleTransitTableError on a missing pair, asymmetric entries,
 *   a negative or fractional cost, or an entry from a venue to itself
 */
export function createTransitTable(
  times: TransitTimes,
  options: TransitTableOptions = {}
): TransitCostTable {
  const sameVenueMinutes = options.sameVenueMinutes ?? DEFAULT_SAME_VENUE_MINUTES
  if (!isMinuteCount(sameVenueMinutes)) {
    throw new InfeasibleTransitTableError(
      `Same-venue transit must be a non-negative integer, got ${sameVenueMinutes}`
    )
  }

  const venueSet = new Set<string>()
  const costs = new Map<string, number>()

  for (const [from, row] of Object.entries(times)) {
    venueSet.add(from)
    for (const [to, minutes] of Object.entries(row)) {
      venueSet.add(to)
      if (from === to) {
        throw new InfeasibleTransitTableError(
          `Transit table has an entry from '${from}' to itself; same-venue transit is fixed at ${sameVenueMinutes}m`
        )
      }
      if (!isMinuteCount(minutes)) {
        throw new InfeasibleTransitTableError(
          `Transit time ${from} -> ${to} must be a non-negative integer, got ${minutes}`
        )
      }
      const key = pairKey(from, to)
      const existing = costs.get(key)
      if (existing !== undefined && existing !== minutes) {
        throw new InfeasibleTransitTableError(
          `Asymmetric transit times between '${from}' and '${to}': ${existing}m vs ${minutes}m`
        )
      }
      costs.set(key, minutes)
    }
  }

  const venueList = [...venueSet].sort().map(venueId)
  for (let i = 0; i < venueList.length; i++) {
    for (let j = i + 1; j < venueList.length; j++) {
      const a = venueList[i]
      const b = venueList[j]
      if (a === undefined || b === undefined) continue
      if (!costs.has(pairKey(a, b))) {
        throw new InfeasibleTransitTableError(`Transit table is missing the pair '${a}' / '${b}'`)
      }
    }
  }

  Object.freeze(venueList)

  return {
    sameVenueMinutes,

    venues() {
      return venueList
    },

    has(venue: string) {
      return venueSet.has(venue)
    },

    minutes(from: VenueId, to: VenueId) {
      if (from === to) return sameVenueMinutes
      const cost = costs.get(pairKey(from, to))
      if (cost === undefined) {
        throw new InfeasibleTransitTableError(`No transit time between '${from}' and '${to}'`)
      }
      return cost
    },

    toTransitTimes() {
      const out: TransitTimes = {}
      for (const from of venueList) {
        const row: Record<string, number> = {}
        for (const to of venueList) {
          if (from === to) continue
          row[to] = costs.get(pairKey(from, to)) ?? 0
        }
        out[from] = row
      }
      return out
    },
  }
}
