/**
 * Segment 11: Public API Tests
 *
 * The planner object: config validation at construction, planning,
 * per-call limits and progress events.
 */

import { describe, it, expect, vi, afterEach } from 'vitest'
import {
  createFestivalPlanner,
  planProgramme,
  type ImprovementEvent,
  type ScheduleResult,
} from '../src/index'
import { createMockAdapter } from '../src/adapter'
import {
  InvalidConfigError,
  InfeasibleTransitTableError,
  MalformedEventError,
} from '../src/errors'
import { TRANSIT, ev } from './helpers/programme'

const TWO_SIDES = [
  ev('Main', 60, ['2030-05-14 10:00', 'EAST']),
  ev('Side', 60, ['2030-05-14 11:30', 'WEST'], ['2030-05-14 11:30', 'NORTH']),
]

afterEach(() => {
  vi.restoreAllMocks()
})

describe('Segment 11: Public API', () => {
  describe('construction', () => {
    it('exposes the validated transit table', () => {
      const planner = createFestivalPlanner({ transitTimes: TRANSIT })
      expect(planner.transitTable.venues()).toEqual(['EAST', 'NORTH', 'WEST'])
      expect(planner.transitTable.sameVenueMinutes).toBe(5)
    })

    it('rejects an invalid limit', () => {
      expect(() => createFestivalPlanner({ transitTimes: TRANSIT, limits: { maxIterations: 0 } })).toThrow(
        'Invalid planner config: limits.maxIterations: Number must be greater than 0'
      )
    })

    it('rejects an incomplete transit table', () => {
      expect(() => createFestivalPlanner({ transitTimes: { A: { B: 5 }, C: {} } })).toThrow(
        InfeasibleTransitTableError
      )
    })

    it('planners with different configs do not interfere', () => {
      const events = [
        ev('Alpha', 60, ['2030-05-14 10:00', 'EAST']),
        ev('Beta', 60, ['2030-05-14 11:10', 'EAST']),
      ]
      const quick = createFestivalPlanner({ transitTimes: TRANSIT })
      const slow = createFestivalPlanner({ transitTimes: TRANSIT, sameVenueMinutes: 15 })

      expect(quick.plan(events).attendance).toBe(2)
      expect(slow.plan(events).attendance).toBe(1)
      expect(quick.plan(events).attendance).toBe(2)
    })
  })

  describe('plan', () => {
    it('returns the optimal schedule', () => {
      const planner = createFestivalPlanner({ transitTimes: TRANSIT })
      const result = planner.plan(TWO_SIDES)

      expect(result.attendance).toBe(2)
      expect(result.totalTransitMinutes).toBe(10)
      expect(result.entries.map(e => e.occurrence.venue)).toEqual(['EAST', 'NORTH'])
      expect(result.status).toBe('optimal')
    })

    it('throws MalformedEventError for an unknown venue', () => {
      const planner = createFestivalPlanner({ transitTimes: TRANSIT })
      expect(() => planner.plan([ev('Lost', 60, ['2030-05-14 10:00', 'SOUTH'])])).toThrow(MalformedEventError)
    })

    it('applies configured limits', () => {
      const planner = createFestivalPlanner({ transitTimes: TRANSIT, limits: { maxIterations: 1 } })
      const result = planner.plan(TWO_SIDES)
      expect(result.status).toBe('interrupted')
      expect(result.attendance).toBe(0)
    })

    it('per-call limits override configured ones', () => {
      const planner = createFestivalPlanner({ transitTimes: TRANSIT, limits: { maxIterations: 1 } })
      const result = planner.plan(TWO_SIDES, { limits: { maxIterations: 100_000 } })
      expect(result.status).toBe('optimal')
      expect(result.attendance).toBe(2)
    })

    it('rejects invalid per-call limits', () => {
      const planner = createFestivalPlanner({ transitTimes: TRANSIT })
      expect(() => planner.plan(TWO_SIDES, { limits: { timeLimitMs: -1 } })).toThrow(InvalidConfigError)
      expect(() => planner.plan(TWO_SIDES, { limits: { timeLimitMs: -1 } })).toThrow(
        'Invalid search limits: Number must be greater than 0'
      )
    })
  })

  describe('events', () => {
    it('emits each improvement, then solved', () => {
      const planner = createFestivalPlanner({ transitTimes: TRANSIT })
      const order: string[] = []
      const improvements: ImprovementEvent[] = []
      planner.on('improvement', e => { improvements.push(e); order.push('improvement') })
      planner.on('solved', () => { order.push('solved') })

      planner.plan(TWO_SIDES)

      expect(order).toEqual(['improvement', 'improvement', 'solved'])
      expect(improvements.map(e => [e.phase, e.totalTransitMinutes])).toEqual([
        ['attendance', 25],
        ['transit', 10],
      ])
    })

    it('solved receives the returned result', () => {
      const planner = createFestivalPlanner({ transitTimes: TRANSIT })
      let solved: ScheduleResult | null = null
      planner.on('solved', r => { solved = r })

      const result = planner.plan(TWO_SIDES)
      expect(solved).toBe(result)
    })

    it('unsubscribe stops delivery', () => {
      const planner = createFestivalPlanner({ transitTimes: TRANSIT })
      const handler = vi.fn()
      const off = planner.on('solved', handler)

      planner.plan(TWO_SIDES)
      off()
      planner.plan(TWO_SIDES)

      expect(handler).toHaveBeenCalledTimes(1)
    })

    it('handler errors are logged and do not break planning', () => {
      const logged = vi.spyOn(console, 'error').mockImplementation(() => {})
      const planner = createFestivalPlanner({ transitTimes: TRANSIT })
      const failure = new Error('Handler error')
      const after = vi.fn()
      planner.on('solved', () => { throw failure })
      planner.on('solved', after)

      const result = planner.plan(TWO_SIDES)

      expect(result.attendance).toBe(2)
      expect(after).toHaveBeenCalledTimes(1)
      expect(logged).toHaveBeenCalledWith("Event handler error on 'solved':", failure)
    })
  })

  describe('planProgramme', () => {
    it('plans the stored programme', async () => {
      const adapter = createMockAdapter()
      await adapter.createVenue({ id: 'EAST', name: 'East Hall' })
      await adapter.createVenue({ id: 'WEST', name: 'West Hall' })
      await adapter.setTransitTime('EAST', 'WEST', 25)
      await adapter.createEvent({ id: 'e1', title: 'Alpha', durationMinutes: 60 })
      await adapter.createEvent({ id: 'e2', title: 'Beta', durationMinutes: 60 })
      await adapter.addShowing({ id: 's1', eventId: 'e1', start: '2030-05-14 10:00', venueId: 'EAST' })
      await adapter.addShowing({ id: 's2', eventId: 'e2', start: '2030-05-14 11:20', venueId: 'WEST' })
      await adapter.addShowing({ id: 's3', eventId: 'e2', start: '2030-05-14 11:30', venueId: 'WEST' })

      const result = await planProgramme(adapter)

      expect(result.attendance).toBe(2)
      expect(result.entries.map(e => e.occurrence.start)).toEqual(['2030-05-14T10:00:00', '2030-05-14T11:30:00'])
      expect(result.totalTransitMinutes).toBe(25)
    })

    it('uses the programme same-venue time unless the config sets one', async () => {
      const stored = createMockAdapter()
      await stored.createVenue({ id: 'EAST', name: 'East Hall' })
      await stored.createEvent({ id: 'e1', title: 'Alpha', durationMinutes: 60 })
      await stored.createEvent({ id: 'e2', title: 'Beta', durationMinutes: 60 })
      await stored.addShowing({ id: 's1', eventId: 'e1', start: '2030-05-14 10:00', venueId: 'EAST' })
      await stored.addShowing({ id: 's2', eventId: 'e2', start: '2030-05-14 11:10', venueId: 'EAST' })
      const adapter = {
        ...stored,
        loadProgramme: async () => ({ ...(await stored.loadProgramme()), sameVenueMinutes: 15 }),
      }

      expect((await planProgramme(adapter)).attendance).toBe(1)
      expect((await planProgramme(adapter, { sameVenueMinutes: 5 })).attendance).toBe(2)
    })

    it('rejects a stored programme with a missing transit pair', async () => {
      const adapter = createMockAdapter()
      await adapter.createVenue({ id: 'EAST', name: 'East Hall' })
      await adapter.createVenue({ id: 'WEST', name: 'West Hall' })

      await expect(planProgramme(adapter)).rejects.toThrow("Transit table is missing the pair 'EAST' / 'WEST'")
    })
  })
})
