/**
 * Public API
 *
 * Wraps the modules into a planner object bound to one venue configuration.
 * Venue data is configuration, never module state, so independent planners
 * can run side by side.
 */

import type { EventInput, TransitTimes } from './types'
import type { TransitCostTable } from './transit-table'
import type { SearchLimits } from './search'
import type { ImprovementEvent } from './schedule-optimizer'
import type { ScheduleResult } from './schedule-result'
import type { Adapter } from './adapter'
import { parsePlannerConfig, searchLimitsSchema } from './programme-input'
import { createTransitTable } from './transit-table'
import { createEventCatalog } from './event-catalog'
import { createCompatibilityOracle } from './compatibility'
import { optimizeSchedule } from './schedule-optimizer'
import { InvalidConfigError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type PlannerConfig = {
  transitTimes: TransitTimes
  /** Minutes to move between screens of one venue; defaults to 5 */
  sameVenueMinutes?: number
  limits?: SearchLimits
}

export type PlanOptions = {
  /** Overrides the configured limits for this call */
  limits?: SearchLimits
}

export type PlannerEventMap = {
  improvement: ImprovementEvent
  solved: ScheduleResult
}

export type PlannerEventName = keyof PlannerEventMap

export interface FestivalPlanner {
  readonly transitTable: TransitCostTable
  plan(events: readonly EventInput[], options?: PlanOptions): ScheduleResult
  /** Returns an unsubscribe function */
  on<K extends PlannerEventName>(event: K, handler: (payload: PlannerEventMap[K]) => void): () => void
}

type HandlerLists = { [K in PlannerEventName]: Array<(payload: PlannerEventMap[K]) => void> }

// ============================================================================
// Planner
// ============================================================================

/**
 * @throws InvalidConfigError when the config does not match its schema
 * @throws InfeasibleTransitTableError when the transit table is incomplete or asymmetric
 */
export function createFestivalPlanner(config: PlannerConfig): FestivalPlanner {
  const settings = parsePlannerConfig(config)
  const transitTable = createTransitTable(settings.transitTimes, {
    sameVenueMinutes: settings.sameVenueMinutes,
  })
  const oracle = createCompatibilityOracle(transitTable)

  // Event handlers
  const handlers: HandlerLists = { improvement: [], solved: [] }

  function emit<K extends PlannerEventName>(event: K, payload: PlannerEventMap[K]): boolean {
    let hadErrors = false
    for (const handler of [...handlers[event]]) {
      try { handler(payload) } catch (e) { hadErrors = true; console.error(`Event handler error on '${event}':`, e) }
    }
    return !hadErrors
  }

  function resolveLimits(options?: PlanOptions): SearchLimits {
    if (!options?.limits) return settings.limits ?? {}
    const parsed = searchLimitsSchema.safeParse(options.limits)
    if (!parsed.success) {
      throw new InvalidConfigError(`Invalid search limits: ${parsed.error.issues.map(i => i.message).join('; ')}`)
    }
    return { ...settings.limits, ...parsed.data }
  }

  return {
    transitTable,

    plan(events: readonly EventInput[], options?: PlanOptions) {
      const limits = resolveLimits(options)
      const catalog = createEventCatalog(events, transitTable)
      const result = optimizeSchedule(catalog, oracle, {
        ...limits,
        onImprovement: improvement => { emit('improvement', improvement) },
      })
      emit('solved', result)
      return result
    },

    on<K extends PlannerEventName>(event: K, handler: (payload: PlannerEventMap[K]) => void) {
      const list: Array<(payload: PlannerEventMap[K]) => void> = handlers[event]
      list.push(handler)
      return () => {
        const idx = list.indexOf(handler)
        if (idx !== -1) list.splice(idx, 1)
      }
    },
  }
}

/**
 * Loads a stored programme and plans it with the stored transit table. The
 * programme's `sameVenueMinutes` applies unless the config sets its own.
 */
export async function planProgramme(
  adapter: Adapter,
  config: Omit<PlannerConfig, 'transitTimes'> = {}
): Promise<ScheduleResult> {
  const programme = await adapter.loadProgramme()
  const planner = createFestivalPlanner({
    ...config,
    transitTimes: programme.transitTimes,
    sameVenueMinutes: config.sameVenueMinutes ?? programme.sameVenueMinutes,
  })
  return planner.plan(programme.events)
}
