/**
 * festival-planner
 *
 * Public API exports
 */

// Error system: base class, codes, error classes
export {
  FestivalPlannerError, FestivalPlannerErrorCode,
  MalformedEventError, InfeasibleTransitTableError, InvalidConfigError,
  DuplicateKeyError, NotFoundError, InvalidDataError,
  ParseError, ScheduleVerificationError,
} from './errors'
export type { FestivalPlannerErrorCode as FestivalPlannerErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Time & Date
export type { LocalDate, LocalTime, LocalDateTime } from './time-date'
export { parseDateTime, formatDateTimeShort, minutesBetween, sameDate } from './time-date'

// Shared types
export type { VenueId, TransitTimes, EventInput, OccurrenceInput } from './types'
export { venueId } from './types'

// Transit table
export type { TransitCostTable, TransitTableOptions } from './transit-table'
export { createTransitTable, DEFAULT_SAME_VENUE_MINUTES } from './transit-table'

// Event catalog
export type { EventCatalog, Occurrence } from './event-catalog'
export { createEventCatalog } from './event-catalog'

// Compatibility
export type { ConflictPredicate, CompatibilityOracle, ConflictGraph } from './compatibility'
export { createCompatibilityOracle, buildConflictGraph } from './compatibility'

// Exact search (backend-agnostic decision model)
export type {
  DecisionModel, SearchPhase, SearchStatus, SearchSnapshot,
  SearchLimits, SearchOptions, SearchStats, SearchOutcome,
} from './search'
export { solveTwoPhase, totalTransitOf, Incumbent } from './search'

// Optimizer
export type {
  ImprovementEvent, OptimizeOptions, ScheduleDecisionModel,
  Violation, ViolationReason,
} from './schedule-optimizer'
export { buildDecisionModel, findViolations, optimizeSchedule } from './schedule-optimizer'

// Result assembly + rendering
export type { ScheduleEntry, ScheduleResult } from './schedule-result'
export { buildScheduleResult, renderSchedule } from './schedule-result'

// Programme input
export type { ProgrammeInput, PlannerSettings } from './programme-input'
export {
  programmeInputSchema, plannerConfigSchema, eventInputSchema,
  occurrenceInputSchema, transitTimesSchema, searchLimitsSchema,
  parseProgramme, parsePlannerConfig,
} from './programme-input'

// Adapter (persistence interface + in-memory mock)
export type { Adapter, Venue, TransitTime, FestivalEvent, Showing } from './adapter'
export { createMockAdapter } from './adapter'

// SQLite adapter
export type { SqliteAdapter } from './sqlite-adapter'
export { createSqliteAdapter } from './sqlite-adapter'

// High-level API
export type {
  FestivalPlanner, PlannerConfig, PlanOptions,
  PlannerEventMap, PlannerEventName,
} from './public-api'
export { createFestivalPlanner, planProgramme } from './public-api'
