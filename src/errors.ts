/**
 * Consolidated error system for festival-planner.
 *
 * All error classes extend FestivalPlannerError, which carries a typed error code.
 * Modules re-export the classes they throw.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const FestivalPlannerErrorCode = {
  // Programme loading
  MALFORMED_EVENT: 'MALFORMED_EVENT',
  INFEASIBLE_TRANSIT_TABLE: 'INFEASIBLE_TRANSIT_TABLE',
  INVALID_CONFIG: 'INVALID_CONFIG',

  // Programme store
  DUPLICATE_KEY: 'DUPLICATE_KEY',
  NOT_FOUND: 'NOT_FOUND',
  INVALID_DATA: 'INVALID_DATA',

  // Time & date
  PARSE_ERROR: 'PARSE_ERROR',

  // Optimizer
  SCHEDULE_VERIFICATION: 'SCHEDULE_VERIFICATION',
} as const

export type FestivalPlannerErrorCode = (typeof FestivalPlannerErrorCode)[keyof typeof FestivalPlannerErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class FestivalPlannerError extends Error {
  readonly code: FestivalPlannerErrorCode

  constructor(code: FestivalPlannerErrorCode, message: string) {
    super(message)
    this.name = 'FestivalPlannerError'
    this.code = code
  }
}

// ============================================================================
// Programme Loading Errors
// ============================================================================

export class MalformedEventError extends FestivalPlannerError {
  constructor(message: string) {
    super(FestivalPlannerErrorCode.MALFORMED_EVENT, message)
    this.name = 'MalformedEventError'
  }
}

export class InfeasibleTransitTableError extends FestivalPlannerError {
  constructor(message: string) {
    super(FestivalPlannerErrorCode.INFEASIBLE_TRANSIT_TABLE, message)
    this.name = 'InfeasibleTransitTableError'
  }
}

export class InvalidConfigError extends FestivalPlannerError {
  constructor(message: string) {
    super(FestivalPlannerErrorCode.INVALID_CONFIG, message)
    this.name = 'InvalidConfigError'
  }
}

// ============================================================================
// Store Errors
// ============================================================================

export class DuplicateKeyError extends FestivalPlannerError {
  constructor(message: string) {
    super(FestivalPlannerErrorCode.DUPLICATE_KEY, message)
    this.name = 'DuplicateKeyError'
  }
}

export class NotFoundError extends FestivalPlannerError {
  constructor(message: string) {
    super(FestivalPlannerErrorCode.NOT_FOUND, message)
    this.name = 'NotFoundError'
  }
}

export class InvalidDataError extends FestivalPlannerError {
  constructor(message: string) {
    super(FestivalPlannerErrorCode.INVALID_DATA, message)
    this.name = 'InvalidDataError'
  }
}

// ============================================================================
// Time & Date Errors
// ============================================================================

export class ParseError extends FestivalPlannerError {
  constructor(message: string) {
    super(FestivalPlannerErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}

// ============================================================================
// Optimizer Errors
// ============================================================================

export class ScheduleVerificationError extends FestivalPlannerError {
  constructor(message: string) {
    super(FestivalPlannerErrorCode.SCHEDULE_VERIFICATION, message)
    this.name = 'ScheduleVerificationError'
  }
}
