/**
 * Segment 12: Error System Tests
 *
 * The consolidated error system in errors.ts: the FestivalPlannerError base
 * class, the error code map, and every subclass.
 */

import { describe, it, expect } from 'vitest'
import {
  FestivalPlannerError,
  FestivalPlannerErrorCode,
  MalformedEventError,
  InfeasibleTransitTableError,
  InvalidConfigError,
  DuplicateKeyError,
  NotFoundError,
  InvalidDataError,
  ParseError,
  ScheduleVerificationError,
} from '../src/errors'

describe('Segment 12: Error System', () => {
  // ========================================================================
  // FestivalPlannerError Base Class
  // ========================================================================

  describe('FestivalPlannerError base class', () => {
    it('constructor sets code and message', () => {
      const err = new FestivalPlannerError(FestivalPlannerErrorCode.NOT_FOUND, 'test message')
      expect(err.code).toBe('NOT_FOUND')
      expect(err.message).toBe('test message')
    })

    it('is instanceof Error', () => {
      const err = new FestivalPlannerError(FestivalPlannerErrorCode.INVALID_CONFIG, 'x')
      expect(err).toBeInstanceOf(Error)
      expect(err).toBeInstanceOf(FestivalPlannerError)
    })

    it('name property is FestivalPlannerError', () => {
      const err = new FestivalPlannerError(FestivalPlannerErrorCode.INVALID_CONFIG, 'x')
      expect(err.name).toBe('FestivalPlannerError')
    })
  })

  // ========================================================================
  // FestivalPlannerErrorCode
  // ========================================================================

  describe('FestivalPlannerErrorCode', () => {
    it('has exactly 8 unique code values', () => {
      const values = Object.values(FestivalPlannerErrorCode)
      expect(values).toHaveLength(8)
      expect(new Set(values).size).toBe(8)
      expect(values[0]).toBe('MALFORMED_EVENT')
    })

    it('code values match their key names', () => {
      for (const [key, value] of Object.entries(FestivalPlannerErrorCode)) {
        expect(value).toBe(key)
      }
    })
  })

  // ========================================================================
  // Error Subclasses (parametric)
  // ========================================================================

  const errorClasses = [
    { Class: MalformedEventError, code: 'MALFORMED_EVENT', name: 'MalformedEventError' },
    { Class: InfeasibleTransitTableError, code: 'INFEASIBLE_TRANSIT_TABLE', name: 'InfeasibleTransitTableError' },
    { Class: InvalidConfigError, code: 'INVALID_CONFIG', name: 'InvalidConfigError' },
    { Class: DuplicateKeyError, code: 'DUPLICATE_KEY', name: 'DuplicateKeyError' },
    { Class: NotFoundError, code: 'NOT_FOUND', name: 'NotFoundError' },
    { Class: InvalidDataError, code: 'INVALID_DATA', name: 'InvalidDataError' },
    { Class: ParseError, code: 'PARSE_ERROR', name: 'ParseError' },
    { Class: ScheduleVerificationError, code: 'SCHEDULE_VERIFICATION', name: 'ScheduleVerificationError' },
  ] as const

  describe('Error subclasses', () => {
    for (const { Class, code, name } of errorClasses) {
      describe(name, () => {
        it(`code is ${code}`, () => {
          expect(new Class('test').code).toBe(code)
        })

        it(`name is ${name}`, () => {
          expect(new Class('test').name).toBe(name)
        })

        it('instanceof chain: subclass -> FestivalPlannerError', () => {
          const err = new Class('test')
          expect(err).toBeInstanceOf(Class)
          expect(err).toBeInstanceOf(FestivalPlannerError)
          expect(err.message).toBe('test')
        })
      })
    }
  })
})
