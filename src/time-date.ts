/**
 * Time & Date
 *
 * Festival-local timestamps as branded ISO strings. Lexicographic order on
 * `LocalDateTime` is chronological order, so comparisons stay on strings;
 * arithmetic goes through a minute count since 1970-01-01.
 */

import { type Result, Ok, Err } from './result'
import { ParseError } from './errors'

export { ParseError } from './errors'

// ============================================================================
// Branded Types
// ============================================================================

declare const __localDate: unique symbol
declare const __localTime: unique symbol
declare const __localDateTime: unique symbol

/** YYYY-MM-DD */
export type LocalDate = string & { readonly [__localDate]: true }

/** HH:MM:SS */
export type LocalTime = string & { readonly [__localTime]: true }

/** YYYY-MM-DDTHH:MM:SS */
export type LocalDateTime = string & { readonly [__localDateTime]: true }

// ============================================================================
// Calendar
// ============================================================================

const MINUTES_PER_DAY = 1440

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

function monthLength(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28
  return month === 4 || month === 6 || month === 9 || month === 11 ? 30 : 31
}

/** Days since 1970-01-01 in the proleptic Gregorian calendar */
function dayNumber(year: number, month: number, day: number): number {
  const y = month <= 2 ? year - 1 : year
  const era = Math.floor(y / 400)
  const yearOfEra = y - era * 400
  const dayOfYear = Math.floor((153 * (month > 2 ? month - 3 : month + 9) + 2) / 5) + day - 1
  const dayOfEra = yearOfEra * 365 + Math.floor(yearOfEra / 4) - Math.floor(yearOfEra / 100) + dayOfYear
  return era * 146097 + dayOfEra - 719468
}

function calendarDate(days: number): { year: number; month: number; day: number } {
  const shifted = days + 719468
  const era = Math.floor(shifted / 146097)
  const dayOfEra = shifted - era * 146097
  const yearOfEra = Math.floor(
    (dayOfEra - Math.floor(dayOfEra / 1460) + Math.floor(dayOfEra / 36524) - Math.floor(dayOfEra / 146096)) / 365
  )
  const dayOfYear = dayOfEra - (365 * yearOfEra + Math.floor(yearOfEra / 4) - Math.floor(yearOfEra / 100))
  const mp = Math.floor((5 * dayOfYear + 2) / 153)
  const month = mp < 10 ? mp + 3 : mp - 9
  return {
    year: yearOfEra + era * 400 + (month <= 2 ? 1 : 0),
    month,
    day: dayOfYear - Math.floor((153 * mp + 2) / 5) + 1,
  }
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0')
}

function field(dt: LocalDateTime, from: number, to: number): number {
  return Number(dt.substring(from, to))
}

/** Minutes since 1970-01-01T00:00, seconds dropped */
function minuteStamp(dt: LocalDateTime): number {
  const days = dayNumber(field(dt, 0, 4), field(dt, 5, 7), field(dt, 8, 10))
  return days * MINUTES_PER_DAY + field(dt, 11, 13) * 60 + field(dt, 14, 16)
}

// ============================================================================
// Parsing
// ============================================================================

export function parseDate(str: string): Result<LocalDate, ParseError> {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(str)
  if (!match) return Err(new ParseError(`Invalid date format: '${str}'`))

  const [year, month, day] = [match[1], match[2], match[3]].map(Number)
  if (year === undefined || month === undefined || day === undefined) {
    return Err(new ParseError(`Invalid date format: '${str}'`))
  }
  if (month < 1 || month > 12) return Err(new ParseError(`Invalid month in date: '${str}'`))
  if (day < 1 || day > monthLength(year, month)) return Err(new ParseError(`Invalid day in date: '${str}'`))

  return Ok(makeDate(year, month, day))
}

/** `HH:MM` or `HH:MM:SS`, normalized to `HH:MM:SS` */
export function parseTime(str: string): Result<LocalTime, ParseError> {
  const match = /^(\d{2}):(\d{2})(?::(\d{2}))?$/.exec(str)
  if (!match) return Err(new ParseError(`Invalid time format: '${str}'`))

  const hour = Number(match[1])
  const minute = Number(match[2])
  const second = match[3] === undefined ? 0 : Number(match[3])
  if (hour > 23 || minute > 59 || second > 59) {
    return Err(new ParseError(`Time out of range: '${str}'`))
  }

  return Ok(makeTime(hour, minute, second))
}

/**
 * Accepts a `T` or a single space between date and time; programme sheets
 * are usually written with the space.
 */
export function parseDateTime(str: string): Result<LocalDateTime, ParseError> {
  const sepIdx = str.search(/[T ]/)
  if (sepIdx === -1) return Err(new ParseError(`Invalid datetime format (missing time): '${str}'`))

  const date = parseDate(str.substring(0, sepIdx))
  const time = parseTime(str.substring(sepIdx + 1))
  if (!date.ok || !time.ok) return Err(new ParseError(`Invalid datetime: '${str}'`))

  return Ok(makeDateTime(date.value, time.value))
}

// ============================================================================
// Construction
// ============================================================================

export function makeDate(year: number, month: number, day: number): LocalDate {
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}` as LocalDate
}

export function makeTime(hour: number, minute: number, second = 0): LocalTime {
  return `${pad(hour)}:${pad(minute)}:${pad(second)}` as LocalTime
}

export function makeDateTime(date: LocalDate, time: LocalTime): LocalDateTime {
  return `${date}T${time}` as LocalDateTime
}

export function dateOf(dt: LocalDateTime): LocalDate {
  return dt.substring(0, 10) as LocalDate
}

/** `YYYY-MM-DD HH:MM`, the programme-sheet form */
export function formatDateTimeShort(dt: LocalDateTime): string {
  return `${dateOf(dt)} ${dt.substring(11, 16)}`
}

// ============================================================================
// Arithmetic
// ============================================================================

/** Shifts by whole minutes, rolling over days and years; seconds are kept */
export function addMinutes(dt: LocalDateTime, n: number): LocalDateTime {
  const stamp = minuteStamp(dt) + n
  const days = Math.floor(stamp / MINUTES_PER_DAY)
  const minuteOfDay = stamp - days * MINUTES_PER_DAY
  const { year, month, day } = calendarDate(days)
  return makeDateTime(
    makeDate(year, month, day),
    makeTime(Math.floor(minuteOfDay / 60), minuteOfDay % 60, field(dt, 17, 19))
  )
}

/** Whole minutes from a to b; seconds are ignored */
export function minutesBetween(a: LocalDateTime, b: LocalDateTime): number {
  return minuteStamp(b) - minuteStamp(a)
}

// ============================================================================
// Comparison
// ============================================================================

export function compareDateTimes(a: LocalDateTime, b: LocalDateTime): number {
  if (a === b) return 0
  return a < b ? -1 : 1
}

export function sameDate(a: LocalDateTime, b: LocalDateTime): boolean {
  return dateOf(a) === dateOf(b)
}
