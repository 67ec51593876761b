/**
 * Time & Day Utilities
 *
 * Parsing and ordering for the weekly grid: clock times within a day and
 * the five teaching days of the week.
 */

import { type Result, Ok, Err } from './result'

// ============================================================================
// Branded Types
// ============================================================================

declare const __localTime: unique symbol

/** Normalized clock time: HH:MM */
export type LocalTime = string & { readonly [__localTime]: true }

export const TEACHING_DAYS = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday'] as const

export type TeachingDay = (typeof TEACHING_DAYS)[number]

// ============================================================================
// Errors
// ============================================================================

export { ParseError } from './errors'
import { ParseError } from './errors'

// ============================================================================
// Helpers
// ============================================================================

function pad2(n: number): string {
  return n < 10 ? '0' + n : '' + n
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Accepts `H:MM`, `HH:MM` and `HH:MM:SS`. Seconds are validated, then dropped.
 */
export function parseTime(str: string): Result<LocalTime, ParseError> {
  const match = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/.exec(str.trim())
  if (!match) return Err(new ParseError(`Invalid time format: '${str}'`))

  const hour = parseInt(match[1] ?? '', 10)
  const minute = parseInt(match[2] ?? '', 10)
  const second = match[3] ? parseInt(match[3], 10) : 0

  if (hour > 23)
    return Err(new ParseError(`Invalid hour in time: '${str}'`))
  if (minute > 59)
    return Err(new ParseError(`Invalid minute in time: '${str}'`))
  if (second > 59)
    return Err(new ParseError(`Invalid second in time: '${str}'`))

  return Ok(makeTime(hour, minute))
}

export function makeTime(hour: number, minute: number): LocalTime {
  return `${pad2(hour)}:${pad2(minute)}` as LocalTime
}

export function parseTeachingDay(str: string): Result<TeachingDay, ParseError> {
  const lower = str.trim().toLowerCase()
  const day = TEACHING_DAYS.find(d => d.toLowerCase() === lower)
  if (!day) return Err(new ParseError(`Not a teaching day: '${str}'`))
  return Ok(day)
}

// ============================================================================
// Ordering
// ============================================================================

/** Sunday = 0 … Thursday = 4 */
export function dayRank(day: TeachingDay): number {
  return TEACHING_DAYS.indexOf(day)
}

export function compareTimes(a: LocalTime, b: LocalTime): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

export function compareDays(a: TeachingDay, b: TeachingDay): number {
  return dayRank(a) - dayRank(b)
}
