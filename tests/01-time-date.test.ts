/**
 * Segment 1: Time & Day Tests
 *
 * Clock-time parsing/normalization and the Sunday–Thursday teaching week.
 */
import { describe, it, expect } from 'vitest'
import {
  parseTime,
  parseTeachingDay,
  makeTime,
  dayRank,
  compareTimes,
  compareDays,
  TEACHING_DAYS,
  ParseError,
} from '../src/time-date'

describe('Segment 1: Time & Day', () => {
  // ========================================================================
  // parseTime
  // ========================================================================

  describe('parseTime', () => {
    it('normalizes HH:MM', () => {
      const r = parseTime('09:30')
      expect(r).toEqual({ ok: true, value: '09:30' })
    })

    it('pads a single-digit hour', () => {
      const r = parseTime('8:05')
      expect(r.ok && r.value).toBe('08:05')
    })

    it('drops seconds after validating them', () => {
      const r = parseTime('14:00:00')
      expect(r.ok && r.value).toBe('14:00')
    })

    it('trims surrounding whitespace', () => {
      const r = parseTime('  10:15 ')
      expect(r.ok && r.value).toBe('10:15')
    })

    it.each(['', 'noon', '9', '24:00', '12:60', '12:00:61', '9.30'])('rejects %j', input => {
      const r = parseTime(input)
      expect(r.ok).toBe(false)
      if (!r.ok) expect(r.error).toBeInstanceOf(ParseError)
    })

    it('reports the offending input', () => {
      const r = parseTime('25:00')
      expect(r.ok).toBe(false)
      if (!r.ok) expect(r.error.message).toBe("Invalid hour in time: '25:00'")
    })
  })

  describe('makeTime', () => {
    it('zero-pads both parts', () => {
      expect(makeTime(7, 5)).toBe('07:05')
      expect(makeTime(13, 45)).toBe('13:45')
    })
  })

  // ========================================================================
  // Teaching days
  // ========================================================================

  describe('teaching days', () => {
    it('runs Sunday through Thursday', () => {
      expect(TEACHING_DAYS).toEqual(['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday'])
    })

    it('ranks days 0..4', () => {
      expect(TEACHING_DAYS.map(dayRank)).toEqual([0, 1, 2, 3, 4])
    })

    it('parses case-insensitively to the canonical name', () => {
      const r = parseTeachingDay(' tuesday ')
      expect(r.ok && r.value).toBe('Tuesday')
    })

    it('rejects days outside the teaching week', () => {
      const r = parseTeachingDay('Friday')
      expect(r.ok).toBe(false)
      if (!r.ok) expect(r.error.message).toBe("Not a teaching day: 'Friday'")
    })
  })

  // ========================================================================
  // Comparison
  // ========================================================================

  describe('comparison', () => {
    it('orders times chronologically', () => {
      expect(compareTimes(makeTime(9, 0), makeTime(10, 0))).toBe(-1)
      expect(compareTimes(makeTime(10, 0), makeTime(9, 0))).toBe(1)
      expect(compareTimes(makeTime(9, 0), makeTime(9, 0))).toBe(0)
    })

    it('orders days by week position', () => {
      expect(compareDays('Sunday', 'Thursday')).toBeLessThan(0)
      expect(compareDays('Wednesday', 'Monday')).toBeGreaterThan(0)
      expect(compareDays('Monday', 'Monday')).toBe(0)
    })
  })
})
