/**
 * Segment 1: Time & Date Utilities
 *
 * Calendar parsing and arithmetic, weekday computation and conversion between
 * wall-clock time in an IANA timezone and UTC.
 */

import { describe, it, expect } from 'vitest'
import * as fc from 'fast-check'
import {
  parseDate,
  parseTime,
  addDays,
  weekdayIndex,
  startOfWeek,
  isValidTimezone,
  zonedToUtcMs,
  utcMsToZoned,
  makeTime,
} from '../src/time-date'
import { date, time } from './helpers/fixtures'

describe('Segment 1: Time & Date', () => {
  // ========================================================================
  // Parsing
  // ========================================================================

  describe('parseDate', () => {
    it('accepts valid calendar dates', () => {
      const result = parseDate('2024-02-29')
      expect(result.ok).toBe(true)
      if (result.ok) expect(result.value).toBe('2024-02-29')
    })

    it('rejects a day outside the month', () => {
      const result = parseDate('2025-02-29')
      expect(result.ok).toBe(false)
      if (!result.ok) expect(result.error.message).toBe("Invalid day in date: '2025-02-29'")
    })

    it('rejects month 13 and malformed text', () => {
      expect(parseDate('2025-13-01').ok).toBe(false)
      expect(parseDate('2025/06/01').ok).toBe(false)
      expect(parseDate('').ok).toBe(false)
    })
  })

  describe('parseTime', () => {
    it('normalizes to HH:MM', () => {
      const short = parseTime('9:05')
      const long = parseTime('14:00:00')
      expect(short.ok && short.value).toBe('09:05')
      expect(long.ok && long.value).toBe('14:00')
    })

    it('rejects seconds, out-of-range fields and words', () => {
      expect(parseTime('14:00:30').ok).toBe(false)
      expect(parseTime('24:00').ok).toBe(false)
      expect(parseTime('12:60').ok).toBe(false)
      expect(parseTime('noon').ok).toBe(false)
    })
  })

  // ========================================================================
  // Arithmetic
  // ========================================================================

  describe('date arithmetic', () => {
    it('addDays crosses month and year boundaries', () => {
      expect(addDays(date('2025-02-28'), 1)).toBe('2025-03-01')
      expect(addDays(date('2024-02-28'), 1)).toBe('2024-02-29')
      expect(addDays(date('2025-01-01'), -1)).toBe('2024-12-31')
    })

    it('weekdayIndex counts from Monday', () => {
      expect(weekdayIndex(date('1970-01-01'))).toBe(3)
      expect(weekdayIndex(date('2025-06-02'))).toBe(0)
      expect(weekdayIndex(date('2025-06-08'))).toBe(6)
    })

    it('startOfWeek returns the Monday on or before a date', () => {
      expect(startOfWeek(date('2025-06-08'))).toBe('2025-06-02')
      expect(startOfWeek(date('2025-06-02'))).toBe('2025-06-02')
      expect(startOfWeek(date('2025-06-01'))).toBe('2025-05-26')
    })
  })

  // ========================================================================
  // Timezones
  // ========================================================================

  describe('timezones', () => {
    it('recognizes IANA names', () => {
      expect(isValidTimezone('Asia/Tashkent')).toBe(true)
      expect(isValidTimezone('UTC')).toBe(true)
      expect(isValidTimezone('Mars/Olympus_Mons')).toBe(false)
    })

    it('converts a fixed-offset zone', () => {
      expect(zonedToUtcMs(date('2025-06-10'), time('14:00'), 'Asia/Tashkent')).toBe(
        Date.UTC(2025, 5, 10, 9, 0)
      )
    })

    it('treats UTC wall time as the instant itself', () => {
      expect(zonedToUtcMs(date('2025-06-10'), time('14:00'), 'UTC')).toBe(Date.UTC(2025, 5, 10, 14, 0))
    })

    it('uses the daylight offset in summer', () => {
      expect(zonedToUtcMs(date('2025-06-10'), time('14:00'), 'America/New_York')).toBe(
        Date.UTC(2025, 5, 10, 18, 0)
      )
    })

    it('resolves a spring-forward gap to the first instant after the transition', () => {
      expect(zonedToUtcMs(date('2025-03-09'), time('02:30'), 'America/New_York')).toBe(
        Date.UTC(2025, 2, 9, 7, 0)
      )
    })

    it('resolves a fall-back overlap to standard time', () => {
      expect(zonedToUtcMs(date('2025-11-02'), time('01:30'), 'America/New_York')).toBe(
        Date.UTC(2025, 10, 2, 6, 30)
      )
    })

    it('utcMsToZoned gives the local calendar date', () => {
      expect(utcMsToZoned(Date.UTC(2025, 5, 9, 20, 0), 'Asia/Tashkent')).toEqual({
        date: '2025-06-10',
        time: '01:00',
      })
    })

    it('round-trips wall clock through UTC in a zone without DST', () => {
      fc.assert(
        fc.property(
          fc.integer({ min: 0, max: 365 * 30 }),
          fc.integer({ min: 0, max: 23 }),
          fc.integer({ min: 0, max: 59 }),
          (offset, hour, minute) => {
            const day = addDays(date('2000-01-01'), offset)
            const wall = makeTime(hour, minute)
            const ms = zonedToUtcMs(day, wall, 'Asia/Tashkent')
            expect(utcMsToZoned(ms, 'Asia/Tashkent')).toEqual({ date: day, time: wall })
          }
        )
      )
    })
  })
})
