/**
 * Time & Date Utilities
 *
 * Pure functions for calendar dates, wall-clock times, and timezone conversion.
 * Uses Julian Day Number for all date arithmetic to avoid month-length edge cases.
 * Timezone support comes from Intl.DateTimeFormat.
 */

import { Result, Ok, Err } from './result'
import { ParseError } from './errors'

// ============================================================================
// Branded Types
// ============================================================================

declare const __localDate: unique symbol
declare const __localTime: unique symbol

/** Calendar date string: YYYY-MM-DD */
export type LocalDate = string & { readonly [__localDate]: true }

/** Wall-clock slot time string, minute-aligned: HH:MM (never carries seconds) */
export type LocalTime = string & { readonly [__localTime]: true }

// ============================================================================
// Helpers
// ============================================================================

const MONTH_DAYS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29
  return MONTH_DAYS[month - 1] ?? 0
}

function pad2(n: number): string {
  return n < 10 ? '0' + n : '' + n
}

function pad4(n: number): string {
  if (n < 10) return '000' + n
  if (n < 100) return '00' + n
  if (n < 1000) return '0' + n
  return '' + n
}

// ============================================================================
// Julian Day Number (for date arithmetic)
// ============================================================================

function dateToJDN(year: number, month: number, day: number): number {
  const a = Math.floor((14 - month) / 12)
  const y = year + 4800 - a
  const m = month + 12 * a - 3
  return (
    day +
    Math.floor((153 * m + 2) / 5) +
    365 * y +
    Math.floor(y / 4) -
    Math.floor(y / 100) +
    Math.floor(y / 400) -
    32045
  )
}

function jdnToDate(jdn: number): { year: number; month: number; day: number } {
  const a = jdn + 32044
  const b = Math.floor((4 * a + 3) / 146097)
  const c = a - Math.floor(146097 * b / 4)
  const d = Math.floor((4 * c + 3) / 1461)
  const e = c - Math.floor(1461 * d / 4)
  const m = Math.floor((5 * e + 2) / 153)
  const day = e - Math.floor((153 * m + 2) / 5) + 1
  const month = m + 3 - 12 * Math.floor(m / 10)
  const year = 100 * b + d - 4800 + Math.floor(m / 10)
  return { year, month, day }
}

// ============================================================================
// Parsing
// ============================================================================

export function parseDate(str: string): Result<LocalDate, ParseError> {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(str)
  if (!match) return Err(new ParseError(`Invalid date format: '${str}'`))

  const year = parseInt(match[1] ?? '', 10)
  const month = parseInt(match[2] ?? '', 10)
  const day = parseInt(match[3] ?? '', 10)

  if (month < 1 || month > 12)
    return Err(new ParseError(`Invalid month in date: '${str}'`))
  if (day < 1 || day > daysInMonth(year, month))
    return Err(new ParseError(`Invalid day in date: '${str}'`))

  return Ok(str as LocalDate)
}

/**
 * Accepts `H:MM`, `HH:MM` or `HH:MM:00` and normalizes to `HH:MM`.
 * Slots are minute-aligned, so a non-zero seconds field is rejected.
 */
export function parseTime(str: string): Result<LocalTime, ParseError> {
  const match = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/.exec(str)
  if (!match) return Err(new ParseError(`Invalid time format: '${str}'`))

  const hour = parseInt(match[1] ?? '', 10)
  const minute = parseInt(match[2] ?? '', 10)
  const second = match[3] ? parseInt(match[3], 10) : 0

  if (hour > 23)
    return Err(new ParseError(`Invalid hour in time: '${str}'`))
  if (minute > 59)
    return Err(new ParseError(`Invalid minute in time: '${str}'`))
  if (second !== 0)
    return Err(new ParseError(`Slot times cannot carry seconds: '${str}'`))

  return Ok(makeTime(hour, minute))
}

// ============================================================================
// Construction
// ============================================================================

export function makeDate(year: number, month: number, day: number): LocalDate {
  return `${pad4(year)}-${pad2(month)}-${pad2(day)}` as LocalDate
}

export function makeTime(hour: number, minute: number): LocalTime {
  return `${pad2(hour)}:${pad2(minute)}` as LocalTime
}

// ============================================================================
// Component Extraction
// ============================================================================

export function yearOf(date: LocalDate): number {
  return parseInt(date.substring(0, 4), 10)
}

export function monthOf(date: LocalDate): number {
  return parseInt(date.substring(5, 7), 10)
}

export function dayOf(date: LocalDate): number {
  return parseInt(date.substring(8, 10), 10)
}

export function hourOf(time: LocalTime): number {
  return parseInt(time.substring(0, 2), 10)
}

export function minuteOf(time: LocalTime): number {
  return parseInt(time.substring(3, 5), 10)
}

// ============================================================================
// Date Arithmetic (via JDN)
// ============================================================================

export function addDays(date: LocalDate, n: number): LocalDate {
  const jdn = dateToJDN(yearOf(date), monthOf(date), dayOf(date))
  const { year, month, day } = jdnToDate(jdn + n)
  return makeDate(year, month, day)
}

// ============================================================================
// Day-of-Week
// ============================================================================

/** Monday = 0 ... Sunday = 6 */
export function weekdayIndex(date: LocalDate): number {
  const jdn = dateToJDN(yearOf(date), monthOf(date), dayOf(date))
  // 1970-01-01 JDN = 2440588 → 2440588 mod 7 = 3 → thu (index 3)
  return ((jdn % 7) + 7) % 7
}

export function startOfWeek(date: LocalDate): LocalDate {
  return addDays(date, -weekdayIndex(date))
}

// ============================================================================
// Timezone Conversion
// ============================================================================

export function isValidTimezone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: tz })
    return true
  } catch {
    return false
  }
}

const formatters = new Map<string, Intl.DateTimeFormat>()

function formatterFor(tz: string): Intl.DateTimeFormat {
  let formatter = formatters.get(tz)
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone: tz,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
      hour12: false,
    })
    formatters.set(tz, formatter)
  }
  return formatter
}

/** Given a UTC epoch in ms, return the UTC offset in minutes for timezone tz */
function utcOffsetAtMs(utcMs: number, tz: string): number {
  const parts = formatterFor(tz).formatToParts(new Date(utcMs))
  const get = (type: string) => {
    const part = parts.find((p) => p.type === type)
    return part ? parseInt(part.value, 10) : 0
  }

  let h = get('hour')
  if (h === 24) h = 0
  const wholeSecondMs = utcMs - (((utcMs % 1000) + 1000) % 1000)
  const localMs = Date.UTC(get('year'), get('month') - 1, get('day'), h, get('minute'), get('second'))
  return Math.round((localMs - wholeSecondMs) / 60000)
}

/** Wall clock as epoch ms, treating the wall clock as if it were UTC */
function wallClockMs(date: LocalDate, time: LocalTime): number {
  return Date.UTC(yearOf(date), monthOf(date) - 1, dayOf(date), hourOf(time), minuteOf(time))
}

/**
 * Convert a wall-clock date and time in `tz` to a UTC epoch in ms.
 *
 * A wall time inside a spring-forward gap resolves to the first instant after
 * the transition. A wall time inside a fall-back overlap resolves to the
 * standard-time (later) instant.
 */
export function zonedToUtcMs(date: LocalDate, time: LocalTime, tz: string): number {
  const localMs = wallClockMs(date, time)
  if (tz === 'UTC') return localMs

  const year = yearOf(date)
  const janOffset = utcOffsetAtMs(Date.UTC(year, 0, 15, 12, 0, 0), tz)
  const julOffset = utcOffsetAtMs(Date.UTC(year, 6, 15, 12, 0, 0), tz)

  if (janOffset === julOffset) {
    const offset = utcOffsetAtMs(localMs - janOffset * 60000, tz)
    return localMs - offset * 60000
  }

  const stdOffset = Math.min(janOffset, julOffset)
  const dstOffset = Math.max(janOffset, julOffset)
  const utcViaStd = localMs - stdOffset * 60000
  const utcViaDst = localMs - dstOffset * 60000

  if (utcViaStd + utcOffsetAtMs(utcViaStd, tz) * 60000 === localMs) return utcViaStd
  if (utcViaDst + utcOffsetAtMs(utcViaDst, tz) * 60000 === localMs) return utcViaDst

  // Gap: scan minute-by-minute for the first post-transition instant
  for (let ms = utcViaDst; ms <= utcViaStd; ms += 60000) {
    if (utcOffsetAtMs(ms, tz) !== stdOffset) return ms
  }
  return utcViaStd
}

/** Calendar date and wall-clock time of a UTC epoch in `tz` */
export function utcMsToZoned(utcMs: number, tz: string): { date: LocalDate; time: LocalTime } {
  const shifted = new Date(utcMs + utcOffsetAtMs(utcMs, tz) * 60000)
  return {
    date: makeDate(shifted.getUTCFullYear(), shifted.getUTCMonth() + 1, shifted.getUTCDate()),
    time: makeTime(shifted.getUTCHours(), shifted.getUTCMinutes()),
  }
}
