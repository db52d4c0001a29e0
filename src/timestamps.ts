/**
 * Timestamp Normalizer
 *
 * Every persisted point in time is an Instant: the canonical
 * `YYYY-MM-DDTHH:MM:SS.sssZ` text produced by Date#toISOString. Instants are
 * compared by their parsed value, never by their text.
 *
 * `parseInstant` is the strict reader used in steady state. The lenient
 * `normalizeLegacyTimestamp` reader accepts the formats older rows were
 * written in and exists for the normalization migration.
 */

import { Result, Ok, Err } from './result'
import { ParseError } from './errors'
import {
  type LocalDate,
  type LocalTime,
  parseDate,
  zonedToUtcMs,
} from './time-date'

declare const __instant: unique symbol

/** Canonical UTC timestamp: YYYY-MM-DDTHH:MM:SS.sssZ */
export type Instant = string & { readonly [__instant]: true }

// ============================================================================
// Conversion
// ============================================================================

export function msToInstant(ms: number): Instant {
  return new Date(ms).toISOString() as Instant
}

export function instantToMs(instant: Instant): number {
  return Date.parse(instant)
}

export function compareInstants(a: Instant, b: Instant): number {
  return instantToMs(a) - instantToMs(b)
}

export function addMinutesToInstant(instant: Instant, minutes: number): Instant {
  return msToInstant(instantToMs(instant) + minutes * 60000)
}

/** The instant a wall-clock slot starts at in the business timezone */
export function slotInstant(date: LocalDate, time: LocalTime, timezone: string): Instant {
  return msToInstant(zonedToUtcMs(date, time, timezone))
}

// ============================================================================
// Strict Parsing
// ============================================================================

const STRICT_PATTERN =
  /^(\d{4}-\d{2}-\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.\d{1,3})?(?:Z|[+-]\d{2}:\d{2})$/

/**
 * Parse an ISO-8601 timestamp that carries an explicit zone (`Z` or `±HH:MM`)
 * and return it in canonical form. Returns null for anything else.
 */
export function parseInstant(text: string): Instant | null {
  const match = STRICT_PATTERN.exec(text)
  if (!match) return null
  if (!parseDate(match[1] ?? '').ok) return null
  if (!clockInRange(match[2], match[3], match[4])) return null

  const ms = Date.parse(text)
  if (Number.isNaN(ms)) return null
  return msToInstant(ms)
}

export function isCanonicalInstant(text: string): text is Instant {
  return parseInstant(text) === text
}

// ============================================================================
// Legacy Normalization
// ============================================================================

const LEGACY_PATTERN =
  /^(\d{4}-\d{2}-\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d+))?)?\s*(Z|z|[+-]\d{2}:?\d{2})?$/

function clockInRange(h: string | undefined, m: string | undefined, s: string | undefined): boolean {
  const hour = parseInt(h ?? '0', 10)
  const minute = parseInt(m ?? '0', 10)
  const second = parseInt(s ?? '0', 10)
  return hour <= 23 && minute <= 59 && second <= 59
}

function offsetMinutes(zone: string | undefined): number {
  if (!zone || zone === 'Z' || zone === 'z') return 0
  const sign = zone.startsWith('-') ? -1 : 1
  const digits = zone.slice(1).replace(':', '')
  return sign * (parseInt(digits.slice(0, 2), 10) * 60 + parseInt(digits.slice(2, 4), 10))
}

/**
 * Accepts:
 * - naive ISO `YYYY-MM-DDTHH:MM[:SS]`, read as UTC
 * - space-separated `YYYY-MM-DD HH:MM[:SS]`
 * - fractional seconds of any precision (truncated to milliseconds)
 * - offsets `Z`, `±HH:MM` and `±HHMM`
 */
export function normalizeLegacyTimestamp(text: string): Result<Instant, ParseError> {
  const trimmed = text.trim()
  const match = LEGACY_PATTERN.exec(trimmed)
  if (!match) return Err(new ParseError(`Unrecognized timestamp: '${text}'`))

  const [, datePart = '', hh, mm, ss, fraction, zone] = match
  const date = parseDate(datePart)
  if (!date.ok) return Err(new ParseError(`Invalid date in timestamp: '${text}'`))
  if (!clockInRange(hh, mm, ss)) return Err(new ParseError(`Invalid time in timestamp: '${text}'`))

  const millis = fraction ? parseInt(fraction.slice(0, 3).padEnd(3, '0'), 10) : 0
  const wallMs = Date.UTC(
    parseInt(datePart.substring(0, 4), 10),
    parseInt(datePart.substring(5, 7), 10) - 1,
    parseInt(datePart.substring(8, 10), 10),
    parseInt(hh ?? '0', 10),
    parseInt(mm ?? '0', 10),
    parseInt(ss ?? '0', 10),
    millis
  )
  return Ok(msToInstant(wallMs - offsetMinutes(zone) * 60000))
}
