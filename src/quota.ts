/**
 * Weekly reservation quota.
 *
 * The window is the calendar week, Monday 00:00 to the next Monday 00:00 in
 * the business timezone, that contains the reservation being made.
 */

import { addDays, startOfWeek, utcMsToZoned, zonedToUtcMs, makeTime } from './time-date'
import { type Instant, instantToMs, msToInstant } from './timestamps'

export const DEFAULT_WEEKLY_QUOTA = 50

export type QuotaWindow = {
  /** Inclusive */
  start: Instant
  /** Exclusive */
  end: Instant
}

export function weekWindowFor(instant: Instant, timezone: string): QuotaWindow {
  const { date } = utcMsToZoned(instantToMs(instant), timezone)
  const monday = startOfWeek(date)
  const midnight = makeTime(0, 0)
  return {
    start: msToInstant(zonedToUtcMs(monday, midnight, timezone)),
    end: msToInstant(zonedToUtcMs(addDays(monday, 7), midnight, timezone)),
  }
}
