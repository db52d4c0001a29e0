/**
 * Closed-Date Registry
 *
 * Calendar dates on which no new reservations are accepted, each with an
 * optional human-readable reason.
 */

import type { Adapter } from './adapter'
import { ValidationError } from './errors'
import { type LocalDate, parseDate } from './time-date'
import { msToInstant } from './timestamps'
import type { ClosedDate } from './types'
import { type Clock, systemClock } from './scheduler'
import { type Logger, silentLogger } from './logger'
import { convertAll, toClosedDate } from './internal/helpers'

export type ClosedDateRegistryDeps = {
  adapter: Adapter
  clock?: Clock
  logger?: Logger
}

export type ClosedDateRegistry = ReturnType<typeof createClosedDateRegistry>

function requireDate(date: string): LocalDate {
  const parsed = parseDate(date)
  if (!parsed.ok) throw new ValidationError(parsed.error.message)
  return parsed.value
}

export function createClosedDateRegistry(deps: ClosedDateRegistryDeps) {
  const { adapter } = deps
  const clock = deps.clock ?? systemClock
  const logger = deps.logger ?? silentLogger

  async function isClosed(date: LocalDate): Promise<boolean> {
    return (await adapter.getClosedDate(date)) !== null
  }

  /** Null when the date is open; the stored reason (possibly empty) otherwise */
  async function reasonFor(date: LocalDate): Promise<string | null> {
    const record = await adapter.getClosedDate(date)
    return record ? record.reason : null
  }

  /** Closing an already-closed date replaces its reason */
  async function close(date: LocalDate, reason = ''): Promise<void> {
    const valid = requireDate(date)
    await adapter.upsertClosedDate({ date: valid, reason, createdAt: msToInstant(clock.now()) })
    logger.info(`Closed ${valid}`, { reason })
  }

  /** Opening a date that is not closed is a no-op */
  async function open(date: LocalDate): Promise<void> {
    const valid = requireDate(date)
    await adapter.deleteClosedDate(valid)
    logger.info(`Opened ${valid}`)
  }

  async function list(): Promise<ClosedDate[]> {
    return convertAll(await adapter.getAllClosedDates(), toClosedDate)
  }

  return { isClosed, reasonFor, close, open, list }
}
