/**
 * Reminder Ledger
 *
 * Durable store of reminder intents. An intent is "deliver a reminder to this
 * user at this instant about this reservation". The `sent` flag is set at
 * most once and never cleared.
 */

import type { Adapter } from './adapter'
import type { LocalDate } from './time-date'
import { type Instant, instantToMs, msToInstant } from './timestamps'
import type {
  IntentId,
  LeadTag,
  ReminderIntent,
  ReservationId,
  TargetRole,
  UserId,
} from './types'
import { intentId } from './types'
import { type Clock, systemClock } from './scheduler'
import { type Logger, silentLogger } from './logger'
import { convertAll, toIntent, uuid } from './internal/helpers'

export type ReminderLedgerDeps = {
  adapter: Adapter
  clock?: Clock
  logger?: Logger
}

export type NewReminderIntent = {
  reservationId: ReservationId
  targetUser: UserId
  role: TargetRole
  lead: LeadTag
  scheduledAt: Instant
}

export type ReminderLedger = ReturnType<typeof createReminderLedger>

function byScheduledAt(a: ReminderIntent, b: ReminderIntent): number {
  return instantToMs(a.scheduledAt) - instantToMs(b.scheduledAt)
}

export function createReminderLedger(deps: ReminderLedgerDeps) {
  const { adapter } = deps
  const clock = deps.clock ?? systemClock
  const logger = deps.logger ?? silentLogger

  function skipped(record: { id: string }): void {
    logger.warn('Skipping unreadable reminder intent row', { id: record.id })
  }

  async function save(input: NewReminderIntent): Promise<ReminderIntent> {
    const id = intentId(uuid())
    const createdAt = msToInstant(clock.now())
    await adapter.createIntent({
      id,
      reservationId: input.reservationId,
      targetUser: input.targetUser,
      role: input.role,
      leadTag: input.lead,
      instant: input.scheduledAt,
      sent: false,
      createdAt,
    })
    logger.debug('Reminder intent saved', { id, reservationId: input.reservationId, lead: input.lead })
    return { id, ...input, sent: false, createdAt }
  }

  async function get(id: IntentId): Promise<ReminderIntent | null> {
    const record = await adapter.getIntent(id)
    return record ? toIntent(record) : null
  }

  /** Idempotent: marking an already-sent or deleted intent is a no-op */
  async function markSent(id: IntentId): Promise<void> {
    await adapter.markIntentSent(id)
  }

  /** Unsent intents of active reservations scheduled at or before `now`, oldest first */
  async function unsentDue(now: Instant): Promise<ReminderIntent[]> {
    const cutoff = instantToMs(now)
    const intents = convertAll(await adapter.getUnsentIntents(), toIntent, skipped)
    return intents.filter((i) => instantToMs(i.scheduledAt) <= cutoff).sort(byScheduledAt)
  }

  /** Every unsent intent of an active reservation, oldest first */
  async function unsentPending(): Promise<ReminderIntent[]> {
    return convertAll(await adapter.getUnsentIntents(), toIntent, skipped).sort(byScheduledAt)
  }

  async function forReservation(id: ReservationId): Promise<ReminderIntent[]> {
    return convertAll(await adapter.getIntentsByReservation(id), toIntent, skipped).sort(byScheduledAt)
  }

  /** Unsent intents whose active reservation falls on `date` */
  async function forDate(date: LocalDate): Promise<ReminderIntent[]> {
    return convertAll(await adapter.getUnsentIntentsOnDate(date), toIntent, skipped).sort(byScheduledAt)
  }

  async function deleteForReservation(id: ReservationId): Promise<number> {
    return adapter.deleteIntentsByReservations([id])
  }

  async function deleteForReservations(ids: readonly ReservationId[]): Promise<number> {
    return adapter.deleteIntentsByReservations(ids)
  }

  return {
    save,
    get,
    markSent,
    unsentDue,
    unsentPending,
    forReservation,
    forDate,
    deleteForReservation,
    deleteForReservations,
  }
}
