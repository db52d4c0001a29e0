/**
 * Slot Ledger
 *
 * Durable record of reservations. At most one active reservation holds any
 * instant. The check and the insert run inside one store transaction, and the
 * store's uniqueness guard backs it up, so two racing callers for the same
 * instant get exactly one success and one SlotTakenError.
 *
 * Listings skip rows whose stored values do not parse.
 */

import type { Adapter } from './adapter'
import { DuplicateKeyError, NotFoundError, SlotTakenError } from './errors'
import type { LocalDate, LocalTime } from './time-date'
import { type Instant, instantToMs, msToInstant } from './timestamps'
import type { Reservation, ReservationId, UserId } from './types'
import { reservationId } from './types'
import type { ReminderLedger } from './reminder-ledger'
import { type Clock, systemClock } from './scheduler'
import { type Logger, silentLogger } from './logger'
import { convertAll, toReservation, uuid } from './internal/helpers'

export type SlotLedgerDeps = {
  adapter: Adapter
  reminders: ReminderLedger
  clock?: Clock
  logger?: Logger
}

export type NewReservation = {
  userId: UserId
  date: LocalDate
  time: LocalTime
  instant: Instant
  branch?: string
  purpose?: string
}

export type ReservationSlotChange = {
  date: LocalDate
  time: LocalTime
  instant: Instant
}

export type ReservationPage = {
  items: Reservation[]
  total: number
}

export type SlotLedger = ReturnType<typeof createSlotLedger>

function byInstant(a: Reservation, b: Reservation): number {
  return instantToMs(a.instant) - instantToMs(b.instant)
}

export function createSlotLedger(deps: SlotLedgerDeps) {
  const { adapter, reminders } = deps
  const clock = deps.clock ?? systemClock
  const logger = deps.logger ?? silentLogger

  function skipped(record: { id: string }): void {
    logger.warn('Skipping unreadable reservation row', { id: record.id })
  }

  async function isSlotFree(instant: Instant): Promise<boolean> {
    return (await adapter.countActiveReservationsAt(instant)) === 0
  }

  async function reserve(input: NewReservation): Promise<ReservationId> {
    const id = reservationId(uuid())
    await adapter.transaction(async () => {
      if (!(await isSlotFree(input.instant))) throw new SlotTakenError(input.instant)
      try {
        await adapter.createReservation({
          id,
          userId: input.userId,
          date: input.date,
          time: input.time,
          instant: input.instant,
          branch: input.branch ?? '',
          purpose: input.purpose ?? '',
          status: 'active',
          createdAt: msToInstant(clock.now()),
        })
      } catch (e) {
        if (e instanceof DuplicateKeyError) throw new SlotTakenError(input.instant)
        throw e
      }
    })
    logger.info('Reservation created', { id, userId: input.userId, instant: input.instant })
    return id
  }

  async function get(id: ReservationId): Promise<Reservation | null> {
    const record = await adapter.getReservation(id)
    return record ? toReservation(record) : null
  }

  /** Returns true when this call moved the reservation from active to cancelled */
  async function cancel(id: ReservationId): Promise<boolean> {
    const changed = await adapter.cancelReservation(id)
    if (changed) logger.info('Reservation cancelled', { id })
    return changed
  }

  /** Removes the reservation and its reminder intents. Returns false if it did not exist. */
  async function hardDelete(id: ReservationId): Promise<boolean> {
    return adapter.transaction(async () => {
      await reminders.deleteForReservation(id)
      const removed = await adapter.deleteReservations([id])
      if (removed > 0) logger.info('Reservation deleted', { id })
      return removed > 0
    })
  }

  /** Moves an active reservation to another slot, keeping its identity */
  async function move(id: ReservationId, slot: ReservationSlotChange): Promise<void> {
    await adapter.transaction(async () => {
      const existing = await get(id)
      if (!existing || existing.status !== 'active') {
        throw new NotFoundError(`No active reservation '${id}'`)
      }
      if (instantToMs(existing.instant) !== instantToMs(slot.instant) && !(await isSlotFree(slot.instant))) {
        throw new SlotTakenError(slot.instant)
      }
      try {
        await adapter.updateReservationSlot(id, slot)
      } catch (e) {
        if (e instanceof DuplicateKeyError) throw new SlotTakenError(slot.instant)
        throw e
      }
    })
    logger.info('Reservation moved', { id, instant: slot.instant })
  }

  /** Active reservations of `user` with start in [start, end) */
  async function countActiveForUserInWindow(user: UserId, start: Instant, end: Instant): Promise<number> {
    const from = instantToMs(start)
    const to = instantToMs(end)
    const active = convertAll(await adapter.getActiveReservationsByUser(user), toReservation, skipped)
    return active.filter((r) => {
      const at = instantToMs(r.instant)
      return at >= from && at < to
    }).length
  }

  /** Active reservations of `user` that have not started yet, soonest first */
  async function listActiveForUser(user: UserId): Promise<Reservation[]> {
    const now = clock.now()
    const active = convertAll(await adapter.getActiveReservationsByUser(user), toReservation, skipped)
    return active.filter((r) => instantToMs(r.instant) >= now).sort(byInstant)
  }

  /** One page of upcoming active reservations, optionally for a single user */
  async function listUpcomingActive(offset: number, size: number, user?: UserId): Promise<ReservationPage> {
    const now = clock.now()
    const records = user === undefined
      ? await adapter.getActiveReservations()
      : await adapter.getActiveReservationsByUser(user)
    const upcoming = convertAll(records, toReservation, skipped)
      .filter((r) => instantToMs(r.instant) >= now)
      .sort(byInstant)
    return { items: upcoming.slice(offset, offset + size), total: upcoming.length }
  }

  /** Removes reservations (of any status) that started before `now`, with their intents */
  async function purgePast(now: Instant = msToInstant(clock.now())): Promise<number> {
    const cutoff = instantToMs(now)
    const removed = await adapter.transaction(async () => {
      const past = convertAll(await adapter.getAllReservations(), toReservation, skipped)
        .filter((r) => instantToMs(r.instant) < cutoff)
        .map((r) => r.id)
      if (past.length === 0) return 0
      await reminders.deleteForReservations(past)
      return adapter.deleteReservations(past)
    })
    if (removed > 0) logger.info(`Purged ${removed} past reservations`)
    return removed
  }

  /** Deletes every active reservation on `date` with its intents, returning what was removed */
  async function bulkCancelOnDate(date: LocalDate): Promise<Reservation[]> {
    return adapter.transaction(async () => {
      const records = await adapter.getActiveReservationsOnDate(date)
      const ids = records.map((r) => reservationId(r.id))
      if (ids.length === 0) return []
      await reminders.deleteForReservations(ids)
      await adapter.deleteReservations(ids)
      logger.info(`Cancelled ${ids.length} reservations on ${date}`)
      return convertAll(records, toReservation, skipped).sort(byInstant)
    })
  }

  return {
    isSlotFree,
    reserve,
    get,
    cancel,
    hardDelete,
    move,
    countActiveForUserInWindow,
    listActiveForUser,
    listUpcomingActive,
    purgePast,
    bulkCancelOnDate,
  }
}
