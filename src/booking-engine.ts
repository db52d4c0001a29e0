/**
 * Booking Engine
 *
 * Consumer-facing interface that ties the ledgers, the closed-date registry
 * and the reminder dispatcher together. A transport (chat bot, HTTP API)
 * calls these operations and renders their results and errors.
 *
 * Every state change runs in one store transaction. Timers are armed and
 * disarmed only after that transaction commits.
 */

import {
  DateClosedError, NotFoundError, QuotaExceededError, ValidationError, errorMessage,
} from './errors'
import { type LocalDate, type LocalTime, parseDate, parseTime } from './time-date'
import { type Instant, instantToMs, slotInstant } from './timestamps'
import type { ClosedDate, IntentId, ReminderIntent, Reservation, ReservationId, UserId } from './types'
import { createReminderLedger } from './reminder-ledger'
import { createSlotLedger } from './slot-ledger'
import { createClosedDateRegistry } from './closed-dates'
import { createUserDirectory } from './users'
import { createUserCache, type UserCache } from './user-cache'
import { weekWindowFor } from './quota'
import {
  createReminderDispatcher,
  type ReminderHandler,
  type StartSummary,
  type SweepSummary,
} from './reminder-dispatcher'
import { type BookingEngineConfig, resolveEngineConfig } from './config'

// ============================================================================
// Types
// ============================================================================

export type ReserveInput = {
  userId: UserId
  /** YYYY-MM-DD in the business timezone */
  date: string
  /** HH:MM in the business timezone */
  time: string
  branch?: string
  purpose?: string
}

export type UpcomingQuery = {
  /** Restrict to one user's reservations; omit for everyone's */
  userId?: UserId
  /** 1-based, clamped to the available range */
  page?: number
}

export type UpcomingPage = {
  items: Reservation[]
  page: number
  pageSize: number
  total: number
  totalPages: number
}

export type CloseDateOptions = {
  /** Also cancel the active reservations already on that date */
  cancelExisting?: boolean
}

export type BookingEventMap = {
  reserved: Reservation
  cancelled: Reservation
  rescheduled: { before: Reservation; after: Reservation }
  dateClosed: { date: LocalDate; reason: string; cancelled: Reservation[] }
  dateOpened: { date: LocalDate }
}

type Listener<T> = (payload: T) => void
type ListenerMap = { [E in keyof BookingEventMap]: Listener<BookingEventMap[E]>[] }

export type BookingEngine = ReturnType<typeof createBookingEngine>

// ============================================================================
// Factory
// ============================================================================

export function createBookingEngine(config: BookingEngineConfig) {
  const settings = resolveEngineConfig(config)
  const { adapter, clock, logger, timezone } = settings

  const reminders = createReminderLedger({ adapter, clock, logger })
  const slots = createSlotLedger({ adapter, reminders, clock, logger })
  const closedDates = createClosedDateRegistry({ adapter, clock, logger })
  const users = createUserDirectory({ adapter, clock, logger })
  const dispatcher = createReminderDispatcher({
    ledger: reminders,
    slots,
    clock,
    scheduler: settings.scheduler,
    logger,
    plan: settings.reminderPlan,
    operatorIds: settings.operatorIds,
    sweepIntervalMs: settings.sweepIntervalMs,
    purgePastOnStart: settings.purgePastOnStart,
    onDeliveryFailure: settings.onDeliveryFailure,
  })

  // ========== Events ==========

  const listeners: ListenerMap = {
    reserved: [],
    cancelled: [],
    rescheduled: [],
    dateClosed: [],
    dateOpened: [],
  }

  function emit<E extends keyof BookingEventMap>(event: E, payload: BookingEventMap[E]): void {
    for (const listener of listeners[event]) {
      try {
        listener(payload)
      } catch (e) {
        logger.error(`Event handler error on '${event}'`, { error: errorMessage(e) })
      }
    }
  }

  function on<E extends keyof BookingEventMap>(event: E, listener: Listener<BookingEventMap[E]>): () => void {
    const list = listeners[event]
    list.push(listener)
    return () => {
      const index = list.indexOf(listener)
      if (index >= 0) list.splice(index, 1)
    }
  }

  // ========== Validation ==========

  function requireDate(value: string): LocalDate {
    const parsed = parseDate(value)
    if (!parsed.ok) throw new ValidationError(parsed.error.message)
    return parsed.value
  }

  function requireTime(value: string): LocalTime {
    const parsed = parseTime(value)
    if (!parsed.ok) throw new ValidationError(parsed.error.message)
    return parsed.value
  }

  function requireFuture(instant: Instant): void {
    if (instantToMs(instant) <= clock.now()) {
      throw new ValidationError(`Slot ${instant} is not in the future`)
    }
  }

  async function requireActive(id: ReservationId): Promise<Reservation> {
    const reservation = await slots.get(id)
    if (!reservation || reservation.status !== 'active') {
      throw new NotFoundError(`No active reservation '${id}'`)
    }
    return reservation
  }

  // ========== Reservations ==========

  /**
   * Books a slot for a user. Rejects with DateClosedError, QuotaExceededError
   * or SlotTakenError; the store is left unchanged in each case.
   */
  async function reserve(input: ReserveInput): Promise<ReservationId> {
    const date = requireDate(input.date)
    const time = requireTime(input.time)
    const instant = slotInstant(date, time, timezone)
    requireFuture(instant)

    const { reservation, intents } = await adapter.transaction(async () => {
      const reason = await closedDates.reasonFor(date)
      if (reason !== null) throw new DateClosedError(date, reason)

      const window = weekWindowFor(instant, timezone)
      const count = await slots.countActiveForUserInWindow(input.userId, window.start, window.end)
      if (count >= settings.weeklyQuota) throw new QuotaExceededError(settings.weeklyQuota, count)

      const id = await slots.reserve({
        userId: input.userId,
        date,
        time,
        instant,
        branch: input.branch,
        purpose: input.purpose,
      })
      const created = await requireActive(id)
      return { reservation: created, intents: await dispatcher.persistFor(created) }
    })

    dispatcher.armAll(intents)
    emit('reserved', reservation)
    return reservation.id
  }

  /** Idempotent. Returns true when this call cancelled the reservation. */
  async function cancel(id: ReservationId): Promise<boolean> {
    const { before, detached, changed } = await adapter.transaction(async () => {
      const before = await slots.get(id)
      const changed = await slots.cancel(id)
      const detached = changed ? await dispatcher.detach(id) : []
      return { before, detached, changed }
    })
    dispatcher.disarmAll(detached)
    if (changed && before) emit('cancelled', { ...before, status: 'cancelled' })
    return changed
  }

  /** Removes a reservation and its reminders entirely. Returns false if it did not exist. */
  async function hardDelete(id: ReservationId): Promise<boolean> {
    const { removed, intentIds } = await adapter.transaction(async () => {
      const intentIds: IntentId[] = (await reminders.forReservation(id)).map((i) => i.id)
      return { removed: await slots.hardDelete(id), intentIds }
    })
    dispatcher.disarmAll(intentIds)
    return removed
  }

  /**
   * Moves an active reservation to a new slot and replaces its reminders.
   * Closed dates and the weekly quota do not apply: this is an operator action.
   */
  async function reschedule(id: ReservationId, newDate: string, newTime: string): Promise<Reservation> {
    const date = requireDate(newDate)
    const time = requireTime(newTime)
    const instant = slotInstant(date, time, timezone)
    requireFuture(instant)

    const result = await adapter.transaction(async () => {
      const before = await requireActive(id)
      await slots.move(id, { date, time, instant })
      const detached = await dispatcher.detach(id)
      const after = await requireActive(id)
      const intents: ReminderIntent[] = await dispatcher.persistFor(after)
      return { before, after, detached, intents }
    })

    dispatcher.disarmAll(result.detached)
    dispatcher.armAll(result.intents)
    emit('rescheduled', { before: result.before, after: result.after })
    return result.after
  }

  async function getReservation(id: ReservationId): Promise<Reservation | null> {
    return slots.get(id)
  }

  /** A user's upcoming active reservations, soonest first */
  async function listForUser(user: UserId): Promise<Reservation[]> {
    return slots.listActiveForUser(user)
  }

  async function listUpcoming(query: UpcomingQuery = {}): Promise<UpcomingPage> {
    const pageSize = settings.pageSize
    const { total } = await slots.listUpcomingActive(0, 0, query.userId)
    const totalPages = Math.max(1, Math.ceil(total / pageSize))
    const requested = query.page !== undefined && Number.isFinite(query.page) ? Math.floor(query.page) : 1
    const page = Math.min(Math.max(1, requested), totalPages)
    const { items } = await slots.listUpcomingActive((page - 1) * pageSize, pageSize, query.userId)
    return { items, page, pageSize, total, totalPages }
  }

  async function isSlotFree(date: string, time: string): Promise<boolean> {
    return slots.isSlotFree(slotInstant(requireDate(date), requireTime(time), timezone))
  }

  async function purgePast(): Promise<number> {
    return slots.purgePast()
  }

  // ========== Closed dates ==========

  /** Closes a date. With `cancelExisting`, its active reservations are removed and returned. */
  async function closeDate(date: string, reason = '', options: CloseDateOptions = {}): Promise<Reservation[]> {
    const day = requireDate(date)
    const { cancelled, intentIds } = await adapter.transaction(async () => {
      let cancelled: Reservation[] = []
      let intentIds: IntentId[] = []
      if (options.cancelExisting) {
        intentIds = (await reminders.forDate(day)).map((i) => i.id)
        cancelled = await slots.bulkCancelOnDate(day)
      }
      await closedDates.close(day, reason)
      return { cancelled, intentIds }
    })
    dispatcher.disarmAll(intentIds)
    emit('dateClosed', { date: day, reason, cancelled })
    return cancelled
  }

  async function openDate(date: string): Promise<void> {
    const day = requireDate(date)
    await closedDates.open(day)
    emit('dateOpened', { date: day })
  }

  async function isClosed(date: string): Promise<boolean> {
    return closedDates.isClosed(requireDate(date))
  }

  async function closedReason(date: string): Promise<string | null> {
    return closedDates.reasonFor(requireDate(date))
  }

  async function listClosedDates(): Promise<ClosedDate[]> {
    return closedDates.list()
  }

  // ========== Lifecycle ==========

  /** Purges past reservations (unless disabled), replays reminders and starts the sweep */
  async function start(): Promise<StartSummary> {
    return dispatcher.start()
  }

  async function stop(): Promise<void> {
    await dispatcher.stop()
  }

  async function sweep(): Promise<SweepSummary> {
    return dispatcher.sweep()
  }

  function onReminderDue(handler: ReminderHandler): () => void {
    return dispatcher.onReminderDue(handler)
  }

  function isOperator(id: UserId): boolean {
    return settings.operatorIds.includes(id)
  }

  function createRequestCache(): UserCache {
    return createUserCache(users)
  }

  return {
    reserve,
    cancel,
    hardDelete,
    reschedule,
    getReservation,
    listForUser,
    listUpcoming,
    isSlotFree,
    purgePast,
    closeDate,
    openDate,
    isClosed,
    closedReason,
    listClosedDates,
    start,
    stop,
    sweep,
    onReminderDue,
    on,
    isOperator,
    createRequestCache,
    users,
    reminders,
    dispatcher,
    timezone,
  }
}
