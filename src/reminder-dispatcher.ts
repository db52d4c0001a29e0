/**
 * Reminder Dispatcher
 *
 * Turns reminder intents into delivery attempts. Three paths lead to a
 * delivery:
 *
 * - a timer armed for each future intent (`arm`)
 * - a periodic sweep that delivers every unsent intent already due (`sweep`)
 * - a replay on start that re-arms timers for intents persisted by an
 *   earlier process (`replay`)
 *
 * The paths share one in-flight set and each attempt re-reads the intent
 * first, so an intent reached by both a timer and a sweep is delivered once.
 *
 * Delivery itself is the host's job, registered with `onReminderDue`. The
 * callback reports how it went:
 * - return nothing or `{ status: 'delivered' }`: the intent is marked sent
 * - return `{ status: 'permanent' }` or throw PermanentDeliveryError: the
 *   target can never be reached, the intent is marked sent so it is not retried
 * - return `{ status: 'transient' }` or throw anything else: the intent stays
 *   unsent and the next sweep retries it
 *
 * Failures are reported to `onDeliveryFailure` and never reach the caller
 * that triggered the delivery.
 */

import { PermanentDeliveryError, errorMessage } from './errors'
import { instantToMs, msToInstant } from './timestamps'
import type { IntentId, ReminderIntent, Reservation, ReservationId, TargetRole, UserId } from './types'
import type { ReminderLedger } from './reminder-ledger'
import type { SlotLedger } from './slot-ledger'
import { type ReminderPlanEntry, DEFAULT_REMINDER_PLAN, planIntents } from './reminder-plan'
import { type Clock, type Scheduler, type TimerHandle, systemClock, createNodeScheduler } from './scheduler'
import { type Logger, silentLogger } from './logger'

// ============================================================================
// Types
// ============================================================================

export type DeliveryOutcome =
  | { status: 'delivered' }
  | { status: 'transient'; reason: string }
  | { status: 'permanent'; reason: string }

export type ReminderDue = {
  intent: ReminderIntent
  targetUser: UserId
  targetRole: TargetRole
  reservation: Reservation
}

export type ReminderHandler = (
  due: ReminderDue
) => DeliveryOutcome | void | Promise<DeliveryOutcome | void>

export type DeliveryFailure = {
  intent: ReminderIntent
  status: 'transient' | 'permanent'
  reason: string
  error?: unknown
}

export type DeliveryResult = DeliveryOutcome['status'] | 'skipped'

export type SweepSummary = Record<DeliveryResult, number> & { due: number }

export type StartSummary = {
  purged: number
  armed: number
}

export type ReminderDispatcherDeps = {
  ledger: ReminderLedger
  slots: Pick<SlotLedger, 'get' | 'purgePast'>
  clock?: Clock
  scheduler?: Scheduler
  logger?: Logger
  plan?: readonly ReminderPlanEntry[]
  operatorIds?: readonly UserId[]
  sweepIntervalMs?: number
  /** Delete reservations that already started when the dispatcher starts */
  purgePastOnStart?: boolean
  onDeliveryFailure?: (failure: DeliveryFailure) => void | Promise<void>
}

export const DEFAULT_SWEEP_INTERVAL_MS = 60_000

const NO_HANDLER = 'no reminder handler registered'

export type ReminderDispatcher = ReturnType<typeof createReminderDispatcher>

function isOutcome(value: unknown): value is DeliveryOutcome {
  return typeof value === 'object' && value !== null && 'status' in value
}

// ============================================================================
// Dispatcher
// ============================================================================

export function createReminderDispatcher(deps: ReminderDispatcherDeps) {
  const { ledger, slots } = deps
  const clock = deps.clock ?? systemClock
  const scheduler = deps.scheduler ?? createNodeScheduler(clock)
  const logger = deps.logger ?? silentLogger
  const plan = deps.plan ?? DEFAULT_REMINDER_PLAN
  const operatorIds = deps.operatorIds ?? []
  const sweepIntervalMs = deps.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS

  let handler: ReminderHandler | null = null
  let running = false
  let sweepTimer: TimerHandle | null = null
  let sweeping: Promise<SweepSummary> | null = null
  // reset by each sweep pass
  let noHandlerWarned = false

  const armed = new Map<IntentId, TimerHandle>()
  const inFlight = new Set<IntentId>()
  const tasks = new Set<Promise<unknown>>()

  function track(task: Promise<unknown>): void {
    tasks.add(task)
    task.then(
      () => {
        tasks.delete(task)
      },
      (e: unknown) => {
        tasks.delete(task)
        logger.error('Reminder dispatch failed', { error: errorMessage(e) })
      }
    )
  }

  // ========== Registration ==========

  /** Registers the delivery callback, replacing any earlier one. Returns an unsubscribe function. */
  function onReminderDue(callback: ReminderHandler): () => void {
    handler = callback
    return () => {
      if (handler === callback) handler = null
    }
  }

  // ========== Intents ==========

  /** Saves the plan's intents for a reservation, skipping those already in the past */
  async function persistFor(reservation: Pick<Reservation, 'id' | 'userId' | 'instant'>): Promise<ReminderIntent[]> {
    const now = clock.now()
    const saved: ReminderIntent[] = []
    for (const planned of planIntents(reservation, plan, operatorIds)) {
      if (instantToMs(planned.scheduledAt) <= now) {
        logger.debug('Skipping reminder already in the past', { reservationId: reservation.id, lead: planned.lead })
        continue
      }
      saved.push(await ledger.save({ reservationId: reservation.id, ...planned }))
    }
    return saved
  }

  /** Deletes a reservation's intents, returning their ids for disarming after commit */
  async function detach(reservationId: ReservationId): Promise<IntentId[]> {
    const intents = await ledger.forReservation(reservationId)
    await ledger.deleteForReservation(reservationId)
    return intents.map((i) => i.id)
  }

  // ========== Timers ==========

  /** Arms a timer for a future unsent intent. No-op while stopped. */
  function arm(intent: ReminderIntent): boolean {
    if (!running || intent.sent || armed.has(intent.id)) return false
    const at = instantToMs(intent.scheduledAt)
    if (at <= clock.now()) return false
    const handle = scheduler.at(at, () => {
      armed.delete(intent.id)
      track(deliver(intent.id))
    })
    armed.set(intent.id, handle)
    return true
  }

  function armAll(intents: readonly ReminderIntent[]): number {
    let count = 0
    for (const intent of intents) {
      if (arm(intent)) count++
    }
    return count
  }

  function disarm(id: IntentId): void {
    const handle = armed.get(id)
    if (!handle) return
    handle.cancel()
    armed.delete(id)
  }

  function disarmAll(ids: readonly IntentId[]): void {
    for (const id of ids) disarm(id)
  }

  // ========== Delivery ==========

  async function invoke(due: ReminderDue): Promise<{ outcome: DeliveryOutcome; error?: unknown }> {
    if (!handler) {
      return { outcome: { status: 'transient', reason: NO_HANDLER } }
    }
    try {
      const result: unknown = await handler(due)
      return { outcome: isOutcome(result) ? result : { status: 'delivered' } }
    } catch (e) {
      if (e instanceof PermanentDeliveryError) {
        return { outcome: { status: 'permanent', reason: e.message }, error: e }
      }
      return { outcome: { status: 'transient', reason: errorMessage(e) }, error: e }
    }
  }

  async function report(failure: DeliveryFailure): Promise<void> {
    if (failure.reason !== NO_HANDLER) {
      logger.warn(`Reminder ${failure.intent.id} not delivered (${failure.status})`, {
        targetUser: failure.intent.targetUser,
        reason: failure.reason,
      })
    } else if (!noHandlerWarned) {
      noHandlerWarned = true
      logger.warn('No reminder handler registered, due reminders stay unsent')
    }
    if (!deps.onDeliveryFailure) return
    try {
      await deps.onDeliveryFailure(failure)
    } catch (e) {
      logger.error('Delivery failure hook threw', { error: errorMessage(e) })
    }
  }

  /**
   * One delivery attempt. Skips intents that are already in flight, already
   * sent, deleted, or whose reservation is no longer active.
   */
  async function deliver(id: IntentId): Promise<DeliveryResult> {
    if (inFlight.has(id)) return 'skipped'
    inFlight.add(id)
    try {
      const intent = await ledger.get(id)
      if (!intent || intent.sent) return 'skipped'
      const reservation = await slots.get(intent.reservationId)
      if (!reservation || reservation.status !== 'active') return 'skipped'

      const { outcome, error } = await invoke({
        intent,
        targetUser: intent.targetUser,
        targetRole: intent.role,
        reservation,
      })
      if (outcome.status !== 'transient') await ledger.markSent(id)

      if (outcome.status === 'delivered') {
        logger.info(`Reminder ${id} delivered`, { targetUser: intent.targetUser, lead: intent.lead })
      } else {
        await report({ intent, status: outcome.status, reason: outcome.reason, error })
      }
      return outcome.status
    } finally {
      inFlight.delete(id)
    }
  }

  // ========== Sweep ==========

  async function runSweep(): Promise<SweepSummary> {
    noHandlerWarned = false
    const due = await ledger.unsentDue(msToInstant(clock.now()))
    const summary: SweepSummary = { due: due.length, delivered: 0, transient: 0, permanent: 0, skipped: 0 }
    for (const intent of due) {
      disarm(intent.id)
      summary[await deliver(intent.id)]++
    }
    if (due.length > 0) logger.info(`Sweep handled ${due.length} due reminders`, summary)
    return summary
  }

  /** Delivers every unsent due intent. A sweep requested while one runs joins it. */
  function sweep(): Promise<SweepSummary> {
    if (sweeping) return sweeping
    const current = runSweep().finally(() => {
      sweeping = null
    })
    sweeping = current
    return current
  }

  // ========== Lifecycle ==========

  /** Arms timers for every future unsent intent in the ledger */
  async function replay(): Promise<number> {
    const count = armAll(await ledger.unsentPending())
    logger.info(`Restored ${count} reminder timers`)
    return count
  }

  async function start(): Promise<StartSummary> {
    if (running) return { purged: 0, armed: 0 }
    running = true
    try {
      const purged = deps.purgePastOnStart ? await slots.purgePast() : 0
      const armedCount = await replay()
      sweepTimer = scheduler.every(sweepIntervalMs, () => track(sweep()))
      logger.info('Reminder dispatcher started', { purged, armed: armedCount, sweepIntervalMs })
      return { purged, armed: armedCount }
    } catch (e) {
      running = false
      disarmAll([...armed.keys()])
      throw e
    }
  }

  /** Stops timers and the sweep, then waits for deliveries already in progress */
  async function stop(): Promise<void> {
    running = false
    sweepTimer?.cancel()
    sweepTimer = null
    disarmAll([...armed.keys()])
    await idle()
    logger.info('Reminder dispatcher stopped')
  }

  /** Resolves once no delivery or sweep started by a timer is in progress */
  async function idle(): Promise<void> {
    while (tasks.size > 0) {
      await Promise.allSettled([...tasks])
    }
  }

  return {
    onReminderDue,
    persistFor,
    detach,
    arm,
    armAll,
    disarm,
    disarmAll,
    deliver,
    sweep,
    replay,
    start,
    stop,
    idle,
    isArmed: (id: IntentId) => armed.has(id),
    armedCount: () => armed.size,
    isRunning: () => running,
  }
}
