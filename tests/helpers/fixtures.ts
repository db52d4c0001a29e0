/**
 * Shared test fixtures: a settable clock and typed value constructors.
 */

import { parseDate, parseTime, type LocalDate, type LocalTime } from '../../src/time-date'
import { parseInstant, type Instant } from '../../src/timestamps'
import { userId, type UserId } from '../../src/types'
import type { Clock, Scheduler, TimerHandle } from '../../src/scheduler'
import type { LogContext, Logger } from '../../src/logger'
import type { IntentRecord, ReservationRecord } from '../../src/adapter'

/** Sunday 2025-06-01 00:00 UTC, the day before the test week starts */
export const NOW = Date.UTC(2025, 5, 1, 0, 0, 0)

export type TestClock = Clock & {
  set(ms: number): void
  advance(ms: number): void
}

export function createTestClock(start: number = NOW): TestClock {
  let current = start
  return {
    now: () => current,
    set(ms) {
      current = ms
    },
    advance(ms) {
      current += ms
    },
  }
}

export function date(iso: string): LocalDate {
  const parsed = parseDate(iso)
  if (!parsed.ok) throw parsed.error
  return parsed.value
}

export function time(hhmm: string): LocalTime {
  const parsed = parseTime(hhmm)
  if (!parsed.ok) throw parsed.error
  return parsed.value
}

export function instant(iso: string): Instant {
  const parsed = parseInstant(iso)
  if (!parsed) throw new Error(`Bad instant in test: ${iso}`)
  return parsed
}

export const ALICE: UserId = userId('1001')
export const BOB: UserId = userId('1002')
export const OPERATOR: UserId = userId('9001')

// ============================================================================
// Raw store records
// ============================================================================

export function reservationRecord(overrides: Partial<ReservationRecord> = {}): ReservationRecord {
  return {
    id: 'res-1',
    userId: '1001',
    date: '2025-06-10',
    time: '14:00',
    instant: '2025-06-10T14:00:00.000Z',
    branch: 'main',
    purpose: 'speaking',
    status: 'active',
    createdAt: '2025-06-01T00:00:00.000Z',
    ...overrides,
  }
}

export function intentRecord(overrides: Partial<IntentRecord> = {}): IntentRecord {
  return {
    id: 'int-1',
    reservationId: 'res-1',
    targetUser: '1001',
    role: 'student',
    leadTag: '30m',
    instant: '2025-06-10T13:30:00.000Z',
    sent: false,
    createdAt: '2025-06-01T00:00:00.000Z',
    ...overrides,
  }
}

// ============================================================================
// Manual scheduler
// ============================================================================

export type ManualScheduler = Scheduler & {
  /** Moves the clock forward, firing every timer that falls due on the way in order */
  advance(ms: number): void
  pending(): number
}

type ManualTimer = {
  when: number
  interval: number | null
  task: () => void
}

export function createManualScheduler(clock: TestClock): ManualScheduler {
  const timers = new Set<ManualTimer>()

  function add(timer: ManualTimer): TimerHandle {
    timers.add(timer)
    return {
      cancel() {
        timers.delete(timer)
      },
    }
  }

  function nextDue(limit: number): ManualTimer | null {
    let next: ManualTimer | null = null
    for (const timer of timers) {
      if (timer.when <= limit && (next === null || timer.when < next.when)) next = timer
    }
    return next
  }

  return {
    at(whenMs, task) {
      return add({ when: whenMs, interval: null, task })
    },
    every(intervalMs, task) {
      return add({ when: clock.now() + intervalMs, interval: intervalMs, task })
    },
    advance(ms) {
      const target = clock.now() + ms
      for (let timer = nextDue(target); timer !== null; timer = nextDue(target)) {
        clock.set(Math.max(clock.now(), timer.when))
        if (timer.interval === null) timers.delete(timer)
        else timer.when += timer.interval
        timer.task()
      }
      clock.set(target)
    },
    pending: () => timers.size,
  }
}

// ============================================================================
// Recording logger
// ============================================================================

export type LogEntry = {
  level: 'debug' | 'info' | 'warn' | 'error'
  message: string
  context?: LogContext
}

export type RecordingLogger = Logger & { entries: LogEntry[] }

export function createRecordingLogger(): RecordingLogger {
  const entries: LogEntry[] = []
  const record = (level: LogEntry['level']) => (message: string, context?: LogContext) => {
    entries.push({ level, message, context })
  }
  return {
    entries,
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
  }
}
