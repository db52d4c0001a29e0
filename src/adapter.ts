/**
 * Storage Adapter
 *
 * The engine talks to persistence only through this interface. Two
 * implementations ship: an in-memory mock for tests and embedding, and the
 * SQLite adapter in ./sqlite-adapter.
 *
 * Records hold the text exactly as stored. Converting stored text into domain
 * values (and skipping rows that do not parse) is the ledgers' job.
 *
 * Every adapter serializes its work through a single-writer queue: a
 * transaction holds the store until it settles, and standalone calls made
 * while one is open wait for it.
 */

import { DuplicateKeyError, NotFoundError } from './errors'
import type { ReservationStatus } from './types'
import { createTransactionQueue } from './internal/tx-queue'

// ============================================================================
// Records
// ============================================================================

export type UserRecord = {
  id: string
  language: string
  displayName: string
  username: string | null
  createdAt: string
}

export type ReservationRecord = {
  id: string
  userId: string
  date: string
  time: string
  instant: string
  branch: string
  purpose: string
  status: ReservationStatus
  createdAt: string
}

export type ReservationSlot = {
  date: string
  time: string
  instant: string
}

export type IntentRecord = {
  id: string
  reservationId: string
  targetUser: string
  role: string
  leadTag: string
  instant: string
  sent: boolean
  createdAt: string
}

export type ClosedDateRecord = {
  date: string
  reason: string
  createdAt: string
}

export type MigrationRecord = {
  name: string
  appliedAt: string
}

// ============================================================================
// Adapter Interface
// ============================================================================

export interface Adapter {
  /**
   * Run `fn` with exclusive write access. Changes made inside are committed
   * when `fn` resolves and discarded when it rejects. Nested calls join the
   * enclosing transaction.
   */
  transaction<T>(fn: () => Promise<T>): Promise<T>

  // Users
  createUser(user: UserRecord): Promise<void>
  getUser(id: string): Promise<UserRecord | null>
  getAllUsers(): Promise<UserRecord[]>
  updateUser(id: string, changes: Partial<Omit<UserRecord, 'id'>>): Promise<void>

  // Reservations
  /** Rejects with DuplicateKeyError when another active reservation holds the instant */
  createReservation(reservation: ReservationRecord): Promise<void>
  getReservation(id: string): Promise<ReservationRecord | null>
  getAllReservations(): Promise<ReservationRecord[]>
  getActiveReservations(): Promise<ReservationRecord[]>
  getActiveReservationsByUser(userId: string): Promise<ReservationRecord[]>
  getActiveReservationsOnDate(date: string): Promise<ReservationRecord[]>
  countActiveReservationsAt(instant: string): Promise<number>
  /** Flips an active reservation to cancelled. Returns false when nothing changed. */
  cancelReservation(id: string): Promise<boolean>
  /** Rejects with DuplicateKeyError when another active reservation holds the new instant */
  updateReservationSlot(id: string, slot: ReservationSlot): Promise<void>
  deleteReservations(ids: readonly string[]): Promise<number>

  // Reminder intents
  createIntent(intent: IntentRecord): Promise<void>
  getIntent(id: string): Promise<IntentRecord | null>
  getIntentsByReservation(reservationId: string): Promise<IntentRecord[]>
  /** Unsent intents whose reservation exists and is active */
  getUnsentIntents(): Promise<IntentRecord[]>
  /** Unsent intents whose active reservation falls on `date` */
  getUnsentIntentsOnDate(date: string): Promise<IntentRecord[]>
  markIntentSent(id: string): Promise<void>
  deleteIntentsByReservations(reservationIds: readonly string[]): Promise<number>

  // Closed dates
  upsertClosedDate(record: ClosedDateRecord): Promise<void>
  getClosedDate(date: string): Promise<ClosedDateRecord | null>
  getAllClosedDates(): Promise<ClosedDateRecord[]>
  deleteClosedDate(date: string): Promise<void>

  // Migrations
  getMigrations(): Promise<MigrationRecord[]>
  recordMigration(record: MigrationRecord): Promise<void>

  close(): Promise<void>
}

// ============================================================================
// Mock Adapter
// ============================================================================

export function createMockAdapter(): Adapter {
  // ---- State ----
  const state = {
    users: new Map<string, UserRecord>(),
    reservations: new Map<string, ReservationRecord>(),
    intents: new Map<string, IntentRecord>(),
    closedDates: new Map<string, ClosedDateRecord>(),
    migrations: new Map<string, MigrationRecord>(),
  }

  const queue = createTransactionQueue()

  function restoreState(snap: typeof state) {
    Object.assign(state, snap)
  }

  // ---- Helpers ----
  function clone<T>(obj: T): T {
    return structuredClone(obj)
  }

  function op<T>(work: () => T): Promise<T> {
    return queue.run(async () => work())
  }

  function activeHolderOf(instant: string, exceptId?: string): ReservationRecord | undefined {
    for (const r of state.reservations.values()) {
      if (r.status === 'active' && r.instant === instant && r.id !== exceptId) return r
    }
    return undefined
  }

  function isActiveReservation(reservationId: string): boolean {
    return state.reservations.get(reservationId)?.status === 'active'
  }

  function activeReservations(): ReservationRecord[] {
    return [...state.reservations.values()].filter((r) => r.status === 'active')
  }

  // ---- Adapter implementation ----
  const adapter: Adapter = {
    // ================================================================
    // Transaction
    // ================================================================
    transaction<T>(fn: () => Promise<T>): Promise<T> {
      if (queue.active()) return fn()
      return queue.run(async () => {
        const snapshot = clone(state)
        try {
          return await fn()
        } catch (e) {
          restoreState(snapshot)
          throw e
        }
      })
    },

    // ================================================================
    // Users
    // ================================================================
    createUser(user) {
      return op(() => {
        if (state.users.has(user.id)) {
          throw new DuplicateKeyError(`User '${user.id}' already exists`)
        }
        state.users.set(user.id, clone(user))
      })
    },

    getUser(id) {
      return op(() => {
        const user = state.users.get(id)
        return user ? clone(user) : null
      })
    },

    getAllUsers() {
      return op(() => [...state.users.values()].map(clone))
    },

    updateUser(id, changes) {
      return op(() => {
        const existing = state.users.get(id)
        if (!existing) throw new NotFoundError(`User '${id}' not found`)
        state.users.set(id, { ...existing, ...changes })
      })
    },

    // ================================================================
    // Reservations
    // ================================================================
    createReservation(reservation) {
      return op(() => {
        if (state.reservations.has(reservation.id)) {
          throw new DuplicateKeyError(`Reservation '${reservation.id}' already exists`)
        }
        if (reservation.status === 'active' && activeHolderOf(reservation.instant)) {
          throw new DuplicateKeyError(`Active reservation already holds '${reservation.instant}'`)
        }
        state.reservations.set(reservation.id, clone(reservation))
      })
    },

    getReservation(id) {
      return op(() => {
        const r = state.reservations.get(id)
        return r ? clone(r) : null
      })
    },

    getAllReservations() {
      return op(() => [...state.reservations.values()].map(clone))
    },

    getActiveReservations() {
      return op(() => activeReservations().map(clone))
    },

    getActiveReservationsByUser(userId) {
      return op(() => activeReservations().filter((r) => r.userId === userId).map(clone))
    },

    getActiveReservationsOnDate(date) {
      return op(() => activeReservations().filter((r) => r.date === date).map(clone))
    },

    countActiveReservationsAt(instant) {
      return op(() => activeReservations().filter((r) => r.instant === instant).length)
    },

    cancelReservation(id) {
      return op(() => {
        const existing = state.reservations.get(id)
        if (!existing || existing.status !== 'active') return false
        state.reservations.set(id, { ...existing, status: 'cancelled' })
        return true
      })
    },

    updateReservationSlot(id, slot) {
      return op(() => {
        const existing = state.reservations.get(id)
        if (!existing) throw new NotFoundError(`Reservation '${id}' not found`)
        if (existing.status === 'active' && activeHolderOf(slot.instant, id)) {
          throw new DuplicateKeyError(`Active reservation already holds '${slot.instant}'`)
        }
        state.reservations.set(id, { ...existing, ...slot })
      })
    },

    deleteReservations(ids) {
      return op(() => {
        let removed = 0
        for (const id of ids) {
          if (state.reservations.delete(id)) removed++
        }
        return removed
      })
    },

    // ================================================================
    // Reminder intents
    // ================================================================
    createIntent(intent) {
      return op(() => {
        if (state.intents.has(intent.id)) {
          throw new DuplicateKeyError(`Reminder intent '${intent.id}' already exists`)
        }
        state.intents.set(intent.id, clone(intent))
      })
    },

    getIntent(id) {
      return op(() => {
        const intent = state.intents.get(id)
        return intent ? clone(intent) : null
      })
    },

    getIntentsByReservation(reservationId) {
      return op(() =>
        [...state.intents.values()]
          .filter((i) => i.reservationId === reservationId)
          .map(clone)
      )
    },

    getUnsentIntents() {
      return op(() =>
        [...state.intents.values()]
          .filter((i) => !i.sent && isActiveReservation(i.reservationId))
          .map(clone)
      )
    },

    getUnsentIntentsOnDate(date) {
      return op(() =>
        [...state.intents.values()]
          .filter((i) => {
            if (i.sent) return false
            const r = state.reservations.get(i.reservationId)
            return r !== undefined && r.status === 'active' && r.date === date
          })
          .map(clone)
      )
    },

    markIntentSent(id) {
      return op(() => {
        const existing = state.intents.get(id)
        if (existing) state.intents.set(id, { ...existing, sent: true })
      })
    },

    deleteIntentsByReservations(reservationIds) {
      return op(() => {
        const targets = new Set(reservationIds)
        let removed = 0
        for (const [id, intent] of state.intents) {
          if (targets.has(intent.reservationId)) {
            state.intents.delete(id)
            removed++
          }
        }
        return removed
      })
    },

    // ================================================================
    // Closed dates
    // ================================================================
    upsertClosedDate(record) {
      return op(() => {
        const existing = state.closedDates.get(record.date)
        // re-closing changes the reason only
        state.closedDates.set(record.date, clone({ ...record, createdAt: existing?.createdAt ?? record.createdAt }))
      })
    },

    getClosedDate(date) {
      return op(() => {
        const record = state.closedDates.get(date)
        return record ? clone(record) : null
      })
    },

    getAllClosedDates() {
      return op(() =>
        [...state.closedDates.values()]
          .sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0))
          .map(clone)
      )
    },

    deleteClosedDate(date) {
      return op(() => {
        state.closedDates.delete(date)
      })
    },

    // ================================================================
    // Migrations
    // ================================================================
    getMigrations() {
      return op(() => [...state.migrations.values()].map(clone))
    },

    recordMigration(record) {
      return op(() => {
        if (state.migrations.has(record.name)) {
          throw new DuplicateKeyError(`Migration '${record.name}' already recorded`)
        }
        state.migrations.set(record.name, clone(record))
      })
    },

    async close() {},
  }

  return adapter
}
