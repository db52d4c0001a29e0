/**
 * SQLite Adapter
 *
 * Production implementation of the booking adapter using better-sqlite3.
 * Transactions open with BEGIN IMMEDIATE so the write lock is taken before
 * the first read, which also serializes writers in other processes sharing
 * the file. The connection waits up to `busyTimeoutMs` for that lock.
 */
import Database from 'better-sqlite3'
import type {
  Adapter, UserRecord, ReservationRecord, IntentRecord,
  ClosedDateRecord, MigrationRecord,
} from './adapter'
import { setTimeout as sleep } from 'node:timers/promises'
import {
  DuplicateKeyError, LessonBookError, NotFoundError, StoreError, errorMessage,
} from './errors'
import type { ReservationStatus } from './types'
import { createTransactionQueue } from './internal/tx-queue'
import { type Logger, silentLogger } from './logger'
import { createMigrationRunner, builtInMigrations, isDuplicateSlotRefusal } from './migrations'

// ============================================================================
// Extended type for SQLite-specific introspection methods
// ============================================================================

export type SqlValue = string | number | null

export type SqliteExtras = {
  listTables(): Promise<string[]>
  getTableColumns(table: string): Promise<string[]>
  listIndices(table: string): Promise<string[]>
  execute(sql: string): Promise<void>
  rawQuery(sql: string, ...params: SqlValue[]): Promise<unknown[]>
  run(sql: string, ...params: SqlValue[]): Promise<number>
  inTransaction(): Promise<boolean>
}

export type SqliteAdapter = Adapter & SqliteExtras

export type SqliteAdapterOptions = {
  /** Apply the built-in migrations on open (default true) */
  migrate?: boolean
  busyTimeoutMs?: number
  logger?: Logger
}

// ============================================================================
// Schema
// ============================================================================

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS users (
    id TEXT PRIMARY KEY,
    language TEXT NOT NULL DEFAULT 'en',
    display_name TEXT NOT NULL DEFAULT '',
    username TEXT,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS reservations (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL,
    date TEXT NOT NULL,
    time TEXT NOT NULL,
    instant TEXT NOT NULL,
    branch TEXT NOT NULL DEFAULT '',
    purpose TEXT NOT NULL DEFAULT '',
    status TEXT NOT NULL DEFAULT 'active' CHECK (status IN ('active', 'cancelled')),
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS reminder_intents (
    id TEXT PRIMARY KEY,
    reservation_id TEXT NOT NULL,
    user_id TEXT NOT NULL,
    role TEXT NOT NULL,
    lead_tag TEXT NOT NULL,
    instant TEXT NOT NULL,
    sent INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS closed_dates (
    date TEXT PRIMARY KEY,
    reason TEXT NOT NULL DEFAULT '',
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS migrations (
    name TEXT PRIMARY KEY,
    applied_at TEXT NOT NULL
  );
`

// ============================================================================
// Error Mapping
// ============================================================================

function mapError(e: unknown): never {
  if (e instanceof LessonBookError) throw e
  const msg = errorMessage(e)
  if (/UNIQUE constraint/i.test(msg)) throw new DuplicateKeyError(msg, { cause: e })
  throw new StoreError(msg, { cause: e })
}

const LOCK_RETRY_MS = 5

function isBusy(e: unknown): boolean {
  return typeof e === 'object' && e !== null && 'code' in e && e.code === 'SQLITE_BUSY'
}

function safe<T>(fn: () => T): T {
  try { return fn() }
  catch (e) { mapError(e) }
}

// ============================================================================
// SQL Row Types
// ============================================================================

type UserRow = {
  id: string
  language: string
  display_name: string
  username: string | null
  created_at: string
}

type ReservationRow = {
  id: string
  user_id: string
  date: string
  time: string
  instant: string
  branch: string
  purpose: string
  status: string
  created_at: string
}

type IntentRow = {
  id: string
  reservation_id: string
  user_id: string
  role: string
  lead_tag: string
  instant: string
  sent: number
  created_at: string
}

type ClosedDateRow = {
  date: string
  reason: string
  created_at: string
}

type MigrationRow = {
  name: string
  applied_at: string
}

// ============================================================================
// Row → Record mappers
// ============================================================================

function toStatus(value: string): ReservationStatus {
  return value === 'active' ? 'active' : 'cancelled'
}

function toUser(row: UserRow): UserRecord {
  return {
    id: row.id,
    language: row.language,
    displayName: row.display_name,
    username: row.username,
    createdAt: row.created_at,
  }
}

function toReservation(row: ReservationRow): ReservationRecord {
  return {
    id: row.id,
    userId: row.user_id,
    date: row.date,
    time: row.time,
    instant: row.instant,
    branch: row.branch,
    purpose: row.purpose,
    status: toStatus(row.status),
    createdAt: row.created_at,
  }
}

function toIntent(row: IntentRow): IntentRecord {
  return {
    id: row.id,
    reservationId: row.reservation_id,
    targetUser: row.user_id,
    role: row.role,
    leadTag: row.lead_tag,
    instant: row.instant,
    sent: row.sent !== 0,
    createdAt: row.created_at,
  }
}

function toClosedDate(row: ClosedDateRow): ClosedDateRecord {
  return { date: row.date, reason: row.reason, createdAt: row.created_at }
}

function toMigration(row: MigrationRow): MigrationRecord {
  return { name: row.name, appliedAt: row.applied_at }
}

function placeholders(n: number): string {
  return new Array<string>(n).fill('?').join(', ')
}

const UNSENT_ACTIVE_INTENTS = `
  SELECT ri.* FROM reminder_intents ri
  JOIN reservations r ON r.id = ri.reservation_id
  WHERE ri.sent = 0 AND r.status = 'active'
`

// ============================================================================
// Factory
// ============================================================================

export async function createSqliteAdapter(
  path: string,
  options: SqliteAdapterOptions = {}
): Promise<SqliteAdapter> {
  const logger = options.logger ?? silentLogger
  const busyTimeoutMs = options.busyTimeoutMs ?? 15000
  const db = safe(() => new Database(path, { timeout: busyTimeoutMs }))
  safe(() => db.exec(SCHEMA_SQL))

  const queue = createTransactionQueue()

  function op<T>(work: () => T): Promise<T> {
    return queue.run(async () => safe(work))
  }

  function all<R>(sql: string, ...params: SqlValue[]): R[] {
    return db.prepare(sql).all(...params) as R[]
  }

  function one<R>(sql: string, ...params: SqlValue[]): R | undefined {
    return db.prepare(sql).get(...params) as R | undefined
  }

  /** Takes the write lock, waiting between attempts without blocking the event loop */
  async function begin(): Promise<void> {
    const deadline = Date.now() + busyTimeoutMs
    for (;;) {
      try {
        db.pragma('busy_timeout = 0')
        try {
          db.exec('BEGIN IMMEDIATE')
        } finally {
          db.pragma(`busy_timeout = ${busyTimeoutMs}`)
        }
        return
      } catch (e) {
        if (!isBusy(e) || Date.now() >= deadline) mapError(e)
        await sleep(LOCK_RETRY_MS)
      }
    }
  }

  const adapter: SqliteAdapter = {
    // ================================================================
    // Transaction
    // ================================================================
    transaction<T>(fn: () => Promise<T>): Promise<T> {
      if (queue.active()) return fn()
      return queue.run(async () => {
        await begin()
        try {
          const result = await fn()
          safe(() => db.exec('COMMIT'))
          return result
        } catch (e) {
          if (db.inTransaction) db.exec('ROLLBACK')
          throw e
        }
      })
    },

    // ================================================================
    // Users
    // ================================================================
    createUser(user) {
      return op(() => {
        db.prepare(
          'INSERT INTO users (id, language, display_name, username, created_at) VALUES (?, ?, ?, ?, ?)',
        ).run(user.id, user.language, user.displayName, user.username, user.createdAt)
      })
    },

    getUser(id) {
      return op(() => {
        const row = one<UserRow>('SELECT * FROM users WHERE id = ?', id)
        return row ? toUser(row) : null
      })
    },

    getAllUsers() {
      return op(() => all<UserRow>('SELECT * FROM users ORDER BY created_at ASC').map(toUser))
    },

    updateUser(id, changes) {
      return op(() => {
        const existing = one<UserRow>('SELECT * FROM users WHERE id = ?', id)
        if (!existing) throw new NotFoundError(`User '${id}' not found`)
        const next = { ...toUser(existing), ...changes }
        db.prepare(
          'UPDATE users SET language = ?, display_name = ?, username = ?, created_at = ? WHERE id = ?',
        ).run(next.language, next.displayName, next.username, next.createdAt, id)
      })
    },

    // ================================================================
    // Reservations
    // ================================================================
    createReservation(r) {
      return op(() => {
        db.prepare(
          'INSERT INTO reservations (id, user_id, date, time, instant, branch, purpose, status, created_at) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)',
        ).run(r.id, r.userId, r.date, r.time, r.instant, r.branch, r.purpose, r.status, r.createdAt)
      })
    },

    getReservation(id) {
      return op(() => {
        const row = one<ReservationRow>('SELECT * FROM reservations WHERE id = ?', id)
        return row ? toReservation(row) : null
      })
    },

    getAllReservations() {
      return op(() => all<ReservationRow>('SELECT * FROM reservations').map(toReservation))
    },

    getActiveReservations() {
      return op(() =>
        all<ReservationRow>("SELECT * FROM reservations WHERE status = 'active'").map(toReservation)
      )
    },

    getActiveReservationsByUser(userId) {
      return op(() =>
        all<ReservationRow>(
          "SELECT * FROM reservations WHERE status = 'active' AND user_id = ?",
          userId,
        ).map(toReservation)
      )
    },

    getActiveReservationsOnDate(date) {
      return op(() =>
        all<ReservationRow>(
          "SELECT * FROM reservations WHERE status = 'active' AND date = ?",
          date,
        ).map(toReservation)
      )
    },

    countActiveReservationsAt(instant) {
      return op(() => {
        const row = one<{ cnt: number }>(
          "SELECT COUNT(*) AS cnt FROM reservations WHERE status = 'active' AND instant = ?",
          instant,
        )
        return row?.cnt ?? 0
      })
    },

    cancelReservation(id) {
      return op(() => {
        const result = db.prepare(
          "UPDATE reservations SET status = 'cancelled' WHERE id = ? AND status = 'active'",
        ).run(id)
        return result.changes > 0
      })
    },

    updateReservationSlot(id, slot) {
      return op(() => {
        db.prepare('UPDATE reservations SET date = ?, time = ?, instant = ? WHERE id = ?')
          .run(slot.date, slot.time, slot.instant, id)
      })
    },

    deleteReservations(ids) {
      return op(() => {
        if (ids.length === 0) return 0
        const result = db.prepare(
          `DELETE FROM reservations WHERE id IN (${placeholders(ids.length)})`,
        ).run(...ids)
        return result.changes
      })
    },

    // ================================================================
    // Reminder intents
    // ================================================================
    createIntent(i) {
      return op(() => {
        db.prepare(
          'INSERT INTO reminder_intents (id, reservation_id, user_id, role, lead_tag, instant, sent, created_at) VALUES (?, ?, ?, ?, ?, ?, ?, ?)',
        ).run(i.id, i.reservationId, i.targetUser, i.role, i.leadTag, i.instant, i.sent ? 1 : 0, i.createdAt)
      })
    },

    getIntent(id) {
      return op(() => {
        const row = one<IntentRow>('SELECT * FROM reminder_intents WHERE id = ?', id)
        return row ? toIntent(row) : null
      })
    },

    getIntentsByReservation(reservationId) {
      return op(() =>
        all<IntentRow>('SELECT * FROM reminder_intents WHERE reservation_id = ?', reservationId)
          .map(toIntent)
      )
    },

    getUnsentIntents() {
      return op(() => all<IntentRow>(UNSENT_ACTIVE_INTENTS).map(toIntent))
    },

    getUnsentIntentsOnDate(date) {
      return op(() => all<IntentRow>(`${UNSENT_ACTIVE_INTENTS} AND r.date = ?`, date).map(toIntent))
    },

    markIntentSent(id) {
      return op(() => {
        db.prepare('UPDATE reminder_intents SET sent = 1 WHERE id = ?').run(id)
      })
    },

    deleteIntentsByReservations(reservationIds) {
      return op(() => {
        if (reservationIds.length === 0) return 0
        const result = db.prepare(
          `DELETE FROM reminder_intents WHERE reservation_id IN (${placeholders(reservationIds.length)})`,
        ).run(...reservationIds)
        return result.changes
      })
    },

    // ================================================================
    // Closed dates
    // ================================================================
    upsertClosedDate(record) {
      return op(() => {
        db.prepare(
          'INSERT INTO closed_dates (date, reason, created_at) VALUES (?, ?, ?) ON CONFLICT(date) DO UPDATE SET reason = excluded.reason',
        ).run(record.date, record.reason, record.createdAt)
      })
    },

    getClosedDate(date) {
      return op(() => {
        const row = one<ClosedDateRow>('SELECT * FROM closed_dates WHERE date = ?', date)
        return row ? toClosedDate(row) : null
      })
    },

    getAllClosedDates() {
      return op(() => all<ClosedDateRow>('SELECT * FROM closed_dates ORDER BY date ASC').map(toClosedDate))
    },

    deleteClosedDate(date) {
      return op(() => {
        db.prepare('DELETE FROM closed_dates WHERE date = ?').run(date)
      })
    },

    // ================================================================
    // Migrations
    // ================================================================
    getMigrations() {
      return op(() => all<MigrationRow>('SELECT * FROM migrations ORDER BY applied_at ASC').map(toMigration))
    },

    recordMigration(record) {
      return op(() => {
        db.prepare('INSERT INTO migrations (name, applied_at) VALUES (?, ?)').run(record.name, record.appliedAt)
      })
    },

    async close() {
      await queue.run(async () => {
        if (db.open) db.close()
      })
    },

    // ================================================================
    // SQLite Extras (introspection, migration context)
    // ================================================================
    listTables() {
      return op(() =>
        all<{ name: string }>(
          "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
        ).map((r) => r.name)
      )
    },

    getTableColumns(table) {
      return op(() => all<{ name: string }>(`PRAGMA table_info("${table}")`).map((r) => r.name))
    },

    listIndices(table) {
      return op(() => all<{ name: string }>(`PRAGMA index_list("${table}")`).map((r) => r.name))
    },

    execute(sql) {
      return op(() => {
        db.exec(sql)
      })
    },

    rawQuery(sql, ...params) {
      return op(() => db.prepare(sql).all(...params))
    },

    run(sql, ...params) {
      return op(() => db.prepare(sql).run(...params).changes)
    },

    async inTransaction() {
      return db.inTransaction
    },
  }

  if (options.migrate ?? true) {
    const runner = createMigrationRunner({ adapter, logger })
    try {
      await runner.runPending(builtInMigrations(logger), adapter)
    } catch (e) {
      // Duplicate active slots leave the store usable; 003 is retried on next open
      if (!isDuplicateSlotRefusal(e)) {
        db.close()
        throw e
      }
      logger.error('Built-in migrations stopped', { migration: e.migration, error: e.message })
    }
  }

  return adapter
}
