/**
 * Migration Runner
 *
 * Applies named, ordered migrations exactly once each. A migration runs
 * inside a transaction together with the record of its application, so a
 * failure leaves no partial change and no record; the next run retries it.
 * A failure stops the run: later migrations wait for the failed one.
 *
 * Migrations are written to be idempotent (they inspect the schema before
 * altering it), so a store that already has a change is left untouched.
 */

import type { Adapter } from './adapter'
import type { SqliteAdapter } from './sqlite-adapter'
import { MigrationError, ValidationError, errorMessage } from './errors'
import { type Logger, silentLogger } from './logger'
import { type Clock, systemClock } from './scheduler'
import { msToInstant, isCanonicalInstant, normalizeLegacyTimestamp } from './timestamps'

// ============================================================================
// Types
// ============================================================================

export type Migration<C> = {
  name: string
  up(context: C): Promise<void>
}

export type MigrationRunnerDeps = {
  adapter: Adapter
  clock?: Clock
  logger?: Logger
}

export type MigrationRunner = {
  applied(): Promise<Set<string>>
  pending<C>(migrations: readonly Migration<C>[]): Promise<Migration<C>[]>
  /** Returns the names applied by this run, in order */
  runPending<C>(migrations: readonly Migration<C>[], context: C): Promise<string[]>
}

// ============================================================================
// Runner
// ============================================================================

export function createMigrationRunner(deps: MigrationRunnerDeps): MigrationRunner {
  const { adapter } = deps
  const clock = deps.clock ?? systemClock
  const logger = deps.logger ?? silentLogger

  async function applied(): Promise<Set<string>> {
    const records = await adapter.getMigrations()
    return new Set(records.map((r) => r.name))
  }

  async function pending<C>(migrations: readonly Migration<C>[]): Promise<Migration<C>[]> {
    const seen = new Set<string>()
    for (const m of migrations) {
      if (seen.has(m.name)) throw new ValidationError(`Duplicate migration name '${m.name}'`)
      seen.add(m.name)
    }
    const done = await applied()
    return migrations.filter((m) => !done.has(m.name))
  }

  async function runPending<C>(migrations: readonly Migration<C>[], context: C): Promise<string[]> {
    const todo = await pending(migrations)
    if (todo.length === 0) {
      logger.info('All migrations already applied')
      return []
    }

    const ran: string[] = []
    for (const migration of todo) {
      logger.info(`Running migration ${migration.name}`)
      try {
        await adapter.transaction(async () => {
          await migration.up(context)
          await adapter.recordMigration({
            name: migration.name,
            appliedAt: msToInstant(clock.now()),
          })
        })
      } catch (e) {
        logger.error(`Migration ${migration.name} failed`, { error: errorMessage(e) })
        if (e instanceof MigrationError) throw e
        throw new MigrationError(migration.name, errorMessage(e), { cause: e })
      }
      ran.push(migration.name)
      logger.info(`Migration ${migration.name} applied`)
    }
    return ran
  }

  return { applied, pending, runPending }
}

// ============================================================================
// Built-in Migrations (SQLite)
// ============================================================================

const addReservationIndices: Migration<SqliteAdapter> = {
  name: '001_add_reservation_indices',
  async up(db) {
    await db.execute(`
      CREATE INDEX IF NOT EXISTS idx_reservations_user_status ON reservations(user_id, status);
      CREATE INDEX IF NOT EXISTS idx_reservations_date_status ON reservations(date, status);
      CREATE INDEX IF NOT EXISTS idx_reminder_intents_sent ON reminder_intents(sent);
      CREATE INDEX IF NOT EXISTS idx_reminder_intents_reservation ON reminder_intents(reservation_id);
    `)
  },
}

const TIMESTAMP_COLUMNS: readonly { table: string; column: string }[] = [
  { table: 'reservations', column: 'instant' },
  { table: 'reservations', column: 'created_at' },
  { table: 'reminder_intents', column: 'instant' },
  { table: 'reminder_intents', column: 'created_at' },
  { table: 'closed_dates', column: 'created_at' },
  { table: 'users', column: 'created_at' },
]

function isTimestampRow(row: unknown): row is { rid: number; value: string } {
  if (typeof row !== 'object' || row === null) return false
  return 'rid' in row && typeof row.rid === 'number' && 'value' in row && typeof row.value === 'string'
}

/**
 * Rewrites every stored timestamp into canonical form. Values that cannot be
 * read are left as they are; the ledgers skip them when listing.
 */
function normalizeLegacyTimestamps(logger: Logger): Migration<SqliteAdapter> {
  return {
    name: '002_normalize_legacy_timestamps',
    async up(db) {
      for (const { table, column } of TIMESTAMP_COLUMNS) {
        const rows = await db.rawQuery(`SELECT rowid AS rid, ${column} AS value FROM ${table}`)
        let rewritten = 0
        for (const row of rows) {
          if (!isTimestampRow(row) || isCanonicalInstant(row.value)) continue
          const normalized = normalizeLegacyTimestamp(row.value)
          if (!normalized.ok) {
            logger.warn('Leaving unreadable timestamp in place', { table, column, value: row.value })
            continue
          }
          await db.run(`UPDATE ${table} SET ${column} = ? WHERE rowid = ?`, normalized.value, row.rid)
          rewritten++
        }
        if (rewritten > 0) logger.info(`Normalized ${rewritten} timestamps in ${table}.${column}`)
      }
    },
  }
}

export const UNIQUE_ACTIVE_SLOT_MIGRATION = '003_unique_active_slot'

/**
 * True for 003 declining to run over duplicate active slots. A driver failure
 * inside 003 is wrapped by the runner and carries a cause; the refusal does not.
 */
export function isDuplicateSlotRefusal(e: unknown): e is MigrationError {
  return e instanceof MigrationError && e.migration === UNIQUE_ACTIVE_SLOT_MIGRATION && e.cause === undefined
}

const uniqueActiveSlot: Migration<SqliteAdapter> = {
  name: UNIQUE_ACTIVE_SLOT_MIGRATION,
  async up(db) {
    const duplicates = await db.rawQuery(`
      SELECT instant, COUNT(*) AS cnt FROM reservations
      WHERE status = 'active'
      GROUP BY instant HAVING cnt > 1
    `)
    if (duplicates.length > 0) {
      throw new MigrationError(
        UNIQUE_ACTIVE_SLOT_MIGRATION,
        `${duplicates.length} instants hold more than one active reservation; resolve them and restart`
      )
    }
    await db.execute(
      "CREATE UNIQUE INDEX IF NOT EXISTS idx_reservations_active_instant ON reservations(instant) WHERE status = 'active'"
    )
  },
}

const addUserUsername: Migration<SqliteAdapter> = {
  name: '004_add_user_username',
  async up(db) {
    const columns = await db.getTableColumns('users')
    if (!columns.includes('username')) {
      await db.execute('ALTER TABLE users ADD COLUMN username TEXT')
    }
  },
}

export function builtInMigrations(logger: Logger = silentLogger): Migration<SqliteAdapter>[] {
  return [
    addReservationIndices,
    normalizeLegacyTimestamps(logger),
    uniqueActiveSlot,
    addUserUsername,
  ]
}
