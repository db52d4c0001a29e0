/**
 * Segment 8: Migrations
 *
 * The runner applies each named migration once, in order, inside a
 * transaction. The built-in migrations bring an older SQLite store up to the
 * current schema.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { createMockAdapter, type Adapter } from '../src/adapter'
import { createSqliteAdapter, type SqliteAdapter } from '../src/sqlite-adapter'
import {
  builtInMigrations,
  createMigrationRunner,
  isDuplicateSlotRefusal,
  type Migration,
} from '../src/migrations'
import { MigrationError, ValidationError } from '../src/errors'
import { createRecordingLogger, createTestClock, reservationRecord } from './helpers/fixtures'

type Ctx = { log: string[] }

function step(name: string, body?: (ctx: Ctx) => Promise<void>): Migration<Ctx> {
  return {
    name,
    async up(ctx) {
      ctx.log.push(name)
      if (body) await body(ctx)
    },
  }
}

const BUILT_IN_NAMES = [
  '001_add_reservation_indices',
  '002_normalize_legacy_timestamps',
  '003_unique_active_slot',
  '004_add_user_username',
]

describe('Segment 8: Migrations', () => {
  // ========================================================================
  // Runner
  // ========================================================================

  describe('runner', () => {
    let adapter: Adapter
    let ctx: Ctx

    beforeEach(() => {
      adapter = createMockAdapter()
      ctx = { log: [] }
    })

    it('applies pending migrations in order and records them', async () => {
      const runner = createMigrationRunner({ adapter, clock: createTestClock() })
      const ran = await runner.runPending([step('001_a'), step('002_b')], ctx)
      expect(ran).toEqual(['001_a', '002_b'])
      expect(ctx.log).toEqual(['001_a', '002_b'])
      expect(await adapter.getMigrations()).toEqual([
        { name: '001_a', appliedAt: '2025-06-01T00:00:00.000Z' },
        { name: '002_b', appliedAt: '2025-06-01T00:00:00.000Z' },
      ])
    })

    it('skips migrations already applied', async () => {
      const logger = createRecordingLogger()
      const runner = createMigrationRunner({ adapter, logger })
      await runner.runPending([step('001_a')], ctx)
      expect(await runner.runPending([step('001_a'), step('002_b')], ctx)).toEqual(['002_b'])
      expect(await runner.runPending([step('001_a'), step('002_b')], ctx)).toEqual([])
      expect(ctx.log).toEqual(['001_a', '002_b'])
      expect(logger.entries.at(-1)?.message).toBe('All migrations already applied')
    })

    it('stops at a failure, rolls it back and retries it next run', async () => {
      const runner = createMigrationRunner({ adapter })
      let broken = true
      const migrations = [
        step('001_a'),
        step('002_b', async () => {
          await adapter.createReservation(reservationRecord())
          if (broken) throw new Error('boom')
        }),
        step('003_c'),
      ]

      const failure = runner.runPending(migrations, ctx)
      await expect(failure).rejects.toThrow(MigrationError)
      await expect(failure).rejects.toThrow('Migration 002_b failed: boom')
      expect(ctx.log).toEqual(['001_a', '002_b'])
      expect([...(await runner.applied())]).toEqual(['001_a'])
      expect(await adapter.getReservation('res-1')).toBeNull()

      broken = false
      expect(await runner.runPending(migrations, ctx)).toEqual(['002_b', '003_c'])
    })

    it('keeps a MigrationError thrown by the migration itself', async () => {
      const runner = createMigrationRunner({ adapter })
      const refusal = new MigrationError('001_a', 'refused')
      const result = runner.runPending(
        [
          step('001_a', async () => {
            throw refusal
          }),
        ],
        ctx
      )
      await expect(result).rejects.toBe(refusal)
    })

    it('rejects duplicate names before running anything', async () => {
      const runner = createMigrationRunner({ adapter })
      await expect(runner.pending([step('001_a'), step('001_a')])).rejects.toThrow(ValidationError)
      await expect(runner.runPending([step('001_a'), step('001_a')], ctx)).rejects.toThrow(
        "Duplicate migration name '001_a'"
      )
      expect(ctx.log).toEqual([])
    })
  })

  // ========================================================================
  // Built-in migrations
  // ========================================================================

  describe('built-in migrations', () => {
    let db: SqliteAdapter

    beforeEach(async () => {
      db = await createSqliteAdapter(':memory:', { migrate: false })
    })

    afterEach(async () => {
      await db.close()
    })

    it('are all applied on a fresh store when opened normally', async () => {
      const fresh = await createSqliteAdapter(':memory:')
      expect((await fresh.getMigrations()).map((m) => m.name).sort()).toEqual(BUILT_IN_NAMES)
      expect(await fresh.listIndices('reservations')).toContain('idx_reservations_active_instant')
      await fresh.close()
    })

    it('rewrite legacy timestamps and leave unreadable ones', async () => {
      const logger = createRecordingLogger()
      await db.createReservation(
        reservationRecord({ instant: '2025-06-10 14:00:00', createdAt: '2025-06-01T05:00:00+05:00' })
      )
      await db.createReservation(reservationRecord({ id: 'res-2', instant: 'garbage' }))

      await createMigrationRunner({ adapter: db }).runPending(builtInMigrations(logger), db)

      const fixed = await db.getReservation('res-1')
      expect(fixed?.instant).toBe('2025-06-10T14:00:00.000Z')
      expect(fixed?.createdAt).toBe('2025-06-01T00:00:00.000Z')
      expect((await db.getReservation('res-2'))?.instant).toBe('garbage')
      expect(logger.entries.filter((e) => e.level === 'warn')).toEqual([
        {
          level: 'warn',
          message: 'Leaving unreadable timestamp in place',
          context: { table: 'reservations', column: 'instant', value: 'garbage' },
        },
      ])
    })

    it('refuse the unique slot index while active duplicates exist', async () => {
      await db.createReservation(reservationRecord())
      await db.createReservation(reservationRecord({ id: 'res-2' }))
      const runner = createMigrationRunner({ adapter: db })

      await expect(runner.runPending(builtInMigrations(), db)).rejects.toThrow(
        'Migration 003_unique_active_slot failed: 1 instants hold more than one active reservation; resolve them and restart'
      )
      expect([...(await runner.applied())].sort()).toEqual(BUILT_IN_NAMES.slice(0, 2))

      await db.cancelReservation('res-2')
      expect(await runner.runPending(builtInMigrations(), db)).toEqual(BUILT_IN_NAMES.slice(2))
      await expect(db.createReservation(reservationRecord({ id: 'res-3' }))).rejects.toThrow(
        /UNIQUE constraint/
      )
    })

    it('add the username column to an older users table', async () => {
      await db.execute(`
        DROP TABLE users;
        CREATE TABLE users (
          id TEXT PRIMARY KEY,
          language TEXT NOT NULL DEFAULT 'en',
          display_name TEXT NOT NULL DEFAULT '',
          created_at TEXT NOT NULL
        );
      `)
      await createMigrationRunner({ adapter: db }).runPending(builtInMigrations(), db)
      expect(await db.getTableColumns('users')).toEqual(['id', 'language', 'display_name', 'created_at', 'username'])
    })
  })

  describe('opening a store that cannot be migrated', () => {
    let dir: string

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'lessonbook-migrate-'))
    })

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true })
    })

    it('logs the refusal and keeps the store usable', async () => {
      const path = join(dir, 'book.db')
      const legacy = await createSqliteAdapter(path, { migrate: false })
      await legacy.createReservation(reservationRecord())
      await legacy.createReservation(reservationRecord({ id: 'res-2' }))
      await legacy.close()

      const logger = createRecordingLogger()
      const reopened = await createSqliteAdapter(path, { logger })
      expect(await reopened.listIndices('reservations')).not.toContain('idx_reservations_active_instant')
      expect(logger.entries.at(-1)).toEqual({
        level: 'error',
        message: 'Built-in migrations stopped',
        context: {
          migration: '003_unique_active_slot',
          error:
            'Migration 003_unique_active_slot failed: 1 instants hold more than one active reservation; resolve them and restart',
        },
      })
      expect((await reopened.getActiveReservations()).length).toBe(2)
      await reopened.close()
    })

    it('rejects the open when any other migration fails', async () => {
      const path = join(dir, 'book.db')
      const legacy = await createSqliteAdapter(path, { migrate: false })
      await legacy.execute(`
        DROP TABLE reminder_intents;
        CREATE TABLE reminder_intents (
          id TEXT PRIMARY KEY,
          reservation_id TEXT NOT NULL,
          user_id TEXT NOT NULL,
          role TEXT NOT NULL,
          lead_tag TEXT NOT NULL,
          instant TEXT NOT NULL,
          created_at TEXT NOT NULL
        );
      `)
      await legacy.createReservation(reservationRecord({ instant: '2025-06-10T14:00:00+00:00' }))
      await legacy.close()

      await expect(createSqliteAdapter(path)).rejects.toThrow(
        'Migration 001_add_reservation_indices failed: no such column: sent'
      )

      const inspect = await createSqliteAdapter(path, { migrate: false })
      expect(await inspect.getMigrations()).toEqual([])
      expect((await inspect.getReservation('res-1'))?.instant).toBe('2025-06-10T14:00:00+00:00')
      await inspect.close()
    })

    it('only the duplicate-slot refusal counts as tolerable', () => {
      const refusal = new MigrationError('003_unique_active_slot', '2 instants hold more than one active reservation')
      const driverFailure = new MigrationError('003_unique_active_slot', 'disk I/O error', { cause: new Error('disk') })
      expect(isDuplicateSlotRefusal(refusal)).toBe(true)
      expect(isDuplicateSlotRefusal(driverFailure)).toBe(false)
      expect(isDuplicateSlotRefusal(new MigrationError('001_add_reservation_indices', 'no such column'))).toBe(false)
      expect(isDuplicateSlotRefusal(new Error('003_unique_active_slot'))).toBe(false)
    })
  })
})
