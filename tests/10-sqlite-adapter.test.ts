/**
 * Segment 10: SQLite Adapter
 *
 * The better-sqlite3 adapter satisfies the shared contract, lays out the
 * schema the migrations expect, and keeps state across reopen.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { createSqliteAdapter, type SqliteAdapter } from '../src/sqlite-adapter'
import { createBookingEngine } from '../src/booking-engine'
import { SlotTakenError, StoreError } from '../src/errors'
import { adapterContract } from './helpers/adapter-contract'
import {
  ALICE,
  BOB,
  createManualScheduler,
  createTestClock,
  reservationRecord,
} from './helpers/fixtures'

adapterContract('Segment 10: SQLite adapter', () => createSqliteAdapter(':memory:'))

describe('Segment 10: SQLite Adapter', () => {
  // ========================================================================
  // Schema
  // ========================================================================

  describe('schema', () => {
    let db: SqliteAdapter

    beforeEach(async () => {
      db = await createSqliteAdapter(':memory:')
    })

    afterEach(async () => {
      await db.close()
    })

    it('creates every table', async () => {
      expect(await db.listTables()).toEqual([
        'closed_dates',
        'migrations',
        'reminder_intents',
        'reservations',
        'users',
      ])
    })

    it('lays out reservation and intent columns', async () => {
      expect(await db.getTableColumns('reservations')).toEqual([
        'id',
        'user_id',
        'date',
        'time',
        'instant',
        'branch',
        'purpose',
        'status',
        'created_at',
      ])
      expect(await db.getTableColumns('reminder_intents')).toEqual([
        'id',
        'reservation_id',
        'user_id',
        'role',
        'lead_tag',
        'instant',
        'sent',
        'created_at',
      ])
    })

    it('creates the lookup indices and the unique active-slot index', async () => {
      const reservationIndices = await db.listIndices('reservations')
      expect(reservationIndices).toEqual(
        expect.arrayContaining([
          'idx_reservations_user_status',
          'idx_reservations_date_status',
          'idx_reservations_active_instant',
        ])
      )
      expect(await db.listIndices('reminder_intents')).toEqual(
        expect.arrayContaining(['idx_reminder_intents_sent', 'idx_reminder_intents_reservation'])
      )
    })

    it('rejects an unknown status value', async () => {
      await expect(
        db.run(
          "INSERT INTO reservations (id, user_id, date, time, instant, status, created_at) VALUES ('x', '1', '2025-06-10', '14:00', '2025-06-10T14:00:00.000Z', 'pending', '2025-06-01T00:00:00.000Z')"
        )
      ).rejects.toThrow(StoreError)
    })

    it('wraps driver errors in StoreError', async () => {
      await expect(db.rawQuery('SELECT * FROM nowhere')).rejects.toThrow(StoreError)
    })

    it('reports an open transaction only inside one', async () => {
      expect(await db.inTransaction()).toBe(false)
      const inside = await db.transaction(() => db.inTransaction())
      expect(inside).toBe(true)
    })

    it('run returns the number of changed rows', async () => {
      await db.createReservation(reservationRecord())
      await db.createReservation(reservationRecord({ id: 'res-2', instant: '2025-06-10T15:00:00.000Z' }))
      expect(await db.run("UPDATE reservations SET purpose = ? WHERE status = 'active'", 'grammar')).toBe(2)
    })
  })

  // ========================================================================
  // Racing reservations
  // ========================================================================

  describe('racing reservations', () => {
    const SLOT = { date: '2025-06-10', time: '14:00' }
    const AT = '2025-06-10T14:00:00.000Z'
    let dir: string

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'lessonbook-race-'))
    })

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true })
    })

    function engineOn(adapter: SqliteAdapter) {
      const clock = createTestClock()
      return createBookingEngine({ adapter, timezone: 'UTC', clock, scheduler: createManualScheduler(clock) })
    }

    function expectOneWinner(results: PromiseSettledResult<unknown>[]): void {
      expect(results.map((r) => r.status).sort()).toEqual(['fulfilled', 'rejected'])
      const rejected = results.find((r): r is PromiseRejectedResult => r.status === 'rejected')
      expect(rejected?.reason).toBeInstanceOf(SlotTakenError)
    }

    it('gives one of two engine callers the slot', async () => {
      const adapter = await createSqliteAdapter(':memory:')
      const engine = engineOn(adapter)
      const results = await Promise.allSettled([
        engine.reserve({ userId: ALICE, ...SLOT }),
        engine.reserve({ userId: BOB, ...SLOT }),
      ])
      expectOneWinner(results)
      expect(await adapter.countActiveReservationsAt(AT)).toBe(1)
      await adapter.close()
    })

    it('the unique index refuses a slot the check missed', async () => {
      const adapter = await createSqliteAdapter(':memory:')
      const engine = engineOn(adapter)
      await engine.reserve({ userId: ALICE, ...SLOT })
      vi.spyOn(adapter, 'countActiveReservationsAt').mockResolvedValue(0)

      await expect(engine.reserve({ userId: BOB, ...SLOT })).rejects.toThrow(SlotTakenError)
      vi.restoreAllMocks()
      expect(await adapter.countActiveReservationsAt(AT)).toBe(1)
      expect(await adapter.getActiveReservationsByUser(BOB)).toEqual([])
      await adapter.close()
    })

    it('gives one of two connections to one file the slot', async () => {
      const path = join(dir, 'book.db')
      const first = await createSqliteAdapter(path)
      const second = await createSqliteAdapter(path)
      const results = await Promise.allSettled([
        engineOn(first).reserve({ userId: ALICE, ...SLOT }),
        engineOn(second).reserve({ userId: BOB, ...SLOT }),
      ])
      expectOneWinner(results)
      expect(await first.countActiveReservationsAt(AT)).toBe(1)
      expect(await second.countActiveReservationsAt(AT)).toBe(1)
      await first.close()
      await second.close()
    })
  })

  // ========================================================================
  // Durability
  // ========================================================================

  describe('durability', () => {
    let dir: string

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'lessonbook-sqlite-'))
    })

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true })
    })

    it('keeps records across reopen and does not rerun migrations', async () => {
      const path = join(dir, 'book.db')
      const first = await createSqliteAdapter(path)
      await first.createReservation(reservationRecord())
      const applied = (await first.getMigrations()).map((m) => `${m.name}@${m.appliedAt}`).sort()
      await first.close()

      const second = await createSqliteAdapter(path)
      expect((await second.getReservation('res-1'))?.userId).toBe('1001')
      expect((await second.getMigrations()).map((m) => `${m.name}@${m.appliedAt}`).sort()).toEqual(applied)
      await second.close()
    })

    it('a restarted engine re-arms reminders persisted by the previous one', async () => {
      const path = join(dir, 'book.db')
      const clock = createTestClock()
      const scheduler = createManualScheduler(clock)

      const beforeAdapter = await createSqliteAdapter(path)
      const before = createBookingEngine({ adapter: beforeAdapter, timezone: 'UTC', clock, scheduler, operatorIds: ['9001'] })
      await before.reserve({ userId: ALICE, date: '2025-06-10', time: '14:00' })
      await before.reserve({ userId: BOB, date: '2025-06-10', time: '15:00' })
      await before.stop()
      await beforeAdapter.close()

      const afterAdapter = await createSqliteAdapter(path)
      const after = createBookingEngine({ adapter: afterAdapter, timezone: 'UTC', clock, scheduler, operatorIds: ['9001'] })
      const delivered: string[] = []
      after.onReminderDue((due) => {
        delivered.push(`${due.intent.targetUser}:${due.intent.lead}`)
      })

      expect(await after.start()).toEqual({ purged: 0, armed: 6 })
      scheduler.advance(Date.parse('2025-06-10T15:00:00Z') - clock.now())
      await after.dispatcher.idle()
      expect(delivered.sort()).toEqual(['1001:30m', '1001:4h', '1002:30m', '1002:4h', '9001:10m', '9001:10m'])

      await after.stop()
      await afterAdapter.close()
    })
  })
})
