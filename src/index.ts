/**
 * lessonbook-engine
 *
 * Public API exports
 */

// Error system
export {
  LessonBookError, LessonBookErrorCode,
  SlotTakenError, QuotaExceededError, DateClosedError, NotFoundError,
  TransientDeliveryError, PermanentDeliveryError,
  StoreError, DuplicateKeyError, MigrationError,
  ValidationError, ParseError,
  errorMessage,
} from './errors'
export type { LessonBookErrorCode as LessonBookErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Time & Date
export type { LocalDate, LocalTime } from './time-date'
export {
  parseDate, parseTime, makeDate, makeTime,
  addDays, weekdayIndex, startOfWeek,
  isValidTimezone, zonedToUtcMs, utcMsToZoned,
} from './time-date'

// Timestamps
export type { Instant } from './timestamps'
export {
  parseInstant, isCanonicalInstant, normalizeLegacyTimestamp,
  msToInstant, instantToMs, compareInstants, addMinutesToInstant, slotInstant,
} from './timestamps'

// Domain types
export type {
  UserId, ReservationId, IntentId,
  User, Reservation, ReservationStatus,
  ReminderIntent, TargetRole, LeadTag, ClosedDate,
} from './types'
export { userId, reservationId, intentId, LEAD_TAGS, TARGET_ROLES } from './types'

// Adapters
export type {
  Adapter, UserRecord, ReservationRecord, ReservationSlot,
  IntentRecord, ClosedDateRecord, MigrationRecord,
} from './adapter'
export { createMockAdapter } from './adapter'
export type { SqliteAdapter, SqliteAdapterOptions, SqliteExtras, SqlValue } from './sqlite-adapter'
export { createSqliteAdapter } from './sqlite-adapter'

// Ledgers
export type { SlotLedger, NewReservation, ReservationPage } from './slot-ledger'
export { createSlotLedger } from './slot-ledger'
export type { ReminderLedger, NewReminderIntent } from './reminder-ledger'
export { createReminderLedger } from './reminder-ledger'
export type { ClosedDateRegistry } from './closed-dates'
export { createClosedDateRegistry } from './closed-dates'
export type { UserDirectory, UserContact } from './users'
export { createUserDirectory, DEFAULT_LANGUAGE } from './users'
export type { UserCache } from './user-cache'
export { createUserCache } from './user-cache'
export type { QuotaWindow } from './quota'
export { weekWindowFor, DEFAULT_WEEKLY_QUOTA } from './quota'

// Reminders
export type { ReminderPlanEntry, PlannedIntent } from './reminder-plan'
export { DEFAULT_REMINDER_PLAN, leadMinutes, planIntents } from './reminder-plan'
export type {
  ReminderDispatcher, ReminderHandler, ReminderDue,
  DeliveryOutcome, DeliveryFailure, DeliveryResult, SweepSummary, StartSummary,
} from './reminder-dispatcher'
export { createReminderDispatcher, DEFAULT_SWEEP_INTERVAL_MS } from './reminder-dispatcher'
export type { Clock, Scheduler, TimerHandle } from './scheduler'
export { systemClock, createNodeScheduler, MAX_TIMEOUT_MS } from './scheduler'

// Migrations
export type { Migration, MigrationRunner } from './migrations'
export { createMigrationRunner, builtInMigrations, isDuplicateSlotRefusal, UNIQUE_ACTIVE_SLOT_MIGRATION } from './migrations'

// Engine
export type {
  BookingEngine, ReserveInput, UpcomingQuery, UpcomingPage,
  CloseDateOptions, BookingEventMap,
} from './booking-engine'
export { createBookingEngine } from './booking-engine'

// Configuration & logging
export type { BookingEngineConfig, ResolvedEngineConfig, EnvConfig } from './config'
export {
  resolveEngineConfig, loadEnvConfig, engineOptionsFromEnv,
  DEFAULT_TIMEZONE, DEFAULT_PAGE_SIZE,
} from './config'
export type { Logger, LogLevel, LogContext } from './logger'
export { createConsoleLogger, silentLogger, LOG_LEVELS } from './logger'
