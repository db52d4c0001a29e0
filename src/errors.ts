/**
 * Error system for the lesson booking engine.
 *
 * Every error thrown by the engine extends LessonBookError, which carries a
 * typed error code. Domain errors carry the data a caller needs to render a
 * message (the contested instant, the quota numbers, the closure reason).
 */

// ============================================================================
// Error Codes
// ============================================================================

export const LessonBookErrorCode = {
  // Slot ledger
  SLOT_TAKEN: 'SLOT_TAKEN',
  QUOTA_EXCEEDED: 'QUOTA_EXCEEDED',
  DATE_CLOSED: 'DATE_CLOSED',
  NOT_FOUND: 'NOT_FOUND',

  // Reminder delivery
  TRANSIENT_DELIVERY: 'TRANSIENT_DELIVERY',
  PERMANENT_DELIVERY: 'PERMANENT_DELIVERY',

  // Store
  STORE: 'STORE',
  DUPLICATE_KEY: 'DUPLICATE_KEY',
  MIGRATION: 'MIGRATION',

  // Input
  VALIDATION: 'VALIDATION',
  PARSE_ERROR: 'PARSE_ERROR',
} as const

export type LessonBookErrorCode = (typeof LessonBookErrorCode)[keyof typeof LessonBookErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class LessonBookError extends Error {
  readonly code: LessonBookErrorCode

  constructor(code: LessonBookErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'LessonBookError'
    this.code = code
  }
}

// ============================================================================
// Booking Errors
// ============================================================================

export class SlotTakenError extends LessonBookError {
  readonly instant: string

  constructor(instant: string) {
    super(LessonBookErrorCode.SLOT_TAKEN, `Slot ${instant} is already taken`)
    this.name = 'SlotTakenError'
    this.instant = instant
  }
}

export class QuotaExceededError extends LessonBookError {
  readonly limit: number
  readonly count: number

  constructor(limit: number, count: number) {
    super(
      LessonBookErrorCode.QUOTA_EXCEEDED,
      `Weekly reservation limit reached (${count}/${limit})`
    )
    this.name = 'QuotaExceededError'
    this.limit = limit
    this.count = count
  }
}

export class DateClosedError extends LessonBookError {
  readonly date: string
  readonly reason: string

  constructor(date: string, reason: string) {
    super(
      LessonBookErrorCode.DATE_CLOSED,
      reason ? `Date ${date} is closed: ${reason}` : `Date ${date} is closed`
    )
    this.name = 'DateClosedError'
    this.date = date
    this.reason = reason
  }
}

export class NotFoundError extends LessonBookError {
  constructor(message: string) {
    super(LessonBookErrorCode.NOT_FOUND, message)
    this.name = 'NotFoundError'
  }
}

// ============================================================================
// Delivery Errors
// ============================================================================

/** Thrown by a delivery callback when a later attempt may succeed. */
export class TransientDeliveryError extends LessonBookError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(LessonBookErrorCode.TRANSIENT_DELIVERY, message, options)
    this.name = 'TransientDeliveryError'
  }
}

/** Thrown by a delivery callback when the target can never be reached. */
export class PermanentDeliveryError extends LessonBookError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(LessonBookErrorCode.PERMANENT_DELIVERY, message, options)
    this.name = 'PermanentDeliveryError'
  }
}

// ============================================================================
// Store Errors
// ============================================================================

export class StoreError extends LessonBookError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(LessonBookErrorCode.STORE, message, options)
    this.name = 'StoreError'
  }
}

export class DuplicateKeyError extends LessonBookError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(LessonBookErrorCode.DUPLICATE_KEY, message, options)
    this.name = 'DuplicateKeyError'
  }
}

export class MigrationError extends LessonBookError {
  readonly migration: string

  constructor(migration: string, message: string, options?: { cause?: unknown }) {
    super(LessonBookErrorCode.MIGRATION, `Migration ${migration} failed: ${message}`, options)
    this.name = 'MigrationError'
    this.migration = migration
  }
}

// ============================================================================
// Input Errors
// ============================================================================

export class ValidationError extends LessonBookError {
  constructor(message: string) {
    super(LessonBookErrorCode.VALIDATION, message)
    this.name = 'ValidationError'
  }
}

export class ParseError extends LessonBookError {
  constructor(message: string) {
    super(LessonBookErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}

// ============================================================================
// Helpers
// ============================================================================

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}
