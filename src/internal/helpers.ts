/**
 * Internal Helpers
 *
 * Record → domain conversion shared by the ledgers. Stored text that does not
 * parse yields null so read paths can skip the row.
 */

import { randomUUID } from 'node:crypto'
import type { IntentRecord, ReservationRecord, UserRecord, ClosedDateRecord } from '../adapter'
import { parseDate, parseTime } from '../time-date'
import { parseInstant } from '../timestamps'
import {
  type ClosedDate,
  type ReminderIntent,
  type Reservation,
  type User,
  intentId,
  isLeadTag,
  isTargetRole,
  reservationId,
  userId,
} from '../types'

// ============================================================================
// ID Generation
// ============================================================================

export function uuid(): string {
  return randomUUID()
}

// ============================================================================
// Record Conversion
// ============================================================================

export function toReservation(record: ReservationRecord): Reservation | null {
  const instant = parseInstant(record.instant)
  const date = parseDate(record.date)
  const time = parseTime(record.time)
  if (!instant || !date.ok || !time.ok) return null
  return {
    id: reservationId(record.id),
    userId: userId(record.userId),
    date: date.value,
    time: time.value,
    instant,
    branch: record.branch,
    purpose: record.purpose,
    status: record.status,
    createdAt: parseInstant(record.createdAt) ?? instant,
  }
}

export function toIntent(record: IntentRecord): ReminderIntent | null {
  const scheduledAt = parseInstant(record.instant)
  if (!scheduledAt || !isTargetRole(record.role) || !isLeadTag(record.leadTag)) return null
  return {
    id: intentId(record.id),
    reservationId: reservationId(record.reservationId),
    targetUser: userId(record.targetUser),
    role: record.role,
    lead: record.leadTag,
    scheduledAt,
    sent: record.sent,
    createdAt: parseInstant(record.createdAt) ?? scheduledAt,
  }
}

export function toUser(record: UserRecord): User | null {
  const createdAt = parseInstant(record.createdAt)
  if (!createdAt) return null
  return {
    id: userId(record.id),
    language: record.language,
    displayName: record.displayName,
    username: record.username,
    createdAt,
  }
}

export function toClosedDate(record: ClosedDateRecord): ClosedDate | null {
  const date = parseDate(record.date)
  const createdAt = parseInstant(record.createdAt)
  if (!date.ok || !createdAt) return null
  return { date: date.value, reason: record.reason, createdAt }
}

/** Convert records, dropping the ones that do not parse */
export function convertAll<R, D>(
  records: readonly R[],
  convert: (record: R) => D | null,
  onSkip?: (record: R) => void
): D[] {
  const out: D[] = []
  for (const record of records) {
    const value = convert(record)
    if (value !== null) out.push(value)
    else onSkip?.(record)
  }
  return out
}
