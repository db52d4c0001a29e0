/**
 * Domain types shared across the booking engine.
 */

import type { LocalDate, LocalTime } from './time-date'
import type { Instant } from './timestamps'

// ============================================================================
// Identifiers
// ============================================================================

declare const __userId: unique symbol
declare const __reservationId: unique symbol
declare const __intentId: unique symbol

/** Opaque identifier of a person, assigned by the transport */
export type UserId = string & { readonly [__userId]: true }

export type ReservationId = string & { readonly [__reservationId]: true }

export type IntentId = string & { readonly [__intentId]: true }

export function userId(id: string | number): UserId {
  return String(id) as UserId
}

export function reservationId(id: string): ReservationId {
  return id as ReservationId
}

export function intentId(id: string): IntentId {
  return id as IntentId
}

// ============================================================================
// Users
// ============================================================================

export type User = {
  id: UserId
  language: string
  displayName: string
  username: string | null
  createdAt: Instant
}

// ============================================================================
// Reservations
// ============================================================================

export type ReservationStatus = 'active' | 'cancelled'

export type Reservation = {
  id: ReservationId
  userId: UserId
  date: LocalDate
  time: LocalTime
  instant: Instant
  branch: string
  purpose: string
  status: ReservationStatus
  createdAt: Instant
}

// ============================================================================
// Reminder Intents
// ============================================================================

export const TARGET_ROLES = ['student', 'operator'] as const
export type TargetRole = (typeof TARGET_ROLES)[number]

export const LEAD_TAGS = ['4h', '30m', '10m', '60m'] as const
export type LeadTag = (typeof LEAD_TAGS)[number]

export function isTargetRole(value: string): value is TargetRole {
  return (TARGET_ROLES as readonly string[]).includes(value)
}

export function isLeadTag(value: string): value is LeadTag {
  return (LEAD_TAGS as readonly string[]).includes(value)
}

export type ReminderIntent = {
  id: IntentId
  reservationId: ReservationId
  targetUser: UserId
  role: TargetRole
  lead: LeadTag
  scheduledAt: Instant
  sent: boolean
  createdAt: Instant
}

// ============================================================================
// Closed Dates
// ============================================================================

export type ClosedDate = {
  date: LocalDate
  reason: string
  createdAt: Instant
}
