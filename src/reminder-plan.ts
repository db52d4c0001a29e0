/**
 * Reminder plan: which intents a reservation produces.
 *
 * Student entries yield one intent for the reservation owner. Operator entries
 * yield one intent per configured operator.
 */

import type { Instant } from './timestamps'
import { addMinutesToInstant } from './timestamps'
import type { LeadTag, TargetRole, UserId } from './types'

export type ReminderPlanEntry = {
  role: TargetRole
  lead: LeadTag
}

export type PlannedIntent = {
  targetUser: UserId
  role: TargetRole
  lead: LeadTag
  scheduledAt: Instant
}

export const DEFAULT_REMINDER_PLAN: readonly ReminderPlanEntry[] = [
  { role: 'student', lead: '4h' },
  { role: 'student', lead: '30m' },
  { role: 'operator', lead: '10m' },
]

export function leadMinutes(lead: LeadTag): number {
  switch (lead) {
    case '4h':
      return 240
    case '60m':
      return 60
    case '30m':
      return 30
    case '10m':
      return 10
  }
}

export function planIntents(
  reservation: { userId: UserId; instant: Instant },
  plan: readonly ReminderPlanEntry[],
  operatorIds: readonly UserId[]
): PlannedIntent[] {
  const planned: PlannedIntent[] = []
  for (const entry of plan) {
    const scheduledAt = addMinutesToInstant(reservation.instant, -leadMinutes(entry.lead))
    const targets = entry.role === 'student' ? [reservation.userId] : operatorIds
    for (const targetUser of targets) {
      planned.push({ targetUser, role: entry.role, lead: entry.lead, scheduledAt })
    }
  }
  return planned
}
