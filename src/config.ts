/**
 * Configuration
 *
 * `resolveEngineConfig` validates options passed to createBookingEngine and
 * fills in defaults. `loadEnvConfig` reads the process environment for hosts
 * that configure the engine that way.
 */

import { z } from 'zod'
import type { Adapter } from './adapter'
import { ValidationError } from './errors'
import { isValidTimezone } from './time-date'
import { type Logger, LOG_LEVELS, createConsoleLogger, silentLogger } from './logger'
import { type Clock, type Scheduler, systemClock, createNodeScheduler } from './scheduler'
import { type ReminderPlanEntry, DEFAULT_REMINDER_PLAN } from './reminder-plan'
import type { DeliveryFailure } from './reminder-dispatcher'
import { DEFAULT_SWEEP_INTERVAL_MS } from './reminder-dispatcher'
import { DEFAULT_WEEKLY_QUOTA } from './quota'
import { type UserId, userId, LEAD_TAGS, TARGET_ROLES } from './types'

// ============================================================================
// Engine Config
// ============================================================================

export const DEFAULT_TIMEZONE = 'Asia/Tashkent'
export const DEFAULT_PAGE_SIZE = 10

export type BookingEngineConfig = {
  adapter: Adapter
  /** IANA timezone the business operates in */
  timezone?: string
  weeklyQuota?: number
  pageSize?: number
  sweepIntervalMs?: number
  reminderPlan?: readonly ReminderPlanEntry[]
  /** Users that receive operator reminders and may manage the calendar */
  operatorIds?: readonly (string | number)[]
  purgePastOnStart?: boolean
  clock?: Clock
  scheduler?: Scheduler
  logger?: Logger
  onDeliveryFailure?: (failure: DeliveryFailure) => void | Promise<void>
}

export type ResolvedEngineConfig = {
  adapter: Adapter
  timezone: string
  weeklyQuota: number
  pageSize: number
  sweepIntervalMs: number
  reminderPlan: readonly ReminderPlanEntry[]
  operatorIds: readonly UserId[]
  purgePastOnStart: boolean
  clock: Clock
  scheduler: Scheduler
  logger: Logger
  onDeliveryFailure?: (failure: DeliveryFailure) => void | Promise<void>
}

function positiveInteger(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ValidationError(`${name} must be a positive integer, got ${value}`)
  }
  return value
}

export function resolveEngineConfig(config: BookingEngineConfig): ResolvedEngineConfig {
  const timezone = config.timezone ?? DEFAULT_TIMEZONE
  if (!isValidTimezone(timezone)) {
    throw new ValidationError(`Unknown timezone '${timezone}'`)
  }

  const reminderPlan = config.reminderPlan ?? DEFAULT_REMINDER_PLAN
  for (const entry of reminderPlan) {
    if (!TARGET_ROLES.includes(entry.role) || !LEAD_TAGS.includes(entry.lead)) {
      throw new ValidationError(`Invalid reminder plan entry ${entry.role}/${entry.lead}`)
    }
  }

  const clock = config.clock ?? systemClock

  return {
    adapter: config.adapter,
    timezone,
    weeklyQuota: positiveInteger('weeklyQuota', config.weeklyQuota ?? DEFAULT_WEEKLY_QUOTA),
    pageSize: positiveInteger('pageSize', config.pageSize ?? DEFAULT_PAGE_SIZE),
    sweepIntervalMs: positiveInteger('sweepIntervalMs', config.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS),
    reminderPlan,
    operatorIds: [...new Set((config.operatorIds ?? []).map((id) => userId(id)))],
    purgePastOnStart: config.purgePastOnStart ?? true,
    clock,
    scheduler: config.scheduler ?? createNodeScheduler(clock),
    logger: config.logger ?? silentLogger,
    onDeliveryFailure: config.onDeliveryFailure,
  }
}

// ============================================================================
// Environment
// ============================================================================

const envSchema = z.object({
  DB_PATH: z.string().min(1).default('lessonbook.db'),
  TIMEZONE: z
    .string()
    .min(1)
    .default(DEFAULT_TIMEZONE)
    .refine(isValidTimezone, { message: 'Unknown IANA timezone' }),
  ADMIN_IDS: z
    .string()
    .default('')
    .transform((raw) =>
      raw
        .split(',')
        .map((part) => part.trim())
        .filter((part) => part.length > 0)
    ),
  WEEKLY_QUOTA: z.coerce.number().int().positive().default(DEFAULT_WEEKLY_QUOTA),
  SWEEP_INTERVAL_SECONDS: z.coerce.number().int().positive().default(DEFAULT_SWEEP_INTERVAL_MS / 1000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
})

export type EnvConfig = z.infer<typeof envSchema>

export function loadEnvConfig(env: Record<string, string | undefined> = process.env): EnvConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new ValidationError(`Invalid environment: ${detail}`)
  }
  return parsed.data
}

/** Engine options derived from the environment; the host supplies the adapter */
export function engineOptionsFromEnv(env: EnvConfig): Omit<BookingEngineConfig, 'adapter'> {
  return {
    timezone: env.TIMEZONE,
    weeklyQuota: env.WEEKLY_QUOTA,
    sweepIntervalMs: env.SWEEP_INTERVAL_SECONDS * 1000,
    operatorIds: env.ADMIN_IDS,
    logger: env.LOG_LEVEL === 'silent' ? silentLogger : createConsoleLogger('lessonbook', env.LOG_LEVEL),
  }
}
