/**
 * User directory: people known to the engine and their language preference.
 * Users are created on first contact.
 */

import type { Adapter } from './adapter'
import { DuplicateKeyError, NotFoundError, StoreError } from './errors'
import { msToInstant } from './timestamps'
import type { User, UserId } from './types'
import { type Clock, systemClock } from './scheduler'
import { type Logger, silentLogger } from './logger'
import { convertAll, toUser } from './internal/helpers'

export const DEFAULT_LANGUAGE = 'en'

export type UserDirectoryDeps = {
  adapter: Adapter
  clock?: Clock
  logger?: Logger
}

export type UserContact = {
  id: UserId
  language?: string
  displayName?: string
  username?: string | null
}

export type UserDirectory = ReturnType<typeof createUserDirectory>

export function createUserDirectory(deps: UserDirectoryDeps) {
  const { adapter } = deps
  const clock = deps.clock ?? systemClock
  const logger = deps.logger ?? silentLogger

  async function get(id: UserId): Promise<User | null> {
    const record = await adapter.getUser(id)
    return record ? toUser(record) : null
  }

  async function getOrThrow(id: UserId): Promise<User> {
    const user = await get(id)
    if (!user) throw new NotFoundError(`User '${id}' not found`)
    return user
  }

  /** Returns the stored user, creating it on first contact */
  async function ensure(contact: UserContact): Promise<User> {
    const existing = await get(contact.id)
    if (existing) return existing
    try {
      await adapter.createUser({
        id: contact.id,
        language: contact.language ?? DEFAULT_LANGUAGE,
        displayName: contact.displayName ?? '',
        username: contact.username ?? null,
        createdAt: msToInstant(clock.now()),
      })
      logger.info('User registered', { id: contact.id })
    } catch (e) {
      // Lost a first-contact race; the other caller's row stands
      if (!(e instanceof DuplicateKeyError)) throw e
    }
    const created = await get(contact.id)
    if (!created) throw new StoreError(`User '${contact.id}' missing after create`)
    return created
  }

  async function setLanguage(id: UserId, language: string): Promise<User> {
    await getOrThrow(id)
    await adapter.updateUser(id, { language })
    return getOrThrow(id)
  }

  async function updateProfile(id: UserId, profile: { displayName?: string; username?: string | null }): Promise<User> {
    await getOrThrow(id)
    await adapter.updateUser(id, profile)
    return getOrThrow(id)
  }

  async function list(): Promise<User[]> {
    return convertAll(await adapter.getAllUsers(), toUser)
  }

  return { get, getOrThrow, ensure, setLanguage, updateProfile, list }
}
