/**
 * Request-scoped user cache.
 *
 * A transport handler typically needs the same user's language several times
 * while answering one update. Create one cache per request and discard it
 * afterwards; concurrent lookups of the same id share one store read.
 */

import type { User, UserId } from './types'
import type { UserDirectory } from './users'

export type UserCache = {
  get(id: UserId): Promise<User | null>
  language(id: UserId, fallback?: string): Promise<string>
  setLanguage(id: UserId, language: string): Promise<User>
  invalidate(id: UserId): void
}

export function createUserCache(directory: Pick<UserDirectory, 'get' | 'setLanguage'>): UserCache {
  const entries = new Map<UserId, Promise<User | null>>()

  function get(id: UserId): Promise<User | null> {
    let entry = entries.get(id)
    if (!entry) {
      entry = directory.get(id).catch((e: unknown) => {
        entries.delete(id)
        throw e
      })
      entries.set(id, entry)
    }
    return entry
  }

  return {
    get,

    async language(id, fallback = 'en') {
      const user = await get(id)
      return user?.language ?? fallback
    },

    async setLanguage(id, language) {
      const user = await directory.setLanguage(id, language)
      entries.set(id, Promise.resolve(user))
      return user
    },

    invalidate(id) {
      entries.delete(id)
    },
  }
}
