/**
 * Single-writer queue for adapter work.
 *
 * Units run one at a time, in submission order. Work submitted from inside a
 * running unit (same async context) runs immediately, so nested transactions
 * and adapter calls made by a transaction body never wait on themselves.
 */

import { AsyncLocalStorage } from 'node:async_hooks'

export type TransactionQueue = {
  /** True when called from inside a running unit */
  active(): boolean
  run<T>(work: () => Promise<T>): Promise<T>
}

export function createTransactionQueue(): TransactionQueue {
  const scope = new AsyncLocalStorage<boolean>()
  let tail: Promise<unknown> = Promise.resolve()

  return {
    active() {
      return scope.getStore() === true
    },

    run<T>(work: () => Promise<T>): Promise<T> {
      if (scope.getStore() === true) return work()
      const next = tail.then(() => scope.run(true, work))
      tail = next.then(
        () => undefined,
        () => undefined
      )
      return next
    },
  }
}
