/**
 * Clock and timer abstractions. The dispatcher depends on these rather than
 * on globals so tests can drive time.
 */

export type Clock = {
  /** Current time as epoch ms */
  now(): number
}

export const systemClock: Clock = {
  now: () => Date.now(),
}

export type TimerHandle = {
  cancel(): void
}

export type Scheduler = {
  /** Run `task` once at epoch ms `whenMs` (immediately if already past) */
  at(whenMs: number, task: () => void): TimerHandle
  /** Run `task` every `intervalMs` until cancelled */
  every(intervalMs: number, task: () => void): TimerHandle
}

/** Largest delay setTimeout accepts; longer waits are chained */
export const MAX_TIMEOUT_MS = 2_147_483_647

export function createNodeScheduler(clock: Clock = systemClock): Scheduler {
  return {
    at(whenMs, task) {
      let timer: ReturnType<typeof setTimeout> | undefined
      let cancelled = false

      const arm = (): void => {
        const delay = Math.max(0, whenMs - clock.now())
        if (delay > MAX_TIMEOUT_MS) {
          timer = setTimeout(arm, MAX_TIMEOUT_MS)
          return
        }
        timer = setTimeout(() => {
          if (!cancelled) task()
        }, delay)
      }
      arm()

      return {
        cancel() {
          cancelled = true
          if (timer !== undefined) clearTimeout(timer)
        },
      }
    },

    every(intervalMs, task) {
      const timer = setInterval(task, intervalMs)
      return {
        cancel() {
          clearInterval(timer)
        },
      }
    },
  }
}
