/**
 * Deterministic clock for the scheduling loop.
 *
 * `sleep` jumps the clock forward instead of waiting, so a run of many
 * triggers finishes instantly.
 */
import type { Clock } from '../../src/scheduler'

export type FakeClock = Clock & {
  /** Every duration passed to sleep, in order */
  sleeps: number[]
  advance(ms: number): void
}

export type FakeClockOptions = {
  /** Extra time that passes during the nth sleep (0-based), e.g. a suspended process */
  oversleep?: (index: number) => number
  /** Time that actually passes for a sleep of `ms`; overrides `oversleep` */
  elapsed?: (ms: number) => number
}

export function createFakeClock(start: Date, options: FakeClockOptions = {}): FakeClock {
  let nowMs = start.getTime()
  const sleeps: number[] = []

  return {
    sleeps,
    now: () => new Date(nowMs),
    advance(ms) {
      nowMs += ms
    },
    sleep(ms, signal) {
      if (signal.aborted) return Promise.reject(signal.reason)
      const extra = options.oversleep ? options.oversleep(sleeps.length) : 0
      sleeps.push(ms)
      nowMs += options.elapsed ? options.elapsed(ms) : ms + extra
      return Promise.resolve()
    },
  }
}

/** A clock whose sleep never finishes on its own; only an abort ends it */
export function createBlockingClock(start: Date): Clock & { sleeps: number[] } {
  const sleeps: number[] = []
  return {
    sleeps,
    now: () => new Date(start.getTime()),
    sleep(ms, signal) {
      sleeps.push(ms)
      return new Promise<void>((_, reject) => {
        if (signal.aborted) {
          reject(signal.reason)
          return
        }
        signal.addEventListener('abort', () => reject(signal.reason), { once: true })
      })
    },
  }
}
