/**
 * Scheduling Loop
 *
 * Waits for the next trigger instant, fires the platform once, then
 * recomputes from the live clock. A process that wakes late therefore
 * computes a correct (possibly immediately due) trigger instead of drifting.
 *
 * States: idle -> waiting -> firing -> waiting -> ... -> cancelled
 */

import { setTimeout as delay } from 'node:timers/promises'
import type { ScheduleSpec } from './config'
import type { Platform } from './platforms/platform'
import type { Trigger } from './trigger-calculator'
import { nextTrigger as computeNextTrigger } from './trigger-calculator'
import { formatTimeOfDay } from './time-of-day'
import { logger as defaultLogger, type Logger } from './logger'
import { CancelledError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type Clock = {
  now(): Date
  /** Resolve after `ms`, or reject as soon as `signal` aborts */
  sleep(ms: number, signal: AbortSignal): Promise<void>
}

export type SchedulerState =
  | { type: 'idle' }
  | { type: 'waiting'; until: Date; trigger: Trigger }
  | { type: 'firing'; trigger: Trigger }
  | { type: 'cancelled' }

export type SchedulerRunSummary = {
  /** Number of times the platform was invoked */
  fired: number
  failed: number
}

export type SchedulerConfig = {
  schedule: ScheduleSpec
  platform: Platform
  clock?: Clock
  logger?: Logger
}

export type Scheduler = {
  start(signal: AbortSignal): Promise<SchedulerRunSummary>
  nextTrigger(): Trigger
  state(): SchedulerState
  describe(): string
}

type FireOutcome = 'ok' | 'failed' | 'cancelled'

export const systemClock: Clock = {
  now: () => new Date(),
  sleep: (ms, signal) => delay(ms, undefined, { signal }),
}

// ============================================================================
// Formatting
// ============================================================================

function pad2(n: number): string {
  return n < 10 ? '0' + n : '' + n
}

/** Local `YYYY-MM-DD HH:MM:SS` */
export function formatInstant(d: Date): string {
  return (
    `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())} ` +
    `${pad2(d.getHours())}:${pad2(d.getMinutes())}:${pad2(d.getSeconds())}`
  )
}

/** Whole-second duration such as `4h59m0s` */
export function formatDuration(ms: number): string {
  const total = Math.round(ms / 1000)
  const h = Math.floor(total / 3600)
  const m = Math.floor((total % 3600) / 60)
  const s = total % 60
  if (h > 0) return `${h}h${m}m${s}s`
  if (m > 0) return `${m}m${s}s`
  return `${s}s`
}

function targetLabel(trigger: Trigger): string {
  return trigger.targetTime ? formatTimeOfDay(trigger.targetTime) : 'none'
}

// ============================================================================
// Factory
// ============================================================================

export function createScheduler(config: SchedulerConfig): Scheduler {
  const { schedule, platform } = config
  const clock = config.clock ?? systemClock
  const log = config.logger ?? defaultLogger

  let current: SchedulerState = { type: 'idle' }
  let running = false

  function next(): Trigger {
    return computeNextTrigger(
      clock.now(),
      schedule.targetTimes,
      schedule.intervalHours,
      schedule.safetyBufferSeconds
    ).trigger
  }

  /** Resolves false when cancelled before the instant */
  async function waitUntil(trigger: Trigger, signal: AbortSignal): Promise<boolean> {
    let remaining = trigger.triggerAt.getTime() - clock.now().getTime()
    if (remaining <= 0) return true

    current = { type: 'waiting', until: trigger.triggerAt, trigger }
    log.info(`Waiting ${formatDuration(remaining)} until next trigger...`)
    // Timers can wake slightly early; only the clock decides the instant has come
    while (remaining > 0) {
      if (signal.aborted) return false
      try {
        await clock.sleep(remaining, signal)
      } catch (e) {
        if (signal.aborted) return false
        throw e
      }
      remaining = trigger.triggerAt.getTime() - clock.now().getTime()
    }
    return !signal.aborted
  }

  async function fire(trigger: Trigger, signal: AbortSignal): Promise<FireOutcome> {
    current = { type: 'firing', trigger }
    log.info(`[${platform.name}] Triggering quota refresh (for target: ${targetLabel(trigger)})...`)
    try {
      await platform.trigger(signal)
      log.info('[SUCCESS] Trigger completed')
      return 'ok'
    } catch (e) {
      if (signal.aborted || e instanceof CancelledError) {
        log.info('Trigger cancelled')
        return 'cancelled'
      }
      log.error(`Trigger failed: ${e instanceof Error ? e.message : String(e)}`)
      return 'failed'
    }
  }

  async function start(signal: AbortSignal): Promise<SchedulerRunSummary> {
    if (running) throw new Error('Scheduler is already running')
    running = true

    const summary: SchedulerRunSummary = { fired: 0, failed: 0 }

    log.info(`Scheduler started for platform: ${platform.name}`)
    log.info(
      `Target times: [${schedule.targetTimes.join(', ')}], ` +
        `Interval: ${schedule.intervalHours}h, Safety buffer: ${schedule.safetyBufferSeconds}s`
    )

    try {
      let trigger = next()
      log.info(`First trigger scheduled at: ${formatInstant(trigger.triggerAt)} (for target: ${targetLabel(trigger)})`)

      while (!signal.aborted) {
        if (!(await waitUntil(trigger, signal))) break

        summary.fired++
        const outcome = await fire(trigger, signal)
        if (outcome === 'cancelled') break
        if (outcome === 'failed') summary.failed++

        trigger = next()
        log.info(`Next trigger: ${formatInstant(trigger.triggerAt)} (for target: ${targetLabel(trigger)})`)
      }
    } finally {
      current = { type: 'cancelled' }
      running = false
    }

    return summary
  }

  return {
    start,
    nextTrigger: next,
    state: () => current,
    describe: () =>
      `Scheduler{platform=${platform.name}, interval=${schedule.intervalHours}h, targets=[${schedule.targetTimes.join(', ')}]}`,
  }
}
