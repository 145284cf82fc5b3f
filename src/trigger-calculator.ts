/**
 * Trigger Calculator
 *
 * Turns daily target times into absolute trigger instants:
 * trigger = (date at target) - interval + buffer, in local time.
 */

import type { TimeOfDay } from './time-of-day'
import { parseTimeOfDay } from './time-of-day'

// ============================================================================
// Types
// ============================================================================

export type Trigger = {
  /** Target this trigger serves; null only for the fallback trigger */
  readonly targetTime: TimeOfDay | null
  readonly triggerAt: Date
}

export type NextTrigger = {
  trigger: Trigger
  /** Local start of the day whose targets produced the trigger */
  referenceDate: Date
}

const MS_PER_HOUR = 3_600_000
const MS_PER_DAY = 86_400_000

// ============================================================================
// Day Helpers
// ============================================================================

export function startOfDay(d: Date): Date {
  return new Date(d.getFullYear(), d.getMonth(), d.getDate())
}

/** Calendar day arithmetic, so a DST shift never lands on the wrong date */
export function addDays(d: Date, n: number): Date {
  return new Date(d.getFullYear(), d.getMonth(), d.getDate() + n)
}

// ============================================================================
// Public API
// ============================================================================

/**
 * All trigger instants for the targets of `date`, earliest first.
 *
 * A trigger may fall on the previous calendar day. Unparseable target strings
 * are skipped; they are rejected earlier by the conflict validator.
 */
export function triggersForDate(
  date: Date,
  targetTimes: readonly string[],
  intervalHours: number,
  bufferSeconds: number
): Trigger[] {
  const triggers: Trigger[] = []

  for (const str of targetTimes) {
    const parsed = parseTimeOfDay(str)
    if (!parsed.ok) continue

    const target = parsed.value
    const targetAt = new Date(date.getFullYear(), date.getMonth(), date.getDate(), target.hour, target.minute)
    const triggerAt = new Date(targetAt.getTime() - intervalHours * MS_PER_HOUR + bufferSeconds * 1000)

    triggers.push({ targetTime: target, triggerAt })
  }

  triggers.sort((a, b) => a.triggerAt.getTime() - b.triggerAt.getTime())
  return triggers
}

/**
 * The first trigger strictly after `now`, searching today then the following
 * days.
 *
 * Tomorrow is normally enough, but a trigger rolled back by the interval can
 * land on or before `now` even for tomorrow's targets (target 01:00 with a
 * 20h interval triggers at 05:00 the day before), so the search runs until
 * the interval can no longer reach back past `now`. A trigger exactly at
 * `now` counts as already fired.
 */
export function nextTrigger(
  now: Date,
  targetTimes: readonly string[],
  intervalHours: number,
  bufferSeconds: number
): NextTrigger {
  const today = startOfDay(now)
  const horizonDays = 1 + Math.ceil(intervalHours / 24)

  for (let offset = 0; offset <= horizonDays; offset++) {
    const day = offset === 0 ? today : addDays(today, offset)
    for (const trigger of triggersForDate(day, targetTimes, intervalHours, bufferSeconds)) {
      if (trigger.triggerAt.getTime() > now.getTime()) {
        return { trigger, referenceDate: day }
      }
    }
  }

  // Unreachable with a validated, non-empty schedule
  return {
    trigger: { targetTime: null, triggerAt: new Date(now.getTime() + MS_PER_DAY) },
    referenceDate: addDays(today, 1),
  }
}
