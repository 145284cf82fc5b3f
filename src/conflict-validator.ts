/**
 * Conflict Validator
 *
 * Each target time implies a trigger exactly `intervalHours` earlier, which
 * opens a quota window [trigger, trigger + interval). A schedule is valid only
 * if no target's trigger falls inside the window opened by another target.
 *
 * Every ordered pair is checked, not just neighbours in sorted order, because
 * windows can wrap past midnight.
 */

import type { Result } from './result'
import { Ok, Err } from './result'
import type { TimeOfDay } from './time-of-day'
import {
  parseTimeOfDay, formatTimeOfDay, compareTimeOfDay, timeOfDayEquals,
  toSeconds, fromSeconds, wrapDay, inSecondsInterval,
  SECONDS_PER_HOUR, SECONDS_PER_DAY,
} from './time-of-day'
import { ConflictError, DuplicateTargetError, InvalidFormatError } from './errors'

export { ConflictError, DuplicateTargetError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type ScheduleValidationError = InvalidFormatError | DuplicateTargetError | ConflictError

type ParsedTarget = {
  source: string
  time: TimeOfDay
}

// ============================================================================
// Helpers
// ============================================================================

function parseAll(targetTimes: readonly string[]): Result<ParsedTarget[], InvalidFormatError> {
  const parsed: ParsedTarget[] = []
  for (const source of targetTimes) {
    const result = parseTimeOfDay(source)
    if (!result.ok) return Err(result.error)
    parsed.push({ source, time: result.value })
  }
  // Stable sort keeps the first-listed spelling first among equal times
  parsed.sort((a, b) => compareTimeOfDay(a.time, b.time))
  return Ok(parsed)
}

function findDuplicate(sorted: readonly ParsedTarget[]): ParsedTarget | null {
  for (let i = 1; i < sorted.length; i++) {
    if (timeOfDayEquals(sorted[i - 1]!.time, sorted[i]!.time)) return sorted[i]!
  }
  return null
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Prove that no two targets produce overlapping quota windows.
 *
 * Returns the first conflicting pair in (hour, minute) order of the target
 * whose trigger lands in the other's window.
 */
export function validateTargetTimes(
  targetTimes: readonly string[],
  intervalHours: number
): Result<void, ScheduleValidationError> {
  const parsed = parseAll(targetTimes)
  if (!parsed.ok) return parsed

  const targets = parsed.value
  const duplicate = findDuplicate(targets)
  if (duplicate) return Err(new DuplicateTargetError(duplicate.source))

  const interval = intervalHours * SECONDS_PER_HOUR
  // A window of a day or more covers every time of day
  const fullDay = interval >= SECONDS_PER_DAY

  for (let i = 0; i < targets.length; i++) {
    const a = targets[i]!
    const triggerA = toSeconds(a.time) - interval

    for (let j = 0; j < targets.length; j++) {
      if (i === j) continue

      const b = targets[j]!
      const triggerB = toSeconds(b.time) - interval
      const quotaEnd = triggerB + interval

      const conflict =
        fullDay ||
        inSecondsInterval(wrapDay(triggerA), wrapDay(triggerB), wrapDay(quotaEnd))

      if (conflict) {
        return Err(
          new ConflictError({
            target: a.source,
            targetTrigger: formatTimeOfDay(fromSeconds(triggerA)),
            other: b.source,
            otherTrigger: formatTimeOfDay(fromSeconds(triggerB)),
            windowStart: formatTimeOfDay(fromSeconds(triggerB)),
            windowEnd: formatTimeOfDay(fromSeconds(quotaEnd)),
            intervalHours,
          })
        )
      }
    }
  }

  return Ok(undefined)
}
