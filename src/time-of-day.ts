/**
 * Time-of-Day Arithmetic
 *
 * Wall-clock times without a date or timezone, always read in local civil time.
 * All arithmetic is in whole seconds since midnight, modulo one day.
 */

import type { Result } from './result'
import { Ok, Err } from './result'
import { InvalidFormatError } from './errors'

export { InvalidFormatError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type TimeOfDay = {
  readonly hour: number
  readonly minute: number
}

export const SECONDS_PER_HOUR = 3600
export const SECONDS_PER_DAY = 86400

// ============================================================================
// Helpers
// ============================================================================

function pad2(n: number): string {
  return n < 10 ? '0' + n : '' + n
}

/** Wrap a seconds count into [0, 86400) */
export function wrapDay(seconds: number): number {
  return ((seconds % SECONDS_PER_DAY) + SECONDS_PER_DAY) % SECONDS_PER_DAY
}

// ============================================================================
// Parsing & Formatting
// ============================================================================

export function parseTimeOfDay(str: string): Result<TimeOfDay, InvalidFormatError> {
  const match = /^(\d{1,2}):(\d{1,2})$/.exec(str)
  if (!match) return Err(new InvalidFormatError(str))

  const hour = parseInt(match[1]!, 10)
  const minute = parseInt(match[2]!, 10)

  if (hour > 23)
    return Err(new InvalidFormatError(str, `Invalid hour in time: '${str}'`))
  if (minute > 59)
    return Err(new InvalidFormatError(str, `Invalid minute in time: '${str}'`))

  return Ok({ hour, minute })
}

export function isValidTimeOfDay(str: string): boolean {
  return parseTimeOfDay(str).ok
}

export function makeTimeOfDay(hour: number, minute: number): TimeOfDay {
  return { hour, minute }
}

export function formatTimeOfDay(t: TimeOfDay): string {
  return `${pad2(t.hour)}:${pad2(t.minute)}`
}

// ============================================================================
// Seconds Since Midnight
// ============================================================================

export function toSeconds(t: TimeOfDay): number {
  return t.hour * SECONDS_PER_HOUR + t.minute * 60
}

/** Inverse of toSeconds; wraps into [0, 86400) and drops leftover seconds */
export function fromSeconds(seconds: number): TimeOfDay {
  const s = wrapDay(Math.floor(seconds))
  return { hour: Math.floor(s / SECONDS_PER_HOUR), minute: Math.floor((s % SECONDS_PER_HOUR) / 60) }
}

export function shiftSeconds(t: TimeOfDay, delta: number): TimeOfDay {
  return fromSeconds(toSeconds(t) + delta)
}

export function shiftHours(t: TimeOfDay, hours: number): TimeOfDay {
  return shiftSeconds(t, hours * SECONDS_PER_HOUR)
}

// ============================================================================
// Comparison
// ============================================================================

export function compareTimeOfDay(a: TimeOfDay, b: TimeOfDay): number {
  if (a.hour !== b.hour) return a.hour < b.hour ? -1 : 1
  if (a.minute !== b.minute) return a.minute < b.minute ? -1 : 1
  return 0
}

export function timeOfDayEquals(a: TimeOfDay, b: TimeOfDay): boolean {
  return a.hour === b.hour && a.minute === b.minute
}

/**
 * Whether `t` lies in the half-open range [start, end).
 *
 * When start > end the range crosses midnight: [22:00, 02:00) holds 23:30
 * and 01:00 but not 12:00. When start == end the range is empty.
 */
export function inInterval(t: TimeOfDay, start: TimeOfDay, end: TimeOfDay): boolean {
  return inSecondsInterval(toSeconds(t), toSeconds(start), toSeconds(end))
}

export function inSecondsInterval(t: number, start: number, end: number): boolean {
  if (start <= end) return t >= start && t < end
  return t >= start || t < end
}
