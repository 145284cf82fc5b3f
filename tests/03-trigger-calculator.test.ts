/**
 * Segment 03: Trigger Calculator Tests
 *
 * Trigger instants per calendar date and the forward search for the next one.
 * All dates are built in local time, the same way the calculator reads them.
 */

import { describe, it, expect } from 'vitest'
import { triggersForDate, nextTrigger, startOfDay, addDays, type Trigger } from '../src/trigger-calculator'
import { formatTimeOfDay } from '../src/time-of-day'

const TARGETS = ['09:00', '14:00', '19:00']

function targetsOf(triggers: Trigger[]): string[] {
  return triggers.map((t) => (t.targetTime ? formatTimeOfDay(t.targetTime) : 'none'))
}

// ============================================================================
// 1. DAY HELPERS
// ============================================================================

describe('day helpers', () => {
  it('startOfDay truncates to local midnight', () => {
    expect(startOfDay(new Date(2025, 1, 19, 16, 30, 12))).toEqual(new Date(2025, 1, 19))
  })

  it('addDays crosses month and year ends', () => {
    expect(addDays(new Date(2025, 0, 31), 1)).toEqual(new Date(2025, 1, 1))
    expect(addDays(new Date(2024, 11, 31), 1)).toEqual(new Date(2025, 0, 1))
  })
})

// ============================================================================
// 2. triggersForDate
// ============================================================================

describe('triggersForDate', () => {
  it('subtracts the interval and adds the buffer', () => {
    const triggers = triggersForDate(new Date(2025, 1, 19), TARGETS, 5, 60)
    expect(triggers.map((t) => t.triggerAt)).toEqual([
      new Date(2025, 1, 19, 4, 1),
      new Date(2025, 1, 19, 9, 1),
      new Date(2025, 1, 19, 14, 1),
    ])
    expect(targetsOf(triggers)).toEqual(['09:00', '14:00', '19:00'])
  })

  it('orders triggers by instant whatever the input order', () => {
    const triggers = triggersForDate(new Date(2025, 1, 19), ['19:00', '09:00', '14:00'], 5, 60)
    expect(targetsOf(triggers)).toEqual(['09:00', '14:00', '19:00'])
  })

  it('rolls a trigger back into the previous day', () => {
    const [trigger] = triggersForDate(new Date(2025, 1, 19), ['02:00'], 5, 0)
    expect(trigger?.triggerAt).toEqual(new Date(2025, 1, 18, 21, 0))
  })

  it('rolls back across a month boundary', () => {
    const [trigger] = triggersForDate(new Date(2025, 2, 1), ['03:00'], 8, 30)
    expect(trigger?.triggerAt).toEqual(new Date(2025, 1, 28, 19, 0, 30))
  })

  it('ignores the time of day of the date argument', () => {
    const fromMidnight = triggersForDate(new Date(2025, 1, 19), TARGETS, 5, 60)
    const fromAfternoon = triggersForDate(new Date(2025, 1, 19, 17, 45), TARGETS, 5, 60)
    expect(fromAfternoon).toEqual(fromMidnight)
  })

  it('skips malformed target strings', () => {
    const triggers = triggersForDate(new Date(2025, 1, 19), ['09:00', 'bad', '25:00'], 5, 60)
    expect(triggers).toHaveLength(1)
    expect(targetsOf(triggers)).toEqual(['09:00'])
  })

  it('returns nothing for an empty target list', () => {
    expect(triggersForDate(new Date(2025, 1, 19), [], 5, 60)).toEqual([])
  })
})

// ============================================================================
// 3. nextTrigger
// ============================================================================

describe('nextTrigger', () => {
  it('returns the next trigger later today', () => {
    const { trigger, referenceDate } = nextTrigger(new Date(2025, 1, 19, 16, 0, 0), TARGETS, 5, 60)
    expect(trigger.triggerAt).toEqual(new Date(2025, 1, 19, 19, 1))
    expect(trigger.targetTime).toEqual({ hour: 19, minute: 0 })
    expect(referenceDate).toEqual(new Date(2025, 1, 19))
  })

  it('moves on to tomorrow once today is exhausted', () => {
    const { trigger, referenceDate } = nextTrigger(new Date(2025, 1, 19, 19, 1, 1), TARGETS, 5, 60)
    expect(trigger.triggerAt).toEqual(new Date(2025, 1, 20, 4, 1))
    expect(trigger.targetTime).toEqual({ hour: 9, minute: 0 })
    expect(referenceDate).toEqual(new Date(2025, 1, 20))
  })

  it('treats a trigger at exactly now as already passed', () => {
    const { trigger } = nextTrigger(new Date(2025, 1, 19, 14, 1, 0), TARGETS, 5, 60)
    expect(trigger.triggerAt).toEqual(new Date(2025, 1, 19, 19, 1))
  })

  it('returns the first trigger of the day before it fires', () => {
    const { trigger } = nextTrigger(new Date(2025, 1, 19, 0, 0, 0), TARGETS, 5, 60)
    expect(trigger.triggerAt).toEqual(new Date(2025, 1, 19, 4, 1))
  })

  it('crosses a month boundary', () => {
    const { trigger, referenceDate } = nextTrigger(new Date(2025, 0, 31, 23, 0), ['09:00'], 5, 60)
    expect(trigger.triggerAt).toEqual(new Date(2025, 1, 1, 4, 1))
    expect(referenceDate).toEqual(new Date(2025, 1, 1))
  })

  it('finds a trigger that tomorrow has already rolled into the past', () => {
    // 01:00 with 20h triggers at 05:00 the day before; tomorrow's has passed by 10:00
    const { trigger, referenceDate } = nextTrigger(new Date(2025, 1, 19, 10, 0), ['01:00'], 20, 0)
    expect(trigger.triggerAt).toEqual(new Date(2025, 1, 20, 5, 0))
    expect(referenceDate).toEqual(new Date(2025, 1, 21))
  })

  it('handles a week-long interval', () => {
    const { trigger } = nextTrigger(new Date(2025, 1, 19, 12, 0), ['09:00'], 168, 0)
    expect(trigger.triggerAt).toEqual(new Date(2025, 1, 20, 9, 0))
  })

  it('falls back to now + 24h without targets', () => {
    const now = new Date(2025, 1, 19, 16, 0)
    const { trigger, referenceDate } = nextTrigger(now, [], 5, 60)
    expect(trigger.targetTime).toBeNull()
    expect(trigger.triggerAt.getTime()).toBe(now.getTime() + 86_400_000)
    expect(referenceDate).toEqual(new Date(2025, 1, 20))
  })
})
