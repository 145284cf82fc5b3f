/**
 * quota-keeper
 *
 * Public API exports
 */

// Error system
export {
  QuotaKeeperError, QuotaKeeperErrorCode,
  InvalidFormatError, DuplicateTargetError, ConflictError,
  ConfigError, UnsupportedPlatformError,
  ActionFailedError, CancelledError,
} from './errors'
export type { ConflictDetail } from './errors'
export type { QuotaKeeperErrorCode as QuotaKeeperErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err, unwrap } from './result'

// Logging
export type { Logger, LogFn } from './logger'
export { logger, withPrefix } from './logger'

// Time of day
export type { TimeOfDay } from './time-of-day'
export {
  parseTimeOfDay, isValidTimeOfDay, makeTimeOfDay, formatTimeOfDay,
  toSeconds, fromSeconds, wrapDay, shiftSeconds, shiftHours,
  compareTimeOfDay, timeOfDayEquals, inInterval, inSecondsInterval,
  SECONDS_PER_HOUR, SECONDS_PER_DAY,
} from './time-of-day'

// Conflict validation
export type { ScheduleValidationError } from './conflict-validator'
export { validateTargetTimes } from './conflict-validator'

// Trigger calculation
export type { Trigger, NextTrigger } from './trigger-calculator'
export { triggersForDate, nextTrigger, startOfDay, addDays } from './trigger-calculator'

// Scheduling loop
export type {
  Clock, Scheduler, SchedulerConfig, SchedulerState, SchedulerRunSummary,
} from './scheduler'
export { createScheduler, systemClock, formatInstant, formatDuration } from './scheduler'

// Configuration
export type { Config, ScheduleSpec } from './config'
export {
  parseConfig, loadConfig,
  validateConfig, validateScheduler, validatePlatform,
  DEFAULT_CONFIG_PATH, DEFAULT_SAFETY_BUFFER_SECONDS,
  MAX_INTERVAL_HOURS, MAX_SAFETY_BUFFER_SECONDS,
} from './config'

// Platforms
export type {
  Platform, PlatformInput, PlatformOptions, PlatformFactory, PlatformRegistry,
  AnthropicDeps,
} from './platforms'
export {
  createPlatformRegistry, defaultPlatformRegistry,
  createAnthropicPlatform, ANTHROPIC_DEFAULTS,
} from './platforms'

// CLI
export type { MainOptions } from './cli'
export { main, resolveConfigPath } from './cli'
