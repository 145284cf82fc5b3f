/**
 * Configuration
 *
 * Loads the YAML configuration file, fills defaults and validates it before
 * anything is scheduled. Any error here is fatal to startup.
 */

import { readFile } from 'node:fs/promises'
import { parse as parseYaml } from 'yaml'
import { z } from 'zod'
import { ConfigError } from './errors'
import { isValidTimeOfDay } from './time-of-day'
import { validateTargetTimes } from './conflict-validator'
import type { PlatformInput, PlatformRegistry } from './platforms/platform'

// ============================================================================
// Types
// ============================================================================

export const DEFAULT_CONFIG_PATH = 'config.yaml'
export const DEFAULT_SAFETY_BUFFER_SECONDS = 60
export const MAX_INTERVAL_HOURS = 168
export const MAX_SAFETY_BUFFER_SECONDS = 3600

export type ScheduleSpec = {
  readonly intervalHours: number
  readonly targetTimes: readonly string[]
  readonly safetyBufferSeconds: number
}

export type Config = {
  scheduler: ScheduleSpec
  platform: PlatformInput
}

// Shape only; range and conflict rules live in validateScheduler so their
// messages name the exact setting
const configSchema = z.object({
  scheduler: z.object({
    interval_hours: z.number().int(),
    target_times: z.array(z.string()).default([]),
    safety_buffer_seconds: z.number().int().optional(),
  }),
  platform: z.object({
    type: z.string().default(''),
    base_url: z.string().default(''),
    options: z.record(z.unknown()).nullish(),
  }),
})

// ============================================================================
// Loading
// ============================================================================

export function parseConfig(text: string): Config {
  let raw: unknown
  try {
    raw = parseYaml(text)
  } catch (e) {
    throw new ConfigError(`Failed to parse config: ${e instanceof Error ? e.message : String(e)}`, { cause: e })
  }

  const parsed = configSchema.safeParse(raw ?? {})
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : ''
    throw new ConfigError(`Failed to parse config: ${where}${issue?.message ?? 'invalid structure'}`)
  }

  const { scheduler, platform } = parsed.data
  return {
    scheduler: {
      intervalHours: scheduler.interval_hours,
      targetTimes: scheduler.target_times,
      // 0 and missing both mean "use the default"
      safetyBufferSeconds: scheduler.safety_buffer_seconds || DEFAULT_SAFETY_BUFFER_SECONDS,
    },
    platform: {
      type: platform.type,
      baseUrl: platform.base_url,
      options: platform.options ?? {},
    },
  }
}

export async function loadConfig(path: string): Promise<Config> {
  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (e) {
    throw new ConfigError(`Failed to read config file '${path}': ${e instanceof Error ? e.message : String(e)}`, { cause: e })
  }
  return parseConfig(text)
}

// ============================================================================
// Validation
// ============================================================================

/** Throws ConfigError, InvalidFormatError, DuplicateTargetError or ConflictError */
export function validateScheduler(config: Config): void {
  const { intervalHours, targetTimes, safetyBufferSeconds } = config.scheduler

  if (intervalHours <= 0) {
    throw new ConfigError('scheduler.interval_hours must be positive')
  }
  if (intervalHours > MAX_INTERVAL_HOURS) {
    throw new ConfigError(`scheduler.interval_hours too large (max ${MAX_INTERVAL_HOURS})`)
  }
  if (targetTimes.length === 0) {
    throw new ConfigError('scheduler.target_times is required (at least one time)')
  }
  for (const t of targetTimes) {
    if (!isValidTimeOfDay(t)) {
      throw new ConfigError(`scheduler.target_times must be in HH:MM format, got: ${t}`)
    }
  }
  if (safetyBufferSeconds < 0) {
    throw new ConfigError('scheduler.safety_buffer_seconds cannot be negative')
  }
  if (safetyBufferSeconds > MAX_SAFETY_BUFFER_SECONDS) {
    throw new ConfigError(`scheduler.safety_buffer_seconds too large (max ${MAX_SAFETY_BUFFER_SECONDS})`)
  }

  const result = validateTargetTimes(targetTimes, intervalHours)
  if (!result.ok) throw result.error
}

export function validatePlatform(config: Config, registry: PlatformRegistry): void {
  const { type, baseUrl } = config.platform

  if (!type) {
    throw new ConfigError('platform.type is required')
  }
  if (!registry.has(type)) {
    throw new ConfigError(`platform.type '${type}' is not supported (supported: ${registry.types().join(', ')})`)
  }
  if (!baseUrl) {
    throw new ConfigError('platform.base_url is required')
  }
}

export function validateConfig(config: Config, registry: PlatformRegistry): void {
  validateScheduler(config)
  validatePlatform(config, registry)
}
