/**
 * Platform Capability & Registry
 *
 * A platform knows how to perform one trigger against a quota-bearing
 * service. New platforms register a factory under their type identifier;
 * the scheduler only ever sees the Platform capability.
 */

import { UnsupportedPlatformError } from '../errors'

export { UnsupportedPlatformError } from '../errors'

// ============================================================================
// Types
// ============================================================================

export type PlatformOptions = Record<string, unknown>

export type PlatformInput = {
  type: string
  baseUrl: string
  options: PlatformOptions
}

export type Platform = {
  readonly name: string
  /**
   * Perform one trigger, including any retries the platform applies.
   * Rejects with ActionFailedError when every attempt failed and with
   * CancelledError when `signal` aborts first.
   */
  trigger(signal: AbortSignal): Promise<void>
  /** Throws ConfigError when platform-specific settings are missing */
  validateConfig(): void
}

export type PlatformFactory = (input: PlatformInput) => Platform

export type PlatformRegistry = {
  register(type: string, factory: PlatformFactory): void
  has(type: string): boolean
  types(): string[]
  create(input: PlatformInput): Platform
}

// ============================================================================
// Registry
// ============================================================================

export function createPlatformRegistry(): PlatformRegistry {
  const factories = new Map<string, PlatformFactory>()

  return {
    register(type, factory) {
      factories.set(type, factory)
    },

    has(type) {
      return factories.has(type)
    },

    types() {
      return [...factories.keys()].sort()
    },

    create(input) {
      const factory = factories.get(input.type)
      if (!factory) throw new UnsupportedPlatformError(input.type, [...factories.keys()].sort())
      return factory(input)
    },
  }
}
