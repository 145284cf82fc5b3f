/**
 * Anthropic Platform
 *
 * Starts a quota window by sending the smallest possible Messages API request
 * (one token, streamed) and discarding the reply after the first chunk.
 */

import { setTimeout as delay } from 'node:timers/promises'
import { z } from 'zod'
import { ActionFailedError, CancelledError, ConfigError } from '../errors'
import { logger as defaultLogger, withPrefix, type Logger } from '../logger'
import type { Platform, PlatformInput } from './platform'

// ============================================================================
// Options
// ============================================================================

export const ANTHROPIC_DEFAULTS = {
  model: 'claude-3-5-sonnet-20241022',
  timeoutSeconds: 30,
  maxRetries: 0,
  apiVersion: '2023-06-01',
} as const

const optionsSchema = z.object({
  api_key: z.string({ required_error: 'api_key is required for anthropic platform' }),
  model: z.string().default(ANTHROPIC_DEFAULTS.model),
  timeout_seconds: z.number().int().positive().default(ANTHROPIC_DEFAULTS.timeoutSeconds),
  max_retries: z.number().int().min(0).default(ANTHROPIC_DEFAULTS.maxRetries),
})

export type AnthropicDeps = {
  fetch?: typeof fetch
  /** Backoff sleep; must reject when `signal` aborts */
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>
  logger?: Logger
}

// ============================================================================
// Helpers
// ============================================================================

function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`
}

function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e)
}

function defaultSleep(ms: number, signal: AbortSignal): Promise<void> {
  return delay(ms, undefined, { signal })
}

// ============================================================================
// Factory
// ============================================================================

export function createAnthropicPlatform(input: PlatformInput, deps: AnthropicDeps = {}): Platform {
  const parsed = optionsSchema.safeParse(input.options)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const where = issue && issue.path.length > 0 ? `platform.options.${issue.path.join('.')}: ` : ''
    throw new ConfigError(`${where}${issue?.message ?? 'invalid anthropic options'}`)
  }

  const options = parsed.data
  const baseUrl = input.baseUrl
  const doFetch = deps.fetch ?? fetch
  const sleep = deps.sleep ?? defaultSleep
  const log = withPrefix(deps.logger ?? defaultLogger, '[anthropic]')

  async function attemptOnce(signal: AbortSignal): Promise<void> {
    // Per-attempt timeout, still cancelled by the caller's signal
    const controller = new AbortController()
    const timer = setTimeout(
      () => controller.abort(new Error(`Request timed out after ${options.timeout_seconds}s`)),
      options.timeout_seconds * 1000
    )
    const onAbort = () => controller.abort(signal.reason)
    signal.addEventListener('abort', onAbort, { once: true })

    try {
      await send(controller.signal)
    } finally {
      clearTimeout(timer)
      signal.removeEventListener('abort', onAbort)
    }
  }

  async function send(signal: AbortSignal): Promise<void> {
    const response = await doFetch(joinUrl(baseUrl, 'v1/messages'), {
      method: 'POST',
      headers: {
        'content-type': 'application/json',
        'x-api-key': options.api_key,
        'anthropic-version': ANTHROPIC_DEFAULTS.apiVersion,
      },
      body: JSON.stringify({
        model: options.model,
        max_tokens: 1,
        stream: true,
        messages: [{ role: 'user', content: 'hi' }],
      }),
      signal,
    })

    // Only the first chunk matters; the request itself opens the window
    let firstChunk = ''
    if (response.body) {
      const reader = response.body.getReader()
      const { value } = await reader.read()
      if (value) firstChunk = new TextDecoder().decode(value)
      await reader.cancel()
    }

    log.debug(`Response status: ${response.status}`, firstChunk)

    if (!response.ok) {
      throw new Error(`Unexpected status code: ${response.status}`)
    }

    log.info(`Triggered successfully with model: ${options.model}`)
  }

  return {
    name: 'anthropic',

    validateConfig() {
      if (!baseUrl) throw new ConfigError('base_url is required')
      if (!options.api_key) throw new ConfigError('api_key is required')
      if (!options.model) throw new ConfigError('model is required')
    },

    async trigger(signal) {
      const attempts = options.max_retries + 1
      let lastError: unknown

      for (let attempt = 0; attempt < attempts; attempt++) {
        if (signal.aborted) throw new CancelledError()

        if (attempt > 0) {
          const backoffMs = 1000 * 2 ** (attempt - 1)
          log.info(`Retry attempt ${attempt}/${options.max_retries} in ${backoffMs}ms`)
          try {
            await sleep(backoffMs, signal)
          } catch (e) {
            if (signal.aborted) throw new CancelledError()
            throw e
          }
        }

        try {
          await attemptOnce(signal)
          return
        } catch (e) {
          if (signal.aborted) throw new CancelledError()
          lastError = e
          log.warn(`Attempt ${attempt + 1} failed: ${describeError(e)}`)
        }
      }

      throw new ActionFailedError(attempts, lastError)
    },
  }
}
