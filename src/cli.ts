/**
 * Process entry point
 *
 * Usage: quota-keeper [config.yaml]
 * The path may also come from QUOTA_KEEPER_CONFIG.
 */

import { pathToFileURL } from 'node:url'
import { DEFAULT_CONFIG_PATH, loadConfig, validateConfig } from './config'
import { defaultPlatformRegistry, type PlatformRegistry } from './platforms'
import { createScheduler, type Clock, type Scheduler } from './scheduler'
import { logger as defaultLogger, type Logger } from './logger'

export type MainOptions = {
  argv?: readonly string[]
  env?: NodeJS.ProcessEnv
  registry?: PlatformRegistry
  clock?: Clock
  logger?: Logger
  /** Cancels the run in addition to SIGINT and SIGTERM */
  signal?: AbortSignal
}

export function resolveConfigPath(argv: readonly string[], env: NodeJS.ProcessEnv): string {
  return argv[0] ?? env['QUOTA_KEEPER_CONFIG'] ?? DEFAULT_CONFIG_PATH
}

/** Aborts on SIGINT, SIGTERM or when `external` aborts */
function shutdownSignal(log: Logger, external?: AbortSignal): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController()
  const onSignal = () => {
    log.info('Shutdown signal received, stopping...')
    controller.abort()
  }
  const onExternal = () => controller.abort()

  process.once('SIGINT', onSignal)
  process.once('SIGTERM', onSignal)
  if (external?.aborted) controller.abort()
  external?.addEventListener('abort', onExternal, { once: true })

  return {
    signal: controller.signal,
    dispose: () => {
      process.off('SIGINT', onSignal)
      process.off('SIGTERM', onSignal)
      external?.removeEventListener('abort', onExternal)
    },
  }
}

/** Returns the process exit code */
export async function main(options: MainOptions = {}): Promise<number> {
  const log = options.logger ?? defaultLogger
  const registry = options.registry ?? defaultPlatformRegistry()
  const path = resolveConfigPath(options.argv ?? process.argv.slice(2), options.env ?? process.env)

  let scheduler: Scheduler
  try {
    const config = await loadConfig(path)
    validateConfig(config, registry)

    const platform = registry.create(config.platform)
    platform.validateConfig()

    scheduler = createScheduler({
      schedule: config.scheduler,
      platform,
      logger: log,
      ...(options.clock ? { clock: options.clock } : {}),
    })
  } catch (e) {
    log.error(`Startup failed: ${e instanceof Error ? e.message : String(e)}`)
    return 1
  }

  const shutdown = shutdownSignal(log, options.signal)
  try {
    log.debug(scheduler.describe())
    const summary = await scheduler.start(shutdown.signal)
    log.info(`Quota keeper stopped after ${summary.fired} triggers (${summary.failed} failed)`)
    return 0
  } catch (e) {
    log.error(`Scheduler error: ${e instanceof Error ? e.message : String(e)}`)
    return 1
  } finally {
    shutdown.dispose()
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().then(
    (code) => {
      process.exitCode = code
    },
    (e: unknown) => {
      defaultLogger.error('Unexpected failure', e)
      process.exitCode = 1
    }
  )
}
