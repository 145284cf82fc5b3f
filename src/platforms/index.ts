import { createAnthropicPlatform } from './anthropic'
import { createPlatformRegistry, type PlatformRegistry } from './platform'

export type {
  Platform, PlatformInput, PlatformOptions, PlatformFactory, PlatformRegistry,
} from './platform'
export { createPlatformRegistry } from './platform'
export type { AnthropicDeps } from './anthropic'
export { createAnthropicPlatform, ANTHROPIC_DEFAULTS } from './anthropic'

/** Registry with every built-in platform */
export function defaultPlatformRegistry(): PlatformRegistry {
  const registry = createPlatformRegistry()
  registry.register('anthropic', (input) => createAnthropicPlatform(input))
  return registry
}
