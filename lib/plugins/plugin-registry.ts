/**
 * Plugin Registry - explicit registration list for dialogue plugins
 *
 * Plugins are registered by name with a factory and the shared resources
 * they need. instantiate() builds each one once, handing it only the
 * resources it declared. Intent lookup is a linear scan in registration
 * order; the first plugin that declares support wins.
 */

import type { Logger } from '../logger'
import type {
  Plugin,
  PluginFactory,
  PluginRegistration,
  PluginResourceName,
  PluginResources,
} from '@/types/plugin'

export interface PluginStatus {
  name: string
  description: string
  running: boolean
}

function copyResource<K extends PluginResourceName>(
  target: Partial<PluginResources>,
  source: Partial<PluginResources>,
  key: K,
): void {
  target[key] = source[key]
}

export class PluginRegistry {
  private registrations = new Map<string, PluginRegistration>()
  private plugins = new Map<string, Plugin>()
  private background = new Map<string, { controller: AbortController; done: Promise<void> }>()

  constructor(private logger: Logger) {}

  register(name: string, factory: PluginFactory, requiredResources: readonly PluginResourceName[] = []): void {
    if (this.registrations.has(name)) {
      this.logger.warn(`Plugin "${name}" already registered, replacing`)
    }
    this.registrations.set(name, { name, factory, requiredResources })
  }

  /**
   * Build every registered plugin. A plugin whose factory throws, or whose
   * declared resources are not available, is logged and skipped.
   */
  instantiate(resources: Partial<PluginResources>): Plugin[] {
    this.plugins.clear()

    for (const registration of this.registrations.values()) {
      const missing = registration.requiredResources.filter(key => resources[key] === undefined)
      if (missing.length > 0) {
        this.logger.error(`Plugin "${registration.name}" needs unavailable resource(s): ${missing.join(', ')}`)
        continue
      }

      const injected: Partial<PluginResources> = {}
      for (const key of registration.requiredResources) {
        copyResource(injected, resources, key)
      }

      try {
        const plugin = registration.factory(injected)
        this.plugins.set(registration.name, plugin)
        const required = registration.requiredResources.length > 0 ? registration.requiredResources.join(', ') : 'none'
        this.logger.info(`Loaded plugin: ${registration.name} (${plugin.description}). Required resources: ${required}`)
      } catch (err) {
        this.logger.error(`Failed to create plugin "${registration.name}":`, err)
      }
    }

    this.logger.info(`Total plugins loaded: ${this.plugins.size}`)
    return this.list()
  }

  list(): Plugin[] {
    return Array.from(this.plugins.values())
  }

  get(name: string): Plugin | undefined {
    return this.plugins.get(name)
  }

  /** First plugin, in registration order, that declares support for the intent */
  findSupporter(intent: string): Plugin | undefined {
    for (const plugin of this.plugins.values()) {
      try {
        if (plugin.declaresSupport(intent)) return plugin
      } catch (err) {
        this.logger.error(`Error in ${plugin.name}.declaresSupport:`, err)
      }
    }
    return undefined
  }

  /** Start each plugin's background routine, if it has one */
  startAll(): void {
    for (const plugin of this.plugins.values()) {
      if (!plugin.run || this.background.has(plugin.name)) continue

      const controller = new AbortController()
      const done = Promise.resolve()
        .then(() => plugin.run?.(controller.signal))
        .then(() => {
          this.logger.info(`Background task of ${plugin.name} finished`)
        })
        .catch(err => {
          if (!controller.signal.aborted) {
            this.logger.error(`Background task of ${plugin.name} failed:`, err)
          }
        })
        .finally(() => {
          this.background.delete(plugin.name)
        })

      this.background.set(plugin.name, { controller, done })
      this.logger.info(`Started background task of ${plugin.name}`)
    }
  }

  /**
   * Cancel background routines and wait for them, at most timeoutMs.
   * Resolves false when some did not finish in time.
   */
  async stopAll(timeoutMs = 3000): Promise<boolean> {
    const tasks = Array.from(this.background.values())
    if (tasks.length === 0) return true

    for (const task of tasks) task.controller.abort()

    let timer: ReturnType<typeof setTimeout> | undefined
    const timedOut = new Promise<false>(resolve => {
      timer = setTimeout(() => resolve(false), timeoutMs)
    })
    const finished = await Promise.race([
      Promise.allSettled(tasks.map(t => t.done)).then(() => true as const),
      timedOut,
    ])
    clearTimeout(timer)

    if (!finished) {
      this.logger.warn(`Plugin background tasks still running after ${timeoutMs}ms, continuing shutdown`)
    }
    return finished
  }

  getStatus(): PluginStatus[] {
    return this.list().map(plugin => ({
      name: plugin.name,
      description: plugin.description,
      running: this.background.has(plugin.name),
    }))
  }
}
