/**
 * Plugin contract
 *
 * A plugin declares which intents it handles and turns a recognized
 * utterance into a reply. Shared resources are injected at creation
 * time, and only the ones the plugin asked for.
 */

import type { IntentResult } from './dialogue'
import type { MemoryStore } from '@/lib/storage/memory-store'
import type { TaskScheduler } from '@/lib/tasks/task-scheduler'
import type { ConnectionManager } from '@/lib/hardware/connection-manager'
import type { Settings } from '@/lib/settings'

export interface MainLoopHandle {
  /** Run work detached from the caller; failures are logged, never rethrown */
  schedule(name: string, work: () => Promise<void> | void): void
}

export interface PluginResources {
  storage: MemoryStore
  scheduler: TaskScheduler
  hardwareLink: ConnectionManager
  settings: Settings
  mainLoopHandle: MainLoopHandle
}

export type PluginResourceName = keyof PluginResources

export interface Plugin {
  readonly name: string
  readonly description: string
  declaresSupport(intent: string): boolean
  execute(rawText: string, intent: IntentResult): Promise<string> | string
  /** Optional background routine, started once after registration */
  run?(signal: AbortSignal): Promise<void>
}

export type PluginFactory = (resources: Partial<PluginResources>) => Plugin

export interface PluginRegistration {
  name: string
  factory: PluginFactory
  requiredResources: readonly PluginResourceName[]
}
