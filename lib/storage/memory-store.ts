/**
 * Memory Store - small JSON key/value context persisted in the data dir
 *
 * Writes (including read-modify-write updates) go through one lock so
 * concurrent turns cannot lose each other's updates. Plain reads do not
 * take the lock and see the last saved file.
 */

import fs from 'fs/promises'
import path from 'path'
import type { Logger } from '../logger'

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue }

export type MemoryContext = Record<string, JsonValue>

const LOCK_TIMEOUT = 5000 // 5 second timeout for acquiring the write lock

function isContext(value: unknown): value is MemoryContext {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

export class MemoryStore {
  private lockHeld = false
  private lockQueue: Array<{ resolve: () => void; reject: (err: Error) => void }> = []

  constructor(private filePath: string, private logger: Logger) {}

  get path(): string {
    return this.filePath
  }

  // -- Lock ----------------------------------------------------------------

  private async acquireLock(): Promise<void> {
    if (!this.lockHeld) {
      this.lockHeld = true
      return
    }

    return new Promise((resolve, reject) => {
      const timeout = setTimeout(() => {
        const index = this.lockQueue.findIndex(item => item.resolve === onResolve)
        if (index !== -1) {
          this.lockQueue.splice(index, 1)
        }
        reject(new Error('Memory store lock acquisition timeout'))
      }, LOCK_TIMEOUT)

      const onResolve = () => {
        clearTimeout(timeout)
        resolve()
      }
      this.lockQueue.push({
        resolve: onResolve,
        reject: (err: Error) => {
          clearTimeout(timeout)
          reject(err)
        },
      })
    })
  }

  private releaseLock(): void {
    const next = this.lockQueue.shift()
    if (next) {
      next.resolve()
    } else {
      this.lockHeld = false
    }
  }

  private async withLock<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquireLock()
    try {
      return await fn()
    } finally {
      this.releaseLock()
    }
  }

  // -- Reads ---------------------------------------------------------------

  /** Whole context; empty when the file is missing or unreadable */
  async loadContext(): Promise<MemoryContext> {
    let content: string
    try {
      content = await fs.readFile(this.filePath, 'utf-8')
    } catch (err) {
      if (isMissingFile(err)) return {}
      this.logger.error(`Error loading context from '${this.filePath}':`, err)
      return {}
    }

    if (!content.trim()) return {}
    try {
      const parsed: unknown = JSON.parse(content)
      if (isContext(parsed)) return parsed
      this.logger.error(`Memory file '${this.filePath}' does not hold a JSON object, using empty context`)
    } catch {
      this.logger.error(`JSON decode error in memory file '${this.filePath}', using empty context`)
    }
    return {}
  }

  async get(key: string): Promise<JsonValue | undefined> {
    const context = await this.loadContext()
    return context[key]
  }

  // -- Writes --------------------------------------------------------------

  async saveContext(context: MemoryContext): Promise<boolean> {
    return this.withLock(() => this.write(context))
  }

  async set(key: string, value: JsonValue): Promise<boolean> {
    return this.update(context => {
      context[key] = value
      return true
    })
  }

  async clearKey(key: string): Promise<boolean> {
    return this.update(context => {
      if (!(key in context)) return false
      delete context[key]
      return true
    })
  }

  async clearAll(): Promise<boolean> {
    return this.saveContext({})
  }

  /**
   * Read-modify-write under the lock. The mutator returns false to skip
   * the write.
   */
  async update(mutate: (context: MemoryContext) => boolean): Promise<boolean> {
    return this.withLock(async () => {
      const context = await this.loadContext()
      if (!mutate(context)) return false
      return this.write(context)
    })
  }

  private async write(context: MemoryContext): Promise<boolean> {
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true })
      const tmpPath = `${this.filePath}.tmp`
      await fs.writeFile(tmpPath, JSON.stringify(context, null, 2), 'utf-8')
      await fs.rename(tmpPath, this.filePath)
      this.logger.debug(`Context saved to '${this.filePath}'`)
      return true
    } catch (err) {
      this.logger.error(`Error saving context to '${this.filePath}':`, err)
      return false
    }
  }
}
