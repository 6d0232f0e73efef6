/**
 * Event Poller - samples robot event memory and hands events to the runtime
 *
 * Runs its own loop, separate from dialogue work: every interval it reads
 * each monitored key, drops noise, and schedules the registered callback
 * with setImmediate. The loop never waits on the callback, so a slow turn
 * cannot hold up sampling.
 *
 * A key's value is delivered when it is meaningful and differs from the
 * previous sample of that key. The first pass only records a baseline, so
 * values left over from before a (re)connect are not replayed.
 */

import type { Logger } from '../logger'
import {
  MONITORED_EVENTS,
  SENSOR_EVENTS,
  TOUCH_ACTIVE_VALUE,
  TTS_DONE_VALUE,
  type MemoryService,
  type SensorCallback,
  type SensorEvent,
} from '@/types/robot'

export interface EventPollerOptions {
  intervalMs?: number       // default: 100
  errorBackoffMs?: number   // default: 1000
  events?: readonly string[]
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return typeof value === 'object' && value !== null && 'then' in value && typeof value.then === 'function'
}

function isTouchKey(eventName: string): boolean {
  return eventName.includes('Touched') || eventName.includes('TouchChanged')
}

/**
 * Noise filter applied to every sample before delivery
 */
export function isMeaningfulEvent(eventName: string, value: unknown): boolean {
  if (eventName === SENSOR_EVENTS.wordRecognized) {
    // [text, confidence]
    if (!Array.isArray(value) || value.length === 0) return false
    const first: unknown = value[0]
    return typeof first === 'string' && first.trim().length > 0
  }

  if (isTouchKey(eventName)) {
    return value === TOUCH_ACTIVE_VALUE || (Array.isArray(value) && value.includes(TOUCH_ACTIVE_VALUE))
  }

  if (eventName.includes('TextDone')) {
    return value === TTS_DONE_VALUE
  }

  return Boolean(value)
}

function sampleKey(value: unknown): string {
  try {
    return JSON.stringify(value) ?? 'undefined'
  } catch {
    return String(value)
  }
}

export class EventPoller {
  private intervalMs: number
  private errorBackoffMs: number
  private events: readonly string[]

  private stopRequested = false
  private loop: Promise<void> | null = null
  private wake: (() => void) | null = null
  private lastSamples = new Map<string, string>()
  private primed = false
  private delivered = 0

  constructor(
    private memory: MemoryService,
    private callback: SensorCallback,
    private isHealthy: () => boolean,
    private logger: Logger,
    options: EventPollerOptions = {},
  ) {
    this.intervalMs = options.intervalMs ?? 100
    this.errorBackoffMs = options.errorBackoffMs ?? 1000
    this.events = options.events ?? MONITORED_EVENTS
  }

  start(): void {
    if (this.loop) return
    this.stopRequested = false
    const loop: Promise<void> = this.run()
      .catch(err => {
        this.logger.error('Poll loop terminated unexpectedly:', err)
      })
      .finally(() => {
        if (this.loop === loop) this.loop = null
      })
    this.loop = loop
    this.logger.info(`Polling ${this.events.length} event key(s) every ${this.intervalMs}ms`)
  }

  isRunning(): boolean {
    return this.loop !== null
  }

  getDeliveredCount(): number {
    return this.delivered
  }

  /**
   * Signal the loop to stop and wait for it, at most timeoutMs.
   * Resolves false when the loop did not finish in time.
   */
  async stop(timeoutMs = 5000): Promise<boolean> {
    this.stopRequested = true
    this.wake?.()
    const loop = this.loop
    if (!loop) return true

    let timer: ReturnType<typeof setTimeout> | undefined
    const timedOut = new Promise<false>(resolve => {
      timer = setTimeout(() => resolve(false), timeoutMs)
    })
    const joined = await Promise.race([loop.then(() => true as const), timedOut])
    clearTimeout(timer)

    if (!joined) {
      this.logger.warn(`Poll loop did not stop within ${timeoutMs}ms, continuing without it`)
    }
    return joined
  }

  private async run(): Promise<void> {
    this.logger.info('Sensor polling active')

    while (!this.stopRequested && this.isHealthy()) {
      try {
        for (const eventName of this.events) {
          await this.sample(eventName)
        }
        this.primed = true
        await this.sleep(this.intervalMs)
      } catch (err) {
        this.logger.error('Error in sensor polling loop:', err)
        await this.sleep(this.errorBackoffMs)
      }
    }

    this.logger.info(this.stopRequested ? 'Sensor polling stopped' : 'Sensor polling stopped: connection unhealthy')
  }

  private async sample(eventName: string): Promise<void> {
    let value: unknown
    try {
      value = await this.memory.getData(eventName)
    } catch (err) {
      this.logger.debug(`Error polling ${eventName}:`, err)
      return
    }

    const key = sampleKey(value)
    const changed = this.lastSamples.get(eventName) !== key
    this.lastSamples.set(eventName, key)

    if (!this.primed || !changed) return
    if (!isMeaningfulEvent(eventName, value)) return

    this.deliver({ eventName, value, timestamp: performance.now() })
  }

  private deliver(event: SensorEvent): void {
    this.delivered++
    setImmediate(() => {
      try {
        const result = this.callback(event)
        if (isPromiseLike(result)) {
          result.then(undefined, err => {
            this.logger.error(`Error in sensor callback for ${event.eventName}:`, err)
          })
        }
      } catch (err) {
        this.logger.error(`Error in sensor callback for ${event.eventName}:`, err)
      }
    })
  }

  private sleep(ms: number): Promise<void> {
    if (this.stopRequested) return Promise.resolve()
    return new Promise(resolve => {
      const timer = setTimeout(() => {
        this.wake = null
        resolve()
      }, ms)
      this.wake = () => {
        clearTimeout(timer)
        this.wake = null
        resolve()
      }
    })
  }
}
