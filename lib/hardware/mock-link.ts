/**
 * Mock Hardware Link - in-process stand-in for the robot
 *
 * Records every spoken line and posture, serves event memory values set
 * by the caller, and can simulate dropped sessions and refused connects.
 * Used for development without a robot and throughout the tests.
 */

import { HardwareLinkError } from '../errors'
import type {
  HardwareAddress,
  HardwareLink,
  HardwareSession,
  MemoryService,
  MotionService,
  TextToSpeechService,
} from '@/types/robot'

interface MockLinkOptions {
  speechDelayMs?: number  // per word, capped at 3s (default: 0, resolve immediately)
  motionDelayMs?: number  // default: 0
}

export interface PostureCommand {
  posture: string
  speed: number
}

function delay(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve()
  return new Promise(resolve => setTimeout(resolve, ms))
}

class MockSession implements HardwareSession {
  private connected = true

  readonly tts: TextToSpeechService
  readonly motion: MotionService
  readonly memory: MemoryService

  constructor(private link: MockHardwareLink) {
    this.tts = {
      say: async (text) => {
        this.ensureConnected('ALTextToSpeech.say')
        await this.link.runSpeech(text)
      },
    }
    this.motion = {
      goToPosture: async (posture, speed) => {
        this.ensureConnected('ALMotion.goToPosture')
        await this.link.runMotion(posture, speed)
      },
    }
    this.memory = {
      getData: async (key) => {
        this.ensureConnected('ALMemory.getData')
        return this.link.readData(key)
      },
    }
  }

  isConnected(): boolean {
    return this.connected
  }

  async close(): Promise<void> {
    this.connected = false
  }

  drop(): void {
    this.connected = false
  }

  private ensureConnected(call: string): void {
    if (!this.connected) {
      throw new HardwareLinkError(`${call} failed: session closed`)
    }
  }
}

export class MockHardwareLink implements HardwareLink {
  readonly kind = 'mock' as const

  readonly spoken: string[] = []
  readonly postures: PostureCommand[] = []
  readonly addresses: HardwareAddress[] = []

  private memoryValues = new Map<string, unknown>()
  private failingKeys = new Set<string>()
  private refusedConnects = 0
  private speechFailure: Error | null = null
  private current: MockSession | null = null
  private speechDelayMs: number
  private motionDelayMs: number

  constructor(options: MockLinkOptions = {}) {
    this.speechDelayMs = options.speechDelayMs ?? 0
    this.motionDelayMs = options.motionDelayMs ?? 0
  }

  async open(address: HardwareAddress): Promise<HardwareSession> {
    this.addresses.push(address)
    if (this.refusedConnects > 0) {
      this.refusedConnects--
      throw new HardwareLinkError(`Connection refused by ${address.host}:${address.port}`)
    }
    this.current = new MockSession(this)
    return this.current
  }

  get openCount(): number {
    return this.addresses.length
  }

  // -- Test controls -------------------------------------------------------

  setData(key: string, value: unknown): void {
    this.memoryValues.set(key, value)
  }

  /** Make getData(key) throw until cleared */
  failKey(key: string, failing = true): void {
    if (failing) this.failingKeys.add(key)
    else this.failingKeys.delete(key)
  }

  failNextConnects(count: number): void {
    this.refusedConnects = count
  }

  failSpeech(error: Error | null): void {
    this.speechFailure = error
  }

  /** Simulate the robot going away without a clean close */
  dropConnection(): void {
    this.current?.drop()
  }

  // -- Session callbacks ---------------------------------------------------

  async runSpeech(text: string): Promise<void> {
    if (this.speechFailure) throw this.speechFailure
    this.spoken.push(text)
    const words = text.split(/\s+/).filter(Boolean).length
    await delay(Math.min(words * this.speechDelayMs, 3000))
  }

  async runMotion(posture: string, speed: number): Promise<void> {
    this.postures.push({ posture, speed })
    await delay(this.motionDelayMs)
  }

  readData(key: string): unknown {
    if (this.failingKeys.has(key)) {
      throw new HardwareLinkError(`ALMemory key ${key} unavailable`)
    }
    return this.memoryValues.get(key) ?? null
  }
}
