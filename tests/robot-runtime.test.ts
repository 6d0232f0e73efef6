/**
 * Robot Runtime Tests
 *
 * Full stack on the in-process MockHardwareLink with fake timers. The
 * clock is pinned to 2025-03-14 15:05 local time.
 */

import fs from 'fs'
import os from 'os'
import path from 'path'
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { RobotRuntime, type RobotRuntimeOptions } from '@/lib/robot-runtime'
import { ANIMATED_SPEECH_PREFIX } from '@/lib/hardware/connection-manager'
import { MockHardwareLink } from '@/lib/hardware/mock-link'
import type { HardwareAddress, HardwareSession } from '@/types/robot'
import { DEFAULT_PERSONAS_FILE } from '@/lib/settings'
import { StartupError } from '@/lib/errors'
import { INTENTS } from '@/types/dialogue'
import { SENSOR_EVENTS } from '@/types/robot'
import { makeSettings } from './test-utils/fixtures'
import { createLoggerMock } from './test-utils/service-mocks'

const WORD = SENSOR_EVENTS.wordRecognized
const GREETING = `${ANIMATED_SPEECH_PREFIX}Hello. I am Genesis. I am now connected to 192.168.1.50.`

/** Holds open() until release() while a gate is set */
class GatedLink extends MockHardwareLink {
  private gate: Promise<void> | null = null
  private opening: (() => void) | null = null

  hold(): void {
    this.gate = new Promise(resolve => { this.opening = resolve })
  }

  release(): void {
    this.opening?.()
    this.gate = null
  }

  async open(address: HardwareAddress): Promise<HardwareSession> {
    if (this.gate) await this.gate
    return super.open(address)
  }
}

let dir: string
let link: MockHardwareLink
let runtime: RobotRuntime

function createRuntime(overrides: Partial<RobotRuntimeOptions> = {}): RobotRuntime {
  return new RobotRuntime({
    settings: makeSettings({ dataDir: dir, personasFile: DEFAULT_PERSONAS_FILE }),
    logger: createLoggerMock(),
    link,
    reasoningBackend: null,
    ...overrides,
  })
}

/** Start, then let the poller take its baseline pass */
async function startRuntime(): Promise<void> {
  await runtime.start()
  await vi.advanceTimersByTimeAsync(0)
}

async function say(text: string): Promise<void> {
  link.setData(WORD, [text, 0.9])
  await vi.advanceTimersByTimeAsync(100)
}

beforeEach(() => {
  vi.useFakeTimers()
  vi.setSystemTime(new Date(2025, 2, 14, 15, 5, 0))
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'robot-runtime-'))
  link = new MockHardwareLink()
  runtime = createRuntime()
})

afterEach(async () => {
  await runtime.stop()
  vi.useRealTimers()
  fs.rmSync(dir, { recursive: true, force: true })
})

// ============================================================================
// Startup
// ============================================================================

describe('start', () => {
  it('fails with StartupError and builds nothing when the robot is unreachable', async () => {
    link.failNextConnects(1)

    const starting = runtime.start()
    await expect(starting).rejects.toBeInstanceOf(StartupError)
    await expect(starting).rejects.toThrow(
      'Failed to connect to robot at 192.168.1.50:9559. Check robot host, port and network connectivity.',
    )
    expect(runtime.orchestrator).toBeNull()
    expect(runtime.isRunning()).toBe(false)
    expect(link.spoken).toEqual([])
  })

  it('greets in the configured persona and starts polling', async () => {
    await startRuntime()

    expect(link.spoken).toEqual([GREETING])
    expect(runtime.getStatus()).toMatchObject({
      running: true,
      persona: 'Genesis',
      tone: 'friendly',
      connection: { state: 'connected', polling: true, linkKind: 'mock' },
      plugins: [{ name: 'notes', description: 'Takes notes and reads them back', running: false }],
      tasks: [],
    })
  })
})

// ============================================================================
// Turns
// ============================================================================

describe('turns', () => {
  it('answers a spoken time question on the robot', async () => {
    await startRuntime()

    await say('What time is it?')

    expect(link.spoken).toEqual([GREETING, `${ANIMATED_SPEECH_PREFIX}It's 3:05 PM.`])
    expect(link.postures).toEqual([])
    expect(runtime.getStatus().turnsStarted).toBe(1)
  })

  it('switches persona on request', async () => {
    await startRuntime()

    await say('switch your personality to Sage')

    expect(link.spoken[1]).toBe(`${ANIMATED_SPEECH_PREFIX}Okay, I've switched my personality to Sage.`)
    expect(runtime.getStatus()).toMatchObject({ persona: 'Sage', tone: 'calm' })
  })

  it('schedules a spoken reminder', async () => {
    await startRuntime()

    await say('remind me to take my pills at 15:06')

    expect(link.spoken[1]).toBe(
      `${ANIMATED_SPEECH_PREFIX}Task 'daily_reminder_1506_take_my_pi' scheduled daily at 15:06.`,
    )

    await vi.advanceTimersByTimeAsync(60 * 1000)

    expect(link.spoken.filter(line => line.includes('Reminder:'))).toEqual([
      `${ANIMATED_SPEECH_PREFIX}Reminder: take my pills`,
    ])
  })

  it('takes a note through the notes plugin', async () => {
    await startRuntime()

    await say('take a note that the keys are in the drawer')

    await vi.waitFor(() => expect(link.spoken[1]).toBe(
      `${ANIMATED_SPEECH_PREFIX}Okay, I've noted: the keys are in the drawer.`,
    ))
  })

  it('routes to plugins added at construction', async () => {
    runtime = createRuntime({
      registerPlugins: registry => registry.register('forecast', () => ({
        name: 'forecast',
        description: 'Answers weather questions',
        declaresSupport: intent => intent === INTENTS.generalQuery,
        execute: () => 'Sunny all day.',
      }), ['mainLoopHandle']),
    })
    await startRuntime()

    await say('Will it rain tomorrow?')

    expect(link.spoken[1]).toBe(`${ANIMATED_SPEECH_PREFIX}Sunny all day.`)
    expect(link.postures).toEqual([{ posture: 'Stand', speed: 0.8 }])
  })

  it('speaks the fallback reply when reasoning is unavailable', async () => {
    await startRuntime()

    await say('banana')

    expect(link.spoken[1]).toBe(`${ANIMATED_SPEECH_PREFIX}I'm not sure how to respond to that.`)
  })
})

// ============================================================================
// Heartbeat and shutdown
// ============================================================================

describe('heartbeat', () => {
  it('reconnects and resubscribes within one tick after a drop', async () => {
    await startRuntime()
    const callback = runtime.connection.getCallback()

    link.dropConnection()
    await vi.advanceTimersByTimeAsync(5000)
    await vi.advanceTimersByTimeAsync(0)

    expect(link.openCount).toBe(2)
    expect(runtime.getStatus()).toMatchObject({ heartbeatTicks: 1, reconnects: 1 })
    expect(runtime.connection.isPolling()).toBe(true)
    expect(runtime.connection.getCallback()).toBe(callback)

    await say('What day is it?')
    expect(link.spoken.at(-1)).toBe(`${ANIMATED_SPEECH_PREFIX}Today is Friday, March 14, 2025.`)
  })

  it('keeps retrying while the robot stays away', async () => {
    await startRuntime()
    link.dropConnection()
    link.failNextConnects(2)

    await vi.advanceTimersByTimeAsync(5000)
    await vi.advanceTimersByTimeAsync(5000)
    expect(runtime.getStatus().reconnects).toBe(0)

    await vi.advanceTimersByTimeAsync(5000)
    expect(runtime.getStatus()).toMatchObject({ heartbeatTicks: 3, reconnects: 1 })
  })
})

describe('stop', () => {
  it('disconnects and stops the heartbeat', async () => {
    await startRuntime()

    await runtime.stop()
    await vi.advanceTimersByTimeAsync(20000)

    expect(runtime.isRunning()).toBe(false)
    expect(runtime.getStatus()).toMatchObject({
      heartbeatTicks: 0,
      connection: { state: 'disconnected', polling: false },
    })
  })

  it('waits for a reconnect in progress and leaves the robot disconnected', async () => {
    const gated = new GatedLink()
    link = gated
    runtime = createRuntime()
    await startRuntime()

    gated.hold()
    gated.dropConnection()
    await vi.advanceTimersByTimeAsync(5000)
    await vi.waitFor(() => expect(runtime.getStatus().connection.state).toBe('connecting'))

    const stopping = runtime.stop()
    gated.release()
    await stopping
    await vi.advanceTimersByTimeAsync(20000)

    expect(gated.openCount).toBe(2)
    expect(runtime.isRunning()).toBe(false)
    expect(runtime.getStatus()).toMatchObject({
      heartbeatTicks: 1,
      reconnects: 0,
      connection: { state: 'disconnected', polling: false },
    })
  })
})
