/**
 * Factory functions for test data used across runtime tests.
 *
 * Each factory provides sensible defaults that can be overridden.
 */

import os from 'os'
import path from 'path'
import type { Settings } from '@/lib/settings'
import type { PersonaDefinition } from '@/lib/dialogue/persona-catalogue'
import type { Persona } from '@/types/dialogue'
import type { SensorEvent } from '@/types/robot'

// ---------------------------------------------------------------------------
// Personas
// ---------------------------------------------------------------------------

export function makePersona(overrides: Partial<Persona> = {}): Persona {
  return {
    name: 'Genesis',
    tone: 'friendly',
    systemPromptTemplate: 'You are {name}. You speak {language}.',
    ...overrides,
  }
}

export const TEST_PERSONAS: PersonaDefinition[] = [
  { name: 'Genesis', tone: 'friendly', systemPrompt: 'You are {name}. You speak {language}.' },
  { name: 'Sage', tone: 'calm', systemPrompt: 'You are {name}, a patient guide.' },
]

// ---------------------------------------------------------------------------
// Sensor events
// ---------------------------------------------------------------------------

export function makeSensorEvent(eventName: string, value: unknown): SensorEvent {
  return { eventName, value, timestamp: 1000 }
}

// ---------------------------------------------------------------------------
// Settings
// ---------------------------------------------------------------------------

export function makeSettings(overrides: Partial<Settings> = {}): Settings {
  const dataDir = overrides.dataDir ?? path.join(os.tmpdir(), 'robot-runtime-test')
  return {
    robotHost: '192.168.1.50',
    robotPort: 9559,
    robotLink: 'mock',
    anthropicApiKey: null,
    reasoningModel: 'test-model',
    reasoningMaxTokens: 256,
    language: 'en-US',
    personality: 'genesis',
    usePersonaStyling: false,
    logLevel: 'error',
    dataDir,
    interactionsLogFile: path.join(dataDir, 'interactions.log'),
    memoryFile: path.join(dataDir, 'memory.json'),
    personasFile: path.join(dataDir, 'personas.json'),
    pollIntervalMs: 100,
    pollErrorBackoffMs: 1000,
    pollerStopTimeoutMs: 500,
    heartbeatIntervalMs: 5000,
    turnGracePeriodMs: 200,
    ...overrides,
  }
}
