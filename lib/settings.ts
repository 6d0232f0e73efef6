/**
 * Settings - startup configuration
 *
 * Values come from an optional JSON file (ROBOT_CONFIG_FILE) overlaid by
 * environment variables. The resulting struct is frozen and passed down
 * to components explicitly.
 */

import fs from 'fs'
import path from 'path'
import { fileURLToPath } from 'url'
import { ConfigError, errorMessage } from './errors'
import { isLogLevel, type LogLevel } from './logger'

export type RobotLinkKind = 'websocket' | 'mock'

export interface Settings {
  robotHost: string
  robotPort: number
  robotLink: RobotLinkKind

  anthropicApiKey: string | null
  reasoningModel: string
  reasoningMaxTokens: number

  language: string
  personality: string
  usePersonaStyling: boolean

  logLevel: LogLevel
  dataDir: string
  interactionsLogFile: string
  memoryFile: string
  personasFile: string

  pollIntervalMs: number
  pollErrorBackoffMs: number
  pollerStopTimeoutMs: number
  heartbeatIntervalMs: number
  turnGracePeriodMs: number
}

export type Env = Record<string, string | undefined>

export const DEFAULT_PERSONAS_FILE = fileURLToPath(new URL('../config/personas.json', import.meta.url))

const DEFAULTS = {
  robotPort: 9559,
  robotLink: 'websocket',
  reasoningModel: 'claude-3-5-haiku-20241022',
  reasoningMaxTokens: 1024,
  language: 'en-US',
  personality: 'genesis',
  usePersonaStyling: true,
  logLevel: 'info',
  dataDir: 'data',
  interactionsLogFile: 'interactions.log',
  memoryFile: 'memory.json',
  pollIntervalMs: 100,
  pollErrorBackoffMs: 1000,
  pollerStopTimeoutMs: 5000,
  heartbeatIntervalMs: 5000,
  turnGracePeriodMs: 3000,
} as const

// Environment variable -> settings key
const ENV_KEYS: Record<string, keyof Settings> = {
  ROBOT_HOST: 'robotHost',
  ROBOT_PORT: 'robotPort',
  ROBOT_LINK: 'robotLink',
  ANTHROPIC_API_KEY: 'anthropicApiKey',
  REASONING_MODEL: 'reasoningModel',
  REASONING_MAX_TOKENS: 'reasoningMaxTokens',
  LANGUAGE: 'language',
  PERSONALITY: 'personality',
  USE_PERSONA_STYLING: 'usePersonaStyling',
  LOG_LEVEL: 'logLevel',
  DATA_DIR: 'dataDir',
  INTERACTIONS_LOG_FILE: 'interactionsLogFile',
  MEMORY_FILE: 'memoryFile',
  PERSONAS_FILE: 'personasFile',
  POLL_INTERVAL_MS: 'pollIntervalMs',
  POLL_ERROR_BACKOFF_MS: 'pollErrorBackoffMs',
  POLLER_STOP_TIMEOUT_MS: 'pollerStopTimeoutMs',
  HEARTBEAT_INTERVAL_MS: 'heartbeatIntervalMs',
  TURN_GRACE_PERIOD_MS: 'turnGracePeriodMs',
}

function isRobotLinkKind(value: string): value is RobotLinkKind {
  return value === 'websocket' || value === 'mock'
}

type RawSettings = Partial<Record<keyof Settings, string>>

function readConfigFile(filePath: string): RawSettings {
  let parsed: unknown
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'))
  } catch (err) {
    throw new ConfigError(`Could not read config file ${filePath}: ${errorMessage(err)}`)
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`Config file ${filePath} must contain a JSON object`)
  }

  const entries = new Map<string, unknown>(Object.entries(parsed))
  const raw: RawSettings = {}
  for (const key of Object.values(ENV_KEYS)) {
    const value = entries.get(key)
    if (value === null || value === undefined) continue
    raw[key] = String(value)
  }
  return raw
}

function parseInteger(
  name: string,
  value: string | undefined,
  fallback: number,
  min = 1,
  max = Number.MAX_SAFE_INTEGER,
): number {
  if (value === undefined || value.trim() === '') return fallback
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
    const range = max === Number.MAX_SAFE_INTEGER ? `>= ${min}` : `between ${min} and ${max}`
    throw new ConfigError(`${name} must be an integer ${range}, got '${value}'`)
  }
  return parsed
}

function parseLocale(value: string | undefined, fallback: string): string {
  const locale = value?.trim() || fallback
  let supported: string[]
  try {
    supported = Intl.DateTimeFormat.supportedLocalesOf(locale)
  } catch (err) {
    throw new ConfigError(`LANGUAGE must be a locale tag such as en-US, got '${locale}'`, { cause: err })
  }
  if (supported.length === 0) {
    throw new ConfigError(`LANGUAGE '${locale}' is not a supported locale`)
  }
  return locale
}

function parseBoolean(name: string, value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback
  const normalized = value.trim().toLowerCase()
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false
  throw new ConfigError(`${name} must be a boolean, got '${value}'`)
}

/**
 * Load settings from the environment. Throws ConfigError on invalid values.
 */
export function loadSettings(env: Env = process.env): Settings {
  const raw: RawSettings = env.ROBOT_CONFIG_FILE ? readConfigFile(env.ROBOT_CONFIG_FILE) : {}
  for (const [envName, key] of Object.entries(ENV_KEYS)) {
    const value = env[envName]
    if (value !== undefined && value !== '') raw[key] = value
  }

  const robotHost = raw.robotHost?.trim() ?? ''
  if (robotHost.length < 3) {
    throw new ConfigError('ROBOT_HOST must be set to the robot IP address or hostname')
  }

  const logLevel = raw.logLevel?.trim().toLowerCase() ?? DEFAULTS.logLevel
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`LOG_LEVEL must be one of debug, info, warn, error, got '${raw.logLevel}'`)
  }

  const robotLink = raw.robotLink?.trim().toLowerCase() ?? DEFAULTS.robotLink
  if (!isRobotLinkKind(robotLink)) {
    throw new ConfigError(`ROBOT_LINK must be 'websocket' or 'mock', got '${raw.robotLink}'`)
  }

  const dataDir = path.resolve(raw.dataDir ?? DEFAULTS.dataDir)

  return Object.freeze({
    robotHost,
    robotPort: parseInteger('ROBOT_PORT', raw.robotPort, DEFAULTS.robotPort, 1, 65535),
    robotLink,

    anthropicApiKey: raw.anthropicApiKey?.trim() || null,
    reasoningModel: raw.reasoningModel ?? DEFAULTS.reasoningModel,
    reasoningMaxTokens: parseInteger('REASONING_MAX_TOKENS', raw.reasoningMaxTokens, DEFAULTS.reasoningMaxTokens),

    language: parseLocale(raw.language, DEFAULTS.language),
    personality: (raw.personality ?? DEFAULTS.personality).toLowerCase(),
    usePersonaStyling: parseBoolean('USE_PERSONA_STYLING', raw.usePersonaStyling, DEFAULTS.usePersonaStyling),

    logLevel,
    dataDir,
    interactionsLogFile: path.resolve(dataDir, raw.interactionsLogFile ?? DEFAULTS.interactionsLogFile),
    memoryFile: path.resolve(dataDir, raw.memoryFile ?? DEFAULTS.memoryFile),
    personasFile: raw.personasFile ? path.resolve(raw.personasFile) : DEFAULT_PERSONAS_FILE,

    pollIntervalMs: parseInteger('POLL_INTERVAL_MS', raw.pollIntervalMs, DEFAULTS.pollIntervalMs),
    pollErrorBackoffMs: parseInteger('POLL_ERROR_BACKOFF_MS', raw.pollErrorBackoffMs, DEFAULTS.pollErrorBackoffMs),
    pollerStopTimeoutMs: parseInteger('POLLER_STOP_TIMEOUT_MS', raw.pollerStopTimeoutMs, DEFAULTS.pollerStopTimeoutMs),
    heartbeatIntervalMs: parseInteger('HEARTBEAT_INTERVAL_MS', raw.heartbeatIntervalMs, DEFAULTS.heartbeatIntervalMs),
    turnGracePeriodMs: parseInteger('TURN_GRACE_PERIOD_MS', raw.turnGracePeriodMs, DEFAULTS.turnGracePeriodMs, 0),
  })
}
