/**
 * Connection Manager - session lifecycle against the robot hardware link
 *
 * Owns the connection state, the hardware session and the event poller.
 * Connect failures are reported as `false`, never thrown; retries are the
 * caller's job (the runtime heartbeat). While not connected, speech and
 * motion commands are logged and skipped.
 */

import { errorMessage } from '../errors'
import type { Logger } from '../logger'
import { EventPoller, type EventPollerOptions } from './event-poller'
import type {
  ConnectionState,
  HardwareAddress,
  HardwareLink,
  HardwareSession,
  SensorCallback,
} from '@/types/robot'
import type { OutputChannels } from '@/types/dialogue'

export interface ConnectionManagerConfig {
  address: HardwareAddress
  link: HardwareLink
  logger: Logger
  poller?: EventPollerOptions
  pollerStopTimeoutMs?: number  // default: 5000
}

export interface ConnectionStatus {
  state: ConnectionState
  address: string
  linkKind: HardwareLink['kind']
  polling: boolean
  connectAttempts: number
  lastConnectedAt: number | null
  lastError: string | null
}

// Speech speed tag understood by the robot's text-to-speech engine
export const ANIMATED_SPEECH_PREFIX = '\\rspd=80\\ '

export class ConnectionManager implements OutputChannels {
  private state: ConnectionState = 'disconnected'
  private session: HardwareSession | null = null
  private poller: EventPoller | null = null
  private callback: SensorCallback | null = null

  private address: HardwareAddress
  private link: HardwareLink
  private logger: Logger
  private pollerOptions: EventPollerOptions
  private pollerStopTimeoutMs: number

  private connectAttempts = 0
  private lastConnectedAt: number | null = null
  private lastError: string | null = null

  constructor(config: ConnectionManagerConfig) {
    this.address = config.address
    this.link = config.link
    this.logger = config.logger
    this.pollerOptions = config.poller ?? {}
    this.pollerStopTimeoutMs = config.pollerStopTimeoutMs ?? 5000
  }

  get addressLabel(): string {
    return `${this.address.host}:${this.address.port}`
  }

  getState(): ConnectionState {
    return this.state
  }

  isHealthy(): boolean {
    return this.state === 'connected'
  }

  /**
   * Open a session. Resolves true once the services are acquired.
   */
  async connect(): Promise<boolean> {
    if (this.state === 'connected') return true
    if (this.state === 'connecting') {
      this.logger.warn('Connect already in progress')
      return false
    }

    this.state = 'connecting'
    this.connectAttempts++
    this.logger.info(`Connecting to robot at ${this.addressLabel}...`)

    try {
      const session = await this.link.open(this.address)
      this.session = session
      this.state = 'connected'
      this.lastConnectedAt = Date.now()
      this.lastError = null
      this.logger.info('Connection established and services acquired')
      return true
    } catch (err) {
      this.session = null
      this.state = 'disconnected'
      this.lastError = errorMessage(err)
      this.logger.error(`Failed to connect to robot at ${this.addressLabel}:`, err)
      return false
    }
  }

  /**
   * Compare the recorded state with the session's own view of the link and
   * fall back to disconnected when the session has gone away.
   */
  checkHealth(): boolean {
    if (this.state === 'connected' && this.session && !this.session.isConnected()) {
      this.logger.warn('Health check failed: session no longer connected')
      this.state = 'disconnected'
      this.lastError = 'session lost'
    }
    return this.isHealthy()
  }

  /**
   * Drop whatever is left of the old session and connect again.
   * Subscriptions do not survive; call resubscribe() after success.
   */
  async reconnect(): Promise<boolean> {
    await this.stopPoller()
    await this.closeSession()
    this.state = 'disconnected'
    return this.connect()
  }

  /**
   * Start polling sensor events into the callback. Replaces any running poller.
   */
  async subscribe(callback: SensorCallback): Promise<boolean> {
    this.callback = callback
    if (!this.isHealthy() || !this.session) {
      this.logger.warn('Connection required to subscribe to sensors')
      return false
    }

    await this.stopPoller()
    this.poller = new EventPoller(
      this.session.memory,
      callback,
      () => this.isHealthy(),
      this.logger.child('Poller'),
      this.pollerOptions,
    )
    this.poller.start()
    return true
  }

  /** Re-arm the poller with the most recently registered callback */
  async resubscribe(): Promise<boolean> {
    if (!this.callback) {
      this.logger.warn('No sensor callback registered, nothing to resubscribe')
      return false
    }
    return this.subscribe(this.callback)
  }

  isPolling(): boolean {
    return this.poller?.isRunning() ?? false
  }

  getCallback(): SensorCallback | null {
    return this.callback
  }

  async disconnect(): Promise<void> {
    if (this.state === 'disconnected' && !this.session) return
    this.logger.info(`Disconnecting from robot at ${this.addressLabel}...`)

    await this.stopPoller()
    await this.closeSession()
    this.state = 'disconnected'
    this.logger.info('Disconnected')
  }

  // -- Output channels -----------------------------------------------------

  async speak(text: string, animated = true): Promise<void> {
    const session = this.session
    if (!this.isHealthy() || !session) {
      this.logger.warn(`Cannot speak while disconnected: "${text.substring(0, 30)}${text.length > 30 ? '...' : ''}"`)
      return
    }
    await session.tts.say(animated ? `${ANIMATED_SPEECH_PREFIX}${text}` : text)
  }

  async moveToPosture(posture: string, speed = 0.8): Promise<void> {
    const session = this.session
    if (!this.isHealthy() || !session) {
      this.logger.debug(`Cannot move while disconnected: posture=${posture}`)
      return
    }
    await session.motion.goToPosture(posture, speed)
  }

  getStatus(): ConnectionStatus {
    return {
      state: this.state,
      address: this.addressLabel,
      linkKind: this.link.kind,
      polling: this.isPolling(),
      connectAttempts: this.connectAttempts,
      lastConnectedAt: this.lastConnectedAt,
      lastError: this.lastError,
    }
  }

  // -- Internals -----------------------------------------------------------

  private async stopPoller(): Promise<void> {
    const poller = this.poller
    if (!poller) return
    this.poller = null
    await poller.stop(this.pollerStopTimeoutMs)
  }

  private async closeSession(): Promise<void> {
    const session = this.session
    if (!session) return
    this.session = null
    try {
      await session.close()
    } catch (err) {
      this.logger.warn('Error while closing robot session:', err)
    }
  }
}
