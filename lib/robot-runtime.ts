/**
 * Robot Runtime - startup, heartbeat and shutdown of the dialogue runtime
 *
 * Startup order matters: the hardware connection comes first, and if it
 * cannot be made nothing else is built. The orchestrator and the action
 * planner are constructed in two phases to break their mutual dependency.
 */

import { errorMessage, StartupError } from './errors'
import type { Logger } from './logger'
import type { Settings } from './settings'
import { ConnectionManager, type ConnectionStatus } from './hardware/connection-manager'
import { MockHardwareLink } from './hardware/mock-link'
import { WebSocketHardwareLink } from './hardware/websocket-link'
import { ActionPlanner } from './dialogue/action-planner'
import { DialogueOrchestrator } from './dialogue/dialogue-orchestrator'
import { resolveIntent as defaultResolveIntent } from './dialogue/intent-resolver'
import { PersonaCatalogue } from './dialogue/persona-catalogue'
import { InteractionLog } from './interaction-log'
import { PluginRegistry, type PluginStatus } from './plugins/plugin-registry'
import { createNotesPlugin, NOTES_PLUGIN_RESOURCES } from './plugins/notes-plugin'
import { createAnthropicBackend, ReasoningGateway, type ReasoningBackend } from './reasoning/reasoning-gateway'
import { MemoryStore } from './storage/memory-store'
import { ReminderService } from './tasks/reminder-service'
import { TaskScheduler, type TaskInfo } from './tasks/task-scheduler'
import { createTimeTeller } from './time-utils'
import type { IntentResolver } from '@/types/dialogue'
import type { MainLoopHandle } from '@/types/plugin'
import type { HardwareLink } from '@/types/robot'

export interface RobotRuntimeOptions {
  settings: Settings
  logger: Logger
  /** Defaults to the link kind named in settings */
  link?: HardwareLink
  /** Defaults to the Anthropic client when an API key is configured */
  reasoningBackend?: ReasoningBackend | null
  resolveIntent?: IntentResolver
  /** Extra plugin registrations, added after the built-in ones */
  registerPlugins?: (registry: PluginRegistry) => void
}

export interface RuntimeStatus {
  running: boolean
  connection: ConnectionStatus
  persona: string | null
  tone: string | null
  inFlightTurns: number
  turnsStarted: number
  heartbeatTicks: number
  reconnects: number
  plugins: PluginStatus[]
  tasks: TaskInfo[]
}

interface RuntimeComponents {
  scheduler: TaskScheduler
  plugins: PluginRegistry
  orchestrator: DialogueOrchestrator
  planner: ActionPlanner
}

function createLink(settings: Settings, logger: Logger): HardwareLink {
  return settings.robotLink === 'mock'
    ? new MockHardwareLink()
    : new WebSocketHardwareLink(logger.child('Link'))
}

export class RobotRuntime {
  private settings: Settings
  private logger: Logger
  private options: RobotRuntimeOptions

  readonly connection: ConnectionManager
  private components: RuntimeComponents | null = null

  private running = false
  private stopping = false
  private heartbeatTimer: ReturnType<typeof setTimeout> | null = null
  private heartbeatInFlight: Promise<void> | null = null
  private heartbeatTicks = 0
  private reconnects = 0

  constructor(options: RobotRuntimeOptions) {
    this.options = options
    this.settings = options.settings
    this.logger = options.logger

    this.connection = new ConnectionManager({
      address: { host: this.settings.robotHost, port: this.settings.robotPort },
      link: options.link ?? createLink(this.settings, this.logger),
      logger: this.logger.child('Connection'),
      poller: {
        intervalMs: this.settings.pollIntervalMs,
        errorBackoffMs: this.settings.pollErrorBackoffMs,
      },
      pollerStopTimeoutMs: this.settings.pollerStopTimeoutMs,
    })
  }

  get orchestrator(): DialogueOrchestrator | null {
    return this.components?.orchestrator ?? null
  }

  get planner(): ActionPlanner | null {
    return this.components?.planner ?? null
  }

  get scheduler(): TaskScheduler | null {
    return this.components?.scheduler ?? null
  }

  isRunning(): boolean {
    return this.running
  }

  /**
   * Connect, build the dialogue stack, subscribe to sensors, greet and
   * start the heartbeat. Throws StartupError when the robot is unreachable.
   */
  async start(): Promise<void> {
    if (this.running) return
    this.logger.info('Initializing core components...')

    const connected = await this.connection.connect()
    if (!connected) {
      throw new StartupError(
        `Failed to connect to robot at ${this.connection.addressLabel}. Check robot host, port and network connectivity.`,
      )
    }

    let components: RuntimeComponents
    try {
      components = this.buildComponents()
    } catch (err) {
      await this.connection.disconnect()
      throw new StartupError(`Could not initialize dialogue components: ${errorMessage(err)}`, { cause: err })
    }
    this.components = components

    const { orchestrator, plugins } = components
    await this.connection.subscribe(event => orchestrator.handleSensorEvent(event))
    plugins.startAll()

    this.running = true
    this.stopping = false
    this.logger.info('Core components initialized')

    const persona = orchestrator.getConversationState().persona
    try {
      await this.connection.speak(`Hello. I am ${persona.name}. I am now connected to ${this.settings.robotHost}.`)
    } catch (err) {
      this.logger.warn('Initial greeting failed:', err)
    }

    this.scheduleHeartbeat()
  }

  /**
   * One health check. On a lost connection: reconnect, then re-arm the
   * poller with the last registered callback. Never throws.
   */
  async heartbeatTick(): Promise<void> {
    this.heartbeatTicks++
    if (this.connection.checkHealth()) return

    this.logger.error('Lost connection to robot. Attempting reconnect...')
    const reconnected = await this.connection.reconnect()
    if (this.stopping) {
      // Shutdown began while the link was opening; drop the new session
      await this.connection.disconnect()
      return
    }
    if (!reconnected) {
      this.logger.error('Reconnection failed. Will retry on next heartbeat')
      return
    }

    this.reconnects++
    this.logger.info('Reconnected to robot')
    const resubscribed = await this.connection.resubscribe()
    if (!resubscribed) {
      this.logger.warn('Reconnected but sensor subscription could not be restored')
    }
  }

  async stop(): Promise<void> {
    if (this.stopping) return
    this.stopping = true
    this.logger.info('Shutting down...')

    if (this.heartbeatTimer) {
      clearTimeout(this.heartbeatTimer)
      this.heartbeatTimer = null
    }
    await this.awaitHeartbeat(this.settings.turnGracePeriodMs)

    const components = this.components
    if (components) {
      components.scheduler.stop()
      await components.plugins.stopAll(this.settings.turnGracePeriodMs)
      await components.orchestrator.cancelTurns(this.settings.turnGracePeriodMs)
    }

    await this.connection.disconnect()
    this.running = false
    this.logger.info('Shutdown complete')
  }

  getStatus(): RuntimeStatus {
    const components = this.components
    const state = components?.orchestrator.getConversationState()
    return {
      running: this.running,
      connection: this.connection.getStatus(),
      persona: state?.persona.name ?? null,
      tone: state?.tone ?? null,
      inFlightTurns: components?.orchestrator.getInFlightTurnCount() ?? 0,
      turnsStarted: components?.orchestrator.getTurnsStarted() ?? 0,
      heartbeatTicks: this.heartbeatTicks,
      reconnects: this.reconnects,
      plugins: components?.plugins.getStatus() ?? [],
      tasks: components?.scheduler.listTasks() ?? [],
    }
  }

  // -- Internals -----------------------------------------------------------

  private buildComponents(): RuntimeComponents {
    const { settings, logger } = this
    const resolveIntent = this.options.resolveIntent ?? defaultResolveIntent

    const storage = new MemoryStore(settings.memoryFile, logger.child('Storage'))
    const scheduler = new TaskScheduler(logger.child('Tasks'))
    const reminders = new ReminderService(scheduler, this.connection, logger.child('Reminders'))
    const timeTeller = createTimeTeller(settings.language)
    const interactions = new InteractionLog(settings.interactionsLogFile, logger.child('Interactions'))

    const backend = this.options.reasoningBackend !== undefined
      ? this.options.reasoningBackend
      : settings.anthropicApiKey ? createAnthropicBackend(settings.anthropicApiKey) : null
    const gateway = new ReasoningGateway({
      backend,
      model: settings.reasoningModel,
      maxTokens: settings.reasoningMaxTokens,
      logger: logger.child('Reasoning'),
    })

    const personas = PersonaCatalogue.fromFile(settings.personasFile, settings.language, logger.child('Personas'))

    const plugins = new PluginRegistry(logger.child('Plugins'))
    plugins.register('notes', createNotesPlugin, NOTES_PLUGIN_RESOURCES)
    this.options.registerPlugins?.(plugins)
    plugins.instantiate({
      storage,
      scheduler,
      hardwareLink: this.connection,
      settings,
      mainLoopHandle: this.createMainLoopHandle(),
    })

    const orchestrator = new DialogueOrchestrator({
      resolveIntent,
      personas,
      initialPersona: settings.personality,
      plugins,
      gateway,
      timeTeller,
      reminders,
      usePersonaStyling: settings.usePersonaStyling,
      logger: logger.child('Dialogue'),
    })
    const planner = new ActionPlanner({
      resolveIntent,
      delegate: orchestrator,
      gateway,
      timeTeller,
      output: this.connection,
      recorder: interactions,
      logger: logger.child('Planner'),
    })
    orchestrator.bindPlanner(planner)

    return { scheduler, plugins, orchestrator, planner }
  }

  private createMainLoopHandle(): MainLoopHandle {
    const logger = this.logger.child('MainLoop')
    return {
      schedule: (name, work) => {
        Promise.resolve()
          .then(work)
          .catch(err => {
            logger.error(`Scheduled work '${name}' failed:`, err)
          })
      },
    }
  }

  private scheduleHeartbeat(): void {
    if (this.stopping) return
    this.heartbeatTimer = setTimeout(() => {
      this.heartbeatTimer = null
      this.heartbeatInFlight = this.heartbeatTick()
        .catch(err => {
          this.logger.error('Error in heartbeat:', err)
        })
        .finally(() => {
          this.heartbeatInFlight = null
          this.scheduleHeartbeat()
        })
    }, this.settings.heartbeatIntervalMs)
  }

  /** Wait for a running heartbeat tick, at most timeoutMs */
  private async awaitHeartbeat(timeoutMs: number): Promise<void> {
    const tick = this.heartbeatInFlight
    if (!tick) return

    let timer: ReturnType<typeof setTimeout> | undefined
    const timedOut = new Promise<false>(resolve => {
      timer = setTimeout(() => resolve(false), timeoutMs)
    })
    const finished = await Promise.race([tick.then(() => true as const), timedOut])
    clearTimeout(timer)

    if (!finished) {
      this.logger.warn(`Heartbeat still running after ${timeoutMs}ms, continuing shutdown`)
    }
  }
}
