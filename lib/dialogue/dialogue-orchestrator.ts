/**
 * Dialogue Orchestrator - conversation state and intent dispatch
 *
 * Holds the active persona and tone, owns the internal intent handlers
 * and routes everything else to plugins. Replies can be restyled through
 * the reasoning gateway in the active persona's voice.
 *
 * Sensor intake is fire-and-forget: each recognized utterance becomes a
 * detached turn on the action planner. Turns are tracked only so they can
 * be marked for cancellation at shutdown; nothing waits on their result
 * and there is no cap on how many run at once.
 */

import type { Logger } from '../logger'
import { stylize } from '../reasoning/stylizer'
import type { PersonaCatalogue } from './persona-catalogue'
import { formatErrorMessage } from './response-formatter'
import type { PluginRegistry } from '../plugins/plugin-registry'
import { SENSOR_EVENTS, type SensorEvent } from '@/types/robot'
import {
  INTENTS,
  type ConversationState,
  type EntityValue,
  type IntentResolver,
  type Persona,
  type ReasoningService,
  type ReminderScheduling,
  type SpeechProcessor,
  type TimeTeller,
  type TurnDelegate,
} from '@/types/dialogue'

type IntentHandler = (entities: Record<string, EntityValue>, rawText: string) => Promise<string> | string

export interface DialogueOrchestratorConfig {
  resolveIntent: IntentResolver
  personas: PersonaCatalogue
  initialPersona: string
  plugins: PluginRegistry
  gateway: ReasoningService
  timeTeller: TimeTeller
  reminders: ReminderScheduling
  usePersonaStyling: boolean
  logger: Logger
}

interface TrackedTurn {
  text: string
  controller: AbortController
  done: Promise<void>
}

function entityText(entities: Record<string, EntityValue>, key: string): string {
  const value = entities[key]
  return value === undefined ? '' : String(value).trim()
}

/** Utterance text of a WordRecognized value: [text, confidence] or plain text */
export function utteranceText(value: unknown): string {
  if (Array.isArray(value)) {
    return value.length > 0 ? String(value[0]).trim() : ''
  }
  if (value === null || value === undefined) return ''
  return String(value).trim()
}

export class DialogueOrchestrator implements TurnDelegate {
  private resolveIntent: IntentResolver
  private personas: PersonaCatalogue
  private plugins: PluginRegistry
  private gateway: ReasoningService
  private timeTeller: TimeTeller
  private reminders: ReminderScheduling
  private usePersonaStyling: boolean
  private logger: Logger

  private state: ConversationState
  private handlers: Map<string, IntentHandler>
  private planner: SpeechProcessor | null = null

  private turns = new Map<number, TrackedTurn>()
  private nextTurnId = 1
  private turnsStarted = 0

  constructor(config: DialogueOrchestratorConfig) {
    this.resolveIntent = config.resolveIntent
    this.personas = config.personas
    this.plugins = config.plugins
    this.gateway = config.gateway
    this.timeTeller = config.timeTeller
    this.reminders = config.reminders
    this.usePersonaStyling = config.usePersonaStyling
    this.logger = config.logger

    const persona = this.personas.initial(config.initialPersona)
    this.state = Object.freeze({ persona, tone: persona.tone })

    // Internal dispatch table: simple actions and state changes only
    this.handlers = new Map<string, IntentHandler>([
      [INTENTS.tellTime, () => this.timeTeller.tellTime()],
      [INTENTS.tellDate, () => this.timeTeller.tellDate()],
      [INTENTS.setReminder, (entities) => this.handleSetReminder(entities)],
      [INTENTS.changePersonality, (entities) => this.handleChangePersonality(entities)],
      [INTENTS.changeTone, (entities) => this.handleChangeTone(entities)],
    ])

    this.logger.info(`Initialized. Persona: ${persona.name}, tone: ${persona.tone}, styling: ${this.usePersonaStyling ? 'on' : 'off'}`)
  }

  /** Second construction phase: the planner is built after the orchestrator */
  bindPlanner(planner: SpeechProcessor): void {
    this.planner = planner
  }

  // -- TurnDelegate --------------------------------------------------------

  getConversationState(): ConversationState {
    return this.state
  }

  personaPrompt(persona: Persona): string {
    return this.personas.systemPrompt(persona)
  }

  hasHandler(intent: string): boolean {
    return this.handlers.has(intent)
  }

  /** Intents answered by processTurn: the dispatch table plus plugin intents */
  ownsIntent(intent: string): boolean {
    return this.handlers.has(intent) || this.plugins.findSupporter(intent) !== undefined
  }

  async processTurn(rawText: string): Promise<string> {
    const { intent, entities } = this.resolveIntent(rawText)

    let baseReply: string
    const handler = this.handlers.get(intent)
    if (handler) {
      baseReply = await this.runHandler(intent, () => handler(entities, rawText))
    } else {
      const plugin = this.plugins.findSupporter(intent)
      if (plugin) {
        this.logger.debug(`Routing '${intent}' to plugin ${plugin.name}`)
        baseReply = await this.runHandler(intent, () => plugin.execute(rawText, { intent, entities, originalText: rawText }))
      } else {
        baseReply = formatErrorMessage(
          `I understood the intent '${intent}', but I lack the specific tool to execute it directly.`,
        )
      }
    }

    return this.applyPersonaStyle(baseReply, rawText)
  }

  // -- Sensor intake -------------------------------------------------------

  handleSensorEvent(event: SensorEvent): void {
    if (event.eventName !== SENSOR_EVENTS.wordRecognized) {
      this.logger.debug(`Ignoring sensor event ${event.eventName}`)
      return
    }

    const text = utteranceText(event.value)
    if (!text) return

    this.logger.info(`Heard: "${text}"`)
    this.startTurn(text)
  }

  getInFlightTurnCount(): number {
    return this.turns.size
  }

  getTurnsStarted(): number {
    return this.turnsStarted
  }

  /**
   * Mark every in-flight turn for cancellation and wait up to gracePeriodMs
   * for them to wind down. Resolves false when some were still running.
   */
  async cancelTurns(gracePeriodMs: number): Promise<boolean> {
    const pending = Array.from(this.turns.values())
    if (pending.length === 0) return true

    this.logger.info(`Cancelling ${pending.length} in-flight turn(s)`)
    for (const turn of pending) turn.controller.abort()

    let timer: ReturnType<typeof setTimeout> | undefined
    const timedOut = new Promise<false>(resolve => {
      timer = setTimeout(() => resolve(false), gracePeriodMs)
    })
    const settled = await Promise.race([
      Promise.allSettled(pending.map(t => t.done)).then(() => true as const),
      timedOut,
    ])
    clearTimeout(timer)

    if (!settled) {
      this.logger.warn(`${this.turns.size} turn(s) still running after ${gracePeriodMs}ms grace period`)
    }
    return settled
  }

  // -- Internals -----------------------------------------------------------

  private startTurn(text: string): void {
    const planner = this.planner
    if (!planner) {
      this.logger.warn('No action planner bound, dropping utterance')
      return
    }

    const id = this.nextTurnId++
    const controller = new AbortController()
    this.turnsStarted++

    const done = planner.processUserSpeech(text, controller.signal)
      .then(reply => {
        this.logger.debug(`Turn ${id} complete: "${reply.substring(0, 50)}"`)
      })
      .catch(err => {
        this.logger.error(`Turn ${id} failed:`, err)
      })
      .finally(() => {
        this.turns.delete(id)
      })

    this.turns.set(id, { text, controller, done })
  }

  private async runHandler(intent: string, run: () => Promise<string> | string): Promise<string> {
    try {
      return await run()
    } catch (err) {
      this.logger.error(`Error executing handler for intent '${intent}':`, err)
      return formatErrorMessage(`I had trouble processing your request concerning '${intent}'.`)
    }
  }

  private async applyPersonaStyle(baseReply: string, rawText: string): Promise<string> {
    if (!this.usePersonaStyling || !baseReply) return baseReply

    const { persona, tone } = this.state
    const instruction = `${this.personaPrompt(persona)}\nRespond in a ${tone} tone, suitable for robotic speech.`
    return stylize(this.gateway, this.logger, instruction, baseReply, rawText)
  }

  private handleChangePersonality(entities: Record<string, EntityValue>): string {
    const requested = entityText(entities, 'persona_name')
    const available = this.personas.names().join(', ')
    if (!requested) {
      return `Which personality should I switch to? Available: ${available}.`
    }

    const persona = this.personas.get(requested)
    if (!persona) {
      return `Sorry, I don't have a personality named '${requested}'. Available: ${available}.`
    }

    // Persona and tone change together in one assignment
    this.state = Object.freeze({ persona, tone: persona.tone })
    this.logger.info(`Personality changed to: ${persona.name}`)
    return `Okay, I've switched my personality to ${persona.name}.`
  }

  private handleChangeTone(entities: Record<string, EntityValue>): string {
    const tone = entityText(entities, 'tone_name')
    if (!tone) {
      return 'What tone would you like me to use?'
    }
    this.state = Object.freeze({ persona: this.state.persona, tone })
    this.logger.info(`Tone changed to: ${tone}`)
    return `Alright, I'll try to adopt a ${tone} tone.`
  }

  private handleSetReminder(entities: Record<string, EntityValue>): string {
    const note = entityText(entities, 'note')
    const timeStr = entityText(entities, 'time_str')

    if (!note && !timeStr) {
      return 'To set a reminder, I need the reminder text and a specific time.'
    }
    if (!note) {
      return 'What should I remind you about?'
    }
    if (!timeStr) {
      return 'What time should I remind you? Please say a time like 15:30.'
    }
    return this.reminders.setupReminder(note, timeStr)
  }
}
