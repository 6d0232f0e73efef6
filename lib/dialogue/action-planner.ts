/**
 * Action Planner - turns an utterance into speech plus motion on the robot
 *
 * Routing:
 *   tell_time / tell_date          -> answered here, neutral motion
 *   intents the orchestrator owns  -> orchestrator turn, acknowledgment motion
 *   anything else                  -> reasoning gateway, thinking motion
 *
 * Speech and motion start together; the turn ends once every started
 * channel has finished. Output failures become one generic apology.
 */

import type { Logger } from '../logger'
import { isGatewaySentinel } from '../reasoning/reasoning-gateway'
import { FALLBACK_REPLY, OUTPUT_FAILURE_REPLY } from './response-formatter'
import {
  INTENTS,
  MOTIONS,
  POSTURE_MOTION_PREFIX,
  type ActionPlan,
  type IntentResolver,
  type InteractionRecorder,
  type OutputChannels,
  type ReasoningService,
  type SpeechProcessor,
  type TimeTeller,
  type TurnDelegate,
} from '@/types/dialogue'

export interface ActionPlannerConfig {
  resolveIntent: IntentResolver
  delegate: TurnDelegate
  gateway: ReasoningService
  timeTeller: TimeTeller
  output: OutputChannels
  recorder: InteractionRecorder
  logger: Logger
}

const SIMPLE_INTENTS: readonly string[] = [INTENTS.tellTime, INTENTS.tellDate]

const DEFAULT_POSTURE = 'Stand'

/**
 * Posture to run for a motion token, or null when the token means
 * "stay as you are".
 */
export function postureForMotion(motion: string): string | null {
  if (!motion || motion === MOTIONS.neutral) return null
  if (motion.startsWith(POSTURE_MOTION_PREFIX)) {
    const posture = motion.slice(POSTURE_MOTION_PREFIX.length).trim()
    return posture || null
  }
  return DEFAULT_POSTURE
}

export class ActionPlanner implements SpeechProcessor {
  private resolveIntent: IntentResolver
  private delegate: TurnDelegate
  private gateway: ReasoningService
  private timeTeller: TimeTeller
  private output: OutputChannels
  private recorder: InteractionRecorder
  private logger: Logger

  constructor(config: ActionPlannerConfig) {
    this.resolveIntent = config.resolveIntent
    this.delegate = config.delegate
    this.gateway = config.gateway
    this.timeTeller = config.timeTeller
    this.output = config.output
    this.recorder = config.recorder
    this.logger = config.logger
  }

  async processUserSpeech(text: string, signal?: AbortSignal): Promise<string> {
    let plan: ActionPlan | null
    try {
      plan = await this.plan(text)
    } catch (err) {
      this.logger.error('Error planning turn:', err)
      plan = null
    }

    if (signal?.aborted) {
      this.logger.info('Turn cancelled before output')
      return plan?.speech ?? ''
    }

    if (!plan || !plan.speech) {
      try {
        await this.output.speak(FALLBACK_REPLY)
      } catch (err) {
        this.logger.error('Error speaking fallback reply:', err)
      }
      return FALLBACK_REPLY
    }

    try {
      await this.execute(plan)
    } catch (err) {
      this.logger.error('Error executing action plan:', err)
      return OUTPUT_FAILURE_REPLY
    }

    await this.record(text, plan.speech)
    return plan.speech
  }

  /** Build the plan for one utterance; null when there is nothing to say */
  async plan(text: string): Promise<ActionPlan | null> {
    const { intent } = this.resolveIntent(text)
    this.logger.info(`Intent: ${intent}`)

    if (SIMPLE_INTENTS.includes(intent)) {
      const speech = intent === INTENTS.tellTime ? this.timeTeller.tellTime() : this.timeTeller.tellDate()
      return { speech, motion: MOTIONS.neutral }
    }

    if (this.delegate.ownsIntent(intent)) {
      const speech = await this.delegate.processTurn(text)
      const motion = intent === INTENTS.changePersonality ? MOTIONS.joy : MOTIONS.acknowledge
      return speech ? { speech, motion } : null
    }

    const { persona, tone } = this.delegate.getConversationState()
    const instruction = `${this.delegate.personaPrompt(persona)}\n`
      + `You are speaking through a physical robot. Keep responses concise and conversational. Respond in a ${tone} tone.`
    const answer = await this.gateway.getResponse(instruction, text)
    if (!answer || isGatewaySentinel(answer)) {
      this.logger.warn('No usable answer from reasoning gateway')
      return null
    }
    return { speech: answer, motion: MOTIONS.think }
  }

  private async execute(plan: ActionPlan): Promise<void> {
    const speech = this.output.speak(plan.speech)
    const posture = postureForMotion(plan.motion)

    if (!posture) {
      await speech
      return
    }

    const results = await Promise.allSettled([speech, this.output.moveToPosture(posture)])
    const failed = results.find((r): r is PromiseRejectedResult => r.status === 'rejected')
    if (failed) throw failed.reason
  }

  private async record(text: string, reply: string): Promise<void> {
    try {
      await this.recorder.append(text, reply)
    } catch (err) {
      this.logger.error('Error recording interaction:', err)
    }
  }
}
