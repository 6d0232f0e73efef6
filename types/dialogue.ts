// Dialogue types shared by the orchestrator, the action planner and plugins

export const INTENTS = {
  tellTime: 'tell_time',
  tellDate: 'tell_date',
  setReminder: 'set_reminder',
  changePersonality: 'change_personality',
  changeTone: 'change_tone',
  takeNote: 'take_note',
  recallNotes: 'recall_notes',
  greeting: 'greeting',
  generalQuery: 'general_query',
  unknown: 'unknown',
} as const

export type EntityValue = string | number | boolean

export interface IntentResult {
  intent: string
  entities: Record<string, EntityValue>
  originalText: string
}

export type IntentResolver = (text: string) => IntentResult

export interface Persona {
  name: string
  tone: string
  systemPromptTemplate: string  // may reference {language} and {name}
}

export interface ConversationState {
  persona: Persona
  tone: string
}

export interface ActionPlan {
  speech: string
  motion: string  // posture token, '' for none
}

// Motion tokens understood by the action planner
export const MOTIONS = {
  neutral: 'HeadYaw:0',
  acknowledge: 'HeadNod',
  joy: 'BodyLanguage:Joy',
  think: 'BodyLanguage:Think',
} as const

export const POSTURE_MOTION_PREFIX = 'move_posture:'

/**
 * Narrow view of the dialogue orchestrator handed to the action planner.
 * Keeps the planner from depending on the orchestrator class itself.
 */
export interface TurnDelegate {
  getConversationState(): ConversationState
  personaPrompt(persona: Persona): string
  ownsIntent(intent: string): boolean
  processTurn(text: string): Promise<string>
}

export interface SpeechProcessor {
  processUserSpeech(text: string, signal?: AbortSignal): Promise<string>
}

export interface ReasoningService {
  getResponse(systemInstruction: string, userQuery: string): Promise<string>
}

export interface TimeTeller {
  tellTime(): string
  tellDate(): string
}

export interface ReminderScheduling {
  setupReminder(message: string, timeStr: string, reminderName?: string): string
}

export interface OutputChannels {
  speak(text: string, animated?: boolean): Promise<void>
  moveToPosture(posture: string, speed?: number): Promise<void>
}

export interface InteractionRecorder {
  append(userText: string, reply: string): Promise<void>
}
