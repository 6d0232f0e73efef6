/**
 * Intent Resolver - rule-based mapping of an utterance to {intent, entities}
 *
 * Rules are checked in order and the first one that matches wins, so the
 * more specific commands (reminders, persona and tone changes) come before
 * the broad ones (time questions, greetings, any question at all).
 */

import { INTENTS, type EntityValue, type IntentResolver, type IntentResult } from '@/types/dialogue'

interface IntentRule {
  intent: string
  patterns: RegExp[]
  /** Pull entities out of the first matching pattern */
  extract?: (text: string, match: RegExpMatchArray) => Record<string, EntityValue>
}

// -- Time parsing ------------------------------------------------------------

// "at 7", "5pm", "5:30 p.m.", "15:30"; bare numbers only count with "at"
const TIME_PATTERN = /(\bat\s+)?\b(\d{1,2})(?::(\d{2}))?\s*(a\.?m\.?|p\.?m\.?)?(?![\w:])/gi

interface TimeMatch {
  text: string
  timeStr: string
}

function toTimeString(hourText: string, minuteText: string | undefined, meridiem: string | undefined): string | null {
  let hour = Number(hourText)
  const minute = minuteText === undefined ? 0 : Number(minuteText)
  if (minute > 59) return null

  if (meridiem) {
    if (hour < 1 || hour > 12) return null
    const pm = meridiem.toLowerCase().startsWith('p')
    if (pm && hour < 12) hour += 12
    if (!pm && hour === 12) hour = 0
  } else if (hour > 23) {
    return null
  }

  return `${String(hour).padStart(2, '0')}:${String(minute).padStart(2, '0')}`
}

function findTime(text: string): TimeMatch | null {
  for (const match of text.matchAll(TIME_PATTERN)) {
    const [whole, atPrefix, hourText, minuteText, meridiem] = match
    if (!atPrefix && minuteText === undefined && !meridiem) continue
    const timeStr = toTimeString(hourText, minuteText, meridiem)
    if (timeStr) return { text: whole, timeStr }
  }
  return null
}

/**
 * Parse a spoken or typed time into 24h "HH:MM". Returns null when the
 * text holds no recognizable time.
 */
export function parseTimeString(text: string): string | null {
  const trimmed = text.trim()
  if (/^\d{1,2}$/.test(trimmed)) return toTimeString(trimmed, undefined, undefined)
  return findTime(trimmed)?.timeStr ?? null
}

// -- Entity extraction -------------------------------------------------------

function clean(fragment: string): string {
  return fragment
    .replace(/\b(please|now)\b/gi, ' ')
    .replace(/[.!?,]+$/g, '')
    .replace(/\s+/g, ' ')
    .trim()
}

function extractReminder(text: string): Record<string, EntityValue> {
  const time = findTime(text)
  let rest = text.replace(/^.*?\b(?:remind me|set (?:an? )?reminder)\b/i, '')
  if (time) rest = rest.replace(time.text, ' ')
  rest = rest
    .replace(/\b(every day|everyday|daily|today|tonight)\b/gi, ' ')
    .replace(/^\s*(?:(?:to|about|that|for)\s+)+/i, '')

  const entities: Record<string, EntityValue> = {}
  const note = clean(rest)
  if (note) entities.note = note
  if (time) entities.time_str = time.timeStr
  return entities
}

function captured(key: string) {
  return (_text: string, match: RegExpMatchArray): Record<string, EntityValue> => {
    const value = clean(match[1] ?? '')
    return value ? { [key]: value } : {}
  }
}

// -- Rules -------------------------------------------------------------------

const INTENT_RULES: IntentRule[] = [
  {
    intent: INTENTS.setReminder,
    patterns: [/\bremind me\b/i, /\bset (?:a|an)?\s*reminder\b/i],
    extract: extractReminder,
  },
  {
    intent: INTENTS.changePersonality,
    patterns: [
      /\b(?:switch|change|set)\s+(?:your\s+|the\s+)?(?:personality|persona)\s+to\s+(.+)$/i,
      /\b(?:use|activate|be)\s+(?:the\s+)?([\w-]+)\s+(?:personality|persona)\b/i,
      /\b(?:switch|change)\s+(?:your\s+)?(?:personality|persona)\b/i,
    ],
    extract: captured('persona_name'),
  },
  {
    intent: INTENTS.changeTone,
    patterns: [
      /\b(?:change|switch|set)\s+(?:your\s+|the\s+)?tone\s+to\s+(?:an?\s+)?(.+?)(?:\s+tone)?[.!?]*$/i,
      /\b(?:use|adopt|try|take)\s+(?:an?\s+)?([\w-]+)\s+tone\b/i,
      /\b(?:speak|talk)\s+in\s+(?:an?\s+)?([\w-]+)\s+tone\b/i,
      /\b(?:change|switch)\s+(?:your\s+|the\s+)?tone\b/i,
    ],
    extract: captured('tone_name'),
  },
  {
    intent: INTENTS.takeNote,
    patterns: [
      /^(?:please\s+)?(?:take|make|write(?:\s+down)?)\s+(?:a\s+)?note(?:\s+that|\s*:)?\s+(.+)$/i,
      /^(?:please\s+)?(?:note|remember)\s+that\s+(.+)$/i,
    ],
    extract: captured('note'),
  },
  {
    intent: INTENTS.recallNotes,
    patterns: [
      /\b(?:read|recall|show|list|tell me)\s+(?:me\s+)?(?:all\s+)?(?:my\s+)?notes\b/i,
      /\bwhat (?:are|were) my notes\b/i,
      /\bwhat did i (?:note|ask you to remember)\b/i,
    ],
  },
  {
    intent: INTENTS.tellTime,
    patterns: [
      /\bwhat(?:'s| is)?\s+(?:the\s+)?(?:current\s+)?time\b/i,
      /\btell me the time\b/i,
      /\bwhat time is it\b/i,
    ],
  },
  {
    intent: INTENTS.tellDate,
    patterns: [
      /\bwhat(?:'s| is)?\s+(?:the\s+|today's\s+)?date\b/i,
      /\bwhat day is (?:it|today)\b/i,
      /\btoday's date\b/i,
    ],
  },
  {
    intent: INTENTS.greeting,
    patterns: [/^(?:hi|hey|hello|howdy|good (?:morning|afternoon|evening))\b/i],
  },
  {
    intent: INTENTS.generalQuery,
    patterns: [
      /\?\s*$/,
      /^(?:what|who|when|where|which|why|how|can|could|would|do|does|is|are|tell me)\b/i,
    ],
  },
]

/**
 * Resolve an utterance. Anything no rule claims is 'unknown'.
 */
export const resolveIntent: IntentResolver = (text: string): IntentResult => {
  const trimmed = text.trim()
  if (!trimmed) {
    return { intent: INTENTS.unknown, entities: {}, originalText: text }
  }

  for (const rule of INTENT_RULES) {
    for (const pattern of rule.patterns) {
      const match = trimmed.match(pattern)
      if (!match) continue
      const entities = rule.extract ? rule.extract(trimmed, match) : {}
      return { intent: rule.intent, entities, originalText: text }
    }
  }

  return { intent: INTENTS.unknown, entities: {}, originalText: text }
}
