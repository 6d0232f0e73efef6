/**
 * Notes Plugin - take and recall short spoken notes
 */

import { INTENTS, type IntentResult } from '@/types/dialogue'
import type { Plugin, PluginFactory, PluginResourceName } from '@/types/plugin'
import type { JsonValue, MemoryStore } from '../storage/memory-store'

export const NOTES_KEY = 'notes'

export const NOTES_PLUGIN_RESOURCES: readonly PluginResourceName[] = ['storage']

export interface Note {
  text: string
  createdAt: string
}

function isNote(value: JsonValue): value is { text: string; createdAt: string } {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    && typeof value.text === 'string' && typeof value.createdAt === 'string'
}

function readNotes(value: JsonValue | undefined): Note[] {
  if (!Array.isArray(value)) return []
  return value.filter(isNote).map(note => ({ text: note.text, createdAt: note.createdAt }))
}

export class NotesPlugin implements Plugin {
  readonly name = 'notes'
  readonly description = 'Takes notes and reads them back'

  private static readonly INTENTS: readonly string[] = [INTENTS.takeNote, INTENTS.recallNotes]

  constructor(private storage: MemoryStore, private clock: () => Date = () => new Date()) {}

  declaresSupport(intent: string): boolean {
    return NotesPlugin.INTENTS.includes(intent)
  }

  async execute(_rawText: string, intent: IntentResult): Promise<string> {
    if (intent.intent === INTENTS.recallNotes) {
      return this.recall()
    }

    const note = intent.entities.note
    if (typeof note !== 'string' || !note.trim()) {
      return 'What would you like me to note?'
    }
    return this.take(note.trim())
  }

  private async take(text: string): Promise<string> {
    const entry: Note = { text, createdAt: this.clock().toISOString() }
    const saved = await this.storage.update(context => {
      const notes = readNotes(context[NOTES_KEY])
      notes.push(entry)
      context[NOTES_KEY] = notes.map(n => ({ text: n.text, createdAt: n.createdAt }))
      return true
    })
    return saved ? `Okay, I've noted: ${text}.` : "Sorry, I couldn't save that note."
  }

  private async recall(): Promise<string> {
    const notes = readNotes(await this.storage.get(NOTES_KEY))
    if (notes.length === 0) {
      return "You don't have any notes yet."
    }
    const listed = notes.map((note, i) => `${i + 1}. ${note.text}`).join(' ')
    return `You have ${notes.length} note${notes.length === 1 ? '' : 's'}: ${listed}`
  }
}

export const createNotesPlugin: PluginFactory = (resources) => {
  if (!resources.storage) {
    throw new Error('Notes plugin requires storage')
  }
  return new NotesPlugin(resources.storage)
}
