/**
 * Persona Catalogue - the set of personas, keyed by lower-cased name
 *
 * Loaded once at startup from a JSON list and read-only afterwards.
 * Prompt templates may use {name} and {language}; they are resolved
 * when the prompt is read, not at load time.
 */

import fs from 'fs'
import { ConfigError, errorMessage } from '../errors'
import type { Logger } from '../logger'
import type { Persona } from '@/types/dialogue'

export interface PersonaDefinition {
  name: string
  tone: string
  systemPrompt: string
}

export const FALLBACK_PERSONA: Persona = Object.freeze({
  name: 'DefaultGenesis',
  tone: 'neutral',
  systemPromptTemplate: 'You are GENESIS, a helpful AI assistant.',
})

function isPersonaDefinition(value: unknown): value is PersonaDefinition {
  if (typeof value !== 'object' || value === null) return false
  return 'name' in value && typeof value.name === 'string' && value.name.trim() !== ''
    && 'tone' in value && typeof value.tone === 'string'
    && 'systemPrompt' in value && typeof value.systemPrompt === 'string'
}

export class PersonaCatalogue {
  private personas = new Map<string, Persona>()

  constructor(
    definitions: readonly PersonaDefinition[],
    private language: string,
    private logger: Logger,
  ) {
    for (const def of definitions) {
      const key = def.name.toLowerCase()
      if (this.personas.has(key)) {
        this.logger.warn(`Duplicate persona name '${key}', previous definition will be overwritten`)
      }
      this.personas.set(key, Object.freeze({
        name: def.name,
        tone: def.tone,
        systemPromptTemplate: def.systemPrompt,
      }))
      this.logger.info(`Loaded persona '${def.name}' (key: '${key}'), tone: ${def.tone}`)
    }

    if (this.personas.size === 0) {
      this.logger.warn('No personas loaded, using DefaultGenesis')
      this.personas.set(FALLBACK_PERSONA.name.toLowerCase(), FALLBACK_PERSONA)
    }
  }

  /**
   * Read persona definitions from a JSON file. A missing file yields the
   * fallback persona; a malformed one is a configuration error.
   */
  static fromFile(filePath: string, language: string, logger: Logger): PersonaCatalogue {
    if (!fs.existsSync(filePath)) {
      logger.warn(`Persona file not found: ${filePath}`)
      return new PersonaCatalogue([], language, logger)
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'))
    } catch (err) {
      throw new ConfigError(`Could not parse persona file ${filePath}: ${errorMessage(err)}`)
    }
    if (!Array.isArray(parsed)) {
      throw new ConfigError(`Persona file ${filePath} must contain a JSON array`)
    }

    const definitions: PersonaDefinition[] = []
    parsed.forEach((entry: unknown, index) => {
      if (isPersonaDefinition(entry)) {
        definitions.push(entry)
      } else {
        logger.error(`Skipping invalid persona entry #${index} in ${filePath}`)
      }
    })
    return new PersonaCatalogue(definitions, language, logger)
  }

  get(name: string): Persona | undefined {
    return this.personas.get(name.trim().toLowerCase())
  }

  list(): Persona[] {
    return Array.from(this.personas.values())
  }

  names(): string[] {
    return this.list().map(p => p.name)
  }

  get size(): number {
    return this.personas.size
  }

  /** Configured default when it exists, otherwise the first persona */
  initial(preferred: string): Persona {
    const match = this.get(preferred)
    if (match) return match
    const first = this.list()[0] ?? FALLBACK_PERSONA
    this.logger.warn(`Persona '${preferred}' not found, using '${first.name}'`)
    return first
  }

  systemPrompt(persona: Persona): string {
    return persona.systemPromptTemplate
      .replace(/\{name\}/g, persona.name)
      .replace(/\{language\}/g, this.language)
  }
}
