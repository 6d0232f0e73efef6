/**
 * Reasoning Gateway - stateless call to the remote language model
 *
 * Never throws. Every failure maps to one of three fixed sentinel strings,
 * which callers must treat as "no usable answer" rather than as text to
 * speak verbatim.
 */

import Anthropic from '@anthropic-ai/sdk'
import type { Logger } from '../logger'
import type { ReasoningService } from '@/types/dialogue'

export const GATEWAY_SENTINELS = {
  disconnected: 'I am currently disconnected from the external AI services.',
  empty: 'The external AI response was empty or filtered.',
  failure: 'I am experiencing technical difficulties reaching the external AI brain.',
} as const

export type GatewaySentinel = typeof GATEWAY_SENTINELS[keyof typeof GATEWAY_SENTINELS]

const SENTINEL_VALUES: readonly string[] = Object.values(GATEWAY_SENTINELS)

export function isGatewaySentinel(text: string): boolean {
  return SENTINEL_VALUES.includes(text)
}

// -- Backend ---------------------------------------------------------------

export interface CompletionParams {
  model: string
  max_tokens: number
  messages: Array<{ role: 'user'; content: string }>
}

export interface CompletionResult {
  content: Array<{ type: string; text?: string }>
}

/** The slice of the Anthropic client the gateway uses */
export interface ReasoningBackend {
  createMessage(params: CompletionParams): Promise<CompletionResult>
}

export function createAnthropicBackend(apiKey: string): ReasoningBackend {
  const client = new Anthropic({ apiKey })
  return {
    createMessage: (params) => client.messages.create(params),
  }
}

// -- Gateway ---------------------------------------------------------------

export interface ReasoningGatewayConfig {
  backend: ReasoningBackend | null
  model: string
  maxTokens: number
  logger: Logger
}

export function composePrompt(systemInstruction: string, userQuery: string): string {
  return `${systemInstruction}\n\nUser: ${userQuery}\n\nAssistant:`
}

export class ReasoningGateway implements ReasoningService {
  private backend: ReasoningBackend | null
  private model: string
  private maxTokens: number
  private logger: Logger

  private calls = 0
  private failures = 0

  constructor(config: ReasoningGatewayConfig) {
    this.backend = config.backend
    this.model = config.model
    this.maxTokens = config.maxTokens
    this.logger = config.logger

    if (this.backend) {
      this.logger.info(`Reasoning backend configured with model '${this.model}'`)
    } else {
      this.logger.warn('No ANTHROPIC_API_KEY, external reasoning disabled')
    }
  }

  isAvailable(): boolean {
    return this.backend !== null
  }

  async getResponse(systemInstruction: string, userQuery: string): Promise<string> {
    const backend = this.backend
    if (!backend) return GATEWAY_SENTINELS.disconnected

    this.calls++
    try {
      const response = await backend.createMessage({
        model: this.model,
        max_tokens: this.maxTokens,
        messages: [{
          role: 'user',
          content: composePrompt(systemInstruction, userQuery),
        }],
      })

      const first = response.content[0]
      const text = first?.type === 'text' ? first.text?.trim() : undefined
      if (!text) {
        this.logger.warn(`Empty or filtered response for query: ${userQuery.substring(0, 50)}...`)
        return GATEWAY_SENTINELS.empty
      }
      return text
    } catch (err) {
      this.failures++
      this.logger.error('Reasoning call failed:', err)
      return GATEWAY_SENTINELS.failure
    }
  }

  getStatus(): { available: boolean; model: string; calls: number; failures: number } {
    return {
      available: this.isAvailable(),
      model: this.model,
      calls: this.calls,
      failures: this.failures,
    }
  }
}
