/**
 * Stylizer - rephrases a base reply in the active persona's voice
 *
 * Falls back to the base reply whenever the gateway has nothing usable.
 */

import type { Logger } from '../logger'
import type { ReasoningService } from '@/types/dialogue'
import { isGatewaySentinel } from './reasoning-gateway'

export function composeStylingPrompt(instruction: string, baseReply: string, originalQuery?: string): string {
  const parts = [instruction]
  if (originalQuery) {
    parts.push(`User's original query: "${originalQuery}"`)
  }
  parts.push(`The system has generated the following CORE information to be stylized: "${baseReply}"`)
  parts.push('Rephrase or style this core information according to your persona and tone. The final response will be spoken by a physical robot; keep it conversational and slightly concise.')
  return parts.join('\n\n')
}

export async function stylize(
  gateway: ReasoningService,
  logger: Logger,
  instruction: string,
  baseReply: string,
  originalQuery?: string,
): Promise<string> {
  if (!baseReply.trim()) return baseReply

  let styled: string
  try {
    styled = await gateway.getResponse(instruction, composeStylingPrompt(instruction, baseReply, originalQuery))
  } catch (err) {
    logger.warn('Styling failed, using base reply:', err)
    return baseReply
  }

  if (isGatewaySentinel(styled)) {
    logger.warn('Reasoning unavailable for styling, using base reply')
    return baseReply
  }
  logger.debug(`Styled reply received (length: ${styled.length})`)
  return styled
}
