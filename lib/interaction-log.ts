/**
 * Interaction Log - append-only record of every completed turn
 *
 *   2025-03-14T15:05:00.000Z | User: what time is it
 *   2025-03-14T15:05:00.000Z | GENESIS: It's 3:05 PM.
 *   <blank line>
 */

import fs from 'fs/promises'
import path from 'path'
import type { Logger } from './logger'
import type { InteractionRecorder } from '@/types/dialogue'

export function formatInteraction(userText: string, reply: string, at: Date = new Date()): string {
  const ts = at.toISOString()
  return `${ts} | User: ${userText}\n${ts} | GENESIS: ${reply}\n\n`
}

export class InteractionLog implements InteractionRecorder {
  constructor(
    private filePath: string,
    private logger: Logger,
    private clock: () => Date = () => new Date(),
  ) {}

  get path(): string {
    return this.filePath
  }

  /** Never rejects; a failed write is logged and dropped */
  async append(userText: string, reply: string): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true })
      await fs.appendFile(this.filePath, formatInteraction(userText, reply, this.clock()), 'utf-8')
    } catch (err) {
      this.logger.error(`Error logging interaction to file '${this.filePath}':`, err)
    }
  }
}
