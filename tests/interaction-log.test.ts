/**
 * Interaction Log Tests
 */

import fs from 'fs'
import os from 'os'
import path from 'path'
import { describe, it, expect, afterEach } from 'vitest'
import { InteractionLog, formatInteraction } from '@/lib/interaction-log'
import { createLoggerMock } from './test-utils/service-mocks'

const AT = new Date('2025-03-14T15:05:00.000Z')

const tmpDirs: string[] = []

afterEach(() => {
  for (const dir of tmpDirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true })
})

describe('formatInteraction', () => {
  it('writes a user line, a reply line and a blank line', () => {
    expect(formatInteraction('what time is it', "It's 3:05 PM.", AT)).toBe(
      "2025-03-14T15:05:00.000Z | User: what time is it\n2025-03-14T15:05:00.000Z | GENESIS: It's 3:05 PM.\n\n",
    )
  })
})

describe('InteractionLog', () => {
  it('appends entries and creates the directory', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'interactions-'))
    tmpDirs.push(dir)
    const filePath = path.join(dir, 'logs', 'interactions.log')
    const log = new InteractionLog(filePath, createLoggerMock(), () => AT)

    await log.append('hello', 'Hi!')
    await log.append('bye', 'Goodbye!')

    expect(fs.readFileSync(filePath, 'utf-8')).toBe(
      formatInteraction('hello', 'Hi!', AT) + formatInteraction('bye', 'Goodbye!', AT),
    )
  })

  it('logs a failed write instead of rejecting', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'interactions-'))
    tmpDirs.push(dir)
    const blocker = path.join(dir, 'not-a-dir')
    fs.writeFileSync(blocker, '')
    const filePath = path.join(blocker, 'interactions.log')
    const logger = createLoggerMock()
    const log = new InteractionLog(filePath, logger, () => AT)

    await expect(log.append('hello', 'Hi!')).resolves.toBeUndefined()
    expect(logger.error).toHaveBeenCalledWith(`Error logging interaction to file '${filePath}':`, expect.any(Error))
  })
})
