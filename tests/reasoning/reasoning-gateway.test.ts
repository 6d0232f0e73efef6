/**
 * Reasoning Gateway Tests
 *
 * The backend is a vi.fn stand-in for the Anthropic client; nothing
 * leaves the process.
 */

import { describe, it, expect, vi } from 'vitest'
import {
  GATEWAY_SENTINELS,
  ReasoningGateway,
  composePrompt,
  isGatewaySentinel,
  type CompletionResult,
} from '@/lib/reasoning/reasoning-gateway'
import { createLoggerMock } from '../test-utils/service-mocks'

function createBackend(result: CompletionResult | Error) {
  return {
    createMessage: vi.fn(async () => {
      if (result instanceof Error) throw result
      return result
    }),
  }
}

function textResult(text: string): CompletionResult {
  return { content: [{ type: 'text', text }] }
}

describe('composePrompt', () => {
  it('frames the query between the instruction and the assistant cue', () => {
    expect(composePrompt('Be brief.', 'Why is the sky blue?'))
      .toBe('Be brief.\n\nUser: Why is the sky blue?\n\nAssistant:')
  })
})

describe('isGatewaySentinel', () => {
  it('recognizes each sentinel and nothing else', () => {
    expect(isGatewaySentinel(GATEWAY_SENTINELS.disconnected)).toBe(true)
    expect(isGatewaySentinel(GATEWAY_SENTINELS.empty)).toBe(true)
    expect(isGatewaySentinel(GATEWAY_SENTINELS.failure)).toBe(true)
    expect(isGatewaySentinel('The sky scatters blue light.')).toBe(false)
  })
})

describe('ReasoningGateway', () => {
  it('returns the disconnected sentinel without a backend', async () => {
    const logger = createLoggerMock()
    const gateway = new ReasoningGateway({ backend: null, model: 'test-model', maxTokens: 100, logger })

    await expect(gateway.getResponse('sys', 'hi')).resolves.toBe(GATEWAY_SENTINELS.disconnected)
    expect(gateway.isAvailable()).toBe(false)
    expect(logger.warn).toHaveBeenCalledWith('No ANTHROPIC_API_KEY, external reasoning disabled')
  })

  it('sends one user message with the composed prompt', async () => {
    const backend = createBackend(textResult('Rayleigh scattering.'))
    const gateway = new ReasoningGateway({ backend, model: 'test-model', maxTokens: 150, logger: createLoggerMock() })

    await gateway.getResponse('Be brief.', 'Why is the sky blue?')

    expect(backend.createMessage).toHaveBeenCalledWith({
      model: 'test-model',
      max_tokens: 150,
      messages: [{ role: 'user', content: 'Be brief.\n\nUser: Why is the sky blue?\n\nAssistant:' }],
    })
  })

  it('returns the trimmed text of the first block', async () => {
    const backend = createBackend(textResult('  Rayleigh scattering.\n'))
    const gateway = new ReasoningGateway({ backend, model: 'm', maxTokens: 10, logger: createLoggerMock() })

    await expect(gateway.getResponse('sys', 'q')).resolves.toBe('Rayleigh scattering.')
  })

  it('maps blank or non-text replies to the empty sentinel', async () => {
    const blank = new ReasoningGateway({ backend: createBackend(textResult('   ')), model: 'm', maxTokens: 10, logger: createLoggerMock() })
    const noBlocks = new ReasoningGateway({ backend: createBackend({ content: [] }), model: 'm', maxTokens: 10, logger: createLoggerMock() })
    const toolUse = new ReasoningGateway({ backend: createBackend({ content: [{ type: 'tool_use' }] }), model: 'm', maxTokens: 10, logger: createLoggerMock() })

    await expect(blank.getResponse('sys', 'q')).resolves.toBe(GATEWAY_SENTINELS.empty)
    await expect(noBlocks.getResponse('sys', 'q')).resolves.toBe(GATEWAY_SENTINELS.empty)
    await expect(toolUse.getResponse('sys', 'q')).resolves.toBe(GATEWAY_SENTINELS.empty)
  })

  it('maps a thrown error to the failure sentinel and counts it', async () => {
    const logger = createLoggerMock()
    const gateway = new ReasoningGateway({ backend: createBackend(new Error('rate limited')), model: 'm', maxTokens: 10, logger })

    await expect(gateway.getResponse('sys', 'q')).resolves.toBe(GATEWAY_SENTINELS.failure)
    expect(logger.error).toHaveBeenCalledWith('Reasoning call failed:', expect.any(Error))
    expect(gateway.getStatus()).toEqual({ available: true, model: 'm', calls: 1, failures: 1 })
  })
})
