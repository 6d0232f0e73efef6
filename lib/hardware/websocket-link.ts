/**
 * WebSocket Hardware Link - talks to a robot bridge over ws://host:port
 *
 * Each SDK call becomes one JSON request `{ id, service, method, args }`
 * answered by `{ id, result }` or `{ id, error }`. Requests still pending
 * when the socket closes are rejected with HardwareLinkError.
 */

import WebSocket from 'ws'
import { v4 as uuidv4 } from 'uuid'
import { HardwareLinkError } from '../errors'
import type { Logger } from '../logger'
import type {
  HardwareAddress,
  HardwareLink,
  HardwareSession,
  MemoryService,
  MotionService,
  TextToSpeechService,
} from '@/types/robot'

interface WebSocketLinkOptions {
  connectTimeoutMs?: number  // default: 5000
  requestTimeoutMs?: number  // default: 30000 (speech can take a while)
}

export interface BridgeRequest {
  id: string
  service: string
  method: string
  args: unknown[]
}

interface BridgeReply {
  id: string
  result?: unknown
  error?: string | null
}

interface PendingRequest {
  resolve: (value: unknown) => void
  reject: (err: Error) => void
  timer: ReturnType<typeof setTimeout>
}

function isBridgeReply(value: unknown): value is BridgeReply {
  if (typeof value !== 'object' || value === null) return false
  if (!('id' in value) || typeof value.id !== 'string') return false
  return !('error' in value) || value.error == null || typeof value.error === 'string'
}

function rawDataToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf-8')
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf-8')
  return Buffer.from(data).toString('utf-8')
}

class WebSocketSession implements HardwareSession {
  private pending = new Map<string, PendingRequest>()

  readonly tts: TextToSpeechService
  readonly motion: MotionService
  readonly memory: MemoryService

  constructor(
    private socket: WebSocket,
    private logger: Logger,
    private requestTimeoutMs: number,
  ) {
    socket.on('message', (data) => this.handleMessage(data))
    socket.on('close', (code) => {
      this.logger.warn(`Bridge socket closed (code ${code})`)
      this.rejectAll(new HardwareLinkError('Robot bridge connection closed'))
    })
    socket.on('error', (err) => {
      this.logger.error('Bridge socket error:', err)
    })

    this.tts = {
      say: async (text) => {
        await this.call('ALTextToSpeech', 'say', [text])
      },
    }
    this.motion = {
      goToPosture: async (posture, speed) => {
        await this.call('ALMotion', 'goToPosture', [posture, speed])
      },
    }
    this.memory = {
      getData: (key) => this.call('ALMemory', 'getData', [key]),
    }
  }

  isConnected(): boolean {
    return this.socket.readyState === WebSocket.OPEN
  }

  call(service: string, method: string, args: unknown[]): Promise<unknown> {
    if (!this.isConnected()) {
      return Promise.reject(new HardwareLinkError(`${service}.${method} failed: bridge not connected`))
    }

    const request: BridgeRequest = { id: uuidv4(), service, method, args }
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(request.id)
        reject(new HardwareLinkError(`${service}.${method} timed out after ${this.requestTimeoutMs}ms`))
      }, this.requestTimeoutMs)

      this.pending.set(request.id, { resolve, reject, timer })
      this.socket.send(JSON.stringify(request), (err) => {
        if (!err) return
        const entry = this.pending.get(request.id)
        if (!entry) return
        clearTimeout(entry.timer)
        this.pending.delete(request.id)
        entry.reject(new HardwareLinkError(`${service}.${method} could not be sent`, { cause: err }))
      })
    })
  }

  close(): Promise<void> {
    if (this.socket.readyState === WebSocket.CLOSED) return Promise.resolve()
    return new Promise(resolve => {
      this.socket.once('close', () => resolve())
      this.socket.close(1000, 'client disconnect')
    })
  }

  private handleMessage(data: WebSocket.RawData): void {
    let reply: unknown
    try {
      reply = JSON.parse(rawDataToString(data))
    } catch {
      this.logger.warn('Ignoring malformed bridge message')
      return
    }
    if (!isBridgeReply(reply)) {
      this.logger.warn('Ignoring bridge message without a request id')
      return
    }

    const entry = this.pending.get(reply.id)
    if (!entry) {
      this.logger.debug(`Reply for unknown or expired request ${reply.id}`)
      return
    }
    clearTimeout(entry.timer)
    this.pending.delete(reply.id)

    if (typeof reply.error === 'string') {
      entry.reject(new HardwareLinkError(reply.error))
    } else {
      entry.resolve(reply.result ?? null)
    }
  }

  private rejectAll(err: Error): void {
    for (const entry of this.pending.values()) {
      clearTimeout(entry.timer)
      entry.reject(err)
    }
    this.pending.clear()
  }
}

export class WebSocketHardwareLink implements HardwareLink {
  readonly kind = 'websocket' as const

  private connectTimeoutMs: number
  private requestTimeoutMs: number

  constructor(private logger: Logger, options: WebSocketLinkOptions = {}) {
    this.connectTimeoutMs = options.connectTimeoutMs ?? 5000
    this.requestTimeoutMs = options.requestTimeoutMs ?? 30000
  }

  open(address: HardwareAddress): Promise<HardwareSession> {
    const url = `ws://${address.host}:${address.port}`

    return new Promise((resolve, reject) => {
      const socket = new WebSocket(url, { handshakeTimeout: this.connectTimeoutMs })

      const onError = (err: Error) => {
        socket.removeListener('open', onOpen)
        reject(new HardwareLinkError(`Could not reach robot bridge at ${url}`, { cause: err }))
      }
      const onOpen = () => {
        socket.removeListener('error', onError)
        this.logger.info(`Bridge socket open at ${url}`)
        resolve(new WebSocketSession(socket, this.logger, this.requestTimeoutMs))
      }

      socket.once('error', onError)
      socket.once('open', onOpen)
    })
  }
}
