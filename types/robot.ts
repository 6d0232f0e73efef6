/**
 * Robot hardware link types
 *
 * The hardware link is the robot's control surface: speech synthesis,
 * posture motion, and an event memory that publishes sensor values.
 * Each service mirrors one blocking primitive of the robot SDK, exposed
 * here as a promise so callers never stall the event loop.
 */

export type ConnectionState = 'disconnected' | 'connecting' | 'connected'

export interface HardwareAddress {
  host: string
  port: number
}

export interface TextToSpeechService {
  say(text: string): Promise<void>
}

export interface MotionService {
  goToPosture(posture: string, speed: number): Promise<void>
}

export interface MemoryService {
  getData(key: string): Promise<unknown>
}

export interface HardwareSession {
  readonly tts: TextToSpeechService
  readonly motion: MotionService
  readonly memory: MemoryService
  isConnected(): boolean
  close(): Promise<void>
}

export interface HardwareLink {
  readonly kind: 'mock' | 'websocket'
  open(address: HardwareAddress): Promise<HardwareSession>
}

// ---------------------------------------------------------------------------
// Sensor events
// ---------------------------------------------------------------------------

export const SENSOR_EVENTS = {
  wordRecognized: 'WordRecognized',
  ttsDone: 'ALTextToSpeech/TextDone',
  touchChanged: 'TouchChanged',
  frontTactil: 'FrontTactilTouched',
  middleTactil: 'MiddleTactilTouched',
  rearTactil: 'RearTactilTouched',
} as const

export const MONITORED_EVENTS: readonly string[] = [
  SENSOR_EVENTS.wordRecognized,
  SENSOR_EVENTS.ttsDone,
  SENSOR_EVENTS.touchChanged,
  SENSOR_EVENTS.frontTactil,
  SENSOR_EVENTS.middleTactil,
  SENSOR_EVENTS.rearTactil,
]

// Touch keys report 1 while pressed, the speech engine writes 1 when an utterance finishes
export const TOUCH_ACTIVE_VALUE = 1
export const TTS_DONE_VALUE = 1

export interface SensorEvent {
  eventName: string
  value: unknown      // scalar, small list, or [text, confidence]
  timestamp: number   // monotonic ms (performance.now)
}

export type SensorCallback = (event: SensorEvent) => void | Promise<void>
