/**
 * Entry point - load settings, start the runtime, stop it on SIGINT/SIGTERM
 */

import { errorMessage } from '@/lib/errors'
import { createLogger } from '@/lib/logger'
import { RobotRuntime } from '@/lib/robot-runtime'
import { loadSettings, type Settings } from '@/lib/settings'

async function main(): Promise<void> {
  let settings: Settings
  try {
    settings = loadSettings()
  } catch (err) {
    console.error(`[Runtime] Invalid configuration: ${errorMessage(err)}`)
    process.exit(1)
  }

  const logger = createLogger('Runtime', settings.logLevel)
  const runtime = new RobotRuntime({ settings, logger })

  try {
    await runtime.start()
  } catch (err) {
    logger.error('Startup failed, shutting down:', err)
    process.exit(1)
  }

  let shuttingDown = false
  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) return
    shuttingDown = true
    logger.info(`Signal ${signal} received. Initiating graceful shutdown...`)
    runtime.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error('Error during shutdown:', err)
        process.exit(1)
      },
    )
  }

  process.on('SIGINT', shutdown)
  process.on('SIGTERM', shutdown)
}

main().catch(err => {
  console.error('[Runtime] Fatal error:', err)
  process.exit(1)
})
