#!/usr/bin/env node
/**
 * Records global input until Ctrl+C, then writes the log to the configured recordings directory.
 */

import { applyConfig } from './lib/config'
import { Recorder } from './lib/recording/recorder'
import { logger } from './lib/utils/logger'

function main(): void {
  const config = applyConfig()
  const recorder = new Recorder({
    exportDefaults: {
      directory: config.recordingsDirectory,
      filename: config.recordingFilename
    }
  })

  const started = recorder.start()
  if (!started.success) {
    logger.error(started.error)
    process.exitCode = 1
    return
  }

  logger.info('Recording started... Press Ctrl+C to stop.')
  // Hook callbacks alone do not keep the event loop alive on every platform
  const keepAlive = setInterval(() => undefined, 1000)

  let stopping = false
  const shutdown = async (): Promise<void> => {
    if (stopping) return
    stopping = true
    clearInterval(keepAlive)

    const stopped = recorder.stop()
    if (!stopped.success) {
      process.exitCode = 1
    }

    const exported = await recorder.export()
    if (!exported.success) {
      process.exitCode = 1
      return
    }
    logger.info(`Recording stopped. ${exported.data.actionCount} action(s) saved to ${exported.data.path}`)
  }

  process.once('SIGINT', () => {
    shutdown().catch((error: unknown) => {
      logger.error('Failed to finish recording:', error)
      process.exitCode = 1
    })
  })
}

main()
