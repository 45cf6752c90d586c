import * as os from 'os'
import * as path from 'path'
import { isLogLevel, logger, type LogLevel } from './utils/logger'

export const DEFAULT_RECORDING_FILENAME = 'recording.json'
export const RECORDINGS_FOLDER_NAME = 'Input Recordings'

export interface RecorderConfig {
  recordingsDirectory: string
  recordingFilename: string
  logLevel: LogLevel
}

type Env = Record<string, string | undefined>

export function getRecordingsDirectory(env: Env = process.env): string {
  const override = env.INPUT_RECORDER_DIR?.trim()
  if (override) {
    return path.resolve(override)
  }
  return path.join(os.homedir(), 'Documents', RECORDINGS_FOLDER_NAME)
}

export function getRecordingFilename(env: Env = process.env): string {
  return env.INPUT_RECORDER_FILENAME?.trim() || DEFAULT_RECORDING_FILENAME
}

export function getLogLevel(env: Env = process.env): LogLevel {
  const requested = env.INPUT_RECORDER_LOG_LEVEL?.trim().toLowerCase()
  if (requested && isLogLevel(requested)) {
    return requested
  }
  return env.NODE_ENV === 'development' ? 'debug' : 'info'
}

export function loadConfig(env: Env = process.env): RecorderConfig {
  return {
    recordingsDirectory: getRecordingsDirectory(env),
    recordingFilename: getRecordingFilename(env),
    logLevel: getLogLevel(env)
  }
}

/**
 * Reads the environment once and points the shared logger at the configured level.
 */
export function applyConfig(env: Env = process.env): RecorderConfig {
  const config = loadConfig(env)
  logger.configure({ minLevel: config.logLevel })
  return config
}
