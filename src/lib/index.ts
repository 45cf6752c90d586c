/**
 * Input Recorder - Core Library
 */

// Recording System
export * from './recording'

// Input sources
export { KeyboardInputSource } from './input/keyboard-source'
export type { KeyboardSourceOptions, KeyResolver } from './input/keyboard-source'
export { PointerInputSource, getButtonName, getScrollDelta } from './input/pointer-source'
export { UiohookManager, uiohookManager } from './input/uiohook-manager'
export type { HookLoader } from './input/uiohook-manager'
export type * from './input/types'
export { getKeyFromCode, getPrintableCharFromKey, resolveKeyIdentifier } from './keyboard/keyboard-utils'

// Storage
export { exportRecording, parseRecording, readRecording, serializeRecording } from './storage/recording-io'
export type { ExportOptions, ExportSummary } from './storage/recording-io'
export { recordingFileSchema, recordedActionSchema } from './storage/recording-schema'

// Core
export { RecordingError, RecordingErrorCode } from './core/errors'
export type { RecorderResult } from './core/errors'
export { applyConfig, loadConfig } from './config'
export type { RecorderConfig } from './config'
export { logger, Logger } from './utils/logger'
export type { LogLevel, LogSink } from './utils/logger'

export type * from '../types/recording'
