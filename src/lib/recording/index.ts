/**
 * Recording System
 * Recorder lifecycle, action store and stop-gesture trimming
 */

export { Recorder } from './recorder'
export type { RecorderOptions, StartSummary, StopSummary } from './recorder'
export { createRecorderStore } from './recorder-store'
export type { Clock, RecorderState, RecorderStore } from './recorder-store'
export {
  DEFAULT_STOP_GESTURE_LENGTH,
  isKeyAction,
  keepAllActions,
  trimTrailingActions,
  trimTrailingWhile
} from './trim-policies'
export type { TrimPolicy } from './trim-policies'
