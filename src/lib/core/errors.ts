/**
 * Error classes and result shapes shared by the recorder and its storage layer
 */

export enum RecordingErrorCode {
  RECORDING_ACTIVE = 'RECORDING_ACTIVE',
  SOURCE_START_FAILED = 'SOURCE_START_FAILED',
  SOURCE_STOP_FAILED = 'SOURCE_STOP_FAILED',
  HOOK_UNAVAILABLE = 'HOOK_UNAVAILABLE',
  KEY_RESOLUTION_FAILED = 'KEY_RESOLUTION_FAILED',
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  INVALID_PATH = 'INVALID_PATH',
  IO_FAILURE = 'IO_FAILURE',
  SERIALIZATION_FAILED = 'SERIALIZATION_FAILED',
  INVALID_RECORDING = 'INVALID_RECORDING',
  UNKNOWN_ERROR = 'UNKNOWN_ERROR'
}

export class RecordingError extends Error {
  constructor(
    message: string,
    public code: RecordingErrorCode = RecordingErrorCode.UNKNOWN_ERROR,
    public cause?: unknown
  ) {
    super(message)
    this.name = 'RecordingError'
  }
}

export type RecorderResult<T> =
  | { success: true; data: T }
  | { success: false; error: string; code: RecordingErrorCode }

export function ok<T>(data: T): RecorderResult<T> {
  return { success: true, data }
}

export function fail<T>(error: RecordingError): RecorderResult<T> {
  return { success: false, error: error.message, code: error.code }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
