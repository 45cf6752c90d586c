/**
 * Reading and writing recording files: a UTF-8 JSON array of `{ timestamp, type, details }`.
 */

import { constants as fsConstants, promises as fs } from 'fs'
import * as path from 'path'
import { getRecordingFilename, getRecordingsDirectory } from '../config'
import { RecordingError, RecordingErrorCode, errorMessage, fail, ok, type RecorderResult } from '../core/errors'
import { logger as rootLogger } from '../utils/logger'
import type { RecordedAction } from '../../types/recording'
import { recordingFileSchema } from './recording-schema'

const logger = rootLogger.scope('RecordingIO')

export interface ExportOptions {
  /** Created when missing. Defaults to the configured recordings directory. */
  directory?: string
  /** A bare file name. Defaults to the configured recording filename. */
  filename?: string
}

export interface ExportSummary {
  path: string
  actionCount: number
}

const PERMISSION_CODES = new Set(['EACCES', 'EPERM', 'EROFS'])
// EEXIST comes from a recursive mkdir that runs into a file
const INVALID_PATH_CODES = new Set(['ENOENT', 'ENOTDIR', 'EEXIST', 'EISDIR', 'EINVAL', 'ENAMETOOLONG', 'ELOOP'])

function getErrnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code
  }
  return undefined
}

/**
 * Maps a filesystem failure to the error reported to the caller.
 */
export function toFileSystemError(error: unknown, target: string, operation: 'read' | 'write' = 'write'): RecordingError {
  const code = getErrnoCode(error)
  const reason = errorMessage(error)
  if (code && PERMISSION_CODES.has(code)) {
    return new RecordingError(`Permission error: cannot ${operation} ${target} (${reason})`, RecordingErrorCode.PERMISSION_DENIED, error)
  }
  if (code && INVALID_PATH_CODES.has(code)) {
    return new RecordingError(`Invalid path: ${target} (${reason})`, RecordingErrorCode.INVALID_PATH, error)
  }
  if (code) {
    return new RecordingError(`Failed to ${operation} file ${target}: ${reason}`, RecordingErrorCode.IO_FAILURE, error)
  }
  return new RecordingError(`An unexpected error occurred with ${target}: ${reason}`, RecordingErrorCode.UNKNOWN_ERROR, error)
}

function resolveTarget(options: ExportOptions): { directory: string; filename: string } {
  const directory = options.directory ?? getRecordingsDirectory()
  const filename = options.filename ?? getRecordingFilename()

  if (!directory.trim()) {
    throw new RecordingError('Invalid path: export directory is empty', RecordingErrorCode.INVALID_PATH)
  }
  if (!filename.trim() || path.basename(filename) !== filename || filename === '.' || filename === '..') {
    throw new RecordingError(`Invalid path: "${filename}" is not a file name`, RecordingErrorCode.INVALID_PATH)
  }
  return { directory: path.resolve(directory), filename }
}

export function serializeRecording(actions: ReadonlyArray<RecordedAction>): string {
  try {
    return `${JSON.stringify(actions, null, 2)}\n`
  } catch (error) {
    throw new RecordingError(
      `Error during serialization of the action log to JSON: ${errorMessage(error)}`,
      RecordingErrorCode.SERIALIZATION_FAILED,
      error
    )
  }
}

/**
 * Writes `actions` to `directory/filename`, creating the directory when needed.
 * Never throws: every failure is logged and returned with its own error code.
 */
export async function exportRecording(
  actions: ReadonlyArray<RecordedAction>,
  options: ExportOptions = {}
): Promise<RecorderResult<ExportSummary>> {
  let target: { directory: string; filename: string }
  let content: string
  try {
    target = resolveTarget(options)
    content = serializeRecording(actions)
  } catch (error) {
    const failure = error instanceof RecordingError
      ? error
      : new RecordingError(`An unexpected error occurred: ${errorMessage(error)}`, RecordingErrorCode.UNKNOWN_ERROR, error)
    logger.error(failure.message)
    return fail(failure)
  }

  const { directory, filename } = target
  const fullPath = path.join(directory, filename)

  try {
    await fs.mkdir(directory, { recursive: true })
  } catch (error) {
    const failure = toFileSystemError(error, directory)
    logger.error(failure.message)
    return fail(failure)
  }

  try {
    await fs.access(directory, fsConstants.W_OK)
  } catch (error) {
    const failure = getErrnoCode(error) === 'ENOENT'
      ? toFileSystemError(error, directory)
      : new RecordingError(`Permission error: cannot write to directory ${directory}`, RecordingErrorCode.PERMISSION_DENIED, error)
    logger.error(failure.message)
    return fail(failure)
  }

  try {
    await fs.writeFile(fullPath, content, 'utf8')
  } catch (error) {
    const failure = toFileSystemError(error, fullPath)
    logger.error(failure.message)
    return fail(failure)
  }

  logger.info(`Saved ${actions.length} action(s) to ${fullPath}`)
  return ok({ path: fullPath, actionCount: actions.length })
}

/**
 * Parses the contents of a recording file.
 * @throws RecordingError with INVALID_RECORDING when the text is not a valid recording
 */
export function parseRecording(text: string): RecordedAction[] {
  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (error) {
    throw new RecordingError(`Recording is not valid JSON: ${errorMessage(error)}`, RecordingErrorCode.INVALID_RECORDING, error)
  }

  const parsed = recordingFileSchema.safeParse(raw)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : ''
    throw new RecordingError(
      `Recording does not match the expected format${where}: ${issue ? issue.message : 'unknown issue'}`,
      RecordingErrorCode.INVALID_RECORDING,
      parsed.error
    )
  }
  return parsed.data
}

export async function readRecording(filePath: string): Promise<RecordedAction[]> {
  let text: string
  try {
    text = await fs.readFile(filePath, 'utf8')
  } catch (error) {
    throw toFileSystemError(error, filePath, 'read')
  }
  return parseRecording(text)
}
