/**
 * Recorder - captures global pointer and keyboard input into an ordered, timestamped action log.
 *
 * Lifecycle: idle --start()--> recording --stop()--> idle. Both transitions are idempotent.
 * Input sources push actions through `record()`, which checks the state and appends in a
 * single store transaction, so actions arriving after `stop()` are dropped.
 */

import type { StoreApi } from 'zustand/vanilla'
import { ResourceManager } from '../core/resource-manager'
import { RecordingError, RecordingErrorCode, errorMessage, fail, ok, type RecorderResult } from '../core/errors'
import { KeyboardInputSource } from '../input/keyboard-source'
import { PointerInputSource } from '../input/pointer-source'
import type { InputSource } from '../input/types'
import { exportRecording, type ExportOptions, type ExportSummary } from '../storage/recording-io'
import { logger as rootLogger } from '../utils/logger'
import type { ActionInput, RecordedAction, RecorderStatus, SessionMode } from '../../types/recording'
import { createRecorderStore, type Clock, type RecorderStore } from './recorder-store'
import { keepAllActions, trimTrailingActions, type TrimPolicy } from './trim-policies'

const logger = rootLogger.scope('Recorder')

export interface RecorderOptions {
  /** Defaults to the pointer and keyboard sources on the shared uiohook instance */
  sources?: InputSource[]
  /**
   * Removes the stop gesture from the end of the log when a session stops.
   * `false` keeps every action. Defaults to dropping the last two actions.
   */
  trimOnStop?: TrimPolicy | false
  sessionMode?: SessionMode
  clock?: Clock
  /** Defaults used by `export()` when the call does not name a directory or filename */
  exportDefaults?: ExportOptions
}

export interface StartSummary {
  alreadyRecording: boolean
  sources: string[]
}

export interface StopSummary {
  wasRecording: boolean
  removed: number
  actionCount: number
}

export class Recorder {
  private readonly store: StoreApi<RecorderStore>
  private readonly subscriptions = new ResourceManager()
  private readonly sources: InputSource[]
  private readonly trimPolicy: TrimPolicy
  private readonly sessionMode: SessionMode
  private readonly exportDefaults: ExportOptions

  constructor(options: RecorderOptions = {}) {
    this.sources = options.sources ?? [new PointerInputSource(), new KeyboardInputSource()]
    this.trimPolicy = options.trimOnStop === false ? keepAllActions : options.trimOnStop ?? trimTrailingActions()
    this.sessionMode = options.sessionMode ?? 'fresh'
    this.exportDefaults = options.exportDefaults ?? {}
    this.store = createRecorderStore(options.clock)
  }

  start(): RecorderResult<StartSummary> {
    const sourceNames = this.sources.map(source => source.name)
    if (!this.store.getState().beginSession(this.sessionMode)) {
      logger.debug('start() ignored, already recording')
      return ok({ alreadyRecording: true, sources: sourceNames })
    }

    const sink = (input: ActionInput) => this.record(input)
    for (const source of this.sources) {
      try {
        this.subscribeSource(source, sink)
      } catch (error) {
        const failures = this.subscriptions.releaseAll()
        failures.forEach(({ identifier, error: stopError }) => {
          logger.error(`Failed to stop ${identifier} capture during rollback:`, stopError)
        })
        this.store.getState().abortSession()
        const message = `Failed to start ${source.name} capture: ${errorMessage(error)}`
        logger.error(message)
        return fail(new RecordingError(message, RecordingErrorCode.SOURCE_START_FAILED, error))
      }
    }

    logger.info(`Recording started (${sourceNames.join(', ')})`)
    return ok({ alreadyRecording: false, sources: sourceNames })
  }

  private subscribeSource(source: InputSource, sink: (input: ActionInput) => unknown): void {
    const subscription = source.subscribe(sink)
    try {
      this.subscriptions.register(source.name, () => subscription.stop())
    } catch (error) {
      subscription.stop()
      throw error
    }
  }

  /**
   * Appends an action stamped with the time elapsed since the session started.
   * @returns The recorded action, or null when not recording
   */
  record(input: ActionInput): RecordedAction | null {
    return this.store.getState().appendAction(input)
  }

  stop(): RecorderResult<StopSummary> {
    if (this.store.getState().status !== 'recording') {
      logger.debug('stop() ignored, not recording')
      return ok({ wasRecording: false, removed: 0, actionCount: this.getLog().length })
    }

    const failures = this.subscriptions.releaseAll()
    const ended = this.store.getState().endSession(this.trimPolicy)
    const removed = ended ? ended.removed : 0
    const actionCount = this.getLog().length

    if (removed > 0) {
      logger.debug(`Trimmed ${removed} trailing action(s) as stop gesture`)
    }

    if (failures.length > 0) {
      logger.info(`Recording stopped with ${actionCount} action(s) (${removed} trimmed)`)
      const details = failures.map(({ identifier, error }) => `${identifier}: ${errorMessage(error)}`).join('; ')
      const message = `Recording stopped with errors (${details})`
      logger.error(message)
      return fail(new RecordingError(message, RecordingErrorCode.SOURCE_STOP_FAILED))
    }

    logger.info(`Recording stopped with ${actionCount} action(s)`)
    return ok({ wasRecording: true, removed, actionCount })
  }

  /**
   * Writes the log to `directory/filename` as an indented JSON array.
   * Refused while recording. Never throws; the outcome is in the result.
   */
  async export(options: ExportOptions = {}): Promise<RecorderResult<ExportSummary>> {
    if (this.isRecording()) {
      const message = 'Cannot export while recording; stop the recording first'
      logger.warn(message)
      return fail(new RecordingError(message, RecordingErrorCode.RECORDING_ACTIVE))
    }
    return exportRecording(this.getLog(), {
      directory: options.directory ?? this.exportDefaults.directory,
      filename: options.filename ?? this.exportDefaults.filename
    })
  }

  /**
   * The current log. Every change produces a new array; a returned array is never modified.
   */
  getLog(): ReadonlyArray<RecordedAction> {
    return this.store.getState().actions
  }

  /**
   * Empties the log. Ignored while recording.
   */
  clear(): boolean {
    const cleared = this.store.getState().clearActions()
    if (!cleared) {
      logger.warn('clear() ignored while recording')
    }
    return cleared
  }

  getStatus(): RecorderStatus {
    return this.store.getState().status
  }

  isRecording(): boolean {
    return this.getStatus() === 'recording'
  }

  getActiveSources(): string[] {
    return this.subscriptions.getIdentifiers()
  }

  /**
   * Notified after every state change (status, appended action, trim).
   */
  subscribe(listener: (state: RecorderStore, previous: RecorderStore) => void): () => void {
    return this.store.subscribe(listener)
  }
}
