import { createStore, type StoreApi } from 'zustand/vanilla'
import type { ActionInput, RecordedAction, RecorderStatus, SessionMode } from '../../types/recording'
import type { TrimPolicy } from './trim-policies'

/** Milliseconds, wall clock */
export type Clock = () => number

export interface RecorderState {
  status: RecorderStatus
  sessionStartedAt: number | null
  // Seconds added to every timestamp of the session (non-zero only when appending to a previous log)
  timeOffset: number
  lastTimestamp: number
  actions: RecordedAction[]
  actionCount: number
}

export interface RecorderStore extends RecorderState {
  /** @returns false when a session is already running */
  beginSession: (mode: SessionMode) => boolean
  /** Timestamp and append in one transaction. No-op unless recording. */
  appendAction: (input: ActionInput) => RecordedAction | null
  /** Trim and return to idle in one transaction. @returns null when no session was running */
  endSession: (trim: TrimPolicy) => { removed: number } | null
  /** Abandon a session that failed to start, keeping whatever the log held before it */
  abortSession: () => void
  clearActions: () => boolean
}

const initialState: RecorderState = {
  status: 'idle',
  sessionStartedAt: null,
  timeOffset: 0,
  lastTimestamp: 0,
  actions: [],
  actionCount: 0
}

export function createRecorderStore(clock: Clock = Date.now): StoreApi<RecorderStore> {
  return createStore<RecorderStore>((set, get) => {
    let previous: Pick<RecorderState, 'actions' | 'lastTimestamp' | 'actionCount'> | null = null

    return {
      ...initialState,

      beginSession: (mode) => {
        const state = get()
        if (state.status === 'recording') return false

        previous = { actions: state.actions, lastTimestamp: state.lastTimestamp, actionCount: state.actionCount }
        const fresh = mode === 'fresh'
        set({
          status: 'recording',
          sessionStartedAt: clock(),
          timeOffset: fresh ? 0 : state.lastTimestamp,
          lastTimestamp: fresh ? 0 : state.lastTimestamp,
          actions: fresh ? [] : state.actions,
          actionCount: fresh ? 0 : state.actionCount
        })
        return true
      },

      appendAction: (input) => {
        const state = get()
        if (state.status !== 'recording' || state.sessionStartedAt === null) return null

        const elapsed = (clock() - state.sessionStartedAt) / 1000 + state.timeOffset
        // Never step back when the wall clock does
        const timestamp = Math.max(elapsed, state.lastTimestamp)
        const action: RecordedAction = Object.freeze({ timestamp, ...input })

        const actions = [...state.actions, action]
        set({ actions, lastTimestamp: timestamp, actionCount: actions.length })
        return action
      },

      endSession: (trim) => {
        const state = get()
        if (state.status !== 'recording') return null

        const kept = Array.from(trim(state.actions))
        const last = kept[kept.length - 1]
        set({
          status: 'idle',
          actions: kept,
          actionCount: kept.length,
          lastTimestamp: last ? last.timestamp : 0
        })
        previous = null
        return { removed: state.actions.length - kept.length }
      },

      abortSession: () => {
        if (get().status !== 'recording') return
        set({
          status: 'idle',
          sessionStartedAt: null,
          timeOffset: 0,
          ...(previous ?? { actions: [], lastTimestamp: 0, actionCount: 0 })
        })
        previous = null
      },

      clearActions: () => {
        if (get().status === 'recording') return false
        set({ actions: [], actionCount: 0, lastTimestamp: 0 })
        return true
      }
    }
  })
}
