/**
 * Recorded input event type definitions
 */

export type ActionType =
  | 'mouse_button_down'
  | 'mouse_button_up'
  | 'mouse_scroll'
  | 'key_press'
  | 'key_release'

export interface ScreenLocation {
  x: number
  y: number
}

export interface MouseButtonDetails {
  location: ScreenLocation
  button: string
}

export interface MouseScrollDetails {
  location: ScreenLocation
  scroll_delta: {
    dx: number
    dy: number
  }
}

export interface KeyDetails {
  key: string
}

export interface ActionDetailsMap {
  mouse_button_down: MouseButtonDetails
  mouse_button_up: MouseButtonDetails
  mouse_scroll: MouseScrollDetails
  key_press: KeyDetails
  key_release: KeyDetails
}

/**
 * One captured input. `timestamp` is in seconds since the session started.
 */
export type RecordedAction = {
  [T in ActionType]: {
    readonly timestamp: number
    readonly type: T
    readonly details: Readonly<ActionDetailsMap[T]>
  }
}[ActionType]

/**
 * An action before it is timestamped, as handed over by an input source.
 */
export type ActionInput = {
  [T in ActionType]: {
    type: T
    details: ActionDetailsMap[T]
  }
}[ActionType]

export type RecorderStatus = 'idle' | 'recording'

/**
 * What `start()` does with the log of a previous session.
 * - fresh: every session begins with an empty log
 * - append: actions keep accumulating, timestamps continue after the previous last entry
 */
export type SessionMode = 'fresh' | 'append'
