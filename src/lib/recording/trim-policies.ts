import type { RecordedAction } from '../../types/recording'

/**
 * Applied once when a session stops, to drop trailing actions that belong to the
 * gesture used to stop the recording rather than to the recorded input.
 * Must return a new array (or the same one when nothing is removed).
 */
export type TrimPolicy = (actions: readonly RecordedAction[]) => readonly RecordedAction[]

// A hotkey press + release is two actions
export const DEFAULT_STOP_GESTURE_LENGTH = 2

export const keepAllActions: TrimPolicy = (actions) => actions

/**
 * Drops the last `count` actions. Shorter logs end up empty.
 */
export function trimTrailingActions(count: number = DEFAULT_STOP_GESTURE_LENGTH): TrimPolicy {
  if (!Number.isInteger(count) || count < 0) {
    throw new RangeError(`Trim count must be a non-negative integer, got ${count}`)
  }
  return (actions) => {
    if (count === 0) return actions
    return actions.slice(0, Math.max(0, actions.length - count))
  }
}

/**
 * Drops actions from the end for as long as `predicate` holds, e.g. a multi-key chord.
 */
export function trimTrailingWhile(predicate: (action: RecordedAction) => boolean): TrimPolicy {
  return (actions) => {
    let end = actions.length
    while (end > 0 && predicate(actions[end - 1])) {
      end--
    }
    return end === actions.length ? actions : actions.slice(0, end)
  }
}

export function isKeyAction(action: RecordedAction): boolean {
  return action.type === 'key_press' || action.type === 'key_release'
}
