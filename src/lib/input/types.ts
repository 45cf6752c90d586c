/**
 * Contracts between the recorder and the global input hook.
 */

import type { ActionInput } from '../../types/recording'

// Payload fields read from uiohook-napi events. The real events carry more.
export interface HookModifierState {
  altKey: boolean
  ctrlKey: boolean
  metaKey: boolean
  shiftKey: boolean
}

export interface HookMouseEvent extends HookModifierState {
  x: number
  y: number
  button: unknown
  clicks: number
}

export interface HookWheelEvent extends HookModifierState {
  x: number
  y: number
  amount: number
  direction: number
  rotation: number
}

export interface HookKeyboardEvent extends HookModifierState {
  keycode: number
}

export interface HookEventMap {
  mousedown: HookMouseEvent
  mouseup: HookMouseEvent
  wheel: HookWheelEvent
  keydown: HookKeyboardEvent
  keyup: HookKeyboardEvent
}

export type HookEventName = keyof HookEventMap

/**
 * The part of uiohook-napi's `uIOhook` the recorder relies on.
 */
export interface InputHook {
  on<E extends HookEventName>(event: E, listener: (e: HookEventMap[E]) => void): unknown
  off<E extends HookEventName>(event: E, listener: (e: HookEventMap[E]) => void): unknown
  start(): void
  stop(): void
}

export type ActionSink = (input: ActionInput) => unknown

export interface InputSubscription {
  stop(): void
}

export interface InputSource {
  /** Identifier used in logs and for the subscription registry */
  readonly name: string
  subscribe(sink: ActionSink): InputSubscription
}
