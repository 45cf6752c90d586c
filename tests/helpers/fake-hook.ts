import { EventEmitter } from 'events'
import type {
  HookEventMap,
  HookEventName,
  HookKeyboardEvent,
  HookMouseEvent,
  HookWheelEvent,
  InputHook
} from '@/lib/input/types'

/**
 * In-process stand-in for uiohook-napi's `uIOhook`
 */
export class FakeHook implements InputHook {
  private emitter = new EventEmitter()
  start = jest.fn()
  stop = jest.fn()

  on<E extends HookEventName>(event: E, listener: (e: HookEventMap[E]) => void): this {
    this.emitter.on(event, listener)
    return this
  }

  off<E extends HookEventName>(event: E, listener: (e: HookEventMap[E]) => void): this {
    this.emitter.off(event, listener)
    return this
  }

  emit<E extends HookEventName>(event: E, payload: HookEventMap[E]): void {
    this.emitter.emit(event, payload)
  }

  listenerCount(event: HookEventName): number {
    return this.emitter.listenerCount(event)
  }
}

const noModifiers = { altKey: false, ctrlKey: false, metaKey: false, shiftKey: false }

export function mouseEvent(x: number, y: number, button: number): HookMouseEvent {
  return { ...noModifiers, x, y, button, clicks: 1 }
}

export function wheelEvent(x: number, y: number, direction: number, rotation: number): HookWheelEvent {
  return { ...noModifiers, x, y, direction, rotation, amount: 3 }
}

export function keyEvent(keycode: number, modifiers: Partial<typeof noModifiers> = {}): HookKeyboardEvent {
  return { ...noModifiers, ...modifiers, keycode }
}

/**
 * Manually advanced millisecond clock
 */
export function createClock(start = 1_000_000) {
  let now = start
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms
    }
  }
}
