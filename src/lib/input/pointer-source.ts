import { RecordingError, RecordingErrorCode } from '../core/errors'
import { logger as rootLogger } from '../utils/logger'
import type { MouseButtonDetails, MouseScrollDetails } from '../../types/recording'
import { MOUSE_BUTTONS, WHEEL_DIRECTION } from './constants'
import type { ActionSink, HookMouseEvent, HookWheelEvent, InputSource, InputSubscription } from './types'
import { uiohookManager, type UiohookManager } from './uiohook-manager'

const logger = rootLogger.scope('PointerSource')

export function getButtonName(button: unknown): string {
  switch (button) {
    case MOUSE_BUTTONS.LEFT:
      return 'left'
    case MOUSE_BUTTONS.RIGHT:
      return 'right'
    case MOUSE_BUTTONS.MIDDLE:
      return 'middle'
    default:
      return `button${String(button)}`
  }
}

function toLocation(event: { x: number; y: number }): MouseButtonDetails['location'] {
  return { x: Math.round(event.x), y: Math.round(event.y) }
}

/**
 * Scroll delta in whole notches. Positive dy scrolls up (away from the user), positive dx scrolls right.
 */
export function getScrollDelta(event: HookWheelEvent): MouseScrollDetails['scroll_delta'] {
  const steps = Math.trunc(event.rotation) || 0
  if (event.direction === WHEEL_DIRECTION.HORIZONTAL) {
    return { dx: steps, dy: 0 }
  }
  // libuiohook reports positive rotation when the wheel turns towards the user
  return { dx: 0, dy: steps === 0 ? 0 : -steps }
}

/**
 * Pointer clicks (press and release) and wheel scrolls from the global hook.
 * Pointer moves are not captured.
 */
export class PointerInputSource implements InputSource {
  readonly name = 'pointer'

  constructor(private readonly manager: UiohookManager = uiohookManager) {}

  subscribe(sink: ActionSink): InputSubscription {
    const hook = this.manager.acquire(this.name)
    if (!hook) {
      throw new RecordingError('uiohook-napi not available, pointer capture disabled', RecordingErrorCode.HOOK_UNAVAILABLE)
    }

    const handleMouseDown = (event: HookMouseEvent) => {
      sink({
        type: 'mouse_button_down',
        details: { location: toLocation(event), button: getButtonName(event.button) }
      })
    }

    const handleMouseUp = (event: HookMouseEvent) => {
      sink({
        type: 'mouse_button_up',
        details: { location: toLocation(event), button: getButtonName(event.button) }
      })
    }

    const handleWheel = (event: HookWheelEvent) => {
      sink({
        type: 'mouse_scroll',
        details: { location: toLocation(event), scroll_delta: getScrollDelta(event) }
      })
    }

    hook.on('mousedown', handleMouseDown)
    hook.on('mouseup', handleMouseUp)
    hook.on('wheel', handleWheel)
    logger.info('Pointer capture started')

    let active = true
    return {
      stop: () => {
        if (!active) return
        active = false
        try {
          hook.off('mousedown', handleMouseDown)
          hook.off('mouseup', handleMouseUp)
          hook.off('wheel', handleWheel)
        } finally {
          this.manager.release(this.name)
        }
        logger.info('Pointer capture stopped')
      }
    }
  }
}
