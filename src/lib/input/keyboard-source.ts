import { RecordingError, RecordingErrorCode, errorMessage } from '../core/errors'
import { resolveKeyIdentifier } from '../keyboard/keyboard-utils'
import { logger as rootLogger } from '../utils/logger'
import type { ActionSink, HookKeyboardEvent, InputSource, InputSubscription } from './types'
import { uiohookManager, type UiohookManager } from './uiohook-manager'

const logger = rootLogger.scope('KeyboardSource')

export type KeyResolver = (event: HookKeyboardEvent) => string

export interface KeyboardSourceOptions {
  manager?: UiohookManager
  resolveKey?: KeyResolver
}

/**
 * Key presses and releases from the global hook. A key that cannot be resolved is
 * reported and dropped; capture carries on with the next event.
 */
export class KeyboardInputSource implements InputSource {
  readonly name = 'keyboard'
  private readonly manager: UiohookManager
  private readonly resolveKey: KeyResolver

  constructor(options: KeyboardSourceOptions = {}) {
    this.manager = options.manager ?? uiohookManager
    this.resolveKey = options.resolveKey ?? resolveKeyIdentifier
  }

  subscribe(sink: ActionSink): InputSubscription {
    const hook = this.manager.acquire(this.name)
    if (!hook) {
      throw new RecordingError('uiohook-napi not available, keyboard capture disabled', RecordingErrorCode.HOOK_UNAVAILABLE)
    }

    const handleKeyDown = (event: HookKeyboardEvent) => {
      let key: string
      try {
        key = this.resolveKey(event)
      } catch (error) {
        logger.warn(`Error capturing key press: ${errorMessage(error)}`)
        return
      }
      sink({ type: 'key_press', details: { key } })
    }

    const handleKeyUp = (event: HookKeyboardEvent) => {
      let key: string
      try {
        key = this.resolveKey(event)
      } catch (error) {
        logger.warn(`Error capturing key release: ${errorMessage(error)}`)
        return
      }
      sink({ type: 'key_release', details: { key } })
    }

    hook.on('keydown', handleKeyDown)
    hook.on('keyup', handleKeyUp)
    logger.info('Keyboard capture started')

    let active = true
    return {
      stop: () => {
        if (!active) return
        active = false
        try {
          hook.off('keydown', handleKeyDown)
          hook.off('keyup', handleKeyUp)
        } finally {
          this.manager.release(this.name)
        }
        logger.info('Keyboard capture stopped')
      }
    }
  }
}
