/**
 * Shared uiohook manager coordinating uiohook-napi usage across input sources.
 * The hook is started when the first source acquires it and stopped when the last one releases it.
 */

import { logger as rootLogger } from '../utils/logger'
import type { InputHook } from './types'

const logger = rootLogger.scope('uiohook')

export type HookLoader = () => InputHook

// Lazy load uiohook-napi so a missing native binding only fails the recording that needs it
function loadUiohookNapi(): InputHook {
  // eslint-disable-next-line @typescript-eslint/no-var-requires
  const uiohookModule = require('uiohook-napi')
  return uiohookModule.uIOhook
}

export class UiohookManager {
  private hook: InputHook | null = null
  private running = false
  private readonly activeModules = new Set<string>()

  constructor(private readonly loadHook: HookLoader = loadUiohookNapi) {}

  /**
   * Initialize and get the hook instance
   * @returns The hook or null if the binding could not be loaded
   */
  getHook(moduleName: string): InputHook | null {
    if (!this.hook) {
      try {
        this.hook = this.loadHook()
        logger.info(`uiohook-napi loaded for ${moduleName}`)
      } catch (error) {
        logger.error(`Failed to load uiohook-napi for ${moduleName}:`, error)
        return null
      }
    }
    return this.hook
  }

  /**
   * Start the hook on behalf of `moduleName` if it is not running yet.
   * @returns The running hook, or null if it is unavailable or failed to start
   */
  acquire(moduleName: string): InputHook | null {
    const hook = this.getHook(moduleName)
    if (!hook) return null

    if (this.activeModules.has(moduleName)) {
      return hook
    }

    if (!this.running) {
      try {
        logger.info(`Starting uiohook-napi (first module: ${moduleName})`)
        hook.start()
        this.running = true
      } catch (error) {
        logger.error(`Failed to start uiohook for ${moduleName}:`, error)
        return null
      }
    }

    this.activeModules.add(moduleName)
    logger.debug(`uiohook reference count is ${this.activeModules.size} after ${moduleName}`)
    return hook
  }

  /**
   * Stop the hook if no other module is using it
   */
  release(moduleName: string): void {
    if (!this.activeModules.delete(moduleName)) return
    logger.debug(`uiohook reference count is ${this.activeModules.size} after releasing ${moduleName}`)

    if (this.activeModules.size > 0 || !this.hook || !this.running) return

    this.running = false
    try {
      logger.info(`Stopping uiohook-napi (last module: ${moduleName})`)
      this.hook.stop()
    } catch (error) {
      logger.error(`Error stopping uiohook for ${moduleName}:`, error)
    }
  }

  isRunning(): boolean {
    return this.running
  }

  getReferenceCount(): number {
    return this.activeModules.size
  }
}

export const uiohookManager = new UiohookManager()
