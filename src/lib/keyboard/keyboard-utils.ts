import { RecordingError, RecordingErrorCode } from '../core/errors'
import type { HookKeyboardEvent } from '../input/types'
import keycodes from './uiohook-keycodes.json'

/**
 * libuiohook virtual key code (VC_*) → Web KeyboardEvent.code
 */
const UIOHOOK_KEYCODE_MAP: Record<string, string> = keycodes

const PUNCTUATION_CHARS: Record<string, string> = {
  Minus: '-',
  Equal: '=',
  BracketLeft: '[',
  BracketRight: ']',
  Backslash: '\\',
  Semicolon: ';',
  Quote: '\'',
  Backquote: '`',
  Comma: ',',
  Period: '.',
  Slash: '/',
  NumpadMultiply: '*',
  NumpadAdd: '+',
  NumpadSubtract: '-',
  NumpadDecimal: '.',
  NumpadDivide: '/'
}

// US layout with shift held
const SHIFTED_CHARS: Record<string, string> = {
  Digit1: '!',
  Digit2: '@',
  Digit3: '#',
  Digit4: '$',
  Digit5: '%',
  Digit6: '^',
  Digit7: '&',
  Digit8: '*',
  Digit9: '(',
  Digit0: ')',
  Minus: '_',
  Equal: '+',
  BracketLeft: '{',
  BracketRight: '}',
  Backslash: '|',
  Semicolon: ':',
  Quote: '"',
  Backquote: '~',
  Comma: '<',
  Period: '>',
  Slash: '?'
}

function hasShift(modifiers: string[] = []): boolean {
  return modifiers.some(m => m.toLowerCase() === 'shift')
}

export function getKeyFromCode(code: number): string {
  return UIOHOOK_KEYCODE_MAP[String(code)] ?? `Unknown(${code})`
}

/**
 * Convert a key code name (e.g. "KeyA", "Digit1", "Comma") into the character it types.
 * Follows the shift modifier for letters, digits and punctuation, assuming a US layout.
 * Returns null for non-printable/control keys.
 */
export function getPrintableCharFromKey(key: string, modifiers: string[] = []): string | null {
  if (!key) return null

  if (key === 'Space' || key === ' ') return ' '

  const shift = hasShift(modifiers)
  if (key.startsWith('Key') && key.length === 4) {
    const ch = key.charAt(3)
    return shift ? ch.toUpperCase() : ch.toLowerCase()
  }

  const shifted = shift ? SHIFTED_CHARS[key] : undefined
  if (shifted) return shifted

  if (key.startsWith('Digit') && key.length === 6) {
    return key.charAt(5)
  }
  if (key.startsWith('Numpad')) {
    const numpadKey = key.slice(6)
    if (numpadKey.length === 1) return numpadKey
  }

  const punctuation = PUNCTUATION_CHARS[key]
  if (punctuation) return punctuation

  if (key.length === 1) return key

  return null
}

export function getModifiers(event: HookKeyboardEvent): string[] {
  const modifiers: string[] = []
  if (event.metaKey) modifiers.push('meta')
  if (event.ctrlKey) modifiers.push('ctrl')
  if (event.altKey) modifiers.push('alt')
  if (event.shiftKey) modifiers.push('shift')
  return modifiers
}

/**
 * Key identifier recorded for a key event: the typed character when there is one,
 * otherwise the symbolic key name ("ShiftLeft", "Enter", "F5", "Unknown(999)").
 * @throws RecordingError when the payload has no usable keycode
 */
export function resolveKeyIdentifier(event: HookKeyboardEvent): string {
  const { keycode } = event
  if (typeof keycode !== 'number' || !Number.isInteger(keycode) || keycode < 0) {
    throw new RecordingError(
      `Invalid keycode in key event: ${String(keycode)}`,
      RecordingErrorCode.KEY_RESOLUTION_FAILED
    )
  }

  const key = getKeyFromCode(keycode)
  return getPrintableCharFromKey(key, getModifiers(event)) ?? key
}
