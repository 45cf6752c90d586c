/**
 * libuiohook constants used when translating raw hook payloads
 */

// Button numbers reported on mousedown/mouseup
export const MOUSE_BUTTONS = {
  LEFT: 1,
  RIGHT: 2,
  MIDDLE: 3,
} as const

// Wheel event `direction`
export const WHEEL_DIRECTION = {
  VERTICAL: 3,
  HORIZONTAL: 4,
} as const
