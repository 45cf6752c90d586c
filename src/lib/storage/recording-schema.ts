import { z } from 'zod'

// Unknown keys are kept so files written by newer versions load without losing data
const locationSchema = z.object({
  x: z.number().int(),
  y: z.number().int()
}).passthrough()

const buttonDetailsSchema = z.object({
  location: locationSchema,
  button: z.string()
}).passthrough()

const scrollDetailsSchema = z.object({
  location: locationSchema,
  scroll_delta: z.object({
    dx: z.number().int(),
    dy: z.number().int()
  }).passthrough()
}).passthrough()

const keyDetailsSchema = z.object({
  key: z.string()
}).passthrough()

const timestampSchema = z.number().nonnegative().finite()

export const recordedActionSchema = z.discriminatedUnion('type', [
  z.object({ timestamp: timestampSchema, type: z.literal('mouse_button_down'), details: buttonDetailsSchema }).passthrough(),
  z.object({ timestamp: timestampSchema, type: z.literal('mouse_button_up'), details: buttonDetailsSchema }).passthrough(),
  z.object({ timestamp: timestampSchema, type: z.literal('mouse_scroll'), details: scrollDetailsSchema }).passthrough(),
  z.object({ timestamp: timestampSchema, type: z.literal('key_press'), details: keyDetailsSchema }).passthrough(),
  z.object({ timestamp: timestampSchema, type: z.literal('key_release'), details: keyDetailsSchema }).passthrough()
])

export const recordingFileSchema = z.array(recordedActionSchema)
