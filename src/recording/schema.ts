import { z } from 'zod';
import { clickTypes, dragTypes, type Recording } from './types.js';

// Records are only checked for shape here. Out-of-range values are dropped
// record by record when the event timeline is built.

const rectSchema = z.object({
  x: z.number(),
  y: z.number(),
  width: z.number(),
  height: z.number(),
});

const elementSchema = z.object({
  role: z.string(),
  subrole: z.string().optional(),
  frame: rectSchema,
  title: z.string().optional(),
  isClickable: z.boolean().default(false),
  applicationName: z.string().optional(),
});

const mousePositionSchema = z.object({
  time: z.number(),
  x: z.number(),
  y: z.number(),
  appBundleId: z.string().optional(),
});

const clickSchema = z.object({
  time: z.number(),
  x: z.number(),
  y: z.number(),
  clickType: z.enum(clickTypes).default('leftDown'),
  appBundleId: z.string().optional(),
  element: elementSchema.optional(),
});

const dragSchema = z.object({
  startTime: z.number(),
  endTime: z.number(),
  startX: z.number(),
  startY: z.number(),
  endX: z.number(),
  endY: z.number(),
  dragType: z.enum(dragTypes).default('selection'),
});

const scrollSchema = z.object({
  time: z.number(),
  x: z.number(),
  y: z.number(),
  deltaX: z.number().default(0),
  deltaY: z.number().default(0),
});

const modifiersSchema = z.object({
  command: z.boolean().default(false),
  shift: z.boolean().default(false),
  option: z.boolean().default(false),
  control: z.boolean().default(false),
});

const keySchema = z.object({
  time: z.number(),
  type: z.enum(['keyDown', 'keyUp']),
  keyCode: z.number().int(),
  modifiers: modifiersSchema.default({}),
  character: z.string().optional(),
});

const uiStateSampleSchema = z.object({
  time: z.number(),
  cursorX: z.number(),
  cursorY: z.number(),
  element: elementSchema.optional(),
  caretBounds: rectSchema.optional(),
});

export const recordingSchema = z.object({
  version: z.literal(1),
  duration: z.number().nonnegative(),
  screenBounds: z.object({
    width: z.number().positive(),
    height: z.number().positive(),
  }),
  mousePositions: z.array(mousePositionSchema).default([]),
  clicks: z.array(clickSchema).default([]),
  drags: z.array(dragSchema).default([]),
  scrolls: z.array(scrollSchema).default([]),
  keys: z.array(keySchema).default([]),
  uiStateSamples: z.array(uiStateSampleSchema).default([]),
});

export type ValidatedRecording = z.infer<typeof recordingSchema>;

/**
 * Validate an unknown value (usually parsed JSON) as a recording.
 * Throws with the zod issue list when the shape is wrong.
 */
export function parseRecording(raw: unknown): Recording {
  const result = recordingSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid recording: ${result.error.message}`);
  }
  return result.data;
}
