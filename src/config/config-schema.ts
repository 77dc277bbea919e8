import { z } from 'zod';

const range = (message: string) =>
  z.tuple([z.number().nonnegative(), z.number().nonnegative()])
    .refine(([lo, hi]) => lo <= hi, { message });

const zoomRange = range('Zoom range minimum must not exceed its maximum');
const durationRange = range('Duration range minimum must not exceed its maximum');

export type Range = [number, number];

export const easingSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('linear') }),
  z.object({ type: z.literal('easeIn') }),
  z.object({ type: z.literal('easeOut') }),
  z.object({ type: z.literal('easeInOut') }),
  z.object({
    type: z.literal('cubicBezier'),
    p1x: z.number(),
    p1y: z.number(),
    p2x: z.number(),
    p2y: z.number(),
  }),
  z.object({
    type: z.literal('spring'),
    /** 1 is critically damped; below 1 overshoots. */
    dampingRatio: z.number().positive(),
    /** Approximate settle time in seconds. */
    response: z.number().positive(),
  }),
]);

export type EasingCurve = z.infer<typeof easingSchema>;

export const classifierSettingsSchema = z.object({
  typingSessionTimeout: z.number().positive().default(1.5),
  /** The camera arrives this long before the first keystroke. */
  typingAnticipation: z.number().nonnegative().default(0.4),
  navigatingClickWindow: z.number().positive().default(2.0),
  navigatingClickDistance: z.number().positive().default(0.4),
  navigatingMinClicks: z.number().int().min(2).default(2),
  /** Length of spans produced by point events (single clicks, app switches). */
  pointSpanDuration: z.number().positive().default(0.5),
  scrollMergeGap: z.number().positive().default(1.0),
  /** Gaps at least this long are reported as idle with full confidence. */
  idleThreshold: z.number().positive().default(5.0),
  /** Gaps shorter than this never split spans of one intent family. */
  minGapDuration: z.number().nonnegative().default(0.3),
  continuationGap: z.number().nonnegative().default(1.5),
  continuationMaxDistance: z.number().nonnegative().default(0.2),
  /** UI-state samples further than this from a typing session are ignored. */
  uiSampleWindow: z.number().positive().default(2.0),
  contextChangeWindow: z.number().positive().default(2.0),
  contextChangeAreaRatio: z.number().gt(1).default(3.0),
});

export type ClassifierSettings = z.infer<typeof classifierSettingsSchema>;

export const segmenterSettingsSchema = z.object({
  minSceneDuration: z.number().nonnegative().default(0.3),
  /** Normalized distance from the running centroid that starts a new scene. */
  spatialSplitDistance: z.number().positive().default(0.25),
});

export type SegmenterSettings = z.infer<typeof segmenterSettingsSchema>;

export const shotSettingsSchema = z.object({
  typingCodeZoomRange: zoomRange.default([2.0, 2.5]),
  typingTextFieldZoomRange: zoomRange.default([2.2, 2.8]),
  typingTerminalZoomRange: zoomRange.default([1.6, 2.0]),
  clickingZoomRange: zoomRange.default([1.8, 2.2]),
  navigatingZoomRange: zoomRange.default([1.5, 1.8]),
  draggingZoomRange: zoomRange.default([1.3, 1.6]),
  scrollingZoomRange: zoomRange.default([1.3, 1.5]),
  idleZoom: z.number().positive().default(1.0),
  switchingZoom: z.number().positive().default(1.0),
  minZoom: z.number().positive().default(1.0),
  maxZoom: z.number().positive().default(2.8),
  /** Margin added around element frames and event bounding boxes. */
  workAreaPadding: z.number().nonnegative().default(0.08),
  /** Fraction of the viewport the work area should fill. */
  targetAreaCoverage: z.number().positive().max(1).default(0.7),
  /** Share of the neighbour's zoom above 1.0 an idle scene keeps. */
  idleZoomDecay: z.number().gt(0).lt(1).default(0.5),
}).refine(s => s.minZoom <= s.maxZoom, { message: 'minZoom must not exceed maxZoom' });

export type ShotSettings = z.infer<typeof shotSettingsSchema>;

export const transitionSettingsSchema = z.object({
  /** Viewport-relative distance below which a short direct pan is used. */
  directPanThreshold: z.number().positive().default(0.6),
  /** Viewport-relative distance below which a medium direct pan is used. */
  gentlePanThreshold: z.number().positive().default(1.2),
  /** Viewport-relative distance at which zoom+pan durations reach their maximum. */
  fullZoomOutThreshold: z.number().positive().default(3.0),
  shortPanDurationRange: durationRange.default([0.4, 0.6]),
  mediumPanDurationRange: durationRange.default([0.6, 0.9]),
  zoomOutPanDurationRange: durationRange.default([0.8, 1.2]),
  zoomInPanDurationRange: durationRange.default([0.7, 1.0]),
  panEasing: easingSchema.default({ type: 'spring', dampingRatio: 1.0, response: 0.6 }),
  zoomOutEasing: easingSchema.default({ type: 'spring', dampingRatio: 1.0, response: 0.5 }),
  zoomInEasing: easingSchema.default({ type: 'spring', dampingRatio: 0.92, response: 0.55 }),
}).refine(
  s => s.directPanThreshold < s.gentlePanThreshold && s.gentlePanThreshold < s.fullZoomOutThreshold,
  { message: 'Thresholds must satisfy directPan < gentlePan < fullZoomOut' },
);

export type TransitionSettings = z.infer<typeof transitionSettingsSchema>;

export const configSchema = z.object({
  classifier: classifierSettingsSchema.default({}),
  segmenter: segmenterSettingsSchema.default({}),
  shot: shotSettingsSchema.default({}),
  transition: transitionSettingsSchema.default({}),
});

export type AutoframeConfig = z.infer<typeof configSchema>;
