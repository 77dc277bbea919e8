// Public API exports
export type { NormalizedPoint, Rect, Size } from './geometry/point.js';
export type { Recording } from './recording/types.js';
export { parseRecording, recordingSchema } from './recording/schema.js';
export type {
  EventKind, EventTimeline, UIElementInfo, UIStateSample, UnifiedEvent,
} from './timeline/types.js';
export { buildEventTimeline, eventsInRange, lastMousePosition } from './timeline/event-timeline.js';
export { canonicalAppIdentity, sameApp } from './timeline/app-identity.js';
export type { ContextChange, IntentSpan, TypingContext, UserIntent } from './analysis/types.js';
export { intentsEqual, intentLabel } from './analysis/types.js';
export { classifyIntents } from './analysis/intent-classifier.js';
export type {
  CameraScene, FocusRegion, FocusSource, ShotPlan, ShotType, TransitionPlan, TransitionStyle, ZoomSource,
} from './planning/types.js';
export { segmentScenes } from './planning/scene-segmenter.js';
export { planShots } from './planning/shot-planner.js';
export { planTransitions } from './planning/transition-planner.js';
export { runSmartZoom, type SmartZoomResult } from './pipeline/smart-zoom.js';
export { InvariantError } from './pipeline/invariants.js';
export { describeResult } from './pipeline/diagnostics.js';
export type {
  AutoframeConfig, ClassifierSettings, EasingCurve, SegmenterSettings, ShotSettings, TransitionSettings,
} from './config/config-schema.js';
export { configSchema } from './config/config-schema.js';
export { defaultConfig } from './config/defaults.js';
export { loadConfig } from './config/load-config.js';
