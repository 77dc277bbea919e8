import type { AutoframeConfig } from '../config/config-schema.js';
import { defaultConfig } from '../config/defaults.js';
import type { IntentSpan } from '../analysis/types.js';
import { classifyIntents } from '../analysis/intent-classifier.js';
import type { Recording } from '../recording/types.js';
import { buildEventTimeline } from '../timeline/event-timeline.js';
import type { EventTimeline } from '../timeline/types.js';
import { segmentScenes } from '../planning/scene-segmenter.js';
import { planShots } from '../planning/shot-planner.js';
import { planTransitions } from '../planning/transition-planner.js';
import type { CameraScene, ShotPlan, TransitionPlan } from '../planning/types.js';
import { InvariantError, assertShotBounds, assertTiling } from './invariants.js';

export interface SmartZoomResult {
  timeline: EventTimeline;
  intentSpans: IntentSpan[];
  scenes: CameraScene[];
  shots: ShotPlan[];
  transitions: TransitionPlan[];
}

/**
 * Run every stage over one recording and check the guarantees each stage
 * makes to the next. Throws InvariantError when a stage breaks one.
 */
export function runSmartZoom(recording: Recording, config: AutoframeConfig = defaultConfig): SmartZoomResult {
  const timeline = buildEventTimeline(recording);
  const { duration } = timeline;

  const intentSpans = classifyIntents(timeline, timeline.uiStateSamples, config.classifier);
  assertTiling('intents', intentSpans, duration);

  const scenes = segmentScenes(intentSpans, timeline, duration, config.segmenter);
  assertTiling('scenes', scenes, duration);

  const shots = planShots(scenes, recording.screenBounds, timeline, config.shot);
  if (shots.length !== scenes.length) {
    throw new InvariantError('shots', `planned ${shots.length} shots for ${scenes.length} scenes`);
  }
  assertShotBounds(shots, config.shot);

  const transitions = planTransitions(shots, config.transition);
  if (transitions.length !== Math.max(0, shots.length - 1)) {
    throw new InvariantError('transitions', `planned ${transitions.length} transitions for ${shots.length} shots`);
  }

  return { timeline, intentSpans, scenes, shots, transitions };
}
