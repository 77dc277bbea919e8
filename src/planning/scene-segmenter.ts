import type { SegmenterSettings } from '../config/config-schema.js';
import { defaultConfig } from '../config/defaults.js';
import { RunningCentroid, rectAround } from '../geometry/point.js';
import { intentsEqual, type IntentSpan, type IntentType, type UserIntent } from '../analysis/types.js';
import { eventsInRange } from '../timeline/event-timeline.js';
import type { EventTimeline } from '../timeline/types.js';
import type { CameraScene, FocusRegion } from './types.js';

/** Intents whose scenes split when the activity wanders across the screen. */
const spatiallySensitive: ReadonlySet<IntentType> = new Set(['clicking', 'navigating', 'scrolling']);

/** Width and height of a synthesized cursor region, by intent. */
function cursorRegionSize(intent: UserIntent): [number, number] {
  switch (intent.type) {
    case 'clicking':
    case 'navigating':
    case 'dragging':
      return [0.1, 0.1];
    case 'typing':
      return [0.15, 0.05];
    default:
      return [0.02, 0.02];
  }
}

export function focusRegionFor(span: IntentSpan): FocusRegion {
  if (span.focusElement) {
    return {
      time: span.startTime,
      region: span.focusElement.frame,
      confidence: span.confidence,
      source: { type: 'activeElement', element: span.focusElement },
    };
  }
  const [width, height] = cursorRegionSize(span.intent);
  return {
    time: span.startTime,
    region: rectAround(span.focusPosition, width, height),
    confidence: span.confidence,
    source: { type: 'cursorPosition' },
  };
}

function appContextIn(timeline: EventTimeline, start: number, end: number): string | undefined {
  return eventsInRange(timeline, start, end).find(e => e.metadata.appBundleId)?.metadata.appBundleId;
}

interface SpanGroup {
  spans: IntentSpan[];
  center: RunningCentroid;
}

function startsNewScene(group: SpanGroup, next: IntentSpan, settings: SegmenterSettings): boolean {
  const current = group.spans[0].intent;
  if (current.type === 'switching' || current.type === 'idle') return true;
  if (!intentsEqual(current, next.intent)) return true;
  if (spatiallySensitive.has(next.intent.type)) {
    return group.center.distanceTo(next.focusPosition) > settings.spatialSplitDistance;
  }
  return false;
}

function buildScene(spans: readonly IntentSpan[], timeline: EventTimeline): CameraScene {
  const startTime = spans[0].startTime;
  const endTime = spans[spans.length - 1].endTime;
  const contextChange = spans.reduce<IntentSpan['contextChange']>(
    (last, span) => span.contextChange ?? last,
    undefined,
  );
  const appContext = appContextIn(timeline, startTime, endTime);

  return {
    startTime,
    endTime,
    primaryIntent: spans[0].intent,
    focusRegions: spans.map(focusRegionFor),
    ...(appContext !== undefined ? { appContext } : {}),
    ...(contextChange ? { contextChange } : {}),
  };
}

function sceneDuration(scene: CameraScene): number {
  return scene.endTime - scene.startTime;
}

/** Merge `absorbed` into `survivor`, keeping the survivor's intent. */
function absorb(survivor: CameraScene, absorbed: CameraScene): CameraScene {
  const earlier = absorbed.startTime < survivor.startTime ? absorbed : survivor;
  const later = earlier === survivor ? absorbed : survivor;
  const appContext = survivor.appContext ?? absorbed.appContext;
  const contextChange = survivor.contextChange ?? absorbed.contextChange;
  return {
    startTime: earlier.startTime,
    endTime: later.endTime,
    primaryIntent: survivor.primaryIntent,
    focusRegions: [...earlier.focusRegions, ...later.focusRegions],
    ...(appContext !== undefined ? { appContext } : {}),
    ...(contextChange ? { contextChange } : {}),
  };
}

const isSwitching = (scene: CameraScene) => scene.primaryIntent.type === 'switching';

/**
 * Fold scenes shorter than `minDuration` into a neighbour. Switching scenes
 * neither absorb nor get absorbed, so a short scene with switching scenes on
 * both sides stays as it is.
 */
function absorbShortScenes(scenes: CameraScene[], minDuration: number): CameraScene[] {
  const result = [...scenes];
  const mergeTarget = (index: number) => {
    const prev = index > 0 && !isSwitching(result[index - 1]) ? result[index - 1] : undefined;
    const next = index < result.length - 1 && !isSwitching(result[index + 1]) ? result[index + 1] : undefined;
    return { prev, next };
  };

  for (;;) {
    const index = result.findIndex((scene, i) => {
      if (isSwitching(scene) || sceneDuration(scene) >= minDuration) return false;
      const { prev, next } = mergeTarget(i);
      return prev !== undefined || next !== undefined;
    });
    if (index === -1) break;

    const scene = result[index];
    const { prev, next } = mergeTarget(index);
    if (prev && (!next || sceneDuration(prev) >= sceneDuration(next))) {
      result.splice(index - 1, 2, absorb(prev, scene));
    } else if (next) {
      result.splice(index, 2, absorb(next, scene));
    }
  }
  return result;
}

/**
 * Group intent spans into camera scenes.
 *
 * Adjacent spans merge only when their intents are equal; switching and idle
 * spans always stand alone. Clicking, navigating and scrolling groups also
 * split once a span strays too far from the group's running centroid. Scenes
 * shorter than `minSceneDuration` are then folded into their longer
 * non-switching neighbour.
 */
export function segmentScenes(
  intentSpans: readonly IntentSpan[],
  timeline: EventTimeline,
  duration: number = timeline.duration,
  settings: SegmenterSettings = defaultConfig.segmenter,
): CameraScene[] {
  if (intentSpans.length === 0) return [];

  const groups: SpanGroup[] = [];
  for (const span of intentSpans) {
    const group = groups[groups.length - 1];
    if (group && !startsNewScene(group, span, settings)) {
      group.spans.push(span);
      group.center.add(span.focusPosition);
    } else {
      groups.push({ spans: [span], center: new RunningCentroid(span.focusPosition) });
    }
  }

  const scenes = absorbShortScenes(
    groups.map(group => buildScene(group.spans, timeline)),
    settings.minSceneDuration,
  );

  // Pin the outer edges to the recording bounds.
  const first = scenes[0];
  const last = scenes[scenes.length - 1];
  if (first.startTime !== 0) scenes[0] = { ...first, startTime: 0 };
  if (last.endTime !== duration) scenes[scenes.length - 1] = { ...scenes[scenes.length - 1], endTime: duration };

  return scenes;
}
