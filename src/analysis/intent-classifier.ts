import type { ClassifierSettings } from '../config/config-schema.js';
import { defaultConfig } from '../config/defaults.js';
import {
  SCREEN_CENTER,
  RunningCentroid,
  centroid,
  distance,
  isInUnitRange,
  rectCenter,
  type NormalizedPoint,
} from '../geometry/point.js';
import { canonicalAppIdentity, isCodeEditorApp, isTerminalApp } from '../timeline/app-identity.js';
import { eventsInRange, lastMousePosition } from '../timeline/event-timeline.js';
import { findNearest } from '../timeline/lookup.js';
import type { EventTimeline, KeyEventData, UIStateSample, UnifiedEvent } from '../timeline/types.js';
import { detectPostClickChange } from './context-change.js';
import type { IntentSpan, TypingContext, UserIntent } from './types.js';

// Gaps at or below this are treated as contiguous.
const GAP_EPSILON = 0.01;

const textFieldRoles = new Set(['axtextfield', 'axsearchfield', 'axsecuretextfield', 'axcombobox']);
const richTextKeywords = ['word', 'pages', 'writer', 'notes', 'notion', 'craft', 'obsidian', 'rich', 'document'];

interface TypingSession {
  span: IntentSpan;
  firstKeyTime: number;
}

/**
 * Label the whole recording with intent spans.
 *
 * Each intent is detected independently, overlaps are resolved in favour of
 * the earlier span, and the remaining gaps are either bridged or filled with
 * idle spans. The result is sorted and tiles [0, duration].
 */
export function classifyIntents(
  timeline: EventTimeline,
  uiStateSamples: readonly UIStateSample[] = timeline.uiStateSamples,
  settings: ClassifierSettings = defaultConfig.classifier,
): IntentSpan[] {
  const { duration } = timeline;
  if (duration <= 0) return [];

  const hasActionableEvents = timeline.events.some(e => e.kind.type !== 'mouseMove');
  if (!hasActionableEvents) {
    return [idleSpan(0, duration, SCREEN_CENTER, settings)];
  }

  const typing = detectTypingSessions(timeline, uiStateSamples, settings);
  const dragging = detectDraggingSpans(timeline);
  const scrolling = detectScrollingSpans(timeline, settings);
  const switching = detectSwitchingSpans(timeline, uiStateSamples, settings);

  // Clicks made while typing or dragging belong to that activity
  const excluded: Array<[number, number]> = [
    ...typing.map((s): [number, number] => [s.firstKeyTime, s.span.endTime]),
    ...dragging.map((s): [number, number] => [s.startTime, s.endTime]),
  ];
  const firstKeys = typing.map(s => s.firstKeyTime);
  const clicks = detectClickSpans(timeline, excluded, uiStateSamples, settings)
    .map(span => endAtFirstKey(span, firstKeys));

  const others = [...dragging, ...scrolling, ...switching, ...clicks];
  const typingSpans = typing.map(session => trimAnticipation(session, others));

  const all = [...typingSpans, ...others].sort((a, b) => a.startTime - b.startTime);
  const resolved = clipToDuration(resolveOverlaps(all), duration);
  return fillGaps(resolved, duration, settings);
}

// MARK: typing

function hasShortcutModifiers(data: KeyEventData): boolean {
  return data.modifiers.command || data.modifiers.control || data.modifiers.option;
}

function detectTypingSessions(
  timeline: EventTimeline,
  samples: readonly UIStateSample[],
  settings: ClassifierSettings,
): TypingSession[] {
  const keyDowns = timeline.events.filter(
    e => e.kind.type === 'keyDown' && !hasShortcutModifiers(e.kind),
  );
  if (keyDowns.length === 0) return [];

  const sessions: TypingSession[] = [];
  let group: UnifiedEvent[] = [keyDowns[0]];

  for (const event of keyDowns.slice(1)) {
    const last = group[group.length - 1];
    if (event.time - last.time > settings.typingSessionTimeout) {
      sessions.push(makeTypingSession(group, timeline, samples, settings));
      group = [event];
    } else {
      group.push(event);
    }
  }
  sessions.push(makeTypingSession(group, timeline, samples, settings));

  return sessions;
}

function makeTypingSession(
  keys: UnifiedEvent[],
  timeline: EventTimeline,
  samples: readonly UIStateSample[],
  settings: ClassifierSettings,
): TypingSession {
  const firstKeyTime = keys[0].time;
  const lastKeyTime = keys[keys.length - 1].time;

  const nearest = findNearest(samples, firstKeyTime);
  const sample = nearest && Math.abs(nearest.time - firstKeyTime) <= settings.uiSampleWindow
    ? nearest
    : undefined;

  const keyCount = keys.length;
  const confidence = keyCount > 3 ? 0.9 : keyCount > 1 ? 0.7 : 0.5;

  return {
    firstKeyTime,
    span: {
      startTime: Math.max(0, firstKeyTime - settings.typingAnticipation),
      endTime: lastKeyTime,
      intent: { type: 'typing', context: typingContext(firstKeyTime, lastKeyTime, timeline, sample) },
      confidence,
      focusPosition: typingFocus(firstKeyTime, timeline, sample),
      focusElement: sample?.elementInfo,
    },
  };
}

function typingFocus(
  firstKeyTime: number,
  timeline: EventTimeline,
  sample: UIStateSample | undefined,
): NormalizedPoint {
  if (sample?.caretBounds) {
    const caret = rectCenter(sample.caretBounds);
    if (isInUnitRange(caret)) return caret;
  }
  if (sample) return sample.cursorPosition;
  return lastMousePosition(timeline, firstKeyTime) ?? SCREEN_CENTER;
}

function typingContext(
  start: number,
  end: number,
  timeline: EventTimeline,
  sample: UIStateSample | undefined,
): TypingContext {
  const role = sample?.elementInfo?.role.toLowerCase() ?? '';
  const appName = sample?.elementInfo?.applicationName ?? '';
  const bundleId = eventsInRange(timeline, Math.max(0, start - 0.5), end + 0.5)
    .find(e => e.metadata.appBundleId !== undefined)?.metadata.appBundleId ?? '';

  if (textFieldRoles.has(role)) return 'textField';
  if (isTerminalApp(bundleId, appName)) return 'terminal';
  if (isCodeEditorApp(bundleId, appName)) return 'codeEditor';
  if (role === 'axtextarea') {
    const subrole = sample?.elementInfo?.subrole ?? '';
    const hints = [bundleId, appName, subrole].map(s => s.toLowerCase());
    const richText = hints.some(hint => richTextKeywords.some(k => hint.includes(k)));
    return richText ? 'textField' : 'codeEditor';
  }
  return 'textField';
}

/**
 * Pull the anticipated start forward so it does not reach back into a span
 * that ends before the first keystroke.
 */
function trimAnticipation(session: TypingSession, others: readonly IntentSpan[]): IntentSpan {
  let start = session.span.startTime;
  for (const other of others) {
    if (other.startTime < session.firstKeyTime && other.endTime > start) {
      start = Math.min(session.firstKeyTime, Math.max(start, other.endTime));
    }
  }
  return start === session.span.startTime ? session.span : { ...session.span, startTime: start };
}

/** A click that leads into typing ends where the typing begins. */
function endAtFirstKey(span: IntentSpan, firstKeys: readonly number[]): IntentSpan {
  const cut = firstKeys.find(t => t > span.startTime && t < span.endTime);
  return cut === undefined ? span : { ...span, endTime: cut };
}

// MARK: dragging

function detectDraggingSpans(timeline: EventTimeline): IntentSpan[] {
  const spans: IntentSpan[] = [];
  for (const event of timeline.events) {
    if (event.kind.type !== 'dragStart') continue;
    spans.push({
      startTime: event.kind.startTime,
      endTime: event.kind.endTime,
      intent: { type: 'dragging', dragType: event.kind.dragType },
      confidence: 0.95,
      focusPosition: event.kind.startPosition,
    });
  }
  return spans;
}

// MARK: scrolling

function detectScrollingSpans(timeline: EventTimeline, settings: ClassifierSettings): IntentSpan[] {
  const scrolls = timeline.events.filter(e => e.kind.type === 'scroll');
  if (scrolls.length === 0) return [];

  const spans: IntentSpan[] = [];
  const emit = (group: UnifiedEvent[]) => {
    const start = group[0].time;
    const end = Math.max(group[group.length - 1].time, start + settings.pointSpanDuration);
    spans.push({
      startTime: start,
      endTime: end,
      intent: { type: 'scrolling' },
      confidence: 0.9,
      focusPosition: group[0].position,
    });
  };

  let group: UnifiedEvent[] = [scrolls[0]];
  for (const event of scrolls.slice(1)) {
    if (event.time - group[group.length - 1].time > settings.scrollMergeGap) {
      emit(group);
      group = [event];
    } else {
      group.push(event);
    }
  }
  emit(group);

  return spans;
}

// MARK: switching

interface AppObservation {
  time: number;
  app: string;
  position: NormalizedPoint;
}

/** Observations where the canonical app differs from the one before it. */
function appChanges(observations: readonly AppObservation[]): AppObservation[] {
  const changes: AppObservation[] = [];
  let lastApp: string | undefined;
  for (const observation of observations) {
    const identity = canonicalAppIdentity(observation.app);
    if (lastApp !== undefined && lastApp !== identity) changes.push(observation);
    lastApp = identity;
  }
  return changes;
}

/**
 * App changes come from event metadata first. A change seen only in the
 * sampled application name counts when no event change lies within
 * `uiSampleWindow` of it.
 */
function detectSwitchingSpans(
  timeline: EventTimeline,
  samples: readonly UIStateSample[],
  settings: ClassifierSettings,
): IntentSpan[] {
  const fromEvents = appChanges(timeline.events.flatMap(e => {
    const app = e.metadata.appBundleId;
    return app ? [{ time: e.time, app, position: e.position }] : [];
  }));
  const fromSamples = appChanges(samples.flatMap(s => {
    const app = s.elementInfo?.applicationName;
    return app ? [{ time: s.time, app, position: s.cursorPosition }] : [];
  })).filter(change => !fromEvents.some(e => Math.abs(e.time - change.time) <= settings.uiSampleWindow));

  return [...fromEvents, ...fromSamples]
    .sort((a, b) => a.time - b.time)
    .map((change): IntentSpan => ({
      startTime: Math.max(0, change.time - settings.pointSpanDuration),
      endTime: change.time + settings.pointSpanDuration,
      intent: { type: 'switching' },
      confidence: 0.85,
      focusPosition: change.position,
    }));
}

// MARK: clicking / navigating

function detectClickSpans(
  timeline: EventTimeline,
  excluded: ReadonlyArray<[number, number]>,
  samples: readonly UIStateSample[],
  settings: ClassifierSettings,
): IntentSpan[] {
  const clicks = timeline.events.filter(
    e => e.kind.type === 'click'
      && e.kind.clickType === 'leftDown'
      && !excluded.some(([start, end]) => e.time >= start && e.time <= end),
  );
  if (clicks.length === 0) return [];

  const spans: IntentSpan[] = [];
  let group: UnifiedEvent[] = [clicks[0]];
  let groupCenter = new RunningCentroid(clicks[0].position);

  for (const click of clicks.slice(1)) {
    const last = group[group.length - 1];
    const closeInTime = click.time - last.time <= settings.navigatingClickWindow;
    const closeInSpace = distance(click.position, last.position) <= settings.navigatingClickDistance
      || groupCenter.distanceTo(click.position) <= settings.navigatingClickDistance;

    if (closeInTime && closeInSpace) {
      group.push(click);
      groupCenter.add(click.position);
    } else {
      spans.push(...emitClickGroup(group, samples, settings));
      group = [click];
      groupCenter = new RunningCentroid(click.position);
    }
  }
  spans.push(...emitClickGroup(group, samples, settings));

  return spans;
}

function emitClickGroup(
  group: UnifiedEvent[],
  samples: readonly UIStateSample[],
  settings: ClassifierSettings,
): IntentSpan[] {
  const changeAfter = (time: number) => detectPostClickChange(
    time, samples, settings.contextChangeWindow, settings.contextChangeAreaRatio,
  );

  if (group.length >= settings.navigatingMinClicks) {
    const first = group[0];
    const last = group[group.length - 1];
    return [withContextChange({
      startTime: first.time,
      endTime: last.time + settings.pointSpanDuration,
      intent: { type: 'navigating' },
      confidence: 0.8,
      focusPosition: centroid(group.map(e => e.position)),
      focusElement: last.metadata.elementInfo,
    }, changeAfter(last.time))];
  }

  return group.map(event => withContextChange({
    startTime: event.time,
    endTime: event.time + settings.pointSpanDuration,
    intent: { type: 'clicking' },
    confidence: 0.9,
    focusPosition: event.position,
    focusElement: event.metadata.elementInfo,
  }, changeAfter(event.time)));
}

function withContextChange(span: IntentSpan, change: IntentSpan['contextChange']): IntentSpan {
  return change ? { ...span, contextChange: change } : span;
}

// MARK: assembly

/**
 * Later spans that overlap an earlier one start where it ends, or vanish.
 * Switching spans are the exception: they keep their whole window and the
 * earlier span is cut back to make room.
 */
function resolveOverlaps(spans: readonly IntentSpan[]): IntentSpan[] {
  const result: IntentSpan[] = [];
  for (const span of spans) {
    const prev = result[result.length - 1];
    if (!prev || span.startTime >= prev.endTime) {
      result.push(span);
    } else if (span.intent.type === 'switching') {
      if (prev.startTime < span.startTime) {
        result[result.length - 1] = { ...prev, endTime: span.startTime };
      } else {
        result.pop();
      }
      result.push(span);
    } else if (prev.endTime < span.endTime) {
      result.push({ ...span, startTime: prev.endTime });
    }
  }
  return result;
}

function clipToDuration(spans: readonly IntentSpan[], duration: number): IntentSpan[] {
  return spans
    .map(span => (span.endTime > duration ? { ...span, endTime: duration } : span))
    .filter(span => span.endTime - span.startTime > 0);
}

function compatibleForContinuation(previous: UserIntent, next: UserIntent): boolean {
  switch (previous.type) {
    case 'typing':
      return next.type === 'typing' && previous.context === next.context;
    case 'clicking':
    case 'navigating':
      return next.type === 'clicking' || next.type === 'navigating';
    case 'dragging':
    case 'scrolling':
      return next.type === previous.type;
    default:
      return false;
  }
}

function idleSpan(
  start: number,
  end: number,
  focusPosition: NormalizedPoint,
  settings: ClassifierSettings,
): IntentSpan {
  return {
    startTime: start,
    endTime: end,
    intent: { type: 'idle' },
    confidence: end - start >= settings.idleThreshold ? 0.8 : 0.5,
    focusPosition,
  };
}

function fillGaps(spans: readonly IntentSpan[], duration: number, settings: ClassifierSettings): IntentSpan[] {
  if (spans.length === 0) return [idleSpan(0, duration, SCREEN_CENTER, settings)];

  const result: IntentSpan[] = [];
  let cursor = 0;

  for (const original of spans) {
    let span = original;
    const gap = span.startTime - cursor;
    const prev = result[result.length - 1];

    if (gap > GAP_EPSILON) {
      const bridge = prev !== undefined
        && compatibleForContinuation(prev.intent, span.intent)
        && (gap < settings.minGapDuration
          || (gap <= settings.continuationGap
            && distance(prev.focusPosition, span.focusPosition) < settings.continuationMaxDistance));

      if (bridge) {
        result[result.length - 1] = { ...prev, endTime: span.startTime };
      } else {
        result.push(idleSpan(cursor, span.startTime, prev?.focusPosition ?? SCREEN_CENTER, settings));
      }
    } else if (gap > 0) {
      if (prev) {
        result[result.length - 1] = { ...prev, endTime: span.startTime };
      } else {
        span = { ...span, startTime: 0 };
      }
    }

    result.push(span);
    cursor = span.endTime;
  }

  const trailing = duration - cursor;
  const last = result[result.length - 1];
  if (trailing > GAP_EPSILON) {
    result.push(idleSpan(cursor, duration, last.focusPosition, settings));
  } else if (trailing > 0) {
    result[result.length - 1] = { ...last, endTime: duration };
  }

  return result;
}
