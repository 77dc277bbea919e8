import { SCREEN_CENTER, type NormalizedPoint, type Rect, type Size } from '../geometry/point.js';
import type {
  ClickRecord,
  DragRecord,
  ElementRecord,
  KeyRecord,
  MousePositionRecord,
  Recording,
  ScrollRecord,
  UIStateSampleRecord,
} from '../recording/types.js';
import { findLastAtOrBefore } from './lookup.js';
import type {
  EventTimeline,
  ScrollDirection,
  UIElementInfo,
  UIStateSample,
  UnifiedEvent,
} from './types.js';

/** Minimum spacing between kept mouse-move samples (10 Hz). */
export const MOUSE_MOVE_INTERVAL = 0.1;

/** How far back a key event looks for a UI-state sample carrying caret bounds. */
export const CARET_LOOKBACK = 1.0;

const EPSILON = 1e-9;

function isValidTime(time: number): boolean {
  return Number.isFinite(time) && time >= 0;
}

function normalizePoint(x: number, y: number, bounds: Size): NormalizedPoint | null {
  const nx = x / bounds.width;
  const ny = y / bounds.height;
  if (!Number.isFinite(nx) || !Number.isFinite(ny)) return null;
  if (nx < 0 || nx > 1 || ny < 0 || ny > 1) return null;
  return { x: nx, y: ny };
}

function normalizeRect(rect: Rect, bounds: Size): Rect | null {
  const normalized = {
    x: rect.x / bounds.width,
    y: rect.y / bounds.height,
    width: rect.width / bounds.width,
    height: rect.height / bounds.height,
  };
  const values = [normalized.x, normalized.y, normalized.width, normalized.height];
  if (!values.every(Number.isFinite) || normalized.width < 0 || normalized.height < 0) return null;
  return normalized;
}

function normalizeElement(element: ElementRecord | undefined, bounds: Size): UIElementInfo | undefined {
  if (!element) return undefined;
  const frame = normalizeRect(element.frame, bounds);
  if (!frame) return undefined;
  return { ...element, frame };
}

function byTime<T extends { time: number }>(a: T, b: T): number {
  return a.time - b.time;
}

interface AppSample {
  time: number;
  app: string;
}

/**
 * Resolves the active application for an event that did not record one, from
 * the nearest preceding mouse sample, then the nearest preceding UI sample.
 */
class AppContextIndex {
  private readonly fromMouse: AppSample[];
  private readonly fromUIState: AppSample[];

  constructor(positions: readonly MousePositionRecord[], samples: readonly UIStateSample[]) {
    this.fromMouse = positions.flatMap(p => (p.appBundleId ? [{ time: p.time, app: p.appBundleId }] : []));
    this.fromUIState = samples.flatMap(s => {
      const app = s.elementInfo?.applicationName;
      return app ? [{ time: s.time, app }] : [];
    });
  }

  resolve(time: number, own?: string): string | undefined {
    if (own) return own;
    return findLastAtOrBefore(this.fromMouse, time)?.app
      ?? findLastAtOrBefore(this.fromUIState, time)?.app;
  }
}

function scrollDirection(deltaX: number, deltaY: number): ScrollDirection {
  if (Math.abs(deltaY) >= Math.abs(deltaX)) return deltaY > 0 ? 'down' : 'up';
  return deltaX > 0 ? 'right' : 'left';
}

function buildUIStateSamples(records: readonly UIStateSampleRecord[], bounds: Size): UIStateSample[] {
  const samples: UIStateSample[] = [];
  for (const record of records) {
    if (!isValidTime(record.time)) continue;
    const cursorPosition = normalizePoint(record.cursorX, record.cursorY, bounds);
    if (!cursorPosition) continue;
    const caret = record.caretBounds ? normalizeRect(record.caretBounds, bounds) : null;
    samples.push({
      time: record.time,
      cursorPosition,
      elementInfo: normalizeElement(record.element, bounds),
      ...(caret ? { caretBounds: caret } : {}),
    });
  }
  return samples.sort(byTime);
}

function downsamplePositions(positions: readonly MousePositionRecord[]): MousePositionRecord[] {
  const kept: MousePositionRecord[] = [];
  let lastKept = -Infinity;
  for (const p of positions) {
    if (p.time - lastKept >= MOUSE_MOVE_INTERVAL - EPSILON) {
      kept.push(p);
      lastKept = p.time;
    }
  }
  return kept;
}

/**
 * Merge independently sampled recorder streams into one time-sorted,
 * position-normalized event sequence.
 *
 * Records with a non-finite or negative time, or a position outside the
 * capture bounds, are dropped. Every event is tagged with the active
 * application; key events also get the mouse position and caret bounds in
 * effect when they were pressed.
 */
export function buildEventTimeline(recording: Recording): EventTimeline {
  const bounds = recording.screenBounds;
  const duration = Number.isFinite(recording.duration) ? Math.max(0, recording.duration) : 0;

  const positions = recording.mousePositions
    .filter(p => isValidTime(p.time) && normalizePoint(p.x, p.y, bounds) !== null)
    .sort(byTime);
  const uiStateSamples = buildUIStateSamples(recording.uiStateSamples, bounds);
  const appIndex = new AppContextIndex(positions, uiStateSamples);
  const caretSamples = uiStateSamples.filter(s => s.caretBounds !== undefined);

  const events: UnifiedEvent[] = [];

  for (const p of downsamplePositions(positions)) {
    const position = normalizePoint(p.x, p.y, bounds);
    if (!position) continue;
    events.push({
      time: p.time,
      kind: { type: 'mouseMove' },
      position,
      metadata: { appBundleId: appIndex.resolve(p.time, p.appBundleId) },
    });
  }

  for (const click of recording.clicks) {
    const event = clickEvent(click, bounds, appIndex);
    if (event) events.push(event);
  }

  for (const drag of recording.drags) {
    events.push(...dragEvents(drag, bounds, appIndex));
  }

  for (const scroll of recording.scrolls) {
    const event = scrollEvent(scroll, bounds, appIndex);
    if (event) events.push(event);
  }

  for (const key of recording.keys) {
    const event = keyEvent(key, positions, caretSamples, bounds, appIndex);
    if (event) events.push(event);
  }

  events.sort(byTime);

  return Object.freeze({
    events: Object.freeze(events),
    duration,
    uiStateSamples: Object.freeze(uiStateSamples),
  });
}

function clickEvent(click: ClickRecord, bounds: Size, apps: AppContextIndex): UnifiedEvent | null {
  if (!isValidTime(click.time)) return null;
  const position = normalizePoint(click.x, click.y, bounds);
  if (!position) return null;
  const appBundleId = apps.resolve(click.time, click.appBundleId);
  const elementInfo = normalizeElement(click.element, bounds);
  return {
    time: click.time,
    kind: { type: 'click', position, clickType: click.clickType, appBundleId, elementInfo },
    position,
    metadata: { appBundleId, elementInfo },
  };
}

function dragEvents(drag: DragRecord, bounds: Size, apps: AppContextIndex): UnifiedEvent[] {
  if (!isValidTime(drag.startTime) || !isValidTime(drag.endTime) || drag.endTime < drag.startTime) {
    return [];
  }
  const startPosition = normalizePoint(drag.startX, drag.startY, bounds);
  const endPosition = normalizePoint(drag.endX, drag.endY, bounds);
  if (!startPosition || !endPosition) return [];

  const data = {
    startTime: drag.startTime,
    endTime: drag.endTime,
    startPosition,
    endPosition,
    dragType: drag.dragType,
  };
  return [
    {
      time: drag.startTime,
      kind: { type: 'dragStart', ...data },
      position: startPosition,
      metadata: { appBundleId: apps.resolve(drag.startTime) },
    },
    {
      time: drag.endTime,
      kind: { type: 'dragEnd', ...data },
      position: endPosition,
      metadata: { appBundleId: apps.resolve(drag.endTime) },
    },
  ];
}

function scrollEvent(scroll: ScrollRecord, bounds: Size, apps: AppContextIndex): UnifiedEvent | null {
  if (!isValidTime(scroll.time)) return null;
  const position = normalizePoint(scroll.x, scroll.y, bounds);
  if (!position) return null;
  const magnitude = Math.hypot(scroll.deltaX, scroll.deltaY);
  if (!Number.isFinite(magnitude)) return null;
  return {
    time: scroll.time,
    kind: { type: 'scroll', direction: scrollDirection(scroll.deltaX, scroll.deltaY), magnitude },
    position,
    metadata: { appBundleId: apps.resolve(scroll.time) },
  };
}

function keyEvent(
  key: KeyRecord,
  positions: readonly MousePositionRecord[],
  caretSamples: readonly UIStateSample[],
  bounds: Size,
  apps: AppContextIndex,
): UnifiedEvent | null {
  if (!isValidTime(key.time)) return null;

  const lastMouse = findLastAtOrBefore(positions, key.time);
  const position = (lastMouse && normalizePoint(lastMouse.x, lastMouse.y, bounds)) ?? SCREEN_CENTER;

  const caretSample = findLastAtOrBefore(caretSamples, key.time);
  const caretBounds = caretSample && key.time - caretSample.time <= CARET_LOOKBACK
    ? caretSample.caretBounds
    : undefined;

  const data = { keyCode: key.keyCode, modifiers: key.modifiers, character: key.character };
  return {
    time: key.time,
    kind: key.type === 'keyDown' ? { type: 'keyDown', ...data } : { type: 'keyUp', ...data },
    position,
    metadata: { appBundleId: apps.resolve(key.time), ...(caretBounds ? { caretBounds } : {}) },
  };
}

/** Events with `start <= time <= end`. */
export function eventsInRange(timeline: EventTimeline, start: number, end: number): UnifiedEvent[] {
  if (start > end) return [];
  return timeline.events.filter(e => e.time >= start && e.time <= end);
}

/** Position of the last positional event at or before `time`. */
export function lastMousePosition(timeline: EventTimeline, time: number): NormalizedPoint | null {
  let found: NormalizedPoint | null = null;
  for (const event of timeline.events) {
    if (event.time > time) break;
    if (event.kind.type === 'keyDown' || event.kind.type === 'keyUp') continue;
    found = event.position;
  }
  return found;
}
