import type { Range, ShotSettings } from '../config/config-schema.js';
import { defaultConfig } from '../config/defaults.js';
import {
  SCREEN_CENTER,
  centroid,
  clamp,
  paddedBoundingBox,
  rectCenter,
  type NormalizedPoint,
  type Rect,
  type Size,
} from '../geometry/point.js';
import type { ContextChange, TypingContext, UserIntent } from '../analysis/types.js';
import { eventsInRange } from '../timeline/event-timeline.js';
import type { EventTimeline, UnifiedEvent } from '../timeline/types.js';
import type { CameraScene, FocusRegion, ShotPlan, ShotType, ZoomSource } from './types.js';

// Bounding boxes smaller than this are treated as degenerate.
const MIN_AREA_SIZE = 0.01;

function typingZoomRange(context: TypingContext, settings: ShotSettings): Range {
  switch (context) {
    case 'codeEditor':
      return settings.typingCodeZoomRange;
    case 'textField':
      return settings.typingTextFieldZoomRange;
    case 'terminal':
      return settings.typingTerminalZoomRange;
  }
}

export function zoomRangeFor(intent: UserIntent, settings: ShotSettings): Range {
  switch (intent.type) {
    case 'typing':
      return typingZoomRange(intent.context, settings);
    case 'clicking':
      return settings.clickingZoomRange;
    case 'navigating':
      return settings.navigatingZoomRange;
    case 'dragging':
      return settings.draggingZoomRange;
    case 'scrolling':
      return settings.scrollingZoomRange;
    case 'idle':
      return [settings.idleZoom, settings.idleZoom];
    case 'switching':
      return [settings.switchingZoom, settings.switchingZoom];
  }
}

export function shotTypeFor(zoom: number): ShotType {
  if (zoom <= 1.0) return { type: 'wide' };
  if (zoom <= 2.0) return { type: 'medium', zoom };
  return { type: 'closeUp', zoom };
}

/** Keep the viewport, `0.5 / zoom` on each side of the center, inside the frame. */
export function clampCenter(center: NormalizedPoint, zoom: number): NormalizedPoint {
  const half = 0.5 / Math.max(zoom, 1);
  return {
    x: clamp(center.x, half, 1 - half),
    y: clamp(center.y, half, 1 - half),
  };
}

function clampZoom(zoom: number, range: Range, settings: ShotSettings): number {
  const ranged = clamp(zoom, range[0], range[1]);
  return clamp(ranged, settings.minZoom, settings.maxZoom);
}

/**
 * Element frames are normalized by the timeline; a frame that still looks
 * like capture pixels is scaled down, and one that cannot be mapped is ignored.
 */
function normalizeFrame(frame: Rect, screenBounds: Size): Rect | null {
  const inUnit = (r: Rect) =>
    r.x >= -0.1 && r.y >= -0.1 && r.x + r.width <= 1.1 && r.y + r.height <= 1.1;
  if (inUnit(frame)) return frame;
  if (screenBounds.width <= 0 || screenBounds.height <= 0) return null;
  const scaled = {
    x: frame.x / screenBounds.width,
    y: frame.y / screenBounds.height,
    width: frame.width / screenBounds.width,
    height: frame.height / screenBounds.height,
  };
  const originValid = scaled.x >= -0.1 && scaled.x <= 1.1 && scaled.y >= -0.1 && scaled.y <= 1.1;
  return originValid ? scaled : null;
}

function elementRegion(scene: CameraScene): FocusRegion | undefined {
  return scene.focusRegions.find(r => r.source.type === 'activeElement');
}

/** Events that say where the work happens for this kind of activity. */
function relevantEvents(intent: UserIntent, events: readonly UnifiedEvent[]): UnifiedEvent[] {
  switch (intent.type) {
    case 'clicking':
    case 'navigating':
      return events.filter(
        e => e.kind.type === 'click' && (e.kind.clickType === 'leftDown' || e.kind.clickType === 'rightDown'),
      );
    case 'dragging':
      return events.filter(e => e.kind.type === 'dragStart' || e.kind.type === 'dragEnd');
    case 'scrolling':
      return [...events];
    case 'typing':
      return events.filter(e => e.kind.type === 'keyDown');
    default:
      return [];
  }
}

interface ZoomDecision {
  zoom: number;
  source: ZoomSource;
}

function computeZoom(
  scene: CameraScene,
  events: readonly UnifiedEvent[],
  range: Range,
  screenBounds: Size,
  settings: ShotSettings,
): ZoomDecision {
  const intent = scene.primaryIntent;
  if (intent.type === 'idle' || intent.type === 'switching') {
    return { zoom: range[0], source: 'fixed' };
  }

  const element = elementRegion(scene);
  const frame = element ? normalizeFrame(element.region, screenBounds) : null;
  if (frame) {
    const padding = settings.workAreaPadding * 2;
    const areaSize = Math.max(frame.width + padding, frame.height + padding);
    if (areaSize > MIN_AREA_SIZE) {
      return { zoom: clampZoom(settings.targetAreaCoverage / areaSize, range, settings), source: 'element' };
    }
  }

  const relevant = relevantEvents(intent, events);
  if (relevant.length >= 2) {
    const box = paddedBoundingBox(relevant.map(e => e.position), settings.workAreaPadding);
    const areaSize = Math.max(box.width, box.height);
    if (areaSize > MIN_AREA_SIZE) {
      return { zoom: clampZoom(settings.targetAreaCoverage / areaSize, range, settings), source: 'activityBBox' };
    }
  }

  if (relevant.length === 1) {
    return { zoom: clampZoom(range[0], range, settings), source: 'singleEvent' };
  }

  return { zoom: clampZoom((range[0] + range[1]) / 2, range, settings), source: 'intentMidpoint' };
}

/** Pull back for clicks that opened something larger than what was clicked. */
function adjustForContextChange(
  zoom: number,
  change: ContextChange,
  range: Range,
  settings: ShotSettings,
): number {
  switch (change.type) {
    case 'expansion':
      return clampZoom(zoom * Math.max(0.5, 1 / Math.sqrt(change.ratio)), range, settings);
    case 'modalOpened':
      return clampZoom(range[0], range, settings);
    case 'contraction':
      return zoom;
  }
}

function computeCenter(
  scene: CameraScene,
  events: readonly UnifiedEvent[],
  screenBounds: Size,
): NormalizedPoint {
  const intent = scene.primaryIntent;
  if (intent.type === 'idle' || intent.type === 'switching') return SCREEN_CENTER;

  const element = elementRegion(scene);
  const frame = element ? normalizeFrame(element.region, screenBounds) : null;
  if (frame) return rectCenter(frame);

  const relevant = relevantEvents(intent, events);
  if (relevant.length > 0) {
    if (intent.type === 'typing') {
      // The camera follows typing forward from where it begins.
      const first = relevant[0];
      const caret = first.metadata.caretBounds
        ? normalizeFrame(first.metadata.caretBounds, screenBounds)
        : null;
      return caret ? rectCenter(caret) : first.position;
    }
    return centroid(relevant.map(e => e.position));
  }

  if (scene.focusRegions.length > 0) {
    return centroid(scene.focusRegions.map(r => rectCenter(r.region)));
  }

  return SCREEN_CENTER;
}

function planScene(
  scene: CameraScene,
  screenBounds: Size,
  timeline: EventTimeline,
  settings: ShotSettings,
): ShotPlan {
  const range = zoomRangeFor(scene.primaryIntent, settings);
  const events = eventsInRange(timeline, scene.startTime, scene.endTime);

  const { source, zoom: baseZoom } = computeZoom(scene, events, range, screenBounds, settings);
  let zoom = baseZoom;
  if (scene.contextChange && source !== 'fixed') {
    zoom = adjustForContextChange(zoom, scene.contextChange, range, settings);
  }

  return {
    scene,
    shotType: shotTypeFor(zoom),
    idealZoom: zoom,
    idealCenter: clampCenter(computeCenter(scene, events, screenBounds), zoom),
    zoomSource: source,
  };
}

/**
 * Idle scenes keep part of the nearest working shot's zoom and all of its
 * center. The neighbour is the last non-idle shot before the idle run, or
 * the first one after it when the run leads the recording.
 */
function decayIdleShots(plans: ShotPlan[], settings: ShotSettings): ShotPlan[] {
  const isIdle = (plan: ShotPlan) => plan.scene.primaryIntent.type === 'idle';

  return plans.map((plan, index) => {
    if (!isIdle(plan)) return plan;

    let neighbor: ShotPlan | undefined;
    for (let i = index - 1; i >= 0 && !neighbor; i--) {
      if (!isIdle(plans[i])) neighbor = plans[i];
    }
    for (let i = index + 1; i < plans.length && !neighbor; i++) {
      if (!isIdle(plans[i])) neighbor = plans[i];
    }
    if (!neighbor || neighbor.idealZoom <= 1) return plan;

    const zoom = 1 + (neighbor.idealZoom - 1) * settings.idleZoomDecay;
    return {
      ...plan,
      shotType: shotTypeFor(zoom),
      idealZoom: zoom,
      idealCenter: clampCenter(neighbor.idealCenter, zoom),
      zoomSource: 'idleDecay',
    };
  });
}

/**
 * Choose zoom, center and shot type for every scene, in order.
 *
 * Zoom comes from the first rule that applies: the focused element's size,
 * the padded bounding box of the events relevant to the intent, the range
 * floor for a single event, or the range midpoint. Idle scenes are resolved
 * afterwards against their neighbours.
 */
export function planShots(
  scenes: readonly CameraScene[],
  screenBounds: Size,
  timeline: EventTimeline,
  settings: ShotSettings = defaultConfig.shot,
): ShotPlan[] {
  const plans = scenes.map(scene => planScene(scene, screenBounds, timeline, settings));
  return decayIdleShots(plans, settings);
}
