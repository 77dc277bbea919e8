import { describe, it, expect } from 'vitest';
import { clampCenter, planShots, shotTypeFor } from '../../src/planning/shot-planner.js';
import type { CameraScene, FocusRegion } from '../../src/planning/types.js';
import type { UserIntent } from '../../src/analysis/types.js';
import { rectAround, type NormalizedPoint, type Rect } from '../../src/geometry/point.js';
import { buildEventTimeline } from '../../src/timeline/event-timeline.js';
import type { EventTimeline } from '../../src/timeline/types.js';
import { BOUNDS, click, keyDown, recording, sample } from '../fixtures/recording-factory.js';

const clicking: UserIntent = { type: 'clicking' };
const code: UserIntent = { type: 'typing', context: 'codeEditor' };
const idle: UserIntent = { type: 'idle' };

function scene(
  primaryIntent: UserIntent,
  startTime: number,
  endTime: number,
  extra: Partial<CameraScene> = {},
): CameraScene {
  return { startTime, endTime, primaryIntent, focusRegions: [], ...extra };
}

function elementRegion(frame: Rect): FocusRegion {
  return {
    time: 0,
    region: frame,
    confidence: 0.9,
    source: { type: 'activeElement', element: { role: 'AXButton', frame, isClickable: true } },
  };
}

function cursorRegion(center: NormalizedPoint): FocusRegion {
  return { time: 0, region: rectAround(center, 0.02, 0.02), confidence: 0.9, source: { type: 'cursorPosition' } };
}

const emptyTimeline = buildEventTimeline(recording());

function plan(scenes: CameraScene[], timeline: EventTimeline = emptyTimeline) {
  return planShots(scenes, BOUNDS, timeline);
}

describe('planShots', () => {
  describe('zoom rules', () => {
    it('sizes to the focused element', () => {
      const frame = { x: 0.4, y: 0.4, width: 0.2, height: 0.1 };
      const [shot] = plan([scene(clicking, 0, 3, { focusRegions: [elementRegion(frame)] })]);

      expect(shot.zoomSource).toBe('element');
      expect(shot.idealZoom).toBeCloseTo(0.7 / 0.36);
      expect(shot.idealCenter.x).toBeCloseTo(0.5);
      expect(shot.idealCenter.y).toBeCloseTo(0.45);
    });

    it('ignores concurrent events when an element is known', () => {
      const frame = { x: 0.4, y: 0.4, width: 0.2, height: 0.1 };
      const busy = buildEventTimeline(recording({ clicks: [click(1, 100, 100), click(2, 900, 900)] }));
      const s = scene(clicking, 0, 3, { focusRegions: [elementRegion(frame)] });

      expect(plan([s], busy)[0].idealZoom).toBe(plan([s])[0].idealZoom);
    });

    it('normalizes an element frame given in capture pixels', () => {
      const frame = { x: 400, y: 300, width: 200, height: 100 };
      const [shot] = plan([scene(clicking, 0, 3, { focusRegions: [elementRegion(frame)] })]);

      expect(shot.idealZoom).toBeCloseTo(0.7 / 0.36);
      expect(shot.idealCenter.y).toBeCloseTo(0.35);
    });

    it('frames the padded bounding box of the clicks, ignoring mouse moves', () => {
      const timeline = buildEventTimeline(recording({
        mousePositions: [{ time: 1.5, x: 900, y: 900 }],
        clicks: [click(1, 200, 200), click(2, 500, 300)],
      }));
      const [shot] = plan([scene({ type: 'navigating' }, 0, 3)], timeline);
      const zoom = 0.7 / 0.46;

      expect(shot.zoomSource).toBe('activityBBox');
      expect(shot.idealZoom).toBeCloseTo(zoom);
      expect(shot.idealCenter.x).toBeCloseTo(0.35);
      // The centroid sits at y = 0.25, which would show the area above the frame.
      expect(shot.idealCenter.y).toBeCloseTo(0.5 / zoom);
    });

    it('clamps a tight bounding box to the intent range', () => {
      const timeline = buildEventTimeline(recording({ clicks: [click(1, 400, 400), click(2, 500, 450)] }));
      const [shot] = plan([scene(clicking, 0, 3)], timeline);
      expect(shot.idealZoom).toBe(2.2);
    });

    it('uses the range floor for a single event', () => {
      const timeline = buildEventTimeline(recording({ clicks: [click(1, 100, 100)] }));
      const [shot] = plan([scene(clicking, 0, 3)], timeline);

      expect(shot.zoomSource).toBe('singleEvent');
      expect(shot.idealZoom).toBe(1.8);
      expect(shot.idealCenter.x).toBeCloseTo(0.5 / 1.8);
    });

    it('falls back to the range midpoint and the focus regions without events', () => {
      const [shot] = plan([scene({ type: 'scrolling' }, 0, 3, { focusRegions: [cursorRegion({ x: 0.6, y: 0.6 })] })]);

      expect(shot.zoomSource).toBe('intentMidpoint');
      expect(shot.idealZoom).toBeCloseTo(1.4);
      expect(shot.idealCenter.x).toBeCloseTo(0.6);
      expect(shot.idealCenter.y).toBeCloseTo(0.6);
    });

    it('keeps switching scenes wide and centered', () => {
      const [shot] = plan([scene({ type: 'switching' }, 0, 1)]);
      expect(shot).toMatchObject({
        idealZoom: 1,
        idealCenter: { x: 0.5, y: 0.5 },
        shotType: { type: 'wide' },
        zoomSource: 'fixed',
      });
    });
  });

  describe('typing', () => {
    const keys = [keyDown(1), keyDown(2)];
    const mousePositions = [{ time: 0.5, x: 300, y: 300 }, { time: 1.5, x: 700, y: 700 }];

    it('centers on the first keystroke, not the middle of the session', () => {
      const timeline = buildEventTimeline(recording({ mousePositions, keys }));
      const [shot] = plan([scene(code, 0, 3)], timeline);

      expect(shot.zoomSource).toBe('activityBBox');
      expect(shot.idealZoom).toBe(2);
      expect(shot.shotType).toEqual({ type: 'medium', zoom: 2 });
      expect(shot.idealCenter).toEqual({ x: 0.3, y: 0.3 });
    });

    it('prefers the caret of the first keystroke', () => {
      const timeline = buildEventTimeline(recording({
        mousePositions,
        keys,
        uiStateSamples: [sample(0.9, { caretBounds: { x: 600, y: 200, width: 10, height: 20 } })],
      }));
      const [shot] = plan([scene(code, 0, 3)], timeline);

      expect(shot.idealCenter.x).toBeCloseTo(0.605);
      expect(shot.idealCenter.y).toBeCloseTo(0.25);
    });
  });

  describe('context changes', () => {
    const small = { x: 0.45, y: 0.45, width: 0.05, height: 0.05 };

    it('zooms out for an expansion', () => {
      const [shot] = plan([scene(clicking, 0, 3, {
        focusRegions: [elementRegion(small)],
        contextChange: { type: 'expansion', ratio: 1.21 },
      })]);
      expect(shot.idealZoom).toBeCloseTo(2);
    });

    it('drops to the range floor for a modal', () => {
      const [shot] = plan([scene(clicking, 0, 3, {
        focusRegions: [elementRegion(small)],
        contextChange: { type: 'modalOpened', role: 'AXSheet' },
      })]);
      expect(shot.idealZoom).toBe(1.8);
    });

    it('leaves a contraction alone', () => {
      const [shot] = plan([scene(clicking, 0, 3, {
        focusRegions: [elementRegion(small)],
        contextChange: { type: 'contraction', ratio: 0.2 },
      })]);
      expect(shot.idealZoom).toBe(2.2);
    });
  });

  describe('idle decay', () => {
    const timeline = buildEventTimeline(recording({ clicks: [click(1, 450, 520), click(3, 450, 520)] }));

    it('keeps idle zoom strictly between the neighbour and 1.0, on the neighbour center', () => {
      const shots = plan([scene(clicking, 0, 2), scene(idle, 2, 5), scene(code, 5, 10)], timeline);

      expect(shots[0].idealZoom).toBe(1.8);
      expect(shots[1].zoomSource).toBe('idleDecay');
      expect(shots[1].idealZoom).toBeCloseTo(1.4);
      expect(shots[1].idealZoom).toBeGreaterThan(1);
      expect(shots[1].idealZoom).toBeLessThan(shots[0].idealZoom);
      expect(shots[1].idealCenter).toEqual(shots[0].idealCenter);
    });

    it('decays a run of idle scenes to one value', () => {
      const shots = plan([scene(clicking, 0, 2), scene(idle, 2, 4), scene(idle, 4, 6)], timeline);
      expect(shots[1].idealZoom).toBe(shots[2].idealZoom);
    });

    it('looks ahead when the idle scene leads the recording', () => {
      const shots = plan([scene(idle, 0, 2), scene(clicking, 2, 4)], timeline);
      expect(shots[0].idealZoom).toBeCloseTo(1.4);
    });

    it('stays at 1.0 without a working neighbour', () => {
      expect(plan([scene(idle, 0, 5)])[0]).toMatchObject({ idealZoom: 1, zoomSource: 'fixed' });
      const afterSwitch = plan([scene({ type: 'switching' }, 0, 1), scene(idle, 1, 5)]);
      expect(afterSwitch[1].idealZoom).toBe(1);
    });
  });
});

describe('shotTypeFor', () => {
  it('classifies by zoom', () => {
    expect(shotTypeFor(1)).toEqual({ type: 'wide' });
    expect(shotTypeFor(1.5)).toEqual({ type: 'medium', zoom: 1.5 });
    expect(shotTypeFor(2)).toEqual({ type: 'medium', zoom: 2 });
    expect(shotTypeFor(2.4)).toEqual({ type: 'closeUp', zoom: 2.4 });
  });
});

describe('clampCenter', () => {
  it('keeps the viewport inside the frame', () => {
    expect(clampCenter({ x: 0, y: 1 }, 2)).toEqual({ x: 0.25, y: 0.75 });
    expect(clampCenter({ x: 0.1, y: 0.9 }, 1)).toEqual({ x: 0.5, y: 0.5 });
  });
});
