import { describe, it, expect } from 'vitest';
import { planTransitions, viewportDistance } from '../../src/planning/transition-planner.js';
import { shotTypeFor } from '../../src/planning/shot-planner.js';
import { defaultConfig } from '../../src/config/defaults.js';
import type { ShotPlan, TransitionPlan } from '../../src/planning/types.js';
import type { UserIntent } from '../../src/analysis/types.js';

function shot(x: number, y: number, zoom: number, intent: UserIntent = { type: 'clicking' }): ShotPlan {
  return {
    scene: { startTime: 0, endTime: 1, primaryIntent: intent, focusRegions: [] },
    shotType: shotTypeFor(zoom),
    idealZoom: zoom,
    idealCenter: { x, y },
    zoomSource: 'singleEvent',
  };
}

const { transition } = defaultConfig;

function durationOf(plan: TransitionPlan): number {
  return plan.style.type === 'cut' ? 0 : plan.style.duration;
}

describe('viewportDistance', () => {
  it('measures displacement in half-viewports at the source zoom', () => {
    expect(viewportDistance(shot(0.5, 0.5, 1), shot(0.75, 0.5, 1))).toBeCloseTo(0.5);
    expect(viewportDistance(shot(0.5, 0.5, 2.5), shot(0.75, 0.5, 2.5))).toBeCloseTo(1.25);
  });
});

describe('planTransitions', () => {
  it('plans one transition per adjacent pair', () => {
    expect(planTransitions([])).toEqual([]);
    expect(planTransitions([shot(0.5, 0.5, 1)])).toEqual([]);
    expect(planTransitions([shot(0.5, 0.5, 1), shot(0.5, 0.5, 1), shot(0.5, 0.5, 1)])).toHaveLength(2);
  });

  it('cuts into a switching scene', () => {
    const [plan] = planTransitions([shot(0.2, 0.2, 2), shot(0.5, 0.5, 1, { type: 'switching' })]);
    expect(plan).toEqual({ style: { type: 'cut' }, easing: { type: 'linear' } });
  });

  it('pans directly over a short distance', () => {
    const [plan] = planTransitions([shot(0.5, 0.5, 1), shot(0.6, 0.5, 1)]);
    expect(plan.style.type).toBe('directPan');
    expect(durationOf(plan)).toBeCloseTo(0.4 + 0.2 * (0.2 / 0.6));
    expect(plan.easing).toEqual(transition.panEasing);
  });

  it('uses the longer pan range over a medium distance', () => {
    const [plan] = planTransitions([shot(0.5, 0.5, 1), shot(0.9, 0.5, 1)]);
    expect(plan.style.type).toBe('directPan');
    expect(durationOf(plan)).toBeCloseTo(0.7);
  });

  it('judges the same move as farther when zoomed in', () => {
    const [wide] = planTransitions([shot(0.5, 0.5, 1), shot(0.75, 0.5, 1)]);
    const [close] = planTransitions([shot(0.5, 0.5, 2.5), shot(0.75, 0.5, 2.5)]);
    expect(wide.style.type).toBe('directPan');
    expect(close.style.type).toBe('zoomOutAndPan');
  });

  it('zooms out and pans between distant shots at equal zoom', () => {
    const [plan] = planTransitions([shot(0.1, 0.1, 1), shot(0.9, 0.9, 1)]);
    const [lo, hi] = transition.zoomOutPanDurationRange;

    expect(plan.style.type).toBe('zoomOutAndPan');
    const duration = durationOf(plan);
    expect(duration).toBeGreaterThanOrEqual(lo);
    expect(duration).toBeLessThanOrEqual(hi);
    expect(duration).toBeCloseTo(0.8 + 0.4 * (0.4 / 1.8));
    expect(plan.easing).toEqual(transition.zoomOutEasing);
  });

  it('zooms in and pans when the destination is closer in', () => {
    const [plan] = planTransitions([shot(0.1, 0.1, 1), shot(0.9, 0.9, 2)]);
    expect(plan.style.type).toBe('zoomInAndPan');
    expect(plan.easing).toEqual(transition.zoomInEasing);
  });

  it('caps the duration at the far end of the range', () => {
    const [plan] = planTransitions([shot(0.1, 0.1, 2.5), shot(0.9, 0.9, 1)]);
    expect(plan.style.type).toBe('zoomOutAndPan');
    expect(durationOf(plan)).toBeCloseTo(transition.zoomOutPanDurationRange[1]);
  });
});
