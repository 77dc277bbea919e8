import type { Range, TransitionSettings } from '../config/config-schema.js';
import { defaultConfig } from '../config/defaults.js';
import { clamp } from '../geometry/point.js';
import type { ShotPlan, TransitionPlan } from './types.js';

function interpolate(range: Range, t: number): number {
  return range[0] + (range[1] - range[0]) * clamp(t, 0, 1);
}

/**
 * Center displacement measured in half-viewports at the source zoom, so the
 * same raw move counts as farther when the camera is zoomed in.
 */
export function viewportDistance(from: ShotPlan, to: ShotPlan): number {
  const half = 0.5 / Math.max(from.idealZoom, 1);
  const dx = Math.abs(from.idealCenter.x - to.idealCenter.x);
  const dy = Math.abs(from.idealCenter.y - to.idealCenter.y);
  return Math.max(dx, dy) / half;
}

export function planTransition(from: ShotPlan, to: ShotPlan, settings: TransitionSettings): TransitionPlan {
  if (to.scene.primaryIntent.type === 'switching') {
    return { style: { type: 'cut' }, easing: { type: 'linear' } };
  }

  const distance = viewportDistance(from, to);
  const { directPanThreshold, gentlePanThreshold, fullZoomOutThreshold } = settings;

  if (distance < directPanThreshold) {
    return {
      style: { type: 'directPan', duration: interpolate(settings.shortPanDurationRange, distance / directPanThreshold) },
      easing: settings.panEasing,
    };
  }

  if (distance < gentlePanThreshold) {
    const t = (distance - directPanThreshold) / (gentlePanThreshold - directPanThreshold);
    return {
      style: { type: 'directPan', duration: interpolate(settings.mediumPanDurationRange, t) },
      easing: settings.panEasing,
    };
  }

  const t = (distance - gentlePanThreshold) / (fullZoomOutThreshold - gentlePanThreshold);
  if (to.idealZoom > from.idealZoom) {
    return {
      style: { type: 'zoomInAndPan', duration: interpolate(settings.zoomInPanDurationRange, t) },
      easing: settings.zoomInEasing,
    };
  }
  return {
    style: { type: 'zoomOutAndPan', duration: interpolate(settings.zoomOutPanDurationRange, t) },
    easing: settings.zoomOutEasing,
  };
}

/** One transition per adjacent pair of shots. */
export function planTransitions(
  shotPlans: readonly ShotPlan[],
  settings: TransitionSettings = defaultConfig.transition,
): TransitionPlan[] {
  const transitions: TransitionPlan[] = [];
  for (let i = 0; i < shotPlans.length - 1; i++) {
    transitions.push(planTransition(shotPlans[i], shotPlans[i + 1], settings));
  }
  return transitions;
}
