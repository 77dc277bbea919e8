import { clamp, type NormalizedPoint } from '../geometry/point.js';
import type { ShotPlan } from '../planning/types.js';
import type { ShotSettings } from '../config/config-schema.js';
import { zoomRangeFor } from '../planning/shot-planner.js';

/** Tolerated drift between adjacent interval edges, in seconds. */
export const TILING_EPSILON = 1e-6;

/**
 * A stage produced output that breaks a pipeline guarantee. This is a bug in
 * the stage, not a problem with the recording.
 */
export class InvariantError extends Error {
  public readonly stage: string;

  constructor(stage: string, detail: string) {
    super(`${stage}: ${detail}`);
    this.name = 'InvariantError';
    this.stage = stage;
  }
}

interface Interval {
  startTime: number;
  endTime: number;
}

/** Intervals must be sorted, contiguous and cover exactly [0, duration]. */
export function assertTiling(stage: string, intervals: readonly Interval[], duration: number): void {
  if (intervals.length === 0) {
    if (duration > 0) throw new InvariantError(stage, `nothing covers [0, ${duration}]`);
    return;
  }

  const first = intervals[0];
  const last = intervals[intervals.length - 1];
  if (Math.abs(first.startTime) > TILING_EPSILON) {
    throw new InvariantError(stage, `first interval starts at ${first.startTime}, expected 0`);
  }
  if (Math.abs(last.endTime - duration) > TILING_EPSILON) {
    throw new InvariantError(stage, `last interval ends at ${last.endTime}, expected ${duration}`);
  }

  intervals.forEach((interval, i) => {
    if (interval.endTime < interval.startTime) {
      throw new InvariantError(stage, `interval ${i} ends before it starts`);
    }
    const next = intervals[i + 1];
    if (next && Math.abs(next.startTime - interval.endTime) > TILING_EPSILON) {
      throw new InvariantError(
        stage,
        `gap or overlap between interval ${i} (ends ${interval.endTime}) and ${i + 1} (starts ${next.startTime})`,
      );
    }
  });
}

function viewportFits(center: NormalizedPoint, zoom: number): boolean {
  const half = 0.5 / Math.max(zoom, 1);
  const fits = (v: number) => v - half >= -TILING_EPSILON && v + half <= 1 + TILING_EPSILON;
  return fits(center.x) && fits(center.y);
}

/** Zoom stays within the configured bounds and the viewport stays on screen. */
export function assertShotBounds(plans: readonly ShotPlan[], settings: ShotSettings): void {
  plans.forEach((plan, i) => {
    const { idealZoom, idealCenter, zoomSource } = plan;
    // Fixed and idle-decayed zooms are exempt from the range checks.
    if (zoomSource !== 'fixed' && zoomSource !== 'idleDecay') {
      if (idealZoom < settings.minZoom - TILING_EPSILON || idealZoom > settings.maxZoom + TILING_EPSILON) {
        throw new InvariantError('shots', `shot ${i} zoom ${idealZoom} outside [${settings.minZoom}, ${settings.maxZoom}]`);
      }
      const range = zoomRangeFor(plan.scene.primaryIntent, settings);
      const [lo, hi] = range.map(v => clamp(v, settings.minZoom, settings.maxZoom));
      if (idealZoom < lo - TILING_EPSILON || idealZoom > hi + TILING_EPSILON) {
        throw new InvariantError('shots', `shot ${i} zoom ${idealZoom} outside its intent range [${lo}, ${hi}]`);
      }
    }
    if (!viewportFits(idealCenter, idealZoom)) {
      throw new InvariantError('shots', `shot ${i} viewport leaves the frame at (${idealCenter.x}, ${idealCenter.y})`);
    }
  });
}
