import type { EasingCurve } from '../config/config-schema.js';
import type { NormalizedPoint, Rect } from '../geometry/point.js';
import type { ContextChange, UserIntent } from '../analysis/types.js';
import type { UIElementInfo } from '../timeline/types.js';

export type FocusSource =
  | { type: 'cursorPosition' }
  | { type: 'activeElement'; element: UIElementInfo };

export interface FocusRegion {
  time: number;
  region: Rect;
  confidence: number;
  source: FocusSource;
}

export interface CameraScene {
  startTime: number;
  endTime: number;
  primaryIntent: UserIntent;
  focusRegions: FocusRegion[];
  appContext?: string;
  /** Last context change recorded by the spans that formed this scene. */
  contextChange?: ContextChange;
}

export type ShotType =
  | { type: 'wide' }
  | { type: 'medium'; zoom: number }
  | { type: 'closeUp'; zoom: number };

/** Which rule produced a shot's zoom. */
export type ZoomSource =
  | 'element'
  | 'activityBBox'
  | 'singleEvent'
  | 'intentMidpoint'
  | 'fixed'
  | 'idleDecay';

export interface ShotPlan {
  scene: CameraScene;
  shotType: ShotType;
  idealZoom: number;
  idealCenter: NormalizedPoint;
  zoomSource: ZoomSource;
}

export type TransitionStyle =
  | { type: 'cut' }
  | { type: 'directPan'; duration: number }
  | { type: 'zoomOutAndPan'; duration: number }
  | { type: 'zoomInAndPan'; duration: number };

export interface TransitionPlan {
  style: TransitionStyle;
  easing: EasingCurve;
}
