import type { Rect, Size } from '../geometry/point.js';

// Raw recorder output. Positions and frames are capture pixels, top-left origin.

export const clickTypes = ['leftDown', 'leftUp', 'rightDown', 'rightUp'] as const;
export type ClickType = (typeof clickTypes)[number];

export const dragTypes = ['selection', 'move', 'resize'] as const;
export type DragType = (typeof dragTypes)[number];

export interface ElementRecord {
  role: string;
  subrole?: string;
  frame: Rect;
  title?: string;
  isClickable: boolean;
  applicationName?: string;
}

export interface MousePositionRecord {
  time: number;
  x: number;
  y: number;
  appBundleId?: string;
}

export interface ClickRecord {
  time: number;
  x: number;
  y: number;
  clickType: ClickType;
  appBundleId?: string;
  element?: ElementRecord;
}

export interface DragRecord {
  startTime: number;
  endTime: number;
  startX: number;
  startY: number;
  endX: number;
  endY: number;
  dragType: DragType;
}

export interface ScrollRecord {
  time: number;
  x: number;
  y: number;
  deltaX: number;
  deltaY: number;
}

export interface KeyModifiers {
  command: boolean;
  shift: boolean;
  option: boolean;
  control: boolean;
}

export interface KeyRecord {
  time: number;
  type: 'keyDown' | 'keyUp';
  keyCode: number;
  modifiers: KeyModifiers;
  character?: string;
}

export interface UIStateSampleRecord {
  time: number;
  cursorX: number;
  cursorY: number;
  element?: ElementRecord;
  caretBounds?: Rect;
}

export interface Recording {
  version: 1;
  duration: number;
  screenBounds: Size;
  mousePositions: MousePositionRecord[];
  clicks: ClickRecord[];
  drags: DragRecord[];
  scrolls: ScrollRecord[];
  keys: KeyRecord[];
  uiStateSamples: UIStateSampleRecord[];
}
