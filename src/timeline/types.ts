import type { NormalizedPoint, Rect } from '../geometry/point.js';
import type { ClickType, DragType, KeyModifiers } from '../recording/types.js';

/** Accessibility snapshot of one UI element. `frame` is normalized. */
export interface UIElementInfo {
  role: string;
  subrole?: string;
  frame: Rect;
  title?: string;
  isClickable: boolean;
  applicationName?: string;
}

export type ScrollDirection = 'up' | 'down' | 'left' | 'right';

export interface ClickEventData {
  position: NormalizedPoint;
  clickType: ClickType;
  appBundleId?: string;
  elementInfo?: UIElementInfo;
}

export interface DragEventData {
  startTime: number;
  endTime: number;
  startPosition: NormalizedPoint;
  endPosition: NormalizedPoint;
  dragType: DragType;
}

export interface KeyEventData {
  keyCode: number;
  modifiers: KeyModifiers;
  character?: string;
}

export type EventKind =
  | { type: 'mouseMove' }
  | ({ type: 'click' } & ClickEventData)
  | ({ type: 'dragStart' } & DragEventData)
  | ({ type: 'dragEnd' } & DragEventData)
  | { type: 'scroll'; direction: ScrollDirection; magnitude: number }
  | ({ type: 'keyDown' } & KeyEventData)
  | ({ type: 'keyUp' } & KeyEventData);

export type EventType = EventKind['type'];

export interface EventMetadata {
  /** Active application identity (bundle ID or display name) as recorded. */
  appBundleId?: string;
  elementInfo?: UIElementInfo;
  /** Normalized caret bounds, attached to key events only. */
  caretBounds?: Rect;
}

export interface UnifiedEvent {
  /** Seconds from recording start. */
  time: number;
  kind: EventKind;
  position: NormalizedPoint;
  metadata: EventMetadata;
}

/** Periodic accessibility sample, normalized. */
export interface UIStateSample {
  time: number;
  cursorPosition: NormalizedPoint;
  elementInfo?: UIElementInfo;
  caretBounds?: Rect;
}

export interface EventTimeline {
  readonly events: readonly UnifiedEvent[];
  readonly duration: number;
  readonly uiStateSamples: readonly UIStateSample[];
}
