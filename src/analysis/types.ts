import type { NormalizedPoint } from '../geometry/point.js';
import type { DragType } from '../recording/types.js';
import type { UIElementInfo } from '../timeline/types.js';

export type TypingContext = 'codeEditor' | 'textField' | 'terminal';

export type UserIntent =
  | { type: 'typing'; context: TypingContext }
  | { type: 'clicking' }
  | { type: 'navigating' }
  | { type: 'dragging'; dragType: DragType }
  | { type: 'scrolling' }
  | { type: 'idle' }
  | { type: 'switching' };

export type IntentType = UserIntent['type'];

/** Equal only when both the variant and its payload match. */
export function intentsEqual(a: UserIntent, b: UserIntent): boolean {
  switch (a.type) {
    case 'typing':
      return b.type === 'typing' && a.context === b.context;
    case 'dragging':
      return b.type === 'dragging' && a.dragType === b.dragType;
    default:
      return a.type === b.type;
  }
}

export function intentLabel(intent: UserIntent): string {
  switch (intent.type) {
    case 'typing':
      return `typing(${intent.context})`;
    case 'dragging':
      return `dragging(${intent.dragType})`;
    default:
      return intent.type;
  }
}

export type ContextChange =
  | { type: 'expansion'; ratio: number }
  | { type: 'contraction'; ratio: number }
  | { type: 'modalOpened'; role: string };

export interface IntentSpan {
  startTime: number;
  endTime: number;
  intent: UserIntent;
  confidence: number;
  focusPosition: NormalizedPoint;
  focusElement?: UIElementInfo;
  contextChange?: ContextChange;
}
