import type { UIStateSample } from '../timeline/types.js';
import type { ContextChange } from './types.js';

const modalRoles = new Set(['AXSheet', 'AXDialog', 'AXPopover', 'AXMenu']);

function area(sample: UIStateSample): number | null {
  const frame = sample.elementInfo?.frame;
  return frame ? frame.width * frame.height : null;
}

/** Compare two consecutive UI-state samples for a change in the focused element. */
export function detectContextChange(
  previous: UIStateSample | undefined,
  current: UIStateSample,
  areaRatioThreshold: number,
): ContextChange | undefined {
  if (!previous) return undefined;

  const currentArea = area(current);
  const previousArea = area(previous);
  if (currentArea !== null && previousArea !== null && previousArea > 0) {
    const ratio = currentArea / previousArea;
    if (ratio > areaRatioThreshold) return { type: 'expansion', ratio };
    if (ratio < 1 / areaRatioThreshold) return { type: 'contraction', ratio };
  }

  const currentRole = current.elementInfo?.role;
  const previousRole = previous.elementInfo?.role;
  if (currentRole && modalRoles.has(currentRole) && previousRole && !modalRoles.has(previousRole)) {
    return { type: 'modalOpened', role: currentRole };
  }

  return undefined;
}

/**
 * Context change caused by a click: the first sample within `window` seconds
 * after the click, compared to the last sample at or before it. Samples
 * outside the window are not attached.
 */
export function detectPostClickChange(
  clickTime: number,
  samples: readonly UIStateSample[],
  window: number,
  areaRatioThreshold: number,
): ContextChange | undefined {
  let pre: UIStateSample | undefined;
  let post: UIStateSample | undefined;
  for (const sample of samples) {
    if (sample.time <= clickTime) {
      if (!pre || sample.time >= pre.time) pre = sample;
    } else if (sample.time <= clickTime + window) {
      if (!post || sample.time < post.time) post = sample;
    }
  }
  if (!post) return undefined;
  return detectContextChange(pre, post, areaRatioThreshold);
}
