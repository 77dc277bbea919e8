import { intentLabel, type IntentType } from '../analysis/types.js';
import type { ShotPlan, TransitionPlan, TransitionStyle } from '../planning/types.js';
import type { SmartZoomResult } from './smart-zoom.js';

const fmt = (value: number, digits = 2) => value.toFixed(digits);

function transitionLabel(style: TransitionStyle): string {
  return style.type === 'cut' ? 'cut' : `${style.type}(${fmt(style.duration)}s)`;
}

function shotLine(plan: ShotPlan, index: number): string {
  const { scene, idealZoom, idealCenter, zoomSource, shotType } = plan;
  const window = `[${fmt(scene.startTime)}-${fmt(scene.endTime)}]`;
  const app = scene.appContext ? ` app=${scene.appContext}` : '';
  return `  #${index} ${window} ${intentLabel(scene.primaryIntent)} ${shotType.type}`
    + ` zoom=${fmt(idealZoom)} (${zoomSource}) center=(${fmt(idealCenter.x, 3)}, ${fmt(idealCenter.y, 3)})${app}`;
}

function transitionLine(plan: TransitionPlan, index: number): string {
  return `  #${index} -> #${index + 1} ${transitionLabel(plan.style)} easing=${plan.easing.type}`;
}

/** Count of intent spans per intent type, in first-seen order. */
export function intentCounts(result: Pick<SmartZoomResult, 'intentSpans'>): Map<IntentType, number> {
  const counts = new Map<IntentType, number>();
  for (const span of result.intentSpans) {
    counts.set(span.intent.type, (counts.get(span.intent.type) ?? 0) + 1);
  }
  return counts;
}

/** Plain-text dump of one pipeline run, one fact per line. */
export function describeResult(result: SmartZoomResult): string {
  const counts = [...intentCounts(result)].map(([type, n]) => `${type}=${n}`).join(' ');
  const lines = [
    `events: ${result.timeline.events.length}, duration: ${fmt(result.timeline.duration)}s`,
    `intents: ${result.intentSpans.length}${counts ? ` (${counts})` : ''}`,
    `scenes: ${result.scenes.length}`,
    'shots:',
    ...result.shots.map(shotLine),
    'transitions:',
    ...result.transitions.map(transitionLine),
  ];
  return lines.join('\n');
}
