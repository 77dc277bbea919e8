import { describe, it, expect } from 'vitest';
import { detectContextChange, detectPostClickChange } from '../../src/analysis/context-change.js';
import type { UIStateSample } from '../../src/timeline/types.js';

function uiSample(time: number, role: string, width: number, height: number): UIStateSample {
  return {
    time,
    cursorPosition: { x: 0.5, y: 0.5 },
    elementInfo: { role, frame: { x: 0.1, y: 0.1, width, height }, isClickable: true },
  };
}

describe('detectContextChange', () => {
  it('reports an expansion when the focused element grows past the threshold', () => {
    const change = detectContextChange(uiSample(0, 'AXButton', 0.1, 0.1), uiSample(1, 'AXGroup', 0.2, 0.2), 3);
    expect(change?.type).toBe('expansion');
    expect(change?.type === 'expansion' && change.ratio).toBeCloseTo(4);
  });

  it('reports a contraction when it shrinks past the threshold', () => {
    const change = detectContextChange(uiSample(0, 'AXGroup', 0.2, 0.2), uiSample(1, 'AXButton', 0.1, 0.1), 3);
    expect(change?.type).toBe('contraction');
    expect(change?.type === 'contraction' && change.ratio).toBeCloseTo(0.25);
  });

  it('reports a modal that opens without a large size change', () => {
    const change = detectContextChange(uiSample(0, 'AXButton', 0.1, 0.1), uiSample(1, 'AXSheet', 0.1, 0.2), 3);
    expect(change).toEqual({ type: 'modalOpened', role: 'AXSheet' });
  });

  it('reports nothing without a previous sample or a real change', () => {
    expect(detectContextChange(undefined, uiSample(1, 'AXSheet', 0.5, 0.5), 3)).toBeUndefined();
    expect(detectContextChange(uiSample(0, 'AXButton', 0.1, 0.1), uiSample(1, 'AXButton', 0.1, 0.15), 3))
      .toBeUndefined();
  });
});

describe('detectPostClickChange', () => {
  it('compares the first sample after the click with the last one before it', () => {
    const samples = [uiSample(0.5, 'AXButton', 0.1, 0.1), uiSample(1.5, 'AXGroup', 0.5, 0.5)];
    const change = detectPostClickChange(1, samples, 2, 3);
    expect(change?.type).toBe('expansion');
  });

  it('ignores samples outside the window', () => {
    const samples = [uiSample(0.5, 'AXButton', 0.1, 0.1), uiSample(3.5, 'AXGroup', 0.5, 0.5)];
    expect(detectPostClickChange(1, samples, 2, 3)).toBeUndefined();
  });
});
