import { describe, it, expect } from 'vitest';
import { findLastAtOrBefore, findNearest } from '../../src/timeline/lookup.js';

const samples = [
  { time: 0, label: 'a' },
  { time: 0.5, label: 'b' },
  { time: 1, label: 'c' },
  { time: 2, label: 'd' },
];

describe('findLastAtOrBefore', () => {
  it('returns exact match', () => {
    expect(findLastAtOrBefore(samples, 1)?.label).toBe('c');
  });

  it('returns the item just before the time when between entries', () => {
    expect(findLastAtOrBefore(samples, 0.75)?.label).toBe('b');
    expect(findLastAtOrBefore(samples, 1.5)?.label).toBe('c');
  });

  it('returns the last item when the time is after all entries', () => {
    expect(findLastAtOrBefore(samples, 99)?.label).toBe('d');
  });

  it('returns undefined when every item is later', () => {
    expect(findLastAtOrBefore(samples, -0.1)).toBeUndefined();
    expect(findLastAtOrBefore([], 1)).toBeUndefined();
  });
});

describe('findNearest', () => {
  it('picks the closest item on either side', () => {
    expect(findNearest(samples, 0.74)?.label).toBe('b');
    expect(findNearest(samples, 1.9)?.label).toBe('d');
  });

  it('prefers the earlier item on a tie', () => {
    expect(findNearest(samples, 1.5)?.label).toBe('c');
  });

  it('returns undefined for no items', () => {
    expect(findNearest([], 0)).toBeUndefined();
  });
});
