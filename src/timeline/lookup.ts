interface Timed {
  time: number;
}

/**
 * Binary search for the last item with time <= `time`.
 * `items` must be sorted by time. Returns undefined when every item is later.
 */
export function findLastAtOrBefore<T extends Timed>(items: readonly T[], time: number): T | undefined {
  let lo = 0;
  let hi = items.length - 1;
  let found: T | undefined;

  while (lo <= hi) {
    const mid = (lo + hi) >>> 1;
    const item = items[mid];
    if (item.time <= time) {
      found = item;
      lo = mid + 1;
    } else {
      hi = mid - 1;
    }
  }

  return found;
}

/** Item whose time is closest to `time`; the earlier one wins a tie. */
export function findNearest<T extends Timed>(items: readonly T[], time: number): T | undefined {
  let best: T | undefined;
  for (const item of items) {
    if (best === undefined || Math.abs(item.time - time) < Math.abs(best.time - time)) {
      best = item;
    }
  }
  return best;
}
