/** Normalized coordinates in [0, 1], top-left origin, relative to the capture bounds. */
export interface NormalizedPoint {
  x: number;
  y: number;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface Size {
  width: number;
  height: number;
}

export const SCREEN_CENTER: NormalizedPoint = Object.freeze({ x: 0.5, y: 0.5 });

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function distance(a: NormalizedPoint, b: NormalizedPoint): number {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  return Math.sqrt(dx * dx + dy * dy);
}

export function isInUnitRange(p: NormalizedPoint): boolean {
  return p.x >= 0 && p.x <= 1 && p.y >= 0 && p.y <= 1;
}

export function rectCenter(rect: Rect): NormalizedPoint {
  return { x: rect.x + rect.width / 2, y: rect.y + rect.height / 2 };
}

export function rectAround(center: NormalizedPoint, width: number, height: number): Rect {
  return { x: center.x - width / 2, y: center.y - height / 2, width, height };
}

/** Arithmetic mean of the points. Callers guarantee a non-empty list. */
export function centroid(points: readonly NormalizedPoint[]): NormalizedPoint {
  let sx = 0;
  let sy = 0;
  for (const p of points) {
    sx += p.x;
    sy += p.y;
  }
  return { x: sx / points.length, y: sy / points.length };
}

/**
 * Bounding box of the points, grown by `padding` on every side and clipped to
 * the unit square.
 */
export function paddedBoundingBox(points: readonly NormalizedPoint[], padding: number): Rect {
  let loX = Infinity;
  let hiX = -Infinity;
  let loY = Infinity;
  let hiY = -Infinity;
  for (const p of points) {
    loX = Math.min(loX, p.x);
    hiX = Math.max(hiX, p.x);
    loY = Math.min(loY, p.y);
    hiY = Math.max(hiY, p.y);
  }
  const minX = Math.max(0, loX - padding);
  const maxX = Math.min(1, hiX + padding);
  const minY = Math.max(0, loY - padding);
  const maxY = Math.min(1, hiY + padding);
  return { x: minX, y: minY, width: maxX - minX, height: maxY - minY };
}

/**
 * Online mean of a growing point set. Comparing against the running mean
 * (rather than the last accepted point) catches slow drift made of many small
 * steps.
 */
export class RunningCentroid {
  private sumX = 0;
  private sumY = 0;
  private n = 0;

  constructor(first?: NormalizedPoint) {
    if (first) this.add(first);
  }

  add(p: NormalizedPoint): void {
    this.sumX += p.x;
    this.sumY += p.y;
    this.n += 1;
  }

  get count(): number {
    return this.n;
  }

  get value(): NormalizedPoint | null {
    if (this.n === 0) return null;
    return { x: this.sumX / this.n, y: this.sumY / this.n };
  }

  distanceTo(p: NormalizedPoint): number {
    const mean = this.value;
    return mean === null ? 0 : distance(mean, p);
  }
}
