/**
 * Track Simplifier - Douglas-Peucker point reduction
 *
 * For storage and display only. The output is lossy: compute metrics on the
 * original track, never on its simplified copy.
 */

import type { GeoPoint, Track } from '../geo/types.js';

/** Roughly 10 m at mid latitudes */
export const DEFAULT_TOLERANCE_DEG = 0.0001;

/**
 * Perpendicular distance (in degrees) from p to the segment a-b, in the lon/lat plane
 */
function segmentDistance(p: GeoPoint, a: GeoPoint, b: GeoPoint): number {
  const dx = b.lon - a.lon;
  const dy = b.lat - a.lat;
  const lengthSq = dx * dx + dy * dy;

  if (lengthSq === 0) {
    return Math.hypot(p.lon - a.lon, p.lat - a.lat);
  }

  const t = Math.max(0, Math.min(1, ((p.lon - a.lon) * dx + (p.lat - a.lat) * dy) / lengthSq));
  return Math.hypot(p.lon - (a.lon + t * dx), p.lat - (a.lat + t * dy));
}

/**
 * Reduce a track to the points needed to stay within `tolerance` degrees of it.
 * Returns an ordered subset of the input that always keeps both endpoints.
 */
export function simplify(points: Track, tolerance: number = DEFAULT_TOLERANCE_DEG): GeoPoint[] {
  if (points.length <= 2) return [...points];

  const epsilon = Number.isFinite(tolerance) && tolerance > 0 ? tolerance : 0;
  const keep = new Array<boolean>(points.length).fill(false);
  keep[0] = true;
  keep[points.length - 1] = true;

  // Explicit stack so long tracks do not recurse deeply
  const stack: [number, number][] = [[0, points.length - 1]];

  while (stack.length > 0) {
    const range = stack.pop();
    if (!range) break;
    const [first, last] = range;

    let maxDistance = -1;
    let index = -1;
    for (let i = first + 1; i < last; i++) {
      const d = segmentDistance(points[i], points[first], points[last]);
      if (d > maxDistance) {
        maxDistance = d;
        index = i;
      }
    }

    if (index !== -1 && maxDistance > epsilon) {
      keep[index] = true;
      stack.push([first, index], [index, last]);
    }
  }

  return points.filter((_, i) => keep[i]);
}
