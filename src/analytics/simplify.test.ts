import { describe, it, expect } from 'vitest';
import { simplify } from './simplify.js';
import { toGeoJson } from './geojson.js';
import { eastwardTrack } from '../testing/tracks.js';
import type { GeoPoint } from '../geo/types.js';

const zigzag: GeoPoint[] = [
  { lat: 0, lon: 0, ele: 10 },
  { lat: 0.001, lon: 0.001, ele: 12 },
  { lat: 0, lon: 0.002, ele: 14 },
  { lat: 0.001, lon: 0.003, ele: 16 },
  { lat: 0, lon: 0.004, ele: 18 },
];

describe('simplify', () => {
  it('drops collinear points', () => {
    const line = eastwardTrack([0, 1, 2, 3, 4]);
    const result = simplify(line);
    expect(result).toHaveLength(2);
    expect(result[0]).toBe(line[0]);
    expect(result[1]).toBe(line[4]);
  });

  it('keeps deviations larger than the tolerance', () => {
    expect(simplify(zigzag, 0.0001)).toEqual(zigzag);
  });

  it('drops deviations within the tolerance', () => {
    expect(simplify(zigzag, 0.01)).toEqual([zigzag[0], zigzag[4]]);
  });

  it('keeps endpoints and never grows', () => {
    for (const tolerance of [0, 0.0005, 0.002, 1]) {
      const result = simplify(zigzag, tolerance);
      expect(result.length).toBeLessThanOrEqual(zigzag.length);
      expect(result[0]).toBe(zigzag[0]);
      expect(result[result.length - 1]).toBe(zigzag[zigzag.length - 1]);
    }
  });

  it('preserves input order', () => {
    const result = simplify(zigzag, 0.0001);
    const indices = result.map(p => zigzag.indexOf(p));
    expect(indices).toEqual([...indices].sort((a, b) => a - b));
  });

  it('treats a negative tolerance as zero', () => {
    expect(simplify(zigzag, -1)).toEqual(zigzag);
  });

  it('returns a copy of tiny tracks', () => {
    const pair = eastwardTrack([0, 1]);
    const result = simplify(pair);
    expect(result).toEqual(pair);
    expect(result).not.toBe(pair);
    expect(simplify([])).toEqual([]);
  });
});

describe('toGeoJson', () => {
  it('writes lon/lat/ele coordinates', () => {
    const feature = toGeoJson([{ lat: 45.5, lon: 6.5, ele: 1200 }, { lat: 45.6, lon: 6.6 }], 'Col loop');
    expect(feature).toEqual({
      type: 'Feature',
      geometry: {
        type: 'LineString',
        coordinates: [[6.5, 45.5, 1200], [6.6, 45.6, 0]],
      },
      properties: { name: 'Col loop' },
    });
  });

  it('is null for an empty track and names unnamed tracks', () => {
    expect(toGeoJson([])).toBeNull();
    expect(toGeoJson([{ lat: 0, lon: 0 }])?.properties.name).toBe('Track');
  });
});
