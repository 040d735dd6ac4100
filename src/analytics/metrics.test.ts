import { describe, it, expect } from 'vitest';
import {
  classifyRoute,
  computeMetrics,
  effortKm,
  itraPoints,
  longestClimb,
  sampleSlopes,
} from './metrics.js';
import { eastwardTrack, KM_DEG } from '../testing/tracks.js';
import type { GeoPoint } from '../geo/types.js';

// 1 km square starting and ending at the origin
const square: GeoPoint[] = [
  { lat: 0, lon: 0 },
  { lat: KM_DEG, lon: 0 },
  { lat: KM_DEG, lon: KM_DEG },
  { lat: 0, lon: KM_DEG },
  { lat: 0, lon: 0 },
];

describe('computeMetrics', () => {
  it('measures a flat square loop', () => {
    const m = computeMetrics(square);

    expect(m.distance_km).toBe(4);
    expect(m.elevation_gain_m).toBe(0);
    expect(m.elevation_loss_m).toBe(0);
    expect(m.route_type).toBe('loop');
    expect(m.effort_score).toBe(4);
    expect(m.estimated_itra_points).toBe(0);
    expect(m.max_slope_pct).toBe(0);
    expect(m.estimated_times).toEqual({ hiker: '1h00', runner: '0h30', elite: '0h20' });
    expect(m.point_count).toBe(5);
  });

  it('measures a single 500 m climb over 5 km', () => {
    const m = computeMetrics(eastwardTrack([1000, 1100, 1200, 1300, 1400, 1500]));

    expect(m.distance_km).toBe(5);
    expect(m.elevation_gain_m).toBe(500);
    expect(m.elevation_loss_m).toBe(0);
    expect(m.effort_score).toBe(10);
    expect(m.max_altitude_m).toBe(1500);
    expect(m.min_altitude_m).toBe(1000);
    expect(m.avg_altitude_m).toBe(1250);
    expect(m.max_slope_pct).toBe(10);
    expect(m.avg_uphill_slope_pct).toBe(10);
    expect(m.longest_climb_m).toBe(500);
    expect(m.ibp_index).toBe(10);
    expect(m.route_type).toBe('point_to_point');
    expect(m.estimated_times.runner).toBe('1h27');
    expect(m.start_point).toEqual({ lat: 0, lon: 0 });
  });

  it('raises the IBP index on steep courses', () => {
    // 20% average uphill: 200 m per km
    const m = computeMetrics(eastwardTrack([0, 200, 400]));
    expect(m.avg_uphill_slope_pct).toBe(20);
    expect(m.effort_score).toBe(6);
    expect(m.ibp_index).toBe(6);

    const longer = computeMetrics(eastwardTrack([0, 200, 400, 600, 800, 1000, 1200, 1400, 1600, 1800, 2000]));
    expect(longer.effort_score).toBe(30);
    expect(longer.ibp_index).toBe(33);
    expect(longer.estimated_itra_points).toBe(1);
  });

  it('is idempotent', () => {
    const track = eastwardTrack([820, 905, 870, 1010, 990]);
    expect(computeMetrics(track)).toEqual(computeMetrics(track));
  });

  it('ignores steps where either point lacks elevation', () => {
    const m = computeMetrics(eastwardTrack([100, null, 200]));
    expect(m.elevation_gain_m).toBe(0);
    expect(m.max_altitude_m).toBe(200);
    expect(m.min_altitude_m).toBe(100);
    expect(m.avg_altitude_m).toBe(150);
  });

  it('returns zeroed metrics for an empty track', () => {
    const m = computeMetrics([]);
    expect(m.distance_km).toBe(0);
    expect(m.effort_score).toBe(0);
    expect(m.start_point).toBeNull();
    expect(m.end_point).toBeNull();
    expect(m.estimated_times.runner).toBe('0h00');
    expect(m.point_count).toBe(0);
  });

  it('keeps the coordinate and altitude of a single point', () => {
    const m = computeMetrics([{ lat: 45.9, lon: 6.87, ele: 1035.8 }]);
    expect(m.distance_km).toBe(0);
    expect(m.max_altitude_m).toBe(1035);
    expect(m.start_point).toEqual({ lat: 45.9, lon: 6.87 });
    expect(m.end_point).toEqual({ lat: 45.9, lon: 6.87 });
    expect(m.route_type).toBe('point_to_point');
  });
});

describe('sampleSlopes', () => {
  it('takes one sample per 50 m of track', () => {
    // 30 m steps: the window closes on the second point, 60 m from the anchor
    const slopes = sampleSlopes(eastwardTrack([0, 5, 10, 12], 0.03));
    expect(slopes).toHaveLength(1);
    expect(slopes[0]).toBeCloseTo(50 / 3, 6);
  });

  it('returns nothing for short tracks', () => {
    expect(sampleSlopes(eastwardTrack([0, 5], 0.01))).toEqual([]);
    expect(sampleSlopes([])).toEqual([]);
  });
});

describe('longestClimb', () => {
  it('survives small dips and breaks on large ones', () => {
    // +100, -10, +110 (climb of 210), -50 breaks, +10
    expect(longestClimb(eastwardTrack([100, 200, 190, 300, 250, 260]))).toBe(210);
  });

  it('is zero on a descent', () => {
    expect(longestClimb(eastwardTrack([500, 400, 300]))).toBe(0);
  });
});

describe('difficulty helpers', () => {
  it('counts km-effort', () => {
    expect(effortKm(42, 2500)).toBe(67);
  });

  it('maps effort to ITRA tiers', () => {
    expect(itraPoints(24.9)).toBe(0);
    expect(itraPoints(25)).toBe(1);
    expect(itraPoints(65)).toBe(3);
    expect(itraPoints(189.9)).toBe(5);
    expect(itraPoints(250)).toBe(6);
  });

  it('classifies loops by the start/end gap', () => {
    expect(classifyRoute(square)).toBe('loop');
    expect(classifyRoute(eastwardTrack([0, 0]))).toBe('point_to_point');
    expect(classifyRoute(eastwardTrack([0, 0, 0], 0.05))).toBe('loop');
  });
});
