import { describe, it, expect } from 'vitest';
import { coerceWaypoint, normalizeWaypoints } from './waypoints.js';

describe('normalizeWaypoints', () => {
  it('adds Start and Finish to an empty list', () => {
    expect(normalizeWaypoints([], 10)).toEqual([
      { km: 0, name: 'Start', kind: 'start', lat: null, lon: null },
      { km: 10, name: 'Finish', kind: 'finish', lat: null, lon: null },
    ]);
  });

  it('sorts and clamps waypoints onto the track', () => {
    const result = normalizeWaypoints([
      { km: 12, name: 'Beyond' },
      { km: -3, name: 'Before' },
      { km: 5, name: 'Col', kind: 'water' },
    ], 10);

    expect(result.map(w => [w.km, w.name, w.kind])).toEqual([
      [0, 'Before', 'checkpoint'],
      [5, 'Col', 'water'],
      [10, 'Beyond', 'checkpoint'],
    ]);
  });

  it('uses waypoints near the ends instead of adding new ones', () => {
    const result = normalizeWaypoints([
      { km: 0.08, name: 'Village' },
      { km: 9.6, name: 'Stadium' },
    ], 10);

    expect(result.map(w => [w.km, w.name])).toEqual([[0, 'Village'], [9.6, 'Stadium']]);
  });

  it('adds ends when waypoints are outside the snap tolerances', () => {
    const result = normalizeWaypoints([
      { km: 0.2, name: 'Bridge' },
      { km: 9.4, name: 'Lake' },
    ], 10);

    expect(result.map(w => w.name)).toEqual(['Start', 'Bridge', 'Lake', 'Finish']);
  });

  it('keeps caller order for equal distances', () => {
    const result = normalizeWaypoints([
      { km: 4, name: 'Aid' },
      { km: 4, name: 'Timing mat' },
    ], 10);

    expect(result.map(w => w.name)).toEqual(['Start', 'Aid', 'Timing mat', 'Finish']);
  });
});

describe('coerceWaypoint', () => {
  it('accepts a complete waypoint', () => {
    expect(coerceWaypoint({ km: 12.5, name: 'Refuge', kind: 'food', lat: 45.8, lon: 6.9 })).toEqual({
      km: 12.5,
      name: 'Refuge',
      kind: 'food',
      lat: 45.8,
      lon: 6.9,
    });
  });

  it('defaults unknown kinds and drops bad coordinates', () => {
    expect(coerceWaypoint({ km: 3, name: 'Hut', kind: 'party', lat: '45' })).toEqual({
      km: 3,
      name: 'Hut',
      kind: 'checkpoint',
      lat: null,
      lon: null,
    });
  });

  it('rejects entries without km or name', () => {
    expect(coerceWaypoint({ name: 'Nowhere' })).toBeNull();
    expect(coerceWaypoint({ km: 'five', name: 'Col' })).toBeNull();
    expect(coerceWaypoint({ km: 5 })).toBeNull();
    expect(coerceWaypoint(null)).toBeNull();
    expect(coerceWaypoint('km 5')).toBeNull();
  });
});
