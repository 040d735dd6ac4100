import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { closeDb, initializeDb } from '../db/client.js';
import { analyzeTrack, simplifyTrack } from './tracks.js';
import {
  deleteSavedStrategy,
  getStrategy,
  listSavedStrategies,
  planStrategy,
  replanStrategy,
  saveStrategy,
} from './strategy.js';
import {
  getPredictionConfigInfo,
  predictRaceTime,
  resetPredictionConfig,
  updatePredictionConfig,
} from './prediction.js';
import { failure, success, timeOperation } from './types.js';
import { eastwardTrack, flatTrack } from '../testing/tracks.js';

describe('envelopes', () => {
  it('wraps results with a trace id and timing', () => {
    const result = timeOperation('trc_test', () => success({ value: 1 }, 'trc_test'));
    expect(result.ok).toBe(true);
    expect(result.data).toEqual({ value: 1 });
    expect(result.trace_id).toBe('trc_test');
    expect(result.timings_ms?.total).toBeGreaterThanOrEqual(0);
  });

  it('turns thrown errors into INTERNAL_ERROR', () => {
    const result = timeOperation<number>('trc_test', () => {
      throw new Error('disk on fire');
    });
    expect(result.ok).toBe(false);
    expect(result.error).toMatchObject({ code: 'INTERNAL_ERROR', message: 'disk on fire' });
  });

  it('passes failures through', () => {
    const result = timeOperation('trc_test', () => failure('NOT_FOUND', 'nope', 'trc_test'));
    expect(result.error).toEqual({ code: 'NOT_FOUND', message: 'nope', details: undefined });
  });
});

describe('tracks api', () => {
  it('analyzes a track', () => {
    const result = analyzeTrack({ points: eastwardTrack([1000, 1100, 1200]), name: 'Ridge' });
    expect(result.ok).toBe(true);
    expect(result.trace_id).toMatch(/^trc_/);
    expect(result.data?.name).toBe('Ridge');
    expect(result.data?.degenerate).toBe(false);
    expect(result.data?.metrics.elevation_gain_m).toBe(200);
    expect(result.data?.geojson).toBeUndefined();
  });

  it('includes GeoJSON on request', () => {
    const result = analyzeTrack({ points: flatTrack(2), include_geojson: true });
    expect(result.data?.geojson?.geometry.coordinates).toHaveLength(3);
    expect(result.data?.geojson?.properties.name).toBe('Track');
  });

  it('flags degenerate tracks instead of failing', () => {
    const result = analyzeTrack({ points: [] });
    expect(result.ok).toBe(true);
    expect(result.data?.degenerate).toBe(true);
    expect(result.data?.metrics.distance_km).toBe(0);
  });

  it('simplifies a track', () => {
    const result = simplifyTrack({ points: eastwardTrack([10, 11, 12, 13]) });
    expect(result.data).toMatchObject({ tolerance: 0.0001, original_count: 4, simplified_count: 2 });
    expect(result.data?.points[1].ele).toBe(13);
  });
});

describe('strategy api', () => {
  beforeEach(() => {
    initializeDb(':memory:');
  });

  afterEach(() => {
    closeDb();
  });

  it('maps pacing failures to error codes', () => {
    expect(planStrategy({ points: [], waypoints: [], target_minutes: 60 }).error?.code).toBe('INSUFFICIENT_DATA');
    expect(planStrategy({ points: flatTrack(5), waypoints: [], target_minutes: 0 }).error?.code).toBe('INVALID_TARGET');
  });

  it('saves, lists and replans a strategy', () => {
    const saved = saveStrategy({
      points: flatTrack(10),
      waypoints: [{ km: 5, name: 'Mid' }],
      target_minutes: 60,
      start_hour: 8,
      fatigue_intensity: 0,
      title: 'Tempo loop',
      track_name: 'river',
    });
    expect(saved.ok).toBe(true);
    const id = saved.data?.strategy_id ?? '';

    expect(listSavedStrategies().data?.map(s => s.id)).toEqual([id]);
    expect(getStrategy(id).data).toMatchObject({ title: 'Tempo loop', start_hour: 8, target_minutes: 60 });

    const replanned = replanStrategy(id, flatTrack(10));
    expect(replanned.data?.points.map(p => p.time_of_day)).toEqual(['08:00', '08:30', '09:00']);
  });

  it('does not save a plan that fails', () => {
    const result = saveStrategy({ points: flatTrack(5), waypoints: [], target_minutes: -1, title: 'Broken' });
    expect(result.error?.code).toBe('INVALID_TARGET');
    expect(listSavedStrategies().data).toEqual([]);
  });

  it('reports unknown strategies', () => {
    expect(getStrategy('strat_missing').error?.code).toBe('NOT_FOUND');
    expect(replanStrategy('strat_missing', flatTrack(5)).error?.code).toBe('NOT_FOUND');
    expect(deleteSavedStrategy('strat_missing').error?.code).toBe('NOT_FOUND');
  });

  it('deletes a saved strategy', () => {
    const id = saveStrategy({ points: flatTrack(5), waypoints: [], target_minutes: 30, title: 'Short' }).data?.strategy_id ?? '';

    expect(deleteSavedStrategy(id).data).toEqual({ id, deleted: true });
    expect(getStrategy(id).error?.code).toBe('NOT_FOUND');
    expect(listSavedStrategies().data).toEqual([]);
  });

  it('lists at least one strategy when the limit is below 1', () => {
    saveStrategy({ points: flatTrack(5), waypoints: [], target_minutes: 30, title: 'First' });
    saveStrategy({ points: flatTrack(5), waypoints: [], target_minutes: 35, title: 'Second' });

    expect(listSavedStrategies(-1).data).toHaveLength(1);
    expect(listSavedStrategies(0).data).toHaveLength(1);
    expect(listSavedStrategies(Number.NaN).data).toHaveLength(2);
  });
});

describe('prediction api', () => {
  beforeEach(() => {
    initializeDb(':memory:');
  });

  afterEach(() => {
    closeDb();
  });

  it('predicts with stored coefficients', () => {
    updatePredictionConfig({ base_speed_slope: 0.03 });
    const result = predictRaceTime({ metrics: { distance_km: 20, elevation_gain_m: 0 }, performance_index: 500 });

    // 0.03 * 500 - 4 = 11
    expect(result.data?.adjusted_speed_kmeh).toBe(11);
    expect(result.data?.config_scope).toBe('global');
    expect(result.data?.distance_km).toBe(20);
  });

  it('uses an inline config without the store', () => {
    const result = predictRaceTime({
      metrics: { distance_km: 20, elevation_gain_m: 0 },
      performance_index: 500,
      config: {},
    });
    // 0.024 * 500 - 4 = 8
    expect(result.data?.adjusted_speed_kmeh).toBe(8);
    expect(result.data?.config_scope).toBe('inline');
  });

  it('resolves the index from ratings', () => {
    const result = predictRaceTime({ points: flatTrack(10), indices: { itra_score: 550 }, config: {} });
    expect(result.data?.performance_index).toBe(550);
  });

  it('reports unavailable predictions', () => {
    const result = predictRaceTime({ points: [], config: {} });
    expect(result.error).toMatchObject({ code: 'PREDICTION_UNAVAILABLE', message: 'Track has no distance' });
  });

  it('shows, updates and resets config scopes', () => {
    expect(getPredictionConfigInfo().data?.overridden_keys).toEqual([]);

    const updated = updatePredictionConfig({ push_multiplier: 1.25 }, 'runner-7');
    expect(updated.data?.config.push_multiplier).toBe(1.25);
    expect(updated.data?.overridden_keys).toEqual(['push_multiplier']);

    const reset = resetPredictionConfig('runner-7');
    expect(reset.data?.config.push_multiplier).toBe(1.15);
    expect(reset.data?.overridden_keys).toEqual([]);
  });

  it('rejects updates without known keys', () => {
    expect(updatePredictionConfig({ speed: 12 }).error?.code).toBe('INVALID_INPUT');
  });

  it('rejects known keys with non-numeric values and stores nothing', () => {
    const result = updatePredictionConfig({ base_speed_slope: 'fast', min_speed_kmeh: null });
    expect(result.error?.code).toBe('INVALID_INPUT');

    const info = getPredictionConfigInfo();
    expect(info.data?.overridden_keys).toEqual([]);
    expect(info.data?.config.base_speed_slope).toBe(0.024);
  });

  it('stores only the numeric values of a mixed update', () => {
    const result = updatePredictionConfig({ base_speed_slope: 'fast', min_speed_kmeh: 3.5 });
    expect(result.data?.overridden_keys).toEqual(['min_speed_kmeh']);
    expect(result.data?.config.base_speed_slope).toBe(0.024);
  });
});
