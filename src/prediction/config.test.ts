import { describe, it, expect } from 'vitest';
import {
  DEFAULT_PREDICTION_CONFIG,
  isPredictionConfigKey,
  mergePredictionConfig,
  sanitizePredictionOverride,
} from './config.js';

describe('prediction config', () => {
  it('freezes the defaults', () => {
    expect(Object.isFrozen(DEFAULT_PREDICTION_CONFIG)).toBe(true);
    expect(DEFAULT_PREDICTION_CONFIG.base_speed_slope).toBe(0.024);
    expect(DEFAULT_PREDICTION_CONFIG.decay_max_total).toBe(0.4);
  });

  it('recognizes config keys', () => {
    expect(isPredictionConfigKey('push_multiplier')).toBe(true);
    expect(isPredictionConfigKey('pace')).toBe(false);
  });

  it('keeps only known numeric values', () => {
    expect(sanitizePredictionOverride({
      base_speed_slope: '0.03',
      min_speed_kmeh: 'fast',
      decay_step_km: Number.NaN,
      push_multiplier: 1.2,
      favourite_colour: 3,
    })).toEqual({ base_speed_slope: 0.03, push_multiplier: 1.2 });
  });

  it('ignores values that are not objects', () => {
    expect(sanitizePredictionOverride(null)).toEqual({});
    expect(sanitizePredictionOverride([1, 2])).toEqual({});
    expect(sanitizePredictionOverride('base_speed_slope=1')).toEqual({});
  });

  it('lets later overrides win and returns a frozen snapshot', () => {
    const merged = mergePredictionConfig(
      undefined,
      { base_speed_slope: 0.03, decay_start_km: 50 },
      null,
      { base_speed_slope: 0.05 }
    );

    expect(merged.base_speed_slope).toBe(0.05);
    expect(merged.decay_start_km).toBe(50);
    expect(merged.min_speed_kmeh).toBe(3);
    expect(Object.isFrozen(merged)).toBe(true);
    expect(DEFAULT_PREDICTION_CONFIG.base_speed_slope).toBe(0.024);
  });
});
