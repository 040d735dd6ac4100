/**
 * Track Attributes - Tags inferred from computed metrics
 */

import type { TrackAttributes, TrackMetrics, TrackTag } from '../geo/types.js';

const HIGH_MOUNTAIN_ALTITUDE_M = 2000;
const VERTICAL_GAIN_PER_KM = 150;
const SKYRUNNING_SLOPE_PCT = 30;

export function inferAttributes(metrics: TrackMetrics): TrackAttributes {
  const tags: TrackTag[] = [];
  const isHighMountain = metrics.max_altitude_m > HIGH_MOUNTAIN_ALTITUDE_M;

  if (isHighMountain) {
    tags.push('high_mountain');
  }

  const gainPerKm = metrics.distance_km > 0
    ? metrics.elevation_gain_m / metrics.distance_km
    : 0;
  if (gainPerKm > VERTICAL_GAIN_PER_KM) {
    tags.push('vertical');
  }

  if (isHighMountain && metrics.max_slope_pct > SKYRUNNING_SLOPE_PCT) {
    tags.push('skyrunning');
  }

  return { is_high_mountain: isHighMountain, tags };
}
