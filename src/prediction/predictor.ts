/**
 * Finish-Time Predictor
 *
 * Estimates race times from track km-effort and a runner performance index:
 * - Base speed from a linear fit on the index
 * - Technicality penalty from the average gradient (m of climb per km)
 * - Distance decay once the race gets long
 *
 * Three intensities are reported: endurance, race and push.
 */

import { effortKm } from '../analytics/metrics.js';
import type { TrackMetrics } from '../geo/types.js';
import { formatPredictedHours, round } from '../util/format.js';
import { mergePredictionConfig, type PredictionConfig } from './config.js';

/** Index assumed when the runner has no rating at all */
export const DEFAULT_PERFORMANCE_INDEX = 400;

/** No prediction ever runs slower than this (km-effort/h) */
export const ABSOLUTE_MIN_SPEED_KMEH = 2.5;

/** Index points per ml/kg/min */
const VO2MAX_INDEX_RATIO = 11.6;

export interface PerformanceIndices {
  utmb_index?: number | null;
  itra_score?: number | null;
  betrail_score?: number | null;
}

export type PredictionScenario = 'endurance' | 'race' | 'push';

export interface FinishPrediction {
  available: true;
  performance_index: number;
  vo2max_estimate: number;
  km_effort: number;
  gradient_ratio: number;
  adjusted_speed_kmeh: number;
  times: Record<PredictionScenario, string>;
  raw_hours: { race: number };
}

export interface PredictionUnavailable {
  available: false;
  reason: string;
}

export type PredictionResult = FinishPrediction | PredictionUnavailable;

/**
 * Best of the available ratings, or the default index when none is set.
 * Betrail scores are fractional and are truncated first.
 */
export function resolvePerformanceIndex(indices: PerformanceIndices): number {
  const candidates: number[] = [];
  if (indices.utmb_index) candidates.push(indices.utmb_index);
  if (indices.itra_score) candidates.push(indices.itra_score);
  if (indices.betrail_score) candidates.push(Math.trunc(indices.betrail_score));

  const valid = candidates.filter(Number.isFinite);
  return valid.length > 0 ? Math.max(...valid) : DEFAULT_PERFORMANCE_INDEX;
}

/**
 * Speed multiplier from the average gradient; the steepest matching band wins
 */
export function technicalityFactor(gradientRatio: number, config: Readonly<PredictionConfig>): number {
  let factor = 1.0;
  if (gradientRatio > config.tech_factor_1_threshold) factor = config.tech_factor_1_hilly;
  if (gradientRatio > config.tech_factor_2_threshold) factor = config.tech_factor_2_mountain;
  if (gradientRatio > config.tech_factor_3_threshold) factor = config.tech_factor_3_alpine;
  return factor;
}

/**
 * Speed multiplier for long races: loses `decay_rate_per_step` every
 * `decay_step_km` past `decay_start_km`, capped at `decay_max_total`
 */
export function distanceDecayFactor(kmEffort: number, config: Readonly<PredictionConfig>): number {
  if (kmEffort <= config.decay_start_km || config.decay_step_km <= 0) return 1.0;

  const over = kmEffort - config.decay_start_km;
  const decay = Math.min(config.decay_max_total, (over / config.decay_step_km) * config.decay_rate_per_step);
  return 1.0 - decay;
}

function scenarioMultiplier(value: number): number {
  return Number.isFinite(value) && value > 0 ? value : 1;
}

/**
 * Predict finish times for a track.
 * A track with no distance yields `{ available: false }` instead of throwing.
 */
export function predictFinish(
  metrics: Pick<TrackMetrics, 'distance_km' | 'elevation_gain_m'>,
  performanceIndex: number = DEFAULT_PERFORMANCE_INDEX,
  config: Readonly<PredictionConfig> | Partial<PredictionConfig> = {}
): PredictionResult {
  // Snapshot: callers may keep editing their own config object
  const cfg = mergePredictionConfig(undefined, config);

  const distance = metrics.distance_km || 0;
  const gain = metrics.elevation_gain_m || 0;
  if (distance <= 0) {
    return { available: false, reason: 'Track has no distance' };
  }

  const index = Number.isFinite(performanceIndex) ? performanceIndex : DEFAULT_PERFORMANCE_INDEX;
  const kmEffort = effortKm(distance, gain);
  const gradientRatio = gain / distance;

  const baseSpeed = Math.max(cfg.base_speed_slope * index - cfg.base_speed_intercept, cfg.min_speed_kmeh);
  const rawAdjusted = baseSpeed * technicalityFactor(gradientRatio, cfg) * distanceDecayFactor(kmEffort, cfg);
  const adjustedSpeed = Number.isFinite(rawAdjusted)
    ? Math.max(rawAdjusted, ABSOLUTE_MIN_SPEED_KMEH)
    : ABSOLUTE_MIN_SPEED_KMEH;

  const enduranceHours = kmEffort / (adjustedSpeed * scenarioMultiplier(cfg.endurance_multiplier));
  const raceHours = kmEffort / adjustedSpeed;
  const pushHours = kmEffort / (adjustedSpeed * scenarioMultiplier(cfg.push_multiplier));

  return {
    available: true,
    performance_index: index,
    vo2max_estimate: round(index / VO2MAX_INDEX_RATIO, 1),
    km_effort: round(kmEffort, 1),
    gradient_ratio: round(gradientRatio, 1),
    adjusted_speed_kmeh: round(adjustedSpeed, 2),
    times: {
      endurance: formatPredictedHours(enduranceHours),
      race: formatPredictedHours(raceHours),
      push: formatPredictedHours(pushHours),
    },
    raw_hours: {
      race: round(raceHours, 2),
    },
  };
}
