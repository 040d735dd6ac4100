/**
 * Prediction API - Finish-time estimates and their stored coefficients
 */

import { computeMetrics } from '../analytics/metrics.js';
import type { Track, TrackMetrics } from '../geo/types.js';
import {
  predictFinish,
  resolvePerformanceIndex,
  type PerformanceIndices,
} from '../prediction/predictor.js';
import {
  PREDICTION_CONFIG_KEYS,
  sanitizePredictionOverride,
  type PredictionConfig,
} from '../prediction/config.js';
import {
  GLOBAL_SCOPE,
  getPredictionConfig,
  getStoredOverride,
  resetPredictionOverride,
  savePredictionOverride,
} from '../db/prediction-configs.js';
import {
  ApiEnvelope,
  PredictionConfigResult,
  RacePredictionResult,
  failure,
  generateTraceId,
  success,
  timeOperation,
} from './types.js';

export interface PredictRaceParams {
  /** Either a track or precomputed metrics */
  points?: Track;
  metrics?: Pick<TrackMetrics, 'distance_km' | 'elevation_gain_m'>;
  /** Explicit index; otherwise the best of `indices`, otherwise the default */
  performance_index?: number;
  indices?: PerformanceIndices;
  /** Config scope to resolve; the global config when omitted */
  user_scope?: string;
  /** Skip the store and use this config as-is */
  config?: Partial<PredictionConfig>;
}

/**
 * Predict endurance, race and push finish times
 */
export function predictRaceTime(params: PredictRaceParams): ApiEnvelope<RacePredictionResult> {
  const trace_id = generateTraceId();

  return timeOperation(trace_id, () => {
    const metrics = params.metrics ?? computeMetrics(params.points ?? []);
    const index = params.performance_index ?? resolvePerformanceIndex(params.indices ?? {});

    const dbStart = Date.now();
    const config = params.config ?? getPredictionConfig(params.user_scope);
    const dbMs = params.config ? undefined : Date.now() - dbStart;

    const prediction = predictFinish(metrics, index, config);
    if (!prediction.available) {
      return failure('PREDICTION_UNAVAILABLE', prediction.reason, trace_id);
    }

    return success<RacePredictionResult>({
      ...prediction,
      distance_km: metrics.distance_km,
      elevation_gain_m: metrics.elevation_gain_m,
      config_scope: params.config ? 'inline' : params.user_scope ?? GLOBAL_SCOPE,
    }, trace_id, {
      timings_ms: { total: 0, db: dbMs },
    });
  });
}

function overriddenKeys(userScope?: string): string[] {
  const globalOverride = getStoredOverride(GLOBAL_SCOPE) ?? {};
  const userOverride = userScope && userScope !== GLOBAL_SCOPE
    ? getStoredOverride(userScope) ?? {}
    : {};

  return PREDICTION_CONFIG_KEYS.filter(key => key in globalOverride || key in userOverride);
}

/**
 * Effective config for a scope, listing the keys that differ from defaults
 */
export function getPredictionConfigInfo(scope?: string): ApiEnvelope<PredictionConfigResult> {
  const trace_id = generateTraceId();

  return timeOperation(trace_id, () => success({
    scope: scope ?? GLOBAL_SCOPE,
    config: getPredictionConfig(scope),
    overridden_keys: overriddenKeys(scope),
  }, trace_id));
}

/**
 * Store coefficient overrides for a scope.
 * Fails with INVALID_INPUT when none of the values is a known numeric key.
 */
export function updatePredictionConfig(
  values: Record<string, unknown>,
  scope: string = GLOBAL_SCOPE
): ApiEnvelope<PredictionConfigResult> {
  const trace_id = generateTraceId();

  return timeOperation(trace_id, () => {
    const override = sanitizePredictionOverride(values);
    if (Object.keys(override).length === 0) {
      return failure('INVALID_INPUT', 'No known numeric prediction config values given', trace_id, {
        allowed: PREDICTION_CONFIG_KEYS,
      });
    }

    savePredictionOverride(override, scope);

    return success({
      scope,
      config: getPredictionConfig(scope),
      overridden_keys: overriddenKeys(scope),
    }, trace_id);
  });
}

/**
 * Remove a scope's overrides so it falls back to the next layer
 */
export function resetPredictionConfig(scope: string = GLOBAL_SCOPE): ApiEnvelope<PredictionConfigResult> {
  const trace_id = generateTraceId();

  return timeOperation(trace_id, () => {
    resetPredictionOverride(scope);
    return success({
      scope,
      config: getPredictionConfig(scope),
      overridden_keys: overriddenKeys(scope),
    }, trace_id);
  });
}
