/**
 * API Types - Core contracts for the trailpace service layer
 *
 * All API functions return an ApiEnvelope for observability and consistency.
 * Expected outcomes such as "no prediction for this track" come back as
 * failure envelopes with a stable code; only bugs become INTERNAL_ERROR.
 */

import { nanoid } from 'nanoid';
import type { TrackAttributes, TrackMetrics } from '../geo/types.js';
import type { TrackFeature } from '../analytics/geojson.js';
import type { FinishPrediction } from '../prediction/predictor.js';
import type { PredictionConfig } from '../prediction/config.js';

/**
 * Standard response envelope for all API operations
 */
export interface ApiEnvelope<T> {
  ok: boolean;
  data?: T;
  error?: ApiError;
  trace_id: string;
  timings_ms?: {
    total: number;
    db?: number;
  };
}

/**
 * Structured error for API responses
 */
export interface ApiError {
  code: ApiErrorCode;
  message: string;
  details?: unknown;
}

export type ApiErrorCode =
  | 'INVALID_INPUT'
  | 'INSUFFICIENT_DATA'
  | 'INVALID_TARGET'
  | 'PREDICTION_UNAVAILABLE'
  | 'NOT_FOUND'
  | 'DB_NOT_INITIALIZED'
  | 'UNKNOWN_TOOL'
  | 'INTERNAL_ERROR';

// ============================================
// Helper Functions
// ============================================

/**
 * Generate a unique trace ID for request tracking
 */
export function generateTraceId(): string {
  return `trc_${nanoid(16)}`;
}

/**
 * Create a success envelope
 */
export function success<T>(data: T, trace_id: string, options?: {
  timings_ms?: ApiEnvelope<T>['timings_ms'];
}): ApiEnvelope<T> {
  return {
    ok: true,
    data,
    trace_id,
    ...options,
  };
}

/**
 * Create an error envelope
 */
export function failure<T = never>(
  code: ApiErrorCode,
  message: string,
  trace_id: string,
  details?: unknown
): ApiEnvelope<T> {
  return {
    ok: false,
    error: { code, message, details },
    trace_id,
  };
}

/**
 * Run an operation with timing; thrown errors become INTERNAL_ERROR envelopes
 */
export function timeOperation<T>(
  trace_id: string,
  operation: () => ApiEnvelope<T>
): ApiEnvelope<T> {
  const startTime = Date.now();

  try {
    const result = operation();
    return {
      ...result,
      timings_ms: {
        ...result.timings_ms,
        total: Date.now() - startTime,
      },
    };
  } catch (err) {
    const message = err instanceof Error ? err.message : 'Unknown error';
    return {
      ok: false,
      error: {
        code: 'INTERNAL_ERROR',
        message,
        details: err instanceof Error ? { stack: err.stack } : undefined,
      },
      trace_id,
      timings_ms: { total: Date.now() - startTime },
    };
  }
}

// ============================================
// Common Result Types
// ============================================

/**
 * Track analysis result
 */
export interface TrackAnalysisResult {
  name: string | null;
  /** Fewer than 2 points: metrics are zeroed */
  degenerate: boolean;
  metrics: TrackMetrics;
  attributes: TrackAttributes;
  geojson?: TrackFeature | null;
}

/**
 * Simplification result
 */
export interface SimplifyResult {
  tolerance: number;
  original_count: number;
  simplified_count: number;
  points: { lat: number; lon: number; ele: number | null }[];
}

/**
 * Prediction result with the inputs that produced it
 */
export interface RacePredictionResult extends FinishPrediction {
  distance_km: number;
  elevation_gain_m: number;
  config_scope: string;
}

/**
 * Effective prediction config and where its values came from
 */
export interface PredictionConfigResult {
  scope: string;
  config: Readonly<PredictionConfig>;
  overridden_keys: string[];
}
