/**
 * Tracks API - Metrics, attributes and simplification
 *
 * Read-only: nothing here touches the store.
 */

import { computeMetrics } from '../analytics/metrics.js';
import { inferAttributes } from '../analytics/attributes.js';
import { toGeoJson } from '../analytics/geojson.js';
import { DEFAULT_TOLERANCE_DEG, simplify } from '../analytics/simplify.js';
import { elevationOf, type Track } from '../geo/types.js';
import {
  ApiEnvelope,
  SimplifyResult,
  TrackAnalysisResult,
  generateTraceId,
  success,
  timeOperation,
} from './types.js';

export interface AnalyzeTrackParams {
  points: Track;
  name?: string | null;
  include_geojson?: boolean;
}

export interface SimplifyTrackParams {
  points: Track;
  /** Degrees; 0.0001 is roughly 10 m */
  tolerance?: number;
}

/**
 * Compute metrics and inferred attributes for a track
 */
export function analyzeTrack(params: AnalyzeTrackParams): ApiEnvelope<TrackAnalysisResult> {
  const trace_id = generateTraceId();

  return timeOperation(trace_id, () => {
    const metrics = computeMetrics(params.points);

    return success<TrackAnalysisResult>({
      name: params.name ?? null,
      degenerate: params.points.length < 2,
      metrics,
      attributes: inferAttributes(metrics),
      ...(params.include_geojson
        ? { geojson: toGeoJson(params.points, params.name ?? undefined) }
        : {}),
    }, trace_id);
  });
}

/**
 * Reduce a track's point count for storage or display
 */
export function simplifyTrack(params: SimplifyTrackParams): ApiEnvelope<SimplifyResult> {
  const trace_id = generateTraceId();
  const tolerance = params.tolerance ?? DEFAULT_TOLERANCE_DEG;

  return timeOperation(trace_id, () => {
    const simplified = simplify(params.points, tolerance);

    return success<SimplifyResult>({
      tolerance,
      original_count: params.points.length,
      simplified_count: simplified.length,
      points: simplified.map(p => ({ lat: p.lat, lon: p.lon, ele: elevationOf(p) })),
    }, trace_id);
  });
}
