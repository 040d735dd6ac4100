/**
 * Pacing Simulator - Split a goal time across checkpoints
 *
 * One pass over the track accumulates an effort cost per segment
 * (distance + climb/100, with a penalty on steep steps). The goal time is
 * then shared out in proportion to cost, with a fatigue drift that makes
 * later segments of equal cost take longer.
 */

import { haversineMeters, trackLengthMeters } from '../geo/distance.js';
import { elevationDelta, elevationOf, type Track } from '../geo/types.js';
import { METERS_GAIN_PER_EFFORT_KM } from '../analytics/metrics.js';
import { formatElapsed, minutesToTimeOfDay, round } from '../util/format.js';
import { normalizeWaypoints } from './waypoints.js';
import type {
  PacingOptions,
  PacingResult,
  PlanPoint,
  ResolvedWaypoint,
  SegmentCost,
  Waypoint,
} from './types.js';

export const DEFAULT_START_HOUR = 6;
export const DEFAULT_FATIGUE_INTENSITY = 0.2;
export const AGGRESSIVE_FATIGUE_INTENSITY = 0.25;
export const CONSERVATIVE_FATIGUE_INTENSITY = 0;

/** Steps steeper than this (either direction) cost 20% more */
export const STEEP_SLOPE_PCT = 20;
export const STEEP_PENALTY = 1.2;

/** Running distance within 1 mm of a waypoint counts as reaching it */
const CROSSING_TOLERANCE_KM = 1e-6;

/**
 * Effort cost of one step between consecutive points
 */
export function stepCost(distanceM: number, elevationDiffM: number): number {
  let cost = distanceM / 1000 + Math.max(0, elevationDiffM) / METERS_GAIN_PER_EFFORT_KM;
  const slope = distanceM > 0 ? (elevationDiffM / distanceM) * 100 : 0;
  if (Math.abs(slope) > STEEP_SLOPE_PCT) {
    cost *= STEEP_PENALTY;
  }
  return cost;
}

interface SegmentAccumulator {
  distance_km: number;
  elevation_gain_m: number;
  elevation_loss_m: number;
  raw_cost: number;
}

const emptyAccumulator = (): SegmentAccumulator => ({
  distance_km: 0,
  elevation_gain_m: 0,
  elevation_loss_m: 0,
  raw_cost: 0,
});

/**
 * Walk the track once, closing a segment each time a waypoint is reached.
 * Waypoints already behind the running distance close as zero-cost segments.
 */
export function buildSegments(
  points: Track,
  waypoints: readonly ResolvedWaypoint[]
): SegmentCost[] {
  const segments: SegmentCost[] = [];
  let acc = emptyAccumulator();
  let cumulativeKm = 0;
  let target = 1;
  // The last waypoint takes the rest of the track
  const lastTarget = waypoints.length - 1;

  const closeReached = (altitude: number): void => {
    while (target < lastTarget && cumulativeKm >= waypoints[target].km - CROSSING_TOLERANCE_KM) {
      segments.push({
        from: waypoints[target - 1],
        to: waypoints[target],
        ...acc,
        end_altitude_m: altitude,
      });
      acc = emptyAccumulator();
      target++;
    }
  };

  if (points.length > 0) {
    closeReached(elevationOf(points[0]) ?? 0);
  }

  for (let i = 1; i < points.length; i++) {
    const distanceM = haversineMeters(points[i - 1], points[i]);
    const diff = elevationDelta(points[i - 1], points[i]);

    cumulativeKm += distanceM / 1000;
    acc.distance_km += distanceM / 1000;
    acc.elevation_gain_m += Math.max(0, diff);
    acc.elevation_loss_m += Math.max(0, -diff);
    acc.raw_cost += stepCost(distanceM, diff);

    closeReached(elevationOf(points[i]) ?? 0);
  }

  // Waypoints the scan never reached take what is left, then zero-length segments
  const endAltitude = points.length > 0 ? elevationOf(points[points.length - 1]) ?? 0 : 0;
  while (target < waypoints.length) {
    segments.push({
      from: waypoints[target - 1],
      to: waypoints[target],
      ...acc,
      end_altitude_m: endAltitude,
    });
    acc = emptyAccumulator();
    target++;
  }

  return segments;
}

/**
 * Share the target time across segments.
 * Weighted cost drifts linearly from 1x at the start to (1 + fatigue)x at the finish.
 * The returned durations always sum to targetMinutes.
 */
export function distributeTime(
  segments: readonly SegmentCost[],
  targetMinutes: number,
  fatigueIntensity: number
): number[] {
  if (segments.length === 0) return [];

  const totalRaw = segments.reduce((sum, s) => sum + s.raw_cost, 0);
  if (totalRaw <= 0) {
    return segments.map(() => targetMinutes / segments.length);
  }

  let costBefore = 0;
  const weighted = segments.map(segment => {
    const drift = 1 + (costBefore / totalRaw) * fatigueIntensity;
    costBefore += segment.raw_cost;
    return segment.raw_cost * drift;
  });

  const totalWeighted = weighted.reduce((sum, w) => sum + w, 0);
  const paceFactor = targetMinutes / totalWeighted;

  return weighted.map(w => w * paceFactor);
}

function finiteOr(value: number | undefined, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function cumulative(values: readonly number[]): number[] {
  let total = 0;
  return values.map(v => (total += v));
}

/**
 * Build a checkpoint-by-checkpoint race plan for a goal time
 */
export function planPacing(
  points: Track,
  waypoints: readonly Waypoint[],
  targetMinutes: number,
  options: PacingOptions = {}
): PacingResult {
  if (points.length < 2) {
    return {
      ok: false,
      error: 'insufficient_data',
      message: `Track has ${points.length} point(s); at least 2 are needed`,
    };
  }

  const totalKm = trackLengthMeters(points) / 1000;
  if (totalKm <= 0) {
    return { ok: false, error: 'insufficient_data', message: 'Track has zero length' };
  }

  if (!Number.isFinite(targetMinutes) || targetMinutes <= 0) {
    return {
      ok: false,
      error: 'invalid_target',
      message: `Target time must be a positive number of minutes, got ${targetMinutes}`,
    };
  }

  const startHour = finiteOr(options.start_hour, DEFAULT_START_HOUR);
  const fatigue = Math.max(0, finiteOr(options.fatigue_intensity, DEFAULT_FATIGUE_INTENSITY));

  const resolved = normalizeWaypoints(waypoints, totalKm);
  const segments = buildSegments(points, resolved);

  const durations = distributeTime(segments, targetMinutes, fatigue);
  const elapsed = cumulative(durations);
  const aggressive = cumulative(distributeTime(segments, targetMinutes, AGGRESSIVE_FATIGUE_INTENSITY));
  const conservative = cumulative(distributeTime(segments, targetMinutes, CONSERVATIVE_FATIGUE_INTENSITY));
  const gains = cumulative(segments.map(s => s.elevation_gain_m));

  const startMinutes = startHour * 60;
  const startTod = minutesToTimeOfDay(startMinutes);
  const start = resolved[0];

  const rows: PlanPoint[] = [{
    name: start.name,
    kind: start.kind,
    cumulative_km: 0,
    cumulative_elevation_gain_m: 0,
    altitude_m: Math.trunc(elevationOf(points[0]) ?? 0),
    elapsed_minutes: 0,
    elapsed_time: formatElapsed(0),
    time_of_day: startTod,
    segment_distance_km: 0,
    segment_elevation_gain_m: 0,
    segment_elevation_loss_m: 0,
    segment_minutes: 0,
    segment_duration: '-',
    aggressive_time_of_day: startTod,
    conservative_time_of_day: startTod,
    lat: start.lat,
    lon: start.lon,
  }];

  segments.forEach((segment, i) => {
    rows.push({
      name: segment.to.name,
      kind: segment.to.kind,
      cumulative_km: round(segment.to.km, 2),
      cumulative_elevation_gain_m: Math.round(gains[i]),
      altitude_m: Math.trunc(segment.end_altitude_m),
      elapsed_minutes: elapsed[i],
      elapsed_time: formatElapsed(elapsed[i]),
      time_of_day: minutesToTimeOfDay(startMinutes + elapsed[i]),
      segment_distance_km: round(segment.distance_km, 2),
      segment_elevation_gain_m: Math.round(segment.elevation_gain_m),
      segment_elevation_loss_m: Math.round(segment.elevation_loss_m),
      segment_minutes: durations[i],
      segment_duration: formatElapsed(durations[i]),
      aggressive_time_of_day: minutesToTimeOfDay(startMinutes + aggressive[i]),
      conservative_time_of_day: minutesToTimeOfDay(startMinutes + conservative[i]),
      lat: segment.to.lat,
      lon: segment.to.lon,
    });
  });

  return {
    ok: true,
    plan: {
      target_minutes: targetMinutes,
      start_hour: startHour,
      fatigue_intensity: fatigue,
      total_distance_km: round(totalKm, 2),
      points: rows,
    },
  };
}
