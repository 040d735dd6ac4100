/**
 * Track Metrics - Physical analysis of a parsed GPS track
 *
 * Computes from the raw point sequence:
 * - Distance, elevation gain/loss and altitude stats
 * - Slope statistics sampled over 50 m chunks
 * - Effort score (km-effort) and difficulty tier
 * - Profile time estimates and route type
 *
 * Elevation is used raw (sum of deltas, no smoothing). Every downstream
 * number depends on this, so do not smooth here without changing the
 * predictor coefficients too.
 */

import { haversineMeters } from '../geo/distance.js';
import {
  elevationDelta,
  elevationOf,
  type EffortProfile,
  type GeoPoint,
  type RouteType,
  type Track,
  type TrackMetrics,
} from '../geo/types.js';
import { formatHours, round } from '../util/format.js';

/** Distance over which one slope sample is taken */
export const SLOPE_WINDOW_M = 50;

/** Start and end closer than this make a loop */
export const LOOP_THRESHOLD_M = 200;

/** Descent that ends a climb */
export const CLIMB_BREAK_LOSS_M = 20;

/** 100 m of climbing counts as 1 km of flat */
export const METERS_GAIN_PER_EFFORT_KM = 100;

const ITRA_THRESHOLDS = [25, 40, 65, 90, 140, 190] as const;

export const EFFORT_PROFILES: Record<EffortProfile, { flat_kmh: number; climb_m_per_h: number }> = {
  hiker: { flat_kmh: 4, climb_m_per_h: 300 },
  runner: { flat_kmh: 8, climb_m_per_h: 600 },
  elite: { flat_kmh: 12, climb_m_per_h: 1200 },
};

/**
 * Grade-adjusted distance
 */
export function effortKm(distanceKm: number, elevationGainM: number): number {
  return distanceKm + elevationGainM / METERS_GAIN_PER_EFFORT_KM;
}

/**
 * Difficulty tier (0-6) from the effort score
 */
export function itraPoints(effortScore: number): number {
  return ITRA_THRESHOLDS.filter(threshold => effortScore >= threshold).length;
}

/**
 * Time for a fixed speed/climb profile, "HhMM"
 */
export function estimateProfileTime(
  profile: EffortProfile,
  distanceKm: number,
  elevationGainM: number
): string {
  const pace = EFFORT_PROFILES[profile];
  return formatHours(distanceKm / pace.flat_kmh + elevationGainM / pace.climb_m_per_h);
}

export function classifyRoute(points: Track): RouteType {
  if (points.length < 2) return 'point_to_point';
  const gap = haversineMeters(points[0], points[points.length - 1]);
  return gap < LOOP_THRESHOLD_M ? 'loop' : 'point_to_point';
}

interface SlopeFold {
  anchor: GeoPoint;
  accumulated_m: number;
  slopes: number[];
}

/**
 * Slope samples (%) taken every time 50 m of track has elapsed
 */
export function sampleSlopes(points: Track): number[] {
  if (points.length < 2) return [];

  const initial: SlopeFold = { anchor: points[0], accumulated_m: 0, slopes: [] };

  return points.slice(1).reduce<SlopeFold>((state, point, i) => {
    const accumulated = state.accumulated_m + haversineMeters(points[i], point);
    if (accumulated < SLOPE_WINDOW_M) {
      return { ...state, accumulated_m: accumulated };
    }
    const slope = (elevationDelta(state.anchor, point) / accumulated) * 100;
    state.slopes.push(slope);
    return { anchor: point, accumulated_m: 0, slopes: state.slopes };
  }, initial).slopes;
}

/**
 * Longest continuous climb in meters.
 * A climb survives dips until the descent since the last rise exceeds 20 m.
 */
export function longestClimb(points: Track): number {
  let longest = 0;
  let currentGain = 0;
  let lossBuffer = 0;
  let lastEle: number | null = null;

  for (const point of points) {
    const ele = elevationOf(point);
    if (ele === null) continue;
    if (lastEle === null) {
      lastEle = ele;
      continue;
    }

    const diff = ele - lastEle;
    if (diff > 0) {
      currentGain += diff;
      lossBuffer = 0;
    } else if (diff < 0) {
      lossBuffer += -diff;
      if (lossBuffer > CLIMB_BREAK_LOSS_M) {
        longest = Math.max(longest, currentGain);
        currentGain = 0;
        lossBuffer = 0;
      }
    }
    lastEle = ele;
  }

  return Math.max(longest, currentGain);
}

function emptyMetrics(points: Track): TrackMetrics {
  const only = points[0];
  const ele = only ? elevationOf(only) : null;
  const altitude = ele !== null ? Math.trunc(ele) : 0;
  const coordinate = only ? { lat: only.lat, lon: only.lon } : null;

  return {
    distance_km: 0,
    elevation_gain_m: 0,
    elevation_loss_m: 0,
    max_altitude_m: altitude,
    min_altitude_m: altitude,
    avg_altitude_m: altitude,
    max_slope_pct: 0,
    avg_uphill_slope_pct: 0,
    longest_climb_m: 0,
    effort_score: 0,
    ibp_index: 0,
    estimated_itra_points: 0,
    route_type: 'point_to_point',
    estimated_times: { hiker: formatHours(0), runner: formatHours(0), elite: formatHours(0) },
    start_point: coordinate,
    end_point: coordinate,
    point_count: points.length,
  };
}

/**
 * Compute the full metrics set for a track.
 * Fewer than two points yields zeroed metrics rather than an error.
 */
export function computeMetrics(points: Track): TrackMetrics {
  if (points.length < 2) {
    return emptyMetrics(points);
  }

  let distanceM = 0;
  let uphill = 0;
  let downhill = 0;

  for (let i = 1; i < points.length; i++) {
    distanceM += haversineMeters(points[i - 1], points[i]);
    const diff = elevationDelta(points[i - 1], points[i]);
    if (diff > 0) uphill += diff;
    else downhill -= diff;
  }

  const distanceKm = round(distanceM / 1000, 2);

  // Altitude stats over points that carry elevation
  const elevations = points
    .map(elevationOf)
    .filter((ele): ele is number => ele !== null);
  const maxAlt = elevations.length > 0
    ? Math.trunc(elevations.reduce((max, ele) => Math.max(max, ele), -Infinity))
    : 0;
  const minAlt = elevations.length > 0
    ? Math.trunc(elevations.reduce((min, ele) => Math.min(min, ele), Infinity))
    : 0;
  const avgAlt = elevations.length > 0
    ? Math.trunc(elevations.reduce((sum, ele) => sum + ele, 0) / elevations.length)
    : 0;

  const slopes = sampleSlopes(points);
  const uphillSlopes = slopes.filter(slope => slope > 0);
  const maxSlope = round(slopes.reduce((max, slope) => Math.max(max, Math.abs(slope)), 0), 1);
  const avgUphillSlope = uphillSlopes.length > 0
    ? round(uphillSlopes.reduce((sum, s) => sum + s, 0) / uphillSlopes.length, 1)
    : 0;

  const elevationGain = Math.trunc(uphill);
  const elevationLoss = Math.trunc(downhill);
  const effortScore = round(effortKm(distanceKm, elevationGain), 1);

  // IBP-like index: steep courses score 10% above their km-effort
  const ibpScore = avgUphillSlope > 10 ? effortScore * 1.1 : effortScore;

  const start = points[0];
  const end = points[points.length - 1];

  return {
    distance_km: distanceKm,
    elevation_gain_m: elevationGain,
    elevation_loss_m: elevationLoss,
    max_altitude_m: maxAlt,
    min_altitude_m: minAlt,
    avg_altitude_m: avgAlt,
    max_slope_pct: maxSlope,
    avg_uphill_slope_pct: avgUphillSlope,
    longest_climb_m: Math.trunc(longestClimb(points)),
    effort_score: effortScore,
    ibp_index: Math.trunc(ibpScore),
    estimated_itra_points: itraPoints(effortScore),
    route_type: classifyRoute(points),
    estimated_times: {
      hiker: estimateProfileTime('hiker', distanceKm, elevationGain),
      runner: estimateProfileTime('runner', distanceKm, elevationGain),
      elite: estimateProfileTime('elite', distanceKm, elevationGain),
    },
    start_point: { lat: start.lat, lon: start.lon },
    end_point: { lat: end.lat, lon: end.lon },
    point_count: points.length,
  };
}
