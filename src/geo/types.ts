/**
 * Geo Type Definitions
 *
 * A track is the ordered point sequence produced by an upstream GPX/FIT parser.
 * Everything computed from it is a fresh readonly value.
 */

export interface GeoPoint {
  readonly lat: number;
  readonly lon: number;
  /** Meters above sea level */
  readonly ele?: number | null;
  readonly time?: Date | null;
}

export type Track = readonly GeoPoint[];

export interface GeoCoordinate {
  readonly lat: number;
  readonly lon: number;
}

export type RouteType = 'loop' | 'out_and_back' | 'point_to_point';

export type EffortProfile = 'hiker' | 'runner' | 'elite';

export interface TrackMetrics {
  readonly distance_km: number;
  readonly elevation_gain_m: number;
  readonly elevation_loss_m: number;
  readonly max_altitude_m: number;
  readonly min_altitude_m: number;
  readonly avg_altitude_m: number;
  readonly max_slope_pct: number;
  readonly avg_uphill_slope_pct: number;
  readonly longest_climb_m: number;
  /** Grade-adjusted distance in km-effort */
  readonly effort_score: number;
  readonly ibp_index: number;
  /** Difficulty tier, 0-6 */
  readonly estimated_itra_points: number;
  readonly route_type: RouteType;
  readonly estimated_times: Readonly<Record<EffortProfile, string>>;
  readonly start_point: GeoCoordinate | null;
  readonly end_point: GeoCoordinate | null;
  readonly point_count: number;
}

export interface TrackAttributes {
  readonly is_high_mountain: boolean;
  readonly tags: readonly TrackTag[];
}

export type TrackTag = 'high_mountain' | 'vertical' | 'skyrunning';

/**
 * Elevation of a point, or null when the parser gave none
 */
export function elevationOf(point: GeoPoint): number | null {
  return typeof point.ele === 'number' && Number.isFinite(point.ele) ? point.ele : null;
}

/**
 * Elevation difference between two points, 0 unless both carry elevation
 */
export function elevationDelta(from: GeoPoint, to: GeoPoint): number {
  const a = elevationOf(from);
  const b = elevationOf(to);
  return a !== null && b !== null ? b - a : 0;
}
