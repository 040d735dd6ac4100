/**
 * Strategy Type Definitions
 */

export type WaypointKind = 'start' | 'finish' | 'checkpoint' | 'water' | 'food' | 'base_camp';

export const WAYPOINT_KINDS: readonly WaypointKind[] = [
  'start',
  'finish',
  'checkpoint',
  'water',
  'food',
  'base_camp',
];

export interface Waypoint {
  km: number;
  name: string;
  kind?: WaypointKind;
  lat?: number | null;
  lon?: number | null;
}

/** A waypoint after sorting, clamping and Start/Finish synthesis */
export interface ResolvedWaypoint {
  readonly km: number;
  readonly name: string;
  readonly kind: WaypointKind;
  readonly lat: number | null;
  readonly lon: number | null;
}

export interface SegmentCost {
  readonly from: ResolvedWaypoint;
  readonly to: ResolvedWaypoint;
  readonly distance_km: number;
  readonly elevation_gain_m: number;
  readonly elevation_loss_m: number;
  /** Elevation of the point that closed the segment */
  readonly end_altitude_m: number;
  readonly raw_cost: number;
}

export interface PlanPoint {
  readonly name: string;
  readonly kind: WaypointKind;
  readonly cumulative_km: number;
  readonly cumulative_elevation_gain_m: number;
  readonly altitude_m: number;
  readonly elapsed_minutes: number;
  /** "HHhMM" */
  readonly elapsed_time: string;
  /** "HH:MM" */
  readonly time_of_day: string;
  readonly segment_distance_km: number;
  readonly segment_elevation_gain_m: number;
  readonly segment_elevation_loss_m: number;
  readonly segment_minutes: number;
  /** "HHhMM", "-" on the start row */
  readonly segment_duration: string;
  /** Same plan run with a hard start (fatigue 0.25) */
  readonly aggressive_time_of_day: string;
  /** Same plan with even effort (fatigue 0) */
  readonly conservative_time_of_day: string;
  readonly lat: number | null;
  readonly lon: number | null;
}

export interface PacingPlan {
  readonly target_minutes: number;
  readonly start_hour: number;
  readonly fatigue_intensity: number;
  readonly total_distance_km: number;
  readonly points: readonly PlanPoint[];
}

export type PacingErrorCode = 'insufficient_data' | 'invalid_target';

export type PacingResult =
  | { ok: true; plan: PacingPlan }
  | { ok: false; error: PacingErrorCode; message: string };

export interface PacingOptions {
  /** Hour of day the race starts, e.g. 6.5 for 06:30 */
  start_hour?: number;
  /** Cost drift from start to finish; 0.2 means the last segment costs 20% more */
  fatigue_intensity?: number;
}
