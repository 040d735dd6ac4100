/**
 * Waypoint normalization
 *
 * Sorts caller waypoints, clamps them onto the track and makes sure the list
 * starts at km 0 and ends at or near the finish.
 */

import { WAYPOINT_KINDS, type ResolvedWaypoint, type Waypoint, type WaypointKind } from './types.js';

/** A first waypoint this close to km 0 is the start */
export const START_TOLERANCE_KM = 0.1;

/** A last waypoint this close to the total stands in for the finish, keeping its km */
export const FINISH_TOLERANCE_KM = 0.5;

export const START_NAME = 'Start';
export const FINISH_NAME = 'Finish';

function resolve(waypoint: Waypoint, totalKm: number): ResolvedWaypoint {
  const km = Number.isFinite(waypoint.km) ? waypoint.km : 0;
  return {
    km: Math.min(Math.max(km, 0), totalKm),
    name: waypoint.name,
    kind: waypoint.kind ?? 'checkpoint',
    lat: waypoint.lat ?? null,
    lon: waypoint.lon ?? null,
  };
}

export function normalizeWaypoints(
  waypoints: readonly Waypoint[],
  totalKm: number
): ResolvedWaypoint[] {
  // Array.prototype.sort is stable, so equal distances keep caller order
  const sorted = waypoints
    .map(w => resolve(w, totalKm))
    .sort((a, b) => a.km - b.km);

  const first = sorted[0];
  if (first && first.km <= START_TOLERANCE_KM) {
    sorted[0] = { ...first, km: 0 };
  } else {
    sorted.unshift({ km: 0, name: START_NAME, kind: 'start', lat: null, lon: null });
  }

  const last = sorted[sorted.length - 1];
  if (sorted.length === 1 || totalKm - last.km > FINISH_TOLERANCE_KM) {
    sorted.push({ km: totalKm, name: FINISH_NAME, kind: 'finish', lat: null, lon: null });
  }

  return sorted;
}

export function isWaypointKind(value: unknown): value is WaypointKind {
  return WAYPOINT_KINDS.some(kind => kind === value);
}

function optionalCoordinate(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

/**
 * Waypoint from untrusted JSON, or null when km or name is missing.
 * Unknown kinds fall back to 'checkpoint'.
 */
export function coerceWaypoint(value: unknown): Waypoint | null {
  if (value === null || typeof value !== 'object') return null;

  const km: unknown = 'km' in value ? value.km : undefined;
  const name: unknown = 'name' in value ? value.name : undefined;
  if (typeof km !== 'number' || !Number.isFinite(km) || typeof name !== 'string') {
    return null;
  }

  const kind: unknown = 'kind' in value ? value.kind : undefined;
  return {
    km,
    name,
    kind: isWaypointKind(kind) ? kind : 'checkpoint',
    lat: optionalCoordinate('lat' in value ? value.lat : undefined),
    lon: optionalCoordinate('lon' in value ? value.lon : undefined),
  };
}
