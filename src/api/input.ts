/**
 * Untrusted track and waypoint input
 *
 * Tracks arrive as JSON from files or MCP calls: either an array of points
 * or `{ name?, points }`, each point `{ lat, lon, ele?, time? }`.
 * Waypoints are an array of `{ km, name, kind?, lat?, lon? }`.
 */

import type { GeoPoint } from '../geo/types.js';
import type { Waypoint } from '../strategy/types.js';
import { coerceWaypoint } from '../strategy/waypoints.js';

export class TrackInputError extends Error {
  constructor(message: string, readonly index: number | null = null) {
    super(index === null ? message : `Entry ${index}: ${message}`);
    this.name = 'TrackInputError';
  }
}

export interface ParsedTrack {
  name: string | null;
  points: GeoPoint[];
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function parsePoint(value: unknown, index: number): GeoPoint {
  if (!isRecord(value)) {
    throw new TrackInputError('point must be an object', index);
  }

  const { lat, lon, ele, time } = value;
  if (typeof lat !== 'number' || !Number.isFinite(lat) || lat < -90 || lat > 90) {
    throw new TrackInputError(`invalid lat ${JSON.stringify(lat)}`, index);
  }
  if (typeof lon !== 'number' || !Number.isFinite(lon) || lon < -180 || lon > 180) {
    throw new TrackInputError(`invalid lon ${JSON.stringify(lon)}`, index);
  }

  let parsedTime: Date | null = null;
  if (typeof time === 'string' || typeof time === 'number') {
    const date = new Date(time);
    parsedTime = Number.isNaN(date.getTime()) ? null : date;
  }

  return {
    lat,
    lon,
    ele: typeof ele === 'number' && Number.isFinite(ele) ? ele : null,
    time: parsedTime,
  };
}

/**
 * Validate parsed JSON as a track
 */
export function parseTrackJson(raw: unknown): ParsedTrack {
  let name: string | null = null;
  let entries: unknown;

  if (Array.isArray(raw)) {
    entries = raw;
  } else if (isRecord(raw)) {
    name = typeof raw.name === 'string' && raw.name.trim() ? raw.name : null;
    entries = raw.points;
  }

  if (!Array.isArray(entries)) {
    throw new TrackInputError('Expected an array of points or an object with a "points" array');
  }

  return {
    name,
    points: entries.map((entry: unknown, i) => parsePoint(entry, i)),
  };
}

export function parseWaypointsJson(raw: unknown): Waypoint[] {
  if (!Array.isArray(raw)) {
    throw new TrackInputError('Expected an array of waypoints');
  }

  return raw.map((entry: unknown, i) => {
    const waypoint = coerceWaypoint(entry);
    if (!waypoint) {
      throw new TrackInputError('waypoint needs a numeric "km" and a string "name"', i);
    }
    return waypoint;
  });
}
