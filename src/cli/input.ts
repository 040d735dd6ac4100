/**
 * Track and waypoint files for the CLI
 */

import { readFileSync } from 'fs';
import { basename, extname } from 'path';
import type { Waypoint } from '../strategy/types.js';
import {
  TrackInputError,
  parseTrackJson,
  parseWaypointsJson,
  type ParsedTrack,
} from '../api/input.js';

export type LoadedTrack = ParsedTrack;

function readJson(path: string): unknown {
  const text = readFileSync(path, 'utf-8');
  try {
    return JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new TrackInputError(`${path} is not valid JSON: ${reason}`);
  }
}

/**
 * Read a track file; unnamed tracks take the file name
 */
export function loadTrackFile(path: string): LoadedTrack {
  const track = parseTrackJson(readJson(path));
  return {
    ...track,
    name: track.name ?? basename(path, extname(path)),
  };
}

export function loadWaypointsFile(path: string): Waypoint[] {
  return parseWaypointsJson(readJson(path));
}
