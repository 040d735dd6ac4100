/**
 * Saved strategies - the inputs of a pacing plan, kept for re-computation
 */

import { execute, generateId, query, queryOne } from './client.js';
import { coerceWaypoint } from '../strategy/waypoints.js';
import type { Waypoint } from '../strategy/types.js';

export interface SavedStrategy {
  id: string;
  title: string;
  track_name: string | null;
  target_minutes: number;
  start_hour: number;
  fatigue_intensity: number;
  waypoints: Waypoint[];
  created_at: string;
}

interface StrategyRow {
  id: string;
  title: string;
  track_name: string | null;
  target_minutes: number;
  start_hour: number;
  fatigue_intensity: number;
  waypoints: string;
  created_at: string;
}

export interface StrategyInput {
  title: string;
  track_name?: string | null;
  target_minutes: number;
  start_hour: number;
  fatigue_intensity: number;
  waypoints: readonly Waypoint[];
}

/**
 * Create a strategy record
 */
export function createStrategy(input: StrategyInput): string {
  const id = generateId('strat');

  execute(
    `INSERT INTO strategies (id, title, track_name, target_minutes, start_hour, fatigue_intensity, waypoints)
     VALUES (?, ?, ?, ?, ?, ?, ?)`,
    [
      id,
      input.title,
      input.track_name ?? null,
      input.target_minutes,
      input.start_hour,
      input.fatigue_intensity,
      JSON.stringify(input.waypoints),
    ]
  );

  return id;
}

/**
 * Get strategy by ID
 */
export function getStrategyById(id: string): SavedStrategy | null {
  const row = queryOne<StrategyRow>('SELECT * FROM strategies WHERE id = ?', [id]);
  return row ? parseStrategyRow(row) : null;
}

/**
 * Most recent strategies first
 */
export function listStrategies(limit: number = 20): SavedStrategy[] {
  const rows = query<StrategyRow>(
    'SELECT * FROM strategies ORDER BY created_at DESC, rowid DESC LIMIT ?',
    [limit]
  );
  return rows.map(parseStrategyRow);
}

export function deleteStrategy(id: string): boolean {
  return execute('DELETE FROM strategies WHERE id = ?', [id]).changes > 0;
}

function parseWaypoints(raw: string): Waypoint[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return [];
  }
  if (!Array.isArray(parsed)) return [];

  return parsed
    .map(coerceWaypoint)
    .filter((w): w is Waypoint => w !== null);
}

function parseStrategyRow(row: StrategyRow): SavedStrategy {
  return {
    id: row.id,
    title: row.title,
    track_name: row.track_name,
    target_minutes: row.target_minutes,
    start_hour: row.start_hour,
    fatigue_intensity: row.fatigue_intensity,
    waypoints: parseWaypoints(row.waypoints),
    created_at: row.created_at,
  };
}
