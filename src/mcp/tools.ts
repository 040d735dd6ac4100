/**
 * MCP tool definitions and dispatch
 *
 * Read tools work on the track passed in the call. Store tools need an
 * initialized database.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import {
  analyzeTrack,
  simplifyTrack,
  planStrategy,
  saveStrategy,
  listSavedStrategies,
  deleteSavedStrategy,
  predictRaceTime,
  getPredictionConfigInfo,
  failure,
  generateTraceId,
  type ApiEnvelope,
} from '../api/index.js';
import { TrackInputError, parseTrackJson, parseWaypointsJson } from '../api/input.js';
import { isDbInitialized, resolveDbPath } from '../db/client.js';
import { DEFAULT_PREDICTION_CONFIG } from '../prediction/config.js';
import { parseGoalMinutes } from '../util/format.js';

// ============================================
// Tool Definitions
// ============================================

const TRACK_PROPERTIES = {
  points: {
    type: 'array',
    description: 'Track points in order: { lat, lon, ele?, time? }',
    items: { type: 'object' },
  },
  name: { type: 'string', description: 'Optional track name' },
};

const PACING_PROPERTIES = {
  ...TRACK_PROPERTIES,
  waypoints: {
    type: 'array',
    description: 'Checkpoints: { km, name, kind? }. Start and Finish are added when missing',
    items: { type: 'object' },
  },
  target: { type: ['number', 'string'], description: 'Goal time in minutes, or "6h30" / "6:30"' },
  start_hour: { type: 'number', description: 'Start hour of day (default: 6)' },
  fatigue_intensity: { type: 'number', description: 'Fatigue drift, 0 = even effort (default: 0.2)' },
};

export const READ_TOOLS: Tool[] = [
  {
    name: 'trail_analyze_track',
    description: 'Compute distance, elevation, slope, effort, ITRA points and estimated times for a track',
    inputSchema: {
      type: 'object',
      properties: {
        ...TRACK_PROPERTIES,
        include_geojson: { type: 'boolean', description: 'Include a GeoJSON LineString (default: false)' },
      },
      required: ['points'],
    },
  },
  {
    name: 'trail_simplify_track',
    description: 'Reduce a track with Douglas-Peucker, keeping its shape',
    inputSchema: {
      type: 'object',
      properties: {
        ...TRACK_PROPERTIES,
        tolerance: { type: 'number', description: 'Tolerance in degrees (default: 0.0001, about 10 m)' },
      },
      required: ['points'],
    },
  },
  {
    name: 'trail_plan_pacing',
    description: 'Split a goal time across checkpoints with effort-based pacing and fatigue drift',
    inputSchema: {
      type: 'object',
      properties: PACING_PROPERTIES,
      required: ['points', 'target'],
    },
  },
  {
    name: 'trail_predict_finish',
    description: 'Predict endurance, race and push finish times from a performance index',
    inputSchema: {
      type: 'object',
      properties: {
        ...TRACK_PROPERTIES,
        performance_index: { type: 'number', description: 'Performance index (default: best rating, else 400)' },
        utmb_index: { type: 'number' },
        itra_score: { type: 'number' },
        betrail_score: { type: 'number' },
        scope: { type: 'string', description: 'Prediction config scope (default: global)' },
      },
      required: ['points'],
    },
  },
  {
    name: 'trail_read_prediction_config',
    description: 'Get the effective prediction coefficients for a scope',
    inputSchema: {
      type: 'object',
      properties: {
        scope: { type: 'string', description: 'Config scope (default: global)' },
      },
    },
  },
];

export const STORE_TOOLS: Tool[] = [
  {
    name: 'trail_save_strategy',
    description: 'Compute a pacing plan and save its inputs as a strategy',
    inputSchema: {
      type: 'object',
      properties: {
        ...PACING_PROPERTIES,
        title: { type: 'string', description: 'Strategy title' },
      },
      required: ['points', 'target', 'title'],
    },
  },
  {
    name: 'trail_list_strategies',
    description: 'List saved strategies, most recent first',
    inputSchema: {
      type: 'object',
      properties: {
        limit: { type: 'number', description: 'Max strategies to return, at least 1 (default: 20)' },
      },
    },
  },
  {
    name: 'trail_delete_strategy',
    description: 'Delete a saved strategy',
    inputSchema: {
      type: 'object',
      properties: {
        id: { type: 'string', description: 'Strategy ID' },
      },
      required: ['id'],
    },
  },
];

export const ALL_TOOLS = [...READ_TOOLS, ...STORE_TOOLS];

// ============================================
// Argument Helpers
// ============================================

export type ToolArgs = Record<string, unknown>;

function optionalNumber(args: ToolArgs, key: string): number | undefined {
  const value = args[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function optionalString(args: ToolArgs, key: string): string | undefined {
  const value = args[key];
  return typeof value === 'string' && value.trim() ? value : undefined;
}

function targetMinutes(args: ToolArgs): number {
  const value = args.target;
  if (typeof value === 'number') return value;
  if (typeof value === 'string') return parseGoalMinutes(value) ?? Number.NaN;
  return Number.NaN;
}

function pacingParams(args: ToolArgs) {
  const track = parseTrackJson({ name: args.name, points: args.points });
  return {
    track,
    params: {
      points: track.points,
      waypoints: args.waypoints === undefined ? [] : parseWaypointsJson(args.waypoints),
      target_minutes: targetMinutes(args),
      start_hour: optionalNumber(args, 'start_hour'),
      fatigue_intensity: optionalNumber(args, 'fatigue_intensity'),
    },
  };
}

function storeReady(): boolean {
  return isDbInitialized(resolveDbPath());
}

function notInitialized(): ApiEnvelope<never> {
  return failure(
    'DB_NOT_INITIALIZED',
    'Database not initialized. Run `trailpace init` first.',
    generateTraceId()
  );
}

// ============================================
// Tool Handlers
// ============================================

function dispatch(name: string, args: ToolArgs): ApiEnvelope<unknown> {
  switch (name) {
    // Read tools
    case 'trail_analyze_track': {
      const track = parseTrackJson({ name: args.name, points: args.points });
      return analyzeTrack({
        points: track.points,
        name: track.name,
        include_geojson: args.include_geojson === true,
      });
    }

    case 'trail_simplify_track': {
      const track = parseTrackJson({ points: args.points });
      return simplifyTrack({ points: track.points, tolerance: optionalNumber(args, 'tolerance') });
    }

    case 'trail_plan_pacing':
      return planStrategy(pacingParams(args).params);

    case 'trail_predict_finish': {
      const track = parseTrackJson({ points: args.points });
      return predictRaceTime({
        points: track.points,
        performance_index: optionalNumber(args, 'performance_index'),
        indices: {
          utmb_index: optionalNumber(args, 'utmb_index'),
          itra_score: optionalNumber(args, 'itra_score'),
          betrail_score: optionalNumber(args, 'betrail_score'),
        },
        user_scope: optionalString(args, 'scope'),
        config: storeReady() ? undefined : {},
      });
    }

    case 'trail_read_prediction_config':
      if (!storeReady()) {
        return {
          ok: true,
          data: { scope: 'defaults', config: DEFAULT_PREDICTION_CONFIG, overridden_keys: [] },
          trace_id: generateTraceId(),
        };
      }
      return getPredictionConfigInfo(optionalString(args, 'scope'));

    // Store tools
    case 'trail_save_strategy': {
      if (!storeReady()) return notInitialized();
      const title = optionalString(args, 'title');
      if (!title) {
        return failure('INVALID_INPUT', 'title is required', generateTraceId());
      }
      const { track, params } = pacingParams(args);
      return saveStrategy({ ...params, title, track_name: track.name });
    }

    case 'trail_list_strategies':
      if (!storeReady()) return notInitialized();
      return listSavedStrategies(optionalNumber(args, 'limit'));

    case 'trail_delete_strategy': {
      if (!storeReady()) return notInitialized();
      const id = optionalString(args, 'id');
      if (!id) {
        return failure('INVALID_INPUT', 'id is required', generateTraceId());
      }
      return deleteSavedStrategy(id);
    }

    default:
      return failure('UNKNOWN_TOOL', `Unknown tool: ${name}`, generateTraceId());
  }
}

/**
 * Run a tool; invalid tracks and waypoints become INVALID_INPUT envelopes
 */
export function handleToolCall(name: string, args: ToolArgs): ApiEnvelope<unknown> {
  try {
    return dispatch(name, args);
  } catch (err) {
    if (err instanceof TrackInputError) {
      return failure('INVALID_INPUT', err.message, generateTraceId(), { index: err.index });
    }
    throw err;
  }
}
