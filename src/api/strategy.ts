/**
 * Strategy API - Pacing plans and saved strategies
 */

import { planPacing } from '../strategy/pacing.js';
import type { PacingPlan, PacingResult, Waypoint } from '../strategy/types.js';
import type { Track } from '../geo/types.js';
import {
  createStrategy,
  deleteStrategy,
  getStrategyById,
  listStrategies,
  type SavedStrategy,
} from '../db/strategies.js';
import {
  ApiEnvelope,
  failure,
  generateTraceId,
  success,
  timeOperation,
} from './types.js';

export interface PlanStrategyParams {
  points: Track;
  waypoints: readonly Waypoint[];
  target_minutes: number;
  start_hour?: number;
  fatigue_intensity?: number;
}

export interface SaveStrategyParams extends PlanStrategyParams {
  title: string;
  track_name?: string | null;
}

export interface SaveStrategyResult {
  strategy_id: string;
  plan: PacingPlan;
}

function planFailure<T>(result: Extract<PacingResult, { ok: false }>, trace_id: string): ApiEnvelope<T> {
  return failure<T>(
    result.error === 'invalid_target' ? 'INVALID_TARGET' : 'INSUFFICIENT_DATA',
    result.message,
    trace_id
  );
}

function runPlan(params: PlanStrategyParams): PacingResult {
  return planPacing(params.points, params.waypoints, params.target_minutes, {
    start_hour: params.start_hour,
    fatigue_intensity: params.fatigue_intensity,
  });
}

/**
 * Compute a pacing plan without saving anything
 */
export function planStrategy(params: PlanStrategyParams): ApiEnvelope<PacingPlan> {
  const trace_id = generateTraceId();

  return timeOperation(trace_id, () => {
    const result = runPlan(params);
    if (!result.ok) return planFailure(result, trace_id);
    return success(result.plan, trace_id);
  });
}

/**
 * Compute a plan and, if it succeeds, save its inputs
 */
export function saveStrategy(params: SaveStrategyParams): ApiEnvelope<SaveStrategyResult> {
  const trace_id = generateTraceId();

  return timeOperation(trace_id, () => {
    const result = runPlan(params);
    if (!result.ok) return planFailure(result, trace_id);

    const dbStart = Date.now();
    const strategy_id = createStrategy({
      title: params.title,
      track_name: params.track_name ?? null,
      target_minutes: result.plan.target_minutes,
      start_hour: result.plan.start_hour,
      fatigue_intensity: result.plan.fatigue_intensity,
      waypoints: params.waypoints,
    });

    return success({ strategy_id, plan: result.plan }, trace_id, {
      timings_ms: { total: 0, db: Date.now() - dbStart },
    });
  });
}

/**
 * Fetch a saved strategy
 */
export function getStrategy(id: string): ApiEnvelope<SavedStrategy> {
  const trace_id = generateTraceId();

  return timeOperation(trace_id, () => {
    const strategy = getStrategyById(id);
    if (!strategy) return failure('NOT_FOUND', `Strategy not found: ${id}`, trace_id);
    return success(strategy, trace_id);
  });
}

/** Page size for strategy listings */
export const DEFAULT_STRATEGY_LIMIT = 20;

/**
 * Recent saved strategies. Limits below 1 are raised to 1.
 */
export function listSavedStrategies(limit: number = DEFAULT_STRATEGY_LIMIT): ApiEnvelope<SavedStrategy[]> {
  const trace_id = generateTraceId();
  const pageSize = Number.isFinite(limit) ? Math.max(1, Math.trunc(limit)) : DEFAULT_STRATEGY_LIMIT;
  return timeOperation(trace_id, () => success(listStrategies(pageSize), trace_id));
}

/**
 * Delete a saved strategy
 */
export function deleteSavedStrategy(id: string): ApiEnvelope<{ id: string; deleted: true }> {
  const trace_id = generateTraceId();

  return timeOperation(trace_id, () => {
    if (!deleteStrategy(id)) return failure('NOT_FOUND', `Strategy not found: ${id}`, trace_id);
    return success({ id, deleted: true as const }, trace_id);
  });
}

/**
 * Re-run a saved strategy against a track
 */
export function replanStrategy(id: string, points: Track): ApiEnvelope<PacingPlan> {
  const trace_id = generateTraceId();

  return timeOperation(trace_id, () => {
    const strategy = getStrategyById(id);
    if (!strategy) return failure('NOT_FOUND', `Strategy not found: ${id}`, trace_id);

    const result = runPlan({
      points,
      waypoints: strategy.waypoints,
      target_minutes: strategy.target_minutes,
      start_hour: strategy.start_hour,
      fatigue_intensity: strategy.fatigue_intensity,
    });
    if (!result.ok) return planFailure(result, trace_id);
    return success(result.plan, trace_id);
  });
}
