/**
 * Plan command - Checkpoint splits for a goal time
 *
 * Usage:
 *   trailpace plan course.json --goal 6h30 --waypoints aid.json
 *   trailpace plan course.json --goal 6h30 --save "Spring race"
 *   trailpace plan course.json --strategy strat_abc123
 */

import chalk from 'chalk';
import { closeDb } from '../db/client.js';
import { planStrategy, replanStrategy, saveStrategy } from '../api/strategy.js';
import { DEFAULT_FATIGUE_INTENSITY, DEFAULT_START_HOUR } from '../strategy/pacing.js';
import type { PacingPlan, Waypoint } from '../strategy/types.js';
import { formatElapsed, minutesToTimeOfDay, parseGoalMinutes } from '../util/format.js';
import { loadTrackFile, loadWaypointsFile, type LoadedTrack } from './input.js';
import { envNumber, heading, pad, padLeft, printJson, requireDb, unwrap } from './output.js';

export interface PlanOptions {
  goal?: string;
  start?: number;
  fatigue?: number;
  waypoints?: string;
  save?: string;
  strategy?: string;
  json?: boolean;
}

export async function planCommand(file: string, options: PlanOptions): Promise<void> {
  const track = loadTrackFile(file);

  if (options.strategy) {
    if (!requireDb()) return;
    const plan = unwrap(replanStrategy(options.strategy, track.points));
    closeDb();
    output(plan, track, options);
    return;
  }

  if (!options.goal) {
    console.log(chalk.yellow('Missing --goal <time>'));
    console.log(chalk.gray('Example: trailpace plan course.json --goal 6h30'));
    return;
  }

  const target = parseGoalMinutes(options.goal);
  if (target === null) {
    console.error(chalk.red(`Invalid goal time: ${options.goal}`));
    console.error(chalk.gray('Use minutes (390), 6h30, 6:30 or 6h'));
    process.exit(1);
  }

  const waypoints: Waypoint[] = options.waypoints ? loadWaypointsFile(options.waypoints) : [];
  const params = {
    points: track.points,
    waypoints,
    target_minutes: target,
    start_hour: options.start ?? envNumber('TRAILPACE_START_HOUR', DEFAULT_START_HOUR),
    fatigue_intensity: options.fatigue ?? envNumber('TRAILPACE_FATIGUE', DEFAULT_FATIGUE_INTENSITY),
  };

  if (options.save) {
    if (!requireDb()) return;
    const saved = unwrap(saveStrategy({ ...params, title: options.save, track_name: track.name }));
    closeDb();
    output(saved.plan, track, options);
    if (!options.json) {
      console.log('');
      console.log(chalk.green(`Saved strategy ${saved.strategy_id}`));
    }
    return;
  }

  output(unwrap(planStrategy(params)), track, options);
}

function output(plan: PacingPlan, track: LoadedTrack, options: PlanOptions): void {
  if (options.json) {
    printJson(plan);
    return;
  }
  displayPlan(plan, track.name);
}

function displayPlan(plan: PacingPlan, name: string | null): void {
  heading(`${name ?? 'Track'} - ${formatElapsed(plan.target_minutes)} goal`);

  console.log(chalk.gray(
    `${plan.total_distance_km} km, start ${minutesToTimeOfDay(plan.start_hour * 60)}, fatigue ${plan.fatigue_intensity}`
  ));
  console.log('');

  console.log(chalk.bold(
    `${pad('Checkpoint', 20)}${padLeft('km', 7)}${padLeft('D+', 7)}${padLeft('Alt', 6)}` +
    `${padLeft('Split', 8)}${padLeft('Elapsed', 9)}${padLeft('Time', 7)}${padLeft('Fast', 7)}${padLeft('Even', 7)}`
  ));
  console.log(chalk.gray('─'.repeat(78)));

  for (const row of plan.points) {
    const label = row.kind === 'checkpoint' ? row.name : `${row.name} (${row.kind})`;
    console.log(
      `${pad(label.slice(0, 19), 20)}` +
      `${padLeft(row.cumulative_km.toFixed(1), 7)}` +
      `${padLeft(row.cumulative_elevation_gain_m, 7)}` +
      `${padLeft(row.altitude_m, 6)}` +
      `${padLeft(row.segment_duration, 8)}` +
      `${padLeft(row.elapsed_time, 9)}` +
      chalk.cyan(padLeft(row.time_of_day, 7)) +
      `${padLeft(row.aggressive_time_of_day, 7)}` +
      `${padLeft(row.conservative_time_of_day, 7)}`
    );
  }
}
