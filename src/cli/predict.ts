/**
 * Predict command - Finish-time estimates for a track
 */

import chalk from 'chalk';
import { closeDb, isDbInitialized, resolveDbPath } from '../db/client.js';
import { predictRaceTime } from '../api/prediction.js';
import { DEFAULT_PERFORMANCE_INDEX } from '../prediction/predictor.js';
import { loadTrackFile } from './input.js';
import { envNumber, heading, printJson, unwrap } from './output.js';

interface PredictOptions {
  index?: number;
  utmb?: number;
  itra?: number;
  betrail?: number;
  scope?: string;
  json?: boolean;
}

export async function predictCommand(file: string, options: PredictOptions): Promise<void> {
  const track = loadTrackFile(file);

  const hasRatings = options.utmb !== undefined || options.itra !== undefined || options.betrail !== undefined;
  const performanceIndex = options.index ?? (hasRatings
    ? undefined
    : envNumber('TRAILPACE_PERFORMANCE_INDEX', DEFAULT_PERFORMANCE_INDEX));

  // Without a store, predictions run on the built-in coefficients
  const useStore = isDbInitialized(resolveDbPath());

  const result = unwrap(predictRaceTime({
    points: track.points,
    performance_index: performanceIndex,
    indices: {
      utmb_index: options.utmb,
      itra_score: options.itra,
      betrail_score: options.betrail,
    },
    user_scope: options.scope,
    config: useStore ? undefined : {},
  }));

  if (useStore) closeDb();

  if (options.json) {
    printJson(result);
    return;
  }

  heading(`${track.name ?? 'Track'} - finish prediction`);

  console.log(`  Course:          ${result.distance_km} km, +${result.elevation_gain_m} m (${result.km_effort} km-effort)`);
  console.log(`  Gradient:        ${result.gradient_ratio} m/km`);
  console.log(`  Index:           ${result.performance_index} (VO2max ~${result.vo2max_estimate})`);
  console.log(`  Speed:           ${result.adjusted_speed_kmeh} km-effort/h`);
  console.log('');
  console.log(chalk.bold('Finish times'));
  console.log(`  Endurance:       ${result.times.endurance}`);
  console.log(`  Race:            ${chalk.green(result.times.race)}`);
  console.log(`  Push:            ${result.times.push}`);
  console.log('');
  console.log(chalk.gray(`Coefficients: ${result.config_scope}`));
}
