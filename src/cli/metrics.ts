/**
 * Metrics command - Distance, elevation and difficulty for a track file
 */

import chalk from 'chalk';
import { analyzeTrack } from '../api/tracks.js';
import type { TrackMetrics } from '../geo/types.js';
import { loadTrackFile } from './input.js';
import { heading, printJson, unwrap } from './output.js';

interface MetricsOptions {
  json?: boolean;
  geojson?: boolean;
}

export async function metricsCommand(file: string, options: MetricsOptions): Promise<void> {
  const track = loadTrackFile(file);
  const result = unwrap(analyzeTrack({
    points: track.points,
    name: track.name,
    include_geojson: options.geojson,
  }));

  if (options.json || options.geojson) {
    printJson(options.geojson ? result.geojson : result);
    return;
  }

  heading(result.name ?? 'Track');

  if (result.degenerate) {
    console.log(chalk.yellow(`Only ${result.metrics.point_count} point(s): metrics are empty`));
    return;
  }

  displayMetrics(result.metrics);

  console.log('');
  if (result.attributes.tags.length > 0) {
    console.log(`${chalk.bold('Tags:')} ${result.attributes.tags.map(t => chalk.magenta(t)).join(', ')}`);
  } else {
    console.log(`${chalk.bold('Tags:')} ${chalk.gray('none')}`);
  }
}

function displayMetrics(m: TrackMetrics): void {
  console.log(chalk.bold('Distance & elevation'));
  console.log(`  Distance:        ${m.distance_km} km (${m.route_type.replace(/_/g, ' ')})`);
  console.log(`  Gain / loss:     ${chalk.green(`+${m.elevation_gain_m}`)} / ${chalk.red(`-${m.elevation_loss_m}`)} m`);
  console.log(`  Altitude:        ${m.min_altitude_m}-${m.max_altitude_m} m (avg ${m.avg_altitude_m})`);
  console.log(`  Longest climb:   ${m.longest_climb_m} m`);
  console.log('');

  console.log(chalk.bold('Difficulty'));
  console.log(`  Max slope:       ${m.max_slope_pct}%`);
  console.log(`  Avg uphill:      ${m.avg_uphill_slope_pct}%`);
  console.log(`  Effort:          ${m.effort_score} km-effort`);
  console.log(`  IBP index:       ${m.ibp_index}`);
  console.log(`  ITRA points:     ${m.estimated_itra_points}`);
  console.log('');

  console.log(chalk.bold('Estimated times'));
  console.log(`  Hiker:           ${m.estimated_times.hiker}`);
  console.log(`  Runner:          ${m.estimated_times.runner}`);
  console.log(`  Elite:           ${m.estimated_times.elite}`);
}
