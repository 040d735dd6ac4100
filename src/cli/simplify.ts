/**
 * Simplify command - Reduce a track's point count
 */

import chalk from 'chalk';
import { writeFileSync } from 'fs';
import { simplifyTrack } from '../api/tracks.js';
import { loadTrackFile } from './input.js';
import { printJson, unwrap } from './output.js';

interface SimplifyOptions {
  tolerance?: number;
  output?: string;
  json?: boolean;
}

export async function simplifyCommand(file: string, options: SimplifyOptions): Promise<void> {
  const track = loadTrackFile(file);
  const result = unwrap(simplifyTrack({ points: track.points, tolerance: options.tolerance }));

  if (options.output) {
    writeFileSync(options.output, JSON.stringify({ name: track.name, points: result.points }, null, 2));
  }

  if (options.json) {
    printJson(result);
    return;
  }

  const kept = result.original_count > 0
    ? Math.round((result.simplified_count / result.original_count) * 100)
    : 100;

  console.log(chalk.green(`Simplified ${track.name ?? file}`));
  console.log(`  Tolerance: ${result.tolerance}°`);
  console.log(`  Points:    ${result.original_count} → ${result.simplified_count} (${kept}% kept)`);
  if (options.output) {
    console.log(`  Written:   ${chalk.cyan(options.output)}`);
  }
}
