/**
 * Strategies command - List, inspect or delete saved pacing strategies
 */

import chalk from 'chalk';
import { closeDb } from '../db/client.js';
import { deleteSavedStrategy, getStrategy, listSavedStrategies } from '../api/strategy.js';
import { formatElapsed, minutesToTimeOfDay } from '../util/format.js';
import { pad, printJson, requireDb, unwrap } from './output.js';

interface StrategiesOptions {
  limit?: number;
  delete?: boolean;
  json?: boolean;
}

export async function strategiesCommand(id: string | undefined, options: StrategiesOptions): Promise<void> {
  if (!requireDb()) return;

  if (options.delete) {
    if (!id) {
      console.error(chalk.red('--delete needs a strategy ID'));
      closeDb();
      process.exit(1);
    }

    const deleted = unwrap(deleteSavedStrategy(id));
    closeDb();

    if (options.json) {
      printJson(deleted);
      return;
    }
    console.log(chalk.green(`✓ Deleted strategy ${deleted.id}`));
    return;
  }

  if (id) {
    const strategy = unwrap(getStrategy(id));
    closeDb();

    if (options.json) {
      printJson(strategy);
      return;
    }

    console.log(chalk.bold(strategy.title));
    console.log(`  ID:        ${strategy.id}`);
    console.log(`  Track:     ${strategy.track_name ?? chalk.gray('-')}`);
    console.log(`  Goal:      ${formatElapsed(strategy.target_minutes)}`);
    console.log(`  Start:     ${minutesToTimeOfDay(strategy.start_hour * 60)}`);
    console.log(`  Fatigue:   ${strategy.fatigue_intensity}`);
    console.log(`  Created:   ${strategy.created_at}`);
    console.log('');
    if (strategy.waypoints.length === 0) {
      console.log(chalk.gray('  No waypoints'));
    }
    for (const w of strategy.waypoints) {
      console.log(`  ${pad(w.km.toFixed(1), 7)}${w.name} ${chalk.gray(`(${w.kind ?? 'checkpoint'})`)}`);
    }
    console.log('');
    console.log(chalk.gray(`Re-run with: trailpace plan <file> --strategy ${strategy.id}`));
    return;
  }

  const strategies = unwrap(listSavedStrategies(options.limit));
  closeDb();

  if (options.json) {
    printJson(strategies);
    return;
  }

  if (strategies.length === 0) {
    console.log(chalk.yellow('No saved strategies'));
    console.log(`Save one with ${chalk.cyan('trailpace plan <file> --goal <time> --save <title>')}`);
    return;
  }

  console.log(chalk.bold(`${pad('ID', 20)}${pad('Goal', 8)}${pad('Track', 20)}Title`));
  for (const s of strategies) {
    console.log(`${pad(s.id, 20)}${pad(formatElapsed(s.target_minutes), 8)}${pad(s.track_name ?? '-', 20)}${s.title}`);
  }
}
