/**
 * Config command - Show and tune prediction coefficients
 *
 * Usage:
 *   trailpace config show [--scope <user>]
 *   trailpace config set base_speed_slope=0.025 decay_start_km=50 [--scope <user>]
 *   trailpace config reset [--scope <user>]
 */

import chalk from 'chalk';
import { closeDb } from '../db/client.js';
import {
  getPredictionConfigInfo,
  resetPredictionConfig,
  updatePredictionConfig,
} from '../api/prediction.js';
import type { PredictionConfigResult } from '../api/types.js';
import { GLOBAL_SCOPE } from '../db/prediction-configs.js';
import { DEFAULT_PREDICTION_CONFIG, PREDICTION_CONFIG_KEYS } from '../prediction/config.js';
import { pad, printJson, requireDb, unwrap } from './output.js';

interface ConfigOptions {
  scope?: string;
  json?: boolean;
}

/**
 * Parse "key=value" pairs; malformed pairs are returned separately
 */
export function parseAssignments(pairs: readonly string[]): {
  values: Record<string, string>;
  invalid: string[];
} {
  const values: Record<string, string> = {};
  const invalid: string[] = [];

  for (const pair of pairs) {
    const eq = pair.indexOf('=');
    if (eq <= 0 || eq === pair.length - 1) {
      invalid.push(pair);
      continue;
    }
    values[pair.slice(0, eq).trim()] = pair.slice(eq + 1).trim();
  }

  return { values, invalid };
}

export async function configCommand(
  subcommand: string,
  pairs: string[],
  options: ConfigOptions
): Promise<void> {
  if (!requireDb()) return;

  const scope = options.scope ?? GLOBAL_SCOPE;
  let result: PredictionConfigResult;

  switch (subcommand) {
    case 'show':
      result = unwrap(getPredictionConfigInfo(scope));
      break;

    case 'set': {
      const { values, invalid } = parseAssignments(pairs);
      if (invalid.length > 0) {
        console.error(chalk.red(`Expected key=value, got: ${invalid.join(', ')}`));
        closeDb();
        process.exit(1);
      }
      const unknown = Object.keys(values).filter(k => !PREDICTION_CONFIG_KEYS.some(key => key === k));
      if (unknown.length > 0) {
        console.log(chalk.yellow(`Ignoring unknown keys: ${unknown.join(', ')}`));
      }
      result = unwrap(updatePredictionConfig(values, scope));
      if (!options.json) console.log(chalk.green(`Updated ${scope} prediction config`));
      break;
    }

    case 'reset':
      result = unwrap(resetPredictionConfig(scope));
      if (!options.json) console.log(chalk.green(`Reset ${scope} prediction config`));
      break;

    default:
      console.error(chalk.red(`Unknown subcommand: ${subcommand}`));
      closeDb();
      process.exit(1);
  }

  closeDb();

  if (options.json) {
    printJson(result);
    return;
  }

  displayConfig(result);
}

function displayConfig(result: PredictionConfigResult): void {
  console.log('');
  console.log(chalk.bold(`Prediction config (${result.scope})`));
  for (const key of PREDICTION_CONFIG_KEYS) {
    const value = result.config[key];
    const line = `  ${pad(key, 26)}${value}`;
    if (result.overridden_keys.includes(key)) {
      console.log(`${chalk.cyan(line)} ${chalk.gray(`(default ${DEFAULT_PREDICTION_CONFIG[key]})`)}`);
    } else {
      console.log(line);
    }
  }
}
