#!/usr/bin/env node
/**
 * Trailpace CLI - Trail route analytics and race pacing
 *
 * Track commands:
 * - trailpace metrics <file>    : Distance, elevation, difficulty
 * - trailpace simplify <file>   : Reduce point count
 * - trailpace plan <file>       : Checkpoint splits for a goal time
 * - trailpace predict <file>    : Finish-time estimates
 *
 * Store commands:
 * - trailpace config            : Prediction coefficients
 * - trailpace strategies        : Saved pacing strategies
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { config } from 'dotenv';

// Load environment variables
config();

const program = new Command();

program
  .name('trailpace')
  .description('Trail route analytics and pacing')
  .version('0.1.0');

// ===========================================
// Track Commands
// ===========================================

program
  .command('metrics')
  .description('Compute distance, elevation and difficulty metrics for a track file')
  .argument('<file>', 'Track JSON file')
  .option('--geojson', 'Print the track as a GeoJSON feature')
  .option('--json', 'Output raw JSON')
  .action(async (file: string, options) => {
    const { metricsCommand } = await import('./metrics.js');
    await metricsCommand(file, options);
  });

program
  .command('simplify')
  .description('Simplify a track with Douglas-Peucker')
  .argument('<file>', 'Track JSON file')
  .option('-t, --tolerance <degrees>', 'Tolerance in degrees (0.0001 ~ 10 m)', parseFloat)
  .option('-o, --output <path>', 'Write the simplified track to a file')
  .option('--json', 'Output raw JSON')
  .action(async (file: string, options) => {
    const { simplifyCommand } = await import('./simplify.js');
    await simplifyCommand(file, options);
  });

program
  .command('plan')
  .description('Split a goal time across checkpoints')
  .argument('<file>', 'Track JSON file')
  .option('--goal <time>', 'Goal time (390, 6h30, 6:30)')
  .option('--start <hour>', 'Start hour, e.g. 6.5 for 06:30', parseFloat)
  .option('--fatigue <n>', 'Fatigue intensity (0 = even effort)', parseFloat)
  .option('--waypoints <file>', 'Waypoints JSON file')
  .option('--save <title>', 'Save the strategy under this title')
  .option('--strategy <id>', 'Re-run a saved strategy')
  .option('--json', 'Output raw JSON')
  .action(async (file: string, options) => {
    const { planCommand } = await import('./plan.js');
    await planCommand(file, options);
  });

program
  .command('predict')
  .description('Predict finish times from a performance index')
  .argument('<file>', 'Track JSON file')
  .option('--index <n>', 'Performance index', parseFloat)
  .option('--utmb <n>', 'UTMB index', parseFloat)
  .option('--itra <n>', 'ITRA score', parseFloat)
  .option('--betrail <n>', 'Betrail score', parseFloat)
  .option('--scope <name>', 'Prediction config scope')
  .option('--json', 'Output raw JSON')
  .action(async (file: string, options) => {
    const { predictCommand } = await import('./predict.js');
    await predictCommand(file, options);
  });

// ===========================================
// Store Commands
// ===========================================

program
  .command('config')
  .description('Show or tune prediction coefficients')
  .argument('<subcommand>', 'show | set | reset')
  .argument('[pairs...]', 'key=value pairs for "set"')
  .option('--scope <name>', 'Config scope (default: global)')
  .option('--json', 'Output raw JSON')
  .action(async (subcommand: string, pairs: string[], options) => {
    const { configCommand } = await import('./config.js');
    await configCommand(subcommand, pairs, options);
  });

program
  .command('strategies')
  .description('List saved strategies, or show or delete one')
  .argument('[id]', 'Strategy ID')
  .option('--limit <n>', 'Number of strategies to list', parseInt)
  .option('--delete', 'Delete the strategy')
  .option('--json', 'Output raw JSON')
  .action(async (id: string | undefined, options) => {
    const { strategiesCommand } = await import('./strategies.js');
    await strategiesCommand(id, options);
  });

// ===========================================
// Utility Commands
// ===========================================

program
  .command('info')
  .description('Show database and system information')
  .action(async () => {
    const { infoCommand } = await import('./info.js');
    await infoCommand();
  });

program
  .command('init')
  .description('Initialize the database')
  .action(async () => {
    const { initializeDb, isDbInitialized, getDbInfo, closeDb, resolveDbPath } = await import('../db/client.js');
    const { verifySchema } = await import('../db/migrate.js');
    const { existsSync, mkdirSync } = await import('fs');
    const { dirname } = await import('path');

    const dbPath = resolveDbPath();

    if (isDbInitialized(dbPath)) {
      console.log(chalk.green('Database already initialized'));
      const info = getDbInfo();
      console.log(`  Path: ${info.path}`);
      console.log(`  Version: ${info.schemaVersion}`);
      console.log(`  Tables: ${info.tableCount}`);
      closeDb();
      return;
    }

    // Create directory if needed
    const dataDir = dirname(dbPath);
    if (!existsSync(dataDir)) {
      mkdirSync(dataDir, { recursive: true });
    }

    console.log(chalk.blue('Initializing database...'));
    initializeDb(dbPath);

    const { valid, issues } = verifySchema();
    if (valid) {
      console.log(chalk.green('Database initialized successfully!'));
      const info = getDbInfo();
      console.log(`  Path: ${info.path}`);
      console.log(`  Version: ${info.schemaVersion}`);
      console.log(`  Tables: ${info.tableCount}`);
    } else {
      console.error(chalk.red('Schema verification failed:'));
      issues.forEach(i => console.error(`  - ${i}`));
      process.exit(1);
    }

    closeDb();
  });

// Parse arguments
program.parseAsync().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(chalk.red(message));
  process.exit(1);
});
