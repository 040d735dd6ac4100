/**
 * Info command - Show database and system information
 */

import chalk from 'chalk';
import { getDbInfo, closeDb, isDbInitialized, queryOne, resolveDbPath } from '../db/client.js';
import { verifySchema } from '../db/migrate.js';

export async function infoCommand(): Promise<void> {
  console.log(chalk.bold('Trailpace System Information'));
  console.log('============================');
  console.log('');

  const dbPath = resolveDbPath();

  if (!isDbInitialized(dbPath)) {
    console.log(chalk.yellow('Database not initialized'));
    console.log(`Run ${chalk.cyan('trailpace init')} to create the database`);
    return;
  }

  // Database info
  const info = getDbInfo();
  console.log(chalk.bold('Database'));
  console.log(`  Path: ${info.path}`);
  console.log(`  Schema version: ${info.schemaVersion}`);
  console.log(`  Journal mode: ${info.journalMode}`);
  console.log(`  Tables: ${info.tableCount}`);

  // Schema verification
  const { valid, issues } = verifySchema();
  console.log(`  Schema valid: ${valid ? chalk.green('Yes') : chalk.red('No')}`);
  if (!valid) {
    issues.forEach(i => console.log(chalk.red(`    - ${i}`)));
  }

  console.log('');

  // Stored data
  if (valid) {
    const strategies = queryOne<{ count: number }>('SELECT COUNT(*) AS count FROM strategies');
    const scopes = queryOne<{ count: number }>('SELECT COUNT(*) AS count FROM prediction_configs');
    console.log(chalk.bold('Data'));
    console.log(`  Saved strategies: ${strategies?.count ?? 0}`);
    console.log(`  Config scopes: ${scopes?.count ?? 0}`);
    console.log('');
  }

  // Environment
  console.log(chalk.bold('Environment'));
  console.log(`  Start hour: ${process.env.TRAILPACE_START_HOUR ?? chalk.gray('default')}`);
  console.log(`  Fatigue: ${process.env.TRAILPACE_FATIGUE ?? chalk.gray('default')}`);
  console.log(`  Performance index: ${process.env.TRAILPACE_PERFORMANCE_INDEX ?? chalk.gray('default')}`);

  closeDb();
}
