/**
 * Shared CLI output helpers
 */

import chalk from 'chalk';
import { closeDb, isDbInitialized, resolveDbPath } from '../db/client.js';
import type { ApiEnvelope } from '../api/types.js';

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

export function heading(title: string): void {
  console.log('');
  console.log(chalk.bold('═'.repeat(68)));
  console.log(chalk.bold.cyan(`  ${title}`));
  console.log(chalk.bold('═'.repeat(68)));
  console.log('');
}

/**
 * Unwrap an envelope, or print its error and exit
 */
export function unwrap<T>(envelope: ApiEnvelope<T>): T {
  if (envelope.ok && envelope.data !== undefined) {
    return envelope.data;
  }

  const code = envelope.error?.code ?? 'INTERNAL_ERROR';
  const message = envelope.error?.message ?? 'Unknown error';
  console.error(chalk.red(`${code}: ${message}`));
  console.error(chalk.gray(`trace: ${envelope.trace_id}`));
  closeDb();
  process.exit(1);
}

/**
 * True when the store is ready; prints the init hint otherwise
 */
export function requireDb(): boolean {
  if (isDbInitialized(resolveDbPath())) return true;

  console.log(chalk.yellow('Database not initialized'));
  console.log(`Run ${chalk.cyan('trailpace init')} to create the database`);
  return false;
}

/**
 * Numeric environment variable, or the fallback when unset or not a number
 */
export function envNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

export function pad(value: string | number, width: number): string {
  return String(value).padEnd(width);
}

export function padLeft(value: string | number, width: number): string {
  return String(value).padStart(width);
}
