/**
 * Schema checks
 */

import { getDb, query } from './client.js';
import { REQUIRED_TABLES } from './schema.js';

/**
 * Verify schema integrity
 */
export function verifySchema(): { valid: boolean; issues: string[] } {
  const issues: string[] = [];
  const db = getDb();

  const existingTables = new Set(
    query<{ name: string }>(
      "SELECT name FROM sqlite_master WHERE type='table'"
    ).map(t => t.name)
  );

  for (const table of REQUIRED_TABLES) {
    if (!existingTables.has(table)) {
      issues.push(`Missing required table: ${table}`);
    }
  }

  // WAL only applies to file-backed databases
  if (!db.memory) {
    const journalMode = db.pragma('journal_mode', { simple: true });
    if (journalMode !== 'wal') {
      issues.push(`Expected journal_mode=wal, got ${journalMode}`);
    }
  }

  return {
    valid: issues.length === 0,
    issues,
  };
}
