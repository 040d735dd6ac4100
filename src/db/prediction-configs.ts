/**
 * Prediction config store
 *
 * Resolution order: defaults <- 'global' scope <- user scope.
 */

import { execute, queryOne } from './client.js';
import {
  DEFAULT_PREDICTION_CONFIG,
  mergePredictionConfig,
  sanitizePredictionOverride,
  type PredictionConfig,
} from '../prediction/config.js';

export const GLOBAL_SCOPE = 'global';

interface PredictionConfigRow {
  scope: string;
  config: string;
  updated_at: string;
}

function parseOverride(raw: string): Partial<PredictionConfig> {
  try {
    return sanitizePredictionOverride(JSON.parse(raw));
  } catch {
    // Corrupt row: behave as if nothing were stored
    return {};
  }
}

/**
 * Stored override for a scope, or null when none is saved
 */
export function getStoredOverride(scope: string = GLOBAL_SCOPE): Partial<PredictionConfig> | null {
  const row = queryOne<PredictionConfigRow>(
    'SELECT * FROM prediction_configs WHERE scope = ?',
    [scope]
  );
  return row ? parseOverride(row.config) : null;
}

/**
 * Effective config for a user (or the global config when no user is given)
 */
export function getPredictionConfig(userScope?: string): Readonly<PredictionConfig> {
  const globalOverride = getStoredOverride(GLOBAL_SCOPE);
  const userOverride = userScope && userScope !== GLOBAL_SCOPE
    ? getStoredOverride(userScope)
    : null;

  return mergePredictionConfig(DEFAULT_PREDICTION_CONFIG, globalOverride, userOverride);
}

/**
 * Merge values into a scope's stored override. Unknown keys and
 * non-numeric values are dropped. Returns the stored override.
 */
export function savePredictionOverride(
  values: Record<string, unknown>,
  scope: string = GLOBAL_SCOPE
): Partial<PredictionConfig> {
  const next = {
    ...(getStoredOverride(scope) ?? {}),
    ...sanitizePredictionOverride(values),
  };

  execute(
    `INSERT INTO prediction_configs (scope, config, updated_at)
     VALUES (?, ?, datetime('now'))
     ON CONFLICT(scope) DO UPDATE SET config = excluded.config, updated_at = excluded.updated_at`,
    [scope, JSON.stringify(next)]
  );

  return next;
}

/**
 * Drop a scope's override. Returns false when nothing was stored.
 */
export function resetPredictionOverride(scope: string = GLOBAL_SCOPE): boolean {
  const result = execute('DELETE FROM prediction_configs WHERE scope = ?', [scope]);
  return result.changes > 0;
}
