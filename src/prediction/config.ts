/**
 * Prediction Config - Tunable coefficients for the finish-time predictor
 *
 * Defaults live here. Stored overrides (global, then per user) are merged on
 * top, and the predictor only ever sees a frozen snapshot.
 */

export interface PredictionConfig {
  /** km-effort/h gained per index point */
  base_speed_slope: number;
  base_speed_intercept: number;
  min_speed_kmeh: number;
  /** Gradient ratios are meters of climb per km */
  tech_factor_1_threshold: number;
  tech_factor_1_hilly: number;
  tech_factor_2_threshold: number;
  tech_factor_2_mountain: number;
  tech_factor_3_threshold: number;
  tech_factor_3_alpine: number;
  decay_start_km: number;
  decay_step_km: number;
  decay_rate_per_step: number;
  decay_max_total: number;
  endurance_multiplier: number;
  push_multiplier: number;
}

export type PredictionConfigKey = keyof PredictionConfig;

export const DEFAULT_PREDICTION_CONFIG: Readonly<PredictionConfig> = Object.freeze({
  base_speed_slope: 0.024,
  base_speed_intercept: 4.0,
  min_speed_kmeh: 3.0,
  tech_factor_1_threshold: 40,
  tech_factor_1_hilly: 0.95,
  tech_factor_2_threshold: 60,
  tech_factor_2_mountain: 0.85,
  tech_factor_3_threshold: 90,
  tech_factor_3_alpine: 0.70,
  decay_start_km: 40,
  decay_step_km: 20,
  decay_rate_per_step: 0.05,
  decay_max_total: 0.40,
  endurance_multiplier: 0.85,
  push_multiplier: 1.15,
});

export const PREDICTION_CONFIG_KEYS: readonly PredictionConfigKey[] = [
  'base_speed_slope',
  'base_speed_intercept',
  'min_speed_kmeh',
  'tech_factor_1_threshold',
  'tech_factor_1_hilly',
  'tech_factor_2_threshold',
  'tech_factor_2_mountain',
  'tech_factor_3_threshold',
  'tech_factor_3_alpine',
  'decay_start_km',
  'decay_step_km',
  'decay_rate_per_step',
  'decay_max_total',
  'endurance_multiplier',
  'push_multiplier',
];

export function isPredictionConfigKey(key: string): key is PredictionConfigKey {
  return PREDICTION_CONFIG_KEYS.some(k => k === key);
}

function toFiniteNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Keep only known keys with numeric values (numeric strings are converted)
 */
export function sanitizePredictionOverride(raw: unknown): Partial<PredictionConfig> {
  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) return {};

  const override: Partial<PredictionConfig> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!isPredictionConfigKey(key)) continue;
    const num = toFiniteNumber(value);
    if (num !== null) override[key] = num;
  }
  return override;
}

/**
 * Merge overrides onto a base config, later overrides winning per key.
 * The result is frozen so one prediction reads one consistent snapshot.
 */
export function mergePredictionConfig(
  base: Readonly<PredictionConfig> = DEFAULT_PREDICTION_CONFIG,
  ...overrides: readonly (Partial<PredictionConfig> | null | undefined)[]
): Readonly<PredictionConfig> {
  const merged: PredictionConfig = { ...base };
  for (const override of overrides) {
    Object.assign(merged, sanitizePredictionOverride(override));
  }
  return Object.freeze(merged);
}
