/**
 * API Index - Re-export all API functions
 *
 * This is the single entry point for all API operations.
 * MCP server and other consumers should import from here.
 */

// Types
export * from './types.js';

// Tracks API
export {
  analyzeTrack,
  simplifyTrack,
  type AnalyzeTrackParams,
  type SimplifyTrackParams,
} from './tracks.js';

// Strategy API
export {
  planStrategy,
  saveStrategy,
  getStrategy,
  listSavedStrategies,
  deleteSavedStrategy,
  replanStrategy,
  type PlanStrategyParams,
  type SaveStrategyParams,
  type SaveStrategyResult,
} from './strategy.js';

// Prediction API
export {
  predictRaceTime,
  getPredictionConfigInfo,
  updatePredictionConfig,
  resetPredictionConfig,
  type PredictRaceParams,
} from './prediction.js';
