/**
 * trailpace - trail route analytics and pacing
 */

export * from './geo/types.js';
export { EARTH_RADIUS_M, haversineMeters, trackLengthMeters } from './geo/distance.js';

export {
  computeMetrics,
  effortKm,
  itraPoints,
  classifyRoute,
  estimateProfileTime,
  longestClimb,
  EFFORT_PROFILES,
} from './analytics/metrics.js';
export { inferAttributes } from './analytics/attributes.js';
export { toGeoJson, type TrackFeature } from './analytics/geojson.js';
export { simplify, DEFAULT_TOLERANCE_DEG } from './analytics/simplify.js';

export * from './strategy/types.js';
export { normalizeWaypoints, coerceWaypoint } from './strategy/waypoints.js';
export { planPacing, stepCost, buildSegments, distributeTime } from './strategy/pacing.js';

export * from './prediction/config.js';
export * from './prediction/predictor.js';

export * from './util/format.js';

export * as api from './api/index.js';
