/**
 * GeoJSON export for map display
 */

import { elevationOf, type Track } from '../geo/types.js';

export interface TrackFeature {
  type: 'Feature';
  geometry: {
    type: 'LineString';
    /** [lon, lat, ele] per point; missing elevation is written as 0 */
    coordinates: [number, number, number][];
  };
  properties: {
    name: string;
  };
}

export function toGeoJson(points: Track, name?: string): TrackFeature | null {
  if (points.length === 0) return null;

  return {
    type: 'Feature',
    geometry: {
      type: 'LineString',
      coordinates: points.map(p => [p.lon, p.lat, elevationOf(p) ?? 0]),
    },
    properties: {
      name: name && name.trim() ? name : 'Track',
    },
  };
}
