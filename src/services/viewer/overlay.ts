import type { IndexRange, TraceGeolocation } from '../radargram/radargramStore';
import type { Position } from '../index/types';
import { computeBounds, type BoundingBox } from '../../utils/geo';

/**
 * GeoJSON features the host map draws while a radargram is open:
 * the crosshair position, the on-screen stretch of groundtrack, and the
 * bounding boxes of the view and of the whole transect.
 */

export type OverlayKind = 'cursor' | 'viewport-track' | 'viewport-bounds' | 'full-bounds';

export interface OverlayProperties {
  kind: OverlayKind;
  segmentId: string;
  traceIndex?: number;
}

export type OverlayFeature = GeoJSON.Feature<GeoJSON.Point | GeoJSON.LineString | GeoJSON.Polygon, OverlayProperties>;

/** Groundtrack lines are thinned to at most this many vertices. */
export const MAX_TRACK_VERTICES = 1000;

function toPosition(geo: TraceGeolocation): Position {
  return [geo.lon, geo.lat];
}

export function cursorFeature(segmentId: string, traceIndex: number, geo: TraceGeolocation): OverlayFeature {
  return {
    type: 'Feature',
    properties: { kind: 'cursor', segmentId, traceIndex },
    geometry: { type: 'Point', coordinates: toPosition(geo) },
  };
}

/** Positions of the traces in `range`, thinned to `maxVertices`, always keeping both ends. */
export function trackPositions(
  geolocations: readonly TraceGeolocation[],
  [start, end]: IndexRange,
  maxVertices = MAX_TRACK_VERTICES,
): Position[] {
  const count = end - start;
  const stride = Math.max(1, Math.ceil(count / maxVertices));
  const out: Position[] = [];
  for (let i = start; i < end; i += stride) out.push(toPosition(geolocations[i]));
  if ((count - 1) % stride !== 0) out.push(toPosition(geolocations[end - 1]));
  return out;
}

export function trackFeature(segmentId: string, positions: Position[]): OverlayFeature {
  // A single-trace view still needs two vertices to be a valid LineString
  const coordinates = positions.length === 1 ? [positions[0], positions[0]] : positions;
  return {
    type: 'Feature',
    properties: { kind: 'viewport-track', segmentId },
    geometry: { type: 'LineString', coordinates },
  };
}

export function boundsFeature(
  segmentId: string,
  kind: 'viewport-bounds' | 'full-bounds',
  [west, south, east, north]: BoundingBox,
): OverlayFeature {
  return {
    type: 'Feature',
    properties: { kind, segmentId },
    bbox: [west, south, east, north],
    geometry: {
      type: 'Polygon',
      coordinates: [[[west, south], [east, south], [east, north], [west, north], [west, south]]],
    },
  };
}

/** Bounding box over every trace in `range` (not the thinned line). */
export function rangeBounds(geolocations: readonly TraceGeolocation[], [start, end]: IndexRange): BoundingBox | null {
  return computeBounds(geolocations.slice(start, end).map(toPosition));
}
