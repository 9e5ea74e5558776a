import type { Position } from '../services/index/types';

const EARTH_RADIUS_M = 6371008.8;

function toRad(deg: number): number {
  return (deg * Math.PI) / 180;
}

/**
 * Haversine distance between two points, in metres.
 */
export function haversineDistance(
  lat1: number, lon1: number,
  lat2: number, lon2: number,
): number {
  const dLat = toRad(lat2 - lat1);
  const dLon = toRad(lon2 - lon1);
  const a =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRad(lat1)) * Math.cos(toRad(lat2)) * Math.sin(dLon / 2) ** 2;
  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
  return EARTH_RADIUS_M * c;
}

/**
 * Cumulative along-track distance (metres) for every vertex of a track.
 * First entry is always 0.
 */
export function alongTrackDistances(lats: ArrayLike<number>, lons: ArrayLike<number>): Float64Array {
  const n = Math.min(lats.length, lons.length);
  const out = new Float64Array(n);
  for (let i = 1; i < n; i++) {
    out[i] = out[i - 1] + haversineDistance(lats[i - 1], lons[i - 1], lats[i], lons[i]);
  }
  return out;
}

/** Wrap a longitude difference into [-180, 180). */
function wrapLon(dLon: number): number {
  return ((((dLon + 180) % 360) + 360) % 360) - 180;
}

export interface NearestPoint {
  /** Nearest point on the polyline, same coordinate order as the input */
  point: Position;
  distance: number;
  /** Index of the first vertex of the edge the nearest point lies on */
  vertexIndex: number;
}

/**
 * Closest point on segment AB to P in a plane. Returns parameter t in [0, 1].
 */
function projectOntoSegment(
  px: number, py: number,
  ax: number, ay: number,
  bx: number, by: number,
): number {
  const dx = bx - ax;
  const dy = by - ay;
  const len2 = dx * dx + dy * dy;
  if (len2 === 0) return 0;
  const t = ((px - ax) * dx + (py - ay) * dy) / len2;
  return Math.min(1, Math.max(0, t));
}

/**
 * Nearest point on a projected polyline, Euclidean distance in map units.
 */
export function nearestPointPlanar(click: Position, track: Position[]): NearestPoint | null {
  if (track.length === 0) return null;
  if (track.length === 1) {
    const [x, y] = track[0];
    return { point: [x, y], distance: Math.hypot(click[0] - x, click[1] - y), vertexIndex: 0 };
  }

  let best: NearestPoint | null = null;
  for (let i = 0; i < track.length - 1; i++) {
    const [ax, ay] = track[i];
    const [bx, by] = track[i + 1];
    const t = projectOntoSegment(click[0], click[1], ax, ay, bx, by);
    const x = ax + (bx - ax) * t;
    const y = ay + (by - ay) * t;
    const distance = Math.hypot(click[0] - x, click[1] - y);
    if (!best || distance < best.distance) {
      best = { point: [x, y], distance, vertexIndex: i };
    }
  }
  return best;
}

/**
 * Nearest point on a [lon, lat] polyline with geodesic (haversine) distance in metres.
 *
 * Each edge is projected into a local equirectangular plane centred on the
 * click, which keeps the per-edge projection exact enough at transect scale
 * and handles the antimeridian by wrapping longitude differences.
 */
export function nearestPointGeodesic(click: Position, track: Position[]): NearestPoint | null {
  if (track.length === 0) return null;

  const [clon, clat] = click;
  const kx = Math.cos(toRad(clat));
  const toLocal = ([lon, lat]: Position): [number, number] => [wrapLon(lon - clon) * kx, lat - clat];

  if (track.length === 1) {
    const [lon, lat] = track[0];
    return { point: [lon, lat], distance: haversineDistance(clat, clon, lat, lon), vertexIndex: 0 };
  }

  let best: NearestPoint | null = null;
  for (let i = 0; i < track.length - 1; i++) {
    const a = track[i];
    const b = track[i + 1];
    const [ax, ay] = toLocal(a);
    const [bx, by] = toLocal(b);
    const t = projectOntoSegment(0, 0, ax, ay, bx, by);
    const lon = a[0] + wrapLon(b[0] - a[0]) * t;
    const lat = a[1] + (b[1] - a[1]) * t;
    const distance = haversineDistance(clat, clon, lat, lon);
    if (!best || distance < best.distance) {
      best = { point: [lon, lat], distance, vertexIndex: i };
    }
  }
  return best;
}

export type BoundingBox = [west: number, south: number, east: number, north: number];

/**
 * Bounding box of a set of [lon, lat] positions. Returns null for an empty set.
 */
export function computeBounds(points: Iterable<Position>): BoundingBox | null {
  let west = Infinity;
  let south = Infinity;
  let east = -Infinity;
  let north = -Infinity;
  for (const [lon, lat] of points) {
    if (lon < west) west = lon;
    if (lon > east) east = lon;
    if (lat < south) south = lat;
    if (lat > north) north = lat;
  }
  if (west === Infinity) return null;
  return [west, south, east, north];
}
