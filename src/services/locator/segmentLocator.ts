import { nearestPointGeodesic, nearestPointPlanar } from '../../utils/geo';
import type { GeometryIndex, Position, SegmentRecord } from '../index/types';

export const DEFAULT_MAX_CANDIDATES = 5;

export interface Candidate {
  segment: SegmentRecord;
  /** Metres for geographic indexes, map units for projected ones */
  distance: number;
  /** Nearest point on the groundtrack */
  nearestPoint: Position;
  /** First vertex of the groundtrack edge holding nearestPoint */
  nearestVertexIndex: number;
}

export interface LocateOptions {
  /** Drop candidates farther than this (same units as Candidate.distance) */
  maxDistance?: number;
}

function compareCandidates(a: Candidate, b: Candidate): number {
  if (a.distance !== b.distance) return a.distance - b.distance;
  if (a.segment.id === b.segment.id) return 0;
  return a.segment.id < b.segment.id ? -1 : 1;
}

/**
 * Rank the visible segments by distance from a clicked point.
 *
 * Only ids listed in `visibleSegmentIds` are considered: the host passes the
 * segments whose layers are currently shown. An empty result means "nothing
 * nearby", not a failure. Ties break by segment id so repeated clicks give the
 * same order.
 */
export function locate(
  index: GeometryIndex,
  clickPoint: Position,
  visibleSegmentIds: Iterable<string>,
  maxCandidates = DEFAULT_MAX_CANDIDATES,
  options: LocateOptions = {},
): Candidate[] {
  if (!Number.isInteger(maxCandidates) || maxCandidates < 0) {
    throw new RangeError(`maxCandidates must be a non-negative integer, got ${maxCandidates}`);
  }
  if (maxCandidates === 0) return [];

  const nearest = index.crs === 'geographic' ? nearestPointGeodesic : nearestPointPlanar;
  const maxDistance = options.maxDistance ?? Infinity;
  const candidates: Candidate[] = [];

  for (const segment of index.segmentsWithin(visibleSegmentIds)) {
    const hit = nearest(clickPoint, segment.groundtrack);
    if (!hit || hit.distance > maxDistance) continue;
    candidates.push({
      segment,
      distance: hit.distance,
      nearestPoint: hit.point,
      nearestVertexIndex: hit.vertexIndex,
    });
  }

  candidates.sort(compareCandidates);
  return candidates.slice(0, maxCandidates);
}
