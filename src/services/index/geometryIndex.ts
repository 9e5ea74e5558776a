import { readFile } from 'node:fs/promises';
import type {
  AuthClass,
  Availability,
  Checksum,
  DownloadMethod,
  GeometryIndex,
  IndexCrs,
  Position,
  RemoteResource,
  SegmentRecord,
} from './types';

/**
 * In-memory GeometryIndex over a GeoJSON FeatureCollection of LineString /
 * MultiLineString groundtracks.
 *
 * Feature properties follow the granules table of the compiled index:
 * `name`, `region`, `institution`, `campaign`, `granule`, `product`,
 * `data_format`, `availability` ('a' | 's' | 'u'), `download_method`, `url`,
 * `relative_path`, `filesize`, and optionally `checksum` ("sha256:<hex>")
 * and `auth` ('none' | 'bearer' | 'aad').
 */
export class MemoryGeometryIndex implements GeometryIndex {
  readonly crs: IndexCrs;
  private segments = new Map<string, SegmentRecord>();

  constructor(segments: Iterable<SegmentRecord>, crs: IndexCrs = 'geographic') {
    this.crs = crs;
    for (const seg of segments) {
      if (this.segments.has(seg.id)) {
        throw new Error(`Duplicate segment id in index: ${seg.id}`);
      }
      this.segments.set(seg.id, seg);
    }
  }

  get(id: string): SegmentRecord | undefined {
    return this.segments.get(id);
  }

  *segmentsWithin(visibleIds: Iterable<string>): Iterable<SegmentRecord> {
    const seen = new Set<string>();
    for (const id of visibleIds) {
      if (seen.has(id)) continue;
      seen.add(id);
      const seg = this.segments.get(id);
      if (seg) yield seg;
    }
  }

  all(): Iterable<SegmentRecord> {
    return this.segments.values();
  }

  get size(): number {
    return this.segments.size;
  }
}

function str(value: unknown, fallback = ''): string {
  return typeof value === 'string' ? value : fallback;
}

function isPosition(value: unknown): value is Position {
  return (
    Array.isArray(value) &&
    value.length >= 2 &&
    typeof value[0] === 'number' &&
    typeof value[1] === 'number' &&
    Number.isFinite(value[0]) &&
    Number.isFinite(value[1])
  );
}

function parseGroundtrack(geometry: GeoJSON.Geometry | null): Position[] {
  if (!geometry) return [];
  const lines: unknown[][] = [];
  if (geometry.type === 'LineString') {
    lines.push(geometry.coordinates);
  } else if (geometry.type === 'MultiLineString') {
    lines.push(...geometry.coordinates);
  } else {
    return [];
  }
  const track: Position[] = [];
  for (const line of lines) {
    for (const coord of line) {
      if (isPosition(coord)) track.push([coord[0], coord[1]]);
    }
  }
  return track;
}

function parseAvailability(value: unknown): Availability {
  // Index codes: 'u' = not publicly released, 'a'/'s' = released
  if (value === 'u' || value === 'unavailable') return 'unavailable';
  return 'available-remote';
}

function parseDownloadMethod(value: unknown): DownloadMethod {
  switch (value) {
    case 'wget':
    case 'http':
      return 'http';
    case 'nsidc':
      return 'nsidc';
    default:
      return 'manual';
  }
}

function parseAuthClass(value: unknown, method: DownloadMethod): AuthClass {
  if (value === 'none' || value === 'bearer' || value === 'aad') return value;
  return method === 'nsidc' ? 'bearer' : 'none';
}

/** Parse "sha256:<hex>" / "md5:<hex>". */
export function parseChecksum(value: unknown): Checksum | undefined {
  if (typeof value !== 'string') return undefined;
  const match = value.trim().match(/^(sha256|md5):([0-9a-fA-F]+)$/);
  if (!match) return undefined;
  const algorithm = match[1] === 'md5' ? 'md5' : 'sha256';
  return { algorithm, value: match[2].toLowerCase() };
}

function parseRemote(p: Record<string, unknown>): RemoteResource | null {
  const url = str(p.url);
  const relativePath = str(p.relative_path);
  const sizeBytes = typeof p.filesize === 'number' ? p.filesize : Number.NaN;
  if (!url || !relativePath || !Number.isFinite(sizeBytes) || sizeBytes < 0) return null;

  const downloadMethod = parseDownloadMethod(p.download_method);
  return {
    url,
    downloadMethod,
    authClass: parseAuthClass(p.auth, downloadMethod),
    sizeBytes,
    checksum: parseChecksum(p.checksum),
    relativePath,
  };
}

/**
 * Convert a GeoJSON FeatureCollection to segment records.
 * Features without a name or a usable groundtrack are skipped.
 */
export function segmentsFromGeoJSON(collection: GeoJSON.FeatureCollection<GeoJSON.Geometry | null>): SegmentRecord[] {
  const segments: SegmentRecord[] = [];

  for (const feature of collection.features) {
    const p = feature.properties;
    if (!p) continue;

    const id = str(p.name) || (typeof feature.id === 'string' ? feature.id : '');
    if (!id) continue;

    const groundtrack = parseGroundtrack(feature.geometry);
    if (groundtrack.length === 0) continue;

    segments.push({
      id,
      region: str(p.region).toUpperCase(),
      institution: str(p.institution),
      campaign: str(p.campaign),
      granule: str(p.granule),
      product: str(p.product),
      dataFormat: str(p.data_format),
      groundtrack,
      availability: parseAvailability(p.availability),
      remote: parseRemote(p),
    });
  }

  return segments;
}

function isFeatureCollection(value: unknown): value is GeoJSON.FeatureCollection<GeoJSON.Geometry | null> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    value.type === 'FeatureCollection' &&
    'features' in value &&
    Array.isArray(value.features)
  );
}

/** Load an index from a GeoJSON file on disk. */
export async function loadGeometryIndex(path: string, crs: IndexCrs = 'geographic'): Promise<MemoryGeometryIndex> {
  const raw = await readFile(path, 'utf8');
  const parsed: unknown = JSON.parse(raw);
  if (!isFeatureCollection(parsed)) {
    throw new Error(`Index ${path} is not a GeoJSON FeatureCollection`);
  }
  return new MemoryGeometryIndex(segmentsFromGeoJSON(parsed), crs);
}
