import type { FileHandle } from 'node:fs/promises';
import { FormatError } from '../errors';
import { alongTrackDistances } from '../../utils/geo';
import type { RadargramMetadata } from './format';

export interface TraceGeolocation {
  lat: number;
  lon: number;
  /** Cumulative distance from the first trace, metres */
  alongTrackM: number;
  /** Seconds since the epoch; NaN when the file has no timing */
  utc: number;
}

/** Loads the decoded samples for one tile of traces, trace-major. */
export interface SampleSource {
  loadTile(tileIndex: number): Promise<Float32Array>;
  close(): Promise<void>;
}

/** Everything about an opened file except its samples. */
export interface SourceInfo {
  traceCount: number;
  sampleCount: number;
  metadata: RadargramMetadata;
  fastTime: Float64Array;
  geolocations: TraceGeolocation[];
  product: string;
  availableProducts: string[];
}

/** Samples held in memory; tiles are views into one array. */
export class InMemorySource implements SampleSource {
  constructor(
    private samples: Float32Array,
    private tileLength: number,
  ) {}

  async loadTile(tileIndex: number): Promise<Float32Array> {
    const start = tileIndex * this.tileLength;
    return this.samples.subarray(start, Math.min(start + this.tileLength, this.samples.length));
  }

  async close(): Promise<void> {}
}

export function checkFastTime(fastTime: Float64Array, path: string): void {
  for (let i = 0; i < fastTime.length; i++) {
    if (!Number.isFinite(fastTime[i]) || (i > 0 && !(fastTime[i] > fastTime[i - 1]))) {
      throw new FormatError(`${path}: fast time is not strictly increasing at sample ${i}`, path);
    }
  }
}

/** Per-trace positions with along-track distance; every trace needs a finite position. */
export function buildGeolocations(
  lats: Float64Array,
  lons: Float64Array,
  utc: (traceIndex: number) => number,
  path: string,
): TraceGeolocation[] {
  for (let i = 0; i < lats.length; i++) {
    if (!Number.isFinite(lats[i]) || !Number.isFinite(lons[i])) {
      throw new FormatError(`${path}: trace ${i} has no position`, path);
    }
  }
  const along = alongTrackDistances(lats, lons);
  return Array.from({ length: lats.length }, (_, i): TraceGeolocation => ({
    lat: lats[i],
    lon: lons[i],
    alongTrackM: along[i],
    utc: utc(i),
  }));
}

/** Fill `buffer` from `position`, failing if the file ends first. */
export async function readExactly(
  handle: FileHandle,
  buffer: Uint8Array,
  position: number,
  path: string,
  what: string,
): Promise<void> {
  let read = 0;
  while (read < buffer.length) {
    const { bytesRead } = await handle.read(buffer, read, buffer.length - read, position + read);
    if (bytesRead === 0) {
      throw new FormatError(`${path}: file ended inside ${what}`, path);
    }
    read += bytesRead;
  }
}

/** Throws unless `requested` is one of the products the file carries. */
export function checkProduct(requested: string | undefined, available: readonly string[], path: string): string {
  const product = requested ?? available[0];
  if (!available.includes(product)) {
    throw new RangeError(`${path} has no product "${product}"; available: ${available.join(', ')}`);
  }
  return product;
}
